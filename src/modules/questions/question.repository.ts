import { z } from 'zod';
import type { SQLiteTenantClient } from '../../infrastructure/sqlite/client.js';
import { jsonColumn, optionalText } from '../../infrastructure/sqlite/rows.js';
import { createInMemoryTable, type Repository, type Snapshottable } from '../../common/repository.js';
import { QUESTION_TYPES, questionContentSchema, type Question } from './question.model.js';

export interface QuestionRepository extends Repository<Question> {
  listByIds(tenantId: string, ids: string[]): Question[];
}

export function createInMemoryQuestionRepository(): QuestionRepository & Snapshottable {
  const table = createInMemoryTable<Question>();
  return {
    save(question) {
      return table.put(question);
    },
    getById(tenantId, id) {
      return table.get(tenantId, id);
    },
    listByIds(tenantId, ids) {
      const wanted = new Set(ids);
      return table.values().filter(q => q.tenantId === tenantId && wanted.has(q.id));
    },
    snapshot: () => table.snapshot(),
  };
}

const questionRowSchema = z.object({
  id: z.string(),
  tenantId: z.string(),
  type: z.enum(QUESTION_TYPES),
  text: z.string(),
  defaultPoints: z.number(),
  contentJson: jsonColumn(questionContentSchema),
  explanation: optionalText,
  createdBy: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

function toQuestion(row: unknown): Question {
  const { contentJson, ...rest } = questionRowSchema.parse(row);
  return { ...rest, content: contentJson };
}

const QUESTION_COLUMNS = `id, tenant_id as tenantId, type, text, default_points as defaultPoints, content_json as contentJson,
  explanation, created_by as createdBy, created_at as createdAt, updated_at as updatedAt`;

export function createSQLiteQuestionRepository(client: SQLiteTenantClient): QuestionRepository {
  return {
    save(question) {
      const db = client.getConnection(question.tenantId);
      db.prepare(`
        INSERT INTO questions (id, tenant_id, type, text, default_points, content_json, explanation, created_by, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          type = excluded.type,
          text = excluded.text,
          default_points = excluded.default_points,
          content_json = excluded.content_json,
          explanation = excluded.explanation,
          updated_at = excluded.updated_at
      `).run(
        question.id,
        question.tenantId,
        question.content.type,
        question.text,
        question.defaultPoints,
        JSON.stringify(question.content),
        question.explanation ?? null,
        question.createdBy,
        question.createdAt,
        question.updatedAt,
      );
      return question;
    },
    getById(tenantId, id) {
      const db = client.getConnection(tenantId);
      const row = db.prepare(`SELECT ${QUESTION_COLUMNS} FROM questions WHERE id = ? AND tenant_id = ?`).get(id, tenantId);
      return row ? toQuestion(row) : undefined;
    },
    listByIds(tenantId, ids) {
      if (ids.length === 0) {
        return [];
      }
      const db = client.getConnection(tenantId);
      const placeholders = ids.map(() => '?').join(', ');
      return db
        .prepare(`SELECT ${QUESTION_COLUMNS} FROM questions WHERE tenant_id = ? AND id IN (${placeholders})`)
        .all(tenantId, ...ids)
        .map(toQuestion);
    },
  };
}
