import { z } from 'zod';
import type { SQLiteTenantClient } from '../../infrastructure/sqlite/client.js';
import { jsonColumn, optionalText } from '../../infrastructure/sqlite/rows.js';
import { createInMemoryTable, type Repository, type Snapshottable } from '../../common/repository.js';
import { ValidationError } from '../../common/errors.js';
import {
  ASSESSMENT_STATUSES,
  MAX_ASSESSMENT_POINTS,
  assessmentSettingsSchema,
  type Assessment,
  type AssessmentQuestion,
} from './assessment.model.js';

export interface AssessmentRepository extends Repository<Assessment> {
  list(tenantId: string): Assessment[];
}

export interface AssessmentQuestionRepository extends Repository<AssessmentQuestion> {
  /** Rows of one assessment, sorted by their display order. */
  listByAssessment(tenantId: string, assessmentId: string): AssessmentQuestion[];
  listByQuestion(tenantId: string, questionId: string): AssessmentQuestion[];
}

function assertPointsBudget(existing: AssessmentQuestion[], candidate: AssessmentQuestion) {
  if (candidate.points < 0) {
    throw new ValidationError('Question points cannot be negative');
  }
  const others = existing.filter(row => row.id !== candidate.id && row.questionId !== candidate.questionId);
  const total = others.reduce((sum, row) => sum + row.points, 0) + candidate.points;
  if (total > MAX_ASSESSMENT_POINTS) {
    throw new ValidationError(
      `Assessment ${candidate.assessmentId} would total ${total} points; the maximum is ${MAX_ASSESSMENT_POINTS}`,
    );
  }
}

const byOrder = (a: AssessmentQuestion, b: AssessmentQuestion) => a.order - b.order;

export function createInMemoryAssessmentRepository(): AssessmentRepository & Snapshottable {
  const table = createInMemoryTable<Assessment>();
  return {
    save(assessment) {
      return table.put(assessment);
    },
    getById(tenantId, id) {
      return table.get(tenantId, id);
    },
    list(tenantId) {
      return table.values().filter(a => a.tenantId === tenantId);
    },
    snapshot: () => table.snapshot(),
  };
}

export function createInMemoryAssessmentQuestionRepository(): AssessmentQuestionRepository & Snapshottable {
  const table = createInMemoryTable<AssessmentQuestion>();
  const listByAssessment = (tenantId: string, assessmentId: string) =>
    table
      .values()
      .filter(row => row.tenantId === tenantId && row.assessmentId === assessmentId)
      .sort(byOrder);
  return {
    save(row) {
      assertPointsBudget(listByAssessment(row.tenantId, row.assessmentId), row);
      return table.put(row);
    },
    getById(tenantId, id) {
      return table.get(tenantId, id);
    },
    listByAssessment,
    listByQuestion(tenantId, questionId) {
      return table.values().filter(row => row.tenantId === tenantId && row.questionId === questionId);
    },
    snapshot: () => table.snapshot(),
  };
}

const assessmentRowSchema = z.object({
  id: z.string(),
  tenantId: z.string(),
  title: z.string(),
  description: optionalText,
  status: z.enum(ASSESSMENT_STATUSES),
  durationMinutes: z.number(),
  passingScore: z.number(),
  maxAttempts: z.number(),
  dueDate: optionalText,
  createdBy: z.string(),
  settingsJson: jsonColumn(assessmentSettingsSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
});

function toAssessment(row: unknown): Assessment {
  const { settingsJson, ...rest } = assessmentRowSchema.parse(row);
  return { ...rest, settings: settingsJson };
}

const ASSESSMENT_COLUMNS = `id, tenant_id as tenantId, title, description, status, duration_minutes as durationMinutes,
  passing_score as passingScore, max_attempts as maxAttempts, due_date as dueDate, created_by as createdBy,
  settings_json as settingsJson, created_at as createdAt, updated_at as updatedAt`;

export function createSQLiteAssessmentRepository(client: SQLiteTenantClient): AssessmentRepository {
  return {
    save(assessment) {
      const db = client.getConnection(assessment.tenantId);
      db.prepare(`
        INSERT INTO assessments (id, tenant_id, title, description, status, duration_minutes, passing_score, max_attempts, due_date, created_by, settings_json, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          title = excluded.title,
          description = excluded.description,
          status = excluded.status,
          duration_minutes = excluded.duration_minutes,
          passing_score = excluded.passing_score,
          max_attempts = excluded.max_attempts,
          due_date = excluded.due_date,
          created_by = excluded.created_by,
          settings_json = excluded.settings_json,
          updated_at = excluded.updated_at
      `).run(
        assessment.id,
        assessment.tenantId,
        assessment.title,
        assessment.description ?? null,
        assessment.status,
        assessment.durationMinutes,
        assessment.passingScore,
        assessment.maxAttempts,
        assessment.dueDate ?? null,
        assessment.createdBy,
        JSON.stringify(assessment.settings),
        assessment.createdAt,
        assessment.updatedAt,
      );
      return assessment;
    },
    getById(tenantId, id) {
      const db = client.getConnection(tenantId);
      const row = db.prepare(`SELECT ${ASSESSMENT_COLUMNS} FROM assessments WHERE id = ? AND tenant_id = ?`).get(id, tenantId);
      return row ? toAssessment(row) : undefined;
    },
    list(tenantId) {
      const db = client.getConnection(tenantId);
      return db
        .prepare(`SELECT ${ASSESSMENT_COLUMNS} FROM assessments WHERE tenant_id = ? ORDER BY created_at DESC`)
        .all(tenantId)
        .map(toAssessment);
    },
  };
}

const assessmentQuestionRowSchema = z.object({
  id: z.string(),
  tenantId: z.string(),
  assessmentId: z.string(),
  questionId: z.string(),
  order: z.number(),
  points: z.number(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const ASSESSMENT_QUESTION_COLUMNS = `id, tenant_id as tenantId, assessment_id as assessmentId, question_id as questionId,
  position as "order", points, created_at as createdAt, updated_at as updatedAt`;

export function createSQLiteAssessmentQuestionRepository(client: SQLiteTenantClient): AssessmentQuestionRepository {
  const listByAssessment = (tenantId: string, assessmentId: string) => {
    const db = client.getConnection(tenantId);
    return db
      .prepare(`SELECT ${ASSESSMENT_QUESTION_COLUMNS} FROM assessment_questions WHERE tenant_id = ? AND assessment_id = ? ORDER BY position`)
      .all(tenantId, assessmentId)
      .map(row => assessmentQuestionRowSchema.parse(row));
  };
  return {
    save(row) {
      const db = client.getConnection(row.tenantId);
      db.transaction(() => {
        assertPointsBudget(listByAssessment(row.tenantId, row.assessmentId), row);
        db.prepare(`
          INSERT INTO assessment_questions (id, tenant_id, assessment_id, question_id, position, points, created_at, updated_at)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?)
          ON CONFLICT(tenant_id, assessment_id, question_id) DO UPDATE SET
            position = excluded.position,
            points = excluded.points,
            updated_at = excluded.updated_at
        `).run(row.id, row.tenantId, row.assessmentId, row.questionId, row.order, row.points, row.createdAt, row.updatedAt);
      });
      return row;
    },
    getById(tenantId, id) {
      const db = client.getConnection(tenantId);
      const row = db.prepare(`SELECT ${ASSESSMENT_QUESTION_COLUMNS} FROM assessment_questions WHERE id = ? AND tenant_id = ?`).get(id, tenantId);
      return row ? assessmentQuestionRowSchema.parse(row) : undefined;
    },
    listByAssessment,
    listByQuestion(tenantId, questionId) {
      const db = client.getConnection(tenantId);
      return db
        .prepare(`SELECT ${ASSESSMENT_QUESTION_COLUMNS} FROM assessment_questions WHERE tenant_id = ? AND question_id = ?`)
        .all(tenantId, questionId)
        .map(row => assessmentQuestionRowSchema.parse(row));
    },
  };
}
