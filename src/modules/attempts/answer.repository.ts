import { z } from 'zod';
import type { SQLiteTenantClient } from '../../infrastructure/sqlite/client.js';
import { jsonColumn, nullableBoolean, optionalText, sqliteBoolean, toSqliteBoolean } from '../../infrastructure/sqlite/rows.js';
import { createInMemoryTable, type Repository, type Snapshottable } from '../../common/repository.js';
import { answerPayloadSchema } from '../questions/question.model.js';
import { answerHistoryEntrySchema, type Answer } from './attempt.model.js';

export interface AnswerRepository extends Repository<Answer> {
  saveMany(answers: Answer[]): Answer[];
  listByAttempt(tenantId: string, attemptId: string): Answer[];
  getByAttemptAndQuestion(tenantId: string, attemptId: string, questionId: string): Answer | undefined;
  listByQuestion(tenantId: string, questionId: string): Answer[];
}

export function createInMemoryAnswerRepository(): AnswerRepository & Snapshottable {
  const table = createInMemoryTable<Answer>();
  const byAttempt = (tenantId: string, attemptId: string) =>
    table.values().filter(a => a.tenantId === tenantId && a.attemptId === attemptId);
  const save = (answer: Answer): Answer => {
    // one row per (attempt, question): an upsert replaces the previous row
    const existing = byAttempt(answer.tenantId, answer.attemptId).find(
      a => a.questionId === answer.questionId && a.id !== answer.id,
    );
    if (existing) {
      table.delete(existing.tenantId, existing.id);
    }
    return table.put(answer);
  };
  return {
    save,
    saveMany(answers) {
      return answers.map(answer => save(answer));
    },
    getById(tenantId, id) {
      return table.get(tenantId, id);
    },
    listByAttempt: byAttempt,
    getByAttemptAndQuestion(tenantId, attemptId, questionId) {
      return byAttempt(tenantId, attemptId).find(a => a.questionId === questionId);
    },
    listByQuestion(tenantId, questionId) {
      return table.values().filter(a => a.tenantId === tenantId && a.questionId === questionId);
    },
    snapshot: () => table.snapshot(),
  };
}

const answerRowSchema = z.object({
  id: z.string(),
  tenantId: z.string(),
  attemptId: z.string(),
  questionId: z.string(),
  payloadJson: jsonColumn(answerPayloadSchema).nullable(),
  score: z.number(),
  maxScore: z.number(),
  isCorrect: nullableBoolean,
  isGraded: sqliteBoolean,
  gradedBy: optionalText,
  gradedAt: optionalText,
  feedback: optionalText,
  timeSpentSeconds: z.number(),
  firstAnsweredAt: optionalText,
  lastModifiedAt: optionalText,
  flagged: sqliteBoolean,
  historyJson: jsonColumn(z.array(answerHistoryEntrySchema)),
  createdAt: z.string(),
  updatedAt: z.string(),
});

function toAnswer(row: unknown): Answer {
  const { payloadJson, historyJson, ...rest } = answerRowSchema.parse(row);
  return { ...rest, payload: payloadJson, history: historyJson };
}

const ANSWER_COLUMNS = `id, tenant_id as tenantId, attempt_id as attemptId, question_id as questionId, payload_json as payloadJson,
  score, max_score as maxScore, is_correct as isCorrect, is_graded as isGraded, graded_by as gradedBy, graded_at as gradedAt,
  feedback, time_spent_seconds as timeSpentSeconds, first_answered_at as firstAnsweredAt, last_modified_at as lastModifiedAt,
  flagged, history_json as historyJson, created_at as createdAt, updated_at as updatedAt`;

export function createSQLiteAnswerRepository(client: SQLiteTenantClient): AnswerRepository {
  const select = (tenantId: string, where: string, ...params: string[]) =>
    client
      .getConnection(tenantId)
      .prepare(`SELECT ${ANSWER_COLUMNS} FROM answers WHERE tenant_id = ? AND ${where}`)
      .all(tenantId, ...params)
      .map(toAnswer);

  const save = (answer: Answer): Answer => {
    client.getConnection(answer.tenantId).prepare(`
      INSERT INTO answers (id, tenant_id, attempt_id, question_id, payload_json, score, max_score, is_correct, is_graded, graded_by,
        graded_at, feedback, time_spent_seconds, first_answered_at, last_modified_at, flagged, history_json, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(tenant_id, attempt_id, question_id) DO UPDATE SET
        id = excluded.id,
        payload_json = excluded.payload_json,
        score = excluded.score,
        max_score = excluded.max_score,
        is_correct = excluded.is_correct,
        is_graded = excluded.is_graded,
        graded_by = excluded.graded_by,
        graded_at = excluded.graded_at,
        feedback = excluded.feedback,
        time_spent_seconds = excluded.time_spent_seconds,
        first_answered_at = excluded.first_answered_at,
        last_modified_at = excluded.last_modified_at,
        flagged = excluded.flagged,
        history_json = excluded.history_json,
        updated_at = excluded.updated_at
    `).run(
      answer.id,
      answer.tenantId,
      answer.attemptId,
      answer.questionId,
      answer.payload === null ? null : JSON.stringify(answer.payload),
      answer.score,
      answer.maxScore,
      answer.isCorrect === null ? null : toSqliteBoolean(answer.isCorrect),
      toSqliteBoolean(answer.isGraded),
      answer.gradedBy ?? null,
      answer.gradedAt ?? null,
      answer.feedback ?? null,
      answer.timeSpentSeconds,
      answer.firstAnsweredAt ?? null,
      answer.lastModifiedAt ?? null,
      toSqliteBoolean(answer.flagged),
      JSON.stringify(answer.history),
      answer.createdAt,
      answer.updatedAt,
    );
    return answer;
  };

  return {
    save,
    saveMany(answers) {
      if (answers.length === 0) {
        return [];
      }
      const db = client.getConnection(answers[0].tenantId);
      return db.transaction(() => answers.map(answer => save(answer)));
    },
    getById(tenantId, id) {
      return select(tenantId, 'id = ?', id)[0];
    },
    listByAttempt(tenantId, attemptId) {
      return select(tenantId, 'attempt_id = ? ORDER BY created_at, id', attemptId);
    },
    getByAttemptAndQuestion(tenantId, attemptId, questionId) {
      return select(tenantId, 'attempt_id = ? AND question_id = ?', attemptId, questionId)[0];
    },
    listByQuestion(tenantId, questionId) {
      return select(tenantId, 'question_id = ?', questionId);
    },
  };
}
