import { z } from 'zod';
import type { SQLiteTenantClient } from '../../infrastructure/sqlite/client.js';
import { jsonColumn, optionalText, sqliteBoolean, toSqliteBoolean } from '../../infrastructure/sqlite/rows.js';
import { createInMemoryTable, type Repository, type Snapshottable } from '../../common/repository.js';
import { ConflictError } from '../../common/errors.js';
import { ATTEMPT_STATUSES, END_REASONS, sessionMetadataSchema, type Attempt } from './attempt.model.js';

export interface AttemptRepository extends Repository<Attempt> {
  /**
   * Inserts a new in-progress attempt. Throws ConflictError when the student
   * already has one for the same assessment.
   */
  insertActive(attempt: Attempt): Attempt;
  findActive(tenantId: string, assessmentId: string, studentId: string): Attempt | undefined;
  countByStudent(tenantId: string, assessmentId: string, studentId: string): number;
  listByAssessment(tenantId: string, assessmentId: string): Attempt[];
  listByStudent(tenantId: string, studentId: string): Attempt[];
  /** In-progress attempts whose deadline is before `now` (ISO timestamp). */
  listExpired(tenantId: string, now: string): Attempt[];
}

export interface InMemoryAttemptRepository extends AttemptRepository, Snapshottable {
  tenantIds(): string[];
}

const byStart = (a: Attempt, b: Attempt) => a.startedAt.localeCompare(b.startedAt);

export function createInMemoryAttemptRepository(): InMemoryAttemptRepository {
  const table = createInMemoryTable<Attempt>();
  const scoped = (tenantId: string) => table.values().filter(a => a.tenantId === tenantId);
  const findActive = (tenantId: string, assessmentId: string, studentId: string) =>
    scoped(tenantId).find(a => a.assessmentId === assessmentId && a.studentId === studentId && a.status === 'in_progress');
  return {
    save(attempt) {
      return table.put(attempt);
    },
    insertActive(attempt) {
      const existing = findActive(attempt.tenantId, attempt.assessmentId, attempt.studentId);
      if (existing && existing.id !== attempt.id) {
        throw new ConflictError(`Student ${attempt.studentId} already has an attempt in progress`);
      }
      return table.put(attempt);
    },
    getById(tenantId, id) {
      return table.get(tenantId, id);
    },
    findActive,
    countByStudent(tenantId, assessmentId, studentId) {
      return scoped(tenantId).filter(a => a.assessmentId === assessmentId && a.studentId === studentId).length;
    },
    listByAssessment(tenantId, assessmentId) {
      return scoped(tenantId).filter(a => a.assessmentId === assessmentId).sort(byStart);
    },
    listByStudent(tenantId, studentId) {
      return scoped(tenantId).filter(a => a.studentId === studentId).sort(byStart);
    },
    listExpired(tenantId, now) {
      const cutoff = new Date(now).getTime();
      return scoped(tenantId).filter(a => a.status === 'in_progress' && new Date(a.endsAt).getTime() < cutoff);
    },
    tenantIds() {
      return [...new Set(table.values().map(a => a.tenantId))].sort();
    },
    snapshot: () => table.snapshot(),
  };
}

const attemptRowSchema = z.object({
  id: z.string(),
  tenantId: z.string(),
  assessmentId: z.string(),
  studentId: z.string(),
  attemptNumber: z.number(),
  status: z.enum(ATTEMPT_STATUSES),
  startedAt: z.string(),
  endsAt: z.string(),
  completedAt: optionalText,
  timeSpentSeconds: z.number(),
  timeRemainingSeconds: z.number(),
  score: z.number(),
  maxScore: z.number(),
  percentage: z.number(),
  passed: sqliteBoolean,
  isGraded: sqliteBoolean,
  currentQuestionIndex: z.number(),
  questionsAnswered: z.number(),
  totalQuestions: z.number(),
  endReason: z
    .enum(END_REASONS)
    .nullable()
    .transform(value => value ?? undefined),
  sessionJson: jsonColumn(sessionMetadataSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
});

function toAttempt(row: unknown): Attempt {
  const { sessionJson, ...rest } = attemptRowSchema.parse(row);
  return { ...rest, session: sessionJson };
}

const ATTEMPT_COLUMNS = `id, tenant_id as tenantId, assessment_id as assessmentId, student_id as studentId,
  attempt_number as attemptNumber, status, started_at as startedAt, ends_at as endsAt, completed_at as completedAt,
  time_spent_seconds as timeSpentSeconds, time_remaining_seconds as timeRemainingSeconds, score, max_score as maxScore,
  percentage, passed, is_graded as isGraded, current_question_index as currentQuestionIndex,
  questions_answered as questionsAnswered, total_questions as totalQuestions, end_reason as endReason,
  session_json as sessionJson, created_at as createdAt, updated_at as updatedAt`;

const UPSERT_ATTEMPT = `
  INSERT INTO attempts (id, tenant_id, assessment_id, student_id, attempt_number, status, started_at, ends_at, completed_at,
    time_spent_seconds, time_remaining_seconds, score, max_score, percentage, passed, is_graded, current_question_index,
    questions_answered, total_questions, end_reason, session_json, created_at, updated_at)
  VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  ON CONFLICT(id) DO UPDATE SET
    status = excluded.status,
    ends_at = excluded.ends_at,
    completed_at = excluded.completed_at,
    time_spent_seconds = excluded.time_spent_seconds,
    time_remaining_seconds = excluded.time_remaining_seconds,
    score = excluded.score,
    max_score = excluded.max_score,
    percentage = excluded.percentage,
    passed = excluded.passed,
    is_graded = excluded.is_graded,
    current_question_index = excluded.current_question_index,
    questions_answered = excluded.questions_answered,
    total_questions = excluded.total_questions,
    end_reason = excluded.end_reason,
    session_json = excluded.session_json,
    updated_at = excluded.updated_at
`;

function attemptValues(attempt: Attempt) {
  return [
    attempt.id,
    attempt.tenantId,
    attempt.assessmentId,
    attempt.studentId,
    attempt.attemptNumber,
    attempt.status,
    attempt.startedAt,
    attempt.endsAt,
    attempt.completedAt ?? null,
    attempt.timeSpentSeconds,
    attempt.timeRemainingSeconds,
    attempt.score,
    attempt.maxScore,
    attempt.percentage,
    toSqliteBoolean(attempt.passed),
    toSqliteBoolean(attempt.isGraded),
    attempt.currentQuestionIndex,
    attempt.questionsAnswered,
    attempt.totalQuestions,
    attempt.endReason ?? null,
    JSON.stringify(attempt.session),
    attempt.createdAt,
    attempt.updatedAt,
  ];
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && error.message.includes('UNIQUE constraint failed');
}

export function createSQLiteAttemptRepository(client: SQLiteTenantClient): AttemptRepository {
  const select = (tenantId: string, where: string, ...params: Array<string | number>) =>
    client
      .getConnection(tenantId)
      .prepare(`SELECT ${ATTEMPT_COLUMNS} FROM attempts WHERE tenant_id = ? AND ${where}`)
      .all(tenantId, ...params)
      .map(toAttempt);

  return {
    save(attempt) {
      client.getConnection(attempt.tenantId).prepare(UPSERT_ATTEMPT).run(...attemptValues(attempt));
      return attempt;
    },
    insertActive(attempt) {
      try {
        client.getConnection(attempt.tenantId).prepare(UPSERT_ATTEMPT).run(...attemptValues(attempt));
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new ConflictError(`Student ${attempt.studentId} already has an attempt in progress`);
        }
        throw error;
      }
      return attempt;
    },
    getById(tenantId, id) {
      return select(tenantId, 'id = ?', id)[0];
    },
    findActive(tenantId, assessmentId, studentId) {
      return select(tenantId, "assessment_id = ? AND student_id = ? AND status = 'in_progress'", assessmentId, studentId)[0];
    },
    countByStudent(tenantId, assessmentId, studentId) {
      const row = client
        .getConnection(tenantId)
        .prepare('SELECT COUNT(*) as total FROM attempts WHERE tenant_id = ? AND assessment_id = ? AND student_id = ?')
        .get(tenantId, assessmentId, studentId);
      return z.object({ total: z.number() }).parse(row).total;
    },
    listByAssessment(tenantId, assessmentId) {
      return select(tenantId, 'assessment_id = ? ORDER BY started_at', assessmentId);
    },
    listByStudent(tenantId, studentId) {
      return select(tenantId, 'student_id = ? ORDER BY started_at', studentId);
    },
    listExpired(tenantId, now) {
      return select(tenantId, "status = 'in_progress' AND ends_at < ?", now);
    },
  };
}
