import { z } from 'zod';
import { v4 as uuid } from 'uuid';
import type { BaseEntity } from '../../common/types.js';
import { InvalidStateError } from '../../common/errors.js';
import { answerPayloadSchema, type AnswerPayload } from '../questions/question.model.js';

export const ATTEMPT_STATUSES = ['in_progress', 'completed', 'abandoned', 'timed_out'] as const;

export type AttemptStatus = (typeof ATTEMPT_STATUSES)[number];

export const END_REASONS = ['submitted', 'auto_submit', 'time_out', 'abandoned'] as const;

export type EndReason = (typeof END_REASONS)[number];

/** Allowed moves between statuses. Terminal statuses have no way out. */
export const ATTEMPT_TRANSITIONS: Readonly<Record<AttemptStatus, readonly AttemptStatus[]>> = {
  in_progress: ['completed', 'abandoned', 'timed_out'],
  completed: [],
  abandoned: [],
  timed_out: [],
};

export function isTerminal(status: AttemptStatus): boolean {
  return ATTEMPT_TRANSITIONS[status].length === 0;
}

export function canTransition(from: AttemptStatus, to: AttemptStatus): boolean {
  return ATTEMPT_TRANSITIONS[from].includes(to);
}

export function assertTransition(attemptId: string, from: AttemptStatus, to: AttemptStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidStateError(`Attempt ${attemptId} cannot move from ${from} to ${to}`);
  }
}

export const sessionMetadataSchema = z.object({
  ipAddress: z.string().optional(),
  userAgent: z.string().optional(),
});

export type SessionMetadata = z.infer<typeof sessionMetadataSchema>;

export interface Attempt extends BaseEntity {
  assessmentId: string;
  studentId: string;
  attemptNumber: number;
  status: AttemptStatus;
  startedAt: string;
  endsAt: string;
  completedAt?: string;
  timeSpentSeconds: number;
  timeRemainingSeconds: number;
  score: number;
  maxScore: number;
  percentage: number;
  passed: boolean;
  isGraded: boolean;
  currentQuestionIndex: number;
  questionsAnswered: number;
  totalQuestions: number;
  endReason?: EndReason;
  session: SessionMetadata;
}

export const answerHistoryEntrySchema = z.object({
  payload: answerPayloadSchema.nullable(),
  recordedAt: z.string(),
});

export type AnswerHistoryEntry = z.infer<typeof answerHistoryEntrySchema>;

export interface Answer extends BaseEntity {
  attemptId: string;
  questionId: string;
  payload: AnswerPayload | null;
  score: number;
  maxScore: number;
  /** `null` until the answer has been graded. */
  isCorrect: boolean | null;
  isGraded: boolean;
  /** Set only for manual grades. */
  gradedBy?: string;
  gradedAt?: string;
  feedback?: string;
  timeSpentSeconds: number;
  firstAnsweredAt?: string;
  lastModifiedAt?: string;
  flagged: boolean;
  history: AnswerHistoryEntry[];
}

export interface NewAttemptInput {
  tenantId: string;
  assessmentId: string;
  studentId: string;
  attemptNumber: number;
  durationMinutes: number;
  totalQuestions: number;
  session?: SessionMetadata;
}

export function createAttempt(input: NewAttemptInput, now: Date): Attempt {
  const timestamp = now.toISOString();
  const durationSeconds = input.durationMinutes * 60;
  return {
    id: uuid(),
    tenantId: input.tenantId,
    assessmentId: input.assessmentId,
    studentId: input.studentId,
    attemptNumber: input.attemptNumber,
    status: 'in_progress',
    startedAt: timestamp,
    endsAt: new Date(now.getTime() + durationSeconds * 1000).toISOString(),
    timeSpentSeconds: 0,
    timeRemainingSeconds: durationSeconds,
    score: 0,
    maxScore: 0,
    percentage: 0,
    passed: false,
    isGraded: false,
    currentQuestionIndex: 0,
    questionsAnswered: 0,
    totalQuestions: input.totalQuestions,
    session: input.session ?? {},
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

export function createEmptyAnswer(attempt: Attempt, questionId: string, maxScore: number, now: Date): Answer {
  const timestamp = now.toISOString();
  return {
    id: uuid(),
    tenantId: attempt.tenantId,
    attemptId: attempt.id,
    questionId,
    payload: null,
    score: 0,
    maxScore,
    isCorrect: null,
    isGraded: false,
    timeSpentSeconds: 0,
    flagged: false,
    history: [],
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

export function secondsUntil(deadline: string, now: Date): number {
  return Math.max(0, Math.floor((new Date(deadline).getTime() - now.getTime()) / 1000));
}

export function isExpired(attempt: Pick<Attempt, 'endsAt'>, now: Date): boolean {
  return now.getTime() > new Date(attempt.endsAt).getTime();
}
