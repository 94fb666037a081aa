import type { DomainEvent } from '../../common/types.js';

export const EVENT_TYPES = {
  AttemptStarted: 'AttemptStarted',
  AttemptSubmitted: 'AttemptSubmitted',
  AttemptTimedOut: 'AttemptTimedOut',
  AttemptAbandoned: 'AttemptAbandoned',
  AttemptGraded: 'AttemptGraded',
  AnswerGraded: 'AnswerGraded',
} as const;

export type EventType = (typeof EVENT_TYPES)[keyof typeof EVENT_TYPES];

export interface AttemptEventPayload {
  attemptId: string;
  assessmentId: string;
  studentId: string;
}

export interface AttemptGradedPayload extends AttemptEventPayload {
  score: number;
  maxScore: number;
  percentage: number;
  passed: boolean;
  isGraded: boolean;
}

export interface AnswerGradedPayload {
  answerId: string;
  attemptId: string;
  questionId: string;
  score: number;
  gradedBy: string;
}

export type AttemptStartedEvent = DomainEvent<'AttemptStarted', AttemptEventPayload>;
export type AttemptSubmittedEvent = DomainEvent<'AttemptSubmitted', AttemptEventPayload>;
export type AttemptTimedOutEvent = DomainEvent<'AttemptTimedOut', AttemptEventPayload>;
export type AttemptAbandonedEvent = DomainEvent<'AttemptAbandoned', AttemptEventPayload>;
export type AttemptGradedEvent = DomainEvent<'AttemptGraded', AttemptGradedPayload>;
export type AnswerGradedEvent = DomainEvent<'AnswerGraded', AnswerGradedPayload>;

export type AppEvent =
  | AttemptStartedEvent
  | AttemptSubmittedEvent
  | AttemptTimedOutEvent
  | AttemptAbandonedEvent
  | AttemptGradedEvent
  | AnswerGradedEvent;
