import { z } from 'zod';
import { v4 as uuid } from 'uuid';
import type { BaseEntity } from '../../common/types.js';

export const ASSESSMENT_STATUSES = ['draft', 'active', 'expired', 'archived'] as const;

export type AssessmentStatus = (typeof ASSESSMENT_STATUSES)[number];

/** Upper bound for the sum of question points in a single assessment. */
export const MAX_ASSESSMENT_POINTS = 100;

export const assessmentSettingsSchema = z.object({
  randomizeQuestions: z.boolean().default(false),
  randomizeOptions: z.boolean().default(false),
  showCorrectAnswers: z.boolean().default(false),
});

export type AssessmentSettings = z.infer<typeof assessmentSettingsSchema>;

export interface Assessment extends BaseEntity {
  title: string;
  description?: string;
  status: AssessmentStatus;
  durationMinutes: number;
  passingScore: number;
  maxAttempts: number;
  dueDate?: string;
  createdBy: string;
  settings: AssessmentSettings;
}

export interface AssessmentQuestion extends BaseEntity {
  assessmentId: string;
  questionId: string;
  order: number;
  /** Points awarded for this question in this assessment; authoritative for grading. */
  points: number;
}

export type AssessmentInput = Omit<Assessment, 'id' | 'createdAt' | 'updatedAt' | 'settings' | 'maxAttempts'> & {
  id?: string;
  maxAttempts?: number;
  settings?: Partial<AssessmentSettings>;
};

export function createAssessment(data: AssessmentInput, now: Date = new Date()): Assessment {
  const timestamp = now.toISOString();
  const maxAttempts = typeof data.maxAttempts === 'number' && Number.isFinite(data.maxAttempts)
    ? Math.max(1, Math.floor(data.maxAttempts))
    : 1;
  return {
    ...data,
    id: data.id ?? uuid(),
    maxAttempts,
    settings: assessmentSettingsSchema.parse(data.settings ?? {}),
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

export function createAssessmentQuestion(
  data: Omit<AssessmentQuestion, 'id' | 'createdAt' | 'updatedAt'> & { id?: string },
  now: Date = new Date(),
): AssessmentQuestion {
  const timestamp = now.toISOString();
  return { ...data, id: data.id ?? uuid(), createdAt: timestamp, updatedAt: timestamp };
}

/** Whether new attempts may be started at `now`. */
export function availabilityProblem(assessment: Assessment, now: Date): string | undefined {
  if (assessment.status !== 'active') {
    return `assessment is ${assessment.status}`;
  }
  if (assessment.dueDate && now.getTime() > new Date(assessment.dueDate).getTime()) {
    return 'assessment is past its due date';
  }
  return undefined;
}
