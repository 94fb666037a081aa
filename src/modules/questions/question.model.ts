import { z } from 'zod';
import { v4 as uuid } from 'uuid';
import type { BaseEntity } from '../../common/types.js';

export const QUESTION_TYPES = [
  'multiple_choice',
  'true_false',
  'essay',
  'fill_blank',
  'matching',
  'ordering',
  'short_answer',
] as const;

export type QuestionType = (typeof QUESTION_TYPES)[number];

const displayItemSchema = z.object({ id: z.string().min(1), text: z.string() });

export const multipleChoiceContentSchema = z.object({
  type: z.literal('multiple_choice'),
  options: z.array(displayItemSchema.extend({ imageUrl: z.string().optional() })).min(2),
  correctOptionIds: z.array(z.string().min(1)).min(1),
  multipleCorrect: z.boolean().default(false),
  partialCredit: z.boolean().default(false),
});

export const trueFalseContentSchema = z.object({
  type: z.literal('true_false'),
  correctAnswer: z.boolean(),
  trueLabel: z.string().optional(),
  falseLabel: z.string().optional(),
});

export const essayContentSchema = z.object({
  type: z.literal('essay'),
  minWords: z.number().int().nonnegative().optional(),
  maxWords: z.number().int().positive().optional(),
  suggestedLength: z.number().int().positive().optional(),
  rubricCriteria: z.array(z.object({ name: z.string(), description: z.string().optional(), points: z.number().nonnegative() })).default([]),
  sampleAnswer: z.string().optional(),
  keywords: z.array(z.string()).default([]),
});

export const blankDefinitionSchema = z.object({
  acceptedAnswers: z.array(z.string()).min(1),
  points: z.number().nonnegative(),
  placeholder: z.string().optional(),
});

export const fillBlankContentSchema = z.object({
  type: z.literal('fill_blank'),
  template: z.string(),
  blanks: z.record(blankDefinitionSchema),
  caseSensitive: z.boolean().default(false),
});

export const matchingContentSchema = z.object({
  type: z.literal('matching'),
  leftItems: z.array(displayItemSchema),
  rightItems: z.array(displayItemSchema),
  correctPairs: z.array(z.object({ leftId: z.string(), rightId: z.string() })),
});

export const orderingContentSchema = z.object({
  type: z.literal('ordering'),
  items: z.array(displayItemSchema),
  correctOrder: z.array(z.string()),
});

export const shortAnswerContentSchema = z.object({
  type: z.literal('short_answer'),
  acceptedAnswers: z.array(z.string()).min(1),
  caseSensitive: z.boolean().default(false),
  fuzzyMatching: z.boolean().default(false),
  maxLength: z.number().int().positive().optional(),
  placeholder: z.string().optional(),
});

export const questionContentSchema = z.discriminatedUnion('type', [
  multipleChoiceContentSchema,
  trueFalseContentSchema,
  essayContentSchema,
  fillBlankContentSchema,
  matchingContentSchema,
  orderingContentSchema,
  shortAnswerContentSchema,
]);

export type MultipleChoiceContent = z.infer<typeof multipleChoiceContentSchema>;
export type TrueFalseContent = z.infer<typeof trueFalseContentSchema>;
export type EssayContent = z.infer<typeof essayContentSchema>;
export type BlankDefinition = z.infer<typeof blankDefinitionSchema>;
export type FillBlankContent = z.infer<typeof fillBlankContentSchema>;
export type MatchingContent = z.infer<typeof matchingContentSchema>;
export type OrderingContent = z.infer<typeof orderingContentSchema>;
export type ShortAnswerContent = z.infer<typeof shortAnswerContentSchema>;
export type QuestionContent = z.infer<typeof questionContentSchema>;

export const answerPayloadSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('multiple_choice'), selectedOptionIds: z.array(z.string()) }),
  z.object({ type: z.literal('true_false'), value: z.boolean() }),
  z.object({ type: z.literal('essay'), text: z.string() }),
  z.object({ type: z.literal('fill_blank'), blanks: z.record(z.string()) }),
  z.object({ type: z.literal('matching'), pairs: z.record(z.string()) }),
  z.object({ type: z.literal('ordering'), order: z.array(z.string()) }),
  z.object({ type: z.literal('short_answer'), text: z.string() }),
]);

export type AnswerPayload = z.infer<typeof answerPayloadSchema>;

export type ContentOf<K extends QuestionType> = Extract<QuestionContent, { type: K }>;
export type AnswerOf<K extends QuestionType> = Extract<AnswerPayload, { type: K }>;

export interface Question extends BaseEntity {
  type: QuestionType;
  text: string;
  defaultPoints: number;
  content: QuestionContent;
  explanation?: string;
  createdBy: string;
}

export type QuestionInput = Omit<Question, 'id' | 'createdAt' | 'updatedAt' | 'type'> & { id?: string };

export function createQuestion(data: QuestionInput, now: Date = new Date()): Question {
  const timestamp = now.toISOString();
  return {
    ...data,
    id: data.id ?? uuid(),
    type: data.content.type,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/**
 * True when the answer payload has nothing a scorer could evaluate. Empty
 * answers are graded as zero without consulting the scoring engine.
 */
export function isEmptyAnswer(payload: AnswerPayload | null): boolean {
  if (!payload) return true;
  switch (payload.type) {
    case 'multiple_choice':
      return payload.selectedOptionIds.length === 0;
    case 'true_false':
      return false;
    case 'essay':
    case 'short_answer':
      return payload.text.trim().length === 0;
    case 'fill_blank':
      return Object.values(payload.blanks).every(value => value.trim().length === 0);
    case 'matching':
      return Object.keys(payload.pairs).length === 0;
    case 'ordering':
      return payload.order.length === 0;
  }
}
