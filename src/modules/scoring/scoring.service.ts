import { GradingNotAllowedError, ValidationError } from '../../common/errors.js';
import type {
  AnswerOf,
  AnswerPayload,
  ContentOf,
  FillBlankContent,
  MatchingContent,
  MultipleChoiceContent,
  OrderingContent,
  QuestionContent,
  QuestionType,
  ShortAnswerContent,
  TrueFalseContent,
} from '../questions/question.model.js';

export interface ScoringResult {
  /** Fraction of the question's points earned, always within [0, 1]. */
  ratio: number;
  fullyCorrect: boolean;
}

export const FUZZY_MATCH_THRESHOLD = 0.8;

const AUTO_GRADEABLE_TYPES: ReadonlySet<QuestionType> = new Set([
  'multiple_choice',
  'true_false',
  'fill_blank',
  'matching',
  'ordering',
  'short_answer',
]);

export function isAutoGradeable(type: QuestionType): boolean {
  return AUTO_GRADEABLE_TYPES.has(type);
}

/** A question's content together with an answer of the same type. */
export type ScorablePair = { [K in QuestionType]: { type: K; content: ContentOf<K>; answer: AnswerOf<K> } }[QuestionType];

/**
 * Pairs content and answer by type, rejecting answers submitted for a
 * different question type.
 */
export function pairAnswer(content: QuestionContent, answer: AnswerPayload): ScorablePair {
  switch (content.type) {
    case 'multiple_choice':
      if (answer.type === 'multiple_choice') return { type: content.type, content, answer };
      break;
    case 'true_false':
      if (answer.type === 'true_false') return { type: content.type, content, answer };
      break;
    case 'essay':
      if (answer.type === 'essay') return { type: content.type, content, answer };
      break;
    case 'fill_blank':
      if (answer.type === 'fill_blank') return { type: content.type, content, answer };
      break;
    case 'matching':
      if (answer.type === 'matching') return { type: content.type, content, answer };
      break;
    case 'ordering':
      if (answer.type === 'ordering') return { type: content.type, content, answer };
      break;
    case 'short_answer':
      if (answer.type === 'short_answer') return { type: content.type, content, answer };
      break;
  }
  throw new ValidationError(`Answer of type ${answer.type} does not match question type ${content.type}`);
}

export function scoreAnswer(content: QuestionContent, answer: AnswerPayload): ScoringResult {
  const pair = pairAnswer(content, answer);
  switch (pair.type) {
    case 'multiple_choice':
      return scoreMultipleChoice(pair.content, pair.answer.selectedOptionIds);
    case 'true_false':
      return scoreTrueFalse(pair.content, pair.answer.value);
    case 'fill_blank':
      return scoreFillBlank(pair.content, pair.answer.blanks);
    case 'short_answer':
      return scoreShortAnswer(pair.content, pair.answer.text);
    case 'matching':
      return scoreMatching(pair.content, pair.answer.pairs);
    case 'ordering':
      return scoreOrdering(pair.content, pair.answer.order);
    case 'essay':
      throw new GradingNotAllowedError(pair.type);
  }
}

export function scoreMultipleChoice(content: MultipleChoiceContent, selectedOptionIds: string[]): ScoringResult {
  const correct = new Set(content.correctOptionIds);
  const selected = new Set(selectedOptionIds);
  const exactMatch = selected.size === correct.size && [...selected].every(id => correct.has(id));
  if (exactMatch) {
    return { ratio: 1, fullyCorrect: true };
  }
  if (correct.size <= 1) {
    return { ratio: 0, fullyCorrect: false };
  }
  let correctSelected = 0;
  let incorrectSelected = 0;
  for (const id of selected) {
    if (correct.has(id)) correctSelected += 1;
    else incorrectSelected += 1;
  }
  const missed = correct.size - correctSelected;
  const ratio = Math.max(0, (correctSelected - (incorrectSelected + missed)) / correct.size);
  return { ratio, fullyCorrect: false };
}

export function scoreTrueFalse(content: TrueFalseContent, value: boolean): ScoringResult {
  const isCorrect = content.correctAnswer === value;
  return { ratio: isCorrect ? 1 : 0, fullyCorrect: isCorrect };
}

function normalizeText(value: string, caseSensitive: boolean): string {
  const trimmed = value.trim();
  return caseSensitive ? trimmed : trimmed.toLowerCase();
}

export function scoreFillBlank(content: FillBlankContent, provided: Record<string, string>): ScoringResult {
  let totalPoints = 0;
  let earnedPoints = 0;
  let allCorrect = true;
  for (const [blankId, blank] of Object.entries(content.blanks)) {
    totalPoints += blank.points;
    const candidate = provided[blankId];
    const matched = candidate !== undefined
      && blank.acceptedAnswers.some(
        accepted => normalizeText(accepted, content.caseSensitive) === normalizeText(candidate, content.caseSensitive),
      );
    if (matched) {
      earnedPoints += blank.points;
    } else {
      allCorrect = false;
    }
  }
  if (totalPoints === 0) {
    return { ratio: 0, fullyCorrect: false };
  }
  return { ratio: earnedPoints / totalPoints, fullyCorrect: allCorrect };
}

export function scoreShortAnswer(content: ShortAnswerContent, text: string): ScoringResult {
  const candidate = normalizeText(text, content.caseSensitive);
  if (content.acceptedAnswers.some(accepted => normalizeText(accepted, content.caseSensitive) === candidate)) {
    return { ratio: 1, fullyCorrect: true };
  }
  if (!content.fuzzyMatching) {
    return { ratio: 0, fullyCorrect: false };
  }
  const best = content.acceptedAnswers.reduce(
    (max, accepted) => Math.max(max, similarity(text.trim().toLowerCase(), accepted.trim().toLowerCase())),
    0,
  );
  return { ratio: best >= FUZZY_MATCH_THRESHOLD ? best : 0, fullyCorrect: false };
}

export function scoreMatching(content: MatchingContent, pairs: Record<string, string>): ScoringResult {
  const total = content.correctPairs.length;
  if (total === 0) {
    return { ratio: 0, fullyCorrect: false };
  }
  const correct = content.correctPairs.filter(pair => pairs[pair.leftId] === pair.rightId).length;
  return { ratio: correct / total, fullyCorrect: correct === total };
}

export function scoreOrdering(content: OrderingContent, order: string[]): ScoringResult {
  const expected = content.correctOrder;
  if (expected.length === 0) {
    return { ratio: 0, fullyCorrect: false };
  }
  if (order.length === expected.length && expected.every((id, index) => order[index] === id)) {
    return { ratio: 1, fullyCorrect: true };
  }
  // Only exact positions earn credit; a shifted but otherwise correct sequence scores low.
  // Extra items count against the answer.
  const inPlace = expected.filter((id, index) => order[index] === id).length;
  return { ratio: inPlace / Math.max(order.length, expected.length), fullyCorrect: false };
}

/** Edit distance over code points. */
export function levenshtein(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  if (left.length === 0) return right.length;
  if (right.length === 0) return left.length;
  let previous = Array.from({ length: right.length + 1 }, (_, index) => index);
  for (let i = 1; i <= left.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= right.length; j += 1) {
      const cost = left[i - 1] === right[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[right.length];
}

export function similarity(a: string, b: string): number {
  const maxLength = Math.max(Array.from(a).length, Array.from(b).length);
  if (maxLength === 0) {
    return 1;
  }
  return 1 - levenshtein(a, b) / maxLength;
}

const LETTER_GRADES: ReadonlyArray<[number, string]> = [
  [97, 'A+'],
  [93, 'A'],
  [90, 'A-'],
  [87, 'B+'],
  [83, 'B'],
  [80, 'B-'],
  [77, 'C+'],
  [73, 'C'],
  [70, 'C-'],
  [67, 'D+'],
  [63, 'D'],
  [60, 'D-'],
];

export function letterGrade(percentage: number): string {
  for (const [threshold, grade] of LETTER_GRADES) {
    if (percentage >= threshold) {
      return grade;
    }
  }
  return 'F';
}
