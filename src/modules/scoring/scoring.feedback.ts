import type { AnswerPayload, QuestionContent } from '../questions/question.model.js';
import { pairAnswer, type ScoringResult } from './scoring.service.js';

export interface FeedbackOptions {
  /** Include the expected answer in feedback for incorrect responses. */
  revealCorrectAnswers?: boolean;
}

const PARTIAL_CREDIT_NOTE = 'Partial credit awarded.';

export function generateFeedback(
  content: QuestionContent,
  answer: AnswerPayload,
  result: ScoringResult,
  options: FeedbackOptions = {},
): string {
  const pair = pairAnswer(content, answer);
  const reveal = options.revealCorrectAnswers === true;
  const partial = !result.fullyCorrect && result.ratio > 0;

  switch (pair.type) {
    case 'essay':
      return 'Essay questions require manual grading.';
    case 'multiple_choice': {
      if (result.fullyCorrect) return 'Correct! Well done.';
      if (!reveal) return partial ? `Partially correct. ${PARTIAL_CREDIT_NOTE}` : 'Incorrect answer.';
      const correct = new Set(pair.content.correctOptionIds);
      const texts = pair.content.options.filter(option => correct.has(option.id)).map(option => option.text);
      return texts.length === 1
        ? `Incorrect. The correct answer is: ${texts[0]}`
        : `Incorrect. The correct answers are: ${texts.join(', ')}`;
    }
    case 'true_false': {
      if (result.fullyCorrect) return 'Correct!';
      if (!reveal) return 'Incorrect answer.';
      const label = pair.content.correctAnswer
        ? pair.content.trueLabel ?? 'True'
        : pair.content.falseLabel ?? 'False';
      return `Incorrect. The correct answer is: ${label}`;
    }
    case 'fill_blank': {
      if (result.fullyCorrect) return 'All blanks filled correctly!';
      const base = 'Some answers are incorrect. Please review your responses.';
      if (!reveal) return base;
      const expected = Object.entries(pair.content.blanks).map(([id, blank]) => `${id}: ${blank.acceptedAnswers[0]}`);
      return `${base} Expected: ${expected.join('; ')}`;
    }
    case 'short_answer': {
      if (result.fullyCorrect) return 'Correct answer!';
      if (partial) return `Close match. ${PARTIAL_CREDIT_NOTE}`;
      const base = "Your answer doesn't match the expected response. Please review the question.";
      return reveal ? `${base} Expected: ${pair.content.acceptedAnswers[0]}` : base;
    }
    case 'matching':
      if (result.fullyCorrect) return 'All items matched correctly!';
      return 'Some matches are incorrect. Please review your pairings.';
    case 'ordering': {
      if (result.fullyCorrect) return 'Perfect sequence!';
      const base = 'The order is not completely correct. Please review the sequence.';
      if (!reveal) return base;
      const textById = new Map(pair.content.items.map(item => [item.id, item.text]));
      return `${base} Correct order: ${pair.content.correctOrder.map(id => textById.get(id) ?? id).join(' > ')}`;
    }
  }
}
