import type {
  EssayContent,
  FillBlankContent,
  MatchingContent,
  MultipleChoiceContent,
  OrderingContent,
  Question,
  QuestionContent,
  ShortAnswerContent,
  TrueFalseContent,
} from './question.model.js';

export type SanitizedContent =
  | Omit<MultipleChoiceContent, 'correctOptionIds'>
  | Omit<TrueFalseContent, 'correctAnswer'>
  | Omit<EssayContent, 'sampleAnswer' | 'keywords'>
  | (Omit<FillBlankContent, 'blanks'> & { blanks: Record<string, { points: number; placeholder?: string }> })
  | Omit<MatchingContent, 'correctPairs'>
  | Omit<OrderingContent, 'correctOrder'>
  | Omit<ShortAnswerContent, 'acceptedAnswers'>;

export type SanitizedQuestion = Omit<Question, 'content' | 'explanation'> & { content: SanitizedContent };

/**
 * Strips everything that would give the answer away. Works on a deep copy so
 * the caller's question is left untouched.
 */
export function sanitizeQuestion(question: Question): SanitizedQuestion {
  const { explanation: _explanation, content, ...rest } = structuredClone(question);
  return { ...rest, content: sanitizeContent(content) };
}

export function sanitizeContent(content: QuestionContent): SanitizedContent {
  switch (content.type) {
    case 'multiple_choice': {
      const { correctOptionIds: _correct, ...visible } = content;
      return visible;
    }
    case 'true_false': {
      const { correctAnswer: _correct, ...visible } = content;
      return visible;
    }
    case 'essay': {
      const { sampleAnswer: _sample, keywords: _keywords, ...visible } = content;
      return visible;
    }
    case 'fill_blank': {
      const blanks: Record<string, { points: number; placeholder?: string }> = {};
      for (const [id, { acceptedAnswers: _accepted, ...blank }] of Object.entries(content.blanks)) {
        blanks[id] = blank;
      }
      return { ...content, blanks };
    }
    case 'matching': {
      const { correctPairs: _pairs, ...visible } = content;
      return visible;
    }
    case 'ordering': {
      const { correctOrder: _order, ...visible } = content;
      return visible;
    }
    case 'short_answer': {
      const { acceptedAnswers: _accepted, ...visible } = content;
      return visible;
    }
  }
}
