import type { RepositoryBundle } from './repositories.js';
import { createAssessment, createAssessmentQuestion } from '../modules/assessments/assessment.model.js';
import { createQuestion, type QuestionContent } from '../modules/questions/question.model.js';

export const DEMO_ASSESSMENT_ID = 'demo-assessment';
export const DEFAULT_TENANT_ID = 'dev-tenant';

interface DemoQuestion {
  id: string;
  text: string;
  points: number;
  content: QuestionContent;
  explanation?: string;
}

const DEMO_QUESTIONS: DemoQuestion[] = [
  {
    id: 'demo-q-capital',
    text: 'What is the capital of France?',
    points: 20,
    content: {
      type: 'multiple_choice',
      options: [
        { id: 'paris', text: 'Paris' },
        { id: 'berlin', text: 'Berlin' },
        { id: 'madrid', text: 'Madrid' },
        { id: 'rome', text: 'Rome' },
      ],
      correctOptionIds: ['paris'],
      multipleCorrect: false,
      partialCredit: false,
    },
  },
  {
    id: 'demo-q-ocean',
    text: 'The Pacific Ocean is the largest ocean on Earth.',
    points: 10,
    content: { type: 'true_false', correctAnswer: true },
  },
  {
    id: 'demo-q-mountain',
    text: 'The tallest mountain above sea level is {{b1}}.',
    points: 20,
    content: {
      type: 'fill_blank',
      template: 'The tallest mountain above sea level is {{b1}}.',
      blanks: { b1: { acceptedAnswers: ['Mount Everest', 'Everest'], points: 1 } },
      caseSensitive: false,
    },
  },
  {
    id: 'demo-q-capitals',
    text: 'Match each country to its capital.',
    points: 20,
    content: {
      type: 'matching',
      leftItems: [
        { id: 'fr', text: 'France' },
        { id: 'de', text: 'Germany' },
      ],
      rightItems: [
        { id: 'paris', text: 'Paris' },
        { id: 'berlin', text: 'Berlin' },
        { id: 'rome', text: 'Rome' },
      ],
      correctPairs: [
        { leftId: 'fr', rightId: 'paris' },
        { leftId: 'de', rightId: 'berlin' },
      ],
    },
  },
  {
    id: 'demo-q-planets',
    text: 'Order the planets by distance from the sun.',
    points: 15,
    content: {
      type: 'ordering',
      items: [
        { id: 'mercury', text: 'Mercury' },
        { id: 'venus', text: 'Venus' },
        { id: 'earth', text: 'Earth' },
      ],
      correctOrder: ['mercury', 'venus', 'earth'],
    },
  },
  {
    id: 'demo-q-process',
    text: 'Name the process plants use to turn light into chemical energy.',
    points: 15,
    content: { type: 'short_answer', acceptedAnswers: ['photosynthesis'], caseSensitive: false, fuzzyMatching: true },
    explanation: 'Chlorophyll captures light energy during photosynthesis.',
  },
];

/**
 * Creates a small active assessment for local development. Does nothing when
 * the tenant already has it.
 */
export function seedDemoTenant(repositories: RepositoryBundle, tenantId: string, now: Date = new Date()): boolean {
  if (repositories.assessment.getById(tenantId, DEMO_ASSESSMENT_ID)) {
    return false;
  }
  repositories.transaction(tenantId, () => {
    repositories.assessment.save(
      createAssessment(
        {
          id: DEMO_ASSESSMENT_ID,
          tenantId,
          title: 'General knowledge warm-up',
          status: 'active',
          durationMinutes: 30,
          passingScore: 60,
          maxAttempts: 3,
          createdBy: 'demo-teacher',
          settings: { randomizeQuestions: true, randomizeOptions: true, showCorrectAnswers: true },
        },
        now,
      ),
    );
    DEMO_QUESTIONS.forEach((demo, index) => {
      repositories.question.save(
        createQuestion(
          {
            id: demo.id,
            tenantId,
            text: demo.text,
            defaultPoints: demo.points,
            content: demo.content,
            explanation: demo.explanation,
            createdBy: 'demo-teacher',
          },
          now,
        ),
      );
      repositories.assessmentQuestion.save(
        createAssessmentQuestion(
          { tenantId, assessmentId: DEMO_ASSESSMENT_ID, questionId: demo.id, order: index + 1, points: demo.points },
          now,
        ),
      );
    });
  });
  return true;
}
