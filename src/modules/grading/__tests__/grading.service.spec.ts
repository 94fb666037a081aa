import { describe, expect, it, vi } from 'vitest';
import { InvalidStateError, PermissionDeniedError, ValidationError } from '../../../common/errors.js';
import { createAssessment, createAssessmentQuestion } from '../../assessments/assessment.model.js';
import { createQuestion } from '../../questions/question.model.js';
import type { SubmittedAnswer } from '../../attempts/attempt.service.js';
import {
  DEMO_ASSESSMENT_ID,
  PERFECT_DEMO_ANSWERS,
  TENANT,
  actor,
  admin,
  createHarness,
  demoTeacher,
  student,
  type Harness,
} from '../../../__tests__/harness.js';

const essayTeacher = actor('teacher-2', 'TEACHER');

function withAnswer(questionId: string, payload: SubmittedAnswer['payload']): SubmittedAnswer[] {
  return PERFECT_DEMO_ANSWERS.map(answer => (answer.questionId === questionId ? { questionId, payload } : answer));
}

async function completedAttempt(h: Harness, answers: SubmittedAnswer[], studentId = 'student-1') {
  const attempt = await h.attempts.start(student(studentId), DEMO_ASSESSMENT_ID);
  await h.attempts.submit(student(studentId), attempt.id, answers);
  await h.queue.onIdle();
  return attempt;
}

function answerFor(h: Harness, attemptId: string, questionId: string) {
  const answer = h.repositories.answer.getByAttemptAndQuestion(TENANT, attemptId, questionId);
  if (!answer) throw new Error(`no answer for ${questionId}`);
  return answer;
}

function addEssayAssessment(h: Harness) {
  const now = h.clock.now();
  h.repositories.transaction(TENANT, () => {
    h.repositories.assessment.save(
      createAssessment(
        {
          id: 'essay-assessment',
          tenantId: TENANT,
          title: 'Landforms',
          status: 'active',
          durationMinutes: 60,
          passingScore: 50,
          maxAttempts: 1,
          createdBy: 'teacher-2',
        },
        now,
      ),
    );
    h.repositories.question.save(
      createQuestion(
        {
          id: 'q-essay',
          tenantId: TENANT,
          text: 'Explain how erosion shapes valleys.',
          defaultPoints: 40,
          content: { type: 'essay', rubricCriteria: [], keywords: ['water'] },
          createdBy: 'teacher-2',
        },
        now,
      ),
    );
    h.repositories.question.save(
      createQuestion(
        {
          id: 'q-tf',
          tenantId: TENANT,
          text: 'Rivers can carve canyons.',
          defaultPoints: 60,
          content: { type: 'true_false', correctAnswer: true },
          createdBy: 'teacher-2',
        },
        now,
      ),
    );
    h.repositories.assessmentQuestion.save(
      createAssessmentQuestion({ tenantId: TENANT, assessmentId: 'essay-assessment', questionId: 'q-essay', order: 1, points: 40 }, now),
    );
    h.repositories.assessmentQuestion.save(
      createAssessmentQuestion({ tenantId: TENANT, assessmentId: 'essay-assessment', questionId: 'q-tf', order: 2, points: 60 }, now),
    );
  });
}

function addWeightedAssessment(h: Harness) {
  const now = h.clock.now();
  h.repositories.transaction(TENANT, () => {
    h.repositories.assessment.save(
      createAssessment(
        {
          id: 'weighted-assessment',
          tenantId: TENANT,
          title: 'Rivers and seas',
          status: 'active',
          durationMinutes: 20,
          passingScore: 70,
          maxAttempts: 1,
          createdBy: 'teacher-2',
        },
        now,
      ),
    );
    h.repositories.question.save(
      createQuestion(
        {
          id: 'q-delta',
          tenantId: TENANT,
          text: 'A delta forms where a river meets the sea.',
          defaultPoints: 60,
          content: { type: 'true_false', correctAnswer: true },
          createdBy: 'teacher-2',
        },
        now,
      ),
    );
    h.repositories.question.save(
      createQuestion(
        {
          id: 'q-rivers',
          tenantId: TENANT,
          text: 'Match each river to its continent.',
          defaultPoints: 40,
          content: {
            type: 'matching',
            leftItems: [
              { id: 'nile', text: 'Nile' },
              { id: 'amazon', text: 'Amazon' },
            ],
            rightItems: [
              { id: 'africa', text: 'Africa' },
              { id: 'america', text: 'South America' },
            ],
            correctPairs: [
              { leftId: 'nile', rightId: 'africa' },
              { leftId: 'amazon', rightId: 'america' },
            ],
          },
          createdBy: 'teacher-2',
        },
        now,
      ),
    );
    h.repositories.assessmentQuestion.save(
      createAssessmentQuestion({ tenantId: TENANT, assessmentId: 'weighted-assessment', questionId: 'q-delta', order: 1, points: 60 }, now),
    );
    h.repositories.assessmentQuestion.save(
      createAssessmentQuestion({ tenantId: TENANT, assessmentId: 'weighted-assessment', questionId: 'q-rivers', order: 2, points: 40 }, now),
    );
  });
}

describe('GradingService.autoGradeAttempt', () => {
  it('awards full marks for a perfect submission', async () => {
    const h = createHarness();
    const attempt = await completedAttempt(h, PERFECT_DEMO_ANSWERS);

    const result = h.grading.autoGradeAttempt(TENANT, attempt.id);

    expect(result).toMatchObject({ score: 100, maxScore: 100, percentage: 100, passed: true, letterGrade: 'A+', isGraded: true });
    expect(result.questions).toHaveLength(6);
    expect(result.questions.every(q => q.isCorrect === true && !q.partialCredit)).toBe(true);
  });

  it('gives partial credit and reveals answers when the assessment allows it', async () => {
    const h = createHarness();
    const answers = withAnswer('demo-q-ocean', { type: 'true_false', value: false }).map(answer =>
      answer.questionId === 'demo-q-process' ? { ...answer, payload: { type: 'short_answer', text: 'photosynthesys' } } : answer,
    );
    const attempt = await completedAttempt(h, answers);

    const result = h.grading.autoGradeAttempt(TENANT, attempt.id);

    expect(result).toMatchObject({ score: 88.93, percentage: 88.93, passed: true, letterGrade: 'B+', isGraded: true });
    expect(result.questions.find(q => q.questionId === 'demo-q-ocean')).toMatchObject({
      score: 0,
      isCorrect: false,
      partialCredit: false,
      feedback: 'Incorrect. The correct answer is: True',
    });
    expect(result.questions.find(q => q.questionId === 'demo-q-process')).toMatchObject({
      score: 13.93,
      maxScore: 15,
      isCorrect: false,
      partialCredit: true,
      feedback: 'Close match. Partial credit awarded.',
    });
  });

  it('grades unanswered questions as zero', async () => {
    const h = createHarness();
    const attempt = await completedAttempt(h, []);

    const answers = h.repositories.answer.listByAttempt(TENANT, attempt.id);
    expect(answers.every(a => a.isGraded && a.isCorrect === false && a.score === 0)).toBe(true);
    expect(answerFor(h, attempt.id, 'demo-q-capital').feedback).toBe('No answer was provided.');
    expect(h.repositories.attempt.getById(TENANT, attempt.id)).toMatchObject({
      score: 0,
      maxScore: 100,
      percentage: 0,
      passed: false,
      isGraded: true,
    });
  });

  it('weights each question by its points in the total', async () => {
    const h = createHarness();
    addWeightedAssessment(h);
    const attempt = await h.attempts.start(student(), 'weighted-assessment');
    await h.attempts.submit(student(), attempt.id, [
      { questionId: 'q-delta', payload: { type: 'true_false', value: true } },
      { questionId: 'q-rivers', payload: { type: 'matching', pairs: { nile: 'africa', amazon: 'africa' } } },
    ]);
    await h.queue.onIdle();

    const result = h.grading.autoGradeAttempt(TENANT, attempt.id);

    expect(result).toMatchObject({ score: 80, maxScore: 100, percentage: 80, passed: true, letterGrade: 'B-' });
    expect(result.questions.find(q => q.questionId === 'q-rivers')).toMatchObject({
      score: 20,
      maxScore: 40,
      isCorrect: false,
      partialCredit: true,
    });
  });

  it('refuses attempts that are still running', async () => {
    const h = createHarness();
    const attempt = await h.attempts.start(student(), DEMO_ASSESSMENT_ID);

    expect(() => h.grading.autoGradeAttempt(TENANT, attempt.id)).toThrow(InvalidStateError);
  });

  it('never grades abandoned attempts', async () => {
    const h = createHarness();
    const attempt = await h.attempts.start(student(), DEMO_ASSESSMENT_ID);
    await h.attempts.abandon(student(), attempt.id);

    expect(() => h.grading.autoGradeAttempt(TENANT, attempt.id)).toThrow(
      `Attempt ${attempt.id} is abandoned and is not graded`,
    );
    expect(() => h.grading.gradeAttempt(demoTeacher, attempt.id)).toThrow(InvalidStateError);
    const ocean = answerFor(h, attempt.id, 'demo-q-ocean');
    expect(() => h.grading.manualGradeAnswer(admin, ocean.id, 10)).toThrow(InvalidStateError);
    expect(h.repositories.attempt.getById(TENANT, attempt.id)?.isGraded).toBe(false);
  });

  it('rolls back every answer when saving the attempt fails', async () => {
    const h = createHarness();
    const attempt = await completedAttempt(h, PERFECT_DEMO_ANSWERS);
    const ocean = h.repositories.question.getById(TENANT, 'demo-q-ocean');
    if (!ocean) throw new Error('demo question missing');
    h.repositories.question.save({ ...ocean, content: { type: 'true_false', correctAnswer: false } });
    const save = vi.spyOn(h.repositories.attempt, 'save').mockImplementation(() => {
      throw new Error('disk full');
    });

    expect(() => h.grading.autoGradeAttempt(TENANT, attempt.id)).toThrow('disk full');
    save.mockRestore();

    expect(answerFor(h, attempt.id, 'demo-q-ocean')).toMatchObject({ score: 10, isCorrect: true });
    expect(h.published.filter(e => e.type === 'AttemptGraded')).toHaveLength(1);
  });
});

describe('GradingService.manualGradeAnswer', () => {
  it('leaves essays for a grader and finalizes once they are scored', async () => {
    const h = createHarness();
    addEssayAssessment(h);
    const attempt = await h.attempts.start(student(), 'essay-assessment');
    await h.attempts.submit(student(), attempt.id, [
      { questionId: 'q-essay', payload: { type: 'essay', text: 'Water wears the rock away over time.' } },
      { questionId: 'q-tf', payload: { type: 'true_false', value: true } },
    ]);
    await h.queue.onIdle();

    expect(h.repositories.attempt.getById(TENANT, attempt.id)).toMatchObject({
      score: 60,
      percentage: 60,
      passed: true,
      isGraded: false,
    });
    const essay = answerFor(h, attempt.id, 'q-essay');
    expect(essay).toMatchObject({ isGraded: false, isCorrect: null, score: 0 });
    expect(h.logger.warn).not.toHaveBeenCalledWith(expect.anything(), 'Answer could not be auto-graded');

    const graded = h.grading.manualGradeAnswer(essayTeacher, essay.id, 30, 'Good use of examples');
    expect(graded).toMatchObject({
      score: 30,
      maxScore: 40,
      isCorrect: false,
      isGraded: true,
      gradedBy: 'teacher-2',
      feedback: 'Good use of examples',
    });
    await h.queue.onIdle();

    expect(h.repositories.attempt.getById(TENANT, attempt.id)).toMatchObject({
      score: 90,
      maxScore: 100,
      percentage: 90,
      isGraded: true,
    });
    expect(answerFor(h, attempt.id, 'q-essay').score).toBe(30);
    expect(h.published.map(e => e.type)).toEqual([
      'AttemptStarted',
      'AttemptSubmitted',
      'AttemptGraded',
      'AnswerGraded',
      'AttemptGraded',
    ]);
  });

  it('validates the score range and the grader', async () => {
    const h = createHarness();
    addEssayAssessment(h);
    const attempt = await h.attempts.start(student(), 'essay-assessment');
    await h.attempts.submit(student(), attempt.id);
    await h.queue.onIdle();
    const essay = answerFor(h, attempt.id, 'q-essay');

    expect(() => h.grading.manualGradeAnswer(essayTeacher, essay.id, 41)).toThrow('Score must be between 0 and 40');
    expect(() => h.grading.manualGradeAnswer(essayTeacher, essay.id, -1)).toThrow(ValidationError);
    expect(() => h.grading.manualGradeAnswer(demoTeacher, essay.id, 10)).toThrow(PermissionDeniedError);
    expect(h.grading.manualGradeAnswer(admin, essay.id, 40).isCorrect).toBe(true);
    await h.queue.onIdle();
  });

  it('waits until the attempt is finished', async () => {
    const h = createHarness();
    const attempt = await h.attempts.start(student(), DEMO_ASSESSMENT_ID);
    const ocean = answerFor(h, attempt.id, 'demo-q-ocean');

    expect(() => h.grading.manualGradeAnswer(admin, ocean.id, 10)).toThrow(InvalidStateError);
  });
});

describe('GradingService batch grading', () => {
  it('grades completed attempts of an assessment and re-grades timed out ones too', async () => {
    const h = createHarness();
    await completedAttempt(h, PERFECT_DEMO_ANSWERS, 'student-1');
    await completedAttempt(h, [], 'student-2');
    await h.attempts.start(student('student-3'), DEMO_ASSESSMENT_ID);
    h.clock.advance(31 * 60_000);
    await h.attempts.timeOutExpired();
    await h.queue.onIdle();

    const graded = h.grading.autoGradeAssessment(demoTeacher, DEMO_ASSESSMENT_ID);
    expect(graded.failed).toEqual([]);
    expect(graded.graded.map(result => result.score).sort((a, b) => a - b)).toEqual([0, 100]);

    const regraded = h.grading.reGradeAssessment(admin, DEMO_ASSESSMENT_ID);
    expect(regraded.graded).toHaveLength(3);
    expect(() => h.grading.autoGradeAssessment(student(), DEMO_ASSESSMENT_ID)).toThrow(PermissionDeniedError);
  });

  it('re-grades a changed question across finished attempts', async () => {
    const h = createHarness();
    const attempt = await completedAttempt(h, PERFECT_DEMO_ANSWERS);
    await h.attempts.start(student('student-2'), DEMO_ASSESSMENT_ID);
    const ocean = h.repositories.question.getById(TENANT, 'demo-q-ocean');
    if (!ocean) throw new Error('demo question missing');
    h.repositories.question.save({ ...ocean, content: { type: 'true_false', correctAnswer: false } });

    const results = h.grading.reGradeQuestion(demoTeacher, 'demo-q-ocean');

    expect(results).toEqual([
      expect.objectContaining({ attemptId: attempt.id, questionId: 'demo-q-ocean', score: 0, isCorrect: false }),
    ]);
    expect(h.repositories.attempt.getById(TENANT, attempt.id)?.score).toBe(90);
    expect(() => h.grading.reGradeQuestion(actor('teacher-x', 'TEACHER'), 'demo-q-ocean')).toThrow(PermissionDeniedError);
  });

  it('keeps manual grades when re-grading', async () => {
    const h = createHarness();
    const attempt = await completedAttempt(h, PERFECT_DEMO_ANSWERS);
    h.grading.manualGradeAnswer(admin, answerFor(h, attempt.id, 'demo-q-ocean').id, 5);
    await h.queue.onIdle();

    const { graded } = h.grading.reGradeAssessment(admin, DEMO_ASSESSMENT_ID);

    expect(graded[0].score).toBe(95);
    expect(graded[0].questions.find(q => q.questionId === 'demo-q-ocean')).toMatchObject({
      score: 5,
      isCorrect: false,
      partialCredit: true,
    });
  });
});

describe('GradingService.manualGradeAnswers', () => {
  it('saves the whole batch and finalizes the attempt once', async () => {
    const h = createHarness();
    const attempt = await completedAttempt(h, PERFECT_DEMO_ANSWERS);
    const ocean = answerFor(h, attempt.id, 'demo-q-ocean');
    const capital = answerFor(h, attempt.id, 'demo-q-capital');

    const graded = h.grading.manualGradeAnswers(demoTeacher, [
      { answerId: ocean.id, score: 5, feedback: 'Half marks' },
      { answerId: capital.id, score: 10 },
    ]);
    await h.queue.onIdle();

    expect(graded.map(answer => [answer.questionId, answer.score, answer.gradedBy])).toEqual([
      ['demo-q-ocean', 5, 'demo-teacher'],
      ['demo-q-capital', 10, 'demo-teacher'],
    ]);
    expect(answerFor(h, attempt.id, 'demo-q-ocean').feedback).toBe('Half marks');
    expect(h.repositories.attempt.getById(TENANT, attempt.id)).toMatchObject({ score: 85, percentage: 85, isGraded: true });
    expect(h.published.filter(e => e.type === 'AnswerGraded')).toHaveLength(2);
    expect(h.published.filter(e => e.type === 'AttemptGraded')).toHaveLength(2);
  });

  it('writes nothing when one grade is invalid', async () => {
    const h = createHarness();
    const attempt = await completedAttempt(h, PERFECT_DEMO_ANSWERS);
    const ocean = answerFor(h, attempt.id, 'demo-q-ocean');
    const capital = answerFor(h, attempt.id, 'demo-q-capital');

    expect(() =>
      h.grading.manualGradeAnswers(demoTeacher, [
        { answerId: ocean.id, score: 5 },
        { answerId: capital.id, score: 25 },
      ]),
    ).toThrow('Score must be between 0 and 20');
    await h.queue.onIdle();

    const untouched = answerFor(h, attempt.id, 'demo-q-ocean');
    expect(untouched.score).toBe(10);
    expect(untouched.gradedBy).toBeUndefined();
    expect(h.published.filter(e => e.type === 'AnswerGraded')).toHaveLength(0);
    expect(h.repositories.attempt.getById(TENANT, attempt.id)?.score).toBe(100);
  });

  it('rejects empty batches and repeated answers', async () => {
    const h = createHarness();
    const attempt = await completedAttempt(h, PERFECT_DEMO_ANSWERS);
    const ocean = answerFor(h, attempt.id, 'demo-q-ocean');

    expect(() => h.grading.manualGradeAnswers(demoTeacher, [])).toThrow('At least one grade is required');
    expect(() =>
      h.grading.manualGradeAnswers(demoTeacher, [
        { answerId: ocean.id, score: 5 },
        { answerId: ocean.id, score: 6 },
      ]),
    ).toThrow('Each answer may be graded only once per batch');
  });

  it('caps an earlier manual grade when the question is worth less', async () => {
    const h = createHarness();
    const attempt = await completedAttempt(h, PERFECT_DEMO_ANSWERS);
    h.grading.manualGradeAnswer(admin, answerFor(h, attempt.id, 'demo-q-ocean').id, 10);
    await h.queue.onIdle();
    const link = h.repositories.assessmentQuestion
      .listByAssessment(TENANT, DEMO_ASSESSMENT_ID)
      .find(row => row.questionId === 'demo-q-ocean');
    if (!link) throw new Error('demo link missing');
    h.repositories.assessmentQuestion.save({ ...link, points: 5 });

    const { graded } = h.grading.reGradeAssessment(admin, DEMO_ASSESSMENT_ID);

    expect(graded[0]).toMatchObject({ score: 95, maxScore: 95, percentage: 100 });
    expect(graded[0].questions.find(q => q.questionId === 'demo-q-ocean')).toMatchObject({ score: 5, maxScore: 5 });
  });
});

describe('GradingService.autoGradeAnswer', () => {
  it('grades a pending answer and refreshes the attempt', async () => {
    const h = createHarness();
    const attempt = await completedAttempt(h, withAnswer('demo-q-ocean', { type: 'true_false', value: false }));
    const ocean = answerFor(h, attempt.id, 'demo-q-ocean');
    h.repositories.answer.save({ ...ocean, isGraded: false, isCorrect: null, score: 0, gradedAt: undefined });

    const result = h.grading.autoGradeAnswer(demoTeacher, ocean.id);
    await h.queue.onIdle();

    expect(result).toMatchObject({ answerId: ocean.id, score: 0, maxScore: 10, isCorrect: false, isGraded: true });
    expect(answerFor(h, attempt.id, 'demo-q-ocean').isGraded).toBe(true);
    expect(h.repositories.attempt.getById(TENANT, attempt.id)).toMatchObject({ score: 90, isGraded: true });
    expect(h.published.filter(e => e.type === 'AttemptGraded')).toHaveLength(2);
  });

  it('returns graded answers unchanged', async () => {
    const h = createHarness();
    const attempt = await completedAttempt(h, PERFECT_DEMO_ANSWERS);
    h.grading.manualGradeAnswer(admin, answerFor(h, attempt.id, 'demo-q-ocean').id, 4);
    await h.queue.onIdle();
    const ocean = answerFor(h, attempt.id, 'demo-q-ocean');

    expect(h.grading.autoGradeAnswer(admin, ocean.id)).toMatchObject({ score: 4, isGraded: true, partialCredit: true });
    expect(() => h.grading.autoGradeAnswer(actor('teacher-x', 'TEACHER'), ocean.id)).toThrow(PermissionDeniedError);
  });

  it('leaves essays for a grader', async () => {
    const h = createHarness();
    addEssayAssessment(h);
    const attempt = await h.attempts.start(student(), 'essay-assessment');
    await h.attempts.submit(student(), attempt.id, [
      { questionId: 'q-essay', payload: { type: 'essay', text: 'Rivers cut downwards.' } },
    ]);
    await h.queue.onIdle();
    const essay = answerFor(h, attempt.id, 'q-essay');

    expect(h.grading.autoGradeAnswer(essayTeacher, essay.id)).toMatchObject({ score: 0, maxScore: 40, isGraded: false });
    await h.queue.onIdle();
    expect(h.repositories.attempt.getById(TENANT, attempt.id)?.isGraded).toBe(false);
  });
});

describe('GradingService previews', () => {
  it('scores a candidate answer at the question default points', () => {
    const h = createHarness();

    expect(
      h.grading.calculateScore(demoTeacher, 'demo-q-ocean', { type: 'true_false', value: true }),
    ).toEqual({ questionId: 'demo-q-ocean', ratio: 1, fullyCorrect: true, score: 10, maxScore: 10 });
    const partial = h.grading.calculateScore(admin, 'demo-q-process', { type: 'short_answer', text: 'photosynthesys' });
    expect(partial).toMatchObject({ score: 13.93, maxScore: 15, fullyCorrect: false });
    expect(() => h.grading.calculateScore(student(), 'demo-q-ocean', { type: 'true_false', value: true })).toThrow(
      PermissionDeniedError,
    );
  });

  it('builds feedback with or without the correct answer', () => {
    const h = createHarness();
    const wrong = { type: 'true_false', value: false } as const;

    expect(h.grading.buildFeedback(demoTeacher, 'demo-q-ocean', wrong)).toEqual({
      questionId: 'demo-q-ocean',
      feedback: 'Incorrect answer.',
    });
    expect(h.grading.buildFeedback(demoTeacher, 'demo-q-ocean', wrong, true).feedback).toBe(
      'Incorrect. The correct answer is: True',
    );
    expect(
      h.grading.buildFeedback(demoTeacher, 'demo-q-capital', { type: 'multiple_choice', selectedOptionIds: [] }).feedback,
    ).toBe('No answer was provided.');
    expect(() => h.grading.buildFeedback(student(), 'demo-q-ocean', wrong)).toThrow(PermissionDeniedError);
  });
});
