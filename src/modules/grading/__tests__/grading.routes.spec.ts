import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { FastifyInstance } from 'fastify';
import {
  DEMO_ASSESSMENT_ID,
  PERFECT_DEMO_ANSWERS,
  TENANT,
  createTestApp,
  demoTeacher,
  headersFor,
  student,
} from '../../../__tests__/harness.js';

describe('grading routes', () => {
  let app: FastifyInstance;

  beforeEach(() => {
    ({ app } = createTestApp());
  });

  afterEach(async () => {
    await app.close();
  });

  async function startAttempt(): Promise<string> {
    const started = await app.inject({
      method: 'POST',
      url: '/attempts',
      headers: headersFor(student()),
      payload: { assessmentId: DEMO_ASSESSMENT_ID },
    });
    return started.json().id;
  }

  async function submittedAttempt(): Promise<string> {
    const attemptId = await startAttempt();
    await app.inject({
      method: 'POST',
      url: `/attempts/${attemptId}/submit`,
      headers: headersFor(student()),
      payload: { answers: PERFECT_DEMO_ANSWERS },
    });
    await app.services.gradingQueue.onIdle();
    return attemptId;
  }

  function answerId(attemptId: string, questionId: string): string {
    const answer = app.services.repositories.answer.getByAttemptAndQuestion(TENANT, attemptId, questionId);
    expect(answer).toBeDefined();
    return answer?.id ?? '';
  }

  it('grades an attempt for the assessment owner', async () => {
    const attemptId = await submittedAttempt();

    const response = await app.inject({
      method: 'POST',
      url: `/grading/attempts/${attemptId}`,
      headers: headersFor(demoTeacher),
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body).toMatchObject({
      attemptId,
      score: 100,
      maxScore: 100,
      percentage: 100,
      passed: true,
      letterGrade: 'A+',
      isGraded: true,
    });
    expect(body.questions).toHaveLength(6);
  });

  it('does not let students grade', async () => {
    const attemptId = await submittedAttempt();

    const response = await app.inject({
      method: 'POST',
      url: `/grading/attempts/${attemptId}`,
      headers: headersFor(student()),
    });

    expect(response.statusCode).toBe(403);
    expect(response.json()).toEqual({
      error: `Not allowed to manage assessment ${DEMO_ASSESSMENT_ID}`,
      code: 'PERMISSION_DENIED',
    });
  });

  it('applies a manual grade and refreshes the attempt totals', async () => {
    const attemptId = await submittedAttempt();
    const oceanAnswerId = answerId(attemptId, 'demo-q-ocean');

    const response = await app.inject({
      method: 'PUT',
      url: `/grading/answers/${oceanAnswerId}`,
      headers: headersFor(demoTeacher),
      payload: { score: 5, feedback: 'Half credit' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      id: oceanAnswerId,
      score: 5,
      maxScore: 10,
      isCorrect: false,
      gradedBy: 'demo-teacher',
      feedback: 'Half credit',
    });

    await app.services.gradingQueue.onIdle();
    const detail = await app.inject({ method: 'GET', url: `/attempts/${attemptId}`, headers: headersFor(demoTeacher) });
    expect(detail.json().attempt).toMatchObject({ score: 95, percentage: 95, passed: true });
  });

  it('rejects manual scores above the question points', async () => {
    const attemptId = await submittedAttempt();

    const response = await app.inject({
      method: 'PUT',
      url: `/grading/answers/${answerId(attemptId, 'demo-q-ocean')}`,
      headers: headersFor(demoTeacher),
      payload: { score: 50 },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Score must be between 0 and 10', code: 'VALIDATION_FAILED' });
  });

  it('rejects negative manual scores before reaching the service', async () => {
    const attemptId = await submittedAttempt();

    const response = await app.inject({
      method: 'PUT',
      url: `/grading/answers/${answerId(attemptId, 'demo-q-ocean')}`,
      headers: headersFor(demoTeacher),
      payload: { score: -1 },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'Validation failed', code: 'VALIDATION_FAILED' });
  });

  it('refuses manual grading while the attempt is in progress', async () => {
    const attemptId = await startAttempt();

    const response = await app.inject({
      method: 'PUT',
      url: `/grading/answers/${answerId(attemptId, 'demo-q-ocean')}`,
      headers: headersFor(demoTeacher),
      payload: { score: 5 },
    });

    expect(response.statusCode).toBe(409);
    expect(response.json()).toEqual({ error: `Attempt ${attemptId} is still in progress`, code: 'INVALID_STATE' });
  });

  it('grades and re-grades a whole assessment', async () => {
    const attemptId = await submittedAttempt();

    const graded = await app.inject({
      method: 'POST',
      url: `/grading/assessments/${DEMO_ASSESSMENT_ID}`,
      headers: headersFor(demoTeacher),
    });
    expect(graded.statusCode).toBe(200);
    expect(graded.json().failed).toEqual([]);
    expect(graded.json().graded).toHaveLength(1);
    expect(graded.json().graded[0]).toMatchObject({ attemptId, score: 100 });

    const regraded = await app.inject({
      method: 'POST',
      url: `/grading/assessments/${DEMO_ASSESSMENT_ID}/regrade`,
      headers: headersFor(demoTeacher),
    });
    expect(regraded.json().graded[0]).toMatchObject({ attemptId, score: 100 });
  });

  it('re-grades a single question and keeps manual scores', async () => {
    const attemptId = await submittedAttempt();
    await app.inject({
      method: 'PUT',
      url: `/grading/answers/${answerId(attemptId, 'demo-q-ocean')}`,
      headers: headersFor(demoTeacher),
      payload: { score: 5 },
    });
    await app.services.gradingQueue.onIdle();

    const response = await app.inject({
      method: 'POST',
      url: '/grading/questions/demo-q-ocean/regrade',
      headers: headersFor(demoTeacher),
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual([
      expect.objectContaining({ attemptId, questionId: 'demo-q-ocean', score: 5, maxScore: 10 }),
    ]);
  });

  it('applies a batch of manual grades', async () => {
    const attemptId = await submittedAttempt();

    const response = await app.inject({
      method: 'POST',
      url: '/grading/answers/batch',
      headers: headersFor(demoTeacher),
      payload: {
        grades: [
          { answerId: answerId(attemptId, 'demo-q-ocean'), score: 5 },
          { answerId: answerId(attemptId, 'demo-q-capital'), score: 10 },
        ],
      },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json().map((answer: { score: number }) => answer.score)).toEqual([5, 10]);
    await app.services.gradingQueue.onIdle();
    const detail = await app.inject({ method: 'GET', url: `/attempts/${attemptId}`, headers: headersFor(demoTeacher) });
    expect(detail.json().attempt).toMatchObject({ score: 85, percentage: 85 });
  });

  it('rejects an empty batch', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/grading/answers/batch',
      headers: headersFor(demoTeacher),
      payload: { grades: [] },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'Validation failed', code: 'VALIDATION_FAILED' });
  });

  it('auto-grades a single answer', async () => {
    const attemptId = await submittedAttempt();
    const oceanAnswerId = answerId(attemptId, 'demo-q-ocean');

    const response = await app.inject({
      method: 'POST',
      url: `/grading/answers/${oceanAnswerId}/auto`,
      headers: headersFor(demoTeacher),
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ answerId: oceanAnswerId, questionId: 'demo-q-ocean', score: 10, isGraded: true });
  });

  it('refuses to grade an abandoned attempt', async () => {
    const attemptId = await startAttempt();
    await app.inject({ method: 'POST', url: `/attempts/${attemptId}/abandon`, headers: headersFor(student()) });

    const response = await app.inject({
      method: 'POST',
      url: `/grading/attempts/${attemptId}`,
      headers: headersFor(demoTeacher),
    });

    expect(response.statusCode).toBe(409);
    expect(response.json()).toEqual({
      error: `Attempt ${attemptId} is abandoned and is not graded`,
      code: 'INVALID_STATE',
    });
  });

  it('previews the score of a candidate answer', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/grading/calculate-score',
      headers: headersFor(demoTeacher),
      payload: { questionId: 'demo-q-planets', payload: { type: 'ordering', order: ['mercury', 'earth', 'venus'] } },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      questionId: 'demo-q-planets',
      ratio: 1 / 3,
      fullyCorrect: false,
      score: 5,
      maxScore: 15,
    });
  });

  it('previews feedback for a candidate answer', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/grading/generate-feedback',
      headers: headersFor(demoTeacher),
      payload: {
        questionId: 'demo-q-ocean',
        payload: { type: 'true_false', value: false },
        revealCorrectAnswers: true,
      },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      questionId: 'demo-q-ocean',
      feedback: 'Incorrect. The correct answer is: True',
    });
  });

  it('keeps score previews from students', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/grading/calculate-score',
      headers: headersFor(student()),
      payload: { questionId: 'demo-q-ocean', payload: { type: 'true_false', value: true } },
    });

    expect(response.statusCode).toBe(403);
    expect(response.json().code).toBe('PERMISSION_DENIED');
  });
});
