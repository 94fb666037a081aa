import type { RepositoryBundle } from '../../infrastructure/repositories.js';
import { buildEvent, type EventBus } from '../../common/event-bus.js';
import { requireManage, requireRole } from '../../common/access.js';
import { createSilentLogger, type Logger } from '../../common/logger.js';
import { systemClock, type ActorContext, type Clock } from '../../common/types.js';
import { InvalidStateError, NotFoundError, ValidationError } from '../../common/errors.js';
import type { Assessment } from '../assessments/assessment.model.js';
import { isEmptyAnswer, type AnswerPayload, type Question } from '../questions/question.model.js';
import { isAutoGradeable, letterGrade, scoreAnswer, type ScoringResult } from '../scoring/scoring.service.js';
import { generateFeedback } from '../scoring/scoring.feedback.js';
import type { AttemptGradingScheduler } from '../attempts/attempt.service.js';
import type { Answer, Attempt, AttemptStatus } from '../attempts/attempt.model.js';
import type { GradingQueue } from './grading.queue.js';

export interface GradingServiceDeps {
  repositories: RepositoryBundle;
  queue: GradingQueue;
  events: EventBus;
  clock?: Clock;
  logger?: Logger;
}

export interface QuestionGradeResult {
  answerId: string;
  questionId: string;
  score: number;
  maxScore: number;
  isCorrect: boolean | null;
  partialCredit: boolean;
  isGraded: boolean;
  feedback?: string;
}

export interface AttemptGradeResult {
  attemptId: string;
  score: number;
  maxScore: number;
  percentage: number;
  passed: boolean;
  letterGrade: string;
  isGraded: boolean;
  questions: QuestionGradeResult[];
}

export interface BatchGradeResult {
  graded: AttemptGradeResult[];
  failed: Array<{ attemptId: string; error: string }>;
}

export interface QuestionRegradeResult extends QuestionGradeResult {
  attemptId: string;
}

export interface ManualGrade {
  answerId: string;
  score: number;
  feedback?: string;
}

export interface ScorePreview extends ScoringResult {
  questionId: string;
  score: number;
  maxScore: number;
}

export interface FeedbackPreview {
  questionId: string;
  feedback: string;
}

const NO_ANSWER_FEEDBACK = 'No answer was provided.';

const REGRADABLE_STATUSES: readonly AttemptStatus[] = ['completed', 'timed_out'];

function assertGradable(attempt: Attempt): void {
  if (attempt.status === 'in_progress') {
    throw new InvalidStateError(`Attempt ${attempt.id} is still in progress`);
  }
  if (!REGRADABLE_STATUSES.includes(attempt.status)) {
    throw new InvalidStateError(`Attempt ${attempt.id} is ${attempt.status} and is not graded`);
  }
}

function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}

function toQuestionResult(answer: Answer): QuestionGradeResult {
  return {
    answerId: answer.id,
    questionId: answer.questionId,
    score: answer.score,
    maxScore: answer.maxScore,
    isCorrect: answer.isCorrect,
    partialCredit: answer.isGraded && answer.score > 0 && answer.score < answer.maxScore,
    isGraded: answer.isGraded,
    feedback: answer.feedback,
  };
}

/**
 * Scores finished attempts and keeps their aggregates consistent. Each attempt
 * is graded inside one repository transaction so partially written grades are
 * never visible.
 */
export class GradingService implements AttemptGradingScheduler {
  private readonly repositories: RepositoryBundle;
  private readonly queue: GradingQueue;
  private readonly events: EventBus;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(deps: GradingServiceDeps) {
    this.repositories = deps.repositories;
    this.queue = deps.queue;
    this.events = deps.events;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createSilentLogger();
  }

  scheduleAutoGrade(tenantId: string, attemptId: string): void {
    this.queue.enqueue({ kind: 'auto-grade', tenantId, attemptId, run: () => this.autoGradeAttempt(tenantId, attemptId) });
  }

  autoGradeAttempt(tenantId: string, attemptId: string): AttemptGradeResult {
    const { attempt, result } = this.repositories.transaction(tenantId, () => this.gradeInTransaction(tenantId, attemptId));
    this.events.publish(
      buildEvent(this.clock, 'AttemptGraded', tenantId, {
        attemptId,
        assessmentId: attempt.assessmentId,
        studentId: attempt.studentId,
        score: result.score,
        maxScore: result.maxScore,
        percentage: result.percentage,
        passed: result.passed,
        isGraded: result.isGraded,
      }),
    );
    this.logger.info(
      { attemptId, score: result.score, maxScore: result.maxScore, isGraded: result.isGraded },
      'Attempt graded',
    );
    return result;
  }

  /** Grades on behalf of a teacher or admin who manages the attempt's assessment. */
  gradeAttempt(actor: ActorContext, attemptId: string): AttemptGradeResult {
    const attempt = this.loadAttempt(actor.tenantId, attemptId);
    requireManage(actor, this.loadAssessment(actor.tenantId, attempt.assessmentId), `assessment ${attempt.assessmentId}`);
    return this.autoGradeAttempt(actor.tenantId, attemptId);
  }

  manualGradeAnswer(actor: ActorContext, answerId: string, score: number, feedback?: string): Answer {
    const [graded] = this.applyManualGrades(actor, [{ answerId, score, feedback }]);
    return graded;
  }

  /**
   * Applies several manual grades at once. Every grade is validated before
   * anything is written; the whole batch is saved in one transaction and each
   * touched attempt is finalized once.
   */
  manualGradeAnswers(actor: ActorContext, grades: ManualGrade[]): Answer[] {
    if (grades.length === 0) {
      throw new ValidationError('At least one grade is required');
    }
    const ids = new Set(grades.map(grade => grade.answerId));
    if (ids.size !== grades.length) {
      throw new ValidationError('Each answer may be graded only once per batch');
    }
    return this.applyManualGrades(actor, grades);
  }

  /** Auto-grades one answer of a finished attempt. Answers already graded are returned as they are. */
  autoGradeAnswer(actor: ActorContext, answerId: string): QuestionGradeResult {
    const { tenantId } = actor;
    const answer = this.loadAnswer(tenantId, answerId);
    const attempt = this.loadAttempt(tenantId, answer.attemptId);
    const assessment = this.loadAssessment(tenantId, attempt.assessmentId);
    requireManage(actor, assessment, `assessment ${assessment.id}`);
    assertGradable(attempt);
    if (answer.isGraded) {
      return toQuestionResult(answer);
    }
    const points = this.pointsFor(tenantId, assessment.id, answer.questionId);
    const question = this.loadQuestion(tenantId, answer.questionId);

    const graded = this.gradeAnswer(answer, question, points, assessment, this.clock.now().toISOString());
    this.repositories.transaction(tenantId, () => this.repositories.answer.save(graded));
    this.enqueueFinalize(tenantId, attempt.id);
    this.logger.info({ answerId, attemptId: attempt.id, score: graded.score }, 'Answer auto-graded');
    return toQuestionResult(graded);
  }

  /** Scores a candidate answer against a question without storing anything. */
  calculateScore(actor: ActorContext, questionId: string, payload: AnswerPayload): ScorePreview {
    requireRole(actor, 'TEACHER', 'ADMIN');
    const question = this.loadQuestion(actor.tenantId, questionId);
    const result = scoreAnswer(question.content, payload);
    return {
      questionId,
      ...result,
      score: roundScore(result.ratio * question.defaultPoints),
      maxScore: question.defaultPoints,
    };
  }

  buildFeedback(
    actor: ActorContext,
    questionId: string,
    payload: AnswerPayload,
    revealCorrectAnswers = false,
  ): FeedbackPreview {
    requireRole(actor, 'TEACHER', 'ADMIN');
    const question = this.loadQuestion(actor.tenantId, questionId);
    if (isEmptyAnswer(payload)) {
      return { questionId, feedback: NO_ANSWER_FEEDBACK };
    }
    const result: ScoringResult = isAutoGradeable(question.content.type)
      ? scoreAnswer(question.content, payload)
      : { ratio: 0, fullyCorrect: false };
    return { questionId, feedback: generateFeedback(question.content, payload, result, { revealCorrectAnswers }) };
  }

  autoGradeAssessment(actor: ActorContext, assessmentId: string): BatchGradeResult {
    const assessment = this.loadAssessment(actor.tenantId, assessmentId);
    requireManage(actor, assessment, `assessment ${assessmentId}`);
    return this.gradeMany(actor.tenantId, assessmentId, ['completed']);
  }

  reGradeAssessment(actor: ActorContext, assessmentId: string): BatchGradeResult {
    const assessment = this.loadAssessment(actor.tenantId, assessmentId);
    requireManage(actor, assessment, `assessment ${assessmentId}`);
    return this.gradeMany(actor.tenantId, assessmentId, REGRADABLE_STATUSES);
  }

  reGradeQuestion(actor: ActorContext, questionId: string): QuestionRegradeResult[] {
    const { tenantId } = actor;
    const question = this.loadQuestion(tenantId, questionId);
    requireManage(actor, question, `question ${questionId}`);

    const attemptIds = [...new Set(this.repositories.answer.listByQuestion(tenantId, questionId).map(a => a.attemptId))];
    const results: QuestionRegradeResult[] = [];
    for (const attemptId of attemptIds) {
      const attempt = this.repositories.attempt.getById(tenantId, attemptId);
      if (!attempt || !REGRADABLE_STATUSES.includes(attempt.status)) {
        continue;
      }
      try {
        const graded = this.autoGradeAttempt(tenantId, attemptId);
        const entry = graded.questions.find(q => q.questionId === questionId);
        if (entry) {
          results.push({ ...entry, attemptId });
        }
      } catch (err) {
        this.logger.error({ err, attemptId, questionId }, 'Re-grading attempt failed');
      }
    }
    this.logger.info({ questionId, attempts: results.length }, 'Question re-graded');
    return results;
  }

  private applyManualGrades(actor: ActorContext, grades: ManualGrade[]): Answer[] {
    const { tenantId } = actor;
    const timestamp = this.clock.now().toISOString();
    const graded = grades.map(({ answerId, score, feedback }) => {
      const answer = this.loadAnswer(tenantId, answerId);
      const attempt = this.loadAttempt(tenantId, answer.attemptId);
      const assessment = this.loadAssessment(tenantId, attempt.assessmentId);
      requireManage(actor, assessment, `assessment ${assessment.id}`);
      assertGradable(attempt);
      const points = this.pointsFor(tenantId, assessment.id, answer.questionId);
      if (!Number.isFinite(score) || score < 0 || score > points) {
        throw new ValidationError(`Score must be between 0 and ${points}`);
      }
      const next: Answer = {
        ...answer,
        score,
        maxScore: points,
        feedback: feedback ?? answer.feedback,
        gradedBy: actor.actorId,
        gradedAt: timestamp,
        isGraded: true,
        isCorrect: score === points,
        updatedAt: timestamp,
      };
      return next;
    });

    this.repositories.transaction(tenantId, () => this.repositories.answer.saveMany(graded));

    for (const attemptId of new Set(graded.map(answer => answer.attemptId))) {
      this.enqueueFinalize(tenantId, attemptId);
    }
    for (const answer of graded) {
      this.events.publish(
        buildEvent(this.clock, 'AnswerGraded', tenantId, {
          answerId: answer.id,
          attemptId: answer.attemptId,
          questionId: answer.questionId,
          score: answer.score,
          gradedBy: actor.actorId,
        }),
      );
    }
    this.logger.info({ answers: graded.length, gradedBy: actor.actorId }, 'Answers graded manually');
    return graded;
  }

  private enqueueFinalize(tenantId: string, attemptId: string): void {
    this.queue.enqueue({
      kind: 'finalize-manual',
      tenantId,
      attemptId,
      run: () => this.finalizeIfComplete(tenantId, attemptId),
    });
  }

  /** Re-runs aggregation once every answer of the attempt carries a grade. */
  finalizeIfComplete(tenantId: string, attemptId: string): AttemptGradeResult | undefined {
    const pending = this.repositories.answer.listByAttempt(tenantId, attemptId).filter(answer => !answer.isGraded);
    if (pending.length > 0) {
      this.logger.debug({ attemptId, pending: pending.length }, 'Attempt still has ungraded answers');
      return undefined;
    }
    return this.autoGradeAttempt(tenantId, attemptId);
  }

  private gradeMany(tenantId: string, assessmentId: string, statuses: readonly AttemptStatus[]): BatchGradeResult {
    const batch: BatchGradeResult = { graded: [], failed: [] };
    const attempts = this.repositories.attempt
      .listByAssessment(tenantId, assessmentId)
      .filter(attempt => statuses.includes(attempt.status));
    for (const attempt of attempts) {
      try {
        batch.graded.push(this.autoGradeAttempt(tenantId, attempt.id));
      } catch (err) {
        this.logger.error({ err, attemptId: attempt.id, assessmentId }, 'Grading attempt failed');
        batch.failed.push({ attemptId: attempt.id, error: err instanceof Error ? err.message : String(err) });
      }
    }
    return batch;
  }

  private gradeInTransaction(tenantId: string, attemptId: string): { attempt: Attempt; result: AttemptGradeResult } {
    const attempt = this.loadAttempt(tenantId, attemptId);
    assertGradable(attempt);
    const assessment = this.loadAssessment(tenantId, attempt.assessmentId);
    const links = this.repositories.assessmentQuestion.listByAssessment(tenantId, assessment.id);
    const pointsByQuestion = new Map(links.map(link => [link.questionId, link.points]));
    const questions = new Map(
      this.repositories.question.listByIds(tenantId, links.map(link => link.questionId)).map(q => [q.id, q]),
    );
    const timestamp = this.clock.now().toISOString();

    const graded: Answer[] = [];
    for (const answer of this.repositories.answer.listByAttempt(tenantId, attemptId)) {
      const points = pointsByQuestion.get(answer.questionId);
      const question = questions.get(answer.questionId);
      if (points === undefined || !question) {
        this.logger.warn({ attemptId, questionId: answer.questionId }, 'Answer has no matching assessment question, skipping');
        continue;
      }
      graded.push(this.gradeAnswer(answer, question, points, assessment, timestamp));
    }

    const score = roundScore(graded.reduce((sum, answer) => sum + answer.score, 0));
    const maxScore = graded.reduce((sum, answer) => sum + answer.maxScore, 0);
    const percentage = maxScore > 0 ? roundScore((score / maxScore) * 100) : 0;
    const passed = percentage >= assessment.passingScore;
    const isGraded = graded.every(answer => answer.isGraded);

    this.repositories.answer.saveMany(graded);
    const saved = this.repositories.attempt.save({
      ...attempt,
      score,
      maxScore,
      percentage,
      passed,
      isGraded,
      updatedAt: timestamp,
    });

    return {
      attempt: saved,
      result: {
        attemptId,
        score,
        maxScore,
        percentage,
        passed,
        letterGrade: letterGrade(percentage),
        isGraded,
        questions: graded.map(toQuestionResult),
      },
    };
  }

  private gradeAnswer(answer: Answer, question: Question, points: number, assessment: Assessment, timestamp: string): Answer {
    if (answer.gradedBy) {
      // manual grades are kept as given, capped by the current point value
      return { ...answer, score: Math.min(answer.score, points), maxScore: points };
    }
    if (!isAutoGradeable(question.content.type)) {
      return { ...answer, score: 0, maxScore: points, isCorrect: null, isGraded: false, gradedAt: undefined };
    }
    if (answer.payload === null || isEmptyAnswer(answer.payload)) {
      return {
        ...answer,
        score: 0,
        maxScore: points,
        isCorrect: false,
        isGraded: true,
        gradedAt: timestamp,
        feedback: NO_ANSWER_FEEDBACK,
        updatedAt: timestamp,
      };
    }
    try {
      const result = scoreAnswer(question.content, answer.payload);
      return {
        ...answer,
        score: roundScore(result.ratio * points),
        maxScore: points,
        isCorrect: result.fullyCorrect,
        isGraded: true,
        gradedAt: timestamp,
        feedback: generateFeedback(question.content, answer.payload, result, {
          revealCorrectAnswers: assessment.settings.showCorrectAnswers,
        }),
        updatedAt: timestamp,
      };
    } catch (err) {
      this.logger.warn({ err, answerId: answer.id, questionId: question.id }, 'Answer could not be auto-graded');
      return {
        ...answer,
        score: 0,
        maxScore: points,
        isCorrect: null,
        isGraded: false,
        gradedAt: undefined,
        updatedAt: timestamp,
      };
    }
  }

  private loadAnswer(tenantId: string, answerId: string): Answer {
    const answer = this.repositories.answer.getById(tenantId, answerId);
    if (!answer) {
      throw new NotFoundError('Answer', answerId);
    }
    return answer;
  }

  private loadQuestion(tenantId: string, questionId: string): Question {
    const question = this.repositories.question.getById(tenantId, questionId);
    if (!question) {
      throw new NotFoundError('Question', questionId);
    }
    return question;
  }

  private pointsFor(tenantId: string, assessmentId: string, questionId: string): number {
    const link = this.repositories.assessmentQuestion
      .listByAssessment(tenantId, assessmentId)
      .find(candidate => candidate.questionId === questionId);
    if (!link) {
      throw new NotFoundError('Assessment question', questionId);
    }
    return link.points;
  }

  private loadAttempt(tenantId: string, attemptId: string): Attempt {
    const attempt = this.repositories.attempt.getById(tenantId, attemptId);
    if (!attempt) {
      throw new NotFoundError('Attempt', attemptId);
    }
    return attempt;
  }

  private loadAssessment(tenantId: string, assessmentId: string): Assessment {
    const assessment = this.repositories.assessment.getById(tenantId, assessmentId);
    if (!assessment) {
      throw new NotFoundError('Assessment', assessmentId);
    }
    return assessment;
  }
}
