import type { RepositoryBundle } from '../../infrastructure/repositories.js';
import type { EventBus } from '../../common/event-bus.js';
import { buildEvent } from '../../common/event-bus.js';
import { canManage, hasRole, requireManage, requireRole } from '../../common/access.js';
import { createSilentLogger, type Logger } from '../../common/logger.js';
import { systemClock, type ActorContext, type Clock } from '../../common/types.js';
import {
  AttemptAlreadySubmittedError,
  AttemptCannotStartError,
  ConflictError,
  InvalidStateError,
  NotFoundError,
  PermissionDeniedError,
  TimeExpiredError,
  ValidationError,
} from '../../common/errors.js';
import { availabilityProblem, type Assessment, type AssessmentQuestion } from '../assessments/assessment.model.js';
import { answerPayloadSchema, isEmptyAnswer, type AnswerPayload, type Question } from '../questions/question.model.js';
import { sanitizeQuestion, type SanitizedQuestion } from '../questions/question.sanitizer.js';
import type { RandomizationService } from '../randomization/randomization.service.js';
import type { AttemptEventPayload } from '../events/events.types.js';
import {
  assertTransition,
  createAttempt,
  createEmptyAnswer,
  isExpired,
  isTerminal,
  secondsUntil,
  type Answer,
  type Attempt,
  type SessionMetadata,
} from './attempt.model.js';

/** Hands a finished attempt to whatever grades it. */
export interface AttemptGradingScheduler {
  scheduleAutoGrade(tenantId: string, attemptId: string): void;
}

export interface AttemptServiceDeps {
  repositories: RepositoryBundle;
  randomization: RandomizationService;
  grading: AttemptGradingScheduler;
  events: EventBus;
  clock?: Clock;
  logger?: Logger;
}

export interface SubmitAnswerOptions {
  flagged?: boolean;
  timeSpentSeconds?: number;
  currentQuestionIndex?: number;
}

export interface SubmittedAnswer {
  questionId: string;
  payload: unknown;
  flagged?: boolean;
  timeSpentSeconds?: number;
}

export interface SubmitOptions {
  endReason?: 'submitted' | 'auto_submit';
  timeSpentSeconds?: number;
}

export interface AttemptQuestionView {
  position: number;
  points: number;
  question: SanitizedQuestion | Question;
}

export interface AttemptDetail {
  attempt: Attempt;
  answers: Answer[];
  questions: AttemptQuestionView[];
  canSubmit: boolean;
  canResume: boolean;
  timeRemainingSeconds: number;
}

export interface StartEligibility {
  canStart: boolean;
  reason?: string;
  /** Set when an unexpired attempt is already running and should be resumed. */
  activeAttemptId?: string;
}

export interface TimeRemaining {
  attemptId: string;
  endsAt: string;
  timeRemainingSeconds: number;
  expired: boolean;
}

function eventPayload(attempt: Attempt): AttemptEventPayload {
  return { attemptId: attempt.id, assessmentId: attempt.assessmentId, studentId: attempt.studentId };
}

function parsePayload(raw: unknown): AnswerPayload {
  const parsed = answerPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(issue => `${issue.path.join('.') || 'payload'}: ${issue.message}`).join('; ');
    throw new ValidationError(`Invalid answer payload (${detail})`);
  }
  return parsed.data;
}

function elapsedSeconds(attempt: Attempt, now: Date): number {
  const end = Math.min(now.getTime(), new Date(attempt.endsAt).getTime());
  return Math.max(0, Math.floor((end - new Date(attempt.startedAt).getTime()) / 1000));
}

function withPayload(base: Answer, payload: AnswerPayload, timestamp: string, options: SubmitAnswerOptions = {}): Answer {
  const history = base.payload === null
    ? base.history
    : [...base.history, { payload: base.payload, recordedAt: base.lastModifiedAt ?? base.updatedAt }];
  return {
    ...base,
    payload,
    history,
    flagged: options.flagged ?? base.flagged,
    timeSpentSeconds: options.timeSpentSeconds ?? base.timeSpentSeconds,
    firstAnsweredAt: base.firstAnsweredAt ?? timestamp,
    lastModifiedAt: timestamp,
    updatedAt: timestamp,
  };
}

/**
 * Owns the attempt state machine: starting, answering, submitting, timing out
 * and abandoning. Grading is handed off through {@link AttemptGradingScheduler}
 * once an attempt reaches a graded terminal state.
 */
export class AttemptService {
  private readonly repositories: RepositoryBundle;
  private readonly randomization: RandomizationService;
  private readonly grading: AttemptGradingScheduler;
  private readonly events: EventBus;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(deps: AttemptServiceDeps) {
    this.repositories = deps.repositories;
    this.randomization = deps.randomization;
    this.grading = deps.grading;
    this.events = deps.events;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createSilentLogger();
  }

  async start(actor: ActorContext, assessmentId: string, session: SessionMetadata = {}): Promise<Attempt> {
    requireRole(actor, 'STUDENT');
    const { tenantId, actorId: studentId } = actor;
    const now = this.clock.now();
    const assessment = this.loadAssessment(tenantId, assessmentId);
    const problem = availabilityProblem(assessment, now);
    if (problem) {
      throw new AttemptCannotStartError(problem);
    }

    const active = this.repositories.attempt.findActive(tenantId, assessmentId, studentId);
    if (active) {
      if (!isExpired(active, now)) {
        return active;
      }
      await this.handleTimeout(tenantId, active.id);
    }

    const previous = this.repositories.attempt.countByStudent(tenantId, assessmentId, studentId);
    const links = this.repositories.assessmentQuestion.listByAssessment(tenantId, assessmentId);
    const limitProblem = this.limitProblem(assessment, previous, links);
    if (limitProblem) {
      throw new AttemptCannotStartError(limitProblem);
    }

    const attempt = createAttempt(
      {
        tenantId,
        assessmentId,
        studentId,
        attemptNumber: previous + 1,
        durationMinutes: assessment.durationMinutes,
        totalQuestions: links.length,
        session,
      },
      now,
    );
    try {
      this.repositories.transaction(tenantId, () => {
        this.repositories.attempt.insertActive(attempt);
        this.repositories.answer.saveMany(links.map(link => createEmptyAnswer(attempt, link.questionId, link.points, now)));
      });
    } catch (err) {
      if (err instanceof ConflictError) {
        const winner = this.repositories.attempt.findActive(tenantId, assessmentId, studentId);
        if (winner) {
          this.logger.info({ attemptId: winner.id, assessmentId }, 'Concurrent start resolved to existing attempt');
          return winner;
        }
      }
      throw err;
    }

    const { settings } = assessment;
    if (settings.randomizeQuestions || settings.randomizeOptions) {
      await this.randomization.generateSeeds(attempt, settings, assessment.durationMinutes * 60);
    }
    this.events.publish(buildEvent(this.clock, 'AttemptStarted', tenantId, eventPayload(attempt)));
    this.logger.info({ attemptId: attempt.id, assessmentId, attemptNumber: attempt.attemptNumber }, 'Attempt started');
    return attempt;
  }

  /**
   * Reports whether `start` would open a new attempt. An expired active
   * attempt is timed out on the way, as `start` would do.
   */
  async canStart(actor: ActorContext, assessmentId: string): Promise<StartEligibility> {
    requireRole(actor, 'STUDENT');
    const { tenantId, actorId: studentId } = actor;
    const now = this.clock.now();
    const assessment = this.loadAssessment(tenantId, assessmentId);
    const problem = availabilityProblem(assessment, now);
    if (problem) {
      return { canStart: false, reason: problem };
    }
    const active = this.repositories.attempt.findActive(tenantId, assessmentId, studentId);
    if (active) {
      if (!isExpired(active, now)) {
        return { canStart: false, reason: 'an attempt is already in progress', activeAttemptId: active.id };
      }
      await this.handleTimeout(tenantId, active.id);
    }
    const previous = this.repositories.attempt.countByStudent(tenantId, assessmentId, studentId);
    const links = this.repositories.assessmentQuestion.listByAssessment(tenantId, assessmentId);
    const limitProblem = this.limitProblem(assessment, previous, links);
    return limitProblem ? { canStart: false, reason: limitProblem } : { canStart: true };
  }

  /** The student's running attempt on an assessment. Expired attempts are timed out and not returned. */
  async getCurrent(actor: ActorContext, assessmentId: string): Promise<Attempt> {
    requireRole(actor, 'STUDENT');
    const { tenantId } = actor;
    this.loadAssessment(tenantId, assessmentId);
    const active = this.repositories.attempt.findActive(tenantId, assessmentId, actor.actorId);
    if (active && isExpired(active, this.clock.now())) {
      await this.handleTimeout(tenantId, active.id);
    } else if (active) {
      return active;
    }
    throw new NotFoundError('Active attempt for assessment', assessmentId);
  }

  async resume(actor: ActorContext, attemptId: string): Promise<AttemptDetail> {
    const attempt = this.loadOwnAttempt(actor, attemptId);
    if (attempt.status !== 'in_progress') {
      throw new InvalidStateError(`Attempt ${attemptId} is ${attempt.status} and cannot be resumed`);
    }
    await this.ensureTimeLeft(attempt);
    return this.getDetail(actor, attemptId);
  }

  async submitAnswer(
    actor: ActorContext,
    attemptId: string,
    questionId: string,
    rawPayload: unknown,
    options: SubmitAnswerOptions = {},
  ): Promise<Answer> {
    const payload = parsePayload(rawPayload);
    const attempt = this.loadOwnAttempt(actor, attemptId);
    if (isTerminal(attempt.status)) {
      throw new AttemptAlreadySubmittedError(attemptId);
    }
    await this.ensureTimeLeft(attempt);

    const { tenantId } = attempt;
    const link = this.loadLink(attempt, questionId);
    this.assertPayloadMatches(tenantId, questionId, payload);
    const now = this.clock.now();
    const timestamp = now.toISOString();

    return this.repositories.transaction(tenantId, () => {
      const existing = this.repositories.answer.getByAttemptAndQuestion(tenantId, attemptId, questionId);
      const answer = withPayload(existing ?? createEmptyAnswer(attempt, questionId, link.points, now), payload, timestamp, options);
      this.repositories.answer.save(answer);
      const current = this.loadAttempt(tenantId, attemptId);
      this.repositories.attempt.save({
        ...current,
        questionsAnswered: this.countAnswered(tenantId, attemptId),
        currentQuestionIndex: options.currentQuestionIndex ?? current.currentQuestionIndex,
        timeRemainingSeconds: secondsUntil(current.endsAt, now),
        updatedAt: timestamp,
      });
      return answer;
    });
  }

  async submit(
    actor: ActorContext,
    attemptId: string,
    submitted: SubmittedAnswer[] = [],
    options: SubmitOptions = {},
  ): Promise<Attempt> {
    const attempt = this.loadOwnAttempt(actor, attemptId);
    if (isTerminal(attempt.status)) {
      throw new AttemptAlreadySubmittedError(attemptId);
    }
    await this.ensureTimeLeft(attempt);

    const { tenantId } = attempt;
    const validated = submitted.map(entry => {
      const payload = parsePayload(entry.payload);
      const link = this.loadLink(attempt, entry.questionId);
      this.assertPayloadMatches(tenantId, entry.questionId, payload);
      return { entry, payload, link };
    });
    const now = this.clock.now();
    const timestamp = now.toISOString();

    const completed = this.repositories.transaction(tenantId, () => {
      const current = this.loadAttempt(tenantId, attemptId);
      if (isTerminal(current.status)) {
        throw new AttemptAlreadySubmittedError(attemptId);
      }
      assertTransition(attemptId, current.status, 'completed');
      this.repositories.answer.saveMany(
        validated.map(({ entry, payload, link }) => {
          const existing = this.repositories.answer.getByAttemptAndQuestion(tenantId, attemptId, entry.questionId);
          return withPayload(existing ?? createEmptyAnswer(current, entry.questionId, link.points, now), payload, timestamp, {
            flagged: entry.flagged,
            timeSpentSeconds: entry.timeSpentSeconds,
          });
        }),
      );
      const next: Attempt = {
        ...current,
        status: 'completed',
        endReason: options.endReason ?? 'submitted',
        completedAt: timestamp,
        timeSpentSeconds: options.timeSpentSeconds ?? elapsedSeconds(current, now),
        timeRemainingSeconds: secondsUntil(current.endsAt, now),
        questionsAnswered: this.countAnswered(tenantId, attemptId),
        updatedAt: timestamp,
      };
      return this.repositories.attempt.save(next);
    });

    await this.randomization.clearSeeds(completed);
    this.grading.scheduleAutoGrade(tenantId, attemptId);
    this.events.publish(buildEvent(this.clock, 'AttemptSubmitted', tenantId, eventPayload(completed)));
    this.logger.info({ attemptId, endReason: completed.endReason }, 'Attempt submitted');
    return completed;
  }

  /**
   * Moves an in-progress attempt to `timed_out` and queues it for grading.
   * Returns the attempt unchanged when it already finished.
   */
  async handleTimeout(tenantId: string, attemptId: string): Promise<Attempt> {
    const now = this.clock.now();
    const timestamp = now.toISOString();
    const attempt = this.loadAttempt(tenantId, attemptId);
    if (isTerminal(attempt.status)) {
      return attempt;
    }
    assertTransition(attemptId, attempt.status, 'timed_out');
    const timedOut = this.repositories.attempt.save({
      ...attempt,
      status: 'timed_out',
      endReason: 'time_out',
      completedAt: timestamp,
      timeSpentSeconds: elapsedSeconds(attempt, now),
      timeRemainingSeconds: 0,
      questionsAnswered: this.countAnswered(tenantId, attemptId),
      updatedAt: timestamp,
    });

    await this.randomization.clearSeeds(timedOut);
    this.grading.scheduleAutoGrade(tenantId, attemptId);
    this.events.publish(buildEvent(this.clock, 'AttemptTimedOut', tenantId, eventPayload(timedOut)));
    this.logger.info({ attemptId, assessmentId: timedOut.assessmentId }, 'Attempt timed out');
    return timedOut;
  }

  async extendTime(actor: ActorContext, attemptId: string, minutes: number): Promise<Attempt> {
    if (!Number.isInteger(minutes) || minutes <= 0) {
      throw new ValidationError('Extension must be a positive whole number of minutes');
    }
    const attempt = this.loadAttempt(actor.tenantId, attemptId);
    const assessment = this.loadAssessment(actor.tenantId, attempt.assessmentId);
    requireManage(actor, assessment, `assessment ${assessment.id}`);
    if (attempt.status !== 'in_progress') {
      throw new InvalidStateError(`Attempt ${attemptId} is ${attempt.status}; only in-progress attempts can be extended`);
    }
    await this.ensureTimeLeft(attempt);

    const now = this.clock.now();
    const endsAt = new Date(new Date(attempt.endsAt).getTime() + minutes * 60_000).toISOString();
    const extended = this.repositories.attempt.save({
      ...attempt,
      endsAt,
      timeRemainingSeconds: secondsUntil(endsAt, now),
      updatedAt: now.toISOString(),
    });
    await this.randomization.refreshSeeds(extended, extended.timeRemainingSeconds);
    this.logger.info({ attemptId, minutes, extendedBy: actor.actorId }, 'Attempt time extended');
    return extended;
  }

  async abandon(actor: ActorContext, attemptId: string): Promise<Attempt> {
    const attempt = this.loadOwnAttempt(actor, attemptId);
    assertTransition(attemptId, attempt.status, 'abandoned');
    await this.ensureTimeLeft(attempt);

    const now = this.clock.now();
    const timestamp = now.toISOString();
    const abandoned = this.repositories.attempt.save({
      ...attempt,
      status: 'abandoned',
      endReason: 'abandoned',
      completedAt: timestamp,
      timeSpentSeconds: elapsedSeconds(attempt, now),
      timeRemainingSeconds: secondsUntil(attempt.endsAt, now),
      updatedAt: timestamp,
    });
    await this.randomization.clearSeeds(abandoned);
    this.events.publish(buildEvent(this.clock, 'AttemptAbandoned', abandoned.tenantId, eventPayload(abandoned)));
    this.logger.info({ attemptId }, 'Attempt abandoned');
    return abandoned;
  }

  async getDetail(actor: ActorContext, attemptId: string): Promise<AttemptDetail> {
    const attempt = this.loadAttempt(actor.tenantId, attemptId);
    const assessment = this.loadAssessment(actor.tenantId, attempt.assessmentId);
    const isOwner = attempt.studentId === actor.actorId;
    if (!isOwner && !canManage(actor, assessment)) {
      throw new PermissionDeniedError(`Not allowed to view attempt ${attemptId}`);
    }

    const now = this.clock.now();
    const inProgress = attempt.status === 'in_progress';
    const links = this.repositories.assessmentQuestion.listByAssessment(attempt.tenantId, attempt.assessmentId);
    const pointsByQuestion = new Map(links.map(link => [link.questionId, link.points]));
    const ordered = this.orderedQuestions(attempt, links);

    let questions: Array<SanitizedQuestion | Question> = ordered;
    if (isOwner && (inProgress || !assessment.settings.showCorrectAnswers)) {
      const sanitized = ordered.map(sanitizeQuestion);
      questions = inProgress ? await this.randomization.apply(attempt, assessment.settings, sanitized) : sanitized;
    }

    const open = isOwner && inProgress && !isExpired(attempt, now);
    return {
      attempt,
      answers: this.repositories.answer.listByAttempt(attempt.tenantId, attemptId),
      questions: questions.map((question, index) => ({
        position: index + 1,
        points: pointsByQuestion.get(question.id) ?? 0,
        question,
      })),
      canSubmit: open,
      canResume: open,
      timeRemainingSeconds: inProgress ? secondsUntil(attempt.endsAt, now) : 0,
    };
  }

  async getTimeRemaining(actor: ActorContext, attemptId: string): Promise<TimeRemaining> {
    const attempt = this.loadOwnAttempt(actor, attemptId);
    if (attempt.status !== 'in_progress') {
      throw new InvalidStateError(`Attempt ${attemptId} is ${attempt.status}`);
    }
    const now = this.clock.now();
    if (isExpired(attempt, now)) {
      await this.handleTimeout(attempt.tenantId, attemptId);
      return { attemptId, endsAt: attempt.endsAt, timeRemainingSeconds: 0, expired: true };
    }
    return { attemptId, endsAt: attempt.endsAt, timeRemainingSeconds: secondsUntil(attempt.endsAt, now), expired: false };
  }

  listMine(actor: ActorContext): Attempt[] {
    return this.repositories.attempt.listByStudent(actor.tenantId, actor.actorId);
  }

  listForAssessment(actor: ActorContext, assessmentId: string): Attempt[] {
    const assessment = this.loadAssessment(actor.tenantId, assessmentId);
    const attempts = this.repositories.attempt.listByAssessment(actor.tenantId, assessmentId);
    if (canManage(actor, assessment)) {
      return attempts;
    }
    if (hasRole(actor, 'STUDENT')) {
      return attempts.filter(attempt => attempt.studentId === actor.actorId);
    }
    throw new PermissionDeniedError(`Not allowed to list attempts for assessment ${assessmentId}`);
  }

  /** Times out every in-progress attempt past its deadline. Returns how many were closed. */
  async timeOutExpired(): Promise<number> {
    const cutoff = this.clock.now().toISOString();
    let closed = 0;
    for (const tenantId of this.repositories.listTenants()) {
      for (const attempt of this.repositories.attempt.listExpired(tenantId, cutoff)) {
        try {
          await this.handleTimeout(tenantId, attempt.id);
          closed += 1;
        } catch (err) {
          this.logger.error({ err, tenantId, attemptId: attempt.id }, 'Failed to time out expired attempt');
        }
      }
    }
    return closed;
  }

  private limitProblem(assessment: Assessment, previous: number, links: AssessmentQuestion[]): string | undefined {
    if (previous >= assessment.maxAttempts) {
      return `maximum of ${assessment.maxAttempts} attempts reached`;
    }
    if (links.length === 0) {
      return 'assessment has no questions';
    }
    return undefined;
  }

  private async ensureTimeLeft(attempt: Attempt): Promise<void> {
    if (isExpired(attempt, this.clock.now())) {
      await this.handleTimeout(attempt.tenantId, attempt.id);
      throw new TimeExpiredError(attempt.id);
    }
  }

  private loadAttempt(tenantId: string, attemptId: string): Attempt {
    const attempt = this.repositories.attempt.getById(tenantId, attemptId);
    if (!attempt) {
      throw new NotFoundError('Attempt', attemptId);
    }
    return attempt;
  }

  private loadOwnAttempt(actor: ActorContext, attemptId: string): Attempt {
    const attempt = this.loadAttempt(actor.tenantId, attemptId);
    if (attempt.studentId !== actor.actorId) {
      throw new PermissionDeniedError(`Attempt ${attemptId} belongs to another student`);
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

  private loadLink(attempt: Attempt, questionId: string): AssessmentQuestion {
    const link = this.repositories.assessmentQuestion
      .listByAssessment(attempt.tenantId, attempt.assessmentId)
      .find(candidate => candidate.questionId === questionId);
    if (!link) {
      throw new NotFoundError('Question', questionId);
    }
    return link;
  }

  private assertPayloadMatches(tenantId: string, questionId: string, payload: AnswerPayload): void {
    const question = this.repositories.question.getById(tenantId, questionId);
    if (!question) {
      throw new NotFoundError('Question', questionId);
    }
    if (question.type !== payload.type) {
      throw new ValidationError(`Question ${questionId} expects a ${question.type} answer, got ${payload.type}`);
    }
  }

  private countAnswered(tenantId: string, attemptId: string): number {
    return this.repositories.answer.listByAttempt(tenantId, attemptId).filter(answer => !isEmptyAnswer(answer.payload)).length;
  }

  private orderedQuestions(attempt: Attempt, links: AssessmentQuestion[]): Question[] {
    const questions = this.repositories.question.listByIds(attempt.tenantId, links.map(link => link.questionId));
    const byId = new Map(questions.map(question => [question.id, question]));
    const ordered: Question[] = [];
    for (const link of links) {
      const question = byId.get(link.questionId);
      if (question) {
        ordered.push(question);
      } else {
        this.logger.warn({ attemptId: attempt.id, questionId: link.questionId }, 'Assessment question is missing');
      }
    }
    return ordered;
  }
}
