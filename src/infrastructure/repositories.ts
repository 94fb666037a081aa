import type { AppConfig } from '../config/index.js';
import {
  createInMemoryAssessmentQuestionRepository,
  createInMemoryAssessmentRepository,
  createSQLiteAssessmentQuestionRepository,
  createSQLiteAssessmentRepository,
  type AssessmentQuestionRepository,
  type AssessmentRepository,
} from '../modules/assessments/assessment.repository.js';
import {
  createInMemoryQuestionRepository,
  createSQLiteQuestionRepository,
  type QuestionRepository,
} from '../modules/questions/question.repository.js';
import {
  createInMemoryAttemptRepository,
  createSQLiteAttemptRepository,
  type AttemptRepository,
} from '../modules/attempts/attempt.repository.js';
import {
  createInMemoryAnswerRepository,
  createSQLiteAnswerRepository,
  type AnswerRepository,
} from '../modules/attempts/answer.repository.js';
import { createSQLiteTenantClient } from './sqlite/client.js';

export interface RepositoryBundle {
  assessment: AssessmentRepository;
  assessmentQuestion: AssessmentQuestionRepository;
  question: QuestionRepository;
  attempt: AttemptRepository;
  answer: AnswerRepository;
  /**
   * Runs `fn` atomically for one tenant: either every write inside it is kept
   * or none is. Nested calls join the outer transaction.
   */
  transaction<T>(tenantId: string, fn: () => T): T;
  /** Tenants that currently hold attempt data. */
  listTenants(): string[];
  dispose?: () => void | Promise<void>;
}

export function createInMemoryRepositoryBundle(): RepositoryBundle {
  const assessment = createInMemoryAssessmentRepository();
  const assessmentQuestion = createInMemoryAssessmentQuestionRepository();
  const question = createInMemoryQuestionRepository();
  const attempt = createInMemoryAttemptRepository();
  const answer = createInMemoryAnswerRepository();
  const snapshottable = [assessment, assessmentQuestion, question, attempt, answer];
  let depth = 0;

  return {
    assessment,
    assessmentQuestion,
    question,
    attempt,
    answer,
    transaction<T>(_tenantId: string, fn: () => T): T {
      if (depth > 0) {
        return fn();
      }
      const restores = snapshottable.map(repo => repo.snapshot());
      depth += 1;
      try {
        return fn();
      } catch (error) {
        restores.forEach(restore => restore());
        throw error;
      } finally {
        depth -= 1;
      }
    },
    listTenants: () => attempt.tenantIds(),
    dispose: () => {},
  };
}

export function createSQLiteRepositoryBundle(config: AppConfig): RepositoryBundle {
  const client = createSQLiteTenantClient(config.persistence.sqlite);
  return {
    assessment: createSQLiteAssessmentRepository(client),
    assessmentQuestion: createSQLiteAssessmentQuestionRepository(client),
    question: createSQLiteQuestionRepository(client),
    attempt: createSQLiteAttemptRepository(client),
    answer: createSQLiteAnswerRepository(client),
    transaction: <T>(tenantId: string, fn: () => T): T => client.getConnection(tenantId).transaction(fn),
    listTenants: () => client.listTenants(),
    dispose: () => client.closeAll(),
  };
}

export function createRepositoryBundleFromConfig(config: AppConfig): RepositoryBundle {
  switch (config.persistence.provider) {
    case 'memory':
      return createInMemoryRepositoryBundle();
    case 'sqlite':
    default:
      return createSQLiteRepositoryBundle(config);
  }
}
