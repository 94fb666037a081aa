import Fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ZodError } from 'zod';
import { registerAuth } from './modules/auth/auth.middleware.js';
import { attemptRoutes } from './modules/attempts/attempt.routes.js';
import { gradingRoutes } from './modules/grading/grading.routes.js';
import { AttemptService } from './modules/attempts/attempt.service.js';
import { TimeoutSweeper } from './modules/attempts/attempt.timeout-sweeper.js';
import { GradingQueue } from './modules/grading/grading.queue.js';
import { GradingService } from './modules/grading/grading.service.js';
import { RandomizationService } from './modules/randomization/randomization.service.js';
import type { RandomSource } from './modules/randomization/seeded-shuffle.js';
import { createRepositoryBundleFromConfig, type RepositoryBundle } from './infrastructure/repositories.js';
import { createSeedCacheFromConfig, type SeedCache } from './infrastructure/cache/seed-cache.js';
import { InMemoryEventBus, type EventBus } from './common/event-bus.js';
import { AppError } from './common/errors.js';
import { systemClock, type Clock } from './common/types.js';
import { loadConfig, type AppConfig } from './config/index.js';
import pkg from '../package.json' with { type: 'json' };

export interface AppDependencies {
  config?: AppConfig;
  repositories?: RepositoryBundle;
  seedCache?: SeedCache;
  clock?: Clock;
  randomSource?: RandomSource;
}

export interface AppServices {
  config: AppConfig;
  repositories: RepositoryBundle;
  events: EventBus;
  randomization: RandomizationService;
  gradingQueue: GradingQueue;
  grading: GradingService;
  attempts: AttemptService;
  sweeper: TimeoutSweeper;
}

declare module 'fastify' {
  interface FastifyInstance {
    services: AppServices;
  }
}

const apiVersion = typeof pkg?.version === 'string' ? pkg.version : '0.0.0';

export function buildApp(deps: AppDependencies = {}) {
  const config = deps.config ?? loadConfig();
  const app = Fastify({ logger: { level: config.server.logLevel } });
  const logger = app.log;
  const clock = deps.clock ?? systemClock;
  const repositories = deps.repositories ?? createRepositoryBundleFromConfig(config);
  const seedCache = deps.seedCache ?? createSeedCacheFromConfig(config.cache, logger);

  const events = new InMemoryEventBus(logger);
  const randomization = new RandomizationService({
    cache: seedCache,
    logger,
    clock,
    randomSource: deps.randomSource,
    ttlBufferSeconds: config.cache.seedTtlBufferSeconds,
  });
  const gradingQueue = new GradingQueue({ logger, ...config.grading });
  const grading = new GradingService({ repositories, queue: gradingQueue, events, clock, logger });
  const attempts = new AttemptService({ repositories, randomization, grading, events, clock, logger });
  const sweeper = new TimeoutSweeper(attempts, { intervalMs: config.attempts.timeoutSweepIntervalMs, logger });
  app.decorate('services', { config, repositories, events, randomization, gradingQueue, grading, attempts, sweeper });

  app.register(swagger, {
    openapi: {
      info: {
        title: 'Attempt & Grading API',
        description: 'Timed assessment attempts with seeded randomization and automatic grading',
        version: apiVersion,
      },
      servers: [{ url: process.env.API_PUBLIC_URL ?? `http://localhost:${config.server.port}`, description: 'Local dev server' }],
      components: {
        securitySchemes: {
          TenantHeader: { type: 'apiKey', in: 'header', name: 'x-tenant-id', description: 'Tenant scope for the request' },
          ActorHeader: { type: 'apiKey', in: 'header', name: 'x-actor-id', description: 'Identifier of the calling user' },
          RolesHeader: {
            type: 'apiKey',
            in: 'header',
            name: 'x-actor-roles',
            description: 'Comma separated roles: ADMIN, TEACHER, STUDENT',
          },
        },
      },
      security: [{ TenantHeader: [], ActorHeader: [], RolesHeader: [] }],
    },
  });

  app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
    staticCSP: true,
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      reply.code(error.statusCode).send({ error: error.message, code: error.code });
      return;
    }
    if (error instanceof ZodError) {
      reply.code(400).send({ error: 'Validation failed', code: 'VALIDATION_FAILED', issues: error.issues });
      return;
    }
    const clientError = error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500;
    if (clientError) {
      reply.code(error.statusCode ?? 400).send({ error: error.message, code: error.code ?? 'BAD_REQUEST' });
      return;
    }
    request.log.error({ err: error }, 'Unhandled error');
    reply.code(500).send({ error: 'Internal Server Error', code: 'INTERNAL_ERROR' });
  });

  // Register auth & tenant enforcement
  app.addHook('onRequest', async (request, reply) => {
    const url = request.raw.url ?? '';
    if (url.startsWith('/health') || url.startsWith('/docs')) {
      return;
    }
    await registerAuth(request, reply);
  });

  app.register(attemptRoutes, { prefix: '/attempts', attemptService: attempts });
  app.register(gradingRoutes, { prefix: '/grading', gradingService: grading });

  app.addHook('onClose', async () => {
    await sweeper.stop();
    await gradingQueue.onIdle();
    if (seedCache.dispose) {
      await seedCache.dispose();
    }
    if (repositories.dispose) {
      await repositories.dispose();
    }
  });

  app.get('/health', async () => ({
    status: 'ok',
    grading: { pending: gradingQueue.size, failed: gradingQueue.failedCount },
  }));
  return app;
}
