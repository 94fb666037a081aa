import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { answerPayloadSchema } from '../questions/question.model.js';
import { actorOf } from '../auth/auth.middleware.js';
import { toJsonSchema } from '../../common/zod-json-schema.js';
import { passThroughValidator } from '../../common/fastify-schema.js';
import type { AttemptService } from './attempt.service.js';

const idParamsSchema = z.object({ id: z.string().min(1) });
const assessmentParamsSchema = z.object({ assessmentId: z.string().min(1) });
const answerParamsSchema = z.object({ id: z.string().min(1), questionId: z.string().min(1) });

const startSchema = z.object({ assessmentId: z.string().min(1) });
const answerSchema = z.object({
  payload: answerPayloadSchema,
  flagged: z.boolean().optional(),
  timeSpentSeconds: z.number().int().nonnegative().optional(),
  currentQuestionIndex: z.number().int().nonnegative().optional(),
});
const submitSchema = z.object({
  answers: z
    .array(
      z.object({
        questionId: z.string().min(1),
        payload: answerPayloadSchema,
        flagged: z.boolean().optional(),
        timeSpentSeconds: z.number().int().nonnegative().optional(),
      }),
    )
    .default([]),
  endReason: z.enum(['submitted', 'auto_submit']).optional(),
  timeSpentSeconds: z.number().int().nonnegative().optional(),
});
const extendSchema = z.object({ minutes: z.number().int().positive() });

const idParams = toJsonSchema(idParamsSchema);
const routeOptions = { attachValidation: true, validatorCompiler: passThroughValidator };

export interface AttemptRoutesOptions {
  attemptService: AttemptService;
}

export async function attemptRoutes(app: FastifyInstance, options: AttemptRoutesOptions) {
  const { attemptService } = options;

  app.post('/', { ...routeOptions, schema: { body: toJsonSchema(startSchema) } }, async (req, reply) => {
    const { assessmentId } = startSchema.parse(req.body);
    const userAgent = req.headers['user-agent'];
    const attempt = await attemptService.start(actorOf(req), assessmentId, {
      ipAddress: req.ip,
      userAgent: typeof userAgent === 'string' ? userAgent : undefined,
    });
    reply.code(201);
    return attempt;
  });

  app.get('/', async req => attemptService.listMine(actorOf(req)));

  app.get(
    '/assessment/:assessmentId',
    { ...routeOptions, schema: { params: toJsonSchema(assessmentParamsSchema) } },
    async req => {
      const { assessmentId } = assessmentParamsSchema.parse(req.params);
      return attemptService.listForAssessment(actorOf(req), assessmentId);
    },
  );

  app.get(
    '/assessment/:assessmentId/current',
    { ...routeOptions, schema: { params: toJsonSchema(assessmentParamsSchema) } },
    async req => {
      const { assessmentId } = assessmentParamsSchema.parse(req.params);
      return attemptService.getCurrent(actorOf(req), assessmentId);
    },
  );

  app.get(
    '/assessment/:assessmentId/can-start',
    { ...routeOptions, schema: { params: toJsonSchema(assessmentParamsSchema) } },
    async req => {
      const { assessmentId } = assessmentParamsSchema.parse(req.params);
      return attemptService.canStart(actorOf(req), assessmentId);
    },
  );

  app.get('/:id', { ...routeOptions, schema: { params: idParams } }, async req => {
    const { id } = idParamsSchema.parse(req.params);
    return attemptService.getDetail(actorOf(req), id);
  });

  app.post('/:id/resume', { ...routeOptions, schema: { params: idParams } }, async req => {
    const { id } = idParamsSchema.parse(req.params);
    return attemptService.resume(actorOf(req), id);
  });

  app.put(
    '/:id/answers/:questionId',
    { ...routeOptions, schema: { params: toJsonSchema(answerParamsSchema), body: toJsonSchema(answerSchema) } },
    async req => {
      const { id, questionId } = answerParamsSchema.parse(req.params);
      const { payload, ...answerOptions } = answerSchema.parse(req.body);
      return attemptService.submitAnswer(actorOf(req), id, questionId, payload, answerOptions);
    },
  );

  app.post('/:id/submit', { ...routeOptions, schema: { params: idParams, body: toJsonSchema(submitSchema) } }, async req => {
    const { id } = idParamsSchema.parse(req.params);
    const { answers, ...submitOptions } = submitSchema.parse(req.body ?? {});
    return attemptService.submit(actorOf(req), id, answers, submitOptions);
  });

  app.post('/:id/abandon', { ...routeOptions, schema: { params: idParams } }, async req => {
    const { id } = idParamsSchema.parse(req.params);
    return attemptService.abandon(actorOf(req), id);
  });

  app.post('/:id/extend', { ...routeOptions, schema: { params: idParams, body: toJsonSchema(extendSchema) } }, async req => {
    const { id } = idParamsSchema.parse(req.params);
    const { minutes } = extendSchema.parse(req.body);
    return attemptService.extendTime(actorOf(req), id, minutes);
  });

  app.get('/:id/time-remaining', { ...routeOptions, schema: { params: idParams } }, async req => {
    const { id } = idParamsSchema.parse(req.params);
    return attemptService.getTimeRemaining(actorOf(req), id);
  });
}
