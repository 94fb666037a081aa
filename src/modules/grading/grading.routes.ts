import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { answerPayloadSchema } from '../questions/question.model.js';
import { actorOf } from '../auth/auth.middleware.js';
import { toJsonSchema } from '../../common/zod-json-schema.js';
import { passThroughValidator } from '../../common/fastify-schema.js';
import type { GradingService } from './grading.service.js';

const idParamsSchema = z.object({ id: z.string().min(1) });
const manualGradeSchema = z.object({
  score: z.number().nonnegative(),
  feedback: z.string().max(4000).optional(),
});

const batchGradeSchema = z.object({
  grades: z
    .array(
      z.object({
        answerId: z.string().min(1),
        score: z.number().nonnegative(),
        feedback: z.string().max(4000).optional(),
      }),
    )
    .min(1),
});
const scorePreviewSchema = z.object({
  questionId: z.string().min(1),
  payload: answerPayloadSchema,
});
const feedbackPreviewSchema = scorePreviewSchema.extend({
  revealCorrectAnswers: z.boolean().optional(),
});

const idParams = toJsonSchema(idParamsSchema);
const routeOptions = { attachValidation: true, validatorCompiler: passThroughValidator };

export interface GradingRoutesOptions {
  gradingService: GradingService;
}

export async function gradingRoutes(app: FastifyInstance, options: GradingRoutesOptions) {
  const { gradingService } = options;

  app.post('/attempts/:id', { ...routeOptions, schema: { params: idParams } }, async req => {
    const { id } = idParamsSchema.parse(req.params);
    return gradingService.gradeAttempt(actorOf(req), id);
  });

  app.post('/answers/batch', { ...routeOptions, schema: { body: toJsonSchema(batchGradeSchema) } }, async req => {
    const { grades } = batchGradeSchema.parse(req.body);
    return gradingService.manualGradeAnswers(actorOf(req), grades);
  });

  app.post('/answers/:id/auto', { ...routeOptions, schema: { params: idParams } }, async req => {
    const { id } = idParamsSchema.parse(req.params);
    return gradingService.autoGradeAnswer(actorOf(req), id);
  });

  app.post('/calculate-score', { ...routeOptions, schema: { body: toJsonSchema(scorePreviewSchema) } }, async req => {
    const { questionId, payload } = scorePreviewSchema.parse(req.body);
    return gradingService.calculateScore(actorOf(req), questionId, payload);
  });

  app.post(
    '/generate-feedback',
    { ...routeOptions, schema: { body: toJsonSchema(feedbackPreviewSchema) } },
    async req => {
      const { questionId, payload, revealCorrectAnswers } = feedbackPreviewSchema.parse(req.body);
      return gradingService.buildFeedback(actorOf(req), questionId, payload, revealCorrectAnswers);
    },
  );

  app.put(
    '/answers/:id',
    { ...routeOptions, schema: { params: idParams, body: toJsonSchema(manualGradeSchema) } },
    async req => {
      const { id } = idParamsSchema.parse(req.params);
      const { score, feedback } = manualGradeSchema.parse(req.body);
      return gradingService.manualGradeAnswer(actorOf(req), id, score, feedback);
    },
  );

  app.post('/assessments/:id', { ...routeOptions, schema: { params: idParams } }, async req => {
    const { id } = idParamsSchema.parse(req.params);
    return gradingService.autoGradeAssessment(actorOf(req), id);
  });

  app.post('/assessments/:id/regrade', { ...routeOptions, schema: { params: idParams } }, async req => {
    const { id } = idParamsSchema.parse(req.params);
    return gradingService.reGradeAssessment(actorOf(req), id);
  });

  app.post('/questions/:id/regrade', { ...routeOptions, schema: { params: idParams } }, async req => {
    const { id } = idParamsSchema.parse(req.params);
    return gradingService.reGradeQuestion(actorOf(req), id);
  });
}
