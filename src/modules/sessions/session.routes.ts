import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { passThroughValidator } from '../../common/fastify-schema.js';
import { examSchema, sessionModeSchema } from '../../common/schemas.js';
import { toJsonSchema } from '../../common/zod-json-schema.js';
import type { PipelineOrchestrator } from '../pipeline/orchestrator.js';
import type { StateStore } from '../state/state.repository.js';
import { sanitizeUserId } from '../state/student-state.model.js';

const userIdSchema = z.string().trim().min(1).max(128);

export const startBodySchema = z.object({
  userId: userIdSchema.default('default'),
  mode: sessionModeSchema.default('adaptive'),
  focusTopics: z.array(z.string().trim().min(1).max(100)).max(10).default([]),
  minutes: z.number().int().min(5).max(600).optional(),
  offline: z.boolean().optional(),
});

/** Exam and answers are checked by the pipeline so every problem is reported together. */
export const submitBodySchema = z.object({
  userId: userIdSchema.default('default'),
  mode: sessionModeSchema.default('adaptive'),
  exam: z.unknown(),
  answers: z.unknown(),
  offline: z.boolean().optional(),
});

const submitDocsSchema = submitBodySchema.extend({
  exam: examSchema,
  answers: z.record(z.number().int().nonnegative()),
});

const stateParamsSchema = z.object({ userId: userIdSchema });

export interface SessionRoutesOptions {
  orchestrator: PipelineOrchestrator;
  stateStore: StateStore;
}

export async function sessionRoutes(app: FastifyInstance, options: SessionRoutesOptions) {
  const { orchestrator, stateStore } = options;

  app.post(
    '/session/start',
    {
      schema: {
        tags: ['Sessions'],
        summary: 'Start a session: plan and issue an exam',
        body: toJsonSchema(startBodySchema, 'StartSessionRequest'),
      },
      validatorCompiler: passThroughValidator,
    },
    async req => {
      const body = startBodySchema.parse(req.body ?? {});
      return orchestrator.start({ ...body, userId: req.identity ?? body.userId });
    },
  );

  app.post(
    '/session/submit',
    {
      schema: {
        tags: ['Sessions'],
        summary: 'Submit answers: diagnose, ground, coach and record progress',
        body: toJsonSchema(submitDocsSchema, 'SubmitSessionRequest'),
      },
      validatorCompiler: passThroughValidator,
    },
    async req => {
      const body = submitBodySchema.parse(req.body ?? {});
      return orchestrator.submit({
        userId: req.identity ?? body.userId,
        mode: body.mode,
        exam: body.exam,
        answers: { answers: body.answers },
        offline: body.offline,
      });
    },
  );

  app.get('/state/:userId', { schema: { tags: ['State'], summary: 'Read a student state' } }, async req => {
    const params = stateParamsSchema.parse(req.params);
    const userId = sanitizeUserId(req.identity ?? params.userId);
    return { userId, state: await stateStore.load(userId) };
  });
}
