import Fastify, { type FastifyError } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ZodError } from 'zod';
import { AuthError, RateLimitError, StoreUnavailableError, ValidationError } from './common/errors.js';
import { registerAuth } from './modules/auth/auth.middleware.js';
import type { ApiKeyStore } from './modules/auth/api-key.store.js';
import type { SlidingWindowRateLimiter } from './modules/auth/rate-limiter.js';
import type { PipelineOrchestrator } from './modules/pipeline/orchestrator.js';
import { sessionRoutes } from './modules/sessions/session.routes.js';
import type { StateStore } from './modules/state/state.repository.js';
import pkg from '../package.json' with { type: 'json' };

export interface AppDependencies {
  orchestrator: PipelineOrchestrator;
  stateStore: StateStore;
  apiKeys: ApiKeyStore;
  rateLimiter: SlidingWindowRateLimiter;
  logger?: boolean;
  onClose?: () => Promise<void>;
}

const apiVersion = typeof pkg?.version === 'string' ? pkg.version : '0.0.0';

const OPEN_PATHS = ['/health', '/docs'];

function zodDetails(error: ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function buildApp(deps: AppDependencies) {
  const app = Fastify({ logger: deps.logger ?? true });

  app.register(swagger, {
    openapi: {
      info: {
        title: 'Exam Coach API',
        description: 'Adaptive exam sessions: plan, exam, diagnosis, grounded explanations and coaching',
        version: apiVersion,
      },
      servers: [{ url: process.env.API_PUBLIC_URL ?? 'http://localhost:3000', description: 'Local dev server' }],
      components: {
        securitySchemes: {
          ApiKeyHeader: {
            type: 'apiKey',
            in: 'header',
            name: 'x-api-key',
            description: 'API key mapped to a caller identity',
          },
        },
      },
      security: [{ ApiKeyHeader: [] }],
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

  app.addHook('onRequest', async request => {
    const url = request.raw.url ?? '';
    if (OPEN_PATHS.some(path => url.startsWith(path))) {
      return;
    }
    await registerAuth(request, deps.apiKeys);
    const decision = deps.rateLimiter.check(request.identity ?? request.ip);
    if (!decision.allowed) {
      throw new RateLimitError(decision.retryAfterSeconds);
    }
  });

  app.setErrorHandler((error: FastifyError | Error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({ error: 'Invalid request body', details: zodDetails(error) });
    }
    if (error instanceof ValidationError) {
      return reply.code(400).send({ error: error.message, details: error.details });
    }
    if (error instanceof AuthError) {
      return reply.code(error.statusCode).send({ error: error.message });
    }
    if (error instanceof RateLimitError) {
      return reply.code(429).header('retry-after', String(error.retryAfterSeconds)).send({ error: error.message });
    }
    if (error instanceof StoreUnavailableError) {
      request.log.error({ err: error }, 'state store unavailable');
      return reply.code(503).send({ error: error.message });
    }
    const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500;
    if (statusCode < 500) {
      return reply.code(statusCode).send({ error: error.message });
    }
    request.log.error({ err: error }, 'request failed');
    return reply.code(500).send({ error: 'Internal Server Error' });
  });

  app.register(sessionRoutes, { prefix: '/v1', orchestrator: deps.orchestrator, stateStore: deps.stateStore });

  app.addHook('onClose', async () => {
    if (deps.onClose) {
      await deps.onClose();
    }
  });

  app.get('/health', async () => ({ status: 'ok' }));
  return app;
}
