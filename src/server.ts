import dotenv from 'dotenv';
import { buildApp } from './app.js';
import { EVENT_TYPES, eventBus } from './common/event-bus.js';
import { logger } from './common/logger.js';
import { loadConfig } from './config/index.js';
import { createPersistenceBundleFromConfig } from './infrastructure/repositories.js';
import { createApiKeyStoreFromConfig } from './modules/auth/api-key.store.js';
import { SlidingWindowRateLimiter } from './modules/auth/rate-limiter.js';
import { createOrchestratorFromConfig } from './modules/pipeline/orchestrator.factory.js';

dotenv.config();

process.on('unhandledRejection', reason => {
  logger.fatal({ err: reason }, 'unhandled rejection');
  process.exit(1);
});

for (const type of Object.values(EVENT_TYPES)) {
  eventBus.subscribe(type, event => {
    const level = event.type === EVENT_TYPES.StageDegraded ? 'warn' : 'info';
    logger[level]({ event: event.type, eventId: event.id, ...event.payload }, 'domain event');
  });
}

const start = async () => {
  const config = loadConfig();
  logger.info(
    {
      offline: config.runtime.offline,
      cache: config.cache.provider,
      authKeys: config.auth.apiKeys.length,
      verifyIssuedExams: config.session.verifyIssuedExams,
    },
    'configuration loaded',
  );
  const persistence = createPersistenceBundleFromConfig(config);
  const orchestrator = createOrchestratorFromConfig(config, persistence, eventBus);
  const app = buildApp({
    orchestrator,
    stateStore: persistence.stateStore,
    apiKeys: createApiKeyStoreFromConfig(config.auth),
    rateLimiter: new SlidingWindowRateLimiter(config.rateLimit),
    onClose: persistence.dispose,
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  const port = Number(process.env.PORT || 3000);
  try {
    await app.listen({ port, host: '0.0.0.0' });
  } catch (err) {
    logger.fatal({ err }, 'failed to start server');
    process.exit(1);
  }
};

void start();
