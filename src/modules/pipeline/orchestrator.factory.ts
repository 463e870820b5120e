import type { InMemoryEventBus } from '../../common/event-bus.js';
import type { AppConfig } from '../../config/index.js';
import type { PersistenceBundle } from '../../infrastructure/repositories.js';
import { DocumentCache } from '../cache/document-cache.js';
import { GroundingVerifier, createToolDocumentFetcher } from '../grounding/grounding.service.js';
import { createHttpModelInvoker, type ModelInvoker } from '../llm/model-client.js';
import { createGatedToolClient, createToolTransportFromConfig, type ToolTransport } from '../tools/tool-client.js';
import { IssuedExamRegistry } from './issued-exam.registry.js';
import { PipelineOrchestrator } from './orchestrator.js';

export interface OrchestratorOverrides {
  invoke?: ModelInvoker;
  transport?: ToolTransport;
}

/** Wires the pipeline from configuration; overrides replace the network edges. */
export function createOrchestratorFromConfig(
  config: AppConfig,
  persistence: PersistenceBundle,
  events: InMemoryEventBus,
  overrides: OrchestratorOverrides = {},
): PipelineOrchestrator {
  const { runtime } = config;
  const transport = overrides.transport ?? createToolTransportFromConfig(runtime.tools);
  const tools = createGatedToolClient(transport, { timeoutMs: runtime.toolTimeoutMs });
  const cache = new DocumentCache(persistence.documentStore, createToolDocumentFetcher(tools), {
    maxAgeMs: config.cache.maxAgeMs,
  });
  const invoke = overrides.invoke ?? (runtime.model ? createHttpModelInvoker(runtime.model) : undefined);

  return new PipelineOrchestrator({
    settings: {
      offline: runtime.offline,
      modelTimeoutMs: runtime.modelTimeoutMs,
      verifyIssuedExams: config.session.verifyIssuedExams,
    },
    stateStore: persistence.stateStore,
    grounding: new GroundingVerifier({ tools, cache, config: config.grounding }),
    registry: new IssuedExamRegistry(config.session.issuedExamLimit),
    events,
    invoke,
  });
}
