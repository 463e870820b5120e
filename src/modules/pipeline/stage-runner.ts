import type { ZodType, ZodTypeDef } from 'zod';
import { MalformedOutputError, describeError } from '../../common/errors.js';
import { EVENT_TYPES, type InMemoryEventBus } from '../../common/event-bus.js';
import { moduleLogger } from '../../common/logger.js';
import { withTimeout } from '../../common/timeout.js';
import type { StageName, StageReport, StageStatus } from '../../common/types.js';
import type { AgentName, ModelInvoker } from '../llm/model-client.js';
import { buildRepairPrompt, parseModelOutput } from '../parsing/response-parser.js';

export const MAX_STAGE_ATTEMPTS = 2;

/** Per-session context shared by every stage call. */
export interface StageRuntime {
  /** Absent when the session runs offline. */
  invoke?: ModelInvoker;
  timeoutMs: number;
  sessionId: string;
  warnings: string[];
  events: InMemoryEventBus;
}

export interface StageCall<T> {
  stage: StageName;
  /** Human-readable name used in warnings, e.g. "Planner". */
  label: string;
  agent: AgentName;
  systemPrompt: string;
  userPrompt: string;
  schemaName: string;
  schema: ZodType<T, ZodTypeDef, unknown>;
  fallback: () => T;
}

export interface StageOutcome<T> {
  value: T;
  status: StageStatus;
  attempts: number;
}

const log = moduleLogger('stage-runner');

/**
 * Calls the model for one stage. A malformed answer gets exactly one repair
 * attempt; a failed call or timeout uses up an attempt as well. When both
 * attempts fail the fallback value is returned and a warning is recorded.
 */
export async function runStage<T>(runtime: StageRuntime, call: StageCall<T>): Promise<StageOutcome<T>> {
  const invoke = runtime.invoke;
  if (!invoke) {
    return { value: call.fallback(), status: 'stub', attempts: 0 };
  }

  let userPrompt = call.userPrompt;
  let lastError: unknown;
  for (let attempt = 1; attempt <= MAX_STAGE_ATTEMPTS; attempt += 1) {
    try {
      const raw = await withTimeout(`${call.label} model call`, runtime.timeoutMs, signal =>
        invoke({ agent: call.agent, systemPrompt: call.systemPrompt, userPrompt, signal }),
      );
      const value = parseModelOutput(raw, call.schema);
      return { value, status: attempt === 1 ? 'ok' : 'repaired', attempts: attempt };
    } catch (error) {
      lastError = error;
      log.warn(
        { stage: call.stage, agent: call.agent, attempt, sessionId: runtime.sessionId, err: describeError(error) },
        'stage attempt failed',
      );
      userPrompt =
        error instanceof MalformedOutputError ? buildRepairPrompt(call.userPrompt, call.schemaName, error) : call.userPrompt;
    }
  }

  const reason = describeError(lastError);
  runtime.warnings.push(`${call.label} failed online; used offline fallback. (${reason})`);
  runtime.events.emit(EVENT_TYPES.StageDegraded, {
    sessionId: runtime.sessionId,
    stage: call.stage,
    label: call.label,
    attempts: MAX_STAGE_ATTEMPTS,
    reason,
  });
  return { value: call.fallback(), status: 'fallback', attempts: MAX_STAGE_ATTEMPTS };
}

const STATUS_SEVERITY: Record<StageStatus, number> = { stub: 0, ok: 1, repaired: 2, fallback: 3 };

/** Folds several calls of one stage into a single report: worst status, summed attempts. */
export function summarizeStage(stage: StageName, outcomes: ReadonlyArray<{ status: StageStatus; attempts: number }>): StageReport {
  let status: StageStatus = 'stub';
  let attempts = 0;
  for (const outcome of outcomes) {
    attempts += outcome.attempts;
    if (STATUS_SEVERITY[outcome.status] > STATUS_SEVERITY[status]) {
      status = outcome.status;
    }
  }
  return { stage, status, attempts };
}

export function stubReport(stage: StageName): StageReport {
  return { stage, status: 'stub', attempts: 0 };
}
