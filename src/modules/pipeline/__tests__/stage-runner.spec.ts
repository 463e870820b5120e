import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { EVENT_TYPES, InMemoryEventBus } from '../../../common/event-bus.js';
import type { DomainEvent } from '../../../common/types.js';
import type { ModelInvoker } from '../../llm/model-client.js';
import { runStage, summarizeStage, type StageCall, type StageRuntime } from '../stage-runner.js';

const querySchema = z.object({ query: z.string().min(1) });
type Query = z.infer<typeof querySchema>;

const REPAIR_PROMPT =
  'Find a query.\n\nYour previous output was invalid. Return only JSON matching schema SearchQuery, with no markdown and no commentary.';

function runtimeWith(invoke?: ModelInvoker, timeoutMs = 1_000): StageRuntime {
  return { invoke, timeoutMs, sessionId: 'session-1', warnings: [], events: new InMemoryEventBus() };
}

function queryCall(): StageCall<Query> {
  return {
    stage: 'ground',
    label: 'Grounding query',
    agent: 'grounding',
    systemPrompt: 'Write a query.',
    userPrompt: 'Find a query.',
    schemaName: 'SearchQuery',
    schema: querySchema,
    fallback: () => ({ query: 'fallback query' }),
  };
}

describe('runStage', () => {
  it('returns the stub without calling a model when offline', async () => {
    const runtime = runtimeWith();

    const outcome = await runStage(runtime, queryCall());

    expect(outcome).toEqual({ value: { query: 'fallback query' }, status: 'stub', attempts: 0 });
    expect(runtime.warnings).toEqual([]);
  });

  it('accepts a valid first answer', async () => {
    const invoke = vi.fn<ModelInvoker>(async () => '{"query":"availability zones"}');
    const runtime = runtimeWith(invoke);

    const outcome = await runStage(runtime, queryCall());

    expect(outcome).toEqual({ value: { query: 'availability zones' }, status: 'ok', attempts: 1 });
    expect(invoke).toHaveBeenCalledTimes(1);
    expect(invoke.mock.calls[0]?.[0]).toMatchObject({
      agent: 'grounding',
      systemPrompt: 'Write a query.',
      userPrompt: 'Find a query.',
    });
  });

  it('sends the repair instruction once after malformed output', async () => {
    const invoke = vi
      .fn<ModelInvoker>()
      .mockResolvedValueOnce('not json')
      .mockResolvedValueOnce('```json\n{"query":"region pairs"}\n```');
    const runtime = runtimeWith(invoke);

    const outcome = await runStage(runtime, queryCall());

    expect(outcome).toEqual({ value: { query: 'region pairs' }, status: 'repaired', attempts: 2 });
    expect(invoke.mock.calls[1]?.[0].userPrompt).toBe(REPAIR_PROMPT);
    expect(runtime.warnings).toEqual([]);
  });

  it('retries a failed call with the original prompt', async () => {
    const invoke = vi
      .fn<ModelInvoker>()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce('{"query":"rbac"}');
    const runtime = runtimeWith(invoke);

    const outcome = await runStage(runtime, queryCall());

    expect(outcome.status).toBe('repaired');
    expect(invoke.mock.calls[1]?.[0].userPrompt).toBe('Find a query.');
  });

  it('falls back after two malformed answers, with a warning and an event', async () => {
    const invoke = vi.fn<ModelInvoker>(async () => 'not json');
    const runtime = runtimeWith(invoke);
    const degraded: DomainEvent[] = [];
    runtime.events.subscribe(EVENT_TYPES.StageDegraded, event => degraded.push(event));

    const outcome = await runStage(runtime, queryCall());

    const reason = 'Malformed model output: no JSON object found in output (8 chars)';
    expect(outcome).toEqual({ value: { query: 'fallback query' }, status: 'fallback', attempts: 2 });
    expect(invoke).toHaveBeenCalledTimes(2);
    expect(runtime.warnings).toEqual([`Grounding query failed online; used offline fallback. (${reason})`]);
    expect(degraded).toHaveLength(1);
    expect(degraded[0]?.payload).toEqual({
      sessionId: 'session-1',
      stage: 'ground',
      label: 'Grounding query',
      attempts: 2,
      reason,
    });
  });

  it('treats a model call that never answers as a failure', async () => {
    const invoke = vi.fn<ModelInvoker>(() => new Promise<string>(() => undefined));
    const runtime = runtimeWith(invoke, 10);

    const outcome = await runStage(runtime, queryCall());

    expect(outcome.status).toBe('fallback');
    expect(runtime.warnings).toEqual([
      'Grounding query failed online; used offline fallback. (Grounding query model call timed out after 10ms)',
    ]);
  });

  it('runs transforming schemas on the parsed output', async () => {
    const invoke = vi.fn<ModelInvoker>(async () => '{"query":"  tags  "}');
    const call: StageCall<string> = {
      ...queryCall(),
      schema: querySchema.transform(value => value.query.trim().toUpperCase()),
      fallback: () => 'NONE',
    };

    const outcome = await runStage(runtimeWith(invoke), call);

    expect(outcome.value).toBe('TAGS');
  });
});

describe('summarizeStage', () => {
  it('reports the worst status and the total attempts', () => {
    expect(
      summarizeStage('ground', [
        { status: 'ok', attempts: 1 },
        { status: 'fallback', attempts: 2 },
        { status: 'repaired', attempts: 2 },
      ]),
    ).toEqual({ stage: 'ground', status: 'fallback', attempts: 5 });
  });

  it('reports a stub when nothing ran', () => {
    expect(summarizeStage('coach', [])).toEqual({ stage: 'coach', status: 'stub', attempts: 0 });
  });
});
