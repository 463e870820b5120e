import { MockAgent, getGlobalDispatcher, setGlobalDispatcher, type Dispatcher } from 'undici';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { StageTimeoutError, ToolDeniedError } from '../../../common/errors.js';
import {
  createGatedToolClient,
  createHttpToolTransport,
  createToolTransportFromConfig,
  type ToolTransport,
} from '../tool-client.js';

describe('createGatedToolClient', () => {
  it('never reaches the transport for a denied tool', async () => {
    const transport = vi.fn<ToolTransport>();
    const client = createGatedToolClient(transport, { timeoutMs: 1_000 });

    await expect(client.call('shell', { command: 'ls' })).rejects.toBeInstanceOf(ToolDeniedError);
    expect(transport).not.toHaveBeenCalled();
  });

  it('forwards the normalized tool and parsed arguments', async () => {
    const transport = vi.fn<ToolTransport>().mockResolvedValue({ hits: [] });
    const client = createGatedToolClient(transport, { timeoutMs: 1_000 });

    await expect(client.call('DOCUMENT-SEARCH', { query: ' zones ' })).resolves.toEqual({ hits: [] });
    expect(transport).toHaveBeenCalledTimes(1);
    expect(transport.mock.calls[0]?.[0]).toBe('document-search');
    expect(transport.mock.calls[0]?.[1]).toEqual({ query: 'zones' });
  });

  it('times out a transport that never settles', async () => {
    const transport: ToolTransport = () => new Promise(() => undefined);
    const client = createGatedToolClient(transport, { timeoutMs: 10 });

    await expect(client.call('document-search', { query: 'zones' })).rejects.toBeInstanceOf(StageTimeoutError);
  });
});

describe('createToolTransportFromConfig', () => {
  it('fails every call when no gateway is configured', async () => {
    const transport = createToolTransportFromConfig(undefined);
    await expect(transport('document-fetch', { url: 'https://learn.microsoft.com/' }, new AbortController().signal)).rejects.toThrow(
      'No tool gateway configured for document-fetch; set TOOL_ENDPOINT',
    );
  });
});

describe('createHttpToolTransport', () => {
  const origin = 'https://tools.example.test';
  let previous: Dispatcher;
  let agent: MockAgent;

  beforeEach(() => {
    previous = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
  });

  afterEach(async () => {
    setGlobalDispatcher(previous);
    await agent.close();
  });

  it('posts the tool call and parses a JSON reply', async () => {
    agent
      .get(origin)
      .intercept({
        path: '/invoke',
        method: 'POST',
        headers: { authorization: 'Bearer test-secret' },
        body: JSON.stringify({ tool: 'document-search', arguments: { query: 'regions' } }),
      })
      .reply(200, { results: [{ url: 'https://learn.microsoft.com/regions' }] }, {
        headers: { 'content-type': 'application/json; charset=utf-8' },
      });

    const transport = createHttpToolTransport({ endpoint: `${origin}/`, apiKey: 'test-secret' });

    await expect(
      transport('document-search', { query: 'regions' }, new AbortController().signal),
    ).resolves.toEqual({ results: [{ url: 'https://learn.microsoft.com/regions' }] });
  });

  it('returns a text reply as a string', async () => {
    agent
      .get(origin)
      .intercept({ path: '/invoke', method: 'POST' })
      .reply(200, 'Regions pair up for resiliency.', { headers: { 'content-type': 'text/plain' } });

    const transport = createHttpToolTransport({ endpoint: origin });

    await expect(
      transport('document-fetch', { url: 'https://learn.microsoft.com/regions' }, new AbortController().signal),
    ).resolves.toBe('Regions pair up for resiliency.');
  });

  it('reports a non-OK status', async () => {
    agent.get(origin).intercept({ path: '/invoke', method: 'POST' }).reply(404, 'missing');

    const transport = createHttpToolTransport({ endpoint: origin });

    await expect(
      transport('document-fetch', { url: 'https://learn.microsoft.com/gone' }, new AbortController().signal),
    ).rejects.toThrow('Tool gateway responded 404 for document-fetch');
  });
});
