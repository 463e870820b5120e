import { fetch } from 'undici';
import { ToolDeniedError } from '../../common/errors.js';
import { moduleLogger } from '../../common/logger.js';
import { withTimeout } from '../../common/timeout.js';
import { authorize, type AllowedTool, type ToolArguments } from './tool-policy.js';

/** Raw tool invocation; knows nothing about policy. */
export type ToolTransport = (tool: AllowedTool, args: ToolArguments, signal: AbortSignal) => Promise<unknown>;

export interface GatedToolClient {
  call(toolName: string, args: unknown): Promise<unknown>;
}

export interface GatedToolClientOptions {
  timeoutMs: number;
}

const log = moduleLogger('tools');

/**
 * The only path from the pipeline to a tool transport. Every call is
 * authorized first; denials raise ToolDeniedError and never reach the wire.
 */
export function createGatedToolClient(transport: ToolTransport, options: GatedToolClientOptions): GatedToolClient {
  return {
    async call(toolName, args) {
      const decision = authorize(toolName, args);
      if (!decision.allowed) {
        log.warn({ toolName, reason: decision.reason }, 'tool call denied');
        throw new ToolDeniedError(toolName, decision.reason);
      }
      const started = performance.now();
      const result = await withTimeout(`tool ${decision.tool}`, options.timeoutMs, signal =>
        transport(decision.tool, decision.arguments, signal),
      );
      log.debug({ tool: decision.tool, durationMs: Math.round(performance.now() - started) }, 'tool call completed');
      return result;
    },
  };
}

export interface HttpToolTransportOptions {
  endpoint: string;
  apiKey?: string;
}

/** POSTs `{ tool, arguments }` to a tool gateway and returns its JSON body. */
export function createHttpToolTransport(options: HttpToolTransportOptions): ToolTransport {
  const url = `${options.endpoint.replace(/\/+$/, '')}/invoke`;
  return async (tool, args, signal) => {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (options.apiKey) {
      headers.authorization = `Bearer ${options.apiKey}`;
    }
    const response = await fetch(url, {
      method: 'POST',
      headers,
      body: JSON.stringify({ tool, arguments: args }),
      signal,
    });
    if (!response.ok) {
      throw new Error(`Tool gateway responded ${response.status} for ${tool}`);
    }
    const contentType = response.headers.get('content-type') ?? '';
    return contentType.includes('application/json') ? response.json() : response.text();
  };
}

/**
 * HTTP transport when a tool gateway is configured; otherwise every call
 * fails, which grounding reports as insufficient evidence.
 */
export function createToolTransportFromConfig(tools: HttpToolTransportOptions | undefined): ToolTransport {
  if (tools) {
    return createHttpToolTransport(tools);
  }
  return async tool => {
    throw new Error(`No tool gateway configured for ${tool}; set TOOL_ENDPOINT`);
  };
}
