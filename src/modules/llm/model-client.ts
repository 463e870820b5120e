import { fetch } from 'undici';
import { z } from 'zod';
import { moduleLogger } from '../../common/logger.js';

export const AGENT_NAMES = ['planner', 'examiner', 'misconception', 'grounding', 'coach'] as const;
export type AgentName = (typeof AGENT_NAMES)[number];

export interface ModelRequest {
  agent: AgentName;
  systemPrompt: string;
  userPrompt: string;
  signal: AbortSignal;
}

/** Raw model invocation: resolves the model's text output. */
export type ModelInvoker = (request: ModelRequest) => Promise<string>;

export interface HttpModelInvokerOptions {
  endpoint: string;
  apiKey?: string;
  deployment: string;
}

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

const log = moduleLogger('llm');

/** Invokes an OpenAI-compatible chat completions endpoint. */
export function createHttpModelInvoker(options: HttpModelInvokerOptions): ModelInvoker {
  const url = `${options.endpoint.replace(/\/+$/, '')}/chat/completions`;
  return async ({ agent, systemPrompt, userPrompt, signal }) => {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (options.apiKey) {
      headers['api-key'] = options.apiKey;
      headers.authorization = `Bearer ${options.apiKey}`;
    }
    const started = performance.now();
    const response = await fetch(url, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        model: options.deployment,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        temperature: 0.2,
      }),
      signal,
    });
    if (!response.ok) {
      const detail = await response.text();
      throw new Error(`Model endpoint responded ${response.status} for ${agent}: ${detail.slice(0, 200)}`);
    }
    const body = chatCompletionSchema.parse(await response.json());
    log.debug({ agent, durationMs: Math.round(performance.now() - started) }, 'model call completed');
    return body.choices[0]?.message.content ?? '';
  };
}
