/**
 * Pulls a single JSON object out of noisy model text and validates it against
 * a zod schema. Candidates are tried in order:
 *
 * 1. the whole text, trimmed
 * 2. every fenced block (```json ... ``` or ``` ... ```)
 * 3. the outermost `{ ... }` span of the text with fences removed
 *
 * The first candidate that both parses and validates wins. Nothing is retried
 * here; callers decide whether to ask the model again.
 */
import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';
import { MalformedOutputError } from '../../common/errors.js';

const FENCED_BLOCK = /```[a-zA-Z]*[ \t]*\r?\n?([\s\S]*?)```/g;

function collectCandidates(text: string): string[] {
  const candidates: string[] = [];
  const push = (value: string | undefined) => {
    const trimmed = value?.trim();
    if (trimmed && !candidates.includes(trimmed)) {
      candidates.push(trimmed);
    }
  };

  push(text);

  for (const match of text.matchAll(FENCED_BLOCK)) {
    push(match[1]);
  }

  const unfenced = text.replace(/```[a-zA-Z]*/g, '');
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start !== -1 && end > start) {
    push(unfenced.slice(start, end + 1));
  }

  return candidates;
}

function tryParseJson(candidate: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(candidate) };
  } catch {
    return { ok: false };
  }
}

export function parseModelOutput<T>(raw: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const candidates = collectCandidates(raw);
  let lastIssues: ZodIssue[] = [];
  let parsedAny = false;

  for (const candidate of candidates) {
    const parsed = tryParseJson(candidate);
    if (!parsed.ok) {
      continue;
    }
    parsedAny = true;
    const result = schema.safeParse(parsed.value);
    if (result.success) {
      return result.data;
    }
    lastIssues = result.error.issues;
  }

  const reason = parsedAny ? 'output did not match the expected schema' : 'no JSON object found in output';
  throw new MalformedOutputError(`Malformed model output: ${reason} (${raw.length} chars)`, raw, lastIssues);
}

export function summarizeIssues(issues: ZodIssue[], limit = 3): string {
  return issues
    .slice(0, limit)
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Appends the one-shot repair instruction to the original request. */
export function buildRepairPrompt(userPrompt: string, schemaName: string, error?: MalformedOutputError): string {
  const detail = error && error.issues.length > 0 ? `\nProblems found: ${summarizeIssues(error.issues)}.` : '';
  return `${userPrompt}\n\nYour previous output was invalid. Return only JSON matching schema ${schemaName}, with no markdown and no commentary.${detail}`;
}
