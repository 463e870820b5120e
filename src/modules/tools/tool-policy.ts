import { z } from 'zod';

export const ALLOWED_TOOLS = ['document-search', 'document-fetch', 'code-sample-search'] as const;
export type AllowedTool = (typeof ALLOWED_TOOLS)[number];

export const TOOL_NOT_PERMITTED = 'tool not permitted';

const searchArgumentsSchema = z
  .object({
    query: z.string().trim().min(1).max(300),
    limit: z.number().int().min(1).max(10).optional(),
  })
  .strict();

const codeSampleArgumentsSchema = searchArgumentsSchema
  .extend({ language: z.string().trim().min(1).max(40).optional() })
  .strict();

const fetchArgumentsSchema = z
  .object({
    url: z
      .string()
      .url()
      .refine(value => value.startsWith('https://'), { message: 'url must use https' }),
  })
  .strict();

const argumentSchemas: Record<AllowedTool, z.ZodTypeAny> = {
  'document-search': searchArgumentsSchema,
  'document-fetch': fetchArgumentsSchema,
  'code-sample-search': codeSampleArgumentsSchema,
};

export type ToolArguments = Record<string, unknown>;

export type ToolDecision =
  | { allowed: true; tool: AllowedTool; arguments: ToolArguments }
  | { allowed: false; reason: string };

export function normalizeToolName(toolName: string): string {
  return toolName.trim().toLowerCase();
}

function isAllowedTool(name: string): name is AllowedTool {
  return (ALLOWED_TOOLS as readonly string[]).includes(name);
}

function isRecord(value: unknown): value is ToolArguments {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decides whether a tool call may go out. Pure and total: every input,
 * however malformed, yields a decision.
 */
export function authorize(toolName: unknown, args: unknown): ToolDecision {
  if (typeof toolName !== 'string') {
    return { allowed: false, reason: TOOL_NOT_PERMITTED };
  }
  const name = normalizeToolName(toolName);
  if (!isAllowedTool(name)) {
    return { allowed: false, reason: TOOL_NOT_PERMITTED };
  }
  const result = argumentSchemas[name].safeParse(args);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join('.') || 'arguments'} ${issue.message.toLowerCase()}`)
      .join('; ');
    return { allowed: false, reason: `invalid arguments: ${detail}` };
  }
  if (!isRecord(result.data)) {
    return { allowed: false, reason: 'invalid arguments: expected an object' };
  }
  return { allowed: true, tool: name, arguments: result.data };
}
