import type { ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const TOP_LEVEL_DROPPED = new Set(['$schema', 'definitions', '$defs', 'components', '$ref']);

function stripDefaults(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(stripDefaults);
  }
  if (value && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([key]) => key !== 'default')
        .map(([key, nested]) => [key, stripDefaults(nested)]),
    );
  }
  return value;
}

/** Inline JSON schema for Fastify route docs; `default` keywords are removed. */
export function toJsonSchema(schema: ZodTypeAny, name?: string): Record<string, unknown> {
  const jsonSchema = name
    ? zodToJsonSchema(schema, { $refStrategy: 'none', name, nameStrategy: 'title' })
    : zodToJsonSchema(schema, { $refStrategy: 'none' });
  return Object.fromEntries(
    Object.entries(jsonSchema)
      .filter(([key]) => !TOP_LEVEL_DROPPED.has(key))
      .map(([key, nested]) => [key, stripDefaults(nested)]),
  );
}
