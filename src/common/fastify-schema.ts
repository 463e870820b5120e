import type { FastifySchemaCompiler } from 'fastify';

/**
 * Route schemas are documentation only; bodies are parsed with zod inside the
 * handlers.
 */
export const passThroughValidator: FastifySchemaCompiler<unknown> = () => data => ({ value: data });
