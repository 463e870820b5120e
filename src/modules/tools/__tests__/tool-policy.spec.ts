import { describe, expect, it } from 'vitest';
import { ALLOWED_TOOLS, TOOL_NOT_PERMITTED, authorize } from '../tool-policy.js';

describe('authorize', () => {
  it.each(['shell', 'file-write', 'http-request', 'document_search', 'documents-search', ' ', ''])(
    'denies non-allow-listed tool "%s"',
    name => {
      expect(authorize(name, { query: 'zones' })).toEqual({ allowed: false, reason: TOOL_NOT_PERMITTED });
    },
  );

  it('denies a tool name that is not a string', () => {
    expect(authorize(42, { query: 'zones' })).toEqual({ allowed: false, reason: TOOL_NOT_PERMITTED });
    expect(authorize(undefined, undefined)).toEqual({ allowed: false, reason: TOOL_NOT_PERMITTED });
  });

  it('normalizes case and whitespace before the allow-list check', () => {
    expect(authorize('  Document-Search ', { query: 'zones' })).toEqual({
      allowed: true,
      tool: 'document-search',
      arguments: { query: 'zones' },
    });
  });

  it('allows every allow-listed tool with valid arguments', () => {
    const samples: Record<string, unknown> = {
      'document-search': { query: 'region pairs', limit: 3 },
      'document-fetch': { url: 'https://learn.microsoft.com/azure/reliability/overview' },
      'code-sample-search': { query: 'create a resource group', language: 'bicep' },
    };
    for (const tool of ALLOWED_TOOLS) {
      expect(authorize(tool, samples[tool]).allowed).toBe(true);
    }
  });

  it('trims search queries', () => {
    const decision = authorize('document-search', { query: '  locks  ' });
    expect(decision).toEqual({ allowed: true, tool: 'document-search', arguments: { query: 'locks' } });
  });

  it('rejects unknown argument keys', () => {
    const decision = authorize('document-search', { query: 'zones', scope: 'all' });
    expect(decision.allowed).toBe(false);
    expect(decision.allowed ? '' : decision.reason).toMatch(/^invalid arguments: /);
  });

  it('rejects plain http fetches', () => {
    const decision = authorize('document-fetch', { url: 'http://learn.microsoft.com/azure' });
    expect(decision).toEqual({ allowed: false, reason: 'invalid arguments: url url must use https' });
  });

  it('rejects a missing argument object', () => {
    const decision = authorize('document-search', null);
    expect(decision.allowed).toBe(false);
    expect(decision.allowed ? '' : decision.reason).toMatch(/^invalid arguments: arguments /);
  });
});
