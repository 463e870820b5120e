import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { JsonStore } from '../json-store.js';

const counterSchema = z.object({ count: z.number() });

describe('JsonStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'exam-coach-json-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('resolves undefined for a missing file', async () => {
    await expect(new JsonStore(counterSchema, path.join(dir, 'missing.json')).read()).resolves.toBeUndefined();
  });

  it('writes a versioned snapshot that reads back', async () => {
    const store = new JsonStore(counterSchema, path.join(dir, 'nested', 'counter.json'));

    await store.write({ count: 3 });

    const snapshot = await store.read();
    expect(snapshot?.version).toBe('1.0');
    expect(snapshot?.data).toEqual({ count: 3 });
  });

  it('survives concurrent writers on one path', async () => {
    const filePath = path.join(dir, 'counter.json');
    const first = new JsonStore(counterSchema, filePath);
    const second = new JsonStore(counterSchema, filePath);

    await Promise.all([first.write({ count: 1 }), second.write({ count: 2 })]);

    const snapshot = await first.read();
    expect([1, 2]).toContain(snapshot?.data.count);
    expect(await readdir(dir)).toEqual(['counter.json']);
  });

  it('rejects a document that fails the schema', async () => {
    const filePath = path.join(dir, 'counter.json');
    await writeFile(filePath, JSON.stringify({ version: '1.0', updatedAt: 'now', data: { count: 'three' } }));

    await expect(new JsonStore(counterSchema, filePath).read()).rejects.toBeInstanceOf(z.ZodError);
  });
});
