import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';

export interface JsonStoreSnapshot<T> {
  version: string;
  updatedAt: string;
  data: T;
}

const SNAPSHOT_VERSION = '1.0';

const snapshotEnvelopeSchema = z.object({
  version: z.string(),
  updatedAt: z.string(),
  data: z.unknown(),
});

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * A zod-validated JSON document on local disk. Writes go through a temp file
 * and a rename so readers never observe a half-written snapshot.
 */
export class JsonStore<T> {
  constructor(private readonly schema: z.ZodType<T>, readonly filePath: string) {}

  /** Resolves undefined when the file does not exist; throws when it is unreadable or invalid. */
  async read(): Promise<JsonStoreSnapshot<T> | undefined> {
    let payload: string;
    try {
      payload = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }
    const parsed: unknown = JSON.parse(payload);
    const envelope = snapshotEnvelopeSchema.parse(parsed);
    return { version: envelope.version, updatedAt: envelope.updatedAt, data: this.schema.parse(envelope.data) };
  }

  async write(data: T): Promise<void> {
    const snapshot: JsonStoreSnapshot<T> = {
      version: SNAPSHOT_VERSION,
      updatedAt: new Date().toISOString(),
      data,
    };
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${uuid()}.tmp`;
    await writeFile(tempPath, JSON.stringify(snapshot, null, 2));
    await rename(tempPath, this.filePath);
  }
}
