import * as fs from 'fs/promises';
import * as path from 'path';
import { StorageError } from '../../services/content/errors/ContentErrors';
import { describeError } from '../../shared/security';

/**
 * Minimal string key/value persistence used by the secure token store.
 */
export interface KeyValueStore {
  read(key: string): Promise<string | null>;
  write(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
}

export class MemoryKeyValueStore implements KeyValueStore {
  private readonly data: Map<string, string> = new Map();

  async read(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async write(key: string, value: string): Promise<void> {
    this.data.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }

  get size(): number {
    return this.data.size;
  }
}

function isMissingFileError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err)) return false;
  return err.code === 'ENOENT' || err.code === 'ENOTDIR';
}

function isStringRecord(value: unknown): value is Record<string, string> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === 'string');
}

/**
 * JSON file of string entries. Writes are serialized so concurrent updates never
 * interleave a read-modify-write cycle.
 */
export class FileKeyValueStore implements KeyValueStore {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async read(key: string): Promise<string | null> {
    await this.queue;
    const data = await this.load();
    return data[key] ?? null;
  }

  write(key: string, value: string): Promise<void> {
    return this.update((data) => {
      data[key] = value;
    });
  }

  delete(key: string): Promise<void> {
    return this.update((data) => {
      delete data[key];
    });
  }

  private update(mutate: (data: Record<string, string>) => void): Promise<void> {
    const next = this.queue.then(async () => {
      const data = await this.load();
      mutate(data);
      await this.save(data);
    });
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.queue = next.catch((err: unknown) => {
      console.error(`[FileKeyValueStore] Write failed: ${describeError(err)}`);
    });
    return next;
  }

  private async load(): Promise<Record<string, string>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFileError(err)) return {};
      throw new StorageError('read', `cannot read ${path.basename(this.filePath)}`, err);
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      if (isStringRecord(parsed)) return { ...parsed };
    } catch {
      // fall through to the warning below
    }
    console.warn(`[FileKeyValueStore] Ignoring malformed store file ${path.basename(this.filePath)}`);
    return {};
  }

  private async save(data: Record<string, string>): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(data, null, 2), { encoding: 'utf-8', mode: 0o600 });
    } catch (err) {
      throw new StorageError('write', `cannot write ${path.basename(this.filePath)}`, err);
    }
  }
}
