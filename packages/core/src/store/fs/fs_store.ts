import * as fs from 'fs/promises';
import * as path from 'path';
import { randomBytes } from 'crypto';
import type { Store, Serializer, FsStoreOptions } from '../store';
import { isErrnoCode } from '../../utils/fs_errors';

const DEFAULT_SERIALIZER: Serializer = {
  stringify: (value) => JSON.stringify(value, null, 2),
  parse: (text) => JSON.parse(text),
};

const TEMP_SUFFIX = '.tmp';

/**
 * Validates that an ID does not contain path traversal.
 * Blocks: `..`, `/`, `\`
 */
export function validateId(id: string): void {
  if (!id || typeof id !== 'string') {
    throw new Error('ID must be a non-empty string');
  }
  if (id.includes('..') || /[\/\\]/.test(id)) {
    throw new Error(`Invalid ID: "${id}". IDs cannot contain /, \\, or ..`);
  }
}

/**
 * Writes `content` next to `filePath` under a temporary name, then renames it
 * into place. Readers see either the old file or the new one, never a
 * partial write.
 */
export async function writeFileAtomic(filePath: string, content: string | Buffer): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.${randomBytes(4).toString('hex')}${TEMP_SUFFIX}`;
  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * FsStore<T> - Filesystem implementation of Store<T>
 *
 * One file per ID, replaced atomically on every put.
 *
 * @example
 * const store = new FsStore<Snapshot>({
 *   basePath: '~/.gradewatch/state',
 *   guard: isSnapshot,
 * });
 *
 * await store.put('12345%3As1.grades', snapshot);
 * const snapshot = await store.get('12345%3As1.grades');
 */
export class FsStore<T> implements Store<T> {
  private readonly basePath: string;
  private readonly extension: string;
  private readonly serializer: Serializer;
  private readonly guard: (value: unknown) => value is T;
  private readonly onInvalid: ((id: string, cause: unknown) => void) | undefined;
  private readonly createIfMissing: boolean;

  constructor(options: FsStoreOptions<T>) {
    this.basePath = options.basePath;
    this.extension = options.extension ?? '.json';
    this.serializer = options.serializer ?? DEFAULT_SERIALIZER;
    this.guard = options.guard;
    this.onInvalid = options.onInvalid;
    this.createIfMissing = options.createIfMissing ?? true;
  }

  private getFilePath(id: string): string {
    validateId(id);
    return path.join(this.basePath, `${id}${this.extension}`);
  }

  async get(id: string): Promise<T | null> {
    const filePath = this.getFilePath(id);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = this.serializer.parse(content);
    } catch (error) {
      return this.invalid(id, error);
    }

    if (this.guard(parsed)) {
      return parsed;
    }
    return this.invalid(id, new Error(`File for "${id}" does not have the expected shape`));
  }

  private invalid(id: string, cause: unknown): null {
    if (!this.onInvalid) {
      throw cause;
    }
    this.onInvalid(id, cause);
    return null;
  }

  async put(id: string, value: T): Promise<void> {
    const filePath = this.getFilePath(id);
    if (this.createIfMissing) {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
    }
    await writeFileAtomic(filePath, this.serializer.stringify(value));
  }

  async delete(id: string): Promise<void> {
    const filePath = this.getFilePath(id);
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if (!isErrnoCode(error, 'ENOENT')) {
        throw error;
      }
    }
  }

  async list(): Promise<string[]> {
    try {
      const files = await fs.readdir(this.basePath);
      return files
        .filter((f) => f.endsWith(this.extension))
        .map((f) => f.slice(0, -this.extension.length));
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return [];
      }
      throw error;
    }
  }

  async exists(id: string): Promise<boolean> {
    const filePath = this.getFilePath(id);
    try {
      await fs.access(filePath);
      return true;
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return false;
      }
      throw error;
    }
  }
}
