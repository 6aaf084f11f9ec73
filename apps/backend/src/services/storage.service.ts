import fsPromises from 'node:fs/promises';
import path from 'node:path';
import { storageError, notFound } from '../utils/errors.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Flat blob store keyed by storage name. Every name resolves inside the
 * root; anything that would escape it is rejected before touching disk.
 */
export interface IStorageService {
  store(name: string, data: Buffer): Promise<void>;
  retrieve(name: string): Promise<Buffer>;
  delete(name: string): Promise<void>;
  exists(name: string): Promise<boolean>;
}

export class StorageService implements IStorageService {
  private readonly root: string;

  constructor(storagePath: string) {
    this.root = storagePath;
  }

  private resolve(name: string): string {
    const absolute = path.resolve(this.root, name);
    const root = path.resolve(this.root);
    if (!absolute.startsWith(root + path.sep)) {
      throw storageError(`Path traversal attempt: ${name}`);
    }
    return absolute;
  }

  async store(name: string, data: Buffer): Promise<void> {
    const absolute = this.resolve(name);

    try {
      await fsPromises.mkdir(path.dirname(absolute), { recursive: true });
      await fsPromises.writeFile(absolute, data);
    } catch (err) {
      throw storageError(`Failed to store blob ${name}: ${errorMessage(err)}`);
    }
  }

  async retrieve(name: string): Promise<Buffer> {
    const absolute = this.resolve(name);
    try {
      return await fsPromises.readFile(absolute);
    } catch (err) {
      if (isMissingFile(err)) {
        throw notFound(`Blob not found: ${name}`);
      }
      throw storageError(`Failed to retrieve blob ${name}: ${errorMessage(err)}`);
    }
  }

  async delete(name: string): Promise<void> {
    const absolute = this.resolve(name);
    try {
      await fsPromises.unlink(absolute);
    } catch (err) {
      // Idempotent: a blob that is already gone counts as deleted
      if (isMissingFile(err)) return;
      throw storageError(`Failed to delete blob ${name}: ${errorMessage(err)}`);
    }
  }

  async exists(name: string): Promise<boolean> {
    const absolute = this.resolve(name);
    try {
      await fsPromises.access(absolute);
      return true;
    } catch {
      return false;
    }
  }
}
