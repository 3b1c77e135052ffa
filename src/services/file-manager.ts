/**
 * Content-addressed cache of uploaded files.
 */

import { createHash } from 'node:crypto';
import { readFile, stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { Mutex } from 'async-mutex';
import type { ResolvedSessionConfig } from '../config/index.js';
import { FileAccessError, UnsupportedMediaTypeError } from '../error/index.js';
import type { Logger } from '../observability/logging.js';
import { createFileData } from '../types/index.js';
import type { FileData, GeminiFile } from '../types/index.js';
import { getMimeType } from '../utils/mime.js';
import type { FilesService } from './files.js';

/** SHA-256 of some bytes, as lowercase hex. */
export function hashBytes(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

const HEX_SHA256 = /^[0-9a-f]{64}$/i;

/**
 * The API reports `sha256Hash` base64-encoded; the cache is keyed by hex.
 */
export function toHexHash(value: string): string {
  if (HEX_SHA256.test(value)) {
    return value.toLowerCase();
  }
  return Buffer.from(value, 'base64').toString('hex');
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function toFileData(file: GeminiFile): FileData {
  return createFileData(file.uri, file.mimeType);
}

/**
 * Keeps one uploaded copy per distinct file content.
 *
 * Entries are keyed by the SHA-256 of the bytes. An entry that expires within
 * `fileExpiryMargin` is evicted on lookup and deleted from the API. Every
 * access to the cache runs under one mutex.
 *
 * @example
 * ```typescript
 * const fileData = await session.files.addFile('./report.pdf');
 * await session.sendMessageWithFile('Summarize this report', fileData);
 * ```
 */
export class FileManager {
  private readonly files = new Map<string, GeminiFile>();
  private readonly mutex = new Mutex();
  private readonly logger: Logger;
  private readonly expiryMargin: number;

  constructor(
    private readonly service: FilesService,
    config: Pick<ResolvedSessionConfig, 'fileExpiryMargin' | 'logger'>
  ) {
    this.logger = config.logger;
    this.expiryMargin = config.fileExpiryMargin;
  }

  /** Number of cached entries, fresh or not. */
  get size(): number {
    return this.files.size;
  }

  /** Hashes of the cached entries. */
  hashes(): string[] {
    return Array.from(this.files.keys());
  }

  /**
   * Upload bytes unless identical content is already cached and fresh.
   */
  async addFileFromBytes(name: string, bytes: Uint8Array, mimeType: string): Promise<FileData> {
    const hash = hashBytes(bytes);
    const release = await this.mutex.acquire();

    try {
      const cached = await this.lookup(hash);
      if (cached) {
        return cached;
      }

      const file = await this.service.upload({ displayName: name, bytes, mimeType });
      this.files.set(hash, file);
      return toFileData(file);
    } finally {
      release();
    }
  }

  /**
   * Upload a local file, taking its name from the path and its MIME type
   * from the extension.
   *
   * @throws {FileAccessError} If the path does not exist or cannot be read
   * @throws {UnsupportedMediaTypeError} If the extension is not a known file type
   */
  async addFile(path: string): Promise<FileData> {
    try {
      await stat(path);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new FileAccessError(path, 'File does not exist', error);
      }
      throw new FileAccessError(path, 'Cannot access file', error);
    }

    const name = basename(path);
    const mimeType = getMimeType(path);
    if (!mimeType) {
      throw new UnsupportedMediaTypeError(name);
    }

    let bytes: Buffer;
    try {
      bytes = await readFile(path);
    } catch (error) {
      throw new FileAccessError(path, 'Cannot read file', error);
    }

    return this.addFileFromBytes(name, bytes, mimeType);
  }

  /** Whether a hash is cached, fresh or not. */
  async checkFile(hash: string): Promise<boolean> {
    return this.mutex.runExclusive(() => this.files.has(hash));
  }

  /**
   * Look up a fresh entry. A stale entry is evicted and deleted remotely.
   */
  async getFile(hash: string): Promise<FileData | undefined> {
    const release = await this.mutex.acquire();
    try {
      return await this.lookup(hash);
    } finally {
      release();
    }
  }

  /**
   * Cache every file already uploaded under this API key.
   */
  async fetchList(): Promise<void> {
    const remote = await this.service.listAll();
    const release = await this.mutex.acquire();

    try {
      let added = 0;
      for (const file of remote) {
        if (!file.sha256Hash) {
          this.logger.debug('Skipping listed file without hash', { name: file.name });
          continue;
        }
        this.files.set(toHexHash(file.sha256Hash), file);
        added++;
      }
      this.logger.info('Fetched file list', { listed: remote.length, cached: added });
    } finally {
      release();
    }
  }

  /**
   * Remove an entry and delete it remotely. Unknown hashes are ignored.
   */
  async deleteFile(hash: string): Promise<void> {
    const release = await this.mutex.acquire();
    try {
      const file = this.files.get(hash);
      if (!file) {
        return;
      }
      this.files.delete(hash);
      await this.service.delete(file.name);
    } finally {
      release();
    }
  }

  /**
   * Remove every entry, deleting each remotely. A failed delete is logged
   * and the rest still run.
   */
  async clearFiles(): Promise<void> {
    const release = await this.mutex.acquire();
    try {
      const entries = Array.from(this.files.entries());
      this.files.clear();
      for (const [hash, file] of entries) {
        await this.deleteRemote(hash, file);
      }
    } finally {
      release();
    }
  }

  /** Caller holds the mutex. */
  private async lookup(hash: string): Promise<FileData | undefined> {
    const file = this.files.get(hash);
    if (!file) {
      return undefined;
    }

    if (this.isFresh(file)) {
      this.logger.debug('Found cached file', { hash, name: file.name });
      return toFileData(file);
    }

    this.logger.info('Evicting expiring file', { hash, name: file.name, expirationTime: file.expirationTime });
    this.files.delete(hash);
    await this.deleteRemote(hash, file);
    return undefined;
  }

  private isFresh(file: GeminiFile): boolean {
    if (!file.expirationTime) {
      return true;
    }
    return Date.parse(file.expirationTime) > Date.now() + this.expiryMargin;
  }

  private async deleteRemote(hash: string, file: GeminiFile): Promise<void> {
    try {
      await this.service.delete(file.name);
    } catch (error) {
      this.logger.warn('Failed to delete file', { hash, name: file.name, error });
    }
  }
}
