/**
 * File manager tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileManager, hashBytes, toHexHash } from '../src/services/file-manager.js';
import type { FilesService } from '../src/services/files.js';
import type {
  GeminiFile,
  ListFilesParams,
  ListFilesResponse,
  UploadFileRequest,
} from '../src/types/index.js';
import { FileAccessError, NotFoundError, UnsupportedMediaTypeError } from '../src/error/index.js';
import { getMimeType } from '../src/utils/mime.js';
import { spyLogger } from './helpers.js';

const HELLO_HASH = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';
const MINUTE = 60_000;

function expiresIn(ms: number): string {
  return new Date(Date.now() + ms).toISOString();
}

/** In-memory stand-in for the remote files API. */
class FakeFilesService implements FilesService {
  uploads: UploadFileRequest[] = [];
  deleted: string[] = [];
  remote: GeminiFile[] = [];
  failDeletes = false;
  expiration: string | undefined = expiresIn(48 * 60 * MINUTE);

  async upload(request: UploadFileRequest): Promise<GeminiFile> {
    this.uploads.push(request);
    const id = this.uploads.length;
    return {
      name: `files/${id}`,
      uri: `https://files.example.test/${id}`,
      mimeType: request.mimeType,
      displayName: request.displayName,
      expirationTime: this.expiration,
      state: 'ACTIVE',
    };
  }

  async list(_params?: ListFilesParams): Promise<ListFilesResponse> {
    return { files: this.remote };
  }

  async listAll(): Promise<GeminiFile[]> {
    return this.remote;
  }

  async get(fileName: string): Promise<GeminiFile> {
    const file = this.remote.find((f) => f.name === fileName);
    if (!file) {
      throw new NotFoundError(fileName);
    }
    return file;
  }

  async delete(fileName: string): Promise<void> {
    if (this.failDeletes) {
      throw new Error('delete failed');
    }
    this.deleted.push(fileName);
  }

  async waitForActive(fileName: string): Promise<GeminiFile> {
    return this.get(fileName);
  }
}

describe('FileManager', () => {
  let service: FakeFilesService;
  let logger: ReturnType<typeof spyLogger>;
  let manager: FileManager;
  const hello = new TextEncoder().encode('hello');

  beforeEach(() => {
    service = new FakeFilesService();
    logger = spyLogger();
    manager = new FileManager(service, { fileExpiryMargin: 10 * MINUTE, logger });
  });

  describe('hashing', () => {
    it('should hash bytes as hex SHA-256', () => {
      expect(hashBytes(hello)).toBe(HELLO_HASH);
    });

    it('should convert base64 hashes to hex', () => {
      const base64 = Buffer.from(HELLO_HASH, 'hex').toString('base64');
      expect(toHexHash(base64)).toBe(HELLO_HASH);
    });

    it('should keep hex hashes', () => {
      expect(toHexHash(HELLO_HASH.toUpperCase())).toBe(HELLO_HASH);
    });
  });

  describe('addFileFromBytes', () => {
    it('should upload new content and cache it by hash', async () => {
      const fileData = await manager.addFileFromBytes('hello.txt', hello, 'text/plain');

      expect(fileData).toEqual({ mimeType: 'text/plain', fileUri: 'https://files.example.test/1' });
      expect(service.uploads).toHaveLength(1);
      expect(service.uploads[0]).toMatchObject({ displayName: 'hello.txt', mimeType: 'text/plain' });
      expect(manager.hashes()).toEqual([HELLO_HASH]);
      await expect(manager.checkFile(HELLO_HASH)).resolves.toBe(true);
    });

    it('should reuse a fresh upload of the same content', async () => {
      await manager.addFileFromBytes('hello.txt', hello, 'text/plain');
      const again = await manager.addFileFromBytes('copy.txt', hello, 'text/plain');

      expect(again.fileUri).toBe('https://files.example.test/1');
      expect(service.uploads).toHaveLength(1);
    });

    it('should upload identical content only once when added concurrently', async () => {
      const [first, second] = await Promise.all([
        manager.addFileFromBytes('a.txt', hello, 'text/plain'),
        manager.addFileFromBytes('b.txt', hello, 'text/plain'),
      ]);

      expect(first).toEqual(second);
      expect(service.uploads).toHaveLength(1);
    });

    it('should replace an upload that is about to expire', async () => {
      service.expiration = expiresIn(5 * MINUTE);
      await manager.addFileFromBytes('hello.txt', hello, 'text/plain');

      service.expiration = expiresIn(48 * 60 * MINUTE);
      const fileData = await manager.addFileFromBytes('hello.txt', hello, 'text/plain');

      expect(fileData.fileUri).toBe('https://files.example.test/2');
      expect(service.uploads).toHaveLength(2);
      expect(service.deleted).toEqual(['files/1']);
      expect(manager.size).toBe(1);
    });

    it('should treat uploads without an expiration as fresh', async () => {
      service.expiration = undefined;
      await manager.addFileFromBytes('hello.txt', hello, 'text/plain');

      await expect(manager.getFile(HELLO_HASH)).resolves.toEqual({
        mimeType: 'text/plain',
        fileUri: 'https://files.example.test/1',
      });
    });
  });

  describe('getFile', () => {
    it('should return undefined for unknown hashes', async () => {
      await expect(manager.getFile('0'.repeat(64))).resolves.toBeUndefined();
      await expect(manager.checkFile('0'.repeat(64))).resolves.toBe(false);
    });

    it('should evict a stale entry even when the remote delete fails', async () => {
      service.expiration = expiresIn(MINUTE);
      await manager.addFileFromBytes('hello.txt', hello, 'text/plain');
      service.failDeletes = true;

      await expect(manager.getFile(HELLO_HASH)).resolves.toBeUndefined();

      expect(manager.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith(
        'Failed to delete file',
        expect.objectContaining({ hash: HELLO_HASH, name: 'files/1' })
      );
    });

    it('should treat an already expired entry as stale', async () => {
      service.expiration = expiresIn(-MINUTE);
      await manager.addFileFromBytes('hello.txt', hello, 'text/plain');

      await expect(manager.getFile(HELLO_HASH)).resolves.toBeUndefined();
      expect(service.deleted).toEqual(['files/1']);
    });
  });

  describe('fetchList', () => {
    it('should cache listed files by their hex hash', async () => {
      service.remote = [
        {
          name: 'files/remote',
          uri: 'https://files.example.test/remote',
          mimeType: 'image/png',
          sha256Hash: Buffer.from(HELLO_HASH, 'hex').toString('base64'),
          expirationTime: expiresIn(48 * 60 * MINUTE),
        },
        { name: 'files/unhashed', uri: 'https://files.example.test/unhashed', mimeType: 'image/png' },
      ];

      await manager.fetchList();

      expect(manager.hashes()).toEqual([HELLO_HASH]);
      await expect(manager.getFile(HELLO_HASH)).resolves.toEqual({
        mimeType: 'image/png',
        fileUri: 'https://files.example.test/remote',
      });
    });

    it('should let a listed file satisfy a later add', async () => {
      service.remote = [
        {
          name: 'files/remote',
          uri: 'https://files.example.test/remote',
          mimeType: 'text/plain',
          sha256Hash: HELLO_HASH,
        },
      ];

      await manager.fetchList();
      const fileData = await manager.addFileFromBytes('hello.txt', hello, 'text/plain');

      expect(fileData.fileUri).toBe('https://files.example.test/remote');
      expect(service.uploads).toHaveLength(0);
    });
  });

  describe('deleteFile and clearFiles', () => {
    it('should delete a cached file remotely', async () => {
      await manager.addFileFromBytes('hello.txt', hello, 'text/plain');

      await manager.deleteFile(HELLO_HASH);

      expect(service.deleted).toEqual(['files/1']);
      expect(manager.size).toBe(0);
    });

    it('should ignore unknown hashes', async () => {
      await manager.deleteFile(HELLO_HASH);
      expect(service.deleted).toEqual([]);
    });

    it('should clear every entry and keep going past failed deletes', async () => {
      await manager.addFileFromBytes('hello.txt', hello, 'text/plain');
      await manager.addFileFromBytes('world.txt', new TextEncoder().encode('world'), 'text/plain');
      service.failDeletes = true;

      await manager.clearFiles();

      expect(manager.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledTimes(2);
    });
  });

  describe('addFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'file-manager-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should upload a local file with its name and MIME type', async () => {
      const path = join(dir, 'notes.txt');
      await writeFile(path, 'hello');

      const fileData = await manager.addFile(path);

      expect(fileData).toEqual({ mimeType: 'text/plain', fileUri: 'https://files.example.test/1' });
      expect(service.uploads[0]).toMatchObject({ displayName: 'notes.txt', mimeType: 'text/plain' });
      expect(manager.hashes()).toEqual([HELLO_HASH]);
    });

    it('should report a missing file', async () => {
      const path = join(dir, 'missing.pdf');

      const error = await manager.addFile(path).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FileAccessError);
      expect(error).toMatchObject({ message: `File does not exist: ${path}`, path });
    });

    it('should reject unknown extensions', async () => {
      const path = join(dir, 'data.xyz');
      await writeFile(path, 'hello');

      await expect(manager.addFile(path)).rejects.toThrow(UnsupportedMediaTypeError);
      await expect(manager.addFile(path)).rejects.toThrow('Unsupported file type: data.xyz');
      expect(service.uploads).toHaveLength(0);
    });

    it.each(['notes.constructor', 'notes.toString', 'notes.__proto__'])(
      'should reject %s as an unknown extension',
      async (name) => {
        const path = join(dir, name);
        await writeFile(path, 'hello');

        await expect(manager.addFile(path)).rejects.toThrow(`Unsupported file type: ${name}`);
        expect(service.uploads).toHaveLength(0);
      }
    );
  });
});

describe('getMimeType', () => {
  it('should map known extensions case-insensitively', () => {
    expect(getMimeType('chart.PNG')).toBe('image/png');
    expect(getMimeType('/tmp/report.pdf')).toBe('application/pdf');
  });

  it('should return undefined without a known extension', () => {
    expect(getMimeType('Makefile')).toBeUndefined();
    expect(getMimeType('notes.constructor')).toBeUndefined();
    expect(getMimeType('notes.valueOf')).toBeUndefined();
    expect(getMimeType('notes.hasOwnProperty')).toBeUndefined();
  });
});
