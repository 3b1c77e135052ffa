/**
 * Files service tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MockHttpClient } from '../src/__mocks__/index.js';
import { HttpClient } from '../src/client/index.js';
import { FilesServiceImpl, normalizeFileName } from '../src/services/files.js';
import type { GeminiFile } from '../src/types/index.js';
import {
  FileProcessingError,
  FileUploadError,
  NotFoundError,
  ValidationError,
} from '../src/error/index.js';
import { BASE, testConfig } from './helpers.js';

const UPLOAD_SESSION = 'https://upload.example.test/session/abc';

function remoteFile(overrides: Partial<GeminiFile> = {}): GeminiFile {
  return {
    name: 'files/abc',
    uri: `${BASE}/v1beta/files/abc`,
    mimeType: 'text/plain',
    displayName: 'notes.txt',
    state: 'ACTIVE',
    ...overrides,
  };
}

describe('FilesService', () => {
  let mockClient: MockHttpClient;
  let service: FilesServiceImpl;
  const bytes = new TextEncoder().encode('hello');

  beforeEach(() => {
    mockClient = new MockHttpClient();
    const config = testConfig(mockClient);
    service = new FilesServiceImpl(new HttpClient(config), config);
  });

  describe('upload', () => {
    function enqueueUploadSession(): void {
      mockClient.enqueueResponse({
        status: 200,
        body: '',
        headers: { 'x-goog-upload-url': UPLOAD_SESSION },
      });
    }

    it('should upload with the resumable protocol and wait for ACTIVE', async () => {
      enqueueUploadSession();
      mockClient.enqueueJsonResponse(200, { file: remoteFile({ state: 'PROCESSING' }) });
      mockClient.enqueueJsonResponse(200, remoteFile({ state: 'PROCESSING' }));
      mockClient.enqueueJsonResponse(200, remoteFile({ state: 'ACTIVE' }));

      const file = await service.upload({ displayName: 'notes.txt', bytes, mimeType: 'text/plain' });

      expect(file).toEqual(remoteFile());
      mockClient.verifyRequestCount(4);

      mockClient.verifyRequest(0, 'POST', `${BASE}/upload/v1beta/files?key=test-key`);
      expect(mockClient.getHeader(0, 'X-Goog-Upload-Protocol')).toBe('resumable');
      expect(mockClient.getHeader(0, 'X-Goog-Upload-Command')).toBe('start');
      expect(mockClient.getHeader(0, 'X-Goog-Upload-Header-Content-Length')).toBe('5');
      expect(mockClient.getHeader(0, 'X-Goog-Upload-Header-Content-Type')).toBe('text/plain');
      expect(mockClient.getJsonBody(0)).toEqual({ file: { display_name: 'notes.txt' } });

      mockClient.verifyRequest(1, 'PUT', UPLOAD_SESSION);
      expect(mockClient.getHeader(1, 'Content-Length')).toBe('5');
      expect(mockClient.getHeader(1, 'X-Goog-Upload-Offset')).toBe('0');
      expect(mockClient.getHeader(1, 'X-Goog-Upload-Command')).toBe('upload, finalize');
      expect(mockClient.getRequests()[1]?.options.body).toEqual(new Uint8Array(bytes));

      mockClient.verifyRequest(2, 'GET', `${BASE}/v1beta/files/abc?key=test-key`);
      mockClient.verifyRequest(3, 'GET', `${BASE}/v1beta/files/abc?key=test-key`);
    });

    it('should fail without an upload session URL', async () => {
      mockClient.enqueueResponse({ status: 200, body: '' });

      await expect(
        service.upload({ displayName: 'notes.txt', bytes, mimeType: 'text/plain' })
      ).rejects.toThrow('Upload of notes.txt failed: X-Goog-Upload-URL header not found');
      mockClient.verifyRequestCount(1);
    });

    it('should fail when the finalized upload has no file', async () => {
      enqueueUploadSession();
      mockClient.enqueueJsonResponse(200, {});

      const error = await service
        .upload({ displayName: 'notes.txt', bytes, mimeType: 'text/plain' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FileUploadError);
      expect(error).toMatchObject({ message: 'Upload of notes.txt failed: File data not found', fileName: 'notes.txt' });
    });

    it('should reject empty data', async () => {
      await expect(
        service.upload({ displayName: 'empty.txt', bytes: new Uint8Array(0), mimeType: 'text/plain' })
      ).rejects.toThrow(ValidationError);
      mockClient.verifyRequestCount(0);
    });

    it('should reject a missing MIME type', async () => {
      await expect(service.upload({ displayName: 'notes', bytes, mimeType: '' })).rejects.toThrow(ValidationError);
    });
  });

  describe('waitForActive', () => {
    it('should return an active file at once', async () => {
      mockClient.enqueueJsonResponse(200, remoteFile());

      await expect(service.waitForActive('files/abc')).resolves.toEqual(remoteFile());
      mockClient.verifyRequestCount(1);
    });

    it('should report a failed file with its error message', async () => {
      mockClient.enqueueJsonResponse(200, remoteFile({ state: 'FAILED', error: { code: 3, message: 'Unsupported video codec' } }));

      await expect(service.waitForActive('files/abc')).rejects.toThrow(
        'File processing failed for files/abc: Unsupported video codec'
      );
    });

    it('should report a failed file without details', async () => {
      mockClient.enqueueJsonResponse(200, remoteFile({ state: 'FAILED' }));

      await expect(service.waitForActive('files/abc')).rejects.toThrow(
        'File processing failed for files/abc: File processing failed'
      );
    });

    it('should reject an unknown state', async () => {
      mockClient.enqueueJsonResponse(200, remoteFile({ state: 'STATE_UNSPECIFIED' }));

      await expect(service.waitForActive('files/abc')).rejects.toThrow(
        'File processing failed for files/abc: File processing unknown state'
      );
    });

    it('should give up after the configured number of waits', async () => {
      for (let i = 0; i < 4; i++) {
        mockClient.enqueueJsonResponse(200, remoteFile({ state: 'PROCESSING' }));
      }

      const error = await service.waitForActive('files/abc').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FileProcessingError);
      expect(error).toMatchObject({ message: 'File processing failed for files/abc: File processing timeout' });
      mockClient.verifyRequestCount(4);
      expect(mockClient.pending).toBe(0);
    });
  });

  describe('list', () => {
    it('should pass paging parameters', async () => {
      mockClient.enqueueJsonResponse(200, { files: [remoteFile()], nextPageToken: 'next' });

      const page = await service.list({ pageSize: 2, pageToken: 'start' });

      expect(page).toEqual({ files: [remoteFile()], nextPageToken: 'next' });
      expect(mockClient.getLastRequest()?.url).toBe(
        `${BASE}/v1beta/files?key=test-key&pageSize=2&pageToken=start`
      );
    });

    it('should reject a non-positive page size', async () => {
      await expect(service.list({ pageSize: 0 })).rejects.toThrow(ValidationError);
    });

    it('should follow page tokens in listAll', async () => {
      const second = remoteFile({ name: 'files/def', uri: `${BASE}/v1beta/files/def` });
      mockClient.enqueueJsonResponse(200, { files: [remoteFile()], nextPageToken: 'next' });
      mockClient.enqueueJsonResponse(200, { files: [second] });

      const files = await service.listAll();

      expect(files).toEqual([remoteFile(), second]);
      expect(mockClient.getRequests()[1]?.url).toBe(`${BASE}/v1beta/files?key=test-key&pageToken=next`);
    });

    it('should stop when a page has no files', async () => {
      mockClient.enqueueJsonResponse(200, {});

      await expect(service.listAll()).resolves.toEqual([]);
      mockClient.verifyRequestCount(1);
    });
  });

  describe('get and delete', () => {
    it('should add the files/ prefix to bare ids', async () => {
      mockClient.enqueueJsonResponse(200, remoteFile());

      await service.get('abc');

      expect(mockClient.getLastRequest()?.url).toBe(`${BASE}/v1beta/files/abc?key=test-key`);
    });

    it('should map a missing file', async () => {
      mockClient.enqueueErrorResponse(404, 'File abc not found', 'NOT_FOUND');

      await expect(service.get('files/abc')).rejects.toThrow(NotFoundError);
    });

    it('should delete by name', async () => {
      mockClient.enqueueJsonResponse(200, {});

      await service.delete('abc');

      mockClient.verifyRequest(0, 'DELETE', `${BASE}/v1beta/files/abc?key=test-key`);
    });
  });

  describe('normalizeFileName', () => {
    it('should keep full names', () => {
      expect(normalizeFileName('files/abc')).toBe('files/abc');
      expect(normalizeFileName('abc')).toBe('files/abc');
    });

    it('should reject empty names', () => {
      expect(() => normalizeFileName('')).toThrow(ValidationError);
    });
  });
});
