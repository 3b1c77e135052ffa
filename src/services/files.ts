/**
 * Files service: resumable uploads and file metadata.
 */

import type {
  GeminiFile,
  ListFilesParams,
  ListFilesResponse,
  UploadFileRequest,
} from '../types/index.js';
import type { HttpClient } from '../client/index.js';
import type { ResolvedSessionConfig } from '../config/index.js';
import { FileProcessingError, FileUploadError, ValidationError } from '../error/index.js';
import {
  GeminiFileSchema,
  ListFilesResponseSchema,
  UploadedFileEnvelopeSchema,
} from '../types/schemas.js';
import { BaseServiceWithConfig } from './base.js';

/**
 * Service for file upload and management.
 */
export interface FilesService {
  /**
   * Upload a file with the resumable protocol and wait until it is ACTIVE.
   *
   * @throws {FileUploadError} If the upload session or the finalized file is missing
   * @throws {FileProcessingError} If the file fails processing or never becomes ACTIVE
   */
  upload(request: UploadFileRequest): Promise<GeminiFile>;

  /** List one page of uploaded files. */
  list(params?: ListFilesParams): Promise<ListFilesResponse>;

  /** List every uploaded file, following page tokens. */
  listAll(pageSize?: number): Promise<GeminiFile[]>;

  /** Get file metadata. */
  get(fileName: string): Promise<GeminiFile>;

  /** Delete a file. */
  delete(fileName: string): Promise<void>;

  /**
   * Poll a file until it reaches ACTIVE.
   *
   * @throws {FileProcessingError} On FAILED, on an unknown state, or when the
   * configured number of waits runs out
   */
  waitForActive(fileName: string): Promise<GeminiFile>;
}

/** Returns the resource name `files/{id}` for a bare id or a full name. */
export function normalizeFileName(fileName: string): string {
  if (!fileName) {
    throw new ValidationError('File name cannot be empty', [
      { field: 'name', description: 'File name cannot be empty' },
    ]);
  }
  return fileName.startsWith('files/') ? fileName : `files/${fileName}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Implementation of FilesService.
 */
export class FilesServiceImpl extends BaseServiceWithConfig implements FilesService {
  constructor(httpClient: HttpClient, config: ResolvedSessionConfig) {
    super(httpClient, config);
  }

  async upload(request: UploadFileRequest): Promise<GeminiFile> {
    if (request.bytes.length === 0) {
      throw new ValidationError('File data cannot be empty', [
        { field: 'bytes', description: 'File data cannot be empty' },
      ]);
    }
    if (!request.mimeType) {
      throw new ValidationError('MIME type is required', [
        { field: 'mimeType', description: 'MIME type is required' },
      ]);
    }

    const size = request.bytes.length.toString();
    this.logger.info('Uploading file', {
      displayName: request.displayName,
      mimeType: request.mimeType,
      sizeBytes: request.bytes.length,
    });

    // Open the upload session.
    const start = await this.fetchText(this.buildUploadUrl('files'), {
      method: 'POST',
      headers: {
        ...this.getHeaders('application/json'),
        'X-Goog-Upload-Protocol': 'resumable',
        'X-Goog-Upload-Command': 'start',
        'X-Goog-Upload-Header-Content-Length': size,
        'X-Goog-Upload-Header-Content-Type': request.mimeType,
      },
      body: JSON.stringify({ file: { display_name: request.displayName } }),
    });

    const uploadUrl = start.headers.get('x-goog-upload-url');
    if (!uploadUrl) {
      throw new FileUploadError(request.displayName, 'X-Goog-Upload-URL header not found');
    }

    // Send the bytes and finalize in one request.
    const envelope = await this.fetchJson(
      uploadUrl,
      {
        method: 'PUT',
        headers: {
          'Content-Length': size,
          'X-Goog-Upload-Offset': '0',
          'X-Goog-Upload-Command': 'upload, finalize',
        },
        body: new Uint8Array(request.bytes),
      },
      UploadedFileEnvelopeSchema,
      'Uploaded file'
    );

    if (!envelope.file) {
      throw new FileUploadError(request.displayName, 'File data not found');
    }

    const file = await this.waitForActive(envelope.file.name);
    this.logger.info('File uploaded', { name: file.name, uri: file.uri });
    return file;
  }

  async list(params: ListFilesParams = {}): Promise<ListFilesResponse> {
    if (params.pageSize !== undefined && params.pageSize < 1) {
      throw new ValidationError('PageSize must be positive', [
        { field: 'pageSize', description: 'Must be at least 1', value: params.pageSize },
      ]);
    }

    const queryParams: Record<string, string> = {};
    if (params.pageSize !== undefined) {
      queryParams.pageSize = params.pageSize.toString();
    }
    if (params.pageToken) {
      queryParams.pageToken = params.pageToken;
    }

    return this.fetchJson(
      this.buildUrl('files', queryParams),
      { method: 'GET', headers: this.getHeaders() },
      ListFilesResponseSchema,
      'ListFilesResponse'
    );
  }

  async listAll(pageSize?: number): Promise<GeminiFile[]> {
    const files: GeminiFile[] = [];
    let pageToken: string | undefined;

    do {
      const page = await this.list({ pageSize, pageToken });
      if (!page.files) {
        break;
      }
      files.push(...page.files);
      pageToken = page.nextPageToken || undefined;
    } while (pageToken);

    return files;
  }

  async get(fileName: string): Promise<GeminiFile> {
    return this.fetchJson(
      this.buildUrl(normalizeFileName(fileName)),
      { method: 'GET', headers: this.getHeaders() },
      GeminiFileSchema,
      'GeminiFile'
    );
  }

  async delete(fileName: string): Promise<void> {
    const name = normalizeFileName(fileName);
    await this.fetchText(this.buildUrl(name), {
      method: 'DELETE',
      headers: this.getHeaders(),
    });
    this.logger.info('File deleted', { name });
  }

  async waitForActive(fileName: string): Promise<GeminiFile> {
    for (let waits = 0; ; waits++) {
      const file = await this.get(fileName);

      if (file.state === 'ACTIVE') {
        return file;
      }
      if (file.state === 'FAILED') {
        throw new FileProcessingError(fileName, file.error?.message ?? 'File processing failed');
      }
      if (file.state !== 'PROCESSING') {
        throw new FileProcessingError(fileName, 'File processing unknown state');
      }
      if (waits >= this.config.filePollAttempts) {
        throw new FileProcessingError(fileName, 'File processing timeout');
      }

      this.logger.debug('File still processing', { name: fileName, waits: waits + 1 });
      await sleep(this.config.filePollInterval);
    }
  }
}
