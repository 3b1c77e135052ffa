/**
 * File-related types for the Gemini API.
 */

/** File processing state */
export type FileState = 'STATE_UNSPECIFIED' | 'PROCESSING' | 'ACTIVE' | 'FAILED';

export const FILE_STATES = [
  'STATE_UNSPECIFIED',
  'PROCESSING',
  'ACTIVE',
  'FAILED',
] as const satisfies readonly FileState[];

/** Status attached to a file that failed processing */
export interface FileStatus {
  code?: number;
  message?: string;
}

/** File metadata */
export interface GeminiFile {
  /** Resource name, `files/{id}` */
  name: string;
  uri: string;
  mimeType: string;
  displayName?: string;
  sizeBytes?: string;
  createTime?: string;
  updateTime?: string;
  expirationTime?: string;
  sha256Hash?: string;
  state?: FileState;
  error?: FileStatus;
  videoMetadata?: {
    videoDuration?: string;
  };
}

/** Request for file upload */
export interface UploadFileRequest {
  displayName: string;
  bytes: Uint8Array;
  mimeType: string;
}

/** Parameters for listing files */
export interface ListFilesParams {
  pageSize?: number;
  pageToken?: string;
}

/** Response from listing files */
export interface ListFilesResponse {
  files?: GeminiFile[];
  nextPageToken?: string;
}
