/**
 * Content-related types for the Gemini API.
 */

// ============================================================================
// Content Parts
// ============================================================================

/** Text content part */
export interface TextPart {
  text: string;
}

/** Inline binary data */
export interface Blob {
  mimeType: string;
  /** Base64-encoded bytes */
  data: string;
}

/** Inline data part */
export interface InlineDataPart {
  inlineData: Blob;
}

/** Reference to an uploaded file */
export interface FileData {
  mimeType?: string;
  fileUri: string;
}

/** File data part */
export interface FileDataPart {
  fileData: FileData;
}

/** Union of all part types */
export type Part = TextPart | InlineDataPart | FileDataPart;

// ============================================================================
// Content and Roles
// ============================================================================

/** Role of a conversation turn */
export type Role = 'user' | 'model';

/** One conversation turn */
export interface Content {
  role?: Role;
  parts: Part[];
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Builds an inline blob from raw bytes.
 *
 * @example
 * ```typescript
 * const blob = createBlob('image/png', await readFile('chart.png'));
 * ```
 */
export function createBlob(mimeType: string, bytes: Uint8Array): Blob {
  return {
    mimeType,
    data: Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64'),
  };
}

/** Builds a file reference. */
export function createFileData(fileUri: string, mimeType?: string): FileData {
  return mimeType === undefined ? { fileUri } : { mimeType, fileUri };
}

// ============================================================================
// Type Guards
// ============================================================================

/** Check if a part is a text part */
export function isTextPart(part: Part): part is TextPart {
  return 'text' in part;
}

/** Check if a part is an inline data part */
export function isInlineDataPart(part: Part): part is InlineDataPart {
  return 'inlineData' in part;
}

/** Check if a part is a file data part */
export function isFileDataPart(part: Part): part is FileDataPart {
  return 'fileData' in part;
}
