/**
 * Runtime schemas for API response bodies.
 *
 * Every body the client reads is checked against one of these before it is
 * handed out as a typed value.
 */

import { z } from 'zod';
import { DeserializationError } from '../error/index.js';
import type { ApiErrorDetail } from '../error/index.js';
import type { Blob, Content, FileData, Part } from './content.js';
import type { SafetyRating } from './safety.js';
import type {
  Candidate,
  GenerateContentResponse,
  PromptFeedback,
  UsageMetadata,
} from './generation.js';
import { BLOCK_REASONS, FINISH_REASONS } from './generation.js';
import type { GeminiFile, ListFilesResponse } from './files.js';
import { FILE_STATES } from './files.js';

/** Schema whose input is an arbitrary decoded JSON value. */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// ============================================================================
// Content
// ============================================================================

export const BlobSchema: Schema<Blob> = z.object({
  mimeType: z.string(),
  data: z.string(),
});

export const FileDataSchema: Schema<FileData> = z.object({
  mimeType: z.string().optional(),
  fileUri: z.string(),
});

export const PartSchema: Schema<Part> = z.union([
  z.object({ text: z.string() }),
  z.object({ inlineData: BlobSchema }),
  z.object({ fileData: FileDataSchema }),
]);

export const ContentSchema: Schema<Content> = z.object({
  role: z.enum(['user', 'model']).optional(),
  parts: z.array(PartSchema).default([]),
});

// ============================================================================
// Generation
// ============================================================================

export const SafetyRatingSchema: Schema<SafetyRating> = z.object({
  category: z.string().optional(),
  probability: z.string().optional(),
  blocked: z.boolean().optional(),
});

export const PromptFeedbackSchema: Schema<PromptFeedback> = z.object({
  blockReason: z.enum(BLOCK_REASONS).optional(),
  safetyRatings: z.array(SafetyRatingSchema).optional(),
});

export const UsageMetadataSchema: Schema<UsageMetadata> = z.object({
  promptTokenCount: z.number().int().optional(),
  cachedContentTokenCount: z.number().int().optional(),
  candidatesTokenCount: z.number().int().optional(),
  totalTokenCount: z.number().int().optional(),
});

export const CandidateSchema: Schema<Candidate> = z.object({
  content: ContentSchema.optional(),
  finishReason: z.enum(FINISH_REASONS).optional(),
  safetyRatings: z.array(SafetyRatingSchema).optional(),
  tokenCount: z.number().int().optional(),
  index: z.number().int().optional(),
});

export const GenerateContentResponseSchema: Schema<GenerateContentResponse> = z.object({
  candidates: z.array(CandidateSchema).optional(),
  promptFeedback: PromptFeedbackSchema.optional(),
  usageMetadata: UsageMetadataSchema.optional(),
  modelVersion: z.string().optional(),
});

// ============================================================================
// Files
// ============================================================================

export const GeminiFileSchema: Schema<GeminiFile> = z.object({
  name: z.string(),
  uri: z.string(),
  mimeType: z.string(),
  displayName: z.string().optional(),
  sizeBytes: z.string().optional(),
  createTime: z.string().optional(),
  updateTime: z.string().optional(),
  expirationTime: z.string().optional(),
  sha256Hash: z.string().optional(),
  state: z.enum(FILE_STATES).optional(),
  error: z
    .object({
      code: z.number().int().optional(),
      message: z.string().optional(),
    })
    .optional(),
  videoMetadata: z.object({ videoDuration: z.string().optional() }).optional(),
});

export const UploadedFileEnvelopeSchema: Schema<{ file?: GeminiFile }> = z.object({
  file: GeminiFileSchema.optional(),
});

export const ListFilesResponseSchema: Schema<ListFilesResponse> = z.object({
  files: z.array(GeminiFileSchema).optional(),
  nextPageToken: z.string().optional(),
});

// ============================================================================
// Errors
// ============================================================================

export const ApiErrorBodySchema: Schema<{ error: ApiErrorDetail }> = z.object({
  error: z.object({
    code: z.number().int(),
    message: z.string(),
    status: z.string(),
    details: z.array(z.unknown()).optional(),
  }),
});

// ============================================================================
// Parsing
// ============================================================================

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validates an already-decoded value against a schema.
 *
 * @throws {DeserializationError} If the value does not match
 */
export function parseValue<T>(data: unknown, schema: Schema<T>, label: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new DeserializationError(`${label}: ${describeIssues(result.error)}`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}

/**
 * Decodes a JSON body and validates it against a schema.
 *
 * @throws {DeserializationError} If the text is not JSON or does not match
 */
export function parseJson<T>(text: string, schema: Schema<T>, label: string): T {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DeserializationError(`${label} is not valid JSON (${reason})`, {
      body: text.slice(0, 512),
    });
  }
  return parseValue(data, schema, label);
}
