/**
 * Generation request and response types for the Gemini API.
 */

import type { Content } from './content.js';
import type { SafetySetting, SafetyRating } from './safety.js';

/** Configuration for content generation */
export interface GenerationConfig {
  /** Up to five sequences that stop generation */
  stopSequences?: string[];
  /** MIME type of the generated text, e.g. `application/json` */
  responseMimeType?: string;
  maxOutputTokens?: number;
  /** Randomness, 0.0 to 2.0 */
  temperature?: number;
  topP?: number;
  topK?: number;
}

/** Why the model stopped producing a candidate */
export type FinishReason =
  | 'FINISH_REASON_UNSPECIFIED'
  | 'STOP'
  | 'MAX_TOKENS'
  | 'SAFETY'
  | 'RECITATION'
  | 'LANGUAGE'
  | 'OTHER'
  | 'BLOCKLIST'
  | 'PROHIBITED_CONTENT'
  | 'SPII'
  | 'MALFORMED_FUNCTION_CALL';

export const FINISH_REASONS = [
  'FINISH_REASON_UNSPECIFIED',
  'STOP',
  'MAX_TOKENS',
  'SAFETY',
  'RECITATION',
  'LANGUAGE',
  'OTHER',
  'BLOCKLIST',
  'PROHIBITED_CONTENT',
  'SPII',
  'MALFORMED_FUNCTION_CALL',
] as const satisfies readonly FinishReason[];

/** Why the prompt itself was blocked */
export type BlockReason =
  | 'BLOCK_REASON_UNSPECIFIED'
  | 'SAFETY'
  | 'OTHER'
  | 'BLOCKLIST'
  | 'PROHIBITED_CONTENT';

export const BLOCK_REASONS = [
  'BLOCK_REASON_UNSPECIFIED',
  'SAFETY',
  'OTHER',
  'BLOCKLIST',
  'PROHIBITED_CONTENT',
] as const satisfies readonly BlockReason[];

const BLOCK_REASON_LABELS: Record<BlockReason, string> = {
  BLOCK_REASON_UNSPECIFIED: 'Unspecified',
  SAFETY: 'Safety',
  OTHER: 'Other',
  BLOCKLIST: 'Blocklist',
  PROHIBITED_CONTENT: 'Prohibited Content',
};

/** Human-readable name of a block reason. */
export function blockReasonLabel(reason: BlockReason): string {
  return BLOCK_REASON_LABELS[reason];
}

/** Prompt feedback */
export interface PromptFeedback {
  blockReason?: BlockReason;
  safetyRatings?: SafetyRating[];
}

/** Token accounting for one call */
export interface UsageMetadata {
  promptTokenCount?: number;
  cachedContentTokenCount?: number;
  candidatesTokenCount?: number;
  totalTokenCount?: number;
}

/** Response candidate */
export interface Candidate {
  content?: Content;
  finishReason?: FinishReason;
  safetyRatings?: SafetyRating[];
  tokenCount?: number;
  index?: number;
}

/** Request body for generateContent and streamGenerateContent */
export interface GenerateContentRequest {
  contents: Content[];
  safetySettings?: SafetySetting[];
  generationConfig?: GenerationConfig;
  systemInstruction?: Content;
}

/** Response from content generation, or one streamed chunk of it */
export interface GenerateContentResponse {
  candidates?: Candidate[];
  promptFeedback?: PromptFeedback;
  usageMetadata?: UsageMetadata;
  modelVersion?: string;
}
