/**
 * Readers for generation responses.
 */

import type {
  BlockReason,
  Candidate,
  Content,
  GenerateContentResponse,
  UsageMetadata,
} from '../types/index.js';
import { isTextPart } from '../types/index.js';

export { blockReasonLabel } from '../types/index.js';
export {
  isCandidateBlocked,
  hasSafetyConcerns,
  getSafetyRatingSummary,
  type SafetyRatingSummary,
} from '../services/safety.js';

/** Candidates of a response, empty when there are none. */
export function getCandidates(response: GenerateContentResponse): Candidate[] {
  return response.candidates ?? [];
}

/** First text part of a content, if it has one. */
export function getContentText(content: Content): string | undefined {
  return content.parts.find(isTextPart)?.text;
}

/** First text of every candidate that has one, in candidate order. */
export function getResults(response: GenerateContentResponse): string[] {
  const results: string[] = [];
  for (const candidate of getCandidates(response)) {
    const text = candidate.content ? getContentText(candidate.content) : undefined;
    if (text !== undefined) {
      results.push(text);
    }
  }
  return results;
}

/** First text of the first candidate. */
export function getText(response: GenerateContentResponse): string | undefined {
  const content = response.candidates?.[0]?.content;
  return content ? getContentText(content) : undefined;
}

export function getUsageMetadata(response: GenerateContentResponse): UsageMetadata | undefined {
  return response.usageMetadata;
}

/** Why the prompt was blocked, if it was. */
export function getFeedback(response: GenerateContentResponse): BlockReason | undefined {
  return response.promptFeedback?.blockReason;
}
