/**
 * Usability and safety checks for generation responses.
 */

import {
  AllCandidatesBlockedError,
  EmptyResponseError,
  PromptBlockedError,
} from '../error/index.js';
import type {
  Candidate,
  FinishReason,
  GenerateContentResponse,
  SafetyRating,
} from '../types/index.js';

/** Finish reasons that mean the candidate was withheld */
const BLOCKING_FINISH_REASONS: ReadonlySet<FinishReason> = new Set<FinishReason>([
  'SAFETY',
  'RECITATION',
  'PROHIBITED_CONTENT',
]);

/** Finish reasons reported as a safety concern */
const CONCERN_FINISH_REASONS: ReadonlySet<FinishReason> = new Set<FinishReason>([
  'SAFETY',
  'RECITATION',
  'PROHIBITED_CONTENT',
  'BLOCKLIST',
  'SPII',
]);

/**
 * Checks that a complete response can be read.
 *
 * @throws {PromptBlockedError} If there is no usable candidate and prompt
 * feedback gives a block reason
 * @throws {EmptyResponseError} If there are no candidates at all
 * @throws {AllCandidatesBlockedError} If no candidate carries content
 */
export function checkResponseUsable(response: GenerateContentResponse): void {
  const candidates = response.candidates ?? [];
  const blockReason = response.promptFeedback?.blockReason;

  if (candidates.length > 0 && candidates.some((candidate) => candidate.content !== undefined)) {
    return;
  }

  if (blockReason) {
    throw new PromptBlockedError(blockReason);
  }

  if (candidates.length === 0) {
    throw new EmptyResponseError();
  }

  throw new AllCandidatesBlockedError();
}

/**
 * Checks one streamed chunk. Chunks may omit candidates, so only a prompt
 * block is an error here.
 *
 * @throws {PromptBlockedError} If prompt feedback gives a block reason
 */
export function checkChunkUsable(chunk: GenerateContentResponse): void {
  const blockReason = chunk.promptFeedback?.blockReason;
  if (blockReason && (chunk.candidates ?? []).every((c) => c.content === undefined)) {
    throw new PromptBlockedError(blockReason);
  }
}

/** Whether a candidate stopped for safety, recitation or prohibited content. */
export function isCandidateBlocked(candidate: Candidate): boolean {
  return candidate.finishReason !== undefined && BLOCKING_FINISH_REASONS.has(candidate.finishReason);
}

/**
 * Checks if a response has any safety concerns (non-throwing).
 */
export function hasSafetyConcerns(response: GenerateContentResponse): boolean {
  if (response.promptFeedback?.blockReason) {
    return true;
  }

  return (response.candidates ?? []).some(
    (candidate) =>
      (candidate.finishReason !== undefined && CONCERN_FINISH_REASONS.has(candidate.finishReason)) ||
      (candidate.safetyRatings ?? []).some(
        (rating) => rating.blocked === true || rating.probability === 'HIGH' || rating.probability === 'MEDIUM'
      )
  );
}

/** Summary returned by {@link getSafetyRatingSummary}. */
export interface SafetyRatingSummary {
  promptBlocked: boolean;
  responseBlocked: boolean;
  ratings: SafetyRating[];
}

/**
 * Collects the safety state of a response, for logging.
 */
export function getSafetyRatingSummary(response: GenerateContentResponse): SafetyRatingSummary {
  const candidates = response.candidates ?? [];

  return {
    promptBlocked: response.promptFeedback?.blockReason !== undefined,
    responseBlocked: candidates.some(
      (candidate) => candidate.finishReason !== undefined && CONCERN_FINISH_REASONS.has(candidate.finishReason)
    ),
    ratings: candidates.flatMap((candidate) => candidate.safetyRatings ?? []),
  };
}
