/**
 * Stream accumulator for combining streamed response chunks.
 */

import type {
  Candidate,
  Content,
  GenerateContentResponse,
  Part,
  PromptFeedback,
  UsageMetadata,
} from '../types/index.js';
import { isTextPart } from '../types/index.js';

/**
 * Options for stream accumulation.
 */
export interface AccumulatorOptions {
  /**
   * Whether to join adjacent text parts of a candidate into one.
   * @default true
   */
  mergeTextParts?: boolean;
}

function copyCandidate(candidate: Candidate): Candidate {
  const copy: Candidate = { ...candidate };
  if (candidate.content) {
    copy.content = {
      ...candidate.content,
      parts: candidate.content.parts.map((part) => ({ ...part })),
    };
  }
  return copy;
}

/**
 * Combines the chunks of one streamed response.
 *
 * Candidates are merged by index. Text is concatenated; finish reason, safety
 * ratings, token count and usage metadata keep the last value seen.
 *
 * @example
 * ```typescript
 * const accumulator = new StreamAccumulator();
 *
 * for await (const chunk of stream) {
 *   accumulator.add(chunk);
 * }
 *
 * console.log(accumulator.text());
 * ```
 */
export class StreamAccumulator {
  private candidates = new Map<number, Candidate>();
  private usageMetadata?: UsageMetadata;
  private promptFeedback?: PromptFeedback;
  private modelVersion?: string;
  private chunks = 0;
  private readonly mergeTextParts: boolean;

  constructor(options: AccumulatorOptions = {}) {
    this.mergeTextParts = options.mergeTextParts ?? true;
  }

  /**
   * Add a chunk to the accumulator. The chunk itself is not modified.
   */
  add(chunk: GenerateContentResponse): void {
    this.chunks++;

    if (chunk.modelVersion) {
      this.modelVersion = chunk.modelVersion;
    }
    if (chunk.usageMetadata) {
      this.usageMetadata = { ...this.usageMetadata, ...chunk.usageMetadata };
    }
    if (chunk.promptFeedback) {
      this.promptFeedback = chunk.promptFeedback;
    }

    for (const candidate of chunk.candidates ?? []) {
      this.addCandidate(candidate);
    }
  }

  private addCandidate(candidate: Candidate): void {
    const index = candidate.index ?? 0;
    const existing = this.candidates.get(index);

    if (!existing) {
      this.candidates.set(index, copyCandidate(candidate));
      return;
    }

    if (candidate.content) {
      if (!existing.content) {
        existing.content = { parts: [] };
      }
      for (const part of candidate.content.parts) {
        this.addPart(existing.content, part);
      }
      if (candidate.content.role) {
        existing.content.role = candidate.content.role;
      }
    }

    if (candidate.finishReason) {
      existing.finishReason = candidate.finishReason;
    }
    if (candidate.safetyRatings) {
      existing.safetyRatings = candidate.safetyRatings;
    }
    if (candidate.tokenCount !== undefined) {
      existing.tokenCount = candidate.tokenCount;
    }
  }

  private addPart(content: Content, part: Part): void {
    const lastPart = content.parts[content.parts.length - 1];

    if (this.mergeTextParts && isTextPart(part) && lastPart && isTextPart(lastPart)) {
      lastPart.text += part.text;
      return;
    }

    content.parts.push({ ...part });
  }

  /**
   * Build the combined response.
   */
  build(): GenerateContentResponse {
    const candidates = Array.from(this.candidates.values())
      .sort((a, b) => (a.index ?? 0) - (b.index ?? 0))
      .map(copyCandidate);

    const response: GenerateContentResponse = {};

    if (candidates.length > 0) {
      response.candidates = candidates;
    }
    if (this.promptFeedback) {
      response.promptFeedback = this.promptFeedback;
    }
    if (this.usageMetadata) {
      response.usageMetadata = { ...this.usageMetadata };
    }
    if (this.modelVersion) {
      response.modelVersion = this.modelVersion;
    }

    return response;
  }

  /**
   * Text of the first candidate so far, or an empty string.
   */
  text(): string {
    const [first] = Array.from(this.candidates.keys()).sort((a, b) => a - b);
    const candidate = first === undefined ? undefined : this.candidates.get(first);

    return (candidate?.content?.parts ?? [])
      .filter(isTextPart)
      .map((part) => part.text)
      .join('');
  }

  reset(): void {
    this.candidates.clear();
    this.usageMetadata = undefined;
    this.promptFeedback = undefined;
    this.modelVersion = undefined;
    this.chunks = 0;
  }

  /** Number of chunks added so far. */
  get chunkCount(): number {
    return this.chunks;
  }

  get isEmpty(): boolean {
    return this.candidates.size === 0;
  }
}
