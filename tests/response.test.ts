/**
 * Response reader tests
 */

import { describe, it, expect } from 'vitest';
import {
  getCandidates,
  getContentText,
  getFeedback,
  getResults,
  getSafetyRatingSummary,
  getText,
  getUsageMetadata,
  hasSafetyConcerns,
  isCandidateBlocked,
} from '../src/response/index.js';
import type { GenerateContentResponse } from '../src/types/index.js';
import { textResponse } from './helpers.js';

const response: GenerateContentResponse = {
  candidates: [
    {
      content: {
        role: 'model',
        parts: [{ inlineData: { mimeType: 'image/png', data: 'aGVsbG8=' } }, { text: 'First' }, { text: 'Second' }],
      },
      finishReason: 'STOP',
      index: 0,
    },
    { finishReason: 'SAFETY', index: 1 },
    {
      content: { role: 'model', parts: [{ inlineData: { mimeType: 'image/png', data: 'aGVsbG8=' } }] },
      index: 2,
    },
    { content: { role: 'model', parts: [{ text: 'Third' }] }, index: 3 },
  ],
  usageMetadata: { promptTokenCount: 3, candidatesTokenCount: 7, totalTokenCount: 10 },
};

describe('response readers', () => {
  it('should read the first text of each candidate', () => {
    expect(getResults(response)).toEqual(['First', 'Third']);
  });

  it('should read the first candidate text', () => {
    expect(getText(response)).toBe('First');
    expect(getText({})).toBeUndefined();
  });

  it('should find the first text part of a content', () => {
    expect(getContentText({ parts: [{ fileData: { fileUri: 'https://files.example.test/1' } }, { text: 'x' }] })).toBe(
      'x'
    );
    expect(getContentText({ parts: [] })).toBeUndefined();
  });

  it('should expose candidates, usage and feedback', () => {
    expect(getCandidates(response)).toHaveLength(4);
    expect(getCandidates({})).toEqual([]);
    expect(getUsageMetadata(response)).toEqual({ promptTokenCount: 3, candidatesTokenCount: 7, totalTokenCount: 10 });
    expect(getFeedback(response)).toBeUndefined();
    expect(getFeedback({ promptFeedback: { blockReason: 'BLOCKLIST' } })).toBe('BLOCKLIST');
  });
});

describe('safety helpers', () => {
  it('should flag blocked candidates', () => {
    expect(isCandidateBlocked({ finishReason: 'SAFETY' })).toBe(true);
    expect(isCandidateBlocked({ finishReason: 'RECITATION' })).toBe(true);
    expect(isCandidateBlocked({ finishReason: 'STOP' })).toBe(false);
    expect(isCandidateBlocked({})).toBe(false);
  });

  it('should detect safety concerns from ratings', () => {
    expect(
      hasSafetyConcerns(
        textResponse('Hi', {
          safetyRatings: [{ category: 'HARM_CATEGORY_HARASSMENT', probability: 'MEDIUM' }],
        })
      )
    ).toBe(true);
    expect(
      hasSafetyConcerns(
        textResponse('Hi', {
          safetyRatings: [{ category: 'HARM_CATEGORY_HARASSMENT', probability: 'NEGLIGIBLE' }],
        })
      )
    ).toBe(false);
  });

  it('should detect safety concerns from finish reasons and feedback', () => {
    expect(hasSafetyConcerns(textResponse('Hi', { finishReason: 'SPII' }))).toBe(true);
    expect(hasSafetyConcerns({ promptFeedback: { blockReason: 'OTHER' } })).toBe(true);
    expect(hasSafetyConcerns(textResponse('Hi'))).toBe(false);
  });

  it('should summarize safety state', () => {
    const rating = { category: 'HARM_CATEGORY_HATE_SPEECH', probability: 'LOW' };

    expect(getSafetyRatingSummary(response)).toEqual({
      promptBlocked: false,
      responseBlocked: true,
      ratings: [],
    });
    expect(getSafetyRatingSummary(textResponse('Hi', { safetyRatings: [rating] }))).toEqual({
      promptBlocked: false,
      responseBlocked: false,
      ratings: [rating],
    });
  });
});
