/**
 * Safety-related types for the Gemini API.
 */

/** Harm category for safety filtering */
export type HarmCategory =
  | 'HARM_CATEGORY_HATE_SPEECH'
  | 'HARM_CATEGORY_SEXUALLY_EXPLICIT'
  | 'HARM_CATEGORY_DANGEROUS_CONTENT'
  | 'HARM_CATEGORY_HARASSMENT'
  | 'HARM_CATEGORY_CIVIC_INTEGRITY';

/** Categories covered by `Settings.setAllSafetySettings` and the request defaults, in wire order. */
export const DEFAULT_HARM_CATEGORIES = [
  'HARM_CATEGORY_HATE_SPEECH',
  'HARM_CATEGORY_SEXUALLY_EXPLICIT',
  'HARM_CATEGORY_DANGEROUS_CONTENT',
  'HARM_CATEGORY_HARASSMENT',
] as const satisfies readonly HarmCategory[];

/** Threshold for blocking harmful content */
export type HarmBlockThreshold =
  | 'HARM_BLOCK_THRESHOLD_UNSPECIFIED'
  | 'BLOCK_LOW_AND_ABOVE'
  | 'BLOCK_MEDIUM_AND_ABOVE'
  | 'BLOCK_ONLY_HIGH'
  | 'BLOCK_NONE';

/** Safety setting configuration */
export interface SafetySetting {
  category: HarmCategory;
  threshold: HarmBlockThreshold;
}

/** Harm probability level */
export type HarmProbability =
  | 'HARM_PROBABILITY_UNSPECIFIED'
  | 'NEGLIGIBLE'
  | 'LOW'
  | 'MEDIUM'
  | 'HIGH';

/**
 * Safety rating attached to a candidate or to prompt feedback. The API reports
 * these loosely, so every field is an open string.
 */
export interface SafetyRating {
  category?: string;
  probability?: string;
  blocked?: boolean;
}
