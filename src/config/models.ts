/**
 * Model identifiers accepted by the session.
 */

import { ValidationError } from '../error/index.js';

/** Known models, keyed by a stable constant name. */
export const Models = {
  Gemini15ProExp0827: 'gemini-1.5-pro-exp-0827',
  Gemini15FlashExp0827: 'gemini-1.5-flash-exp-0827',
  Gemini15Flash8bExp0827: 'gemini-1.5-flash-8b-exp-0827',
  Gemini15Pro: 'gemini-1.5-pro',
  Gemini2FlashExp: 'gemini-2.0-flash-exp',
  Gemini2Flash: 'gemini-2.0-flash',
  Gemini2FlashLite: 'gemini-2.0-flash-lite',
  Gemini2FlashThinkingExp: 'gemini-2.0-flash-thinking-exp-01-21',
  Gemini2ProExp1206: 'gemini-exp-1206',
  Gemini2ProExp: 'gemini-2.0-pro-exp-02-05',
  Gemini25ProExp: 'gemini-2.5-pro-preview-05-06',
  Gemini15Flash: 'gemini-1.5-flash',
  Gemini10Pro: 'gemini-1.0-pro',
  Gemma2_2bIt: 'gemma-2-2b-it',
  Gemma2_9bIt: 'gemma-2-9b-it',
  Gemma2_27bIt: 'gemma-2-27b-it',
} as const;

/** One of the known model names. */
export type KnownModel = (typeof Models)[keyof typeof Models];

/** A known model name or any custom one. */
export type ModelId = KnownModel | (string & {});

export const DEFAULT_MODEL: KnownModel = Models.Gemini2Flash;

const KNOWN_MODELS: ReadonlySet<string> = new Set(Object.values(Models));

/** Whether `model` is one of the known model names. */
export function isKnownModel(model: string): model is KnownModel {
  return KNOWN_MODELS.has(model);
}

/**
 * Returns the name the API expects for a model. Double quotes are removed
 * from custom names.
 *
 * @throws {ValidationError} If the name is empty
 */
export function modelName(model: ModelId): string {
  const name = isKnownModel(model) ? model : model.replace(/"/g, '');

  if (name.trim().length === 0) {
    throw new ValidationError('Invalid model name', [
      {
        field: 'model',
        description: 'Model name cannot be empty or whitespace',
        value: model,
      },
    ]);
  }

  return name;
}
