/**
 * Per-call generation and safety settings.
 */

import type {
  GenerationConfig,
  HarmBlockThreshold,
  HarmCategory,
  SafetySetting,
} from '../types/index.js';
import { DEFAULT_HARM_CATEGORIES } from '../types/index.js';
import { ValidationError } from '../error/index.js';

/** Largest streamed object accepted by default (8 MiB) */
export const DEFAULT_STREAM_MAX_JSON_SIZE = 8 * 1024 * 1024;

/**
 * Mutable settings applied when a context is built into a request.
 * Anything left unset falls back to the request defaults.
 *
 * @example
 * ```typescript
 * const settings = new Settings();
 * settings.setAllSafetySettings('BLOCK_ONLY_HIGH');
 * settings.setTemperature(0.2);
 * settings.setSystemInstruction('Answer in one sentence.');
 * ```
 */
export class Settings {
  private _safetySettings?: SafetySetting[];
  private _generationConfig?: GenerationConfig;
  private _systemInstruction?: string;
  private _streamMaxJsonSize = DEFAULT_STREAM_MAX_JSON_SIZE;

  get safetySettings(): readonly SafetySetting[] | undefined {
    return this._safetySettings;
  }

  get generationConfig(): Readonly<GenerationConfig> | undefined {
    return this._generationConfig;
  }

  get systemInstruction(): string | undefined {
    return this._systemInstruction;
  }

  get streamMaxJsonSize(): number {
    return this._streamMaxJsonSize;
  }

  /** Set the four standard harm categories to one threshold. */
  setAllSafetySettings(threshold: HarmBlockThreshold): void {
    this._safetySettings = DEFAULT_HARM_CATEGORIES.map((category) => ({ category, threshold }));
  }

  /** Replace the threshold of one category, adding it when absent. */
  setSafetySetting(category: HarmCategory, threshold: HarmBlockThreshold): void {
    const settings = (this._safetySettings ?? []).filter((s) => s.category !== category);
    settings.push({ category, threshold });
    this._safetySettings = settings;
  }

  /** Replace the whole generation config. */
  setAdvanceSettings(config: GenerationConfig): void {
    this._generationConfig = { ...config };
  }

  setTemperature(temperature: number): void {
    this.updateGenerationConfig({ temperature });
  }

  setMaxOutputTokens(maxOutputTokens: number): void {
    this.updateGenerationConfig({ maxOutputTokens });
  }

  setTopP(topP: number): void {
    this.updateGenerationConfig({ topP });
  }

  setTopK(topK: number): void {
    this.updateGenerationConfig({ topK });
  }

  setStopSequences(stopSequences: string[]): void {
    this.updateGenerationConfig({ stopSequences: [...stopSequences] });
  }

  setResponseMimeType(responseMimeType: string): void {
    this.updateGenerationConfig({ responseMimeType });
  }

  setSystemInstruction(instruction: string): void {
    this._systemInstruction = instruction;
  }

  clearSystemInstruction(): void {
    this._systemInstruction = undefined;
  }

  /**
   * Largest single object accepted from a streamed response, in bytes.
   *
   * @throws {ValidationError} If `bytes` is not a positive integer
   */
  setStreamMaxJsonSize(bytes: number): void {
    if (!Number.isInteger(bytes) || bytes <= 0) {
      throw new ValidationError('Invalid stream size limit', [
        {
          field: 'streamMaxJsonSize',
          description: 'Must be a positive integer',
          value: bytes,
        },
      ]);
    }
    this._streamMaxJsonSize = bytes;
  }

  private updateGenerationConfig(update: GenerationConfig): void {
    this._generationConfig = { ...this._generationConfig, ...update };
  }
}
