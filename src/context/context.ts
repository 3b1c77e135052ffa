/**
 * Conversation history and request building.
 */

import type {
  Blob,
  Content,
  FileData,
  GenerateContentRequest,
  GenerationConfig,
  Part,
  Role,
  SafetySetting,
} from '../types/index.js';
import { DEFAULT_HARM_CATEGORIES } from '../types/index.js';
import type { Settings } from './settings.js';

/** Generation config sent when none is set */
export const DEFAULT_GENERATION_CONFIG: Readonly<GenerationConfig> = {
  maxOutputTokens: 8192,
  temperature: 1.0,
};

/** Safety settings sent when none are set: every standard category at BLOCK_NONE */
export function defaultSafetySettings(): SafetySetting[] {
  return DEFAULT_HARM_CATEGORIES.map((category) => ({ category, threshold: 'BLOCK_NONE' }));
}

function copyContent(content: Content): Content {
  const parts = content.parts.map((part) => ({ ...part }));
  return content.role === undefined ? { parts } : { role: content.role, parts };
}

/**
 * An append-only list of conversation turns.
 *
 * @example
 * ```typescript
 * const context = new Context();
 * context.pushMessage('user', 'Hello');
 * const request = context.build(new Settings());
 * ```
 */
export class Context {
  private turns: Content[] = [];

  /** Creates a context holding copies of existing turns. */
  static from(contents: readonly Content[]): Context {
    const context = new Context();
    context.turns = contents.map(copyContent);
    return context;
  }

  get length(): number {
    return this.turns.length;
  }

  get contents(): readonly Content[] {
    return this.turns;
  }

  pushMessage(role: Role | undefined, text: string): void {
    this.push(role, [{ text }]);
  }

  pushFile(role: Role | undefined, fileData: FileData): void {
    this.push(role, [{ fileData }]);
  }

  pushBlob(role: Role | undefined, blob: Blob): void {
    this.push(role, [{ inlineData: blob }]);
  }

  pushMessageWithFile(role: Role | undefined, text: string, fileData: FileData): void {
    this.push(role, [{ text }, { fileData }]);
  }

  pushMessageWithBlob(role: Role | undefined, text: string, blob: Blob): void {
    this.push(role, [{ text }, { inlineData: blob }]);
  }

  /**
   * Builds the request body for the current history.
   */
  build(settings: Settings): GenerateContentRequest {
    const request: GenerateContentRequest = {
      contents: this.turns.map(copyContent),
      safetySettings: settings.safetySettings
        ? settings.safetySettings.map((s) => ({ ...s }))
        : defaultSafetySettings(),
      generationConfig: settings.generationConfig
        ? { ...settings.generationConfig }
        : { ...DEFAULT_GENERATION_CONFIG },
    };

    if (settings.systemInstruction !== undefined) {
      request.systemInstruction = { parts: [{ text: settings.systemInstruction }] };
    }

    return request;
  }

  clear(): void {
    this.turns = [];
  }

  isEmpty(): boolean {
    return this.turns.length === 0;
  }

  lastTurn(): Content | undefined {
    return this.turns[this.turns.length - 1];
  }

  /** Removes and returns the last turn. */
  popTurn(): Content | undefined {
    return this.turns.pop();
  }

  private push(role: Role | undefined, parts: Part[]): void {
    this.turns.push(role === undefined ? { parts } : { role, parts });
  }
}
