/**
 * Conversation session over the generation API.
 */

import { HttpClient } from '../client/index.js';
import type { ModelId, ResolvedSessionConfig } from '../config/index.js';
import { modelName } from '../config/index.js';
import { Context, Settings } from '../context/index.js';
import { EmptyResponseError } from '../error/index.js';
import type { Logger } from '../observability/logging.js';
import { getContentText } from '../response/index.js';
import type { ContentService, ContentStream } from '../services/index.js';
import { ContentServiceImpl, FileManager, FilesServiceImpl } from '../services/index.js';
import { StreamAccumulator } from '../streaming/index.js';
import type { Blob, FileData, GenerateContentResponse, Role } from '../types/index.js';
import { GemSessionBuilder } from './builder.js';

/** Options shared by every send operation. */
export interface SendOptions {
  /** Role of the pushed turn (default: `user`) */
  role?: Role;
  /** Settings for this call (default: a fresh `Settings`) */
  settings?: Settings;
}

/**
 * A conversation with one model.
 *
 * Each send pushes a turn onto the session's context, sends the whole history
 * and appends the model's reply, so the next send continues the conversation.
 *
 * @example
 * ```typescript
 * const session = GemSession.create(process.env.GEMINI_API_KEY ?? '');
 * const settings = new Settings();
 * settings.setAllSafetySettings('BLOCK_ONLY_HIGH');
 *
 * const response = await session.sendMessage('Hello! What is your name?', { settings });
 * console.log(getText(response));
 * ```
 */
export class GemSession {
  private readonly httpClient: HttpClient;
  private readonly contentService: ContentService;
  private readonly logger: Logger;
  private readonly wireModel: string;
  private _files?: FileManager;

  constructor(
    private readonly config: ResolvedSessionConfig,
    private readonly _context: Context = new Context()
  ) {
    this.logger = config.logger;
    this.wireModel = modelName(config.model);
    this.httpClient = new HttpClient(config, this.logger);
    this.contentService = new ContentServiceImpl(this.httpClient, this.logger);
  }

  /** Session with default settings. */
  static create(apiKey: string): GemSession {
    return new GemSessionBuilder().apiKey(apiKey).build();
  }

  static builder(): GemSessionBuilder {
    return new GemSessionBuilder();
  }

  /** The conversation history, mutable. */
  get context(): Context {
    return this._context;
  }

  get model(): ModelId {
    return this.config.model;
  }

  /** File cache sharing this session's configuration and HTTP client. */
  get files(): FileManager {
    if (!this._files) {
      this._files = new FileManager(new FilesServiceImpl(this.httpClient, this.config), this.config);
    }
    return this._files;
  }

  // ==========================================================================
  // Batch
  // ==========================================================================

  async sendMessage(message: string, options: SendOptions = {}): Promise<GenerateContentResponse> {
    this._context.pushMessage(options.role ?? 'user', message);
    return this.sendAndRecord(options.settings);
  }

  async sendFile(fileData: FileData, options: SendOptions = {}): Promise<GenerateContentResponse> {
    this._context.pushFile(options.role ?? 'user', fileData);
    return this.sendAndRecord(options.settings);
  }

  async sendBlob(blob: Blob, options: SendOptions = {}): Promise<GenerateContentResponse> {
    this._context.pushBlob(options.role ?? 'user', blob);
    return this.sendAndRecord(options.settings);
  }

  async sendMessageWithFile(
    message: string,
    fileData: FileData,
    options: SendOptions = {}
  ): Promise<GenerateContentResponse> {
    this._context.pushMessageWithFile(options.role ?? 'user', message, fileData);
    return this.sendAndRecord(options.settings);
  }

  async sendMessageWithBlob(
    message: string,
    blob: Blob,
    options: SendOptions = {}
  ): Promise<GenerateContentResponse> {
    this._context.pushMessageWithBlob(options.role ?? 'user', message, blob);
    return this.sendAndRecord(options.settings);
  }

  /**
   * Send the current history as is. Nothing is appended to it.
   */
  async sendContext(settings: Settings = new Settings()): Promise<GenerateContentResponse> {
    return this.contentService.generate(this.wireModel, this._context.build(settings));
  }

  // ==========================================================================
  // Streaming
  // ==========================================================================

  async sendMessageStream(message: string, options: SendOptions = {}): Promise<ContentStream> {
    this._context.pushMessage(options.role ?? 'user', message);
    return this.streamAndRecord(options.settings);
  }

  async sendFileStream(fileData: FileData, options: SendOptions = {}): Promise<ContentStream> {
    this._context.pushFile(options.role ?? 'user', fileData);
    return this.streamAndRecord(options.settings);
  }

  async sendBlobStream(blob: Blob, options: SendOptions = {}): Promise<ContentStream> {
    this._context.pushBlob(options.role ?? 'user', blob);
    return this.streamAndRecord(options.settings);
  }

  async sendMessageWithFileStream(
    message: string,
    fileData: FileData,
    options: SendOptions = {}
  ): Promise<ContentStream> {
    this._context.pushMessageWithFile(options.role ?? 'user', message, fileData);
    return this.streamAndRecord(options.settings);
  }

  async sendMessageWithBlobStream(
    message: string,
    blob: Blob,
    options: SendOptions = {}
  ): Promise<ContentStream> {
    this._context.pushMessageWithBlob(options.role ?? 'user', message, blob);
    return this.streamAndRecord(options.settings);
  }

  /**
   * Stream a response to the current history as is. Nothing is appended to it.
   */
  async sendContextStream(settings: Settings = new Settings()): Promise<ContentStream> {
    return this.contentService.generateStream(this.wireModel, this._context.build(settings), {
      maxJsonSize: settings.streamMaxJsonSize,
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async sendAndRecord(settings?: Settings): Promise<GenerateContentResponse> {
    const response = await this.sendContext(settings);

    const content = response.candidates?.[0]?.content;
    if (content) {
      const text = getContentText(content);
      if (text === undefined) {
        throw new EmptyResponseError('Response content has no text part');
      }
      this._context.pushMessage('model', text);
    }

    return response;
  }

  private async streamAndRecord(settings?: Settings): Promise<ContentStream> {
    const stream = await this.sendContextStream(settings);
    return this.recordStream(stream);
  }

  private async *recordStream(stream: ContentStream): AsyncGenerator<GenerateContentResponse> {
    const accumulator = new StreamAccumulator();

    for await (const chunk of stream) {
      accumulator.add(chunk);
      yield chunk;
    }

    const text = accumulator.text();
    if (text) {
      this._context.pushMessage('model', text);
    }
    this.logger.debug('Stream recorded', { chunks: accumulator.chunkCount, characters: text.length });
  }
}
