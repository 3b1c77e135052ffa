/**
 * Chunked JSON decoder for streamed generation responses.
 *
 * `streamGenerateContent` answers with one JSON array whose elements arrive
 * over time, not with Server-Sent Events:
 * [{"candidates":[...]}
 * ,{"candidates":[...],"usageMetadata":{...}}
 * ]
 *
 * The decoder pulls each top-level object out as soon as its closing brace
 * has arrived. Brackets, commas and whitespace between objects are skipped.
 */

import { MalformedChunkError } from '../error/index.js';

/** Largest object accepted when no limit is given (8 MiB) */
export const DEFAULT_MAX_OBJECT_SIZE = 8 * 1024 * 1024;

interface ScanState {
  pos: number;
  depth: number;
  inString: boolean;
  escapeNext: boolean;
}

function freshScan(): ScanState {
  return { pos: 0, depth: 0, inString: false, escapeNext: false };
}

function isDelimiter(char: string): boolean {
  return (
    char === ' ' ||
    char === '\n' ||
    char === '\r' ||
    char === '\t' ||
    char === ',' ||
    char === '[' ||
    char === ']'
  );
}

/**
 * Incremental parser for a streamed JSON array of objects.
 *
 * @example
 * ```typescript
 * const parser = new ChunkedJsonParser();
 *
 * parser.feed('[{"candidates":[{"content"');
 * // => [] (object still open)
 *
 * parser.feed(':{"parts":[{"text":"Hello"}]}}]');
 * // => [{ candidates: [{ content: { parts: [{ text: 'Hello' }] } }] }]
 * ```
 */
export class ChunkedJsonParser {
  private buffer = '';
  private scan: ScanState = freshScan();

  /**
   * @param maxObjectSize - Largest single object accepted, in bytes
   */
  constructor(private readonly maxObjectSize: number = DEFAULT_MAX_OBJECT_SIZE) {}

  /**
   * Feed decoded text and return every object completed by it.
   *
   * @throws {MalformedChunkError} On invalid JSON, an oversized object, or
   * anything other than an object between delimiters
   */
  feed(data: string): unknown[] {
    this.buffer += data;
    const results: unknown[] = [];

    for (let next = this.next(); next !== undefined; next = this.next()) {
      results.push(next.value);
    }

    return results;
  }

  /**
   * Finish the stream, returning a last object if one is buffered.
   *
   * @throws {MalformedChunkError} If an unfinished object or other bytes remain
   */
  flush(): unknown | null {
    const next = this.next();

    this.skipDelimiters();
    if (this.buffer.length > 0) {
      const excerpt = this.buffer.slice(0, 64);
      this.reset();
      throw new MalformedChunkError(`unexpected end of stream after '${excerpt}'`);
    }

    return next === undefined ? null : next.value;
  }

  /** Drop any buffered input. */
  reset(): void {
    this.buffer = '';
    this.scan = freshScan();
  }

  /** Number of characters waiting for the rest of an object. */
  get buffered(): number {
    return this.buffer.length;
  }

  private next(): { value: unknown } | undefined {
    if (this.scan.pos === 0) {
      this.skipDelimiters();
      if (this.buffer.length === 0) {
        return undefined;
      }
      if (this.buffer[0] !== '{') {
        throw new MalformedChunkError(`expected an object, found '${this.buffer.slice(0, 32)}'`);
      }
    }

    const end = this.findObjectEnd();
    if (end === -1) {
      // Characters never outnumber UTF-8 bytes.
      if (this.buffer.length > this.maxObjectSize) {
        throw new MalformedChunkError(`object exceeds ${this.maxObjectSize} bytes`);
      }
      return undefined;
    }

    const json = this.buffer.slice(0, end + 1);
    this.buffer = this.buffer.slice(end + 1);
    this.scan = freshScan();

    if (Buffer.byteLength(json, 'utf8') > this.maxObjectSize) {
      throw new MalformedChunkError(`object exceeds ${this.maxObjectSize} bytes`);
    }

    try {
      return { value: JSON.parse(json) };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MalformedChunkError(`invalid JSON object (${reason})`);
    }
  }

  /**
   * Continue scanning the buffered object from where the last feed stopped.
   * Returns the index of its closing brace, or -1 when it is still open.
   */
  private findObjectEnd(): number {
    const scan = this.scan;

    for (; scan.pos < this.buffer.length; scan.pos++) {
      const char = this.buffer[scan.pos];

      if (scan.escapeNext) {
        scan.escapeNext = false;
        continue;
      }

      if (scan.inString) {
        if (char === '\\') {
          scan.escapeNext = true;
        } else if (char === '"') {
          scan.inString = false;
        }
        continue;
      }

      switch (char) {
        case '"':
          scan.inString = true;
          break;
        case '{':
        case '[':
          scan.depth++;
          break;
        case '}':
        case ']':
          scan.depth--;
          if (scan.depth === 0) {
            return scan.pos;
          }
          break;
      }
    }

    return -1;
  }

  private skipDelimiters(): void {
    let i = 0;
    while (i < this.buffer.length && isDelimiter(this.buffer[i])) {
      i++;
    }
    if (i > 0) {
      this.buffer = this.buffer.slice(i);
    }
  }
}
