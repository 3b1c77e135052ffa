/**
 * Streaming support: chunked JSON decoding and chunk accumulation.
 */

export { ChunkedJsonParser, DEFAULT_MAX_OBJECT_SIZE } from './chunked-json.js';
export { StreamAccumulator, type AccumulatorOptions } from './accumulator.js';
