/**
 * Core types for the session client.
 */

export * from './content.js';
export * from './safety.js';
export * from './generation.js';
export * from './files.js';
