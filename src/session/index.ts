export { GemSession, type SendOptions } from './session.js';
export { GemSessionBuilder } from './builder.js';
