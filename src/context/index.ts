export { Context, DEFAULT_GENERATION_CONFIG, defaultSafetySettings } from './context.js';
export { Settings, DEFAULT_STREAM_MAX_JSON_SIZE } from './settings.js';
