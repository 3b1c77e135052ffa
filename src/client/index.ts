/**
 * HTTP client exports.
 */

export { HttpClient, type OpenStream, type TextResponse } from './http.js';
