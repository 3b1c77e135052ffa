/**
 * Service exports.
 */

export { ContentServiceImpl, type ContentService, type ContentStream, type StreamOptions } from './content.js';
export { FilesServiceImpl, normalizeFileName, type FilesService } from './files.js';
export { FileManager, hashBytes, toHexHash } from './file-manager.js';
export {
  checkResponseUsable,
  checkChunkUsable,
  isCandidateBlocked,
  hasSafetyConcerns,
  getSafetyRatingSummary,
  type SafetyRatingSummary,
} from './safety.js';
