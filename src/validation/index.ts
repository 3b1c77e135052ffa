/**
 * Input validation for generation requests.
 *
 * Requests are checked at the service boundary so that malformed history or
 * out-of-range settings fail locally instead of as a 400 from the API.
 */

import { ValidationError } from '../error/index.js';
import type { ValidationDetail } from '../error/index.js';
import type {
  Content,
  GenerateContentRequest,
  GenerationConfig,
  Part,
} from '../types/index.js';

/** Most stop sequences the API accepts */
export const MAX_STOP_SEQUENCES = 5;

// ============================================================================
// Content & Part Validation
// ============================================================================

function validateContent(content: Content, fieldPath: string): ValidationDetail[] {
  if (!Array.isArray(content.parts) || content.parts.length === 0) {
    return [
      {
        field: `${fieldPath}.parts`,
        description: 'Content must have at least one part',
      },
    ];
  }

  return content.parts.flatMap((part, i) => validatePart(part, `${fieldPath}.parts[${i}]`));
}

function validatePart(part: Part, fieldPath: string): ValidationDetail[] {
  const errors: ValidationDetail[] = [];

  if ('text' in part) {
    if (typeof part.text !== 'string') {
      errors.push({
        field: `${fieldPath}.text`,
        description: 'Text must be a string',
        value: typeof part.text,
      });
    } else if (part.text.length === 0) {
      errors.push({
        field: `${fieldPath}.text`,
        description: 'Text cannot be empty',
      });
    }
  } else if ('inlineData' in part) {
    if (!part.inlineData.data) {
      errors.push({
        field: `${fieldPath}.inlineData.data`,
        description: 'InlineData must have data property',
      });
    }
    if (!part.inlineData.mimeType) {
      errors.push({
        field: `${fieldPath}.inlineData.mimeType`,
        description: 'InlineData must have mimeType property',
      });
    }
  } else if ('fileData' in part) {
    if (!part.fileData.fileUri) {
      errors.push({
        field: `${fieldPath}.fileData.fileUri`,
        description: 'FileData must have fileUri property',
      });
    }
  } else {
    errors.push({
      field: fieldPath,
      description: 'Part must have text, inlineData or fileData',
    });
  }

  return errors;
}

// ============================================================================
// Generation Config Validation
// ============================================================================

function checkRange(
  errors: ValidationDetail[],
  field: keyof GenerationConfig,
  value: number | undefined,
  min: number,
  max: number | undefined,
  description: string
): void {
  if (value === undefined) {
    return;
  }
  if (!Number.isFinite(value) || value < min || (max !== undefined && value > max)) {
    errors.push({ field: `generationConfig.${field}`, description, value });
  }
}

function validateGenerationConfig(config: GenerationConfig): ValidationDetail[] {
  const errors: ValidationDetail[] = [];

  checkRange(errors, 'temperature', config.temperature, 0, 2, 'Temperature must be between 0 and 2');
  checkRange(errors, 'topP', config.topP, 0, 1, 'Top-p must be between 0 and 1');
  checkRange(errors, 'topK', config.topK, 1, undefined, 'Top-k must be at least 1');
  checkRange(
    errors,
    'maxOutputTokens',
    config.maxOutputTokens,
    1,
    undefined,
    'Max output tokens must be at least 1'
  );

  if (config.stopSequences !== undefined && config.stopSequences.length > MAX_STOP_SEQUENCES) {
    errors.push({
      field: 'generationConfig.stopSequences',
      description: `Stop sequences cannot exceed ${MAX_STOP_SEQUENCES} entries`,
      value: config.stopSequences.length,
    });
  }

  return errors;
}

// ============================================================================
// Request Validation
// ============================================================================

/**
 * Validates a GenerateContentRequest.
 *
 * @throws {ValidationError} If validation fails
 */
export function validateGenerateContentRequest(request: GenerateContentRequest): void {
  const errors: ValidationDetail[] = [];

  if (request.contents.length === 0) {
    errors.push({
      field: 'contents',
      description: 'Contents array must not be empty',
    });
  } else {
    request.contents.forEach((content, i) => {
      errors.push(...validateContent(content, `contents[${i}]`));
    });
  }

  if (request.systemInstruction) {
    errors.push(...validateContent(request.systemInstruction, 'systemInstruction'));
  }

  if (request.generationConfig) {
    errors.push(...validateGenerationConfig(request.generationConfig));
  }

  if (errors.length > 0) {
    throw new ValidationError('Invalid GenerateContentRequest', errors);
  }
}

/**
 * Validates a wire model name.
 *
 * @throws {ValidationError} If the name is empty or whitespace
 */
export function validateModelName(model: string): void {
  if (model.trim().length === 0) {
    throw new ValidationError('Invalid model name', [
      {
        field: 'model',
        description: 'Model name cannot be empty or whitespace',
        value: model,
      },
    ]);
  }
}
