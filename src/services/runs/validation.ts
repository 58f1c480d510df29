import { InvalidArgumentError } from '../../errors/categories.js';
import type { CreateRunRequest } from './request.js';

export const METADATA_LIMITS = {
  maxEntries: 16,
  maxKeyLength: 64,
  maxValueLength: 512,
} as const;

/**
 * Local checks for the documented limits the service enforces anyway. Only
 * run when the client is configured with `validateRequests: true`.
 */
export class RunRequestValidator {
  static validate(request: CreateRunRequest): void {
    if (request.assistantId.trim() === '') {
      throw new InvalidArgumentError('assistant_id is required', { param: 'assistant_id' });
    }

    if (request.temperature !== undefined && (request.temperature < 0 || request.temperature > 2)) {
      throw new InvalidArgumentError('temperature must be between 0 and 2', { param: 'temperature' });
    }

    if (request.topP !== undefined && (request.topP < 0 || request.topP > 1)) {
      throw new InvalidArgumentError('top_p must be between 0 and 1', { param: 'top_p' });
    }

    validateTokenBudget(request.maxPromptTokens, 'max_prompt_tokens');
    validateTokenBudget(request.maxCompletionTokens, 'max_completion_tokens');

    if (request.truncationStrategy?.type === 'last_messages' && !(request.truncationStrategy.lastMessages >= 1)) {
      throw new InvalidArgumentError('truncation_strategy.last_messages must be at least 1', {
        param: 'truncation_strategy.last_messages',
      });
    }

    if (request.metadata) {
      validateMetadata(request.metadata);
    }
  }
}

function validateTokenBudget(value: number | undefined, param: string): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
    throw new InvalidArgumentError(`${param} must be a positive integer`, { param });
  }
}

function validateMetadata(metadata: Readonly<Record<string, string>>): void {
  const entries = Object.entries(metadata);
  if (entries.length > METADATA_LIMITS.maxEntries) {
    throw new InvalidArgumentError(
      `metadata can have at most ${METADATA_LIMITS.maxEntries} entries, got ${entries.length}`,
      { param: 'metadata' }
    );
  }

  for (const [key, value] of entries) {
    if (key.length > METADATA_LIMITS.maxKeyLength) {
      throw new InvalidArgumentError(
        `metadata key '${key}' exceeds ${METADATA_LIMITS.maxKeyLength} characters`,
        { param: `metadata.${key}` }
      );
    }
    if (value.length > METADATA_LIMITS.maxValueLength) {
      throw new InvalidArgumentError(
        `metadata value for '${key}' exceeds ${METADATA_LIMITS.maxValueLength} characters`,
        { param: `metadata.${key}` }
      );
    }
  }
}
