/**
 * Error taxonomy shared by ingestion, session lookups and the model gateway
 */

import type { DocumentClass } from '../types/index.js';

/** One document could not be ingested; the rest of the corpus continues. */
export class IngestionError extends Error {
  constructor(
    readonly filename: string,
    readonly documentClass: DocumentClass,
    readonly reason: string
  ) {
    super(`${filename}: ${reason}`);
    this.name = 'IngestionError';
  }
}

export class NotFoundError extends Error {
  constructor(
    readonly resource: string,
    readonly id: string
  ) {
    super(`${resource} ${id} not found`);
    this.name = 'NotFoundError';
  }
}

export type ModelErrorKind = 'RateLimited' | 'InvalidRequest' | 'Unavailable' | 'Unknown';

export class ModelError extends Error {
  constructor(
    readonly kind: ModelErrorKind,
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'ModelError';
  }

  /** Whether sending the same message again may succeed */
  get retryable(): boolean {
    return this.kind !== 'InvalidRequest';
  }
}

/**
 * User-facing wording for a failed model call
 */
export function describeModelError(error: ModelError): string {
  switch (error.kind) {
    case 'RateLimited':
      return 'The tutor is experiencing high demand. Please wait a moment and try again.';
    case 'Unavailable':
      return 'The tutor is temporarily unavailable. Please try again in a moment.';
    case 'InvalidRequest':
      return 'The tutor could not process this request. Please check the server configuration.';
    case 'Unknown':
      return 'I encountered an error while processing your question. Please try again.';
  }
}
