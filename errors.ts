/**
 * Retention Errors
 *
 * Failure taxonomy shared by the store, the session and the concept sources.
 * Transitions report failures as values; sources throw and the session
 * converts what they throw into results.
 */

export type RetentionErrorCode =
  | 'NOT_FOUND'
  | 'DUPLICATE_IDENTITY'
  | 'INVALID_INPUT'
  | 'EXTERNAL_COLLABORATOR_FAILURE';

export class RetentionError extends Error {
  readonly code: RetentionErrorCode;

  constructor(code: RetentionErrorCode, message: string) {
    super(message);
    this.name = 'RetentionError';
    this.code = code;
  }
}

export type OperationResult<T> =
  | { success: true; data: T }
  | { success: false; error: RetentionError };

export function succeed<T>(data: T): OperationResult<T> {
  return { success: true, data };
}

export function fail<T>(code: RetentionErrorCode, message: string): OperationResult<T> {
  return { success: false, error: new RetentionError(code, message) };
}

/**
 * Wrap anything a collaborator threw as an EXTERNAL_COLLABORATOR_FAILURE,
 * keeping RetentionErrors as they are.
 */
export function toCollaboratorError(error: unknown, context: string): RetentionError {
  if (error instanceof RetentionError) return error;
  const detail = error instanceof Error ? error.message : String(error);
  return new RetentionError('EXTERNAL_COLLABORATOR_FAILURE', `${context}: ${detail}`);
}

/** HTTP status for each failure code */
export const HTTP_STATUS_BY_CODE: Record<RetentionErrorCode, number> = {
  NOT_FOUND: 404,
  DUPLICATE_IDENTITY: 409,
  INVALID_INPUT: 400,
  EXTERNAL_COLLABORATOR_FAILURE: 502,
};
