/**
 * Error taxonomy for the lifecycle controller
 *
 * Every failure a reconciliation pass can report is one of these classes.
 * Transient failures are retried by the workload layer; the rest are terminal
 * for the pass that raised them.
 */

/**
 * Machine-readable error codes
 */
export type OperatorErrorCode =
  | 'CARDINALITY_VIOLATION'
  | 'INVALID_KEY_MATERIAL'
  | 'VALIDATION_FAILURE'
  | 'TRANSIENT_BACKEND_FAILURE'
  | 'LEADERSHIP_REQUIRED'
  | 'TIMEOUT'
  | 'STATE_FILE_ERROR';

/**
 * Base error class for all controller failures
 */
export class OperatorError extends Error {
  constructor(
    message: string,
    public readonly code: OperatorErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'OperatorError';
  }

  /**
   * Whether the failure may succeed when attempted again
   */
  get retryable(): boolean {
    return false;
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * A relation declared with a peer limit received one peer too many
 */
export class CardinalityViolation extends OperatorError {
  constructor(
    public readonly relationName: string,
    public readonly limit: number,
    public readonly rejectedPeer: string
  ) {
    super(
      `Relation "${relationName}" accepts at most ${limit} peer(s); rejected "${rejectedPeer}"`,
      'CARDINALITY_VIOLATION',
      `Remove the existing "${relationName}" integration before adding another`
    );
    this.name = 'CardinalityViolation';
  }
}

/**
 * Caller-supplied key material is not a structurally valid PEM private key
 */
export class InvalidKeyMaterial extends OperatorError {
  constructor(reason: string) {
    super(
      `Invalid private key material: ${reason}`,
      'INVALID_KEY_MATERIAL',
      'Provide an unencrypted PEM private key, optionally base64-encoded'
    );
    this.name = 'InvalidKeyMaterial';
  }
}

/**
 * Missing or malformed required data
 */
export class ValidationFailure extends OperatorError {
  constructor(
    message: string,
    public readonly relationName?: string,
    public readonly field?: string
  ) {
    super(message, 'VALIDATION_FAILURE');
    this.name = 'ValidationFailure';
  }
}

/**
 * The managed service rejected an operation for a reason expected to clear up
 */
export class TransientBackendFailure extends OperatorError {
  constructor(
    message: string,
    public readonly operation?: string
  ) {
    super(message, 'TRANSIENT_BACKEND_FAILURE', 'The operation is retried automatically');
    this.name = 'TransientBackendFailure';
  }

  override get retryable(): boolean {
    return true;
  }
}

/**
 * A workload operation exceeded its time bound
 */
export class TimeoutError extends OperatorError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`Operation "${operation}" timed out after ${timeoutMs}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }

  override get retryable(): boolean {
    return true;
  }
}

/**
 * A non-leader unit attempted to originate secret material
 */
export class LeadershipRequired extends OperatorError {
  constructor(operation: string) {
    super(
      `${operation} must be called on the leader unit`,
      'LEADERSHIP_REQUIRED',
      'Run the command against the current leader unit'
    );
    this.name = 'LeadershipRequired';
  }
}

/**
 * The persisted operator context could not be read
 */
export class StateFileError extends OperatorError {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super(
      `Failed to load operator state from ${path}: ${reason}`,
      'STATE_FILE_ERROR',
      'Fix or remove the state file; a missing file starts from an empty context'
    );
    this.name = 'StateFileError';
  }
}

/**
 * Type guard to check if an error is an OperatorError
 */
export function isOperatorError(error: unknown): error is OperatorError {
  return error instanceof OperatorError;
}

/**
 * Whether an error is worth another attempt
 */
export function isTransient(error: unknown): boolean {
  return isOperatorError(error) && error.retryable;
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Format any error into a user-friendly message
 */
export function formatError(error: unknown): string {
  if (isOperatorError(error)) {
    return error.toUserMessage();
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}
