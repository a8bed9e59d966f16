/**
 * Error handling utilities and custom error classes
 */

export type ErrorCode = 'INVALID_ARGUMENT';

export interface ErrorDetails {
  [key: string]: unknown;
}

export class JumpHashError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: ErrorDetails;

  constructor(code: ErrorCode, message: string, details?: ErrorDetails) {
    super(message);
    this.name = 'JumpHashError';
    this.code = code;
    this.details = details;
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }
}

export class InvalidArgumentError extends JumpHashError {
  constructor(message: string, details?: ErrorDetails) {
    super('INVALID_ARGUMENT', message, details);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Check if an error is a JumpHashError
 */
export function isJumpHashError(error: unknown): error is JumpHashError {
  return error instanceof JumpHashError;
}
