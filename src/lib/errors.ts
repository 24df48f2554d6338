/**
 * Error classes raised by the state engine and its persistence collaborator
 */

export type ErrorCode =
  | 'validation'
  | 'not_found'
  | 'persistence'
  | 'disposed';

/**
 * Base error class with a machine readable code
 */
export class TodoError extends Error {
  constructor(
    message: string,
    public code: ErrorCode = 'persistence'
  ) {
    super(message);
    this.name = 'TodoError';
  }
}

/**
 * Malformed task fields or action payloads
 */
export class ValidationError extends TodoError {
  constructor(message = 'Invalid data') {
    super(message, 'validation');
    this.name = 'ValidationError';
  }
}

/**
 * Operation on a missing task or project
 */
export class NotFoundError extends TodoError {
  constructor(message = 'Not found') {
    super(message, 'not_found');
    this.name = 'NotFoundError';
  }
}

/**
 * Storage layer failure
 */
export class PersistenceError extends TodoError {
  constructor(message = 'Storage failure') {
    super(message, 'persistence');
    this.name = 'PersistenceError';
  }
}

export class StoreDisposedError extends TodoError {
  constructor(message = 'Store has been disposed') {
    super(message, 'disposed');
    this.name = 'StoreDisposedError';
  }
}

// Renders any thrown value into the text shown through AppState.error
export const errorMessage = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
};
