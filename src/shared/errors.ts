// ============================================================================
// Base Error Classes
// ============================================================================

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

// ============================================================================
// HTTP Errors
// ============================================================================

export class BadRequestError extends AppError {
  constructor(message: string = 'Bad request') {
    super(message, 400, 'BAD_REQUEST');
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class TooManyRequestsError extends AppError {
  constructor(message: string = 'Too many requests') {
    super(message, 429, 'RATE_LIMITED');
  }
}

// ============================================================================
// Business Logic Errors
// ============================================================================

export class ConversationClosedError extends AppError {
  constructor(conversationId: string) {
    super(`Conversation is completed: ${conversationId}`, 409, 'CONVERSATION_COMPLETED');
  }
}

// ============================================================================
// External Service Errors
// ============================================================================

export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly originalError?: Error;

  constructor(service: string, message: string, originalError?: Error) {
    super(`${service} error: ${message}`, 502, 'EXTERNAL_SERVICE_ERROR');
    this.service = service;
    this.originalError = originalError;
  }
}

/**
 * credits / auth failures need a human; rate_limit and unknown are worth a retry.
 */
export type AIFailureKind = 'credits' | 'auth' | 'rate_limit' | 'unknown';

export class AIServiceError extends ExternalServiceError {
  public readonly kind: AIFailureKind;

  constructor(message: string, kind: AIFailureKind = 'unknown', originalError?: Error) {
    super('AI', message, originalError);
    this.kind = kind;
  }
}

// ============================================================================
// Storage Errors
// ============================================================================

export class DatabaseError extends AppError {
  constructor(message: string, originalError?: Error) {
    super(`Database error: ${message}`, 500, 'DATABASE_ERROR', false);
    if (originalError?.stack) {
      this.stack = `${this.stack}\nCaused by: ${originalError.stack}`;
    }
  }
}

export class StoreUnavailableError extends AppError {
  constructor(operation: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : 'unknown failure';
    super(`Conversation store unavailable during ${operation}: ${reason}`, 503, 'STORE_UNAVAILABLE');
  }
}

export class TimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, 500, 'INTERNAL_ERROR', false);
  }

  return new AppError('Unknown error', 500, 'UNKNOWN_ERROR', false);
}

/**
 * Check if error is retryable (transient)
 */
export function isRetryableError(error: unknown): boolean {
  if (isAppError(error)) {
    if (error.statusCode === 429 || error.statusCode === 503) {
      return true;
    }
    if (error instanceof AIServiceError) {
      return error.kind === 'rate_limit' || error.kind === 'unknown';
    }
    return false;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    const retryablePatterns = [
      'timeout',
      'timed out',
      'econnreset',
      'econnrefused',
      'network',
      'temporarily unavailable',
    ];
    return retryablePatterns.some(pattern => message.includes(pattern));
  }

  return false;
}

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: () => Promise<T>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
