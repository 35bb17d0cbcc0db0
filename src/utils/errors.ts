/**
 * Application error types.
 *
 * Input-validation errors (FormatError, PastTimeError, UsageError) carry a
 * user-facing message. StorageError wraps a failing database call; its
 * message is for operators and is never echoed to a chat.
 */

export class AppError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    opts: { code: string; context?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = new.target.name;
    this.code = opts.code;
    if (opts.context) this.context = opts.context;
  }
}

/** Reminder timestamp did not match `YYYY-MM-DD HH:MM`. */
export class FormatError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { code: 'FORMAT_ERROR', context });
  }
}

/** Reminder timestamp is not strictly in the future. */
export class PastTimeError extends AppError {
  constructor(message: string = 'Reminder time must be in the future.', context?: Record<string, unknown>) {
    super(message, { code: 'PAST_TIME', context });
  }
}

/** Command arguments did not have the expected shape. */
export class UsageError extends AppError {
  constructor(usage: string) {
    super(usage, { code: 'USAGE' });
  }
}

export class StorageError extends AppError {
  constructor(operation: string, cause: unknown, context?: Record<string, unknown>) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Storage operation failed (${operation}): ${detail}`, { code: 'STORAGE_ERROR', context, cause });
  }
}

/** A messaging platform API call failed. */
export class TransportError extends AppError {
  constructor(platform: string, message: string, context?: Record<string, unknown>) {
    super(`${platform}: ${message}`, { code: 'TRANSPORT_ERROR', context });
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
