/**
 * Error Handling
 *
 * Every failure is reduced to one of the shared error codes. The code fixes
 * the HTTP status and whether repeating the same step can help; the engine
 * only reports the code, the HTTP layer adds the generic wording below.
 */

import { ErrorCode } from '@shared/conversation';

export { ErrorCode };

interface ErrorDescriptor {
  statusCode: number;
  retryable: boolean;
  title: string;
  message: string;
  action?: string; // what the caller should do next
  retryAfterSeconds?: number;
}

const ERROR_CATALOG: Record<ErrorCode, ErrorDescriptor> = {
  [ErrorCode.COLLABORATOR_UNAVAILABLE]: {
    statusCode: 503,
    retryable: true,
    title: 'Service temporarily unavailable',
    message: 'A service needed for this step could not be reached.',
    action: 'Repeat the same step in a moment.',
    retryAfterSeconds: 30,
  },
  [ErrorCode.COLLABORATOR_TIMEOUT]: {
    statusCode: 504,
    retryable: true,
    title: 'Service is slow',
    message: 'A service needed for this step took too long to answer.',
    action: 'Repeat the same step.',
    retryAfterSeconds: 10,
  },
  [ErrorCode.PERSISTENCE_UNAVAILABLE]: {
    statusCode: 503,
    retryable: true,
    title: 'Storage issue',
    message: 'We could not read or save data right now.',
    action: 'Repeat the same step, nothing was saved.',
    retryAfterSeconds: 10,
  },
  [ErrorCode.INVALID_INPUT]: {
    statusCode: 400,
    retryable: false,
    title: 'Invalid input',
    message: 'The information you provided isn\'t valid.',
    action: 'Check the input and send it again.',
  },
  [ErrorCode.ITEM_NOT_FOUND]: {
    statusCode: 404,
    retryable: false,
    title: 'Item not found',
    message: 'We couldn\'t find that item.',
    action: 'Double-check the item ID or send a new photo.',
  },
  [ErrorCode.INTERNAL_ERROR]: {
    statusCode: 500,
    retryable: true,
    title: 'Something went wrong',
    message: 'We\'re experiencing a temporary issue.',
    action: 'Try again in a moment.',
    retryAfterSeconds: 10,
  },
};

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    public originalError?: Error,
    public context?: Record<string, unknown>
  ) {
    super(ERROR_CATALOG[code].message);
    this.name = 'AppError';
  }

  getStatusCode(): number {
    return statusCodeFor(this.code);
  }

  isRetryable(): boolean {
    return isRetryableCode(this.code);
  }

  toJSON() {
    const { title, message, action, retryAfterSeconds, statusCode, retryable } = ERROR_CATALOG[this.code];
    return {
      code: this.code,
      title,
      message,
      action,
      retryAfterSeconds,
      statusCode,
      isRetryable: retryable,
      // Underlying details stay out of production responses
      ...(process.env.NODE_ENV === 'development' && {
        originalError: this.originalError?.message,
        context: this.context,
      }),
    };
  }
}

export function statusCodeFor(code: ErrorCode): number {
  return ERROR_CATALOG[code].statusCode;
}

export function isRetryableCode(code: ErrorCode): boolean {
  return ERROR_CATALOG[code].retryable;
}

function looksLikeTimeout(error: Error): boolean {
  return error.name === 'AbortError' || error.name === 'TimeoutError' || error.message.includes('timed out');
}

/**
 * Any thrown value as an AppError; unknown failures get `defaultCode`.
 */
export function toAppError(error: unknown, defaultCode: ErrorCode = ErrorCode.INTERNAL_ERROR): AppError {
  if (error instanceof AppError) return error;
  if (!(error instanceof Error)) return new AppError(defaultCode, new Error(String(error)));
  return new AppError(looksLikeTimeout(error) ? ErrorCode.COLLABORATOR_TIMEOUT : defaultCode, error);
}

/**
 * Run a call at a port boundary, tagging any non-AppError failure with `code`
 */
export async function withErrorCode<T>(code: ErrorCode, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw toAppError(error, code);
  }
}
