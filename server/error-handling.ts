/**
 * Error Handling & User Messaging System
 *
 * Maps internal errors to user-friendly messages and HTTP status codes.
 * Only INVALID_INPUT and REQUEST_ABORTED ever escape the analysis pipeline;
 * every other code is recorded on the analysis summary instead of thrown.
 */

export enum ErrorCode {
  // Pipeline
  INVALID_INPUT = 'INVALID_INPUT',
  REQUEST_ABORTED = 'REQUEST_ABORTED',

  // Upstream services
  EXPERT_UNAVAILABLE = 'EXPERT_UNAVAILABLE',
  EXPERT_TIMEOUT = 'EXPERT_TIMEOUT',
  SYNTHESIS_DEGRADED = 'SYNTHESIS_DEGRADED',
  SEARCH_UNAVAILABLE = 'SEARCH_UNAVAILABLE',
  SEARCH_RATE_LIMIT = 'SEARCH_RATE_LIMIT',
  SEARCH_REJECTED = 'SEARCH_REJECTED',
  EMBEDDING_FAILED = 'EMBEDDING_FAILED',
  EMBEDDING_REJECTED = 'EMBEDDING_REJECTED',
  UPSTREAM_TIMEOUT = 'UPSTREAM_TIMEOUT',

  // Generic
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

interface UserMessage {
  title: string;
  message: string;
  action?: string; // What user should do
  retryAfterSeconds?: number;
}

const USER_MESSAGES: Record<ErrorCode, UserMessage> = {
  [ErrorCode.INVALID_INPUT]: {
    title: 'Invalid image',
    message: 'We couldn\'t read the photo you uploaded.',
    action: 'Upload a JPEG, PNG or WebP photo and try again.',
  },
  [ErrorCode.REQUEST_ABORTED]: {
    title: 'Analysis cancelled',
    message: 'The analysis was cancelled before it finished.',
  },
  [ErrorCode.EXPERT_UNAVAILABLE]: {
    title: 'Vision service unavailable',
    message: 'One of our image recognition services is unavailable.',
    action: 'Results are based on the remaining services.',
    retryAfterSeconds: 300,
  },
  [ErrorCode.EXPERT_TIMEOUT]: {
    title: 'Vision service is slow',
    message: 'One of our image recognition services took too long to answer.',
    action: 'Results are based on the services that answered in time.',
    retryAfterSeconds: 60,
  },
  [ErrorCode.SYNTHESIS_DEGRADED]: {
    title: 'Quick identification used',
    message: 'Our AI reasoning service is unavailable, so a rule-based identification was used.',
    action: 'Review the identified brand and category before listing.',
    retryAfterSeconds: 60,
  },
  [ErrorCode.SEARCH_UNAVAILABLE]: {
    title: 'Marketplace temporarily unavailable',
    message: 'We can\'t reach the marketplace right now, so no comparable listings were found.',
    action: 'Check back in a moment for live data.',
    retryAfterSeconds: 300,
  },
  [ErrorCode.SEARCH_RATE_LIMIT]: {
    title: 'Marketplace is busy',
    message: 'Marketplace search is temporarily rate limited.',
    action: 'Try again in a few minutes for the latest listings.',
    retryAfterSeconds: 300,
  },
  [ErrorCode.SEARCH_REJECTED]: {
    title: 'Marketplace search rejected',
    message: 'The marketplace refused our search request.',
    action: 'Results are shown without comparable listings.',
  },
  [ErrorCode.EMBEDDING_FAILED]: {
    title: 'Visual matching unavailable',
    message: 'We couldn\'t compare listing photos with yours.',
    action: 'Listings are shown without visual ranking.',
    retryAfterSeconds: 60,
  },
  [ErrorCode.EMBEDDING_REJECTED]: {
    title: 'Visual matching unavailable',
    message: 'The image embedding service refused our request.',
    action: 'Listings are shown without visual ranking.',
  },
  [ErrorCode.UPSTREAM_TIMEOUT]: {
    title: 'Service is slow',
    message: 'An upstream service took too long to answer.',
    retryAfterSeconds: 30,
  },
  [ErrorCode.INTERNAL_ERROR]: {
    title: 'Something went wrong',
    message: 'We\'re experiencing a temporary issue.',
    action: 'Please try again in a moment.',
    retryAfterSeconds: 10,
  },
};

const ERROR_PROPERTIES: Record<ErrorCode, { statusCode: number; isRetryable: boolean }> = {
  [ErrorCode.INVALID_INPUT]: { statusCode: 400, isRetryable: false },
  [ErrorCode.REQUEST_ABORTED]: { statusCode: 499, isRetryable: false },
  [ErrorCode.EXPERT_UNAVAILABLE]: { statusCode: 503, isRetryable: false },
  [ErrorCode.EXPERT_TIMEOUT]: { statusCode: 504, isRetryable: true },
  [ErrorCode.SYNTHESIS_DEGRADED]: { statusCode: 503, isRetryable: true },
  [ErrorCode.SEARCH_UNAVAILABLE]: { statusCode: 503, isRetryable: true },
  [ErrorCode.SEARCH_RATE_LIMIT]: { statusCode: 429, isRetryable: true },
  [ErrorCode.SEARCH_REJECTED]: { statusCode: 502, isRetryable: false },
  [ErrorCode.EMBEDDING_FAILED]: { statusCode: 502, isRetryable: true },
  [ErrorCode.EMBEDDING_REJECTED]: { statusCode: 502, isRetryable: false },
  [ErrorCode.UPSTREAM_TIMEOUT]: { statusCode: 504, isRetryable: true },
  [ErrorCode.INTERNAL_ERROR]: { statusCode: 500, isRetryable: true },
};

/**
 * Application error with proper context
 */
export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    public originalError?: Error,
    public context?: Record<string, unknown>
  ) {
    super(originalError?.message || USER_MESSAGES[code].message);
    this.name = 'AppError';
  }

  getUserMessage(): UserMessage {
    return USER_MESSAGES[this.code];
  }

  getStatusCode(): number {
    return ERROR_PROPERTIES[this.code].statusCode;
  }

  isRetryable(): boolean {
    return ERROR_PROPERTIES[this.code].isRetryable;
  }

  toJSON() {
    const userMessage = USER_MESSAGES[this.code];
    return {
      code: this.code,
      title: userMessage.title,
      message: userMessage.message,
      action: userMessage.action,
      retryAfterSeconds: userMessage.retryAfterSeconds,
      statusCode: this.getStatusCode(),
      isRetryable: this.isRetryable(),
      // Only expose original error details in development
      ...(process.env.NODE_ENV === 'development' && {
        originalError: this.originalError?.message,
        context: this.context,
      }),
    };
  }
}

function searchErrorCode(status?: number): ErrorCode {
  if (status === 429) return ErrorCode.SEARCH_RATE_LIMIT;
  if (status !== undefined && status >= 400 && status < 500) return ErrorCode.SEARCH_REJECTED;
  return ErrorCode.SEARCH_UNAVAILABLE;
}

/**
 * Raised by marketplace gateways when the upstream is unreachable or answers
 * with an error status. The pipeline turns it into an empty comp set.
 */
export class SearchUnavailableError extends AppError {
  constructor(message: string, public status?: number) {
    super(
      searchErrorCode(status),
      new Error(message),
      status !== undefined ? { status } : undefined
    );
    this.name = 'SearchUnavailableError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Helper to convert any error to AppError
 */
export function toAppError(error: unknown, defaultCode = ErrorCode.INTERNAL_ERROR): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError' || /timed? ?out/i.test(error.message)) {
      return new AppError(ErrorCode.UPSTREAM_TIMEOUT, error);
    }
    if (error.message.includes('rate limit') || error.message.includes('429')) {
      return new AppError(ErrorCode.SEARCH_RATE_LIMIT, error);
    }
    return new AppError(defaultCode, error);
  }

  return new AppError(defaultCode, new Error(String(error)));
}
