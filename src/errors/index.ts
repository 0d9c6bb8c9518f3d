/**
 * Custom Error classes for Parley
 */

export interface ErrorOptions {
  code: string;
  provider?: string;
  retryable?: boolean;
  cause?: Error;
}

type SubclassOptions = Omit<ErrorOptions, 'code' | 'retryable'> &
  Partial<Pick<ErrorOptions, 'code' | 'retryable'>>;

/**
 * Base error class for all Parley errors
 */
export class ParleyError extends Error {
  public readonly code: string;
  public readonly provider?: string;
  public readonly retryable: boolean;
  public override readonly cause?: Error;

  constructor(message: string, options: ErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code;
    this.provider = options.provider;
    this.retryable = options.retryable ?? false;
    this.cause = options.cause;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      provider: this.provider,
      retryable: this.retryable,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

// ============================================
// Provider errors (raised at the agent boundary)
// ============================================

/**
 * API rate limit exceeded error
 */
export class APIRateLimitError extends ParleyError {
  constructor(message: string = 'API rate limit exceeded', options: SubclassOptions = {}) {
    super(message, {
      code: options.code ?? 'API_RATE_LIMIT',
      provider: options.provider,
      retryable: options.retryable ?? true,
      cause: options.cause,
    });
  }
}

/**
 * API timeout error
 */
export class APITimeoutError extends ParleyError {
  constructor(message: string = 'API request timed out', options: SubclassOptions = {}) {
    super(message, {
      code: options.code ?? 'API_TIMEOUT',
      provider: options.provider,
      retryable: options.retryable ?? true,
      cause: options.cause,
    });
  }
}

/**
 * API authentication failure error
 */
export class APIAuthError extends ParleyError {
  constructor(message: string = 'API authentication failed', options: SubclassOptions = {}) {
    super(message, {
      code: options.code ?? 'API_AUTH_FAILED',
      provider: options.provider,
      retryable: options.retryable ?? false,
      cause: options.cause,
    });
  }
}

/**
 * Network error
 */
export class APINetworkError extends ParleyError {
  constructor(message: string = 'Network error occurred', options: SubclassOptions = {}) {
    super(message, {
      code: options.code ?? 'API_NETWORK_ERROR',
      provider: options.provider,
      retryable: options.retryable ?? true,
      cause: options.cause,
    });
  }
}

/**
 * Any other failure reported by a provider API
 */
export class APIProviderError extends ParleyError {
  constructor(message: string = 'Provider API error', options: SubclassOptions = {}) {
    super(message, {
      code: options.code ?? 'API_ERROR',
      provider: options.provider,
      retryable: options.retryable ?? false,
      cause: options.cause,
    });
  }
}

export type ProviderError =
  | APIRateLimitError
  | APITimeoutError
  | APIAuthError
  | APINetworkError
  | APIProviderError;

export function isProviderError(error: unknown): error is ProviderError {
  return (
    error instanceof APIRateLimitError ||
    error instanceof APITimeoutError ||
    error instanceof APIAuthError ||
    error instanceof APINetworkError ||
    error instanceof APIProviderError
  );
}

// ============================================
// Configuration errors
// ============================================

/**
 * Configuration/initialization error
 */
export class ConfigurationError extends ParleyError {
  constructor(message: string, options: Omit<ErrorOptions, 'code'> & Partial<Pick<ErrorOptions, 'code'>> = {}) {
    super(message, {
      code: options.code ?? 'CONFIGURATION_ERROR',
      provider: options.provider,
      retryable: false,
      cause: options.cause,
    });
  }
}

/**
 * Unknown convergence profile name
 */
export class InvalidProfileError extends ConfigurationError {
  public readonly profile: string;

  constructor(profile: string, validProfiles: readonly string[]) {
    super(`Invalid convergence profile '${profile}'. Must be one of: ${validProfiles.join(', ')}`, {
      code: 'INVALID_PROFILE',
    });
    this.profile = profile;
  }
}

/**
 * Convergence weights whose total is not 1.0
 */
export class WeightsDoNotSumToOneError extends ConfigurationError {
  public readonly total: number;

  constructor(total: number) {
    super(`Convergence weights must sum to 1.0, but got ${total.toFixed(3)}`, {
      code: 'WEIGHTS_DO_NOT_SUM_TO_ONE',
    });
    this.total = total;
  }
}

// ============================================
// Runtime errors
// ============================================

/**
 * A durable write or read could not complete
 */
export class PersistenceError extends ParleyError {
  constructor(message: string, options: Omit<ErrorOptions, 'code'> & Partial<Pick<ErrorOptions, 'code'>> = {}) {
    super(message, {
      code: options.code ?? 'PERSISTENCE_ERROR',
      provider: options.provider,
      retryable: options.retryable ?? false,
      cause: options.cause,
    });
  }
}

/**
 * Illegal conversation state transition
 */
export class ConversationStateError extends ParleyError {
  constructor(message: string, options: Omit<ErrorOptions, 'code'> & Partial<Pick<ErrorOptions, 'code'>> = {}) {
    super(message, {
      code: options.code ?? 'INVALID_TRANSITION',
      retryable: false,
      cause: options.cause,
    });
  }
}

/**
 * Analytical import failure
 */
export class ImportError extends ParleyError {
  constructor(message: string, options: Omit<ErrorOptions, 'code'> & Partial<Pick<ErrorOptions, 'code'>> = {}) {
    super(message, {
      code: options.code ?? 'IMPORT_ERROR',
      retryable: options.retryable ?? false,
      cause: options.cause,
    });
  }
}
