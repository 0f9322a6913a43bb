import { logger } from './logger';

export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface ErrorHandlingConfig {
  maxRetries: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
  exponentialBackoff: boolean;
  criticalErrorTypes: string[];
}

export interface RetryConfig {
  maxRetries: number;
  delayMs: number;
  maxDelayMs: number;
  exponentialBackoff: boolean;
  retryableErrors?: string[];
  nonRetryableErrors?: string[];
}

export class ApplicationError extends Error {
  public readonly code: string;
  public readonly severity: ErrorSeverity;
  public readonly retryable: boolean;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: number;

  constructor(
    message: string,
    code: string,
    severity: ErrorSeverity = 'medium',
    retryable: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.code = code;
    this.severity = severity;
    this.retryable = retryable;
    this.context = context;
    this.timestamp = Date.now();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ApplicationError);
    }
  }
}

export class RateLimitError extends ApplicationError {
  constructor(service: string, resetTime: number) {
    super(
      `Rate limit exceeded for service: ${service}`,
      'RATE_LIMIT_EXCEEDED',
      'medium',
      true,
      { service, resetTime }
    );
    this.name = 'RateLimitError';
  }
}

/**
 * Raised when a rule document is rejected at load or upload time.
 */
export class RuleValidationError extends ApplicationError {
  public readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(
      `Invalid rule document '${source}': ${issues.join('; ')}`,
      'RULE_VALIDATION_ERROR',
      'low',
      false,
      { source, issues }
    );
    this.name = 'RuleValidationError';
    this.issues = issues;
  }
}

export class ConfigurationError extends ApplicationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 'critical', false, context);
    this.name = 'ConfigurationError';
  }
}

export class NotFoundError extends ApplicationError {
  constructor(entity: string, id: string | number) {
    super(`${entity} not found`, 'NOT_FOUND', 'low', false, { entity, id });
    this.name = 'NotFoundError';
  }
}

/**
 * A request the caller can fix: expired signal, wrong intent state and the like.
 */
export class InvalidRequestError extends ApplicationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_REQUEST', 'low', false, context);
    this.name = 'InvalidRequestError';
  }
}

export class UpstreamHttpError extends ApplicationError {
  constructor(service: string, status: number, url: string) {
    super(
      `${service} request failed with status ${status}`,
      'UPSTREAM_HTTP_ERROR',
      'medium',
      status >= 500 || status === 429,
      { service, status, url }
    );
    this.name = 'UpstreamHttpError';
  }
}

export class ErrorHandler {
  private config: ErrorHandlingConfig;

  constructor(config: ErrorHandlingConfig) {
    this.config = config;
  }

  /**
   * Run an operation, retrying retryable failures with capped exponential backoff.
   */
  async executeWithRetry<T>(
    operation: () => Promise<T>,
    operationName: string,
    retryConfig?: Partial<RetryConfig>
  ): Promise<T> {
    const config: RetryConfig = {
      maxRetries: this.config.maxRetries,
      delayMs: this.config.retryDelayMs,
      maxDelayMs: this.config.maxRetryDelayMs,
      exponentialBackoff: this.config.exponentialBackoff,
      ...retryConfig
    };

    let lastError: unknown = new Error('Operation failed');
    let attempt = 0;

    while (attempt <= config.maxRetries) {
      try {
        const result = await operation();
        if (attempt > 0) {
          logger.info(`Operation '${operationName}' recovered after ${attempt} retries`);
        }
        return result;
      } catch (error) {
        lastError = error;
        attempt++;

        if (!this.isRetryable(error, config)) {
          logger.debug(`Non-retryable error in operation '${operationName}'`);
          throw error;
        }

        if (attempt > config.maxRetries) {
          break;
        }

        const delay = this.computeDelay(attempt, config);
        logger.warn(`Operation '${operationName}' failed (attempt ${attempt}/${config.maxRetries + 1}), retrying in ${delay}ms:`, error);

        await this.sleep(delay);
      }
    }

    throw new ApplicationError(
      `Operation '${operationName}' failed after ${config.maxRetries + 1} attempts`,
      'MAX_RETRIES_EXCEEDED',
      'high',
      false,
      { originalError: errorMessage(lastError), attempts: attempt }
    );
  }

  computeDelay(attempt: number, config: Pick<RetryConfig, 'delayMs' | 'maxDelayMs' | 'exponentialBackoff'>): number {
    const raw = config.exponentialBackoff
      ? config.delayMs * Math.pow(2, attempt - 1)
      : config.delayMs;
    return Math.min(raw, config.maxDelayMs);
  }

  /**
   * Log an error at a level matching its severity and count it.
   */
  handleError(error: unknown, context?: Record<string, unknown>): void {
    const errorInfo = this.categorizeError(error);
    const enhancedContext = {
      ...context,
      errorCode: errorInfo.code,
      severity: errorInfo.severity,
      retryable: errorInfo.retryable
    };

    switch (errorInfo.severity) {
      case 'critical':
        logger.error('CRITICAL ERROR:', error, enhancedContext);
        break;
      case 'high':
        logger.error('HIGH SEVERITY ERROR:', error, enhancedContext);
        break;
      case 'medium':
        logger.warn('MEDIUM SEVERITY ERROR:', error, enhancedContext);
        break;
      case 'low':
        logger.info('LOW SEVERITY ERROR:', error, enhancedContext);
        break;
    }
  }

  categorizeError(error: unknown): { code: string; severity: ErrorSeverity; retryable: boolean } {
    if (error instanceof ApplicationError) {
      return { code: error.code, severity: error.severity, retryable: error.retryable };
    }

    const message = errorMessage(error).toLowerCase();

    if (this.config.criticalErrorTypes.some(type => message.includes(type.toLowerCase()))) {
      return { code: 'CRITICAL_ERROR', severity: 'critical', retryable: false };
    }
    if (message.includes('database') || message.includes('sql') || message.includes('connection')) {
      return { code: 'DATABASE_ERROR', severity: 'high', retryable: true };
    }
    if (message.includes('network') || message.includes('fetch') || message.includes('timeout')) {
      return { code: 'NETWORK_ERROR', severity: 'medium', retryable: true };
    }
    if (message.includes('rate limit') || message.includes('429')) {
      return { code: 'RATE_LIMIT', severity: 'medium', retryable: true };
    }
    if (message.includes('validation') || message.includes('invalid')) {
      return { code: 'VALIDATION_ERROR', severity: 'low', retryable: false };
    }

    return { code: 'UNKNOWN_ERROR', severity: 'medium', retryable: true };
  }

  private isRetryable(error: unknown, config: RetryConfig): boolean {
    if (error instanceof ApplicationError) {
      return error.retryable;
    }

    const message = errorMessage(error);

    if (config.nonRetryableErrors?.some(pattern => message.includes(pattern))) {
      return false;
    }
    if (config.retryableErrors?.some(pattern => message.includes(pattern))) {
      return true;
    }

    const retryablePatterns = [
      'ECONNRESET',
      'ECONNREFUSED',
      'ETIMEDOUT',
      'ENOTFOUND',
      'network',
      'timeout',
      'Rate limit',
      'Service Unavailable',
      '503',
      '502',
      '504'
    ];

    return retryablePatterns.some(pattern =>
      message.toLowerCase().includes(pattern.toLowerCase())
    );
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export const DEFAULT_ERROR_CONFIG: ErrorHandlingConfig = {
  maxRetries: 3,
  retryDelayMs: 500,
  maxRetryDelayMs: 30000,
  exponentialBackoff: true,
  criticalErrorTypes: [
    'database corruption',
    'authentication failure'
  ]
};

export const errorHandler = new ErrorHandler(DEFAULT_ERROR_CONFIG);
