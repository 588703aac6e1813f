import { logger, type LogMeta } from './logger.js';

export class BotError extends Error {
  public readonly code: string;
  public readonly userMessage: string;
  public readonly context?: LogMeta;
  public readonly isRetryable: boolean;

  constructor(
    message: string,
    code: string = 'UNKNOWN_ERROR',
    userMessage?: string,
    context?: LogMeta,
    isRetryable: boolean = false
  ) {
    super(message);
    this.name = 'BotError';
    this.code = code;
    this.userMessage = userMessage || 'Something went wrong. Please try again.';
    this.context = context;
    this.isRetryable = isRetryable;
  }
}

export class ValidationError extends BotError {
  constructor(message: string, field?: string, value?: unknown) {
    super(
      message,
      'VALIDATION_ERROR',
      `Invalid input: ${message}`,
      { field, value },
      false
    );
    this.name = 'ValidationError';
  }
}

export class DatabaseError extends BotError {
  constructor(message: string, operation?: string, context?: LogMeta) {
    super(
      message,
      'DATABASE_ERROR',
      'Database operation failed. Please try again.',
      { operation, ...context },
      true
    );
    this.name = 'DatabaseError';
  }
}

export class PermissionError extends BotError {
  constructor(message: string, requiredPermission?: string, userId?: string) {
    super(
      message,
      'PERMISSION_ERROR',
      'You do not have permission to perform this action.',
      { requiredPermission, userId },
      false
    );
    this.name = 'PermissionError';
  }
}

export class RewardDispatchError extends BotError {
  constructor(message: string, challengeId: string, contributorId: string, isRetryable: boolean = true) {
    super(
      message,
      'REWARD_DISPATCH_ERROR',
      'Reward delivery failed.',
      { challengeId, contributorId },
      isRetryable
    );
    this.name = 'RewardDispatchError';
  }
}

export class AnnouncementError extends BotError {
  constructor(message: string, channelId?: string) {
    super(
      message,
      'ANNOUNCEMENT_ERROR',
      'Could not post the announcement.',
      { channelId },
      true
    );
    this.name = 'AnnouncementError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// Retry wrapper with exponential backoff
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  maxRetries: number = 3,
  baseDelay: number = 1000,
  shouldRetry?: (error: unknown) => boolean
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn(attempt + 1);
    } catch (error) {
      lastError = error;

      if (shouldRetry && !shouldRetry(error)) {
        throw error;
      }

      if (attempt === maxRetries) {
        break;
      }

      const delay = baseDelay * Math.pow(2, attempt);
      logger.warn(`Retry attempt ${attempt + 1}/${maxRetries} after ${delay}ms`, {
        error: errorMessage(error),
        attempt: attempt + 1,
        maxRetries
      });

      await sleep(delay);
    }
  }

  throw lastError;
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof BotError) {
    return error.isRetryable;
  }
  // Anything thrown by a collaborator that is not one of ours is treated as transient.
  return true;
}

// Global error handlers
export function setupGlobalErrorHandlers(onShutdown?: () => Promise<void>) {
  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', {
      error: error.message,
      stack: error.stack,
      pid: process.pid
    });

    setTimeout(() => {
      process.exit(1);
    }, 1000);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', {
      reason: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined
    });
  });

  process.on('warning', (warning) => {
    logger.warn('Process warning', {
      name: warning.name,
      message: warning.message,
      stack: warning.stack
    });
  });

  const gracefulShutdown = (signal: string) => {
    logger.info(`Received ${signal}, initiating graceful shutdown...`);

    const done = () => {
      logger.info('Graceful shutdown completed');
      process.exit(0);
    };
    const timer = setTimeout(done, 5000);
    timer.unref();

    if (!onShutdown) return;
    onShutdown()
      .catch((error) => logger.error('Shutdown hook failed', { error: errorMessage(error) }))
      .finally(done);
  };

  process.once('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.once('SIGINT', () => gracefulShutdown('SIGINT'));
}

export function formatErrorForUser(error: unknown): string {
  if (error instanceof BotError) {
    return error.userMessage;
  }

  // Don't expose internal errors to users
  return 'An unexpected error occurred. Please try again.';
}

export function formatErrorForLogging(error: unknown, context?: LogMeta): LogMeta {
  const baseInfo = {
    message: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
    name: error instanceof Error ? error.name : 'Unknown',
    ...context
  };

  if (error instanceof BotError) {
    return {
      ...baseInfo,
      code: error.code,
      userMessage: error.userMessage,
      context: error.context,
      isRetryable: error.isRetryable
    };
  }

  return baseInfo;
}
