import { logger } from './logger';
import { toError } from './errors';

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number;
  operationName?: string;
  /** Returning false ends the retry loop and rethrows immediately */
  shouldRetry?: (error: Error) => boolean;
}

/**
 * Retry helper for network operations with exponential backoff
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelay = 1000,
    operationName = 'operation',
    shouldRetry = () => true,
  } = options;
  let lastError: Error | undefined;

  for (let i = 0; i <= maxRetries; i++) {
    try {
      return await operation();
    } catch (error) {
      lastError = toError(error);
      if (!shouldRetry(lastError)) {
        throw lastError;
      }
      if (i === maxRetries) {
        break;
      }
      const delay = baseDelay * Math.pow(2, i);
      const retryCount = i + 1;
      logger.warn(
        `${operationName} failed, retrying in ${delay}ms (retry ${retryCount}/${maxRetries})`,
        {
          error: lastError.message,
        },
      );
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  logger.error(`${operationName} failed after ${maxRetries} retries`, {
    error: lastError?.message,
  });
  throw lastError;
}
