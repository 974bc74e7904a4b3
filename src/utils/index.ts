/**
 * Utility Functions
 *
 * Common helpers used throughout the relay: ID generation, timing, retries and
 * formatting.
 */

import { v4 as uuidv4 } from "uuid";
import crypto from "crypto";
import type { RawData } from "ws";

/**
 * Generates a unique identifier
 * @returns A UUID v4 string
 */
export function generateId(): string {
  return uuidv4();
}

/**
 * Generates a unique request ID for tracking requests
 * @returns A short, unique identifier
 */
export function generateRequestId(): string {
  return crypto.randomBytes(8).toString("hex");
}

/**
 * Sleeps for a specified number of milliseconds. Rejects early when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error("Sleep aborted"));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new Error("Sleep aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Formats a duration in milliseconds to human readable format
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) {
    return `${days}d ${hours % 24}h ${minutes % 60}m`;
  } else if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else if (seconds > 0) {
    return `${seconds}s`;
  } else {
    return `${ms}ms`;
  }
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  shouldRetry?: (error: unknown) => boolean;
  /** Stops further attempts and cuts the current backoff short */
  signal?: AbortSignal;
}

/**
 * Retries an async function with exponential backoff
 * @returns Promise that resolves with the function result, or rejects with the last error
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      throw new Error("Retry aborted");
    }
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (
        attempt === options.maxAttempts ||
        options.signal?.aborted ||
        (options.shouldRetry && !options.shouldRetry(error))
      ) {
        break;
      }

      const delay = Math.min(
        options.baseDelayMs * Math.pow(2, attempt - 1),
        options.maxDelayMs ?? Number.POSITIVE_INFINITY
      );
      options.onRetry?.(error, attempt, delay);
      await sleep(delay, options.signal);
    }
  }

  throw lastError;
}

/**
 * Decodes a WebSocket payload as UTF-8 text
 */
export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}
