/**
 * Exponential backoff between ticket creation attempts
 */

export interface BackoffSettings {
  backoffBaseMs: number;
  backoffCapMs: number;
}

/**
 * Delay before retry number `retryCount` (1-based): min(base * 2^(n-1), cap)
 */
export function backoffDelay(retryCount: number, settings: BackoffSettings): number {
  const exponent = Math.max(retryCount, 1) - 1;
  return Math.min(settings.backoffBaseMs * 2 ** exponent, settings.backoffCapMs);
}

/**
 * Every delay a run would wait through when all retries are used
 */
export function backoffSchedule(maxRetries: number, settings: BackoffSettings): number[] {
  return Array.from({ length: maxRetries }, (_, index) => backoffDelay(index + 1, settings));
}
