/** Bounded exponential backoff */
export interface BackoffOptions {
  initialMs: number;
  factor: number;
  maxMs: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  initialMs: 250,
  factor: 2,
  maxMs: 5000,
};

/** Delay before retry number `attempt` (0-based) */
export function backoffDelay(attempt: number, options: BackoffOptions = DEFAULT_BACKOFF): number {
  const delay = options.initialMs * Math.pow(options.factor, Math.max(0, attempt));
  return Math.min(options.maxMs, delay);
}
