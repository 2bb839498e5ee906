export interface BackoffPolicy {
  baseMs: number;
  maxMs: number;
}

/** Delay before the next attempt, given how many attempts have already run. */
export function backoffDelay(attempts: number, policy: BackoffPolicy): number {
  const exponent = Math.max(0, attempts - 1);
  return Math.min(policy.baseMs * 2 ** exponent, policy.maxMs);
}

export function nextAttemptAt(now: Date, attempts: number, policy: BackoffPolicy): Date {
  return new Date(now.getTime() + backoffDelay(attempts, policy));
}
