// Fixed-backoff polling used by the profile-creation path, plus shared network-error detection.

export interface PollOptions {
  attempts: number;
  intervalMs: number;
  sleep?: (ms: number) => Promise<void>;
  onAttempt?: (attempt: number) => void;
}

/**
 * Waits `intervalMs` before each attempt and stops at the first non-null result.
 * Returns null once `attempts` lookups have come back empty. Errors thrown by `lookup` propagate.
 */
export async function pollUntil<T>(lookup: () => Promise<T | null>, options: PollOptions): Promise<T | null> {
  const { attempts, intervalMs, sleep: wait = sleep, onAttempt } = options;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    await wait(intervalMs);
    onAttempt?.(attempt);
    const found = await lookup();
    if (found !== null) return found;
  }
  return null;
}

export function isNetworkError(error: unknown): boolean {
  const message = String(error instanceof Error ? error.message : error ?? "").toLowerCase();
  return message.includes("fetch") ||
         message.includes("network") ||
         message.includes("timeout") ||
         message.includes("econn") ||
         message.includes("enotfound") ||
         error instanceof TypeError; // fetch network errors are TypeErrors
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
