export function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/** Exponential backoff for attempt n (1-based), capped, with ±25% jitter. */
export function backoffMs(attempt: number, baseMs = 1000, capMs = 60_000): number {
  const base = Math.min(capMs, baseMs * 2 ** (attempt - 1));
  return Math.floor(base * (0.75 + Math.random() * 0.5));
}
