export function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export function jitter(minMs: number, maxMs: number): number {
  const min = Math.min(minMs, maxMs);
  const max = Math.max(minMs, maxMs);
  return Math.floor(min + Math.random() * (max - min + 1));
}

// Exponential backoff with jitter: 1s, 2s, 4s, ... capped, each scaled by 0.75..1.5.
export function backoffDelay(attempt: number, baseMs = 1000, capMs = 60_000): number {
  const base = Math.min(capMs, baseMs * 2 ** (attempt - 1));
  return Math.floor(base * (0.75 + Math.random() * 0.75));
}
