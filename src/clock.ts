/**
 * Time source for every bounded wait in the pipeline (UI waits, folder
 * polling, inter-book delay, retry backoff).
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, Math.max(0, ms))),
};

/**
 * Format an epoch-ms time as YYYY-MM-DD_HH-mm-ss (UTC), the timestamp shape
 * used by notebook exports.
 */
export function formatStamp(epochMs: number): string {
  const d = new Date(epochMs);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}` +
    `_${pad(d.getUTCHours())}-${pad(d.getUTCMinutes())}-${pad(d.getUTCSeconds())}`;
}
