// Fixed-window, per-key request limiter kept in process memory.
// State is lost on restart and is not shared between server instances.

export interface RateLimiter {
  check(key: string): boolean;
  size(): number;
}

export function createRateLimiter(limit: number, windowMs: number = 60_000): RateLimiter {
  const windows = new Map<string, { count: number; resetAt: number }>();
  let lastSweep = Date.now();

  function sweep(now: number) {
    windows.forEach((window, key) => {
      if (now > window.resetAt) windows.delete(key);
    });
    lastSweep = now;
  }

  return {
    check(key) {
      const now = Date.now();
      if (now - lastSweep > windowMs || windows.size > 500) sweep(now);

      const window = windows.get(key);
      if (!window || now > window.resetAt) {
        windows.set(key, { count: 1, resetAt: now + windowMs });
        return true;
      }
      if (window.count >= limit) return false;
      window.count++;
      return true;
    },
    size: () => windows.size,
  };
}
