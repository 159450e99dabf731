/**
 * In-memory TTL cache with single-flight refills.
 *
 * A miss starts exactly one compute per key; callers arriving while it is
 * in flight await the same promise instead of starting their own fetch.
 * Failed computes are not cached. Invalidating a key also detaches any
 * in-flight compute so its result is never stored.
 *
 * Default TTLs:
 *   - CI statuses: 5 seconds (polled state, refreshed by the tracker)
 *   - ArgoCD rollouts: 10 seconds (argocd.cacheTtlMs)
 *   - GitHub data (compare, repo lists): 5 minutes
 */

// ─── Types ──────────────────────────────────────────────

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

// ─── TTL Presets (milliseconds) ─────────────────────────

export const TTL = {
  /** Polled CI status rows */
  CI: 5 * 1000,
  /** GitHub API data: repo lists, branch comparisons */
  GITHUB: 5 * 60 * 1000,
} as const;

// ─── Cache Implementation ───────────────────────────────

const store = new Map<string, CacheEntry<unknown>>();
const inFlight = new Map<string, Promise<unknown>>();

/**
 * Get a cached value, or compute and cache it if missing/expired.
 */
export async function cached<T>(
  key: string,
  ttlMs: number,
  compute: () => Promise<T>
): Promise<T> {
  const existing = store.get(key) as CacheEntry<T> | undefined;
  if (existing && existing.expiresAt > Date.now()) {
    return existing.value;
  }

  const pending = inFlight.get(key) as Promise<T> | undefined;
  if (pending) return pending;

  const refill: Promise<T> = compute()
    .then((value) => {
      if (inFlight.get(key) === refill) {
        store.set(key, { value, expiresAt: Date.now() + ttlMs });
      }
      return value;
    })
    .finally(() => {
      if (inFlight.get(key) === refill) {
        inFlight.delete(key);
      }
    });

  inFlight.set(key, refill);
  return refill;
}

/**
 * Invalidate all cached entries.
 */
export function invalidateAll(): void {
  store.clear();
  inFlight.clear();
}

/**
 * Invalidate a single key.
 */
export function invalidate(key: string): void {
  store.delete(key);
  inFlight.delete(key);
}

/**
 * Invalidate entries matching a key prefix.
 */
export function invalidatePrefix(prefix: string): void {
  for (const key of [...store.keys()]) {
    if (key.startsWith(prefix)) store.delete(key);
  }
  for (const key of [...inFlight.keys()]) {
    if (key.startsWith(prefix)) inFlight.delete(key);
  }
}

/**
 * Get cache statistics for observability.
 */
export function getCacheStats(): {
  entries: number;
  activeEntries: number;
  inFlight: number;
  keys: string[];
} {
  const now = Date.now();
  let activeEntries = 0;
  for (const entry of store.values()) {
    if (entry.expiresAt > now) {
      activeEntries++;
    }
  }

  return {
    entries: store.size,
    activeEntries,
    inFlight: inFlight.size,
    keys: Array.from(store.keys()),
  };
}
