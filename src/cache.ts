/**
 * In-memory TTL cache for resolved secrets.
 *
 * Entries live only as long as the owning resolver; nothing is written to
 * disk. Only successful resolutions are stored.
 */

interface SecretCacheEntry {
  value: string;
  resolvedAt: number;
}

export class SecretCache {
  private entries = new Map<string, SecretCacheEntry>();

  /**
   * @param ttlMs - Age after which an entry is stale
   * @param now   - Clock, injectable for tests
   */
  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /** Fresh value for `name`, or undefined when absent or stale. */
  get(name: string): string | undefined {
    const entry = this.entries.get(name);
    if (!entry) return undefined;
    if (this.now() - entry.resolvedAt > this.ttlMs) {
      this.entries.delete(name);
      return undefined;
    }
    return entry.value;
  }

  set(name: string, value: string): void {
    this.entries.set(name, { value, resolvedAt: this.now() });
  }

  /** Drop every stale entry. Returns how many were removed. */
  prune(): number {
    const cutoff = this.now() - this.ttlMs;
    let removed = 0;
    for (const [name, entry] of this.entries) {
      if (entry.resolvedAt < cutoff) {
        this.entries.delete(name);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
