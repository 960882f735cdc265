/**
 * Secret resolver: a TTL cache in front of a SecretSource.
 *
 * Failures from the source come back as `missing` resolutions; the
 * resolver never throws for a secret it could not fetch, so a renderer can
 * keep going and report every missing token at the end.
 *
 * Failures are not put in the TTL cache, but they are remembered for the
 * life of the resolver (one run), so a token missing from several
 * templates costs one source call. `retryMissing()` forgets them.
 */
import { SecretCache } from './cache.js';
import { logger } from './logger.js';
import type { Resolution, SecretSource } from './types.js';

export interface ResolverOptions {
  /** Cache TTL in milliseconds. Default: 300000 (5 minutes). */
  ttlMs?: number;
  /** Disable caching; every resolve calls the source. Default: true. */
  cacheEnabled?: boolean;
  now?: () => number;
}

export interface WarmSummary {
  resolved: number;
  missing: number;
}

export const DEFAULT_CACHE_TTL_MS = 300_000;

type MissingResolution = Extract<Resolution, { status: 'missing' }>;

export class SecretResolver {
  private readonly cache: SecretCache;
  private readonly cacheEnabled: boolean;
  private readonly missing = new Map<string, MissingResolution>();
  private calls = 0;

  constructor(
    private readonly source: SecretSource,
    options: ResolverOptions = {},
  ) {
    this.cache = new SecretCache(
      options.ttlMs ?? DEFAULT_CACHE_TTL_MS,
      options.now,
    );
    this.cacheEnabled = options.cacheEnabled ?? true;
  }

  /** Number of calls made to the underlying source so far. */
  get externalCalls(): number {
    return this.calls;
  }

  get cachedCount(): number {
    return this.cache.size;
  }

  async resolve(tokenName: string): Promise<Resolution> {
    if (this.cacheEnabled) {
      const cached = this.cache.get(tokenName);
      if (cached !== undefined) {
        logger.debug({ token: tokenName }, 'Secret served from cache');
        return { status: 'resolved', value: cached, cached: true };
      }
      const failed = this.missing.get(tokenName);
      if (failed) {
        logger.debug({ token: tokenName, reason: failed.reason }, 'Secret already known missing');
        return failed;
      }
    }

    this.calls++;
    const result = await this.source.fetch(tokenName);
    if (!result.ok) {
      logger.debug(
        { token: tokenName, source: this.source.name, reason: result.reason },
        'Secret could not be resolved',
      );
      const resolution: MissingResolution = {
        status: 'missing',
        reason: result.reason,
        detail: result.detail,
      };
      if (this.cacheEnabled) this.missing.set(tokenName, resolution);
      return resolution;
    }

    if (this.cacheEnabled) {
      this.cache.set(tokenName, result.value);
    }
    logger.debug(
      { token: tokenName, source: this.source.name, length: result.value.length },
      'Secret resolved',
    );
    return { status: 'resolved', value: result.value, cached: false };
  }

  /**
   * Resolve every distinct name ahead of rendering, so templates that share
   * tokens cost one source call per token.
   */
  async warm(tokenNames: Iterable<string>): Promise<WarmSummary> {
    const pruned = this.cache.prune();
    const summary: WarmSummary = { resolved: 0, missing: 0 };
    for (const name of new Set(tokenNames)) {
      const resolution = await this.resolve(name);
      if (resolution.status === 'resolved') summary.resolved++;
      else summary.missing++;
    }
    logger.info({ ...summary, pruned, cached: this.cachedCount }, 'Secret cache warmed');
    return summary;
  }

  /** Forget failed lookups so the next resolve asks the source again. */
  retryMissing(): void {
    this.missing.clear();
  }

  clear(): void {
    this.cache.clear();
    this.missing.clear();
  }
}
