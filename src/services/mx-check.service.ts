import type { DnsResolver, MxCacheEntry, MxLookupResult } from '../types/dns.types.js';
import { normalizeDomain } from './domain-classifier.service.js';
import { createLogger, type StructuredLogger } from './logger.service.js';
import { metrics as defaultMetrics, type MetricsService } from './metrics.service.js';

export interface MxCheckDeps {
  cacheEnabled?: boolean;
  logger?: StructuredLogger;
  metrics?: MetricsService;
}

/**
 * MX Check Service
 *
 * Answers "does this domain have a mail exchanger" with a per-domain cache.
 *
 * Cache policy:
 * - Entries never expire; only clearCache() removes them
 * - While caching is disabled the cache is neither read nor written,
 *   existing entries are kept and are served again once re-enabled
 * - A and AAAA checks (hasValidDNS) always go to the resolver
 */
export class MxCheckService {
  private readonly cache = new Map<string, MxCacheEntry>();
  private cacheEnabled: boolean;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsService;

  constructor(private readonly resolver: DnsResolver, deps: MxCheckDeps = {}) {
    this.cacheEnabled = deps.cacheEnabled ?? true;
    this.logger = deps.logger ?? createLogger({ component: 'mx-check' });
    this.metrics = deps.metrics ?? defaultMetrics;
  }

  async hasValidMX(domain: string): Promise<boolean> {
    return (await this.lookupMx(domain)).hasMx;
  }

  /**
   * MX check that also reports the resolver outcome and whether
   * the answer came from the cache
   */
  async lookupMx(domain: string): Promise<MxLookupResult> {
    const key = normalizeDomain(domain);
    if (!key) {
      return { domain: key, hasMx: false, outcome: 'skipped', cached: false };
    }

    if (this.cacheEnabled) {
      const entry = this.cache.get(key);
      if (entry) {
        this.metrics.recordMxLookup('cache', entry.hasMx);
        this.logger.mxLookup({ domain: key, hasMx: entry.hasMx, outcome: entry.outcome, cached: true });
        return { domain: key, hasMx: entry.hasMx, outcome: entry.outcome, cached: true };
      }
    }

    const outcome = await this.resolver.lookup(key, 'MX');
    const hasMx = outcome === 'found';

    if (this.cacheEnabled) {
      this.cache.set(key, { hasMx, outcome, cachedAt: Date.now() });
      this.metrics.updateMxCacheSize(this.cache.size);
    }

    this.metrics.recordMxLookup('resolver', hasMx);
    this.logger.mxLookup({ domain: key, hasMx, outcome, cached: false });
    return { domain: key, hasMx, outcome, cached: false };
  }

  /**
   * True when the domain has an A or an AAAA record. Never cached.
   */
  async hasValidDNS(domain: string): Promise<boolean> {
    const key = normalizeDomain(domain);
    if (!key) {
      return false;
    }
    return (await this.resolver.hasRecords(key, 'A')) || (await this.resolver.hasRecords(key, 'AAAA'));
  }

  setCachingEnabled(enabled: boolean): this {
    this.cacheEnabled = enabled;
    return this;
  }

  isCachingEnabled(): boolean {
    return this.cacheEnabled;
  }

  clearCache(): this {
    const entries = this.cache.size;
    this.cache.clear();
    this.metrics.updateMxCacheSize(0);
    this.logger.mxCacheCleared({ entries });
    return this;
  }

  getCacheSize(): number {
    return this.cache.size;
  }

  getCachedEntry(domain: string): MxCacheEntry | undefined {
    return this.cache.get(normalizeDomain(domain));
  }
}
