/**
 * DNS lookup types
 */

export type DnsRecordType = 'MX' | 'A' | 'AAAA';

/**
 * Outcome of a single resolver query.
 * 'not-found' means the name or record type does not exist,
 * 'failed' covers timeouts, refused queries and other transport errors.
 */
export type DnsLookupOutcome = 'found' | 'not-found' | 'failed';

/**
 * Resolver collaborator used by the MX check service
 */
export interface DnsResolver {
  lookup(domain: string, type: DnsRecordType): Promise<DnsLookupOutcome>;
  hasRecords(domain: string, type: DnsRecordType): Promise<boolean>;
}

export interface MxCacheEntry {
  hasMx: boolean;
  outcome: DnsLookupOutcome;
  cachedAt: number;
}

/**
 * Detailed answer for an MX check
 */
export interface MxLookupResult {
  domain: string | null;
  hasMx: boolean;
  /** 'skipped' when there was no domain to look up */
  outcome: DnsLookupOutcome | 'skipped';
  cached: boolean;
}
