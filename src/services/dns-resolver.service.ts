import { promises as dns } from 'dns';
import type { MxRecord } from 'dns';
import { domainToASCII } from 'url';
import type { DnsLookupOutcome, DnsRecordType, DnsResolver } from '../types/dns.types.js';
import { createLogger, type StructuredLogger } from './logger.service.js';
import { metrics as defaultMetrics, type MetricsService } from './metrics.service.js';

/**
 * Subset of Node's DNS resolver used for lookups
 */
export interface DnsClient {
  resolveMx(hostname: string): Promise<MxRecord[]>;
  resolve4(hostname: string): Promise<string[]>;
  resolve6(hostname: string): Promise<string[]>;
}

export interface NodeDnsResolverConfig {
  timeoutMs: number;
  tries: number;
  servers?: string[];
}

export interface NodeDnsResolverDeps {
  client?: DnsClient;
  logger?: StructuredLogger;
  metrics?: MetricsService;
}

// Answers that mean the record does not exist rather than that the query failed
const NOT_FOUND_CODES = new Set<string>(['ENODATA', 'ENOTFOUND']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * A null MX (RFC 7505) is a single record with an empty exchange.
 * Node reports it as '' and some servers as '.'.
 */
function hasUsableExchange(records: MxRecord[]): boolean {
  return records.some((record) => record.exchange !== '' && record.exchange !== '.');
}

/**
 * DNS resolver backed by Node's `dns` module.
 *
 * Every lookup resolves to a tri-state outcome; nothing is thrown to the caller.
 */
export class NodeDnsResolver implements DnsResolver {
  private readonly client: DnsClient;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsService;

  constructor(
    config: NodeDnsResolverConfig = { timeoutMs: 5000, tries: 2 },
    deps: NodeDnsResolverDeps = {}
  ) {
    this.client = deps.client ?? NodeDnsResolver.createClient(config);
    this.logger = deps.logger ?? createLogger({ component: 'dns-resolver' });
    this.metrics = deps.metrics ?? defaultMetrics;
  }

  private static createClient(config: NodeDnsResolverConfig): DnsClient {
    const resolver = new dns.Resolver({ timeout: config.timeoutMs, tries: config.tries });
    if (config.servers && config.servers.length > 0) {
      resolver.setServers(config.servers);
    }
    return resolver;
  }

  async lookup(domain: string, type: DnsRecordType): Promise<DnsLookupOutcome> {
    const outcome = await this.query(domain, type);
    this.metrics.recordDnsLookup(type, outcome);
    return outcome;
  }

  async hasRecords(domain: string, type: DnsRecordType): Promise<boolean> {
    return (await this.lookup(domain, type)) === 'found';
  }

  private async query(domain: string, type: DnsRecordType): Promise<DnsLookupOutcome> {
    // The resolver does no IDNA conversion; '' means the name has no ASCII form
    const hostname = domainToASCII(domain);
    if (!hostname) {
      return 'not-found';
    }

    try {
      switch (type) {
        case 'MX':
          return hasUsableExchange(await this.client.resolveMx(hostname)) ? 'found' : 'not-found';
        case 'A':
          return (await this.client.resolve4(hostname)).length > 0 ? 'found' : 'not-found';
        case 'AAAA':
          return (await this.client.resolve6(hostname)).length > 0 ? 'found' : 'not-found';
      }
    } catch (error) {
      const code = errorCode(error);
      if (code !== undefined && NOT_FOUND_CODES.has(code)) {
        return 'not-found';
      }

      this.logger.dnsLookupFailed({
        domain,
        type,
        code,
        error: error instanceof Error ? error.message : String(error),
      });
      return 'failed';
    }
  }
}
