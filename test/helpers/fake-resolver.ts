import type { DnsLookupOutcome, DnsRecordType, DnsResolver } from '../../src/types/dns.types.js';

/**
 * In-process resolver with scripted answers and a call log
 */
export class FakeResolver implements DnsResolver {
  readonly calls: Array<{ domain: string; type: DnsRecordType }> = [];
  private readonly answers = new Map<string, DnsLookupOutcome>();

  constructor(answers: Record<string, DnsLookupOutcome> = {}) {
    for (const [key, outcome] of Object.entries(answers)) {
      this.answers.set(key, outcome);
    }
  }

  /**
   * Sets the answer for a domain and record type ("example.com MX")
   */
  answer(domain: string, type: DnsRecordType, outcome: DnsLookupOutcome): this {
    this.answers.set(`${domain} ${type}`, outcome);
    return this;
  }

  async lookup(domain: string, type: DnsRecordType): Promise<DnsLookupOutcome> {
    this.calls.push({ domain, type });
    return this.answers.get(`${domain} ${type}`) ?? 'not-found';
  }

  async hasRecords(domain: string, type: DnsRecordType): Promise<boolean> {
    return (await this.lookup(domain, type)) === 'found';
  }

  callsFor(domain: string, type: DnsRecordType): number {
    return this.calls.filter((call) => call.domain === domain && call.type === type).length;
  }
}
