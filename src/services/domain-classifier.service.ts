/**
 * Normalizes a domain for storage and comparison
 */
export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase();
}

/**
 * Set of lowercase domains, enumerated in insertion order
 */
export class DomainSet {
  private readonly domains = new Set<string>();

  constructor(initial: Iterable<string> = []) {
    for (const domain of initial) {
      this.add(domain);
    }
  }

  add(domain: string): boolean {
    const normalized = normalizeDomain(domain);
    if (!normalized || this.domains.has(normalized)) {
      return false;
    }
    this.domains.add(normalized);
    return true;
  }

  delete(domain: string): boolean {
    return this.domains.delete(normalizeDomain(domain));
  }

  has(domain: string): boolean {
    return this.domains.has(normalizeDomain(domain));
  }

  get size(): number {
    return this.domains.size;
  }

  toArray(): string[] {
    return [...this.domains];
  }
}

/**
 * Domain Classifier
 *
 * Decides whether a domain is disposable from a blocklist and an allowlist.
 * Allowlist membership always wins over blocklist membership; a domain in
 * neither list is not disposable.
 */
export class DomainClassifier {
  private readonly blocklist: DomainSet;
  private readonly allowlist: DomainSet;

  constructor(blocklist: Iterable<string> = [], allowlist: Iterable<string> = []) {
    this.blocklist = new DomainSet(blocklist);
    this.allowlist = new DomainSet(allowlist);
  }

  isDisposable(domain: string): boolean {
    if (this.allowlist.has(domain)) {
      return false;
    }
    return this.blocklist.has(domain);
  }

  /**
   * Raw membership, ignores the allowlist
   */
  isBlocklisted(domain: string): boolean {
    return this.blocklist.has(domain);
  }

  /**
   * Raw membership, ignores the blocklist
   */
  isAllowlisted(domain: string): boolean {
    return this.allowlist.has(domain);
  }

  addToBlocklist(domain: string): this {
    this.blocklist.add(domain);
    return this;
  }

  addManyToBlocklist(domains: Iterable<string>): this {
    for (const domain of domains) {
      this.addToBlocklist(domain);
    }
    return this;
  }

  addToAllowlist(domain: string): this {
    this.allowlist.add(domain);
    return this;
  }

  addManyToAllowlist(domains: Iterable<string>): this {
    for (const domain of domains) {
      this.addToAllowlist(domain);
    }
    return this;
  }

  removeFromBlocklist(domain: string): this {
    this.blocklist.delete(domain);
    return this;
  }

  removeFromAllowlist(domain: string): this {
    this.allowlist.delete(domain);
    return this;
  }

  getBlocklist(): string[] {
    return this.blocklist.toArray();
  }

  getAllowlist(): string[] {
    return this.allowlist.toArray();
  }

  getBlocklistCount(): number {
    return this.blocklist.size;
  }

  getAllowlistCount(): number {
    return this.allowlist.size;
  }
}
