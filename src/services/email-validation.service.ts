import validator from 'validator';
import {
  EmailInvalidReason,
  INVALID_REASON_MESSAGES,
  type ValidationResult,
  type ValidationStatistics,
} from '../types/validation.types.js';
import type { DnsResolver, MxLookupResult } from '../types/dns.types.js';
import { DomainClassifier } from './domain-classifier.service.js';
import { MxCheckService } from './mx-check.service.js';
import { NodeDnsResolver } from './dns-resolver.service.js';
import { ListLoaderService } from './list-loader.service.js';
import { createLogger, type StructuredLogger } from './logger.service.js';
import { metrics as defaultMetrics, type MetricsService } from './metrics.service.js';

export interface EmailValidationDeps {
  resolver?: DnsResolver;
  cacheEnabled?: boolean;
  logger?: StructuredLogger;
  metrics?: MetricsService;
}

export interface CreateEmailValidationOptions extends EmailValidationDeps {
  loader?: ListLoaderService;
  /** Merge the disposable-email-domains package list into the blocklist */
  includePackagedBlocklist?: boolean;
}

/**
 * Email validation service with layered validation approach
 *
 * Layers, always in this order:
 * 1. Syntax validation (validator.isEmail)
 * 2. Disposable domain detection (blocklist, overridden by allowlist)
 * 3. MX record lookup (optional, cached per domain)
 */
export class EmailValidationService {
  private readonly classifier: DomainClassifier;
  private readonly mxCheck: MxCheckService;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsService;

  constructor(
    blocklist: Iterable<string> = [],
    allowlist: Iterable<string> = [],
    deps: EmailValidationDeps = {}
  ) {
    this.logger = deps.logger ?? createLogger({ component: 'email-validation' });
    this.metrics = deps.metrics ?? defaultMetrics;
    this.classifier = new DomainClassifier(blocklist, allowlist);
    this.mxCheck = new MxCheckService(deps.resolver ?? new NodeDnsResolver(), {
      cacheEnabled: deps.cacheEnabled,
      logger: this.logger,
      metrics: this.metrics,
    });
    this.reportListSizes();
  }

  /**
   * Builds a service from the bundled (or configured) block and allow lists
   */
  static async create(options: CreateEmailValidationOptions = {}): Promise<EmailValidationService> {
    const loader = options.loader ?? new ListLoaderService();
    const { blocklist, allowlist } = await loader.loadAll();

    const service = new EmailValidationService(blocklist, allowlist, options);
    if (options.includePackagedBlocklist) {
      service.addManyToBlocklist(loader.loadPackagedBlocklist());
    }
    return service;
  }

  isValidFormat(email: string): boolean {
    if (!email) {
      return false;
    }
    return validator.isEmail(email);
  }

  isDisposable(email: string): boolean {
    const domain = this.extractDomain(email);
    return domain !== null && this.classifier.isDisposable(domain);
  }

  isBlocklisted(email: string): boolean {
    const domain = this.extractDomain(email);
    return domain !== null && this.classifier.isBlocklisted(domain);
  }

  isAllowlisted(email: string): boolean {
    const domain = this.extractDomain(email);
    return domain !== null && this.classifier.isAllowlisted(domain);
  }

  /**
   * Domain-level checks, for callers that have no address
   */
  isDisposableDomain(domain: string): boolean {
    return this.classifier.isDisposable(domain);
  }

  isBlocklistedDomain(domain: string): boolean {
    return this.classifier.isBlocklisted(domain);
  }

  isAllowlistedDomain(domain: string): boolean {
    return this.classifier.isAllowlisted(domain);
  }

  async hasValidMX(email: string): Promise<boolean> {
    const domain = this.extractDomain(email);
    if (domain === null) {
      return false;
    }
    return this.mxCheck.hasValidMX(domain);
  }

  /**
   * MX check that separates "no record" from "lookup failed"
   */
  async lookupMx(email: string): Promise<MxLookupResult> {
    const domain = this.extractDomain(email);
    if (domain === null) {
      return { domain: null, hasMx: false, outcome: 'skipped', cached: false };
    }
    return this.mxCheck.lookupMx(domain);
  }

  async hasValidDNS(email: string): Promise<boolean> {
    const domain = this.extractDomain(email);
    if (domain === null) {
      return false;
    }
    return this.mxCheck.hasValidDNS(domain);
  }

  /**
   * Stops at the first failing layer
   */
  async isValid(email: string, checkMx = true): Promise<boolean> {
    if (!this.isValidFormat(email)) {
      return false;
    }
    if (this.isDisposable(email)) {
      return false;
    }
    if (checkMx && !(await this.hasValidMX(email))) {
      return false;
    }
    return true;
  }

  /**
   * Runs every applicable layer and records each failure.
   * Disposable and MX checks only run for well-formed addresses.
   */
  async validateWithDetails(email: string, checkMx = true): Promise<ValidationResult> {
    const reasons: EmailInvalidReason[] = [];
    const result: ValidationResult = {
      valid: true,
      format: this.isValidFormat(email),
      disposable: false,
      mx: null,
      domain: this.extractDomain(email),
      errors: [],
    };

    if (!result.format) {
      reasons.push(EmailInvalidReason.SYNTAX);
    } else {
      result.disposable = this.isDisposable(email);
      if (result.disposable) {
        reasons.push(EmailInvalidReason.DISPOSABLE);
      }

      if (checkMx) {
        result.mx = await this.hasValidMX(email);
        if (!result.mx) {
          reasons.push(EmailInvalidReason.MX_FAIL);
        }
      }
    }

    result.valid = reasons.length === 0;
    result.errors = reasons.map((reason) => INVALID_REASON_MESSAGES[reason]);

    this.metrics.recordEmailValidation(result.valid, reasons);
    this.logger.emailValidated({
      email,
      domain: result.domain,
      valid: result.valid,
      errors: result.errors,
    });

    return result;
  }

  /**
   * Results keyed by the exact input string; repeated inputs share one entry
   */
  async validateMultiple(emails: Iterable<string>, checkMx = true): Promise<Map<string, ValidationResult>> {
    const results = new Map<string, ValidationResult>();

    // Sequential so resolver calls are not fanned out
    for (const email of emails) {
      results.set(email, await this.validateWithDetails(email, checkMx));
    }

    return results;
  }

  async filterValid(emails: readonly string[], checkMx = true): Promise<string[]> {
    const valid: string[] = [];
    for (const email of emails) {
      if (await this.isValid(email, checkMx)) {
        valid.push(email);
      }
    }
    return valid;
  }

  async filterInvalid(emails: readonly string[], checkMx = true): Promise<string[]> {
    const invalid: string[] = [];
    for (const email of emails) {
      if (!(await this.isValid(email, checkMx))) {
        invalid.push(email);
      }
    }
    return invalid;
  }

  async getStatistics(emails: readonly string[], checkMx = true): Promise<ValidationStatistics> {
    const stats: ValidationStatistics = {
      total: emails.length,
      valid: 0,
      invalid: 0,
      invalidFormat: 0,
      disposable: 0,
    };
    let noMx = 0;

    for (const email of emails) {
      const result = await this.validateWithDetails(email, checkMx);

      if (result.valid) {
        stats.valid++;
      } else {
        stats.invalid++;
      }
      if (!result.format) {
        stats.invalidFormat++;
      }
      if (result.disposable) {
        stats.disposable++;
      }
      if (result.mx === false) {
        noMx++;
      }
    }

    if (checkMx) {
      stats.noMx = noMx;
    }
    return stats;
  }

  /**
   * Lowercased text after the last '@', or null when there is no '@'
   */
  extractDomain(email: string): string | null {
    const atPos = email.lastIndexOf('@');
    if (atPos === -1) {
      return null;
    }
    return email.slice(atPos + 1).toLowerCase();
  }

  /**
   * Text before the last '@', or null when there is no '@'
   */
  extractLocalPart(email: string): string | null {
    const atPos = email.lastIndexOf('@');
    if (atPos === -1) {
      return null;
    }
    return email.slice(0, atPos);
  }

  /**
   * Trims and lowercases the whole address, local part included
   */
  normalize(email: string): string {
    return email.trim().toLowerCase();
  }

  normalizeMultiple(emails: readonly string[]): string[] {
    return emails.map((email) => this.normalize(email));
  }

  addToBlocklist(domain: string): this {
    this.classifier.addToBlocklist(domain);
    this.reportListSizes();
    return this;
  }

  addManyToBlocklist(domains: Iterable<string>): this {
    this.classifier.addManyToBlocklist(domains);
    this.reportListSizes();
    return this;
  }

  addToAllowlist(domain: string): this {
    this.classifier.addToAllowlist(domain);
    this.reportListSizes();
    return this;
  }

  addManyToAllowlist(domains: Iterable<string>): this {
    this.classifier.addManyToAllowlist(domains);
    this.reportListSizes();
    return this;
  }

  removeFromBlocklist(domain: string): this {
    this.classifier.removeFromBlocklist(domain);
    this.reportListSizes();
    return this;
  }

  removeFromAllowlist(domain: string): this {
    this.classifier.removeFromAllowlist(domain);
    this.reportListSizes();
    return this;
  }

  getBlocklist(): string[] {
    return this.classifier.getBlocklist();
  }

  getAllowlist(): string[] {
    return this.classifier.getAllowlist();
  }

  getBlocklistCount(): number {
    return this.classifier.getBlocklistCount();
  }

  getAllowlistCount(): number {
    return this.classifier.getAllowlistCount();
  }

  setCacheEnabled(enabled: boolean): this {
    this.mxCheck.setCachingEnabled(enabled);
    return this;
  }

  isCacheEnabled(): boolean {
    return this.mxCheck.isCachingEnabled();
  }

  clearCache(): this {
    this.mxCheck.clearCache();
    return this;
  }

  getCacheSize(): number {
    return this.mxCheck.getCacheSize();
  }

  private reportListSizes(): void {
    this.metrics.updateListSize('blocklist', this.classifier.getBlocklistCount());
    this.metrics.updateListSize('allowlist', this.classifier.getAllowlistCount());
  }
}
