import { readFile, writeFile, access } from 'fs/promises';
import { constants } from 'fs';
import { createRequire } from 'module';
import { fileURLToPath } from 'url';
import type { DomainLists, ListFileErrorCode } from '../types/list.types.js';
import { createLogger, type StructuredLogger } from './logger.service.js';

const DEFAULT_BLOCKLIST_PATH = fileURLToPath(new URL('../../data/blocklist.conf', import.meta.url));
const DEFAULT_ALLOWLIST_PATH = fileURLToPath(new URL('../../data/allowlist.conf', import.meta.url));

const requirePackage = createRequire(import.meta.url);

/**
 * Raised when a list file cannot be read or written
 */
export class ListFileError extends Error {
  constructor(
    public readonly code: ListFileErrorCode,
    public readonly filePath: string,
    message: string
  ) {
    super(message);
    this.name = 'ListFileError';
  }
}

/**
 * Parsed lists keyed by file path, owned by a loader instance
 */
export class ListCache {
  private readonly entries = new Map<string, string[]>();

  get(filePath: string): string[] | undefined {
    const domains = this.entries.get(filePath);
    return domains ? [...domains] : undefined;
  }

  set(filePath: string, domains: readonly string[]): void {
    this.entries.set(filePath, [...domains]);
  }

  has(filePath: string): boolean {
    return this.entries.has(filePath);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Parses list file content.
 * Blank lines and lines starting with '#' or ';' are skipped,
 * every other line is trimmed and lowercased.
 */
export function parseList(content: string): string[] {
  const domains: string[] = [];
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) {
      continue;
    }
    domains.push(line.toLowerCase());
  }
  return domains;
}

export interface ListLoaderOptions {
  blocklistPath?: string;
  allowlistPath?: string;
  cache?: ListCache;
  logger?: StructuredLogger;
}

/**
 * List Loader Service
 *
 * Reads and writes the flat domain list files (one domain per line).
 */
export class ListLoaderService {
  private readonly blocklistPath: string;
  private readonly allowlistPath: string;
  private readonly cache: ListCache;
  private readonly logger: StructuredLogger;

  constructor(options: ListLoaderOptions = {}) {
    this.blocklistPath = options.blocklistPath ?? DEFAULT_BLOCKLIST_PATH;
    this.allowlistPath = options.allowlistPath ?? DEFAULT_ALLOWLIST_PATH;
    this.cache = options.cache ?? new ListCache();
    this.logger = options.logger ?? createLogger({ component: 'list-loader' });
  }

  async loadBlocklist(useCache = true): Promise<string[]> {
    return this.loadCached(this.blocklistPath, useCache);
  }

  async loadAllowlist(useCache = true): Promise<string[]> {
    return this.loadCached(this.allowlistPath, useCache);
  }

  async loadCustomBlocklist(filePath: string): Promise<string[]> {
    return this.loadList(filePath);
  }

  async loadCustomAllowlist(filePath: string): Promise<string[]> {
    return this.loadList(filePath);
  }

  async loadAll(useCache = true): Promise<DomainLists> {
    return {
      blocklist: await this.loadBlocklist(useCache),
      allowlist: await this.loadAllowlist(useCache),
    };
  }

  /**
   * Domains shipped by the disposable-email-domains package
   */
  loadPackagedBlocklist(): string[] {
    const packaged: unknown = requirePackage('disposable-email-domains');
    if (!Array.isArray(packaged)) {
      return [];
    }
    return packaged
      .filter((entry): entry is string => typeof entry === 'string')
      .map((entry) => entry.trim().toLowerCase())
      .filter((entry) => entry.length > 0);
  }

  clearCache(): void {
    this.cache.clear();
  }

  getBlocklistPath(): string {
    return this.blocklistPath;
  }

  getAllowlistPath(): string {
    return this.allowlistPath;
  }

  async blocklistExists(): Promise<boolean> {
    return this.fileExists(this.blocklistPath);
  }

  async allowlistExists(): Promise<boolean> {
    return this.fileExists(this.allowlistPath);
  }

  async getBlocklistCount(): Promise<number> {
    return (await this.loadBlocklist()).length;
  }

  async getAllowlistCount(): Promise<number> {
    return (await this.loadAllowlist()).length;
  }

  /**
   * Loads several list files and returns their union, first occurrence order
   */
  async mergeLists(filePaths: readonly string[]): Promise<string[]> {
    const merged = new Set<string>();
    for (const filePath of filePaths) {
      for (const domain of await this.loadList(filePath)) {
        merged.add(domain);
      }
    }
    return [...merged];
  }

  /**
   * Writes domains trimmed, lowercased, deduplicated and sorted, one per line
   */
  async saveList(filePath: string, domains: Iterable<string>): Promise<string[]> {
    const normalized = [
      ...new Set([...domains].map((domain) => domain.trim().toLowerCase()).filter((domain) => domain.length > 0)),
    ].sort();

    try {
      await writeFile(filePath, normalized.length > 0 ? `${normalized.join('\n')}\n` : '', 'utf-8');
    } catch (error) {
      throw new ListFileError(
        'LIST_WRITE_FAILED',
        filePath,
        `Unable to write list file: ${filePath} (${error instanceof Error ? error.message : String(error)})`
      );
    }

    this.logger.listSaved({ filePath, count: normalized.length });
    return normalized;
  }

  private async loadCached(filePath: string, useCache: boolean): Promise<string[]> {
    if (useCache) {
      const cached = this.cache.get(filePath);
      if (cached) {
        this.logger.listLoaded({ filePath, count: cached.length, cached: true });
        return cached;
      }
    }

    const domains = await this.loadList(filePath);
    if (useCache) {
      this.cache.set(filePath, domains);
    }
    return domains;
  }

  private async loadList(filePath: string): Promise<string[]> {
    if (!(await this.fileExists(filePath))) {
      throw new ListFileError('LIST_NOT_FOUND', filePath, `List file not found: ${filePath}`);
    }

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      throw new ListFileError(
        'LIST_NOT_READABLE',
        filePath,
        `List file is not readable: ${filePath} (${error instanceof Error ? error.message : String(error)})`
      );
    }

    const domains = parseList(content);
    this.logger.listLoaded({ filePath, count: domains.length, cached: false });
    return domains;
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }
}
