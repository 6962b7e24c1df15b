import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, readFile, unlink } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ListCache, ListFileError, ListLoaderService, parseList } from '../../src/services/list-loader.service.js';

/**
 * Unit Tests - List Loader Service
 *
 * Works against list files in a per-test temporary directory.
 */
describe('parseList', () => {
  it('should skip blank and comment lines', () => {
    const content = '# header\n\nmailinator.com\n; note\n  Tempmail.COM  \n\n';

    expect(parseList(content)).toEqual(['mailinator.com', 'tempmail.com']);
  });

  it('should handle CRLF line endings', () => {
    expect(parseList('a.com\r\nb.com\r\n')).toEqual(['a.com', 'b.com']);
  });

  it('should keep duplicates in file order', () => {
    expect(parseList('b.com\na.com\nb.com')).toEqual(['b.com', 'a.com', 'b.com']);
  });

  it('should return an empty list for empty content', () => {
    expect(parseList('')).toEqual([]);
  });
});

describe('ListLoaderService', () => {
  let dir: string;
  let blocklistPath: string;
  let allowlistPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'mailcheck-lists-'));
    blocklistPath = join(dir, 'blocklist.conf');
    allowlistPath = join(dir, 'allowlist.conf');
    await writeFile(blocklistPath, '# disposable\nmailinator.com\ntempmail.com\n', 'utf-8');
    await writeFile(allowlistPath, 'gmail.com\n', 'utf-8');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('loading', () => {
    it('should load both configured lists', async () => {
      const loader = new ListLoaderService({ blocklistPath, allowlistPath });

      expect(await loader.loadAll()).toEqual({
        blocklist: ['mailinator.com', 'tempmail.com'],
        allowlist: ['gmail.com'],
      });
    });

    it('should serve repeated loads from the cache', async () => {
      const cache = new ListCache();
      const loader = new ListLoaderService({ blocklistPath, allowlistPath, cache });

      await loader.loadBlocklist();
      await writeFile(blocklistPath, 'changed.com\n', 'utf-8');

      expect(await loader.loadBlocklist()).toEqual(['mailinator.com', 'tempmail.com']);
      expect(await loader.loadBlocklist(false)).toEqual(['changed.com']);
      expect(cache.has(blocklistPath)).toBe(true);
    });

    it('should reread the file after clearCache', async () => {
      const loader = new ListLoaderService({ blocklistPath, allowlistPath });

      await loader.loadBlocklist();
      await writeFile(blocklistPath, 'changed.com\n', 'utf-8');
      loader.clearCache();

      expect(await loader.loadBlocklist()).toEqual(['changed.com']);
    });

    it('should share a cache between loaders given the same instance', async () => {
      const cache = new ListCache();
      await new ListLoaderService({ blocklistPath, allowlistPath, cache }).loadAllowlist();
      await unlink(allowlistPath);

      const second = new ListLoaderService({ blocklistPath, allowlistPath, cache });

      expect(await second.loadAllowlist()).toEqual(['gmail.com']);
    });

    it('should hand out copies of cached lists', async () => {
      const loader = new ListLoaderService({ blocklistPath, allowlistPath });

      (await loader.loadBlocklist()).push('mutated.com');

      expect(await loader.loadBlocklist()).toEqual(['mailinator.com', 'tempmail.com']);
    });

    it('should load custom lists without caching them', async () => {
      const customPath = join(dir, 'custom.conf');
      await writeFile(customPath, 'Custom.Example\n', 'utf-8');
      const cache = new ListCache();
      const loader = new ListLoaderService({ blocklistPath, allowlistPath, cache });

      expect(await loader.loadCustomBlocklist(customPath)).toEqual(['custom.example']);
      expect(await loader.loadCustomAllowlist(customPath)).toEqual(['custom.example']);
      expect(cache.size).toBe(0);
    });

    it('should raise LIST_NOT_FOUND for a missing file', async () => {
      const missing = join(dir, 'missing.conf');
      const loader = new ListLoaderService({ blocklistPath: missing, allowlistPath });

      const error = await loader.loadBlocklist().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ListFileError);
      expect(error).toMatchObject({
        code: 'LIST_NOT_FOUND',
        filePath: missing,
        message: `List file not found: ${missing}`,
      });
    });
  });

  describe('file information', () => {
    it('should report paths, existence and counts', async () => {
      const loader = new ListLoaderService({ blocklistPath, allowlistPath: join(dir, 'absent.conf') });

      expect(loader.getBlocklistPath()).toBe(blocklistPath);
      expect(loader.getAllowlistPath()).toBe(join(dir, 'absent.conf'));
      expect(await loader.blocklistExists()).toBe(true);
      expect(await loader.allowlistExists()).toBe(false);
      expect(await loader.getBlocklistCount()).toBe(2);
    });
  });

  describe('mergeLists', () => {
    it('should union files in first occurrence order', async () => {
      const extraPath = join(dir, 'extra.conf');
      await writeFile(extraPath, 'tempmail.com\nyopmail.com\nMAILINATOR.com\n', 'utf-8');
      const loader = new ListLoaderService({ blocklistPath, allowlistPath });

      expect(await loader.mergeLists([blocklistPath, extraPath])).toEqual([
        'mailinator.com',
        'tempmail.com',
        'yopmail.com',
      ]);
    });

    it('should fail when any input is missing', async () => {
      const loader = new ListLoaderService({ blocklistPath, allowlistPath });

      await expect(loader.mergeLists([blocklistPath, join(dir, 'missing.conf')])).rejects.toBeInstanceOf(
        ListFileError
      );
    });
  });

  describe('saveList', () => {
    it('should write a sorted, deduplicated, lowercased list', async () => {
      const outputPath = join(dir, 'out.conf');
      const loader = new ListLoaderService({ blocklistPath, allowlistPath });

      const saved = await loader.saveList(outputPath, ['Zeta.com', ' alpha.com ', 'zeta.com', '', 'beta.com']);

      expect(saved).toEqual(['alpha.com', 'beta.com', 'zeta.com']);
      expect(await readFile(outputPath, 'utf-8')).toBe('alpha.com\nbeta.com\nzeta.com\n');
      expect(await loader.loadCustomBlocklist(outputPath)).toEqual(saved);
    });

    it('should write an empty file for an empty list', async () => {
      const outputPath = join(dir, 'empty.conf');
      const loader = new ListLoaderService({ blocklistPath, allowlistPath });

      expect(await loader.saveList(outputPath, [])).toEqual([]);
      expect(await readFile(outputPath, 'utf-8')).toBe('');
    });

    it('should raise LIST_WRITE_FAILED when the directory does not exist', async () => {
      const outputPath = join(dir, 'no-such-dir', 'out.conf');
      const loader = new ListLoaderService({ blocklistPath, allowlistPath });

      await expect(loader.saveList(outputPath, ['a.com'])).rejects.toMatchObject({
        code: 'LIST_WRITE_FAILED',
        filePath: outputPath,
      });
    });
  });
});

describe('bundled lists', () => {
  it('should ship a blocklist with well-known disposable domains', async () => {
    const loader = new ListLoaderService();

    expect(await loader.blocklistExists()).toBe(true);
    expect(await loader.loadBlocklist()).toContain('mailinator.com');
  });

  it('should ship an allowlist that contains gmail.com', async () => {
    const loader = new ListLoaderService();

    expect(await loader.allowlistExists()).toBe(true);
    expect(await loader.loadAllowlist()).toContain('gmail.com');
  });

  it('should read the packaged disposable-email-domains list', () => {
    const packaged = new ListLoaderService().loadPackagedBlocklist();

    expect(packaged.length).toBeGreaterThan(1000);
    expect(packaged.every((domain) => domain === domain.toLowerCase())).toBe(true);
  });
});
