import { describe, it, expect } from 'vitest';
import { DomainClassifier, DomainSet } from '../../src/services/domain-classifier.service.js';

/**
 * Unit Tests - Domain Classifier
 *
 * Allowlist-over-blocklist precedence, set semantics and
 * case-insensitive lookups.
 */
describe('DomainSet', () => {
  it('should normalize and deduplicate initial entries', () => {
    const set = new DomainSet(['Example.COM', '  example.com ', 'other.org']);

    expect(set.size).toBe(2);
    expect(set.toArray()).toEqual(['example.com', 'other.org']);
  });

  it('should ignore blank domains', () => {
    const set = new DomainSet();

    expect(set.add('   ')).toBe(false);
    expect(set.size).toBe(0);
  });

  it('should report whether add and delete changed the set', () => {
    const set = new DomainSet();

    expect(set.add('a.com')).toBe(true);
    expect(set.add('A.com')).toBe(false);
    expect(set.delete('a.COM')).toBe(true);
    expect(set.delete('a.com')).toBe(false);
  });
});

describe('DomainClassifier', () => {
  describe('isDisposable', () => {
    it('should flag blocklisted domains', () => {
      const classifier = new DomainClassifier(['mailinator.com'], []);

      expect(classifier.isDisposable('mailinator.com')).toBe(true);
    });

    it('should not flag domains in neither list', () => {
      const classifier = new DomainClassifier(['mailinator.com'], ['gmail.com']);

      expect(classifier.isDisposable('example.com')).toBe(false);
    });

    it('should let the allowlist win over the blocklist', () => {
      const classifier = new DomainClassifier(['both.com'], ['both.com']);

      expect(classifier.isDisposable('both.com')).toBe(false);
      expect(classifier.isBlocklisted('both.com')).toBe(true);
      expect(classifier.isAllowlisted('both.com')).toBe(true);
    });

    it('should flip to false as soon as a blocklisted domain is allowlisted', () => {
      const classifier = new DomainClassifier(['mailinator.com'], []);
      expect(classifier.isDisposable('mailinator.com')).toBe(true);

      classifier.addToAllowlist('mailinator.com');

      expect(classifier.isDisposable('mailinator.com')).toBe(false);
    });

    it('should give the same answer whichever list was filled first', () => {
      const allowFirst = new DomainClassifier().addToAllowlist('x.com').addToBlocklist('x.com');
      const blockFirst = new DomainClassifier().addToBlocklist('x.com').addToAllowlist('x.com');

      expect(allowFirst.isDisposable('x.com')).toBe(false);
      expect(blockFirst.isDisposable('x.com')).toBe(false);
    });

    it('should compare case-insensitively', () => {
      const classifier = new DomainClassifier(['MailInator.com'], []);

      expect(classifier.isDisposable('MAILINATOR.COM')).toBe(true);
      expect(classifier.isDisposable(' mailinator.com ')).toBe(true);
    });

    it('should become disposable again when removed from the allowlist', () => {
      const classifier = new DomainClassifier(['test.com'], ['test.com']);

      classifier.removeFromAllowlist('TEST.com');

      expect(classifier.isDisposable('test.com')).toBe(true);
    });
  });

  describe('list mutation', () => {
    it('should keep a single entry when the same domain is added twice', () => {
      const classifier = new DomainClassifier();

      classifier.addToBlocklist('test.com').addToBlocklist('test.com');
      classifier.addToAllowlist('ok.com').addToAllowlist(' OK.com');

      expect(classifier.getBlocklistCount()).toBe(1);
      expect(classifier.getAllowlistCount()).toBe(1);
    });

    it('should add many domains at once', () => {
      const classifier = new DomainClassifier();

      classifier.addManyToBlocklist(['domain1.com', 'domain2.com', 'DOMAIN1.com']);
      classifier.addManyToAllowlist(['safe1.com', 'safe2.com']);

      expect(classifier.getBlocklist()).toEqual(['domain1.com', 'domain2.com']);
      expect(classifier.getAllowlist()).toEqual(['safe1.com', 'safe2.com']);
    });

    it('should treat removing an absent domain as a no-op', () => {
      const classifier = new DomainClassifier(['a.com', 'b.com'], []);

      classifier.removeFromBlocklist('missing.com');

      expect(classifier.getBlocklist()).toEqual(['a.com', 'b.com']);
    });

    it('should remove a present domain', () => {
      const classifier = new DomainClassifier(['test.com'], []);

      classifier.removeFromBlocklist(' Test.Com ');

      expect(classifier.isDisposable('test.com')).toBe(false);
      expect(classifier.getBlocklistCount()).toBe(0);
    });

    it('should enumerate in insertion order', () => {
      const classifier = new DomainClassifier(['c.com', 'a.com'], []);

      classifier.addToBlocklist('b.com');

      expect(classifier.getBlocklist()).toEqual(['c.com', 'a.com', 'b.com']);
    });

    it('should return copies that do not alter the lists', () => {
      const classifier = new DomainClassifier(['a.com'], []);

      classifier.getBlocklist().push('b.com');

      expect(classifier.getBlocklistCount()).toBe(1);
    });
  });

  describe('membership queries', () => {
    it('should not consult the allowlist for isBlocklisted', () => {
      const classifier = new DomainClassifier(['blocked.com'], ['blocked.com']);

      expect(classifier.isBlocklisted('blocked.com')).toBe(true);
      expect(classifier.isBlocklisted('other.com')).toBe(false);
    });

    it('should report allowlist membership', () => {
      const classifier = new DomainClassifier([], ['allowed.com']);

      expect(classifier.isAllowlisted('ALLOWED.com')).toBe(true);
      expect(classifier.isAllowlisted('other.com')).toBe(false);
    });
  });
});
