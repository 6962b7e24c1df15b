/**
 * Domain list types
 */

export type ListKind = 'blocklist' | 'allowlist';

export interface DomainLists {
  blocklist: string[];
  allowlist: string[];
}

export type ListFileErrorCode = 'LIST_NOT_FOUND' | 'LIST_NOT_READABLE' | 'LIST_WRITE_FAILED';
