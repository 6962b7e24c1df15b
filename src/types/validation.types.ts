/**
 * Email validation types and enums
 */

/**
 * Reasons why an email is invalid, in the order checks run
 */
export enum EmailInvalidReason {
  SYNTAX = 'syntax',
  DISPOSABLE = 'disposable',
  MX_FAIL = 'mx-fail',
}

/**
 * Human-readable message recorded for each failing check
 */
export const INVALID_REASON_MESSAGES: Record<EmailInvalidReason, string> = {
  [EmailInvalidReason.SYNTAX]: 'Invalid email format',
  [EmailInvalidReason.DISPOSABLE]: 'Disposable email address',
  [EmailInvalidReason.MX_FAIL]: 'No valid MX record found',
};

/**
 * Detailed result of validating one email
 */
export interface ValidationResult {
  valid: boolean;
  format: boolean;
  disposable: boolean;
  /** null when the MX check was not performed */
  mx: boolean | null;
  /** null when the input has no '@' */
  domain: string | null;
  errors: string[];
}

/**
 * Aggregate counts over a batch of emails
 */
export interface ValidationStatistics {
  total: number;
  valid: number;
  invalid: number;
  invalidFormat: number;
  disposable: number;
  /** Only present when MX records were checked */
  noMx?: number;
}
