/**
 * Verifier: recompute the expected token and compare.
 *
 * Precondition checks run before any comparison:
 *   1. both participant names non-empty
 *   2. candidate (trimmed) is exactly tokenLength characters → else InputLengthError
 *
 * The diagnostic never shows more than the last 4 characters of the expected token.
 */

import {
  formatCalendarDate,
  formatLocalTimestamp,
  formatTimeOfDay,
  type AttributeSet
} from './attributes.js';
import { InputLengthError, InputValidationError } from './errors.js';
import type { TokenDeriver } from './token_deriver.js';

const VISIBLE_SUFFIX = 4;
const MASK_CHAR = '*';

export interface VerificationResult {
  valid: boolean;
  /** Expected token with all but the last 4 characters masked. */
  expected_masked: string;
  /** Candidate as compared: trimmed, uppercased. */
  candidate: string;
}

export function maskToken(token: string): string {
  const hidden = Math.max(token.length - VISIBLE_SUFFIX, 0);
  return MASK_CHAR.repeat(hidden) + token.slice(hidden);
}

/**
 * @throws InputValidationError if a participant name is empty
 * @throws InputLengthError if the trimmed candidate has the wrong length
 */
export function verify(
  deriver: TokenDeriver,
  attributes: AttributeSet,
  candidateToken: string
): VerificationResult {
  if (!attributes.participant_a.trim() || !attributes.participant_b.trim()) {
    throw new InputValidationError('MISSING_ATTRIBUTE', 'Both participant names are required');
  }

  const candidate = candidateToken.trim().toUpperCase();
  if (candidate.length !== deriver.tokenLength) {
    throw new InputLengthError(deriver.tokenLength, candidate.length);
  }

  const expected = deriver.deriveFor(attributes);

  return {
    valid: candidate === expected,
    expected_masked: maskToken(expected),
    candidate
  };
}

/** Plain-text diagnostic block shown to the person checking a key. */
export function formatVerificationReport(
  result: VerificationResult,
  attributes: AttributeSet,
  checkedAt: Date
): string {
  return [
    'VERIFICATION DETAILS',
    '='.repeat(50),
    '',
    `RESULT: ${result.valid ? 'VALID' : 'INVALID'}`,
    '',
    'KEYS:',
    `   Supplied key   : ${result.candidate}`,
    `   Expected key   : ${result.expected_masked}`,
    '',
    'MATCH:',
    `   Participant A  : ${attributes.participant_a}`,
    `   Participant B  : ${attributes.participant_b}`,
    `   Date           : ${formatCalendarDate(attributes.event_date)}`,
    `   Time           : ${formatTimeOfDay(attributes.event_time)}`,
    '',
    `Checked at ${formatLocalTimestamp(checkedAt)}`
  ].join('\n');
}
