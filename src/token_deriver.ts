/**
 * Token Deriver: keyed, truncated SHA-256 of the canonical attributes.
 *
 * Hash input (order and delimiter are part of the wire contract):
 *   canonical_a;canonical_b;YYYY-MM-DD;HH:MM;SECRET
 *
 * Token = first tokenLength hex chars of SHA256(input), uppercased.
 * Same attributes + same secret always produce the same token.
 * Swapping the participants changes the token unless both canonicalize equally.
 */

import { createHash } from 'crypto';
import { canonicalize } from './canonicalize.js';
import {
  formatCalendarDate,
  formatTimeOfDay,
  type AttributeSet,
  type CalendarDate,
  type TimeOfDay
} from './attributes.js';
import { InputValidationError } from './errors.js';

export const DEFAULT_TOKEN_LENGTH = 10;
const MIN_TOKEN_LENGTH = 4;  // the verifier always reveals the last 4
const MAX_TOKEN_LENGTH = 64; // full SHA-256 hex digest

const FIELD_DELIMITER = ';';

export interface TokenDeriverOptions {
  secret: string;
  /** Truncation length in hex characters. Defaults to 10 (40 bits). */
  tokenLength?: number;
}

export class TokenDeriver {
  private readonly _secret: string;
  public readonly tokenLength: number;

  constructor(options: TokenDeriverOptions) {
    const tokenLength = options.tokenLength ?? DEFAULT_TOKEN_LENGTH;
    if (
      !Number.isInteger(tokenLength) ||
      tokenLength < MIN_TOKEN_LENGTH ||
      tokenLength > MAX_TOKEN_LENGTH
    ) {
      throw new InputValidationError(
        'INVALID_TOKEN_LENGTH',
        `tokenLength must be an integer in [${MIN_TOKEN_LENGTH}, ${MAX_TOKEN_LENGTH}], got ${tokenLength}`
      );
    }
    this._secret = options.secret;
    this.tokenLength = tokenLength;
  }

  derive(participantA: string, participantB: string, date: CalendarDate, time: TimeOfDay): string {
    const input = [
      canonicalize(participantA),
      canonicalize(participantB),
      formatCalendarDate(date),
      formatTimeOfDay(time),
      this._secret
    ].join(FIELD_DELIMITER);

    return createHash('sha256')
      .update(input, 'utf8')
      .digest('hex')
      .slice(0, this.tokenLength)
      .toUpperCase();
  }

  deriveFor(attributes: AttributeSet): string {
    return this.derive(
      attributes.participant_a,
      attributes.participant_b,
      attributes.event_date,
      attributes.event_time
    );
  }
}
