/**
 * Issuance Pipeline: validate → derive → render → record
 *
 * Orchestrates:
 *   1. Validate raw attributes (names, date, time)
 *   2. Derive the match key
 *   3. Render the message with display values and build the mailto payload
 *   4. Append a History Entry
 *   5. Emit one structured log line
 *
 * Steps 1-3 have no side effects: a validation or template error leaves the
 * ledger untouched. The token itself is never written to the log.
 */

import {
  formatCalendarDate,
  formatTimeOfDay,
  validateAttributeInput,
  type RawAttributeInput
} from './attributes.js';
import { errorTypeOf } from './errors.js';
import type { HistoryEntry } from './history_record.js';
import type { HistoryLedger } from './history_ledger.js';
import type { TokenDeriver } from './token_deriver.js';
import {
  buildMailtoLink,
  buildMessage,
  DEFAULT_SUBJECT,
  type MessagePayload
} from './template_renderer.js';

export interface IssuanceContext {
  deriver: TokenDeriver;
  ledger: HistoryLedger;
  template: string;
  recipient: string;
  subject?: string;
}

export interface IssueResult {
  token: string;
  message: MessagePayload;
  /** Payload for the external image encoder. */
  mailto: string;
  entry: HistoryEntry;
}

/** JSON log line format */
interface IssuanceLogEntry {
  event: 'TOKEN_ISSUED' | 'ISSUE_REJECTED';
  participant_a: string;
  participant_b: string;
  event_date: string;
  event_time: string;
  issued_at: string | null;
  error_type: string | null;
  reason: string | null;
}

function emitLog(entry: IssuanceLogEntry): void {
  process.stdout.write(JSON.stringify(entry) + '\n');
}

/**
 * Issue a match key and record it.
 * @throws InputValidationError, TemplateSyntaxError, StorageError, after logging ISSUE_REJECTED
 */
export function issueToken(input: RawAttributeInput, context: IssuanceContext): IssueResult {
  try {
    return _issue(input, context);
  } catch (err) {
    emitLog({
      event: 'ISSUE_REJECTED',
      participant_a: input.participant_a.trim(),
      participant_b: input.participant_b.trim(),
      event_date: input.event_date.trim(),
      event_time: input.event_time.trim(),
      issued_at: null,
      error_type: errorTypeOf(err),
      reason: err instanceof Error ? err.message : String(err)
    });
    throw err;
  }
}

function _issue(input: RawAttributeInput, context: IssuanceContext): IssueResult {
  // Step 1: Validate
  const attributes = validateAttributeInput(input);
  const eventDate = formatCalendarDate(attributes.event_date);
  const eventTime = formatTimeOfDay(attributes.event_time);

  // Step 2: Derive
  const token = context.deriver.deriveFor(attributes);

  // Step 3: Render (display values, not canonical keys)
  const message = buildMessage(
    context.template,
    {
      participant_a: attributes.participant_a,
      participant_b: attributes.participant_b,
      event_date: eventDate,
      event_time: eventTime,
      token
    },
    context.subject ?? DEFAULT_SUBJECT
  );
  const mailto = buildMailtoLink(context.recipient, message);

  // Step 4: Record
  const entry = context.ledger.createEntry(attributes, token);
  context.ledger.append(entry);

  // Step 5: Log issuance
  emitLog({
    event: 'TOKEN_ISSUED',
    participant_a: attributes.participant_a,
    participant_b: attributes.participant_b,
    event_date: eventDate,
    event_time: eventTime,
    issued_at: entry.issued_at,
    error_type: null,
    reason: null
  });

  return { token, message, mailto, entry };
}
