/**
 * Operation: which action the runner performs.
 *
 * ISSUE   derive a key, render the message, record it in history
 * VERIFY  recompute and compare a claimed key
 * PREVIEW render the saved template with sample values
 * HISTORY list history rows (newest first, keys omitted)
 * STATS   total and issued-today counts
 * CLEAR   empty the history (irreversible)
 * AUDIT   re-derive every stored key and report mismatches
 */

import { InputValidationError } from '../errors.js';

export enum Operation {
  ISSUE = 'ISSUE',
  VERIFY = 'VERIFY',
  PREVIEW = 'PREVIEW',
  HISTORY = 'HISTORY',
  STATS = 'STATS',
  CLEAR = 'CLEAR',
  AUDIT = 'AUDIT'
}

function isOperation(value: string): value is Operation {
  return Object.values(Operation).some((op) => op === value);
}

/**
 * Parse operation from a string input. Case-insensitive, no default.
 * @throws InputValidationError('UNKNOWN_OPERATION')
 */
export function parseOperation(raw: string): Operation {
  const value = raw.trim().toUpperCase();
  if (isOperation(value)) return value;
  throw new InputValidationError(
    'UNKNOWN_OPERATION',
    `operation must be one of ${Object.values(Operation).join(', ')}, got: "${raw}"`
  );
}

export function parseOperationFromEnv(): Operation {
  return parseOperation(process.env['INPUT_OPERATION'] ?? process.env['OPERATION'] ?? '');
}
