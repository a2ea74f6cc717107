/**
 * Action Runner Tests: operation parsing, inputs, dispatch
 *
 * Run: npx tsx --test tests/action_runner.spec.ts
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { runOperation, type RunContext } from '../src/action_runner.js';
import {
  DEFAULT_HISTORY_PATH,
  DEFAULT_RECIPIENT,
  DEFAULT_SETTINGS_PATH,
  readActionInputs,
  type ActionInputs
} from '../src/config/inputs.js';
import { Operation, parseOperation } from '../src/config/operation.js';
import { defaultSettings } from '../src/config/settings.js';
import { HistoryLedger } from '../src/history_ledger.js';
import { MemoryHistoryStore } from '../src/stores/memory_store.js';
import { TokenDeriver } from '../src/token_deriver.js';
import { DEFAULT_TEMPLATE, previewTemplate } from '../src/template_renderer.js';
import { InputLengthError, InputValidationError } from '../src/errors.js';

const NOW = new Date(2025, 5, 20, 10, 0, 0);

function makeContext(): RunContext {
  const clock = (): Date => new Date(NOW.getTime());
  return {
    deriver: new TokenDeriver({ secret: 'test-secret' }),
    ledger: new HistoryLedger(new MemoryHistoryStore(), clock),
    settings: defaultSettings(NOW),
    clock
  };
}

function makeInputs(env: Record<string, string> = {}): ActionInputs {
  return readActionInputs({
    INPUT_PARTICIPANT_A: 'Les Aigles Rouges',
    INPUT_PARTICIPANT_B: 'Les Lions Bleus',
    INPUT_EVENT_DATE: '2025-06-20',
    INPUT_EVENT_TIME: '18:30',
    ...env
  });
}

// ─── Operation + inputs ─────────────────────────────────────────────────────

test('parseOperation accepts any case and surrounding whitespace', () => {
  assert.equal(parseOperation('issue'), Operation.ISSUE);
  assert.equal(parseOperation(' Verify '), Operation.VERIFY);
  assert.equal(parseOperation('AUDIT'), Operation.AUDIT);
});

test('parseOperation rejects unknown and empty values', () => {
  for (const raw of ['delete', '']) {
    assert.throws(
      () => parseOperation(raw),
      (err: unknown) => err instanceof InputValidationError && err.error_type === 'UNKNOWN_OPERATION'
    );
  }
});

test('readActionInputs trims values and applies path defaults', () => {
  const inputs = readActionInputs({ INPUT_PARTICIPANT_A: '  FC Nord  ', INPUT_TOKEN: ' abc ' });
  assert.deepEqual(inputs, {
    participant_a: 'FC Nord',
    participant_b: '',
    event_date: '',
    event_time: '',
    token: 'abc',
    history_path: DEFAULT_HISTORY_PATH,
    settings_path: DEFAULT_SETTINGS_PATH,
    recipient: DEFAULT_RECIPIENT,
    subject: '',
    reset_template: false
  });
});

// ─── ISSUE ──────────────────────────────────────────────────────────────────

test('ISSUE publishes the payload, records history and returns form values to save', () => {
  const context = makeContext();
  const result = runOperation(Operation.ISSUE, makeInputs({ INPUT_RECIPIENT: 'ref@example.org' }), context);

  assert.ok(result.outputs['mailto']?.startsWith('mailto:ref@example.org?subject=Match%20payment%20details&body='));
  assert.ok(result.outputs['body']?.includes('Security key: DD5BE65C2F'));
  assert.ok(result.outputs['body']?.includes('- Team 1: Les Aigles Rouges'));
  assert.ok(result.outputs['issued_at']?.startsWith('2025-06-20T10:00:00.000'));
  assert.ok(!result.summary.join('\n').includes('DD5BE65C2F'), 'summary must not echo the key');

  assert.equal(context.ledger.load().length, 1);
  assert.equal(result.settings?.participant_a, 'Les Aigles Rouges');
  assert.equal(result.settings?.event_time, '18:30');
});

test('ISSUE falls back to saved form values for empty inputs', () => {
  const context = makeContext();
  context.settings = { ...context.settings, participant_a: 'FC Nord', participant_b: 'FC Sud', event_date: '2025-06-20' };

  const result = runOperation(Operation.ISSUE, readActionInputs({}), context);
  assert.equal(context.ledger.load()[0]?.token, '5465B1ED59');
  assert.ok(result.outputs['mailto']?.startsWith(`mailto:${DEFAULT_RECIPIENT}?`));
});

test('ISSUE uses the subject input when given', () => {
  const result = runOperation(Operation.ISSUE, makeInputs({ INPUT_SUBJECT: 'Referee fee' }), makeContext());
  assert.equal(result.outputs['subject'], 'Referee fee');
});

// ─── VERIFY ─────────────────────────────────────────────────────────────────

test('VERIFY reports a matching key as valid', () => {
  const result = runOperation(Operation.VERIFY, makeInputs({ INPUT_TOKEN: 'dd5be65c2f' }), makeContext());
  assert.deepEqual(result.outputs, { valid: 'true', expected_masked: '******5C2F' });
  assert.ok(result.summary.includes('RESULT: VALID'));
});

test('VERIFY reports a wrong key as invalid', () => {
  const result = runOperation(Operation.VERIFY, makeInputs({ INPUT_TOKEN: '0000000000' }), makeContext());
  assert.deepEqual(result.outputs, { valid: 'false', expected_masked: '******5C2F' });
  assert.ok(result.summary.includes('RESULT: INVALID'));
});

test('VERIFY with a short key throws InputLengthError', () => {
  assert.throws(
    () => runOperation(Operation.VERIFY, makeInputs({ INPUT_TOKEN: 'DD5BE' }), makeContext()),
    InputLengthError
  );
});

// ─── PREVIEW / HISTORY / STATS / CLEAR / AUDIT ──────────────────────────────

test('PREVIEW renders the saved template with sample values', () => {
  const context = makeContext();
  context.settings = { ...context.settings, template: 'Key: {token} ({participant_b})' };
  const result = runOperation(Operation.PREVIEW, makeInputs(), context);
  assert.deepEqual(result.outputs, { preview: 'Key: ABC123DEF0 (Les Lions Bleus)', length_level: 'ok' });
});

test('PREVIEW with reset_template restores the default and returns it to save', () => {
  const context = makeContext();
  context.settings = { ...context.settings, template: 'Key: {token}' };
  const result = runOperation(Operation.PREVIEW, makeInputs({ INPUT_RESET_TEMPLATE: 'TRUE' }), context);
  assert.equal(result.settings?.template, DEFAULT_TEMPLATE);
  assert.equal(result.outputs['preview'], previewTemplate(DEFAULT_TEMPLATE));
  assert.equal(result.outputs['length_level'], 'ok');
});

test('PREVIEW without reset_template saves nothing', () => {
  const result = runOperation(Operation.PREVIEW, makeInputs(), makeContext());
  assert.equal(result.settings, undefined);
});

test('HISTORY, STATS, AUDIT and CLEAR operate on the same ledger', () => {
  const context = makeContext();
  runOperation(Operation.ISSUE, makeInputs(), context);
  runOperation(Operation.ISSUE, makeInputs({ INPUT_PARTICIPANT_A: 'FC Nord', INPUT_PARTICIPANT_B: 'FC Sud' }), context);

  const history = runOperation(Operation.HISTORY, makeInputs(), context);
  assert.equal(history.outputs['count'], '2');
  const rows: Array<Record<string, string>> = JSON.parse(history.outputs['rows'] ?? '[]');
  assert.equal(rows[0]?.['participant_a'], 'FC Nord');
  assert.equal(rows[0]?.['token'], undefined);
  assert.equal(history.summary[1], `${rows[1]?.['issued_at']} | Les Aigles Rouges vs Les Lions Bleus | 2025-06-20 18:30`);

  assert.deepEqual(runOperation(Operation.STATS, makeInputs(), context).outputs, { total: '2', issued_today: '2' });
  assert.deepEqual(runOperation(Operation.AUDIT, makeInputs(), context).outputs, { checked: '2', mismatches: '0' });

  runOperation(Operation.CLEAR, makeInputs(), context);
  assert.deepEqual(runOperation(Operation.STATS, makeInputs(), context).outputs, { total: '0', issued_today: '0' });
});
