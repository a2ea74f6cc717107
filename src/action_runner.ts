/**
 * Action Runner: dispatch one Operation against the ledger and deriver.
 *
 * Returns action outputs plus human-readable summary lines; the entry point
 * decides how to publish them. Errors propagate unchanged.
 */

import {
  formatLocalTimestamp,
  validateAttributeInput
} from './attributes.js';
import { attributeInputWithDefaults, type ActionInputs } from './config/inputs.js';
import { Operation } from './config/operation.js';
import { resetTemplate, type Settings } from './config/settings.js';
import type { Clock, HistoryLedger } from './history_ledger.js';
import { issueToken } from './issuance_pipeline.js';
import { previewTemplate, templateLengthLevel } from './template_renderer.js';
import type { TokenDeriver } from './token_deriver.js';
import { formatVerificationReport, verify } from './verifier.js';

export interface RunContext {
  deriver: TokenDeriver;
  ledger: HistoryLedger;
  settings: Settings;
  clock: Clock;
}

export interface RunResult {
  outputs: Record<string, string>;
  summary: string[];
  /** Present when the form values used should be persisted. */
  settings?: Settings;
}

export function runOperation(operation: Operation, inputs: ActionInputs, context: RunContext): RunResult {
  switch (operation) {
    case Operation.ISSUE:
      return runIssue(inputs, context);
    case Operation.VERIFY:
      return runVerify(inputs, context);
    case Operation.PREVIEW:
      return runPreview(inputs, context);
    case Operation.HISTORY:
      return runHistory(context);
    case Operation.STATS:
      return runStats(context);
    case Operation.CLEAR:
      return runClear(context);
    case Operation.AUDIT:
      return runAudit(context);
  }
}

function runIssue(inputs: ActionInputs, context: RunContext): RunResult {
  const raw = attributeInputWithDefaults(inputs, context.settings);
  const result = issueToken(raw, {
    deriver: context.deriver,
    ledger: context.ledger,
    template: context.settings.template,
    recipient: inputs.recipient,
    ...(inputs.subject ? { subject: inputs.subject } : {})
  });

  return {
    outputs: {
      mailto: result.mailto,
      subject: result.message.subject,
      body: result.message.body,
      issued_at: result.entry.issued_at
    },
    // The key travels only inside the payload; it is not echoed here.
    summary: [
      `Match key issued for ${result.entry.participant_a} vs ${result.entry.participant_b}`,
      `   event:     ${result.entry.date} ${result.entry.time}`,
      `   issued_at: ${result.entry.issued_at}`
    ],
    settings: {
      ...context.settings,
      participant_a: result.entry.participant_a,
      participant_b: result.entry.participant_b,
      event_date: result.entry.date,
      event_time: result.entry.time
    }
  };
}

function runVerify(inputs: ActionInputs, context: RunContext): RunResult {
  const attributes = validateAttributeInput(attributeInputWithDefaults(inputs, context.settings));
  const result = verify(context.deriver, attributes, inputs.token);

  return {
    outputs: {
      valid: String(result.valid),
      expected_masked: result.expected_masked
    },
    summary: formatVerificationReport(result, attributes, context.clock()).split('\n')
  };
}

function runPreview(inputs: ActionInputs, context: RunContext): RunResult {
  const settings = inputs.reset_template ? resetTemplate(context.settings) : context.settings;
  const preview = previewTemplate(settings.template);
  const level = templateLengthLevel(settings.template);
  return {
    outputs: { preview, length_level: level },
    summary: [`Template: ${settings.template.length} characters (${level})`, '', ...preview.split('\n')],
    ...(inputs.reset_template ? { settings } : {})
  };
}

function runHistory(context: RunContext): RunResult {
  const rows = context.ledger.listRecent();
  return {
    outputs: { rows: JSON.stringify(rows), count: String(rows.length) },
    summary: rows.map((r) => `${r.issued_at} | ${r.participant_a} vs ${r.participant_b} | ${r.event}`)
  };
}

function runStats(context: RunContext): RunResult {
  const stats = context.ledger.stats();
  return {
    outputs: { total: String(stats.total), issued_today: String(stats.issued_today) },
    summary: [`Total: ${stats.total} keys issued | Today: ${stats.issued_today}`]
  };
}

function runClear(context: RunContext): RunResult {
  context.ledger.clear();
  return {
    outputs: { total: '0' },
    summary: [`History cleared at ${formatLocalTimestamp(context.clock())}`]
  };
}

function runAudit(context: RunContext): RunResult {
  const report = context.ledger.audit(context.deriver);
  return {
    outputs: {
      checked: String(report.checked),
      mismatches: String(report.mismatches.length)
    },
    summary: [
      `Audited ${report.checked} entries, ${report.mismatches.length} mismatched`,
      ...report.mismatches.map(
        (m) => `   #${m.index} issued_at=${m.issued_at} expected=${m.expected_masked}`
      )
    ]
  };
}
