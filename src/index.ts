/**
 * Match Key Action: Main Entry Point
 *
 * Flow:
 *   1. Parse operation + inputs from INPUT_* env
 *   2. Load settings (template, last form values)
 *   3. Build deriver (baked-in secret) and file-backed ledger
 *   4. Run the operation, publish outputs
 *   5. Persist settings after ISSUE (form values) or a template reset
 */

import * as core from '@actions/core';
import { readActionInputs } from './config/inputs.js';
import { parseOperationFromEnv } from './config/operation.js';
import { TOKEN_SECRET } from './config/secret.js';
import { loadSettings, saveSettings } from './config/settings.js';
import { runOperation } from './action_runner.js';
import { errorTypeOf } from './errors.js';
import { HistoryLedger } from './history_ledger.js';
import { FileHistoryStore } from './stores/file_store.js';
import { TokenDeriver } from './token_deriver.js';

function run(): void {
  const operation = parseOperationFromEnv();
  const inputs = readActionInputs();
  const clock = (): Date => new Date();

  const settings = loadSettings(inputs.settings_path, clock());
  const deriver = new TokenDeriver({ secret: TOKEN_SECRET });
  const ledger = new HistoryLedger(new FileHistoryStore(inputs.history_path), clock);

  const result = runOperation(operation, inputs, { deriver, ledger, settings, clock });

  for (const [name, value] of Object.entries(result.outputs)) {
    core.setOutput(name, value);
  }
  core.setOutput('operation', operation);

  for (const line of result.summary) {
    console.log(line);
  }

  if (result.settings) {
    try {
      saveSettings(inputs.settings_path, result.settings);
    } catch (err) {
      // Key is already issued and recorded; only the form defaults are lost.
      core.warning(err instanceof Error ? err.message : String(err));
    }
  }

  if (result.outputs['valid'] === 'false') {
    core.setFailed('Match key does not match the supplied attributes');
  }
}

try {
  run();
} catch (err) {
  const msg = err instanceof Error ? err.message : String(err);
  core.setFailed(`[${errorTypeOf(err)}] ${msg}`);
  process.exit(1);
}
