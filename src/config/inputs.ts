/**
 * Action inputs: read from INPUT_* environment variables.
 *
 * Attribute inputs left empty fall back to the saved settings.
 */

import type { RawAttributeInput } from '../attributes.js';
import type { Settings } from './settings.js';

export const DEFAULT_HISTORY_PATH = './match_history.json';
export const DEFAULT_SETTINGS_PATH = './match_settings.yaml';
export const DEFAULT_RECIPIENT = 'treasurer@example.org';

export interface ActionInputs {
  participant_a: string;
  participant_b: string;
  event_date: string;
  event_time: string;
  /** Candidate key for VERIFY. */
  token: string;
  history_path: string;
  settings_path: string;
  recipient: string;
  /** Empty = default subject. */
  subject: string;
  /** PREVIEW: restore and save the default template. */
  reset_template: boolean;
}

type Env = Record<string, string | undefined>;

function input(env: Env, name: string): string {
  return (env[`INPUT_${name}`] ?? '').trim();
}

export function readActionInputs(env: Env = process.env): ActionInputs {
  return {
    participant_a: input(env, 'PARTICIPANT_A'),
    participant_b: input(env, 'PARTICIPANT_B'),
    event_date: input(env, 'EVENT_DATE'),
    event_time: input(env, 'EVENT_TIME'),
    token: input(env, 'TOKEN'),
    history_path: input(env, 'HISTORY_PATH') || DEFAULT_HISTORY_PATH,
    settings_path: input(env, 'SETTINGS_PATH') || DEFAULT_SETTINGS_PATH,
    recipient: input(env, 'RECIPIENT') || DEFAULT_RECIPIENT,
    subject: input(env, 'SUBJECT'),
    reset_template: input(env, 'RESET_TEMPLATE').toLowerCase() === 'true'
  };
}

export function attributeInputWithDefaults(inputs: ActionInputs, settings: Settings): RawAttributeInput {
  return {
    participant_a: inputs.participant_a || settings.participant_a,
    participant_b: inputs.participant_b || settings.participant_b,
    event_date: inputs.event_date || settings.event_date,
    event_time: inputs.event_time || settings.event_time
  };
}
