/**
 * Settings: persisted message template and last-used form values (YAML).
 *
 * Missing file → defaults. Malformed file or field → defaults for what is
 * unusable (warning logged). Settings never carry the token secret.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import * as core from '@actions/core';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import {
  calendarDateOf,
  formatCalendarDate,
  parseCalendarDate,
  parseTimeOfDay
} from '../attributes.js';
import { StorageError } from '../errors.js';
import { DEFAULT_TEMPLATE } from '../template_renderer.js';

export const DEFAULT_EVENT_TIME = '18:30';

export interface Settings {
  template: string;
  participant_a: string;
  participant_b: string;
  /** YYYY-MM-DD */
  event_date: string;
  /** HH:MM */
  event_time: string;
}

export function defaultSettings(today: Date = new Date()): Settings {
  return {
    template: DEFAULT_TEMPLATE,
    participant_a: '',
    participant_b: '',
    event_date: formatCalendarDate(calendarDateOf(today)),
    event_time: DEFAULT_EVENT_TIME
  };
}

function validOr(value: unknown, parse: (text: string) => unknown, fallback: string): string {
  if (typeof value !== 'string') return fallback;
  try {
    parse(value);
    return value.trim();
  } catch {
    return fallback;
  }
}

export function loadSettings(path: string, today: Date = new Date()): Settings {
  const defaults = defaultSettings(today);
  if (!existsSync(path)) return defaults;

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, 'utf8'));
  } catch (err) {
    core.warning(`Settings at ${path} unreadable, using defaults: ${err instanceof Error ? err.message : String(err)}`);
    return defaults;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    core.warning(`Settings at ${path} is not a mapping, using defaults`);
    return defaults;
  }

  const { template, participant_a, participant_b, event_date, event_time } =
    parsed as Record<string, unknown>;
  return {
    // An empty saved template falls back to the default.
    template: typeof template === 'string' && template ? template : defaults.template,
    participant_a: typeof participant_a === 'string' ? participant_a.trim() : '',
    participant_b: typeof participant_b === 'string' ? participant_b.trim() : '',
    event_date: validOr(event_date, parseCalendarDate, defaults.event_date),
    event_time: validOr(event_time, parseTimeOfDay, defaults.event_time)
  };
}

/** @throws StorageError('WRITE_FAILED') */
export function saveSettings(path: string, settings: Settings): void {
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, stringifyYaml(settings), 'utf8');
  } catch (err) {
    throw new StorageError(
      'WRITE_FAILED',
      path,
      `Could not save settings at ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

export function resetTemplate(settings: Settings): Settings {
  return { ...settings, template: DEFAULT_TEMPLATE };
}
