/**
 * Template Renderer: explicit placeholder scanner.
 *
 * Recognized placeholders (the whole contract surface):
 *   {participant_a} {participant_b} {event_date} {event_time} {token}
 *
 * Any other well-formed braced text ({other}, { token }, {}) is copied literally.
 * An opening brace with no closing brace before the next '{' or end of input
 * is malformed: TemplateSyntaxError, no output. A lone '}' is literal text.
 *
 * Values are inserted as-is. Nothing in the template is ever evaluated.
 */

import { TemplateSyntaxError } from './errors.js';

export const PLACEHOLDER_NAMES = [
  'participant_a',
  'participant_b',
  'event_date',
  'event_time',
  'token'
] as const;

export type PlaceholderName = (typeof PLACEHOLDER_NAMES)[number];

export type TemplateVariables = Record<PlaceholderName, string>;

export interface MessagePayload {
  subject: string;
  body: string;
}

export const DEFAULT_SUBJECT = 'Match payment details';

export const DEFAULT_TEMPLATE = `Hello,

I am the referee for the following match:

- Team 1: {participant_a}
- Team 2: {participant_b}
- Date: {event_date}
- Time: {event_time}

Security key: {token}

IBAN: _______________________

(or attach a PDF containing your IBAN)

Thank you.`;

/** Fixed example values used to preview a template before saving it. */
export const SAMPLE_VARIABLES: TemplateVariables = {
  participant_a: 'Les Aigles Rouges',
  participant_b: 'Les Lions Bleus',
  event_date: '2025-06-20',
  event_time: '18:30',
  token: 'ABC123DEF0'
};

const LONG_TEMPLATE_CHARS = 500;
const TOO_LONG_TEMPLATE_CHARS = 1000;

export type TemplateLengthLevel = 'ok' | 'long' | 'too_long';

function isPlaceholderName(name: string): name is PlaceholderName {
  return PLACEHOLDER_NAMES.some((p) => p === name);
}

/**
 * Substitute the recognized placeholders.
 * @throws TemplateSyntaxError on an unmatched '{'
 */
export function render(template: string, variables: TemplateVariables): string {
  const out: string[] = [];
  let cursor = 0;

  while (cursor < template.length) {
    const open = template.indexOf('{', cursor);
    if (open === -1) {
      out.push(template.slice(cursor));
      break;
    }
    out.push(template.slice(cursor, open));

    const close = template.indexOf('}', open + 1);
    const nextOpen = template.indexOf('{', open + 1);
    if (close === -1 || (nextOpen !== -1 && nextOpen < close)) {
      throw new TemplateSyntaxError(open, `Unmatched '{' at offset ${open}`);
    }

    const name = template.slice(open + 1, close);
    out.push(isPlaceholderName(name) ? variables[name] : template.slice(open, close + 1));
    cursor = close + 1;
  }

  return out.join('');
}

/** Render with SAMPLE_VARIABLES. */
export function previewTemplate(template: string): string {
  return render(template, SAMPLE_VARIABLES);
}

export function templateLengthLevel(template: string): TemplateLengthLevel {
  if (template.length > TOO_LONG_TEMPLATE_CHARS) return 'too_long';
  if (template.length > LONG_TEMPLATE_CHARS) return 'long';
  return 'ok';
}

export function buildMessage(
  template: string,
  variables: TemplateVariables,
  subject: string = DEFAULT_SUBJECT
): MessagePayload {
  return { subject, body: render(template, variables) };
}

/**
 * mailto: URI handed to the external image encoder.
 * Subject and body are percent-encoded; the recipient is kept verbatim.
 */
export function buildMailtoLink(recipient: string, message: MessagePayload): string {
  return (
    `mailto:${recipient}` +
    `?subject=${encodeURIComponent(message.subject)}` +
    `&body=${encodeURIComponent(message.body)}`
  );
}
