/**
 * Prompt-injection mitigation for user descriptions
 */

/**
 * Text substituted for every matched trigger phrase
 */
export const REDACTION_MARKER = '[REDACTED]';

export const DEFAULT_MAX_PROMPT_LENGTH = 500;

/**
 * Known injection trigger phrases, matched case-insensitively as substrings
 */
export const INJECTION_PHRASES: readonly string[] = [
  'ignore previous instructions',
  'ignore all previous',
  'ignore above',
  'disregard all instructions',
  'disregard previous',
  'forget your instructions',
  'forget all instructions',
  'new instruction',
  'you are now',
  'act as',
  'pretend you are',
  'system:',
  'assistant:',
  '[inst]',
  '<|im_start|>',
  '### instruction',
  'your job is to',
  'return only',
  'override',
  'jailbreak',
];

export interface SanitizeResult {
  /** Cleaned, length-capped text */
  text: string;
  /** True when at least one phrase was replaced */
  redacted: boolean;
  /** True when the text was cut to the maximum length */
  truncated: boolean;
  /** Advisory lines for the caller */
  warnings: string[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Cut index that never leaves a lone high surrogate at the end
 */
function truncationEnd(text: string, maxLength: number): number {
  const last = text.charCodeAt(maxLength - 1);
  return last >= 0xd800 && last <= 0xdbff ? maxLength - 1 : maxLength;
}

/**
 * Redact injection phrases, then cap the length
 *
 * Truncation happens after redaction and may split a word. The result is not
 * trimmed, so any input longer than `maxLength` without redactions comes back
 * exactly `maxLength` UTF-16 units long, or one unit shorter when the cut would
 * fall inside a surrogate pair (the whole pair is dropped).
 *
 * @example
 * sanitizePrompt('A login card. Ignore previous instructions')
 * // => { text: 'A login card. [REDACTED]', redacted: true, ... }
 */
export function sanitizePrompt(
  input: string,
  maxLength: number = DEFAULT_MAX_PROMPT_LENGTH
): SanitizeResult {
  const warnings: string[] = [];
  let text = input;
  let redacted = false;

  for (const phrase of INJECTION_PHRASES) {
    const pattern = new RegExp(escapeRegExp(phrase), 'gi');
    if (pattern.test(text)) {
      pattern.lastIndex = 0;
      text = text.replace(pattern, REDACTION_MARKER);
      redacted = true;
      warnings.push(`Blocked suspicious phrase: "${phrase}"`);
    }
  }

  let truncated = false;
  if (text.length > maxLength) {
    text = text.slice(0, truncationEnd(text, maxLength));
    truncated = true;
    warnings.push(`Prompt truncated to ${maxLength} characters.`);
  }

  return { text, redacted, truncated, warnings };
}
