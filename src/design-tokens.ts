/**
 * Design token set
 *
 * A flat, frozen `name → value` map loaded once at start-up and handed to
 * every component that needs it (validator, prompt builders).
 */

import { Ajv } from 'ajv';
import chroma from 'chroma-js';
import { readFile } from 'fs/promises';

/**
 * Keys every token file must define
 */
export const REQUIRED_TOKEN_KEYS = [
  'primary-color',
  'secondary-color',
  'border-radius',
  'font-family',
  'padding',
  'shadow',
] as const;

export type RequiredTokenKey = (typeof REQUIRED_TOKEN_KEYS)[number];

export type DesignTokenSet = Readonly<Record<RequiredTokenKey, string> & Record<string, string>>;

/**
 * A colour defined by the token set
 */
export interface TokenColor {
  /** Token name the colour was found in */
  token: string;
  /** Literal as written in the token value */
  value: string;
  /** Normalized lowercase hex (#rrggbb or #rrggbbaa) */
  hex: string;
}

/**
 * Raised when a token file is unreadable or does not match the schema
 */
export class TokenSetError extends Error {
  constructor(
    message: string,
    public errors: Array<{ path: string; message: string }> = []
  ) {
    super(message);
    this.name = 'TokenSetError';
  }
}

const tokenSetSchema = {
  type: 'object',
  required: [...REQUIRED_TOKEN_KEYS],
  properties: Object.fromEntries(
    REQUIRED_TOKEN_KEYS.map((key) => [key, { type: 'string', minLength: 1 }])
  ),
  additionalProperties: { type: 'string' },
};

const ajv = new Ajv({ allErrors: true });
const validateTokenSet = ajv.compile<DesignTokenSet>(tokenSetSchema);

/**
 * Matches hex colour literals (#rgb, #rgba, #rrggbb, #rrggbbaa).
 * `&#123;` style HTML entities are not colours, and neither are names such as
 * `#add-button` or `#feed` that merely start with hex letters.
 */
export const HEX_COLOR_PATTERN = /(?<![&\w])#(?:[0-9a-fA-F]{8}|[0-9a-fA-F]{6}|[0-9a-fA-F]{3,4})(?![\w-])/g;

/**
 * Validate a raw object and freeze it into a token set
 *
 * @throws {TokenSetError} If required tokens are missing or a value is not a string
 */
export function createDesignTokenSet(raw: unknown, source = '(inline)'): DesignTokenSet {
  if (!validateTokenSet(raw)) {
    const errors = (validateTokenSet.errors || []).map((err) => ({
      path: err.instancePath || '(root)',
      message: err.message || 'Unknown error',
    }));
    throw new TokenSetError(`Invalid design token set in ${source}`, errors);
  }

  return Object.freeze({ ...raw });
}

/**
 * Load the token file from disk
 *
 * @throws {TokenSetError} If the file cannot be read, parsed or validated
 */
export async function loadDesignTokens(path: string): Promise<DesignTokenSet> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TokenSetError(`Cannot read design tokens from ${path}: ${reason}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TokenSetError(`Design token file ${path} is not valid JSON: ${reason}`);
  }

  return createDesignTokenSet(parsed, path);
}

/**
 * Normalize a hex literal for comparison
 *
 * @example
 * normalizeHex('#FFF') // => '#ffffff'
 * normalizeHex('#6366F1') // => '#6366f1'
 * normalizeHex('#zzz') // => null
 */
export function normalizeHex(literal: string): string | null {
  if (!chroma.valid(literal)) return null;
  return chroma(literal).hex();
}

/**
 * Every hex colour that appears in any token value, in token order
 */
export function collectTokenColors(tokens: DesignTokenSet): TokenColor[] {
  const colors: TokenColor[] = [];
  const seen = new Set<string>();

  for (const [token, value] of Object.entries(tokens)) {
    for (const match of value.matchAll(HEX_COLOR_PATTERN)) {
      const hex = normalizeHex(match[0]);
      if (!hex || seen.has(hex)) continue;
      seen.add(hex);
      colors.push({ token, value: match[0], hex });
    }
  }

  return colors;
}

/**
 * Closest token colour to a hex literal by CIE Lab distance
 */
export function findNearestTokenColor(literal: string, colors: TokenColor[]): TokenColor | null {
  if (!chroma.valid(literal) || colors.length === 0) return null;

  let best: TokenColor | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;

  for (const color of colors) {
    const distance = chroma.deltaE(literal, color.hex);
    if (distance < bestDistance) {
      bestDistance = distance;
      best = color;
    }
  }

  return best;
}

/**
 * Format tokens as a Markdown table for tool responses
 */
export function formatTokensTable(tokens: DesignTokenSet): string {
  let output = `| Token | Value |\n`;
  output += `|-------|-------|\n`;
  for (const [name, value] of Object.entries(tokens)) {
    output += `| \`${name}\` | \`${value}\` |\n`;
  }
  return output;
}
