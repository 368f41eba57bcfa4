/**
 * Design token checks: required token usage and unauthorized colours
 */

import {
  HEX_COLOR_PATTERN,
  collectTokenColors,
  findNearestTokenColor,
  normalizeHex,
  type DesignTokenSet,
} from '../../design-tokens.js';
import type { ComponentSource, SectionRole, ValidationError } from '../types.js';

function includesIgnoreCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

/**
 * First family of a font stack, unquoted
 *
 * @example
 * primaryFontFamily("'Inter', sans-serif") // => 'Inter'
 */
export function primaryFontFamily(fontFamily: string): string {
  return (fontFamily.split(',')[0] ?? '').replace(/["']/g, '').trim();
}

export function checkPrimaryColor(source: ComponentSource, tokens: DesignTokenSet): ValidationError[] {
  const primary = tokens['primary-color'];
  if (includesIgnoreCase(source.style, primary) || includesIgnoreCase(source.markup, primary)) {
    return [];
  }
  return [
    {
      category: 'token-missing',
      message: `primary-color token ${primary} is not used in the style or markup section`,
    },
  ];
}

export function checkBorderRadius(source: ComponentSource, tokens: DesignTokenSet): ValidationError[] {
  const radius = tokens['border-radius'];
  if (includesIgnoreCase(source.style, radius)) return [];
  return [
    {
      category: 'token-missing',
      section: 'style',
      message: `border-radius token ${radius} is not used in the style section`,
    },
  ];
}

export function checkFontFamily(source: ComponentSource, tokens: DesignTokenSet): ValidationError[] {
  const family = primaryFontFamily(tokens['font-family']);
  if (!family || includesIgnoreCase(source.style, family)) return [];
  return [
    {
      category: 'token-missing',
      section: 'style',
      message: `font-family token ${family} is not used in the style section`,
    },
  ];
}

const CSS_COMMENT_PATTERN = /\/\*[\s\S]*?\*\//g;

/**
 * Declaration value: after `:` up to `;` or `}`. Selectors end at `{` and
 * never match, pseudo-classes and `:not(#id)` included.
 */
const DECLARATION_VALUE_PATTERN = /:([^;{}]*)(?=[;}])/g;

const ATTRIBUTE_PATTERN = /([^\s=<>"'/]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

/**
 * Attributes whose value may hold a colour, plain or bound:
 * `style`, `[style.color]`, `[ngStyle]`, `[attr.fill]`
 */
const COLOR_ATTRIBUTES: ReadonlySet<string> = new Set([
  'style',
  'ngstyle',
  'fill',
  'stroke',
  'color',
  'bgcolor',
  'stop-color',
]);

function isColorAttribute(name: string): boolean {
  const bare = name
    .toLowerCase()
    .replace(/^\[|\]$/g, '')
    .replace(/^attr\./, '');
  return COLOR_ATTRIBUTES.has(bare.split('.')[0]);
}

/**
 * Text that can carry a colour: declaration values in style, colour
 * attribute values in markup. Selectors, `href="#feed"` and text content
 * are left out.
 */
export function colorCarriers(section: SectionRole, code: string): string[] {
  if (section === 'style') {
    const uncommented = code.replace(CSS_COMMENT_PATTERN, '');
    return [...uncommented.matchAll(DECLARATION_VALUE_PATTERN)].map((match) => match[1]);
  }
  return [...code.matchAll(ATTRIBUTE_PATTERN)]
    .filter((match) => isColorAttribute(match[1]))
    .map((match) => match[2] ?? match[3] ?? '');
}

/**
 * Every hex colour in style declarations then markup attributes that the
 * token set does not define, one error per distinct colour
 */
export function checkUnauthorizedColors(
  source: ComponentSource,
  tokens: DesignTokenSet
): ValidationError[] {
  const tokenColors = collectTokenColors(tokens);
  const allowed = new Set(tokenColors.map((color) => color.hex));
  const reported = new Set<string>();
  const errors: ValidationError[] = [];

  const sections: SectionRole[] = ['style', 'markup'];
  for (const section of sections) {
    const literals = colorCarriers(section, source[section]).flatMap((value) =>
      [...value.matchAll(HEX_COLOR_PATTERN)].map((match) => match[0])
    );
    for (const literal of literals) {
      const key = normalizeHex(literal) ?? literal.toLowerCase();
      if (allowed.has(key) || reported.has(key)) continue;
      reported.add(key);

      const nearest = findNearestTokenColor(literal, tokenColors);
      const hint = nearest ? ` (nearest token: ${nearest.token} ${nearest.value})` : '';
      errors.push({
        category: 'unauthorized-color',
        section,
        message: `${section} section uses ${literal}, which is not a design token color${hint}`,
      });
    }
  }

  return errors;
}
