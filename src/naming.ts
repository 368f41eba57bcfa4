/**
 * Component naming derived from the user's description
 */

import type { ComponentNaming } from './core/types.js';
import { REDACTION_MARKER } from './sanitizer.js';

const STOP_WORDS = new Set(['a', 'an', 'the', 'with', 'and', 'for', 'of', 'in', 'on', 'at', 'to']);

const MAX_NAME_WORDS = 4;

export const FALLBACK_KEBAB_NAME = 'app-component';

/**
 * Convert a description to a kebab-case component name
 *
 * @example
 * promptToKebab('A login card with glassmorphism effect') // => 'login-card-glassmorphism-effect'
 * promptToKebab('!!!') // => 'app-component'
 */
export function promptToKebab(prompt: string): string {
  const words = prompt
    .split(REDACTION_MARKER)
    .join(' ')
    .replace(/[^a-zA-Z0-9\s]/g, '')
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 0 && !STOP_WORDS.has(word))
    .slice(0, MAX_NAME_WORDS);

  return words.length > 0 ? words.join('-') : FALLBACK_KEBAB_NAME;
}

/**
 * Normalize an explicit name (any casing) to kebab-case
 *
 * @example
 * toKebabCase('PricingTable') // => 'pricing-table'
 * toKebabCase('user profile') // => 'user-profile'
 */
export function toKebabCase(name: string): string {
  const kebab = name
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/[^a-zA-Z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .toLowerCase();

  return kebab || FALLBACK_KEBAB_NAME;
}

/**
 * kebab-case → PascalCase class name with the Component suffix
 *
 * @example
 * kebabToClassName('login-card') // => 'LoginCardComponent'
 */
export function kebabToClassName(kebab: string): string {
  const pascal = kebab
    .split('-')
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');

  // Class names cannot start with a digit
  const safe = /^\d/.test(pascal) ? `App${pascal}` : pascal;
  return `${safe}Component`;
}

export function kebabToSelector(kebab: string): string {
  return kebab.startsWith('app-') ? kebab : `app-${kebab}`;
}

/**
 * Resolve all names for one request
 *
 * @param prompt - Sanitized description
 * @param explicitName - Name supplied by the caller, wins over the derived one
 */
export function resolveNaming(prompt: string, explicitName?: string): ComponentNaming {
  const kebabName = explicitName?.trim() ? toKebabCase(explicitName) : promptToKebab(prompt);

  return {
    kebabName,
    className: kebabToClassName(kebabName),
    selector: kebabToSelector(kebabName),
  };
}
