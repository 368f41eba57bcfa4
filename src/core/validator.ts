/**
 * Validator - deterministic check battery over one generated component
 *
 * Pure function of (source, tokens, options). Every check runs and every
 * failure is reported, in this order:
 *
 * 1. Presence         : markup, style and logic are non-empty
 * 2. Primary color    : token literal in style or markup
 * 3. Border radius    : token literal in style
 * 4. Font family      : token literal in style
 * 5. Bracket balance  : {} () [] per family, logic then style
 * 6. Structure        : @Component, exported class, selector/templateUrl/styleUrls
 * 7. Tag balance      : markup open/close tags
 * 8. Unauthorized color: hex colours in style declarations or markup colour
 *    attributes that are not tokens (strict policy only)
 */

import type { DesignTokenSet } from '../design-tokens.js';
import { checkBrackets } from './checks/brackets.js';
import { checkStructure } from './checks/structure.js';
import { checkTagBalance } from './checks/tags.js';
import {
  checkBorderRadius,
  checkFontFamily,
  checkPrimaryColor,
  checkUnauthorizedColors,
} from './checks/tokens.js';
import {
  SECTION_ROLES,
  type ColorPolicy,
  type ComponentSource,
  type ValidationError,
  type ValidatorOptions,
} from './types.js';

export const DEFAULT_COLOR_POLICY: ColorPolicy = 'strict';

export function checkPresence(source: ComponentSource): ValidationError[] {
  return SECTION_ROLES.filter((role) => source[role].trim() === '').map((role) => ({
    category: 'section-missing' as const,
    section: role,
    message: `${role} section is missing or empty`,
  }));
}

/**
 * Run the full battery
 *
 * @returns Ordered errors; empty means the component passed
 */
export function validateComponent(
  source: ComponentSource,
  tokens: DesignTokenSet,
  options: ValidatorOptions = {}
): ValidationError[] {
  const colorPolicy = options.colorPolicy ?? DEFAULT_COLOR_POLICY;

  return [
    ...checkPresence(source),
    ...checkPrimaryColor(source, tokens),
    ...checkBorderRadius(source, tokens),
    ...checkFontFamily(source, tokens),
    ...checkBrackets(source.logic, source.style),
    ...checkStructure(source.logic),
    ...checkTagBalance(source.markup),
    ...(colorPolicy === 'strict' ? checkUnauthorizedColors(source, tokens) : []),
  ];
}

/**
 * `[category] message`: the exact line handed to the fixer and shown to users
 */
export function formatValidationError(error: ValidationError): string {
  return `[${error.category}] ${error.message}`;
}

export function formatValidationErrors(errors: readonly ValidationError[]): string[] {
  return errors.map(formatValidationError);
}
