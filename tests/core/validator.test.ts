import { describe, it, expect } from 'vitest';
import {
  checkPresence,
  formatValidationError,
  formatValidationErrors,
  validateComponent,
} from '../../src/core/validator.js';
import {
  ONE_ERROR_SOURCE,
  RADIUS_ERROR_LINE,
  TAG_ERROR_LINE,
  TEST_TOKENS,
  TWO_ERROR_SOURCE,
  VALID_SOURCE,
} from '../fixtures/components.js';

describe('validator', () => {
  describe('validateComponent', () => {
    it('should return no errors for a valid component', () => {
      expect(validateComponent(VALID_SOURCE, TEST_TOKENS)).toEqual([]);
    });

    it('should report a mismatched tag', () => {
      const source = { ...VALID_SOURCE, markup: '<div><span></div>' };

      expect(formatValidationErrors(validateComponent(source, TEST_TOKENS))).toEqual([
        '[tag-mismatch] markup section: <span> is not closed before </div>',
      ]);
    });

    it('should report exactly one unauthorized colour', () => {
      const source = { ...VALID_SOURCE, style: VALID_SOURCE.style.replace('color: #1e293b;', 'color: #ff0000;') };
      const errors = validateComponent(source, TEST_TOKENS);

      expect(errors).toHaveLength(1);
      expect(errors[0].category).toBe('unauthorized-color');
      expect(errors[0].section).toBe('style');
      expect(errors[0].message).toMatch(/^style section uses #ff0000, which is not a design token color \(nearest token: /);
    });

    it('should skip the colour check under the required-only policy', () => {
      const source = { ...VALID_SOURCE, style: `${VALID_SOURCE.style}\n.x { color: #ff0000; }` };
      expect(validateComponent(source, TEST_TOKENS, { colorPolicy: 'required-only' })).toEqual([]);
    });

    it('should report errors in check order', () => {
      expect(formatValidationErrors(validateComponent(TWO_ERROR_SOURCE, TEST_TOKENS))).toEqual([
        RADIUS_ERROR_LINE,
        TAG_ERROR_LINE,
      ]);
      expect(formatValidationErrors(validateComponent(ONE_ERROR_SOURCE, TEST_TOKENS))).toEqual([TAG_ERROR_LINE]);
    });

    it('should report everything for an empty component', () => {
      const errors = validateComponent({ markup: '', style: '', logic: '' }, TEST_TOKENS);

      expect(errors).toHaveLength(11);
      expect(errors.map((error) => error.category)).toEqual([
        'section-missing',
        'section-missing',
        'section-missing',
        'token-missing',
        'token-missing',
        'token-missing',
        'structure-missing',
        'structure-missing',
        'structure-missing',
        'structure-missing',
        'structure-missing',
      ]);
    });

    it('should be a pure function of its input', () => {
      const source = { ...TWO_ERROR_SOURCE };
      const first = validateComponent(source, TEST_TOKENS);
      const second = validateComponent(source, TEST_TOKENS);

      expect(second).toEqual(first);
      expect(source).toEqual(TWO_ERROR_SOURCE);
    });
  });

  describe('checkPresence', () => {
    it('should treat whitespace-only sections as missing, in markup/style/logic order', () => {
      expect(checkPresence({ markup: ' \n', style: 'a {}', logic: '' })).toEqual([
        { category: 'section-missing', section: 'markup', message: 'markup section is missing or empty' },
        { category: 'section-missing', section: 'logic', message: 'logic section is missing or empty' },
      ]);
    });
  });

  describe('formatValidationError', () => {
    it('should prefix the category', () => {
      expect(formatValidationError({ category: 'token-missing', message: 'x' })).toBe('[token-missing] x');
    });
  });
});
