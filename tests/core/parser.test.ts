import { describe, it, expect } from 'vitest';
import { parseGeneration, stripFences } from '../../src/core/parser.js';
import { VALID_SOURCE, toRawOutput } from '../fixtures/components.js';

describe('parser', () => {
  describe('parseGeneration', () => {
    it('should split marked sections', () => {
      expect(parseGeneration(toRawOutput(VALID_SOURCE))).toEqual(VALID_SOURCE);
    });

    it('should accept markers in any order and without a component name', () => {
      const raw = ['=== component.css ===', 'p {}', '=== component.html ===', '<p></p>', '=== component.ts ===', 'export class A {}'].join('\n');

      expect(parseGeneration(raw)).toEqual({
        markup: '<p></p>',
        style: 'p {}',
        logic: 'export class A {}',
      });
    });

    it('should strip fences inside marked sections', () => {
      const raw = [
        '=== card.component.ts ===',
        '```typescript',
        'export class CardComponent {}',
        '```',
        '=== card.component.html ===',
        '```html',
        '<div></div>',
        '```',
        '=== card.component.css ===',
        '```css',
        'div { color: red; }',
        '```',
      ].join('\n');

      expect(parseGeneration(raw)).toEqual({
        markup: '<div></div>',
        style: 'div { color: red; }',
        logic: 'export class CardComponent {}',
      });
    });

    it('should fall back to fenced blocks when there are no markers', () => {
      const raw = [
        'Here is your component:',
        '```typescript',
        'const a = 1;',
        '```',
        '',
        '```html',
        '<p>x</p>',
        '```',
        '',
        '```scss',
        'p { margin: 0; }',
        '```',
      ].join('\n');

      expect(parseGeneration(raw)).toEqual({
        markup: '<p>x</p>',
        style: 'p { margin: 0; }',
        logic: 'const a = 1;',
      });
    });

    it('should keep the first occurrence of a role', () => {
      const raw = ['```css', 'a {}', '```', '```css', 'b {}', '```'].join('\n');
      expect(parseGeneration(raw).style).toBe('a {}');
    });

    it('should fill missing sections with empty strings', () => {
      const raw = ['=== card.component.html ===', '<div></div>'].join('\n');

      expect(parseGeneration(raw)).toEqual({ markup: '<div></div>', style: '', logic: '' });
    });

    it('should fall back to a fenced block when a marker is empty', () => {
      const raw = '=== x.component.ts ===\n=== x.component.html ===\n<div></div>\n```ts\nexport class A {}\n```';

      expect(parseGeneration(raw)).toEqual({ markup: '<div></div>', style: '', logic: 'export class A {}' });
    });

    it('should end a marked section at a fence for another role', () => {
      const raw = ['=== card.component.html ===', '<p></p>', '```css', 'p { margin: 0; }', '```'].join('\n');

      expect(parseGeneration(raw)).toEqual({ markup: '<p></p>', style: 'p { margin: 0; }', logic: '' });
    });

    it('should return three empty sections for unstructured text', () => {
      expect(parseGeneration('Sorry, I cannot help with that.')).toEqual({ markup: '', style: '', logic: '' });
      expect(parseGeneration('')).toEqual({ markup: '', style: '', logic: '' });
    });
  });

  describe('stripFences', () => {
    it('should remove the wrapping fence lines', () => {
      expect(stripFences('```css\n.a { }\n```')).toBe('.a { }');
    });

    it('should leave unfenced text alone apart from trimming', () => {
      expect(stripFences('  .a { }\n')).toBe('.a { }');
    });
  });
});
