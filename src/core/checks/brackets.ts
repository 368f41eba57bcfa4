/**
 * Bracket balance check
 *
 * Each family ({}, (), []) is tracked on its own stack, so a section can fail
 * once per family. String literals, comments and (in TypeScript) regex
 * literals are skipped.
 */

import type { SectionRole, ValidationError } from '../types.js';

export interface BracketFamily {
  open: string;
  close: string;
}

export const BRACKET_FAMILIES: readonly BracketFamily[] = [
  { open: '{', close: '}' },
  { open: '(', close: ')' },
  { open: '[', close: ']' },
];

/**
 * First problem found for one bracket family
 */
export type BracketIssue =
  | { kind: 'unexpected-close'; family: BracketFamily; line: number }
  | { kind: 'unclosed'; family: BracketFamily; line: number; count: number };

export interface ScanOptions {
  /** Treat `//` as a line comment (true for TypeScript, false for CSS) */
  lineComments: boolean;
  /** Skip `/.../flags` regex literals */
  regexLiterals?: boolean;
}

/**
 * Characters after which a `/` starts a regex rather than a division
 */
const REGEX_PRECEDERS = '(,=:[!&|?{};+-*%<>~^';
const REGEX_KEYWORD_BEFORE = /\b(?:return|typeof|case|in|of|void|yield|await)\s*$/;

/**
 * Scan code and return at most one issue per family, in family order
 */
export function findBracketIssues(code: string, options: ScanOptions): BracketIssue[] {
  // Per family: line numbers of currently open brackets
  const stacks = BRACKET_FAMILIES.map(() => [] as number[]);
  const issues = new Map<number, BracketIssue>();

  let line = 1;
  let i = 0;
  // Last significant character outside comments
  let prev = '';

  while (i < code.length) {
    const ch = code[i];
    const next = code[i + 1];

    if (ch === '\n') {
      line++;
      i++;
      continue;
    }

    // Block comment
    if (ch === '/' && next === '*') {
      const end = code.indexOf('*/', i + 2);
      const stop = end === -1 ? code.length : end + 2;
      line += countNewlines(code, i, stop);
      i = stop;
      continue;
    }

    // Line comment
    if (options.lineComments && ch === '/' && next === '/') {
      const end = code.indexOf('\n', i);
      i = end === -1 ? code.length : end;
      continue;
    }

    // String literal
    if (ch === '"' || ch === "'" || ch === '`') {
      const stop = skipString(code, i, ch);
      line += countNewlines(code, i, stop);
      i = stop;
      prev = ch;
      continue;
    }

    // Regex literal
    if (options.regexLiterals && ch === '/' && startsRegex(code, i, prev)) {
      const stop = skipRegex(code, i);
      if (stop !== -1) {
        i = stop;
        prev = '/';
        continue;
      }
    }

    if (ch.trim() !== '') prev = ch;

    const openIndex = BRACKET_FAMILIES.findIndex((f) => f.open === ch);
    if (openIndex !== -1) {
      stacks[openIndex].push(line);
    } else {
      const closeIndex = BRACKET_FAMILIES.findIndex((f) => f.close === ch);
      if (closeIndex !== -1 && !issues.has(closeIndex)) {
        if (stacks[closeIndex].length === 0) {
          issues.set(closeIndex, {
            kind: 'unexpected-close',
            family: BRACKET_FAMILIES[closeIndex],
            line,
          });
        } else {
          stacks[closeIndex].pop();
        }
      }
    }

    i++;
  }

  stacks.forEach((stack, index) => {
    if (!issues.has(index) && stack.length > 0) {
      issues.set(index, {
        kind: 'unclosed',
        family: BRACKET_FAMILIES[index],
        line: stack[0],
        count: stack.length,
      });
    }
  });

  return BRACKET_FAMILIES.flatMap((_, index) => {
    const issue = issues.get(index);
    return issue ? [issue] : [];
  });
}

function startsRegex(code: string, index: number, prev: string): boolean {
  if (prev === '' || REGEX_PRECEDERS.includes(prev)) return true;
  return REGEX_KEYWORD_BEFORE.test(code.slice(Math.max(0, index - 12), index));
}

/**
 * Index just past the flags of a regex literal, or -1 when the line ends first
 */
function skipRegex(code: string, start: number): number {
  let i = start + 1;
  let inClass = false;
  while (i < code.length) {
    const ch = code[i];
    if (ch === '\n') return -1;
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === '[') inClass = true;
    else if (ch === ']') inClass = false;
    else if (ch === '/' && !inClass) {
      i++;
      while (i < code.length && /[a-z]/i.test(code[i])) i++;
      return i;
    }
    i++;
  }
  return -1;
}

function countNewlines(code: string, from: number, to: number): number {
  let count = 0;
  for (let i = from; i < to; i++) {
    if (code[i] === '\n') count++;
  }
  return count;
}

/**
 * Index just past the closing quote (or end of input)
 */
function skipString(code: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < code.length) {
    const ch = code[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === quote) return i + 1;
    // Unterminated single-line string: stop at the newline
    if (ch === '\n' && quote !== '`') return i;
    i++;
  }
  return code.length;
}

/**
 * Render an issue as a validation error
 */
export function bracketIssueToError(section: SectionRole, issue: BracketIssue): ValidationError {
  const pair = `${issue.family.open}${issue.family.close}`;

  if (issue.kind === 'unexpected-close') {
    return {
      category: 'bracket-imbalance',
      section,
      message: `${section} section has an unmatched '${issue.family.close}' at line ${issue.line} (${pair})`,
    };
  }

  const plural = issue.count === 1 ? '' : 's';
  return {
    category: 'bracket-imbalance',
    section,
    message: `${section} section leaves ${issue.count} '${issue.family.open}'${plural} unclosed, first opened at line ${issue.line} (${pair})`,
  };
}

/**
 * Bracket check over logic and style
 */
export function checkBrackets(logic: string, style: string): ValidationError[] {
  return [
    ...findBracketIssues(logic, { lineComments: true, regexLiterals: true }).map((issue) =>
      bracketIssueToError('logic', issue)
    ),
    ...findBracketIssues(style, { lineComments: false }).map((issue) =>
      bracketIssueToError('style', issue)
    ),
  ];
}
