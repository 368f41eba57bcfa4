/**
 * Markup tag balance check (stack-based)
 */

import type { ValidationError } from '../types.js';

/**
 * Elements that never take a closing tag
 */
export const VOID_TAGS: ReadonlySet<string> = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'param',
  'source',
  'track',
  'wbr',
]);

/**
 * `<name attrs>` / `</name>` / `<name />`; quoted attribute values may contain `>`
 */
const TAG_PATTERN = /<(\/)?([a-zA-Z][\w.:-]*)((?:[^>"']|"[^"]*"|'[^']*')*)>/g;

const COMMENT_PATTERN = /<!--[\s\S]*?-->/g;
const INTERPOLATION_PATTERN = /\{\{[\s\S]*?\}\}/g;
const CONTROL_FLOW_PATTERN = /@(?:else\s+)?(?:if|for|switch|case|defer)\s*\(/g;

/**
 * Drop `@if (...)`, `@for (...)` and friends up to the balancing `)`, so
 * `count<limit` in a condition is not read as a tag
 */
export function stripControlFlowHeaders(markup: string): string {
  let result = '';
  let cursor = 0;

  for (const match of markup.matchAll(CONTROL_FLOW_PATTERN)) {
    const start = match.index ?? 0;
    if (start < cursor) continue;

    let depth = 0;
    let end = start + match[0].length - 1;
    for (; end < markup.length; end++) {
      if (markup[end] === '(') depth++;
      else if (markup[end] === ')' && --depth === 0) break;
    }

    result += markup.slice(cursor, start);
    cursor = Math.min(end + 1, markup.length);
  }

  return result + markup.slice(cursor);
}

export type TagIssue =
  | { kind: 'mismatch'; open: string; close: string }
  | { kind: 'unexpected-close'; close: string }
  | { kind: 'unclosed'; open: string };

/**
 * Walk the markup and return the first balance problem, or null
 */
export function findTagIssue(markup: string): TagIssue | null {
  const cleaned = stripControlFlowHeaders(
    markup.replace(COMMENT_PATTERN, '').replace(INTERPOLATION_PATTERN, '')
  );
  const stack: string[] = [];

  for (const match of cleaned.matchAll(TAG_PATTERN)) {
    const isClosing = match[1] === '/';
    const name = match[2].toLowerCase();
    const attributes = match[3];

    if (VOID_TAGS.has(name)) continue;

    if (!isClosing) {
      if (attributes.trimEnd().endsWith('/')) continue; // self-closing
      stack.push(name);
      continue;
    }

    const top = stack[stack.length - 1];
    if (top === undefined) {
      return { kind: 'unexpected-close', close: name };
    }
    if (top !== name) {
      return { kind: 'mismatch', open: top, close: name };
    }
    stack.pop();
  }

  const unclosed = stack[stack.length - 1];
  return unclosed === undefined ? null : { kind: 'unclosed', open: unclosed };
}

export function tagIssueToError(issue: TagIssue): ValidationError {
  const message =
    issue.kind === 'mismatch'
      ? `<${issue.open}> is not closed before </${issue.close}>`
      : issue.kind === 'unexpected-close'
        ? `</${issue.close}> has no matching opening tag`
        : `<${issue.open}> is never closed`;

  return { category: 'tag-mismatch', section: 'markup', message: `markup section: ${message}` };
}

/**
 * Tag balance check; at most one error
 */
export function checkTagBalance(markup: string): ValidationError[] {
  const issue = findTagIssue(markup);
  return issue ? [tagIssueToError(issue)] : [];
}
