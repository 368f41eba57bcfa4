/**
 * Parser - split raw model output into the three component sections
 *
 * Two heuristics, in priority order:
 * 1. Section markers: `=== login-card.component.ts ===`
 * 2. Fenced code blocks: ```typescript ... ```
 *
 * A marked body ends at the next marker or at a fence labelled for another
 * role. A role that neither heuristic finds stays an empty string; the
 * validator reports it as missing.
 */

import type { ComponentSource, SectionRole } from './types.js';

/**
 * Marker / fence label → section role
 */
const LABEL_ROLES: Readonly<Record<string, SectionRole>> = {
  ts: 'logic',
  typescript: 'logic',
  logic: 'logic',
  html: 'markup',
  markup: 'markup',
  template: 'markup',
  css: 'style',
  scss: 'style',
  style: 'style',
  styles: 'style',
};

const MARKER_PATTERN = /^[ \t]*={3,}[ \t]*(?:[\w.-]*\.)?([a-zA-Z]+)[ \t]*={3,}[ \t]*$/gm;

const FENCE_PATTERN = /^[ \t]*```[ \t]*([a-zA-Z]*)[^\n]*\n([\s\S]*?)^[ \t]*```[ \t]*$/gm;

const FENCE_OPEN_PATTERN = /^[ \t]*```[ \t]*([a-zA-Z]+)/gm;

const LEADING_FENCE = /^```[a-zA-Z]*[^\n]*\n?/;
const TRAILING_FENCE = /\n?```[ \t]*$/;

function roleForLabel(label: string): SectionRole | undefined {
  return LABEL_ROLES[label.toLowerCase()];
}

/**
 * Remove fence lines wrapping a section body
 */
export function stripFences(body: string): string {
  return body.trim().replace(LEADING_FENCE, '').replace(TRAILING_FENCE, '').trim();
}

/**
 * Cut a marked body at the first fence opened for another role
 */
function endAtForeignFence(body: string, role: SectionRole): string {
  for (const fence of body.matchAll(FENCE_OPEN_PATTERN)) {
    const fenceRole = roleForLabel(fence[1]);
    if (fenceRole && fenceRole !== role) {
      return body.slice(0, fence.index ?? 0);
    }
  }
  return body;
}

function findMarkedSections(raw: string): Partial<ComponentSource> {
  const found: Partial<ComponentSource> = {};
  const markers = [...raw.matchAll(MARKER_PATTERN)];

  markers.forEach((marker, index) => {
    const role = roleForLabel(marker[1]);
    if (!role || found[role] !== undefined) return;

    const start = (marker.index ?? 0) + marker[0].length;
    const next = markers[index + 1];
    const end = next?.index ?? raw.length;
    const body = stripFences(endAtForeignFence(raw.slice(start, end), role));
    // An empty marker does not hide a fenced block for the same role
    if (body) found[role] = body;
  });

  return found;
}

function findFencedSections(raw: string): Partial<ComponentSource> {
  const found: Partial<ComponentSource> = {};

  for (const block of raw.matchAll(FENCE_PATTERN)) {
    const role = roleForLabel(block[1]);
    if (!role || found[role] !== undefined) continue;
    found[role] = block[2].trim();
  }

  return found;
}

/**
 * Extract markup, style and logic from raw model output
 *
 * Deterministic and total: never throws, missing sections are ''.
 */
export function parseGeneration(raw: string): ComponentSource {
  const marked = findMarkedSections(raw);
  const fenced = findFencedSections(raw);

  return {
    markup: marked.markup ?? fenced.markup ?? '',
    style: marked.style ?? fenced.style ?? '',
    logic: marked.logic ?? fenced.logic ?? '',
  };
}
