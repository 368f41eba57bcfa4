/**
 * Structural markers the logic section must contain
 */

import type { ValidationError } from '../types.js';

interface StructureMarker {
  pattern: RegExp;
  description: string;
}

export const STRUCTURE_MARKERS: readonly StructureMarker[] = [
  { pattern: /@Component\s*\(/, description: 'the @Component decorator' },
  { pattern: /export\s+(?:default\s+)?class\s+[A-Za-z_$][\w$]*/, description: 'an exported class' },
  { pattern: /\bselector\s*:/, description: 'a selector in @Component' },
  { pattern: /\btemplateUrl\s*:/, description: 'templateUrl pointing at the markup file' },
  { pattern: /\bstyleUrls?\s*:/, description: 'styleUrl(s) pointing at the style file' },
];

export function checkStructure(logic: string): ValidationError[] {
  return STRUCTURE_MARKERS.filter((marker) => !marker.pattern.test(logic)).map((marker) => ({
    category: 'structure-missing' as const,
    section: 'logic' as const,
    message: `logic section is missing ${marker.description}`,
  }));
}
