/**
 * Prompt construction for the generator and fixer calls
 *
 * Both builders are pure: the same tokens, names and errors always produce
 * the same messages, so the fix prompt can be asserted on without a model.
 */

import type { DesignTokenSet } from '../design-tokens.js';
import type { ComponentNaming, ComponentSource, PromptPair, ValidationError } from './types.js';
import { formatValidationError } from './validator.js';

/**
 * Section markers the model is told to emit (and the parser reads)
 */
export function sectionMarkers(naming: ComponentNaming): Record<keyof ComponentSource, string> {
  return {
    logic: `=== ${naming.kebabName}.component.ts ===`,
    markup: `=== ${naming.kebabName}.component.html ===`,
    style: `=== ${naming.kebabName}.component.css ===`,
  };
}

function formatTokenLines(tokens: DesignTokenSet): string {
  return Object.entries(tokens)
    .map(([name, value]) => `  ${name}: ${value}`)
    .join('\n');
}

function outputContract(naming: ComponentNaming): string {
  const markers = sectionMarkers(naming);
  return [
    markers.logic,
    '<TypeScript component class>',
    '',
    markers.markup,
    '<HTML template>',
    '',
    markers.style,
    '<CSS styles>',
  ].join('\n');
}

/**
 * System message shared by both calls: output format, naming and the
 * immutable token values
 */
function buildSystemMessage(tokens: DesignTokenSet, naming: ComponentNaming, role: string): string {
  return `${role}

Output EXACTLY these three sections and nothing else. No explanations, no markdown fences:

${outputContract(naming)}

Component contract:
- The TypeScript file imports Component from @angular/core and uses the @Component decorator
- selector: '${naming.selector}'
- templateUrl: './${naming.kebabName}.component.html'
- styleUrls: ['./${naming.kebabName}.component.css']
- export class ${naming.className}
- No inline template or inline styles in the TypeScript file
- Every {}, () and [] is balanced and every HTML tag is closed

Design tokens (authoritative, copy values verbatim, use no other hex colors):
${formatTokenLines(tokens)}

The CSS must use the font-family, border-radius and primary-color values above.`;
}

export function buildGeneratorPrompt(
  tokens: DesignTokenSet,
  naming: ComponentNaming,
  description: string
): PromptPair {
  return {
    system: buildSystemMessage(tokens, naming, 'You are an Angular component generator.'),
    user: `Generate the Angular component for this UI:\n\n${description}`,
  };
}

/**
 * The fixer receives the previous sections and the literal error lines,
 * one per validation error, in validator order
 */
export function buildFixerPrompt(
  tokens: DesignTokenSet,
  naming: ComponentNaming,
  previous: ComponentSource,
  errors: readonly ValidationError[]
): PromptPair {
  const markers = sectionMarkers(naming);
  const errorBlock = errors.map((error) => `- ${formatValidationError(error)}`).join('\n');

  return {
    system: buildSystemMessage(
      tokens,
      naming,
      'You are an Angular component repair agent. Fix ONLY the listed validation errors; do not redesign the UI or rename the component.'
    ),
    user: `The component below failed validation.

VALIDATION ERRORS:
${errorBlock}

PREVIOUS OUTPUT:
${markers.logic}
${previous.logic}

${markers.markup}
${previous.markup}

${markers.style}
${previous.style}

Return the full corrected component in the three-section format.`,
  };
}
