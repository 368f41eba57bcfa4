/**
 * validate_component MCP Tool
 *
 * Runs the validator alone, without any LLM call. Accepts either the raw
 * three-section text or the sections as separate arguments.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { parseGeneration } from '../../core/parser.js';
import type { ComponentSource, ValidationError } from '../../core/types.js';
import { formatValidationError, validateComponent } from '../../core/validator.js';
import { createArgsParser, type ToolInputSchema } from './args.js';
import { textResponse, type ToolContext, type ToolResponse } from './context.js';

const inputSchema: ToolInputSchema = {
  type: 'object',
  properties: {
    raw: {
      type: 'string',
      description: 'Raw output with "=== name.component.ts/html/css ===" markers or fenced blocks',
    },
    logic: { type: 'string', description: 'TypeScript component class' },
    markup: { type: 'string', description: 'HTML template' },
    style: { type: 'string', description: 'CSS styles' },
  },
  additionalProperties: false,
};

export const validateComponentTool: Tool = {
  name: 'validate_component',
  description: `Validate an Angular component against the loaded design tokens without generating anything.

Pass either "raw" (three marked sections) or "logic", "markup" and "style" separately.
Returns the ordered list of validation errors, or confirms the component is valid.`,
  inputSchema,
};

export interface ValidateComponentArgs {
  raw?: string;
  logic?: string;
  markup?: string;
  style?: string;
}

export const parseValidateComponentArgs = createArgsParser<ValidateComponentArgs>(
  validateComponentTool.name,
  inputSchema
);

export interface ValidateComponentResult {
  source: ComponentSource;
  errors: ValidationError[];
}

export function executeValidateComponent(
  args: ValidateComponentArgs,
  context: ToolContext
): ValidateComponentResult {
  const source: ComponentSource =
    args.raw !== undefined
      ? parseGeneration(args.raw)
      : { markup: args.markup ?? '', style: args.style ?? '', logic: args.logic ?? '' };

  return {
    source,
    errors: validateComponent(source, context.tokens, { colorPolicy: context.config.colorPolicy }),
  };
}

export function formatValidateComponentResponse(result: ValidateComponentResult): ToolResponse {
  if (result.errors.length === 0) {
    return textResponse('# ✅ Component is valid');
  }

  const noun = result.errors.length === 1 ? 'error' : 'errors';
  const lines = result.errors.map((error) => `- ${formatValidationError(error)}`).join('\n');
  return textResponse(`# ❌ ${result.errors.length} validation ${noun}\n\n${lines}`);
}
