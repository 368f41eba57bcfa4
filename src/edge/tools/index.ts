/**
 * Edge Tools - MCP tool implementations
 */

export {
  generateComponentTool,
  executeGenerateComponent,
  formatGenerateComponentResponse,
  parseGenerateComponentArgs,
  type GenerateComponentArgs,
  type GenerateComponentResult,
} from './generate-component.js';

export {
  validateComponentTool,
  executeValidateComponent,
  formatValidateComponentResponse,
  parseValidateComponentArgs,
  type ValidateComponentArgs,
  type ValidateComponentResult,
} from './validate-component.js';

export { getDesignTokensTool, formatGetDesignTokensResponse } from './get-design-tokens.js';

export { ToolArgumentError } from './args.js';
export { textResponse, type ToolContext, type ToolResponse } from './context.js';
