/**
 * get_design_tokens MCP Tool
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { collectTokenColors, formatTokensTable } from '../../design-tokens.js';
import { textResponse, type ToolContext, type ToolResponse } from './context.js';

export const getDesignTokensTool: Tool = {
  name: 'get_design_tokens',
  description: 'Show the design tokens every generated component is validated against, and the active colour policy.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

export function formatGetDesignTokensResponse(context: ToolContext): ToolResponse {
  const colors = collectTokenColors(context.tokens);

  let text = `# 🎨 Design Tokens\n\n`;
  text += `Source: \`${context.tokensPath}\`\n\n`;
  text += formatTokensTable(context.tokens);
  text += `\n**Colour policy:** \`${context.config.colorPolicy}\``;
  text +=
    context.config.colorPolicy === 'strict'
      ? ` (only ${colors.map((color) => color.value).join(', ')} may appear as hex literals)`
      : ` (hex literals outside the token set are allowed)`;

  return textResponse(text);
}
