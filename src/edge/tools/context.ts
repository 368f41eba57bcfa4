/**
 * Shared, read-only state every tool runs against
 */

import type { ArchitectConfig } from '../../config-schema.js';
import type { DesignTokenSet } from '../../design-tokens.js';
import type { LlmCollaborator } from '../../llm/client.js';

export interface ToolContext {
  config: ArchitectConfig;
  /** Loaded once at start-up and never mutated */
  tokens: DesignTokenSet;
  /** Resolved path the tokens were read from */
  tokensPath: string;
  llm: LlmCollaborator;
}

/**
 * Text-only tool response, shaped like the MCP CallToolResult
 */
export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export function textResponse(text: string, isError = false): ToolResponse {
  return { content: [{ type: 'text', text }], isError };
}
