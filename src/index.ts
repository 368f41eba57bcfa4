#!/usr/bin/env node
/**
 * Component Architect MCP Server
 *
 * Turns a plain-language UI description into an Angular component that is
 * checked against a fixed design token set, with at most one LLM repair pass.
 */

import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  ConfigValidationError,
  formatConfigErrors,
  loadConfig,
  resolveApiKey,
  resolveConfigPaths,
} from './config-loader.js';
import { loadDesignTokens, TokenSetError } from './design-tokens.js';
import { OpenAiCollaborator } from './llm/client.js';
import { createServer, SERVER_VERSION, tools } from './server.js';

async function main(): Promise<void> {
  const loaded = await loadConfig();
  const { filepath } = loaded;
  const config = resolveConfigPaths(loaded.config, filepath);
  const tokensPath = config.tokensFile;
  const tokens = await loadDesignTokens(tokensPath);

  const llm = new OpenAiCollaborator({
    baseUrl: config.llm.baseUrl,
    apiKey: resolveApiKey(config),
    model: config.llm.model,
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
    timeoutMs: config.llm.timeoutMs,
  });

  const server = createServer({ config, tokens, tokensPath, llm });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('');
  console.error('═══════════════════════════════════════════════════════════════════');
  console.error(`🏗️  Component Architect MCP Server v${SERVER_VERSION}`);
  console.error('═══════════════════════════════════════════════════════════════════');
  console.error('');
  console.error(`  ⚙️  Config:  ${filepath ?? '(defaults)'}`);
  console.error(`  🎨 Tokens:  ${tokensPath} (${Object.keys(tokens).length} entries)`);
  console.error(`  🤖 Model:   ${llm.model} @ ${config.llm.baseUrl}`);
  console.error(`  📁 Output:  ${config.outputDir}`);
  console.error('');
  for (const tool of tools) {
    console.error(`  • ${tool.name}`);
  }
  console.error('');
  console.error('═══════════════════════════════════════════════════════════════════');
  console.error('');
}

main().catch((error: unknown) => {
  if (error instanceof ConfigValidationError) {
    console.error(formatConfigErrors(error));
  } else if (error instanceof TokenSetError) {
    console.error(`${error.message}\n${error.errors.map((err) => `  - ${err.path}: ${err.message}`).join('\n')}`);
  } else {
    console.error('Fatal error:', error);
  }
  process.exit(1);
});
