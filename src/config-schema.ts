/**
 * Configuration schemas for the component architect
 * Defines TypeScript interfaces and JSON Schema for validation
 */

import type { ColorPolicy } from './core/types.js';

/**
 * What to do when the fix attempt still fails validation
 */
export type PersistentFailurePolicy = 'save-with-warning' | 'reject';

/**
 * LLM endpoint settings
 */
export interface LlmConfig {
  /** OpenAI-compatible base URL (Ollama, Groq, OpenAI) */
  baseUrl: string;

  model: string;

  /** Name of the environment variable holding the API key */
  apiKeyEnv: string;

  /** Deadline for each generator/fixer call */
  timeoutMs: number;

  temperature: number;

  maxTokens: number;
}

/**
 * Fully resolved configuration
 */
export interface ArchitectConfig {
  /** Path to the design tokens JSON file */
  tokensFile: string;

  /** Directory the component files are written to */
  outputDir: string;

  colorPolicy: ColorPolicy;

  onPersistentFailure: PersistentFailurePolicy;

  /** Run prettier over the written files */
  formatOutput: boolean;

  sanitizer: {
    maxLength: number;
  };

  llm: LlmConfig;
}

/**
 * Configuration as written in a config file: every key optional
 */
export interface ArchitectConfigFile {
  tokensFile?: string;
  outputDir?: string;
  colorPolicy?: ColorPolicy;
  onPersistentFailure?: PersistentFailurePolicy;
  formatOutput?: boolean;
  sanitizer?: {
    maxLength?: number;
  };
  llm?: Partial<LlmConfig>;
}

/**
 * JSON Schema for configuration validation using AJV
 */
export const architectConfigSchema = {
  type: 'object',
  properties: {
    tokensFile: { type: 'string', minLength: 1 },
    outputDir: { type: 'string', minLength: 1 },
    colorPolicy: {
      type: 'string',
      enum: ['strict', 'required-only'],
    },
    onPersistentFailure: {
      type: 'string',
      enum: ['save-with-warning', 'reject'],
    },
    formatOutput: { type: 'boolean' },
    sanitizer: {
      type: 'object',
      properties: {
        maxLength: { type: 'integer', minimum: 1 },
      },
      additionalProperties: false,
    },
    llm: {
      type: 'object',
      properties: {
        baseUrl: { type: 'string', minLength: 1 },
        model: { type: 'string', minLength: 1 },
        apiKeyEnv: { type: 'string', minLength: 1 },
        timeoutMs: { type: 'integer', minimum: 1 },
        temperature: { type: 'number', minimum: 0, maximum: 2 },
        maxTokens: { type: 'integer', minimum: 1 },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: ArchitectConfig = {
  tokensFile: 'design-tokens.json',
  outputDir: 'output_component',
  colorPolicy: 'strict',
  onPersistentFailure: 'save-with-warning',
  formatOutput: true,
  sanitizer: {
    maxLength: 500,
  },
  llm: {
    baseUrl: 'http://localhost:11434/v1',
    model: 'deepseek-coder:6.7b',
    apiKeyEnv: 'LLM_API_KEY',
    timeoutMs: 120_000,
    temperature: 0.2,
    maxTokens: 3000,
  },
};
