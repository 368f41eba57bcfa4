/**
 * generate_component MCP Tool
 *
 * Description → sanitize → generate → validate → (fix once) → persist or report
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { runPipeline, type PipelineResult } from '../../core/orchestrator.js';
import type { AttemptRecord } from '../../core/types.js';
import { formatValidationError } from '../../core/validator.js';
import { isGenerationError, type GenerationErrorCode } from '../../llm/errors.js';
import {
  writeComponentFiles,
  writeFailureReport,
  type FailureReportResult,
  type WriteComponentResult,
} from '../file-writer.js';
import { createArgsParser, type ToolInputSchema } from './args.js';
import { textResponse, type ToolContext, type ToolResponse } from './context.js';

const inputSchema: ToolInputSchema = {
  type: 'object',
  properties: {
    description: {
      type: 'string',
      description: 'Plain-language description of the UI component to build',
    },
    componentName: {
      type: 'string',
      description: 'Component name, e.g. "profile-card" (default: derived from the description)',
    },
    outputDir: {
      type: 'string',
      description: 'Directory for the generated files (default: from config, "output_component")',
    },
  },
  required: ['description'],
  additionalProperties: false,
};

/**
 * Tool definition for MCP server
 */
export const generateComponentTool: Tool = {
  name: 'generate_component',
  description: `Generate an Angular component (TypeScript + HTML + CSS) from a plain-language description.

Pipeline:
1. Sanitize the description (prompt-injection phrases redacted, length capped)
2. Generate the three files with the configured LLM
3. Validate against the design tokens (required tokens, brackets, structure, tags, colours)
4. If invalid: ONE corrective call with the literal error list, then validate again

Returns:
• Written file paths on success
• Every remaining validation error and a saved failure report otherwise
• The attempt log`,
  inputSchema,
};

/**
 * Input arguments for generate_component tool
 */
export interface GenerateComponentArgs {
  description: string;
  componentName?: string;
  outputDir?: string;
}

export const parseGenerateComponentArgs = createArgsParser<GenerateComponentArgs>(
  generateComponentTool.name,
  inputSchema
);

/**
 * Result from generate_component tool
 */
export interface GenerateComponentResult {
  success: boolean;
  pipeline?: PipelineResult;
  written?: WriteComponentResult;
  failureReport?: FailureReportResult;
  error?: string;
  errorCode?: GenerationErrorCode;
  /** Attempts completed before a collaborator failure */
  attempts?: readonly AttemptRecord[];
}

/**
 * Execute the generate_component tool
 */
export async function executeGenerateComponent(
  args: GenerateComponentArgs,
  context: ToolContext,
  signal?: AbortSignal
): Promise<GenerateComponentResult> {
  const { config, tokens, llm } = context;

  if (args.description.trim() === '') {
    return { success: false, error: 'The description is empty. Describe the component to generate.' };
  }

  const outputDir = args.outputDir ?? config.outputDir;

  try {
    const pipeline = await runPipeline(
      { prompt: args.description, componentName: args.componentName },
      {
        tokens,
        llm,
        colorPolicy: config.colorPolicy,
        timeoutMs: config.llm.timeoutMs,
        maxPromptLength: config.sanitizer.maxLength,
        signal,
      }
    );

    const writeComponent = (): Promise<WriteComponentResult> =>
      writeComponentFiles({
        outputDir,
        naming: pipeline.naming,
        source: pipeline.source,
        format: config.formatOutput,
      });

    if (pipeline.valid) {
      return { success: true, pipeline, written: await writeComponent() };
    }

    const failureReport = await writeFailureReport({
      outputDir,
      naming: pipeline.naming,
      rawOutput: pipeline.rawOutput,
      errors: pipeline.errors,
      attempts: pipeline.attempts,
    });

    const written = config.onPersistentFailure === 'save-with-warning' ? await writeComponent() : undefined;

    return { success: false, pipeline, written, failureReport };
  } catch (error) {
    if (isGenerationError(error)) {
      return {
        success: false,
        error: error.getUserMessage(),
        errorCode: error.code,
        attempts: error.attempts,
      };
    }

    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

function formatAttempt(record: AttemptRecord): string {
  const label = record.stage === 'fix' ? 'fix' : 'generate';
  if (record.valid) {
    return `- Attempt ${record.attempt} (${label}): ✅ valid`;
  }
  const noun = record.errors.length === 1 ? 'error' : 'errors';
  return `- Attempt ${record.attempt} (${label}): ❌ ${record.errors.length} ${noun}`;
}

function formatAttemptLog(attempts: readonly AttemptRecord[]): string {
  if (attempts.length === 0) return '';
  return `## 🔁 Attempts\n\n${attempts.map(formatAttempt).join('\n')}\n\n`;
}

function formatFilesTable(written: WriteComponentResult): string {
  let text = `| Section | Path |\n`;
  text += `|---------|------|\n`;
  for (const file of written.files) {
    text += `| ${file.role} | \`${file.path}\` |\n`;
  }
  return `${text}\n`;
}

/**
 * Format the result for MCP response
 */
export function formatGenerateComponentResponse(result: GenerateComponentResult): ToolResponse {
  const { pipeline } = result;

  if (!pipeline) {
    let text = `# ❌ Error\n\n${result.error ?? 'No result generated'}\n\n`;
    if (result.errorCode) {
      text += `Code: \`${result.errorCode}\`\n\n`;
    }
    text += formatAttemptLog(result.attempts ?? []);
    return textResponse(text.trimEnd(), true);
  }

  const { naming, sanitized } = pipeline;
  let text = result.success
    ? `# ✅ Generated: ${naming.className}\n\n`
    : `# ❌ Validation failed: ${naming.className}\n\n`;

  if (sanitized.warnings.length > 0) {
    text += `## ⚠️ Description sanitized\n\n`;
    text += `${sanitized.warnings.map((warning) => `- ${warning}`).join('\n')}\n\n`;
  }

  if (result.success && result.written) {
    text += `## 📦 Files\n\n`;
    text += formatFilesTable(result.written);
  }

  if (!result.success) {
    text += `The component still fails validation after ${pipeline.fixAttempts} fix attempt(s).\n\n`;
    text += `## Errors\n\n`;
    text += `${pipeline.errors.map((error) => `- ${formatValidationError(error)}`).join('\n')}\n\n`;

    if (result.failureReport) {
      text += `## 📄 Failure report\n\n`;
      text += `- Raw output: \`${result.failureReport.rawPath}\`\n`;
      text += `- Error log: \`${result.failureReport.errorsPath}\`\n\n`;
    }

    if (result.written) {
      text += `## ⚠️ Saved with warning\n\n`;
      text += `The invalid component was written anyway. Review it before use.\n\n`;
      text += formatFilesTable(result.written);
    }
  }

  text += formatAttemptLog(pipeline.attempts);

  return textResponse(text.trimEnd(), !result.success);
}
