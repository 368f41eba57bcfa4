/**
 * File Writer - persist a generated component or its failure report
 *
 * Valid (or save-with-warning) components become three sibling files:
 *   <kebab>.component.ts / .html / .css
 *
 * A terminal failure leaves the raw last attempt and the error log beside them:
 *   <kebab>.failed.txt / <kebab>.errors.json
 */

import { mkdir, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import * as prettier from 'prettier';
import {
  SECTION_EXTENSIONS,
  SECTION_ROLES,
  type AttemptRecord,
  type ComponentNaming,
  type ComponentSource,
  type SectionRole,
  type ValidationError,
} from '../core/types.js';
import { formatValidationErrors } from '../core/validator.js';

const PRETTIER_PARSERS: Record<SectionRole, string> = {
  markup: 'angular',
  style: 'css',
  logic: 'typescript',
};

export interface WriteComponentOptions {
  outputDir: string;
  naming: ComponentNaming;
  source: ComponentSource;
  /** Run prettier over each section (default true) */
  format?: boolean;
}

export interface WrittenFile {
  role: SectionRole;
  path: string;
  /** Whether prettier output was used */
  formatted: boolean;
}

export interface WriteComponentResult {
  directory: string;
  files: WrittenFile[];
}

export interface WriteFailureOptions {
  outputDir: string;
  naming: ComponentNaming;
  rawOutput: string;
  errors: readonly ValidationError[];
  attempts: readonly AttemptRecord[];
}

export interface FailureReportResult {
  rawPath: string;
  errorsPath: string;
}

export function componentFileName(naming: ComponentNaming, role: SectionRole): string {
  return `${naming.kebabName}.component.${SECTION_EXTENSIONS[role]}`;
}

/**
 * Format one section; falls back to the original text when prettier rejects it
 */
export async function formatSection(role: SectionRole, code: string): Promise<{ code: string; formatted: boolean }> {
  try {
    const formatted = await prettier.format(code, {
      parser: PRETTIER_PARSERS[role],
      singleQuote: true,
      trailingComma: 'es5',
      tabWidth: 2,
    });
    return { code: formatted, formatted: true };
  } catch (error) {
    const message = error instanceof Error ? error.message.split('\n')[0] : String(error);
    console.error(`⚠️ [WRITE] prettier could not format the ${role} section, keeping raw text: ${message}`);
    return { code, formatted: false };
  }
}

/**
 * Write the three component files, creating the directory if needed
 */
export async function writeComponentFiles(options: WriteComponentOptions): Promise<WriteComponentResult> {
  const { naming, source, format = true } = options;
  const directory = resolve(options.outputDir);
  await mkdir(directory, { recursive: true });

  const files: WrittenFile[] = [];

  for (const role of SECTION_ROLES) {
    const path = join(directory, componentFileName(naming, role));
    const { code, formatted } = format
      ? await formatSection(role, source[role])
      : { code: source[role], formatted: false };

    await writeFile(path, code.endsWith('\n') ? code : `${code}\n`, 'utf-8');
    files.push({ role, path, formatted });
    console.error(`💾 [WRITE] ${path}`);
  }

  return { directory, files };
}

/**
 * Write the raw last attempt and the ordered error log
 */
export async function writeFailureReport(options: WriteFailureOptions): Promise<FailureReportResult> {
  const { naming, rawOutput, errors, attempts } = options;
  const directory = resolve(options.outputDir);
  await mkdir(directory, { recursive: true });

  const rawPath = join(directory, `${naming.kebabName}.failed.txt`);
  const errorsPath = join(directory, `${naming.kebabName}.errors.json`);

  const report = {
    component: naming.className,
    selector: naming.selector,
    errors: formatValidationErrors(errors),
    attempts: attempts.map((attempt) => ({
      attempt: attempt.attempt,
      stage: attempt.stage,
      valid: attempt.valid,
      errors: formatValidationErrors(attempt.errors),
    })),
  };

  await writeFile(rawPath, rawOutput, 'utf-8');
  await writeFile(errorsPath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
  console.error(`💾 [WRITE] Failure report: ${rawPath}`);

  return { rawPath, errorsPath };
}
