/**
 * Orchestrator - generate → validate → (fix once) → validate
 *
 * Modelled as an explicit state machine:
 *
 *   generating → validating ─┬─ done-valid
 *                            └─ fixing → revalidating ─┬─ done-valid
 *                                                      └─ done-invalid
 *
 * At most one fix attempt per request; the cap is a constant, not an option.
 * Validation failures are values. Collaborator failures (timeout,
 * cancellation, transport) are thrown as GenerationError and end the request.
 */

import type { DesignTokenSet } from '../design-tokens.js';
import { GenerationError, createGenerationError } from '../llm/errors.js';
import type { LlmCollaborator } from '../llm/client.js';
import { resolveNaming } from '../naming.js';
import { DEFAULT_MAX_PROMPT_LENGTH, sanitizePrompt, type SanitizeResult } from '../sanitizer.js';
import { parseGeneration } from './parser.js';
import { buildFixerPrompt, buildGeneratorPrompt } from './prompts.js';
import type {
  AttemptRecord,
  AttemptStage,
  ColorPolicy,
  ComponentNaming,
  ComponentSource,
  PipelineStage,
  PromptPair,
  TerminalStage,
  ValidationError,
} from './types.js';
import { DEFAULT_COLOR_POLICY, validateComponent } from './validator.js';

/**
 * Hard cap on corrective calls per request
 */
export const MAX_FIX_ATTEMPTS = 1;

export const DEFAULT_LLM_TIMEOUT_MS = 120_000;

export interface PipelineRequest {
  /** Raw user description (sanitized here) */
  prompt: string;
  /** Explicit component name; derived from the prompt when absent */
  componentName?: string;
}

export interface PipelineContext {
  tokens: DesignTokenSet;
  llm: LlmCollaborator;
  colorPolicy?: ColorPolicy;
  /** Deadline for each collaborator call */
  timeoutMs?: number;
  maxPromptLength?: number;
  /** Aborts the in-flight call; no fix is attempted afterwards */
  signal?: AbortSignal;
  onTransition?: (from: PipelineStage, to: PipelineStage) => void;
}

export interface PipelineResult {
  state: TerminalStage;
  valid: boolean;
  source: ComponentSource;
  /** Raw text of the last collaborator call */
  rawOutput: string;
  /** Errors of the last validation pass */
  errors: readonly ValidationError[];
  attempts: readonly AttemptRecord[];
  fixAttempts: number;
  naming: ComponentNaming;
  sanitized: SanitizeResult;
}

// ============================================================================
// States
// ============================================================================

interface Generated {
  rawOutput: string;
  source: ComponentSource;
}

type PipelineState =
  | { stage: 'generating' }
  | ({ stage: 'validating' } & Generated)
  | ({ stage: 'fixing'; errors: readonly ValidationError[] } & Generated)
  | ({ stage: 'revalidating' } & Generated)
  | ({ stage: 'done-valid' } & Generated)
  | ({ stage: 'done-invalid'; errors: readonly ValidationError[] } & Generated);

type TerminalState = Extract<PipelineState, { stage: TerminalStage }>;

function isTerminal(state: PipelineState): state is TerminalState {
  return state.stage === 'done-valid' || state.stage === 'done-invalid';
}

/**
 * Mutable bookkeeping for one run
 */
interface RunContext {
  tokens: DesignTokenSet;
  llm: LlmCollaborator;
  colorPolicy: ColorPolicy;
  timeoutMs: number;
  signal?: AbortSignal;
  naming: ComponentNaming;
  description: string;
  attempts: AttemptRecord[];
  fixAttempts: number;
  stage: PipelineStage;
}

// ============================================================================
// Collaborator calls
// ============================================================================

/**
 * Run one collaborator call under a deadline, linked to the caller's signal.
 * The deadline holds even if the collaborator ignores its signal.
 */
export async function callWithDeadline(
  stage: AttemptStage,
  invoke: (signal: AbortSignal) => Promise<string>,
  timeoutMs: number,
  outer?: AbortSignal
): Promise<string> {
  if (outer?.aborted) {
    throw new GenerationError('Request cancelled before the call started', 'CANCELLED', stage);
  }

  const controller = new AbortController();
  let failure: GenerationError | undefined;

  const timer = setTimeout(() => {
    failure = new GenerationError(`LLM call exceeded ${timeoutMs}ms`, 'TIMEOUT', stage, undefined, {
      timeoutMs,
    });
    controller.abort();
  }, timeoutMs);

  const onOuterAbort = (): void => {
    failure = new GenerationError('Request cancelled during the call', 'CANCELLED', stage);
    controller.abort();
  };
  outer?.addEventListener('abort', onOuterAbort, { once: true });

  try {
    return await new Promise<string>((resolve, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(failure ?? new GenerationError('LLM call aborted', 'CANCELLED', stage)),
        { once: true }
      );
      invoke(controller.signal).then(resolve, reject);
    });
  } catch (error) {
    throw failure ?? createGenerationError(error, stage);
  } finally {
    clearTimeout(timer);
    outer?.removeEventListener('abort', onOuterAbort);
  }
}

async function callCollaborator(ctx: RunContext, stage: AttemptStage, prompt: PromptPair): Promise<string> {
  console.error(`🤖 [LLM] ${stage === 'fix' ? 'Fixer' : 'Generator'} call started...`);
  const started = Date.now();
  const text = await callWithDeadline(
    stage,
    (signal) => ctx.llm.complete(prompt, { signal, timeoutMs: ctx.timeoutMs }),
    ctx.timeoutMs,
    ctx.signal
  );
  console.error(`   ✅ Response received (${text.length} chars, ${Date.now() - started}ms)`);
  return text;
}

// ============================================================================
// Transitions
// ============================================================================

function recordAttempt(ctx: RunContext, stage: AttemptStage, generated: Generated, errors: ValidationError[]): void {
  const record: AttemptRecord = Object.freeze({
    attempt: ctx.attempts.length === 0 ? 1 : 2,
    stage,
    valid: errors.length === 0,
    errors: Object.freeze([...errors]),
    source: Object.freeze({ ...generated.source }),
    rawOutput: generated.rawOutput,
  });
  ctx.attempts.push(record);
}

async function advance(state: PipelineState, ctx: RunContext): Promise<PipelineState> {
  switch (state.stage) {
    case 'generating': {
      const prompt = buildGeneratorPrompt(ctx.tokens, ctx.naming, ctx.description);
      const rawOutput = await callCollaborator(ctx, 'generate', prompt);
      return { stage: 'validating', rawOutput, source: parseGeneration(rawOutput) };
    }

    case 'validating': {
      const errors = validateComponent(state.source, ctx.tokens, { colorPolicy: ctx.colorPolicy });
      recordAttempt(ctx, 'generate', state, errors);

      if (errors.length === 0) {
        return { stage: 'done-valid', rawOutput: state.rawOutput, source: state.source };
      }
      if (ctx.fixAttempts < MAX_FIX_ATTEMPTS) {
        return { stage: 'fixing', rawOutput: state.rawOutput, source: state.source, errors };
      }
      return { stage: 'done-invalid', rawOutput: state.rawOutput, source: state.source, errors };
    }

    case 'fixing': {
      ctx.fixAttempts++;
      const prompt = buildFixerPrompt(ctx.tokens, ctx.naming, state.source, state.errors);
      const rawOutput = await callCollaborator(ctx, 'fix', prompt);
      return { stage: 'revalidating', rawOutput, source: parseGeneration(rawOutput) };
    }

    case 'revalidating': {
      const errors = validateComponent(state.source, ctx.tokens, { colorPolicy: ctx.colorPolicy });
      recordAttempt(ctx, 'fix', state, errors);

      return errors.length === 0
        ? { stage: 'done-valid', rawOutput: state.rawOutput, source: state.source }
        : { stage: 'done-invalid', rawOutput: state.rawOutput, source: state.source, errors };
    }

    case 'done-valid':
    case 'done-invalid':
      return state;
  }
}

async function drive(
  ctx: RunContext,
  onTransition?: (from: PipelineStage, to: PipelineStage) => void
): Promise<TerminalState> {
  let state: PipelineState = { stage: 'generating' };

  while (!isTerminal(state)) {
    const next: PipelineState = await advance(state, ctx);
    console.error(`🔄 [PIPELINE] ${state.stage} → ${next.stage}`);
    onTransition?.(state.stage, next.stage);
    ctx.stage = next.stage;
    state = next;
  }

  return state;
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Run one request through the state machine
 *
 * @throws {GenerationError} When a collaborator call fails, times out or is
 *   cancelled; `error.attempts` holds the attempts completed before it
 */
export async function runPipeline(
  request: PipelineRequest,
  context: PipelineContext
): Promise<PipelineResult> {
  const sanitized = sanitizePrompt(request.prompt, context.maxPromptLength ?? DEFAULT_MAX_PROMPT_LENGTH);
  for (const warning of sanitized.warnings) {
    console.error(`⚠️ [SANITIZER] ${warning}`);
  }

  const ctx: RunContext = {
    tokens: context.tokens,
    llm: context.llm,
    colorPolicy: context.colorPolicy ?? DEFAULT_COLOR_POLICY,
    timeoutMs: context.timeoutMs ?? DEFAULT_LLM_TIMEOUT_MS,
    signal: context.signal,
    naming: resolveNaming(sanitized.text, request.componentName),
    description: sanitized.text,
    attempts: [],
    fixAttempts: 0,
    stage: 'generating',
  };

  let state: TerminalState;
  try {
    state = await drive(ctx, context.onTransition);
  } catch (error) {
    const failure = createGenerationError(error, ctx.fixAttempts > 0 ? 'fix' : 'generate');
    failure.attempts = Object.freeze([...ctx.attempts]);
    console.error(`❌ [PIPELINE] ${ctx.stage} failed: ${failure.code} - ${failure.message}`);
    throw failure;
  }

  const errors = state.stage === 'done-invalid' ? state.errors : [];

  return {
    state: state.stage,
    valid: state.stage === 'done-valid',
    source: state.source,
    rawOutput: state.rawOutput,
    errors,
    attempts: Object.freeze([...ctx.attempts]),
    fixAttempts: ctx.fixAttempts,
    naming: ctx.naming,
    sanitized,
  };
}
