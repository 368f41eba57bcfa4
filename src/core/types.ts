/**
 * Core types for the generate → validate → fix pipeline
 */

// ============================================================================
// Component sections
// ============================================================================

/**
 * Role of one generated file
 */
export type SectionRole = 'markup' | 'style' | 'logic';

/**
 * Order in which sections are reported and persisted
 */
export const SECTION_ROLES: readonly SectionRole[] = ['markup', 'style', 'logic'];

/**
 * File extension written for each section
 */
export const SECTION_EXTENSIONS: Readonly<Record<SectionRole, string>> = {
  markup: 'html',
  style: 'css',
  logic: 'ts',
};

/**
 * Three named bodies produced by one generation attempt
 */
export interface ComponentSource {
  markup: string;
  style: string;
  logic: string;
}

/**
 * Names derived for a component (file names, class, selector)
 */
export interface ComponentNaming {
  /** e.g. 'login-card' */
  kebabName: string;
  /** e.g. 'LoginCardComponent' */
  className: string;
  /** e.g. 'app-login-card' */
  selector: string;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Check category a validation error belongs to
 */
export type ValidationCategory =
  | 'section-missing'
  | 'token-missing'
  | 'bracket-imbalance'
  | 'structure-missing'
  | 'tag-mismatch'
  | 'unauthorized-color';

/**
 * One failed check
 */
export interface ValidationError {
  category: ValidationCategory;
  /** Section the failure was found in, when it is tied to one */
  section?: SectionRole;
  message: string;
}

/**
 * Whether hex colours outside the token set fail validation
 *
 * - strict: any unknown hex literal is an error
 * - required-only: only missing required tokens are errors
 */
export type ColorPolicy = 'strict' | 'required-only';

export interface ValidatorOptions {
  colorPolicy?: ColorPolicy;
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Orchestrator states
 */
export type PipelineStage =
  | 'generating'
  | 'validating'
  | 'fixing'
  | 'revalidating'
  | 'done-valid'
  | 'done-invalid';

export type TerminalStage = Extract<PipelineStage, 'done-valid' | 'done-invalid'>;

/**
 * Which collaborator call produced an attempt
 */
export type AttemptStage = 'generate' | 'fix';

/**
 * One validated pass through the pipeline
 */
export interface AttemptRecord {
  attempt: 1 | 2;
  stage: AttemptStage;
  valid: boolean;
  errors: readonly ValidationError[];
  source: Readonly<ComponentSource>;
  rawOutput: string;
}

/**
 * Chat messages for one collaborator call
 */
export interface PromptPair {
  system: string;
  user: string;
}
