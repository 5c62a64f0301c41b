/**
 * Shared shapes for prompt fragments, project configuration and generation results.
 */

/** Free-form values that flow into templates as `metadata`. */
export type Metadata = Record<string, unknown>;

/** A reusable role definition rendered into every prompt as `persona`. */
export interface Persona {
  readonly name: string;
  readonly content: string;
}

/** A task template written against a persona. */
export interface Action {
  readonly name: string;
  readonly template: string;
  readonly personaName: string;
}

/** Reference material attached to a prompt. Template examples are rendered first. */
export interface Example {
  readonly name: string;
  readonly content: string;
  readonly isTemplate: boolean;
}

export interface GenerateConfig {
  /** Naming convention id, e.g. `standard`, `copilot` or `claude-code`. */
  tool: string;
  /** Optional library namespace used by conventions that prefix or nest outputs. */
  library: string | null;
  /** Absolute directory generated prompts are written to. */
  outputDir: string;
}

/** Per-action settings from the `prompts` list of the config file. */
export interface PromptConfig {
  persona: string;
  action: string;
  variants: string[];
  /** AI CLI tool to prefer for variant generation, `null` for auto-detection. */
  cliTool: string | null;
  examples: string[];
  metadata: Metadata;
}

export interface ProjectConfig {
  /** Directory the config file lives in; relative paths resolve against it. */
  projectRoot: string;
  /** Directory holding persona/, action/, example/, variant/ and templates/, relative to the file system root. */
  rootDir: string;
  generate: GenerateConfig;
  metadata: Metadata;
  prompts: PromptConfig[];
  /** Path or URL the configuration was read from, `null` when built from defaults. */
  source: string | null;
}

export interface GenerateResult {
  success: boolean;
  filesGenerated: string[];
  errors: string[];
  /** Variants that could not be produced; these do not fail the run. */
  skipped: string[];
}

/** A variant produced by an AI CLI tool or MCP sampling, held for the session. */
export interface CachedVariant {
  variantName: string;
  actionName: string;
  personaName: string;
  content: string;
  generatedAt: Date;
  metadata: Metadata;
}

export interface SaveResult {
  filePath: string;
  saved: boolean;
  error?: string;
}
