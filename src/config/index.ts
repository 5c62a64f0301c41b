import path from "path";
import yaml from "js-yaml";
import { z } from "zod";
import type { FileSystem } from "../utils/fileSystem.js";
import type { GenerateConfig, Metadata, ProjectConfig, PromptConfig } from "../types/index.js";
import { ConfigurationError, errorMessage } from "../utils/errors.js";
import { identifierProblem, isPlainObject } from "../utils/validation.js";

export const CONFIG_FILE_NAMES = ["promptloom.yaml", "promptloom.yml", ".promptloom.yaml"] as const;
export const DEFAULT_CONFIG_FILE = CONFIG_FILE_NAMES[0];
export const DEFAULT_ROOT_DIR = "promptloom";
export const DEFAULT_TOOL = "standard";
export const DEFAULT_OUTPUT_DIR = "prompts";

/** String schema that applies the identifier rules, reporting problems under `field`. */
export function identifier(field: string) {
  return z.string().superRefine((value, ctx) => {
    const problem = identifierProblem(value, field);
    if (problem) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
    }
  });
}

const metadataSchema = z.record(z.unknown());

const promptEntrySchema = z.object({
  persona: identifier("Persona name"),
  action: identifier("Action name"),
  variants: z.array(identifier("Variant name")).default([]),
  cli_tool: z.string().trim().min(1, "CLI tool name cannot be empty").nullable().optional(),
  examples: z.array(z.string().min(1)).default([]),
  metadata: metadataSchema.default({}),
});

const generateSchema = z.object({
  tool: z.string().trim().min(1, "Tool cannot be empty").default(DEFAULT_TOOL),
  library: identifier("Library name").nullable().optional(),
  output_dir: z.string().trim().min(1, "Output directory cannot be empty").default(DEFAULT_OUTPUT_DIR),
});

export const configFileSchema = z.object({
  promptloom: z.object({ root: z.string().trim().min(1).default(DEFAULT_ROOT_DIR) }).default({}),
  generate: generateSchema.default({}),
  metadata: metadataSchema.default({}),
  prompts: z.array(promptEntrySchema).default([]),
});

export type ConfigFile = z.input<typeof configFileSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validates parsed YAML and resolves paths against `projectRoot`.
 */
export function parseConfig(data: unknown, projectRoot: string, source: string | null = null): ProjectConfig {
  const result = configFileSchema.safeParse(data ?? {});
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  const parsed = result.data;
  return {
    projectRoot,
    rootDir: parsed.promptloom.root,
    generate: {
      tool: parsed.generate.tool,
      library: parsed.generate.library ?? null,
      outputDir: path.resolve(projectRoot, parsed.generate.output_dir),
    },
    metadata: parsed.metadata,
    prompts: parsed.prompts.map(
      (entry): PromptConfig => ({
        persona: entry.persona,
        action: entry.action,
        variants: entry.variants,
        cliTool: entry.cli_tool ?? null,
        examples: entry.examples,
        metadata: entry.metadata,
      }),
    ),
    source,
  };
}

export function parseConfigText(text: string, projectRoot: string, source: string | null = null): ProjectConfig {
  let data: unknown;
  try {
    data = yaml.load(text);
  } catch (error) {
    const where = source ? ` ${source}` : "";
    throw new ConfigurationError(`Failed to parse configuration file${where}: ${errorMessage(error)}`);
  }
  if (data !== undefined && data !== null && !isPlainObject(data)) {
    throw new ConfigurationError("Invalid configuration: document must be a mapping");
  }
  return parseConfig(data, projectRoot, source);
}

/**
 * Reads and validates the config file at `configPath` from `fileSystem`.
 * `projectRoot` is the local directory outputs resolve against.
 */
export async function loadConfigFile(
  fileSystem: FileSystem,
  configPath: string,
  projectRoot: string,
): Promise<ProjectConfig> {
  if (!(await fileSystem.exists(configPath))) {
    throw new ConfigurationError(`Configuration file not found: ${configPath}`);
  }
  const text = await fileSystem.readText(configPath);
  return parseConfigText(text, projectRoot, configPath);
}

/** First config file name present in the file system root, or `null`. */
export async function findConfigFile(fileSystem: FileSystem): Promise<string | null> {
  for (const name of CONFIG_FILE_NAMES) {
    if (await fileSystem.exists(name)) {
      return name;
    }
  }
  return null;
}

export interface GenerateOverrides {
  tool?: string;
  library?: string | null;
  outputDir?: string;
}

export function defaultConfig(projectRoot: string, overrides: GenerateOverrides = {}): ProjectConfig {
  return applyOverrides(parseConfig({}, projectRoot), overrides);
}

/**
 * Returns a copy with CLI overrides applied. Prompt entries and metadata are kept as they are.
 */
export function applyOverrides(config: ProjectConfig, overrides: GenerateOverrides): ProjectConfig {
  const generate: GenerateConfig = { ...config.generate };
  if (overrides.tool !== undefined) {
    if (!overrides.tool.trim()) {
      throw new ConfigurationError("Tool cannot be empty");
    }
    generate.tool = overrides.tool.trim();
  }
  if (overrides.library !== undefined) {
    const problem = overrides.library === null ? null : identifierProblem(overrides.library, "Library name");
    if (problem) {
      throw new ConfigurationError(problem);
    }
    generate.library = overrides.library;
  }
  if (overrides.outputDir !== undefined) {
    generate.outputDir = path.resolve(config.projectRoot, overrides.outputDir);
  }
  return { ...config, generate };
}

export function findPromptConfig(config: ProjectConfig, actionName: string): PromptConfig | undefined {
  return config.prompts.find((prompt) => prompt.action === actionName);
}

/**
 * Combines global metadata with per-prompt metadata. Prompt keys win; when both sides hold a
 * mapping under the same key the two mappings are merged one level deep.
 */
export function mergeMetadata(base: Metadata, override: Metadata = {}): Metadata {
  const merged: Metadata = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = merged[key];
    merged[key] = isPlainObject(existing) && isPlainObject(value) ? { ...existing, ...value } : value;
  }
  return merged;
}

export function resolveMetadata(config: ProjectConfig, prompt?: PromptConfig, extra: Metadata = {}): Metadata {
  return mergeMetadata(mergeMetadata(config.metadata, prompt?.metadata), extra);
}

/** Names of actions produced as `{variant}-{action}` for configured prompts. */
export function variantActionNames(config: ProjectConfig): Set<string> {
  const names = new Set<string>();
  for (const prompt of config.prompts) {
    for (const variant of prompt.variants) {
      names.add(`${variant}-${prompt.action}`);
    }
  }
  return names;
}
