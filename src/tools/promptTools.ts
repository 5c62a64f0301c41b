import path from "path";
import { z } from "zod";
import type { Generator } from "../generators/generator.js";
import type { VariantCache } from "../generators/variantCache.js";
import { VariantSaver } from "../generators/variantSaver.js";
import { findPromptConfig, identifier, resolveMetadata } from "../config/index.js";
import { LocalFileSystem } from "../utils/fileSystem.js";
import { PromptloomError, errorMessage } from "../utils/errors.js";
import { DEFAULT_CLI_TIMEOUT_SECONDS } from "../generators/cliTools.js";
import { buildSamplingPrompt, type Sampler } from "./sampling.js";

const PREVIEW_LENGTH = 200;

export interface ToolContext {
  generator: Generator;
  cache: VariantCache;
  sampler?: Sampler;
}

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

function textResult(text: string): ToolResult {
  return { content: [{ type: "text" as const, text }] };
}

function jsonResult(value: unknown): ToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

function preview(content: string): string {
  return content.length > PREVIEW_LENGTH ? `${content.slice(0, PREVIEW_LENGTH)}...` : content;
}

const metadataArg = z.record(z.unknown()).optional().describe("Metadata merged over the configured metadata");
const examplesArg = z.array(z.string()).optional().describe("Example names to include");

export const listPersonasSchema = z.object({});

export async function listPersonas(context: ToolContext): Promise<ToolResult> {
  const loader = context.generator.loader;
  const personas = [];
  for (const name of await loader.listPersonas()) {
    const persona = await loader.loadPersona(name);
    personas.push({ name, preview: preview(persona.content) });
  }
  return jsonResult({ personas });
}

export const listActionsSchema = z.object({
  persona_name: identifier("Persona name").describe("Persona the actions will be rendered with"),
});

export async function listActions(
  context: ToolContext,
  { persona_name }: z.infer<typeof listActionsSchema>,
): Promise<ToolResult> {
  const loader = context.generator.loader;
  await loader.loadPersona(persona_name);
  return jsonResult({ persona: persona_name, actions: await loader.listActions() });
}

export const listExamplesSchema = z.object({});

export async function listExamples(context: ToolContext): Promise<ToolResult> {
  const loader = context.generator.loader;
  const examples = [];
  for (const name of await loader.listExamples()) {
    const example = await loader.loadExample(name);
    examples.push({ name, is_template: example.isTemplate, preview: preview(example.content) });
  }
  return jsonResult({ examples });
}

export const generatePromptSchema = z.object({
  action: identifier("Action name").describe("Action name"),
  persona: identifier("Persona name").describe("Persona name"),
  examples: examplesArg,
  metadata: metadataArg,
});

async function composeFor(context: ToolContext, args: z.infer<typeof generatePromptSchema>): Promise<string> {
  const generator = context.generator;
  const prompt = findPromptConfig(generator.config, args.action);
  return generator.composer.compose(args.action, args.persona, {
    examples: args.examples ?? prompt?.examples,
    tool: generator.naming.name,
    library: generator.config.generate.library,
    metadata: resolveMetadata(generator.config, prompt, args.metadata),
  });
}

export async function generatePrompt(
  context: ToolContext,
  args: z.infer<typeof generatePromptSchema>,
): Promise<ToolResult> {
  return textResult(await composeFor(context, args));
}

/** Same as `generate_prompt`; kept for clients that call it by this name. */
export const composePromptSchema = generatePromptSchema;
export const composePrompt = generatePrompt;

export const generateWithSamplerSchema = generatePromptSchema.extend({
  instructions: z
    .string()
    .optional()
    .describe("Instructions for the client's model to refine the composed prompt"),
});

export async function generateWithSampler(
  context: ToolContext,
  args: z.infer<typeof generateWithSamplerSchema>,
): Promise<ToolResult> {
  const base = await composeFor(context, args);
  if (!args.instructions || !context.sampler) {
    return textResult(base);
  }
  return textResult(await context.sampler(buildSamplingPrompt(args.instructions, base)));
}

export const generateVariantsSchema = z.object({
  action: identifier("Action name").describe("Base action name"),
  persona: identifier("Persona name").describe("Persona name"),
  variants: z.array(identifier("Variant name")).min(1).describe("Variant names, e.g. update or refine"),
  examples: examplesArg,
  metadata: metadataArg,
  cli_tool: z.string().min(1).optional().describe("AI CLI tool to use: codex, copilot, claude or gemini"),
  timeout: z.number().int().positive().default(DEFAULT_CLI_TIMEOUT_SECONDS).describe("Seconds per variant"),
});

export async function generateVariants(
  context: ToolContext,
  args: z.infer<typeof generateVariantsSchema>,
): Promise<ToolResult> {
  const generator = context.generator;
  const prompt = findPromptConfig(generator.config, args.action);
  const examples = args.examples ?? prompt?.examples;
  const metadata = resolveMetadata(generator.config, prompt, args.metadata);
  const basePrompt = await composeFor(context, args);

  const variants: Record<string, { source: string; content: string }> = {};
  const errors: Record<string, string> = {};
  for (const variantName of args.variants) {
    try {
      const resolved = await generator.resolveVariant(variantName, args.action, args.persona, {
        examples,
        metadata,
        basePrompt,
        cliTool: args.cli_tool ?? prompt?.cliTool,
        timeoutSeconds: args.timeout,
      });
      variants[variantName] = { source: resolved.source, content: resolved.content };
    } catch (error) {
      errors[variantName] = errorMessage(error);
    }
  }
  const result = jsonResult({ action: args.action, persona: args.persona, variants, errors });
  return Object.keys(variants).length === 0 ? { ...result, isError: true } : result;
}

export const listCachedVariantsSchema = z.object({
  action: z.string().optional().describe("Only variants of this action"),
});

export async function listCachedVariants(
  context: ToolContext,
  { action }: z.infer<typeof listCachedVariantsSchema>,
): Promise<ToolResult> {
  const variants = action ? context.cache.getByAction(action) : context.cache.getAll();
  return jsonResult({
    count: variants.length,
    variants: variants.map((variant) => ({
      name: `${variant.variantName}-${variant.actionName}`,
      persona: variant.personaName,
      generated_at: variant.generatedAt.toISOString(),
      preview: preview(variant.content),
    })),
  });
}

export const saveVariantsSchema = z.object({
  force: z.boolean().default(false).describe("Overwrite existing action templates"),
});

export async function saveVariants(
  context: ToolContext,
  { force }: z.infer<typeof saveVariantsSchema>,
): Promise<ToolResult> {
  const generator = context.generator;
  const fileSystem = generator.loader.fileSystem;
  if (!(fileSystem instanceof LocalFileSystem)) {
    throw new PromptloomError(`Saving variants requires a local project, not ${fileSystem.describe()}`, "READ_ONLY_SOURCE");
  }
  if (!context.cache.hasVariants()) {
    return textResult("No cached variants to save");
  }
  const saver = new VariantSaver(path.resolve(fileSystem.baseDir, generator.config.rootDir));
  const results = await saver.saveAll(
    context.cache.getAll(),
    async (personaName) => (await generator.loader.loadPersona(personaName)).content,
    force,
  );
  return jsonResult({ results });
}
