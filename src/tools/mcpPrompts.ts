import type { GetPromptResult, Prompt } from "@modelcontextprotocol/sdk/types.js";
import type { Metadata } from "../types/index.js";
import type { Generator } from "../generators/generator.js";
import type { VariantCache } from "../generators/variantCache.js";
import { resolveMetadata } from "../config/index.js";
import { PromptloomError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import { buildSamplingPrompt, type Sampler } from "./sampling.js";

const log = getLogger("mcpPrompts");

export interface PromptDefinition {
  name: string;
  description: string;
  persona: string;
  action: string;
  examples: string[];
  metadata: Metadata;
  variant: string | null;
}

function describePrompt(action: string, persona: string, metadata: Metadata, variant: string | null): string {
  const description = typeof metadata.description === "string" ? metadata.description : `${action} as ${persona}`;
  return variant ? `${description} (${variant} variant)` : description;
}

/**
 * One prompt per configured action plus one per `{variant}-{action}`. Names are unique: when
 * two entries produce the same name the first one wins and the rest are logged and dropped.
 */
export function discoverPrompts(generator: Generator): PromptDefinition[] {
  const definitions = new Map<string, PromptDefinition>();
  const add = (definition: PromptDefinition): void => {
    const existing = definitions.get(definition.name);
    if (existing) {
      log.warn(
        { prompt: definition.name, kept: existing.persona, dropped: definition.persona },
        "Duplicate prompt name, keeping the first definition",
      );
      return;
    }
    definitions.set(definition.name, definition);
  };

  for (const prompt of generator.config.prompts) {
    const metadata = resolveMetadata(generator.config, prompt);
    add({
      name: prompt.action,
      description: describePrompt(prompt.action, prompt.persona, metadata, null),
      persona: prompt.persona,
      action: prompt.action,
      examples: prompt.examples,
      metadata,
      variant: null,
    });
    for (const variant of prompt.variants) {
      add({
        name: `${variant}-${prompt.action}`,
        description: describePrompt(prompt.action, prompt.persona, metadata, variant),
        persona: prompt.persona,
        action: prompt.action,
        examples: prompt.examples,
        metadata,
        variant,
      });
    }
  }
  return [...definitions.values()];
}

export function toMcpPrompt(definition: PromptDefinition): Prompt {
  return { name: definition.name, description: definition.description, arguments: [] };
}

export interface PromptContext {
  generator: Generator;
  cache: VariantCache;
  sampler?: Sampler;
}

async function renderVariant(context: PromptContext, definition: PromptDefinition, variant: string): Promise<string> {
  const { generator, cache } = context;

  // An action template on disk takes precedence over sampling.
  const variantAction = `${variant}-${definition.action}`;
  if (await generator.loader.hasAction(variantAction)) {
    return generator.composer.compose(variantAction, definition.persona, {
      examples: definition.examples,
      tool: generator.naming.name,
      library: generator.config.generate.library,
      metadata: definition.metadata,
    });
  }

  const cached = cache.find(variant, definition.action, definition.persona, definition.metadata);
  if (cached) {
    return cached.content;
  }
  if (!context.sampler) {
    throw new PromptloomError(`Sampling is not available to generate ${variantAction}`, "SAMPLING_UNAVAILABLE");
  }

  const base = await generator.composer.compose(definition.action, definition.persona, {
    examples: definition.examples,
    tool: generator.naming.name,
    library: generator.config.generate.library,
    metadata: definition.metadata,
  });
  const instruction = await generator.variants.buildInstruction(variant, {
    personaName: definition.persona,
    actionName: definition.action,
    tool: generator.naming.name,
    library: generator.config.generate.library,
    metadata: definition.metadata,
  });
  const content = await context.sampler(buildSamplingPrompt(instruction, base));
  cache.add({
    variantName: variant,
    actionName: definition.action,
    personaName: definition.persona,
    content,
    metadata: definition.metadata,
  });
  log.info({ prompt: variantAction }, "Generated variant through sampling");
  return content;
}

export async function getPrompt(context: PromptContext, name: string): Promise<GetPromptResult> {
  const definition = discoverPrompts(context.generator).find((candidate) => candidate.name === name);
  if (!definition) {
    throw new PromptloomError(`Unknown prompt: ${name}`, "PROMPT_NOT_FOUND");
  }

  const text = definition.variant
    ? await renderVariant(context, definition, definition.variant)
    : await context.generator.composer.compose(definition.action, definition.persona, {
        examples: definition.examples,
        tool: context.generator.naming.name,
        library: context.generator.config.generate.library,
        metadata: definition.metadata,
      });

  return {
    description: definition.description,
    messages: [{ role: "user", content: { type: "text", text } }],
  };
}
