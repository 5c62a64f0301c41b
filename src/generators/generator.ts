import type { GenerateResult, Metadata, ProjectConfig, PromptConfig } from "../types/index.js";
import type { FileSystem } from "../utils/fileSystem.js";
import { TemplateLoader } from "../prompts/loader.js";
import { PromptComposer } from "../prompts/composer.js";
import type { TemplateEngine } from "../prompts/engine.js";
import { findPromptConfig, resolveMetadata, variantActionNames } from "../config/index.js";
import { getNamingConvention, type NamingConvention } from "./naming.js";
import { PromptWriter } from "./promptWriter.js";
import { CliToolRegistry, cliTimeoutFromEnv } from "./cliTools.js";
import { VariantGenerator, type VariantContext } from "./variantGenerator.js";
import { VariantCache, variantCache } from "./variantCache.js";
import { PromptloomError, errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import { validateIdentifier } from "../utils/validation.js";

const log = getLogger("generator");

export interface GeneratorOptions {
  cliTools?: CliToolRegistry;
  cache?: VariantCache;
  engine?: TemplateEngine;
  timeoutSeconds?: number;
}

export type VariantSource = "template" | "cache" | "ai";

export interface ResolvedVariant {
  variantName: string;
  actionName: string;
  content: string;
  source: VariantSource;
}

export interface ResolveVariantOptions {
  examples?: string[];
  metadata?: Metadata;
  /** Already composed base prompt; composed on demand when omitted. */
  basePrompt?: string;
  cliTool?: string | null;
  timeoutSeconds?: number;
}

function emptyResult(): GenerateResult {
  return { success: true, filesGenerated: [], errors: [], skipped: [] };
}

/**
 * Writes every action of a prompt library to the output directory using the configured
 * naming convention, then resolves the configured variants of each action.
 */
export class Generator {
  readonly loader: TemplateLoader;
  readonly composer: PromptComposer;
  readonly naming: NamingConvention;
  readonly writer: PromptWriter;
  readonly variants: VariantGenerator;
  readonly cache: VariantCache;
  private readonly timeoutSeconds: number;

  constructor(
    readonly config: ProjectConfig,
    fileSystem: FileSystem,
    options: GeneratorOptions = {},
  ) {
    this.naming = getNamingConvention(config.generate.tool);
    this.loader = new TemplateLoader(fileSystem, config.rootDir);
    this.composer = new PromptComposer(this.loader, options.engine);
    this.writer = new PromptWriter(this.composer, this.naming);
    this.variants = new VariantGenerator(this.loader, this.composer, options.cliTools ?? new CliToolRegistry());
    this.cache = options.cache ?? variantCache;
    this.timeoutSeconds = options.timeoutSeconds ?? cliTimeoutFromEnv();
  }

  private async defaultPersona(): Promise<string> {
    const [first] = await this.loader.listPersonas();
    if (!first) {
      throw new PromptloomError("No personas found in project", "NO_PERSONAS");
    }
    return first;
  }

  private async personaFor(prompt: PromptConfig | undefined, explicit?: string): Promise<string> {
    return explicit ?? prompt?.persona ?? (await this.defaultPersona());
  }

  /** Actions on disk, or the configured prompt actions when the source cannot be listed. */
  private async actionNames(): Promise<string[]> {
    if (this.loader.fileSystem.canList) {
      return this.loader.listActions();
    }
    return [...new Set(this.config.prompts.map((prompt) => prompt.action))].sort();
  }

  async generateAll(personaName?: string, exampleNames?: string[]): Promise<GenerateResult> {
    const result = emptyResult();
    const actions = await this.actionNames();
    if (actions.length === 0) {
      return { ...result, success: false, errors: ["No actions found in project"] };
    }

    const variantActions = variantActionNames(this.config);
    for (const actionName of actions) {
      if (variantActions.has(actionName)) {
        continue;
      }
      await this.generateInto(result, actionName, personaName, exampleNames);
    }
    result.success = result.errors.length === 0;
    log.info(
      { files: result.filesGenerated.length, errors: result.errors.length, skipped: result.skipped.length },
      "Generation finished",
    );
    return result;
  }

  async generateAction(actionName: string, personaName?: string, exampleNames?: string[]): Promise<GenerateResult> {
    const result = emptyResult();
    await this.generateInto(result, actionName, personaName, exampleNames);
    result.success = result.errors.length === 0;
    return result;
  }

  private async generateInto(
    result: GenerateResult,
    actionName: string,
    personaName: string | undefined,
    exampleNames: string[] | undefined,
  ): Promise<void> {
    const prompt = findPromptConfig(this.config, actionName);
    const metadata = resolveMetadata(this.config, prompt);
    const examples = exampleNames ?? prompt?.examples;
    let persona: string;
    let basePrompt: string;

    try {
      persona = await this.personaFor(prompt, personaName);
      const written = await this.writer.write({
        actionName,
        personaName: persona,
        outputDir: this.config.generate.outputDir,
        library: this.config.generate.library,
        examples,
        metadata,
      });
      basePrompt = written.content;
      result.filesGenerated.push(written.filePath);
    } catch (error) {
      result.errors.push(`Failed to generate ${actionName}: ${errorMessage(error)}`);
      return;
    }

    if (!prompt || prompt.variants.length === 0) {
      return;
    }

    for (const variantName of prompt.variants) {
      try {
        const resolved = await this.resolveVariant(variantName, actionName, persona, {
          examples,
          metadata,
          basePrompt,
          cliTool: prompt.cliTool,
        });
        const filePath = this.writer.outputPath(
          this.config.generate.outputDir,
          `${variantName}-${actionName}`,
          this.config.generate.library,
        );
        await this.writer.writeContent(filePath, resolved.content);
        result.filesGenerated.push(filePath);
      } catch (error) {
        log.warn({ variant: variantName, action: actionName, err: errorMessage(error) }, "Skipping variant");
        result.skipped.push(`${variantName}-${actionName}: ${errorMessage(error)}`);
      }
    }
  }

  /**
   * Produces `{variantName}-{actionName}`: rendered from an action template of that name when
   * one exists, otherwise reused from the session cache, otherwise generated by an AI CLI tool
   * and cached.
   */
  async resolveVariant(
    variantName: string,
    actionName: string,
    personaName: string,
    options: ResolveVariantOptions = {},
  ): Promise<ResolvedVariant> {
    validateIdentifier(variantName, "Variant name");
    validateIdentifier(actionName, "Action name");
    validateIdentifier(personaName, "Persona name");
    const variantAction = `${variantName}-${actionName}`;
    const metadata = options.metadata ?? {};

    if (await this.loader.hasAction(variantAction)) {
      const content = await this.composer.compose(variantAction, personaName, {
        examples: options.examples,
        tool: this.naming.name,
        library: this.config.generate.library,
        metadata,
      });
      return { variantName, actionName, content, source: "template" };
    }

    const cached = this.cache.find(variantName, actionName, personaName, metadata);
    if (cached) {
      log.debug({ variant: variantAction }, "Using cached variant");
      return { variantName, actionName, content: cached.content, source: "cache" };
    }

    const basePrompt =
      options.basePrompt ??
      (await this.composer.compose(actionName, personaName, {
        examples: options.examples,
        tool: this.naming.name,
        library: this.config.generate.library,
        metadata,
      }));
    const context: VariantContext = {
      personaName,
      actionName,
      tool: this.naming.name,
      library: this.config.generate.library,
      metadata,
    };
    const content = await this.variants.generateVariant(variantName, basePrompt, context, {
      cliTool: options.cliTool,
      timeoutSeconds: options.timeoutSeconds ?? this.timeoutSeconds,
    });
    this.cache.add({ variantName, actionName, personaName, content, metadata });
    return { variantName, actionName, content, source: "ai" };
  }
}
