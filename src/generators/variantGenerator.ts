import type { Metadata, PromptConfig } from "../types/index.js";
import type { TemplateLoader } from "../prompts/loader.js";
import type { PromptComposer } from "../prompts/composer.js";
import { CliToolRegistry, DEFAULT_CLI_TIMEOUT_SECONDS, type CliTool } from "./cliTools.js";
import { errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

const log = getLogger("variantGenerator");

export interface VariantContext {
  personaName: string;
  actionName: string;
  tool: string;
  library: string | null;
  metadata: Metadata;
}

export interface VariantRunOptions {
  cliTool?: string | null;
  timeoutSeconds?: number;
}

/**
 * Produces prompt variants by rendering a variant instruction template and handing it,
 * together with the base prompt, to an AI CLI tool.
 */
export class VariantGenerator {
  constructor(
    private readonly loader: TemplateLoader,
    private readonly composer: PromptComposer,
    private readonly tools: CliToolRegistry = new CliToolRegistry(),
  ) {}

  /** Renders `variant/{variantName}` with the variant context. */
  async buildInstruction(variantName: string, context: VariantContext): Promise<string> {
    const template = await this.loader.loadVariantTemplate(variantName);
    return this.composer.renderTemplate(template, {
      persona_name: context.personaName,
      action_name: context.actionName,
      variant_name: variantName,
      tool: context.tool,
      library: context.library,
      metadata: context.metadata,
    });
  }

  selectTool(requested?: string | null): Promise<CliTool> {
    return this.tools.select(requested);
  }

  async generateVariant(
    variantName: string,
    basePrompt: string,
    context: VariantContext,
    options: VariantRunOptions = {},
  ): Promise<string> {
    const tool = await this.selectTool(options.cliTool);
    const instruction = await this.buildInstruction(variantName, context);
    log.info({ variant: variantName, action: context.actionName, tool: tool.name }, "Generating variant");
    return tool.generateVariant(instruction, basePrompt, options.timeoutSeconds ?? DEFAULT_CLI_TIMEOUT_SECONDS);
  }

  /**
   * Generates every variant listed in `prompt`. Variants that fail are logged and left out.
   */
  async generateVariants(
    prompt: PromptConfig,
    basePrompt: string,
    context: VariantContext,
    options: VariantRunOptions = {},
  ): Promise<Map<string, string>> {
    const results = new Map<string, string>();
    const tool = await this.selectTool(options.cliTool ?? prompt.cliTool);
    for (const variantName of prompt.variants) {
      try {
        const instruction = await this.buildInstruction(variantName, context);
        const content = await tool.generateVariant(
          instruction,
          basePrompt,
          options.timeoutSeconds ?? DEFAULT_CLI_TIMEOUT_SECONDS,
        );
        results.set(variantName, content);
      } catch (error) {
        log.warn({ variant: variantName, action: context.actionName, err: errorMessage(error) }, "Variant generation failed");
      }
    }
    return results;
  }
}
