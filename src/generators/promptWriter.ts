import type { Metadata } from "../types/index.js";
import type { PromptComposer } from "../prompts/composer.js";
import type { NamingConvention } from "./naming.js";
import { writeTextFile } from "../utils/fileSystem.js";

export interface WritePromptOptions {
  actionName: string;
  personaName: string;
  outputDir: string;
  library: string | null;
  examples?: string[];
  metadata?: Metadata;
}

/**
 * Composes a prompt and writes it where the naming convention expects it.
 */
export class PromptWriter {
  constructor(
    private readonly composer: PromptComposer,
    readonly naming: NamingConvention,
  ) {}

  outputPath(outputDir: string, actionName: string, library: string | null): string {
    return this.naming.getOutputPath(outputDir, actionName, library);
  }

  async write(options: WritePromptOptions): Promise<{ filePath: string; content: string }> {
    const content = await this.composer.compose(options.actionName, options.personaName, {
      examples: options.examples,
      tool: this.naming.name,
      library: options.library,
      metadata: options.metadata,
    });
    const filePath = this.outputPath(options.outputDir, options.actionName, options.library);
    await this.writeContent(filePath, content);
    return { filePath, content };
  }

  async writeContent(filePath: string, content: string): Promise<void> {
    await writeTextFile(filePath, content.endsWith("\n") ? content : `${content}\n`);
  }
}
