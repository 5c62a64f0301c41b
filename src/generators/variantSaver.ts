import path from "path";
import type { CachedVariant, SaveResult } from "../types/index.js";
import { pathExists, writeTextFile } from "../utils/fileSystem.js";
import { errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import { ACTION_DIR, TEMPLATE_EXTENSIONS } from "../prompts/loader.js";

const log = getLogger("variantSaver");

export const PERSONA_PLACEHOLDER = "{{{persona}}}";

/**
 * Persists cached variants as `{variant}-{action}` action templates so later runs render them
 * from disk instead of calling an AI tool again.
 */
export class VariantSaver {
  /**
   * @param libraryRoot absolute directory containing `action/`
   */
  constructor(private readonly libraryRoot: string) {}

  targetPath(variant: CachedVariant): string {
    return path.join(this.libraryRoot, ACTION_DIR, `${variant.variantName}-${variant.actionName}${TEMPLATE_EXTENSIONS[0]}`);
  }

  /** Replaces the rendered persona text with the persona placeholder. */
  toTemplate(content: string, personaContent: string): string {
    const persona = personaContent.trim();
    if (!persona) {
      return content;
    }
    return content.split(persona).join(PERSONA_PLACEHOLDER);
  }

  async save(variant: CachedVariant, personaContent: string, force = false): Promise<SaveResult> {
    const filePath = this.targetPath(variant);

    if (!force && (await pathExists(filePath))) {
      return { filePath, saved: false, error: "File exists" };
    }

    const template = this.toTemplate(variant.content, personaContent);

    try {
      await writeTextFile(filePath, template.endsWith("\n") ? template : `${template}\n`);
    } catch (error) {
      return { filePath, saved: false, error: `Failed to write file: ${errorMessage(error)}` };
    }
    log.info({ filePath }, "Saved variant template");
    return { filePath, saved: true };
  }

  async saveAll(
    variants: CachedVariant[],
    personaContent: (personaName: string) => Promise<string>,
    force = false,
  ): Promise<SaveResult[]> {
    const results: SaveResult[] = [];
    for (const variant of variants) {
      let persona = "";
      try {
        persona = await personaContent(variant.personaName);
      } catch (error) {
        log.warn({ persona: variant.personaName, err: error }, "Persona unavailable, saving without placeholder");
      }
      results.push(await this.save(variant, persona, force));
    }
    return results;
  }
}
