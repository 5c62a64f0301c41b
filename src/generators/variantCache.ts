import { isDeepStrictEqual } from "util";
import type { CachedVariant, Metadata } from "../types/index.js";

/**
 * In-memory store of AI-generated variants for the lifetime of the process.
 */
export class VariantCache {
  private variants: CachedVariant[] = [];

  add(variant: Omit<CachedVariant, "generatedAt"> & { generatedAt?: Date }): CachedVariant {
    const entry: CachedVariant = { ...variant, generatedAt: variant.generatedAt ?? new Date() };
    this.variants.push(entry);
    return entry;
  }

  getAll(): CachedVariant[] {
    return [...this.variants];
  }

  getByAction(actionName: string): CachedVariant[] {
    return this.variants.filter((variant) => variant.actionName === actionName);
  }

  getByVariant(variantName: string): CachedVariant[] {
    return this.variants.filter((variant) => variant.variantName === variantName);
  }

  /** Most recent entry generated for the same variant, action, persona and metadata. */
  find(variantName: string, actionName: string, personaName: string, metadata: Metadata): CachedVariant | undefined {
    for (let index = this.variants.length - 1; index >= 0; index--) {
      const variant = this.variants[index];
      if (
        variant.variantName === variantName &&
        variant.actionName === actionName &&
        variant.personaName === personaName &&
        isDeepStrictEqual(variant.metadata, metadata)
      ) {
        return variant;
      }
    }
    return undefined;
  }

  clear(): void {
    this.variants = [];
  }

  hasVariants(): boolean {
    return this.variants.length > 0;
  }

  count(): number {
    return this.variants.length;
  }
}

/** Cache shared by the CLI run or MCP session. */
export const variantCache = new VariantCache();
