import path from "path";
import type { Action, Example, Persona } from "../types/index.js";
import type { FileSystem } from "../utils/fileSystem.js";
import { createAction, createExample, createPersona } from "../models/promptModels.js";
import {
  ActionNotFoundError,
  ExampleNotFoundError,
  PersonaNotFoundError,
  VariantTemplateNotFoundError,
} from "../utils/errors.js";

export const PERSONA_DIR = "persona";
export const ACTION_DIR = "action";
export const EXAMPLE_DIR = "example";
export const VARIANT_DIR = "variant";
export const PARTIALS_DIR = "templates";

export const TEMPLATE_EXTENSIONS = [".md.hbs", ".md.handlebars"] as const;
const MARKDOWN_EXTENSION = ".md";
const PARTIAL_EXTENSIONS = [".hbs", ".handlebars"] as const;

function stripExtension(fileName: string, extensions: readonly string[]): string | null {
  for (const extension of extensions) {
    if (fileName.endsWith(extension)) {
      return fileName.slice(0, -extension.length);
    }
  }
  return null;
}

/**
 * Loads personas, actions, examples and variant templates from a prompt library.
 * Loaded items are cached per loader instance.
 */
export class TemplateLoader {
  private readonly personas = new Map<string, Persona>();
  private readonly actions = new Map<string, Action>();
  private readonly examples = new Map<string, Example>();

  constructor(
    public readonly fileSystem: FileSystem,
    public readonly rootDir: string,
  ) {}

  private dir(name: string): string {
    return path.posix.join(this.rootDir, name);
  }

  private async firstExisting(directory: string, name: string, extensions: readonly string[]): Promise<string | null> {
    for (const extension of extensions) {
      const candidate = path.posix.join(this.dir(directory), `${name}${extension}`);
      if (await this.fileSystem.exists(candidate)) {
        return candidate;
      }
    }
    return null;
  }

  async loadPersona(name: string): Promise<Persona> {
    const cached = this.personas.get(name);
    if (cached) {
      return cached;
    }
    const filePath = await this.firstExisting(PERSONA_DIR, name, [MARKDOWN_EXTENSION]);
    if (!filePath) {
      throw new PersonaNotFoundError(name);
    }
    const persona = createPersona(name, await this.fileSystem.readText(filePath));
    this.personas.set(name, persona);
    return persona;
  }

  async loadAction(name: string, personaName: string): Promise<Action> {
    const key = `${personaName}:${name}`;
    const cached = this.actions.get(key);
    if (cached) {
      return cached;
    }
    const filePath = await this.firstExisting(ACTION_DIR, name, TEMPLATE_EXTENSIONS);
    if (!filePath) {
      throw new ActionNotFoundError(name);
    }
    const action = createAction(name, await this.fileSystem.readText(filePath), personaName);
    this.actions.set(key, action);
    return action;
  }

  async hasAction(name: string): Promise<boolean> {
    return (await this.firstExisting(ACTION_DIR, name, TEMPLATE_EXTENSIONS)) !== null;
  }

  async loadExample(name: string): Promise<Example> {
    const baseName = name.endsWith(MARKDOWN_EXTENSION) ? name.slice(0, -MARKDOWN_EXTENSION.length) : name;
    const cached = this.examples.get(baseName);
    if (cached) {
      return cached;
    }
    const templatePath = await this.firstExisting(EXAMPLE_DIR, baseName, TEMPLATE_EXTENSIONS);
    const filePath = templatePath ?? (await this.firstExisting(EXAMPLE_DIR, baseName, [MARKDOWN_EXTENSION]));
    if (!filePath) {
      throw new ExampleNotFoundError(name);
    }
    const example = createExample(baseName, await this.fileSystem.readText(filePath), templatePath !== null);
    this.examples.set(baseName, example);
    return example;
  }

  async loadVariantTemplate(variantName: string): Promise<string> {
    const filePath = await this.firstExisting(VARIANT_DIR, variantName, [...TEMPLATE_EXTENSIONS, MARKDOWN_EXTENSION]);
    if (!filePath) {
      throw new VariantTemplateNotFoundError(variantName);
    }
    return this.fileSystem.readText(filePath);
  }

  /** Partials from `templates/`, keyed by file name without extension. */
  async loadPartials(): Promise<Map<string, string>> {
    const partials = new Map<string, string>();
    for (const filePath of await this.fileSystem.listFiles(this.dir(PARTIALS_DIR))) {
      const name = stripExtension(path.posix.basename(filePath), PARTIAL_EXTENSIONS);
      if (name) {
        partials.set(name, await this.fileSystem.readText(filePath));
      }
    }
    return partials;
  }

  private async listNames(directory: string, extensions: readonly string[]): Promise<string[]> {
    const names = new Set<string>();
    for (const filePath of await this.fileSystem.listFiles(this.dir(directory))) {
      const name = stripExtension(path.posix.basename(filePath), extensions);
      if (name) {
        names.add(name);
      }
    }
    return [...names].sort();
  }

  listPersonas(): Promise<string[]> {
    return this.listNames(PERSONA_DIR, [MARKDOWN_EXTENSION]);
  }

  listActions(): Promise<string[]> {
    return this.listNames(ACTION_DIR, TEMPLATE_EXTENSIONS);
  }

  listExamples(): Promise<string[]> {
    return this.listNames(EXAMPLE_DIR, [...TEMPLATE_EXTENSIONS, MARKDOWN_EXTENSION]);
  }

  listVariants(): Promise<string[]> {
    return this.listNames(VARIANT_DIR, [...TEMPLATE_EXTENSIONS, MARKDOWN_EXTENSION]);
  }

  clearCache(): void {
    this.personas.clear();
    this.actions.clear();
    this.examples.clear();
  }
}
