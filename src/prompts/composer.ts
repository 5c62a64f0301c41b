import type { Metadata } from "../types/index.js";
import type { TemplateLoader } from "./loader.js";
import { HandlebarsEngine, type TemplateContext, type TemplateEngine } from "./engine.js";

export interface ComposeOptions {
  examples?: string[];
  tool?: string;
  library?: string | null;
  metadata?: Metadata;
}

/**
 * Renders an action template with its persona, examples and metadata in scope.
 *
 * Template context:
 * - `persona`: persona content
 * - `persona_name`, `action_name`
 * - `tool`, `library`: target naming convention
 * - `metadata`: merged metadata mapping
 * - `examples`: rendered example contents, only when examples were requested
 */
export class PromptComposer {
  private partialsLoaded = false;

  constructor(
    private readonly loader: TemplateLoader,
    private readonly engine: TemplateEngine = new HandlebarsEngine(),
  ) {}

  private async ensurePartials(): Promise<void> {
    if (this.partialsLoaded) {
      return;
    }
    for (const [name, template] of await this.loader.loadPartials()) {
      this.engine.registerPartial(name, template);
    }
    this.partialsLoaded = true;
  }

  async compose(actionName: string, personaName: string, options: ComposeOptions = {}): Promise<string> {
    await this.ensurePartials();
    const persona = await this.loader.loadPersona(personaName);
    const action = await this.loader.loadAction(actionName, personaName);

    const context: TemplateContext = {
      persona: persona.content,
      persona_name: persona.name,
      action_name: action.name,
      tool: options.tool ?? "standard",
      library: options.library ?? null,
      metadata: options.metadata ?? {},
    };

    if (options.examples && options.examples.length > 0) {
      const rendered: string[] = [];
      for (const name of options.examples) {
        const example = await this.loader.loadExample(name);
        rendered.push(example.isTemplate ? this.engine.render(example.content, context) : example.content);
      }
      context.examples = rendered;
    }

    return this.engine.render(action.template, context);
  }

  /** Renders an arbitrary template string with the same engine and partials. */
  async renderTemplate(template: string, context: TemplateContext): Promise<string> {
    await this.ensurePartials();
    return this.engine.render(template, context);
  }
}
