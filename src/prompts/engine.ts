import Handlebars from "handlebars";
import yaml from "js-yaml";
import { TemplateRenderError, errorMessage } from "../utils/errors.js";
import { isPlainObject } from "../utils/validation.js";

export type TemplateContext = Record<string, unknown>;

export interface TemplateEngine {
  render(template: string, context: TemplateContext): string;
  registerPartial(name: string, template: string): void;
}

function isEmptyValue(value: unknown): boolean {
  if (value === undefined || value === null || value === "") {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return isPlainObject(value) && Object.keys(value).length === 0;
}

/**
 * Handlebars environment with the helpers prompt templates rely on. Output is not HTML-escaped
 * and missing variables render as empty strings.
 */
export class HandlebarsEngine implements TemplateEngine {
  private readonly env = Handlebars.create();

  constructor() {
    this.env.registerHelper("default", (value: unknown, fallback: unknown) =>
      isEmptyValue(value) ? fallback : value,
    );
    this.env.registerHelper("present", (value: unknown) => !isEmptyValue(value));
    this.env.registerHelper("join", (value: unknown, separator: unknown) =>
      Array.isArray(value) ? value.map(String).join(typeof separator === "string" ? separator : ", ") : "",
    );
    this.env.registerHelper("frontmatter", (value: unknown) => {
      if (!isPlainObject(value) || Object.keys(value).length === 0) {
        return "";
      }
      return `---\n${yaml.dump(value)}---\n`;
    });
  }

  registerPartial(name: string, template: string): void {
    this.env.registerPartial(name, template);
  }

  render(template: string, context: TemplateContext): string {
    try {
      this.env.parse(template);
    } catch (error) {
      throw new TemplateRenderError(`Template syntax error: ${errorMessage(error)}`);
    }
    try {
      return this.env.compile(template, { noEscape: true, strict: false })(context);
    } catch (error) {
      throw new TemplateRenderError(`Template rendering failed: ${errorMessage(error)}`);
    }
  }
}
