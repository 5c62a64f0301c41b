import path from "path";
import { ConfigurationError } from "../utils/errors.js";

/**
 * How a target tool expects prompt files to be named and laid out.
 */
export interface NamingConvention {
  readonly name: string;
  readonly description: string;
  readonly fileExtension: string;
  getFilename(actionName: string, library: string | null): string;
  getOutputPath(outputDir: string, actionName: string, library: string | null): string;
}

abstract class FlatConvention implements NamingConvention {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly fileExtension: string;
  abstract getFilename(actionName: string, library: string | null): string;

  getOutputPath(outputDir: string, actionName: string, library: string | null): string {
    return path.join(outputDir, this.getFilename(actionName, library));
  }
}

export class StandardConvention extends FlatConvention {
  readonly name = "standard";
  readonly description = "Standard format (.prompt.md)";
  readonly fileExtension = ".prompt.md";

  getFilename(actionName: string): string {
    return `${actionName}${this.fileExtension}`;
  }
}

export class CopilotConvention extends FlatConvention {
  readonly name = "copilot";
  readonly description = "GitHub Copilot format (.prompt.md)";
  readonly fileExtension = ".prompt.md";

  getFilename(actionName: string, library: string | null): string {
    return library ? `${library}.${actionName}${this.fileExtension}` : `${actionName}${this.fileExtension}`;
  }
}

export class ClaudeCodeConvention implements NamingConvention {
  readonly name = "claude-code";
  readonly description = "Claude Code format (.md)";
  readonly fileExtension = ".md";

  getFilename(actionName: string): string {
    return `${actionName}${this.fileExtension}`;
  }

  getOutputPath(outputDir: string, actionName: string, library: string | null): string {
    const directory = library ? path.join(outputDir, library) : outputDir;
    return path.join(directory, this.getFilename(actionName));
  }
}

export class NamingRegistry {
  private readonly conventions = new Map<string, NamingConvention>();

  register(convention: NamingConvention): void {
    this.conventions.set(convention.name, convention);
  }

  get(name: string): NamingConvention {
    const convention = this.conventions.get(name);
    if (!convention) {
      throw new ConfigurationError(`Unknown tool '${name}'. Available: ${this.list().join(", ")}`);
    }
    return convention;
  }

  isSupported(name: string): boolean {
    return this.conventions.has(name);
  }

  list(): string[] {
    return [...this.conventions.keys()].sort();
  }

  all(): NamingConvention[] {
    return this.list().map((name) => this.get(name));
  }
}

export const namingRegistry = new NamingRegistry();
namingRegistry.register(new StandardConvention());
namingRegistry.register(new CopilotConvention());
namingRegistry.register(new ClaudeCodeConvention());

export function getNamingConvention(tool: string): NamingConvention {
  return namingRegistry.get(tool);
}
