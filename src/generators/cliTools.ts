import type { CommandRunner, PathProbe } from "../utils/processExec.js";
import { isOnPath, runCommand } from "../utils/processExec.js";
import { CLIToolError, NoAvailableCLIToolError, errorMessage } from "../utils/errors.js";

export const DEFAULT_CLI_TIMEOUT_SECONDS = 60;

export interface CliToolDependencies {
  runner?: CommandRunner;
  probe?: PathProbe;
}

/**
 * An external AI command line tool that rewrites a prompt. The prompt is passed on stdin
 * and the rewritten prompt is read from stdout.
 */
export abstract class CliTool {
  abstract readonly name: string;
  abstract readonly command: string;
  protected abstract readonly args: readonly string[];

  private readonly runner: CommandRunner;
  private readonly probe: PathProbe;

  constructor(dependencies: CliToolDependencies = {}) {
    this.runner = dependencies.runner ?? runCommand;
    this.probe = dependencies.probe ?? isOnPath;
  }

  isAvailable(): Promise<boolean> {
    return this.probe(this.command);
  }

  buildInput(variantPrompt: string, basePrompt: string): string {
    return `${variantPrompt}\n\nOriginal prompt:\n${basePrompt}`;
  }

  async generateVariant(
    variantPrompt: string,
    basePrompt: string,
    timeoutSeconds = DEFAULT_CLI_TIMEOUT_SECONDS,
  ): Promise<string> {
    if (!(await this.isAvailable())) {
      throw new CLIToolError(`${this.name} is not available in PATH`);
    }

    let result;
    try {
      result = await this.runner(this.command, [...this.args], {
        input: this.buildInput(variantPrompt, basePrompt),
        timeoutMs: timeoutSeconds * 1000,
      });
    } catch (error) {
      throw new CLIToolError(`${this.name} invocation failed: ${errorMessage(error)}`);
    }

    if (result.timedOut) {
      throw new CLIToolError(`${this.name} timed out after ${timeoutSeconds}s`);
    }
    if (result.exitCode !== 0) {
      throw new CLIToolError(`${this.name} failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
    }
    const output = result.stdout.trim();
    if (!output) {
      throw new CLIToolError(`${this.name} returned no output`);
    }
    return output;
  }
}

export class CodexCli extends CliTool {
  readonly name = "codex";
  readonly command = "codex";
  protected readonly args = ["exec", "-"];
}

export class CopilotCli extends CliTool {
  readonly name = "copilot";
  readonly command = "gh";
  protected readonly args = ["copilot", "suggest", "-t", "shell"];
}

export class ClaudeCli extends CliTool {
  readonly name = "claude";
  readonly command = "claude";
  protected readonly args = ["-p"];
}

export class GeminiCli extends CliTool {
  readonly name = "gemini";
  readonly command = "gemini";
  protected readonly args: readonly string[] = [];
}

/** Tools in auto-detection order. */
export function createDefaultCliTools(dependencies: CliToolDependencies = {}): CliTool[] {
  return [
    new CodexCli(dependencies),
    new CopilotCli(dependencies),
    new ClaudeCli(dependencies),
    new GeminiCli(dependencies),
  ];
}

export class CliToolRegistry {
  constructor(private readonly tools: CliTool[] = createDefaultCliTools()) {}

  names(): string[] {
    return this.tools.map((tool) => tool.name);
  }

  getByName(name: string): CliTool | undefined {
    return this.tools.find((tool) => tool.name === name);
  }

  async getAvailable(): Promise<CliTool[]> {
    const available: CliTool[] = [];
    for (const tool of this.tools) {
      if (await tool.isAvailable()) {
        available.push(tool);
      }
    }
    return available;
  }

  /**
   * Picks `requested` when given, otherwise the first available tool.
   */
  async select(requested?: string | null): Promise<CliTool> {
    if (requested) {
      const tool = this.getByName(requested);
      if (!tool || !(await tool.isAvailable())) {
        throw new NoAvailableCLIToolError(`CLI tool not found/not available: ${requested}`);
      }
      return tool;
    }
    const [first] = await this.getAvailable();
    if (!first) {
      throw new NoAvailableCLIToolError(
        "No AI CLI tools available. Install one of: codex, gh copilot, claude, gemini",
      );
    }
    return first;
  }
}

/** `PROMPTLOOM_CLI_TIMEOUT` in seconds, or the default when unset or invalid. */
export function cliTimeoutFromEnv(env: NodeJS.ProcessEnv = process.env): number {
  const value = Number(env.PROMPTLOOM_CLI_TIMEOUT);
  return Number.isFinite(value) && value > 0 ? value : DEFAULT_CLI_TIMEOUT_SECONDS;
}
