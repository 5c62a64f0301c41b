import path from "path";
import { applyOverrides } from "./config/index.js";
import { loadProject } from "./config/project.js";
import { Generator } from "./generators/generator.js";
import { ProjectInitializer } from "./generators/initializer.js";
import { VariantSaver } from "./generators/variantSaver.js";
import { CliToolRegistry } from "./generators/cliTools.js";
import { namingRegistry } from "./generators/naming.js";
import { variantCache, type VariantCache } from "./generators/variantCache.js";
import { LocalFileSystem } from "./utils/fileSystem.js";
import { PromptloomError, errorMessage } from "./utils/errors.js";
import { getLogger } from "./utils/logger.js";

const log = getLogger("cli");

export interface Output {
  log(message: string): void;
  error(message: string): void;
}

export const consoleOutput: Output = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

export interface CommandDependencies {
  output?: Output;
  cwd?: string;
  cliTools?: CliToolRegistry;
  cache?: VariantCache;
}

function reportFailure(output: Output, error: unknown): number {
  if (!(error instanceof PromptloomError)) {
    log.error({ err: error }, "Unexpected failure");
  }
  output.error(`Error: ${errorMessage(error)}`);
  return 1;
}

export interface InitCommandOptions {
  scaffold?: boolean;
  force?: boolean;
}

export async function handleInit(
  directory: string | undefined,
  options: InitCommandOptions,
  dependencies: CommandDependencies = {},
): Promise<number> {
  const output = dependencies.output ?? consoleOutput;
  const projectDir = path.resolve(dependencies.cwd ?? process.cwd(), directory ?? ".");
  try {
    const initializer = new ProjectInitializer(projectDir);
    const created = await initializer.initialize({ scaffold: options.scaffold, overwrite: options.force });
    output.log(`Initialized promptloom project in ${projectDir}`);
    for (const entry of created) {
      output.log(`  ${path.relative(projectDir, entry) || "."}`);
    }
    return 0;
  } catch (error) {
    return reportFailure(output, error);
  }
}

export interface GenerateCommandOptions {
  config?: string;
  tool?: string;
  library?: string;
  outputDir?: string;
  persona?: string;
  examples?: string[];
  action?: string;
  saveVariants?: boolean;
  force?: boolean;
}

export async function handleGenerate(
  options: GenerateCommandOptions,
  dependencies: CommandDependencies = {},
): Promise<number> {
  const output = dependencies.output ?? consoleOutput;
  const cache = dependencies.cache ?? variantCache;
  try {
    const project = await loadProject({ source: options.config, cwd: dependencies.cwd, allowDefaults: true });
    const config = applyOverrides(project.config, {
      tool: options.tool,
      library: options.library,
      outputDir: options.outputDir,
    });
    const generator = new Generator(config, project.fileSystem, { cliTools: dependencies.cliTools, cache });

    const result = options.action
      ? await generator.generateAction(options.action, options.persona, options.examples)
      : await generator.generateAll(options.persona, options.examples);

    output.log(
      `Generated ${result.filesGenerated.length} file(s) in ${config.generate.outputDir} (${generator.naming.description})`,
    );
    for (const filePath of result.filesGenerated) {
      output.log(`  ${path.relative(config.generate.outputDir, filePath)}`);
    }
    for (const skipped of result.skipped) {
      output.error(`Skipped variant ${skipped}`);
    }
    for (const message of result.errors) {
      output.error(`Error: ${message}`);
    }

    if (options.saveVariants && cache.hasVariants()) {
      const fileSystem = project.fileSystem;
      if (!(fileSystem instanceof LocalFileSystem)) {
        output.error(`Error: Cannot save variants to ${fileSystem.describe()}`);
        return 1;
      }
      const saver = new VariantSaver(path.resolve(fileSystem.baseDir, config.rootDir));
      const saved = await saver.saveAll(
        cache.getAll(),
        async (personaName) => (await generator.loader.loadPersona(personaName)).content,
        options.force,
      );
      for (const entry of saved) {
        output.log(entry.saved ? `Saved ${entry.filePath}` : `Not saved ${entry.filePath}: ${entry.error}`);
      }
    }

    return result.success ? 0 : 1;
  } catch (error) {
    return reportFailure(output, error);
  }
}

export const LIST_KINDS = ["personas", "actions", "examples", "variants", "tools", "cli-tools"] as const;
export type ListKind = (typeof LIST_KINDS)[number];

export function isListKind(value: string): value is ListKind {
  return LIST_KINDS.some((kind) => kind === value);
}

export async function handleList(
  kind: string,
  options: { config?: string },
  dependencies: CommandDependencies = {},
): Promise<number> {
  const output = dependencies.output ?? consoleOutput;
  if (!isListKind(kind)) {
    output.error(`Error: Unknown list target '${kind}'. Available: ${LIST_KINDS.join(", ")}`);
    return 1;
  }
  try {
    if (kind === "tools") {
      for (const convention of namingRegistry.all()) {
        output.log(`${convention.name}\t${convention.description}`);
      }
      return 0;
    }
    if (kind === "cli-tools") {
      const registry = dependencies.cliTools ?? new CliToolRegistry();
      const available = new Set((await registry.getAvailable()).map((tool) => tool.name));
      for (const name of registry.names()) {
        output.log(`${name}\t${available.has(name) ? "available" : "not found"}`);
      }
      return 0;
    }

    const project = await loadProject({ source: options.config, cwd: dependencies.cwd, allowDefaults: true });
    const generator = new Generator(project.config, project.fileSystem, { cliTools: dependencies.cliTools });
    const loader = generator.loader;
    const names =
      kind === "personas"
        ? await loader.listPersonas()
        : kind === "actions"
          ? await loader.listActions()
          : kind === "examples"
            ? await loader.listExamples()
            : await loader.listVariants();
    for (const name of names) {
      output.log(name);
    }
    return 0;
  } catch (error) {
    return reportFailure(output, error);
  }
}
