import { promises as fs } from "fs";
import path from "path";
import { DEFAULT_CONFIG_FILE, DEFAULT_OUTPUT_DIR, DEFAULT_ROOT_DIR } from "../config/index.js";
import { ACTION_DIR, EXAMPLE_DIR, PARTIALS_DIR, PERSONA_DIR, VARIANT_DIR } from "../prompts/loader.js";
import { pathExists, writeTextFile } from "../utils/fileSystem.js";
import { ConfigurationError, errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import {
  EXAMPLE_ACTION,
  EXAMPLE_CONFIG,
  EXAMPLE_EXAMPLE,
  EXAMPLE_PERSONA,
  EXAMPLE_VARIANT,
  OUTPUT_GITIGNORE,
  TEMPLATES_README,
} from "./scaffold.js";

const log = getLogger("initializer");

export interface InitOptions {
  scaffold?: boolean;
  overwrite?: boolean;
}

function wrapFsError(error: unknown, what: string): ConfigurationError {
  if (typeof error === "object" && error !== null && "code" in error && (error.code === "EACCES" || error.code === "EPERM")) {
    return new ConfigurationError(`Permission denied: ${errorMessage(error)}`);
  }
  return new ConfigurationError(`Failed to ${what}: ${errorMessage(error)}`);
}

/**
 * Creates a config file and, optionally, a starter prompt library in a directory.
 */
export class ProjectInitializer {
  constructor(private readonly projectDir: string) {}

  get configPath(): string {
    return path.join(this.projectDir, DEFAULT_CONFIG_FILE);
  }

  async createConfig(overwrite = false): Promise<string> {
    if (!overwrite && (await pathExists(this.configPath))) {
      throw new ConfigurationError(`Configuration file already exists: ${this.configPath}`);
    }
    try {
      await writeTextFile(this.configPath, EXAMPLE_CONFIG);
    } catch (error) {
      throw wrapFsError(error, "create configuration file");
    }
    return this.configPath;
  }

  async createDirectories(): Promise<string[]> {
    const root = path.join(this.projectDir, DEFAULT_ROOT_DIR);
    const directories = [
      ...[PERSONA_DIR, ACTION_DIR, EXAMPLE_DIR, VARIANT_DIR, PARTIALS_DIR].map((name) => path.join(root, name)),
      path.join(this.projectDir, DEFAULT_OUTPUT_DIR),
    ];
    try {
      for (const directory of directories) {
        await fs.mkdir(directory, { recursive: true });
      }
    } catch (error) {
      throw wrapFsError(error, "create directories");
    }
    return directories;
  }

  async createExampleFiles(overwrite = false): Promise<string[]> {
    const root = path.join(this.projectDir, DEFAULT_ROOT_DIR);
    const files: Array<[string, string]> = [
      [path.join(root, PERSONA_DIR, "researcher.md"), EXAMPLE_PERSONA],
      [path.join(root, ACTION_DIR, "analyze.md.hbs"), EXAMPLE_ACTION],
      [path.join(root, EXAMPLE_DIR, "analysis-output.md"), EXAMPLE_EXAMPLE],
      [path.join(root, VARIANT_DIR, "update.md.hbs"), EXAMPLE_VARIANT],
      [path.join(root, PARTIALS_DIR, "README.md"), TEMPLATES_README],
      [path.join(this.projectDir, DEFAULT_OUTPUT_DIR, ".gitignore"), OUTPUT_GITIGNORE],
    ];
    const written: string[] = [];
    try {
      for (const [filePath, content] of files) {
        if (!overwrite && (await pathExists(filePath))) {
          continue;
        }
        await writeTextFile(filePath, content);
        written.push(filePath);
      }
    } catch (error) {
      throw wrapFsError(error, "create example files");
    }
    return written;
  }

  /** Returns every file and directory created. */
  async initialize(options: InitOptions = {}): Promise<string[]> {
    const created = [await this.createConfig(options.overwrite)];
    if (options.scaffold ?? true) {
      created.push(...(await this.createDirectories()));
      created.push(...(await this.createExampleFiles(options.overwrite)));
    }
    log.info({ projectDir: this.projectDir, created: created.length }, "Project initialized");
    return created;
  }
}
