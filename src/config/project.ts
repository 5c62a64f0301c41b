import { promises as fs } from "fs";
import path from "path";
import type { ProjectConfig } from "../types/index.js";
import { LocalFileSystem, type FileSystem } from "../utils/fileSystem.js";
import { createGitHubFileSystem, isGitHubUrl, type HttpClient } from "../utils/github.js";
import { ConfigurationError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import { DEFAULT_CONFIG_FILE, defaultConfig, findConfigFile, loadConfigFile } from "./index.js";

const log = getLogger("project");

export interface Project {
  config: ProjectConfig;
  /** Where persona/, action/, example/ and variant/ are read from. */
  fileSystem: FileSystem;
}

export interface LoadProjectOptions {
  /** Local directory, config file path, or `github://org/repo[@ref][/subpath]`. Defaults to `cwd`. */
  source?: string;
  cwd?: string;
  /** Fall back to defaults when no config file is found instead of failing. */
  allowDefaults?: boolean;
  httpClient?: HttpClient;
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Resolves a project from a local path or a GitHub URL. Remote projects are read-only;
 * their outputs resolve against `cwd`.
 */
export async function loadProject(options: LoadProjectOptions = {}): Promise<Project> {
  const cwd = options.cwd ?? process.cwd();
  const source = options.source ?? cwd;

  if (isGitHubUrl(source)) {
    const fileSystem = await createGitHubFileSystem(source, DEFAULT_CONFIG_FILE, options.httpClient);
    const config = await loadConfigFile(fileSystem, DEFAULT_CONFIG_FILE, cwd);
    log.info({ source: fileSystem.describe() }, "Loaded remote project");
    return { config: { ...config, source }, fileSystem };
  }

  const resolved = path.resolve(cwd, source);
  if (await isDirectory(resolved)) {
    const fileSystem = new LocalFileSystem(resolved);
    const configFile = await findConfigFile(fileSystem);
    if (configFile) {
      const config = await loadConfigFile(fileSystem, configFile, resolved);
      return { config: { ...config, source: path.join(resolved, configFile) }, fileSystem };
    }
    if (!options.allowDefaults) {
      throw new ConfigurationError(`Configuration file not found: ${path.join(resolved, DEFAULT_CONFIG_FILE)}`);
    }
    log.warn({ directory: resolved }, "No configuration file found, using defaults");
    return { config: defaultConfig(resolved), fileSystem };
  }

  const projectRoot = path.dirname(resolved);
  const fileSystem = new LocalFileSystem(projectRoot);
  const config = await loadConfigFile(fileSystem, path.basename(resolved), projectRoot);
  return { config: { ...config, source: resolved }, fileSystem };
}
