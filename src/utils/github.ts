import axios from "axios";
import type { FileSystem } from "./fileSystem.js";
import { ConfigurationError, PromptloomError } from "./errors.js";
import { getLogger } from "./logger.js";

const log = getLogger("github");

const GITHUB_URL_PATTERN = /^github:\/\/([^/@\s]+)\/([^/@\s]+)(?:@([^/\s]+))?(?:\/(.*))?$/;
const RAW_BASE_URL = "https://raw.githubusercontent.com";
const REQUEST_TIMEOUT_MS = 30_000;

export interface GitHubLocation {
  org: string;
  repo: string;
  ref: string;
  subpath: string | null;
}

/** Minimal HTTP surface used to fetch raw files; satisfied by an axios instance. */
export interface HttpClient {
  get(
    url: string,
    config: { responseType: "text"; headers: Record<string, string>; timeout: number },
  ): Promise<{ data: unknown }>;
}

export function isGitHubUrl(source: string): boolean {
  return source.startsWith("github://");
}

/**
 * Parses `github://org/repo[@ref][/subpath]`. The ref defaults to `main`.
 */
export function parseGitHubUrl(url: string): GitHubLocation {
  const match = GITHUB_URL_PATTERN.exec(url);
  if (!match) {
    throw new ConfigurationError(
      `Invalid GitHub URL format: ${url}. Expected format: github://org/repo[@ref][/subpath]`,
    );
  }
  const [, org, repo, ref, subpath] = match;
  const trimmed = subpath ? subpath.replace(/\/+$/, "") : "";
  return { org, repo, ref: ref ?? "main", subpath: trimmed || null };
}

/**
 * Read-only view of a GitHub repository through raw.githubusercontent.com.
 * Directory listing is not available, so list operations return nothing.
 */
export class GitHubFileSystem implements FileSystem {
  readonly canList = false;
  private readonly cache = new Map<string, string>();
  private readonly subpath: string | null;

  constructor(
    public readonly org: string,
    public readonly repo: string,
    public readonly ref = "main",
    subpath: string | null = null,
    private readonly client: HttpClient = axios.create(),
  ) {
    const trimmed = subpath ? subpath.replace(/^\/+|\/+$/g, "") : "";
    this.subpath = trimmed || null;
  }

  rawUrl(filePath: string): string {
    const relative = filePath.replace(/^\/+/, "");
    const prefix = this.subpath ? `${this.subpath}/` : "";
    return `${RAW_BASE_URL}/${this.org}/${this.repo}/${this.ref}/${prefix}${relative}`;
  }

  async readText(filePath: string): Promise<string> {
    const url = this.rawUrl(filePath);
    const cached = this.cache.get(url);
    if (cached !== undefined) {
      return cached;
    }

    const headers: Record<string, string> = { "User-Agent": "promptloom" };
    if (process.env.GITHUB_TOKEN) {
      headers["Authorization"] = `token ${process.env.GITHUB_TOKEN}`;
    }

    try {
      const response = await this.client.get(url, {
        responseType: "text",
        headers,
        timeout: REQUEST_TIMEOUT_MS,
      });
      const text = typeof response.data === "string" ? response.data : JSON.stringify(response.data);
      this.cache.set(url, text);
      log.debug({ url }, "Fetched file from GitHub");
      return text;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status === 404) {
          throw new PromptloomError(`File not found on GitHub: ${url}`, "GITHUB_NOT_FOUND");
        }
        if (status === 401 || status === 403) {
          throw new PromptloomError(
            `GitHub denied access to ${url}. Check that GITHUB_TOKEN is valid.`,
            "GITHUB_ACCESS_DENIED",
          );
        }
        throw new PromptloomError(`Failed to fetch ${url}: ${error.message}`, "GITHUB_FETCH_FAILED");
      }
      throw error;
    }
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await this.readText(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async listFiles(): Promise<string[]> {
    return [];
  }

  describe(): string {
    const suffix = this.subpath ? `/${this.subpath}` : "";
    return `github://${this.org}/${this.repo}@${this.ref}${suffix}`;
  }
}

/**
 * Builds a file system for `url` and checks that `configFile` can be read from it.
 */
export async function createGitHubFileSystem(
  url: string,
  configFile: string,
  client?: HttpClient,
): Promise<GitHubFileSystem> {
  const location = parseGitHubUrl(url);
  const fileSystem = new GitHubFileSystem(location.org, location.repo, location.ref, location.subpath, client);
  if (!(await fileSystem.exists(configFile))) {
    throw new ConfigurationError(
      `Configuration file ${configFile} not found at ${url} ` +
        `(repository ${location.org}/${location.repo}, ref ${location.ref})`,
    );
  }
  return fileSystem;
}
