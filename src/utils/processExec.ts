import { spawn } from "child_process";
import { promises as fs, constants as fsConstants } from "fs";
import path from "path";
import { getLogger } from "./logger.js";

const log = getLogger("process");

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunCommandOptions {
  input?: string;
  timeoutMs: number;
  /** Time between SIGTERM and SIGKILL once the timeout fires. */
  killGraceMs?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export type CommandRunner = (command: string, args: string[], options: RunCommandOptions) => Promise<CommandResult>;

/** Resolves whether `command` is an executable somewhere on PATH. */
export type PathProbe = (command: string) => Promise<boolean>;

export const DEFAULT_KILL_GRACE_MS = 2000;

function shouldUseWindowsShell(command: string): boolean {
  if (process.platform !== "win32") {
    return false;
  }
  const normalized = command.toLowerCase();
  return normalized.endsWith(".cmd") || normalized.endsWith(".bat");
}

/**
 * Spawns `command`, writes `input` to its stdin and collects output. Once `timeoutMs` elapses
 * the child gets SIGTERM, then SIGKILL after `killGraceMs`, and the call settles with
 * `timedOut: true` even if its pipes are still held open. Rejects only when the process
 * cannot be started.
 */
export const runCommand: CommandRunner = (command, args, options) =>
  new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      shell: shouldUseWindowsShell(command),
      windowsHide: process.platform === "win32",
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;
    let killTimer: NodeJS.Timeout | undefined;

    const finish = (exitCode: number | null): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      clearTimeout(killTimer);
      resolve({ exitCode, stdout, stderr, timedOut });
    };

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGTERM");
      killTimer = setTimeout(() => {
        log.warn({ command, pid: child.pid }, "Process ignored SIGTERM, killing");
        child.kill("SIGKILL");
        child.stdin.destroy();
        child.stdout.destroy();
        child.stderr.destroy();
        finish(null);
      }, options.killGraceMs ?? DEFAULT_KILL_GRACE_MS);
    }, options.timeoutMs);

    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });
    child.stdin.on("error", (error) => {
      // EPIPE when the child exits before reading its input; the exit code reports the failure.
      log.debug({ command, err: error }, "stdin closed early");
    });

    child.on("error", (error) => {
      clearTimeout(timer);
      clearTimeout(killTimer);
      if (!settled) {
        settled = true;
        reject(error);
      }
    });
    child.on("close", (exitCode) => {
      finish(exitCode);
    });

    child.stdin.end(options.input ?? "");
  });

function pathExtensions(): string[] {
  if (process.platform !== "win32") {
    return [""];
  }
  const raw = process.env.PATHEXT ?? ".COM;.EXE;.BAT;.CMD";
  return ["", ...raw.split(";").filter(Boolean)];
}

/** Looks for an executable file named `command` in each PATH entry. */
export const isOnPath: PathProbe = async (command) => {
  const entries = (process.env.PATH ?? "").split(path.delimiter).filter(Boolean);
  const mode = process.platform === "win32" ? fsConstants.F_OK : fsConstants.X_OK;
  for (const directory of entries) {
    for (const extension of pathExtensions()) {
      const candidate = path.join(directory, `${command}${extension}`);
      try {
        const stat = await fs.stat(candidate);
        if (stat.isFile()) {
          await fs.access(candidate, mode);
          return true;
        }
      } catch {
        continue;
      }
    }
  }
  return false;
};
