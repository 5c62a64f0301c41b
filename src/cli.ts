#!/usr/bin/env node
import "./env.js";
import { Command } from "commander";
import { handleGenerate, handleInit, handleList, LIST_KINDS, type GenerateCommandOptions } from "./commands.js";
import { VERSION } from "./version.js";
import { logger, setLogLevel } from "./utils/logger.js";

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, ...value.split(",").map((item) => item.trim()).filter(Boolean)];
}

const program = new Command();

program
  .name("promptloom")
  .description("Compose persona, action and example fragments into prompt libraries")
  .version(VERSION)
  .option("-v, --verbose", "log debug output to stderr")
  .hook("preAction", (command) => {
    if (command.opts<{ verbose?: boolean }>().verbose) {
      setLogLevel("debug");
    }
  });

program
  .command("init")
  .description("Create promptloom.yaml and a starter prompt library")
  .argument("[directory]", "project directory", ".")
  .option("--no-scaffold", "only write the configuration file")
  .option("-f, --force", "overwrite existing files")
  .action(async (directory: string, options: { scaffold: boolean; force?: boolean }) => {
    process.exitCode = await handleInit(directory, options);
  });

program
  .command("generate")
  .alias("export")
  .description("Render every action (or one) into the output directory")
  .option("-c, --config <path>", "project directory, config file or github://org/repo[@ref][/subpath]")
  .option("-t, --tool <name>", "naming convention: standard, copilot or claude-code")
  .option("-l, --library <name>", "library namespace for the naming convention")
  .option("-o, --output-dir <dir>", "directory to write prompts to")
  .option("-p, --persona <name>", "persona to render every action with")
  .option("-e, --examples <names>", "comma separated example names", collect)
  .option("-a, --action <name>", "only generate this action")
  .option("--save-variants", "save AI-generated variants as action templates")
  .option("-f, --force", "overwrite existing variant templates when saving")
  .action(async (options: GenerateCommandOptions) => {
    process.exitCode = await handleGenerate(options);
  });

program
  .command("list")
  .description(`List library contents: ${LIST_KINDS.join(", ")}`)
  .argument("<kind>", "what to list")
  .option("-c, --config <path>", "project directory, config file or github://org/repo[@ref][/subpath]")
  .action(async (kind: string, options: { config?: string }) => {
    process.exitCode = await handleList(kind, options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.fatal({ err: error }, "Command failed");
  process.exitCode = 1;
});
