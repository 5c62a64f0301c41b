#!/usr/bin/env node
import "./env.js";
import { Command } from "commander";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadProject } from "./config/project.js";
import { createPromptServer, SERVER_VERSION } from "./server.js";
import { logger } from "./utils/logger.js";

async function main(): Promise<void> {
  const program = new Command();
  program
    .name("promptloom-mcp")
    .description("Serve a promptloom prompt library over the Model Context Protocol (stdio)")
    .version(SERVER_VERSION)
    .option("-c, --config-dir <dir>", "project directory or github://org/repo[@ref][/subpath]")
    .parse(process.argv);

  const { configDir } = program.opts<{ configDir?: string }>();
  const project = await loadProject({
    source: configDir || process.env.PROMPTLOOM_CONFIG_DIR || undefined,
    allowDefaults: true,
  });
  const { server } = createPromptServer(project);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ source: project.config.source ?? project.fileSystem.describe() }, "MCP server connected over stdio");
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Server failed to start");
  process.exit(1);
});
