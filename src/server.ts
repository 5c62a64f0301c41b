import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  type CallToolRequest,
  CallToolRequestSchema,
  ErrorCode,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { Project } from "./config/project.js";
import { Generator, type GeneratorOptions } from "./generators/generator.js";
import { variantCache, type VariantCache } from "./generators/variantCache.js";
import { PromptloomError, errorMessage } from "./utils/errors.js";
import { getLogger } from "./utils/logger.js";
import {
  composePrompt,
  composePromptSchema,
  generatePrompt,
  generatePromptSchema,
  generateVariants,
  generateVariantsSchema,
  generateWithSampler,
  generateWithSamplerSchema,
  listActions,
  listActionsSchema,
  listCachedVariants,
  listCachedVariantsSchema,
  listExamples,
  listExamplesSchema,
  listPersonas,
  listPersonasSchema,
  saveVariants,
  saveVariantsSchema,
  type ToolContext,
  type ToolResult,
} from "./tools/promptTools.js";
import { discoverPrompts, getPrompt, toMcpPrompt } from "./tools/mcpPrompts.js";
import { createServerSampler, type Sampler } from "./tools/sampling.js";
import { VERSION } from "./version.js";

const log = getLogger("server");

export const SERVER_NAME = "promptloom";
export const SERVER_VERSION = VERSION;

export interface PromptServerOptions extends GeneratorOptions {
  cache?: VariantCache;
  /** Overrides MCP sampling, e.g. in tests. */
  sampler?: Sampler;
}

export interface PromptServer {
  server: Server;
  context: ToolContext;
  callTool(name: string, args: unknown): Promise<ToolResult>;
}

export function createPromptServer(project: Project, options: PromptServerOptions = {}): PromptServer {
  const cache = options.cache ?? variantCache;
  const generator = new Generator(project.config, project.fileSystem, { ...options, cache });

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {}, prompts: {} } },
  );
  const context: ToolContext = {
    generator,
    cache,
    sampler: options.sampler ?? createServerSampler(server),
  };

  async function callTool(name: string, args: unknown): Promise<ToolResult> {
    const input = args ?? {};
    switch (name) {
      case "list_personas":
        await listPersonasSchema.parseAsync(input);
        return listPersonas(context);
      case "list_actions":
        return listActions(context, await listActionsSchema.parseAsync(input));
      case "list_examples":
        await listExamplesSchema.parseAsync(input);
        return listExamples(context);
      case "generate_prompt":
        return generatePrompt(context, await generatePromptSchema.parseAsync(input));
      case "compose_prompt":
        return composePrompt(context, await composePromptSchema.parseAsync(input));
      case "generate_with_sampler":
        return generateWithSampler(context, await generateWithSamplerSchema.parseAsync(input));
      case "generate_variants":
        return generateVariants(context, await generateVariantsSchema.parseAsync(input));
      case "list_cached_variants":
        return listCachedVariants(context, await listCachedVariantsSchema.parseAsync(input));
      case "save_variants":
        return saveVariants(context, await saveVariantsSchema.parseAsync(input));
      default:
        throw new PromptloomError(`Tool ${name} does not exist`, "UNKNOWN_TOOL");
    }
  }

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        { name: "list_personas", description: "List available personas with a short preview of each.", inputSchema: zodToJsonSchema(listPersonasSchema) },
        { name: "list_actions", description: "List actions that can be rendered with a persona.", inputSchema: zodToJsonSchema(listActionsSchema) },
        { name: "list_examples", description: "List examples and whether they are templates.", inputSchema: zodToJsonSchema(listExamplesSchema) },
        { name: "generate_prompt", description: "Compose a prompt from an action, a persona and optional examples and metadata.", inputSchema: zodToJsonSchema(generatePromptSchema) },
        { name: "compose_prompt", description: "Alias of generate_prompt.", inputSchema: zodToJsonSchema(composePromptSchema) },
        { name: "generate_with_sampler", description: "Compose a prompt and optionally refine it with the client's model using the given instructions.", inputSchema: zodToJsonSchema(generateWithSamplerSchema) },
        { name: "generate_variants", description: "Produce {variant}-{action} prompts from action templates or with an AI CLI tool.", inputSchema: zodToJsonSchema(generateVariantsSchema) },
        { name: "list_cached_variants", description: "List variants generated during this session.", inputSchema: zodToJsonSchema(listCachedVariantsSchema) },
        { name: "save_variants", description: "Save cached variants as action templates in the prompt library.", inputSchema: zodToJsonSchema(saveVariantsSchema) },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
    const toolName = request.params.name;
    try {
      return await callTool(toolName, request.params.arguments);
    } catch (error) {
      const message = errorMessage(error);
      log.error({ tool: toolName, err: message }, "Tool call failed");
      return {
        content: [{ type: "text" as const, text: `Error occurred: ${message}\nPlease check arguments and try again.` }],
        isError: true,
      };
    }
  });

  server.setRequestHandler(ListPromptsRequestSchema, async () => {
    return { prompts: discoverPrompts(generator).map(toMcpPrompt) };
  });

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    try {
      return await getPrompt(context, request.params.name);
    } catch (error) {
      if (error instanceof PromptloomError && error.code === "PROMPT_NOT_FOUND") {
        throw new McpError(ErrorCode.InvalidParams, error.message);
      }
      throw new McpError(ErrorCode.InternalError, errorMessage(error));
    }
  });

  return { server, context, callTool };
}
