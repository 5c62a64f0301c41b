import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { PromptloomError } from "../utils/errors.js";

/** Sends a prompt to the connected client's model and returns its text reply. */
export type Sampler = (prompt: string) => Promise<string>;

const SAMPLING_MAX_TOKENS = 4096;

export function buildSamplingPrompt(instruction: string, basePrompt: string): string {
  return `${instruction}\n\n# Base Prompt to Transform\n\n${basePrompt}`;
}

/** Sampler backed by MCP `sampling/createMessage`. */
export function createServerSampler(server: Server): Sampler {
  return async (prompt) => {
    const result = await server.createMessage({
      messages: [{ role: "user", content: { type: "text", text: prompt } }],
      maxTokens: SAMPLING_MAX_TOKENS,
    });
    const content = result.content;
    if (!Array.isArray(content) && content.type === "text") {
      return content.text.trim();
    }
    throw new PromptloomError("Sampling returned no text content", "SAMPLING_FAILED");
  };
}
