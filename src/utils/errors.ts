/**
 * Error hierarchy shared by the CLI, the generator and the MCP server.
 * Every error carries a stable `code` so callers can branch without matching messages.
 */
export class PromptloomError extends Error {
  constructor(
    message: string,
    public readonly code: string = "PROMPTLOOM_ERROR",
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ConfigurationError extends PromptloomError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
  }
}

export class ValidationError extends PromptloomError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
  }
}

export class PersonaNotFoundError extends PromptloomError {
  constructor(public readonly personaName: string) {
    super(`Persona not found: ${personaName}`, "PERSONA_NOT_FOUND");
  }
}

export class ActionNotFoundError extends PromptloomError {
  constructor(public readonly actionName: string) {
    super(`Action not found: ${actionName}`, "ACTION_NOT_FOUND");
  }
}

export class ExampleNotFoundError extends PromptloomError {
  constructor(public readonly exampleName: string) {
    super(`Example not found: ${exampleName}`, "EXAMPLE_NOT_FOUND");
  }
}

export class VariantTemplateNotFoundError extends PromptloomError {
  constructor(public readonly variantName: string) {
    super(`Variant template not found: ${variantName}`, "VARIANT_TEMPLATE_NOT_FOUND");
  }
}

export class TemplateRenderError extends PromptloomError {
  constructor(message: string) {
    super(message, "TEMPLATE_RENDER_ERROR");
  }
}

export class CLIToolError extends PromptloomError {
  constructor(message: string) {
    super(message, "CLI_TOOL_ERROR");
  }
}

export class NoAvailableCLIToolError extends PromptloomError {
  constructor(message: string) {
    super(message, "NO_AVAILABLE_CLI_TOOL");
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
