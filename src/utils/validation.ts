import { ValidationError } from "./errors.js";

const IDENTIFIER_CHARS = /^[a-z0-9_-]+$/;

/**
 * Returns the reason `name` is not a valid identifier, or `null` when it is.
 * Identifiers are lowercase, start with a letter and do not end with `-` or `_`.
 */
export function identifierProblem(name: string, field = "Identifier"): string | null {
  if (!name) {
    return `${field} cannot be empty`;
  }
  if (!/^[a-zA-Z]/.test(name)) {
    return `${field} must start with a letter: ${name}`;
  }
  if (!IDENTIFIER_CHARS.test(name)) {
    return `${field} must contain only lowercase letters, numbers, hyphens, and underscores: ${name}`;
  }
  if (name.endsWith("-") || name.endsWith("_")) {
    return `${field} must not end with a hyphen or underscore: ${name}`;
  }
  return null;
}

export function validateIdentifier(name: string, field = "Identifier"): string {
  const problem = identifierProblem(name, field);
  if (problem) {
    throw new ValidationError(problem);
  }
  return name;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
