import type { Action, Example, Persona } from "../types/index.js";
import { ValidationError } from "../utils/errors.js";
import { validateIdentifier } from "../utils/validation.js";

export function createPersona(name: string, content: string): Persona {
  validateIdentifier(name, "Persona name");
  if (!content.trim()) {
    throw new ValidationError("Persona content cannot be empty");
  }
  return Object.freeze({ name, content });
}

export function createAction(name: string, template: string, personaName: string): Action {
  validateIdentifier(name, "Action name");
  validateIdentifier(personaName, "Persona name");
  if (!template.trim()) {
    throw new ValidationError("Action template cannot be empty");
  }
  return Object.freeze({ name, template, personaName });
}

export function createExample(name: string, content: string, isTemplate = false): Example {
  validateIdentifier(name, "Example name");
  if (!content.trim()) {
    throw new ValidationError("Example content cannot be empty");
  }
  return Object.freeze({ name, content, isTemplate });
}
