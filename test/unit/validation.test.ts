import { describe, it, expect } from '@jest/globals';
import { identifierProblem, validateIdentifier } from '../../src/utils/validation.js';
import { createAction, createExample, createPersona } from '../../src/models/promptModels.js';
import { ValidationError } from '../../src/utils/errors.js';

describe('identifier validation', () => {
  it('accepts lowercase names with digits, hyphens and underscores', () => {
    expect(identifierProblem('code-review_2')).toBeNull();
    expect(validateIdentifier('a')).toBe('a');
  });

  it('rejects empty names', () => {
    expect(identifierProblem('', 'Persona name')).toBe('Persona name cannot be empty');
  });

  it('rejects names that do not start with a letter', () => {
    expect(identifierProblem('1st')).toBe('Identifier must start with a letter: 1st');
    expect(identifierProblem('-x')).toBe('Identifier must start with a letter: -x');
  });

  it('rejects uppercase and other characters', () => {
    expect(identifierProblem('Review')).toBe(
      'Identifier must contain only lowercase letters, numbers, hyphens, and underscores: Review',
    );
    expect(identifierProblem('a.b')).toBe(
      'Identifier must contain only lowercase letters, numbers, hyphens, and underscores: a.b',
    );
  });

  it('rejects trailing hyphens and underscores', () => {
    expect(identifierProblem('draft-')).toBe('Identifier must not end with a hyphen or underscore: draft-');
    expect(identifierProblem('draft_')).toBe('Identifier must not end with a hyphen or underscore: draft_');
  });

  it('throws ValidationError from validateIdentifier', () => {
    expect(() => validateIdentifier('Bad', 'Action name')).toThrow(ValidationError);
  });
});

describe('prompt models', () => {
  it('creates frozen personas', () => {
    const persona = createPersona('researcher', 'You research.');
    expect(persona).toEqual({ name: 'researcher', content: 'You research.' });
    expect(Object.isFrozen(persona)).toBe(true);
  });

  it('rejects blank content', () => {
    expect(() => createPersona('researcher', '  \n')).toThrow('Persona content cannot be empty');
    expect(() => createAction('analyze', '', 'researcher')).toThrow('Action template cannot be empty');
    expect(() => createExample('sample', ' ')).toThrow('Example content cannot be empty');
  });

  it('validates every name on an action', () => {
    expect(() => createAction('analyze', '{{persona}}', 'Researcher')).toThrow(
      'Persona name must contain only lowercase letters, numbers, hyphens, and underscores: Researcher',
    );
  });

  it('defaults examples to plain content', () => {
    expect(createExample('sample', 'text').isTemplate).toBe(false);
    expect(createExample('sample', 'text', true).isTemplate).toBe(true);
  });
});
