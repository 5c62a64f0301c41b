import { describe, it, expect } from '@jest/globals';
import path from 'path';
import { getNamingConvention, namingRegistry } from '../../src/generators/naming.js';
import { ConfigurationError } from '../../src/utils/errors.js';

describe('naming conventions', () => {
  it('lists the registered tools', () => {
    expect(namingRegistry.list()).toEqual(['claude-code', 'copilot', 'standard']);
    expect(namingRegistry.isSupported('copilot')).toBe(true);
    expect(namingRegistry.isSupported('cursor')).toBe(false);
  });

  it('reports unknown tools with the available names', () => {
    expect(() => getNamingConvention('cursor')).toThrow(ConfigurationError);
    expect(() => getNamingConvention('cursor')).toThrow("Unknown tool 'cursor'. Available: claude-code, copilot, standard");
  });

  it('standard ignores the library', () => {
    const standard = getNamingConvention('standard');
    expect(standard.description).toBe('Standard format (.prompt.md)');
    expect(standard.getFilename('analyze', 'core')).toBe('analyze.prompt.md');
    expect(standard.getOutputPath('/out', 'analyze', 'core')).toBe(path.join('/out', 'analyze.prompt.md'));
  });

  it('copilot prefixes the library', () => {
    const copilot = getNamingConvention('copilot');
    expect(copilot.getFilename('analyze', 'core')).toBe('core.analyze.prompt.md');
    expect(copilot.getFilename('analyze', null)).toBe('analyze.prompt.md');
    expect(copilot.getOutputPath('/out', 'analyze', 'core')).toBe(path.join('/out', 'core.analyze.prompt.md'));
  });

  it('claude-code nests outputs under the library', () => {
    const claude = getNamingConvention('claude-code');
    expect(claude.fileExtension).toBe('.md');
    expect(claude.getFilename('analyze', 'core')).toBe('analyze.md');
    expect(claude.getOutputPath('/out', 'analyze', 'core')).toBe(path.join('/out', 'core', 'analyze.md'));
    expect(claude.getOutputPath('/out', 'analyze', null)).toBe(path.join('/out', 'analyze.md'));
  });
});
