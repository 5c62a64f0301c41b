import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import path from 'path';
import { handleGenerate, handleInit, handleList } from '../../src/commands.js';
import { VariantCache } from '../../src/generators/variantCache.js';
import {
  MemoryOutput,
  createSampleProject,
  createTempDir,
  fakeRegistry,
  fakeRunner,
  readFile,
  removeDir,
} from '../utils/testHelpers.js';

describe('CLI commands', () => {
  let dir: string;
  let output: MemoryOutput;

  beforeEach(() => {
    output = new MemoryOutput();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('initializes a project and generates from it', async () => {
    dir = await createTempDir();
    expect(await handleInit(undefined, { scaffold: true }, { output, cwd: dir })).toBe(0);
    expect(output.lines[0]).toBe(`Initialized promptloom project in ${dir}`);
    expect(output.lines).toContain('  promptloom.yaml');

    const generateOutput = new MemoryOutput();
    const code = await handleGenerate(
      {},
      { output: generateOutput, cwd: dir, cache: new VariantCache(), cliTools: fakeRegistry(fakeRunner({ stdout: 'Updated' })) },
    );
    expect(code).toBe(0);
    expect(generateOutput.lines).toEqual([
      `Generated 2 file(s) in ${path.join(dir, 'prompts')} (Standard format (.prompt.md))`,
      '  analyze.prompt.md',
      '  update-analyze.prompt.md',
    ]);
    const analyze = await readFile(path.join(dir, 'prompts', 'analyze.prompt.md'));
    expect(analyze).toContain('---\ndescription: Analyze a topic and report findings\n---\n');
    expect(analyze).toContain('You are a meticulous researcher.');
    expect(analyze).toContain('## Examples');
  });

  it('refuses to initialize twice', async () => {
    dir = await createTempDir();
    await handleInit('.', { scaffold: false }, { output, cwd: dir });
    const second = new MemoryOutput();
    expect(await handleInit('.', { scaffold: false }, { output: second, cwd: dir })).toBe(1);
    expect(second.errors).toEqual([`Error: Configuration file already exists: ${path.join(dir, 'promptloom.yaml')}`]);
  });

  it('applies tool, library and output overrides', async () => {
    dir = await createSampleProject();
    const code = await handleGenerate(
      { tool: 'copilot', library: 'core', outputDir: 'dist-prompts', action: 'summarize', persona: 'writer' },
      { output, cwd: dir, cache: new VariantCache(), cliTools: fakeRegistry(fakeRunner()) },
    );
    expect(code).toBe(0);
    expect(output.lines).toEqual([
      `Generated 1 file(s) in ${path.join(dir, 'dist-prompts')} (GitHub Copilot format (.prompt.md))`,
      '  core.summarize.prompt.md',
    ]);
  });

  it('saves AI variants as action templates on request', async () => {
    dir = await createSampleProject();
    const cache = new VariantCache();
    const code = await handleGenerate(
      { action: 'analyze', saveVariants: true },
      { output, cwd: dir, cache, cliTools: fakeRegistry(fakeRunner({ stdout: 'You are a careful researcher.\nDig deeper.' })) },
    );
    expect(code).toBe(0);
    const saved = path.join(dir, 'promptloom', 'action', 'expand-analyze.md.hbs');
    expect(output.lines[output.lines.length - 1]).toBe(`Saved ${saved}`);
    expect(await readFile(saved)).toBe('{{{persona}}}\nDig deeper.\n');
  });

  it('reports invalid options as errors', async () => {
    dir = await createSampleProject();
    expect(await handleGenerate({ tool: 'cursor' }, { output, cwd: dir })).toBe(1);
    expect(output.errors).toEqual(["Error: Unknown tool 'cursor'. Available: claude-code, copilot, standard"]);
  });

  it('lists library contents, naming conventions and CLI tools', async () => {
    dir = await createSampleProject();
    expect(await handleList('personas', {}, { output, cwd: dir })).toBe(0);
    expect(await handleList('variants', {}, { output, cwd: dir })).toBe(0);
    expect(await handleList('tools', {}, { output, cwd: dir })).toBe(0);
    expect(await handleList('cli-tools', {}, { output, cwd: dir, cliTools: fakeRegistry(fakeRunner()) })).toBe(0);
    expect(output.lines).toEqual([
      'researcher',
      'writer',
      'expand',
      'claude-code\tClaude Code format (.md)',
      'copilot\tGitHub Copilot format (.prompt.md)',
      'standard\tStandard format (.prompt.md)',
      'codex\tnot found',
      'claude\tavailable',
    ]);
    expect(await handleList('nonsense', {}, { output, cwd: dir })).toBe(1);
    expect(output.errors).toEqual([
      "Error: Unknown list target 'nonsense'. Available: personas, actions, examples, variants, tools, cli-tools",
    ]);
  });
});
