import { describe, it, expect, afterEach } from '@jest/globals';
import path from 'path';
import {
  applyOverrides,
  defaultConfig,
  findConfigFile,
  loadConfigFile,
  mergeMetadata,
  parseConfigText,
  resolveMetadata,
  variantActionNames,
} from '../../src/config/index.js';
import { loadProject } from '../../src/config/project.js';
import { LocalFileSystem } from '../../src/utils/fileSystem.js';
import { ConfigurationError } from '../../src/utils/errors.js';
import { createSampleProject, createTempDir, removeDir, writeFiles, SAMPLE_CONFIG } from '../utils/testHelpers.js';

const ROOT = path.resolve('/projects/demo');

describe('parseConfigText', () => {
  it('applies defaults to an empty document', () => {
    const config = parseConfigText('', ROOT);
    expect(config.rootDir).toBe('promptloom');
    expect(config.generate).toEqual({ tool: 'standard', library: null, outputDir: path.join(ROOT, 'prompts') });
    expect(config.metadata).toEqual({});
    expect(config.prompts).toEqual([]);
    expect(config.source).toBeNull();
  });

  it('reads prompt entries with snake_case keys', () => {
    const config = parseConfigText(
      `generate:
  tool: copilot
  library: core
prompts:
  - persona: researcher
    action: analyze
    cli_tool: claude
    variants: [update]
    examples: [report]
    metadata:
      topic: caching
`,
      ROOT,
    );
    expect(config.generate.tool).toBe('copilot');
    expect(config.generate.library).toBe('core');
    expect(config.prompts).toEqual([
      {
        persona: 'researcher',
        action: 'analyze',
        variants: ['update'],
        cliTool: 'claude',
        examples: ['report'],
        metadata: { topic: 'caching' },
      },
    ]);
  });

  it('defaults variants to an empty list and cli_tool to null', () => {
    const config = parseConfigText('prompts:\n  - persona: researcher\n    action: analyze\n', ROOT);
    expect(config.prompts[0].variants).toEqual([]);
    expect(config.prompts[0].cliTool).toBeNull();
  });

  it('rejects invalid identifiers with the field path', () => {
    expect(() => parseConfigText('prompts:\n  - persona: Researcher\n    action: analyze\n', ROOT)).toThrow(
      'Invalid configuration: prompts.0.persona: Persona name must contain only lowercase letters, numbers, hyphens, and underscores: Researcher',
    );
  });

  it('rejects a blank cli_tool', () => {
    expect(() =>
      parseConfigText("prompts:\n  - persona: researcher\n    action: analyze\n    cli_tool: '  '\n", ROOT),
    ).toThrow('prompts.0.cli_tool: CLI tool name cannot be empty');
  });

  it('rejects an empty tool', () => {
    expect(() => parseConfigText("generate:\n  tool: ''\n", ROOT)).toThrow('generate.tool: Tool cannot be empty');
  });

  it('wraps YAML syntax errors', () => {
    expect(() => parseConfigText('generate: [unclosed', ROOT, 'promptloom.yaml')).toThrow(
      /^Failed to parse configuration file promptloom\.yaml: /,
    );
  });

  it('rejects documents that are not mappings', () => {
    expect(() => parseConfigText('- a\n- b\n', ROOT)).toThrow('Invalid configuration: document must be a mapping');
    expect(() => parseConfigText('just text\n', ROOT)).toThrow('Invalid configuration: document must be a mapping');
  });
});

describe('overrides and defaults', () => {
  it('builds defaults with overrides', () => {
    const config = defaultConfig(ROOT, { tool: 'claude-code', library: 'core', outputDir: 'build/prompts' });
    expect(config.generate).toEqual({
      tool: 'claude-code',
      library: 'core',
      outputDir: path.join(ROOT, 'build', 'prompts'),
    });
  });

  it('keeps prompts and metadata when overriding', () => {
    const base = parseConfigText(SAMPLE_CONFIG, ROOT);
    const config = applyOverrides(base, { tool: 'copilot' });
    expect(config.prompts).toBe(base.prompts);
    expect(config.metadata).toEqual({ team: 'docs' });
    expect(config.generate.outputDir).toBe(path.join(ROOT, 'out'));
    expect(base.generate.tool).toBe('standard');
  });

  it('validates overridden libraries', () => {
    const base = defaultConfig(ROOT);
    expect(() => applyOverrides(base, { library: 'Core' })).toThrow(ConfigurationError);
    expect(() => applyOverrides(base, { tool: ' ' })).toThrow('Tool cannot be empty');
  });
});

describe('metadata merging', () => {
  it('lets prompt keys win and merges nested mappings one level deep', () => {
    expect(
      mergeMetadata(
        { team: 'docs', labels: { area: 'search', owner: 'a' }, tags: ['x'] },
        { labels: { owner: 'b' }, tags: ['y'] },
      ),
    ).toEqual({ team: 'docs', labels: { area: 'search', owner: 'b' }, tags: ['y'] });
  });

  it('layers global, prompt and call metadata', () => {
    const config = parseConfigText(SAMPLE_CONFIG, ROOT);
    expect(resolveMetadata(config, config.prompts[0], { topic: 'indexes' })).toEqual({ team: 'docs', topic: 'indexes' });
  });

  it('lists variant action names', () => {
    const config = parseConfigText(SAMPLE_CONFIG, ROOT);
    expect([...variantActionNames(config)]).toEqual(['update-analyze', 'expand-analyze']);
  });
});

describe('loading from disk', () => {
  let dir: string;

  afterEach(async () => {
    await removeDir(dir);
  });

  it('reports a missing file', async () => {
    dir = await createTempDir();
    await expect(loadConfigFile(new LocalFileSystem(dir), 'promptloom.yaml', dir)).rejects.toThrow(
      'Configuration file not found: promptloom.yaml',
    );
  });

  it('finds the first known config file name', async () => {
    dir = await createTempDir();
    await writeFiles(dir, { '.promptloom.yaml': 'metadata: {}\n' });
    expect(await findConfigFile(new LocalFileSystem(dir))).toBe('.promptloom.yaml');
  });

  it('loads a project directory', async () => {
    dir = await createSampleProject();
    const project = await loadProject({ source: dir });
    expect(project.config.source).toBe(path.join(dir, 'promptloom.yaml'));
    expect(project.config.generate.outputDir).toBe(path.join(dir, 'out'));
    expect(project.fileSystem.describe()).toBe(dir);
  });

  it('loads an explicit config file path', async () => {
    dir = await createSampleProject();
    const project = await loadProject({ source: 'promptloom.yaml', cwd: dir });
    expect(project.config.projectRoot).toBe(dir);
    expect(project.config.prompts).toHaveLength(1);
  });

  it('falls back to defaults only when allowed', async () => {
    dir = await createTempDir();
    await expect(loadProject({ source: dir })).rejects.toThrow(ConfigurationError);
    const project = await loadProject({ source: dir, allowDefaults: true });
    expect(project.config.source).toBeNull();
    expect(project.config.generate.tool).toBe('standard');
  });
});
