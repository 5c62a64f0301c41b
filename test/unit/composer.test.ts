import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { PromptComposer } from '../../src/prompts/composer.js';
import { TemplateLoader } from '../../src/prompts/loader.js';
import { LocalFileSystem } from '../../src/utils/fileSystem.js';
import { createSampleProject, removeDir } from '../utils/testHelpers.js';

describe('PromptComposer', () => {
  let dir: string;
  let composer: PromptComposer;

  beforeAll(async () => {
    dir = await createSampleProject({
      'promptloom/action/with-examples.md.hbs':
        '{{action_name}}/{{tool}}{{#each examples}}\n[{{this}}]{{/each}}{{#unless examples}} no examples{{/unless}}',
    });
    composer = new PromptComposer(new TemplateLoader(new LocalFileSystem(dir), 'promptloom'));
  });

  afterAll(async () => {
    await removeDir(dir);
  });

  it('renders the persona and metadata into the action', async () => {
    const text = await composer.compose('analyze', 'researcher', { metadata: { topic: 'caching', team: 'docs' } });
    expect(text).toBe('You are a careful researcher.\nAnalyze caching for docs.\n');
  });

  it('defaults tool and library', async () => {
    const text = await composer.compose('summarize', 'writer', { metadata: { team: 'docs' } });
    expect(text).toBe('You write clear prose.\nSummarize for everyone. -- docs\n');
  });

  it('passes the library through', async () => {
    const text = await composer.compose('summarize', 'writer', { library: 'core', metadata: { team: 'qa' } });
    expect(text).toBe('You write clear prose.\nSummarize for core. -- qa\n');
  });

  it('renders template examples and keeps plain ones', async () => {
    const text = await composer.compose('with-examples', 'writer', { tool: 'copilot', examples: ['report', 'dynamic'] });
    expect(text).toBe('with-examples/copilot\n[Report format]\n[Example for writer]');
  });

  it('leaves examples undefined when none are requested', async () => {
    expect(await composer.compose('with-examples', 'writer', { examples: [] })).toBe('with-examples/standard no examples');
  });

  it('renders arbitrary templates with the loaded partials', async () => {
    expect(await composer.renderTemplate('x {{> footer}}', { metadata: { team: 'ops' } })).toBe('x -- ops');
  });
});
