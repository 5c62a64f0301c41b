import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { GitHubFileSystem, createGitHubFileSystem, parseGitHubUrl, type HttpClient } from '../../src/utils/github.js';
import { ConfigurationError } from '../../src/utils/errors.js';

function httpError(status: number): Error {
  return Object.assign(new Error(`Request failed with status code ${status}`), {
    isAxiosError: true,
    response: { status },
  });
}

function fakeClient(files: Record<string, string>) {
  const get = jest.fn<HttpClient['get']>(async (url) => {
    if (url in files) {
      return { data: files[url] };
    }
    throw httpError(404);
  });
  return { client: { get }, get };
}

describe('parseGitHubUrl', () => {
  it('parses org, repo, ref and subpath', () => {
    expect(parseGitHubUrl('github://acme/prompts@v2/library/core/')).toEqual({
      org: 'acme',
      repo: 'prompts',
      ref: 'v2',
      subpath: 'library/core',
    });
  });

  it('defaults the ref to main', () => {
    expect(parseGitHubUrl('github://acme/prompts')).toEqual({ org: 'acme', repo: 'prompts', ref: 'main', subpath: null });
  });

  it('rejects other formats', () => {
    expect(() => parseGitHubUrl('https://github.com/acme/prompts')).toThrow(
      'Invalid GitHub URL format: https://github.com/acme/prompts. Expected format: github://org/repo[@ref][/subpath]',
    );
    expect(() => parseGitHubUrl('github://acme')).toThrow(ConfigurationError);
  });
});

describe('GitHubFileSystem', () => {
  const originalToken = process.env.GITHUB_TOKEN;

  afterEach(() => {
    if (originalToken === undefined) {
      delete process.env.GITHUB_TOKEN;
    } else {
      process.env.GITHUB_TOKEN = originalToken;
    }
  });

  it('builds raw URLs under the subpath', () => {
    const fileSystem = new GitHubFileSystem('acme', 'prompts', 'main', 'lib/', fakeClient({}).client);
    expect(fileSystem.rawUrl('/promptloom/persona/a.md')).toBe(
      'https://raw.githubusercontent.com/acme/prompts/main/lib/promptloom/persona/a.md',
    );
    expect(fileSystem.describe()).toBe('github://acme/prompts@main/lib');
  });

  it('reads and caches files', async () => {
    delete process.env.GITHUB_TOKEN;
    const url = 'https://raw.githubusercontent.com/acme/prompts/main/promptloom.yaml';
    const { client, get } = fakeClient({ [url]: 'metadata: {}\n' });
    const fileSystem = new GitHubFileSystem('acme', 'prompts', 'main', null, client);

    expect(await fileSystem.readText('promptloom.yaml')).toBe('metadata: {}\n');
    expect(await fileSystem.readText('promptloom.yaml')).toBe('metadata: {}\n');
    expect(get).toHaveBeenCalledTimes(1);
    expect(get).toHaveBeenCalledWith(url, {
      responseType: 'text',
      headers: { 'User-Agent': 'promptloom' },
      timeout: 30_000,
    });
  });

  it('sends the token when one is configured', async () => {
    process.env.GITHUB_TOKEN = 'test-secret';
    const url = 'https://raw.githubusercontent.com/acme/prompts/main/a.md';
    const { client, get } = fakeClient({ [url]: 'a' });
    await new GitHubFileSystem('acme', 'prompts', 'main', null, client).readText('a.md');
    expect(get.mock.calls[0][1].headers).toEqual({ 'User-Agent': 'promptloom', Authorization: 'token test-secret' });
  });

  it('maps HTTP failures', async () => {
    const notFound = new GitHubFileSystem('acme', 'prompts', 'main', null, fakeClient({}).client);
    await expect(notFound.readText('x.md')).rejects.toThrow(
      'File not found on GitHub: https://raw.githubusercontent.com/acme/prompts/main/x.md',
    );
    expect(await notFound.exists('x.md')).toBe(false);

    const denied = new GitHubFileSystem('acme', 'prompts', 'main', null, {
      get: async () => {
        throw httpError(403);
      },
    });
    await expect(denied.readText('x.md')).rejects.toThrow('GitHub denied access to');
  });

  it('cannot list directories', async () => {
    const fileSystem = new GitHubFileSystem('acme', 'prompts', 'main', null, fakeClient({}).client);
    expect(await fileSystem.listFiles()).toEqual([]);
  });
});

describe('createGitHubFileSystem', () => {
  it('requires the config file to exist', async () => {
    await expect(createGitHubFileSystem('github://acme/prompts@dev', 'promptloom.yaml', fakeClient({}).client)).rejects.toThrow(
      'Configuration file promptloom.yaml not found at github://acme/prompts@dev (repository acme/prompts, ref dev)',
    );
  });

  it('returns a file system rooted at the subpath', async () => {
    const url = 'https://raw.githubusercontent.com/acme/prompts/main/lib/promptloom.yaml';
    const fileSystem = await createGitHubFileSystem(
      'github://acme/prompts/lib',
      'promptloom.yaml',
      fakeClient({ [url]: 'metadata: {}' }).client,
    );
    expect(fileSystem.describe()).toBe('github://acme/prompts@main/lib');
  });
});
