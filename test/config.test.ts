import { describe, it, expect, afterEach } from 'vitest';
import { loadGitHubCredentials, resolveConfig, validateConfig } from '../src/cli/config.js';
import { DEFAULT_SOURCE_OPTIONS } from '../src/analyzer/pipeline.js';
import { ConfigError } from '../src/analyzer/errors.js';
import { createProject, removeProject } from './helpers.js';

describe('Config', () => {
  let root: string;

  afterEach(() => {
    removeProject(root);
  });

  it('should fall back to defaults without a config file', () => {
    root = createProject({});

    const config = resolveConfig(root);

    expect(config.projectRoot).toBe(root);
    expect(config.source).toEqual(DEFAULT_SOURCE_OPTIONS);
    expect(config.denylist).toEqual([]);
    expect(config.branchName).toBe('chore/remove-dead-code');
    expect(config.suppressMarkers).toEqual(['test', 'routes']);
  });

  it('should merge the config file with CLI options', () => {
    root = createProject({
      'sweeper.config.json': JSON.stringify({
        denylist: ['legacy/**'],
        ignorePatterns: ['**/vendor/**'],
        branchName: 'chore/sweep',
        include: ['src/**/*.ts'],
      }),
    });

    const config = resolveConfig(root, { deny: ['hero-workflow.tsx', 'legacy/**'], ignore: ['**/gen/**'] });

    expect(config.denylist).toEqual(['legacy/**', 'hero-workflow.tsx']);
    expect(config.source.ignorePatterns).toEqual([
      ...DEFAULT_SOURCE_OPTIONS.ignorePatterns,
      '**/vendor/**',
      '**/gen/**',
    ]);
    expect(config.source.include).toEqual(['src/**/*.ts']);
    expect(config.branchName).toBe('chore/sweep');
  });

  it('should let CLI options win over the file', () => {
    root = createProject({
      'sweeper.config.json': JSON.stringify({ branchName: 'chore/sweep', maxFileSize: 2048 }),
    });

    const config = resolveConfig(root, { branch: 'cleanup', maxFileSize: 4096, include: ['lib/**/*.js'] });

    expect(config.branchName).toBe('cleanup');
    expect(config.source.maxFileSize).toBe(4096);
    expect(config.source.include).toEqual(['lib/**/*.js']);
  });

  it('should read YAML config files', () => {
    root = createProject({
      'sweeper.config.yaml': 'maxFileSize: 2048\ntsconfig: tsconfig.build.json\nsuppressMarkers:\n  - handlers\n',
    });

    const config = resolveConfig(root);

    expect(config.source.maxFileSize).toBe(2048);
    expect(config.source.tsconfig).toBe('tsconfig.build.json');
    expect(config.suppressMarkers).toEqual(['handlers']);
  });

  it('should report unparseable and missing config files', () => {
    root = createProject({ 'sweeper.config.json': '{ not json' });

    expect(() => resolveConfig(root)).toThrow(/^Could not parse .*sweeper\.config\.json: /);
    expect(() => resolveConfig(root, { config: 'missing.json' })).toThrow(/^Config file not found: /);
  });
});

describe('Config validation', () => {
  it('should reject unknown keys and invalid values', () => {
    expect(() => validateConfig({ colour: 'blue' })).toThrow(ConfigError);
    expect(() => validateConfig({ colour: 'blue' })).toThrow(/^Invalid configuration: \(root\): Unrecognized key/);
    expect(() => validateConfig({ maxFileSize: -1 })).toThrow(/^Invalid configuration: maxFileSize: /);
    expect(validateConfig(null)).toEqual({});
  });
});

describe('GitHub credentials', () => {
  it('should read credentials from the environment', () => {
    expect(
      loadGitHubCredentials({ GITHUB_TOKEN: 'test-secret', GITHUB_USERNAME: 'sweeper-bot', GITHUB_EMAIL: 'bot@example.com' })
    ).toEqual({ token: 'test-secret', username: 'sweeper-bot', email: 'bot@example.com' });
  });

  it('should name every missing variable', () => {
    expect(() => loadGitHubCredentials({ GITHUB_TOKEN: 'test-secret' })).toThrow(
      'Missing required environment variables: GITHUB_USERNAME, GITHUB_EMAIL'
    );
  });
});
