import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../analyzer/errors.js';
import { DEFAULT_BRANCH_NAME, DEFAULT_SOURCE_OPTIONS } from '../analyzer/pipeline.js';
import { DEFAULT_SUPPRESS_MARKERS } from '../analyzer/typescript/ts-file-scanner.js';
import type { GitHubCredentials, ResolvedConfig, SweeperConfig } from '../analyzer/types.js';

const CONFIG_FILENAMES = ['sweeper.config.json', 'sweeper.config.yaml', 'sweeper.config.yml'];

const configSchema = z
  .object({
    include: z.array(z.string().min(1)).optional(),
    ignorePatterns: z.array(z.string().min(1)).optional(),
    denylist: z.array(z.string().min(1)).optional(),
    maxFileSize: z.number().int().positive().optional(),
    branchName: z.string().min(1).optional(),
    tsconfig: z.string().min(1).optional(),
    suppressMarkers: z.array(z.string().min(1)).optional(),
  })
  .strict();

/** Validate a parsed config object. Throws ConfigError on invalid input. */
export function validateConfig(config: unknown): SweeperConfig {
  const result = configSchema.safeParse(config ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

/** Find the config file in the project root */
export function findConfigFile(projectRoot: string): string | null {
  for (const name of CONFIG_FILENAMES) {
    const path = resolve(projectRoot, name);
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

/** Load config from a file */
export function loadConfigFile(configPath: string): SweeperConfig {
  const content = readFileSync(configPath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.yaml') || configPath.endsWith('.yml')
      ? yaml.load(content)
      : JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Could not parse ${configPath}: ${errorMessage(err)}`);
  }
  return validateConfig(parsed);
}

/** CLI options that can override config */
export interface CliOptions {
  config?: string;
  include?: string[];
  ignore?: string[];
  deny?: string[];
  maxFileSize?: number;
  branch?: string;
  tsconfig?: string;
  markers?: string[];
}

/** Merge CLI options with config file and defaults to produce a resolved config */
export function resolveConfig(projectRoot: string, cliOptions: CliOptions = {}): ResolvedConfig {
  const absRoot = resolve(projectRoot);

  // Load config file
  let fileConfig: SweeperConfig = {};
  const configPath = cliOptions.config
    ? resolve(absRoot, cliOptions.config)
    : findConfigFile(absRoot);

  if (configPath) {
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, 'config');
    }
    fileConfig = loadConfigFile(configPath);
  }

  // Include patterns (CLI > file > defaults)
  const include = cliOptions.include?.length
    ? cliOptions.include
    : fileConfig.include?.length
      ? fileConfig.include
      : DEFAULT_SOURCE_OPTIONS.include;

  // Ignore patterns and denylist are additive
  const ignorePatterns = [
    ...DEFAULT_SOURCE_OPTIONS.ignorePatterns,
    ...(fileConfig.ignorePatterns || []),
    ...(cliOptions.ignore || []),
  ];
  const denylist = [...(fileConfig.denylist || []), ...(cliOptions.deny || [])];

  const tsconfig = cliOptions.tsconfig || fileConfig.tsconfig;

  return {
    projectRoot: absRoot,
    source: {
      ...DEFAULT_SOURCE_OPTIONS,
      include,
      ignorePatterns: [...new Set(ignorePatterns)],
      maxFileSize: cliOptions.maxFileSize || fileConfig.maxFileSize || DEFAULT_SOURCE_OPTIONS.maxFileSize,
      ...(tsconfig ? { tsconfig } : {}),
    },
    denylist: [...new Set(denylist)],
    branchName: cliOptions.branch || fileConfig.branchName || DEFAULT_BRANCH_NAME,
    suppressMarkers: cliOptions.markers?.length
      ? cliOptions.markers
      : fileConfig.suppressMarkers || DEFAULT_SUPPRESS_MARKERS,
  };
}

/**
 * Read GitHub credentials from the environment. They are handed to the
 * publisher explicitly rather than kept in process-wide state.
 */
export function loadGitHubCredentials(env: NodeJS.ProcessEnv = process.env): GitHubCredentials {
  const token = env.GITHUB_TOKEN;
  const username = env.GITHUB_USERNAME;
  const email = env.GITHUB_EMAIL;

  if (!token || !username || !email) {
    const missing = [
      ['GITHUB_TOKEN', token],
      ['GITHUB_USERNAME', username],
      ['GITHUB_EMAIL', email],
    ]
      .filter(([, value]) => !value)
      .map(([name]) => name);
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`, 'env');
  }

  return { token, username, email };
}
