import express, { type NextFunction, type Request, type Response } from 'express';
import { createServer, type Server } from 'node:http';
import { z } from 'zod';
import { runDeadCodeAnalysis } from '../analyzer/pipeline.js';
import { createFilePolicy, type FilePolicy } from '../analyzer/file-policy.js';
import { TypeScriptSourceModelProvider } from '../analyzer/typescript/ts-provider.js';
import { scanRepository } from '../analyzer/typescript/ts-file-scanner.js';
import { ConfigError, InvalidRepositoryError, LoadError, errorMessage } from '../analyzer/errors.js';
import { GitHubPublisher } from '../github/publisher.js';
import {
  GitRepositoryFetcher,
  parseRepositoryUrl,
  withTemporaryCheckout,
  type RepositoryFetcher,
  type RepositoryRef,
} from '../github/repository.js';
import { loadGitHubCredentials } from './config.js';
import type {
  ChangePublisher,
  GitHubCredentials,
  ResolvedConfig,
  SourceModelOptions,
  SourceModelProvider,
} from '../analyzer/types.js';

export const API_INFO = {
  name: 'Dead Code Sweeper API',
  version: '1.0.0',
  description: 'API to analyze GitHub repositories for dead code',
};

const languageSchema = z.enum(['typescript', 'javascript']);

/** Files loaded when a request names a language */
export const LANGUAGE_INCLUDE: Record<z.infer<typeof languageSchema>, string[]> = {
  typescript: ['**/*.{ts,tsx,mts,cts}'],
  javascript: ['**/*.{js,jsx,mjs,cjs}'],
};

const analyzeDeadCodeSchema = z.object({
  repo_url: z.string().min(1),
  create_pr: z.boolean().optional().default(false),
  language: languageSchema.optional(),
});

const analyzeSchema = z.object({
  repo_url: z.string().min(1),
});

export interface PublisherContext {
  credentials: GitHubCredentials;
  cwd: string;
  repository: RepositoryRef;
}

/** Collaborators of the HTTP service, injectable for tests */
export interface ServiceDependencies {
  fetcher: RepositoryFetcher;
  provider: SourceModelProvider;
  policy: FilePolicy;
  source: SourceModelOptions;
  branchName: string;
  suppressMarkers: string[];
  loadCredentials: () => GitHubCredentials;
  createPublisher: (context: PublisherContext) => ChangePublisher;
  /** Runs a request inside its own working directory */
  withCheckout?: <T>(fn: (dir: string) => Promise<T>) => Promise<T>;
}

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
    throw new HttpError(400, `Invalid request: ${issues}`);
  }
  return result.data;
}

function parseRepository(url: string): RepositoryRef {
  try {
    return parseRepositoryUrl(url);
  } catch (err) {
    if (err instanceof InvalidRepositoryError) throw new HttpError(400, err.message);
    throw err;
  }
}

async function cloneInto(
  deps: ServiceDependencies,
  ref: RepositoryRef,
  dir: string,
  credentials?: GitHubCredentials
): Promise<void> {
  try {
    await deps.fetcher.clone(ref, dir, credentials);
  } catch (err) {
    throw new HttpError(500, `Failed to clone repository: ${errorMessage(err)}`);
  }
}

function sendError(res: Response, err: unknown): void {
  if (err instanceof HttpError) {
    if (err.status >= 500) console.error(`[serve] ${err.message}`);
    res.status(err.status).json({ detail: err.message });
    return;
  }
  const detail = err instanceof LoadError
    ? `Failed to initialize codebase: ${err.message}`
    : `Error analyzing repository: ${errorMessage(err)}`;
  console.error(`[serve] ${detail}`);
  res.status(500).json({ detail });
}

/** Abort the request's pipeline when the client goes away before the response */
function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

export function createApp(deps: ServiceDependencies): express.Express {
  const app = express();
  const withCheckout = deps.withCheckout ?? withTemporaryCheckout;

  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req, res) => {
    res.json(API_INFO);
  });

  app.post('/analyze-dead-code', async (req: Request, res: Response) => {
    try {
      const body = parseBody(analyzeDeadCodeSchema, req.body);
      // Reject malformed URLs before any clone or load
      const ref = parseRepository(body.repo_url);

      let credentials: GitHubCredentials | undefined;
      try {
        credentials = deps.loadCredentials();
      } catch (err) {
        if (body.create_pr || !(err instanceof ConfigError)) {
          throw new HttpError(500, errorMessage(err));
        }
        console.log('[serve] No GitHub credentials configured; cloning anonymously');
      }

      const signal = abortOnDisconnect(res);
      const report = await withCheckout(async (dir) => {
        await cloneInto(deps, ref, dir, credentials);
        const publish = body.create_pr && credentials
          ? {
              publisher: deps.createPublisher({ credentials, cwd: dir, repository: ref }),
              branchName: deps.branchName,
            }
          : undefined;

        return runDeadCodeAnalysis({
          repository: ref.ownerRepo,
          locator: dir,
          provider: deps.provider,
          policy: deps.policy,
          source: body.language ? { ...deps.source, include: LANGUAGE_INCLUDE[body.language] } : deps.source,
          publish,
          signal,
        });
      });

      res.json(report);
    } catch (err) {
      sendError(res, err);
    }
  });

  app.post('/analyze', async (req: Request, res: Response) => {
    try {
      const body = parseBody(analyzeSchema, req.body);
      const ref = parseRepository(body.repo_url);

      const findings = await withCheckout(async (dir) => {
        await cloneInto(deps, ref, dir);
        return scanRepository(dir, { suppressMarkers: deps.suppressMarkers });
      });

      res.json({
        repository: ref.cloneUrl,
        heuristic: true,
        dead_code_findings: findings.map(f => ({
          file_path: f.filePath,
          unused_functions: f.unusedFunctions,
          unused_variables: f.unusedVariables,
          suppressed: f.suppressed,
        })),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  // express.json rejects malformed bodies with a SyntaxError
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ detail: `Invalid JSON body: ${err.message}` });
      return;
    }
    next(err);
  });

  return app;
}

export interface ServeOptions {
  port: number;
}

/** Production wiring: git clone, the TypeScript provider and the GitHub publisher */
export function createDefaultDependencies(config: ResolvedConfig): ServiceDependencies {
  return {
    fetcher: new GitRepositoryFetcher(),
    provider: new TypeScriptSourceModelProvider(),
    policy: createFilePolicy({ denylist: config.denylist }),
    source: config.source,
    branchName: config.branchName,
    suppressMarkers: config.suppressMarkers,
    loadCredentials: () => loadGitHubCredentials(process.env),
    createPublisher: (context) => new GitHubPublisher(context),
  };
}

export async function startServer(config: ResolvedConfig, options: ServeOptions): Promise<Server> {
  const app = createApp(createDefaultDependencies(config));
  const server = createServer(app);

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, () => {
      server.off('error', reject);
      resolve();
    });
  });

  console.log(`\n[serve] Dead code sweeper API running at http://localhost:${options.port}`);
  console.log(`  POST /analyze-dead-code  cross-file analysis (optional pull request)`);
  console.log(`  POST /analyze            file-scope heuristic scan`);
  return server;
}
