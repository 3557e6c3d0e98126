import { classifySnapshot } from './classifier.js';
import { RemovalExecutor } from './removal.js';
import { createPullRequestDescription, createReport, summarizeRemoval } from './report.js';
import { CancellationError, LoadError, PublishError } from './errors.js';
import type { FilePolicy } from './file-policy.js';
import type {
  AnalysisReport,
  ChangePublisher,
  Classification,
  DeadCodeFinding,
  Snapshot,
  SourceModelOptions,
  SourceModelProvider,
} from './types.js';

export const DEFAULT_SOURCE_OPTIONS: SourceModelOptions = {
  include: ['**/*.{ts,tsx,js,jsx,mts,cts,mjs,cjs}'],
  ignorePatterns: [
    '**/node_modules/**',
    '**/.next/**',
    '**/dist/**',
    '**/build/**',
    '**/*.d.ts',
  ],
  maxFileSize: 1_000_000,
  parseComments: true,
  resolveTypes: true,
};

const DEGRADED_IGNORE_PATTERNS = ['**/*.test.*', '**/*.spec.*', '**/tests/**', '**/e2e/**'];
const DEGRADED_MAX_FILE_SIZE = 500_000;

export const PULL_REQUEST_TITLE = 'chore: remove dead code';
export const COMMIT_MESSAGE = 'chore: remove dead code';
export const DEFAULT_BRANCH_NAME = 'chore/remove-dead-code';

/** The more restrictive configuration used for the single retry */
export function degradeOptions(options: SourceModelOptions): SourceModelOptions {
  return {
    ...options,
    ignorePatterns: [...new Set([...options.ignorePatterns, ...DEGRADED_IGNORE_PATTERNS])],
    maxFileSize: Math.min(options.maxFileSize, DEGRADED_MAX_FILE_SIZE),
    parseComments: false,
    resolveTypes: false,
  };
}

/**
 * Load a snapshot, retrying exactly once with the degraded configuration when
 * the first attempt fails with a LoadError. A second failure propagates.
 */
export async function loadSnapshotWithRetry(
  provider: SourceModelProvider,
  locator: string,
  options: SourceModelOptions = DEFAULT_SOURCE_OPTIONS
): Promise<{ snapshot: Snapshot; degraded: boolean }> {
  try {
    return { snapshot: await provider.load(locator, options), degraded: false };
  } catch (err) {
    if (!(err instanceof LoadError)) throw err;
    console.warn(`[load] ${err.message}`);
    console.warn('[load] Retrying with more restrictive settings...');
  }

  return { snapshot: await provider.load(locator, degradeOptions(options)), degraded: true };
}

export interface PublishOptions {
  publisher: ChangePublisher;
  branchName?: string;
}

export interface AnalysisOptions {
  /** Name reported back to the caller, e.g. `owner/repo` */
  repository: string;
  /** Handed to the provider; a local directory for the bundled provider */
  locator: string;
  provider: SourceModelProvider;
  policy: FilePolicy;
  source?: SourceModelOptions;
  /** Delete dead definitions after classification */
  remove?: boolean;
  dryRun?: boolean;
  /** Remove, commit, push and open a pull request */
  publish?: PublishOptions;
  signal?: AbortSignal;
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancellationError();
  }
}

/** Run the full pipeline: load → classify → (remove) → (publish) */
export async function runDeadCodeAnalysis(options: AnalysisOptions): Promise<AnalysisReport> {
  const { provider, policy, signal } = options;

  throwIfAborted(signal);
  const { snapshot, degraded } = await loadSnapshotWithRetry(
    provider,
    options.locator,
    options.source ?? DEFAULT_SOURCE_OPTIONS
  );

  throwIfAborted(signal);
  const classification = classifySnapshot(snapshot, policy);
  const report = createReport(options.repository, classification, degraded);
  console.log(
    `[classify] ${classification.deadFunctions.length} unused functions, ` +
      `${classification.deadClasses.length} unused classes`
  );

  const wantsRemoval = options.remove || options.publish !== undefined;
  if (!wantsRemoval || classification.candidates.length === 0) {
    return report;
  }

  throwIfAborted(signal);
  if (!options.publish) {
    const outcomes = await new RemovalExecutor({ root: snapshot.root, dryRun: options.dryRun })
      .remove(classification.candidates, { signal });
    report.removal = summarizeRemoval(outcomes);
    return report;
  }

  await publishRemoval(report, classification, snapshot, options.publish, signal);
  return report;
}

async function publishRemoval(
  report: AnalysisReport,
  classification: Classification,
  snapshot: Snapshot,
  { publisher, branchName = DEFAULT_BRANCH_NAME }: PublishOptions,
  signal?: AbortSignal
): Promise<void> {
  try {
    const branch = await publisher.createBranch(branchName);
    console.log(`[publish] Created branch ${branch.name}`);

    const outcomes = await new RemovalExecutor({ root: snapshot.root })
      .remove(classification.candidates, { signal });
    report.removal = summarizeRemoval(outcomes);
    // A partial change set is never committed
    throwIfAborted(signal);

    const removed = outcomes.filter(o => o.status === 'removed').map(o => o.definition);
    if (removed.length === 0) {
      throw new PublishError('No definitions could be removed; nothing to commit');
    }

    const isRemoved = (finding: DeadCodeFinding) =>
      removed.some(d => d.filepath === finding.filepath && d.name === finding.name && d.kind === finding.kind);

    await publisher.commit(COMMIT_MESSAGE);
    await publisher.push(branch);
    const body = createPullRequestDescription({
      unusedFunctions: report.unusedFunctions.filter(isRemoved),
      unusedClasses: report.unusedClasses.filter(isRemoved),
    });
    report.pullRequest = await publisher.openPullRequest(PULL_REQUEST_TITLE, body, branch);
    console.log(`[publish] Opened pull request ${report.pullRequest.url ?? ''}`.trimEnd());
  } catch (err) {
    if (!(err instanceof PublishError)) throw err;
    console.warn(`[publish] ${err.message}`);
    report.publishError = { message: err.message, status: err.status };
  }
}
