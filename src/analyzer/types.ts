/** Kind of a removable definition */
export type DefinitionKind = 'function' | 'class';

/** Liveness verdict of the classifier */
export type Liveness = 'live' | 'dead' | 'out-of-scope';

/** Terminal state of one removal */
export type RemovalStatus = 'removed' | 'skipped-reexported' | 'failed';

/** Location of a reference to a definition */
export interface UsageSite {
  filepath: string;
  line: number;
  column: number;
}

/** A top-level function or class */
export interface Definition {
  name: string;
  kind: DefinitionKind;
  /** Project-relative path of the owning file */
  filepath: string;
  sourceText: string;
  /** Offsets of sourceText in the file content the snapshot was loaded from */
  start: number;
  end: number;
  line: number;
  usages: UsageSite[];
  isExported: boolean;
}

export interface SourceFile {
  path: string;
  absolutePath: string;
  definitions: Definition[];
}

/** Parsed, point-in-time view of a codebase */
export interface Snapshot {
  root: string;
  files(): SourceFile[];
}

/** Reporting-only projection of a dead definition */
export interface DeadCodeFinding {
  name: string;
  kind: DefinitionKind;
  filepath: string;
  sourceText: string;
}

/** A definition the classifier could not read */
export interface SkippedSymbol {
  name: string;
  kind: DefinitionKind;
  filepath: string;
  reason: string;
}

export type RemovalOutcome =
  | { definition: Definition; status: 'removed' | 'skipped-reexported' }
  | { definition: Definition; status: 'failed'; reason: string };

export interface Classification {
  deadFunctions: DeadCodeFinding[];
  deadClasses: DeadCodeFinding[];
  /** Dead definitions in report order, ready for removal */
  candidates: Definition[];
  skipped: SkippedSymbol[];
}

/** Options that shape how a snapshot is built */
export interface SourceModelOptions {
  include: string[];
  ignorePatterns: string[];
  maxFileSize: number;
  /** Extend definition ranges over their leading comments */
  parseComments: boolean;
  /** Resolve references through the type checker instead of by name */
  resolveTypes: boolean;
  tsconfig?: string;
}

/** Builds snapshots from a locator (a local directory for the bundled provider) */
export interface SourceModelProvider {
  load(locator: string, options: SourceModelOptions): Promise<Snapshot>;
}

export interface Branch {
  name: string;
}

export interface PullRequestRef {
  url: string | null;
  number: number | null;
}

/** Publishes a working copy's changes as a pull request */
export interface ChangePublisher {
  createBranch(name: string): Promise<Branch>;
  commit(message: string): Promise<void>;
  push(branch: Branch): Promise<void>;
  openPullRequest(title: string, body: string, branch: Branch): Promise<PullRequestRef>;
}

export interface RemovalOutcomeSummary {
  name: string;
  kind: DefinitionKind;
  filepath: string;
  status: RemovalStatus;
  reason?: string;
}

export interface RemovalSummary {
  removed: number;
  skippedReexported: number;
  failed: number;
  outcomes: RemovalOutcomeSummary[];
}

/** The analysis result handed to callers */
export interface AnalysisReport {
  repository: string;
  unusedFunctions: DeadCodeFinding[];
  unusedClasses: DeadCodeFinding[];
  totalUnusedItems: number;
  skipped: SkippedSymbol[];
  degraded: boolean;
  removal?: RemovalSummary;
  pullRequest?: PullRequestRef;
  publishError?: { message: string; status: number | null };
}

/** Result of the file-scope liveness scan */
export interface FileLivenessResult {
  filePath: string;
  unusedFunctions: string[];
  unusedVariables: string[];
  suppressed: boolean;
  heuristic: true;
  error?: string;
}

/** Configuration file schema */
export interface SweeperConfig {
  include?: string[];
  ignorePatterns?: string[];
  denylist?: string[];
  maxFileSize?: number;
  branchName?: string;
  tsconfig?: string;
  suppressMarkers?: string[];
}

/** Resolved config (with defaults applied) */
export interface ResolvedConfig {
  projectRoot: string;
  source: SourceModelOptions;
  denylist: string[];
  branchName: string;
  suppressMarkers: string[];
}

export interface GitHubCredentials {
  token: string;
  username: string;
  email: string;
}
