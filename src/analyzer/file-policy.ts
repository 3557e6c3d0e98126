import { Minimatch } from 'minimatch';

/** Substrings that mark a test file wherever they appear */
const TEST_MARKERS = ['.test.', '.spec.', '__tests__'];

/** Directory names that hold tests */
const TEST_DIRS = new Set(['test', 'tests', 'spec', 'e2e']);

/** Dependency, VCS, build output and framework cache directories */
const SKIP_DIRS = new Set([
  'node_modules',
  '.git',
  'dist',
  'build',
  'coverage',
  '.next',
  '.nuxt',
  '.svelte-kit',
  '.turbo',
  '.cache',
]);

/** Generated and declaration files */
const SKIP_MARKERS = ['.d.ts', '.d.mts', '.d.cts', '.min.js', '.bundle.js'];

const GLOB_CHARS = /[*?[{]/;

export interface FilePolicyOptions {
  /** Known-problematic paths; globs or plain substrings */
  denylist?: string[];
}

/** Decides which files take part in dead-code analysis */
export interface FilePolicy {
  shouldAnalyze(filepath: string): boolean;
}

function normalize(filepath: string): string {
  return filepath.replace(/\\/g, '/');
}

/** Directory segments of a path (the file name itself is dropped) */
function directorySegments(path: string): string[] {
  return path.split('/').slice(0, -1);
}

export function isTestFile(filepath: string): boolean {
  const path = normalize(filepath);
  if (TEST_MARKERS.some(marker => path.includes(marker))) return true;
  return directorySegments(path).some(segment => TEST_DIRS.has(segment));
}

type Matcher = (path: string) => boolean;

function compileDenyEntry(entry: string): Matcher {
  const pattern = normalize(entry);
  if (!GLOB_CHARS.test(pattern)) {
    return path => path.includes(pattern);
  }
  try {
    const glob = new Minimatch(pattern, { dot: true, matchBase: !pattern.includes('/') });
    return path => glob.match(path) || path.includes(pattern);
  } catch {
    return path => path.includes(pattern);
  }
}

export function createFilePolicy(options: FilePolicyOptions = {}): FilePolicy {
  const denied = (options.denylist ?? []).filter(entry => entry.length > 0).map(compileDenyEntry);

  return {
    shouldAnalyze(filepath: string): boolean {
      const path = normalize(filepath);
      if (isTestFile(path)) return false;
      if (directorySegments(path).some(segment => SKIP_DIRS.has(segment))) return false;
      if (SKIP_MARKERS.some(marker => path.includes(marker))) return false;
      return !denied.some(matches => matches(path));
    },
  };
}
