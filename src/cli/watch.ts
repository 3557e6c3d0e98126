import { watch, type FSWatcher } from 'chokidar';
import { errorMessage } from '../analyzer/errors.js';
import type { AnalysisReport } from '../analyzer/types.js';

const DEBOUNCE_MS = 500;

const IGNORED_DIRS = /(^|[/\\])(node_modules|\.git|dist|build|coverage)([/\\]|$)/;
const SOURCE_FILE = /\.[cm]?[jt]sx?$/;

/**
 * Re-run analysis whenever a watched source file changes.
 *
 * Changes are debounced: a burst of edits triggers a single pass. Changes
 * that arrive while a pass is running queue exactly one follow-up pass, so
 * two analyses never run against the same working copy at once.
 */
export function startWatcher(
  projectRoot: string,
  analyze: () => Promise<AnalysisReport>,
  onUpdate: (report: AnalysisReport) => void
): FSWatcher {
  const watcher = watch('.', {
    cwd: projectRoot,
    ignored: (path: string) => IGNORED_DIRS.test(path),
    ignoreInitial: true,
    awaitWriteFinish: {
      stabilityThreshold: 300,
      pollInterval: 100,
    },
  });

  let debounceTimer: NodeJS.Timeout | null = null;
  let analyzing = false;
  const pendingChanges = new Set<string>();

  const runPass = async () => {
    analyzing = true;
    const changedFiles = [...pendingChanges];
    pendingChanges.clear();

    try {
      console.log(`[watch] ${changedFiles.length} file(s) changed, re-analyzing...`);
      const start = Date.now();
      const report = await analyze();
      console.log(`[watch] Analysis complete in ${Date.now() - start}ms (${report.totalUnusedItems} unused items)`);
      onUpdate(report);
    } catch (err) {
      console.error(`[watch] Analysis failed: ${errorMessage(err)}`);
    } finally {
      analyzing = false;
      // More changes accumulated while analyzing
      if (pendingChanges.size > 0) schedule();
    }
  };

  const schedule = () => {
    if (analyzing) return;
    if (debounceTimer) clearTimeout(debounceTimer);
    debounceTimer = setTimeout(() => {
      debounceTimer = null;
      void runPass();
    }, DEBOUNCE_MS);
  };

  const onChange = (event: string) => (filePath: string) => {
    if (!SOURCE_FILE.test(filePath)) return;
    console.log(`[watch]   ${event}: ${filePath}`);
    pendingChanges.add(filePath);
    schedule();
  };

  watcher.on('change', onChange('changed'));
  watcher.on('add', onChange('added'));
  watcher.on('unlink', onChange('removed'));

  console.log('[watch] Watching for file changes...');
  return watcher;
}
