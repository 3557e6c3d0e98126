import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { RemovalError, errorMessage } from './errors.js';
import { isNameExported } from './typescript/ts-exports.js';
import type { Definition, RemovalOutcome } from './types.js';

export interface RemovalExecutorOptions {
  /** Project root the definitions' paths are relative to */
  root: string;
  /** Compute outcomes without writing files */
  dryRun?: boolean;
}

export interface RemoveOptions {
  /** Honored between files; a file already being edited is finished first */
  signal?: AbortSignal;
}

interface Entry {
  index: number;
  definition: Definition;
}

interface Range {
  start: number;
  end: number;
}

const BYTE_ORDER_MARK = 0xfeff;

function failed(definition: Definition, reason: string): RemovalOutcome {
  return { definition, status: 'failed', reason };
}

function groupByFile(items: Definition[]): Map<string, Entry[]> {
  const byFile = new Map<string, Entry[]>();
  items.forEach((definition, index) => {
    const entries = byFile.get(definition.filepath) || [];
    entries.push({ index, definition });
    byFile.set(definition.filepath, entries);
  });
  return byFile;
}

/**
 * Deletes definitions from their owning files. Each item ends removed,
 * skipped because it is exported, or failed; one failure never stops the
 * rest of the batch and nothing already applied is rolled back.
 */
export class RemovalExecutor {
  constructor(private readonly options: RemovalExecutorOptions) {}

  async remove(items: Definition[], { signal }: RemoveOptions = {}): Promise<RemovalOutcome[]> {
    const results: RemovalOutcome[] = items.map(definition => failed(definition, 'not processed'));

    for (const [filepath, entries] of groupByFile(items)) {
      if (signal?.aborted) {
        for (const { index, definition } of entries) {
          results[index] = failed(definition, 'cancelled');
        }
        continue;
      }

      const outcomes = await this.removeFromFile(filepath, entries);
      for (const [index, outcome] of outcomes) {
        results[index] = outcome;
      }
    }

    return results;
  }

  /** Apply all removals of one file, last range first so earlier offsets stay valid */
  private async removeFromFile(filepath: string, entries: Entry[]): Promise<Map<number, RemovalOutcome>> {
    const outcomes = new Map<number, RemovalOutcome>();
    const absolutePath = resolve(this.options.root, filepath);

    const failAll = (reason: string): Map<number, RemovalOutcome> => {
      console.warn(`[remove] ${reason}`);
      for (const { index, definition } of entries) {
        outcomes.set(index, failed(definition, reason));
      }
      return outcomes;
    };

    let bytes: Buffer;
    try {
      bytes = await readFile(absolutePath);
    } catch (err) {
      const error = new RemovalError(`Could not read ${filepath}: ${errorMessage(err)}`, filepath, { cause: err });
      return failAll(error.message);
    }

    // Only files that round-trip as UTF-8 are rewritten
    const content = bytes.toString('utf-8');
    if (!Buffer.from(content, 'utf-8').equals(bytes)) {
      return failAll(`${filepath} is not valid UTF-8`);
    }

    // Definition offsets are measured on text without a byte order mark
    const shift = content.charCodeAt(0) === BYTE_ORDER_MARK ? 1 : 0;
    const ordered = [...entries].sort((a, b) => b.definition.start - a.definition.start);
    const removed: Range[] = [];
    let updated = content;

    for (const { index, definition } of ordered) {
      try {
        const outcome = this.removeOne(definition, absolutePath, updated, shift, removed);
        if (outcome.status === 'removed') {
          const range = removed[removed.length - 1];
          updated = updated.slice(0, range.start) + updated.slice(range.end);
        }
        outcomes.set(index, outcome);
      } catch (err) {
        outcomes.set(index, failed(definition, errorMessage(err)));
      }
    }

    const removedCount = removed.length;
    if (removedCount > 0 && !this.options.dryRun) {
      try {
        await writeFile(absolutePath, updated, 'utf-8');
      } catch (err) {
        const error = new RemovalError(`Could not write ${filepath}: ${errorMessage(err)}`, filepath, { cause: err });
        console.warn(`[remove] ${error.message}`);
        for (const [index, outcome] of outcomes) {
          if (outcome.status === 'removed') outcomes.set(index, failed(outcome.definition, error.message));
        }
        return outcomes;
      }
    }

    for (const outcome of outcomes.values()) {
      if (outcome.status === 'failed') {
        console.warn(`[remove] ${outcome.definition.name} in ${filepath}: ${outcome.reason}`);
      }
    }
    if (removedCount > 0) {
      console.log(`[remove] ${filepath}: ${removedCount} definition(s) removed${this.options.dryRun ? ' (dry run)' : ''}`);
    }
    return outcomes;
  }

  private removeOne(
    definition: Definition,
    absolutePath: string,
    content: string,
    shift: number,
    removed: Range[]
  ): RemovalOutcome {
    // Classification and removal can be separated by other edits; check again
    if (definition.isExported || isNameExported(absolutePath, content, definition.name)) {
      return { definition, status: 'skipped-reexported' };
    }

    const range: Range = { start: definition.start + shift, end: definition.end + shift };
    if (removed.some(r => range.start < r.end && r.start < range.end)) {
      return failed(definition, 'source range overlaps a definition already removed from this file');
    }
    if (content.slice(range.start, range.end) !== definition.sourceText) {
      return failed(definition, 'source range no longer matches file content');
    }

    removed.push(range);
    return { definition, status: 'removed' };
  }
}
