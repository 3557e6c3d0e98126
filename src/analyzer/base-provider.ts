import { statSync } from 'node:fs';
import { resolve, relative, sep } from 'node:path';
import { glob } from 'glob';
import { LoadError } from './errors.js';
import type { Snapshot, SourceModelOptions, SourceModelProvider } from './types.js';

/** A source file picked up for loading */
export interface DiscoveredFile {
  relativePath: string;
  absolutePath: string;
}

/**
 * Abstract base class for source model providers.
 * Each provider parses the discovered files, extracts top-level definitions
 * and resolves the references between them.
 */
export abstract class BaseSourceModelProvider implements SourceModelProvider {
  abstract load(locator: string, options: SourceModelOptions): Promise<Snapshot>;

  /** Resolve the project root of a locator, failing when it is not a directory */
  protected resolveRoot(locator: string): string {
    const root = resolve(locator);
    let isDirectory = false;
    try {
      isDirectory = statSync(root).isDirectory();
    } catch (err) {
      throw new LoadError(`Cannot read project root ${root}`, { cause: err });
    }
    if (!isDirectory) {
      throw new LoadError(`Project root ${root} is not a directory`);
    }
    return root;
  }

  /** Get files matching include/ignore patterns, skipping oversized ones */
  protected async resolveFiles(root: string, options: SourceModelOptions): Promise<DiscoveredFile[]> {
    const included: string[] = [];

    for (const pattern of options.include) {
      const matches = await glob(pattern, {
        cwd: root,
        absolute: false,
        ignore: options.ignorePatterns,
        nodir: true,
        posix: true,
      });
      included.push(...matches);
    }

    // Deduplicate and keep a stable traversal order
    const unique = [...new Set(included)].sort();
    const files: DiscoveredFile[] = [];

    for (const relativePath of unique) {
      const absolutePath = resolve(root, relativePath);
      const size = statSync(absolutePath).size;
      if (size > options.maxFileSize) {
        console.warn(`[load] Skipping ${relativePath}: ${size} bytes exceeds ${options.maxFileSize}`);
        continue;
      }
      files.push({ relativePath: this.toProjectPath(root, absolutePath), absolutePath });
    }

    if (files.length === 0) {
      throw new LoadError(`No source files found under ${root}`);
    }
    return files;
  }

  /** Project-relative path with `/` separators */
  protected toProjectPath(root: string, absolutePath: string): string {
    return relative(root, absolutePath).split(sep).join('/');
  }
}
