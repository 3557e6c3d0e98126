import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { Definition } from '../src/analyzer/types.js';

/** Write `files` (project-relative path → content) under `root` */
export function writeProject(root: string, files: Record<string, string>): void {
  for (const [path, content] of Object.entries(files)) {
    const target = join(root, path);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content, 'utf-8');
  }
}

/** Create a throwaway project in the OS temp directory */
export function createProject(files: Record<string, string>): string {
  const root = mkdtempSync(join(tmpdir(), 'sweeper-test-'));
  writeProject(root, files);
  return root;
}

export function removeProject(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

export function makeDefinition(overrides: Partial<Definition> = {}): Definition {
  return {
    name: 'foo',
    kind: 'function',
    filepath: 'src/a.ts',
    sourceText: 'function foo() {}',
    start: 0,
    end: 17,
    line: 1,
    usages: [],
    isExported: false,
    ...overrides,
  };
}

/** A definition whose range is the first occurrence of `sourceText` in `content` */
export function definitionIn(
  content: string,
  sourceText: string,
  overrides: Partial<Definition> & Pick<Definition, 'name'>
): Definition {
  const start = content.indexOf(sourceText);
  if (start < 0) throw new Error(`"${sourceText}" not found in content`);
  return makeDefinition({ sourceText, start, end: start + sourceText.length, ...overrides });
}
