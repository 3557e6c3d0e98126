import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { TypeScriptSourceModelProvider } from '../../src/analyzer/typescript/ts-provider.js';
import { DEFAULT_SOURCE_OPTIONS } from '../../src/analyzer/pipeline.js';
import { LoadError } from '../../src/analyzer/errors.js';
import { createProject, removeProject } from '../helpers.js';
import type { Definition, Snapshot, SourceModelOptions } from '../../src/analyzer/types.js';

const NAME_BASED: SourceModelOptions = { ...DEFAULT_SOURCE_OPTIONS, resolveTypes: false };

function definitionsOf(snapshot: Snapshot, path: string): Definition[] {
  return snapshot.files().find(f => f.path === path)?.definitions ?? [];
}

function findDefinition(snapshot: Snapshot, path: string, name: string): Definition {
  const definition = definitionsOf(snapshot, path).find(d => d.name === name);
  if (!definition) throw new Error(`${name} not found in ${path}`);
  return definition;
}

describe('TypeScript source model provider', () => {
  const provider = new TypeScriptSourceModelProvider();

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('With type resolution', () => {
    let root: string;
    let snapshot: Snapshot;

    beforeAll(async () => {
      root = createProject({
        'src/lib.ts': [
          "import { helperUsed } from './util.js';",
          '',
          'export function publicApi() {',
          '  return helperUsed() + internalUsed();',
          '}',
          '',
          'function internalUsed() {',
          '  return 1;',
          '}',
          '',
          '// Computes nothing.',
          'function unusedHelper() {',
          '  return unusedHelper();',
          '}',
          '',
          'class UnusedClass {}',
          '',
          'export class PublicClass {}',
          '',
          'const arrowUnused = () => 1;',
          '',
        ].join('\n'),
        'src/util.ts': [
          'export function helperUsed() {',
          '  return 2;',
          '}',
          '',
          'function listedLater() {',
          '  return 3;',
          '}',
          '',
          'export { listedLater };',
          '',
        ].join('\n'),
        'src/legacy.js': 'function globalHelper() {\n  return 1;\n}\n',
      });
      snapshot = await provider.load(root, DEFAULT_SOURCE_OPTIONS);
    });

    afterAll(() => {
      removeProject(root);
    });

    it('should list files by project-relative path in sorted order', () => {
      expect(snapshot.root).toBe(root);
      expect(snapshot.files().map(f => f.path)).toEqual(['src/legacy.js', 'src/lib.ts', 'src/util.ts']);
      expect(snapshot.files()[1].absolutePath).toBe(join(root, 'src/lib.ts'));
    });

    it('should extract top-level functions, classes and function-valued constants', () => {
      const definitions = definitionsOf(snapshot, 'src/lib.ts');
      expect(definitions.map(d => [d.name, d.kind])).toEqual([
        ['publicApi', 'function'],
        ['internalUsed', 'function'],
        ['unusedHelper', 'function'],
        ['UnusedClass', 'class'],
        ['PublicClass', 'class'],
        ['arrowUnused', 'function'],
      ]);
    });

    it('should detect export modifiers, export lists and script globals', () => {
      expect(findDefinition(snapshot, 'src/lib.ts', 'publicApi').isExported).toBe(true);
      expect(findDefinition(snapshot, 'src/lib.ts', 'PublicClass').isExported).toBe(true);
      expect(findDefinition(snapshot, 'src/lib.ts', 'UnusedClass').isExported).toBe(false);
      expect(findDefinition(snapshot, 'src/lib.ts', 'arrowUnused').isExported).toBe(false);
      expect(findDefinition(snapshot, 'src/util.ts', 'listedLater').isExported).toBe(true);
      expect(findDefinition(snapshot, 'src/legacy.js', 'globalHelper').isExported).toBe(true);
    });

    it('should record usage sites with 1-based positions', () => {
      expect(findDefinition(snapshot, 'src/lib.ts', 'internalUsed').usages).toEqual([
        { filepath: 'src/lib.ts', line: 4, column: 25 },
      ]);
    });

    it('should resolve references through imports', () => {
      const usages = findDefinition(snapshot, 'src/util.ts', 'helperUsed').usages;
      expect(usages.map(u => [u.filepath, u.line])).toEqual([
        ['src/lib.ts', 1],
        ['src/lib.ts', 4],
      ]);
    });

    it('should not count recursion as a usage', () => {
      expect(findDefinition(snapshot, 'src/lib.ts', 'unusedHelper').usages).toEqual([]);
    });

    it('should include the attached leading comment in the source range', () => {
      const unusedHelper = findDefinition(snapshot, 'src/lib.ts', 'unusedHelper');
      expect(unusedHelper.sourceText).toBe('// Computes nothing.\nfunction unusedHelper() {\n  return unusedHelper();\n}');
      expect(unusedHelper.line).toBe(12);
    });
  });

  describe('With name-based references', () => {
    let root: string;

    afterEach(() => {
      removeProject(root);
    });

    it('should count references from test files', async () => {
      root = createProject({
        'src/a.ts': 'export const x = 1;\n\nfunction helper() {\n  return 1;\n}\n',
        'src/a.test.ts': 'helper();\n',
      });

      const snapshot = await provider.load(root, NAME_BASED);

      expect(findDefinition(snapshot, 'src/a.ts', 'helper').usages).toEqual([
        { filepath: 'src/a.test.ts', line: 1, column: 1 },
      ]);
    });

    it('should stop the comment block at a blank line', async () => {
      root = createProject({
        'src/a.ts': 'export const x = 1;\n\n// Banner\n\n/** Adds one. */\nfunction helper() {\n  return 1;\n}\n',
      });

      const snapshot = await provider.load(root, NAME_BASED);

      expect(findDefinition(snapshot, 'src/a.ts', 'helper').sourceText).toBe(
        '/** Adds one. */\nfunction helper() {\n  return 1;\n}'
      );
    });

    it('should leave file directives above the comment block in place', async () => {
      root = createProject({
        'src/a.ts': '/// <reference types="node" />\n// @ts-nocheck\n// Unused.\nfunction dead() {}\nexport {};\n',
        'src/b.ts': '/* eslint-disable */\n// eslint-disable-next-line no-console\nfunction noisy() {}\nexport {};\n',
      });

      const snapshot = await provider.load(root, NAME_BASED);

      expect(findDefinition(snapshot, 'src/a.ts', 'dead').sourceText).toBe('// Unused.\nfunction dead() {}');
      expect(findDefinition(snapshot, 'src/b.ts', 'noisy').sourceText).toBe(
        '// eslint-disable-next-line no-console\nfunction noisy() {}'
      );
    });

    it('should merge overload signatures into one definition', async () => {
      root = createProject({
        'src/over.ts': [
          'export {};',
          '',
          'function over(a: string): string;',
          'function over(a: number): number;',
          'function over(a: unknown) {',
          '  return a;',
          '}',
          '',
        ].join('\n'),
      });

      const snapshot = await provider.load(root, { ...NAME_BASED, parseComments: false });
      const definitions = definitionsOf(snapshot, 'src/over.ts');

      expect(definitions).toHaveLength(1);
      expect(definitions[0]).toMatchObject({
        name: 'over',
        sourceText: 'function over(a: string): string;\nfunction over(a: number): number;\nfunction over(a: unknown) {\n  return a;\n}',
        line: 3,
        usages: [],
        isExported: false,
      });
    });

    it('should skip files larger than the limit', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      root = createProject({
        'src/a.ts': 'export const a = 1;\n',
        'src/big.ts': `export const big = '${'x'.repeat(2000)}';\n`,
      });

      const snapshot = await provider.load(root, { ...NAME_BASED, maxFileSize: 1000 });

      expect(snapshot.files().map(f => f.path)).toEqual(['src/a.ts']);
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('Load errors', () => {
    it('should fail with LoadError when the root does not exist', async () => {
      await expect(provider.load(join('/nonexistent', 'sweeper-project'), DEFAULT_SOURCE_OPTIONS))
        .rejects.toBeInstanceOf(LoadError);
    });

    it('should fail with LoadError when no source files match', async () => {
      const root = createProject({ 'README.md': '# empty\n' });
      try {
        await expect(provider.load(root, DEFAULT_SOURCE_OPTIONS)).rejects.toThrow(/^No source files found under /);
      } finally {
        removeProject(root);
      }
    });

    it('should fail with LoadError when the root is a file', async () => {
      const root = createProject({ 'a.ts': 'export {};\n' });
      try {
        await expect(provider.load(join(root, 'a.ts'), DEFAULT_SOURCE_OPTIONS)).rejects.toThrow(/is not a directory$/);
      } finally {
        removeProject(root);
      }
    });
  });
});
