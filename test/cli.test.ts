import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createCli } from '../src/cli/index.js';
import { createProject, removeProject } from './helpers.js';

const SOURCE = 'export function main() {\n  return 1;\n}\n\nfunction unused() {\n  return 2;\n}\n';

describe('CLI', () => {
  let root: string;
  let output: string[];

  const lastOutput = (): unknown => JSON.parse(output[output.length - 1]);

  beforeEach(() => {
    root = createProject({ 'src/a.ts': SOURCE, 'src/routes/users.ts': 'function handler() {}\nconst x = 1;\n' });
    output = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      output.push(args.map(String).join(' '));
    });
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeProject(root);
  });

  it('should print the analysis report as JSON', async () => {
    await createCli().parseAsync(['node', 'sweeper', 'analyze', '--root', root, '--json']);

    expect(lastOutput()).toMatchObject({
      repository: root,
      totalUnusedItems: 1,
      unusedFunctions: [{ name: 'unused', filepath: 'src/a.ts' }],
    });
    expect(readFileSync(join(root, 'src/a.ts'), 'utf-8')).toBe(SOURCE);
  });

  it('should remove dead code with --remove', async () => {
    await createCli().parseAsync(['node', 'sweeper', 'analyze', '--root', root, '--remove', '--json']);

    expect(lastOutput()).toMatchObject({ removal: { removed: 1, failed: 0 } });
    expect(readFileSync(join(root, 'src/a.ts'), 'utf-8')).toBe('export function main() {\n  return 1;\n}\n\n\n');
  });

  it('should treat --dry-run as a removal that writes nothing', async () => {
    await createCli().parseAsync(['node', 'sweeper', 'analyze', '--root', root, '--dry-run', '--json']);

    expect(lastOutput()).toMatchObject({ removal: { removed: 1, failed: 0 } });
    expect(readFileSync(join(root, 'src/a.ts'), 'utf-8')).toBe(SOURCE);
  });

  it('should leave denylisted files alone', async () => {
    await createCli().parseAsync(['node', 'sweeper', 'analyze', '--root', root, '--deny', 'src/a.ts', '--json']);

    expect(lastOutput()).toMatchObject({ totalUnusedItems: 0 });
  });

  it('should run the file-scope scan', async () => {
    await createCli().parseAsync(['node', 'sweeper', 'scan', '--root', root, '--json']);

    expect(lastOutput()).toEqual([
      { filePath: 'src/a.ts', unusedFunctions: ['main', 'unused'], unusedVariables: [], suppressed: false, heuristic: true },
      { filePath: 'src/routes/users.ts', unusedFunctions: [], unusedVariables: ['x'], suppressed: true, heuristic: true },
    ]);
  });
});
