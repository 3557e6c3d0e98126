import { describe, it, expect } from 'vitest';
import {
  createPullRequestDescription,
  createReport,
  formatSummary,
  summarizeRemoval,
} from '../src/analyzer/report.js';
import { makeDefinition } from './helpers.js';
import type { DeadCodeFinding, RemovalOutcome } from '../src/analyzer/types.js';

const unusedFn: DeadCodeFinding = {
  name: 'formatDate',
  kind: 'function',
  filepath: 'src/utils/date.ts',
  sourceText: 'function formatDate(d: Date) {\n  return d.toISOString();\n}',
};

const unusedClass: DeadCodeFinding = {
  name: 'LegacyCache',
  kind: 'class',
  filepath: 'src/cache.ts',
  sourceText: 'class LegacyCache {}',
};

describe('Report', () => {
  describe('Pull request description', () => {
    it('should list removed functions and classes with their source', () => {
      expect(createPullRequestDescription({ unusedFunctions: [unusedFn], unusedClasses: [unusedClass] })).toBe(
        [
          '## Dead Code Removal',
          '',
          'This PR removes unused code identified by the dead code sweeper.',
          '',
          '',
          '### Removed Functions',
          '',
          '- `formatDate` from `src/utils/date.ts`',
          '```typescript',
          'function formatDate(d: Date) {',
          '  return d.toISOString();',
          '}',
          '```',
          '',
          '### Removed Classes',
          '',
          '- `LegacyCache` from `src/cache.ts`',
          '```typescript',
          'class LegacyCache {}',
          '```',
          '',
        ].join('\n')
      );
    });

    it('should omit empty sections', () => {
      const description = createPullRequestDescription({ unusedFunctions: [], unusedClasses: [unusedClass] });
      expect(description).not.toContain('### Removed Functions');
      expect(description.startsWith(
        '## Dead Code Removal\n\nThis PR removes unused code identified by the dead code sweeper.\n\n\n### Removed Classes\n'
      )).toBe(true);
    });
  });

  it('should total the findings of a classification', () => {
    const report = createReport(
      'acme/widgets',
      { deadFunctions: [unusedFn], deadClasses: [unusedClass], candidates: [], skipped: [] },
      true
    );
    expect(report).toEqual({
      repository: 'acme/widgets',
      unusedFunctions: [unusedFn],
      unusedClasses: [unusedClass],
      totalUnusedItems: 2,
      skipped: [],
      degraded: true,
    });
  });

  it('should count removal outcomes by status', () => {
    const outcomes: RemovalOutcome[] = [
      { definition: makeDefinition({ name: 'a' }), status: 'removed' },
      { definition: makeDefinition({ name: 'B', kind: 'class' }), status: 'skipped-reexported' },
      { definition: makeDefinition({ name: 'c' }), status: 'failed', reason: 'cancelled' },
    ];

    expect(summarizeRemoval(outcomes)).toEqual({
      removed: 1,
      skippedReexported: 1,
      failed: 1,
      outcomes: [
        { name: 'a', kind: 'function', filepath: 'src/a.ts', status: 'removed' },
        { name: 'B', kind: 'class', filepath: 'src/a.ts', status: 'skipped-reexported' },
        { name: 'c', kind: 'function', filepath: 'src/a.ts', status: 'failed', reason: 'cancelled' },
      ],
    });
  });

  it('should summarize a report for the terminal', () => {
    const summary = formatSummary({
      repository: 'acme/widgets',
      unusedFunctions: [unusedFn],
      unusedClasses: [],
      totalUnusedItems: 1,
      skipped: [],
      degraded: false,
      removal: { removed: 1, skippedReexported: 0, failed: 0, outcomes: [] },
      pullRequest: { url: 'https://github.com/acme/widgets/pull/7', number: 7 },
    });

    expect(summary.split('\n')).toEqual([
      'Repository: acme/widgets',
      '  Unused functions: 1',
      '  Unused classes: 0',
      '  Total unused items: 1',
      '    function formatDate (src/utils/date.ts)',
      '  Removed: 1, skipped (exported): 0, failed: 0',
      '  Pull request: https://github.com/acme/widgets/pull/7',
    ]);
  });
});
