import { writeFileSync } from 'node:fs';
import type {
  AnalysisReport,
  Classification,
  DeadCodeFinding,
  RemovalOutcome,
  RemovalSummary,
} from './types.js';

/** Build the caller-facing report from a classification pass */
export function createReport(repository: string, classification: Classification, degraded: boolean): AnalysisReport {
  return {
    repository,
    unusedFunctions: classification.deadFunctions,
    unusedClasses: classification.deadClasses,
    totalUnusedItems: classification.deadFunctions.length + classification.deadClasses.length,
    skipped: classification.skipped,
    degraded,
  };
}

export function summarizeRemoval(outcomes: RemovalOutcome[]): RemovalSummary {
  const summary: RemovalSummary = { removed: 0, skippedReexported: 0, failed: 0, outcomes: [] };

  for (const outcome of outcomes) {
    const { name, kind, filepath } = outcome.definition;
    if (outcome.status === 'failed') {
      summary.failed++;
      summary.outcomes.push({ name, kind, filepath, status: outcome.status, reason: outcome.reason });
      continue;
    }
    if (outcome.status === 'removed') {
      summary.removed++;
    } else {
      summary.skippedReexported++;
    }
    summary.outcomes.push({ name, kind, filepath, status: outcome.status });
  }

  return summary;
}

export interface RemovedCode {
  unusedFunctions: DeadCodeFinding[];
  unusedClasses: DeadCodeFinding[];
}

function describeSection(title: string, findings: DeadCodeFinding[]): string {
  if (findings.length === 0) return '';
  let section = `\n### ${title}\n`;
  for (const finding of findings) {
    section += `\n- \`${finding.name}\` from \`${finding.filepath}\`\n`;
    section += '```typescript\n';
    section += finding.sourceText;
    section += '\n```\n';
  }
  return section;
}

/** Markdown body of the removal pull request */
export function createPullRequestDescription(removed: RemovedCode): string {
  let description = '## Dead Code Removal\n\n';
  description += 'This PR removes unused code identified by the dead code sweeper.\n\n';
  description += describeSection('Removed Functions', removed.unusedFunctions);
  description += describeSection('Removed Classes', removed.unusedClasses);
  return description;
}

/** One-screen summary for terminal output */
export function formatSummary(report: AnalysisReport): string {
  const lines = [
    `Repository: ${report.repository}${report.degraded ? ' (degraded load)' : ''}`,
    `  Unused functions: ${report.unusedFunctions.length}`,
    `  Unused classes: ${report.unusedClasses.length}`,
    `  Total unused items: ${report.totalUnusedItems}`,
  ];

  for (const finding of [...report.unusedFunctions, ...report.unusedClasses]) {
    lines.push(`    ${finding.kind} ${finding.name} (${finding.filepath})`);
  }
  if (report.skipped.length > 0) {
    lines.push(`  Skipped symbols: ${report.skipped.length}`);
  }
  if (report.removal) {
    const { removed, skippedReexported, failed } = report.removal;
    lines.push(`  Removed: ${removed}, skipped (exported): ${skippedReexported}, failed: ${failed}`);
  }
  if (report.pullRequest?.url) {
    lines.push(`  Pull request: ${report.pullRequest.url}`);
  }
  if (report.publishError) {
    lines.push(`  Publish failed: ${report.publishError.message}`);
  }
  return lines.join('\n');
}

/** Write the report to a JSON file */
export function writeReport(report: AnalysisReport, outputPath: string): void {
  const json = JSON.stringify(report, null, 2);
  writeFileSync(outputPath, json, 'utf-8');
}
