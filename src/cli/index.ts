import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'node:path';
import { resolveConfig } from './config.js';
import { runDeadCodeAnalysis } from '../analyzer/pipeline.js';
import { createFilePolicy } from '../analyzer/file-policy.js';
import { formatSummary, writeReport } from '../analyzer/report.js';
import { TypeScriptSourceModelProvider } from '../analyzer/typescript/ts-provider.js';
import { scanRepository } from '../analyzer/typescript/ts-file-scanner.js';
import { errorMessage } from '../analyzer/errors.js';
import type { AnalysisReport, ResolvedConfig } from '../analyzer/types.js';

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

interface AnalyzeCommandOptions {
  root: string;
  config?: string;
  include?: string[];
  ignore?: string[];
  deny?: string[];
  maxFileSize?: number;
  tsconfig?: string;
  remove?: boolean;
  dryRun?: boolean;
  json?: boolean;
  output?: string;
  watch?: boolean;
}

function analyzeLocal(config: ResolvedConfig, options: { remove: boolean; dryRun: boolean }): Promise<AnalysisReport> {
  return runDeadCodeAnalysis({
    repository: config.projectRoot,
    locator: config.projectRoot,
    provider: new TypeScriptSourceModelProvider(),
    policy: createFilePolicy({ denylist: config.denylist }),
    source: config.source,
    remove: options.remove,
    dryRun: options.dryRun,
  });
}

function printReport(report: AnalysisReport, options: AnalyzeCommandOptions, projectRoot: string): void {
  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log(`\n${formatSummary(report)}`);
  }
  if (options.output) {
    const outputPath = resolve(projectRoot, options.output);
    writeReport(report, outputPath);
    console.log(`\nReport written to: ${outputPath}`);
  }
}

export function createCli(): Command {
  const program = new Command();

  program
    .name('sweeper')
    .description('Find unused functions and classes, remove them safely and open a pull request')
    .version('1.0.0');

  program
    .command('analyze')
    .description('Analyze a local project for dead functions and classes')
    .option('-r, --root <path>', 'Project root directory', '.')
    .option('-c, --config <path>', 'Path to config file')
    .option('-i, --include <patterns...>', 'File patterns to load')
    .option('-x, --ignore <patterns...>', 'Additional file patterns to ignore while loading')
    .option('--deny <paths...>', 'Paths never analyzed for removal (globs or substrings)')
    .option('--max-file-size <bytes>', 'Skip files larger than this', parseInteger)
    .option('--tsconfig <path>', 'Path to tsconfig.json')
    .option('--remove', 'Delete dead definitions from their files')
    .option('--dry-run', 'Report removal outcomes without writing files (implies --remove)')
    .option('--json', 'Print the report as JSON')
    .option('-o, --output <path>', 'Write the JSON report to a file')
    .option('-w, --watch', 'Re-analyze on file changes (report only)')
    .action(async (options: AnalyzeCommandOptions) => {
      try {
        const config = resolveConfig(resolve(options.root), {
          config: options.config,
          include: options.include,
          ignore: options.ignore,
          deny: options.deny,
          maxFileSize: options.maxFileSize,
          tsconfig: options.tsconfig,
        });

        const remove = (options.remove || options.dryRun) ?? false;
        if (options.watch && remove) {
          throw new Error('--watch cannot be combined with --remove');
        }

        console.log(`Analyzing project at ${config.projectRoot}...`);
        console.log(`Include: ${config.source.include.join(', ')}`);
        console.log(`Ignore: ${config.source.ignorePatterns.length} patterns`);
        console.log(`Denylist: ${config.denylist.length} entries`);

        const run = () => analyzeLocal(config, { remove, dryRun: options.dryRun ?? false });
        printReport(await run(), options, config.projectRoot);

        if (options.watch) {
          const { startWatcher } = await import('./watch.js');
          startWatcher(config.projectRoot, run, report => printReport(report, options, config.projectRoot));
        }
      } catch (err) {
        console.error('Analysis failed:', errorMessage(err));
        process.exit(1);
      }
    });

  program
    .command('scan')
    .description('File-scope heuristic scan for unused functions and variables (no cross-file references)')
    .option('-r, --root <path>', 'Project root directory', '.')
    .option('-c, --config <path>', 'Path to config file')
    .option('-m, --markers <markers...>', 'Path markers that suppress unused-function reports')
    .option('--json', 'Print the findings as JSON')
    .action(async (options: { root: string; config?: string; markers?: string[]; json?: boolean }) => {
      try {
        const config = resolveConfig(resolve(options.root), { config: options.config, markers: options.markers });
        const findings = await scanRepository(config.projectRoot, { suppressMarkers: config.suppressMarkers });

        if (options.json) {
          console.log(JSON.stringify(findings, null, 2));
          return;
        }

        console.log('Heuristic results: references from other files are not considered.\n');
        for (const finding of findings) {
          console.log(finding.filePath);
          if (finding.unusedFunctions.length > 0) {
            console.log(`  functions: ${finding.unusedFunctions.join(', ')}`);
          }
          if (finding.unusedVariables.length > 0) {
            console.log(`  variables: ${finding.unusedVariables.join(', ')}`);
          }
        }
        console.log(`\n${findings.length} file(s) with findings`);
      } catch (err) {
        console.error('Scan failed:', errorMessage(err));
        process.exit(1);
      }
    });

  program
    .command('serve')
    .description('Start the HTTP API')
    .option('-p, --port <port>', 'Server port', parseInteger, Number.parseInt(process.env.PORT ?? '', 10) || 8000)
    .option('-r, --root <path>', 'Directory holding the config file', '.')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (options: { port: number; root: string; config?: string }) => {
      try {
        const config = resolveConfig(resolve(options.root), { config: options.config });
        const { startServer } = await import('./serve.js');
        await startServer(config, { port: options.port });
      } catch (err) {
        console.error('Server failed:', errorMessage(err));
        process.exit(1);
      }
    });

  return program;
}
