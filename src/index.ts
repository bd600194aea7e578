#!/usr/bin/env node

import { Command } from 'commander';
import { resolve, dirname, join } from 'path';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { analyzeProject, type AnalysisReport } from './analysis/aggregator.js';
import { loadConfig, validateConfig, type AnalyzerConfig } from './config.js';
import { renderTextReport } from './report/text.js';
import { serializeReport } from './report/json.js';
import { writeReportFile } from './report/writer.js';
import { generateMermaid } from './viz/mermaid.js';
import { generateDiagramHTML } from './viz/generate-html.js';
import { watchProject } from './watcher.js';

// Read version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '../package.json');
const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
const version =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

// Exit status when --fail-on-findings sees undefined symbols or cycles
const FINDINGS_EXIT_CODE = 2;

interface CommonOptions {
  exclude?: string[];
  privateNames?: string;
  privatePrefix?: string;
  ignoreWildcards?: boolean;
  verbose?: boolean;
}

const program = new Command();

program
  .name('pyxref')
  .description('Static cross-reference analysis for Python projects: undefined and unused symbols, import cycles, coupling')
  .version(version);

program
  .command('analyze')
  .description('Analyze a Python project and report findings')
  .argument('<directory>', 'Project directory to analyze')
  .option('-o, --output <path>', 'Also write the JSON report to this file')
  .option('--format <type>', 'Output format: text | json', 'text')
  .option('--exclude <patterns...>', 'Glob patterns to exclude (e.g., "tests/**" "**/migrations/**")')
  .option('--private-names <policy>', 'Names left out of the unused report: dunder | prefix | none')
  .option('--private-prefix <prefix>', 'Prefix marking private names when --private-names is prefix')
  .option('--ignore-wildcards', 'Do not report `from x import *` statements')
  .option('--verbose', 'Show detailed parsing progress')
  .option('--fail-on-findings', `Exit with status ${FINDINGS_EXIT_CODE} when undefined symbols or cycles are found`)
  .action(async (directory: string, options: CommonOptions & { output?: string; format: string; failOnFindings?: boolean }) => {
    try {
      if (options.format !== 'text' && options.format !== 'json') {
        throw new Error(`Unknown format "${options.format}" (expected text or json)`);
      }

      const projectRoot = resolve(directory);
      const config = resolveConfig(projectRoot, options);

      console.error(`Analyzing project: ${projectRoot}`);
      const report = await analyzeProject(projectRoot, config);

      if (options.format === 'json') {
        console.log(serializeReport(report));
      } else {
        console.log(renderTextReport(report));
      }

      if (options.output) {
        writeReportFile(options.output, serializeReport(report));
      }

      if (options.failOnFindings && hasFindings(report)) {
        process.exit(FINDINGS_EXIT_CODE);
      }
    } catch (err) {
      console.error('Error analyzing project:', err instanceof Error ? err.message : err);
      process.exit(1);
    }
  });

program
  .command('graph')
  .description('Render the import graph as a Mermaid diagram, cycles highlighted')
  .argument('<directory>', 'Project directory to analyze')
  .option('-o, --output <path>', 'Write the Mermaid definition to this file instead of stdout')
  .option('--html <path>', 'Also write a standalone HTML page showing the diagram')
  .option('--title <title>', 'Title of the HTML page', 'Python Import Graph')
  .option('--exclude <patterns...>', 'Glob patterns to exclude (e.g., "tests/**" "**/migrations/**")')
  .option('--verbose', 'Show detailed parsing progress')
  .action(async (directory: string, options: CommonOptions & { output?: string; html?: string; title: string }) => {
    try {
      const projectRoot = resolve(directory);
      const config = resolveConfig(projectRoot, options);

      console.error(`Analyzing project: ${projectRoot}`);
      const report = await analyzeProject(projectRoot, config);
      const mermaid = generateMermaid(report.dependencies, report.cycles);

      if (options.output) {
        writeReportFile(options.output, mermaid + '\n');
      } else {
        console.log(mermaid);
      }

      if (options.html) {
        writeReportFile(options.html, generateDiagramHTML(mermaid, { title: options.title }));
      }

      if (report.cycles.length > 0) {
        console.error(`Found ${report.cycles.length} circular import(s), shown as red dashed links`);
      }
    } catch (err) {
      console.error('Error generating graph:', err instanceof Error ? err.message : err);
      process.exit(1);
    }
  });

program
  .command('watch')
  .description('Analyze a Python project and re-run the analysis whenever a .py file changes')
  .argument('<directory>', 'Project directory to watch')
  .option('--exclude <patterns...>', 'Glob patterns to exclude (e.g., "tests/**" "**/migrations/**")')
  .option('--private-names <policy>', 'Names left out of the unused report: dunder | prefix | none')
  .option('--private-prefix <prefix>', 'Prefix marking private names when --private-names is prefix')
  .option('--ignore-wildcards', 'Do not report `from x import *` statements')
  .option('--verbose', 'Show detailed parsing progress')
  .action(async (directory: string, options: CommonOptions) => {
    try {
      const projectRoot = resolve(directory);
      const config = resolveConfig(projectRoot, options);

      let running = false;
      let rerun = false;

      // One analysis at a time; events during a run schedule exactly one more
      const run = async (): Promise<void> => {
        if (running) {
          rerun = true;
          return;
        }
        running = true;
        try {
          do {
            rerun = false;
            const report = await analyzeProject(projectRoot, config);
            console.log(renderTextReport(report));
          } while (rerun);
        } finally {
          running = false;
        }
      };

      await run();

      const watcher = watchProject(
        projectRoot,
        { onPythonFileEvent: () => run() },
        { ignoreDirs: config.ignoreDirs }
      );

      process.on('SIGINT', () => {
        console.error('\nStopping watcher...');
        watcher.close().then(
          () => process.exit(0),
          (err: unknown) => {
            console.error('Error closing watcher:', err);
            process.exit(1);
          }
        );
      });
    } catch (err) {
      console.error('Error watching project:', err instanceof Error ? err.message : err);
      process.exit(1);
    }
  });

function resolveConfig(projectRoot: string, options: CommonOptions): AnalyzerConfig {
  const fromFlags = Object.fromEntries(
    Object.entries({
      exclude: options.exclude,
      privateNames: options.privateNames,
      privatePrefix: options.privatePrefix,
      wildcardImports: options.ignoreWildcards ? 'ignore' : undefined,
      verbose: options.verbose,
    }).filter(([, value]) => value !== undefined)
  );

  return loadConfig(projectRoot, validateConfig(fromFlags, 'command line'));
}

function hasFindings(report: AnalysisReport): boolean {
  return report.undefinedSymbols.length > 0 || report.cycles.length > 0;
}

program.parse();
