#!/usr/bin/env node

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { config } from 'dotenv';
import { ConfigError, type ConfigOverrides, envOverrides, errorMessage, loadConfig } from './config.js';
import { EXIT_ERROR, exitCodeFor } from './exit-code.js';
import { runSuite } from './orchestrator.js';
import {
  type LineWriter,
  type ReportStats,
  type ReporterOptions,
  printResults,
  printRunHeader,
  printRunSummary,
  writeHtmlReport,
} from './reporter.js';
import type { TestConfig } from './types.js';

// Load environment variables
config();

interface RunCommandOptions {
  config: string;
  output?: string;
  format: ReporterOptions['format'];
  workers?: number;
  requests?: number;
  runs?: number;
  seed?: number;
  scenario?: string;
  html: boolean;
  verbose?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Must be an integer.');
  }
  return parsed;
}

function parseFormat(value: string): ReporterOptions['format'] {
  if (value === 'pretty' || value === 'json' || value === 'csv') return value;
  throw new InvalidArgumentError('Must be one of: pretty, json, csv.');
}

function flagOverrides(options: RunCommandOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.output !== undefined) overrides.outputDir = options.output;
  if (options.workers !== undefined) overrides.numWorkers = options.workers;
  if (options.requests !== undefined) overrides.requestsPerEndpoint = options.requests;
  if (options.runs !== undefined) overrides.numTestRuns = options.runs;
  if (options.seed !== undefined) overrides.seed = options.seed;
  if (options.scenario !== undefined) overrides.scenario = options.scenario;
  return overrides;
}

async function saveReport(
  cfg: TestConfig,
  stats: ReportStats,
  label: string,
  title: string,
  log: LineWriter,
): Promise<void> {
  try {
    const reportPath = await writeHtmlReport(stats, cfg.report.outputDir, label, {
      title,
      includeRequestDetails: cfg.report.includeRequestDetails,
    });
    log(chalk.gray(`Report generated: ${reportPath}`));
  } catch (error) {
    console.error(chalk.red(`Failed to write report: ${errorMessage(error)}`));
  }
}

const program = new Command();

program
  .name('perf-runner')
  .description('Load-test HTTP endpoints described in a YAML or JSON configuration file')
  .version('1.0.0');

program
  .command('run', { isDefault: true })
  .description('Run the configured load test')
  .option('-c, --config <path>', 'Path to the test configuration file', 'config.yaml')
  .option('-o, --output <dir>', 'Output directory for HTML reports')
  .option('-f, --format <format>', 'Summary format: pretty, json, csv', parseFormat, 'pretty')
  .option('-w, --workers <number>', 'Maximum endpoints tested concurrently', parsePositiveInt)
  .option('-n, --requests <number>', 'Requests sent to each endpoint per run', parsePositiveInt)
  .option('-r, --runs <number>', 'Number of test runs', parsePositiveInt)
  .option('--seed <number>', 'Seed for generated values', parseInteger)
  .option('--scenario <name>', 'Apply a named scenario from the configuration')
  .option('--no-html', 'Skip writing HTML reports')
  .option('--verbose', 'Show stack traces for failed endpoint tasks')
  .action(async (options: RunCommandOptions) => {
    try {
      const cfg = await loadConfig(options.config, { ...envOverrides(), ...flagOverrides(options) });
      // json and csv results own stdout; everything else goes to stderr
      const log: LineWriter = options.format === 'pretty' ? console.log : console.error;

      log(`Running performance tests with ${cfg.numWorkers} workers...`);
      log(chalk.gray(`${cfg.endpoints.length} endpoints x ${cfg.requestsPerEndpoint} requests, ${cfg.numTestRuns} runs`));

      const { aggregate } = await runSuite(cfg, {
        onRunStart: (run, total) => printRunHeader(run, total, log),
        onRunComplete: async (run, stats) => {
          printRunSummary(run, stats, log);
          if (options.html) {
            await saveReport(cfg, stats, `run${run}`, `Performance Test Report - Run ${run}`, log);
          }
        },
        onTaskError: (endpoint, error) => {
          console.error(chalk.red(`Error in test execution for ${endpoint.name}: ${errorMessage(error)}`));
          if (options.verbose && error instanceof Error && error.stack) {
            console.error(chalk.gray(error.stack));
          }
        },
      });

      printResults(aggregate, { format: options.format });
      if (options.html) {
        await saveReport(cfg, aggregate, 'aggregate', 'Performance Test Report - All Runs', log);
      }

      process.exit(exitCodeFor(aggregate));
    } catch (error) {
      if (error instanceof ConfigError) {
        console.error(`Configuration error: ${error.message}`);
      } else {
        console.error(`Error: ${errorMessage(error)}`);
      }
      process.exit(EXIT_ERROR);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(EXIT_ERROR);
});
