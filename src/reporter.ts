import chalk from 'chalk';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { AggregateStatistics, ErrorRecord, RunStatistics } from './types.js';
import { successRate } from './metrics.js';

export interface ReporterOptions {
  format: 'pretty' | 'json' | 'csv';
}

export type ReportStats = RunStatistics | AggregateStatistics;

/** Where progress lines go; json and csv modes keep them off stdout. */
export type LineWriter = (line: string) => void;

const HTML_ERROR_ROWS = 10;
const HTML_ERROR_LENGTH = 100;

function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatMs(ms: number): string {
  return ms.toFixed(2);
}

function isAggregate(stats: ReportStats): stats is AggregateStatistics {
  return 'runCount' in stats;
}

// ============================================================================
// Console
// ============================================================================

export function printRunHeader(run: number, total: number, write: LineWriter = console.log): void {
  write(chalk.bold(`\n--- Test Run ${run}/${total} ---`));
}

export function formatRunSummary(run: number, stats: RunStatistics): string[] {
  const rate = successRate(stats.successfulRequests, stats.totalRequests);
  const lines = [
    `Test Run ${run} Summary:`,
    `  Total Requests: ${stats.totalRequests}`,
    `  Successful: ${stats.successfulRequests}`,
    `  Failed: ${stats.failedRequests}`,
    `  Success Rate: ${rate.toFixed(2)}%`,
    `  Avg Response Time: ${formatMs(stats.avgTime)} ms`,
  ];
  if (stats.taskErrors > 0) {
    lines.push(`  Endpoint Task Errors: ${stats.taskErrors}`);
  }
  if (stats.noSuccessfulRequests) {
    lines.push('  No successful requests to calculate response times');
  }
  return lines;
}

export function printRunSummary(run: number, stats: RunStatistics, write: LineWriter = console.log): void {
  const [title, ...rest] = formatRunSummary(run, stats);
  write(`\n${chalk.cyan(title)}`);
  for (const line of rest) {
    write(stats.noSuccessfulRequests && line.includes('No successful') ? chalk.yellow(line) : line);
  }
}

export function printResults(stats: AggregateStatistics, options: ReporterOptions = { format: 'pretty' }): void {
  switch (options.format) {
    case 'json':
      console.log(formatJson(stats));
      break;
    case 'csv':
      console.log(formatCsv(stats));
      break;
    default:
      printPretty(stats);
  }
}

function printPretty(stats: AggregateStatistics): void {
  const rate = stats.successRate.toFixed(1);
  const failedRate = successRate(stats.failedRequests, stats.totalRequests).toFixed(1);

  console.log('');
  console.log(chalk.bold('Load Test Results'));
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log(`${chalk.cyan('Runs:')}          ${stats.runCount}`);
  console.log('');

  console.log(chalk.bold('Requests:'));
  console.log(`  Total:        ${stats.totalRequests}`);
  console.log(`  Succeeded:    ${chalk.green(stats.successfulRequests)} (${rate}%)`);
  console.log(`  Failed:       ${chalk.red(stats.failedRequests)} (${failedRate}%)`);
  if (stats.taskErrors > 0) {
    console.log(`  Task errors:  ${chalk.red(stats.taskErrors)}`);
  }
  console.log('');

  if (stats.noSuccessfulRequests) {
    console.log(chalk.yellow('No successful requests to calculate response times'));
    console.log('');
  } else {
    console.log(chalk.bold('Latency (ms):'));
    console.log(`  Min:          ${formatMs(stats.minTime)}`);
    console.log(`  Max:          ${formatMs(stats.maxTime)}`);
    console.log(`  Avg:          ${formatMs(stats.avgTime)}`);
    console.log(`  p50:          ${formatMs(stats.p50)}`);
    console.log(`  p95:          ${formatMs(stats.p95)}`);
    console.log(`  p99:          ${formatMs(stats.p99)}`);
    console.log('');
  }

  if (stats.runCount > 1) {
    console.log(chalk.bold('Runs:'));
    for (const run of stats.runs) {
      console.log(`  #${run.run}  ${run.successRate.toFixed(1)}% ok, avg ${formatMs(run.avgTime)} ms`);
    }
    console.log('');
  }

  if (stats.errors.length > 0) {
    console.log(chalk.bold('Errors:'));
    for (const error of stats.errors) {
      console.log(`  ${chalk.red(error.statusCode ?? 'ERR')}  ${error.method} ${error.endpoint}: ${error.error}`);
    }
    if (stats.totalErrors > stats.errors.length) {
      console.log(chalk.gray(`  ... and ${stats.totalErrors - stats.errors.length} more errors`));
    }
    console.log('');
  }

  console.log(chalk.gray('══════════════════════════════════════'));
  console.log('');
}

export function formatJson(stats: AggregateStatistics): string {
  const output = {
    runs: stats.runCount,
    requests: {
      total: stats.totalRequests,
      succeeded: stats.successfulRequests,
      failed: stats.failedRequests,
      success_rate: stats.successRate,
    },
    latency_ms: {
      min: stats.minTime,
      max: stats.maxTime,
      avg: stats.avgTime,
      p50: stats.p50,
      p95: stats.p95,
      p99: stats.p99,
    },
    no_successful_requests: stats.noSuccessfulRequests,
    per_run: stats.runs.map(r => ({
      run: r.run,
      total: r.totalRequests,
      succeeded: r.successfulRequests,
      success_rate: r.successRate,
      avg_ms: r.avgTime,
    })),
    errors: stats.errors.map(e => ({
      endpoint: e.endpoint,
      method: e.method,
      status_code: e.statusCode ?? null,
      error: e.error,
    })),
    total_errors: stats.totalErrors,
    task_errors: stats.taskErrors,
  };

  return JSON.stringify(output, null, 2);
}

export function formatCsv(stats: AggregateStatistics): string {
  const lines = ['run,total,succeeded,failed,success_rate,avg_ms'];
  for (const r of stats.runs) {
    lines.push([
      r.run,
      r.totalRequests,
      r.successfulRequests,
      r.totalRequests - r.successfulRequests,
      r.successRate.toFixed(2),
      r.avgTime.toFixed(2),
    ].join(','));
  }
  lines.push([
    'all',
    stats.totalRequests,
    stats.successfulRequests,
    stats.failedRequests,
    stats.successRate.toFixed(2),
    stats.avgTime.toFixed(2),
  ].join(','));
  return lines.join('\n');
}

// ============================================================================
// HTML
// ============================================================================

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

const STYLE = `
    body { font-family: Arial, sans-serif; margin: 20px; }
    .summary { background: #f5f5f5; padding: 15px; border-radius: 5px; margin-bottom: 20px; }
    .metric { margin: 10px 0; }
    .success { color: green; }
    .error { color: red; }
    .warning { color: orange; font-weight: bold; }
    table { width: 100%; border-collapse: collapse; margin-top: 20px; }
    th, td { border: 1px solid #ddd; padding: 8px; text-align: left; }
    th { background-color: #f2f2f2; }
    tr:nth-child(even) { background-color: #f9f9f9; }
    pre { background: #f5f5f5; padding: 10px; border-radius: 4px; overflow-x: auto; white-space: pre-wrap; }
    .tips { margin-top: 20px; padding: 15px; background-color: #fff3cd; border-left: 5px solid #ffc107; }`;

function renderErrors(errors: ErrorRecord[], totalErrors: number, includeRequestDetails: boolean): string {
  const shown = errors.slice(0, HTML_ERROR_ROWS);
  const columns = includeRequestDetails ? 5 : 4;
  let html = '<h2>Error Details</h2>\n<p>First few errors encountered:</p>\n<table>\n';
  html += '<tr><th>#</th><th>Endpoint</th><th>Status Code</th><th>Error</th>';
  html += includeRequestDetails ? '<th>Request Data</th></tr>\n' : '</tr>\n';

  shown.forEach((error, i) => {
    html += `<tr><td>${i + 1}</td>`;
    html += `<td>${escapeHtml(`${error.method} ${error.endpoint}`)}</td>`;
    html += `<td>${error.statusCode ?? 'N/A'}</td>`;
    html += `<td><pre>${escapeHtml(truncate(error.error, HTML_ERROR_LENGTH))}</pre></td>`;
    if (includeRequestDetails) {
      const data = error.requestData === undefined ? '' : JSON.stringify(error.requestData, null, 2);
      html += `<td><pre>${escapeHtml(data)}</pre></td>`;
    }
    html += '</tr>\n';
  });

  if (totalErrors > shown.length) {
    html += `<tr><td colspan="${columns}">... and ${totalErrors - shown.length} more errors</td></tr>\n`;
  }
  return `${html}</table>\n`;
}

const DEBUGGING_TIPS = `<div class="tips">
<h3>Debugging Tips</h3>
<ul>
<li>Check if the API server is running and accessible</li>
<li>Verify the base URL in the configuration</li>
<li>Check if authentication is required and credentials are correct</li>
<li>Inspect the error messages above for more details</li>
</ul>
</div>
`;

export interface HtmlReportOptions {
  title?: string;
  includeRequestDetails?: boolean;
  generatedAt?: Date;
}

export function renderHtmlReport(stats: ReportStats, options: HtmlReportOptions = {}): string {
  const title = options.title ?? 'Performance Test Report';
  const generatedAt = (options.generatedAt ?? new Date()).toISOString();
  const rate = successRate(stats.successfulRequests, stats.totalRequests);

  let html = `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>${escapeHtml(title)}</title>
<style>${STYLE}
</style>
</head>
<body>
<h1>${escapeHtml(title)}</h1>
<p>Generated ${generatedAt}</p>
<div class="summary">
<h2>Summary</h2>
`;
  if (isAggregate(stats)) {
    html += `<div class="metric">Test Runs: ${stats.runCount}</div>\n`;
  }
  html += `<div class="metric">Total Requests: ${stats.totalRequests}</div>
<div class="metric ${stats.successfulRequests > 0 ? 'success' : 'error'}">Successful: ${stats.successfulRequests}</div>
<div class="metric${stats.failedRequests > 0 ? ' error' : ''}">Failed: ${stats.failedRequests}</div>
<div class="metric">Success Rate: ${rate.toFixed(2)}%</div>
`;
  if (stats.taskErrors > 0) {
    html += `<div class="metric error">Endpoint Task Errors: ${stats.taskErrors}</div>\n`;
  }

  if (stats.noSuccessfulRequests) {
    html += '<div class="metric warning">No successful requests to calculate response times</div>\n';
  } else {
    html += `<div class="metric">Average Response Time: ${formatMs(stats.avgTime)} ms</div>
<div class="metric">Min Response Time: ${formatMs(stats.minTime)} ms</div>
<div class="metric">Max Response Time: ${formatMs(stats.maxTime)} ms</div>
<div class="metric">p95 Response Time: ${formatMs(stats.p95)} ms</div>
`;
  }
  html += '</div>\n';

  if (isAggregate(stats)) {
    html += '<h2>Runs</h2>\n<table>\n<tr><th>Run</th><th>Requests</th><th>Success Rate</th><th>Avg Response Time (ms)</th></tr>\n';
    for (const run of stats.runs) {
      html += `<tr><td>${run.run}</td><td>${run.totalRequests}</td><td>${run.successRate.toFixed(2)}%</td><td>${formatMs(run.avgTime)}</td></tr>\n`;
    }
    html += '</table>\n';
  } else {
    html += `<p>Duration: ${formatDuration(stats.durationMs)}, throughput: ${stats.throughput.toFixed(1)} req/s</p>\n`;
    html += '<h2>Endpoints</h2>\n<table>\n<tr><th>Endpoint</th><th>Requests</th><th>Successful</th><th>Failed</th><th>Avg Response Time (ms)</th></tr>\n';
    for (const endpoint of stats.endpoints) {
      html += `<tr><td>${escapeHtml(`${endpoint.method} ${endpoint.name}`)}</td><td>${endpoint.totalRequests}</td>`;
      html += `<td>${endpoint.successfulRequests}</td><td>${endpoint.failedRequests}</td><td>${formatMs(endpoint.avgTime)}</td></tr>\n`;
    }
    html += '</table>\n';
  }

  if (stats.errors.length > 0) {
    html += renderErrors(stats.errors, stats.failedRequests, options.includeRequestDetails ?? true);
    if (stats.successfulRequests === 0 && stats.totalRequests > 0) {
      html += DEBUGGING_TIPS;
    }
  }

  return `${html}</body>\n</html>\n`;
}

function timestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export function reportFileName(label: string, date: Date = new Date()): string {
  return `performance_report_${timestamp(date)}_${label}.html`;
}

/** Renders and writes a report into `outputDir`, returning the file path. */
export async function writeHtmlReport(
  stats: ReportStats,
  outputDir: string,
  label: string,
  options: HtmlReportOptions = {},
): Promise<string> {
  const generatedAt = options.generatedAt ?? new Date();
  await mkdir(outputDir, { recursive: true });
  const reportPath = join(outputDir, reportFileName(label, generatedAt));
  await writeFile(reportPath, renderHtmlReport(stats, { ...options, generatedAt }), 'utf8');
  return reportPath;
}
