/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import { basename } from 'node:path';
import { formatBytes, formatDuration } from '@encodeq/utils';
import { qualityVerdict, type QualityVerdict } from '@encodeq/media';
import {
  efficiency,
  type BenchmarkResult,
  type ExecutionSummary,
  type JobResult,
  type QualityReport,
} from '@encodeq/processing';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

export function printRule(width: number = 40): void {
  console.log('-'.repeat(width));
}

const VERDICT_COLORS: Record<QualityVerdict, (text: string) => string> = {
  EXCELLENT: chalk.green,
  GREAT: chalk.green,
  GOOD: chalk.cyan,
  ACCEPTABLE: chalk.yellow,
  POOR: chalk.red,
};

export function colorVerdict(verdict: QualityVerdict, text: string = verdict): string {
  return VERDICT_COLORS[verdict](text);
}

/**
 * Plan lines from the queue package, with headings in bold
 */
export function printPlan(lines: readonly string[]): void {
  printHeader('Encoding plan');
  for (const line of lines) {
    console.log(line.replace(/^([A-Z][a-z]+:)/, chalk.bold('$1')));
  }
}

export function printJobResult(result: JobResult): void {
  const name = basename(result.job.inputPath);

  if (!result.success) {
    printError(result.interrupted ? `${name}: interrupted` : `${name}: encode failed`);
    if (result.diagnostics && result.diagnostics.trim() !== '') {
      console.error(chalk.gray(result.diagnostics.trimEnd()));
    }
    return;
  }

  printSuccess(`${name} done in ${formatDuration(result.elapsedSeconds * 1000)}`);
  if (result.stats) {
    printKeyValue('Original', formatBytes(result.stats.inputBytes));
    printKeyValue('Encoded', `${formatBytes(result.stats.outputBytes)} (${result.stats.ratioPercent.toFixed(1)}%)`);
    printKeyValue('Saved', formatBytes(result.stats.savedBytes));
  }
}

export function printSummary(summary: ExecutionSummary): void {
  printHeader('Queue summary');
  printKeyValue('Jobs', `${summary.succeeded} succeeded, ${summary.failed} failed of ${summary.attempted}`);
  printKeyValue('Total original', formatBytes(summary.totalInputBytes));
  printKeyValue('Total encoded', formatBytes(summary.totalOutputBytes));
  printKeyValue('Saved', `${formatBytes(summary.savedBytes)} (${summary.savedPercent.toFixed(1)}%)`);
  if (summary.interrupted) {
    printWarning('Stopped early; the remaining jobs were not run.');
  }
}

export function printBenchmarkTable(results: readonly BenchmarkResult[]): void {
  printHeader('Benchmark results');
  console.log(`    ${'PRESET'.padEnd(34)} | ${'VMAF'.padEnd(5)} | ${'RATING'.padEnd(10)} | ${'SSIM'.padEnd(6)} | ${'FPS'.padEnd(6)} | ${'EFF'.padEnd(6)} | SIZE`);
  printRule(100);

  results.forEach((result, i) => {
    const verdict = qualityVerdict(result.vmafScore, 'vmaf');
    const ssim = result.ssimScore === undefined ? 'N/A' : result.ssimScore.toFixed(4);
    console.log([
      `[${i + 1}] ${result.preset.name.padEnd(34)}`,
      colorVerdict(verdict, result.vmafScore.toFixed(1).padEnd(5)),
      colorVerdict(verdict, verdict.padEnd(10)),
      ssim.padEnd(6),
      result.measuredFps.toFixed(1).padEnd(6),
      efficiency(result).toFixed(2).padEnd(6),
      formatBytes(result.estimatedTotalBytes),
    ].join(' | '));
  });

  printRule(100);
}

export function printQualityReport(report: QualityReport): void {
  printRule();
  console.log(chalk.bold(`${report.metric.toUpperCase()} result`));
  if (report.score === undefined || report.verdict === undefined) {
    printWarning(`No score found (exit code ${report.exitCode}). Details: ${report.reportPath}`);
    printRule();
    return;
  }

  const score = report.metric === 'vmaf' ? report.score.toFixed(2) : report.score.toFixed(4);
  printKeyValue('Score', chalk.bold(score));
  printKeyValue('Verdict', colorVerdict(report.verdict));
  printKeyValue('Notes', report.note ?? '');
  printKeyValue('Report', report.reportPath);
  printRule();
}
