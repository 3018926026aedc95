import chalk from 'chalk';
import { formatDuration } from '../lib/utils/format.js';
import type { ProvisioningStep } from '../registry/types.js';
import type { RunListener, StepResult, StepStatus } from '../runner/types.js';

export interface RunSummary {
  status: 'succeeded' | 'failed';
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
  /** Failed steps marked optional; they do not fail the run */
  failed_optional: number;
  already_applied: number;
}

/** Aggregate counts; the run fails iff a non-optional step failed */
export function summarize(results: readonly StepResult[]): RunSummary {
  const count = (status: StepStatus) => results.filter((r) => r.status === status).length;
  const failedRequired = results.filter((r) => r.status === 'failed' && !r.optional).length;
  return {
    status: failedRequired > 0 ? 'failed' : 'succeeded',
    total: results.length,
    succeeded: count('success'),
    skipped: count('skipped'),
    failed: count('failed'),
    failed_optional: results.filter((r) => r.status === 'failed' && r.optional).length,
    already_applied: results.filter((r) => r.already_applied).length,
  };
}

/** 1 when any required step failed, 0 otherwise */
export function exitCodeFor(results: readonly StepResult[]): number {
  return summarize(results).status === 'failed' ? 1 : 0;
}

export function statusIcon(status: StepStatus): string {
  switch (status) {
    case 'success': return chalk.green('✓');
    case 'skipped': return chalk.dim('⏭');
    case 'failed': return chalk.red('✗');
  }
}

function indent(text: string, prefix = '    '): string {
  return text
    .trimEnd()
    .split('\n')
    .map((line) => `${prefix}${line}`)
    .join('\n');
}

export interface ReporterOptions {
  /** Print only a final JSON document */
  json?: boolean;
  /** Print captured output of every step, not only failed ones */
  verbose?: boolean;
  write?: (line: string) => void;
}

/** Streams step outcomes to the console as the executor produces them */
export class ConsoleReporter implements RunListener {
  private readonly json: boolean;
  private readonly verbose: boolean;
  private readonly write: (line: string) => void;

  constructor(options: ReporterOptions = {}) {
    this.json = options.json ?? false;
    this.verbose = options.verbose ?? false;
    this.write = options.write ?? ((line) => console.log(line));
  }

  onStepStart(step: ProvisioningStep, index: number, total: number): void {
    if (this.json) return;
    this.write(chalk.dim(`▶ [${index + 1}/${total}] ${step.name}`));
  }

  onStepResult(result: StepResult): void {
    if (this.json) return;

    const duration = result.duration_ms > 0 ? chalk.dim(` (${formatDuration(result.duration_ms)})`) : '';
    const detail = result.reason ? chalk.dim(` ${result.reason}`) : '';
    const optional = result.status === 'failed' && result.optional ? chalk.yellow(' [optional]') : '';
    this.write(`  ${statusIcon(result.status)} ${result.name}${detail}${optional}${duration}`);

    if (this.verbose) {
      this.write(chalk.dim(`    $ ${result.command}`));
    }
    if (result.output && (this.verbose || result.status === 'failed')) {
      this.write(chalk.dim(indent(result.output)));
    }
  }

  /** Print the summary table and counts line (or the JSON document) */
  printSummary(manifestName: string, results: readonly StepResult[]): void {
    const summary = summarize(results);

    if (this.json) {
      this.write(JSON.stringify({
        manifest: manifestName,
        status: summary.status,
        steps: results.map((r) => ({
          name: r.name,
          group: r.group,
          status: r.status,
          exit_code: r.exit_code,
          optional: r.optional,
          already_applied: r.already_applied,
          reason: r.reason,
          duration_ms: r.duration_ms,
        })),
        summary,
      }));
      return;
    }

    this.write('');
    this.write(`Summary: ${chalk.bold(manifestName)}`);
    const nameWidth = Math.max(4, ...results.map((r) => r.name.length));
    const groupWidth = Math.max(5, ...results.map((r) => r.group.length));
    for (const r of results) {
      const duration = r.duration_ms > 0 ? formatDuration(r.duration_ms) : '';
      this.write(
        `  ${statusIcon(r.status)} ${r.name.padEnd(nameWidth)}  ${r.group.padEnd(groupWidth)}  ${r.status.padEnd(7)}  ${duration.padStart(8)}`.trimEnd(),
      );
    }
    this.write('');
    this.write(formatCounts(summary));
  }
}

/** e.g. "3 succeeded, 1 skipped, 1 failed" */
export function formatCounts(summary: RunSummary): string {
  const parts = [
    chalk.green(`${summary.succeeded} succeeded`),
    chalk.dim(`${summary.skipped} skipped`),
    summary.failed > 0 ? chalk.red(`${summary.failed} failed`) : `${summary.failed} failed`,
  ];
  return parts.join(', ');
}
