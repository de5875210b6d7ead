/**
 * Report Formatter
 *
 * Renders run reports as coloured text for terminals or as JSON.
 */

import chalk from 'chalk';
import type { ComparisonResult, FieldComparisonVerdict, RunTally } from './types.js';
import { emptyTally } from './types.js';
import { orderedVerdicts, type CheckOutcome, type CheckStatus } from './comparison-engine.js';
import { formatTally, type RunReport } from './orchestrator.js';

const STATUS_LABELS: Record<CheckStatus, string> = {
  passed: '[PASS]',
  failed: '[FAIL]',
  skipped: '[SKIP]',
  error: '[ERROR]',
};

const STATUS_COLOURS: Record<CheckStatus, (text: string) => string> = {
  passed: chalk.green,
  failed: chalk.red,
  skipped: chalk.gray,
  error: chalk.magenta,
};

function statusTag(status: CheckStatus): string {
  return STATUS_COLOURS[status](STATUS_LABELS[status]);
}

/** Continuation lines of multi-line messages line up under the first. */
function indent(message: string, width: number): string {
  return message.split('\n').join(`\n${' '.repeat(width)}`);
}

function axes(verdict: FieldComparisonVerdict): Array<[string, boolean]> {
  switch (verdict.kind) {
    case 'form-field':
      return [
        ['count', verdict.countMatch],
        ['properties', verdict.propertiesMatch],
        ['label', verdict.labelMatch],
      ];
    case 'navigation':
      return [
        ['count', verdict.countMatch],
        ['text', verdict.textMatch],
      ];
    case 'action':
      return [
        ['count', verdict.countMatch],
        ['text', verdict.textMatch],
        ['type', verdict.typeMatch],
      ];
    case 'data-display':
      return [
        ['count', verdict.countMatch],
        ['structure', verdict.structureMatch],
      ];
  }
}

export function formatVerdict(verdict: FieldComparisonVerdict): string {
  const mark = verdict.match ? chalk.green('ok  ') : chalk.red('FAIL');
  const checks = axes(verdict)
    .map(([name, ok]) => `${name}=${ok ? 'ok' : chalk.red('FAIL')}`)
    .join(' ');
  const error = verdict.error ? chalk.red(` error: ${verdict.error}`) : '';
  return `${mark} ${verdict.role} [${verdict.priority}] L=${verdict.legacyCount} M=${verdict.modernCount} ${checks}${error}`;
}

function outcomeMessage(outcome: CheckOutcome): string {
  return outcome.result?.message ?? outcome.reason ?? '';
}

export function formatOutcome(outcome: CheckOutcome): string[] {
  const width = STATUS_LABELS[outcome.status].length + outcome.name.length + 3;
  const lines = [`${statusTag(outcome.status)} ${outcome.name}: ${indent(outcomeMessage(outcome), width)}`];

  const semantic = outcome.semantic;
  if (semantic) {
    for (const verdict of orderedVerdicts(semantic)) {
      lines.push(`    ${formatVerdict(verdict)}`);
    }
    if (semantic.missing.length > 0) lines.push(chalk.yellow(`    missing: ${semantic.missing.join(', ')}`));
    if (semantic.extra.length > 0) lines.push(chalk.yellow(`    extra: ${semantic.extra.join(', ')}`));
  }
  return lines;
}

function colourTally(tally: RunTally): string {
  const colour = tally.failed > 0 || tally.errors > 0 ? chalk.red : chalk.green;
  return colour(formatTally(tally));
}

export function formatTextReport(report: RunReport): string {
  const lines: string[] = [];
  lines.push(chalk.bold(`\nUI Parity Report: ${report.path}`));
  lines.push(chalk.bold('================================'));
  lines.push(`Legacy: ${report.legacyUrl}`);
  lines.push(`Modern: ${report.modernUrl}\n`);

  for (const outcome of report.outcomes) {
    lines.push(...formatOutcome(outcome));
  }

  if (report.aborted) {
    lines.push(chalk.red(`\nRun aborted: ${report.aborted}`));
  }
  lines.push(`\nSummary: ${colourTally(report.tally)} (${(report.durationMs / 1000).toFixed(1)}s)`);
  return lines.join('\n') + '\n';
}

export function totalTally(reports: RunReport[]): RunTally {
  const total = emptyTally();
  for (const { tally } of reports) {
    total.passed += tally.passed;
    total.failed += tally.failed;
    total.skipped += tally.skipped;
    total.errors += tally.errors;
  }
  return total;
}

function outcomeJson(outcome: CheckOutcome) {
  return {
    name: outcome.name,
    group: outcome.group,
    status: outcome.status,
    message: outcome.result?.message,
    similarityScore: outcome.result?.similarityScore ?? null,
    details: outcome.semantic ? undefined : outcome.result?.details,
    reason: outcome.reason,
    semantic: outcome.semantic && {
      section: outcome.semantic.section,
      scope: outcome.semantic.scope,
      overallMatch: outcome.semantic.overallMatch,
      verdicts: orderedVerdicts(outcome.semantic),
      missing: outcome.semantic.missing,
      extra: outcome.semantic.extra,
    },
  };
}

export function formatJsonReport(reports: RunReport[]): string {
  return JSON.stringify(
    {
      tally: totalTally(reports),
      runs: reports.map((report) => ({
        path: report.path,
        legacyUrl: report.legacyUrl,
        modernUrl: report.modernUrl,
        durationMs: Math.round(report.durationMs),
        aborted: report.aborted,
        tally: report.tally,
        outcomes: report.outcomes.map(outcomeJson),
      })),
    },
    null,
    2
  );
}

/** One-line rendering of a single comparison, used by `text-diff`. */
export function formatResult(result: ComparisonResult): string {
  const status = result.success ? 'passed' : 'failed';
  const score = result.similarityScore !== null ? ` (score ${result.similarityScore.toFixed(3)})` : '';
  return `${statusTag(status)} ${indent(result.message, STATUS_LABELS[status].length + 1)}${score}`;
}
