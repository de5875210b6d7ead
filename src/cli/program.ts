/**
 * ui-parity command-line program.
 *
 * Commands:
 *   compare [paths...]        run every check group for each path
 *   validate-config <file>    load and validate a settings file
 *   text-diff <legacy> <modern>  compare two strings with one strategy
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { loadSettings, SettingsError, type Settings } from '../config/settings.js';
import { BrowserSession } from '../core/browser-session.js';
import { createLogger, errorMessage, isLogLevel, resolveLogLevel, type Logger } from '../core/logger.js';
import { FailureThresholdError, RunOrchestrator, type RunReport } from '../core/orchestrator.js';
import { formatJsonReport, formatResult, formatTextReport } from '../core/report-formatter.js';
import { TextComparator } from '../core/text-comparator.js';
import { ComparisonType, type Driver } from '../core/types.js';

export interface DriverPair {
  legacy: Driver;
  modern: Driver;
  close(): Promise<void>;
}

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  setExitCode(code: number): void;
  /** Opens the two drivers a `compare` run uses. */
  openDrivers(settings: Settings, logger: Logger): Promise<DriverPair>;
}

async function openBrowserDrivers(settings: Settings, logger: Logger): Promise<DriverPair> {
  const session = BrowserSession.fromSettings(settings.browser, logger.child('browser'));
  try {
    const legacy = await session.openDriver();
    const modern = await session.openDriver();
    return { legacy, modern, close: () => session.close() };
  } catch (error) {
    await session.close();
    throw error;
  }
}

export const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  setExitCode: (code) => {
    process.exitCode = code;
  },
  openDrivers: openBrowserDrivers,
};

type OutputFormat = 'text' | 'json';

const TEXT_TYPES: Record<string, ComparisonType> = {
  exact: ComparisonType.EXACT_TEXT,
  fuzzy: ComparisonType.FUZZY_TEXT,
  semantic: ComparisonType.SEMANTIC_TEXT,
  pattern: ComparisonType.PATTERN_MATCH,
};

function parseThreshold(value: string): number {
  const threshold = Number.parseFloat(value);
  if (Number.isNaN(threshold) || threshold < 0 || threshold > 1) {
    throw new Error('Threshold must be a number between 0 and 1');
  }
  return threshold;
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();
  const fail = (error: unknown) => {
    io.stderr(`${chalk.red('Error:')} ${errorMessage(error)}\n`);
    io.setExitCode(1);
  };

  program
    .name('ui-parity')
    .description('Semantic UI regression comparison between a legacy and a modern web application')
    .version('0.1.0');

  program
    .command('compare')
    .description('Compare legacy and modern pages for each path')
    .argument('[paths...]', 'paths appended to both base URLs', ['/'])
    .option('-c, --config <file>', 'settings file', 'config/settings.json')
    .addOption(new Option('--format <format>', 'output format').choices(['text', 'json']).default('text'))
    .option('--log-level <level>', 'debug|info|warn|error|silent (overrides settings)')
    .action(async (paths: string[], options: { config: string; format: OutputFormat; logLevel?: string }) => {
      let settings: Settings;
      try {
        settings = await loadSettings(options.config);
      } catch (error) {
        fail(error);
        return;
      }

      const level =
        options.logLevel && isLogLevel(options.logLevel) ? options.logLevel : resolveLogLevel(settings.log_level);
      const logger = createLogger('ui-parity', { level, write: (line) => io.stderr(`${line}\n`) });

      let drivers: DriverPair;
      try {
        drivers = await io.openDrivers(settings, logger);
      } catch (error) {
        fail(error);
        return;
      }

      const orchestrator = new RunOrchestrator({ settings, logger });
      const reports: RunReport[] = [];
      try {
        for (const path of paths) {
          reports.push(await orchestrator.runComparison(drivers.legacy, drivers.modern, path));
        }
      } finally {
        await drivers.close();
      }

      if (options.format === 'json') {
        io.stdout(`${formatJsonReport(reports)}\n`);
      } else {
        for (const report of reports) io.stdout(formatTextReport(report));
      }

      try {
        for (const report of reports) orchestrator.assertSuccess(report.tally);
        io.setExitCode(0);
      } catch (error) {
        if (!(error instanceof FailureThresholdError)) throw error;
        fail(error);
      }
    });

  program
    .command('validate-config')
    .description('Validate a settings file')
    .argument('<file>', 'settings file')
    .action(async (file: string) => {
      try {
        const settings = await loadSettings(file);
        const forms = Object.keys(settings.field_mappings.forms ?? {});
        io.stdout(
          `${chalk.green('Settings OK:')} ${file}\n` +
            `  legacy: ${settings.envs.legacy.base_url}\n` +
            `  modern: ${settings.envs.modern.base_url}\n` +
            `  mapped forms: ${forms.length > 0 ? forms.join(', ') : '(none)'}\n`
        );
        io.setExitCode(0);
      } catch (error) {
        if (!(error instanceof SettingsError)) throw error;
        fail(error);
      }
    });

  program
    .command('text-diff')
    .description('Compare two strings')
    .argument('<legacy>', 'legacy text')
    .argument('<modern>', 'modern text (or text matched by a legacy pattern)')
    .addOption(new Option('--type <type>', 'comparison strategy').choices(Object.keys(TEXT_TYPES)).default('exact'))
    .option('--threshold <number>', 'fuzzy/semantic threshold (0-1)')
    .option('--ignore-case', 'case-insensitive exact comparison')
    .action((legacy: string, modern: string, options: { type: string; threshold?: string; ignoreCase?: boolean }) => {
      try {
        const threshold = options.threshold !== undefined ? parseThreshold(options.threshold) : undefined;
        const comparator = new TextComparator({ fuzzyThreshold: threshold, semanticThreshold: threshold });
        const result = comparator.compareText(legacy, modern, TEXT_TYPES[options.type], {
          caseSensitive: !options.ignoreCase,
        });
        io.stdout(`${formatResult(result)}\n`);
        io.setExitCode(result.success ? 0 : 1);
      } catch (error) {
        fail(error);
      }
    });

  return program;
}
