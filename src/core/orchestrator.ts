/**
 * Run Orchestrator
 *
 * Drives one legacy/modern comparison for a path: navigate both sides,
 * strip ignored elements, run every check group, summarize. Holds no state
 * between runs.
 */

import { performance } from 'node:perf_hooks';
import type { Driver, RunTally } from './types.js';
import type { Settings } from '../config/settings.js';
import { ComparisonEngine, pagePair, RunRecorder, type CheckOutcome, type PagePair } from './comparison-engine.js';
import { DomCollector } from './dom-collector.js';
import { errorMessage, silentLogger, type Logger } from './logger.js';

export interface RunReport {
  path: string;
  legacyUrl: string;
  modernUrl: string;
  tally: RunTally;
  outcomes: CheckOutcome[];
  durationMs: number;
  /** Set when navigation failed and the run stopped early. */
  aborted?: string;
}

export class FailureThresholdError extends Error {
  readonly tally: RunTally;
  readonly threshold: number;

  constructor(tally: RunTally, threshold: number) {
    super(
      `${tally.failed} comparisons failed, above the limit of ${threshold} ` +
        `(passed=${tally.passed} failed=${tally.failed} skipped=${tally.skipped} errors=${tally.errors})`
    );
    this.name = 'FailureThresholdError';
    this.tally = { ...tally };
    this.threshold = threshold;
  }
}

/** Joins a base URL and a path with exactly one slash between them. */
export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export function formatTally(tally: RunTally): string {
  return `passed=${tally.passed} failed=${tally.failed} skipped=${tally.skipped} errors=${tally.errors}`;
}

export interface RunOrchestratorOptions {
  settings: Settings;
  logger?: Logger;
  engine?: ComparisonEngine;
  collector?: DomCollector;
}

export class RunOrchestrator {
  readonly settings: Settings;
  private logger: Logger;
  private engine: ComparisonEngine;
  private collector: DomCollector;

  constructor(options: RunOrchestratorOptions) {
    this.settings = options.settings;
    this.logger = options.logger ?? silentLogger;
    this.collector = options.collector ?? new DomCollector({ logger: this.logger.child('collect') });
    this.engine =
      options.engine ??
      new ComparisonEngine({ settings: this.settings, logger: this.logger.child('engine'), collector: this.collector });
  }

  async runComparison(legacy: Driver, modern: Driver, path = '/'): Promise<RunReport> {
    const start = performance.now();
    const legacyUrl = joinUrl(this.settings.envs.legacy.base_url, path);
    const modernUrl = joinUrl(this.settings.envs.modern.base_url, path);
    const recorder = new RunRecorder();
    const report = (aborted?: string): RunReport => ({
      path,
      legacyUrl,
      modernUrl,
      tally: recorder.tally,
      outcomes: recorder.outcomes,
      durationMs: performance.now() - start,
      aborted,
    });

    this.logger.info(`Comparing ${legacyUrl} against ${modernUrl}`);

    try {
      await legacy.goto(legacyUrl);
      await modern.goto(modernUrl);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Navigation failed: ${message}`);
      recorder.record({ name: 'navigation', group: 'setup', status: 'error', reason: message });
      return report(message);
    }

    const pages = pagePair(legacy, modern, legacyUrl, modernUrl);
    await this.removeIgnored(pages, recorder);
    await this.engine.runAll(pages, recorder);

    this.logger.info(`Summary for ${path}: ${formatTally(recorder.tally)}`);
    return report();
  }

  /**
   * Throws FailureThresholdError when more comparisons failed than allowed.
   */
  assertSuccess(tally: RunTally): void {
    const threshold = this.settings.max_test_failures;
    if (tally.failed > threshold) {
      throw new FailureThresholdError(tally, threshold);
    }
  }

  private async removeIgnored(pages: PagePair, recorder: RunRecorder): Promise<void> {
    const selectors = this.settings.ignore_selectors;
    if (selectors.length === 0) return;
    try {
      await this.collector.removeIgnored(pages.legacy.driver, selectors);
      await this.collector.removeIgnored(pages.modern.driver, selectors);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Removing ignored elements failed: ${message}`);
      recorder.record({ name: 'ignore_selectors', group: 'setup', status: 'error', reason: message });
    }
  }
}
