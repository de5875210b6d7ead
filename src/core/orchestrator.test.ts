import { describe, it, expect } from 'vitest';
import { FailureThresholdError, formatTally, joinUrl, RunOrchestrator } from './orchestrator.js';
import { parseSettings, type SettingsInput } from '../config/settings.js';
import { JsdomDriver } from '../test-support/jsdom-driver.js';

const ENVS = {
  legacy: { base_url: 'http://legacy.test/' },
  modern: { base_url: 'http://modern.test' },
};

const PAGE = '<html><head><title>Login</title></head><body><h1>Sign in</h1><button>Go</button></body></html>';

function orchestrator(overrides: Omit<SettingsInput, 'envs'> = {}) {
  return new RunOrchestrator({ settings: parseSettings({ envs: ENVS, ...overrides }) });
}

describe('joinUrl', () => {
  it('joins with exactly one slash', () => {
    expect(joinUrl('http://legacy.test/', '/login')).toBe('http://legacy.test/login');
    expect(joinUrl('http://legacy.test', 'login')).toBe('http://legacy.test/login');
    expect(joinUrl('http://legacy.test', '/')).toBe('http://legacy.test/');
    expect(joinUrl('http://legacy.test/app', '/a?b=1')).toBe('http://legacy.test/app/a?b=1');
  });
});

describe('RunOrchestrator', () => {
  it('stops with one error when navigation fails', async () => {
    const legacy = new JsdomDriver({ 'http://legacy.test/login': PAGE });
    const modern = new JsdomDriver({});
    const report = await orchestrator().runComparison(legacy, modern, '/login');

    expect(report.tally).toEqual({ passed: 0, failed: 0, skipped: 0, errors: 1 });
    expect(report.aborted).toBe('net::ERR_NAME_NOT_RESOLVED at http://modern.test/login');
    expect(report.outcomes).toEqual([
      {
        name: 'navigation',
        group: 'setup',
        status: 'error',
        reason: 'net::ERR_NAME_NOT_RESOLVED at http://modern.test/login',
      },
    ]);
  });

  it('runs every group against both pages', async () => {
    const legacy = new JsdomDriver({ 'http://legacy.test/login': PAGE });
    const modern = new JsdomDriver({ 'http://modern.test/login': PAGE });
    const report = await orchestrator().runComparison(legacy, modern, '/login');

    expect(report.legacyUrl).toBe('http://legacy.test/login');
    expect(report.modernUrl).toBe('http://modern.test/login');
    expect(report.aborted).toBeUndefined();
    expect(report.tally.failed).toBe(0);
    expect(report.tally.errors).toBe(0);
    expect(report.outcomes.map((outcome) => outcome.group)).toContain('iframe');
    expect(await modern.currentUrl()).toBe('http://modern.test/login');
  });

  it('removes ignored elements before comparing', async () => {
    const legacy = new JsdomDriver({
      'http://legacy.test/': PAGE.replace('<button>Go</button>', '<button>Go</button><div class="ad">Sale!</div>'),
    });
    const modern = new JsdomDriver({ 'http://modern.test/': PAGE });
    const report = await orchestrator({ ignore_selectors: ['.ad'] }).runComparison(legacy, modern);

    expect(legacy.document.querySelector('.ad')).toBeNull();
    const body = report.outcomes.find((outcome) => outcome.name === 'body_text');
    expect(body?.status).toBe('passed');
    expect(body?.result?.message).toBe('Text similarity: 100.00%');
  });

  it('keeps runs independent', async () => {
    const run = () =>
      orchestrator().runComparison(
        new JsdomDriver({ 'http://legacy.test/': PAGE }),
        new JsdomDriver({ 'http://modern.test/': PAGE.replace('Sign in', 'Log in') })
      );
    const first = await run();
    const second = await run();
    expect(second.tally).toEqual(first.tally);
    expect(second.tally).not.toBe(first.tally);
    expect(first.tally.failed).toBeGreaterThan(0);
  });

  describe('assertSuccess', () => {
    it('allows failures up to the limit', () => {
      expect(() => orchestrator().assertSuccess({ passed: 1, failed: 5, skipped: 0, errors: 0 })).not.toThrow();
    });

    it('throws with the counts above the limit', () => {
      const tally = { passed: 1, failed: 6, skipped: 2, errors: 3 };
      let caught: unknown;
      try {
        orchestrator().assertSuccess(tally);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(FailureThresholdError);
      if (!(caught instanceof FailureThresholdError)) return;
      expect(caught.tally).toEqual(tally);
      expect(caught.threshold).toBe(5);
      expect(caught.message).toBe(
        '6 comparisons failed, above the limit of 5 (passed=1 failed=6 skipped=2 errors=3)'
      );
    });

    it('honours a configured limit', () => {
      expect(() =>
        orchestrator({ max_test_failures: 0 }).assertSuccess({ passed: 3, failed: 1, skipped: 0, errors: 0 })
      ).toThrow(FailureThresholdError);
    });
  });

  it('formats a tally', () => {
    expect(formatTally({ passed: 2, failed: 1, skipped: 0, errors: 4 })).toBe('passed=2 failed=1 skipped=0 errors=4');
  });
});
