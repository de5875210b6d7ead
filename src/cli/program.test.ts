import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { stripVTControlCharacters as plain } from 'node:util';
import { createProgram, type CliIO, type DriverPair } from './program.js';
import { JsdomDriver } from '../test-support/jsdom-driver.js';

const PAGE = '<html><head><title>Orders</title></head><body><h1>Orders</h1><button>New</button></body></html>';

class FakeIO implements CliIO {
  out = '';
  err = '';
  exitCode: number | undefined;
  closed = false;

  constructor(private pages: { legacy: Record<string, string>; modern: Record<string, string> } = { legacy: {}, modern: {} }) {}

  stdout(text: string): void {
    this.out += text;
  }

  stderr(text: string): void {
    this.err += text;
  }

  setExitCode(code: number): void {
    this.exitCode = code;
  }

  async openDrivers(): Promise<DriverPair> {
    return {
      legacy: new JsdomDriver(this.pages.legacy),
      modern: new JsdomDriver(this.pages.modern),
      close: async () => {
        this.closed = true;
      },
    };
  }
}

async function run(io: FakeIO, args: string[]) {
  await createProgram(io).parseAsync(args, { from: 'user' });
  return io;
}

describe('text-diff', () => {
  it('passes a case-insensitive exact match', async () => {
    const io = await run(new FakeIO(), ['text-diff', 'Hello', 'hello', '--ignore-case']);
    expect(plain(io.out)).toBe('[PASS] Text matches exactly\n');
    expect(io.exitCode).toBe(0);
  });

  it('fails a fuzzy comparison below the default threshold', async () => {
    const io = await run(new FakeIO(), ['text-diff', 'Sign in', 'Sign up', '--type', 'fuzzy']);
    expect(plain(io.out).startsWith('[FAIL] Text similarity 71.43% below threshold 90.00%:')).toBe(true);
    expect(io.exitCode).toBe(1);
  });

  it('applies a custom threshold', async () => {
    const io = await run(new FakeIO(), ['text-diff', 'Sign in', 'Sign up', '--type', 'fuzzy', '--threshold', '0.7']);
    expect(plain(io.out)).toBe('[PASS] Text similarity: 71.43% (score 0.714)\n');
    expect(io.exitCode).toBe(0);
  });

  it('rejects an out-of-range threshold', async () => {
    const io = await run(new FakeIO(), ['text-diff', 'a', 'b', '--threshold', '2']);
    expect(plain(io.err)).toBe('Error: Threshold must be a number between 0 and 1\n');
    expect(io.exitCode).toBe(1);
  });
});

describe('settings files', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  async function settingsFile(content: unknown): Promise<string> {
    const created = await mkdtemp(join(tmpdir(), 'ui-parity-cli-'));
    dir = created;
    const path = join(created, 'settings.json');
    await writeFile(path, JSON.stringify(content));
    return path;
  }

  const ENVS = {
    legacy: { base_url: 'http://legacy.test' },
    modern: { base_url: 'http://modern.test' },
  };

  describe('validate-config', () => {
    it('summarizes a valid file', async () => {
      const path = await settingsFile({
        envs: ENVS,
        field_mappings: { forms: { login: { legacy: { u: '#u' }, modern: { u: '#u' } } } },
      });
      const io = await run(new FakeIO(), ['validate-config', path]);
      expect(plain(io.out)).toBe(
        `Settings OK: ${path}\n  legacy: http://legacy.test\n  modern: http://modern.test\n  mapped forms: login\n`
      );
      expect(io.exitCode).toBe(0);
    });

    it('lists issues for an invalid file', async () => {
      const path = await settingsFile({ envs: { legacy: {}, modern: ENVS.modern } });
      const io = await run(new FakeIO(), ['validate-config', path]);
      expect(plain(io.err)).toBe(`Error: Invalid settings in ${path}:\n  - envs.legacy.base_url: Required\n`);
      expect(io.exitCode).toBe(1);
    });
  });

  describe('compare', () => {
    it('prints a JSON report and exits 0 for identical pages', async () => {
      const path = await settingsFile({ envs: ENVS, log_level: 'silent' });
      const io = new FakeIO({
        legacy: { 'http://legacy.test/orders': PAGE },
        modern: { 'http://modern.test/orders': PAGE },
      });
      await run(io, ['compare', '/orders', '--config', path, '--format', 'json', '--log-level', 'silent']);

      const report = JSON.parse(io.out);
      expect(report.runs).toHaveLength(1);
      expect(report.runs[0].modernUrl).toBe('http://modern.test/orders');
      expect(report.tally.failed).toBe(0);
      expect(io.exitCode).toBe(0);
      expect(io.closed).toBe(true);
    });

    it('exits 1 when failures exceed the configured limit', async () => {
      const path = await settingsFile({ envs: ENVS, max_test_failures: 0 });
      const io = new FakeIO({
        legacy: { 'http://legacy.test/': PAGE },
        modern: { 'http://modern.test/': PAGE.replace('<title>Orders</title>', '<title>Order list</title>') },
      });
      await run(io, ['compare', '--config', path, '--log-level', 'silent']);

      expect(plain(io.out)).toContain("[FAIL] title: Text mismatch:\n              LEGACY: 'Orders'");
      expect(plain(io.err)).toMatch(/Error: \d+ comparisons failed, above the limit of 0/);
      expect(io.exitCode).toBe(1);
    });

    it('reports a missing settings file', async () => {
      const io = await run(new FakeIO(), ['compare', '--config', '/nonexistent/ui-parity.json']);
      expect(plain(io.err).startsWith('Error: Invalid settings in /nonexistent/ui-parity.json:')).toBe(true);
      expect(io.exitCode).toBe(1);
    });
  });
});
