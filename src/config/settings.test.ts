import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadSettings, parseSettings, SettingsError } from './settings.js';

const ENVS = {
  legacy: { base_url: 'http://legacy.test' },
  modern: { base_url: 'http://modern.test' },
};

describe('parseSettings', () => {
  it('applies defaults', () => {
    const settings = parseSettings({ envs: ENVS });
    expect(settings.max_test_failures).toBe(5);
    expect(settings.checks).toEqual({});
    expect(settings.semantic_form_types).toEqual(['login', 'registration', 'search', 'contact']);
    expect(settings.comparison_settings).toEqual({
      field_count_tolerance: 2,
      text_similarity_threshold: 0.8,
      structural_equivalence: [],
    });
    expect(settings.browser).toEqual({ headless: true, timeout_ms: 30_000 });
  });

  it('returns a deeply frozen object', () => {
    const settings = parseSettings({ envs: ENVS, ignore_selectors: ['.ad'] });
    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.comparison_settings)).toBe(true);
    expect(Object.isFrozen(settings.ignore_selectors)).toBe(true);
  });

  it('accepts string and object selector specs', () => {
    const settings = parseSettings({
      envs: ENVS,
      field_mappings: {
        navigation: { legacy: { links: 'nav a' }, modern: { links: { selector: '.menu a', priority: 'high' } } },
      },
    });
    expect(settings.field_mappings.navigation?.modern.links).toEqual({ selector: '.menu a', priority: 'high' });
  });

  it('lists every issue', () => {
    let caught: unknown;
    try {
      parseSettings({ envs: { legacy: { base_url: 'not a url' }, modern: {} }, max_test_failures: -1 }, 'test.json');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SettingsError);
    if (!(caught instanceof SettingsError)) return;
    expect(caught.issues).toHaveLength(3);
    expect(caught.issues[0]).toMatch(/^envs\.legacy\.base_url: /);
    expect(caught.issues[1]).toBe('envs.modern.base_url: Required');
    expect(caught.issues[2]).toMatch(/^max_test_failures: /);
    expect(caught.message.startsWith('Invalid settings in test.json:\n  - envs.legacy.base_url')).toBe(true);
  });
});

describe('loadSettings', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('loads and validates a JSON file', async () => {
    dir = await mkdtemp(join(tmpdir(), 'ui-parity-'));
    const path = join(dir, 'settings.json');
    await writeFile(path, JSON.stringify({ envs: ENVS, max_test_failures: 0 }));
    const settings = await loadSettings(path);
    expect(settings.max_test_failures).toBe(0);
    expect(settings.envs.modern.base_url).toBe('http://modern.test');
  });

  it('reports malformed JSON as a settings error', async () => {
    dir = await mkdtemp(join(tmpdir(), 'ui-parity-'));
    const path = join(dir, 'settings.json');
    await writeFile(path, '{ "envs": ');
    await expect(loadSettings(path)).rejects.toThrow(SettingsError);
  });

  it('reports a missing file as a settings error', async () => {
    await expect(loadSettings('/nonexistent/ui-parity.json')).rejects.toThrow(/cannot read file/);
  });

  it('accepts the bundled example', async () => {
    const example = fileURLToPath(new URL('../../config/settings.example.json', import.meta.url));
    const settings = await loadSettings(example);
    expect(settings.semantic_form_types).toEqual(['login', 'search']);
    expect(settings.checks.performance).toBe(false);
  });
});
