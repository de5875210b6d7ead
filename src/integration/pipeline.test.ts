/**
 * Integration test: full legacy/modern comparison over in-process pages.
 *
 * Settings → orchestrator → collectors, comparators and the semantic field
 * comparator → report.
 */

import { describe, it, expect } from 'vitest';
import { RunOrchestrator } from '../core/orchestrator.js';
import { ComparisonEngine, pagePair, RunRecorder } from '../core/comparison-engine.js';
import { formatJsonReport } from '../core/report-formatter.js';
import { parseSettings } from '../config/settings.js';
import type { FormFieldVerdict } from '../core/types.js';
import { JsdomDriver } from '../test-support/jsdom-driver.js';

const LEGACY_LOGIN = `<!DOCTYPE html>
<html lang="en"><head><title>Sign in</title></head><body>
<div id="menu"><a href="/">Home</a><a href="/help">Help</a></div>
<h1>Sign in</h1>
<form>
  <table class="layout">
    <tr><td><label for="user">Username</label></td><td><input id="user" type="text" name="user" required></td></tr>
    <tr><td><label for="pw">Password</label></td><td><input id="pw" type="password" name="pw" required></td></tr>
  </table>
  <button type="submit" id="go">Sign in</button>
</form>
</body></html>`;

const MODERN_LOGIN = `<!DOCTYPE html>
<html lang="en"><head><title>Sign in</title></head><body>
<nav><a href="/">Home</a><a href="/help">Help</a></nav>
<main>
  <h1>Sign in</h1>
  <form>
    <div class="layout">
      <label for="email">User name</label><input id="email" type="email" name="email" required>
      <label for="password">Password</label><input id="password" type="password" name="password" required>
      <input id="remember" type="checkbox">
    </div>
    <a class="button" href="/session">Sign in</a>
  </form>
</main>
</body></html>`;

const SETTINGS = parseSettings({
  envs: {
    legacy: { base_url: 'http://legacy.test' },
    modern: { base_url: 'http://modern.test' },
  },
  semantic_form_types: ['login'],
  field_mappings: {
    forms: {
      login: {
        legacy: { username: { selector: '#user', priority: 'high' }, password: '#pw' },
        modern: { username: 'input[type=email]', password: '#password', remember_me: '#remember' },
      },
    },
    navigation: { legacy: { main_links: '#menu a' }, modern: { main_links: 'nav a' } },
    actions: { legacy: { sign_in: '#go' }, modern: { sign_in: "a:contains('sign in')" } },
    data_display: { legacy: { layout: 'table.layout' }, modern: { layout: 'div.layout' } },
  },
  semantic_rules: {
    field_types: { 'text-like': ['text', 'email'] },
    button_types: { primary: ['submit', 'link'] },
  },
  comparison_settings: { structural_equivalence: [['table', 'div']] },
});

function loginDrivers() {
  return {
    legacy: new JsdomDriver({ 'http://legacy.test/login': LEGACY_LOGIN }),
    modern: new JsdomDriver({ 'http://modern.test/login': MODERN_LOGIN }),
  };
}

describe('Pipeline E2E Integration', () => {
  it('matches a redesigned login page field by field', async () => {
    const { legacy, modern } = loginDrivers();
    const report = await new RunOrchestrator({ settings: SETTINGS }).runComparison(legacy, modern, '/login');

    const semantic = report.outcomes.filter((outcome) => outcome.group === 'semantic');
    expect(semantic.map((outcome) => [outcome.name, outcome.status])).toEqual([
      ['semantic_forms.login', 'passed'],
      ['semantic_navigation', 'passed'],
      ['semantic_actions', 'passed'],
      ['semantic_data_display', 'passed'],
    ]);

    const login = semantic[0].semantic;
    expect(login?.extra).toEqual(['remember_me']);
    expect(login?.missing).toEqual([]);
    const username = login?.verdicts.username;
    expect(username?.kind).toBe('form-field');
    if (username?.kind !== 'form-field') return;
    const verdict: FormFieldVerdict = username;
    expect(verdict.priority).toBe('high');
    expect(verdict.properties.category).toBe('text-like');
    expect(verdict.label.similarity).toBe(0.94);

    const actions = semantic[2].semantic?.verdicts.sign_in;
    expect(actions?.kind === 'action' && actions.type.category).toBe('primary');
  });

  it('still reports raw differences the semantic layer tolerates', async () => {
    const { legacy, modern } = loginDrivers();
    const report = await new RunOrchestrator({ settings: SETTINGS }).runComparison(legacy, modern, '/login');

    const byName = new Map(report.outcomes.map((outcome) => [outcome.name, outcome]));
    expect(byName.get('title')?.status).toBe('passed');
    expect(byName.get('primary_h1')?.status).toBe('passed');
    // The legacy menu is not a <nav>, so the raw collector sees no links there.
    expect(byName.get('nav_links')?.status).toBe('failed');
    expect(byName.get('landmarks')?.result?.message).toBe(
      'Boolean structure differs:\nmain: L=false M=true\nnav: L=false M=true'
    );
    expect(report.tally.errors).toBe(0);
    expect(report.tally.passed + report.tally.failed + report.tally.skipped).toBe(report.outcomes.length);
  });

  it('produces a JSON report that round-trips the semantic verdicts', async () => {
    const { legacy, modern } = loginDrivers();
    const report = await new RunOrchestrator({ settings: SETTINGS }).runComparison(legacy, modern, '/login');
    const json = JSON.parse(formatJsonReport([report]));

    const forms = json.runs[0].outcomes.find((outcome: { name: string }) => outcome.name === 'semantic_forms.login');
    expect(forms.semantic.verdicts.map((verdict: { role: string }) => verdict.role)).toEqual(['username', 'password']);
    expect(forms.semantic.extra).toEqual(['remember_me']);
  });

  it('compares page architecture of legacy against modern', async () => {
    const engine = new ComparisonEngine({ settings: SETTINGS });
    const recorder = new RunRecorder();
    await engine.runGroup(
      'structure',
      pagePair(
        JsdomDriver.fromHtml('<div><p>a</p></div>'),
        JsdomDriver.fromHtml('<section><p>a</p></section>'),
        'http://legacy.test/',
        'http://modern.test/'
      ),
      recorder
    );

    const architecture = recorder.outcomes.find((outcome) => outcome.name === 'page_architecture');
    expect(architecture?.status).toBe('failed');
    expect(architecture?.result?.message).toBe(
      'Page architecture differs:\nArchitecture divs: L=1 M=0\nArchitecture sections: L=0 M=1'
    );
  });

  it('compares whole-page structure and order of legacy against modern', async () => {
    const engine = new ComparisonEngine({ settings: SETTINGS });
    const recorder = new RunRecorder();
    await engine.runGroup(
      'page',
      pagePair(
        JsdomDriver.fromHtml('<title>Shop</title><div><h1>Deals</h1><p>a</p></div>'),
        JsdomDriver.fromHtml('<title>Shop</title><section><h1>Offers</h1><p>a</p></section>'),
        'http://legacy.test/',
        'http://modern.test/'
      ),
      recorder
    );

    const byName = new Map(recorder.outcomes.map((outcome) => [outcome.name, outcome]));
    expect(byName.get('page_structure')?.result?.message).toBe('Page structure differs:\ndivs: L=1 M=0\nsections: L=0 M=1');
    expect(byName.get('page_structure_ordered')?.result?.message).toBe(
      "Ordered page structure differs:\nheadings[0]: L='Deals' M='Offers'"
    );
    expect(recorder.tally).toEqual({ passed: 0, failed: 3, skipped: 0, errors: 0 });
  });

  it('passes page architecture for structurally identical pages', async () => {
    const engine = new ComparisonEngine({ settings: SETTINGS });
    const recorder = new RunRecorder();
    const html = '<main><ul><li>a</li></ul></main>';
    await engine.runGroup(
      'structure',
      pagePair(JsdomDriver.fromHtml(html), JsdomDriver.fromHtml(html), 'http://legacy.test/', 'http://modern.test/'),
      recorder
    );
    expect(recorder.tally).toEqual({ passed: 2, failed: 0, skipped: 0, errors: 0 });
  });
});
