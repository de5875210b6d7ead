import { describe, it, expect } from 'vitest';
import { actionType, fieldText, fieldType, snapshotElement } from './element-snapshot.js';
import type { ElementSnapshot } from './types.js';
import { JsdomDriver } from '../test-support/jsdom-driver.js';

function snapshot(overrides: Partial<ElementSnapshot>): ElementSnapshot {
  return {
    tagName: 'input',
    type: '',
    required: false,
    placeholder: '',
    labelText: '',
    ariaRole: '',
    ariaLabel: '',
    title: '',
    name: '',
    id: '',
    className: '',
    visibleText: '',
    displayed: true,
    ...overrides,
  };
}

async function first(driver: JsdomDriver, selector: string) {
  const [handle] = await driver.findElements(selector);
  return snapshotElement(handle);
}

describe('snapshotElement', () => {
  it('reads attributes and the for= label', async () => {
    const driver = JsdomDriver.fromHtml(
      '<label for="email">E-mail</label><input id="email" type="Email" required placeholder="you@example.test" class="field">'
    );
    const snap = await first(driver, '#email');
    expect(snap).toEqual({
      tagName: 'input',
      type: 'email',
      required: true,
      placeholder: 'you@example.test',
      labelText: 'E-mail',
      ariaRole: '',
      ariaLabel: '',
      title: '',
      name: '',
      id: 'email',
      className: 'field',
      visibleText: '',
      displayed: true,
    });
  });

  it('finds wrapping and preceding labels', async () => {
    const driver = JsdomDriver.fromHtml(
      '<label>Name <input name="n"></label><div><label>City</label><input name="c"></div>'
    );
    expect((await first(driver, '[name=n]')).labelText).toBe('Name');
    expect((await first(driver, '[name=c]')).labelText).toBe('City');
  });

  it('reports hidden elements as not displayed', async () => {
    const driver = JsdomDriver.fromHtml('<div hidden><button>Go</button></div><p style="display:none">x</p>');
    expect((await first(driver, 'button')).displayed).toBe(false);
    expect((await first(driver, 'p')).displayed).toBe(false);
  });
});

describe('fieldText', () => {
  it('prefers label, then placeholder, aria-label and title', () => {
    expect(fieldText(snapshot({ labelText: 'Email', placeholder: 'you@' }))).toBe('Email');
    expect(fieldText(snapshot({ placeholder: 'Search…', ariaLabel: 'Search' }))).toBe('Search…');
    expect(fieldText(snapshot({ ariaLabel: 'Search', title: 'Find' }))).toBe('Search');
    expect(fieldText(snapshot({ title: 'Find' }))).toBe('Find');
    expect(fieldText(snapshot({ labelText: '   ' }))).toBe('');
  });
});

describe('fieldType', () => {
  it('defaults by tag', () => {
    expect(fieldType(snapshot({}))).toBe('text');
    expect(fieldType(snapshot({ tagName: 'select' }))).toBe('select');
    expect(fieldType(snapshot({ tagName: 'div' }))).toBe('');
    expect(fieldType(snapshot({ type: 'password' }))).toBe('password');
  });
});

describe('actionType', () => {
  it('applies submit, button, input, link precedence', () => {
    expect(actionType(snapshot({ tagName: 'button', type: 'submit' }))).toBe('submit');
    expect(actionType(snapshot({ tagName: 'input', type: 'submit' }))).toBe('submit');
    expect(actionType(snapshot({ tagName: 'button', type: 'reset' }))).toBe('button');
    expect(actionType(snapshot({ tagName: 'input', type: 'image' }))).toBe('image');
    expect(actionType(snapshot({ tagName: 'input' }))).toBe('text');
    expect(actionType(snapshot({ tagName: 'a' }))).toBe('link');
    expect(actionType(snapshot({ tagName: 'div' }))).toBe('unknown');
  });
});
