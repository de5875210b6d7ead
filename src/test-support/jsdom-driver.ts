/**
 * In-process Driver over jsdom, for tests that need a page without a browser.
 */

import { JSDOM } from 'jsdom';
import type { Driver, ElementHandle } from '../core/types.js';
import { associatedLabelText } from '../core/element-label.js';

type DOMWindow = JSDOM['window'];

class JsdomElementHandle implements ElementHandle {
  constructor(
    private element: Element,
    private window: DOMWindow
  ) {}

  async text(): Promise<string> {
    return (this.element.textContent ?? '').replace(/\s+/g, ' ').trim();
  }

  async getAttribute(name: string): Promise<string | null> {
    return this.element.getAttribute(name);
  }

  async tagName(): Promise<string> {
    return this.element.tagName;
  }

  async isDisplayed(): Promise<boolean> {
    for (let node: Element | null = this.element; node; node = node.parentElement) {
      if (node.hasAttribute('hidden')) return false;
      if (this.window.getComputedStyle(node).display === 'none') return false;
    }
    return true;
  }

  async labelText(): Promise<string | null> {
    return associatedLabelText(this.element);
  }

  async sameElement(other: ElementHandle): Promise<boolean> {
    return other instanceof JsdomElementHandle && other.element === this.element;
  }
}

export class JsdomDriver implements Driver {
  private dom: JSDOM;
  /** Called before each findElements; lets tests inject lookup failures. */
  onFind: ((selector: string) => void) | null = null;

  constructor(
    private pages: Record<string, string> = {},
    html = '<!DOCTYPE html><html><head></head><body></body></html>',
    url = 'http://localhost/'
  ) {
    this.dom = new JSDOM(html, { url, runScripts: 'outside-only', pretendToBeVisual: true });
  }

  static fromHtml(body: string, url = 'http://localhost/'): JsdomDriver {
    return new JsdomDriver({}, body, url);
  }

  async goto(url: string): Promise<void> {
    const html = this.pages[url];
    if (html === undefined) {
      throw new Error(`net::ERR_NAME_NOT_RESOLVED at ${url}`);
    }
    this.dom = new JSDOM(html, { url, runScripts: 'outside-only', pretendToBeVisual: true });
  }

  async currentUrl(): Promise<string> {
    return this.dom.window.location.href;
  }

  async findElements(selector: string): Promise<ElementHandle[]> {
    this.onFind?.(selector);
    const nodes = Array.from(this.dom.window.document.querySelectorAll(selector));
    // A new handle per query, as a browser driver hands out.
    return nodes.map((node) => new JsdomElementHandle(node, this.dom.window));
  }

  async executeScript<T>(script: string, ...args: unknown[]): Promise<T> {
    const fn: unknown = this.dom.window.eval(`(function () {\n${script}\n})`);
    if (typeof fn !== 'function') {
      throw new Error('Script did not compile to a function');
    }
    const result: unknown = fn(...args);
    // Results leave the page by value, as they do from a real browser.
    return JSON.parse(JSON.stringify(result ?? null));
  }

  get document(): Document {
    return this.dom.window.document;
  }
}
