/**
 * Driver over a Playwright page.
 */

import type { ElementHandle as PlaywrightHandle, Page } from 'playwright-core';
import type { Driver, ElementHandle } from './types.js';
import { associatedLabelText } from './element-label.js';

class PlaywrightElementHandle implements ElementHandle {
  constructor(private handle: PlaywrightHandle<HTMLElement | SVGElement>) {}

  async text(): Promise<string> {
    const raw = await this.handle.evaluate((el) => (el instanceof HTMLElement ? el.innerText : el.textContent) ?? '');
    return raw.replace(/\s+/g, ' ').trim();
  }

  async getAttribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  async tagName(): Promise<string> {
    return this.handle.evaluate((el) => el.tagName);
  }

  async isDisplayed(): Promise<boolean> {
    return this.handle.isVisible();
  }

  async labelText(): Promise<string | null> {
    return this.handle.evaluate(associatedLabelText);
  }

  async sameElement(other: ElementHandle): Promise<boolean> {
    if (!(other instanceof PlaywrightElementHandle)) return false;
    return this.handle.evaluate((el, candidate) => el === candidate, other.handle);
  }
}

export interface PlaywrightDriverOptions {
  /** Navigation timeout in milliseconds. */
  timeoutMs?: number;
}

export class PlaywrightDriver implements Driver {
  private timeoutMs: number;

  constructor(
    readonly page: Page,
    options: PlaywrightDriverOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'load', timeout: this.timeoutMs });
  }

  async currentUrl(): Promise<string> {
    return this.page.url();
  }

  async findElements(selector: string): Promise<ElementHandle[]> {
    const handles = await this.page.$$(selector);
    return handles.map((handle) => new PlaywrightElementHandle(handle));
  }

  /**
   * The script body runs as a function so it may `return` and read `arguments`.
   */
  async executeScript<T>(script: string, ...args: unknown[]): Promise<T> {
    return this.page.evaluate(
      ([body, scriptArgs]) => new Function(body).apply(null, scriptArgs),
      [script, args] as const
    );
  }
}
