/**
 * Browser Session
 *
 * Owns one Chromium instance and hands out a driver per application.
 * Uses the locally installed browser; nothing is downloaded.
 */

import { chromium, type Browser, type BrowserContext } from 'playwright-core';
import type { Settings } from '../config/settings.js';
import { PlaywrightDriver } from './playwright-driver.js';
import { silentLogger, type Logger } from './logger.js';

export interface BrowserSessionOptions {
  headless?: boolean;
  timeoutMs?: number;
  /** Path to a Chromium/Chrome binary. */
  executablePath?: string;
  /** Installed browser channel such as `chrome` or `msedge`. */
  channel?: string;
  logger?: Logger;
}

export class BrowserSession {
  private browser: Browser | null = null;
  private contexts: BrowserContext[] = [];
  private options: BrowserSessionOptions;
  private logger: Logger;

  constructor(options: BrowserSessionOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  static fromSettings(browser: Settings['browser'], logger?: Logger): BrowserSession {
    return new BrowserSession({
      headless: browser.headless,
      timeoutMs: browser.timeout_ms,
      executablePath: browser.executable_path,
      channel: browser.channel,
      logger,
    });
  }

  /**
   * Launch the browser. Called lazily by openDriver if not already running.
   */
  async init(): Promise<void> {
    if (this.browser) {
      return;
    }

    this.logger.debug(`Launching chromium (headless=${this.options.headless ?? true})`);
    this.browser = await chromium.launch({
      headless: this.options.headless ?? true,
      executablePath: this.options.executablePath,
      channel: this.options.channel,
    });
  }

  /**
   * A fresh context and page, so the two applications share no cookies.
   */
  async openDriver(): Promise<PlaywrightDriver> {
    await this.init();

    if (!this.browser) {
      throw new Error('Browser failed to initialize');
    }

    const context = await this.browser.newContext();
    this.contexts.push(context);
    const page = await context.newPage();
    page.setDefaultTimeout(this.options.timeoutMs ?? 30_000);
    return new PlaywrightDriver(page, { timeoutMs: this.options.timeoutMs });
  }

  async close(): Promise<void> {
    for (const context of this.contexts) {
      await context.close();
    }
    this.contexts = [];
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
    }
  }
}
