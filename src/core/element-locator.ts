/**
 * Element Locator
 *
 * Resolves a configured selector expression against a driver. Expressions are
 * comma-separated CSS alternatives, extended with a `tag:contains('text')`
 * pseudo-selector that filters candidates by case-insensitive text content.
 */

import type { Driver, ElementHandle } from './types.js';
import { errorMessage, silentLogger, type Logger } from './logger.js';

const CONTAINS_MARKER = ':contains(';

export interface ContainsSelector {
  base: string;
  text: string;
}

/**
 * Splits on top-level commas only. Commas inside parentheses, brackets or
 * quotes belong to the alternative they appear in.
 */
export function splitSelectors(expression: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let current = '';

  for (const ch of expression) {
    if (quote) {
      if (ch === quote) quote = null;
      current += ch;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '(' || ch === '[') {
      depth++;
    } else if ((ch === ')' || ch === ']') && depth > 0) {
      depth--;
    } else if (ch === ',' && depth === 0) {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  parts.push(current);

  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

/**
 * `button:contains('Log in')` → `{ base: 'button', text: 'Log in' }`.
 * Quotes around the text are optional. Returns null for plain selectors.
 */
export function parseContains(selector: string): ContainsSelector | null {
  const start = selector.indexOf(CONTAINS_MARKER);
  if (start === -1) return null;

  const end = selector.lastIndexOf(')');
  if (end < start) return null;

  const base = selector.slice(0, start).trim() || '*';
  const raw = selector.slice(start + CONTAINS_MARKER.length, end).trim();
  const text = raw.replace(/^["']/, '').replace(/["']$/, '');
  return { base, text };
}

/** Handles are compared by the node they point at; drivers may wrap one node in several handles. */
async function includesElement(handles: ElementHandle[], handle: ElementHandle): Promise<boolean> {
  for (const candidate of handles) {
    if (await candidate.sameElement(handle)) return true;
  }
  return false;
}

export class ElementLocator {
  private logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  /**
   * Union of matches across alternatives, in order. A handle returned by an
   * earlier alternative is not repeated. A failing alternative is logged
   * and skipped.
   */
  async find(driver: Driver, selectors: string | null | undefined): Promise<ElementHandle[]> {
    if (!selectors || !selectors.trim()) return [];

    const found: ElementHandle[] = [];

    for (const selector of splitSelectors(selectors)) {
      try {
        // Matches within one alternative are distinct; only earlier ones can repeat.
        const earlier = found.slice();
        for (const handle of await this.findOne(driver, selector)) {
          if (await includesElement(earlier, handle)) continue;
          found.push(handle);
        }
      } catch (error) {
        this.logger.warn(`Error finding elements with selector '${selector}': ${errorMessage(error)}`);
      }
    }

    return found;
  }

  private async findOne(driver: Driver, selector: string): Promise<ElementHandle[]> {
    const contains = parseContains(selector);
    if (!contains) {
      return driver.findElements(selector);
    }

    const needle = contains.text.toLowerCase();
    const candidates = await driver.findElements(contains.base);
    const matches: ElementHandle[] = [];
    for (const candidate of candidates) {
      const text = await candidate.text();
      if (text.toLowerCase().includes(needle)) {
        matches.push(candidate);
      }
    }
    return matches;
  }
}
