/**
 * Text Comparator
 *
 * Normalizes text rendered by two independently built applications and
 * compares it with one of several strategies selected by ComparisonType.
 */

import { ComparisonType, type ComparisonResult, type LinkEntry } from './types.js';
import { failed, guard, passed } from './result.js';
import { formatPercent, jaccard, sequenceRatio } from './text-similarity.js';
import { silentLogger, type Logger } from './logger.js';

const HTML_ENTITIES: Readonly<Record<string, string>> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&nbsp;': ' ',
  '&copy;': '©',
  '&reg;': '®',
  '&trade;': '™',
};

const ENTITY_PATTERN = /&(?:amp|lt|gt|quot|#39|nbsp|copy|reg|trade);/g;

/**
 * Trim, decode the fixed entity table, collapse whitespace, and straighten
 * quotes and dashes. Null or empty input yields ''.
 *
 * Entities are decoded one level per call, so text that was escaped twice
 * (`&amp;lt;`) comes out as `&lt;` and only reaches `<` on a second pass.
 */
export function normalizeText(value: string | null | undefined): string {
  if (!value) return '';

  return String(value)
    .replace(ENTITY_PATTERN, (entity) => HTML_ENTITIES[entity] ?? entity)
    .replace(/[“”]/g, '"')
    .replace(/[‘’]/g, "'")
    .replace(/[–—]/g, '-')
    .replace(/\s+/g, ' ')
    .trim();
}

export interface TextComparatorOptions {
  fuzzyThreshold?: number;
  semanticThreshold?: number;
  /** Relative tolerance for compareNumeric. */
  numericTolerance?: number;
  logger?: Logger;
}

export interface TextCompareOptions {
  caseSensitive?: boolean;
}

export interface ListCompareOptions {
  /** Fall back to set similarity when ordered equality fails. */
  partialMatch?: boolean;
}

export interface LinksCompareOptions {
  fuzzyText?: boolean;
}

export type WeightedAspect = [legacy: string | string[], modern: string | string[], weight: number, description: string];

export class TextComparator {
  readonly fuzzyThreshold: number;
  readonly semanticThreshold: number;
  readonly numericTolerance: number;
  private logger: Logger;

  constructor(options: TextComparatorOptions = {}) {
    this.fuzzyThreshold = options.fuzzyThreshold ?? 0.9;
    this.semanticThreshold = options.semanticThreshold ?? 0.8;
    this.numericTolerance = options.numericTolerance ?? 0.1;
    this.logger = options.logger ?? silentLogger;
  }

  normalize(value: string | null | undefined): string {
    return normalizeText(value);
  }

  compareText(
    a: string,
    b: string,
    type: ComparisonType = ComparisonType.EXACT_TEXT,
    options: TextCompareOptions = {}
  ): ComparisonResult {
    return guard('text', this.logger, () => {
      let left = normalizeText(a);
      let right = normalizeText(b);
      if (options.caseSensitive === false) {
        left = left.toLowerCase();
        right = right.toLowerCase();
      }

      switch (type) {
        case ComparisonType.EXACT_TEXT:
          return left === right
            ? passed('Text matches exactly')
            : failed(`Text mismatch:\nLEGACY: '${left}'\nMODERN: '${right}'`);

        case ComparisonType.FUZZY_TEXT: {
          const similarity = sequenceRatio(left, right);
          if (similarity >= this.fuzzyThreshold) {
            return passed(`Text similarity: ${formatPercent(similarity)}`, { similarityScore: similarity });
          }
          return failed(
            `Text similarity ${formatPercent(similarity)} below threshold ${formatPercent(this.fuzzyThreshold)}:\nLEGACY: '${left}'\nMODERN: '${right}'`,
            { similarityScore: similarity }
          );
        }

        case ComparisonType.SEMANTIC_TEXT: {
          const leftWords = wordSet(left);
          const rightWords = wordSet(right);
          if (leftWords.size === 0 || rightWords.size === 0) {
            return failed('Cannot perform semantic comparison on empty text');
          }
          const similarity = jaccard(leftWords, rightWords);
          if (similarity >= this.semanticThreshold) {
            return passed(`Semantic similarity: ${formatPercent(similarity)}`, { similarityScore: similarity });
          }
          return failed(
            `Semantic similarity ${formatPercent(similarity)} below threshold ${formatPercent(this.semanticThreshold)}`,
            { similarityScore: similarity }
          );
        }

        case ComparisonType.PATTERN_MATCH: {
          let pattern: RegExp;
          try {
            pattern = new RegExp(left, 'i');
          } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            return failed(`Invalid regex pattern '${left}': ${reason}`);
          }
          return pattern.test(right)
            ? passed(`Pattern '${left}' matches text`)
            : failed(`Pattern '${left}' does not match text: '${right}'`);
        }

        default:
          throw new Error(`Unsupported comparison type for text: ${type}`);
      }
    });
  }

  compareLists(
    a: string[],
    b: string[],
    type: ComparisonType = ComparisonType.EXACT_TEXT,
    options: ListCompareOptions = {}
  ): ComparisonResult {
    return guard('list', this.logger, () => {
      switch (type) {
        case ComparisonType.EXACT_TEXT: {
          const left = a.map(normalizeText);
          const right = b.map(normalizeText);
          if (sameSequence(left, right)) {
            return passed(`Lists match exactly: ${left.length} items`);
          }
          if (options.partialMatch) {
            const similarity = jaccard(left, right);
            if (similarity >= this.fuzzyThreshold) {
              return passed(`Lists partially match: ${formatPercent(similarity)} similarity`, {
                similarityScore: similarity,
              });
            }
          }
          return failed(`List mismatch:\nLEGACY: ${JSON.stringify(left)}\nMODERN: ${JSON.stringify(right)}`, {
            details: listDelta(left, right),
          });
        }

        case ComparisonType.COUNT:
          return a.length === b.length
            ? passed(`List count matches: ${a.length}`)
            : failed(`List count differs: L=${a.length} M=${b.length}`);

        case ComparisonType.FUZZY_TEXT: {
          if (a.length !== b.length) {
            return failed(`List length differs: L=${a.length} M=${b.length}`);
          }
          let total = 0;
          a.forEach((item, i) => {
            total += sequenceRatio(normalizeText(item), normalizeText(b[i]));
          });
          const average = a.length > 0 ? total / a.length : 0;
          if (average >= this.fuzzyThreshold) {
            return passed(`Lists fuzzy match: ${formatPercent(average)} average similarity`, {
              similarityScore: average,
            });
          }
          return failed(`Lists fuzzy similarity ${formatPercent(average)} below threshold`, {
            similarityScore: average,
          });
        }

        default:
          throw new Error(`Unsupported comparison type for lists: ${type}`);
      }
    });
  }

  compareLinksMap(a: LinkEntry[], b: LinkEntry[], options: LinksCompareOptions = {}): ComparisonResult {
    return guard('links', this.logger, () => {
      const left = a.map(([text, href]): LinkEntry => [normalizeText(text), href]);
      const right = b.map(([text, href]): LinkEntry => [normalizeText(text), href]);

      if (options.fuzzyText) {
        if (left.length !== right.length) {
          return failed(`Link count differs: L=${left.length} M=${right.length}`);
        }
        let total = 0;
        left.forEach(([text, href], i) => {
          const [otherText, otherHref] = right[i];
          total += (sequenceRatio(text, otherText) + (href === otherHref ? 1 : 0)) / 2;
        });
        const average = left.length > 0 ? total / left.length : 0;
        if (average >= this.fuzzyThreshold) {
          return passed(`Links fuzzy match: ${formatPercent(average)} similarity`, { similarityScore: average });
        }
        return failed(`Links fuzzy similarity ${formatPercent(average)} below threshold`, {
          similarityScore: average,
        });
      }

      const leftKeys = left.map(linkKey);
      const rightKeys = right.map(linkKey);
      if (sameSequence(leftKeys, rightKeys)) {
        return passed(`Links match exactly: ${left.length} links`);
      }

      const { onlyInLegacy, onlyInModern } = listDelta(leftKeys, rightKeys);
      return failed(`Links differ: L=${left.length} M=${right.length}`, {
        details: {
          legacyCount: left.length,
          modernCount: right.length,
          onlyInLegacy,
          onlyInModern,
        },
      });
    });
  }

  /**
   * Passes when the relative difference is within `numericTolerance`.
   */
  compareNumeric(a: number, b: number, tolerance = this.numericTolerance): ComparisonResult {
    return guard('numeric', this.logger, () => {
      const scale = Math.max(Math.abs(a), Math.abs(b));
      const delta = scale === 0 ? 0 : Math.abs(a - b) / scale;
      if (delta <= tolerance) {
        return passed(`Numbers within tolerance: L=${a} M=${b}`, { similarityScore: 1 - delta });
      }
      return failed(`Numbers differ by ${formatPercent(delta)}: L=${a} M=${b}`, { similarityScore: 1 - delta });
    });
  }

  /**
   * Weighted average of per-aspect scores. Each aspect scores its similarity
   * when the strategy yields one, else 1 or 0 for pass or fail.
   */
  compareWithWeights(aspects: WeightedAspect[]): ComparisonResult {
    return guard('weighted', this.logger, () => {
      let totalWeight = 0;
      let weighted = 0;
      const details: Record<string, unknown> = {};

      for (const [legacy, modern, weight, description] of aspects) {
        const result =
          typeof legacy === 'string' && typeof modern === 'string'
            ? this.compareText(legacy, modern)
            : this.compareLists(toList(legacy), toList(modern));
        const score = result.similarityScore ?? (result.success ? 1 : 0);
        totalWeight += weight;
        weighted += score * weight;
        details[description] = { success: result.success, score, weight };
      }

      if (totalWeight === 0) {
        return failed('No valid comparisons provided');
      }

      const finalScore = weighted / totalWeight;
      const message = `Weighted comparison score: ${formatPercent(finalScore)}`;
      return finalScore >= this.fuzzyThreshold
        ? passed(message, { similarityScore: finalScore, details })
        : failed(message, { similarityScore: finalScore, details });
    });
  }
}

function wordSet(text: string): Set<string> {
  return new Set(text.toLowerCase().split(' ').filter(Boolean));
}

function sameSequence(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((item, i) => item === b[i]);
}

function listDelta(a: string[], b: string[]): { onlyInLegacy: string[]; onlyInModern: string[] } {
  const setA = new Set(a);
  const setB = new Set(b);
  return {
    onlyInLegacy: [...setA].filter((item) => !setB.has(item)),
    onlyInModern: [...setB].filter((item) => !setA.has(item)),
  };
}

function linkKey([text, href]: LinkEntry): string {
  return `${text} -> ${href}`;
}

function toList(value: string | string[]): string[] {
  return typeof value === 'string' ? [value] : value;
}
