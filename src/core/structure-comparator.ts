/**
 * Structure Comparator
 *
 * Compares the structured data collected per page category (tables, forms,
 * meta tags, accessibility counters, widgets, ...). Every method yields a
 * single verdict whose message lists each differing field on its own line.
 */

import type {
  AccessibilityCounts,
  AccordionState,
  ComparisonResult,
  CountProfile,
  FormSummary,
  FrameContent,
  I18nInfo,
  IframeReport,
  ImagePreview,
  ItemCounts,
  LinkEntry,
  ListStructure,
  MetaTags,
  OrderedPage,
  OrderedTexts,
  PageArchitecture,
  PaginationState,
  PerformanceTimings,
  RolePair,
  TablePreview,
  TabState,
  ThemePalette,
  WidgetTexts,
} from './types.js';
import { failed, fromDifferences, guard, passed } from './result.js';
import { normalizeText } from './text-comparator.js';
import { formatPercent, sequenceRatio } from './text-similarity.js';
import { silentLogger, type Logger } from './logger.js';

const EXACT_META_KEYS = ['title', 'robots', 'canonical', 'og_title'] as const;
const DEFAULT_FUZZY_META_KEYS = ['description', 'og_description'];
const PAGINATION_KEYS = ['current', 'total', 'has_next', 'has_prev'] as const;
const WIDGET_KEYS = ['toasts', 'dialogs', 'tooltips'] as const;
const TIMING_KEYS = ['domContentLoaded', 'loadEventEnd'] as const;
const LIST_SUMMARY_KEYS = ['total_ul', 'total_ol', 'total_li', 'total_nested_lists'] as const;

const ARCHITECTURE_COUNT_KEYS = [
  'total_elements',
  'divs',
  'spans',
  'paragraphs',
  'sections',
  'articles',
  'asides',
  'lists',
  'list_items',
  'forms',
  'tables',
  'images',
  'links',
  'buttons',
  'inputs',
  'selects',
  'textareas',
  'iframes',
  'scripts',
  'styles',
  'meta_tags',
  'title_tags',
  'headings',
  'landmarks',
];
const ARCHITECTURE_RATIO_KEYS = ['element_density', 'semantic_ratio', 'interactive_ratio'];
const ARCHITECTURE_RATIO_TOLERANCE = 0.1;

const THEME_KEYS = ['background_colors', 'text_colors', 'accent_colors', 'css_variables'] as const;

/** Kinds compared by comparePageOrder, after the title. */
const PAGE_ORDER_KEYS = ['headings', 'buttons', 'links', 'nav_links', 'form_elements', 'images'];

/** Iframe element totals may drift by this much before failing. */
const IFRAME_ELEMENT_TOLERANCE = 5;

export interface StructureComparatorOptions {
  fuzzyThreshold?: number;
  logger?: Logger;
}

export class StructureComparator {
  readonly fuzzyThreshold: number;
  private logger: Logger;

  constructor(options: StructureComparatorOptions = {}) {
    this.fuzzyThreshold = options.fuzzyThreshold ?? 0.9;
    this.logger = options.logger ?? silentLogger;
  }

  compareTable(a: TablePreview, b: TablePreview): ComparisonResult {
    return guard('table structure', this.logger, () => {
      const differences: string[] = [];
      const aHeaders = a.headers.map(normalizeText);
      const bHeaders = b.headers.map(normalizeText);
      if (JSON.stringify(aHeaders) !== JSON.stringify(bHeaders)) {
        differences.push(`Headers: L=${JSON.stringify(aHeaders)} M=${JSON.stringify(bHeaders)}`);
      }

      const aRows = a.rows.map((row) => row.map(normalizeText));
      const bRows = b.rows.map((row) => row.map(normalizeText));
      if (aRows.length !== bRows.length) {
        differences.push(`Row count: L=${aRows.length} M=${bRows.length}`);
      }
      const shared = Math.min(aRows.length, bRows.length);
      for (let i = 0; i < shared; i++) {
        if (JSON.stringify(aRows[i]) !== JSON.stringify(bRows[i])) {
          differences.push(`Row[${i}]: L=${JSON.stringify(aRows[i])} M=${JSON.stringify(bRows[i])}`);
        }
      }

      return fromDifferences(
        'Table structure',
        differences,
        `Table structure matches: ${aHeaders.length} columns, ${aRows.length} rows`
      );
    });
  }

  compareForm(a: FormSummary, b: FormSummary): ComparisonResult {
    return guard('form structure', this.logger, () => {
      const differences: string[] = [];
      if (a.inputs.length !== b.inputs.length) {
        differences.push(`Input count: L=${a.inputs.length} M=${b.inputs.length}`);
      }

      a.inputs.slice(0, b.inputs.length).forEach((left, i) => {
        const right = b.inputs[i];
        for (const field of ['name', 'type', 'label', 'required', 'placeholder'] as const) {
          const lv = String(left[field]);
          const rv = String(right[field]);
          if (lv !== rv) {
            differences.push(`Input[${i}] ${field}: L='${lv}' M='${rv}'`);
          }
        }
      });

      return fromDifferences('Form structure', differences, `Form structure matches: ${a.inputs.length} inputs`);
    });
  }

  /**
   * Title, robots, canonical and og_title compare exactly; descriptive keys
   * compare by sequence ratio against the fuzzy threshold.
   */
  compareMeta(a: MetaTags, b: MetaTags, fuzzyKeys: string[] = DEFAULT_FUZZY_META_KEYS): ComparisonResult {
    return guard('meta structure', this.logger, () => {
      const differences: string[] = [];

      for (const key of EXACT_META_KEYS) {
        const lv = normalizeText(a[key]);
        const rv = normalizeText(b[key]);
        if (lv !== rv) differences.push(`Meta ${key}: L='${lv}' M='${rv}'`);
      }

      for (const key of fuzzyKeys) {
        const lv = normalizeText(a[key]);
        const rv = normalizeText(b[key]);
        const similarity = sequenceRatio(lv, rv);
        if (similarity < this.fuzzyThreshold) {
          differences.push(`Meta ${key} similarity ${formatPercent(similarity)}: L='${lv}' M='${rv}'`);
        }
      }

      return fromDifferences('Meta structure', differences, 'Meta structure matches');
    });
  }

  /**
   * Counters track problems, so a higher modern count is a regression and a
   * lower one an improvement. Keys only present in modern compare against 0.
   */
  compareAccessibility(a: AccessibilityCounts, b: AccessibilityCounts): ComparisonResult {
    return guard('accessibility', this.logger, () => {
      const regressions: string[] = [];
      const improvements: string[] = [];
      const keys = new Set([...Object.keys(a), ...Object.keys(b)]);

      for (const key of keys) {
        const lv = a[key] ?? 0;
        const rv = b[key] ?? 0;
        if (rv > lv) regressions.push(`${key}: ${lv}→${rv}`);
        else if (rv < lv) improvements.push(`${key}: ${lv}→${rv}`);
      }

      if (regressions.length > 0) {
        return failed(`Accessibility regressions: ${regressions.join(', ')}`, {
          details: { regressions, improvements },
        });
      }
      if (improvements.length > 0) {
        return passed(`Accessibility improvements: ${improvements.join(', ')}`, { details: { improvements } });
      }
      return passed('Accessibility metrics unchanged');
    });
  }

  compareTabs(a: TabState[], b: TabState[]): ComparisonResult {
    return guard('tabs', this.logger, () =>
      this.compareStates(
        'Tabs',
        a.map((t) => stateKey(t.label, t.selected)),
        b.map((t) => stateKey(t.label, t.selected))
      )
    );
  }

  compareAccordions(a: AccordionState[], b: AccordionState[]): ComparisonResult {
    return guard('accordions', this.logger, () =>
      this.compareStates(
        'Accordions',
        a.map((t) => stateKey(t.text, t.expanded)),
        b.map((t) => stateKey(t.text, t.expanded))
      )
    );
  }

  private compareStates(subject: string, a: string[], b: string[]): ComparisonResult {
    const differences: string[] = [];
    const length = Math.max(a.length, b.length);
    for (let i = 0; i < length; i++) {
      if (a[i] !== b[i]) {
        differences.push(`[${i}]: L=${a[i] ?? '(none)'} M=${b[i] ?? '(none)'}`);
      }
    }
    return fromDifferences(`${subject} structure`, differences, `${subject} structure matches: ${a.length} elements`);
  }

  /** Keys missing on one side read as false. */
  compareBooleans(a: Record<string, boolean>, b: Record<string, boolean>): ComparisonResult {
    return guard('boolean structure', this.logger, () => {
      const differences: string[] = [];
      for (const key of unionKeys(a, b)) {
        const lv = Boolean(a[key]);
        const rv = Boolean(b[key]);
        if (lv !== rv) differences.push(`${key}: L=${lv} M=${rv}`);
      }
      return fromDifferences('Boolean structure', differences, 'Boolean structure matches');
    });
  }

  comparePagination(a: PaginationState, b: PaginationState): ComparisonResult {
    return guard('pagination', this.logger, () => {
      const differences: string[] = [];
      for (const key of PAGINATION_KEYS) {
        if (String(a[key]) !== String(b[key])) {
          differences.push(`Pagination ${key}: L='${a[key]}' M='${b[key]}'`);
        }
      }
      return fromDifferences('Pagination', differences, 'Pagination structure matches');
    });
  }

  compareWidgets(a: WidgetTexts, b: WidgetTexts): ComparisonResult {
    return guard('widgets', this.logger, () => {
      const differences: string[] = [];
      for (const key of WIDGET_KEYS) {
        const lv = a[key].map(normalizeText);
        const rv = b[key].map(normalizeText);
        if (JSON.stringify(lv) !== JSON.stringify(rv)) {
          differences.push(`Widgets ${key}: L=${JSON.stringify(lv)} M=${JSON.stringify(rv)}`);
        }
      }
      return fromDifferences('Widgets', differences, 'Widgets structure matches');
    });
  }

  compareImages(a: ImagePreview[], b: ImagePreview[], maxCompare = 10): ComparisonResult {
    return guard('images', this.logger, () => {
      const left = a.slice(0, maxCompare);
      const right = b.slice(0, maxCompare);
      const differences: string[] = [];
      if (left.length !== right.length) {
        differences.push(`Image count: L=${left.length} M=${right.length}`);
      }

      left.slice(0, right.length).forEach((image, i) => {
        for (const key of ['alt', 'loading'] as const) {
          if (normalizeText(image[key]) !== normalizeText(right[i][key])) {
            differences.push(`Image[${i}] ${key}: L='${image[key]}' M='${right[i][key]}'`);
          }
        }
      });
      return fromDifferences('Images', differences, `Images structure matches: ${left.length} images`);
    });
  }

  compareRoles(a: RolePair[], b: RolePair[], maxCompare = 50): ComparisonResult {
    return guard('interactive roles', this.logger, () => {
      const left = a.slice(0, maxCompare).map(([role, name]) => `${role}:${normalizeText(name)}`);
      const right = b.slice(0, maxCompare).map(([role, name]) => `${role}:${normalizeText(name)}`);
      if (JSON.stringify(left) === JSON.stringify(right)) {
        return passed(`Interactive roles match: ${left.length} roles`);
      }
      return failed(`Interactive roles differ:\nLEGACY: ${JSON.stringify(left)}\nMODERN: ${JSON.stringify(right)}`);
    });
  }

  /** Language compares case-insensitively; text direction is reported but not required. */
  compareI18n(a: I18nInfo, b: I18nInfo): ComparisonResult {
    return guard('i18n', this.logger, () => {
      const differences: string[] = [];
      if (a.lang.toLowerCase() !== b.lang.toLowerCase()) {
        differences.push(`i18n lang: L='${a.lang}' M='${b.lang}'`);
      }
      return fromDifferences('i18n', differences, 'i18n structure matches', { legacyDir: a.dir, modernDir: b.dir });
    });
  }

  comparePerformance(a: PerformanceTimings, b: PerformanceTimings, toleranceMs = 500): ComparisonResult {
    return guard('performance', this.logger, () => {
      const differences: string[] = [];
      for (const key of TIMING_KEYS) {
        const diff = Math.abs(a[key] - b[key]);
        if (diff > toleranceMs) {
          differences.push(`${key}: L=${a[key].toFixed(0)}ms M=${b[key].toFixed(0)}ms (diff=${diff.toFixed(0)}ms)`);
        }
      }
      return fromDifferences(`Performance (tolerance ${toleranceMs}ms)`, differences, 'Performance metrics within tolerance');
    });
  }

  compareListStructure(a: ListStructure, b: ListStructure): ComparisonResult {
    return guard('list structure', this.logger, () => {
      const differences: string[] = [];
      for (const key of LIST_SUMMARY_KEYS) {
        if (a.summary[key] !== b.summary[key]) {
          differences.push(`List summary ${key}: L=${a.summary[key]} M=${b.summary[key]}`);
        }
      }
      if (a.lists.length !== b.lists.length) {
        differences.push(`Number of lists: L=${a.lists.length} M=${b.lists.length}`);
      }
      return fromDifferences('List structure', differences, 'List structure matches');
    });
  }

  /**
   * Element counts must be equal; ratio keys tolerate an absolute drift of 0.1.
   */
  comparePageArchitecture(a: PageArchitecture, b: PageArchitecture): ComparisonResult {
    return guard('page architecture', this.logger, () => {
      const differences: string[] = [];
      for (const key of ARCHITECTURE_COUNT_KEYS) {
        const lv = a[key] ?? 0;
        const rv = b[key] ?? 0;
        if (lv !== rv) differences.push(`Architecture ${key}: L=${lv} M=${rv}`);
      }
      for (const key of ARCHITECTURE_RATIO_KEYS) {
        const lv = a[key] ?? 0;
        const rv = b[key] ?? 0;
        if (Math.abs(lv - rv) > ARCHITECTURE_RATIO_TOLERANCE) {
          differences.push(`Architecture ratio ${key}: L=${lv.toFixed(3)} M=${rv.toFixed(3)}`);
        }
      }
      return fromDifferences('Page architecture', differences, 'Page architecture matches');
    });
  }

  /**
   * One line per kind whose count differs. `keys` restricts and orders the
   * kinds; without it every kind seen on either side is compared, sorted.
   */
  compareCounts(subject: string, a: CountProfile, b: CountProfile, keys?: readonly string[]): ComparisonResult {
    return guard(subject.toLowerCase(), this.logger, () => {
      const differences: string[] = [];
      for (const key of keys ?? unionKeys(a, b)) {
        const lv = a[key] ?? 0;
        const rv = b[key] ?? 0;
        if (lv !== rv) differences.push(`${key}: L=${lv} M=${rv}`);
      }
      return fromDifferences(subject, differences, `${subject} matches`);
    });
  }

  /** Number of lists, then the item count of every list both sides have. */
  compareItemCounts(subject: string, a: ItemCounts, b: ItemCounts): ComparisonResult {
    return guard(subject.toLowerCase(), this.logger, () => {
      const differences: string[] = [];
      if (a.length !== b.length) {
        differences.push(`Count: L=${a.length} M=${b.length}`);
      }
      const shared = Math.min(a.length, b.length);
      for (let i = 0; i < shared; i++) {
        if (a[i] !== b[i]) differences.push(`[${i}] items: L=${a[i]} M=${b[i]}`);
      }
      return fromDifferences(subject, differences, `${subject}: ${a.length} found, item counts match`);
    });
  }

  compareOrderedTexts(subject: string, a: OrderedTexts, b: OrderedTexts, keys?: readonly string[]): ComparisonResult {
    return guard(subject.toLowerCase(), this.logger, () =>
      fromDifferences(subject, orderedDifferences(a, b, keys ?? unionKeys(a, b)), `${subject} match`)
    );
  }

  /** Title, then the main element kinds in document order. */
  comparePageOrder(a: OrderedPage, b: OrderedPage): ComparisonResult {
    return guard('ordered page structure', this.logger, () => {
      const differences: string[] = [];
      if (normalizeText(a.title) !== normalizeText(b.title)) {
        differences.push(`title: L='${normalizeText(a.title)}' M='${normalizeText(b.title)}'`);
      }
      differences.push(...orderedDifferences(a.elements, b.elements, PAGE_ORDER_KEYS));
      return fromDifferences('Ordered page structure', differences, 'Ordered page structure matches');
    });
  }

  /** Element counts of the page; unlike comparePageArchitecture, no ratios. */
  comparePageStructure(a: PageArchitecture, b: PageArchitecture): ComparisonResult {
    return this.compareCounts('Page structure', a, b, ARCHITECTURE_COUNT_KEYS);
  }

  /** Colour values compare as sets. */
  compareTheme(a: ThemePalette, b: ThemePalette): ComparisonResult {
    return guard('theme', this.logger, () => {
      const differences: string[] = [];
      for (const key of THEME_KEYS) {
        const lv = [...new Set(a[key])].sort();
        const rv = [...new Set(b[key])].sort();
        if (JSON.stringify(lv) !== JSON.stringify(rv)) {
          differences.push(`Theme ${key}: L=${JSON.stringify(lv)} M=${JSON.stringify(rv)}`);
        }
      }
      return fromDifferences('Theme', differences, 'Theme matches');
    });
  }

  compareIframes(a: IframeReport, b: IframeReport): ComparisonResult {
    return guard('iframe content', this.logger, () => {
      const differences = frameDifferences('Main', a.main, b.main);

      if (a.summary.total_iframes !== b.summary.total_iframes) {
        differences.push(`Iframe count: L=${a.summary.total_iframes} M=${b.summary.total_iframes}`);
      }
      if (a.summary.accessible_iframes !== b.summary.accessible_iframes) {
        differences.push(`Accessible iframes: L=${a.summary.accessible_iframes} M=${b.summary.accessible_iframes}`);
      }
      const drift = Math.abs(a.summary.total_elements - b.summary.total_elements);
      if (drift > IFRAME_ELEMENT_TOLERANCE) {
        differences.push(`Iframe elements: L=${a.summary.total_elements} M=${b.summary.total_elements}`);
      }

      return fromDifferences('Iframe content', differences, `Iframe content matches: ${a.summary.total_iframes} iframes`, {
        legacySummary: a.summary,
        modernSummary: b.summary,
      });
    });
  }
}

function unionKeys(a: object, b: object): string[] {
  return [...new Set([...Object.keys(a), ...Object.keys(b)])].sort();
}

/** Count first; with equal counts, the first position whose text differs. */
function orderedDifferences(a: OrderedTexts, b: OrderedTexts, keys: readonly string[]): string[] {
  const differences: string[] = [];
  for (const key of keys) {
    const lv = (a[key] ?? []).map(normalizeText);
    const rv = (b[key] ?? []).map(normalizeText);
    if (lv.length !== rv.length) {
      differences.push(`${key} count: L=${lv.length} M=${rv.length}`);
      continue;
    }
    const at = lv.findIndex((text, i) => text !== rv[i]);
    if (at !== -1) differences.push(`${key}[${at}]: L='${lv[at]}' M='${rv[at]}'`);
  }
  return differences;
}

function stateKey(text: string, flag: boolean): string {
  return `${normalizeText(text)}(${flag ? 'on' : 'off'})`;
}

function frameDifferences(scope: string, a: FrameContent, b: FrameContent): string[] {
  const differences: string[] = [];
  if (normalizeText(a.title) !== normalizeText(b.title)) {
    differences.push(`${scope} title: L='${normalizeText(a.title)}' M='${normalizeText(b.title)}'`);
  }
  for (const key of ['headings', 'buttons'] as const) {
    const lv = a[key].map(normalizeText);
    const rv = b[key].map(normalizeText);
    if (JSON.stringify(lv) !== JSON.stringify(rv)) {
      differences.push(`${scope} ${key}: L=${JSON.stringify(lv)} M=${JSON.stringify(rv)}`);
    }
  }
  const linkKeys = (links: LinkEntry[]) => links.map(([text, href]) => `${normalizeText(text)} -> ${href}`);
  if (JSON.stringify(linkKeys(a.links)) !== JSON.stringify(linkKeys(b.links))) {
    differences.push(`${scope} links: L=${a.links.length} M=${b.links.length}`);
  }
  return differences;
}
