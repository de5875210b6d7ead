/**
 * Comparison Engine
 *
 * Runs every comparison category against a legacy/modern page pair:
 * 1. Basic content (title, headings, navigation, buttons, body text)
 * 2. Extended content (links, forms, tables, meta tags)
 * 3. Modern features (accessibility, widgets, landmarks, i18n, timings, ...)
 * 4. Structure (lists, page architecture)
 * 5. Navigation, breadcrumb and feature lists
 * 6. Semantic HTML content, interactive elements
 * 7. Form structure and details
 * 8. Progress indicators and graphics
 * 9. Advanced widgets (carousels, search, notifications, loading, social, media)
 * 10. Framework traces (data attributes, custom elements, analytics, errors, theme)
 * 11. Whole-page order and structure
 * 12. Iframe-aware content
 * 13. Semantic field equivalence (forms, navigation, actions, data display)
 *
 * Each check collects legacy then modern, compares, and records one outcome.
 * Failures of a single check never stop the run.
 */

import { performance } from 'node:perf_hooks';
import {
  ComparisonType,
  emptyTally,
  type ComparisonResult,
  type Driver,
  type FieldComparisonVerdict,
  type FieldPriority,
  type RunTally,
  type SemanticComparison,
  type SemanticOutcome,
} from './types.js';
import type { Settings } from '../config/settings.js';
import { CollectionContext } from './collection-context.js';
import { DomCollector } from './dom-collector.js';
import { ElementLocator } from './element-locator.js';
import { SemanticFieldComparator } from './semantic-field-comparator.js';
import { StructureComparator } from './structure-comparator.js';
import { TextComparator } from './text-comparator.js';
import { failed, passed } from './result.js';
import { errorMessage, silentLogger, type Logger } from './logger.js';

/** `setup` covers navigation and page preparation done before any check. */
export type CheckGroup =
  | 'setup'
  | 'basic'
  | 'extended'
  | 'modern'
  | 'structure'
  | 'lists'
  | 'content'
  | 'forms'
  | 'graphics'
  | 'advanced'
  | 'framework'
  | 'page'
  | 'iframe'
  | 'semantic';

export const CHECK_GROUPS: readonly CheckGroup[] = [
  'basic',
  'extended',
  'modern',
  'structure',
  'lists',
  'content',
  'forms',
  'graphics',
  'advanced',
  'framework',
  'page',
  'iframe',
  'semantic',
];

export type CheckStatus = 'passed' | 'failed' | 'skipped' | 'error';

export interface CheckOutcome {
  name: string;
  group: CheckGroup;
  status: CheckStatus;
  result?: ComparisonResult;
  /** Set for semantic checks that produced verdicts. */
  semantic?: SemanticComparison<FieldComparisonVerdict>;
  /** Why a check was skipped, or the error text. */
  reason?: string;
  collectMs?: number;
  compareMs?: number;
}

/** One side of a comparison: the driver and its per-run collector bookkeeping. */
export interface PageSide {
  driver: Driver;
  context: CollectionContext;
}

export interface PagePair {
  legacy: PageSide;
  modern: PageSide;
}

export function pagePair(legacy: Driver, modern: Driver, legacyUrl: string, modernUrl: string): PagePair {
  return {
    legacy: { driver: legacy, context: new CollectionContext('legacy', legacyUrl) },
    modern: { driver: modern, context: new CollectionContext('modern', modernUrl) },
  };
}

/**
 * Outcome accumulator for one run.
 */
export class RunRecorder {
  readonly tally: RunTally = emptyTally();
  readonly outcomes: CheckOutcome[] = [];

  record(outcome: CheckOutcome): void {
    this.outcomes.push(outcome);
    switch (outcome.status) {
      case 'passed':
        this.tally.passed++;
        break;
      case 'failed':
        this.tally.failed++;
        break;
      case 'skipped':
        this.tally.skipped++;
        break;
      case 'error':
        this.tally.errors++;
        break;
    }
  }
}

type Collect<T> = (driver: Driver, ctx: CollectionContext) => Promise<T>;
type Compare<T> = (legacy: T, modern: T) => ComparisonResult;

interface CategoryCheck {
  name: string;
  group: CheckGroup;
  /** Settings flag that must also be on, besides `checks[name]`. */
  enabled?: () => boolean;
  run(pages: PagePair): Promise<CheckOutcome>;
}

const PRIORITY_RANK: Record<FieldPriority, number> = { high: 0, medium: 1, low: 2 };

export interface ComparisonEngineOptions {
  settings: Settings;
  logger?: Logger;
  collector?: DomCollector;
  locator?: ElementLocator;
}

export class ComparisonEngine {
  readonly settings: Settings;
  private logger: Logger;
  private collector: DomCollector;
  private text: TextComparator;
  private structure: StructureComparator;
  private semantic: SemanticFieldComparator;
  private checks: CategoryCheck[];

  constructor(options: ComparisonEngineOptions) {
    const { settings } = options;
    this.settings = settings;
    this.logger = options.logger ?? silentLogger;
    this.collector = options.collector ?? new DomCollector({ logger: this.logger.child('collect') });
    this.text = new TextComparator({
      fuzzyThreshold: settings.fuzzy_threshold,
      semanticThreshold: settings.semantic_threshold,
      numericTolerance: settings.numeric_tolerance,
      logger: this.logger,
    });
    this.structure = new StructureComparator({ fuzzyThreshold: settings.fuzzy_threshold, logger: this.logger });
    this.semantic = new SemanticFieldComparator({
      fieldMappings: settings.field_mappings,
      semanticRules: settings.semantic_rules,
      settings: settings.comparison_settings,
      locator: options.locator ?? new ElementLocator(this.logger.child('locate')),
      logger: this.logger.child('semantic'),
    });
    this.checks = this.buildChecks();
  }

  /** A category runs unless `checks` turns it off. */
  isEnabled(name: string): boolean {
    return this.settings.checks[name] !== false;
  }

  /** Names of every check, in run order. */
  checkNames(group?: CheckGroup): string[] {
    return this.checks.filter((check) => !group || check.group === group).map((check) => check.name);
  }

  async runGroup(group: CheckGroup, pages: PagePair, recorder: RunRecorder): Promise<void> {
    this.logger.info(`Running ${group} checks`);
    for (const check of this.checks) {
      if (check.group !== group) continue;
      if (!this.isEnabled(check.name) || (check.enabled && !check.enabled())) {
        this.logger.debug(`${check.name}: disabled`);
        recorder.record({ name: check.name, group, status: 'skipped', reason: 'Disabled in settings' });
        continue;
      }
      recorder.record(await check.run(pages));
    }
  }

  async runAll(pages: PagePair, recorder = new RunRecorder()): Promise<RunRecorder> {
    for (const group of CHECK_GROUPS) {
      await this.runGroup(group, pages, recorder);
    }
    this.logger.debug(`legacy collected: ${JSON.stringify(pages.legacy.context.summary())}`);
    this.logger.debug(`modern collected: ${JSON.stringify(pages.modern.context.summary())}`);
    return recorder;
  }

  /**
   * Collects from legacy, then modern, and compares the two values.
   * A collector or comparator exception becomes an `error` outcome.
   */
  async collectAndCompare<T>(
    name: string,
    group: CheckGroup,
    pages: PagePair,
    collect: Collect<T>,
    compare: Compare<T>
  ): Promise<CheckOutcome> {
    try {
      const collectStart = performance.now();
      const legacy = await collect(pages.legacy.driver, pages.legacy.context);
      const modern = await collect(pages.modern.driver, pages.modern.context);
      const collectMs = performance.now() - collectStart;

      const compareStart = performance.now();
      const result = compare(legacy, modern);
      const compareMs = performance.now() - compareStart;

      this.logger.debug(`${name}: collected in ${collectMs.toFixed(1)}ms, compared in ${compareMs.toFixed(1)}ms`);
      this.logResult(name, result);
      return { name, group, status: result.success ? 'passed' : 'failed', result, collectMs, compareMs };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`${name}: ${message}`);
      return { name, group, status: 'error', reason: message };
    }
  }

  private logResult(name: string, result: ComparisonResult): void {
    const score = result.similarityScore !== null ? ` (score ${result.similarityScore.toFixed(3)})` : '';
    if (result.success) {
      this.logger.info(`PASS ${name}: ${result.message}${score}`);
    } else {
      this.logger.warn(`FAIL ${name}: ${result.message}${score}`);
    }
  }

  private check<T>(
    name: string,
    group: CheckGroup,
    collect: Collect<T>,
    compare: Compare<T>,
    enabled?: () => boolean
  ): CategoryCheck {
    return { name, group, enabled, run: (pages) => this.collectAndCompare(name, group, pages, collect, compare) };
  }

  private buildChecks(): CategoryCheck[] {
    const c = this.collector;
    const text = this.text;
    const structure = this.structure;
    const settings = this.settings;

    return [
      this.check('title', 'basic', c.pageTitle, (a, b) => text.compareText(a, b)),
      this.check('primary_h1', 'basic', c.primaryH1, (a, b) => text.compareText(a, b)),
      this.check('headings', 'basic', c.headingTexts, (a, b) => text.compareLists(a, b)),
      this.check('nav_links', 'basic', c.navLinkTexts, (a, b) =>
        text.compareLists(a, b, ComparisonType.EXACT_TEXT, { partialMatch: true })
      ),
      this.check('buttons', 'basic', c.buttonTexts, (a, b) =>
        text.compareLists(a, b, ComparisonType.EXACT_TEXT, { partialMatch: true })
      ),
      this.check(
        'body_text',
        'basic',
        c.bodyText,
        (a, b) => text.compareText(a, b, ComparisonType.FUZZY_TEXT),
        () => settings.auto_collect_body_similarity
      ),

      this.check('links', 'extended', c.linksMap, (a, b) => text.compareLinksMap(a, b)),
      this.check('forms', 'extended', c.formSummary, (a, b) => structure.compareForm(a, b)),
      this.check('tables', 'extended', c.tablePreview, (a, b) => structure.compareTable(a, b)),
      this.check('meta', 'extended', c.meta, (a, b) => structure.compareMeta(a, b)),

      this.check('accessibility', 'modern', c.accessibility, (a, b) => structure.compareAccessibility(a, b)),
      this.check('breadcrumbs', 'modern', c.breadcrumbs, (a, b) => text.compareLists(a, b)),
      this.check('tabs', 'modern', c.tabs, (a, b) => structure.compareTabs(a, b)),
      this.check('accordions', 'modern', c.accordions, (a, b) => structure.compareAccordions(a, b)),
      this.check('pagination', 'modern', c.pagination, (a, b) => structure.comparePagination(a, b)),
      this.check('widgets', 'modern', c.widgets, (a, b) => structure.compareWidgets(a, b)),
      this.check('images', 'modern', c.images, (a, b) => structure.compareImages(a, b)),
      this.check('landmarks', 'modern', c.landmarks, (a, b) => structure.compareBooleans(a, b)),
      this.check('interactive_roles', 'modern', c.interactiveRoles, (a, b) => structure.compareRoles(a, b)),
      this.check('i18n', 'modern', c.i18n, (a, b) => structure.compareI18n(a, b)),
      this.check('performance', 'modern', c.performance, (a, b) =>
        structure.comparePerformance(a, b, settings.performance_tolerance_ms)
      ),

      this.check('list_structure', 'structure', c.listStructure, (a, b) => structure.compareListStructure(a, b)),
      this.check('page_architecture', 'structure', c.pageArchitecture, (a, b) =>
        structure.comparePageArchitecture(a, b)
      ),

      this.check('navigation_lists', 'lists', c.navigationLists, (a, b) =>
        structure.compareItemCounts('Navigation lists', a, b)
      ),
      this.check('breadcrumb_lists', 'lists', c.breadcrumbLists, (a, b) =>
        structure.compareItemCounts('Breadcrumb lists', a, b)
      ),
      this.check('feature_lists', 'lists', c.featureLists, (a, b) => structure.compareItemCounts('Feature lists', a, b)),

      this.check('semantic_content', 'content', c.semanticContent, (a, b) =>
        structure.compareCounts('Semantic content', a, b)
      ),
      this.check('semantic_elements', 'content', c.semanticElements, (a, b) =>
        structure.compareOrderedTexts('Semantic elements', a, b)
      ),
      this.check('interactive_elements', 'content', c.interactiveElements, (a, b) =>
        structure.compareCounts('Interactive elements', a, b)
      ),

      this.check('form_structure', 'forms', c.formStructure, (a, b) => structure.compareCounts('Form structure', a, b)),
      this.check('form_details', 'forms', c.formDetails, (a, b) => structure.compareCounts('Form details', a, b)),

      this.check('progress_indicators', 'graphics', c.progressIndicators, (a, b) =>
        structure.compareCounts('Progress indicators', a, b)
      ),
      this.check('graphics_elements', 'graphics', c.graphicsElements, (a, b) =>
        structure.compareCounts('Graphics elements', a, b)
      ),

      this.check('carousels', 'advanced', c.carousels, (a, b) => structure.compareItemCounts('Carousels', a, b)),
      this.check('search', 'advanced', c.search, (a, b) => structure.compareCounts('Search', a, b)),
      this.check('notifications', 'advanced', c.notifications, (a, b) => structure.compareCounts('Notifications', a, b)),
      this.check('loading_states', 'advanced', c.loadingStates, (a, b) => structure.compareCounts('Loading states', a, b)),
      this.check('social_media', 'advanced', c.socialMedia, (a, b) => structure.compareCounts('Social media', a, b)),
      this.check('media_elements', 'advanced', c.mediaElements, (a, b) => structure.compareCounts('Media elements', a, b)),

      this.check('data_attributes', 'framework', c.dataAttributes, (a, b) =>
        structure.compareCounts('Data attributes', a, b)
      ),
      this.check('custom_elements', 'framework', c.customElements, (a, b) => text.compareLists(a, b)),
      this.check('analytics', 'framework', c.analytics, (a, b) => structure.compareBooleans(a, b)),
      this.check('error_states', 'framework', c.errorStates, (a, b) => structure.compareCounts('Error states', a, b)),
      this.check('theme_colors', 'framework', c.themeColors, (a, b) => structure.compareTheme(a, b)),

      this.check('page_structure_ordered', 'page', c.orderedPage, (a, b) => structure.comparePageOrder(a, b)),
      this.check('page_elements_ordered', 'page', c.orderedPage, (a, b) =>
        structure.compareOrderedTexts('Ordered page elements', a.elements, b.elements)
      ),
      this.check('page_structure', 'page', c.pageArchitecture, (a, b) => structure.comparePageStructure(a, b)),

      this.check('iframes', 'iframe', c.iframeReport, (a, b) => structure.compareIframes(a, b)),

      ...this.settings.semantic_form_types.map((formType) =>
        this.semanticCheck(`semantic_forms.${formType}`, 'semantic_forms', (pages) =>
          this.semantic.compareFormFields(pages.legacy.driver, pages.modern.driver, formType)
        )
      ),
      this.semanticCheck('semantic_navigation', 'semantic_navigation', (pages) =>
        this.semantic.compareNavigationElements(pages.legacy.driver, pages.modern.driver)
      ),
      this.semanticCheck('semantic_actions', 'semantic_actions', (pages) =>
        this.semantic.compareActionButtons(pages.legacy.driver, pages.modern.driver)
      ),
      this.semanticCheck('semantic_data_display', 'semantic_data_display', (pages) =>
        this.semantic.compareDataDisplayElements(pages.legacy.driver, pages.modern.driver)
      ),
    ];
  }

  /**
   * Semantic checks are gated by their section switch (`semantic_forms`, ...).
   * An unmapped section is skipped rather than failed.
   */
  private semanticCheck<T extends FieldComparisonVerdict>(
    name: string,
    switchName: string,
    compare: (pages: PagePair) => Promise<SemanticOutcome<T>>
  ): CategoryCheck {
    return {
      name,
      group: 'semantic',
      enabled: () => this.isEnabled(switchName),
      run: async (pages) => {
        const start = performance.now();
        let outcome: SemanticOutcome<T>;
        try {
          outcome = await compare(pages);
        } catch (error) {
          const message = errorMessage(error);
          this.logger.error(`${name}: ${message}`);
          return { name, group: 'semantic', status: 'error', reason: message };
        }
        const compareMs = performance.now() - start;

        if (outcome.status === 'error') {
          this.logger.info(`SKIP ${name}: ${outcome.error}`);
          return { name, group: 'semantic', status: 'skipped', reason: outcome.error };
        }

        const result = semanticResult(outcome);
        this.logger.debug(`${name}: compared in ${compareMs.toFixed(1)}ms`);
        this.logResult(name, result);
        return {
          name,
          group: 'semantic',
          status: result.success ? 'passed' : 'failed',
          result,
          semantic: outcome,
          compareMs,
        };
      },
    };
  }
}

/** Verdicts ordered high → low priority, then by role name. */
export function orderedVerdicts<T extends FieldComparisonVerdict>(comparison: SemanticComparison<T>): T[] {
  return Object.values(comparison.verdicts).sort(
    (a, b) => PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] || a.role.localeCompare(b.role)
  );
}

function semanticResult<T extends FieldComparisonVerdict>(comparison: SemanticComparison<T>): ComparisonResult {
  const verdicts = orderedVerdicts(comparison);
  const details = { verdicts: comparison.verdicts, missing: comparison.missing, extra: comparison.extra };
  if (comparison.overallMatch) {
    return passed(`Semantic ${comparison.scope} fields match: ${verdicts.length} roles`, { details });
  }
  const mismatched = verdicts.filter((verdict) => !verdict.match).map((verdict) => `${verdict.role} (${verdict.priority})`);
  return failed(`Semantic ${comparison.scope} fields differ: ${mismatched.join(', ')}`, { details });
}
