/**
 * Semantic Field Comparator
 *
 * Decides whether regions of two structurally different applications
 * represent the same logical UI elements. Each mapped role is located on
 * both sides and judged on independent axes (count, properties or type,
 * label or text, structure); a role matches only when every axis passes.
 */

import type {
  ActionVerdict,
  DataDisplayVerdict,
  Driver,
  ElementHandle,
  FieldComparisonVerdict,
  FieldMapping,
  FieldMappings,
  FieldPriority,
  FormFieldVerdict,
  NavigationVerdict,
  SectionMapping,
  SelectorSpec,
  SemanticComparison,
  SemanticComparisonSettings,
  SemanticOutcome,
  SemanticRules,
  SemanticSection,
  TextMatchDetail,
} from './types.js';
import { ElementLocator } from './element-locator.js';
import { actionType, fieldText, fieldType, snapshotElement } from './element-snapshot.js';
import { structurallyEquivalent, typesEquivalent } from './semantic-rules.js';
import { labelRatio } from './text-similarity.js';
import { errorMessage, silentLogger, type Logger } from './logger.js';

const NO_ELEMENTS = 'No elements to compare';

export const DEFAULT_SEMANTIC_SETTINGS: Readonly<SemanticComparisonSettings> = Object.freeze({
  field_count_tolerance: 2,
  text_similarity_threshold: 0.8,
  structural_equivalence: [],
});

export function selectorOf(spec: SelectorSpec | undefined): string {
  if (spec === undefined) return '';
  return typeof spec === 'string' ? spec : spec.selector;
}

export function priorityOf(...specs: Array<SelectorSpec | undefined>): FieldPriority {
  for (const spec of specs) {
    if (spec !== undefined && typeof spec !== 'string' && spec.priority) return spec.priority;
  }
  return 'medium';
}

/** One entry per role mapped for the legacy application, in declared order. */
export function resolveFieldMappings(mapping: SectionMapping): FieldMapping[] {
  return Object.entries(mapping.legacy).map(([role, legacySpec]) => {
    const modernSpec = mapping.modern[role];
    return {
      role,
      legacySelector: selectorOf(legacySpec),
      modernSelector: selectorOf(modernSpec),
      priority: priorityOf(legacySpec, modernSpec),
    };
  });
}

interface RoleContext {
  role: string;
  priority: FieldPriority;
  legacy: ElementHandle[];
  modern: ElementHandle[];
}

type Judge<T extends FieldComparisonVerdict> = (ctx: RoleContext) => Promise<T>;

export interface SemanticFieldComparatorOptions {
  fieldMappings: FieldMappings;
  semanticRules?: SemanticRules;
  settings?: Partial<SemanticComparisonSettings>;
  locator?: ElementLocator;
  logger?: Logger;
}

export class SemanticFieldComparator {
  private fieldMappings: FieldMappings;
  private semanticRules: SemanticRules;
  private settings: SemanticComparisonSettings;
  private locator: ElementLocator;
  private logger: Logger;

  constructor(options: SemanticFieldComparatorOptions) {
    this.fieldMappings = options.fieldMappings;
    this.semanticRules = options.semanticRules ?? {};
    this.settings = { ...DEFAULT_SEMANTIC_SETTINGS, ...options.settings };
    this.logger = options.logger ?? silentLogger;
    this.locator = options.locator ?? new ElementLocator(this.logger);
  }

  async compareFormFields(legacy: Driver, modern: Driver, formType: string): Promise<SemanticOutcome<FormFieldVerdict>> {
    this.logger.info(`Comparing ${formType} form fields semantically...`);
    const mapping = this.fieldMappings.forms?.[formType];
    if (!mapping) {
      this.logger.warn(`No field mappings found for form type: ${formType}`);
      return { status: 'error', section: 'forms', scope: formType, error: `No mappings for form type: ${formType}` };
    }
    return this.compareSection('forms', formType, mapping, legacy, modern, (ctx) => this.judgeFormField(ctx));
  }

  async compareNavigationElements(legacy: Driver, modern: Driver): Promise<SemanticOutcome<NavigationVerdict>> {
    this.logger.info('Comparing navigation elements semantically...');
    return this.compareMappedSection('navigation', legacy, modern, (ctx) => this.judgeNavigation(ctx));
  }

  async compareActionButtons(legacy: Driver, modern: Driver): Promise<SemanticOutcome<ActionVerdict>> {
    this.logger.info('Comparing action buttons semantically...');
    return this.compareMappedSection('actions', legacy, modern, (ctx) => this.judgeAction(ctx));
  }

  async compareDataDisplayElements(legacy: Driver, modern: Driver): Promise<SemanticOutcome<DataDisplayVerdict>> {
    this.logger.info('Comparing data display elements semantically...');
    return this.compareMappedSection('data_display', legacy, modern, (ctx) => this.judgeDataDisplay(ctx));
  }

  private async compareMappedSection<T extends FieldComparisonVerdict>(
    section: Exclude<SemanticSection, 'forms'>,
    legacy: Driver,
    modern: Driver,
    judge: Judge<T>
  ): Promise<SemanticOutcome<T>> {
    const mapping = this.fieldMappings[section];
    if (!mapping) {
      this.logger.warn(`No field mappings found for section: ${section}`);
      return { status: 'error', section, scope: section, error: `No mappings for section: ${section}` };
    }
    return this.compareSection(section, section, mapping, legacy, modern, judge);
  }

  private async compareSection<T extends FieldComparisonVerdict>(
    section: SemanticSection,
    scope: string,
    mapping: SectionMapping,
    legacy: Driver,
    modern: Driver,
    judge: Judge<T>
  ): Promise<SemanticComparison<T>> {
    const result: SemanticComparison<T> = {
      status: 'ok',
      section,
      scope,
      verdicts: {},
      overallMatch: true,
      missing: [],
      extra: [],
    };

    for (const { role, legacySelector, modernSelector, priority } of resolveFieldMappings(mapping)) {
      let verdict: T;
      let legacyElements: ElementHandle[] = [];
      let modernElements: ElementHandle[] = [];
      try {
        legacyElements = await this.locator.find(legacy, legacySelector);
        modernElements = await this.locator.find(modern, modernSelector);
        verdict = await judge({ role, priority, legacy: legacyElements, modern: modernElements });
      } catch (error) {
        const message = errorMessage(error);
        this.logger.error(`Error comparing ${scope} role '${role}': ${message}`);
        // Counts stay as located so a failed snapshot is not reported as a missing field.
        const empty = await judge({ role, priority, legacy: [], modern: [] });
        verdict = {
          ...empty,
          legacyCount: legacyElements.length,
          modernCount: modernElements.length,
          countMatch: this.countMatch(legacyElements.length, modernElements.length),
          match: false,
          error: message,
        };
      }

      result.verdicts[role] = verdict;
      if (!verdict.match) {
        result.overallMatch = false;
        if (verdict.legacyCount === 0) result.missing.push(`legacy_${role}`);
        if (verdict.modernCount === 0) result.missing.push(`modern_${role}`);
      }
    }

    for (const [role, modernSpec] of Object.entries(mapping.modern)) {
      if (role in mapping.legacy) continue;
      const found = await this.locator.find(modern, selectorOf(modernSpec));
      if (found.length > 0) result.extra.push(role);
    }

    this.logger.info(
      `${scope} comparison: ${result.overallMatch ? 'match' : 'mismatch'}` +
        (result.missing.length ? `, missing ${result.missing.join(', ')}` : '') +
        (result.extra.length ? `, extra ${result.extra.join(', ')}` : '')
    );
    return result;
  }

  private countMatch(legacyCount: number, modernCount: number): boolean {
    return Math.abs(legacyCount - modernCount) <= this.settings.field_count_tolerance;
  }

  private compareTexts(legacyText: string, modernText: string): TextMatchDetail {
    const similarity = labelRatio(legacyText, modernText);
    return {
      match: similarity >= this.settings.text_similarity_threshold,
      similarity,
      legacyText,
      modernText,
    };
  }

  private async judgeFormField({ role, priority, legacy, modern }: RoleContext): Promise<FormFieldVerdict> {
    const countMatch = this.countMatch(legacy.length, modern.length);
    const base = { kind: 'form-field' as const, role, priority, legacyCount: legacy.length, modernCount: modern.length, countMatch };

    if (legacy.length === 0 || modern.length === 0) {
      return {
        ...base,
        propertiesMatch: false,
        labelMatch: false,
        match: false,
        properties: { match: false, reason: NO_ELEMENTS },
        label: { match: false, reason: NO_ELEMENTS },
      };
    }

    const legacySnapshot = await snapshotElement(legacy[0]);
    const modernSnapshot = await snapshotElement(modern[0]);

    const type = typesEquivalent(fieldType(legacySnapshot), fieldType(modernSnapshot), this.semanticRules.field_types);
    const requiredMatch = legacySnapshot.required === modernSnapshot.required;
    const propertiesMatch = type.match && requiredMatch;
    const label = this.compareTexts(fieldText(legacySnapshot), fieldText(modernSnapshot));

    return {
      ...base,
      propertiesMatch,
      labelMatch: label.match,
      match: countMatch && propertiesMatch && label.match,
      properties: {
        match: propertiesMatch,
        typeMatch: type.match,
        requiredMatch,
        category: type.category,
        legacy: legacySnapshot,
        modern: modernSnapshot,
        reason: type.reason,
      },
      label,
    };
  }

  private async judgeNavigation({ role, priority, legacy, modern }: RoleContext): Promise<NavigationVerdict> {
    const countMatch = this.countMatch(legacy.length, modern.length);
    const text = await this.compareVisibleText(legacy, modern);
    return {
      kind: 'navigation',
      role,
      priority,
      legacyCount: legacy.length,
      modernCount: modern.length,
      countMatch,
      textMatch: text.match,
      match: countMatch && text.match,
      text,
    };
  }

  private async judgeAction({ role, priority, legacy, modern }: RoleContext): Promise<ActionVerdict> {
    const countMatch = this.countMatch(legacy.length, modern.length);
    const base = { kind: 'action' as const, role, priority, legacyCount: legacy.length, modernCount: modern.length, countMatch };

    if (legacy.length === 0 || modern.length === 0) {
      return {
        ...base,
        textMatch: false,
        typeMatch: false,
        match: false,
        text: { match: false, reason: NO_ELEMENTS },
        type: { match: false, reason: NO_ELEMENTS },
      };
    }

    const legacySnapshot = await snapshotElement(legacy[0]);
    const modernSnapshot = await snapshotElement(modern[0]);
    const text = this.compareTexts(legacySnapshot.visibleText, modernSnapshot.visibleText);
    const legacyType = actionType(legacySnapshot);
    const modernType = actionType(modernSnapshot);
    const equivalence = typesEquivalent(legacyType, modernType, this.semanticRules.button_types);

    return {
      ...base,
      textMatch: text.match,
      typeMatch: equivalence.match,
      match: countMatch && text.match && equivalence.match,
      text,
      type: { match: equivalence.match, legacyType, modernType, category: equivalence.category, reason: equivalence.reason },
    };
  }

  private async judgeDataDisplay({ role, priority, legacy, modern }: RoleContext): Promise<DataDisplayVerdict> {
    const countMatch = this.countMatch(legacy.length, modern.length);
    const base = { kind: 'data-display' as const, role, priority, legacyCount: legacy.length, modernCount: modern.length, countMatch };

    if (legacy.length === 0 || modern.length === 0) {
      return { ...base, structureMatch: false, match: false, structure: { match: false, reason: NO_ELEMENTS } };
    }

    const legacySnapshot = await snapshotElement(legacy[0]);
    const modernSnapshot = await snapshotElement(modern[0]);
    const equivalence = structurallyEquivalent(
      legacySnapshot.tagName,
      modernSnapshot.tagName,
      this.settings.structural_equivalence
    );

    return {
      ...base,
      structureMatch: equivalence.match,
      match: countMatch && equivalence.match,
      structure: {
        match: equivalence.match,
        legacyTag: legacySnapshot.tagName,
        modernTag: modernSnapshot.tagName,
        legacyRole: legacySnapshot.ariaRole,
        modernRole: modernSnapshot.ariaRole,
        equivalentGroup: equivalence.group,
      },
    };
  }

  private async compareVisibleText(legacy: ElementHandle[], modern: ElementHandle[]): Promise<TextMatchDetail> {
    if (legacy.length === 0 || modern.length === 0) {
      return { match: false, reason: NO_ELEMENTS };
    }
    const legacyText = (await legacy[0].text()).trim();
    const modernText = (await modern[0].text()).trim();
    return this.compareTexts(legacyText, modernText);
  }
}
