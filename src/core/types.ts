/**
 * Core type definitions for the ui-parity comparison harness.
 */

// ── Driver Abstraction ──

/**
 * One located DOM element in either application.
 */
export interface ElementHandle {
  /** Visible text, trimmed. */
  text(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  tagName(): Promise<string>;
  isDisplayed(): Promise<boolean>;
  /**
   * Text of the label associated with a form control: a `for=` label,
   * a wrapping label, or a label immediately preceding it. Null when none.
   */
  labelText(): Promise<string | null>;
  /** True when both handles point at the same DOM node. */
  sameElement(other: ElementHandle): Promise<boolean>;
}

export interface Driver {
  goto(url: string): Promise<void>;
  currentUrl(): Promise<string>;
  findElements(selector: string): Promise<ElementHandle[]>;
  /**
   * Runs a script body (may `return`) in the page. Arguments are exposed
   * to the script as `arguments[0]`, `arguments[1]`, ...
   */
  executeScript<T>(script: string, ...args: unknown[]): Promise<T>;
}

export type Side = 'legacy' | 'modern';

// ── Comparison Results ──

export enum ComparisonType {
  EXACT_TEXT = 'exact_text',
  FUZZY_TEXT = 'fuzzy_text',
  SEMANTIC_TEXT = 'semantic_text',
  PATTERN_MATCH = 'pattern_match',
  COUNT = 'count',
}

export interface ComparisonResult {
  readonly success: boolean;
  readonly message: string;
  /** In [0, 1] when the strategy computes one. */
  readonly similarityScore: number | null;
  readonly details: Readonly<Record<string, unknown>>;
  readonly timestamp: number;
}

export interface RunTally {
  passed: number;
  failed: number;
  skipped: number;
  errors: number;
}

export function emptyTally(): RunTally {
  return { passed: 0, failed: 0, skipped: 0, errors: 0 };
}

// ── Semantic Configuration ──

export type FieldPriority = 'high' | 'medium' | 'low';

export interface FieldMapping {
  role: string;
  legacySelector: string;
  modernSelector: string;
  priority: FieldPriority;
}

/** Selectors for one mapping section, keyed by role name per side. */
export interface SectionMapping {
  legacy: Record<string, SelectorSpec>;
  modern: Record<string, SelectorSpec>;
}

export type SelectorSpec = string | { selector: string; priority?: FieldPriority };

export interface FieldMappings {
  forms?: Record<string, SectionMapping>;
  navigation?: SectionMapping;
  actions?: SectionMapping;
  data_display?: SectionMapping;
}

/** Category name → interchangeable type tokens, in declared order. */
export type SemanticCategories = Record<string, string[]>;

export interface SemanticRules {
  field_types?: SemanticCategories;
  button_types?: SemanticCategories;
}

export interface SemanticComparisonSettings {
  field_count_tolerance: number;
  text_similarity_threshold: number;
  structural_equivalence: string[][];
}

// ── Element Snapshot ──

export interface ElementSnapshot {
  tagName: string;
  type: string;
  required: boolean;
  placeholder: string;
  labelText: string;
  ariaRole: string;
  ariaLabel: string;
  title: string;
  name: string;
  id: string;
  className: string;
  visibleText: string;
  displayed: boolean;
}

// ── Field Verdicts ──

interface VerdictBase {
  role: string;
  priority: FieldPriority;
  legacyCount: number;
  modernCount: number;
  countMatch: boolean;
  match: boolean;
  /** Set when locating elements for this role threw. */
  error?: string;
}

export interface TextMatchDetail {
  match: boolean;
  similarity?: number;
  legacyText?: string;
  modernText?: string;
  reason?: string;
}

export interface TypeMatchDetail {
  match: boolean;
  legacyType?: string;
  modernType?: string;
  /** Category that made the two types equivalent. */
  category?: string;
  reason?: string;
}

export interface PropertyMatchDetail {
  match: boolean;
  typeMatch?: boolean;
  requiredMatch?: boolean;
  category?: string;
  legacy?: ElementSnapshot;
  modern?: ElementSnapshot;
  reason?: string;
}

export interface StructureMatchDetail {
  match: boolean;
  legacyTag?: string;
  modernTag?: string;
  legacyRole?: string;
  modernRole?: string;
  equivalentGroup?: string[];
  reason?: string;
}

export interface FormFieldVerdict extends VerdictBase {
  kind: 'form-field';
  propertiesMatch: boolean;
  labelMatch: boolean;
  properties: PropertyMatchDetail;
  label: TextMatchDetail;
}

export interface NavigationVerdict extends VerdictBase {
  kind: 'navigation';
  textMatch: boolean;
  text: TextMatchDetail;
}

export interface ActionVerdict extends VerdictBase {
  kind: 'action';
  textMatch: boolean;
  typeMatch: boolean;
  text: TextMatchDetail;
  type: TypeMatchDetail;
}

export interface DataDisplayVerdict extends VerdictBase {
  kind: 'data-display';
  structureMatch: boolean;
  structure: StructureMatchDetail;
}

export type FieldComparisonVerdict =
  | FormFieldVerdict
  | NavigationVerdict
  | ActionVerdict
  | DataDisplayVerdict;

export type SemanticSection = 'forms' | 'navigation' | 'actions' | 'data_display';

export interface SemanticComparison<TVerdict extends FieldComparisonVerdict> {
  status: 'ok';
  section: SemanticSection;
  /** Form type for `forms`, otherwise the section name. */
  scope: string;
  verdicts: Record<string, TVerdict>;
  overallMatch: boolean;
  /** `legacy_<role>` / `modern_<role>` for roles found on one side only. */
  missing: string[];
  /** Roles mapped only for the modern application that were found there. */
  extra: string[];
}

export interface SemanticMappingError {
  status: 'error';
  section: SemanticSection;
  scope: string;
  error: string;
}

export type SemanticOutcome<TVerdict extends FieldComparisonVerdict> =
  | SemanticComparison<TVerdict>
  | SemanticMappingError;

// ── Collected Data ──

export type LinkEntry = [text: string, href: string];

export interface FormInputSummary {
  name: string;
  type: string;
  label: string;
  required: boolean;
  placeholder: string;
}

export interface FormSummary {
  inputs: FormInputSummary[];
}

export interface TablePreview {
  headers: string[];
  rows: string[][];
}

export type MetaTags = Record<string, string>;

export type AccessibilityCounts = Record<string, number>;

export interface TabState {
  label: string;
  selected: boolean;
}

export interface AccordionState {
  text: string;
  expanded: boolean;
}

export interface PaginationState {
  current: string;
  total: string;
  has_next: boolean;
  has_prev: boolean;
}

export interface WidgetTexts {
  toasts: string[];
  dialogs: string[];
  tooltips: string[];
}

export interface ImagePreview {
  alt: string;
  loading: string;
}

export type RolePair = [role: string, name: string];

export interface I18nInfo {
  lang: string;
  dir: string;
}

export interface PerformanceTimings {
  domContentLoaded: number;
  loadEventEnd: number;
}

export interface ListSummary {
  total_ul: number;
  total_ol: number;
  total_li: number;
  total_nested_lists: number;
}

export interface ListStructure {
  summary: ListSummary;
  lists: Array<{ type: 'ul' | 'ol'; items: number }>;
}

export type PageArchitecture = Record<string, number>;

/** Element count per kind. A kind absent on one side counts as zero. */
export type CountProfile = Record<string, number>;

/** Item count of each matched list or carousel, in document order. */
export type ItemCounts = number[];

/** Texts per element kind, in document order. */
export type OrderedTexts = Record<string, string[]>;

export interface OrderedPage {
  title: string;
  elements: OrderedTexts;
}

export interface ThemePalette {
  background_colors: string[];
  text_colors: string[];
  accent_colors: string[];
  css_variables: string[];
}

export interface FrameContent {
  title: string;
  headings: string[];
  buttons: string[];
  links: LinkEntry[];
}

export interface IframeReport {
  main: FrameContent;
  frames: Array<{ index: number; src: string; accessible: boolean; content: FrameContent | null }>;
  summary: { total_iframes: number; accessible_iframes: number; total_elements: number };
}
