/**
 * ui-parity
 * Barrel export for all core modules and types.
 */

export * from './core/types.js';
export { createLogger, resolveLogLevel, silentLogger, type Logger, type LogLevel } from './core/logger.js';
export { createResult, passed, failed } from './core/result.js';
export { sequenceRatio, labelRatio, jaccard } from './core/text-similarity.js';
export { TextComparator, normalizeText } from './core/text-comparator.js';
export { StructureComparator } from './core/structure-comparator.js';
export { ElementLocator, splitSelectors } from './core/element-locator.js';
export { snapshotElement } from './core/element-snapshot.js';
export { typesEquivalent, structurallyEquivalent } from './core/semantic-rules.js';
export { SemanticFieldComparator, DEFAULT_SEMANTIC_SETTINGS, resolveFieldMappings } from './core/semantic-field-comparator.js';
export { CollectionContext } from './core/collection-context.js';
export { DomCollector } from './core/dom-collector.js';
export {
  ComparisonEngine,
  RunRecorder,
  pagePair,
  type CheckOutcome,
  type CheckGroup,
  type PagePair,
} from './core/comparison-engine.js';
export { RunOrchestrator, FailureThresholdError, type RunReport } from './core/orchestrator.js';
export { BrowserSession } from './core/browser-session.js';
export { PlaywrightDriver } from './core/playwright-driver.js';
export { formatTextReport, formatJsonReport } from './core/report-formatter.js';
export { loadSettings, parseSettings, SettingsError, type Settings } from './config/settings.js';
