/**
 * ComparisonResult construction helpers.
 */

import type { ComparisonResult } from './types.js';
import { errorMessage, type Logger } from './logger.js';

export interface ResultOptions {
  similarityScore?: number | null;
  details?: Record<string, unknown>;
}

export function createResult(success: boolean, message: string, options: ResultOptions = {}): ComparisonResult {
  return Object.freeze({
    success,
    message,
    similarityScore: options.similarityScore ?? null,
    details: Object.freeze({ ...options.details }),
    timestamp: Date.now(),
  });
}

export function passed(message: string, options?: ResultOptions): ComparisonResult {
  return createResult(true, message, options);
}

export function failed(message: string, options?: ResultOptions): ComparisonResult {
  return createResult(false, message, options);
}

/**
 * Runs a comparison and converts anything it throws into a failed result.
 */
export function guard(label: string, logger: Logger, compare: () => ComparisonResult): ComparisonResult {
  try {
    return compare();
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`Error in ${label} comparison: ${message}`);
    return failed(`${capitalize(label)} comparison failed: ${message}`, { details: { error: message } });
  }
}

/**
 * Aggregated verdict for comparators that collect one line per differing field.
 */
export function fromDifferences(
  subject: string,
  differences: string[],
  successMessage: string,
  details: Record<string, unknown> = {}
): ComparisonResult {
  if (differences.length > 0) {
    return failed(`${subject} differs:\n${differences.join('\n')}`, {
      details: { ...details, differences },
    });
  }
  return passed(successMessage, { details });
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
