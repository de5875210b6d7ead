/**
 * Settings
 *
 * Loads the JSON settings file, validates it against the schema below and
 * returns a deeply frozen object with defaults applied. Keys are snake_case.
 */

import { readFile } from 'node:fs/promises';
import { z, type ZodError } from 'zod';
import { errorMessage } from '../core/logger.js';

const priority = z.enum(['high', 'medium', 'low']);

const selectorSpec = z.union([
  z.string().min(1),
  z.object({ selector: z.string().min(1), priority: priority.optional() }),
]);

const sectionMapping = z.object({
  legacy: z.record(selectorSpec).default({}),
  modern: z.record(selectorSpec).default({}),
});

const categories = z.record(z.array(z.string()));

const environment = z.object({
  base_url: z.string().url(),
});

export const DEFAULT_FORM_TYPES = ['login', 'registration', 'search', 'contact'];

export const settingsSchema = z.object({
  envs: z.object({ legacy: environment, modern: environment }),
  /** Per-category switches; a category absent here is enabled. */
  checks: z.record(z.boolean()).default({}),
  ignore_selectors: z.array(z.string()).default([]),
  max_test_failures: z.number().int().nonnegative().default(5),
  auto_collect_body_similarity: z.boolean().default(true),
  fuzzy_threshold: z.number().min(0).max(1).default(0.9),
  semantic_threshold: z.number().min(0).max(1).default(0.8),
  numeric_tolerance: z.number().nonnegative().default(0.1),
  performance_tolerance_ms: z.number().nonnegative().default(500),
  semantic_form_types: z.array(z.string()).default(() => [...DEFAULT_FORM_TYPES]),
  log_level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  browser: z
    .object({
      headless: z.boolean().default(true),
      timeout_ms: z.number().int().positive().default(30_000),
      executable_path: z.string().optional(),
      channel: z.string().optional(),
    })
    .default({}),
  field_mappings: z
    .object({
      forms: z.record(sectionMapping).optional(),
      navigation: sectionMapping.optional(),
      actions: sectionMapping.optional(),
      data_display: sectionMapping.optional(),
    })
    .default({}),
  semantic_rules: z
    .object({
      field_types: categories.optional(),
      button_types: categories.optional(),
    })
    .default({}),
  comparison_settings: z
    .object({
      field_count_tolerance: z.number().int().nonnegative().default(2),
      text_similarity_threshold: z.number().min(0).max(1).default(0.8),
      structural_equivalence: z.array(z.array(z.string()).min(2)).default([]),
    })
    .default({}),
});

export type Settings = z.infer<typeof settingsSchema>;
export type SettingsInput = z.input<typeof settingsSchema>;

export class SettingsError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid settings in ${source}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'SettingsError';
    this.issues = issues;
  }
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Validates already-parsed settings. Throws SettingsError listing every issue.
 */
export function parseSettings(raw: unknown, source = 'settings'): Settings {
  const result = settingsSchema.safeParse(raw);
  if (!result.success) {
    throw new SettingsError(source, formatIssues(result.error));
  }
  return deepFreeze(result.data);
}

export async function loadSettings(path: string): Promise<Settings> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new SettingsError(path, [`cannot read file: ${errorMessage(error)}`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new SettingsError(path, [`not valid JSON: ${errorMessage(error)}`]);
  }
  return parseSettings(raw, path);
}
