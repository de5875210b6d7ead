/**
 * Semantic Rules
 *
 * Type equivalence across configured categories, and structural equivalence
 * of tag names for data-display elements.
 */

import type { SemanticCategories } from './types.js';

const TYPE_SELECTOR = /\[\s*type\s*=\s*["']?([^"'\]\s]+)["']?\s*\]/i;

/**
 * A category token is either a bare type (`email`) or a selector carrying a
 * type attribute (`input[type=email]`, `[type="search"]`).
 */
export function tokenType(token: string): string {
  const match = TYPE_SELECTOR.exec(token);
  return (match ? match[1] : token).trim().toLowerCase();
}

export interface TypeEquivalence {
  match: boolean;
  /** Category covering both types, when one does. */
  category?: string;
  reason?: string;
}

/**
 * Categories are tried in declared order and the first that covers both
 * types wins. Without a covering category the types must be equal.
 * An empty type on either side is treated as unspecified and matches.
 */
export function typesEquivalent(
  legacyType: string,
  modernType: string,
  categories: SemanticCategories = {}
): TypeEquivalence {
  const a = legacyType.trim().toLowerCase();
  const b = modernType.trim().toLowerCase();
  if (!a || !b) {
    return { match: true, reason: 'Type not specified' };
  }

  for (const [category, tokens] of Object.entries(categories)) {
    const types = tokens.map(tokenType);
    if (types.includes(a) && types.includes(b)) {
      return { match: true, category };
    }
  }

  return a === b ? { match: true } : { match: false, reason: `Types differ: '${a}' vs '${b}'` };
}

export interface StructuralEquivalence {
  match: boolean;
  group?: string[];
}

export function structurallyEquivalent(
  legacyTag: string,
  modernTag: string,
  groups: string[][] = []
): StructuralEquivalence {
  const a = legacyTag.toLowerCase();
  const b = modernTag.toLowerCase();

  const group = groups.find((tags) => {
    const lowered = tags.map((tag) => tag.toLowerCase());
    return lowered.includes(a) && lowered.includes(b);
  });
  if (group) return { match: true, group };

  return { match: a === b };
}
