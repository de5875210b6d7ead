import { describe, it, expect } from 'vitest';
import { structurallyEquivalent, tokenType, typesEquivalent } from './semantic-rules.js';

describe('tokenType', () => {
  it('reads bare types and type selectors', () => {
    expect(tokenType('Email')).toBe('email');
    expect(tokenType('input[type=email]')).toBe('email');
    expect(tokenType('[type="search"]')).toBe('search');
    expect(tokenType("input[type='tel']")).toBe('tel');
  });
});

describe('typesEquivalent', () => {
  const categories = {
    'text-like': ['text', 'input[type=email]', 'search'],
    contact: ['email', 'tel'],
  };

  it('is reflexive with or without categories', () => {
    expect(typesEquivalent('number', 'number').match).toBe(true);
    expect(typesEquivalent('tel', 'tel', categories)).toEqual({ match: true, category: 'contact' });
  });

  it('reports the first declared category that covers both types', () => {
    expect(typesEquivalent('text', 'email', categories)).toEqual({ match: true, category: 'text-like' });
    expect(typesEquivalent('email', 'tel', categories)).toEqual({ match: true, category: 'contact' });
  });

  it('falls back to exact equality', () => {
    expect(typesEquivalent('text', 'number', categories)).toEqual({
      match: false,
      reason: "Types differ: 'text' vs 'number'",
    });
  });

  it('does not match on substrings', () => {
    expect(typesEquivalent('tel', 'te', { phone: ['tel', 'text'] }).match).toBe(false);
  });

  it('treats an unspecified type as matching', () => {
    expect(typesEquivalent('', 'email', categories)).toEqual({ match: true, reason: 'Type not specified' });
  });
});

describe('structurallyEquivalent', () => {
  it('matches tags within one configured group', () => {
    expect(structurallyEquivalent('TABLE', 'div', [['ul', 'ol'], ['table', 'div']])).toEqual({
      match: true,
      group: ['table', 'div'],
    });
  });

  it('falls back to exact tag equality', () => {
    expect(structurallyEquivalent('table', 'ul')).toEqual({ match: false });
    expect(structurallyEquivalent('ul', 'UL')).toEqual({ match: true });
  });
});
