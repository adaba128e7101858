import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { TermDictionary, termKey } from '../dictionary';
import { InvalidLexiconError } from '../errors';
import { loadLexicon, parseLexicon } from '../lexicon';

/* ============= TermDictionary ============= */

describe('TermDictionary', () => {
  const dictionary = TermDictionary.fromEntries([
    { term: 'Taiwan', replacements: ['the island'] },
    { term: 'climate change', replacements: [' environmental shifts ', ''] },
  ]);

  it('keeps display order and casing', () => {
    expect(dictionary.entries().map((e) => e.term)).toEqual(['Taiwan', 'climate change']);
    expect(dictionary.size).toBe(2);
  });

  it('looks terms up case-insensitively', () => {
    expect(dictionary.has('TAIWAN')).toBe(true);
    expect(dictionary.get('taiwan')?.term).toBe('Taiwan');
    expect(dictionary.get('Climate Change')?.term).toBe('climate change');
    expect(dictionary.has('equity')).toBe(false);
  });

  it('trims replacements and drops empty ones', () => {
    expect(dictionary.replacementsFor('climate change')).toEqual(['environmental shifts']);
  });

  it('returns a copy of replacements', () => {
    const copy = dictionary.replacementsFor('Taiwan');
    copy.push('mutated');
    expect(dictionary.replacementsFor('Taiwan')).toEqual(['the island']);
  });

  it('returns no replacements for an unknown term', () => {
    expect(dictionary.replacementsFor('equity')).toEqual([]);
  });

  it('rejects duplicate terms regardless of case', () => {
    expect(() =>
      TermDictionary.fromRecord({ equity: ['fairness'], ' Equity ': ['justice'] })
    ).toThrow(InvalidLexiconError);
  });

  it('rejects a term without replacements', () => {
    expect(() => TermDictionary.fromRecord({ equity: ['  '] })).toThrow(
      "Invalid lexicon: term 'equity' needs at least one replacement"
    );
  });

  it('rejects an empty term', () => {
    expect(() => TermDictionary.fromRecord({ ' ': ['x'] })).toThrow(InvalidLexiconError);
  });
});

describe('termKey', () => {
  it('normalizes case and surrounding whitespace', () => {
    expect(termKey('  National ')).toBe('national');
  });
});

/* ============= parseLexicon ============= */

describe('parseLexicon', () => {
  it('builds the dictionary and a lower-cased context policy', () => {
    const lexicon = parseLexicon({
      terms: [
        { term: 'national', replacements: ['domestic'] },
        { term: 'Taiwan', replacements: ['the island'] },
      ],
      contextSensitive: { Taiwan: ['Bank of Taiwan', ' '] },
    });
    expect(lexicon.dictionary.size).toBe(2);
    expect([...lexicon.policy.entries()]).toEqual([['taiwan', ['bank of taiwan']]]);
  });

  it('treats a missing contextSensitive section as empty', () => {
    const lexicon = parseLexicon({ terms: [{ term: 'equity', replacements: ['fairness'] }] });
    expect(lexicon.policy.size).toBe(0);
  });

  it('rejects an allow-list for a term that is not in the dictionary', () => {
    expect(() =>
      parseLexicon({
        terms: [{ term: 'equity', replacements: ['fairness'] }],
        contextSensitive: { national: ['national park'] },
      })
    ).toThrow("Invalid lexicon: context-sensitive term 'national' is not in the dictionary");
  });

  it('rejects malformed documents', () => {
    expect(() => parseLexicon(null)).toThrow(InvalidLexiconError);
    expect(() => parseLexicon({ terms: [] })).toThrow("Invalid lexicon: 'terms' must be a non-empty array");
    expect(() => parseLexicon({ terms: [{ term: 'x' }] })).toThrow(InvalidLexiconError);
    expect(() =>
      parseLexicon({ terms: [{ term: 'x', replacements: ['y'] }], contextSensitive: ['x'] })
    ).toThrow(InvalidLexiconError);
  });
});

/* ============= loadLexicon ============= */

describe('loadLexicon', () => {
  it('loads the shipped configuration', () => {
    const lexicon = loadLexicon(path.resolve(process.cwd(), 'config/lexicon.json'));
    expect(lexicon.dictionary.has('climate change')).toBe(true);
    expect(lexicon.policy.get('national')).toContain('national taiwan university');
  });

  it('wraps a missing file in InvalidLexiconError', () => {
    expect(() => loadLexicon(path.resolve(process.cwd(), 'config/does-not-exist.json'))).toThrow(
      InvalidLexiconError
    );
  });
});
