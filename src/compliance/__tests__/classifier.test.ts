import { describe, it, expect, vi } from 'vitest';
import { classify, createClassifier, type ClassifierDeps } from '../classifier';
import { applyLocalTiers, findNamingEntity, matchAllowList } from '../classifier/tiers';
import { TermDictionary } from '../dictionary';
import { buildContextPolicy } from '../lexicon';
import type { ClassifierDelegate, EntityRecognizer, RecognizedEntity } from '../types';

/* ============= Helpers ============= */

const dictionary = TermDictionary.fromRecord({
  national: ['domestic'],
  Taiwan: ['the island'],
  diversity: ['variety'],
});

const policy = buildContextPolicy(dictionary, {
  national: ['national university', 'national park'],
  taiwan: ['taiwan semiconductor'],
});

function recognizerOf(entities: RecognizedEntity[]): EntityRecognizer {
  return { recognize: () => entities };
}

const noEntities = recognizerOf([]);

function delegateAnswering(descriptive: boolean): ClassifierDelegate {
  return { ask: vi.fn(async () => ({ descriptive })) };
}

function deps(overrides: Partial<ClassifierDeps> = {}): ClassifierDeps {
  return { policy, recognizer: noEntities, delegate: null, timeoutMs: 1000, ...overrides };
}

/* ============= Pure tiers ============= */

describe('matchAllowList', () => {
  it('finds an institutional collocation case-insensitively', () => {
    expect(matchAllowList('Visit the National Park today', 'national', policy)).toBe('national park');
  });

  it('ignores terms without an allow-list', () => {
    expect(matchAllowList('national university diversity', 'diversity', policy)).toBeUndefined();
  });
});

describe('findNamingEntity', () => {
  it('only counts organizations, places and facilities', () => {
    const entities: RecognizedEntity[] = [
      { text: 'Taiwan Times', category: 'Other', start: 0, end: 12 },
      { text: 'Bank of Taiwan', category: 'Organization', start: 20, end: 34 },
    ];
    expect(findNamingEntity(entities, 'taiwan')?.text).toBe('Bank of Taiwan');
    expect(findNamingEntity(entities.slice(0, 1), 'taiwan')).toBeUndefined();
  });
});

describe('applyLocalTiers', () => {
  it('decides on the allow-list without consulting the recognizer', () => {
    const entities = vi.fn(() => []);
    const decision = applyLocalTiers('the national university campus', 'national', policy, entities);
    expect(decision).toEqual({ kind: 'verdict', verdict: 'skip_allow_list_phrase' });
    expect(entities).not.toHaveBeenCalled();
  });

  it('skips a term that is part of a recognized name', () => {
    const decision = applyLocalTiers('Diversity Foundation grants', 'diversity', policy, () => [
      { text: 'Diversity Foundation', category: 'Organization', start: 0, end: 20 },
    ]);
    expect(decision).toEqual({ kind: 'verdict', verdict: 'skip_named_entity' });
  });

  it('accepts a plain term that no local tier excuses', () => {
    expect(applyLocalTiers('we value diversity', 'diversity', policy, () => [])).toEqual({
      kind: 'verdict',
      verdict: 'accept',
    });
  });

  it('defers a context-sensitive term to the delegate', () => {
    expect(applyLocalTiers('a national effort', 'national', policy, () => [])).toEqual({
      kind: 'ask_delegate',
    });
  });
});

/* ============= classify ============= */

describe('classify', () => {
  it('skips on an institutional delegate answer', async () => {
    const delegate = delegateAnswering(false);
    const verdict = await classify('a national effort', 'national', deps({ delegate }));
    expect(verdict).toBe('skip_classifier_judgment');
    expect(delegate.ask).toHaveBeenCalledWith('a national effort', 'national');
  });

  it('accepts on a descriptive delegate answer', async () => {
    const verdict = await classify('Taiwan is a country in East Asia.', 'Taiwan', deps({
      delegate: delegateAnswering(true),
    }));
    expect(verdict).toBe('accept');
  });

  it('never asks the delegate about terms outside the policy', async () => {
    const delegate = delegateAnswering(false);
    expect(await classify('we value diversity', 'diversity', deps({ delegate }))).toBe('accept');
    expect(delegate.ask).not.toHaveBeenCalled();
  });

  it('accepts when no delegate is configured', async () => {
    expect(await classify('a national effort', 'national', deps())).toBe('accept');
  });

  it('fails open when the delegate throws', async () => {
    const delegate: ClassifierDelegate = {
      ask: async () => {
        throw new Error('connection reset');
      },
    };
    expect(await classify('a national effort', 'national', deps({ delegate }))).toBe('accept');
  });

  it('fails open when the delegate times out', async () => {
    const delegate: ClassifierDelegate = {
      ask: () => new Promise((resolve) => setTimeout(() => resolve({ descriptive: false }), 500)),
    };
    const verdict = await classify('a national effort', 'national', deps({ delegate, timeoutMs: 20 }));
    expect(verdict).toBe('accept');
  });

  it('treats a recognizer failure as no entities', async () => {
    const recognizer: EntityRecognizer = {
      recognize: () => {
        throw new Error('model unavailable');
      },
    };
    const delegate = delegateAnswering(false);
    const verdict = await classify('Taiwan Semiconductor plant', 'diversity', deps({ recognizer, delegate }));
    expect(verdict).toBe('accept');
    const sensitive = await classify('the national effort', 'national', deps({ recognizer, delegate }));
    expect(sensitive).toBe('skip_classifier_judgment');
  });

  it('binds its dependencies in createClassifier', async () => {
    const classifyFn = createClassifier(deps({ recognizer: recognizerOf([
      { text: 'National Gallery', category: 'Facility', start: 4, end: 20 },
    ]) }));
    expect(await classifyFn('the National Gallery opened', 'national')).toBe('skip_named_entity');
  });
});
