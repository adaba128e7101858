import { describe, it, expect } from 'vitest';
import { composeText, isModelConfigured } from '../modelRouter';

describe('composeText (dev provider)', () => {
  it('echoes the prompt deterministically without leaving the process', async () => {
    const result = await composeText('Is "national" institutional here?', { provider: 'dev' });
    expect(result).toEqual({
      text: 'Draft:\nIs "national" institutional here?\n\n[dev stub; deterministic]',
      provider: 'dev',
      model: 'dev-stub-1',
    });
  });

  it('honours a model override', async () => {
    const result = await composeText('hello', { provider: 'dev', model: 'local-test' });
    expect(result.model).toBe('local-test');
  });
});

describe('isModelConfigured', () => {
  it('is false for the dev stub', () => {
    expect(isModelConfigured('dev')).toBe(false);
  });
});
