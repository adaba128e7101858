import { describe, it, expect, vi, beforeEach } from 'vitest';
import { composeText } from '../../ai/modelRouter';
import { ModelClassifierDelegate, buildDelegatePrompt, parseDelegateResponse } from '../classifier/delegate';
import { DelegateResponseError } from '../errors';

vi.mock('../../ai/modelRouter', () => ({
  composeText: vi.fn(),
}));

const mockedCompose = vi.mocked(composeText);

function answer(text: string) {
  mockedCompose.mockResolvedValueOnce({ text, provider: 'openai', model: 'test-model' });
}

/* ============= parseDelegateResponse ============= */

describe('parseDelegateResponse', () => {
  it('reads the label on the first line', () => {
    expect(parseDelegateResponse('INSTITUTIONAL\nPart of a university name.')).toEqual({ descriptive: false });
    expect(parseDelegateResponse('descriptive - refers to the country')).toEqual({ descriptive: true });
  });

  it('tolerates list and emphasis markup before the label', () => {
    expect(parseDelegateResponse('**DESCRIPTIVE**')).toEqual({ descriptive: true });
    expect(parseDelegateResponse('- Institutional: part of a name')).toEqual({ descriptive: false });
  });

  it('ignores labels that do not lead the first line', () => {
    expect(parseDelegateResponse('The usage here is descriptive.')).toBeNull();
    expect(parseDelegateResponse('Not institutional; the word is used generically here.')).toBeNull();
    expect(parseDelegateResponse('This is a non-institutional usage.')).toBeNull();
    expect(parseDelegateResponse('Non-institutional\nDESCRIPTIVE')).toBeNull();
  });

  it('does not read a longer word as the label', () => {
    expect(parseDelegateResponse('Institutionally ambiguous.')).toBeNull();
  });

  it('returns null for empty or ambiguous answers', () => {
    expect(parseDelegateResponse('   ')).toBeNull();
    expect(parseDelegateResponse('Could be institutional or descriptive.')).toBeNull();
    expect(parseDelegateResponse('Not sure.')).toBeNull();
  });
});

/* ============= ModelClassifierDelegate ============= */

describe('ModelClassifierDelegate', () => {
  beforeEach(() => {
    mockedCompose.mockReset();
  });

  it('sends the term and snippet through the model router', async () => {
    answer('INSTITUTIONAL');
    const delegate = new ModelClassifierDelegate({ provider: 'openai' });

    await expect(delegate.ask('studied at National Taiwan University', 'Taiwan')).resolves.toEqual({
      descriptive: false,
    });
    expect(mockedCompose).toHaveBeenCalledTimes(1);
    const [prompt, opts] = mockedCompose.mock.calls[0];
    expect(prompt).toBe('Term: "Taiwan"\n\nContext:\n---\nstudied at National Taiwan University\n---');
    expect(prompt).toBe(buildDelegatePrompt('studied at National Taiwan University', 'Taiwan'));
    expect(opts).toMatchObject({ provider: 'openai', maxTokens: 50, temperature: 0 });
  });

  it('throws DelegateResponseError on a negated answer', async () => {
    answer('Not institutional; the word is used generically here.');
    const delegate = new ModelClassifierDelegate();
    await expect(delegate.ask('a national effort', 'national')).rejects.toBeInstanceOf(DelegateResponseError);
  });

  it('throws DelegateResponseError on an unparseable answer', async () => {
    answer('I cannot tell.');
    const delegate = new ModelClassifierDelegate();
    await expect(delegate.ask('a national effort', 'national')).rejects.toBeInstanceOf(DelegateResponseError);
  });

  it('propagates transport errors', async () => {
    mockedCompose.mockRejectedValueOnce(new Error('ECONNRESET'));
    const delegate = new ModelClassifierDelegate();
    await expect(delegate.ask('a national effort', 'national')).rejects.toThrow('ECONNRESET');
  });
});
