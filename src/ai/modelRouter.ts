/* src/ai/modelRouter.ts
   Provider-agnostic "compose text" with provider/model overrides and
   Anthropic text-block flattening. The only place that talks to an LLM SDK.
*/
import { config, type AIProvider } from '../config';

export type ProviderName = AIProvider;

export interface ComposeOptions {
  provider?: ProviderName;
  model?: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface ComposeResult {
  text: string;
  provider: ProviderName;
  model: string;
}

const DEFAULT_MAX_TOKENS = 600;

/** True when a real model sits behind composeText (not the dev stub). */
export function isModelConfigured(provider: ProviderName = config.ai.provider): boolean {
  if (provider === 'openai') return config.ai.openaiKey.length > 0;
  if (provider === 'anthropic') return config.ai.anthropicKey.length > 0;
  return false;
}

/* ------------------------------ main entry ------------------------------ */

/**
 * Canonical text generation entry. `dev` echoes the prompt deterministically
 * so local runs and tests never leave the process.
 */
export async function composeText(
  prompt: string,
  opts: ComposeOptions = {}
): Promise<ComposeResult> {
  const provider: ProviderName = opts.provider ?? config.ai.provider;

  if (provider === 'dev') {
    const model = opts.model || 'dev-stub-1';
    const text = `Draft:\n${prompt}\n\n[dev stub; deterministic]`;
    return { text, provider, model };
  }

  if (provider === 'openai') {
    const { default: OpenAI } = await import('openai');
    const client = new OpenAI({ apiKey: config.ai.openaiKey });
    const model = opts.model || config.ai.model.openai;

    const resp = await client.chat.completions.create({
      model,
      messages: [
        ...(opts.systemPrompt ? [{ role: 'system' as const, content: opts.systemPrompt }] : []),
        { role: 'user' as const, content: prompt },
      ],
      max_tokens: opts.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: opts.temperature,
    });

    const text = (resp.choices[0]?.message?.content ?? '').trim();
    return { text, provider, model };
  }

  const { default: Anthropic } = await import('@anthropic-ai/sdk');
  const client = new Anthropic({ apiKey: config.ai.anthropicKey });
  const model = opts.model || config.ai.model.anthropic;

  const resp = await client.messages.create({
    model,
    max_tokens: opts.maxTokens ?? DEFAULT_MAX_TOKENS,
    system: opts.systemPrompt || undefined,
    temperature: opts.temperature,
    messages: [{ role: 'user', content: prompt }],
  });

  // Anthropic wants plain text blocks; ignore tool-use and other parts
  const text = resp.content
    .flatMap((block) => (block.type === 'text' ? [block.text.trim()] : []))
    .filter(Boolean)
    .join('\n\n')
    .trim();
  return { text, provider, model };
}
