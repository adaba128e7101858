/* src/config.ts
   Centralized config: listener, lexicon location, matcher window, delegate */
import path from 'node:path';
import 'dotenv/config';

const env = (name: string, fallback?: string) =>
  (process.env[name] ?? fallback ?? '').toString();

/** Integer env var; falls back when missing, blank or not a finite number. */
const envInt = (name: string, fallback: number) => {
  const raw = process.env[name];
  if (raw == null || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? Math.floor(n) : fallback;
};

export type AIProvider = 'dev' | 'openai' | 'anthropic';

const AI_PROVIDERS: readonly AIProvider[] = ['dev', 'openai', 'anthropic'];

function parseProvider(raw: string): AIProvider {
  const p = raw.trim().toLowerCase();
  return AI_PROVIDERS.find((candidate) => candidate === p) ?? 'dev';
}

export const config = {
  nodeEnv: env('NODE_ENV', 'development'),

  // ── HTTP ─────────────────────────────────────────────────────────
  server: {
    host: env('HOST', '0.0.0.0'),
    port: envInt('PORT', 4100),
    maxUploadBytes: envInt('MAX_UPLOAD_BYTES', 25 * 1024 * 1024),
  },

  cors: {
    origins: env('CORS_ORIGINS', 'http://localhost:5173')
      .split(',')
      .map(s => s.trim())
      .filter(Boolean),
  },

  // ── Term configuration ───────────────────────────────────────────
  lexicon: {
    path: path.resolve(process.cwd(), env('LEXICON_PATH', 'config/lexicon.json')),
    gazetteerPath: path.resolve(process.cwd(), env('GAZETTEER_PATH', 'data/gazetteer.json')),
  },

  // ── Matcher ──────────────────────────────────────────────────────
  matcher: {
    snippetBefore: envInt('SNIPPET_BEFORE', 40),
    snippetAfter: envInt('SNIPPET_AFTER', 60),
    // 0 disables the page estimate on whole-document blocks
    pageSizeChars: envInt('PAGE_SIZE_CHARS', 3000),
  },

  // ── Context classifier ───────────────────────────────────────────
  classifier: {
    timeoutMs: envInt('CLASSIFIER_TIMEOUT_MS', 5000),
    concurrency: Math.max(1, envInt('CLASSIFIER_CONCURRENCY', 1)),
  },

  // ── AI ───────────────────────────────────────────────────────────
  ai: {
    provider: parseProvider(env('AI_PROVIDER', 'dev')),
    openaiKey: env('OPENAI_API_KEY'),
    anthropicKey: env('ANTHROPIC_API_KEY'),
    model: {
      openai: env('AI_MODEL_OPENAI', 'gpt-4o'),
      anthropic: env('AI_MODEL_ANTHROPIC', 'claude-sonnet-4-5-20250929'),
    },
  },
} as const;

export type AppConfig = typeof config;
