import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../app';
import { createScanContext } from '../../compliance/engine';
import { parseLexicon } from '../../compliance/lexicon';

/* ============= Helpers ============= */

const BOUNDARY = '----scanner-test-boundary';

function multipartBody(filename: string, content: string): string {
  return (
    `--${BOUNDARY}\r\n` +
    `Content-Disposition: form-data; name="file"; filename="${filename}"\r\n` +
    'Content-Type: application/octet-stream\r\n\r\n' +
    `${content}\r\n` +
    `--${BOUNDARY}--\r\n`
  );
}

function upload(app: FastifyInstance, filename: string, content: string, query = '') {
  return app.inject({
    method: 'POST',
    url: `/scan${query}`,
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
    payload: multipartBody(filename, content),
  });
}

const ctx = createScanContext({
  lexicon: parseLexicon({
    terms: [
      { term: 'diversity', replacements: ['variety'] },
      { term: 'national', replacements: ['domestic'] },
    ],
    contextSensitive: { national: ['national park'] },
  }),
  recognizer: { recognize: () => [] },
  delegate: { ask: async () => ({ descriptive: false }) },
});

let app: FastifyInstance;

beforeAll(async () => {
  app = await buildServer(ctx, { corsOrigins: ['http://localhost:5173'] });
  await app.ready();
});

afterAll(async () => {
  await app.close();
});

/* ============= Service routes ============= */

describe('GET /health', () => {
  it('reports the loaded context', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      status: 'ok',
      terms: 2,
      contextSensitiveTerms: 1,
      delegate: 'available',
    });
  });

  it('echoes an upstream request id', async () => {
    const res = await app.inject({ method: 'GET', url: '/health', headers: { 'x-request-id': 'req-123' } });
    expect(res.headers['x-request-id']).toBe('req-123');
  });

  it('mints a request id when none is sent', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(String(res.headers['x-request-id'])).toHaveLength(21);
  });
});

describe('GET /terms', () => {
  it('lists terms in display order', async () => {
    const res = await app.inject({ method: 'GET', url: '/terms' });
    expect(res.json()).toEqual({
      terms: [
        { term: 'diversity', replacements: ['variety'] },
        { term: 'national', replacements: ['domestic'] },
      ],
      contextSensitive: ['national'],
    });
  });
});

describe('GET /metrics', () => {
  it('serves Prometheus text', async () => {
    const res = await app.inject({ method: 'GET', url: '/metrics' });
    expect(res.statusCode).toBe(200);
    expect(String(res.headers['content-type'])).toMatch(/^text\/plain/);
  });
});

/* ============= POST /scan ============= */

describe('POST /scan', () => {
  it('scans an uploaded text file', async () => {
    const res = await upload(app, 'notes.txt', 'We value diversity in the national park.');
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.summary).toEqual({ diversity: 1 });
    expect(body.skipped).toHaveLength(1);
    expect(body.skipped[0].verdict).toBe('skip_allow_list_phrase');
    expect(body.review).toBeUndefined();
  });

  it('takes the format from the query string', async () => {
    const res = await upload(app, 'upload.bin', 'diversity', '?format=plain_text');
    expect(res.statusCode).toBe(200);
    expect(res.json().summary).toEqual({ diversity: 1 });
  });

  it('answers 415 for an unsupported extension', async () => {
    const res = await upload(app, 'memo.rtf', '{\\rtf1 diversity}');
    expect(res.statusCode).toBe(415);
    expect(res.json()).toEqual({
      error: 'unsupported_format',
      message: 'Unsupported document format: .rtf',
    });
  });

  it('answers 422 for a corrupt document', async () => {
    const res = await upload(app, 'report.docx', 'this is not a zip archive');
    expect(res.statusCode).toBe(422);
    expect(res.json().error).toBe('corrupt_document');
  });

  it('attaches an unavailable review when no model is configured', async () => {
    const res = await upload(app, 'notes.txt', 'Inclusive hiring and diversity.', '?review=1');
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.summary).toEqual({ diversity: 1 });
    expect(body.review).toEqual({
      status: 'error',
      message: 'Contextual review unavailable: no model configured',
    });
  });
});

/* ============= POST /scan/text ============= */

describe('POST /scan/text', () => {
  it('scans pasted text', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/scan/text',
      payload: { text: 'A national plan for diversity.' },
    });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.summary).toEqual({ diversity: 1 });
    expect(body.skipped.map((f: { verdict: string }) => f.verdict)).toEqual(['skip_classifier_judgment']);
  });

  it('rejects blank text', async () => {
    const res = await app.inject({ method: 'POST', url: '/scan/text', payload: { text: '   ' } });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'text_required', message: "Body must include non-empty 'text'" });
  });

  it('rejects a body without text', async () => {
    const res = await app.inject({ method: 'POST', url: '/scan/text', payload: { review: true } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('text_required');
  });
});
