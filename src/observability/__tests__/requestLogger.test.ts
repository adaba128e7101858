import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { recordHttpRequest } from '../metrics';
import { registerRequestLogger, requestIdGenerator } from '../requestLogger';

vi.mock('../metrics', () => ({
  recordHttpRequest: vi.fn(),
}));

const mockedRecord = vi.mocked(recordHttpRequest);

let app: FastifyInstance;

beforeAll(async () => {
  app = Fastify({ logger: false, genReqId: requestIdGenerator });
  registerRequestLogger(app);
  app.get('/terms/:id', async () => ({ ok: true }));
  await app.ready();
});

afterAll(async () => {
  await app.close();
});

beforeEach(() => {
  mockedRecord.mockReset();
});

describe('registerRequestLogger', () => {
  it('labels matched requests with the route pattern', async () => {
    await app.inject({ method: 'GET', url: '/terms/42' });
    expect(mockedRecord).toHaveBeenCalledTimes(1);
    expect(mockedRecord.mock.calls[0].slice(0, 3)).toEqual(['GET', '/terms/:id', 200]);
  });

  it('labels every unmatched url the same way', async () => {
    await app.inject({ method: 'POST', url: '/scan/abc123' });
    await app.inject({ method: 'POST', url: '/scan/def456?x=1' });
    expect(mockedRecord.mock.calls.map((call) => call.slice(0, 3))).toEqual([
      ['POST', 'unmatched', 404],
      ['POST', 'unmatched', 404],
    ]);
  });
});
