import { describe, test, expect } from 'vitest';
import { createRoutes } from '../routes.js';
import { createRouter } from '../../service/factory.js';
import type { CreateRouterOptions } from '../../service/factory.js';
import type { RecordStore } from '../../store/types.js';

const features = {
  mentionsFreshness: true,
  mentionsImplementationVerb: false,
  questionAmbiguityScore: 0,
  lengthBucket: 'medium',
};

function createApp(options: CreateRouterOptions = {}) {
  return createRoutes(createRouter({
    policies: [{ organization: 'acme', monthlyLimit: 100, mode: 'hard' }],
    ...options,
  }));
}

function post(path: string, body: unknown, headers: Record<string, string> = {}) {
  return {
    path,
    init: {
      method: 'POST',
      headers: { 'content-type': 'application/json', ...headers },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    },
  };
}

async function send(app: ReturnType<typeof createApp>, request: ReturnType<typeof post>) {
  return app.request(request.path, request.init);
}

describe('routing API', () => {
  test('should route a feature record', async () => {
    const app = createApp();
    const res = await send(app, post('/route', { organization: 'acme', user: 'alice', features }));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ channel: 'web', refused: false, model: 'openai/gpt-4o' });
  });

  test('should route a raw prompt', async () => {
    const app = createApp();
    const res = await send(app, post('/route', { organization: 'acme', user: 'alice', prompt: 'What is a closure?' }));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ channel: 'direct' });
  });

  test('should require exactly one of features or prompt', async () => {
    const app = createApp();
    const both = await send(app, post('/route', { organization: 'acme', user: 'alice', features, prompt: 'hi' }));
    const neither = await send(app, post('/route', { organization: 'acme', user: 'alice' }));

    expect(both.status).toBe(400);
    expect(await both.json()).toMatchObject({ error: 'Invalid route request' });
    expect(neither.status).toBe(400);
  });

  test('should reject unparseable bodies', async () => {
    const app = createApp();
    const res = await send(app, post('/route', '{not json'));
    expect(res.status).toBe(400);
  });

  test('should map malformed features to a 400 with details', async () => {
    const app = createApp();
    const res = await send(app, post('/route', {
      organization: 'acme',
      user: 'alice',
      features: { ...features, lengthBucket: 'huge' },
    }));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      code: 'INVALID_FEATURE_INPUT',
      retryable: false,
      details: [expect.stringContaining('lengthBucket')],
    });
  });

  test('should map store failures to a retryable 503', async () => {
    const broken: RecordStore<number> = {
      get: () => Promise.reject(new Error('connection reset')),
      update: () => Promise.reject(new Error('connection reset')),
    };
    const app = createApp({ weightStore: broken });
    const res = await send(app, post('/route', { organization: 'acme', user: 'alice', features }));

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ code: 'PERSISTENCE_UNAVAILABLE', retryable: true });
  });

  test('should record outcomes and reflect them in the budget', async () => {
    const app = createApp();
    const outcome = await send(app, post('/outcome', {
      organization: 'acme',
      user: 'alice',
      channel: 'web',
      observedUtility: 1,
      actualCost: 25,
    }));
    expect(outcome.status).toBe(200);
    expect(await outcome.json()).toEqual({ ok: true });

    const budget = await app.request('/budget/acme');
    expect(budget.status).toBe(200);
    expect(await budget.json()).toMatchObject({ cumulativeSpend: 25, percentUsed: 25, state: 'UNDER_THRESHOLD' });
  });

  test('should reject outcomes for unknown channels', async () => {
    const app = createApp();
    const res = await send(app, post('/outcome', {
      organization: 'acme',
      user: 'alice',
      channel: 'email',
      observedUtility: 1,
      actualCost: 0,
    }));
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'Invalid outcome report' });
  });

  test('should validate the usage period', async () => {
    const app = createApp();
    expect((await app.request('/usage/acme?period=2026-13')).status).toBe(400);

    const res = await app.request('/usage/acme?period=2026-02');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ period: '2026-02', totalDecisions: 0 });
  });

  test('should list recommendations', async () => {
    const app = createApp();
    const res = await app.request('/recommendations/acme');
    expect(await res.json()).toEqual({ organization: 'acme', recommendations: [] });
  });

  test('should build the ROI report as JSON or markdown', async () => {
    const app = createApp();
    await send(app, post('/outcome', {
      organization: 'acme',
      user: 'alice',
      channel: 'web',
      observedUtility: 1,
      actualCost: 8,
      tokensIn: 200,
      latencyMs: 400,
    }));

    const json = await app.request('/report/acme');
    expect(json.status).toBe(200);
    expect(await json.json()).toMatchObject({ organization: 'acme', totalCost: 8, potentialSavings: 2 });

    const markdown = await app.request('/report/acme?format=markdown');
    expect(markdown.headers.get('content-type')).toMatch(/^text\/plain/);
    expect((await markdown.text()).split('\n')[4]).toBe('**Spend:** $8.00');
  });

  test('should reject unknown report formats', async () => {
    const app = createApp();
    const res = await app.request('/report/acme?format=pdf');
    expect(res.status).toBe(400);
  });

  test('should estimate costs', async () => {
    const app = createApp();
    const res = await send(app, post('/estimate', {
      inputTokens: 1000,
      outputTokens: 1000,
      models: ['openai/gpt-4o', 'local/tiny-llama'],
    }));
    expect(await res.json()).toEqual({
      estimates: [
        { model: 'local/tiny-llama', cost: 0 },
        { model: 'openai/gpt-4o', cost: 0.0125 },
      ],
    });
  });

  test('should echo a well-formed correlation id', async () => {
    const app = createApp();
    const res = await app.request('/health', { headers: { 'x-correlation-id': 'abcd1234' } });
    expect(res.headers.get('x-correlation-id')).toBe('abcd1234');
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  test('should replace a malformed correlation id', async () => {
    const app = createApp();
    const res = await app.request('/health', { headers: { 'x-correlation-id': 'not-an-id' } });
    expect(res.headers.get('x-correlation-id')).toMatch(/^[a-f0-9]{8}$/);
  });
});
