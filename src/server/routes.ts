/**
 * HTTP routes over RouterService. Thin: parse, call, map errors.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import { isPeriodKey } from '../budget/index.js';
import { InvalidFeatureInputError, InvalidOutcomeError, isRoutingError } from '../errors.js';
import type { RouterLogger } from '../logging/index.js';
import { correlationContext, createComponentLogger, extractOrGenerateCorrelationId } from '../logging/index.js';
import { OutcomeReportSchema } from '../service/index.js';
import type { RouterService } from '../service/index.js';

const CORRELATION_HEADER = 'x-correlation-id';

const promptContextSchema = z.object({
  hasCodeSelection: z.boolean().optional(),
  sessionAgeMinutes: z.number().min(0).optional(),
}).optional();

// Exactly one of `features` or `prompt`
const routeBodySchema = z.object({
  organization: z.string().min(1),
  user: z.string().min(1),
  features: z.unknown().optional(),
  prompt: z.string().min(1).optional(),
  context: promptContextSchema,
  requestedModel: z.string().min(1).optional(),
  estimatedCost: z.number().min(0).optional(),
}).refine(body => (body.features === undefined) !== (body.prompt === undefined), {
  message: 'Provide either features or prompt',
});

const estimateBodySchema = z.object({
  inputTokens: z.number().int().min(0),
  outputTokens: z.number().int().min(0).optional(),
  models: z.array(z.string().min(1)).min(1).max(50).optional(),
});

const reportQuerySchema = z.object({
  format: z.enum(['json', 'markdown']).default('json'),
});

const usageQuerySchema = z.object({
  period: z.string().refine(isPeriodKey, 'Expected YYYY-MM').optional(),
});

type Status = 400 | 404 | 500 | 503;

function toStatus(code: number): Status {
  switch (code) {
    case 400:
    case 404:
    case 503:
      return code;
    default:
      return 500;
  }
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return undefined;
  }
}

export function createRoutes(service: RouterService, logger?: RouterLogger): Hono {
  const app = new Hono();
  const log = logger ?? createComponentLogger('http');

  app.use('*', async (c, next) => {
    const correlationId = extractOrGenerateCorrelationId(c.req.header(), CORRELATION_HEADER);
    c.header(CORRELATION_HEADER, correlationId);
    await correlationContext.run(correlationId, () => next());
  });

  app.onError((error, c) => {
    if (isRoutingError(error)) {
      const status = toStatus(error.statusCode);
      log.warn('Request rejected', { path: c.req.path, code: error.code, status });
      return c.json({
        error: error.message,
        code: error.code,
        retryable: error.retryable,
        ...((error instanceof InvalidFeatureInputError || error instanceof InvalidOutcomeError)
          && { details: error.issues }),
      }, status);
    }
    log.error('Unhandled request error', error, { path: c.req.path });
    return c.json({ error: 'Internal server error' }, 500);
  });

  /**
   * POST /route - Route one prompt (features or raw prompt text)
   */
  app.post('/route', async (c) => {
    const body = routeBodySchema.safeParse(await readJson(c));
    if (!body.success) {
      return c.json({ error: 'Invalid route request', details: body.error.issues }, 400);
    }

    const { prompt, features, context, ...rest } = body.data;
    const suggestion = prompt !== undefined
      ? await service.suggestRouteForPrompt({ ...rest, prompt, context })
      : await service.suggestRoute({ ...rest, features });

    return c.json(suggestion);
  });

  /**
   * POST /outcome - Report utility and realized cost of a routed request
   */
  app.post('/outcome', async (c) => {
    const report = OutcomeReportSchema.safeParse(await readJson(c));
    if (!report.success) {
      return c.json({ error: 'Invalid outcome report', details: report.error.issues }, 400);
    }
    await service.recordOutcome(report.data);
    return c.json({ ok: true });
  });

  /**
   * GET /budget/:org - Current month budget status
   */
  app.get('/budget/:org', async (c) => {
    return c.json(await service.getBudgetStatus(c.req.param('org')));
  });

  /**
   * GET /usage/:org?period=YYYY-MM - Usage summary for a month
   */
  app.get('/usage/:org', async (c) => {
    const query = usageQuerySchema.safeParse({ period: c.req.query('period') });
    if (!query.success) {
      return c.json({ error: 'Invalid period', details: query.error.issues }, 400);
    }
    return c.json(await service.getUsageSummary(c.req.param('org'), query.data.period));
  });

  /**
   * GET /recommendations/:org - Weekly recommendations
   */
  app.get('/recommendations/:org', async (c) => {
    const recommendations = await service.weeklyRecommendations(c.req.param('org'));
    return c.json({ organization: c.req.param('org'), recommendations });
  });

  /**
   * GET /report/:org?format=json|markdown - ROI report over the analytics window
   */
  app.get('/report/:org', async (c) => {
    const query = reportQuerySchema.safeParse({ format: c.req.query('format') });
    if (!query.success) {
      return c.json({ error: 'Invalid format', details: query.error.issues }, 400);
    }
    const report = await service.optimizeReport(c.req.param('org'));
    return query.data.format === 'markdown' ? c.text(report.markdown) : c.json(report);
  });

  /**
   * POST /estimate - Cost of a request on each model, cheapest first
   */
  app.post('/estimate', async (c) => {
    const body = estimateBodySchema.safeParse(await readJson(c));
    if (!body.success) {
      return c.json({ error: 'Invalid estimate request', details: body.error.issues }, 400);
    }
    return c.json({ estimates: service.estimateCosts(body.data) });
  });

  app.get('/health', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }));

  return app;
}
