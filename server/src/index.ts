import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { HTTPException } from 'hono/http-exception';
import { z, ZodError } from 'zod';
import {
  InvalidDateError,
  MAX_ITEMS,
  formatDate,
  normalizeItems,
  parseDateKey,
  renderProgress,
  renderTodayReviews,
  todayKey,
} from '@recall-curve/shared';
import type {
  AnalysisResponse,
  DeleteEntryResponse,
  EntryMutationResponse,
  Env,
  HealthResponse,
} from './types';
import * as db from './db/queries';
import { StoreCorruptError } from './db/store';
import { AnalysisFailedError } from './services/analysis';

const app = new Hono<{ Bindings: Env }>();

const dateComponent = z.union([z.number(), z.string()]);

const addEntrySchema = z.object({
  year: dateComponent,
  month: dateComponent,
  day: dateComponent,
  items: z.array(z.string()).max(MAX_ITEMS, `At most ${MAX_ITEMS} study items per entry`),
});

function today(env: Env): string {
  return todayKey(env.CLOCK());
}

function dateParam(value: string): string {
  parseDateKey(value); // throws InvalidDateError
  return value;
}

function indexParam(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new HTTPException(400, { message: `Invalid review index: ${value}` });
  }
  return Number(value);
}

const MARKDOWN_CONTENT_TYPE = 'text/markdown; charset=utf-8';

app.use('/api/*', logger());

// CORS for the Vite dev server (or a configured origin)
app.use('/api/*', cors({
  origin: (origin, c) => {
    if (c.env.CORS_ORIGIN) {
      return c.env.CORS_ORIGIN;
    }
    if (origin?.includes('localhost') || origin?.includes('127.0.0.1')) {
      return origin;
    }
    return null;
  },
}));

app.onError((err, c) => {
  if (err instanceof HTTPException) {
    return c.json({ error: err.message }, err.status);
  }
  if (err instanceof InvalidDateError) {
    return c.json({ error: err.message }, 400);
  }
  if (err instanceof ZodError) {
    return c.json({ error: err.issues.map((i) => i.message).join('; ') }, 400);
  }
  if (err instanceof AnalysisFailedError) {
    return c.json({ error: err.message }, 502);
  }
  if (err instanceof StoreCorruptError) {
    console.error('[API] Data file unreadable:', err.message);
    return c.json({ error: err.message }, 500);
  }
  console.error('[API] Unhandled error:', err);
  return c.json({ error: 'Internal server error' }, 500);
});

app.get('/api/health', (c) => {
  const health: HealthResponse = { status: 'ok', analysis_enabled: c.env.ANALYZER !== null };
  return c.json(health);
});

// ============ Entries ============

app.get('/api/entries', async (c) => {
  return c.json(await db.listEntries(c.env.STORE));
});

app.get('/api/entries/dates', async (c) => {
  return c.json(await db.getExistingDates(c.env.STORE));
});

app.get('/api/entries/:date', async (c) => {
  const date = dateParam(c.req.param('date'));
  const items = await db.getItemsForDate(c.env.STORE, date);
  if (items === null) {
    return c.json({ error: `No study entry for ${date}` }, 404);
  }
  return c.json({ date, items });
});

app.post('/api/entries', async (c) => {
  const body: unknown = await c.req.json().catch(() => {
    throw new HTTPException(400, { message: 'Request body must be JSON' });
  });
  const { year, month, day, items } = addEntrySchema.parse(body);

  const date = formatDate(year, month, day);
  const kept = normalizeItems(items);
  if (kept.length === 0) {
    return c.json({ error: 'Add at least one study item' }, 400);
  }

  const { entry, created } = await db.addLearningEntry(c.env.STORE, date, kept);
  console.log(`[API] ${created ? 'Added' : 'Updated'} entry ${date} (${kept.length} items)`);

  const response: EntryMutationResponse = {
    message: created ? 'Study entry added' : 'Study entry updated',
    created,
    entry,
  };
  return c.json(response, created ? 201 : 200);
});

app.delete('/api/entries/:date', async (c) => {
  const date = dateParam(c.req.param('date'));
  const deleted = await db.deleteEntry(c.env.STORE, date);
  const response: DeleteEntryResponse = {
    message: deleted ? `Deleted study entry for ${date}` : `No study entry for ${date}`,
    deleted,
  };
  return c.json(response);
});

app.post('/api/entries/:date/reviews/:index/complete', async (c) => {
  const date = dateParam(c.req.param('date'));
  const index = indexParam(c.req.param('index'));

  const completed = await db.completeEntryReview(c.env.STORE, date, index);
  if (!completed) {
    return c.json({ error: `No review ${index + 1} for ${date}` }, 404);
  }
  return c.json(await db.getDueReviews(c.env.STORE, today(c.env)));
});

// ============ Reviews ============

app.get('/api/reviews/today', async (c) => {
  return c.json(await db.getDueReviews(c.env.STORE, today(c.env)));
});

app.get('/api/reviews/today/markdown', async (c) => {
  const reviews = await db.getDueReviews(c.env.STORE, today(c.env));
  c.header('Content-Type', MARKDOWN_CONTENT_TYPE);
  return c.body(renderTodayReviews(reviews));
});

app.post('/api/reviews/today/:index/complete', async (c) => {
  const index = indexParam(c.req.param('index'));
  const date = today(c.env);

  const completed = await db.markDueReviewCompleted(c.env.STORE, index, date);
  if (!completed) {
    return c.json({ error: `No review #${index + 1} due today` }, 404);
  }
  return c.json(await db.getDueReviews(c.env.STORE, date));
});

// ============ Progress ============

app.get('/api/progress', async (c) => {
  return c.json(await db.getProgress(c.env.STORE, today(c.env)));
});

app.get('/api/progress/markdown', async (c) => {
  const cards = await db.getProgress(c.env.STORE, today(c.env));
  c.header('Content-Type', MARKDOWN_CONTENT_TYPE);
  return c.body(renderProgress(cards));
});

// ============ Analysis ============

app.post('/api/analysis', async (c) => {
  const analyzer = c.env.ANALYZER;
  if (!analyzer) {
    return c.json({ error: 'Analysis is not configured. Set ANTHROPIC_API_KEY to enable it.' }, 503);
  }

  const date = today(c.env);
  const report = renderProgress(await db.getProgress(c.env.STORE, date));
  const analysis = await analyzer.analyze(report, date);
  const response: AnalysisResponse = { analysis };
  return c.json(response);
});

export default app;
