/**
 * Ledger query routes: request pages, aggregate stats, daily and hourly
 * rollups, and error cleanup. Window and offset validation lives in the
 * time-window builder; malformed query strings become 400 responses.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { RequestValidationError } from '../../shared/errors.js';
import { buildDailyWindow, buildHourlyWindow, buildTimeFilter } from '../../persistence/time-window.js';
import type { UsageAggregator } from '../../persistence/aggregator.js';
import type { RequestLogger } from '../../persistence/request-logger.js';

const int = z.coerce.number().int();

const WindowQuerySchema = z.object({
  hours: int.optional(),
  start_date: z.string().optional(),
  end_date: z.string().optional(),
  timezone_offset: int.optional(),
});

const RequestsQuerySchema = WindowQuerySchema.extend({
  offset: int.optional(),
  limit: int.optional(),
  provider: z.string().optional(),
  model: z.string().optional(),
  min_cost: z.coerce.number().optional(),
  max_cost: z.coerce.number().optional(),
  search: z.string().optional(),
});

const DailyQuerySchema = z.object({
  start_date: z.string().optional(),
  end_date: z.string().optional(),
  timezone_offset: int.optional(),
});

const HourlyQuerySchema = z.object({
  date: z.string({ error: 'date is required' }),
  timezone_offset: int.optional(),
});

/**
 * Validate a query string. Empty values count as absent.
 * @throws RequestValidationError
 */
function parseQuery<T extends z.ZodType>(schema: T, query: Record<string, string>): z.output<T> {
  const present = Object.fromEntries(Object.entries(query).filter(([, value]) => value !== ''));
  const result = schema.safeParse(present);
  if (!result.success) {
    throw new RequestValidationError(`Invalid query: ${z.prettifyError(result.error)}`);
  }
  return result.data;
}

export interface StatsRouteOptions {
  /** Clock for `hours` windows. */
  now?: () => Date;
}

/**
 * Create ledger query routes.
 * @param aggregator - Read side of the ledger.
 * @param requestLogger - Write side, for clearing errored rows.
 */
export function createStatsRoutes(
  aggregator: UsageAggregator,
  requestLogger: Pick<RequestLogger, 'clearErrors'>,
  options: StatsRouteOptions = {},
) {
  const now = options.now ?? (() => new Date());
  const app = new Hono();

  // GET /requests - Paged successful requests with aggregates
  app.get('/requests', (c) => {
    const query = parseQuery(RequestsQuerySchema, c.req.query());
    const window = buildTimeFilter(
      {
        hours: query.hours,
        startDate: query.start_date,
        endDate: query.end_date,
        timezoneOffset: query.timezone_offset,
      },
      now(),
    );

    return c.json(
      aggregator.getRequests({
        window,
        offset: query.offset,
        limit: query.limit,
        provider: query.provider,
        model: query.model,
        minCost: query.min_cost,
        maxCost: query.max_cost,
        search: query.search,
      }),
    );
  });

  // GET /stats - Totals and breakdowns for a window
  app.get('/stats', (c) => {
    const query = parseQuery(WindowQuerySchema, c.req.query());
    const window = buildTimeFilter(
      {
        hours: query.hours,
        startDate: query.start_date,
        endDate: query.end_date,
        timezoneOffset: query.timezone_offset,
      },
      now(),
    );

    return c.json(aggregator.getStats(window));
  });

  // GET /stats/daily - Per local date, defaulting to the last 30 days
  app.get('/stats/daily', (c) => {
    const query = parseQuery(DailyQuerySchema, c.req.query());
    const window = buildDailyWindow(
      { startDate: query.start_date, endDate: query.end_date, timezoneOffset: query.timezone_offset },
      now(),
    );

    return c.json(aggregator.getDailyStats(window));
  });

  // GET /stats/hourly - Dense 24-hour series for one local day
  app.get('/stats/hourly', (c) => {
    const query = parseQuery(HourlyQuerySchema, c.req.query());
    return c.json(aggregator.getHourlyStats(buildHourlyWindow(query.date, query.timezone_offset)));
  });

  // GET /stats/date-range - First and last date with data
  app.get('/stats/date-range', (c) => {
    return c.json(aggregator.getDateRange());
  });

  // DELETE /errors - Remove every errored row
  app.delete('/errors', (c) => {
    return c.json({ deleted: requestLogger.clearErrors() });
  });

  return app;
}
