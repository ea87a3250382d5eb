/**
 * Read side of the usage ledger: pages, totals and local-time rollups.
 * Every read except the error listing considers successful rows only.
 */

import type Database from 'better-sqlite3';
import type { DailyWindow, HourlyWindow, SqlFragment, SqlParams } from './time-window.js';

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 200;
const RECENT_ERRORS_LIMIT = 10;

/** A successful ledger row as listed by getRequests. */
export interface RequestRow {
  id: number;
  timestamp: string;
  model: string;
  provider: string | null;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  cost: number;
  durationMs: number;
  requestData: string | null;
  responseData: string | null;
}

export interface RequestFilter {
  window?: SqlFragment;
  offset?: number;
  limit?: number;
  provider?: string;
  model?: string;
  minCost?: number;
  maxCost?: number;
  /** Substring matched against the model and both serialized payloads. */
  search?: string;
}

export interface RequestPage {
  requests: RequestRow[];
  total: number;
  totalTokens: number;
  totalCost: number;
  avgCost: number;
  offset: number;
  limit: number;
}

export interface UsageStats {
  totals: {
    requests: number;
    cost: number;
    promptTokens: number;
    completionTokens: number;
    avgDurationMs: number;
  };
  byModel: Array<{ model: string; provider: string | null; requests: number; cost: number; tokens: number }>;
  byProvider: Array<{ provider: string | null; requests: number; cost: number; tokens: number }>;
  performance: Array<{
    model: string;
    requests: number;
    avgTokensPerSec: number;
    avgDurationMs: number;
    minTokensPerSec: number;
    maxTokensPerSec: number;
    avgCostPerRequest: number;
  }>;
  recentErrors: Array<{ timestamp: string; model: string; error: string }>;
}

export interface ModelBreakdown {
  provider: string | null;
  model: string;
  requests: number;
  cost: number;
}

export interface DailyBucket {
  date: string;
  requests: number;
  cost: number;
  totalTokens: number;
  byModel: ModelBreakdown[];
}

export interface DailyStats {
  startDate: string;
  endDate: string;
  daily: DailyBucket[];
  totalDays: number;
  totalCost: number;
  totalRequests: number;
}

export interface HourlyBucket {
  hour: number;
  requests: number;
  cost: number;
  totalTokens: number;
  byModel: ModelBreakdown[];
}

export interface HourlyStats {
  date: string;
  hourly: HourlyBucket[];
  totalCost: number;
  totalRequests: number;
}

export interface DateRange {
  startDate: string | null;
  endDate: string | null;
}

interface BucketRow {
  bucket: string | number;
  provider: string | null;
  model: string;
  requests: number;
  cost: number | null;
  tokens: number | null;
}

/** Round half away from zero to a fixed number of decimals. */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Clamp a page size to [1, 200], defaulting to 50. */
export function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) {
    return DEFAULT_PAGE_SIZE;
  }
  return Math.min(Math.max(Math.floor(limit), 1), MAX_PAGE_SIZE);
}

function clampOffset(offset: number | undefined): number {
  if (offset === undefined || !Number.isFinite(offset) || offset < 0) {
    return 0;
  }
  return Math.floor(offset);
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function whereClause(base: string, fragments: readonly string[]): string {
  return [base, ...fragments.filter((f) => f.length > 0)].join(' AND ');
}

/** better-sqlite3 rejects a bind object for a statement without parameters. */
function bind(params: SqlParams): [SqlParams] | [] {
  return Object.keys(params).length > 0 ? [params] : [];
}

/**
 * UsageAggregator provides read access to the requests ledger.
 * Statements with a fixed shape are prepared once; window-dependent ones are
 * prepared per call.
 */
export class UsageAggregator {
  private readonly db: Database.Database;
  private readonly dateRangeStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.db = db;
    this.dateRangeStmt = db.prepare(`
      SELECT
        MIN(DATE(timestamp)) as startDate,
        MAX(DATE(timestamp)) as endDate
      FROM requests
      WHERE error IS NULL
    `);
  }

  /**
   * Page through successful requests, newest first, with aggregates over
   * every matching row.
   */
  getRequests(filter: RequestFilter = {}): RequestPage {
    const limit = clampLimit(filter.limit);
    const offset = clampOffset(filter.offset);

    const conditions: string[] = [filter.window?.sql ?? ''];
    const params: SqlParams = { ...(filter.window?.params ?? {}) };

    if (filter.provider) {
      conditions.push('provider = @provider');
      params['provider'] = filter.provider;
    }
    if (filter.model) {
      conditions.push('model = @model');
      params['model'] = filter.model;
    }
    if (filter.minCost !== undefined) {
      conditions.push('cost >= @minCost');
      params['minCost'] = filter.minCost;
    }
    if (filter.maxCost !== undefined) {
      conditions.push('cost <= @maxCost');
      params['maxCost'] = filter.maxCost;
    }
    if (filter.search) {
      conditions.push(
        "(model LIKE @search ESCAPE '\\' OR request_data LIKE @search ESCAPE '\\' OR response_data LIKE @search ESCAPE '\\')",
      );
      params['search'] = `%${escapeLike(filter.search)}%`;
    }

    const where = whereClause('error IS NULL', conditions);

    const aggregate = this.db
      .prepare(`
        SELECT
          COUNT(*) as total,
          COALESCE(SUM(total_tokens), 0) as totalTokens,
          COALESCE(SUM(cost), 0) as totalCost,
          COALESCE(AVG(cost), 0) as avgCost
        FROM requests
        WHERE ${where}
      `)
      .get(...bind(params)) as { total: number; totalTokens: number; totalCost: number; avgCost: number };

    const requests = this.db
      .prepare(`
        SELECT
          id,
          timestamp,
          model,
          provider,
          prompt_tokens as promptTokens,
          completion_tokens as completionTokens,
          total_tokens as totalTokens,
          cost,
          duration_ms as durationMs,
          request_data as requestData,
          response_data as responseData
        FROM requests
        WHERE ${where}
        ORDER BY timestamp DESC, id DESC
        LIMIT ${limit} OFFSET ${offset}
      `)
      .all(...bind(params)) as RequestRow[];

    return {
      requests,
      total: aggregate.total,
      totalTokens: aggregate.totalTokens,
      totalCost: aggregate.totalCost,
      avgCost: aggregate.avgCost,
      offset,
      limit,
    };
  }

  /** Totals, per-model and per-provider breakdowns, throughput and recent errors. */
  getStats(window: SqlFragment = { sql: '', params: {} }): UsageStats {
    const success = whereClause('error IS NULL', [window.sql]);
    const params = bind(window.params);

    const totals = this.db
      .prepare(`
        SELECT
          COUNT(*) as requests,
          COALESCE(SUM(cost), 0) as cost,
          COALESCE(SUM(prompt_tokens), 0) as promptTokens,
          COALESCE(SUM(completion_tokens), 0) as completionTokens,
          COALESCE(AVG(duration_ms), 0) as avgDurationMs
        FROM requests
        WHERE ${success}
      `)
      .get(...params) as UsageStats['totals'];

    const byModel = this.db
      .prepare(`
        SELECT
          model,
          provider,
          COUNT(*) as requests,
          COALESCE(SUM(cost), 0) as cost,
          COALESCE(SUM(total_tokens), 0) as tokens
        FROM requests
        WHERE ${success}
        GROUP BY model, provider
        ORDER BY cost DESC, model ASC
      `)
      .all(...params) as UsageStats['byModel'];

    const byProvider = this.db
      .prepare(`
        SELECT
          provider,
          COUNT(*) as requests,
          COALESCE(SUM(cost), 0) as cost,
          COALESCE(SUM(total_tokens), 0) as tokens
        FROM requests
        WHERE ${success}
        GROUP BY provider
        ORDER BY cost DESC, provider ASC
      `)
      .all(...params) as UsageStats['byProvider'];

    // Throughput only makes sense with a positive duration and some output
    const performance = this.db
      .prepare(`
        SELECT
          model,
          COUNT(*) as requests,
          AVG(CAST(completion_tokens AS REAL) / (CAST(duration_ms AS REAL) / 1000.0)) as avgTokensPerSec,
          AVG(duration_ms) as avgDurationMs,
          MIN(CAST(completion_tokens AS REAL) / (CAST(duration_ms AS REAL) / 1000.0)) as minTokensPerSec,
          MAX(CAST(completion_tokens AS REAL) / (CAST(duration_ms AS REAL) / 1000.0)) as maxTokensPerSec,
          AVG(cost) as avgCostPerRequest
        FROM requests
        WHERE ${whereClause('error IS NULL AND completion_tokens > 0 AND duration_ms > 0', [window.sql])}
        GROUP BY model
        ORDER BY avgTokensPerSec DESC, model ASC
      `)
      .all(...params) as UsageStats['performance'];

    const recentErrors = this.db
      .prepare(`
        SELECT timestamp, model, error
        FROM requests
        WHERE ${whereClause('error IS NOT NULL', [window.sql])}
        ORDER BY timestamp DESC, id DESC
        LIMIT ${RECENT_ERRORS_LIMIT}
      `)
      .all(...params) as UsageStats['recentErrors'];

    return {
      totals: {
        requests: totals.requests,
        cost: roundTo(totals.cost, 4),
        promptTokens: totals.promptTokens,
        completionTokens: totals.completionTokens,
        avgDurationMs: roundTo(totals.avgDurationMs, 2),
      },
      byModel: byModel.map((row) => ({ ...row, cost: roundTo(row.cost, 4) })),
      byProvider: byProvider.map((row) => ({ ...row, cost: roundTo(row.cost, 4) })),
      performance: performance.map((row) => ({
        model: row.model,
        requests: row.requests,
        avgTokensPerSec: roundTo(row.avgTokensPerSec, 2),
        avgDurationMs: roundTo(row.avgDurationMs, 2),
        minTokensPerSec: roundTo(row.minTokensPerSec, 2),
        maxTokensPerSec: roundTo(row.maxTokensPerSec, 2),
        avgCostPerRequest: roundTo(row.avgCostPerRequest, 6),
      })),
      recentErrors,
    };
  }

  /** Per local date, newest first, with a provider+model breakdown. */
  getDailyStats(window: DailyWindow): DailyStats {
    const rows = this.bucketRows(window.filter, window.grouping, 'DESC');

    const buckets = new Map<string, DailyBucket>();
    for (const row of rows) {
      const date = String(row.bucket);
      const bucket = buckets.get(date) ?? { date, requests: 0, cost: 0, totalTokens: 0, byModel: [] };
      accumulate(bucket, row);
      buckets.set(date, bucket);
    }

    const daily = [...buckets.values()].map((bucket) => ({ ...bucket, cost: roundTo(bucket.cost, 4) }));

    return {
      startDate: window.startDate,
      endDate: window.endDate,
      daily,
      totalDays: daily.length,
      totalCost: roundTo(
        daily.reduce((sum, day) => sum + day.cost, 0),
        4,
      ),
      totalRequests: daily.reduce((sum, day) => sum + day.requests, 0),
    };
  }

  /** Dense 24-hour series for one local day; empty hours are zero-filled. */
  getHourlyStats(window: HourlyWindow): HourlyStats {
    const rows = this.bucketRows(window.filter, window.grouping, 'ASC');

    const hourly: HourlyBucket[] = Array.from({ length: 24 }, (_, hour) => ({
      hour,
      requests: 0,
      cost: 0,
      totalTokens: 0,
      byModel: [],
    }));

    for (const row of rows) {
      const bucket = hourly[Number(row.bucket)];
      if (bucket) {
        accumulate(bucket, row);
      }
    }

    for (const bucket of hourly) {
      bucket.cost = roundTo(bucket.cost, 4);
    }

    return {
      date: window.date,
      hourly,
      totalCost: roundTo(
        hourly.reduce((sum, hour) => sum + hour.cost, 0),
        4,
      ),
      totalRequests: hourly.reduce((sum, hour) => sum + hour.requests, 0),
    };
  }

  /** First and last UTC date with successful rows. */
  getDateRange(): DateRange {
    const row = this.dateRangeStmt.get() as DateRange | undefined;
    return { startDate: row?.startDate ?? null, endDate: row?.endDate ?? null };
  }

  private bucketRows(filter: SqlFragment, grouping: SqlFragment, order: 'ASC' | 'DESC'): BucketRow[] {
    return this.db
      .prepare(`
        SELECT
          ${grouping.sql} as bucket,
          provider,
          model,
          COUNT(*) as requests,
          SUM(cost) as cost,
          SUM(total_tokens) as tokens
        FROM requests
        WHERE ${whereClause('error IS NULL', [filter.sql])}
        GROUP BY bucket, provider, model
        ORDER BY bucket ${order}, cost DESC, model ASC
      `)
      .all(...bind({ ...filter.params, ...grouping.params })) as BucketRow[];
  }
}

function accumulate(bucket: { requests: number; cost: number; totalTokens: number; byModel: ModelBreakdown[] }, row: BucketRow): void {
  bucket.requests += row.requests;
  bucket.cost += row.cost ?? 0;
  bucket.totalTokens += row.tokens ?? 0;
  bucket.byModel.push({
    provider: row.provider,
    model: row.model,
    requests: row.requests,
    cost: roundTo(row.cost ?? 0, 4),
  });
}
