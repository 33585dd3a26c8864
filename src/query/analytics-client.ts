import { setTimeout as sleep } from 'node:timers/promises';
import { Agent, request, type Dispatcher } from 'undici';
import { z } from 'zod';
import type { QueryConfig } from '../config.js';
import { QueryServiceError, UnexpectedResponseError } from '../errors.js';
import type { QueryClient, QueryParams, QueryRow } from '../types/query.js';
import { logger } from '../utils/logger.js';

const TERMINAL_FAILURES = new Set([
  'QUERY_STATE_FAILED',
  'QUERY_STATE_CANCELLED',
  'QUERY_STATE_EXPIRED',
]);
const COMPLETED = 'QUERY_STATE_COMPLETED';

const executeResponseSchema = z.object({
  execution_id: z.string().min(1),
  state: z.string().optional(),
});

const statusResponseSchema = z.object({
  execution_id: z.string(),
  state: z.string(),
});

const resultsResponseSchema = z.object({
  execution_id: z.string(),
  state: z.string(),
  result: z.object({
    rows: z.array(z.record(z.unknown())),
  }),
});

/**
 * Client for an execute / poll / fetch-results analytics API (Dune-style).
 * A saved, parameterized query is executed with the window's dates, its
 * status polled until it settles, and the result rows returned.
 */
export class AnalyticsQueryClient implements QueryClient {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(
    private readonly config: QueryConfig,
    dispatcher?: Dispatcher,
  ) {
    this.ownsDispatcher = dispatcher === undefined;
    this.dispatcher =
      dispatcher ??
      new Agent({
        headersTimeout: config.requestTimeoutMs,
        bodyTimeout: config.requestTimeoutMs,
      });
  }

  async runQuery(params: QueryParams): Promise<QueryRow[]> {
    const log = logger.child({ queryId: this.config.queryId });

    const executed = await this.call(
      'POST',
      `/api/v1/query/${this.config.queryId}/execute`,
      executeResponseSchema,
      { query_parameters: params },
    );
    const executionId = executed.execution_id;
    log.debug({ executionId }, 'Query execution started');

    const deadline = Date.now() + this.config.executionTimeoutMs;
    for (;;) {
      const status = await this.call(
        'GET',
        `/api/v1/execution/${executionId}/status`,
        statusResponseSchema,
      );
      if (status.state === COMPLETED) break;
      if (TERMINAL_FAILURES.has(status.state)) {
        throw new QueryServiceError(`Query execution ${executionId} ended in ${status.state}`);
      }
      if (Date.now() >= deadline) {
        throw new QueryServiceError(
          `Query execution ${executionId} did not finish within ${this.config.executionTimeoutMs}ms`,
        );
      }
      await sleep(this.config.pollIntervalMs);
    }

    const results = await this.call(
      'GET',
      `/api/v1/execution/${executionId}/results`,
      resultsResponseSchema,
    );
    log.info({ executionId, rows: results.result.rows.length }, 'Query results received');
    return results.result.rows;
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) await this.dispatcher.close();
  }

  private async call<T>(
    method: 'GET' | 'POST',
    urlPath: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    payload?: unknown,
  ): Promise<T> {
    const url = new URL(urlPath, this.config.apiUrl).toString();
    const { statusCode, body } = await request(url, {
      method,
      dispatcher: this.dispatcher,
      headers: {
        'X-Dune-API-Key': this.config.apiKey,
        'Content-Type': 'application/json',
      },
      body: payload === undefined ? undefined : JSON.stringify(payload),
      headersTimeout: this.config.requestTimeoutMs,
      bodyTimeout: this.config.requestTimeoutMs,
    });

    if (statusCode < 200 || statusCode >= 300) {
      const text = await body.text();
      throw new QueryServiceError(
        `${method} ${urlPath} returned HTTP ${statusCode}: ${text.slice(0, 200)}`,
        statusCode,
      );
    }

    let data: unknown;
    try {
      data = await body.json();
    } catch (err) {
      throw new UnexpectedResponseError(`${method} ${urlPath} returned a non-JSON body`, {
        cause: err,
      });
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new UnexpectedResponseError(
        `${method} ${urlPath} returned an unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      );
    }
    return parsed.data;
  }
}
