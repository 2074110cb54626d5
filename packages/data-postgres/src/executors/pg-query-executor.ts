import type { QueryResult as PgQueryResult } from "pg";

import { runWithSpan } from "@latchkey/telemetry";

import type { PostgresTelemetryContext } from "../telemetry.js";
import type { QueryExecutor, QueryResult } from "./query-executor.js";

/** Structural view of `pg.Pool`, `pg.PoolClient` and pg-mem's adapter. */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<PgQueryResult>;
}

export interface CreatePgQueryExecutorOptions {
  readonly telemetry?: PostgresTelemetryContext;
}

const truncateStatement = (sql: string, limit = 200): string =>
  sql.length > limit ? `${sql.slice(0, limit)}…` : sql;

const execute = async <Row>(
  queryable: PgQueryable,
  sql: string,
  params: ReadonlyArray<unknown>,
): Promise<QueryResult<Row>> => {
  const result = await queryable.query(sql, [...params]);
  const rows: ReadonlyArray<Row> = result.rows;
  return { rows, rowCount: result.rowCount ?? rows.length };
};

export const createPgQueryExecutor = (
  queryable: PgQueryable,
  options: CreatePgQueryExecutorOptions = {},
): QueryExecutor => ({
  async query<Row = Record<string, unknown>>(
    sql: string,
    params: ReadonlyArray<unknown> = [],
  ): Promise<QueryResult<Row>> {
    const telemetry = options.telemetry;
    if (!telemetry) {
      return execute<Row>(queryable, sql, params);
    }

    const start = performance.now();
    let outcome: "ok" | "error" = "ok";

    try {
      return await runWithSpan(
        telemetry.tracer,
        "postgres.query",
        async (span) => {
          span.setAttribute("db.system", "postgresql");
          span.setAttribute("db.statement", truncateStatement(sql));
          span.setAttribute("db.sql.parameters_length", params.length);
          const result = await execute<Row>(queryable, sql, params);
          span.setAttribute("db.rows_returned", result.rowCount);
          return result;
        },
        {
          onError: (error) => {
            outcome = "error";
            telemetry.logger.error("postgres.query.failed", {
              statement: truncateStatement(sql),
              error: error instanceof Error ? error.message : String(error),
            });
          },
        },
      );
    } finally {
      const duration = performance.now() - start;
      telemetry.logger.debug("postgres.query.completed", {
        statement: truncateStatement(sql),
        durationMs: duration,
        outcome,
      });
      telemetry.metrics.queryCounter.add(1, { outcome });
      telemetry.metrics.queryDuration.record(duration, { outcome });
    }
  },
});
