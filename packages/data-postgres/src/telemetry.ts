import {
  createLatchkeyCounter,
  createLatchkeyHistogram,
  createLatchkeyLogger,
  getLatchkeyTracer,
  type LatchkeyCounter,
  type LatchkeyHistogram,
  type LatchkeyInstrumentationOptions,
  type LatchkeyLogger,
  type LatchkeyTracer,
} from "@latchkey/telemetry";

export interface PostgresTelemetryMetrics {
  readonly queryCounter: LatchkeyCounter;
  readonly queryDuration: LatchkeyHistogram;
}

export interface PostgresTelemetryOptions {
  readonly instrumentation?: LatchkeyInstrumentationOptions;
  readonly tracer?: LatchkeyTracer;
  readonly logger?: LatchkeyLogger;
  readonly metrics?: Partial<PostgresTelemetryMetrics>;
}

export interface PostgresTelemetryContext {
  readonly tracer: LatchkeyTracer;
  readonly logger: LatchkeyLogger;
  readonly metrics: PostgresTelemetryMetrics;
}

const DEFAULT_INSTRUMENTATION: LatchkeyInstrumentationOptions = { name: "data-postgres" };

export const createPostgresTelemetry = (
  options: PostgresTelemetryOptions = {},
): PostgresTelemetryContext => {
  const instrumentation: LatchkeyInstrumentationOptions = {
    ...DEFAULT_INSTRUMENTATION,
    ...options.instrumentation,
  };

  const tracer = options.tracer ?? getLatchkeyTracer(instrumentation);
  const logger =
    options.logger ?? createLatchkeyLogger({ name: instrumentation.name ?? "data-postgres" });
  const metrics: PostgresTelemetryMetrics = {
    queryCounter:
      options.metrics?.queryCounter ??
      createLatchkeyCounter("postgres_queries_total", {
        description: "Count of Postgres queries executed.",
        instrumentation,
      }),
    queryDuration:
      options.metrics?.queryDuration ??
      createLatchkeyHistogram("postgres_query_duration_ms", {
        description: "Duration of Postgres queries.",
        unit: "ms",
        instrumentation,
      }),
  };

  return { tracer, logger, metrics } satisfies PostgresTelemetryContext;
};
