import {
  createLatchkeyCounter,
  createLatchkeyHistogram,
  createLatchkeyLogger,
  getLatchkeyTracer,
  runWithSpan,
  SpanStatusCode,
  type LatchkeyCounter,
  type LatchkeyHistogram,
  type LatchkeyInstrumentationOptions,
  type LatchkeyLogger,
  type LatchkeyTracer,
} from "@latchkey/telemetry";

import { errorResponse, jsonResponse } from "./envelope.js";
import { createLoginFetchHandler, type LoginServiceLike } from "./login-handler.js";

export interface StoreHealthCheck {
  readonly name: string;
  readonly check: () => Promise<boolean>;
}

export interface LoginServerMetrics {
  readonly requestCounter: LatchkeyCounter;
  readonly requestDuration: LatchkeyHistogram;
  readonly healthCheckCounter?: LatchkeyCounter;
}

export interface LoginServerOptions {
  readonly service: LoginServiceLike;
  readonly loginPath?: string;
  readonly healthPath?: string;
  readonly requestTimeoutMs?: number;
  readonly healthChecks?: ReadonlyArray<StoreHealthCheck>;
  readonly metrics?: LoginServerMetrics;
  readonly instrumentation?: LatchkeyInstrumentationOptions;
  readonly tracer?: LatchkeyTracer;
  readonly logger?: LatchkeyLogger;
}

export interface HealthCheckResponse {
  readonly ok: boolean;
  readonly stores: ReadonlyArray<StoreHealthStatus>;
}

export interface StoreHealthStatus {
  readonly name: string;
  readonly healthy: boolean;
  readonly error?: string;
}

export const createLoginServer = (options: LoginServerOptions): ((request: Request) => Promise<Response>) => {
  const instrumentation = options.instrumentation ?? { name: "login-server" };
  const metrics = resolveMetrics(options.metrics, instrumentation);
  const loginPath = normalizePath(options.loginPath ?? "/login");
  const healthPath = normalizePath(options.healthPath ?? "/healthz");
  const healthChecks = options.healthChecks ?? [];
  const tracer = options.tracer ?? getLatchkeyTracer(instrumentation);
  const logger = options.logger ?? createLatchkeyLogger({ name: instrumentation.name ?? "login-server" });
  const loginHandler = createLoginFetchHandler(options.service, {
    requestTimeoutMs: options.requestTimeoutMs,
    logger,
  });

  return async (request: Request): Promise<Response> => {
    const url = new URL(request.url);
    const path = normalizePath(url.pathname);

    if (path === healthPath && request.method.toUpperCase() === "GET") {
      logger.debug("server.health_check");
      return handleHealthCheck(healthChecks, metrics, logger);
    }

    if (path !== loginPath) {
      logger.debug("server.route_not_found", { method: request.method, path });
      return errorResponse("not_found");
    }

    const start = performance.now();
    try {
      return await runWithSpan(
        tracer,
        "login.request",
        async (span) => {
          span.setAttribute("http.method", request.method);
          span.setAttribute("http.target", url.pathname);

          try {
            const response = await loginHandler(request);
            span.setAttribute("http.status_code", response.status);
            recordRequestMetrics(metrics, {
              durationMs: performance.now() - start,
              status: response.status,
              route: loginPath,
            });
            logger.info("server.request_completed", { route: loginPath, status: response.status });
            return response;
          } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            span.setStatus({ code: SpanStatusCode.ERROR, message });
            span.setAttribute("http.status_code", 500);
            logger.error("server.request_failed", { route: loginPath, error: message });
            throw error;
          }
        },
        { attributes: { "http.route": loginPath } },
      );
    } catch {
      recordRequestMetrics(metrics, {
        durationMs: performance.now() - start,
        status: 500,
        route: loginPath,
      });
      return errorResponse("internal");
    }
  };
};

const normalizePath = (path: string): string => (path.endsWith("/") && path !== "/" ? path.slice(0, -1) : path);

const handleHealthCheck = async (
  checks: ReadonlyArray<StoreHealthCheck>,
  metrics: LoginServerMetrics,
  logger: LatchkeyLogger,
): Promise<Response> => {
  const results: StoreHealthStatus[] = await Promise.all(
    checks.map(async (check) => {
      try {
        const healthy = await check.check();
        return { name: check.name, healthy } satisfies StoreHealthStatus;
      } catch (error) {
        return {
          name: check.name,
          healthy: false,
          error: error instanceof Error ? error.message : String(error),
        } satisfies StoreHealthStatus;
      }
    }),
  );

  const ok = results.every((result) => result.healthy);
  metrics.healthCheckCounter?.add(1, { status: ok ? "ok" : "error" });

  logger.info("server.health_check_completed", {
    ok,
    unhealthyStores: results.filter((result) => !result.healthy).map((result) => result.name),
  });

  const body: HealthCheckResponse = { ok, stores: results };
  return jsonResponse(body, ok ? 200 : 503);
};

interface RequestMetricContext {
  readonly status: number;
  readonly durationMs: number;
  readonly route: string;
}

const recordRequestMetrics = (metrics: LoginServerMetrics, context: RequestMetricContext): void => {
  metrics.requestCounter.add(1, { route: context.route, status: context.status });
  metrics.requestDuration.record(context.durationMs, { route: context.route, status: context.status });
};

const resolveMetrics = (
  metrics: LoginServerMetrics | undefined,
  instrumentation: LatchkeyInstrumentationOptions,
): LoginServerMetrics => {
  if (metrics) {
    return metrics;
  }

  return {
    requestCounter: createLatchkeyCounter("login_requests_total", {
      description: "Count of login requests handled",
      instrumentation,
    }),
    requestDuration: createLatchkeyHistogram("login_request_duration_ms", {
      description: "Login request duration",
      unit: "ms",
      instrumentation,
    }),
    healthCheckCounter: createLatchkeyCounter("login_health_checks_total", {
      description: "Count of health checks",
      instrumentation,
    }),
  };
};
