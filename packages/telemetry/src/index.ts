export type { LatchkeyInstrumentationOptions, LatchkeyMetricOptions, LatchkeyCounter, LatchkeyHistogram } from "./metrics.js";
export { getLatchkeyMeter, createLatchkeyCounter, createLatchkeyHistogram } from "./metrics.js";

export type {
  LatchkeyLogger,
  LatchkeyLoggerOptions,
  LatchkeyLogLevel,
  LatchkeyLogEntry,
  LatchkeyLogSink,
} from "./logging.js";
export { createLatchkeyLogger, isLatchkeyLogLevel, LOG_LEVELS } from "./logging.js";

export type { LatchkeyTracer, RunWithSpanOptions } from "./tracing.js";
export { getLatchkeyTracer, runWithSpan, SpanStatusCode } from "./tracing.js";
