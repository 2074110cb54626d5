import { metrics, type Counter, type Histogram, type Meter, type MetricOptions } from "@opentelemetry/api";

export interface LatchkeyInstrumentationOptions {
  readonly name?: string;
  readonly version?: string;
  readonly schemaUrl?: string;
}

const DEFAULT_INSTRUMENTATION_NAME = "latchkey";

export const getLatchkeyMeter = (options: LatchkeyInstrumentationOptions = {}): Meter =>
  metrics.getMeter(options.name ?? DEFAULT_INSTRUMENTATION_NAME, options.version, {
    schemaUrl: options.schemaUrl,
  });

export interface LatchkeyMetricOptions extends MetricOptions {
  readonly instrumentation?: LatchkeyInstrumentationOptions;
}

export type LatchkeyCounter = Counter;
export type LatchkeyHistogram = Histogram;

export const createLatchkeyCounter = (name: string, options: LatchkeyMetricOptions = {}): Counter => {
  const { instrumentation, ...counterOptions } = options;
  return getLatchkeyMeter(instrumentation).createCounter(name, counterOptions);
};

export const createLatchkeyHistogram = (name: string, options: LatchkeyMetricOptions = {}): Histogram => {
  const { instrumentation, ...histogramOptions } = options;
  return getLatchkeyMeter(instrumentation).createHistogram(name, histogramOptions);
};
