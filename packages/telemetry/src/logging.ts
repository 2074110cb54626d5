export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LatchkeyLogLevel = (typeof LOG_LEVELS)[number];

export interface LatchkeyLogEntry {
  readonly timestamp: string;
  readonly level: LatchkeyLogLevel;
  readonly message: string;
  readonly [field: string]: unknown;
}

export type LatchkeyLogSink = (entry: LatchkeyLogEntry, line: string) => void;

export interface LatchkeyLoggerOptions {
  readonly name?: string;
  readonly level?: LatchkeyLogLevel;
  readonly fields?: Record<string, unknown>;
  readonly sink?: LatchkeyLogSink;
  readonly clock?: () => Date;
}

export interface LatchkeyLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): LatchkeyLogger;
}

const LOG_LEVEL_PRIORITY: Record<LatchkeyLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const consoleSink: LatchkeyLogSink = (entry, line) => {
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export const createLatchkeyLogger = (options: LatchkeyLoggerOptions = {}): LatchkeyLogger => {
  const name = options.name ?? "latchkey";
  const threshold = LOG_LEVEL_PRIORITY[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;
  const clock = options.clock ?? (() => new Date());
  const baseFields = {
    service: name,
    ...options.fields,
  } satisfies Record<string, unknown>;

  const createInstance = (contextFields: Record<string, unknown>): LatchkeyLogger => {
    const write = (level: LatchkeyLogLevel, message: string, context?: Record<string, unknown>) => {
      if (LOG_LEVEL_PRIORITY[level] < threshold) {
        return;
      }

      const entry: LatchkeyLogEntry = {
        ...contextFields,
        ...context,
        timestamp: clock().toISOString(),
        level,
        message,
      };
      sink(entry, JSON.stringify(entry));
    };

    return {
      debug(message, context) {
        write("debug", message, context);
      },
      info(message, context) {
        write("info", message, context);
      },
      warn(message, context) {
        write("warn", message, context);
      },
      error(message, context) {
        write("error", message, context);
      },
      child(additionalFields) {
        return createInstance({ ...contextFields, ...additionalFields });
      },
    } satisfies LatchkeyLogger;
  };

  return createInstance(baseFields);
};

export const isLatchkeyLogLevel = (value: string): value is LatchkeyLogLevel =>
  LOG_LEVELS.some((level) => level === value);
