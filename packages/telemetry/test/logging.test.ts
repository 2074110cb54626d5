import { describe, expect, it } from "vitest";

import { createLatchkeyLogger, isLatchkeyLogLevel, type LatchkeyLogEntry } from "../src/index.js";

const captureLogger = (level: "debug" | "info" | "warn" | "error" = "info") => {
  const entries: LatchkeyLogEntry[] = [];
  const lines: string[] = [];
  const logger = createLatchkeyLogger({
    name: "login",
    level,
    clock: () => new Date("2024-05-01T10:00:00.000Z"),
    sink: (entry, line) => {
      entries.push(entry);
      lines.push(line);
    },
  });
  return { logger, entries, lines };
};

describe("createLatchkeyLogger", () => {
  it("writes one JSON line per entry with the service name", () => {
    const { logger, lines } = captureLogger();
    logger.info("login.succeeded", { userId: 7 });

    expect(lines).toEqual([
      '{"service":"login","userId":7,"timestamp":"2024-05-01T10:00:00.000Z","level":"info","message":"login.succeeded"}',
    ]);
  });

  it("drops entries below the configured level", () => {
    const { logger, entries } = captureLogger("warn");
    logger.debug("ignored");
    logger.info("ignored");
    logger.warn("kept");
    logger.error("kept too");

    expect(entries.map((entry) => entry.level)).toEqual(["warn", "error"]);
  });

  it("merges child fields into every entry", () => {
    const { logger, entries } = captureLogger();
    logger.child({ component: "redis" }).child({ attempt: 2 }).error("redis.ping_failed");

    expect(entries[0]).toMatchObject({ service: "login", component: "redis", attempt: 2, level: "error" });
  });

  it("does not let context override the level or message", () => {
    const { logger, entries } = captureLogger();
    logger.warn("challenge.delete_failed", { level: "debug", message: "other" });

    expect(entries[0]?.level).toBe("warn");
    expect(entries[0]?.message).toBe("challenge.delete_failed");
  });
});

describe("isLatchkeyLogLevel", () => {
  it("recognises the supported levels", () => {
    expect(isLatchkeyLogLevel("debug")).toBe(true);
    expect(isLatchkeyLogLevel("trace")).toBe(false);
  });
});
