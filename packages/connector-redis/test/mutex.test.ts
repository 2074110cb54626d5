import { describe, expect, it } from "vitest";

import { Mutex } from "../src/index.js";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("Mutex", () => {
  it("runs tasks one at a time in call order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    await Promise.all([
      mutex.runExclusive(async () => {
        events.push("a:start");
        await delay(10);
        events.push("a:end");
      }),
      mutex.runExclusive(async () => {
        events.push("b:start");
        events.push("b:end");
      }),
    ]);

    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("releases the lock after a rejected task", async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(mutex.runExclusive(async () => "next")).resolves.toBe("next");
  });
});
