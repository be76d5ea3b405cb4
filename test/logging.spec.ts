import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, logWith } from "../core/logging/createLogger.js";
import { Mutex } from "../core/utils/mutex.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns no logger in none mode", () => {
    expect(createLogger("none")).toBeUndefined();
  });

  it("prints JSON lines at or above the configured level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = createLogger("console", { level: "warn" });

    logWith(logger, "info", "skipped");
    logWith(logger, "error", "kept", { event: "X", time: 5 });

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
      level: "error",
      msg: "kept",
      event: "X",
      time: 5,
    });
  });

  it("disables the file logger without a path", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    expect(createLogger("file")).toBeUndefined();
  });
});

describe("logWith", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("keeps a throwing logger away from the caller", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    expect(() =>
      logWith(() => {
        throw new Error("sink down");
      }, "info", "hello")
    ).not.toThrow();
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe("Mutex", () => {
  it("runs sections one at a time in call order", async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    const slow = mutex.runExclusive(async () => {
      order.push("a:start");
      await new Promise((resolve) => setTimeout(resolve, 10));
      order.push("a:end");
    });
    const fast = mutex.runExclusive(async () => {
      order.push("b");
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(["a:start", "a:end", "b"]);
  });

  it("keeps running after a section rejects", async () => {
    const mutex = new Mutex();

    const failed = mutex.runExclusive(async () => {
      throw new Error("boom");
    });
    const next = mutex.runExclusive(() => 42);

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe(42);
  });
});
