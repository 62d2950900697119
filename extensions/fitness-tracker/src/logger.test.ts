import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
  vi.useRealTimers();
});

describe("createConsoleLogger", () => {
  it("writes tagged, timestamped lines", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-02T08:30:00.000Z"));
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    createConsoleLogger().info("Database ready");

    expect(log).toHaveBeenCalledWith(
      "[2026-03-02T08:30:00.000Z] [fitness-tracker] INFO Database ready",
    );
  });

  it("drops messages below the configured level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = createConsoleLogger({ level: "warn" });
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("routes errors to console.error under a custom tag", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    createConsoleLogger({ tag: "store" }).error("disk full");

    expect(error).toHaveBeenCalledWith(expect.stringMatching(/\[store\] ERROR disk full$/));
  });
});
