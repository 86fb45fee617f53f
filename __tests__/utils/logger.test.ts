/**
 * Logger Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { logger } from "../../src/utils/logger.js";

describe("logger", () => {
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
    vi.unstubAllEnvs();
  });

  it("should write JSON entries to stderr when LOG_FORMAT=json", () => {
    vi.stubEnv("LOG_FORMAT", "json");
    vi.stubEnv("LOG_LEVEL", "info");

    logger.info("Linting targets", { targets: ["site.yml"] });

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(errorSpy.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({
      level: "info",
      message: "Linting targets",
      context: { targets: ["site.yml"] },
    });
  });

  it("should drop messages below LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "warn");

    logger.info("hidden");
    logger.debug("hidden too");
    logger.warn("shown");

    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("should merge child context into every entry", () => {
    vi.stubEnv("LOG_FORMAT", "json");
    vi.stubEnv("LOG_LEVEL", "debug");

    logger.child({ component: "lint-runner" }).debug("Running linter", { target: "a.yml" });

    const entry: unknown = JSON.parse(String(errorSpy.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({ context: { component: "lint-runner", target: "a.yml" } });
  });

  it("should rethrow from time() after logging the failure", async () => {
    vi.stubEnv("LOG_LEVEL", "error");

    await expect(
      logger.time("aggregate-lint", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
