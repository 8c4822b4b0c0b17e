import { describe, expect, it, vi } from "vitest";
import { createLogger } from "./logger.js";

describe("createLogger", () => {
  it("writes progress to stderr and never to stdout", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const stdout = vi.spyOn(console, "log").mockImplementation(() => {});

    const logger = createLogger();
    logger.info("🔐 Generating JWT for GitHub App...");
    logger.error("boom");

    expect(stderr.mock.calls).toEqual([["🔐 Generating JWT for GitHub App..."], ["❌ boom"]]);
    expect(stdout).not.toHaveBeenCalled();
  });

  it("prints debug lines only when enabled", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

    createLogger().debug("hidden");
    createLogger({ debug: true }).debug("shown");

    expect(stderr.mock.calls).toEqual([["🐛 shown"]]);
  });

  it("keeps warnings when quiet", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

    const logger = createLogger({ quiet: true });
    logger.info("progress");
    logger.warn("careful");

    expect(stderr.mock.calls).toEqual([["⚠️  careful"]]);
  });
});
