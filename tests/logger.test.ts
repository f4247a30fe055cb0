import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../src/lib/logger";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes one JSON line per entry", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});

    createLogger("svc").child("worker").info("Job completed", { recordId: "rec-1" });

    expect(info).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(info.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: "info",
      message: "Job completed",
      service: "svc",
      scope: "worker",
      context: { recordId: "rec-1" },
    });
    expect(typeof entry.timestamp).toBe("string");
  });

  it("logs errors by message", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    createLogger("svc").error("Upload failed", { error: new Error("S3 unavailable") });

    expect(JSON.parse(String(error.mock.calls[0][0])).context).toEqual({ error: "S3 unavailable" });
  });

  it("drops entries below the minimum level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = createLogger("svc", "warn");
    logger.debug("hidden");
    logger.warn("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("nests child scopes", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});

    createLogger("svc").child("a").child("b").info("x");

    expect(JSON.parse(String(info.mock.calls[0][0])).scope).toBe("a.b");
  });
});
