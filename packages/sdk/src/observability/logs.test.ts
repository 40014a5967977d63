import { describe, it, expect, afterEach, vi } from "vitest";
import { Logger, formatEntry } from "./logs.js";
import { MetricsCollector } from "./metrics.js";

describe("formatEntry", () => {
  it("renders level, event, location, message and details", () => {
    expect(
      formatEntry({
        timestamp: "2024-01-15T10:30:00.000Z",
        level: "warn",
        event: "table.optimize",
        table: "users",
        message: "record ids renumbered",
        details: { records: 3 },
      })
    ).toBe(
      '[2024-01-15T10:30:00.000Z] [WARN] [table.optimize] users record ids renumbered {"records":3}'
    );
  });

  it("joins table and column", () => {
    expect(
      formatEntry({
        timestamp: "t",
        level: "debug",
        event: "index.rebuild",
        table: "users",
        column: "email",
      })
    ).toBe("[t] [DEBUG] [index.rebuild] users/email");
  });
});

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops everything when disabled", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    new Logger().error("persist.save.fail");
    expect(error).not.toHaveBeenCalled();
  });

  it("filters below the minimum level and routes info to console.log", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const logger = new Logger({ enabled: true, level: "info" });

    logger.debug("record.insert");
    logger.info("table.create", { table: "users" });

    expect(debug).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0]?.[0])).toMatch(/\[INFO\] \[table\.create\] users$/);
  });
});

describe("MetricsCollector", () => {
  it("reports hit rate and p95 rebuild time", () => {
    const metrics = new MetricsCollector();
    metrics.recordHit("users", "email");
    metrics.recordHit("users", "email");
    metrics.recordHit("users", "email");
    metrics.recordMiss("users", "email");
    for (let ms = 1; ms <= 20; ms++) {
      metrics.recordRebuild("users", "email", ms, 7);
    }

    expect(metrics.snapshot()).toEqual({
      "users/email": {
        hitCount: 3,
        missCount: 1,
        hitRate: 0.75,
        rebuildCount: 20,
        p95RebuildTimeMs: 19,
        keys: 7,
      },
    });
  });

  it("resets one table or everything", () => {
    const metrics = new MetricsCollector();
    metrics.recordHit("users", "email");
    metrics.recordHit("orders", "status");

    metrics.reset("users");
    expect(Object.keys(metrics.snapshot())).toEqual(["orders/status"]);

    metrics.reset();
    expect(metrics.snapshot()).toEqual({});
  });
});
