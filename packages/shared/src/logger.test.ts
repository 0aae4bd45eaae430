import { afterEach, describe, expect, it, vi } from "vitest";

import { createLogger, formatLog, serializeError } from "./logger";

describe("logger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  describe("formatLog", () => {
    const entry = {
      level: "warn" as const,
      message: "Ledger is empty",
      timestamp: "2024-01-07T09:30:00.000Z",
      scope: "attendance-ledger",
      data: { rows: 0 },
    };

    it("writes one JSON object per entry", () => {
      expect(JSON.parse(formatLog(entry, false))).toEqual({
        severity: "WARN",
        message: "[attendance-ledger] Ledger is empty",
        timestamp: "2024-01-07T09:30:00.000Z",
        data: { rows: 0 },
      });
    });

    it("leaves data out when there is none", () => {
      expect(
        formatLog({ ...entry, scope: undefined, data: undefined }, false),
      ).toBe(
        '{"severity":"WARN","message":"Ledger is empty","timestamp":"2024-01-07T09:30:00.000Z"}',
      );
    });

    it("writes a readable line for local development", () => {
      expect(formatLog(entry, true)).toBe(
        '⚠️  [2024-01-07T09:30:00.000Z] [attendance-ledger] Ledger is empty {"rows":0}',
      );
    });
  });

  it("serializes errors to name, message and stack", () => {
    const error = new TypeError("bad row");

    expect(serializeError(error)).toEqual({
      name: "TypeError",
      message: "bad row",
      stack: error.stack,
    });
    expect(serializeError("plain")).toBe("plain");
  });

  it("routes levels to the matching console method", () => {
    vi.stubEnv("LOCAL_DEVELOPMENT", "false");
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    const log = createLogger("storage");
    log.error("Write failed", new Error("disk full"));
    log.debug("hidden outside local development");

    expect(error).toHaveBeenCalledTimes(1);
    const line = JSON.parse(String(error.mock.calls[0]?.[0]));
    expect(line.severity).toBe("ERROR");
    expect(line.message).toBe("[storage] Write failed");
    expect(line.data.message).toBe("disk full");
    expect(debug).not.toHaveBeenCalled();
  });

  it("emits debug lines in local development", () => {
    vi.stubEnv("LOCAL_DEVELOPMENT", "true");
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    createLogger().child("csv").debug("parsed", { rows: 2 });

    expect(debug).toHaveBeenCalledTimes(1);
    expect(String(debug.mock.calls[0]?.[0])).toMatch(
      /^🔍 \[.+\] \[csv\] parsed \{"rows":2\}$/,
    );
  });
});
