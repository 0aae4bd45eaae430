import { describe, expect, it } from "vitest";

import { NameMatching, StorageDriver } from "@attendance/shared/common/enums";

import { loadAppConfig } from "./index";

describe("loadAppConfig", () => {
  it("applies defaults for everything left unset", () => {
    expect(loadAppConfig({})).toEqual({
      adminPin: "1234",
      storageDriver: StorageDriver.Memory,
      csvDataDir: "./data",
      databaseUrl: undefined,
      databaseSchema: "public",
      cacheTtlSeconds: 10,
      nameMatching: NameMatching.Exact,
      port: 3000,
    });
  });

  it("coerces numeric settings from strings", () => {
    const config = loadAppConfig({
      ADMIN_PIN: "test-pin",
      CACHE_TTL_SECONDS: "0",
      PORT: "8080",
      NAME_MATCHING: "casefold",
    });

    expect(config.adminPin).toBe("test-pin");
    expect(config.cacheTtlSeconds).toBe(0);
    expect(config.port).toBe(8080);
    expect(config.nameMatching).toBe(NameMatching.Casefold);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(loadAppConfig({}))).toBe(true);
  });

  it("requires a database URL for the postgres driver", () => {
    expect(() => loadAppConfig({ STORAGE_DRIVER: "postgres" })).toThrow(
      "DATABASE_URL is required when STORAGE_DRIVER is postgres",
    );
    expect(
      loadAppConfig({
        STORAGE_DRIVER: "postgres",
        DATABASE_URL: "postgres://localhost:5432/attendance",
      }).storageDriver,
    ).toBe(StorageDriver.Postgres);
  });

  it("rejects unknown drivers and negative cache lifetimes", () => {
    expect(() => loadAppConfig({ STORAGE_DRIVER: "sheets" })).toThrow();
    expect(() => loadAppConfig({ CACHE_TTL_SECONDS: "-1" })).toThrow();
  });

  it("reads the process environment by default", () => {
    expect(loadAppConfig().adminPin).toBe("test-pin");
  });
});
