import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

import { StorageDriver } from "@attendance/shared/common/enums";

import { serverSchema, skipValidation } from "./shared";

export const env = createEnv({
  server: serverSchema,
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
  skipValidation,
});

export type Env = typeof env;

type EnvSource = Partial<Record<keyof Env, unknown>>;

/**
 * Settings the rest of the application consumes. Parsed once at start.
 *
 * Defaults are repeated here because `env` is the raw process environment
 * when validation is skipped.
 */
export const appConfigSchema = z
  .object({
    adminPin: z.string().min(1).default("1234"),
    storageDriver: serverSchema.STORAGE_DRIVER,
    csvDataDir: serverSchema.CSV_DATA_DIR,
    databaseUrl: serverSchema.DATABASE_URL,
    databaseSchema: serverSchema.DATABASE_SCHEMA,
    cacheTtlSeconds: serverSchema.CACHE_TTL_SECONDS,
    nameMatching: serverSchema.NAME_MATCHING,
    port: serverSchema.PORT,
  })
  .refine(
    (config) =>
      config.storageDriver !== StorageDriver.Postgres || !!config.databaseUrl,
    {
      message: "DATABASE_URL is required when STORAGE_DRIVER is postgres",
      path: ["databaseUrl"],
    },
  );

export type AppConfig = z.infer<typeof appConfigSchema>;

export function loadAppConfig(source: EnvSource = env): AppConfig {
  return Object.freeze(
    appConfigSchema.parse({
      adminPin: source.ADMIN_PIN,
      storageDriver: source.STORAGE_DRIVER,
      csvDataDir: source.CSV_DATA_DIR,
      databaseUrl: source.DATABASE_URL,
      databaseSchema: source.DATABASE_SCHEMA,
      cacheTtlSeconds: source.CACHE_TTL_SECONDS,
      nameMatching: source.NAME_MATCHING,
      port: source.PORT,
    }),
  );
}
