import { z } from "zod";

import { NameMatching, StorageDriver } from "@attendance/shared/common/enums";

export const nodeEnvSchema = z
  .enum(["development", "production", "test"])
  .default("development");

const booleanString = z
  .string()
  .optional()
  .transform((value) => value?.toLowerCase() === "true");

export const serverSchema = {
  NODE_ENV: nodeEnvSchema,
  ADMIN_PIN:
    process.env.NODE_ENV === "production"
      ? z.string().min(1)
      : z.string().min(1).default("1234"),
  STORAGE_DRIVER: z.nativeEnum(StorageDriver).default(StorageDriver.Memory),
  CSV_DATA_DIR: z.string().min(1).default("./data"),
  DATABASE_URL: z.string().min(1).optional(),
  DATABASE_SCHEMA: z
    .string()
    .regex(/^[a-z_][a-z0-9_]*$/i)
    .default("public"),
  CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(10),
  NAME_MATCHING: z.nativeEnum(NameMatching).default(NameMatching.Exact),
  PORT: z.coerce.number().int().positive().default(3000),
  LOCAL_DEVELOPMENT: booleanString,
};

export const skipValidation =
  !!process.env.CI ||
  !!process.env.SKIP_ENV_VALIDATION ||
  process.env.npm_lifecycle_event === "lint";
