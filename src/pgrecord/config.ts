// config.ts

import "dotenv/config";
import { z } from "zod";

import { snakeCase } from "./utils/naming.js";

const envSchema = z.object({
  DATABASE_URL: z.string().optional(),
  NODE_ENV: z.string().default("development"),
  PGRECORD_SEARCH_PATH: z.string().min(1).default("public"),
  PGRECORD_TAG: z.string().min(1).default("pg"),
  PGRECORD_SILENT_LOGS: z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((v) => v === "true" || v === "1"),
});

export type Env = z.infer<typeof envSchema>;

export interface PgRecordConfig {
  /** Schema every table lives in */
  searchPath: string;
  /** Annotation key looked up when a field declares tags per key, e.g. { pg: "..." } */
  tagKey: string;
  /** Field name -> column name when the annotation has no name */
  columnName: (fieldName: string) => string;
  /** gen_salt() algorithm used by SQL-side password hashing */
  passwordAlgorithm: string;
  updatedAtColumnName: string;
  setTimestampTriggerName: string;
  silentLogs: boolean;
  nodeEnv: string;
  databaseUrl?: string | undefined;
}

export function readEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}

/** Explicit options win over the environment. */
export function resolveConfig(
  overrides: Partial<PgRecordConfig> = {},
  source: NodeJS.ProcessEnv = process.env
): PgRecordConfig {
  const env = readEnv(source);

  return {
    searchPath: env.PGRECORD_SEARCH_PATH,
    tagKey: env.PGRECORD_TAG,
    columnName: snakeCase,
    passwordAlgorithm: "bf",
    updatedAtColumnName: "updated_at",
    setTimestampTriggerName: "set_timestamp",
    silentLogs: env.PGRECORD_SILENT_LOGS,
    nodeEnv: env.NODE_ENV,
    databaseUrl: env.DATABASE_URL,
    ...overrides,
  };
}
