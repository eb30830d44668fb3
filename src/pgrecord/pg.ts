// pg.ts

import pg from "pg";

import type { Executor, QueryResult } from "./model-types.js";

export type SSLSetting = false | { rejectUnauthorized: boolean };

export type SSLConfigOptions = {
  nodeEnv?: string | undefined;
  allowSSL?: boolean | undefined;
  rejectUnauthorized?: boolean | undefined;
  databaseUrl?: string | undefined;
};

export function getSSLConfig(opts: SSLConfigOptions = {}): SSLSetting {
  const { nodeEnv = "development", allowSSL, rejectUnauthorized, databaseUrl } = opts;

  // explicit switch wins
  if (typeof allowSSL === "boolean") {
    return allowSSL ? { rejectUnauthorized: rejectUnauthorized ?? false } : false;
  }

  // sslmode=require or ssl=true in the URL
  const lower = (databaseUrl ?? "").toLowerCase();
  if (lower.includes("sslmode=require") || lower.includes("ssl=true")) {
    return { rejectUnauthorized: rejectUnauthorized ?? false };
  }

  if (nodeEnv === "production") {
    return { rejectUnauthorized: rejectUnauthorized ?? true };
  }

  return false;
}

/** What a pg.Pool and a pg.PoolClient have in common */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<pg.QueryResult<Record<string, unknown>>>;
}

/** Adapts a pg pool or checked-out client to the executor interface. */
export function createPgExecutor(client: Queryable): Executor {
  return {
    async query(text: string, values: readonly unknown[] = []): Promise<QueryResult> {
      // no parameters keeps pg on the simple protocol, which takes several statements
      const result = await client.query(text, values.length > 0 ? [...values] : undefined);
      return {
        rows: result.rows,
        fields: result.fields.map((f) => f.name),
      };
    },
  };
}

export function createPool(databaseUrl: string, ssl: SSLSetting): pg.Pool {
  return new pg.Pool({ connectionString: databaseUrl, ssl });
}
