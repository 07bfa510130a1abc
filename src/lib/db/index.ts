// src/lib/db/index.ts
// pg pool + drizzle client. Built on demand so MOCK mode never opens a connection.

import { drizzle, type NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type { PgDatabase } from "drizzle-orm/pg-core";
import pg from "pg";
import { log } from "@/lib/observability/logger";
import * as schema from "./schema";

const { Pool } = pg;

/** Shared by the root client and its transactions. */
export type LabDatabase = PgDatabase<NodePgQueryResultHKT, typeof schema>;

export type DatabaseHandle = {
  db: LabDatabase;
  close(): Promise<void>;
};

function isLocalConnection(connectionString: string): boolean {
  return ["localhost", "127.0.0.1", "0.0.0.0"].some((host) =>
    connectionString.includes(host),
  );
}

export function createDatabase(connectionString: string): DatabaseHandle {
  const pool = new Pool({
    connectionString,
    ...(isLocalConnection(connectionString)
      ? {}
      : { ssl: { rejectUnauthorized: false } }),
    max: 10,
    connectionTimeoutMillis: 8000,
    idleTimeoutMillis: 30000,
  });

  // an idle client failing must not take the process down
  pool.on("error", (error) => {
    log("ERROR", "DB_POOL_ERROR", { message: error.message });
  });

  return {
    db: drizzle(pool, { schema }),
    async close() {
      await pool.end();
      log("INFO", "DB_POOL_CLOSED");
    },
  };
}
