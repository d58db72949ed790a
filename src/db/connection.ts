import { DuckDBInstance, DuckDBConnection } from "@duckdb/node-api";
import { mkdirSync, existsSync } from "fs";
import { dirname } from "path";

export const DEFAULT_DB_PATH = "./data/telemetry.duckdb"; // file-backed persistence

export interface DatabaseHandle {
  connection: DuckDBConnection;
  close(): void;
}

/**
 * Opens (or creates) a database file and connects to it. `:memory:` gives a
 * private in-process database, which is what the tests use.
 */
export async function openDatabase(
  dbPath: string = DEFAULT_DB_PATH
): Promise<DatabaseHandle> {
  if (dbPath !== ":memory:") {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  }
  const instance = await DuckDBInstance.create(dbPath, {
    threads: process.env.DUCKDB_THREADS || "2",
  });
  const connection = await instance.connect();

  let closed = false;
  return {
    connection,
    close() {
      if (closed) return;
      closed = true;
      connection.closeSync();
      instance.closeSync?.();
    },
  };
}
