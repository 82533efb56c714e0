/**
 * PostgreSQL store for cursors and decoded events (pg client)
 */

import { Pool } from "pg";
import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { StorageError, errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";
import type { IndexedEvent } from "../parser/types.js";
import { toStorageJson } from "../utils/serialize.js";
import type { AccountCursor, IndexerStore } from "./store.js";

const logger = createChildLogger("postgres");

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const SCHEMA_PATH = join(__dirname, "../../sql/schema.sql");

type CursorRow = {
  last_signature: string;
  last_slot: string; // BIGINT arrives as text
};

export interface PoolOptions {
  connectionString: string;
  sslVerify?: boolean;
  ssl?: boolean;
  max?: number;
}

export function createPool(options: PoolOptions): Pool {
  logger.info({ maxConnections: options.max ?? 10 }, "Creating PostgreSQL connection pool");
  const pool = new Pool({
    connectionString: options.connectionString,
    ssl: options.ssl ? { rejectUnauthorized: options.sslVerify ?? true } : undefined,
    max: options.max ?? 10,
    connectionTimeoutMillis: 10000, // 10s timeout
    idleTimeoutMillis: 30000,
  });
  pool.on("error", (err) => {
    logger.error({ error: err.message, stack: err.stack }, "Unexpected pool error");
  });
  return pool;
}

export class PostgresStore implements IndexerStore {
  private pool: Pool;

  constructor(pool: Pool) {
    this.pool = pool;
  }

  async ensureSchema(path: string = SCHEMA_PATH): Promise<void> {
    const sql = readFileSync(path, "utf-8");
    await this.run("apply schema", () => this.pool.query(sql));
    logger.info({ path }, "Database schema ensured");
  }

  async getCursor(account: string): Promise<AccountCursor | null> {
    const result = await this.run("read cursor", () =>
      this.pool.query<CursorRow>(
        `SELECT last_signature, last_slot FROM account_cursors WHERE account = $1`,
        [account]
      )
    );
    const row = result.rows[0];
    if (!row) return null;
    return { signature: row.last_signature, slot: Number(row.last_slot) };
  }

  async setCursor(account: string, cursor: AccountCursor): Promise<void> {
    logger.debug({ account, signature: cursor.signature, slot: cursor.slot }, "Set last processed signature");
    await this.run("write cursor", () =>
      this.pool.query(
        `INSERT INTO account_cursors (account, last_signature, last_slot, updated_at)
         VALUES ($1, $2, $3, NOW())
         ON CONFLICT (account) DO UPDATE SET
           last_signature = EXCLUDED.last_signature,
           last_slot = EXCLUDED.last_slot,
           updated_at = NOW()
         WHERE account_cursors.last_slot <= EXCLUDED.last_slot`,
        [account, cursor.signature, cursor.slot.toString()]
      )
    );
  }

  async insertEvent(record: IndexedEvent): Promise<boolean> {
    const result = await this.run("insert event", () =>
      this.pool.query(
        `INSERT INTO program_events (signature, log_index, event_type, slot, block_time, data)
         VALUES ($1, $2, $3, $4, $5, $6)
         ON CONFLICT (signature, log_index) DO NOTHING`,
        [
          record.signature,
          record.logIndex,
          record.event.type,
          record.slot.toString(),
          record.blockTime,
          JSON.stringify(toStorageJson(record.event.data)),
        ]
      )
    );
    return result.rowCount === 1;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new StorageError(`Failed to ${operation}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
