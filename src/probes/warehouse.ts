import mysql from "mysql2/promise";
import type { RowDataPacket } from "mysql2/promise";
import { z } from "zod";
import type { DatabaseConfig } from "../config.js";
import { logger } from "../logger.js";

/** Days of history a freshness query looks back over. */
export const LOOKBACK_DAYS = 7;

/** The part of a pooled MySQL connection the probes use. */
export interface WarehouseConnection {
  escapeId(identifier: string): string;
  /** Resolves to the result rows. */
  query(sql: string): Promise<unknown[]>;
  release(): void;
}

export interface WarehousePool {
  connect(): Promise<WarehouseConnection>;
  end(): Promise<void>;
}

export interface TableActivity {
  lastRecord: Date | null;
  recordsToday: number;
}

const ActivityRowSchema = z.object({
  last_record: z.coerce.date().nullable(),
  records_today: z.coerce.number().int(),
});

const CountRowSchema = z.object({
  total: z.coerce.number().int(),
});

/**
 * Read-only queries against the MySQL data warehouse.
 *
 * Identifiers come from configuration and are quoted; `where` fragments are
 * trusted configuration and appended as-is.
 */
export class Warehouse {
  private readonly log = logger.child({ module: "warehouse" });

  constructor(private readonly pool: WarehousePool) {}

  /**
   * Pool with every wait bounded: connect and per-query timeouts.
   * Requests beyond `pool_size` queue for a free connection; callers limit
   * their own concurrency to the same size.
   */
  static fromConfig(config: DatabaseConfig): Warehouse {
    const pool = mysql.createPool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: true } : undefined,
      connectionLimit: config.pool_size,
      connectTimeout: config.connect_timeout_ms,
      waitForConnections: true,
      queueLimit: 0,
      idleTimeout: 1000,
    });

    return new Warehouse({
      connect: async () => {
        const conn = await pool.getConnection();
        return {
          escapeId: (identifier) => conn.escapeId(identifier),
          query: async (sql) => {
            const [rows] = await conn.query<RowDataPacket[]>({ sql, timeout: config.query_timeout_ms });
            return rows;
          },
          release: () => conn.release(),
        };
      },
      end: () => pool.end(),
    });
  }

  /** Newest timestamp in the last week and the number of rows dated today. */
  async tableActivity(spec: { table: string; dateColumn: string; where?: string }): Promise<TableActivity> {
    return this.withConnection(async (conn) => {
      const col = conn.escapeId(spec.dateColumn);
      const sql = [
        `SELECT MAX(${col}) AS last_record,`,
        `COUNT(CASE WHEN ${col} >= CURDATE() THEN 1 END) AS records_today`,
        `FROM ${quoteTable(conn, spec.table)}`,
        `WHERE ${col} >= DATE_SUB(CURDATE(), INTERVAL ${LOOKBACK_DAYS} DAY)`,
        spec.where ? `AND (${spec.where})` : "",
      ].filter(Boolean).join(" ");

      const row = ActivityRowSchema.parse(await this.firstRow(conn, sql));
      return { lastRecord: row.last_record, recordsToday: row.records_today };
    });
  }

  /** COUNT(*) or COUNT(DISTINCT col), optionally limited to rows dated today. */
  async countRows(spec: {
    table: string;
    dateColumn?: string;
    distinctColumn?: string;
    where?: string;
  }): Promise<number> {
    return this.withConnection(async (conn) => {
      const counted = spec.distinctColumn ? `DISTINCT ${conn.escapeId(spec.distinctColumn)}` : "*";
      const conditions: string[] = [];
      if (spec.dateColumn) conditions.push(`${conn.escapeId(spec.dateColumn)} >= CURDATE()`);
      if (spec.where) conditions.push(`(${spec.where})`);

      const sql = [
        `SELECT COUNT(${counted}) AS total FROM ${quoteTable(conn, spec.table)}`,
        conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "",
      ].filter(Boolean).join(" ");

      return CountRowSchema.parse(await this.firstRow(conn, sql)).total;
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async withConnection<T>(fn: (conn: WarehouseConnection) => Promise<T>): Promise<T> {
    const conn = await this.pool.connect();
    try {
      return await fn(conn);
    } finally {
      conn.release();
    }
  }

  private async firstRow(conn: WarehouseConnection, sql: string): Promise<unknown> {
    this.log.debug({ sql }, "warehouse query");
    const rows = await conn.query(sql);
    return rows[0] ?? {};
  }
}

/** `schema.table` → `` `schema`.`table` `` */
export function quoteTable(conn: Pick<WarehouseConnection, "escapeId">, table: string): string {
  return table.split(".").map((part) => conn.escapeId(part)).join(".");
}
