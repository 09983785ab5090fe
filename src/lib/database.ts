import { DuckDBInstance, DuckDBConnection } from "@duckdb/node-api";

export type Row = Record<string, unknown>;

export interface ColumnInfo {
  column_name: string;
  data_type: string;
}

export interface RevenueSummary {
  file: string;
  columns: string[];
  /** [rows, columns], as a data frame would report it. */
  shape: [number, number];
  totalRevenue: number;
}

/** Quote a file path for use inside a DuckDB string literal. */
export function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/** DuckDB hands BIGINT and DECIMAL back as strings in JSON rows. */
export function toNumber(value: unknown): number {
  const num = typeof value === "number" ? value : typeof value === "string" ? Number(value) : NaN;
  if (Number.isNaN(num)) throw new Error(`Expected a numeric value, got ${String(value)}`);
  return num;
}

export class DatabaseManager {
  private instance: DuckDBInstance | null = null;
  private connection: DuckDBConnection | null = null;

  /** `:memory:` keeps everything in process; nothing is written to disk. */
  constructor(private readonly dbPath: string = ":memory:") {}

  private async getConnection(): Promise<DuckDBConnection> {
    if (this.connection) return this.connection;
    const instance = await DuckDBInstance.create(this.dbPath);
    const connection = await instance.connect();
    this.instance = instance;
    this.connection = connection;
    return connection;
  }

  async query(sql: string): Promise<Row[]> {
    const conn = await this.getConnection();
    const reader = await conn.runAndReadAll(sql);
    return reader.getRowObjectsJson();
  }

  async execute(sql: string): Promise<void> {
    const conn = await this.getConnection();
    await conn.run(sql);
  }

  /** Column names and detected types of a CSV, without loading it. */
  async inferSchema(filePath: string): Promise<ColumnInfo[]> {
    const rows = await this.query(
      `SELECT column_name, column_type AS data_type FROM (DESCRIBE SELECT * FROM read_csv_auto(${sqlString(filePath)}, header=true))`
    );
    return rows.map((r) => ({ column_name: String(r.column_name), data_type: String(r.data_type) }));
  }

  /**
   * Load a sales CSV and sum Price * Quantity over every row.
   */
  async revenueSummary(filePath: string): Promise<RevenueSummary> {
    const columns = await this.inferSchema(filePath);
    const names = columns.map((c) => c.column_name);
    for (const required of ["Price", "Quantity"]) {
      if (!names.includes(required)) {
        throw new Error(`${filePath} has no ${required} column (found: ${names.join(", ")})`);
      }
    }

    const [totals] = await this.query(
      `SELECT
         COUNT(*)::BIGINT AS row_count,
         COALESCE(SUM("Price" * "Quantity"), 0)::DOUBLE AS total_revenue
       FROM read_csv_auto(${sqlString(filePath)}, header=true)`
    );

    return {
      file: filePath,
      columns: names,
      shape: [toNumber(totals?.row_count), names.length],
      totalRevenue: toNumber(totals?.total_revenue),
    };
  }

  async close(): Promise<void> {
    if (this.connection) {
      this.connection.closeSync();
      this.connection = null;
    }
    if (this.instance) {
      this.instance.closeSync();
      this.instance = null;
    }
  }
}
