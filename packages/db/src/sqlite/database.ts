import fs from "node:fs/promises";
import initSqlJs from "sql.js";
import type { Database as SqlJsDatabase, SqlJsStatic, SqlValue } from "sql.js";

export type Row = Record<string, SqlValue>;

export interface RunResult {
  changes: number;
}

let engine: Promise<SqlJsStatic> | undefined;

const loadEngine = (): Promise<SqlJsStatic> => {
  engine ??= initSqlJs();
  return engine;
};

const isMissing = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

/**
 * SQLite database held in memory and written back to `filename` after every
 * write. `:memory:` databases are never written.
 */
export class Database {
  private constructor(private handle: SqlJsDatabase, public readonly filename: string) {}

  static async open(filename: string): Promise<Database> {
    const SQL = await loadEngine();
    if (filename === ":memory:") {
      return new Database(new SQL.Database(), filename);
    }
    try {
      const bytes = await fs.readFile(filename);
      return new Database(new SQL.Database(bytes), filename);
    } catch (error) {
      if (!isMissing(error)) throw error;
      return new Database(new SQL.Database(), filename);
    }
  }

  async exec(sql: string): Promise<void> {
    this.handle.exec(sql);
  }

  async run(sql: string, ...params: SqlValue[]): Promise<RunResult> {
    this.handle.run(sql, params);
    return { changes: this.handle.getRowsModified() };
  }

  async get(sql: string, ...params: SqlValue[]): Promise<Row | undefined> {
    const rows = await this.all(sql, ...params);
    return rows[0];
  }

  async all(sql: string, ...params: SqlValue[]): Promise<Row[]> {
    const statement = this.handle.prepare(sql);
    try {
      statement.bind(params);
      const rows: Row[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  /** Writes the database image to disk through a temp file and rename. */
  async flush(): Promise<void> {
    if (this.filename === ":memory:") return;
    const image = this.handle.export();
    const tempPath = `${this.filename}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, image);
    await fs.rename(tempPath, this.filename);
  }

  async close(): Promise<void> {
    await this.flush();
    this.handle.close();
  }
}

export const text = (row: Row, column: string): string => {
  const value = row[column];
  if (typeof value !== "string") {
    throw new Error(`Expected text in column ${column}`);
  }
  return value;
};

export const optionalText = (row: Row, column: string): string | undefined => {
  const value = row[column];
  return typeof value === "string" ? value : undefined;
};

export const integer = (row: Row, column: string): number => {
  const value = row[column];
  if (typeof value !== "number") {
    throw new Error(`Expected number in column ${column}`);
  }
  return value;
};
