import path from "node:path";
import { PathHelper } from "@agentline/shared";
import { Database } from "./database.js";
import { Pragmas } from "./pragmas.js";

export class Connection {
  constructor(private database: Database, public readonly dbPath: string) {}

  get db(): Database {
    return this.database;
  }

  static async open(dbPath: string): Promise<Connection> {
    if (dbPath !== ":memory:") {
      await PathHelper.ensureDir(path.dirname(dbPath));
    }
    const database = await Database.open(dbPath);
    await Pragmas.apply(database);
    return new Connection(database, dbPath);
  }

  static async openGlobal(): Promise<Connection> {
    return this.open(PathHelper.getGlobalDbPath());
  }

  /** Persists committed writes; writing the image resets connection pragmas, so they are applied again. */
  async flush(): Promise<void> {
    await this.database.flush();
    await Pragmas.apply(this.database);
  }

  async close(): Promise<void> {
    await this.database.close();
  }
}
