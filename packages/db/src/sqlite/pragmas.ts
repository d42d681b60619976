import type { Database } from "./database.js";

export class Pragmas {
  static async apply(db: Database): Promise<void> {
    await db.exec("PRAGMA foreign_keys = ON;");
  }
}
