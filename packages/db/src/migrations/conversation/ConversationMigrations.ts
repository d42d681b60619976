import type { Database } from "../../sqlite/database.js";

/**
 * Schema for conversation history: one row per conversation, its ordered
 * messages, and the ordered parts of each message. Part payloads are stored as
 * JSON since every variant carries different fields.
 */
export class ConversationMigrations {
  static async run(db: Database): Promise<void> {
    await db.exec(`
      PRAGMA foreign_keys = ON;

      CREATE TABLE IF NOT EXISTS conversations (
        id TEXT PRIMARY KEY,
        project_key TEXT,
        status TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS messages (
        id TEXT PRIMARY KEY,
        conversation_id TEXT NOT NULL REFERENCES conversations(id) ON DELETE CASCADE,
        position INTEGER NOT NULL,
        role TEXT NOT NULL,
        kind TEXT NOT NULL,
        content TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        UNIQUE(conversation_id, position)
      );

      CREATE TABLE IF NOT EXISTS parts (
        id TEXT PRIMARY KEY,
        message_id TEXT NOT NULL REFERENCES messages(id) ON DELETE CASCADE,
        conversation_id TEXT NOT NULL REFERENCES conversations(id) ON DELETE CASCADE,
        position INTEGER NOT NULL,
        type TEXT NOT NULL,
        data_json TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        UNIQUE(message_id, position)
      );

      CREATE INDEX IF NOT EXISTS idx_messages_conversation ON messages(conversation_id, position);
      CREATE INDEX IF NOT EXISTS idx_parts_message ON parts(message_id, position);
    `);
  }
}
