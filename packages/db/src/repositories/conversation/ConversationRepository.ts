import {
  isPart,
  type ConversationSnapshot,
  type ConversationStatus,
  type MessageKind,
  type MessageRecord,
  type MessageRole,
  type Part,
} from "@agentline/shared";
import { Connection } from "../../sqlite/connection.js";
import { optionalText, text, type Database, type Row } from "../../sqlite/database.js";
import { ConversationMigrations } from "../../migrations/conversation/ConversationMigrations.js";

const CONVERSATION_STATUSES: readonly ConversationStatus[] = ["idle", "processing", "completed"];

const toStatus = (value: string): ConversationStatus =>
  CONVERSATION_STATUSES.find((status) => status === value) ?? "idle";

const toRole = (value: string): MessageRole => (value === "assistant" ? "assistant" : "user");

const toKind = (value: string): MessageKind => (value === "continuation" ? "continuation" : "input");

const toMessage = (conversationId: string, row: Row, partsByMessage: Map<string, Part[]>): MessageRecord => {
  const id = text(row, "id");
  return {
    id,
    conversationId,
    role: toRole(text(row, "role")),
    kind: toKind(text(row, "kind")),
    content: text(row, "content"),
    parts: partsByMessage.get(id) ?? [],
    createdAt: text(row, "created_at"),
    updatedAt: text(row, "updated_at"),
  };
};

export class ConversationRepository {
  // one connection serves every conversation, so transactions must not interleave
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private connection: Connection) {}

  static async create(dbPath?: string): Promise<ConversationRepository> {
    const connection = dbPath ? await Connection.open(dbPath) : await Connection.openGlobal();
    await ConversationMigrations.run(connection.db);
    await connection.flush();
    return new ConversationRepository(connection);
  }

  private get db(): Database {
    return this.connection.db;
  }

  async close(): Promise<void> {
    await this.writeChain;
    await this.connection.close();
  }

  getDb(): Database {
    return this.db;
  }

  async withTransaction<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.writeChain.then(async () => {
      await this.db.exec("BEGIN IMMEDIATE");
      let result: T;
      try {
        result = await fn();
        await this.db.exec("COMMIT");
      } catch (error) {
        await this.db.exec("ROLLBACK");
        throw error;
      }
      await this.connection.flush();
      return result;
    });
    this.writeChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async exists(id: string): Promise<boolean> {
    const row = await this.db.get(`SELECT id FROM conversations WHERE id = ?`, id);
    return row !== undefined;
  }

  async listIds(): Promise<string[]> {
    const rows = await this.db.all(`SELECT id FROM conversations ORDER BY updated_at DESC, id ASC`);
    return rows.map((row) => text(row, "id"));
  }

  async load(id: string): Promise<ConversationSnapshot | undefined> {
    const row = await this.db.get(
      `SELECT id, project_key, status, created_at, updated_at FROM conversations WHERE id = ?`,
      id,
    );
    if (!row) return undefined;

    const messageRows = await this.db.all(
      `SELECT id, role, kind, content, created_at, updated_at
       FROM messages WHERE conversation_id = ? ORDER BY position ASC`,
      id,
    );
    const partRows = await this.db.all(
      `SELECT id, message_id, data_json FROM parts WHERE conversation_id = ? ORDER BY message_id, position ASC`,
      id,
    );

    const partsByMessage = new Map<string, Part[]>();
    for (const partRow of partRows) {
      const partId = text(partRow, "id");
      const messageId = text(partRow, "message_id");
      const parsed: unknown = JSON.parse(text(partRow, "data_json"));
      if (!isPart(parsed) || parsed.id !== partId || parsed.messageId !== messageId) {
        throw new Error(`Corrupt part ${partId} in conversation ${id}`);
      }
      const bucket = partsByMessage.get(messageId) ?? [];
      bucket.push(parsed);
      partsByMessage.set(messageId, bucket);
    }

    const messages: MessageRecord[] = messageRows.map((message) => toMessage(id, message, partsByMessage));

    const snapshot: ConversationSnapshot = {
      id: text(row, "id"),
      status: toStatus(text(row, "status")),
      messages,
      createdAt: text(row, "created_at"),
      updatedAt: text(row, "updated_at"),
    };
    const projectKey = optionalText(row, "project_key");
    if (projectKey) snapshot.projectKey = projectKey;
    return snapshot;
  }

  /**
   * Replaces the stored messages and parts of the conversation with the
   * snapshot's, inside one transaction.
   */
  async save(snapshot: ConversationSnapshot): Promise<void> {
    await this.withTransaction(async () => {
      await this.db.run(
        `INSERT INTO conversations (id, project_key, status, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           project_key = excluded.project_key,
           status = excluded.status,
           updated_at = excluded.updated_at`,
        snapshot.id,
        snapshot.projectKey ?? null,
        snapshot.status,
        snapshot.createdAt,
        snapshot.updatedAt,
      );
      await this.db.run(`DELETE FROM parts WHERE conversation_id = ?`, snapshot.id);
      await this.db.run(`DELETE FROM messages WHERE conversation_id = ?`, snapshot.id);

      for (const [position, message] of snapshot.messages.entries()) {
        await this.db.run(
          `INSERT INTO messages (id, conversation_id, position, role, kind, content, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
          message.id,
          snapshot.id,
          position,
          message.role,
          message.kind,
          message.content,
          message.createdAt,
          message.updatedAt,
        );
        for (const [partPosition, part] of message.parts.entries()) {
          await this.db.run(
            `INSERT INTO parts (id, message_id, conversation_id, position, type, data_json, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
            part.id,
            message.id,
            snapshot.id,
            partPosition,
            part.type,
            JSON.stringify(part),
            part.createdAt,
            part.updatedAt,
          );
        }
      }
    });
  }

  async delete(id: string): Promise<boolean> {
    return this.withTransaction(async () => {
      const result = await this.db.run(`DELETE FROM conversations WHERE id = ?`, id);
      return result.changes > 0;
    });
  }
}
