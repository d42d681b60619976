import type { ConversationSnapshot } from "@agentline/shared";
import { Conversation } from "../model/Conversation.js";
import { NOOP_LOGGER, type SessionLogger } from "../logging/EventLog.js";

export interface ConversationPersistence {
  load(id: string): Promise<ConversationSnapshot | undefined>;
  save(snapshot: ConversationSnapshot): Promise<void>;
}

export class InMemoryConversationPersistence implements ConversationPersistence {
  private snapshots = new Map<string, ConversationSnapshot>();

  async load(id: string): Promise<ConversationSnapshot | undefined> {
    const snapshot = this.snapshots.get(id);
    return snapshot ? structuredClone(snapshot) : undefined;
  }

  async save(snapshot: ConversationSnapshot): Promise<void> {
    this.snapshots.set(snapshot.id, structuredClone(snapshot));
  }

  ids(): string[] {
    return Array.from(this.snapshots.keys());
  }
}

/**
 * Owns conversations that are not in flight. A conversation loaded here is
 * handed to the coordinator for the length of a round and written back when
 * the round ends.
 */
export class ConversationStore {
  constructor(
    private persistence: ConversationPersistence,
    private logger: SessionLogger = NOOP_LOGGER,
  ) {}

  async load(id: string): Promise<Conversation | undefined> {
    const snapshot = await this.persistence.load(id);
    return snapshot ? Conversation.fromSnapshot(snapshot) : undefined;
  }

  async loadOrCreate(id: string, projectKey?: string): Promise<Conversation> {
    const existing = await this.load(id);
    if (existing) {
      if (projectKey && !existing.projectKey) existing.projectKey = projectKey;
      return existing;
    }
    this.logger.debug("conversation_created", { conversationId: id, projectKey });
    return Conversation.create(id, projectKey);
  }

  async save(conversation: Conversation): Promise<void> {
    await this.persistence.save(conversation.toSnapshot());
  }

  /** Marks an idle conversation completed; returns false when there is nothing to mark. */
  async markCompleted(id: string): Promise<boolean> {
    const conversation = await this.load(id);
    if (!conversation || conversation.status !== "idle") return false;
    conversation.markCompleted();
    await this.save(conversation);
    return true;
  }
}
