export * from "./sqlite/database.js";
export * from "./sqlite/connection.js";
export * from "./migrations/conversation/ConversationMigrations.js";
export * from "./repositories/conversation/ConversationRepository.js";
