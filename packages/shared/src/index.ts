export * from "./paths/PathHelper.js";
export * from "./conversation/ConversationTypes.js";
export * from "./protocol/Frames.js";
