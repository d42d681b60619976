export * from "./errors/SessionErrors.js";
export * from "./logging/EventLog.js";
export * from "./model/Parts.js";
export * from "./model/Conversation.js";
export * from "./store/ConversationStore.js";
export * from "./connection/ConnectionWriter.js";
export * from "./connection/ConnectionRegistry.js";
export * from "./tools/ToolTypes.js";
export * from "./tools/ToolRegistry.js";
export * from "./tools/ToolRouter.js";
export * from "./tools/RemoteToolCatalog.js";
export * from "./tools/ToolCallCorrelator.js";
export * from "./tools/ToolExecutor.js";
export * from "./tools/ToolPartRunner.js";
export * from "./execution/ReasoningLoop.js";
export * from "./execution/RoundPool.js";
export * from "./execution/SessionCoordinator.js";
export * from "./providers/ProviderTypes.js";
export * from "./providers/OpenAiCompatibleProvider.js";
export * from "./loop/ProviderReasoningLoop.js";
export * from "./subtasks/SubTaskScheduler.js";
export * from "./tools/PlanningTools.js";
export * from "./loop/ProviderSubTaskRunner.js";
