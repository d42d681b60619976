export * from "./config/ServerConfig.js";
export * from "./config/ConfigLoader.js";
export * from "./transport/SocketTransport.js";
export * from "./runtime/SignalHandlers.js";
export * from "./AgentServer.js";
export * from "./cli/ServeCommand.js";
