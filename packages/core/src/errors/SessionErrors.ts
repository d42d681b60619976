export type SessionErrorCode =
  | "capacity_exceeded"
  | "shutting_down"
  | "tool_timeout"
  | "tool_dispatch_failed"
  | "illegal_tool_transition"
  | "part_ownership";

export type SessionErrorDetails = Record<string, unknown>;

export class SessionError extends Error {
  readonly code: SessionErrorCode;
  readonly details?: SessionErrorDetails;

  constructor(code: SessionErrorCode, message: string, details?: SessionErrorDetails) {
    super(message);
    this.name = "SessionError";
    this.code = code;
    this.details = details;
  }
}

export class CapacityError extends SessionError {
  constructor(conversationId: string, limit: number) {
    super("capacity_exceeded", `Round pool is saturated (${limit} active); rejected ${conversationId}`, {
      conversationId,
      limit,
    });
    this.name = "CapacityError";
  }
}

export class ShuttingDownError extends SessionError {
  constructor(message = "Server is shutting down") {
    super("shutting_down", message);
    this.name = "ShuttingDownError";
  }
}

export class ToolTimeoutError extends SessionError {
  readonly toolCallId: string;
  readonly toolName: string;

  constructor(toolCallId: string, toolName: string, timeoutMs: number) {
    super("tool_timeout", `Tool call timed out: ${toolName}`, { toolCallId, toolName, timeoutMs });
    this.name = "ToolTimeoutError";
    this.toolCallId = toolCallId;
    this.toolName = toolName;
  }
}

export class ToolDispatchError extends SessionError {
  constructor(toolCallId: string, toolName: string, reason: string) {
    super("tool_dispatch_failed", reason, { toolCallId, toolName });
    this.name = "ToolDispatchError";
  }
}

export class IllegalToolTransitionError extends SessionError {
  constructor(partId: string, from: string, to: string) {
    super("illegal_tool_transition", `Illegal tool state transition ${from} -> ${to} on part ${partId}`, {
      partId,
      from,
      to,
    });
    this.name = "IllegalToolTransitionError";
  }
}

export class PartOwnershipError extends SessionError {
  constructor(partId: string, owner: string, expectedOwner: string) {
    super("part_ownership", `Part ${partId} belongs to ${owner}, not ${expectedOwner}`, {
      partId,
      owner,
      expectedOwner,
    });
    this.name = "PartOwnershipError";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
