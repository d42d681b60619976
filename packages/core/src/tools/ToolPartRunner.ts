import type { ToolPart } from "@agentline/shared";
import type { RoundContext } from "../execution/ReasoningLoop.js";
import { completeTool, failTool, startTool } from "../model/Parts.js";
import type { ToolOutcome } from "./ToolExecutor.js";

export interface ToolPartResult {
  part: ToolPart;
  outcome: ToolOutcome;
}

/**
 * Moves a pending tool part through running to completed or error, emitting
 * each state, and returns the final part with the raw outcome.
 */
export const executeToolPart = async (round: RoundContext, pending: ToolPart): Promise<ToolPartResult> => {
  await round.emit(pending);
  const running = startTool(pending);
  await round.emit(running);

  const outcome = await round.invokeTool(running.toolName, running.state.input);
  const finished = outcome.ok
    ? completeTool(running, { output: outcome.output, title: outcome.title, content: outcome.content })
    : failTool(running, outcome.error ?? "Tool execution failed");
  await round.emit(finished);
  return { part: finished, outcome };
};
