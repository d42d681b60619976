export const DEFAULT_FORWARDED_TOOLS: readonly string[] = [
  "find_file",
  "read_file",
  "grep_file",
  "call_chain",
  "extract_xml",
  "apply_change",
];

/** Decides per call whether a tool runs on the connected client. */
export class ToolRouter {
  private forwarded: ReadonlySet<string>;

  constructor(forwarded: readonly string[] = DEFAULT_FORWARDED_TOOLS) {
    this.forwarded = new Set(forwarded);
  }

  mustForward(toolName: string): boolean {
    return this.forwarded.has(toolName);
  }

  forwardedTools(): string[] {
    return Array.from(this.forwarded);
  }
}
