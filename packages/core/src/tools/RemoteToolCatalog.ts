import type { ToolDescriptor } from "./ToolTypes.js";

const stringProp = (description: string) => ({ type: "string", description });
const integerProp = (description: string) => ({ type: "integer", description });

/** Tools that only the connected client can execute, described for the model. */
export const REMOTE_TOOL_CATALOG: readonly ToolDescriptor[] = [
  {
    name: "find_file",
    description: "Find files in the client workspace whose name or path matches a pattern.",
    inputSchema: {
      type: "object",
      properties: {
        pattern: stringProp("File name or path regex"),
        searchPath: stringProp("Directory to search, relative to the project root"),
      },
      required: ["pattern"],
    },
  },
  {
    name: "read_file",
    description:
      "Read file content. Reads lines 1-300 unless a range is given; pass a large endLine to read the whole file.",
    inputSchema: {
      type: "object",
      properties: {
        simpleName: stringProp("Class name; the client resolves the file"),
        relativePath: stringProp("File path relative to the project root"),
        startLine: integerProp("First line to read (default 1)"),
        endLine: integerProp("Last line to read (default 300)"),
      },
    },
  },
  {
    name: "grep_file",
    description: "Search file contents with a regular expression.",
    inputSchema: {
      type: "object",
      properties: {
        pattern: stringProp("Regular expression"),
        filePattern: stringProp("File name regex"),
        searchPath: stringProp("Directory to search"),
      },
      required: ["pattern"],
    },
  },
  {
    name: "call_chain",
    description: "List the callers and callees of a method.",
    inputSchema: {
      type: "object",
      properties: {
        className: stringProp("Fully qualified class name"),
        methodName: stringProp("Method name"),
        direction: { type: "string", enum: ["up", "down", "both"], description: "up: callers, down: callees" },
        maxDepth: integerProp("Maximum depth (default 5)"),
      },
      required: ["className", "methodName"],
    },
  },
  {
    name: "extract_xml",
    description: "Extract matching tags from an XML file.",
    inputSchema: {
      type: "object",
      properties: {
        tagPattern: stringProp('Tag pattern, for example bean.*id="paymentService"'),
        relativePath: stringProp("File path relative to the project root"),
      },
      required: ["tagPattern", "relativePath"],
    },
  },
  {
    name: "apply_change",
    description: "Apply an edit to a file in the client workspace, replacing existing content or creating a new file.",
    inputSchema: {
      type: "object",
      properties: {
        relativePath: stringProp("File path relative to the project root"),
        mode: { type: "string", enum: ["replace", "create"], description: "Edit mode (default replace)" },
        newContent: stringProp("New content"),
        searchContent: stringProp("Content to replace; required in replace mode"),
        description: stringProp("Short description of the change"),
      },
      required: ["relativePath", "newContent"],
    },
  },
];

export const remoteToolDescriptor = (name: string): ToolDescriptor | undefined =>
  REMOTE_TOOL_CATALOG.find((tool) => tool.name === name);
