import type { Failure } from "./errors.js";

/** One image attached to a user message: an https:// URL or a data: URI. */
export interface ImagePart {
  url: string;
}

export interface UserMessageItem {
  type: "user_message";
  content: string | ImagePart[];
}

export interface AssistantMessageItem {
  type: "assistant_message";
  text: string;
}

export interface WebSearchCallItem {
  type: "web_search_call";
  id: string;
  status: string;
}

export interface FileSearchCallItem {
  type: "file_search_call";
  id: string;
  queries: string[];
}

export interface ImageGenerationCallItem {
  type: "image_generation_call";
  id: string;
  /** base64 image bytes; null when generation produced nothing */
  result: string | null;
}

export interface CodeInterpreterCallItem {
  type: "code_interpreter_call";
  id: string;
  code: string;
}

export interface McpListToolsItem {
  type: "mcp_list_tools";
  id: string;
  serverLabel: string;
  tools: string[];
}

export interface McpCallItem {
  type: "mcp_call";
  id: string;
  serverLabel: string;
  name: string;
  /** JSON-encoded arguments exactly as the model sent them */
  arguments: string;
  output?: string | null;
}

export type ToolCallRecord =
  | WebSearchCallItem
  | FileSearchCallItem
  | ImageGenerationCallItem
  | CodeInterpreterCallItem
  | McpListToolsItem
  | McpCallItem;

export type ToolCallKind = ToolCallRecord["type"];

export type ConversationItem = UserMessageItem | AssistantMessageItem | ToolCallRecord;

/** Text carried by an item that renders as a text bubble, if any. */
export const getItemText = (item: ConversationItem): string | undefined => {
  if (item.type === "user_message") {
    return typeof item.content === "string" ? item.content : undefined;
  }
  if (item.type === "assistant_message") {
    return item.text;
  }
  return undefined;
};

// ---------------------------------------------------------------------------
// Live turn events
// ---------------------------------------------------------------------------

/**
 * Events produced by an agent runtime while one turn streams. Everything the
 * accumulator does not draw directly arrives as a `lifecycle` event carrying
 * the backend's own tag, which may or may not map to a status label.
 */
export type StreamEvent =
  | { type: "text.delta"; delta: string }
  | { type: "code.delta"; delta: string }
  | { type: "image.partial"; imageBase64: string }
  | { type: "lifecycle"; tag: string };

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export type Role = "user" | "assistant";

export type StatusState = "running" | "complete";

export interface TurnStatus {
  label: string;
  state: StatusState;
}

export type ImageSource =
  | { type: "url"; url: string }
  | { type: "bytes"; bytes: Uint8Array };

export type BubbleContent =
  | { kind: "text"; text: string }
  | { kind: "code"; code: string }
  | { kind: "image"; image: ImageSource };

export type RenderOp =
  | { op: "show_bubble"; role: Role; content: BubbleContent }
  | { op: "set_text"; text: string }
  | { op: "set_code"; code: string }
  | { op: "set_image"; bytes: Uint8Array }
  | { op: "set_status"; label: string; state: StatusState };

export interface RenderSink {
  showBubble(role: Role, content: BubbleContent): Promise<void> | void;
  setText(text: string): Promise<void> | void;
  setCode(code: string): Promise<void> | void;
  setImage(bytes: Uint8Array): Promise<void> | void;
  setStatus(label: string, state: StatusState): Promise<void> | void;
}

export const applyRenderOp = async (sink: RenderSink, op: RenderOp): Promise<void> => {
  switch (op.op) {
    case "show_bubble":
      await sink.showBubble(op.role, op.content);
      return;
    case "set_text":
      await sink.setText(op.text);
      return;
    case "set_code":
      await sink.setCode(op.code);
      return;
    case "set_image":
      await sink.setImage(op.bytes);
      return;
    case "set_status":
      await sink.setStatus(op.label, op.state);
      return;
  }
};

/**
 * Forwards every op to the sink in order, awaiting each before pulling the
 * next one.
 */
export const pumpRenderOps = async (
  ops: Iterable<RenderOp> | AsyncIterable<RenderOp>,
  sink: RenderSink,
): Promise<number> => {
  let count = 0;
  for await (const op of ops) {
    await applyRenderOp(sink, op);
    count += 1;
  }
  return count;
};

/** Sink that keeps every op it receives, in order. */
export class RecordingSink implements RenderSink {
  readonly ops: RenderOp[] = [];

  showBubble(role: Role, content: BubbleContent): void {
    this.ops.push({ op: "show_bubble", role, content });
  }

  setText(text: string): void {
    this.ops.push({ op: "set_text", text });
  }

  setCode(code: string): void {
    this.ops.push({ op: "set_code", code });
  }

  setImage(bytes: Uint8Array): void {
    this.ops.push({ op: "set_image", bytes });
  }

  setStatus(label: string, state: StatusState): void {
    this.ops.push({ op: "set_status", label, state });
  }
}

/** Markdown sinks read `$...$` as math; escape every dollar sign. */
export const escapeDollars = (text: string): string => text.replace(/\$/g, "\\$");

// ---------------------------------------------------------------------------
// Session lifecycle events (telemetry)
// ---------------------------------------------------------------------------

export type SessionEvent =
  | { type: "turn:started"; channel: string; resourceId: string }
  | { type: "turn:completed"; channel: string; duration: number; ops: number }
  | { type: "turn:failed"; channel: string; error: Failure }
  | { type: "history:cleared"; channel: string }
  | { type: "upload:attached"; channel: string; name: string; fileId: string }
  | { type: "upload:image"; channel: string; name: string };

export * from "./errors.js";
