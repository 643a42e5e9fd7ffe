import {
  StreamTransportError,
  ThreadlineError,
  errorMessage,
  escapeDollars,
  type RenderOp,
  type StreamEvent,
  type TurnStatus,
} from "@threadline/sdk";

/** `abandoned`: the consumer stopped pulling ops before the source ended. */
export type TurnState = "idle" | "streaming" | "completed" | "failed" | "abandoned";

export const INITIAL_STATUS: TurnStatus = { label: "⏳", state: "running" };

const running = (label: string): TurnStatus => ({ label, state: "running" });
const complete = (label: string): TurnStatus => ({ label, state: "complete" });

/** Backend lifecycle tags that change the status line. Any other tag is ignored. */
export const STATUS_BY_TAG: ReadonlyMap<string, TurnStatus> = new Map([
  ["response.created", running("⏳ Thinking...")],
  ["response.in_progress", running("⏳ Thinking...")],
  ["response.web_search_call.in_progress", running("🔍 Starting web search...")],
  ["response.web_search_call.searching", running("🔍 Web search in progress...")],
  ["response.web_search_call.completed", complete("✅ Web search completed.")],
  ["response.file_search_call.in_progress", running("🗂️ Starting file search...")],
  ["response.file_search_call.searching", running("🗂️ File search in progress...")],
  ["response.file_search_call.completed", complete("✅ File search completed.")],
  ["response.image_generation_call.in_progress", running("🎨 Drawing image...")],
  ["response.image_generation_call.generating", running("🎨 Drawing image...")],
  ["response.image_generation_call.completed", complete("🎨 Image ready.")],
  // Running, not complete; earlier releases marked these two complete and left
  // response.completed with a blank label.
  ["response.code_interpreter_call.in_progress", running("🤖 Running code...")],
  ["response.code_interpreter_call.interpreting", running("🤖 Running code...")],
  ["response.code_interpreter_call_code.done", complete("🤖 Ran code.")],
  ["response.code_interpreter_call.completed", complete("🤖 Ran code.")],
  ["response.mcp_list_tools.in_progress", running("⚒️ Listing MCP tools")],
  ["response.mcp_list_tools.completed", complete("⚒️ Listed MCP tools")],
  ["response.mcp_list_tools.failed", complete("⚒️ Error listing MCP tools")],
  ["response.mcp_call.in_progress", running("⚒️ Calling MCP tool...")],
  ["response.mcp_call.completed", complete("⚒️ Called MCP tool")],
  ["response.mcp_call.failed", complete("⚒️ Error calling MCP tool")],
  ["response.completed", complete("✅ Done")],
]);

export const lookupStatus = (tag: string): TurnStatus | undefined => STATUS_BY_TAG.get(tag);

/**
 * Live state for one agent turn. Text and code only grow, the image is
 * replaced by each newer partial frame. Build a new accumulator per turn.
 */
export class TurnAccumulator {
  private textBuffer = "";
  private codeBuffer = "";
  private image?: Uint8Array;
  private currentStatus: TurnStatus = INITIAL_STATUS;
  private turnState: TurnState = "idle";

  get text(): string {
    return this.textBuffer;
  }

  get code(): string {
    return this.codeBuffer;
  }

  get latestImage(): Uint8Array | undefined {
    return this.image;
  }

  get status(): TurnStatus {
    return this.currentStatus;
  }

  get state(): TurnState {
    return this.turnState;
  }

  /** Folds one event into the buffers and returns the ops it produces. */
  apply(event: StreamEvent): RenderOp[] {
    switch (event.type) {
      case "lifecycle": {
        const status = lookupStatus(event.tag);
        if (!status) {
          return [];
        }
        this.currentStatus = status;
        return [{ op: "set_status", label: status.label, state: status.state }];
      }
      case "text.delta":
        this.textBuffer += event.delta;
        return [{ op: "set_text", text: escapeDollars(this.textBuffer) }];
      case "code.delta":
        this.codeBuffer += event.delta;
        return [{ op: "set_code", code: this.codeBuffer }];
      case "image.partial": {
        const bytes = Buffer.from(event.imageBase64, "base64");
        this.image = bytes;
        return [{ op: "set_image", bytes }];
      }
      default:
        return [];
    }
  }

  /**
   * Drains the event source, yielding render ops in arrival order. A source
   * failure marks the turn failed and is rethrown; ops already yielded stay
   * on screen.
   */
  async *consume(events: AsyncIterable<StreamEvent>): AsyncGenerator<RenderOp> {
    if (this.turnState !== "idle") {
      throw new Error(`Turn accumulator already used (state: ${this.turnState})`);
    }
    this.turnState = "streaming";
    try {
      yield { op: "set_status", label: this.currentStatus.label, state: this.currentStatus.state };
      for await (const event of events) {
        yield* this.apply(event);
      }
      this.turnState = "completed";
    } catch (error) {
      this.turnState = "failed";
      if (error instanceof ThreadlineError) {
        throw error;
      }
      throw new StreamTransportError(`Event stream failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      if (this.turnState === "streaming") {
        this.turnState = "abandoned";
      }
    }
  }
}
