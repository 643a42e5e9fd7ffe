import { escapeDollars, type ConversationItem, type RenderOp, type ToolCallRecord } from "@threadline/sdk";

const assistantText = (text: string): RenderOp => ({
  op: "show_bubble",
  role: "assistant",
  content: { kind: "text", text },
});

const replayToolCall = (record: ToolCallRecord): RenderOp[] => {
  switch (record.type) {
    case "web_search_call":
      return [assistantText("🔍 Searched the web...")];
    case "file_search_call":
      return [assistantText("🗂️ Searched your files...")];
    case "image_generation_call":
      if (!record.result) {
        return [];
      }
      return [
        {
          op: "show_bubble",
          role: "assistant",
          content: { kind: "image", image: { type: "bytes", bytes: Buffer.from(record.result, "base64") } },
        },
      ];
    case "code_interpreter_call":
      return [{ op: "show_bubble", role: "assistant", content: { kind: "code", code: record.code } }];
    case "mcp_list_tools":
      return [assistantText(`Listed ${record.serverLabel}'s tools`)];
    case "mcp_call":
      return [assistantText(`Called ${record.serverLabel}'s ${record.name} with args ${record.arguments}`)];
    default:
      return [];
  }
};

/** Render ops for one stored item; empty for kinds this version does not know. */
export const replayItem = (item: ConversationItem): RenderOp[] => {
  switch (item.type) {
    case "user_message":
      if (typeof item.content === "string") {
        return [{ op: "show_bubble", role: "user", content: { kind: "text", text: item.content } }];
      }
      return item.content.map((part): RenderOp => ({
        op: "show_bubble",
        role: "user",
        content: { kind: "image", image: { type: "url", url: part.url } },
      }));
    case "assistant_message":
      return [assistantText(escapeDollars(item.text))];
    default:
      return replayToolCall(item);
  }
};

/**
 * Projects stored history into render ops. Pure: calling it again over the
 * same items yields the same sequence.
 */
export function* replayHistory(items: Iterable<ConversationItem>): Generator<RenderOp> {
  for (const item of items) {
    yield* replayItem(item);
  }
}
