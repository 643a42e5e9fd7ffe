import { z } from "zod";
import type { ConversationItem } from "@threadline/sdk";

const imagePartSchema = z.object({ url: z.string() });

const itemSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("user_message"),
    content: z.union([z.string(), z.array(imagePartSchema)]),
  }),
  z.object({ type: z.literal("assistant_message"), text: z.string() }),
  z.object({ type: z.literal("web_search_call"), id: z.string(), status: z.string() }),
  z.object({ type: z.literal("file_search_call"), id: z.string(), queries: z.array(z.string()) }),
  z.object({ type: z.literal("image_generation_call"), id: z.string(), result: z.string().nullable() }),
  z.object({ type: z.literal("code_interpreter_call"), id: z.string(), code: z.string() }),
  z.object({
    type: z.literal("mcp_list_tools"),
    id: z.string(),
    serverLabel: z.string(),
    tools: z.array(z.string()),
  }),
  z.object({
    type: z.literal("mcp_call"),
    id: z.string(),
    serverLabel: z.string(),
    name: z.string(),
    arguments: z.string(),
    output: z.string().nullable().optional(),
  }),
]);

export type ParsedItem =
  | { ok: true; item: ConversationItem }
  | { ok: false; type: string; reason: string };

const describeType = (raw: unknown): string =>
  typeof raw === "object" && raw !== null && "type" in raw && typeof raw.type === "string"
    ? raw.type
    : "(none)";

/**
 * Validates one stored record. Unknown or malformed records are reported
 * instead of thrown so a newer writer cannot break an older reader.
 */
export const parseConversationItem = (raw: unknown): ParsedItem => {
  const parsed = itemSchema.safeParse(raw);
  if (parsed.success) {
    return { ok: true, item: parsed.data };
  }
  return {
    ok: false,
    type: describeType(raw),
    reason: parsed.error.issues[0]?.message ?? "invalid item",
  };
};
