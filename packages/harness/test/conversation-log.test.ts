import { mkdtemp, readFile, readdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { StorageWriteError, getItemText, type ConversationItem } from "@threadline/sdk";
import {
  FileConversationLog,
  InMemoryConversationLog,
  createConversationLog,
} from "../src/conversation-log.js";
import { replayHistory } from "../src/history.js";

const sampleItems: ConversationItem[] = [
  { type: "user_message", content: "What is the weather?" },
  { type: "web_search_call", id: "ws_1", status: "completed" },
  { type: "assistant_message", text: "Sunny, $0 umbrella budget." },
  { type: "user_message", content: [{ url: "data:image/png;base64,AA==" }] },
  { type: "code_interpreter_call", id: "ci_1", code: "print(2 + 2)" },
  { type: "assistant_message", text: "4" },
];

const tempLocator = async (): Promise<string> => {
  const dir = await mkdtemp(join(tmpdir(), "threadline-log-"));
  return join(dir, "chat-memory.json");
};

describe("file conversation log", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("persists items in order across instances", async () => {
    const locator = await tempLocator();
    const writer = new FileConversationLog({ channel: "chat-history", locator });
    await writer.append(sampleItems.slice(0, 2));
    await writer.append(sampleItems.slice(2));

    const reader = new FileConversationLog({ channel: "chat-history", locator });
    expect(await reader.readAll()).toEqual(sampleItems);
    expect(await reader.count()).toBe(6);
  });

  it("reads an empty history when the file does not exist", async () => {
    const log = new FileConversationLog({ channel: "chat-history", locator: await tempLocator() });
    expect(await log.readAll()).toEqual([]);
  });

  it("clears one channel and leaves the others", async () => {
    const locator = await tempLocator();
    const main = new FileConversationLog({ channel: "main", locator });
    const side = new FileConversationLog({ channel: "side", locator });
    await main.append([{ type: "user_message", content: "hello" }]);
    await side.append([{ type: "user_message", content: "other" }]);

    await main.clear();

    expect(await main.readAll()).toEqual([]);
    expect(await side.readAll()).toEqual([{ type: "user_message", content: "other" }]);
  });

  it("writes a versioned document", async () => {
    const locator = await tempLocator();
    const log = new FileConversationLog({ channel: "chat-history", locator });
    await log.append([{ type: "assistant_message", text: "hi" }]);

    const parsed: unknown = JSON.parse(await readFile(locator, "utf8"));
    expect(parsed).toEqual({
      schemaVersion: "v1",
      channels: { "chat-history": [{ type: "assistant_message", text: "hi" }] },
    });
  });

  it("skips records of unknown kinds on read", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const locator = await tempLocator();
    await writeFile(
      locator,
      JSON.stringify({
        schemaVersion: "v1",
        channels: {
          "chat-history": [
            { type: "user_message", content: "kept" },
            { type: "computer_call", id: "cc_1" },
            { type: "assistant_message" },
            { type: "assistant_message", text: "also kept" },
          ],
        },
      }),
      "utf8",
    );

    const log = new FileConversationLog({ channel: "chat-history", locator });

    expect(await log.readAll()).toEqual([
      { type: "user_message", content: "kept" },
      { type: "assistant_message", text: "also kept" },
    ]);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it("raises a storage error when the write fails", async () => {
    const dir = await mkdtemp(join(tmpdir(), "threadline-log-dir-"));
    const log = new FileConversationLog({ channel: "chat-history", locator: dir });

    await expect(log.append([{ type: "user_message", content: "lost" }])).rejects.toBeInstanceOf(
      StorageWriteError,
    );
  });

  it("serializes concurrent appends without losing items", async () => {
    const locator = await tempLocator();
    const log = new FileConversationLog({ channel: "chat-history", locator });

    await Promise.all(
      ["one", "two", "three"].map((content) => log.append([{ type: "user_message", content }])),
    );

    expect(await log.readAll()).toEqual([
      { type: "user_message", content: "one" },
      { type: "user_message", content: "two" },
      { type: "user_message", content: "three" },
    ]);
  });

  it("keeps concurrent appends from stores on different channels of one file", async () => {
    const locator = await tempLocator();
    const a = new FileConversationLog({ channel: "a", locator });
    const b = new FileConversationLog({ channel: "b", locator });

    const results = await Promise.allSettled([
      a.append([{ type: "user_message", content: "for a" }]),
      b.append([{ type: "user_message", content: "for b" }]),
      a.append([{ type: "assistant_message", text: "again a" }]),
    ]);

    expect(results.map((result) => result.status)).toEqual(["fulfilled", "fulfilled", "fulfilled"]);
    expect(await new FileConversationLog({ channel: "a", locator }).readAll()).toEqual([
      { type: "user_message", content: "for a" },
      { type: "assistant_message", text: "again a" },
    ]);
    expect(await new FileConversationLog({ channel: "b", locator }).readAll()).toEqual([
      { type: "user_message", content: "for b" },
    ]);
    expect(await readdir(dirname(locator))).toEqual(["chat-memory.json"]);
  });

  it("keeps what an earlier store instance wrote to the same channel", async () => {
    const locator = await tempLocator();
    await new FileConversationLog({ channel: "chat-history", locator }).append([
      { type: "user_message", content: "first run" },
    ]);
    const second = new FileConversationLog({ channel: "chat-history", locator });

    await Promise.all([
      second.append([{ type: "user_message", content: "second run" }]),
      new FileConversationLog({ channel: "chat-history", locator }).append([
        { type: "assistant_message", text: "third store" },
      ]),
    ]);

    expect(await second.readAll()).toEqual([
      { type: "user_message", content: "first run" },
      { type: "user_message", content: "second run" },
      { type: "assistant_message", text: "third store" },
    ]);
  });
});

describe("in-memory conversation log", () => {
  it("isolates channels and returns copies", async () => {
    const store = new Map<string, ConversationItem[]>();
    const a = new InMemoryConversationLog({ channel: "a", locator: "mem" }, store);
    const b = new InMemoryConversationLog({ channel: "b", locator: "mem" }, store);
    await a.append([{ type: "assistant_message", text: "for a" }]);

    const read = await a.readAll();
    read.push({ type: "assistant_message", text: "mutated" });

    expect(await a.readAll()).toEqual([{ type: "assistant_message", text: "for a" }]);
    expect(await b.readAll()).toEqual([]);
  });

  it("shares one channel between stores on the same locator and map", async () => {
    const store = new Map<string, ConversationItem[]>();
    const first = new InMemoryConversationLog({ channel: "chat-history", locator: "mem" }, store);
    const second = new InMemoryConversationLog({ channel: "chat-history", locator: "mem" }, store);
    const elsewhere = new InMemoryConversationLog({ channel: "chat-history", locator: "other" }, store);

    await first.append([{ type: "user_message", content: "one" }]);
    await second.append([{ type: "assistant_message", text: "two" }]);

    expect(await first.readAll()).toEqual([
      { type: "user_message", content: "one" },
      { type: "assistant_message", text: "two" },
    ]);
    expect(await elsewhere.count()).toBe(0);

    await second.clear();
    expect(await first.count()).toBe(0);
  });

  it("is empty after clear", async () => {
    const log = createConversationLog("memory", { channel: "chat-history", locator: "mem" });
    await log.append(sampleItems);
    await log.clear();
    expect(await log.readAll()).toEqual([]);
    expect(await log.count()).toBe(0);
  });
});

describe("log and replay together", () => {
  it("renders one text bubble per text-bearing item", async () => {
    const log = new FileConversationLog({ channel: "chat-history", locator: await tempLocator() });
    await log.append(sampleItems);

    const ops = [...replayHistory(await log.readAll())];
    const textBubbles = ops.filter(
      (op) =>
        op.op === "show_bubble" &&
        op.content.kind === "text" &&
        (op.role === "user" || !op.content.text.startsWith("🔍")),
    );

    expect(textBubbles).toHaveLength(sampleItems.filter((item) => getItemText(item) !== undefined).length);
  });
});
