import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InMemoryConversationLog } from "../src/conversation-log.js";
import { ResourceReconciler } from "../src/reconciler.js";
import { TelemetryEmitter } from "../src/telemetry.js";
import { UploadIntake, inferMediaType, toDataUri } from "../src/uploads.js";
import { FakeIndexBackend, collect } from "./helpers.js";

const setup = () => {
  const backend = new FakeIndexBackend({ live: ["vs_live"] });
  const log = new InMemoryConversationLog({ channel: "chat-history", locator: "mem" });
  const handler = vi.fn();
  const intake = new UploadIntake({
    log,
    reconciler: new ResourceReconciler(backend, { name: "test-store", rememberedId: "vs_live" }),
    index: backend,
    telemetry: new TelemetryEmitter({ handler }),
  });
  return { backend, log, handler, intake };
};

describe("upload intake", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("attaches text documents to the indexing resource", async () => {
    const { backend, log, handler, intake } = setup();

    const ops = await collect(
      intake.ingest([{ name: "notes.txt", mediaType: "text/plain", data: Buffer.from("my notes") }]),
    );

    expect(ops).toEqual([
      { op: "set_status", label: "⏳ Uploading file...", state: "running" },
      { op: "set_status", label: "⏳ Attaching file...", state: "running" },
      { op: "set_status", label: "✅ File uploaded", state: "complete" },
    ]);
    expect(backend.attached).toEqual([{ resourceId: "vs_live", name: "notes.txt", text: "my notes" }]);
    expect(await log.readAll()).toEqual([]);
    expect(handler).toHaveBeenCalledWith({
      type: "upload:attached",
      channel: "chat-history",
      name: "notes.txt",
      fileId: "file_1",
    });
  });

  it("stores images as user messages with a data URI", async () => {
    const { log, intake } = setup();

    const ops = await collect(
      intake.ingest([{ name: "cat.png", mediaType: "image/png", data: Buffer.from([1, 2, 3]) }]),
    );

    expect(await log.readAll()).toEqual([
      { type: "user_message", content: [{ url: "data:image/png;base64,AQID" }] },
    ]);
    expect(ops.at(-1)).toEqual({
      op: "show_bubble",
      role: "user",
      content: { kind: "image", image: { type: "url", url: "data:image/png;base64,AQID" } },
    });
  });

  it("rejects unsupported media types", async () => {
    const { backend, log, intake } = setup();

    const ops = await collect(
      intake.ingest([{ name: "a.pdf", mediaType: "application/pdf", data: Buffer.from("x") }]),
    );

    expect(ops).toEqual([{ op: "set_status", label: "⚠️ Unsupported file type: a.pdf", state: "complete" }]);
    expect(backend.attached).toEqual([]);
    expect(await log.readAll()).toEqual([]);
  });
});

describe("media types", () => {
  it("infers accepted types from the extension", () => {
    expect(inferMediaType("photo.JPG")).toBe("image/jpeg");
    expect(inferMediaType("notes.txt")).toBe("text/plain");
    expect(inferMediaType("slides.pptx")).toBeUndefined();
  });

  it("builds data URIs", () => {
    expect(toDataUri(Buffer.from("hi"), "text/plain")).toBe("data:text/plain;base64,aGk=");
  });
});
