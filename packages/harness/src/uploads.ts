import { extname } from "node:path";
import type { RenderOp } from "@threadline/sdk";
import type { ConversationLog } from "./conversation-log.js";
import { log } from "./log.js";
import type { DocumentIndex } from "./openai-backend.js";
import type { ResourceReconciler } from "./reconciler.js";
import type { TelemetryEmitter } from "./telemetry.js";

export interface UploadFile {
  name: string;
  mediaType: string;
  data: Buffer;
}

const MEDIA_TYPE_BY_EXTENSION: Record<string, string> = {
  ".txt": "text/plain",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
};

export const ACCEPTED_EXTENSIONS = Object.keys(MEDIA_TYPE_BY_EXTENSION);

export const inferMediaType = (fileName: string): string | undefined =>
  MEDIA_TYPE_BY_EXTENSION[extname(fileName).toLowerCase()];

export const toDataUri = (data: Buffer, mediaType: string): string =>
  `data:${mediaType};base64,${data.toString("base64")}`;

const status = (label: string, state: "running" | "complete" = "running"): RenderOp => ({
  op: "set_status",
  label,
  state,
});

export interface UploadIntakeOptions {
  log: ConversationLog;
  reconciler: ResourceReconciler;
  index: Pick<DocumentIndex, "attachDocument">;
  telemetry: TelemetryEmitter;
}

/**
 * Takes user files before a turn. Documents are attached to the indexing
 * resource for file search; images become user messages in the log.
 */
export class UploadIntake {
  private readonly options: UploadIntakeOptions;

  constructor(options: UploadIntakeOptions) {
    this.options = options;
  }

  async *ingest(files: UploadFile[]): AsyncGenerator<RenderOp> {
    for (const file of files) {
      if (file.mediaType.startsWith("text/")) {
        yield* this.attachDocument(file);
      } else if (file.mediaType.startsWith("image/")) {
        yield* this.appendImage(file);
      } else {
        log("warn", "uploads", "upload.rejected", { name: file.name, mediaType: file.mediaType });
        yield status(`⚠️ Unsupported file type: ${file.name}`, "complete");
      }
    }
  }

  private async *attachDocument(file: UploadFile): AsyncGenerator<RenderOp> {
    const { reconciler, index, telemetry } = this.options;
    yield status("⏳ Uploading file...");
    const resourceId = await reconciler.ensureResource();
    yield status("⏳ Attaching file...");
    const fileId = await index.attachDocument(resourceId, { name: file.name, data: file.data });
    log("info", "uploads", "document.attached", { name: file.name, fileId, resourceId });
    await telemetry.emit({
      type: "upload:attached",
      channel: this.options.log.channel,
      name: file.name,
      fileId,
    });
    yield status("✅ File uploaded", "complete");
  }

  private async *appendImage(file: UploadFile): AsyncGenerator<RenderOp> {
    const { log: conversationLog, telemetry } = this.options;
    yield status("⏳ Uploading image...");
    const url = toDataUri(file.data, file.mediaType);
    await conversationLog.append([{ type: "user_message", content: [{ url }] }]);
    await telemetry.emit({ type: "upload:image", channel: conversationLog.channel, name: file.name });
    yield status("✅ Image uploaded", "complete");
    yield { op: "show_bubble", role: "user", content: { kind: "image", image: { type: "url", url } } };
  }
}
