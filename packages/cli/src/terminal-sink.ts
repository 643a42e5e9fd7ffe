import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { BubbleContent, ImageSource, RenderSink, Role, StatusState } from "@threadline/sdk";
import { cyan, gray, green } from "./ansi.js";

export interface TerminalSinkOptions {
  /** Directory generated and uploaded images are written to. */
  imageDir: string;
  /** Prefix for saved image names; defaults to a per-process stamp. */
  runId?: string;
  write?: (chunk: string) => void;
}

type LiveMode = "none" | "text" | "code";

const CODE_INDENT = "    ";

const unescapeDollars = (text: string): string => text.replace(/\\\$/g, "$");

const indent = (code: string): string =>
  code
    .split("\n")
    .map((line) => `${CODE_INDENT}${line}`)
    .join("\n");

const EXTENSION_BY_MEDIA_TYPE: Record<string, string> = {
  "image/png": "png",
  "image/jpeg": "jpg",
  "image/webp": "webp",
  "image/gif": "gif",
};

export const sniffImageExtension = (bytes: Uint8Array): string => {
  if (bytes[0] === 0x89 && bytes[1] === 0x50 && bytes[2] === 0x4e && bytes[3] === 0x47) {
    return "png";
  }
  if (bytes[0] === 0xff && bytes[1] === 0xd8) {
    return "jpg";
  }
  if (bytes[0] === 0x52 && bytes[1] === 0x49 && bytes[2] === 0x46 && bytes[3] === 0x46) {
    return "webp";
  }
  return "bin";
};

const DATA_URI_PATTERN = /^data:([^;,]+);base64,(.*)$/s;

/**
 * Prints render ops as terminal lines. Live text and code arrive as the full
 * buffer on every update; only the unseen suffix is written.
 */
export class TerminalSink implements RenderSink {
  private readonly imageDir: string;
  private readonly write: (chunk: string) => void;
  private mode: LiveMode = "none";
  private lineOpen = false;
  private textShown = "";
  private codeShown = "";
  private liveImagePath: string | undefined;
  private lastStatus: string | undefined;
  private readonly runId: string;
  private imageCount = 0;

  constructor(options: TerminalSinkOptions) {
    this.imageDir = options.imageDir;
    this.runId = options.runId ?? Date.now().toString(36);
    this.write = options.write ?? ((chunk) => void process.stdout.write(chunk));
  }

  async showBubble(role: Role, content: BubbleContent): Promise<void> {
    this.endLine();
    this.mode = "none";
    this.textShown = "";
    this.codeShown = "";
    this.liveImagePath = undefined;
    this.lastStatus = undefined;
    const prefix = role === "user" ? cyan("you> ") : green("assistant> ");
    switch (content.kind) {
      case "text":
        this.write(`${prefix}${unescapeDollars(content.text)}\n`);
        return;
      case "code":
        this.write(`${prefix}${gray("code")}\n${indent(content.code)}\n`);
        return;
      case "image":
        this.write(`${prefix}${gray("image")} ${await this.describeImage(content.image)}\n`);
        return;
    }
  }

  setText(text: string): void {
    const plain = unescapeDollars(text);
    if (this.mode !== "text") {
      this.endLine();
      this.write(green("assistant> "));
      this.mode = "text";
      this.lineOpen = true;
    }
    const suffix = plain.startsWith(this.textShown) ? plain.slice(this.textShown.length) : `\n${plain}`;
    this.write(suffix);
    this.textShown = plain;
  }

  setCode(code: string): void {
    if (this.mode !== "code") {
      this.endLine();
      this.write(`${gray("code")}\n${CODE_INDENT}`);
      this.mode = "code";
      this.lineOpen = true;
    }
    const suffix = code.startsWith(this.codeShown) ? code.slice(this.codeShown.length) : `\n${code}`;
    this.write(suffix.replace(/\n/g, `\n${CODE_INDENT}`));
    this.codeShown = code;
  }

  async setImage(bytes: Uint8Array): Promise<void> {
    const announce = this.liveImagePath === undefined;
    this.liveImagePath ??= this.nextImagePath(sniffImageExtension(bytes));
    await this.saveImage(this.liveImagePath, bytes);
    if (announce) {
      this.endLine();
      this.mode = "none";
      this.write(`${green("assistant> ")}${gray("image")} ${this.liveImagePath}\n`);
    }
  }

  setStatus(label: string, _state: StatusState): void {
    if (label === this.lastStatus) {
      return;
    }
    this.lastStatus = label;
    this.endLine();
    this.mode = "none";
    this.write(`${gray(`status> ${label}`)}\n`);
  }

  /** Closes a half-written live line. */
  endLine(): void {
    if (this.lineOpen) {
      this.write("\n");
      this.lineOpen = false;
    }
  }

  private async describeImage(image: ImageSource): Promise<string> {
    if (image.type === "bytes") {
      const path = this.nextImagePath(sniffImageExtension(image.bytes));
      await this.saveImage(path, image.bytes);
      return path;
    }
    const match = DATA_URI_PATTERN.exec(image.url);
    if (!match) {
      return image.url;
    }
    const [, mediaType = "", payload = ""] = match;
    const path = this.nextImagePath(EXTENSION_BY_MEDIA_TYPE[mediaType] ?? "bin");
    await this.saveImage(path, Buffer.from(payload, "base64"));
    return path;
  }

  private nextImagePath(extension: string): string {
    this.imageCount += 1;
    return join(this.imageDir, `${this.runId}-${this.imageCount}.${extension}`);
  }

  private async saveImage(path: string, bytes: Uint8Array): Promise<void> {
    await mkdir(this.imageDir, { recursive: true });
    await writeFile(path, bytes);
  }
}
