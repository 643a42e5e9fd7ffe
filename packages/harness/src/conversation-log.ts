import { StorageWriteError, errorMessage, type ConversationItem } from "@threadline/sdk";
import type { StorageProviderName } from "./config.js";
import { parseConversationItem } from "./item-schema.js";
import { readJsonFile, updateJsonFile, withFileLock } from "./json-file.js";
import { log } from "./log.js";

export const STORAGE_SCHEMA_VERSION = "v1";

export interface ConversationLog {
  readonly channel: string;
  readonly locator: string;
  /** Appends all items or none of them. */
  append(items: ConversationItem[]): Promise<void>;
  readAll(): Promise<ConversationItem[]>;
  count(): Promise<number>;
  clear(): Promise<void>;
}

export interface ConversationLogKey {
  channel: string;
  /** Durable store locator; a file path for the local provider. */
  locator: string;
}

type LogFile = {
  schemaVersion: string;
  channels: Record<string, unknown[]>;
};

const toLogFile = (value: unknown): LogFile => {
  const channels: Record<string, unknown[]> = {};
  if (typeof value === "object" && value !== null && "channels" in value) {
    const raw = value.channels;
    if (typeof raw === "object" && raw !== null) {
      for (const [channel, items] of Object.entries(raw)) {
        if (Array.isArray(items)) {
          channels[channel] = items;
        }
      }
    }
  }
  return { schemaVersion: STORAGE_SCHEMA_VERSION, channels };
};

const cloneItems = (items: ConversationItem[]): ConversationItem[] => structuredClone(items);

export class InMemoryConversationLog implements ConversationLog {
  readonly channel: string;
  readonly locator: string;
  private readonly store: Map<string, ConversationItem[]>;

  constructor(key: ConversationLogKey, store: Map<string, ConversationItem[]> = new Map()) {
    this.channel = key.channel;
    this.locator = key.locator;
    this.store = store;
  }

  private get key(): string {
    return `${this.locator}\u0000${this.channel}`;
  }

  async append(items: ConversationItem[]): Promise<void> {
    if (items.length === 0) {
      return;
    }
    const existing = this.store.get(this.key) ?? [];
    this.store.set(this.key, [...existing, ...cloneItems(items)]);
  }

  async readAll(): Promise<ConversationItem[]> {
    return cloneItems(this.store.get(this.key) ?? []);
  }

  async count(): Promise<number> {
    return this.store.get(this.key)?.length ?? 0;
  }

  async clear(): Promise<void> {
    this.store.delete(this.key);
  }
}

/**
 * One JSON document per locator, holding every channel that shares it. Each
 * write replaces the document through a temp file and rename, so a crash
 * leaves either the old or the new history on disk. Stores opened on the same
 * file, whatever their channel, queue behind one write chain.
 */
export class FileConversationLog implements ConversationLog {
  readonly channel: string;
  readonly locator: string;

  constructor(key: ConversationLogKey) {
    this.channel = key.channel;
    this.locator = key.locator;
  }

  private async mutate(task: (file: LogFile) => void): Promise<void> {
    await updateJsonFile(this.locator, (current) => {
      const file = toLogFile(current);
      task(file);
      return file;
    });
  }

  async append(items: ConversationItem[]): Promise<void> {
    if (items.length === 0) {
      return;
    }
    try {
      await this.mutate((file) => {
        file.channels[this.channel] = [...(file.channels[this.channel] ?? []), ...items];
      });
    } catch (error) {
      throw new StorageWriteError(
        `Could not append ${items.length} item(s) to ${this.locator}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  async readAll(): Promise<ConversationItem[]> {
    const file = toLogFile(await withFileLock(this.locator, () => readJsonFile(this.locator)));
    const items: ConversationItem[] = [];
    for (const raw of file.channels[this.channel] ?? []) {
      const parsed = parseConversationItem(raw);
      if (parsed.ok) {
        items.push(parsed.item);
        continue;
      }
      log("warn", "log", "item.skipped", {
        channel: this.channel,
        type: parsed.type,
        reason: parsed.reason,
      });
    }
    return items;
  }

  async count(): Promise<number> {
    return (await this.readAll()).length;
  }

  async clear(): Promise<void> {
    try {
      await this.mutate((file) => {
        delete file.channels[this.channel];
      });
    } catch (error) {
      throw new StorageWriteError(`Could not clear ${this.locator}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

export const createConversationLog = (
  provider: StorageProviderName,
  key: ConversationLogKey,
): ConversationLog => {
  if (provider === "memory") {
    return new InMemoryConversationLog(key);
  }
  return new FileConversationLog(key);
};
