import type OpenAI from "openai";
import {
  pumpRenderOps,
  toFailure,
  type ConversationItem,
  type RenderOp,
  type RenderSink,
} from "@threadline/sdk";
import type { ResolvedConfig } from "./config.js";
import { createConversationLog, type ConversationLog } from "./conversation-log.js";
import { replayHistory } from "./history.js";
import { OpenAiIndexingBackend, createOpenAiClient, type DocumentIndex } from "./openai-backend.js";
import { OpenAiAgentRuntime } from "./openai-runtime.js";
import { ResourceReconciler } from "./reconciler.js";
import { FileResourceHintStore, InMemoryResourceHintStore } from "./resource-hints.js";
import type { AgentRuntime } from "./runtime.js";
import { TelemetryEmitter } from "./telemetry.js";
import { TurnAccumulator } from "./turn-accumulator.js";
import { UploadIntake, type UploadFile } from "./uploads.js";

export interface ChatSessionOptions {
  log: ConversationLog;
  reconciler: ResourceReconciler;
  runtime: AgentRuntime;
  index: Pick<DocumentIndex, "attachDocument">;
  telemetry?: TelemetryEmitter;
}

export interface TurnInput {
  text?: string;
  files?: UploadFile[];
}

export interface TurnOutcome {
  ops: number;
  duration: number;
}

/**
 * One logical conversation: its log, its indexing resource and the runtime
 * that answers it. Construct one per conversation and pass it around; turns
 * submitted to the same session run one after another.
 */
export class ChatSession {
  readonly log: ConversationLog;
  readonly reconciler: ResourceReconciler;
  private readonly runtime: AgentRuntime;
  private readonly telemetry: TelemetryEmitter;
  private readonly intake: UploadIntake;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: ChatSessionOptions) {
    this.log = options.log;
    this.reconciler = options.reconciler;
    this.runtime = options.runtime;
    this.telemetry = options.telemetry ?? new TelemetryEmitter();
    this.intake = new UploadIntake({
      log: options.log,
      reconciler: options.reconciler,
      index: options.index,
      telemetry: this.telemetry,
    });
  }

  /**
   * Wires the OpenAI-backed runtime and indexing backend from resolved config.
   * The confirmed indexing resource id is saved to `indexing.statePath` so
   * later runs reuse it.
   */
  static fromConfig(
    config: ResolvedConfig,
    options: { client?: OpenAI; index?: DocumentIndex } = {},
  ): ChatSession {
    const client = options.client ?? createOpenAiClient();
    const backend = options.index ?? new OpenAiIndexingBackend(client);
    return new ChatSession({
      log: createConversationLog(config.storage.provider, {
        channel: config.channel,
        locator: config.storage.path,
      }),
      reconciler: new ResourceReconciler(backend, {
        name: config.indexing.name,
        fallbackIds: config.indexing.fallbackIds,
        hints:
          config.storage.provider === "memory"
            ? new InMemoryResourceHintStore()
            : new FileResourceHintStore(config.indexing.statePath),
      }),
      runtime: OpenAiAgentRuntime.fromClient(client, config),
      index: backend,
      telemetry: new TelemetryEmitter(config.telemetry),
    });
  }

  get channel(): string {
    return this.log.channel;
  }

  async items(): Promise<ConversationItem[]> {
    return await this.log.readAll();
  }

  async paintHistory(sink: RenderSink): Promise<number> {
    return await pumpRenderOps(replayHistory(await this.log.readAll()), sink);
  }

  /**
   * Render ops for one turn: the user's bubble, then the agent's live output.
   * The resource is re-validated and the user's text persisted before the
   * runtime is invoked.
   */
  async *runTurn(text: string, abortSignal?: AbortSignal): AsyncGenerator<RenderOp> {
    const resourceId = await this.reconciler.ensureResource();
    await this.log.append([{ type: "user_message", content: text }]);
    await this.telemetry.emit({ type: "turn:started", channel: this.channel, resourceId });
    yield { op: "show_bubble", role: "user", content: { kind: "text", text } };
    const accumulator = new TurnAccumulator();
    yield* accumulator.consume(this.runtime.streamTurn({ log: this.log, resourceId, abortSignal }));
  }

  /** Uploads first, then the turn if there is text. Failures reach the caller. */
  submit(input: TurnInput, sink: RenderSink, abortSignal?: AbortSignal): Promise<TurnOutcome> {
    return this.serialized(async () => {
      const startedAt = Date.now();
      let ops = 0;
      try {
        if (input.files && input.files.length > 0) {
          ops += await pumpRenderOps(this.intake.ingest(input.files), sink);
        }
        const text = input.text?.trim();
        if (text) {
          ops += await pumpRenderOps(this.runTurn(text, abortSignal), sink);
        }
      } catch (error) {
        await this.telemetry.emit({ type: "turn:failed", channel: this.channel, error: toFailure(error) });
        throw error;
      }
      const duration = Date.now() - startedAt;
      await this.telemetry.emit({ type: "turn:completed", channel: this.channel, duration, ops });
      return { ops, duration };
    });
  }

  reset(): Promise<void> {
    return this.serialized(async () => {
      await this.log.clear();
      await this.telemetry.emit({ type: "history:cleared", channel: this.channel });
    });
  }

  private serialized<T>(task: () => Promise<T>): Promise<T> {
    const next = this.queue.then(task, task);
    this.queue = next.catch(() => undefined);
    return next;
  }
}
