import type { ConversationItem, RenderOp, StreamEvent } from "@threadline/sdk";
import type { IndexingBackend, ProbeResult } from "../src/reconciler.js";
import type { DocumentUpload } from "../src/openai-backend.js";
import type { AgentRuntime, TurnRequest } from "../src/runtime.js";

export class FakeIndexBackend implements IndexingBackend {
  readonly live: Set<string>;
  readonly failing: Set<string>;
  readonly probes: string[] = [];
  readonly created: string[] = [];
  readonly attached: Array<{ resourceId: string; name: string; text: string }> = [];
  createError?: Error;

  constructor(options: { live?: string[]; failing?: string[] } = {}) {
    this.live = new Set(options.live ?? []);
    this.failing = new Set(options.failing ?? []);
  }

  async probe(id: string): Promise<ProbeResult> {
    this.probes.push(id);
    if (this.failing.has(id)) {
      return { status: "error", error: Object.assign(new Error("service unavailable"), { status: 503 }) };
    }
    return this.live.has(id) ? { status: "exists" } : { status: "not-found" };
  }

  async create(name: string): Promise<string> {
    if (this.createError) {
      throw this.createError;
    }
    this.created.push(name);
    const id = `vs_created_${this.created.length}`;
    this.live.add(id);
    return id;
  }

  async attachDocument(resourceId: string, file: DocumentUpload): Promise<string> {
    this.attached.push({ resourceId, name: file.name, text: file.data.toString("utf8") });
    return `file_${this.attached.length}`;
  }
}

/** Replays fixed events, then persists the turn's items like a real runtime. */
export class ScriptedRuntime implements AgentRuntime {
  readonly requests: TurnRequest[] = [];
  readonly historyAtStart: ConversationItem[][] = [];

  constructor(
    private readonly script: {
      events: StreamEvent[];
      finalItems?: ConversationItem[];
      failWith?: Error;
    },
  ) {}

  async *streamTurn(request: TurnRequest): AsyncGenerator<StreamEvent> {
    this.requests.push(request);
    this.historyAtStart.push(await request.log.readAll());
    for (const event of this.script.events) {
      yield event;
    }
    if (this.script.failWith) {
      throw this.script.failWith;
    }
    await request.log.append(this.script.finalItems ?? []);
  }
}

export const collect = async (ops: AsyncIterable<RenderOp>): Promise<RenderOp[]> => {
  const result: RenderOp[] = [];
  for await (const op of ops) {
    result.push(op);
  }
  return result;
};

export async function* fromArray<T>(values: T[]): AsyncGenerator<T> {
  for (const value of values) {
    yield value;
  }
}
