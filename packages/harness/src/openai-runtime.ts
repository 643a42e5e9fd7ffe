import type OpenAI from "openai";
import type {
  ResponseCreateParamsStreaming,
  ResponseInputImage,
  ResponseInputItem,
  ResponseOutputItem,
  ResponseStreamEvent,
  Tool,
} from "openai/resources/responses/responses";
import { StreamTransportError, type ConversationItem, type StreamEvent } from "@threadline/sdk";
import type { ResolvedConfig, ResolvedTools } from "./config.js";
import { log } from "./log.js";
import type { AgentRuntime, TurnRequest } from "./runtime.js";

/**
 * Model input for a turn. Tool-call records are display history only and are
 * not sent back; the model sees the user and assistant messages.
 */
export const toModelInput = (items: ConversationItem[]): ResponseInputItem[] => {
  const input: ResponseInputItem[] = [];
  for (const item of items) {
    if (item.type === "user_message") {
      input.push({
        role: "user",
        content:
          typeof item.content === "string"
            ? item.content
            : item.content.map(
                (part): ResponseInputImage => ({ type: "input_image", image_url: part.url, detail: "auto" }),
              ),
      });
    } else if (item.type === "assistant_message") {
      input.push({ role: "assistant", content: item.text });
    }
  }
  return input;
};

export const buildTools = (tools: ResolvedTools, resourceId: string): Tool[] => {
  const result: Tool[] = [];
  if (tools.webSearch) {
    result.push({ type: "web_search_preview" });
  }
  if (tools.fileSearch) {
    result.push({
      type: "file_search",
      vector_store_ids: [resourceId],
      max_num_results: tools.fileSearch.maxResults,
    });
  }
  if (tools.imageGeneration) {
    result.push({
      type: "image_generation",
      quality: tools.imageGeneration.quality,
      output_format: tools.imageGeneration.outputFormat,
      partial_images: tools.imageGeneration.partialImages,
    });
  }
  if (tools.codeInterpreter) {
    result.push({ type: "code_interpreter", container: { type: "auto" } });
  }
  for (const server of tools.mcp) {
    result.push({
      type: "mcp",
      server_label: server.label,
      server_url: server.url,
      ...(server.description ? { server_description: server.description } : {}),
      require_approval: server.requireApproval,
    });
  }
  return result;
};

/** Finalized response output as log items; output kinds without a rendering are dropped. */
export const toConversationItems = (output: ResponseOutputItem[]): ConversationItem[] => {
  const items: ConversationItem[] = [];
  for (const entry of output) {
    switch (entry.type) {
      case "message": {
        const text = entry.content
          .map((part) => (part.type === "output_text" ? part.text : part.refusal))
          .join("");
        items.push({ type: "assistant_message", text });
        break;
      }
      case "web_search_call":
        items.push({ type: "web_search_call", id: entry.id, status: entry.status });
        break;
      case "file_search_call":
        items.push({ type: "file_search_call", id: entry.id, queries: entry.queries });
        break;
      case "image_generation_call":
        items.push({ type: "image_generation_call", id: entry.id, result: entry.result });
        break;
      case "code_interpreter_call":
        items.push({ type: "code_interpreter_call", id: entry.id, code: entry.code ?? "" });
        break;
      case "mcp_list_tools":
        items.push({
          type: "mcp_list_tools",
          id: entry.id,
          serverLabel: entry.server_label,
          tools: entry.tools.map((tool) => tool.name),
        });
        break;
      case "mcp_call":
        items.push({
          type: "mcp_call",
          id: entry.id,
          serverLabel: entry.server_label,
          name: entry.name,
          arguments: entry.arguments,
          output: entry.output ?? null,
        });
        break;
      default:
        break;
    }
  }
  return items;
};

export type ResponseStreamFactory = (
  params: ResponseCreateParamsStreaming,
  options: { signal?: AbortSignal },
) => Promise<AsyncIterable<ResponseStreamEvent>>;

type RuntimeConfig = Pick<ResolvedConfig, "model" | "instructions" | "tools">;

export class OpenAiAgentRuntime implements AgentRuntime {
  private readonly createStream: ResponseStreamFactory;
  private readonly config: RuntimeConfig;

  constructor(createStream: ResponseStreamFactory, config: RuntimeConfig) {
    this.createStream = createStream;
    this.config = config;
  }

  static fromClient(client: OpenAI, config: RuntimeConfig): OpenAiAgentRuntime {
    return new OpenAiAgentRuntime((params, options) => client.responses.create(params, options), config);
  }

  async *streamTurn(request: TurnRequest): AsyncGenerator<StreamEvent> {
    const history = await request.log.readAll();
    const stream = await this.createStream(
      {
        model: this.config.model,
        instructions: this.config.instructions,
        input: toModelInput(history),
        tools: buildTools(this.config.tools, request.resourceId),
        stream: true,
      },
      { signal: request.abortSignal },
    );

    for await (const event of stream) {
      switch (event.type) {
        case "response.output_text.delta":
          yield { type: "text.delta", delta: event.delta };
          break;
        case "response.code_interpreter_call_code.delta":
          yield { type: "code.delta", delta: event.delta };
          break;
        case "response.image_generation_call.partial_image":
          yield { type: "image.partial", imageBase64: event.partial_image_b64 };
          break;
        case "error":
          throw new StreamTransportError(`Backend error${event.code ? ` (${event.code})` : ""}: ${event.message}`);
        case "response.failed":
          throw new StreamTransportError(event.response.error?.message ?? "Response failed");
        case "response.completed": {
          const items = toConversationItems(event.response.output);
          await request.log.append(items);
          log("info", "runtime", "turn.persisted", { channel: request.log.channel, items: items.length });
          yield { type: "lifecycle", tag: event.type };
          break;
        }
        default:
          yield { type: "lifecycle", tag: event.type };
      }
    }
  }
}
