import { access } from "node:fs/promises";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { createJiti } from "jiti";
import type { TelemetryConfig } from "./telemetry.js";

export type StorageProviderName = "local" | "memory";

export interface McpServerConfig {
  label: string;
  url: string;
  description?: string;
  requireApproval?: "always" | "never";
}

export interface ToolsConfig {
  webSearch?: boolean;
  fileSearch?: boolean | { maxResults?: number };
  imageGeneration?:
    | boolean
    | {
        quality?: "low" | "medium" | "high" | "auto";
        outputFormat?: "png" | "webp" | "jpeg";
        partialImages?: number;
      };
  codeInterpreter?: boolean;
  mcp?: McpServerConfig[];
}

export interface ThreadlineConfig {
  model?: string;
  instructions?: string;
  channel?: string;
  storage?: {
    provider?: StorageProviderName;
    /** Conversation log file, relative to the working directory. */
    path?: string;
  };
  indexing?: {
    name?: string;
    /** Resource ids tried after the remembered one, in order. */
    fallbackIds?: string[];
    /** File keeping the last confirmed resource id between runs. */
    statePath?: string;
  };
  tools?: ToolsConfig;
  telemetry?: TelemetryConfig;
}

export interface ResolvedTools {
  webSearch: boolean;
  fileSearch: { maxResults: number } | false;
  imageGeneration:
    | {
        quality: "low" | "medium" | "high" | "auto";
        outputFormat: "png" | "webp" | "jpeg";
        partialImages: number;
      }
    | false;
  codeInterpreter: boolean;
  mcp: Array<Required<McpServerConfig>>;
}

export interface ResolvedConfig {
  workingDir: string;
  model: string;
  instructions: string;
  channel: string;
  storage: { provider: StorageProviderName; path: string };
  indexing: { name: string; fallbackIds: string[]; statePath: string };
  tools: ResolvedTools;
  telemetry?: TelemetryConfig;
}

export const DEFAULT_MODEL = "gpt-4.1-mini";
export const DEFAULT_CHANNEL = "chat-history";
export const DEFAULT_STORE_FILE = "chat-memory.json";
export const DEFAULT_INDEX_NAME = "threadline-store";
export const DEFAULT_STATE_FILE = ".threadline/state.json";

export const DEFAULT_INSTRUCTIONS = `You are a helpful assistant.

You have access to the following tools:
  - Web Search Tool: Use this when the user asks a question that isn't in your training data, or about current or future events. When you think you don't know the answer, try searching for it on the web first.
  - File Search Tool: Use this when the user asks about facts related to themselves, or about specific files they uploaded.
  - Code Interpreter Tool: Use this when you need to write and run code to answer the user's question.`;

const DEFAULT_MCP_SERVERS: Array<Required<McpServerConfig>> = [
  {
    label: "Context7",
    url: "https://mcp.context7.com/mcp",
    description: "Use this to get the docs from software projects.",
    requireApproval: "never",
  },
];

const resolveTools = (tools: ToolsConfig | undefined): ResolvedTools => {
  const fileSearch = tools?.fileSearch ?? true;
  const imageGeneration = tools?.imageGeneration ?? true;
  return {
    webSearch: tools?.webSearch ?? true,
    fileSearch:
      fileSearch === false
        ? false
        : { maxResults: (typeof fileSearch === "object" ? fileSearch.maxResults : undefined) ?? 3 },
    imageGeneration:
      imageGeneration === false
        ? false
        : {
            quality: (typeof imageGeneration === "object" ? imageGeneration.quality : undefined) ?? "high",
            outputFormat:
              (typeof imageGeneration === "object" ? imageGeneration.outputFormat : undefined) ?? "jpeg",
            partialImages:
              (typeof imageGeneration === "object" ? imageGeneration.partialImages : undefined) ?? 1,
          },
    codeInterpreter: tools?.codeInterpreter ?? true,
    mcp: (tools?.mcp ?? DEFAULT_MCP_SERVERS).map((server) => ({
      label: server.label,
      url: server.url,
      description: server.description ?? "",
      requireApproval: server.requireApproval ?? "never",
    })),
  };
};

export const resolveConfig = (
  config: ThreadlineConfig | undefined,
  options: { workingDir: string; env?: NodeJS.ProcessEnv },
): ResolvedConfig => {
  const env = options.env ?? process.env;
  const storePath = env.THREADLINE_STORE_PATH || config?.storage?.path || DEFAULT_STORE_FILE;
  return {
    workingDir: options.workingDir,
    model: env.THREADLINE_MODEL || config?.model || DEFAULT_MODEL,
    instructions: config?.instructions ?? DEFAULT_INSTRUCTIONS,
    channel: config?.channel ?? DEFAULT_CHANNEL,
    storage: {
      provider: config?.storage?.provider ?? "local",
      path: resolve(options.workingDir, storePath),
    },
    indexing: {
      name: config?.indexing?.name ?? DEFAULT_INDEX_NAME,
      fallbackIds: config?.indexing?.fallbackIds ?? [],
      statePath: resolve(options.workingDir, config?.indexing?.statePath ?? DEFAULT_STATE_FILE),
    },
    tools: resolveTools(config?.tools),
    telemetry: config?.telemetry,
  };
};

const isConfigObject = (value: unknown): value is ThreadlineConfig =>
  typeof value === "object" && value !== null;

export const loadThreadlineConfig = async (
  workingDir: string,
): Promise<ThreadlineConfig | undefined> => {
  const filePath = resolve(workingDir, "threadline.config.js");
  try {
    await access(filePath);
  } catch {
    return undefined;
  }

  try {
    const imported: unknown = await import(`${pathToFileURL(filePath).href}?t=${Date.now()}`);
    if (isConfigObject(imported) && "default" in imported && isConfigObject(imported.default)) {
      return imported.default;
    }
    return undefined;
  } catch (error) {
    // CommonJS configs are rejected by the ESM loader; jiti accepts both.
    const jiti = createJiti(import.meta.url, { interopDefault: true, moduleCache: false });
    const imported: unknown = await jiti.import(filePath);
    if (isConfigObject(imported) && "default" in imported && isConfigObject(imported.default)) {
      return imported.default;
    }
    if (isConfigObject(imported)) {
      return imported;
    }
    throw error;
  }
};
