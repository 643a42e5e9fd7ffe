import OpenAI, { toFile } from "openai";
import { getErrorStatusCode } from "@threadline/sdk";
import type { IndexingBackend, ProbeResult } from "./reconciler.js";

export interface DocumentUpload {
  name: string;
  data: Buffer;
}

export interface DocumentIndex extends IndexingBackend {
  attachDocument(resourceId: string, file: DocumentUpload): Promise<string>;
}

// Commands that only touch the local log (history, reset) run without a key;
// the first API call reports the missing key instead.
export const createOpenAiClient = (apiKey?: string): OpenAI =>
  new OpenAI({
    apiKey: apiKey ?? process.env.OPENAI_API_KEY ?? "missing-openai-key",
  });

/** Vector stores hold the searchable corpus behind the file search tool. */
export class OpenAiIndexingBackend implements DocumentIndex {
  private readonly client: OpenAI;

  constructor(client: OpenAI) {
    this.client = client;
  }

  async probe(id: string): Promise<ProbeResult> {
    try {
      await this.client.vectorStores.retrieve(id);
      return { status: "exists" };
    } catch (error) {
      if (getErrorStatusCode(error) === 404) {
        return { status: "not-found" };
      }
      return { status: "error", error };
    }
  }

  async create(name: string): Promise<string> {
    const store = await this.client.vectorStores.create({ name });
    return store.id;
  }

  async attachDocument(resourceId: string, file: DocumentUpload): Promise<string> {
    const uploaded = await this.client.files.create({
      file: await toFile(file.data, file.name),
      purpose: "user_data",
    });
    await this.client.vectorStores.files.create(resourceId, { file_id: uploaded.id });
    return uploaded.id;
  }
}
