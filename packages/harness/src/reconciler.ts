import { ResourceUnavailableError, errorMessage } from "@threadline/sdk";
import { log } from "./log.js";
import type { ResourceHintStore } from "./resource-hints.js";

export type ProbeResult =
  | { status: "exists" }
  | { status: "not-found" }
  | { status: "error"; error: unknown };

export interface IndexingBackend {
  /** Read-only existence check. Must not throw for a missing resource. */
  probe(id: string): Promise<ProbeResult>;
  create(name: string): Promise<string>;
}

export interface ReconcilerOptions {
  name: string;
  fallbackIds?: string[];
  /** Id remembered from an earlier call in this session, if any. */
  rememberedId?: string;
  /** Carries the confirmed id across runs; read once, written when it changes. */
  hints?: ResourceHintStore;
}

/**
 * Keeps exactly one live indexing resource per session. A remembered id is a
 * hint: it is probed before every use, and replaced by the first live
 * fallback or a freshly created resource when the backend reports it gone.
 * A probe error stops the search.
 */
export class ResourceReconciler {
  private readonly backend: IndexingBackend;
  private readonly name: string;
  private readonly fallbackIds: string[];
  private readonly hints?: ResourceHintStore;
  private remembered?: string;
  private hintLoaded = false;
  private savedHint?: string;

  constructor(backend: IndexingBackend, options: ReconcilerOptions) {
    this.backend = backend;
    this.name = options.name;
    this.fallbackIds = options.fallbackIds ?? [];
    this.remembered = options.rememberedId;
    this.hints = options.hints;
  }

  get rememberedId(): string | undefined {
    return this.remembered;
  }

  private candidates(): string[] {
    const ordered = this.remembered ? [this.remembered, ...this.fallbackIds] : [...this.fallbackIds];
    return ordered.filter((id, index) => id.length > 0 && ordered.indexOf(id) === index);
  }

  private async loadHint(): Promise<void> {
    if (this.hintLoaded || !this.hints) {
      return;
    }
    this.hintLoaded = true;
    try {
      this.savedHint = await this.hints.read(this.name);
    } catch (error) {
      log("warn", "reconciler", "hint.unreadable", { name: this.name, message: errorMessage(error) });
      return;
    }
    this.remembered ??= this.savedHint;
  }

  private async remember(id: string): Promise<string> {
    this.remembered = id;
    if (!this.hints || this.savedHint === id) {
      return id;
    }
    try {
      await this.hints.write(this.name, id);
      this.savedHint = id;
    } catch (error) {
      log("warn", "reconciler", "hint.unsaved", { id, message: errorMessage(error) });
    }
    return id;
  }

  async ensureResource(): Promise<string> {
    await this.loadHint();
    for (const candidate of this.candidates()) {
      const result = await this.backend.probe(candidate);
      if (result.status === "exists") {
        if (candidate !== this.remembered) {
          log("info", "reconciler", "resource.promoted", { id: candidate, previous: this.remembered ?? null });
        }
        return await this.remember(candidate);
      }
      if (result.status === "error") {
        log("warn", "reconciler", "probe.error", { id: candidate, message: errorMessage(result.error) });
        // Unreachable is not absent: neither fall back nor create.
        throw new ResourceUnavailableError(
          `Indexing backend unreachable while checking resource ${candidate}: ${errorMessage(result.error)}`,
          { cause: result.error },
        );
      }
      log("info", "reconciler", "probe.not_found", { id: candidate });
    }

    let created: string;
    try {
      created = await this.backend.create(this.name);
    } catch (error) {
      throw new ResourceUnavailableError(
        `Could not create indexing resource "${this.name}": ${errorMessage(error)}`,
        { cause: error },
      );
    }
    log("info", "reconciler", "resource.created", { id: created, name: this.name });
    return await this.remember(created);
  }
}
