import { readJsonFile, updateJsonFile, withFileLock } from "./json-file.js";

/**
 * Where the last confirmed indexing resource id is kept between runs. The id
 * is only a hint: the reconciler still probes it before use.
 */
export interface ResourceHintStore {
  read(name: string): Promise<string | undefined>;
  write(name: string, id: string): Promise<void>;
}

type StateFile = {
  indexing: Record<string, string>;
};

const toStateFile = (value: unknown): StateFile => {
  const indexing: Record<string, string> = {};
  if (typeof value === "object" && value !== null && "indexing" in value) {
    const raw = value.indexing;
    if (typeof raw === "object" && raw !== null) {
      for (const [name, id] of Object.entries(raw)) {
        if (typeof id === "string") {
          indexing[name] = id;
        }
      }
    }
  }
  return { indexing };
};

export class FileResourceHintStore implements ResourceHintStore {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async read(name: string): Promise<string | undefined> {
    const state = toStateFile(await withFileLock(this.path, () => readJsonFile(this.path)));
    return state.indexing[name];
  }

  async write(name: string, id: string): Promise<void> {
    await updateJsonFile(this.path, (current) => {
      const state = toStateFile(current);
      state.indexing[name] = id;
      return state;
    });
  }
}

export class InMemoryResourceHintStore implements ResourceHintStore {
  private readonly ids = new Map<string, string>();

  async read(name: string): Promise<string | undefined> {
    return this.ids.get(name);
  }

  async write(name: string, id: string): Promise<void> {
    this.ids.set(name, id);
  }
}
