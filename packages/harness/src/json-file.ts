import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

let tmpCounter = 0;

const writeJsonAtomic = async (filePath: string, payload: unknown): Promise<void> => {
  await mkdir(dirname(filePath), { recursive: true });
  tmpCounter += 1;
  const tmpPath = `${filePath}.${process.pid}.${tmpCounter}.tmp`;
  await writeFile(tmpPath, JSON.stringify(payload, null, 2), "utf8");
  await rename(tmpPath, filePath);
};

const isMissingFile = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

/** Parsed JSON at `filePath`, or undefined when the file does not exist. */
export const readJsonFile = async (filePath: string): Promise<unknown> => {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw error;
  }
  const parsed: unknown = JSON.parse(raw);
  return parsed;
};

// Every store in this process that points at the same file queues here, so
// read-modify-write cycles on one document never overlap.
const writeChains = new Map<string, Promise<void>>();

export const withFileLock = async <T>(filePath: string, task: () => Promise<T>): Promise<T> => {
  const key = resolve(filePath);
  const previous = writeChains.get(key) ?? Promise.resolve();
  const next = previous.then(task, task);
  const settled = next.then(
    () => undefined,
    () => undefined,
  );
  writeChains.set(key, settled);
  try {
    return await next;
  } finally {
    if (writeChains.get(key) === settled) {
      writeChains.delete(key);
    }
  }
};

/** Reads the document, applies `update`, and replaces the file atomically. */
export const updateJsonFile = async (
  filePath: string,
  update: (current: unknown) => unknown,
): Promise<void> =>
  await withFileLock(filePath, async () => {
    const next = update(await readJsonFile(filePath));
    await writeJsonAtomic(filePath, next);
  });
