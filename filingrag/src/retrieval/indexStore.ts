import { readJsonFile, writeJsonAtomic } from "../storage/jsonFile.js";
import { storedIndexSchema, type StoredIndex } from "./types.js";

export function emptyIndex(embeddingModel: string): StoredIndex {
  return { version: 1, embeddingModel, chunks: [] };
}

export async function saveIndex(filePath: string, index: StoredIndex): Promise<void> {
  await writeJsonAtomic(filePath, index);
}

/** Returns undefined when no index has been written yet. */
export async function loadIndex(filePath: string): Promise<StoredIndex | undefined> {
  return readJsonFile(filePath, storedIndexSchema);
}
