import type { DocumentCache } from "../cache/documentCache.js";
import type { CacheEntry } from "../cache/types.js";
import { toFinancialDocument } from "../documents/identity.js";
import type { FetchedDocument } from "../documents/types.js";
import type { Chunker } from "./chunker.js";

/** Chunks, embeds and caches a freshly fetched document. */
export async function ingestDocument(params: {
  fetched: FetchedDocument;
  chunker: Chunker;
  cache: DocumentCache;
}): Promise<CacheEntry> {
  const document = toFinancialDocument(params.fetched);
  if (!document.documentId) {
    throw new Error(`Document "${document.title}" has no identity to cache it under`);
  }
  const chunks = await params.chunker.split(document);
  return params.cache.store(document, chunks);
}
