import type { Passage } from "../retrieval/retriever.js";

export function buildContext(passages: readonly Passage[]): string {
  if (passages.length === 0) return "(no passages matched the question)";
  return passages
    .map(
      (p, i) =>
        `=== Report: ${p.title} (${p.publishedAt}) ===\n` +
        `[Reference ${i + 1}/${passages.length} - chunk ${p.ordinal + 1}/${p.totalChunks}]\n${p.text}`
    )
    .join("\n\n---\n\n");
}
