import type { FilingRag } from "../../core.js";
import { loadSourceDirectory } from "../../loaders/sourceDirectory.js";

export async function runIngestCommand(args: string[], rag: FilingRag): Promise<void> {
  const [companyId, sourceDir] = args;
  if (!companyId || !sourceDir) {
    throw new Error("Usage: filingrag ingest <companyId> <sourceDir>");
  }

  const documents = await loadSourceDirectory(sourceDir, companyId);
  let chunks = 0;
  for (const document of documents) {
    const entry = await rag.submitDocument(document);
    chunks += entry.chunkIds.length;
  }
  process.stdout.write(`${documents.length} documents, ${chunks} chunks\n`);
}
