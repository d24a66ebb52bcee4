import type { FilingRag } from "../../core.js";

export async function runStatsCommand(rag: FilingRag): Promise<void> {
  const stats = await rag.cacheStats();
  process.stdout.write(`${JSON.stringify(stats, null, 2)}\n`);
}

export async function runResetCommand(rag: FilingRag): Promise<void> {
  await rag.resetCache();
  process.stdout.write("cache cleared\n");
}

export async function runRebuildCommand(rag: FilingRag): Promise<void> {
  const summary = await rag.rebuildIndex();
  process.stdout.write(`rebuilt ${summary.documents} documents into ${summary.chunks} chunks\n`);
  if (summary.skipped.length > 0) {
    process.stdout.write(`dropped without stored text: ${summary.skipped.join(", ")}\n`);
  }
}
