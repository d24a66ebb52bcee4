import type { FilingRag } from "../../core.js";

export async function runAskCommand(args: string[], rag: FilingRag): Promise<void> {
  const excludeOpinions = args.includes("--facts-only");
  const [companyId, ...words] = args.filter((a) => a !== "--facts-only");
  const question = words.join(" ").trim();
  if (!companyId || !question) {
    throw new Error("Usage: filingrag ask [--facts-only] <companyId> <question>");
  }

  const answer = await rag.ask(companyId, question, undefined, { excludeOpinions });
  process.stdout.write(`${answer.generatedText}\n`);
  process.stdout.write(
    `\n(${answer.passages.length} passages, ${answer.providerUsed}` +
      (answer.fallbackFrom ? ` after ${answer.fallbackFrom} failed` : "") +
      ")\n"
  );
}
