import path from "node:path";

import { DirectoryLoader } from "@langchain/classic/document_loaders/fs/directory";
import { TextLoader } from "@langchain/classic/document_loaders/fs/text";
import type { Document } from "@langchain/core/documents";

import type { BrokerReportReference, FetchedDocument } from "../documents/types.js";

type AnyMetadata = Record<string, unknown>;

const DATED_NAME = /^(\d{4}-\d{2}-\d{2})[\s_-]+(.+)$/;

/**
 * Title and publication date from a file name. `2024-03-15 Memory outlook.md`
 * gives a dated title; undated names fall back to `fallbackDate`.
 */
export function describeFile(
  filePath: string,
  fallbackDate: string
): Pick<BrokerReportReference, "title" | "publishedAt"> {
  const base = path.basename(filePath, path.extname(filePath)).trim();
  const match = DATED_NAME.exec(base);
  if (match?.[1] && match[2]) {
    return { publishedAt: match[1], title: match[2].trim() };
  }
  return { publishedAt: fallbackDate, title: base };
}

export function toBrokerReport(
  doc: Document<AnyMetadata>,
  companyId: string,
  fallbackDate: string
): FetchedDocument {
  const source = typeof doc.metadata.source === "string" ? doc.metadata.source : "untitled";
  return {
    sourceKind: "broker-report",
    companyId,
    ...describeFile(source, fallbackDate),
    url: source,
    rawText: doc.pageContent
  };
}

/** Every .md and .txt file under `sourceDir` as a broker report for `companyId`. */
export async function loadSourceDirectory(
  sourceDir: string,
  companyId: string,
  fallbackDate: string = new Date().toISOString().slice(0, 10)
): Promise<FetchedDocument[]> {
  const loader = new DirectoryLoader(sourceDir, {
    ".md": (p: string) => new TextLoader(p),
    ".txt": (p: string) => new TextLoader(p)
  });

  const docs = await loader.load();
  return docs
    .filter((doc) => doc.pageContent.trim().length > 0)
    .map((doc) => toBrokerReport(doc, companyId, fallbackDate));
}
