export type SourceKind = "regulatory-filing" | "broker-report" | "industry-report";

export const SOURCE_KINDS: readonly SourceKind[] = [
  "regulatory-filing",
  "broker-report",
  "industry-report"
];

type ReferenceBase = {
  companyId: string;
  title: string;
  /** ISO date (YYYY-MM-DD) or the issuing system's date string. */
  publishedAt: string;
  url?: string;
};

export type FilingReference = ReferenceBase & {
  sourceKind: "regulatory-filing";
  /** Receipt/accession number assigned by the filing system. */
  receiptNumber: string;
};

export type BrokerReportReference = ReferenceBase & {
  sourceKind: "broker-report";
  broker?: string;
};

export type IndustryReportReference = ReferenceBase & {
  sourceKind: "industry-report";
  keywords: string[];
};

/** What a collaborator's search step returns: identity without the body. */
export type DocumentReference = FilingReference | BrokerReportReference | IndustryReportReference;

/** What a collaborator's fetch step returns. */
export type FetchedDocument = DocumentReference & { rawText: string };

export type FinancialDocument = {
  documentId: string;
  companyId: string;
  title: string;
  publishedAt: string;
  rawText: string;
  sourceKind: SourceKind;
  /** Only populated for industry reports. */
  keywords: string[];
};

export type Chunk = {
  chunkId: string;
  documentId: string;
  ordinal: number;
  /** Character offset of `text` within the document's raw text. */
  start: number;
  text: string;
};

export type IndexedChunk = Chunk & { embedding: number[] };
