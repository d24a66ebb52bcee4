import type { DocumentReference, FetchedDocument, SourceKind } from "../documents/types.js";

export type ResolvedCompany = {
  /** Identifier documents are filed under, e.g. the filing system's corporation code. */
  companyId: string;
  name: string;
  stockCode?: string;
  industry?: string;
};

export type CompanyResolver = {
  /** Null when no company matches the name. */
  resolve(companyName: string): Promise<ResolvedCompany | null>;
};

export const FILING_REPORT_TYPES = [
  "annual",
  "half-year",
  "quarterly",
  "material-event",
  "audit"
] as const;

export type FilingReportType = (typeof FILING_REPORT_TYPES)[number];

export const DEFAULT_REPORT_TYPES: readonly FilingReportType[] = ["annual", "half-year"];

export function isFilingReportType(value: string): value is FilingReportType {
  return FILING_REPORT_TYPES.some((t) => t === value);
}

export type SearchFilters = {
  years: number;
  /** Earliest publication date wanted, YYYY-MM-DD. */
  since: string;
  /** Industry keywords; empty unless the question is about an industry. */
  keywords: string[];
  /** Filing types to search; empty except for regulatory-filing sources. */
  reportTypes: FilingReportType[];
  limit: number;
};

/**
 * One external document source. `search` lists candidates cheaply so the cache
 * can be checked before `fetch` downloads a body.
 */
export type DocumentSource = {
  readonly kind: SourceKind;
  search(company: ResolvedCompany, filters: SearchFilters): Promise<DocumentReference[]>;
  fetch(reference: DocumentReference): Promise<FetchedDocument>;
};
