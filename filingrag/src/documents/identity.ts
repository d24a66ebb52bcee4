import crypto from "node:crypto";

import type { DocumentReference, FetchedDocument, FinancialDocument } from "./types.js";

export function normalizeCompanyId(companyId: string): string {
  return companyId.trim().toUpperCase();
}

export function normalizeTitle(title: string): string {
  return title.trim().replace(/\s+/g, " ").toLowerCase();
}

export function normalizeKeyword(keyword: string): string {
  return keyword.trim().toLowerCase();
}

/** Trimmed, de-duplicated (case-insensitively), empty entries dropped; first spelling wins. */
export function cleanKeywords(keywords: readonly string[]): string[] {
  const seen = new Set<string>();
  const kept: string[] = [];
  for (const keyword of keywords) {
    const trimmed = keyword.trim();
    const key = normalizeKeyword(trimmed);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    kept.push(trimmed);
  }
  return kept;
}

export function sharedKeywordCount(a: readonly string[], b: readonly string[]): number {
  const left = new Set(a.map(normalizeKeyword));
  let count = 0;
  for (const key of new Set(b.map(normalizeKeyword))) {
    if (key && left.has(key)) count += 1;
  }
  return count;
}

export function brokerReportId(companyId: string, title: string): string {
  return `broker-report:${normalizeCompanyId(companyId)}:${normalizeTitle(title)}`;
}

export function industryReportId(title: string, publishedAt: string): string {
  const digest = crypto
    .createHash("sha256")
    .update(`${normalizeTitle(title)}\n${publishedAt.trim()}`)
    .digest("hex")
    .slice(0, 24);
  return `industry-report:${digest}`;
}

/**
 * Cache key of a document. Filings are keyed by their receipt number as issued,
 * broker reports by company and title, industry reports by title and date
 * (their cache lookups go through keywords instead).
 */
export function documentIdFor(reference: DocumentReference): string {
  switch (reference.sourceKind) {
    case "regulatory-filing":
      return reference.receiptNumber.trim();
    case "broker-report":
      return brokerReportId(reference.companyId, reference.title);
    case "industry-report":
      return industryReportId(reference.title, reference.publishedAt);
  }
}

export function toFinancialDocument(fetched: FetchedDocument): FinancialDocument {
  return {
    documentId: documentIdFor(fetched),
    companyId: fetched.companyId.trim(),
    title: fetched.title,
    publishedAt: fetched.publishedAt,
    rawText: fetched.rawText,
    sourceKind: fetched.sourceKind,
    keywords: fetched.sourceKind === "industry-report" ? cleanKeywords(fetched.keywords) : []
  };
}
