import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";

import type { Chunk, FinancialDocument } from "../documents/types.js";
import { InvalidConfigError } from "../errors.js";

export const CHUNK_SEPARATORS = ["\n\n", "\n", "。", ".", " ", ""];

export type ChunkerOptions = {
  chunkSize?: number;
  chunkOverlap?: number;
};

export function chunkIdFor(documentId: string, ordinal: number): string {
  return `${documentId}#${ordinal}`;
}

export class Chunker {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  private readonly splitter: RecursiveCharacterTextSplitter;

  constructor(options: ChunkerOptions = {}) {
    this.chunkSize = options.chunkSize ?? 1000;
    this.chunkOverlap = options.chunkOverlap ?? 200;

    if (!Number.isInteger(this.chunkSize) || this.chunkSize <= 0) {
      throw new InvalidConfigError(`chunkSize must be a positive integer, got ${this.chunkSize}`);
    }
    if (!Number.isInteger(this.chunkOverlap) || this.chunkOverlap < 0) {
      throw new InvalidConfigError(
        `chunkOverlap must be a non-negative integer, got ${this.chunkOverlap}`
      );
    }
    if (this.chunkOverlap >= this.chunkSize) {
      throw new InvalidConfigError(
        `chunkOverlap (${this.chunkOverlap}) must be smaller than chunkSize (${this.chunkSize})`
      );
    }

    this.splitter = new RecursiveCharacterTextSplitter({
      chunkSize: this.chunkSize,
      chunkOverlap: this.chunkOverlap,
      separators: CHUNK_SEPARATORS
    });
  }

  async split(document: Pick<FinancialDocument, "documentId" | "rawText">): Promise<Chunk[]> {
    const raw = document.rawText;
    if (raw.trim().length === 0) return [];

    const pieces = await this.splitter.splitText(raw);

    // The splitter trims whitespace at chunk edges, so locate each piece in the
    // source. A piece starts after the previous one and shares at most
    // chunkOverlap characters with it.
    const chunks: Chunk[] = [];
    let searchFrom = 0;
    for (const [ordinal, text] of pieces.entries()) {
      const start = raw.indexOf(text, searchFrom);
      if (start < 0) {
        throw new Error(
          `Chunk ${ordinal} of ${document.documentId} could not be located in the source text`
        );
      }
      chunks.push({
        chunkId: chunkIdFor(document.documentId, ordinal),
        documentId: document.documentId,
        ordinal,
        start,
        text
      });
      searchFrom = Math.max(start + 1, start + text.length - this.chunkOverlap);
    }
    return chunks;
  }
}
