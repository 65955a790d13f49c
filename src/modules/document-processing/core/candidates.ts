/**
 * Candidate selection: validation and de-duplication of source documents.
 */

import type { DocumentRecord } from './types.js';
import type { SourceDocument } from '@/modules/document-source/core/types.js';

export type SkipReason = 'missing-portfolio-id';

export interface SkippedDocument {
  documentId: string;
  reason: SkipReason;
}

export interface CandidateSelection {
  candidates: DocumentRecord[];
  skipped: SkippedDocument[];
  /** Ids returned more than once by the source (first occurrence kept) */
  duplicateIds: string[];
}

/**
 * Validates one source document. Returns the skip reason when it cannot be processed.
 * A document without any date takes `fallbackDate` (the end of the polled window).
 */
export const toDocumentRecord = (doc: SourceDocument, fallbackDate: Date): DocumentRecord | SkipReason => {
  const portfolioId = doc.portfolioId?.trim() ?? '';
  if (portfolioId === '') return 'missing-portfolio-id';

  return {
    documentId: doc.documentId,
    name: doc.name,
    documentDate: doc.documentDate ?? fallbackDate,
    portfolioId,
    documentType: doc.documentType,
  };
};

/**
 * Drops invalid documents and repeated ids, keeping source order.
 */
export const selectCandidates = (
  docs: readonly SourceDocument[],
  fallbackDate: Date
): CandidateSelection => {
  const candidates: DocumentRecord[] = [];
  const skipped: SkippedDocument[] = [];
  const duplicateIds: string[] = [];
  const seen = new Set<string>();

  for (const doc of docs) {
    const record = toDocumentRecord(doc, fallbackDate);
    if (typeof record === 'string') {
      skipped.push({ documentId: doc.documentId, reason: record });
      continue;
    }
    if (seen.has(record.documentId)) {
      duplicateIds.push(record.documentId);
      continue;
    }
    seen.add(record.documentId);
    candidates.push(record);
  }

  return { candidates, skipped, duplicateIds };
};
