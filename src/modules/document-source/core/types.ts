/**
 * Document Source Module - Domain Types
 */

/**
 * A document as returned by the store, before validation.
 */
export interface SourceDocument {
  documentId: string;
  name: string;
  documentDate: Date | null;
  portfolioId: string | null;
  documentType: string | null;
  reference: string | null;
}

/**
 * Search window and filters. `until` is exclusive.
 */
export interface DocumentQuery {
  since: Date;
  until: Date;
  /** Empty means no type filter */
  documentTypes: readonly string[];
}

/**
 * One search hit as delivered by the store.
 */
export interface RawSearchResult {
  documentId: string;
  name: string;
  createdDate: string | null;
  metadata: { name: string; value: string }[];
}

/**
 * Metadata field names (compared case-insensitively).
 */
export const METADATA_FIELDS = {
  documentDate: 'document date',
  portfolioId: 'portfolio id',
  documentType: 'document type',
  reference: 'reference',
} as const;

/** Field name used for the type filter in search criteria */
export const DOCUMENT_TYPE_FIELD = 'Document Type';
