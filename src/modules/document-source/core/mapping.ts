import { METADATA_FIELDS, type RawSearchResult, type SourceDocument } from './types.js';

/**
 * Parses a date string from the store; unparseable values become null.
 */
export const parseSourceDate = (value: string | null | undefined): Date | null => {
  if (value === null || value === undefined || value.trim() === '') return null;
  const parsed = new Date(value.trim());
  return Number.isNaN(parsed.getTime()) ? null : parsed;
};

const emptyToNull = (value: string | null): string | null =>
  value === null || value.trim() === '' ? null : value.trim();

/**
 * Maps a search hit to a SourceDocument.
 *
 * Metadata names are matched case-insensitively; the last occurrence of a
 * field wins. `Reference` stands in for an empty name and the creation date
 * stands in for a missing or unparseable document date.
 */
export const toSourceDocument = (raw: RawSearchResult): SourceDocument => {
  let documentDate: Date | null = null;
  let portfolioId: string | null = null;
  let documentType: string | null = null;
  let reference: string | null = null;

  for (const field of raw.metadata) {
    switch (field.name.trim().toLowerCase()) {
      case METADATA_FIELDS.documentDate:
        documentDate = parseSourceDate(field.value) ?? documentDate;
        break;
      case METADATA_FIELDS.portfolioId:
        portfolioId = emptyToNull(field.value);
        break;
      case METADATA_FIELDS.documentType:
        documentType = emptyToNull(field.value);
        break;
      case METADATA_FIELDS.reference:
        reference = emptyToNull(field.value);
        break;
      default:
        break;
    }
  }

  const name = raw.name.trim() !== '' ? raw.name : (reference ?? '');

  return {
    documentId: raw.documentId,
    name,
    documentDate: documentDate ?? parseSourceDate(raw.createdDate),
    portfolioId,
    documentType,
    reference,
  };
};
