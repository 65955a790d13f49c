import { describe, expect, it } from 'vitest';

import { selectCandidates, toDocumentRecord } from '@/modules/document-processing/index.js';

import { makeSourceDocument } from '../../fixtures/builders.js';

const RUN_TIME = new Date('2025-03-12T10:00:00.000Z');

describe('toDocumentRecord', () => {
  it('maps a valid document and trims the portfolio id', () => {
    const record = toDocumentRecord(makeSourceDocument({ portfolioId: '  P-7 ', reference: 'REF-1' }), RUN_TIME);

    expect(record).toEqual({
      documentId: 'DOC-1',
      name: 'Quarterly Statement',
      documentDate: new Date('2025-03-10T00:00:00.000Z'),
      portfolioId: 'P-7',
      documentType: 'Statement',
    });
  });

  it('rejects a missing or blank portfolio id', () => {
    expect(toDocumentRecord(makeSourceDocument({ portfolioId: null }), RUN_TIME)).toBe('missing-portfolio-id');
    expect(toDocumentRecord(makeSourceDocument({ portfolioId: '' }), RUN_TIME)).toBe('missing-portfolio-id');
    expect(toDocumentRecord(makeSourceDocument({ portfolioId: ' \t' }), RUN_TIME)).toBe('missing-portfolio-id');
  });

  it('keeps a document without a date and dates it at the run time', () => {
    expect(toDocumentRecord(makeSourceDocument({ documentDate: null }), RUN_TIME)).toEqual({
      documentId: 'DOC-1',
      name: 'Quarterly Statement',
      documentDate: RUN_TIME,
      portfolioId: 'P-100',
      documentType: 'Statement',
    });
  });

  it('rejects a missing portfolio id even when the date is missing too', () => {
    expect(toDocumentRecord(makeSourceDocument({ portfolioId: null, documentDate: null }), RUN_TIME)).toBe(
      'missing-portfolio-id'
    );
  });
});

describe('selectCandidates', () => {
  it('keeps source order and separates skipped documents', () => {
    const selection = selectCandidates(
      [
        makeSourceDocument({ documentId: 'B' }),
        makeSourceDocument({ documentId: 'X', portfolioId: null }),
        makeSourceDocument({ documentId: 'A', documentDate: null }),
      ],
      RUN_TIME
    );

    expect(selection.candidates.map((c) => c.documentId)).toEqual(['B', 'A']);
    expect(selection.skipped).toEqual([{ documentId: 'X', reason: 'missing-portfolio-id' }]);
    expect(selection.duplicateIds).toEqual([]);
  });

  it('keeps the first occurrence of a repeated id', () => {
    const selection = selectCandidates(
      [
        makeSourceDocument({ documentId: 'A', portfolioId: 'P-1' }),
        makeSourceDocument({ documentId: 'A', portfolioId: 'P-2' }),
        makeSourceDocument({ documentId: 'A', portfolioId: 'P-3' }),
      ],
      RUN_TIME
    );

    expect(selection.candidates).toHaveLength(1);
    expect(selection.candidates[0]?.portfolioId).toBe('P-1');
    expect(selection.duplicateIds).toEqual(['A', 'A']);
  });

  it('lets a later valid copy through when the first copy is invalid', () => {
    const selection = selectCandidates(
      [
        makeSourceDocument({ documentId: 'A', portfolioId: null }),
        makeSourceDocument({ documentId: 'A', portfolioId: 'P-2' }),
      ],
      RUN_TIME
    );

    expect(selection.candidates.map((c) => c.portfolioId)).toEqual(['P-2']);
    expect(selection.skipped).toEqual([{ documentId: 'A', reason: 'missing-portfolio-id' }]);
  });

  it('returns empty selections for no input', () => {
    expect(selectCandidates([], RUN_TIME)).toEqual({ candidates: [], skipped: [], duplicateIds: [] });
  });
});
