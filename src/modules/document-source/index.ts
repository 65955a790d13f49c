/**
 * Document Source Module
 *
 * Incremental document search against the document store.
 */

export type { SourceDocument, DocumentQuery, RawSearchResult } from './core/types.js';
export type { SourceQueryError } from './core/errors.js';
export type { DocumentSource } from './core/ports.js';

export { createSourceQueryError, getErrorMessage as getSourceErrorMessage } from './core/errors.js';
export { toSourceDocument, parseSourceDate } from './core/mapping.js';
export {
  makeSoapDocumentSource,
  type SoapDocumentSourceSettings,
} from './shell/soap-client.js';
