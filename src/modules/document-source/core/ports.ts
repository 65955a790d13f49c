import type { SourceQueryError } from './errors.js';
import type { DocumentQuery, SourceDocument } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Document store adapter. Returns every matching document; pagination is internal.
 */
export interface DocumentSource {
  search(query: DocumentQuery): Promise<Result<SourceDocument[], SourceQueryError>>;
}
