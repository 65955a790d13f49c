/**
 * Document Source Module - Error Types
 */

/**
 * Transport, HTTP or SOAP fault while querying the store. Always fatal for a run.
 */
export interface SourceQueryError {
  type: 'SourceQueryError';
  message: string;
}

export const createSourceQueryError = (message: string): SourceQueryError => ({
  type: 'SourceQueryError',
  message,
});

export const getErrorMessage = (error: SourceQueryError): string =>
  `Document source query failed: ${error.message}`;
