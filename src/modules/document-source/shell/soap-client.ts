/**
 * SOAP document source
 *
 * Runs `SearchWithResults` once, then pages through `GetSearchResults` until
 * the reported total is reached or the service says there is nothing more.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import { ok, err, type Result } from 'neverthrow';

import { createSourceQueryError, type SourceQueryError } from '../core/errors.js';
import { toSourceDocument } from '../core/mapping.js';
import {
  DOCUMENT_TYPE_FIELD,
  type DocumentQuery,
  type RawSearchResult,
  type SourceDocument,
} from '../core/types.js';

import type { DocumentSource } from '../core/ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface SoapDocumentSourceSettings {
  url: string;
  username?: string | undefined;
  password?: string | undefined;
  pageSize: number;
  timeoutMs: number;
  /** Service contract namespace */
  namespace: string;
}

export interface SoapDocumentSourceDeps {
  settings: SoapDocumentSourceSettings;
  logger: Logger;
  fetch?: typeof fetch;
}

const SOAP_ENVELOPE_NS = 'http://schemas.xmlsoap.org/soap/envelope/';

// Parsed response shapes (namespace prefixes removed, every value kept as text)

const MetadataFieldSchema = Type.Object({
  Name: Type.String(),
  Value: Type.Optional(Type.String()),
});

const DocumentSearchResultSchema = Type.Object({
  DocumentId: Type.String(),
  Name: Type.Optional(Type.String()),
  CreatedDate: Type.Optional(Type.String()),
  Metadata: Type.Optional(
    Type.Union([
      Type.Literal(''),
      Type.Object({ MetadataField: Type.Optional(Type.Array(MetadataFieldSchema)) }),
    ])
  ),
});

const ResultsSchema = Type.Union([
  Type.Literal(''),
  Type.Object({ DocumentSearchResult: Type.Optional(Type.Array(DocumentSearchResultSchema)) }),
]);

const SearchWithResultsEnvelopeSchema = Type.Object({
  Envelope: Type.Object({
    Body: Type.Object({
      SearchWithResultsResponse: Type.Object({
        SearchWithResultsResult: Type.Object({
          Results: Type.Optional(ResultsSchema),
          TotalCount: Type.String(),
          SearchId: Type.Optional(Type.String()),
        }),
      }),
    }),
  }),
});

const GetSearchResultsEnvelopeSchema = Type.Object({
  Envelope: Type.Object({
    Body: Type.Object({
      GetSearchResultsResponse: Type.Object({
        GetSearchResultsResult: Type.Object({
          Results: Type.Optional(ResultsSchema),
          TotalCount: Type.Optional(Type.String()),
          HasMore: Type.Optional(Type.String()),
        }),
      }),
    }),
  }),
});

const FaultEnvelopeSchema = Type.Object({
  Envelope: Type.Object({
    Body: Type.Object({
      Fault: Type.Object({
        faultcode: Type.Optional(Type.String()),
        faultstring: Type.Optional(Type.String()),
      }),
    }),
  }),
});

type ParsedResults = Static<typeof ResultsSchema> | undefined;

interface SearchPage {
  results: RawSearchResult[];
  totalCount: number;
  searchId: string;
  hasMore: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// XML
// ─────────────────────────────────────────────────────────────────────────────

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
});

const parser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  isArray: (name) => name === 'DocumentSearchResult' || name === 'MetadataField',
});

const envelope = (operation: string, namespace: string, request: Record<string, unknown>): string =>
  builder.build({
    's:Envelope': {
      '@_xmlns:s': SOAP_ENVELOPE_NS,
      's:Body': {
        [operation]: {
          '@_xmlns': namespace,
          request,
        },
      },
    },
  });

/**
 * `SearchWithResults` request body.
 */
export const buildSearchEnvelope = (
  query: DocumentQuery,
  pageSize: number,
  namespace: string
): string =>
  envelope('SearchWithResults', namespace, {
    SearchCriteria: {
      MetadataFields:
        query.documentTypes.length === 0
          ? ''
          : {
              MetadataSearchField: query.documentTypes.map((documentType) => ({
                FieldName: DOCUMENT_TYPE_FIELD,
                Value: documentType,
                Operation: 'Equals',
              })),
            },
      FromDate: query.since.toISOString(),
      ToDate: query.until.toISOString(),
    },
    MaxResults: pageSize,
  });

/**
 * `GetSearchResults` request body.
 */
export const buildGetResultsEnvelope = (
  searchId: string,
  startIndex: number,
  pageSize: number,
  namespace: string
): string =>
  envelope('GetSearchResults', namespace, {
    SearchId: searchId,
    StartIndex: startIndex,
    MaxResults: pageSize,
  });

const toRawResults = (results: ParsedResults): RawSearchResult[] => {
  if (results === undefined || results === '') return [];

  return (results.DocumentSearchResult ?? []).map((result) => ({
    documentId: result.DocumentId,
    name: result.Name ?? '',
    createdDate: result.CreatedDate ?? null,
    metadata:
      result.Metadata === undefined || result.Metadata === ''
        ? []
        : (result.Metadata.MetadataField ?? []).map((field) => ({
            name: field.Name,
            value: field.Value ?? '',
          })),
  }));
};

const toCount = (value: string | undefined, fallback: number): number => {
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

/**
 * Parses a `SearchWithResults` response.
 */
export const parseSearchResponse = (xml: string): SearchPage => {
  const parsed: unknown = parser.parse(xml);
  if (!Value.Check(SearchWithResultsEnvelopeSchema, parsed)) {
    throw new Error('Unexpected SearchWithResults response');
  }

  const result = parsed.Envelope.Body.SearchWithResultsResponse.SearchWithResultsResult;
  const results = toRawResults(result.Results);
  const totalCount = toCount(result.TotalCount, results.length);

  return {
    results,
    totalCount,
    searchId: result.SearchId ?? '',
    hasMore: results.length < totalCount,
  };
};

/**
 * Parses a `GetSearchResults` response.
 */
export const parseGetResultsResponse = (xml: string): Omit<SearchPage, 'searchId'> => {
  const parsed: unknown = parser.parse(xml);
  if (!Value.Check(GetSearchResultsEnvelopeSchema, parsed)) {
    throw new Error('Unexpected GetSearchResults response');
  }

  const result = parsed.Envelope.Body.GetSearchResultsResponse.GetSearchResultsResult;
  const results = toRawResults(result.Results);

  return {
    results,
    totalCount: toCount(result.TotalCount, 0),
    hasMore: result.HasMore?.trim().toLowerCase() === 'true',
  };
};

/**
 * Extracts the fault string from a SOAP fault, if the body is one.
 */
export const parseFault = (xml: string): string | null => {
  try {
    const parsed: unknown = parser.parse(xml);
    if (!Value.Check(FaultEnvelopeSchema, parsed)) return null;
    const fault = parsed.Envelope.Body.Fault;
    return fault.faultstring ?? fault.faultcode ?? 'SOAP fault';
  } catch {
    // Not XML at all; the caller reports the HTTP status instead
    return null;
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeSoapDocumentSource = (deps: SoapDocumentSourceDeps): DocumentSource => {
  const { settings, logger } = deps;
  const fetchFn = deps.fetch ?? fetch;
  const log = logger.child({ component: 'SoapDocumentSource' });

  const call = async (operation: string, body: string): Promise<string> => {
    const headers: Record<string, string> = {
      'Content-Type': 'text/xml; charset=utf-8',
      SOAPAction: `"${settings.namespace}/${operation}"`,
    };
    if (settings.username !== undefined) {
      const credentials = `${settings.username}:${settings.password ?? ''}`;
      headers['Authorization'] = `Basic ${Buffer.from(credentials, 'utf-8').toString('base64')}`;
    }

    const response = await fetchFn(settings.url, {
      method: 'POST',
      headers,
      body,
      signal: AbortSignal.timeout(settings.timeoutMs),
    });
    const text = await response.text();

    const fault = parseFault(text);
    if (fault !== null) {
      throw new Error(`${operation} fault: ${fault}`);
    }
    if (!response.ok) {
      throw new Error(`${operation} failed with HTTP ${String(response.status)}`);
    }
    return text;
  };

  return {
    async search(query: DocumentQuery): Promise<Result<SourceDocument[], SourceQueryError>> {
      log.info(
        {
          since: query.since.toISOString(),
          until: query.until.toISOString(),
          documentTypes: query.documentTypes,
        },
        'Searching documents'
      );

      try {
        const first = parseSearchResponse(
          await call(
            'SearchWithResults',
            buildSearchEnvelope(query, settings.pageSize, settings.namespace)
          )
        );
        const raw: RawSearchResult[] = [...first.results];

        log.info(
          { count: first.results.length, total: first.totalCount },
          'Initial search returned documents'
        );

        let fetched = first.results.length;
        while (fetched < first.totalCount) {
          const page = parseGetResultsResponse(
            await call(
              'GetSearchResults',
              buildGetResultsEnvelope(first.searchId, fetched, settings.pageSize, settings.namespace)
            )
          );
          raw.push(...page.results);
          fetched += page.results.length;

          log.debug({ fetched, total: first.totalCount }, 'Retrieved page');

          if (!page.hasMore || page.results.length === 0) break;
        }

        log.info({ count: raw.length }, 'Completed document search');
        return ok(raw.map(toSourceDocument));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log.error({ error }, 'Error searching documents');
        return err(createSourceQueryError(message));
      }
    },
  };
};
