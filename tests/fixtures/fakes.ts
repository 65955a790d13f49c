/**
 * Test fakes
 *
 * In-memory implementations of every port, with call recording and
 * controllable failures.
 */

import { ok, err, type Result } from 'neverthrow';
import pinoLib from 'pino';

import { createDatabaseError, type DatabaseError } from '@/modules/document-processing/core/errors.js';
import { isFailed } from '@/modules/document-processing/core/types.js';
import { createSourceQueryError } from '@/modules/document-source/core/errors.js';

import type { BrokerError, BrokerPublisher, PublishParams } from '@/infra/broker/client.js';
import type { EmailError, EmailSender, SendEmailParams } from '@/infra/email/client.js';
import type { LedgerRepository, WatermarkRepository } from '@/modules/document-processing/core/ports.js';
import type { ProcessedDocument } from '@/modules/document-processing/core/types.js';
import type { DocumentSource } from '@/modules/document-source/core/ports.js';
import type { DocumentQuery, SourceDocument } from '@/modules/document-source/core/types.js';
import type { DispatchError, OwnerLookupError } from '@/modules/notifier/core/errors.js';
import type {
  BatchDispatcher,
  Notifier,
  OwnerDirectory,
  SummaryReporter,
} from '@/modules/notifier/core/ports.js';
import type {
  ErrorAlert,
  NotificationMode,
  NotificationTarget,
  PortfolioOwner,
  ProcessingSummary,
} from '@/modules/notifier/core/types.js';
import type { Logger } from 'pino';

/**
 * Silent logger for tests.
 */
export const makeTestLogger = (): Logger => pinoLib({ level: 'silent' });

// =============================================================================
// Watermark Repository
// =============================================================================

export interface FakeWatermarkRepo extends WatermarkRepository {
  /** Current stored value, null when nothing has been stored */
  current: () => Date | null;
  /** Arguments of every advance() call */
  advanceCalls: Date[];
}

interface FakeWatermarkRepoOptions {
  initial?: Date;
  failGet?: boolean;
  failAdvance?: boolean;
}

export const makeFakeWatermarkRepo = (options: FakeWatermarkRepoOptions = {}): FakeWatermarkRepo => {
  let stored: Date | null = options.initial ?? null;
  const advanceCalls: Date[] = [];

  return {
    current: () => stored,
    advanceCalls,

    async getLast(now: Date): Promise<Result<Date, DatabaseError>> {
      if (options.failGet === true) {
        return err(createDatabaseError('watermark read failed'));
      }
      return ok(stored ?? new Date(now.getTime() - 24 * 60 * 60 * 1000));
    },

    async advance(at: Date): Promise<Result<void, DatabaseError>> {
      advanceCalls.push(at);
      if (options.failAdvance === true) {
        return err(createDatabaseError('watermark write failed'));
      }
      if (stored === null || at.getTime() > stored.getTime()) {
        stored = at;
      }
      return ok(undefined);
    },
  };
};

// =============================================================================
// Ledger Repository
// =============================================================================

export interface FakeLedgerRepo extends LedgerRepository {
  rows: Map<string, ProcessedDocument>;
  /** Document ids passed to upsert(), in call order */
  upsertCalls: string[];
  /** Entry lists passed to upsertMany() */
  upsertManyCalls: ProcessedDocument[][];
  findExistingCalls: string[][];
}

interface FakeLedgerRepoOptions {
  failFindExisting?: boolean;
  /** upsert() fails for these document ids */
  failUpsertFor?: string[];
  failUpsertMany?: boolean;
  failFindFailed?: boolean;
  failFindRecent?: boolean;
}

const newestFirst = (a: ProcessedDocument, b: ProcessedDocument): number =>
  b.processedAt.getTime() - a.processedAt.getTime();

export const makeFakeLedgerRepo = (
  initial: ProcessedDocument[] = [],
  options: FakeLedgerRepoOptions = {}
): FakeLedgerRepo => {
  const rows = new Map<string, ProcessedDocument>(initial.map((row) => [row.documentId, row]));
  const upsertCalls: string[] = [];
  const upsertManyCalls: ProcessedDocument[][] = [];
  const findExistingCalls: string[][] = [];
  const failUpsertFor = new Set(options.failUpsertFor ?? []);

  return {
    rows,
    upsertCalls,
    upsertManyCalls,
    findExistingCalls,

    async findExistingIds(documentIds: readonly string[]): Promise<Result<Set<string>, DatabaseError>> {
      findExistingCalls.push([...documentIds]);
      if (options.failFindExisting === true) {
        return err(createDatabaseError('ledger read failed'));
      }
      return ok(new Set(documentIds.filter((id) => rows.has(id))));
    },

    async upsert(entry: ProcessedDocument): Promise<Result<void, DatabaseError>> {
      upsertCalls.push(entry.documentId);
      if (failUpsertFor.has(entry.documentId)) {
        return err(createDatabaseError(`ledger write failed for ${entry.documentId}`));
      }
      rows.set(entry.documentId, entry);
      return ok(undefined);
    },

    async upsertMany(entries: readonly ProcessedDocument[]): Promise<Result<void, DatabaseError>> {
      upsertManyCalls.push([...entries]);
      if (options.failUpsertMany === true) {
        return err(createDatabaseError('ledger batch write failed'));
      }
      for (const entry of entries) rows.set(entry.documentId, entry);
      return ok(undefined);
    },

    async findFailed(documentId?: string): Promise<Result<ProcessedDocument[], DatabaseError>> {
      if (options.failFindFailed === true) {
        return err(createDatabaseError('ledger read failed'));
      }
      const failed = [...rows.values()]
        .filter(isFailed)
        .filter((row) => documentId === undefined || row.documentId === documentId)
        .sort(newestFirst);
      return ok(failed);
    },

    async findRecent(limit: number): Promise<Result<ProcessedDocument[], DatabaseError>> {
      if (options.failFindRecent === true) {
        return err(createDatabaseError('ledger read failed'));
      }
      return ok([...rows.values()].sort(newestFirst).slice(0, limit));
    },
  };
};

// =============================================================================
// Document Source
// =============================================================================

export interface FakeDocumentSource extends DocumentSource {
  queries: DocumentQuery[];
}

export const makeFakeDocumentSource = (
  documents: SourceDocument[] | { failWith: string }
): FakeDocumentSource => {
  const queries: DocumentQuery[] = [];

  return {
    queries,
    async search(query: DocumentQuery) {
      queries.push(query);
      if (!Array.isArray(documents)) {
        return err(createSourceQueryError(documents.failWith));
      }
      return ok([...documents]);
    },
  };
};

// =============================================================================
// Notifier
// =============================================================================

export interface FakeNotifier extends Notifier {
  /** Target lists passed to prepareBatch() */
  preparedBatches: NotificationTarget[][];
  /** Document ids dispatched, in completion order */
  dispatched: string[];
}

interface FakeNotifierOptions {
  mode?: NotificationMode;
  /** dispatch() returns this error for the given document ids */
  failures?: Record<string, DispatchError>;
  /** dispatch() throws for these document ids */
  throwFor?: string[];
  /** prepareBatch() throws this error */
  prepareError?: Error;
  /** Per-dispatch delay, to exercise concurrency */
  delayMs?: number;
}

export const makeFakeNotifier = (options: FakeNotifierOptions = {}): FakeNotifier => {
  const preparedBatches: NotificationTarget[][] = [];
  const dispatched: string[] = [];
  const throwFor = new Set(options.throwFor ?? []);

  const dispatcher: BatchDispatcher = {
    async dispatch(target: NotificationTarget): Promise<Result<void, DispatchError>> {
      if (options.delayMs !== undefined) {
        await new Promise((resolve) => setTimeout(resolve, options.delayMs));
      }
      dispatched.push(target.documentId);
      if (throwFor.has(target.documentId)) {
        throw new Error(`transport crashed on ${target.documentId}`);
      }
      const failure = options.failures?.[target.documentId];
      return failure !== undefined ? err(failure) : ok(undefined);
    },
  };

  return {
    mode: options.mode ?? 'broker',
    preparedBatches,
    dispatched,
    async prepareBatch(targets: readonly NotificationTarget[]): Promise<BatchDispatcher> {
      preparedBatches.push([...targets]);
      if (options.prepareError !== undefined) {
        throw options.prepareError;
      }
      return dispatcher;
    },
  };
};

// =============================================================================
// Summary Reporter
// =============================================================================

export interface FakeSummaryReporter extends SummaryReporter {
  summaries: ProcessingSummary[];
  alerts: ErrorAlert[];
}

export const makeFakeSummaryReporter = (): FakeSummaryReporter => {
  const summaries: ProcessingSummary[] = [];
  const alerts: ErrorAlert[] = [];

  return {
    summaries,
    alerts,
    async sendSummary(summary: ProcessingSummary): Promise<void> {
      summaries.push(summary);
    },
    async sendErrorAlert(alert: ErrorAlert): Promise<void> {
      alerts.push(alert);
    },
  };
};

// =============================================================================
// Owner Directory
// =============================================================================

export interface FakeOwnerDirectory extends OwnerDirectory {
  /** Portfolio id lists passed to getOwners() */
  calls: string[][];
}

interface FakeOwnerDirectoryOptions {
  /** Lookups that include any of these portfolio ids fail */
  failForPortfolios?: string[];
}

export const makeFakeOwnerDirectory = (
  owners: PortfolioOwner[],
  options: FakeOwnerDirectoryOptions = {}
): FakeOwnerDirectory => {
  const calls: string[][] = [];
  const failing = new Set(options.failForPortfolios ?? []);

  return {
    calls,
    async getOwners(portfolioIds: readonly string[]): Promise<Result<PortfolioOwner[], OwnerLookupError>> {
      calls.push([...portfolioIds]);
      if (portfolioIds.some((id) => failing.has(id))) {
        return err({ type: 'OwnerLookupError', message: 'directory unavailable' });
      }
      const wanted = new Set(portfolioIds);
      return ok(owners.filter((owner) => wanted.has(owner.portfolioId)));
    },
  };
};

// =============================================================================
// Email Sender
// =============================================================================

export interface FakeEmailSender extends EmailSender {
  sent: SendEmailParams[];
}

interface FakeEmailSenderOptions {
  failWith?: EmailError;
  verifyError?: EmailError;
}

export const makeFakeEmailSender = (options: FakeEmailSenderOptions = {}): FakeEmailSender => {
  const sent: SendEmailParams[] = [];

  return {
    sent,
    async send(params: SendEmailParams) {
      sent.push(params);
      if (options.failWith !== undefined) {
        return err(options.failWith);
      }
      return ok({ messageId: `<message-${String(sent.length)}@test>` });
    },
    async verify() {
      return options.verifyError !== undefined ? err(options.verifyError) : ok(undefined);
    },
  };
};

// =============================================================================
// Broker Publisher
// =============================================================================

export interface FakeBrokerPublisher extends BrokerPublisher {
  published: PublishParams[];
  closed: () => boolean;
}

interface FakeBrokerPublisherOptions {
  failWith?: BrokerError;
  connectionError?: BrokerError;
}

export const makeFakeBrokerPublisher = (
  options: FakeBrokerPublisherOptions = {}
): FakeBrokerPublisher => {
  const published: PublishParams[] = [];
  let closed = false;

  return {
    published,
    closed: () => closed,
    async publish(params: PublishParams) {
      published.push(params);
      return options.failWith !== undefined ? err(options.failWith) : ok(undefined);
    },
    async checkConnection() {
      return options.connectionError !== undefined ? err(options.connectionError) : ok(undefined);
    },
    async close() {
      closed = true;
    },
  };
};

// =============================================================================
// Fetch
// =============================================================================

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: string;
}

export type FetchHandler = (request: RecordedRequest) => Response | Promise<Response>;

export interface FakeFetch {
  fetch: typeof fetch;
  requests: RecordedRequest[];
}

const headersToRecord = (headers: RequestInit['headers']): Record<string, string> => {
  const record: Record<string, string> = {};
  new Headers(headers).forEach((value, key) => {
    record[key] = value;
  });
  return record;
};

const requestUrl = (input: string | URL | Request): string => {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.toString();
  return input.url;
};

/**
 * A fetch stand-in that records requests and answers through `handler`.
 */
export const makeFakeFetch = (handler: FetchHandler): FakeFetch => {
  const requests: RecordedRequest[] = [];

  const fakeFetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const request: RecordedRequest = {
      url: requestUrl(input),
      method: init?.method ?? 'GET',
      headers: headersToRecord(init?.headers),
      body: typeof init?.body === 'string' ? init.body : init?.body instanceof URLSearchParams ? init.body.toString() : '',
    };
    requests.push(request);
    return handler(request);
  };

  return { fetch: fakeFetch, requests };
};
