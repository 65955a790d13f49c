/**
 * E-mail notifier
 *
 * Looks up the owner of every portfolio in the batch, then sends each owner a
 * personalized notification per document.
 */

import { ok, err, type Result } from 'neverthrow';

import { chunk, mapInBatches } from '../../../common/utils/concurrency.js';
import {
  createEmailSendError,
  createOwnerEmailMissingError,
  createOwnerNotFoundError,
  type DispatchError,
  type OwnerLookupError,
} from '../core/errors.js';
import { formatDate, formatTimestamp } from '../core/format.js';
import {
  distinctPortfolioIds,
  indexOwnersByPortfolio,
  resolveRecipientAddress,
  resolveRecipientName,
} from '../core/owners.js';

import type { BatchDispatcher, Notifier, OwnerDirectory } from '../core/ports.js';
import type { NotificationTarget, PortfolioOwner } from '../core/types.js';
import type { DocumentNotificationModel, TemplateRenderer } from './templates/renderer.js';
import type { EmailSender } from '@/infra/email/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface OwnerLookupSettings {
  /** Portfolio ids per directory request */
  batchSize: number;
  /** Directory requests in flight at once */
  maxConcurrentBatches: number;
}

export interface EmailNotifierDeps {
  directory: OwnerDirectory;
  emailSender: EmailSender;
  renderer: TemplateRenderer;
  lookup: OwnerLookupSettings;
  logger: Logger;
  now?: () => Date;
}

/**
 * Owner resolution for one portfolio after the batch lookup.
 */
type OwnerSlot = { found: PortfolioOwner } | { failed: OwnerLookupError };

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

export const buildNotificationSubject = (portfolioId: string): string =>
  `New Document Available - Portfolio ${portfolioId}`;

/**
 * Template variables for one document and its owner.
 */
export const buildDocumentNotificationModel = (
  target: NotificationTarget,
  owner: PortfolioOwner,
  now: Date
): DocumentNotificationModel => ({
  portfolioId: target.portfolioId,
  ownerName: owner.name,
  documentName: target.name,
  documentDate: formatDate(target.documentDate),
  documentId: target.documentId,
  notificationDate: formatTimestamp(now),
  organizationName: owner.kind === 'organization' ? owner.organizationName : '',
  isContact: owner.kind === 'contact',
});

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeEmailNotifier = (deps: EmailNotifierDeps): Notifier => {
  const { directory, emailSender, renderer, lookup, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const log = logger.child({ component: 'EmailNotifier' });

  /**
   * Resolves owners batch by batch. A failed batch marks each of its portfolios failed.
   */
  const resolveOwners = async (portfolioIds: string[]): Promise<Map<string, OwnerSlot>> => {
    const slots = new Map<string, OwnerSlot>();
    const batches = chunk(portfolioIds, lookup.batchSize);

    log.info(
      { portfolioCount: portfolioIds.length, batchCount: batches.length },
      'Retrieving portfolio owners'
    );

    const results = await mapInBatches(batches, lookup.maxConcurrentBatches, (batch) =>
      directory.getOwners(batch)
    );

    results.forEach((result, index) => {
      const batch = batches[index] ?? [];
      if (result.isErr()) {
        log.error({ error: result.error, batchSize: batch.length }, 'Owner lookup failed for batch');
        for (const portfolioId of batch) {
          slots.set(portfolioId, { failed: result.error });
        }
        return;
      }

      for (const [portfolioId, owner] of indexOwnersByPortfolio(result.value)) {
        slots.set(portfolioId, { found: owner });
      }
    });

    log.info({ ownerCount: slots.size }, 'Portfolio owners resolved');
    return slots;
  };

  const makeDispatcher = (owners: Map<string, OwnerSlot>): BatchDispatcher => ({
    async dispatch(target: NotificationTarget): Promise<Result<void, DispatchError>> {
      const { documentId, portfolioId } = target;
      const slot = owners.get(portfolioId);

      if (slot === undefined) {
        log.warn({ documentId, portfolioId }, 'No portfolio owner found');
        return err(createOwnerNotFoundError(portfolioId));
      }
      if ('failed' in slot) {
        return err(slot.failed);
      }

      const owner = slot.found;
      const address = resolveRecipientAddress(owner);
      if (address === null) {
        log.warn(
          { documentId, portfolioId, ownerId: owner.id },
          'No email address found for portfolio owner'
        );
        return err(createOwnerEmailMissingError(portfolioId, owner.id));
      }

      const html = renderer.render(
        'document-notification',
        buildDocumentNotificationModel(target, owner, now())
      );
      if (html.isErr()) {
        return err(html.error);
      }

      const sent = await emailSender.send({
        to: { name: resolveRecipientName(owner), address },
        subject: buildNotificationSubject(portfolioId),
        html: html.value,
      });
      if (sent.isErr()) {
        return err(createEmailSendError(sent.error.message));
      }

      log.info({ documentId, portfolioId, to: address }, 'Document notification email sent');
      return ok(undefined);
    },
  });

  return {
    mode: 'email',
    async prepareBatch(targets: readonly NotificationTarget[]): Promise<BatchDispatcher> {
      const portfolioIds = distinctPortfolioIds(targets);
      if (portfolioIds.length === 0) {
        return makeDispatcher(new Map());
      }
      return makeDispatcher(await resolveOwners(portfolioIds));
    },
  };
};
