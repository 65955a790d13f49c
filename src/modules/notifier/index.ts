/**
 * Notifier Module
 *
 * Per-document notification transports (broker or e-mail), the CRM owner
 * directory, and operator summary e-mails.
 */

// Core types
export type {
  NotificationTarget,
  NotificationMode,
  ContactOwner,
  OrganizationOwner,
  PortfolioOwner,
  SummaryOperation,
  ProcessingSummary,
  ErrorAlert,
} from './core/types.js';

// Core errors
export type {
  DispatchError,
  BrokerPublishError,
  OwnerLookupError,
  OwnerNotFoundError,
  OwnerEmailMissingError,
  RenderError,
  EmailSendError,
  UnexpectedDispatchError,
} from './core/errors.js';

export {
  createBrokerPublishError,
  createOwnerLookupError,
  createOwnerNotFoundError,
  createOwnerEmailMissingError,
  createRenderError,
  createEmailSendError,
  createUnexpectedDispatchError,
  getErrorMessage as getDispatchErrorMessage,
} from './core/errors.js';

// Ports
export type { Notifier, BatchDispatcher, OwnerDirectory, SummaryReporter } from './core/ports.js';

// Core logic
export {
  decideSummary,
  resolveSummaryOptions,
  buildSummarySubject,
  buildAlertSubject,
  type SummaryOptions,
  type SummaryDecision,
} from './core/summary.js';
export { resolveRecipientAddress, resolveRecipientName } from './core/owners.js';
export { formatDate, formatTimestamp } from './core/format.js';

// Shell
export {
  makeBrokerNotifier,
  buildCommunicationPayload,
  type BrokerNotifierSettings,
} from './shell/broker-notifier.js';
export { makeEmailNotifier, type OwnerLookupSettings } from './shell/email-notifier.js';
export { makeCrmDirectory, type CrmDirectorySettings } from './shell/crm-directory.js';
export {
  makeEmailSummaryReporter,
  makeLogOnlySummaryReporter,
} from './shell/email-summary-reporter.js';
export { makeTemplateRenderer, type TemplateRenderer } from './shell/templates/renderer.js';
