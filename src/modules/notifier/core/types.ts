/**
 * Notifier Module - Domain Types
 */

// ─────────────────────────────────────────────────────────────────────────────
// Notification Target
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The document facts a notification is built from.
 */
export interface NotificationTarget {
  documentId: string;
  name: string;
  documentDate: Date;
  portfolioId: string;
}

/**
 * Transport selected once per run.
 */
export type NotificationMode = 'broker' | 'email';

// ─────────────────────────────────────────────────────────────────────────────
// Portfolio Owners
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A person who holds the portfolio.
 */
export interface ContactOwner {
  kind: 'contact';
  id: string;
  portfolioId: string;
  firstName: string;
  lastName: string;
  /** Display name ("first last") */
  name: string;
  email: string | null;
}

/**
 * An organization that holds the portfolio.
 */
export interface OrganizationOwner {
  kind: 'organization';
  id: string;
  portfolioId: string;
  name: string;
  organizationName: string;
  email: string | null;
  contactPersonEmail: string | null;
}

export type PortfolioOwner = ContactOwner | OrganizationOwner;

// ─────────────────────────────────────────────────────────────────────────────
// Operator Reports
// ─────────────────────────────────────────────────────────────────────────────

export type SummaryOperation = 'process' | 'retry';

/**
 * End-of-run report sent to operators.
 */
export interface ProcessingSummary {
  operation: SummaryOperation;
  processedCount: number;
  errorCount: number;
  errors: string[];
  dryRun: boolean;
  completedAt: Date;
}

/**
 * Fatal run failure reported to operators.
 */
export interface ErrorAlert {
  title: string;
  message: string;
  /** Underlying error text */
  details: string;
  occurredAt: Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const SUBJECT_PREFIX = '[Document Notifier]';

export const BROKER_CONTENT_TYPE = 'application/xml';

export const COMMUNICATION_REQUEST_NAMESPACE =
  'http://www.objectway.com/comm/request/communicationrequest';
