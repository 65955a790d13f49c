/**
 * Notifier Module - Error Types
 *
 * Per-document dispatch failures. None of these abort a run; the processing
 * engine records them on the ledger row.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Broker publish failed (connection, channel or unroutable message).
 */
export interface BrokerPublishError {
  type: 'BrokerPublishError';
  message: string;
}

/**
 * Owner directory lookup failed for the batch containing this portfolio.
 */
export interface OwnerLookupError {
  type: 'OwnerLookupError';
  message: string;
}

/**
 * No owner is registered for the portfolio.
 */
export interface OwnerNotFoundError {
  type: 'OwnerNotFound';
  portfolioId: string;
}

/**
 * The owner has no usable e-mail address.
 */
export interface OwnerEmailMissingError {
  type: 'OwnerEmailMissing';
  portfolioId: string;
  ownerId: string;
}

/**
 * Template rendering failed.
 */
export interface RenderError {
  type: 'RenderError';
  message: string;
}

/**
 * SMTP send failed.
 */
export interface EmailSendError {
  type: 'EmailSendError';
  message: string;
}

/**
 * Anything thrown from a dispatcher that was not mapped by the adapter.
 */
export interface UnexpectedDispatchError {
  type: 'UnexpectedDispatchError';
  message: string;
}

export type DispatchError =
  | BrokerPublishError
  | OwnerLookupError
  | OwnerNotFoundError
  | OwnerEmailMissingError
  | RenderError
  | EmailSendError
  | UnexpectedDispatchError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createBrokerPublishError = (message: string): BrokerPublishError => ({
  type: 'BrokerPublishError',
  message,
});

export const createOwnerLookupError = (message: string): OwnerLookupError => ({
  type: 'OwnerLookupError',
  message,
});

export const createOwnerNotFoundError = (portfolioId: string): OwnerNotFoundError => ({
  type: 'OwnerNotFound',
  portfolioId,
});

export const createOwnerEmailMissingError = (
  portfolioId: string,
  ownerId: string
): OwnerEmailMissingError => ({
  type: 'OwnerEmailMissing',
  portfolioId,
  ownerId,
});

export const createRenderError = (message: string): RenderError => ({
  type: 'RenderError',
  message,
});

export const createEmailSendError = (message: string): EmailSendError => ({
  type: 'EmailSendError',
  message,
});

/**
 * Wraps a thrown value.
 */
export const createUnexpectedDispatchError = (error: unknown): UnexpectedDispatchError => ({
  type: 'UnexpectedDispatchError',
  message: error instanceof Error ? error.message : String(error),
});

// ─────────────────────────────────────────────────────────────────────────────
// Error Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Gets the text stored on the ledger row for a failed dispatch.
 */
export const getErrorMessage = (error: DispatchError): string => {
  switch (error.type) {
    case 'BrokerPublishError':
      return `Broker publish failed: ${error.message}`;
    case 'OwnerLookupError':
      return `Owner lookup failed: ${error.message}`;
    case 'OwnerNotFound':
      return `No portfolio owner found for portfolio ${error.portfolioId}`;
    case 'OwnerEmailMissing':
      return `No email address found for portfolio owner ${error.ownerId} in portfolio ${error.portfolioId}`;
    case 'RenderError':
      return `Template rendering failed: ${error.message}`;
    case 'EmailSendError':
      return `Email send failed: ${error.message}`;
    case 'UnexpectedDispatchError':
      return error.message;
  }
};
