import type { PortfolioOwner } from './types.js';

/**
 * Recipient address: the owner's own e-mail, else the organization's contact person.
 */
export const resolveRecipientAddress = (owner: PortfolioOwner): string | null => {
  if (owner.email !== null && owner.email.trim() !== '') {
    return owner.email;
  }
  if (owner.kind === 'organization' && owner.contactPersonEmail !== null) {
    const fallback = owner.contactPersonEmail.trim();
    return fallback === '' ? null : owner.contactPersonEmail;
  }
  return null;
};

/**
 * Display name for the recipient mailbox.
 */
export const resolveRecipientName = (owner: PortfolioOwner): string =>
  owner.kind === 'contact'
    ? `${owner.firstName} ${owner.lastName}`.trim()
    : owner.organizationName;

/**
 * Indexes owners by portfolio id. The first owner seen for a portfolio wins.
 */
export const indexOwnersByPortfolio = (
  owners: readonly PortfolioOwner[]
): Map<string, PortfolioOwner> => {
  const byPortfolio = new Map<string, PortfolioOwner>();
  for (const owner of owners) {
    if (!byPortfolio.has(owner.portfolioId)) {
      byPortfolio.set(owner.portfolioId, owner);
    }
  }
  return byPortfolio;
};

/**
 * Distinct portfolio ids in first-seen order.
 */
export const distinctPortfolioIds = (targets: readonly { portfolioId: string }[]): string[] => [
  ...new Set(targets.map((t) => t.portfolioId)),
];
