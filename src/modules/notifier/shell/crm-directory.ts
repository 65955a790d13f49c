/**
 * CRM owner directory (Dataverse Web API)
 *
 * Active contacts are looked up first; portfolios still without an owner are
 * then looked up among active accounts.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ok, err, type Result } from 'neverthrow';

import { createOwnerLookupError, type OwnerLookupError } from '../core/errors.js';

import type { OwnerDirectory } from '../core/ports.js';
import type { ContactOwner, OrganizationOwner, PortfolioOwner } from '../core/types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CrmDirectorySettings {
  /** Organization URL, e.g. https://example.crm.dynamics.com */
  url: string;
  /** OAuth2 token endpoint */
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  timeoutMs: number;
}

export interface CrmDirectoryDeps {
  settings: CrmDirectorySettings;
  logger: Logger;
  fetch?: typeof fetch;
  /** Epoch milliseconds; defaults to Date.now */
  now?: () => number;
}

const API_PATH = '/api/data/v9.2';

/** Refresh the token this long before it expires */
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

const NullableString = Type.Optional(Type.Union([Type.String(), Type.Null()]));

const TokenResponseSchema = Type.Object({
  access_token: Type.String(),
  expires_in: Type.Union([Type.Number(), Type.String()]),
});

const ContactRowSchema = Type.Object({
  contactid: Type.String(),
  firstname: NullableString,
  lastname: NullableString,
  emailaddress1: NullableString,
  new_portfolioid: NullableString,
});

const AccountRowSchema = Type.Object({
  accountid: Type.String(),
  name: NullableString,
  emailaddress1: NullableString,
  new_portfolioid: NullableString,
  new_contactpersonemail: NullableString,
});

const ContactPageSchema = Type.Object({
  value: Type.Array(ContactRowSchema),
  '@odata.nextLink': Type.Optional(Type.String()),
});

const AccountPageSchema = Type.Object({
  value: Type.Array(AccountRowSchema),
  '@odata.nextLink': Type.Optional(Type.String()),
});

type ContactRow = Static<typeof ContactRowSchema>;
type AccountRow = Static<typeof AccountRowSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const escapeODataString = (value: string): string => value.replace(/'/g, "''");

/**
 * Active records whose `new_portfolioid` is one of the given ids.
 */
export const buildPortfolioFilter = (portfolioIds: readonly string[]): string => {
  const values = portfolioIds.map((id) => `'${escapeODataString(id)}'`).join(',');
  return `statecode eq 0 and Microsoft.Dynamics.CRM.In(PropertyName='new_portfolioid',PropertyValues=[${values}])`;
};

const blankToNull = (value: string | null | undefined): string | null =>
  value === null || value === undefined || value.trim() === '' ? null : value;

export const mapContactRow = (row: ContactRow): ContactOwner | null => {
  const portfolioId = blankToNull(row.new_portfolioid);
  if (portfolioId === null) return null;

  const firstName = row.firstname ?? '';
  const lastName = row.lastname ?? '';
  return {
    kind: 'contact',
    id: row.contactid,
    portfolioId,
    firstName,
    lastName,
    name: `${firstName} ${lastName}`.trim(),
    email: blankToNull(row.emailaddress1),
  };
};

export const mapAccountRow = (row: AccountRow): OrganizationOwner | null => {
  const portfolioId = blankToNull(row.new_portfolioid);
  if (portfolioId === null) return null;

  const organizationName = row.name ?? '';
  return {
    kind: 'organization',
    id: row.accountid,
    portfolioId,
    name: organizationName,
    organizationName,
    email: blankToNull(row.emailaddress1),
    contactPersonEmail: blankToNull(row.new_contactpersonemail),
  };
};

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeCrmDirectory = (deps: CrmDirectoryDeps): OwnerDirectory => {
  const { settings, logger } = deps;
  const fetchFn = deps.fetch ?? fetch;
  const now = deps.now ?? Date.now;
  const log = logger.child({ component: 'CrmDirectory' });
  const baseUrl = settings.url.replace(/\/+$/, '');

  let cachedToken: { value: string; expiresAt: number } | null = null;

  const request = async (url: string, init: RequestInit): Promise<unknown> => {
    const response = await fetchFn(url, { ...init, signal: AbortSignal.timeout(settings.timeoutMs) });
    if (!response.ok) {
      const body = await response.text();
      throw new Error(
        `CRM request failed with status ${String(response.status)}: ${body.slice(0, 500)}`
      );
    }
    return response.json();
  };

  const getToken = async (): Promise<string> => {
    if (cachedToken !== null && now() < cachedToken.expiresAt) {
      return cachedToken.value;
    }

    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: settings.clientId,
      client_secret: settings.clientSecret,
      scope: `${new URL(baseUrl).origin}/.default`,
    });

    const data = await request(settings.tokenUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: body.toString(),
    });

    if (!Value.Check(TokenResponseSchema, data)) {
      throw new Error('CRM token response is missing access_token');
    }

    const expiresInMs = Number(data.expires_in) * 1000;
    cachedToken = {
      value: data.access_token,
      expiresAt: now() + Math.max(0, expiresInMs - TOKEN_EXPIRY_MARGIN_MS),
    };
    log.debug('Acquired CRM access token');
    return cachedToken.value;
  };

  const apiGet = async (url: string): Promise<unknown> => {
    const token = await getToken();
    return request(url, {
      method: 'GET',
      headers: {
        Authorization: `Bearer ${token}`,
        Accept: 'application/json',
        'OData-MaxVersion': '4.0',
        'OData-Version': '4.0',
      },
    });
  };

  const buildQueryUrl = (entitySet: string, select: string[], portfolioIds: readonly string[]) => {
    const url = new URL(`${baseUrl}${API_PATH}/${entitySet}`);
    url.searchParams.set('$select', select.join(','));
    url.searchParams.set('$filter', buildPortfolioFilter(portfolioIds));
    return url.toString();
  };

  const fetchContacts = async (portfolioIds: readonly string[]): Promise<ContactOwner[]> => {
    const owners: ContactOwner[] = [];
    let next: string | undefined = buildQueryUrl(
      'contacts',
      ['contactid', 'firstname', 'lastname', 'emailaddress1', 'new_portfolioid'],
      portfolioIds
    );

    while (next !== undefined) {
      const page = await apiGet(next);
      if (!Value.Check(ContactPageSchema, page)) {
        throw new Error('Unexpected CRM contacts response');
      }
      for (const row of page.value) {
        const owner = mapContactRow(row);
        if (owner !== null) owners.push(owner);
      }
      next = page['@odata.nextLink'];
    }

    return owners;
  };

  const fetchAccounts = async (portfolioIds: readonly string[]): Promise<OrganizationOwner[]> => {
    const owners: OrganizationOwner[] = [];
    let next: string | undefined = buildQueryUrl(
      'accounts',
      ['accountid', 'name', 'emailaddress1', 'new_portfolioid', 'new_contactpersonemail'],
      portfolioIds
    );

    while (next !== undefined) {
      const page = await apiGet(next);
      if (!Value.Check(AccountPageSchema, page)) {
        throw new Error('Unexpected CRM accounts response');
      }
      for (const row of page.value) {
        const owner = mapAccountRow(row);
        if (owner !== null) owners.push(owner);
      }
      next = page['@odata.nextLink'];
    }

    return owners;
  };

  return {
    async getOwners(
      portfolioIds: readonly string[]
    ): Promise<Result<PortfolioOwner[], OwnerLookupError>> {
      if (portfolioIds.length === 0) {
        return ok([]);
      }

      try {
        const contacts = await fetchContacts(portfolioIds);
        const covered = new Set(contacts.map((c) => c.portfolioId));
        const remaining = portfolioIds.filter((id) => !covered.has(id));
        const accounts = remaining.length > 0 ? await fetchAccounts(remaining) : [];

        log.debug(
          { portfolioCount: portfolioIds.length, contacts: contacts.length, accounts: accounts.length },
          'Processed batch of portfolio owners'
        );
        return ok([...contacts, ...accounts]);
      } catch (error) {
        log.error({ error }, 'Error retrieving batch of portfolio owners');
        return err(createOwnerLookupError(describe(error)));
      }
    },
  };
};
