import { google } from 'googleapis';
import { EnumerationError, describeError, isTransientFailure } from '../lib/errors';
import { createModuleLogger } from '../lib/logger';
import type { Logger } from '../lib/logger';
import { withRetry, withTimeout } from '../lib/retry';
import type { RetryPolicy } from '../lib/retry';
import type { DelegatedCredential, DomainUser } from '../types';

// ============ TYPES ============
export interface DirectoryUserEntry {
  primaryEmail?: string | null;
  suspended?: boolean | null;
  archived?: boolean | null;
}

export interface DirectoryPage {
  users: DirectoryUserEntry[];
  nextPageToken?: string;
}

export type DirectoryPageSource = (pageToken: string | undefined) => Promise<DirectoryPage>;

export interface DirectoryEnumeratorOptions {
  excludeSuspended: boolean;
  retry: RetryPolicy;
  callTimeoutMs: number;
  /** Resume from a continuation token instead of the first page. */
  startPageToken?: string;
  logger?: Logger;
}

export interface EnumerationStats {
  requests: number;
  pages: number;
  usersYielded: number;
  usersSkipped: number;
  partial: boolean;
  error?: EnumerationError;
}

// ============ ADMIN SDK SOURCE ============
const PAGE_SIZE = 500;

export function createAdminDirectorySource(credential: DelegatedCredential, customer = 'my_customer'): DirectoryPageSource {
  const directory = google.admin({ version: 'directory_v1', auth: credential.auth });

  return async (pageToken) => {
    const res = await directory.users.list({
      customer,
      maxResults: PAGE_SIZE,
      pageToken,
      orderBy: 'email',
      fields: 'nextPageToken,users(primaryEmail,suspended,archived)',
    });
    return {
      users: res.data.users ?? [],
      nextPageToken: res.data.nextPageToken ?? undefined,
    };
  };
}

// ============ ENUMERATOR ============
/**
 * Lazily walks the directory one page at a time. A failure on the first page
 * is fatal; a failure further in ends the sequence early and is reported
 * through `stats.partial` so the users already yielded still get processed.
 */
export class DirectoryEnumerator {
  readonly stats: EnumerationStats = {
    requests: 0,
    pages: 0,
    usersYielded: 0,
    usersSkipped: 0,
    partial: false,
  };

  private readonly log: Logger;

  constructor(
    private readonly fetchPage: DirectoryPageSource,
    private readonly options: DirectoryEnumeratorOptions
  ) {
    this.log = options.logger ?? createModuleLogger('directory-enumerator');
  }

  async *users(): AsyncGenerator<DomainUser, void, undefined> {
    const seen = new Set<string>();
    let pageToken = this.options.startPageToken;

    do {
      let page: DirectoryPage;
      try {
        page = await this.requestPage(pageToken);
      } catch (error) {
        if (this.stats.pages === 0) {
          throw new EnumerationError('total', `Directory listing failed: ${describeError(error)}`, { cause: error });
        }
        const partial = new EnumerationError(
          'partial',
          `Directory listing stopped after ${this.stats.pages} pages: ${describeError(error)}`,
          { cause: error }
        );
        this.stats.partial = true;
        this.stats.error = partial;
        this.log.warn({ pages: this.stats.pages, usersYielded: this.stats.usersYielded, error: partial.message }, 'Partial enumeration');
        return;
      }

      this.stats.pages += 1;
      for (const entry of page.users) {
        const email = entry.primaryEmail?.trim();
        if (!email || seen.has(email.toLowerCase())) continue;
        seen.add(email.toLowerCase());

        const user: DomainUser = {
          email,
          suspended: entry.suspended === true,
          archived: entry.archived === true,
        };
        if (this.options.excludeSuspended && (user.suspended || user.archived)) {
          this.stats.usersSkipped += 1;
          continue;
        }

        this.stats.usersYielded += 1;
        yield user;
      }

      pageToken = page.nextPageToken || undefined;
    } while (pageToken);

    this.log.info(
      { pages: this.stats.pages, usersYielded: this.stats.usersYielded, usersSkipped: this.stats.usersSkipped },
      'Directory enumeration complete'
    );
  }

  private requestPage(pageToken: string | undefined): Promise<DirectoryPage> {
    return withRetry(
      () => {
        this.stats.requests += 1;
        return withTimeout(this.fetchPage(pageToken), this.options.callTimeoutMs, 'directory.users.list');
      },
      {
        label: 'directory.users.list',
        policy: this.options.retry,
        classify: (error) =>
          error instanceof EnumerationError
            ? error
            : new EnumerationError(this.stats.pages === 0 ? 'total' : 'partial', describeError(error), {
                retryable: isTransientFailure(error),
                cause: error,
              }),
        logger: this.log,
      }
    );
  }
}
