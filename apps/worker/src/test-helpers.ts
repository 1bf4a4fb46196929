import { google } from 'googleapis';
import type { RetryPolicy } from './lib/retry';
import type { WarehouseWriter } from './services/warehouse-writer';
import type { DelegatedCredential, InsertRow } from './types';

export const instantRetry = (attempts = 3): RetryPolicy => ({ attempts, minDelayMs: 0, maxDelayMs: 0 });

export function fakeCredential(subject: string): DelegatedCredential {
  const auth = new google.auth.OAuth2();
  auth.setCredentials({ access_token: 'test-token', token_type: 'Bearer' });
  return { subject, auth, expiresAt: new Date('2026-01-01T01:00:00.000Z') };
}

/** An error shaped like the ones googleapis rejects with. */
export function apiError(status: number, reason?: string): Error {
  return Object.assign(new Error(`Request failed with status ${status}`), {
    code: status,
    response: {
      status,
      data: { error: { code: status, errors: reason ? [{ reason }] : [] } },
    },
  });
}

export interface ScriptedFailure {
  error: unknown;
  /** The rows land in the table even though the call fails. */
  committed?: boolean;
}

/** Append-only stand-in for the warehouse table. */
export class FakeWarehouse implements WarehouseWriter {
  readonly attempts: InsertRow[][] = [];
  readonly table: InsertRow[] = [];
  readonly failures: Array<ScriptedFailure | undefined> = [];

  async insertRows(rows: InsertRow[]): Promise<void> {
    this.attempts.push(rows);
    const failure = this.failures.shift();
    if (!failure || failure.committed) {
      this.table.push(...rows);
    }
    if (failure) throw failure.error;
  }
}
