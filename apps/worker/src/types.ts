import type { Auth } from 'googleapis';
import type { ExtractionErrorKind } from './lib/errors';

// ============ DIRECTORY ============
export interface DomainUser {
  email: string;
  suspended: boolean;
  archived: boolean;
}

// ============ CREDENTIALS ============
/** Short-lived identity scoped to one user for one run. Never shared between workers. */
export interface DelegatedCredential {
  subject: string;
  auth: Auth.OAuth2Client;
  expiresAt: Date;
}

export interface CredentialAcquirer {
  acquire(targetUser: string): Promise<DelegatedCredential>;
}

// ============ SCRIPT PROJECTS ============
export type ProjectContainer = 'user-drive' | 'shared-drive';

export interface ScriptProject {
  scriptId: string;
  title: string;
  ownerEmail: string;
  container: ProjectContainer;
}

export type ExtractionOutcome =
  | { status: 'success'; content: string; attempts: number }
  | { status: 'failed'; reason: ExtractionErrorKind; message: string; attempts: number }
  | { status: 'cancelled'; attempts: number };

/** Stored in `extraction_error`; `cancelled` marks projects the run stopped before fetching. */
export type ManifestErrorTag = ExtractionErrorKind | 'cancelled';

// ============ AUDIT RECORDS ============
export interface ManifestRecord {
  scriptId: string;
  scriptName: string;
  ownerEmail: string;
  manifestContent: string;
  extractionError: ManifestErrorTag | null;
}

export interface StampedManifestRecord extends ManifestRecord {
  extractionDate: Date;
}

// A type alias rather than an interface so rows are assignable to the API's JSON object type
export type WarehouseRow = {
  script_id: string;
  script_name: string | null;
  owner_email: string | null;
  manifest_content: string | null;
  extraction_error: string | null;
  extraction_date: string | null;
};

export interface InsertRow {
  insertId: string;
  json: WarehouseRow;
}

// ============ RUN SUMMARY ============
export type RunStatus = 'succeeded' | 'partial' | 'failed' | 'cancelled';

export interface RunSummary {
  runId: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  usersEnumerated: number;
  usersSkipped: number;
  usersProcessed: number;
  usersFailed: number;
  usersCancelled: number;
  projectsFound: number;
  manifestsExtracted: number;
  manifestsFailed: number;
  manifestsCancelled: number;
  recordsWritten: number;
  duplicatesDropped: number;
  batchesFlushed: number;
  batchesFailed: number;
  enumerationPartial: boolean;
  errorsByClass: Record<string, number>;
  warnings: string[];
}
