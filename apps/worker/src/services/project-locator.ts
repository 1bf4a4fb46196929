import { google } from 'googleapis';
import { classifyExtractionError } from '../lib/errors';
import { createModuleLogger } from '../lib/logger';
import type { Logger } from '../lib/logger';
import { withRetry, withTimeout } from '../lib/retry';
import type { RetryPolicy } from '../lib/retry';
import type { DelegatedCredential, ProjectContainer, ScriptProject } from '../types';

export const SCRIPT_MIME_TYPE = 'application/vnd.google-apps.script';
export const OWNED_SCRIPTS_QUERY = `mimeType='${SCRIPT_MIME_TYPE}' and 'me' in owners and trashed=false`;

// ============ TYPES ============
export interface ScriptFileEntry {
  id?: string | null;
  name?: string | null;
  driveId?: string | null;
}

export interface ScriptFilePage {
  files: ScriptFileEntry[];
  nextPageToken?: string;
}

export type ScriptFileSource = (credential: DelegatedCredential, pageToken: string | undefined) => Promise<ScriptFilePage>;

export interface ProjectLocatorOptions {
  source: ScriptFileSource;
  retry: RetryPolicy;
  callTimeoutMs: number;
  logger?: Logger;
}

// ============ DRIVE SOURCE ============
export function createDriveScriptFileSource(): ScriptFileSource {
  return async (credential, pageToken) => {
    const drive = google.drive({ version: 'v3', auth: credential.auth });
    const res = await drive.files.list({
      q: OWNED_SCRIPTS_QUERY,
      spaces: 'drive',
      corpora: 'user',
      fields: 'nextPageToken, files(id, name, driveId)',
      pageSize: 100,
      pageToken,
    });
    return {
      files: res.data.files ?? [],
      nextPageToken: res.data.nextPageToken ?? undefined,
    };
  };
}

/** Files living in a Shared Drive carry the drive's id; user-owned ones do not. */
export function containerOf(file: ScriptFileEntry): ProjectContainer {
  return file.driveId ? 'shared-drive' : 'user-drive';
}

// ============ LOCATOR ============
export class ProjectLocator {
  private readonly log: Logger;

  constructor(private readonly options: ProjectLocatorOptions) {
    this.log = options.logger ?? createModuleLogger('project-locator');
  }

  /**
   * Standalone script projects owned by the credential's subject. Rejects with
   * an `ExtractionError` once retries are spent or on a permission failure.
   */
  async listProjects(credential: DelegatedCredential): Promise<ScriptProject[]> {
    const projects: ScriptProject[] = [];
    const seen = new Set<string>();
    let excluded = 0;
    let pageToken: string | undefined;

    do {
      const page = await withRetry(
        () => withTimeout(this.options.source(credential, pageToken), this.options.callTimeoutMs, 'drive.files.list'),
        {
          label: `drive.files.list for ${credential.subject}`,
          policy: this.options.retry,
          classify: classifyExtractionError,
          logger: this.log,
        }
      );

      for (const file of page.files) {
        if (!file.id || seen.has(file.id)) continue;
        seen.add(file.id);
        const container = containerOf(file);
        if (container !== 'user-drive') {
          excluded += 1;
          continue;
        }
        projects.push({
          scriptId: file.id,
          title: file.name ?? '',
          ownerEmail: credential.subject,
          container,
        });
      }
      pageToken = page.nextPageToken || undefined;
    } while (pageToken);

    this.log.debug({ owner: credential.subject, projects: projects.length, excluded }, 'Projects located');
    return projects;
  }
}
