import { google } from 'googleapis';
import { ExtractionError, classifyExtractionError } from '../lib/errors';
import { createModuleLogger } from '../lib/logger';
import type { Logger } from '../lib/logger';
import { withRetry, withTimeout } from '../lib/retry';
import type { RetryPolicy } from '../lib/retry';
import type {
  DelegatedCredential,
  ExtractionOutcome,
  ManifestErrorTag,
  ManifestRecord,
  ScriptProject,
} from '../types';

export const MANIFEST_FILE_NAME = 'appsscript';
export const MANIFEST_FILE_TYPE = 'JSON';

// ============ TYPES ============
export interface ScriptContentFile {
  name?: string | null;
  type?: string | null;
  source?: string | null;
}

export type ScriptContentSource = (credential: DelegatedCredential, scriptId: string) => Promise<ScriptContentFile[]>;

export interface ManifestExtractorOptions {
  source: ScriptContentSource;
  retry: RetryPolicy;
  callTimeoutMs: number;
  logger?: Logger;
}

// ============ APPS SCRIPT SOURCE ============
export function createAppsScriptContentSource(): ScriptContentSource {
  return async (credential, scriptId) => {
    const script = google.script({ version: 'v1', auth: credential.auth });
    const res = await script.projects.getContent({ scriptId });
    return res.data.files ?? [];
  };
}

// ============ EXTRACTOR ============
export class ManifestExtractor {
  private readonly log: Logger;

  constructor(private readonly options: ManifestExtractorOptions) {
    this.log = options.logger ?? createModuleLogger('manifest-extractor');
  }

  /**
   * Returns the manifest source exactly as stored. Quota and transient
   * failures are retried; the promise rejects with an `ExtractionError`.
   */
  async fetchManifest(
    credential: DelegatedCredential,
    scriptId: string,
    options: { onAttempt?: (attempt: number) => void; signal?: AbortSignal } = {}
  ): Promise<string> {
    const { onAttempt, signal } = options;
    return withRetry(
      async (attempt) => {
        onAttempt?.(attempt);
        const files = await withTimeout(
          this.options.source(credential, scriptId),
          this.options.callTimeoutMs,
          'script.projects.getContent'
        );
        const manifest = files.find((file) => file.name === MANIFEST_FILE_NAME && file.type === MANIFEST_FILE_TYPE);
        if (!manifest) {
          throw new ExtractionError('not-found', `Project ${scriptId} has no ${MANIFEST_FILE_NAME}.json`);
        }
        return manifest.source ?? '';
      },
      {
        label: `script.projects.getContent ${scriptId}`,
        policy: this.options.retry,
        classify: classifyExtractionError,
        logger: this.log,
        signal,
      }
    );
  }

  /**
   * Never rejects: failures come back as a tagged outcome. An abort stops
   * further retries and yields a `cancelled` outcome.
   */
  async extract(
    credential: DelegatedCredential,
    project: ScriptProject,
    signal?: AbortSignal
  ): Promise<ExtractionOutcome> {
    if (signal?.aborted) return { status: 'cancelled', attempts: 0 };

    let attempts = 0;
    try {
      const content = await this.fetchManifest(credential, project.scriptId, {
        signal,
        onAttempt: (attempt) => {
          attempts = attempt;
        },
      });
      return { status: 'success', content, attempts };
    } catch (error) {
      if (signal?.aborted) {
        this.log.debug({ scriptId: project.scriptId, attempts }, 'Manifest extraction cancelled');
        return { status: 'cancelled', attempts };
      }
      const failure = classifyExtractionError(error);
      this.log.warn(
        { scriptId: project.scriptId, owner: project.ownerEmail, reason: failure.kind, attempts, error: failure.message },
        'Manifest extraction failed'
      );
      return { status: 'failed', reason: failure.kind, message: failure.message, attempts };
    }
  }
}

function errorTagOf(outcome: ExtractionOutcome): ManifestErrorTag | null {
  switch (outcome.status) {
    case 'success':
      return null;
    case 'failed':
      return outcome.reason;
    case 'cancelled':
      return 'cancelled';
  }
}

export function toManifestRecord(project: ScriptProject, outcome: ExtractionOutcome): ManifestRecord {
  return {
    scriptId: project.scriptId,
    scriptName: project.title,
    ownerEmail: project.ownerEmail,
    manifestContent: outcome.status === 'success' ? outcome.content : '',
    extractionError: errorTagOf(outcome),
  };
}
