import { randomUUID } from 'node:crypto';
import pLimit from 'p-limit';
import type { AppConfig } from '../lib/config';
import { EnumerationError, describeError, errorClassOf } from '../lib/errors';
import { createRunLogger } from '../lib/logger';
import { metrics as defaultMetrics } from '../lib/metrics';
import type { Metrics } from '../lib/metrics';
import type { RetryPolicy } from '../lib/retry';
import { AuditSink } from '../services/audit-sink';
import { CredentialBroker, createIamJwtSigner, createOAuthTokenExchanger } from '../services/credential-broker';
import { DirectoryEnumerator, createAdminDirectorySource } from '../services/directory-enumerator';
import type { DirectoryPageSource } from '../services/directory-enumerator';
import { ManifestExtractor, createAppsScriptContentSource, toManifestRecord } from '../services/manifest-extractor';
import { ProjectLocator, createDriveScriptFileSource } from '../services/project-locator';
import { BigQueryWarehouseWriter } from '../services/warehouse-writer';
import type {
  CredentialAcquirer,
  DelegatedCredential,
  DomainUser,
  ExtractionOutcome,
  ManifestRecord,
  RunStatus,
  RunSummary,
  ScriptProject,
} from '../types';

// ============ TYPES ============
export interface ManifestAuditDeps {
  broker: CredentialAcquirer;
  createDirectorySource: (adminCredential: DelegatedCredential) => DirectoryPageSource;
  locator: { listProjects(credential: DelegatedCredential): Promise<ScriptProject[]> };
  extractor: {
    extract(credential: DelegatedCredential, project: ScriptProject, signal?: AbortSignal): Promise<ExtractionOutcome>;
  };
  createSink: (runId: string) => AuditSink;
  metrics?: Metrics;
}

export interface ManifestAuditOptions {
  adminUserEmail: string;
  maxWorkers: number;
  excludeSuspendedUsers: boolean;
  directoryRetry: RetryPolicy;
  callTimeoutMs: number;
  runDeadlineMs: number;
  signal?: AbortSignal;
  runId?: string;
  now?: () => Date;
}

// ============ RUN TALLY ============
class RunTally {
  usersEnumerated = 0;
  usersProcessed = 0;
  usersFailed = 0;
  usersCancelled = 0;
  projectsFound = 0;
  manifestsExtracted = 0;
  manifestsFailed = 0;
  manifestsCancelled = 0;
  readonly errorsByClass: Record<string, number> = {};
  readonly warnings: string[] = [];

  recordError(errorClass: string, count = 1): void {
    this.errorsByClass[errorClass] = (this.errorsByClass[errorClass] ?? 0) + count;
  }
}

/** One abort signal for the caller's cancellation and the run deadline. */
function linkAbortSignal(parent: AbortSignal | undefined, deadlineMs: number) {
  const controller = new AbortController();
  const onAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onAbort, { once: true });
  }

  const deadline = setTimeout(() => controller.abort(new Error(`Run deadline of ${deadlineMs}ms reached`)), deadlineMs);
  deadline.unref();

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(deadline);
      parent?.removeEventListener('abort', onAbort);
    },
  };
}

// ============ RUN ============
/**
 * Enumerates the directory, fans users out to a bounded worker pool and
 * funnels every outcome into the audit sink. Rejects only when the directory
 * cannot be read at all; everything else is folded into the summary.
 */
export async function runManifestAudit(deps: ManifestAuditDeps, options: ManifestAuditOptions): Promise<RunSummary> {
  const runId = options.runId ?? randomUUID();
  const now = options.now ?? (() => new Date());
  const metrics = deps.metrics ?? defaultMetrics;
  const log = createRunLogger(runId);
  const startedAt = now();
  const tally = new RunTally();
  const { signal, dispose } = linkAbortSignal(options.signal, options.runDeadlineMs);

  log.info({ maxWorkers: options.maxWorkers }, 'Starting manifest audit run');

  let adminCredential: DelegatedCredential;
  try {
    adminCredential = await deps.broker.acquire(options.adminUserEmail);
  } catch (error) {
    dispose();
    log.error({ admin: options.adminUserEmail, error: describeError(error) }, 'Admin credential unavailable');
    throw new EnumerationError('total', `Admin credential unavailable: ${describeError(error)}`, { cause: error });
  }

  const sink = deps.createSink(runId);
  const enumerator = new DirectoryEnumerator(deps.createDirectorySource(adminCredential), {
    excludeSuspended: options.excludeSuspendedUsers,
    retry: options.directoryRetry,
    callTimeoutMs: options.callTimeoutMs,
    logger: log,
  });

  const scanUser = async (user: DomainUser): Promise<void> => {
    if (signal.aborted) {
      tally.usersCancelled += 1;
      return;
    }

    const scanStart = Date.now();
    try {
      // Scoped to this user only; dropped when the scan ends
      const credential = await deps.broker.acquire(user.email);
      const projects = await deps.locator.listProjects(credential);
      tally.projectsFound += projects.length;

      // Projects left once the run is aborted are recorded as cancelled, not fetched
      const records: ManifestRecord[] = [];
      for (const project of projects) {
        const outcome: ExtractionOutcome = signal.aborted
          ? { status: 'cancelled', attempts: 0 }
          : await deps.extractor.extract(credential, project, signal);
        switch (outcome.status) {
          case 'success':
            tally.manifestsExtracted += 1;
            break;
          case 'failed':
            tally.manifestsFailed += 1;
            tally.recordError(`extraction.${outcome.reason}`);
            break;
          case 'cancelled':
            tally.manifestsCancelled += 1;
            break;
        }
        records.push(toManifestRecord(project, outcome));
      }

      await sink.append(records);
      tally.usersProcessed += 1;
      if (records.length > 0) {
        log.info({ owner: user.email, records: records.length }, 'User scanned');
      }
    } catch (error) {
      tally.usersFailed += 1;
      tally.recordError(errorClassOf(error));
      log.warn({ owner: user.email, errorClass: errorClassOf(error), error: describeError(error) }, 'User scan failed');
    } finally {
      metrics.histogram('user_scan_duration_ms', Date.now() - scanStart);
    }
  };

  const limit = pLimit(options.maxWorkers);
  const inFlight = new Set<Promise<void>>();
  // Users waiting for a free worker, on top of those running
  const maxQueued = options.maxWorkers * 2;
  let stoppedEarly = false;
  let fatal: unknown;

  try {
    for await (const user of enumerator.users()) {
      if (signal.aborted) {
        stoppedEarly = true;
        break;
      }
      tally.usersEnumerated += 1;

      const task: Promise<void> = limit(() => scanUser(user)).then(() => {
        inFlight.delete(task);
      });
      inFlight.add(task);

      while (inFlight.size >= options.maxWorkers + maxQueued) {
        await Promise.race(inFlight);
      }
    }
  } catch (error) {
    fatal = error;
  }

  await Promise.all(inFlight);
  const sinkStats = await sink.close();
  dispose();

  if (fatal !== undefined) {
    log.error({ error: describeError(fatal) }, 'Manifest audit run failed');
    throw fatal;
  }

  if (enumerator.stats.error) {
    tally.recordError(enumerator.stats.error.errorClass);
    tally.warnings.push(enumerator.stats.error.message);
  }
  for (const writeError of sinkStats.errors) {
    tally.recordError(writeError.errorClass);
  }
  const cancelled = stoppedEarly || tally.usersCancelled > 0 || tally.manifestsCancelled > 0;
  if (cancelled) {
    tally.warnings.push(`Run cancelled: ${describeError(signal.reason)}`);
  }

  let status: RunStatus = 'succeeded';
  if (sinkStats.batchesFailed > 0) {
    status = 'failed';
  } else if (cancelled) {
    status = 'cancelled';
  } else if (enumerator.stats.partial || tally.usersFailed > 0 || tally.manifestsFailed > 0) {
    status = 'partial';
  }

  const finishedAt = now();
  const summary: RunSummary = {
    runId,
    status,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    usersEnumerated: tally.usersEnumerated,
    usersSkipped: enumerator.stats.usersSkipped,
    usersProcessed: tally.usersProcessed,
    usersFailed: tally.usersFailed,
    usersCancelled: tally.usersCancelled,
    projectsFound: tally.projectsFound,
    manifestsExtracted: tally.manifestsExtracted,
    manifestsFailed: tally.manifestsFailed,
    manifestsCancelled: tally.manifestsCancelled,
    recordsWritten: sinkStats.recordsWritten,
    duplicatesDropped: sinkStats.duplicatesDropped,
    batchesFlushed: sinkStats.batchesFlushed,
    batchesFailed: sinkStats.batchesFailed,
    enumerationPartial: enumerator.stats.partial,
    errorsByClass: tally.errorsByClass,
    warnings: tally.warnings,
  };

  metrics.counter('users_enumerated_total', summary.usersEnumerated);
  metrics.counter('projects_found_total', summary.projectsFound);
  metrics.counter('manifests_total', summary.manifestsExtracted, { outcome: 'success' });
  metrics.counter('manifests_total', summary.manifestsFailed, { outcome: 'failed' });
  metrics.counter('manifests_total', summary.manifestsCancelled, { outcome: 'cancelled' });
  metrics.counter('rows_written_total', summary.recordsWritten);
  for (const [errorClass, count] of Object.entries(summary.errorsByClass)) {
    metrics.counter('errors_total', count, { class: errorClass });
  }
  metrics.histogram('run_duration_ms', summary.durationMs, { status });

  log.info({ summary }, 'Manifest audit run finished');
  return summary;
}

// ============ PRODUCTION WIRING ============
export function createManifestAuditJob(config: AppConfig): (signal?: AbortSignal) => Promise<RunSummary> {
  const { callTimeoutMs } = config;
  const broker = new CredentialBroker({
    serviceAccountEmail: config.serviceAccountEmail,
    signJwt: createIamJwtSigner(config.serviceAccountEmail),
    exchangeToken: createOAuthTokenExchanger(),
    allowedDomains: config.allowedDomains,
    retry: config.retry.auth,
    callTimeoutMs,
  });
  const locator = new ProjectLocator({
    source: createDriveScriptFileSource(),
    retry: config.retry.extraction,
    callTimeoutMs,
  });
  const extractor = new ManifestExtractor({
    source: createAppsScriptContentSource(),
    retry: config.retry.extraction,
    callTimeoutMs,
  });
  const writer = new BigQueryWarehouseWriter({
    projectId: config.projectId,
    datasetId: config.datasetId,
    tableId: config.tableId,
  });

  return (signal) =>
    runManifestAudit(
      {
        broker,
        createDirectorySource: (adminCredential) => createAdminDirectorySource(adminCredential),
        locator,
        extractor,
        createSink: (runId) =>
          new AuditSink({
            runId,
            writer,
            batchSize: config.batchSize,
            flushIntervalMs: config.flushIntervalMs,
            retry: config.retry.write,
            callTimeoutMs,
          }),
      },
      {
        adminUserEmail: config.adminUserEmail,
        maxWorkers: config.maxWorkers,
        excludeSuspendedUsers: config.excludeSuspendedUsers,
        directoryRetry: config.retry.extraction,
        callTimeoutMs,
        runDeadlineMs: config.runDeadlineMs,
        signal,
      }
    );
}
