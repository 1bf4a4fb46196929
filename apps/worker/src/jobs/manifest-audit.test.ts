import { describe, expect, it, vi } from 'vitest';
import { AuthError, EnumerationError, ExtractionError } from '../lib/errors';
import type { Metrics } from '../lib/metrics';
import { AuditSink } from '../services/audit-sink';
import type { DirectoryPage, DirectoryPageSource } from '../services/directory-enumerator';
import { FakeWarehouse, apiError, fakeCredential, instantRetry } from '../test-helpers';
import type { DelegatedCredential, ExtractionOutcome, ScriptProject } from '../types';
import { runManifestAudit } from './manifest-audit';
import type { ManifestAuditDeps, ManifestAuditOptions } from './manifest-audit';

const ADMIN = 'admin@example.com';
const STARTED = new Date('2026-01-01T00:00:00.000Z');
const FINISHED = new Date('2026-01-01T00:02:30.000Z');

function project(scriptId: string, ownerEmail: string): ScriptProject {
  return { scriptId, title: `Project ${scriptId}`, ownerEmail, container: 'user-drive' };
}

function pagesOf(pages: DirectoryPage[]): DirectoryPageSource {
  return async (pageToken) => pages[pageToken ? Number(pageToken) : 0];
}

interface Scenario {
  pages?: DirectoryPage[];
  directory?: DirectoryPageSource;
  projects?: Record<string, string[]>;
  outcomes?: Record<string, ExtractionOutcome>;
  acquire?: (email: string) => Promise<DelegatedCredential>;
  listProjects?: (credential: DelegatedCredential) => Promise<ScriptProject[]>;
  extract?: (credential: DelegatedCredential, target: ScriptProject) => Promise<ExtractionOutcome>;
}

function setup(scenario: Scenario, overrides: Partial<ManifestAuditOptions> = {}) {
  const warehouse = new FakeWarehouse();
  const metrics: Metrics = { counter: vi.fn(), histogram: vi.fn() };
  const acquire = vi.fn(scenario.acquire ?? (async (email: string) => fakeCredential(email)));
  const listProjects = vi.fn(
    scenario.listProjects ??
      (async (credential: DelegatedCredential) =>
        (scenario.projects?.[credential.subject] ?? []).map((id) => project(id, credential.subject)))
  );
  const extract = vi.fn<ManifestAuditDeps['extractor']['extract']>(
    scenario.extract ??
      (async (_credential: DelegatedCredential, target: ScriptProject): Promise<ExtractionOutcome> =>
        scenario.outcomes?.[target.scriptId] ?? {
          status: 'success',
          content: `{"id":"${target.scriptId}"}`,
          attempts: 1,
        })
  );

  const deps: ManifestAuditDeps = {
    broker: { acquire },
    createDirectorySource: () => scenario.directory ?? pagesOf(scenario.pages ?? []),
    locator: { listProjects },
    extractor: { extract },
    createSink: (runId) =>
      new AuditSink({
        runId,
        writer: warehouse,
        batchSize: 500,
        flushIntervalMs: 0,
        retry: instantRetry(3),
        callTimeoutMs: 1000,
      }),
    metrics,
  };
  const options: ManifestAuditOptions = {
    adminUserEmail: ADMIN,
    maxWorkers: 2,
    excludeSuspendedUsers: true,
    directoryRetry: instantRetry(3),
    callTimeoutMs: 1000,
    runDeadlineMs: 60_000,
    runId: 'run-1',
    now: vi.fn<() => Date>().mockReturnValueOnce(STARTED).mockReturnValue(FINISHED),
    ...overrides,
  };

  return { run: () => runManifestAudit(deps, options), warehouse, metrics, acquire, listProjects, extract };
}

const twoUsers: DirectoryPage[] = [
  {
    users: [
      { primaryEmail: 'alice@example.com' },
      { primaryEmail: 'bob@example.com' },
      { primaryEmail: 'carol@example.com', suspended: true },
    ],
  },
];

describe('runManifestAudit', () => {
  it('records every project of every active user', async () => {
    const { run, warehouse, acquire } = setup({
      pages: twoUsers,
      projects: { 'alice@example.com': ['p1', 'p2'], 'bob@example.com': ['p3'] },
    });

    const summary = await run();

    expect(summary).toMatchObject({
      runId: 'run-1',
      status: 'succeeded',
      startedAt: '2026-01-01T00:00:00.000Z',
      finishedAt: '2026-01-01T00:02:30.000Z',
      durationMs: 150_000,
      usersEnumerated: 2,
      usersSkipped: 1,
      usersProcessed: 2,
      usersFailed: 0,
      projectsFound: 3,
      manifestsExtracted: 3,
      manifestsFailed: 0,
      manifestsCancelled: 0,
      recordsWritten: 3,
      batchesFlushed: 1,
      batchesFailed: 0,
      enumerationPartial: false,
      errorsByClass: {},
      warnings: [],
    });
    const rows = warehouse.table.map((row) => [row.json.script_id, row.json.owner_email]).sort();
    expect(rows).toEqual([
      ['p1', 'alice@example.com'],
      ['p2', 'alice@example.com'],
      ['p3', 'bob@example.com'],
    ]);
    expect(acquire.mock.calls.map(([email]) => email).sort()).toEqual([
      'admin@example.com',
      'alice@example.com',
      'bob@example.com',
    ]);
  });

  it('keeps a row for a manifest that could not be extracted', async () => {
    const { run, warehouse } = setup({
      pages: twoUsers,
      projects: { 'alice@example.com': ['p1', 'p2'], 'bob@example.com': ['p3'] },
      outcomes: { p2: { status: 'failed', reason: 'quota', message: 'Quota exceeded', attempts: 3 } },
    });

    const summary = await run();

    expect(summary).toMatchObject({
      status: 'partial',
      manifestsExtracted: 2,
      manifestsFailed: 1,
      recordsWritten: 3,
      errorsByClass: { 'extraction.quota': 1 },
    });
    const failed = warehouse.table.find((row) => row.json.script_id === 'p2');
    expect(failed?.json).toMatchObject({ manifest_content: '', extraction_error: 'quota', owner_email: 'alice@example.com' });
  });

  it('carries on when one user cannot be scanned', async () => {
    const { run, warehouse } = setup({
      pages: twoUsers,
      listProjects: async (credential) => {
        if (credential.subject === 'bob@example.com') {
          throw new ExtractionError('permission-denied', 'Forbidden');
        }
        return [project('p1', credential.subject)];
      },
    });

    const summary = await run();

    expect(summary).toMatchObject({
      status: 'partial',
      usersProcessed: 1,
      usersFailed: 1,
      recordsWritten: 1,
      errorsByClass: { 'extraction.permission-denied': 1 },
    });
    expect(warehouse.table.map((row) => row.json.owner_email)).toEqual(['alice@example.com']);
  });

  it('counts a user whose delegation is refused', async () => {
    const { run, listProjects } = setup({
      pages: twoUsers,
      acquire: async (email) => {
        if (email === 'bob@example.com') throw new AuthError('unauthorized', 'unauthorized_client');
        return fakeCredential(email);
      },
    });

    const summary = await run();

    expect(summary).toMatchObject({ status: 'partial', usersFailed: 1, errorsByClass: { 'auth.unauthorized': 1 } });
    expect(listProjects.mock.calls.map(([credential]) => credential.subject)).toEqual(['alice@example.com']);
  });

  it('drops a script reported twice in the same run', async () => {
    const { run, warehouse } = setup({
      pages: twoUsers,
      projects: { 'alice@example.com': ['shared-1'], 'bob@example.com': ['shared-1', 'p3'] },
    });

    const summary = await run();

    expect(summary).toMatchObject({ recordsWritten: 2, duplicatesDropped: 1 });
    expect(warehouse.table.map((row) => row.json.script_id).sort()).toEqual(['p3', 'shared-1']);
  });

  it('fails the run when the admin credential cannot be obtained', async () => {
    const { run, listProjects } = setup({
      pages: twoUsers,
      acquire: async () => {
        throw new AuthError('unauthorized', 'unauthorized_client');
      },
    });

    const result = run();

    await expect(result).rejects.toBeInstanceOf(EnumerationError);
    await expect(result).rejects.toMatchObject({ kind: 'total' });
    await expect(result).rejects.toThrow('Admin credential unavailable: unauthorized_client');
    expect(listProjects).not.toHaveBeenCalled();
  });

  it('fails the run when the directory cannot be read at all', async () => {
    const { run, warehouse } = setup({ directory: async () => Promise.reject(apiError(403)) });

    await expect(run()).rejects.toMatchObject({ kind: 'total' });
    expect(warehouse.attempts).toEqual([]);
  });

  it('finishes the users already listed when the directory breaks off', async () => {
    const directory = vi
      .fn<DirectoryPageSource>()
      .mockResolvedValueOnce({ users: [{ primaryEmail: 'alice@example.com' }], nextPageToken: '1' })
      .mockRejectedValue(apiError(503));
    const { run, warehouse } = setup({ directory, projects: { 'alice@example.com': ['p1'] } });

    const summary = await run();

    expect(summary).toMatchObject({
      status: 'partial',
      enumerationPartial: true,
      usersProcessed: 1,
      recordsWritten: 1,
      errorsByClass: { 'enumeration.partial': 1 },
      warnings: ['Directory listing stopped after 1 pages: Request failed with status 503'],
    });
    expect(warehouse.table).toHaveLength(1);
  });

  it('stops handing out users once cancelled and flushes what it has', async () => {
    const controller = new AbortController();
    let aliceStarted: () => void = () => {};
    const aliceScanning = new Promise<void>((resolve) => {
      aliceStarted = resolve;
    });

    const directory: DirectoryPageSource = async (pageToken) => {
      if (!pageToken) {
        return { users: [{ primaryEmail: 'alice@example.com' }], nextPageToken: '1' };
      }
      await aliceScanning;
      controller.abort(new Error('deployment timeout'));
      return { users: [{ primaryEmail: 'bob@example.com' }] };
    };
    const { run, warehouse, acquire } = setup(
      {
        directory,
        listProjects: async (credential) => {
          aliceStarted();
          return [project('p1', credential.subject)];
        },
      },
      { maxWorkers: 1, signal: controller.signal }
    );

    const summary = await run();

    expect(summary).toMatchObject({
      status: 'cancelled',
      usersEnumerated: 1,
      usersProcessed: 1,
      recordsWritten: 1,
      warnings: ['Run cancelled: deployment timeout'],
    });
    expect(warehouse.table.map((row) => row.json.script_id)).toEqual(['p1']);
    expect(acquire.mock.calls.map(([email]) => email)).toEqual(['admin@example.com', 'alice@example.com']);
  });

  it('stops fetching manifests of a running user once cancelled', async () => {
    const controller = new AbortController();
    const scriptIds = Array.from({ length: 50 }, (_, i) => `p${i + 1}`);
    const { run, warehouse, extract } = setup(
      {
        pages: [{ users: [{ primaryEmail: 'alice@example.com' }] }],
        projects: { 'alice@example.com': scriptIds },
        extract: async (_credential, target) => {
          controller.abort(new Error('deployment timeout'));
          return { status: 'success', content: `{"id":"${target.scriptId}"}`, attempts: 1 };
        },
      },
      { signal: controller.signal }
    );

    const summary = await run();

    expect(extract).toHaveBeenCalledTimes(1);
    expect(summary).toMatchObject({
      status: 'cancelled',
      usersProcessed: 1,
      projectsFound: 50,
      manifestsExtracted: 1,
      manifestsFailed: 0,
      manifestsCancelled: 49,
      recordsWritten: 50,
      warnings: ['Run cancelled: deployment timeout'],
    });
    const tags = warehouse.table.map((row) => row.json.extraction_error);
    expect(tags.filter((tag) => tag === null)).toHaveLength(1);
    expect(tags.filter((tag) => tag === 'cancelled')).toHaveLength(49);
    expect(warehouse.table.find((row) => row.json.script_id === 'p2')?.json.manifest_content).toBe('');
  });

  it('passes the run signal to the extractor', async () => {
    const controller = new AbortController();
    const { run, extract } = setup(
      { pages: [{ users: [{ primaryEmail: 'alice@example.com' }] }], projects: { 'alice@example.com': ['p1'] } },
      { signal: controller.signal }
    );

    await run();

    const [, , signal] = extract.mock.calls[0];
    expect(signal).toBeInstanceOf(AbortSignal);
    expect(signal?.aborted).toBe(false);
  });

  it('fails the run when a batch cannot be written', async () => {
    const { run, warehouse } = setup({ pages: twoUsers, projects: { 'alice@example.com': ['p1'] } });
    warehouse.failures.push({ error: apiError(400, 'invalid') });

    const summary = await run();

    expect(summary).toMatchObject({
      status: 'failed',
      batchesFailed: 1,
      recordsWritten: 0,
      errorsByClass: { 'write.fatal-configuration': 1 },
    });
  });

  it('scans at most maxWorkers users at once and pauses the directory at the in-flight cap', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const emails = Array.from({ length: 10 }, (_, i) => `user${i}@example.com`);
    const directory = vi.fn<DirectoryPageSource>(async (pageToken) => {
      const index = pageToken ? Number(pageToken) : 0;
      return {
        users: [{ primaryEmail: emails[index] }],
        nextPageToken: index + 1 < emails.length ? String(index + 1) : undefined,
      };
    });
    let active = 0;
    let peak = 0;
    const { run, listProjects } = setup(
      {
        directory,
        listProjects: async () => {
          active += 1;
          peak = Math.max(peak, active);
          await gate;
          active -= 1;
          return [];
        },
      },
      { maxWorkers: 2 }
    );

    const pending = run();
    // Two running plus twice maxWorkers queued
    await vi.waitFor(() => {
      expect(directory).toHaveBeenCalledTimes(6);
    });
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(directory).toHaveBeenCalledTimes(6);
    expect(listProjects).toHaveBeenCalledTimes(2);

    release();
    const summary = await pending;

    expect(peak).toBe(2);
    expect(directory).toHaveBeenCalledTimes(10);
    expect(summary).toMatchObject({ status: 'succeeded', usersEnumerated: 10, usersProcessed: 10 });
  });

  it('keeps the other workers going while one user call stalls', async () => {
    let failStalled: (error: Error) => void = () => {};
    const stalled = new Promise<never>((_, reject) => {
      failStalled = reject;
    });
    const emails = Array.from({ length: 6 }, (_, i) => `user${i}@example.com`);
    const { run, listProjects } = setup(
      {
        pages: [{ users: emails.map((primaryEmail) => ({ primaryEmail })) }],
        listProjects: async (credential) => {
          if (credential.subject === 'user0@example.com') {
            return stalled;
          }
          return [project(`${credential.subject}-p1`, credential.subject)];
        },
      },
      { maxWorkers: 2 }
    );

    const pending = run();
    await vi.waitFor(() => {
      expect(listProjects).toHaveBeenCalledTimes(6);
    });
    failStalled(new ExtractionError('transient', 'drive.files.list timed out after 1000ms'));
    const summary = await pending;

    expect(summary).toMatchObject({
      status: 'partial',
      usersProcessed: 5,
      usersFailed: 1,
      recordsWritten: 5,
      errorsByClass: { 'extraction.transient': 1 },
    });
  });

  it('emits run metrics', async () => {
    const { run, metrics } = setup({ pages: twoUsers, projects: { 'alice@example.com': ['p1'] } });

    await run();

    expect(metrics.counter).toHaveBeenCalledWith('users_enumerated_total', 2);
    expect(metrics.counter).toHaveBeenCalledWith('rows_written_total', 1);
    expect(metrics.histogram).toHaveBeenCalledWith('run_duration_ms', 150_000, { status: 'succeeded' });
  });
});
