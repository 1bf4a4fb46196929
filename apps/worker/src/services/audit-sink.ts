import { WriteError, classifyWriteError } from '../lib/errors';
import { createModuleLogger } from '../lib/logger';
import type { Logger } from '../lib/logger';
import { withRetry, withTimeout } from '../lib/retry';
import type { RetryPolicy } from '../lib/retry';
import type { InsertRow, ManifestRecord, StampedManifestRecord, WarehouseRow } from '../types';
import type { WarehouseWriter } from './warehouse-writer';

// ============ TYPES ============
export interface AuditSinkOptions {
  runId: string;
  writer: WarehouseWriter;
  batchSize: number;
  /** 0 disables time-based flushing. */
  flushIntervalMs: number;
  retry: RetryPolicy;
  callTimeoutMs: number;
  clock?: () => Date;
  logger?: Logger;
}

export interface SinkStats {
  recordsAccepted: number;
  duplicatesDropped: number;
  recordsWritten: number;
  recordsFailed: number;
  batchesFlushed: number;
  batchesFailed: number;
  errors: WriteError[];
}

export function toWarehouseRow(record: StampedManifestRecord): WarehouseRow {
  return {
    script_id: record.scriptId,
    script_name: record.scriptName,
    owner_email: record.ownerEmail,
    manifest_content: record.manifestContent,
    extraction_error: record.extractionError,
    extraction_date: record.extractionDate.toISOString(),
  };
}

// ============ SINK ============
/**
 * Shared by every worker of a run. Appends land in one buffer; flushes are
 * chained so only one batch is in flight at a time, and records appended
 * during a flush wait for the next batch.
 */
export class AuditSink {
  readonly stats: SinkStats = {
    recordsAccepted: 0,
    duplicatesDropped: 0,
    recordsWritten: 0,
    recordsFailed: 0,
    batchesFlushed: 0,
    batchesFailed: 0,
    errors: [],
  };

  private readonly buffer: ManifestRecord[] = [];
  private readonly accepted = new Set<string>();
  private flushChain: Promise<void> = Promise.resolve();
  private timer?: NodeJS.Timeout;
  private closed = false;
  private readonly clock: () => Date;
  private readonly log: Logger;

  constructor(private readonly options: AuditSinkOptions) {
    this.clock = options.clock ?? (() => new Date());
    this.log = options.logger ?? createModuleLogger('audit-sink');

    if (options.flushIntervalMs > 0) {
      this.timer = setInterval(() => {
        if (this.buffer.length === 0) return;
        this.flush().catch((error: unknown) => {
          this.log.error({ error }, 'Interval flush failed');
        });
      }, options.flushIntervalMs);
      this.timer.unref();
    }
  }

  get pending(): number {
    return this.buffer.length;
  }

  /** Twice the batch size; appends wait for a flush rather than grow past it. */
  get capacity(): number {
    return this.options.batchSize * 2;
  }

  /**
   * Buffers records, dropping script ids already accepted in this run. Waits
   * for a flush while the buffer is at capacity and once a full batch is
   * buffered.
   */
  async append(records: readonly ManifestRecord[]): Promise<void> {
    if (this.closed) {
      throw new WriteError('fatal-configuration', 'Audit sink is closed');
    }

    for (const record of records) {
      if (this.accepted.has(record.scriptId)) {
        this.stats.duplicatesDropped += 1;
        this.log.debug({ scriptId: record.scriptId }, 'Duplicate record dropped');
        continue;
      }
      this.accepted.add(record.scriptId);
      while (this.buffer.length >= this.capacity) {
        await this.enqueueFlush(true);
      }
      this.buffer.push(record);
      this.stats.recordsAccepted += 1;
    }

    if (this.buffer.length >= this.options.batchSize) {
      await this.enqueueFlush(true);
    }
  }

  /** Writes everything buffered so far. Failed batches are counted, not thrown. */
  flush(): Promise<void> {
    return this.enqueueFlush(false);
  }

  /** Stops the interval timer and flushes what is left. */
  async close(): Promise<SinkStats> {
    this.closed = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await this.flush();
    return this.stats;
  }

  private enqueueFlush(fullBatchesOnly: boolean): Promise<void> {
    const next = this.flushChain.then(() => this.drain(fullBatchesOnly));
    this.flushChain = next;
    return next;
  }

  private async drain(fullBatchesOnly: boolean): Promise<void> {
    const minimum = fullBatchesOnly ? this.options.batchSize : 1;
    while (this.buffer.length >= minimum) {
      const batch = this.buffer.splice(0, this.options.batchSize);
      await this.writeBatch(batch);
    }
  }

  private async writeBatch(batch: ManifestRecord[]): Promise<void> {
    // One timestamp per batch, reused by every retry of it
    const extractionDate = this.clock();
    const rows: InsertRow[] = batch.map((record) => ({
      insertId: `${this.options.runId}:${record.scriptId}`,
      json: toWarehouseRow({ ...record, extractionDate }),
    }));

    try {
      await withRetry(
        () => withTimeout(this.options.writer.insertRows(rows), this.options.callTimeoutMs, 'bigquery.insertAll'),
        {
          label: 'bigquery.insertAll',
          policy: this.options.retry,
          classify: classifyWriteError,
          logger: this.log,
        }
      );
      this.stats.batchesFlushed += 1;
      this.stats.recordsWritten += rows.length;
      this.log.info({ rows: rows.length, extractionDate: extractionDate.toISOString() }, 'Batch flushed');
    } catch (error) {
      const failure = classifyWriteError(error);
      this.stats.batchesFailed += 1;
      this.stats.recordsFailed += rows.length;
      this.stats.errors.push(failure);
      this.log.error({ rows: rows.length, kind: failure.kind, error: failure.message }, 'Batch could not be written');
    }
  }
}
