import { google } from 'googleapis';
import type { bigquery_v2 } from 'googleapis';
import { WriteError } from '../lib/errors';
import type { InsertRow } from '../types';

export interface WarehouseWriter {
  /** Appends rows as one request; rejects if any row was not stored. */
  insertRows(rows: InsertRow[]): Promise<void>;
}

export interface TableRef {
  projectId: string;
  datasetId: string;
  tableId: string;
}

/**
 * Streaming inserts into an append-only table. Insert ids let BigQuery drop
 * rows from a retried request that already landed.
 */
export class BigQueryWarehouseWriter implements WarehouseWriter {
  private readonly bigquery: bigquery_v2.Bigquery;

  constructor(private readonly table: TableRef) {
    const auth = new google.auth.GoogleAuth({
      scopes: ['https://www.googleapis.com/auth/bigquery.insertdata'],
    });
    this.bigquery = google.bigquery({ version: 'v2', auth });
  }

  async insertRows(rows: InsertRow[]): Promise<void> {
    if (rows.length === 0) return;

    const res = await this.bigquery.tabledata.insertAll({
      projectId: this.table.projectId,
      datasetId: this.table.datasetId,
      tableId: this.table.tableId,
      requestBody: {
        kind: 'bigquery#tableDataInsertAllRequest',
        skipInvalidRows: false,
        ignoreUnknownValues: false,
        rows: rows.map((row) => ({ insertId: row.insertId, json: row.json })),
      },
    });

    // With skipInvalidRows off a single bad row rejects the whole request
    const insertErrors = res.data.insertErrors ?? [];
    if (insertErrors.length > 0) {
      const reasons = new Set(
        insertErrors.flatMap((entry) => (entry.errors ?? []).map((err) => err.reason ?? 'unknown'))
      );
      throw new WriteError(
        'fatal-configuration',
        `BigQuery rejected ${insertErrors.length} of ${rows.length} rows (${[...reasons].join(', ')})`
      );
    }
  }
}
