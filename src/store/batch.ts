import type { BatchSummary, OnProgress } from "../catalog/types.js";
import type { Logger } from "../logging/logger.js";
import type { QueryExecutor } from "./executor.js";
import type { TableSchema } from "./schema.js";
import type { InputRow, UpsertOptions } from "./upsert.js";
import { upsertRows } from "./upsert.js";

export const DEFAULT_BATCH_SIZE = 500;

export type BatchUpserterParams = {
  db: QueryExecutor;
  schema: TableSchema;
  batchSize?: number;
  upsert?: UpsertOptions;
  logger?: Logger;
  onProgress?: OnProgress;
};

/**
 * Buffers rows and writes them `batchSize` at a time, one transaction per
 * batch. A failed batch is rolled back, logged and counted; later batches
 * are still written.
 */
export class BatchUpserter {
  private readonly params: BatchUpserterParams;
  private readonly batchSize: number;
  private pending: InputRow[] = [];
  private batchIndex = 0;
  private readonly summary: BatchSummary = {
    batches_flushed: 0,
    batches_failed: 0,
    rows_written: 0,
    rows_failed: 0,
  };

  constructor(params: BatchUpserterParams) {
    const batchSize = params.batchSize ?? DEFAULT_BATCH_SIZE;
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new Error(`batch size must be a positive integer, got ${batchSize}`);
    }
    this.params = params;
    this.batchSize = batchSize;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /** Queue a row, flushing when the batch is full. */
  add(row: InputRow): void {
    this.pending.push(row);
    if (this.pending.length >= this.batchSize) {
      this.flush();
    }
  }

  /** Write whatever is queued. Returns false when the batch failed. */
  flush(): boolean {
    if (this.pending.length === 0) {
      return true;
    }
    const rows = this.pending;
    this.pending = [];
    this.batchIndex += 1;
    const { db, schema, upsert, logger, onProgress } = this.params;
    try {
      upsertRows(db, schema, rows, upsert);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.summary.batches_failed += 1;
      this.summary.rows_failed += rows.length;
      logger?.error(`batch ${this.batchIndex} of ${rows.length} rows into ${schema.name} failed`, err);
      onProgress?.({
        type: "catalog.batch.failed",
        table: schema.name,
        row_count: rows.length,
        batch_index: this.batchIndex,
        error: message,
      });
      return false;
    }
    this.summary.batches_flushed += 1;
    this.summary.rows_written += rows.length;
    logger?.info(`batch of ${rows.length} records upserted into ${schema.name}`);
    onProgress?.({
      type: "catalog.batch.flushed",
      table: schema.name,
      row_count: rows.length,
      batch_index: this.batchIndex,
    });
    return true;
  }

  /** Flush the remainder and report totals. */
  finish(): BatchSummary {
    this.flush();
    return { ...this.summary };
  }
}
