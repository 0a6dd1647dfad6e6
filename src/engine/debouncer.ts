/**
 * Batch Debouncer — turns a burst of arrivals into one batch per
 * (environment, hot folder) key.
 *
 * Each arrival appends to the key's pending batch and replaces its
 * deadline. A batch is emitted only once the key has been quiet for
 * `delayMs`. Keys never share state, so a flush of one key cannot
 * touch another.
 */

import path from 'node:path';
import type { Environment } from './registry.js';
import type { PendingBatchPolicy } from '../config/schema.js';
import type { Logger } from '../utils/logger.js';

export interface CompletedBatch {
  key: string;
  environment: Environment;
  hotFolder: string;
  /** Arrival order, no duplicates. */
  files: string[];
}

interface PendingBatch {
  environment: Environment;
  hotFolder: string;
  files: string[];
  seen: Set<string>;
  timer: ReturnType<typeof setTimeout>;
}

export function instanceKey(environment: string, hotFolder: string): string {
  return `${environment}::${path.resolve(hotFolder)}`;
}

export interface BatchDebouncerOptions {
  delayMs: number;
  onBatch: (batch: CompletedBatch) => void;
  logger?: Logger;
}

export class BatchDebouncer {
  private readonly pending = new Map<string, PendingBatch>();
  private closed = false;

  constructor(private readonly options: BatchDebouncerOptions) {
    if (!(options.delayMs > 0)) {
      throw new RangeError(`batch delay must be positive, got ${options.delayMs}`);
    }
  }

  /**
   * Record an arrival. Returns false if the debouncer is shut down or the
   * path was already pending (the deadline is restarted either way while open).
   */
  add(environment: Environment, hotFolder: string, filePath: string): boolean {
    if (this.closed) {
      this.options.logger?.warn(`${environment.name}: ignoring ${filePath}, debouncer is shut down`);
      return false;
    }
    const key = instanceKey(environment.name, hotFolder);
    let batch = this.pending.get(key);
    let added = true;
    if (batch) {
      clearTimeout(batch.timer);
      if (batch.seen.has(filePath)) {
        added = false;
      } else {
        batch.files.push(filePath);
        batch.seen.add(filePath);
      }
      batch.timer = this.arm(key);
    } else {
      batch = {
        environment,
        hotFolder,
        files: [filePath],
        seen: new Set([filePath]),
        timer: this.arm(key),
      };
      this.pending.set(key, batch);
    }
    this.options.logger?.debug(
      `${environment.name}: batch ${batch.files.length} file(s), settling ${this.options.delayMs}ms`,
    );
    return added;
  }

  /** Files currently waiting under `key`, in arrival order. */
  pendingFiles(key: string): readonly string[] {
    return this.pending.get(key)?.files ?? [];
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Stop accepting arrivals and settle every outstanding batch according to
   * `policy`. Returns the batches that were flushed or dropped.
   */
  shutdown(policy: PendingBatchPolicy): CompletedBatch[] {
    this.closed = true;
    const settled: CompletedBatch[] = [];
    for (const key of [...this.pending.keys()]) {
      const batch = this.take(key);
      if (!batch) continue;
      settled.push(batch);
      if (policy === 'flush') {
        this.options.onBatch(batch);
      } else {
        this.options.logger?.info(
          `${batch.environment.name}: dropped pending batch of ${batch.files.length} file(s); files stay in ${batch.hotFolder}`,
        );
      }
    }
    return settled;
  }

  private arm(key: string): ReturnType<typeof setTimeout> {
    return setTimeout(() => {
      const batch = this.take(key);
      if (batch) this.options.onBatch(batch);
    }, this.options.delayMs);
  }

  private take(key: string): CompletedBatch | undefined {
    const batch = this.pending.get(key);
    if (!batch) return undefined;
    clearTimeout(batch.timer);
    this.pending.delete(key);
    return {
      key,
      environment: batch.environment,
      hotFolder: batch.hotFolder,
      files: batch.files,
    };
  }
}
