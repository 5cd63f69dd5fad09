import type { StageContext } from '../context/stage-context.js';
import { ConfigError, toError } from '../runtime/errors.js';
import type { PipelineRunner } from '../runtime/runner.js';
import type { RunOutcome, RunReport } from '../runtime/types.js';
import { logger } from '../shared/logger.js';
import { BatchOptionsSchema, formatIssues } from '../shared/schemas.js';
import type {
  BatchItem,
  BatchOptions,
  BatchOptionsInput,
  BatchSummary,
  BatchSupplier,
  ContextFactory,
  ItemFailure,
  ItemSource,
} from './types.js';

export function batchItem(key: string, params: Record<string, unknown> = {}): BatchItem {
  if (!key) {
    throw new ConfigError('Batch item key must be a non-empty string');
  }
  return Object.freeze({ key, params: Object.freeze({ ...params }) });
}

export function parseBatchOptions(input: BatchOptionsInput = {}): BatchOptions {
  const parsed = BatchOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('Invalid batch options', formatIssues(parsed.error));
  }
  return parsed.data;
}

function isAsyncSource(source: ItemSource): source is AsyncIterable<BatchItem> {
  return Symbol.asyncIterator in source;
}

interface OpenSource {
  next(): Promise<IteratorResult<BatchItem>>;
  /** Ends the iteration early so the source can run its cleanup. Never rejects. */
  close(): Promise<void>;
}

function openSource(source: ItemSource): OpenSource {
  let closed = false;
  let finish: () => Promise<unknown>;
  let next: () => Promise<IteratorResult<BatchItem>>;
  if (isAsyncSource(source)) {
    const iterator = source[Symbol.asyncIterator]();
    next = () => iterator.next();
    finish = async () => iterator.return?.();
  } else {
    const iterator = source[Symbol.iterator]();
    next = async () => iterator.next();
    finish = async () => iterator.return?.();
  }
  return {
    next,
    async close() {
      if (closed) return;
      closed = true;
      try {
        await finish();
      } catch (err) {
        logger.warn('Closing the batch item source failed', { error: toError(err).message });
      }
    },
  };
}

function summarize(attempted: number, failed: number): RunOutcome {
  if (failed === 0) return 'SUCCESS';
  return failed === attempted ? 'FAILURE' : 'PARTIAL';
}

interface BatchState {
  stopRequested: boolean;
  attempted: number;
  succeeded: number;
  failed: ItemFailure[];
}

/**
 * Fans one pipeline out over many items. Each item gets a fresh context from
 * the factory and its own run; at most `maxParallel` runs are in flight.
 *
 * With onItemFailure 'STOP' the first item whose run rejects ends the batch:
 * nothing new is started and runBatch rejects with that item's error while
 * items already running finish on their own. With 'CONTINUE' failures are
 * collected in the summary and runBatch resolves once every item was tried.
 */
export class BatchRunner<C extends StageContext = StageContext> {
  constructor(private readonly runner: PipelineRunner<C>) {}

  /** Copy `params` into `ctx` and run once. No batch markers are written. */
  async runSeed(pipeline: string, ctx: C, params: Record<string, unknown>): Promise<RunReport<C>> {
    for (const [key, value] of Object.entries(params)) {
      ctx.put(key, value);
    }
    return this.runner.run(pipeline, ctx);
  }

  async runSupplied(
    pipeline: string,
    contextFactory: ContextFactory<C>,
    supplier: BatchSupplier,
    runParams: Record<string, unknown> = {},
    options?: BatchOptionsInput,
  ): Promise<BatchSummary> {
    const source = await supplier.items(runParams);
    return this.runBatch(pipeline, contextFactory, source, options);
  }

  async runBatch(
    pipeline: string,
    contextFactory: ContextFactory<C>,
    items: ItemSource,
    options?: BatchOptionsInput,
  ): Promise<BatchSummary> {
    const opts = parseBatchOptions(options);
    const source = openSource(items);
    const startedAt = new Date();
    const state: BatchState = { stopRequested: false, attempted: 0, succeeded: 0, failed: [] };

    let rejectStopped: (cause: Error) => void = () => undefined;
    const stopped = new Promise<never>((_resolve, reject) => {
      rejectStopped = reject;
    });
    const stopBatch = (cause?: Error): void => {
      state.stopRequested = true;
      void source.close();
      if (cause) rejectStopped(cause);
    };

    logger.info('Batch started', {
      pipeline,
      max_parallel: opts.maxParallel,
      on_item_failure: opts.onItemFailure,
      // informational only; runs are never cut short
      per_item_timeout_ms: opts.perItemTimeoutMs,
    });

    const worker = async (): Promise<void> => {
      while (!state.stopRequested) {
        let next: IteratorResult<BatchItem>;
        try {
          next = await source.next();
        } catch (err) {
          stopBatch();
          logger.error('Batch item source failed', { pipeline, error: toError(err).message });
          throw err;
        }
        if (next.done || state.stopRequested) return;
        await this.runItem(pipeline, contextFactory, next.value, opts, state, stopBatch);
      }
    };

    const workers = Array.from({ length: opts.maxParallel }, () => worker());
    await Promise.race([Promise.all(workers), stopped]);

    const finishedAt = new Date();
    const summary: BatchSummary = Object.freeze({
      pipeline,
      attempted: state.attempted,
      succeeded: state.succeeded,
      failed: Object.freeze([...state.failed]),
      outcome: summarize(state.attempted, state.failed.length),
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
    });
    logger.info('Batch completed', {
      pipeline,
      outcome: summary.outcome,
      attempted: summary.attempted,
      succeeded: summary.succeeded,
      failed: summary.failed.length,
    });
    return summary;
  }

  private async runItem(
    pipeline: string,
    contextFactory: ContextFactory<C>,
    item: BatchItem,
    opts: BatchOptions,
    state: BatchState,
    stopBatch: (cause: Error) => void,
  ): Promise<void> {
    state.attempted++;
    try {
      const ctx = contextFactory();
      ctx.putMetadata('batch', true);
      ctx.putMetadata('seed', item.key);
      for (const [key, value] of Object.entries(item.params)) {
        ctx.put(key, value);
      }
      await this.runner.run(pipeline, ctx);
      state.succeeded++;
    } catch (err) {
      const error = toError(err);
      if (state.stopRequested) {
        logger.debug('Batch item failed after stop; discarded', { pipeline, seed: item.key, error: error.message });
        return;
      }
      state.failed.push(Object.freeze({ key: item.key, error }));
      if (opts.onItemFailure === 'STOP') {
        logger.error('Batch item failed; stopping batch', { pipeline, seed: item.key, error: error.message });
        stopBatch(error);
      } else {
        logger.warn('Batch item failed; continuing', { pipeline, seed: item.key, error: error.message });
      }
    }
  }
}
