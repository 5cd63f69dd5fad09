import type { z } from 'zod';
import type { StageContext } from '../context/stage-context.js';
import type { RunOutcome } from '../runtime/types.js';
import type { BatchOptionsSchema, ItemFailurePolicySchema } from '../shared/schemas.js';

export interface BatchItem {
  /** Stable key for idempotency and diagnostics. Keep secrets out of it. */
  readonly key: string;
  readonly params: Readonly<Record<string, unknown>>;
}

export type ItemFailurePolicy = z.infer<typeof ItemFailurePolicySchema>;

export type BatchOptions = z.infer<typeof BatchOptionsSchema>;

export type BatchOptionsInput = z.input<typeof BatchOptionsSchema>;

/** Finite, one-shot source of items. */
export type ItemSource = Iterable<BatchItem> | AsyncIterable<BatchItem>;

export type ContextFactory<C extends StageContext = StageContext> = () => C;

/**
 * Produces the items of one batch, e.g. by listing files or paging an API.
 */
export interface BatchSupplier {
  items(runParams: Readonly<Record<string, unknown>>): ItemSource | Promise<ItemSource>;
}

export interface ItemFailure {
  readonly key: string;
  readonly error: Error;
}

export interface BatchSummary {
  readonly pipeline: string;
  readonly attempted: number;
  readonly succeeded: number;
  readonly failed: readonly ItemFailure[];
  /** SUCCESS with no failures, FAILURE when every attempted item failed, PARTIAL otherwise. */
  readonly outcome: RunOutcome;
  readonly startedAt: string;
  readonly finishedAt: string;
}
