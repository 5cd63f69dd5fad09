import type { z } from 'zod';
import { ContextTypeError, ReservedKeyError } from '../runtime/errors.js';

/** Keys with this prefix belong to the runner; stages must not write them. */
export const RESERVED_PREFIX = '__';

export const RESERVED_KEYS = {
  pipeline: '__pipeline',
  stageId: '__stageId',
  attempt: '__attempt',
  runId: '__runId',
  batch: '__batch',
  seed: '__seed',
} as const;

export interface RunMetadata {
  pipeline?: string;
  stageId?: string;
  attempt?: number;
  runId?: string;
  batch?: boolean;
  seed?: string;
}

export type MetadataField = keyof RunMetadata;

export function isReservedKey(key: string): boolean {
  return key.startsWith(RESERVED_PREFIX);
}

/**
 * Key/value store shared by every stage of one run.
 *
 * User data lives next to runner metadata in one map. Metadata is written only
 * through putMetadata() and read back typed through metadata(); put() refuses
 * reserved keys so a stage cannot clobber the attempt counter or run id.
 */
export class StageContext {
  private readonly data = new Map<string, unknown>();

  constructor(initial?: Record<string, unknown>) {
    if (initial) {
      for (const [key, value] of Object.entries(initial)) {
        this.put(key, value);
      }
    }
  }

  put(key: string, value: unknown): this {
    if (isReservedKey(key)) {
      throw new ReservedKeyError(key);
    }
    this.data.set(key, value);
    return this;
  }

  putMetadata<K extends MetadataField>(field: K, value: RunMetadata[K]): this {
    this.data.set(RESERVED_KEYS[field], value);
    return this;
  }

  get(key: string): unknown {
    return this.data.get(key);
  }

  has(key: string): boolean {
    return this.data.has(key);
  }

  /**
   * Read a value and check it against a schema.
   * Absent keys are checked too, so an optional schema accepts them.
   */
  getAs<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    const parsed = schema.safeParse(this.data.get(key));
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => i.message).join('; ');
      throw new ContextTypeError(key, detail);
    }
    return parsed.data;
  }

  getOr<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
    if (!this.data.has(key)) return fallback;
    return this.getAs(key, schema);
  }

  delete(key: string): boolean {
    if (isReservedKey(key)) {
      throw new ReservedKeyError(key);
    }
    return this.data.delete(key);
  }

  /** User keys in insertion order; reserved keys are left out. */
  keys(): string[] {
    return [...this.data.keys()].filter((k) => !isReservedKey(k));
  }

  entries(): Array<[string, unknown]> {
    return [...this.data.entries()].filter(([k]) => !isReservedKey(k));
  }

  metadata(): Readonly<RunMetadata> {
    const meta: RunMetadata = {};
    const pipeline = this.data.get(RESERVED_KEYS.pipeline);
    if (typeof pipeline === 'string') meta.pipeline = pipeline;
    const stageId = this.data.get(RESERVED_KEYS.stageId);
    if (typeof stageId === 'string') meta.stageId = stageId;
    const attempt = this.data.get(RESERVED_KEYS.attempt);
    if (typeof attempt === 'number') meta.attempt = attempt;
    const runId = this.data.get(RESERVED_KEYS.runId);
    if (typeof runId === 'string') meta.runId = runId;
    const batch = this.data.get(RESERVED_KEYS.batch);
    if (typeof batch === 'boolean') meta.batch = batch;
    const seed = this.data.get(RESERVED_KEYS.seed);
    if (typeof seed === 'string') meta.seed = seed;
    return Object.freeze(meta);
  }

  toJSON(): Record<string, unknown> {
    return Object.fromEntries(this.entries());
  }
}
