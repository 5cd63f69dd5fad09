import { describe, it, expect } from '@jest/globals';
import { z } from 'zod';
import { BatchRunner, batchItem, parseBatchOptions } from '../batch/batch-runner.js';
import type { BatchItem, BatchSupplier } from '../batch/types.js';
import { StageContext } from '../context/stage-context.js';
import { ConfigError, ReservedKeyError } from '../runtime/errors.js';
import { PipelineRunner } from '../runtime/runner.js';
import type { StageFn } from '../runtime/types.js';
import { delay, makeRegistry } from './test-helpers.js';

function batchFor(execute: StageFn, onFailure: 'halt' | 'continue' = 'halt'): BatchRunner {
  const registry = makeRegistry('items', [{ id: 'work', execute }]);
  return new BatchRunner(new PipelineRunner({ registry, onFailure }));
}

function items(...keys: string[]): BatchItem[] {
  return keys.map((key) => batchItem(key, { name: key }));
}

describe('BatchRunner.runBatch', () => {
  it('runs every item exactly once', async () => {
    let calls = 0;
    const batch = batchFor(() => {
      calls++;
    });

    const summary = await batch.runBatch('items', () => new StageContext(), items('a', 'b'), { maxParallel: 2 });

    expect(calls).toBe(2);
    expect(summary).toMatchObject({ pipeline: 'items', attempted: 2, succeeded: 2, failed: [], outcome: 'SUCCESS' });
  });

  it('gives each item its own fresh context with batch metadata and params', async () => {
    const contexts: StageContext[] = [];
    const seen: Array<{ seed?: string; batch?: boolean; name: string }> = [];
    const batch = batchFor((ctx) => {
      const meta = ctx.metadata();
      seen.push({ seed: meta.seed, batch: meta.batch, name: ctx.getAs('name', z.string()) });
      ctx.put('touched', true);
    });

    await batch.runBatch(
      'items',
      () => {
        const ctx = new StageContext();
        contexts.push(ctx);
        return ctx;
      },
      items('x', 'y', 'z'),
      { maxParallel: 3 },
    );

    expect(contexts).toHaveLength(3);
    expect(new Set(contexts).size).toBe(3);
    expect(seen.sort((l, r) => l.name.localeCompare(r.name))).toEqual([
      { seed: 'x', batch: true, name: 'x' },
      { seed: 'y', batch: true, name: 'y' },
      { seed: 'z', batch: true, name: 'z' },
    ]);
  });

  it('never has more than maxParallel runs in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const batch = batchFor(async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(10);
      inFlight--;
    });

    const summary = await batch.runBatch('items', () => new StageContext(), items('1', '2', '3', '4', '5'), {
      maxParallel: 2,
    });

    expect(peak).toBe(2);
    expect(summary.succeeded).toBe(5);
  });

  it('runs items one at a time with maxParallel 1', async () => {
    const order: string[] = [];
    const batch = batchFor(async (ctx) => {
      order.push(`start:${ctx.metadata().seed ?? ''}`);
      await delay(2);
      order.push(`end:${ctx.metadata().seed ?? ''}`);
    });

    await batch.runBatch('items', () => new StageContext(), items('a', 'b'), { maxParallel: 1 });

    expect(order).toEqual(['start:a', 'end:a', 'start:b', 'end:b']);
  });

  it('STOP: rejects with the failing item error and starts nothing after it', async () => {
    const boom = new Error('item exploded');
    let calls = 0;
    const batch = batchFor(() => {
      calls++;
      throw boom;
    });

    await expect(
      batch.runBatch('items', () => new StageContext(), items('a', 'b', 'c'), {
        maxParallel: 1,
        onItemFailure: 'STOP',
      }),
    ).rejects.toBe(boom);
    expect(calls).toBe(1);
  });

  it('STOP: does not wait for items that are still running', async () => {
    const boom = new Error('fast failure');
    let slowFinished = false;
    const batch = batchFor(async (ctx) => {
      if (ctx.metadata().seed === 'fast') throw boom;
      await delay(50);
      slowFinished = true;
    });

    await expect(
      batch.runBatch('items', () => new StageContext(), items('slow', 'fast'), {
        maxParallel: 2,
        onItemFailure: 'STOP',
      }),
    ).rejects.toBe(boom);
    expect(slowFinished).toBe(false);

    await delay(80);
    expect(slowFinished).toBe(true);
  });

  it('STOP: closes the item source so its cleanup runs', async () => {
    const boom = new Error('first item fails');
    let produced = 0;
    let closed = false;
    async function* source(): AsyncGenerator<BatchItem> {
      try {
        for (let i = 0; i < 10; i++) {
          produced++;
          yield batchItem(`item-${i}`);
        }
      } finally {
        closed = true;
      }
    }
    const batch = batchFor(() => {
      throw boom;
    });

    await expect(
      batch.runBatch('items', () => new StageContext(), source(), { maxParallel: 1, onItemFailure: 'STOP' }),
    ).rejects.toBe(boom);
    await delay(5);

    expect(closed).toBe(true);
    expect(produced).toBe(1);
  });

  it('STOP: closes a synchronous source as well', async () => {
    let closed = false;
    function* source(): Generator<BatchItem> {
      try {
        yield batchItem('a');
        yield batchItem('b');
      } finally {
        closed = true;
      }
    }
    const batch = batchFor(() => {
      throw new Error('nope');
    });

    await expect(
      batch.runBatch('items', () => new StageContext(), source(), { maxParallel: 1, onItemFailure: 'STOP' }),
    ).rejects.toThrow('nope');
    await delay(1);

    expect(closed).toBe(true);
  });

  it('CONTINUE: attempts every item, records failures and resolves', async () => {
    let calls = 0;
    const batch = batchFor(() => {
      calls++;
      throw new Error('always fails');
    });

    const summary = await batch.runBatch('items', () => new StageContext(), items('a', 'b', 'c'), {
      maxParallel: 1,
      onItemFailure: 'CONTINUE',
    });

    expect(calls).toBe(3);
    expect(summary.outcome).toBe('FAILURE');
    expect(summary.attempted).toBe(3);
    expect(summary.succeeded).toBe(0);
    expect(summary.failed.map((f) => f.key)).toEqual(['a', 'b', 'c']);
    expect(summary.failed[0]?.error.message).toBe('always fails');
  });

  it('reports PARTIAL when only some items fail', async () => {
    const batch = batchFor((ctx) => {
      if (ctx.get('name') === 'bad') throw new Error('bad item');
    });

    const summary = await batch.runBatch('items', () => new StageContext(), items('good', 'bad'));

    expect(summary.outcome).toBe('PARTIAL');
    expect(summary.failed.map((f) => f.key)).toEqual(['bad']);
  });

  it('counts a stage failure under the continue stage policy as a finished item', async () => {
    const batch = batchFor(() => {
      throw new Error('stage failed');
    }, 'continue');

    const summary = await batch.runBatch('items', () => new StageContext(), items('a'), { onItemFailure: 'STOP' });

    expect(summary).toMatchObject({ attempted: 1, succeeded: 1, outcome: 'SUCCESS' });
  });

  it('records an item whose params use a reserved key as failed', async () => {
    let calls = 0;
    const batch = batchFor(() => {
      calls++;
    });

    const summary = await batch.runBatch('items', () => new StageContext(), [
      batchItem('sneaky', { __attempt: 99 }),
      batchItem('fine', { value: 1 }),
    ]);

    expect(calls).toBe(1);
    expect(summary.failed[0]?.key).toBe('sneaky');
    expect(summary.failed[0]?.error).toBeInstanceOf(ReservedKeyError);
  });

  it('consumes async item sources', async () => {
    const keys: string[] = [];
    async function* source(): AsyncGenerator<BatchItem> {
      yield batchItem('one');
      await delay(1);
      yield batchItem('two');
    }
    const batch = batchFor((ctx) => {
      keys.push(ctx.metadata().seed ?? '');
    });

    const summary = await batch.runBatch('items', () => new StageContext(), source(), { maxParallel: 2 });

    expect(keys.sort()).toEqual(['one', 'two']);
    expect(summary.attempted).toBe(2);
  });

  it('rejects when the item source itself fails, whatever the policy', async () => {
    function* source(): Generator<BatchItem> {
      yield batchItem('one');
      throw new Error('listing failed');
    }
    const batch = batchFor(() => undefined);

    await expect(
      batch.runBatch('items', () => new StageContext(), source(), { maxParallel: 1, onItemFailure: 'CONTINUE' }),
    ).rejects.toThrow('listing failed');
  });

  it('resolves with an empty SUCCESS summary for no items', async () => {
    const summary = await batchFor(() => undefined).runBatch('items', () => new StageContext(), []);
    expect(summary).toMatchObject({ attempted: 0, succeeded: 0, failed: [], outcome: 'SUCCESS' });
  });

  it('rejects invalid options', async () => {
    await expect(
      batchFor(() => undefined).runBatch('items', () => new StageContext(), [], { maxParallel: 0 }),
    ).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('BatchRunner.runSeed', () => {
  it('copies params into the context and runs once without batch markers', async () => {
    const seen: Array<Record<string, unknown>> = [];
    const batch = batchFor((ctx) => {
      seen.push({ a: ctx.get('a'), b: ctx.get('b'), batch: ctx.metadata().batch, seed: ctx.metadata().seed });
    });
    const ctx = new StageContext();

    const report = await batch.runSeed('items', ctx, { a: 'x', b: 'y' });

    expect(seen).toEqual([{ a: 'x', b: 'y', batch: undefined, seed: undefined }]);
    expect(report.context).toBe(ctx);
    expect(report.outcome).toBe('SUCCESS');
  });

  it('propagates a halting failure from the underlying runner', async () => {
    const boom = new Error('seed run failed');
    const batch = batchFor(() => {
      throw boom;
    });
    await expect(batch.runSeed('items', new StageContext(), {})).rejects.toBe(boom);
  });
});

describe('BatchRunner.runSupplied', () => {
  it('asks the supplier for items using the run params', async () => {
    const requested: Array<Readonly<Record<string, unknown>>> = [];
    const supplier: BatchSupplier = {
      async items(runParams) {
        requested.push(runParams);
        return [batchItem('2024-01-01'), batchItem('2024-01-02')];
      },
    };
    let calls = 0;
    const batch = batchFor(() => {
      calls++;
    });

    const summary = await batch.runSupplied('items', () => new StageContext(), supplier, { month: '2024-01' });

    expect(requested).toEqual([{ month: '2024-01' }]);
    expect(calls).toBe(2);
    expect(summary.outcome).toBe('SUCCESS');
  });
});

describe('batch helpers', () => {
  it('batchItem freezes the item and copies params', () => {
    const params = { a: 1 };
    const item = batchItem('k', params);
    params.a = 2;
    expect(item).toEqual({ key: 'k', params: { a: 1 } });
    expect(Object.isFrozen(item)).toBe(true);
  });

  it('batchItem rejects an empty key', () => {
    expect(() => batchItem('')).toThrow(ConfigError);
  });

  it('parseBatchOptions fills the defaults', () => {
    expect(parseBatchOptions()).toEqual({ maxParallel: 4, onItemFailure: 'CONTINUE', perItemTimeoutMs: 600_000 });
  });
});
