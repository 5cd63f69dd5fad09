import type { StageContext } from '../context/stage-context.js';
import { logger, type LogLevel } from '../shared/logger.js';
import { isStageResult, resolveStatus } from './result.js';
import type { StageInvocation, StageResult } from './types.js';

/**
 * Cross-cutting hooks around every stage attempt.
 *
 * before() runs in ascending order and may short-circuit the attempt by
 * returning a result. after() and onError() run in the reverse of that order;
 * exactly one of them fires per attempt. durationNanos spans from just before
 * the first before() hook to the end of the attempt.
 */
export interface StageInterceptor<C extends StageContext = StageContext> {
  /** Lower runs earlier in before() and later in after()/onError(). Defaults to 0. */
  readonly order?: number;
  readonly name?: string;
  before?(inv: StageInvocation, ctx: C): StageResult | undefined | Promise<StageResult | undefined>;
  after?(inv: StageInvocation, ctx: C, result: StageResult | undefined, durationNanos: number): void | Promise<void>;
  onError?(inv: StageInvocation, ctx: C, error: Error, durationNanos: number): void | Promise<void>;
}

export class InterceptorChain<C extends StageContext = StageContext> {
  private readonly ordered: ReadonlyArray<StageInterceptor<C>>;
  private readonly reversed: ReadonlyArray<StageInterceptor<C>>;

  constructor(interceptors: ReadonlyArray<StageInterceptor<C>> = []) {
    // Array.prototype.sort is stable, so equal orders keep registration order.
    this.ordered = [...interceptors].sort((a, b) => (a.order ?? 0) - (b.order ?? 0));
    this.reversed = [...this.ordered].reverse();
  }

  get size(): number {
    return this.ordered.length;
  }

  /**
   * Returns the first short-circuit result, or undefined when every hook passed.
   * A throwing hook fails the attempt like a throwing stage would.
   */
  async before(inv: StageInvocation, ctx: C): Promise<StageResult | undefined> {
    for (const interceptor of this.ordered) {
      if (!interceptor.before) continue;
      // Hooks may come from plain JS, so check the shape like a stage result.
      const returned: unknown = await interceptor.before(inv, ctx);
      const result = isStageResult(returned) ? returned : undefined;
      if (returned !== undefined && result === undefined) {
        logger.warn('Interceptor returned an unknown result; ignoring it', {
          pipeline: inv.pipeline,
          stage: inv.stageId,
          attempt: inv.attempt,
          interceptor: interceptor.name,
        });
      }
      if (result !== undefined) {
        logger.debug('Stage short-circuited by interceptor', {
          pipeline: inv.pipeline,
          stage: inv.stageId,
          attempt: inv.attempt,
          interceptor: interceptor.name,
          status: result.status,
        });
        return result;
      }
    }
    return undefined;
  }

  async after(inv: StageInvocation, ctx: C, result: StageResult | undefined, durationNanos: number): Promise<void> {
    for (const interceptor of this.reversed) {
      if (!interceptor.after) continue;
      try {
        await interceptor.after(inv, ctx, result, durationNanos);
      } catch (err) {
        reportHookFault('after', interceptor.name, inv, err);
      }
    }
  }

  async onError(inv: StageInvocation, ctx: C, error: Error, durationNanos: number): Promise<void> {
    for (const interceptor of this.reversed) {
      if (!interceptor.onError) continue;
      try {
        await interceptor.onError(inv, ctx, error, durationNanos);
      } catch (err) {
        reportHookFault('onError', interceptor.name, inv, err);
      }
    }
  }
}

// Observer hooks are not allowed to change the outcome of an attempt.
function reportHookFault(
  hook: 'after' | 'onError',
  name: string | undefined,
  inv: StageInvocation,
  err: unknown,
): void {
  logger.error(`Interceptor ${hook} hook threw; ignoring`, {
    pipeline: inv.pipeline,
    stage: inv.stageId,
    attempt: inv.attempt,
    interceptor: name,
    error: err instanceof Error ? err.message : String(err),
  });
}

export interface LoggingInterceptorOptions {
  order?: number;
  /** Level for successful attempts. Errors are always logged at warn. */
  level?: Exclude<LogLevel, 'silent'>;
}

/**
 * Logs the end of every stage attempt with its status and duration.
 */
export function createLoggingInterceptor(options: LoggingInterceptorOptions = {}): StageInterceptor {
  const level = options.level ?? 'debug';
  return {
    name: 'logging',
    order: options.order ?? 0,
    after(inv, _ctx, result, durationNanos) {
      logger[level]('Stage attempt finished', {
        pipeline: inv.pipeline,
        stage: inv.stageId,
        attempt: inv.attempt,
        status: resolveStatus(result),
        message: result?.message,
        duration_ms: nanosToMillis(durationNanos),
      });
    },
    onError(inv, _ctx, error, durationNanos) {
      logger.warn('Stage attempt failed', {
        pipeline: inv.pipeline,
        stage: inv.stageId,
        attempt: inv.attempt,
        error: error.message,
        duration_ms: nanosToMillis(durationNanos),
      });
    },
  };
}

export function nanosToMillis(nanos: number): number {
  return Math.round(nanos / 1e4) / 100;
}
