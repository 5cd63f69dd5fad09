import { setTimeout as sleep } from 'node:timers/promises';
import type { z } from 'zod';
import type { StageContext } from '../context/stage-context.js';
import { generateRunId } from '../shared/ids.js';
import { logger } from '../shared/logger.js';
import { RunnerSettingsSchema, formatIssues } from '../shared/schemas.js';
import { ConfigError, RetriesExceededError, toError } from './errors.js';
import { InterceptorChain, type StageInterceptor } from './interceptors.js';
import { normalizeResult, resolveStatus } from './result.js';
import type {
  RunListener,
  RunOutcome,
  RunReport,
  StageDescriptor,
  StageExecutable,
  StageFailurePolicy,
  StageInvocation,
  StageRegistry,
  StageResult,
} from './types.js';

export interface PipelineRunnerOptions<C extends StageContext = StageContext> {
  registry: StageRegistry<C>;
  interceptors?: ReadonlyArray<StageInterceptor<C>>;
  listeners?: ReadonlyArray<RunListener<C>>;
  /** Extra attempts after the first try; 2 means up to 3 tries. */
  maxExtraAttempts?: number;
  backoffMs?: number;
  /**
   * What happens once a stage has used up its attempts.
   * 'halt' ends the run and rejects with the stage's error after listeners
   * saw the FAILURE report. 'continue' records the stage and moves on.
   */
  onFailure?: StageFailurePolicy;
}

export type RunnerSettings = z.infer<typeof RunnerSettingsSchema>;

type StageVerdict =
  | { kind: 'next' }
  | { kind: 'stop'; message?: string }
  | { kind: 'failed'; error: Error };

async function invoke<C extends StageContext>(
  executable: StageExecutable<C>,
  ctx: C,
): Promise<StageResult | undefined> {
  const returned = await (typeof executable === 'function' ? executable(ctx) : executable.execute(ctx));
  return normalizeResult(returned);
}

function elapsedNanos(startedAt: bigint): number {
  return Number(process.hrtime.bigint() - startedAt);
}

/**
 * Drives runs of named pipelines: resolves the ordered stages, checks each
 * condition, runs the attempt loop with interceptors around every attempt and
 * reports the outcome to the run listeners.
 */
export class PipelineRunner<C extends StageContext = StageContext> {
  readonly settings: Readonly<RunnerSettings>;
  private readonly registry: StageRegistry<C>;
  private readonly chain: InterceptorChain<C>;
  private readonly listeners: ReadonlyArray<RunListener<C>>;

  constructor(options: PipelineRunnerOptions<C>) {
    const parsed = RunnerSettingsSchema.safeParse({
      maxExtraAttempts: options.maxExtraAttempts,
      backoffMs: options.backoffMs,
      onFailure: options.onFailure,
    });
    if (!parsed.success) {
      throw new ConfigError('Invalid pipeline runner options', formatIssues(parsed.error));
    }
    this.settings = Object.freeze(parsed.data);
    this.registry = options.registry;
    this.chain = new InterceptorChain(options.interceptors ?? []);
    this.listeners = [...(options.listeners ?? [])];
  }

  /**
   * Execute one run of `pipeline` against `ctx`.
   *
   * Resolves with the run report. Under the 'halt' policy a stage that runs out
   * of attempts makes this reject with that stage's error; the FAILURE report
   * has already gone to the listeners by then.
   *
   * Every attempt gets exactly one of after() or onError(). A stage that keeps
   * answering RETRY past the limit fails with RetriesExceededError, and since
   * after() already saw that last attempt, onError() is not called for it.
   */
  async run(pipeline: string, ctx: C): Promise<RunReport<C>> {
    const runId = generateRunId();
    const startedAt = new Date();
    const failedStages: string[] = [];
    let escalated: Error | undefined;

    ctx.putMetadata('runId', runId);
    ctx.putMetadata('pipeline', pipeline);
    logger.info('Run started', { run_id: runId, pipeline });
    this.notifyStart(pipeline, runId, ctx);

    try {
      await this.runStages(pipeline, ctx, failedStages);
    } catch (err) {
      escalated = toError(err);
    }

    const finishedAt = new Date();
    const outcome: RunOutcome = escalated || failedStages.length > 0 ? 'FAILURE' : 'SUCCESS';
    const report: RunReport<C> = Object.freeze({
      pipeline,
      runId,
      outcome,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      failedStages: Object.freeze([...failedStages]),
      context: ctx,
    });

    logger.info('Run completed', {
      run_id: runId,
      pipeline,
      outcome,
      duration_ms: report.durationMs,
      failed_stages: failedStages.length > 0 ? failedStages : undefined,
    });
    this.notifyComplete(report);

    if (escalated) throw escalated;
    return report;
  }

  private async runStages(pipeline: string, ctx: C, failedStages: string[]): Promise<void> {
    const stages = this.registry.stagesFor(pipeline);
    if (stages.length === 0) {
      logger.warn('Pipeline has no stages', { pipeline });
      return;
    }

    for (const stage of stages) {
      ctx.putMetadata('pipeline', pipeline);
      ctx.putMetadata('stageId', stage.id);

      if (!stage.condition(ctx)) {
        logger.debug('Skipping stage, condition is false', { pipeline, stage: stage.id });
        continue;
      }

      const verdict = await this.runStage(pipeline, stage, ctx);
      if (verdict.kind === 'stop') {
        logger.info('Stage requested stop', { pipeline, stage: stage.id, reason: verdict.message });
        return;
      }
      if (verdict.kind === 'failed') {
        failedStages.push(stage.id);
        logger.error('Stage failed after all attempts', {
          pipeline,
          stage: stage.id,
          policy: this.settings.onFailure,
          error: verdict.error.message,
        });
        if (this.settings.onFailure === 'halt') throw verdict.error;
      }
    }
  }

  private async runStage(pipeline: string, stage: StageDescriptor<C>, ctx: C): Promise<StageVerdict> {
    const { maxExtraAttempts } = this.settings;

    for (let attempt = 1; ; attempt++) {
      ctx.putMetadata('attempt', attempt);
      const inv: StageInvocation = Object.freeze({
        pipeline,
        stageId: stage.id,
        order: stage.order,
        attempt,
      });
      const startedAt = process.hrtime.bigint();

      let result: StageResult | undefined;
      try {
        const shortCircuit = await this.chain.before(inv, ctx);
        result = shortCircuit ?? (await invoke(stage.execute, ctx));
      } catch (thrown) {
        const error = toError(thrown);
        await this.chain.onError(inv, ctx, error, elapsedNanos(startedAt));
        if (attempt <= maxExtraAttempts) {
          logger.info('Stage threw, retrying', { pipeline, stage: stage.id, attempt, error: error.message });
          await this.pause();
          continue;
        }
        return { kind: 'failed', error };
      }

      await this.chain.after(inv, ctx, result, elapsedNanos(startedAt));

      const status = resolveStatus(result);
      switch (status) {
        case 'CONTINUE':
        case 'SKIP':
          return { kind: 'next' };
        case 'STOP':
          return { kind: 'stop', message: result?.message };
        case 'RETRY':
          if (attempt <= maxExtraAttempts) {
            logger.info('Stage asked to retry', { pipeline, stage: stage.id, attempt, reason: result?.message });
            await this.pause();
            continue;
          }
          // after() already saw this attempt, so the synthetic error skips onError.
          return { kind: 'failed', error: new RetriesExceededError(stage.id, attempt, result?.message) };
        default:
          return { kind: 'next' };
      }
    }
  }

  private async pause(): Promise<void> {
    if (this.settings.backoffMs > 0) {
      await sleep(this.settings.backoffMs);
    }
  }

  private notifyStart(pipeline: string, runId: string, ctx: C): void {
    for (const listener of this.listeners) {
      try {
        listener.onStart?.(pipeline, runId, ctx);
      } catch (err) {
        logger.error('Run listener onStart threw; ignoring', { pipeline, run_id: runId, error: toError(err).message });
      }
    }
  }

  private notifyComplete(report: RunReport<C>): void {
    for (const listener of this.listeners) {
      try {
        listener.onComplete?.(report);
      } catch (err) {
        logger.error('Run listener onComplete threw; ignoring', {
          pipeline: report.pipeline,
          run_id: report.runId,
          error: toError(err).message,
        });
      }
    }
  }
}
