import type { StageContext } from '../context/stage-context.js';

export type StageStatus = 'CONTINUE' | 'SKIP' | 'RETRY' | 'STOP';

export interface StageResult {
  readonly status: StageStatus;
  readonly message?: string;
}

/** What a stage body may hand back. Nothing at all means CONTINUE. */
export type StageReturn = StageResult | undefined | void;

export type StageFn<C extends StageContext = StageContext> = (
  ctx: C,
) => StageReturn | Promise<StageReturn>;

export interface StageStep<C extends StageContext = StageContext> {
  execute(ctx: C): StageReturn | Promise<StageReturn>;
}

export type StageExecutable<C extends StageContext = StageContext> = StageFn<C> | StageStep<C>;

export type StageCondition<C extends StageContext = StageContext> = (ctx: C) => boolean;

export interface StageDescriptor<C extends StageContext = StageContext> {
  readonly id: string;
  /** Lower runs first. */
  readonly order: number;
  readonly execute: StageExecutable<C>;
  readonly condition: StageCondition<C>;
}

/**
 * Supplies the already-ordered stages of a pipeline. Unknown pipelines yield
 * an empty list.
 */
export interface StageRegistry<C extends StageContext = StageContext> {
  stagesFor(pipeline: string): ReadonlyArray<StageDescriptor<C>>;
}

/** Passed to interceptors; built fresh for every attempt. */
export interface StageInvocation {
  readonly pipeline: string;
  readonly stageId: string;
  readonly order: number;
  /** 1-based */
  readonly attempt: number;
}

export type RunOutcome = 'SUCCESS' | 'FAILURE' | 'PARTIAL';

export type StageFailurePolicy = 'halt' | 'continue';

export interface RunReport<C extends StageContext = StageContext> {
  readonly pipeline: string;
  readonly runId: string;
  readonly outcome: RunOutcome;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
  /** Stages whose retries ran out. Under halt this holds at most one id. */
  readonly failedStages: readonly string[];
  readonly context: C;
}

export interface RunListener<C extends StageContext = StageContext> {
  onStart?(pipeline: string, runId: string, ctx: C): void;
  onComplete?(report: RunReport<C>): void;
}
