import type { StageContext } from '../context/stage-context.js';
import type { StageCondition, StageDescriptor, StageExecutable, StageRegistry } from './types.js';

export interface StageRegistration<C extends StageContext = StageContext> {
  id: string;
  order?: number;
  execute: StageExecutable<C>;
  condition?: StageCondition<C>;
}

const always = (): boolean => true;

/**
 * Registry fed by explicit register() calls. Stages come back sorted by order,
 * with ties kept in registration sequence.
 */
export class StaticStageRegistry<C extends StageContext = StageContext> implements StageRegistry<C> {
  private readonly pipelines = new Map<string, StageDescriptor<C>[]>();

  register(pipeline: string, stage: StageRegistration<C>): this {
    if (!stage.id) {
      throw new Error(`Stage registered for pipeline ${pipeline} needs an id`);
    }
    const stages = this.pipelines.get(pipeline) ?? [];
    if (stages.some((s) => s.id === stage.id)) {
      throw new Error(`Stage ${stage.id} is already registered for pipeline ${pipeline}`);
    }
    stages.push(
      Object.freeze({
        id: stage.id,
        order: stage.order ?? 0,
        execute: stage.execute,
        condition: stage.condition ?? always,
      }),
    );
    stages.sort((a, b) => a.order - b.order);
    this.pipelines.set(pipeline, stages);
    return this;
  }

  stagesFor(pipeline: string): ReadonlyArray<StageDescriptor<C>> {
    return [...(this.pipelines.get(pipeline) ?? [])];
  }

  pipelineNames(): string[] {
    return [...this.pipelines.keys()];
  }
}
