import type { StageContext } from '../context/stage-context.js';
import { logger } from '../shared/logger.js';
import { StageResult, normalizeResult } from './result.js';
import type { StageExecutable, StageStep } from './types.js';

const MAX_LOGGED_KEYS = 8;

/**
 * Wrap a stage body with debug START/END lines carrying the runner metadata
 * from the context. A missing result comes back as an explicit CONTINUE and
 * errors are rethrown untouched for the runner's retry handling.
 */
export function loggedStage<C extends StageContext>(
  body: StageExecutable<C>,
): { execute(ctx: C): Promise<StageResult> } & StageStep<C> {
  return {
    async execute(ctx: C): Promise<StageResult> {
      const meta = ctx.metadata();
      const fields = {
        pipeline: meta.pipeline ?? '(unknown)',
        stage: meta.stageId ?? '(unknown)',
        attempt: meta.attempt ?? 1,
      };
      const startedAt = Date.now();
      let result: StageResult | undefined;

      if (logger.isDebugEnabled()) {
        logger.debug('Stage start', { ...fields, keys: ctx.keys().slice(0, MAX_LOGGED_KEYS) });
      }
      try {
        const returned = await (typeof body === 'function' ? body(ctx) : body.execute(ctx));
        result = normalizeResult(returned) ?? StageResult.success();
        return result;
      } catch (err) {
        logger.debug('Stage error', { ...fields, error: err instanceof Error ? err.message : String(err) });
        throw err;
      } finally {
        logger.debug('Stage end', {
          ...fields,
          status: result?.status ?? 'ERROR',
          duration_ms: Date.now() - startedAt,
        });
      }
    },
  };
}
