import type { StageResult as StageResultShape, StageReturn, StageStatus } from './types.js';

export type StageResult = StageResultShape;

function make(status: StageStatus, message?: string): StageResult {
  return Object.freeze(message === undefined ? { status } : { status, message });
}

/**
 * Factories for the four control results.
 */
export const StageResult = {
  success: (message?: string): StageResult => make('CONTINUE', message),
  skip: (message?: string): StageResult => make('SKIP', message),
  retry: (message?: string): StageResult => make('RETRY', message),
  stop: (message?: string): StageResult => make('STOP', message),
};

const STATUSES: ReadonlySet<string> = new Set<StageStatus>(['CONTINUE', 'SKIP', 'RETRY', 'STOP']);

export function isStageResult(value: unknown): value is StageResult {
  return (
    typeof value === 'object' &&
    value !== null &&
    'status' in value &&
    typeof value.status === 'string' &&
    STATUSES.has(value.status)
  );
}

/** Whatever a stage body returned, as a result or nothing. */
export function normalizeResult(returned: StageReturn): StageResult | undefined {
  return isStageResult(returned) ? returned : undefined;
}

export function resolveStatus(result: StageResult | undefined): StageStatus {
  return result ? result.status : 'CONTINUE';
}
