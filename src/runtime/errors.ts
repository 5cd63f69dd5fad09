/**
 * A business failure raised by a stage. The runner treats it like any other
 * thrown error: retry while attempts remain, then apply the failure policy.
 */
export class StageFailedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StageFailedError';
  }
}

/** Raised by the runner when a stage keeps answering RETRY past the attempt limit. */
export class RetriesExceededError extends Error {
  readonly stageId: string;
  readonly attempts: number;

  constructor(stageId: string, attempts: number, lastMessage?: string) {
    const detail = lastMessage ? `: ${lastMessage}` : '';
    super(`Retries exceeded for stage ${stageId} after ${attempts} attempts${detail}`);
    this.name = 'RetriesExceededError';
    this.stageId = stageId;
    this.attempts = attempts;
  }
}

export class ReservedKeyError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`Context key "${key}" is reserved for runner metadata`);
    this.name = 'ReservedKeyError';
    this.key = key;
  }
}

export class ContextTypeError extends Error {
  readonly key: string;

  constructor(key: string, detail: string) {
    super(`Context value "${key}" has the wrong type: ${detail}`);
    this.name = 'ContextTypeError';
    this.key = key;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Stages may throw anything. Hooks and callers always receive an Error; a
 * non-Error throwable is kept as its cause.
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) return thrown;
  return new Error(`Non-error thrown: ${String(thrown)}`, { cause: thrown });
}
