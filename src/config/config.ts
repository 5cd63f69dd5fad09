import { readFileSync, existsSync } from 'node:fs';
import { load, YAMLException } from 'js-yaml';
import type { z } from 'zod';
import type { BatchOptions } from '../batch/types.js';
import type { RunnerSettings } from '../runtime/runner.js';
import { ConfigError } from '../runtime/errors.js';
import { setLogLevel } from '../shared/logger.js';
import { EngineConfigSchema, formatIssues } from '../shared/schemas.js';

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const DEFAULT_CONFIG_PATH = 'pipewright.yaml';

export function defaultConfigPath(): string {
  return process.env['PIPEWRIGHT_CONFIG'] ?? DEFAULT_CONFIG_PATH;
}

export function parseEngineConfig(raw: unknown, source = 'config'): EngineConfig {
  // An empty YAML document loads as undefined.
  const parsed = EngineConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid engine configuration in ${source}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Read and validate the engine configuration. A missing file yields the
 * defaults so embedding code can always call this.
 */
export function loadEngineConfig(configPath: string = defaultConfigPath()): EngineConfig {
  if (!existsSync(configPath)) {
    return parseEngineConfig({}, configPath);
  }
  let raw: unknown;
  try {
    raw = load(readFileSync(configPath, 'utf8'));
  } catch (err) {
    if (err instanceof YAMLException) {
      throw new ConfigError(`Could not parse ${configPath}`, [err.reason]);
    }
    throw err;
  }
  return parseEngineConfig(raw, configPath);
}

export function runnerOptionsFromConfig(config: EngineConfig): Partial<RunnerSettings> {
  return {
    maxExtraAttempts: config.runner.max_extra_attempts,
    backoffMs: config.runner.backoff_ms,
    onFailure: config.runner.on_failure,
  };
}

export function batchOptionsFromConfig(config: EngineConfig): Partial<BatchOptions> {
  const policy = config.batch.on_item_failure;
  return {
    maxParallel: config.batch.max_parallel,
    onItemFailure: policy === undefined ? undefined : policy === 'stop' ? 'STOP' : 'CONTINUE',
    perItemTimeoutMs: config.batch.per_item_timeout_ms,
  };
}

export function applyLogLevel(config: EngineConfig): void {
  if (config.log_level) setLogLevel(config.log_level);
}
