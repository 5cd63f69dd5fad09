import { describe, it, expect, afterEach } from '@jest/globals';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  applyLogLevel,
  batchOptionsFromConfig,
  defaultConfigPath,
  loadEngineConfig,
  parseEngineConfig,
  runnerOptionsFromConfig,
} from '../config/config.js';
import { ConfigError } from '../runtime/errors.js';
import { PipelineRunner } from '../runtime/runner.js';
import { StaticStageRegistry } from '../runtime/registry.js';
import { getLogLevel, setLogLevel } from '../shared/logger.js';
import { writeTempConfig, type TempConfig } from './test-helpers.js';

describe('engine configuration', () => {
  let temp: TempConfig | undefined;

  afterEach(() => {
    temp?.cleanup();
    temp = undefined;
    setLogLevel('silent');
    delete process.env['PIPEWRIGHT_CONFIG'];
  });

  it('loads a full YAML file', () => {
    temp = writeTempConfig({
      log_level: 'warn',
      runner: { max_extra_attempts: 2, backoff_ms: 250, on_failure: 'continue' },
      batch: { max_parallel: 8, on_item_failure: 'stop', per_item_timeout_ms: 30000 },
    });

    const config = loadEngineConfig(temp.path);

    expect(runnerOptionsFromConfig(config)).toEqual({ maxExtraAttempts: 2, backoffMs: 250, onFailure: 'continue' });
    expect(batchOptionsFromConfig(config)).toEqual({
      maxParallel: 8,
      onItemFailure: 'STOP',
      perItemTimeoutMs: 30000,
    });
    applyLogLevel(config);
    expect(getLogLevel()).toBe('warn');
  });

  it('falls back to defaults when the file does not exist', () => {
    const config = loadEngineConfig(join(tmpdir(), 'pipewright-does-not-exist', 'pipewright.yaml'));

    expect(config).toEqual({ runner: {}, batch: {} });
    const runner = new PipelineRunner({ registry: new StaticStageRegistry(), ...runnerOptionsFromConfig(config) });
    expect(runner.settings).toEqual({ maxExtraAttempts: 0, backoffMs: 0, onFailure: 'halt' });
  });

  it('treats an empty file as defaults', () => {
    temp = writeTempConfig('', true);
    expect(loadEngineConfig(temp.path)).toEqual({ runner: {}, batch: {} });
  });

  it('maps on_item_failure continue', () => {
    const config = parseEngineConfig({ batch: { on_item_failure: 'continue' } });
    expect(batchOptionsFromConfig(config).onItemFailure).toBe('CONTINUE');
  });

  it('reports every invalid field with its path', () => {
    const cfg = writeTempConfig({ runner: { max_extra_attempts: -1 }, batch: { max_parallel: 0 } });
    temp = cfg;

    let caught: unknown;
    try {
      loadEngineConfig(cfg.path);
    } catch (err) {
      caught = err;
    }

    if (!(caught instanceof ConfigError)) throw new Error('expected ConfigError');
    expect(caught.message.startsWith(`Invalid engine configuration in ${cfg.path}`)).toBe(true);
    expect(caught.issues).toEqual([
      'runner.max_extra_attempts: Number must be greater than or equal to 0',
      'batch.max_parallel: Number must be greater than or equal to 1',
    ]);
  });

  it('rejects unknown keys in a section', () => {
    expect(() => parseEngineConfig({ runner: { retries: 3 } })).toThrow(ConfigError);
  });

  it('rejects malformed YAML', () => {
    const cfg = writeTempConfig('runner: [unclosed', true);
    temp = cfg;
    expect(() => loadEngineConfig(cfg.path)).toThrow(`Could not parse ${cfg.path}`);
  });

  it('takes the default path from the environment', () => {
    expect(defaultConfigPath()).toBe('pipewright.yaml');
    process.env['PIPEWRIGHT_CONFIG'] = '/etc/pipewright/engine.yaml';
    expect(defaultConfigPath()).toBe('/etc/pipewright/engine.yaml');
  });
});
