export {
  StageContext,
  RESERVED_KEYS,
  RESERVED_PREFIX,
  isReservedKey,
  type RunMetadata,
  type MetadataField,
} from './context/stage-context.js';
export type {
  StageStatus,
  StageReturn,
  StageFn,
  StageStep,
  StageExecutable,
  StageCondition,
  StageDescriptor,
  StageRegistry,
  StageInvocation,
  RunOutcome,
  StageFailurePolicy,
  RunReport,
  RunListener,
} from './runtime/types.js';
export { StageResult, isStageResult, normalizeResult, resolveStatus } from './runtime/result.js';
export {
  StageFailedError,
  RetriesExceededError,
  ReservedKeyError,
  ContextTypeError,
  ConfigError,
} from './runtime/errors.js';
export {
  InterceptorChain,
  createLoggingInterceptor,
  type StageInterceptor,
  type LoggingInterceptorOptions,
} from './runtime/interceptors.js';
export { PipelineRunner, type PipelineRunnerOptions, type RunnerSettings } from './runtime/runner.js';
export { loggedStage } from './runtime/logged-stage.js';
export { StaticStageRegistry, type StageRegistration } from './runtime/registry.js';
export { BatchRunner, batchItem, parseBatchOptions } from './batch/batch-runner.js';
export type {
  BatchItem,
  BatchOptions,
  BatchOptionsInput,
  BatchSummary,
  BatchSupplier,
  ContextFactory,
  ItemFailure,
  ItemFailurePolicy,
  ItemSource,
} from './batch/types.js';
export {
  loadEngineConfig,
  defaultConfigPath,
  DEFAULT_CONFIG_PATH,
  parseEngineConfig,
  runnerOptionsFromConfig,
  batchOptionsFromConfig,
  applyLogLevel,
  type EngineConfig,
} from './config/config.js';
export {
  logger,
  setLogLevel,
  getLogLevel,
  isLogLevel,
  setLogWriter,
  type LogLevel,
  type LogWriter,
} from './shared/logger.js';
