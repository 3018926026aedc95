export { Executor, type ExecutorOptions } from './executor.js';
export { runManifest, type RunManifestOptions, type RunManifestResult } from './run-manifest.js';
export { evaluateCondition, commandExists, type ConditionContext, type ConditionOutcome } from './conditions.js';
export { spawnCommand } from './process.js';
export {
  isShuttingDown,
  setCurrentAbort,
  installShutdownHandlers,
  EXIT_INTERRUPTED,
} from './shutdown.js';
export type {
  StepResult,
  StepStatus,
  StepErrorCode,
  CommandRequest,
  CommandOutcome,
  CommandRunner,
  RunListener,
} from './types.js';
export { MAX_CAPTURED_OUTPUT, EXIT_COMMAND_NOT_FOUND } from './types.js';
