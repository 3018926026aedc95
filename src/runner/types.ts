import type { ErrorCode } from '../lib/errors.js';
import type { ProvisioningStep } from '../registry/types.js';

export type StepStatus = 'success' | 'skipped' | 'failed';

/** Outcome of one provisioning step */
export interface StepResult {
  name: string;
  group: string;
  status: StepStatus;
  /** Command line as run (or as declared, if it never ran), secrets masked */
  command: string;
  /** Exit code of the step's command; null when no command ran */
  exit_code: number | null;
  /** Captured stdout and stderr, secrets masked */
  output: string;
  duration_ms: number;
  optional: boolean;
  /** The probe reported the step as already applied */
  already_applied: boolean;
  /** Skip reason or failure detail */
  reason: string | null;
  error_code: StepErrorCode | null;
}

export type StepErrorCode = Extract<
  ErrorCode,
  'STEP_FAILED' | 'STEP_TIMEOUT' | 'COMMAND_NOT_FOUND' | 'UNRESOLVED_VARIABLE'
>;

export interface CommandRequest {
  program: string;
  args: string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Kill the process after this many milliseconds; unset waits forever */
  timeout_ms?: number;
  /** Abort kills the process group: SIGTERM, then SIGKILL after the grace period */
  signal?: AbortSignal;
  /** Delay between SIGTERM and SIGKILL on timeout or abort */
  kill_grace_ms?: number;
}

export interface CommandOutcome {
  exit_code: number | null;
  output: string;
  timed_out: boolean;
  /** Spawn-level failure (program missing, permission denied) */
  error: string | null;
}

/** Runs one sub-process to completion */
export type CommandRunner = (request: CommandRequest) => Promise<CommandOutcome>;

/** Receives executor events as they happen */
export interface RunListener {
  onStepStart?(step: ProvisioningStep, index: number, total: number): void;
  onStepResult?(result: StepResult, step: ProvisioningStep, index: number, total: number): void;
}

/** Keep only the tail of very chatty installers */
export const MAX_CAPTURED_OUTPUT = 64 * 1024;

/** Exit code reported when the program cannot be found */
export const EXIT_COMMAND_NOT_FOUND = 127;
