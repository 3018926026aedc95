import { spawn } from 'node:child_process';
import { debug } from '../lib/utils/debug.js';
import {
  EXIT_COMMAND_NOT_FOUND,
  MAX_CAPTURED_OUTPUT,
  type CommandOutcome,
  type CommandRequest,
  type CommandRunner,
} from './types.js';

function appendCapped(buffer: string, chunk: string): string {
  const next = buffer + chunk;
  return next.length > MAX_CAPTURED_OUTPUT ? next.slice(next.length - MAX_CAPTURED_OUTPUT) : next;
}

/** Time a process gets to exit after SIGTERM before it is sent SIGKILL */
export const KILL_GRACE_MS = 5_000;

/**
 * Spawn a program with a fixed argument list (no shell), capturing
 * stdout and stderr into one buffer. Never rejects.
 *
 * The child leads its own process group, so a terminal Ctrl+C reaches only
 * devstrap; timeouts and aborts signal the whole group.
 */
export const spawnCommand: CommandRunner = (request: CommandRequest): Promise<CommandOutcome> => {
  return new Promise((resolve) => {
    let output = '';
    let timedOut = false;
    let aborted = false;
    let settled = false;
    let timer: NodeJS.Timeout | undefined;
    let killTimer: NodeJS.Timeout | undefined;

    debug('process', `spawn ${request.program}`, request.args.length, 'args in', request.cwd);

    const child = spawn(request.program, request.args, {
      cwd: request.cwd,
      env: request.env,
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: process.platform !== 'win32',
    });

    const signalGroup = (signal: NodeJS.Signals): void => {
      if (child.pid === undefined) return;
      if (process.platform === 'win32') {
        child.kill(signal);
        return;
      }
      try {
        process.kill(-child.pid, signal);
      } catch (err) {
        // The group does not exist until the child has called setsid
        debug('process', `${signal} to group ${child.pid} failed:`, err instanceof Error ? err.message : String(err));
        child.kill(signal);
      }
    };

    const terminate = (): void => {
      signalGroup('SIGTERM');
      killTimer = setTimeout(() => signalGroup('SIGKILL'), request.kill_grace_ms ?? KILL_GRACE_MS);
      killTimer.unref();
    };

    const onAbort = (): void => {
      aborted = true;
      terminate();
    };

    const finish = (outcome: CommandOutcome): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      request.signal?.removeEventListener('abort', onAbort);
      resolve(outcome);
    };

    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => {
      output = appendCapped(output, chunk);
    });
    child.stderr.on('data', (chunk: string) => {
      output = appendCapped(output, chunk);
    });

    if (request.timeout_ms !== undefined) {
      timer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, request.timeout_ms);
    }

    if (request.signal?.aborted) onAbort();
    else request.signal?.addEventListener('abort', onAbort, { once: true });

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        finish({
          exit_code: EXIT_COMMAND_NOT_FOUND,
          output,
          timed_out: false,
          error: `command not found: ${request.program}`,
        });
        return;
      }
      finish({ exit_code: null, output, timed_out: false, error: error.message });
    });

    child.on('close', (code, signal) => {
      if (aborted) {
        finish({ exit_code: null, output, timed_out: false, error: 'aborted' });
        return;
      }
      if (timedOut) {
        finish({ exit_code: null, output, timed_out: true, error: null });
        return;
      }
      if (signal) {
        finish({ exit_code: null, output, timed_out: false, error: `terminated by ${signal}` });
        return;
      }
      finish({ exit_code: code ?? 1, output, timed_out: false, error: null });
    });
  });
};
