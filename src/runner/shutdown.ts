/**
 * Ctrl+C handling for a run.
 *
 * - First Ctrl+C: let the current step finish, skip the rest
 * - Second Ctrl+C: abort the running sub-process
 */

/** Exit code for a run stopped by Ctrl+C */
export const EXIT_INTERRUPTED = 2;

let _isShuttingDown = false;
let _currentAbort: AbortController | null = null;
let _sigintCount = 0;
let _handler: (() => void) | null = null;

/** Whether shutdown has been requested */
export function isShuttingDown(): boolean {
  return _isShuttingDown;
}

/** Register the running step's AbortController for force-quit */
export function setCurrentAbort(controller: AbortController | null): void {
  _currentAbort = controller;
}

/** Install signal handlers. Safe to call multiple times (idempotent). */
export function installShutdownHandlers(): void {
  if (_handler) return;

  _handler = () => {
    _sigintCount++;

    if (_sigintCount === 1) {
      if (!_currentAbort) {
        // Nothing running, exit now
        process.exit(EXIT_INTERRUPTED);
      }
      console.log('\n⏸ Stopping after the current step completes...');
      console.log('  Press Ctrl+C again to abort it.\n');
      _isShuttingDown = true;
    } else {
      console.log('\n⚡ Aborting current step.');
      _currentAbort?.abort();
    }
  };
  process.on('SIGINT', _handler);
}

/** Reset shutdown state and remove the handler (for testing) */
export function resetShutdownState(): void {
  if (_handler) process.off('SIGINT', _handler);
  _handler = null;
  _isShuttingDown = false;
  _currentAbort = null;
  _sigintCount = 0;
}
