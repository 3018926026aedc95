import chalk from 'chalk';
import { DevstrapError } from '../errors.js';

/** Exit code for manifest and credential file problems */
export const EXIT_CONFIGURATION_ERROR = 3;

/**
 * Wrap a CLI command handler with centralized error handling.
 * Catches all errors and prints user-friendly output.
 */
export function withErrorHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof DevstrapError) {
        console.error(chalk.red(`✗ ${err.message}`));
        if (err.hint) {
          console.error(chalk.dim(`  ${err.hint}`));
        }
        process.exit(err.isConfigurationError ? EXIT_CONFIGURATION_ERROR : 1);
      } else if (err instanceof Error) {
        console.error(chalk.red(`✗ ${err.message}`));
      } else {
        console.error(chalk.red('✗ An unexpected error occurred'));
      }
      process.exit(1);
    }
  };
}
