import chalk from 'chalk';
import { BlocksError, ErrorSeverity } from '@core/errors/BlocksError';
import { ConfigurationError } from '@core/errors/ConfigurationError';
import { cliLogger } from '@core/utils/logger';
import { consoleOutput, type CommandOutput } from '../utils/command-context';

export interface ErrorHandlerOptions {
  debug?: boolean;
}

export class ErrorHandler {
  constructor(private readonly output: CommandOutput = consoleOutput) {}

  /**
   * Print the error and return the exit code for the failed command.
   */
  handleError(error: unknown, options: ErrorHandlerOptions = {}): number {
    if (error instanceof BlocksError) {
      this.handleBlocksError(error, options);
      return 1;
    }
    if (error instanceof Error) {
      this.handleGenericError(error, options);
      return 1;
    }

    cliLogger.error('An unknown error occurred', { error: String(error) });
    this.output.error(chalk.red(`Unknown Error: ${String(error)}`));
    return 1;
  }

  private handleBlocksError(error: BlocksError, options: ErrorHandlerOptions): void {
    const label = error.severity === ErrorSeverity.Warning ? chalk.yellow('Warning: ') : chalk.red('Error: ');

    if (error instanceof ConfigurationError && error.details) {
      this.output.error(label + 'Invalid configuration' + (error.details.filePath ? ` in ${error.details.filePath}` : ''));
      for (const issue of error.details.issues) {
        this.output.error(`  - ${issue.path || '(file)'}: ${issue.message}`);
      }
    } else {
      this.output.error(label + error.message);
    }

    this.printCause(error, options);
  }

  private handleGenericError(error: Error, options: ErrorHandlerOptions): void {
    cliLogger.error('An unexpected error occurred', { message: error.message });
    this.output.error(chalk.red('Error: ') + error.message);
    this.printCause(error, options);
  }

  private printCause(error: Error, options: ErrorHandlerOptions): void {
    if (error.cause instanceof Error) {
      this.output.error(chalk.red(`  Cause: ${error.cause.message}`));
    }
    if (options.debug && error.stack) {
      this.output.error(chalk.gray(error.stack));
    }
  }
}
