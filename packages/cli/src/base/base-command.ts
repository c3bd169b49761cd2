/**
 * Base Command Class for the gradewatch CLI
 *
 * Shared output handling: text or `--json`, `--quiet`, and `--verbose`
 * stack traces on failure.
 */

import type { Command } from 'commander';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> implements ICommand {
  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  /**
   * Adds the output options every command shares
   */
  protected withOutputOptions(command: Command): Command {
    return command
      .option('--json', 'Output results in JSON format')
      .option('--verbose', 'Enable verbose output with detailed information')
      .option('--quiet', 'Suppress non-essential output');
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string): void {
    const isJson = options.json || false;
    const isQuiet = options.quiet || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else {
      if (message && !isQuiet) {
        console.log(`✅ ${message}`);
      }
      if (data && !isQuiet) {
        console.log(data);
      }
    }
  }

  /**
   * Routes a caught value through handleError with its message
   */
  protected fail(context: string, error: unknown, options: TOptions): void {
    const detail = error instanceof Error ? error.message : String(error);
    this.handleError(`${context}: ${detail}`, options, error instanceof Error ? error : undefined);
  }
}
