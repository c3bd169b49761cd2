/**
 * Command contracts for the gradewatch CLI
 */

import type { Command } from 'commander';

/**
 * Output options every command accepts
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  register(program: Command): void;
}

export interface IExecutableCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {
  execute(options: TOptions): Promise<void>;
}
