import type { Command } from 'commander';
import { RunCommand } from './run-command';
import type { RunServices } from './run-command';

/**
 * Registers the run command
 */
export function registerRunCommands(program: Command, services: RunServices): void {
  new RunCommand(services).register(program);
}
