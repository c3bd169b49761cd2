import type { Command } from 'commander';
import { ConfigCommand } from './config-command';
import type { ConfigServices } from './config-command';

export function registerConfigCommands(program: Command, services: ConfigServices): void {
  new ConfigCommand(services).register(program);
}
