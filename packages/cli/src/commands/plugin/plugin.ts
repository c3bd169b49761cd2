import type { Command } from 'commander';
import { PluginCommand } from './plugin-command';
import type { PluginServices } from './plugin-command';

/**
 * Registers plugin list|install|update|check|uninstall
 */
export function registerPluginCommands(program: Command, services: PluginServices): void {
  new PluginCommand(services).register(program);
}
