import type { Command } from 'commander';
import { ScheduleCommand } from './schedule-command';
import type { ScheduleServices } from './schedule-command';

export function registerScheduleCommands(program: Command, services: ScheduleServices): void {
  new ScheduleCommand(services).register(program);
}
