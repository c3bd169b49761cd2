#!/usr/bin/env node

import { Command } from 'commander';
import { registerConfigCommands } from './commands/config/config';
import { registerPluginCommands } from './commands/plugin/plugin';
import { registerRunCommands } from './commands/run/run';
import { registerScheduleCommands } from './commands/schedule/schedule';
import { registerSnapshotCommands } from './commands/snapshot/snapshot';
import { AppServices } from './services/app-services';

const program = new Command();
const services = new AppServices();

program
  .name('gradewatch')
  .description('Watch grades and course schedules and push change notifications')
  .version('0.1.0')
  .option('-c, --config <path>', 'Configuration file (default: $GRADEWATCH_CONFIG or ~/.gradewatch/config.yaml)')
  .hook('preAction', () => {
    services.setConfigPath(program.opts<{ config?: string }>().config);
  });

registerRunCommands(program, services);
registerPluginCommands(program, services);
registerSnapshotCommands(program, services);
registerScheduleCommands(program, services);
registerConfigCommands(program, services);

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Fatal error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
