import type { Command } from 'commander';
import { SnapshotCommand } from './snapshot-command';
import type { SnapshotServices } from './snapshot-command';

export function registerSnapshotCommands(program: Command, services: SnapshotServices): void {
  new SnapshotCommand(services).register(program);
}
