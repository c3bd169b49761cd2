import type { Command } from 'commander';
import { MessageRenderer, Records } from '@gradewatch/core';
import type { StateStore } from '@gradewatch/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export type SnapshotCommandOptions = BaseCommandOptions;

export type SnapshotServices = {
  getStateStore(): Promise<StateStore.StateStore>;
};

/**
 * SnapshotCommand - prints the stored baseline for one account and kind
 */
export class SnapshotCommand extends BaseCommand<SnapshotCommandOptions> {
  constructor(private readonly services: SnapshotServices) {
    super();
  }

  register(program: Command): void {
    const snapshot = program
      .command('snapshot')
      .description('Inspect stored snapshots');

    this.withOutputOptions(
      snapshot
        .command('show <accountKey> <kind>')
        .description('Show the stored grades or schedule of an account')
    ).action(async (accountKey: string, kind: string, options: SnapshotCommandOptions) => {
      await this.executeShow(accountKey, kind, options);
    });
  }

  async executeShow(accountKey: string, kind: string, options: SnapshotCommandOptions): Promise<void> {
    if (!Records.isRecordKind(kind)) {
      this.handleError(`Unknown kind "${kind}": expected grades or schedule`, options);
      return;
    }

    try {
      const stateStore = await this.services.getStateStore();
      const snapshot = await stateStore.load(accountKey, kind);
      if (!snapshot) {
        this.handleError(`No ${kind} snapshot stored for ${accountKey}`, options);
        return;
      }
      this.handleSuccess(options.json ? snapshot : MessageRenderer.renderSnapshot(snapshot).content, options);
    } catch (error) {
      this.fail('Failed to read snapshot', error, options);
    }
  }
}
