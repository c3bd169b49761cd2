import type { Command } from 'commander';
import { ScheduleLinearizer } from '@gradewatch/core';
import type { Config, StateStore } from '@gradewatch/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface ScheduleCommandOptions extends BaseCommandOptions {
  week?: string;
}

export type ScheduleServices = {
  getConfig(): Promise<Config.AppConfig>;
  getStateStore(): Promise<StateStore.StateStore>;
};

/**
 * ScheduleCommand - week-by-week view of the stored schedule snapshot
 */
export class ScheduleCommand extends BaseCommand<ScheduleCommandOptions> {
  constructor(private readonly services: ScheduleServices) {
    super();
  }

  register(program: Command): void {
    this.withOutputOptions(
      program
        .command('schedule <accountKey>')
        .description('Show the stored schedule expanded into teaching weeks')
        .option('--week <n>', 'Only this teaching week')
    ).action(async (accountKey: string, options: ScheduleCommandOptions) => {
      await this.execute(accountKey, options);
    });
  }

  async execute(accountKey: string, options: ScheduleCommandOptions): Promise<void> {
    let week: number | undefined;
    if (options.week !== undefined) {
      week = Number(options.week);
      if (!Number.isInteger(week) || week < 1) {
        this.handleError(`Invalid week "${options.week}": expected a positive integer`, options);
        return;
      }
    }

    try {
      const config = await this.services.getConfig();
      const stateStore = await this.services.getStateStore();
      const snapshot = await stateStore.load(accountKey, 'schedule');
      if (!snapshot) {
        this.handleError(`No schedule snapshot stored for ${accountKey}`, options);
        return;
      }

      const linear = ScheduleLinearizer.linearizeSchedule(snapshot.records, {
        totalWeeks: config.semester.totalWeeks,
        ...(config.semester.firstMonday !== undefined ? { firstMonday: config.semester.firstMonday } : {}),
      });
      const view = week === undefined
        ? linear
        : { ...linear, weeks: linear.weeks.filter((candidate) => candidate.week === week) };

      this.handleSuccess(options.json ? view : ScheduleLinearizer.formatLinearSchedule(view), options);
    } catch (error) {
      this.fail('Failed to build schedule', error, options);
    }
  }
}
