import type { Command } from 'commander';
import { Config } from '@gradewatch/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface ConfigCommandOptions extends BaseCommandOptions {
  force?: boolean;
}

export type ConfigServices = {
  getConfigManager(): Config.IConfigManager;
};

/**
 * ConfigCommand - validate the configuration file or write a starter one
 */
export class ConfigCommand extends BaseCommand<ConfigCommandOptions> {
  constructor(private readonly services: ConfigServices) {
    super();
  }

  register(program: Command): void {
    const config = program
      .command('config')
      .description('Validate or create the configuration file');

    this.withOutputOptions(
      config
        .command('validate')
        .description('Check the configuration against its schema')
    ).action(async (options: ConfigCommandOptions) => {
      await this.executeValidate(options);
    });

    this.withOutputOptions(
      config
        .command('init')
        .description('Write a starter configuration file')
        .option('--force', 'Overwrite an existing file')
    ).action(async (options: ConfigCommandOptions) => {
      await this.executeInit(options);
    });
  }

  async executeValidate(options: ConfigCommandOptions): Promise<void> {
    const manager = this.services.getConfigManager();
    try {
      const config = await manager.loadConfig();
      const summary = {
        source: manager.describeSource(),
        accounts: config.accounts.length,
        channels: config.channels.length,
      };
      this.handleSuccess(
        options.json ? summary : undefined,
        options,
        `${summary.source} is valid (${summary.accounts} account(s), ${summary.channels} channel(s))`
      );
    } catch (error) {
      if (Config.isConfigValidationError(error) && options.json) {
        console.log(JSON.stringify({ success: false, source: error.source, errors: error.errors }, null, 2));
        process.exit(1);
        return;
      }
      this.fail('Invalid configuration', error, options);
    }
  }

  async executeInit(options: ConfigCommandOptions): Promise<void> {
    try {
      const location = await this.services.getConfigManager().initConfig({ force: options.force ?? false });
      this.handleSuccess(
        options.json ? { path: location } : undefined,
        options,
        `Wrote starter configuration to ${location}`
      );
    } catch (error) {
      this.fail('Failed to write configuration', error, options);
    }
  }
}
