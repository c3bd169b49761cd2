import type { Command } from 'commander';
import type { PluginRegistry } from '@gradewatch/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface PluginCommandOptions extends BaseCommandOptions {
  offline?: boolean;
}

export type PluginServices = {
  getPluginRegistry(): Promise<PluginRegistry.PluginRegistry>;
};

type PluginRow = {
  institutionCode: string;
  displayName: string;
  version: string;
  installedVersion?: string;
};

function formatRow(row: PluginRow): string {
  const installed = row.installedVersion === undefined
    ? ''
    : row.installedVersion === row.version
      ? '  [installed]'
      : `  [installed ${row.installedVersion}]`;
  return `${row.institutionCode}  ${row.displayName}  ${row.version}${installed}`;
}

/**
 * PluginCommand - discover, install, update and remove school adapters
 */
export class PluginCommand extends BaseCommand<PluginCommandOptions> {
  constructor(private readonly services: PluginServices) {
    super();
  }

  register(program: Command): void {
    const plugin = program
      .command('plugin')
      .description('Manage school adapters');

    this.withOutputOptions(
      plugin
        .command('list')
        .description('List adapters from the plugin index')
        .option('--offline', 'Use the cached index only')
    ).action(async (options: PluginCommandOptions) => {
      await this.executeList(options);
    });

    this.withOutputOptions(
      plugin
        .command('install <code>')
        .description('Download, verify and install the adapter for an institution code')
    ).action(async (code: string, options: PluginCommandOptions) => {
      await this.executeInstall(code, options);
    });

    this.withOutputOptions(
      plugin
        .command('update [code]')
        .description('Update one installed adapter, or every one with a newer version')
    ).action(async (code: string | undefined, options: PluginCommandOptions) => {
      await this.executeUpdate(code, options);
    });

    this.withOutputOptions(
      plugin
        .command('check')
        .description('List installed adapters with a newer version available')
    ).action(async (options: PluginCommandOptions) => {
      await this.executeCheck(options);
    });

    this.withOutputOptions(
      plugin
        .command('uninstall <code>')
        .description('Remove an installed adapter')
    ).action(async (code: string, options: PluginCommandOptions) => {
      await this.executeUninstall(code, options);
    });
  }

  async executeList(options: PluginCommandOptions): Promise<void> {
    try {
      const registry = await this.services.getPluginRegistry();
      const available = await registry.listAvailable({ refresh: !options.offline });
      const installed = new Map(
        (await registry.installed()).map((entry) => [entry.descriptor.institutionCode, entry.descriptor.version])
      );
      const rows: PluginRow[] = available.map((descriptor) => {
        const installedVersion = installed.get(descriptor.institutionCode);
        return {
          institutionCode: descriptor.institutionCode,
          displayName: descriptor.displayName,
          version: descriptor.version,
          ...(installedVersion !== undefined ? { installedVersion } : {}),
        };
      });

      if (options.json) {
        this.handleSuccess(rows, options);
      } else if (rows.length === 0) {
        this.handleSuccess(undefined, options, 'No adapters available');
      } else {
        this.handleSuccess(rows.map(formatRow).join('\n'), options, `${rows.length} adapter(s) available`);
      }
    } catch (error) {
      this.fail('Failed to list adapters', error, options);
    }
  }

  async executeInstall(code: string, options: PluginCommandOptions): Promise<void> {
    try {
      const registry = await this.services.getPluginRegistry();
      const descriptor = await registry.install(code);
      this.handleSuccess(
        options.json ? descriptor : undefined,
        options,
        `Installed ${descriptor.displayName} (${code}) ${descriptor.version}`
      );
    } catch (error) {
      this.fail(`Failed to install ${code}`, error, options);
    }
  }

  async executeUpdate(code: string | undefined, options: PluginCommandOptions): Promise<void> {
    try {
      const registry = await this.services.getPluginRegistry();
      const codes = code !== undefined
        ? [code]
        : (await registry.checkUpdates()).map((update) => update.institutionCode);

      const updated: string[] = [];
      for (const candidate of codes) {
        if (await registry.updateIfNewer(candidate)) {
          updated.push(candidate);
        }
      }

      const message = updated.length > 0
        ? `Updated ${updated.join(', ')}`
        : code !== undefined
          ? `${code} is up to date`
          : 'All adapters are up to date';
      this.handleSuccess(options.json ? { updated } : undefined, options, message);
    } catch (error) {
      this.fail('Failed to update adapters', error, options);
    }
  }

  async executeCheck(options: PluginCommandOptions): Promise<void> {
    try {
      const registry = await this.services.getPluginRegistry();
      const updates = await registry.checkUpdates();
      if (options.json) {
        this.handleSuccess(updates, options);
      } else if (updates.length === 0) {
        this.handleSuccess(undefined, options, 'All adapters are up to date');
      } else {
        this.handleSuccess(
          updates
            .map((update) => `${update.institutionCode}  ${update.displayName}  ${update.installedVersion} -> ${update.availableVersion}`)
            .join('\n'),
          options,
          `${updates.length} update(s) available`
        );
      }
    } catch (error) {
      this.fail('Failed to check for updates', error, options);
    }
  }

  async executeUninstall(code: string, options: PluginCommandOptions): Promise<void> {
    try {
      const registry = await this.services.getPluginRegistry();
      if (!(await registry.uninstall(code))) {
        this.handleError(`${code} is not installed`, options);
        return;
      }
      this.handleSuccess(options.json ? { uninstalled: code } : undefined, options, `Uninstalled ${code}`);
    } catch (error) {
      this.fail(`Failed to uninstall ${code}`, error, options);
    }
  }
}
