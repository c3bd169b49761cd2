import type { Command } from 'commander';
import { Orchestrator, Records } from '@gradewatch/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions, IExecutableCommand } from '../../interfaces/command';
import type { IAppServices } from '../../services/app-services';

export interface RunCommandOptions extends BaseCommandOptions {
  once?: boolean;
  account?: string;
  kind?: string;
}

export type OrchestratorControls = Pick<Orchestrator.Orchestrator, 'start' | 'stop' | 'runOnce'>;

export type RunServices = {
  getOrchestrator(): Promise<OrchestratorControls>;
};

/** Where shutdown signals come from; `process` outside tests */
export type SignalSource = Pick<NodeJS.EventEmitter, 'once' | 'removeListener'>;

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

const FAILED_STATUSES = new Set(['fetch_failed', 'error']);

/**
 * Resolves with the first shutdown signal received.
 */
export function waitForShutdown(signals: SignalSource): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const handlers = SHUTDOWN_SIGNALS.map((signal) => {
      const handler = () => {
        for (const [name, registered] of handlers) {
          signals.removeListener(name, registered);
        }
        resolve(signal);
      };
      return [signal, handler] as const;
    });
    for (const [name, handler] of handlers) {
      signals.once(name, handler);
    }
  });
}

function formatResult(result: Orchestrator.RunOnceResult): string {
  const base = `${result.target}: ${result.status}, ${result.changeCount} change(s)`;
  return result.error ? `${base} (${result.error.message})` : base;
}

/**
 * RunCommand - polls every configured target until interrupted, or runs
 * one cycle per target with --once.
 */
export class RunCommand extends BaseCommand<RunCommandOptions> implements IExecutableCommand<RunCommandOptions> {
  constructor(
    private readonly services: RunServices,
    private readonly signals: SignalSource = process
  ) {
    super();
  }

  register(program: Command): void {
    this.withOutputOptions(
      program
        .command('run')
        .description('Poll grades and schedules and push change notifications')
        .option('--once', 'Run one cycle per target and exit')
        .option('--account <key>', 'Only this account (<institutionCode>:<username>); requires --once')
        .option('--kind <kind>', 'Only grades or schedule; requires --once')
    ).action(async (options: RunCommandOptions) => {
      await this.execute(options);
    });
  }

  async execute(options: RunCommandOptions): Promise<void> {
    if (!options.once && (options.account !== undefined || options.kind !== undefined)) {
      this.handleError('--account and --kind require --once', options);
      return;
    }

    let kinds: Records.RecordKind[] | undefined;
    if (options.kind !== undefined) {
      if (!Records.isRecordKind(options.kind)) {
        this.handleError(`Unknown kind "${options.kind}": expected grades or schedule`, options);
        return;
      }
      kinds = [options.kind];
    }

    try {
      const orchestrator = await this.services.getOrchestrator();
      if (options.once) {
        await this.runOnce(orchestrator, options, kinds);
      } else {
        await this.runUntilSignal(orchestrator, options);
      }
    } catch (error) {
      this.fail('Run failed', error, options);
    }
  }

  private async runOnce(
    orchestrator: OrchestratorControls,
    options: RunCommandOptions,
    kinds: Records.RecordKind[] | undefined
  ): Promise<void> {
    const results = await orchestrator.runOnce(options.account, kinds);
    const failed = results.filter((result) => FAILED_STATUSES.has(result.status)).length;

    if (options.json) {
      this.handleSuccess(
        results.map((result) => ({
          target: result.target,
          accountKey: result.accountKey,
          kind: result.kind,
          status: result.status,
          attempts: result.attempts,
          changeCount: result.changeCount,
          durationMs: result.durationMs,
          ...(result.dispatch ? { dispatch: result.dispatch } : {}),
          ...(result.error ? { error: result.error.message } : {}),
        })),
        options
      );
    } else if (results.length === 0) {
      this.handleSuccess(undefined, options, 'No enabled targets');
    } else {
      this.handleSuccess(results.map(formatResult).join('\n'), options, `Ran ${results.length} target(s)`);
    }

    if (failed > 0) {
      process.exitCode = 1;
    }
  }

  private async runUntilSignal(orchestrator: OrchestratorControls, options: RunCommandOptions): Promise<void> {
    const shutdown = waitForShutdown(this.signals);
    const summary = await orchestrator.start();
    if (!options.quiet && !options.json) {
      console.log(`▶️  Polling ${summary.started.length} target(s); press Ctrl+C to stop`);
      for (const skipped of summary.skipped) {
        console.warn(`⚠️  Skipped ${skipped}: adapter unavailable`);
      }
    }

    const signal = await shutdown;
    if (!options.quiet && !options.json) {
      console.log(`⏹️  ${signal} received; finishing in-flight cycles`);
    }
    await orchestrator.stop();
    this.handleSuccess(options.json ? summary : undefined, options, 'Stopped');
  }
}
