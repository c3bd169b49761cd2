import { ChangeDetector } from "../change_detector/change_detector";
import type { AccountConfig } from "../config_manager/config_manager.types";
import type { IEventStream } from "../event_bus";
import type { Logger } from "../logger";
import { renderChanges } from "../message_renderer/message_renderer";
import type { NotificationDispatcher } from "../notification_dispatcher/notification_dispatcher";
import { isPluginNotFoundError } from "../plugin_registry/plugin_registry.errors";
import type { PluginRegistry } from "../plugin_registry/plugin_registry.types";
import type { PollingScheduler } from "../polling_scheduler/polling_scheduler";
import type { CycleResult, CycleRunner, FetchOutcome } from "../polling_scheduler/polling_scheduler.types";
import { RECORD_KINDS, accountKeyOf, isRecordKind } from "../records/records.types";
import type { ChangeEvent, RecordKind, Snapshot } from "../records/records.types";
import { fetchFromAdapter } from "../school_adapter/school_adapter";
import type { SchoolAdapter } from "../school_adapter/school_adapter.types";
import type { StateStore } from "../state_store/state_store";
import { errorMessage } from "../utils/error_message";
import { UnknownAccountError } from "./orchestrator.errors";
import type { AppContext, PluginUpdateSummary, RunOnceResult, StartSummary, TargetKey } from "./orchestrator.types";

export function targetIdOf(accountKey: string, kind: RecordKind): string {
  return `${accountKey}#${kind}`;
}

/** Splits at the last `#`; account keys may contain `#` themselves */
export function parseTargetId(target: string): TargetKey | null {
  const index = target.lastIndexOf("#");
  if (index <= 0) {
    return null;
  }
  const kind = target.slice(index + 1);
  return isRecordKind(kind) ? { accountKey: target.slice(0, index), kind } : null;
}

export function accountKeyOfConfig(account: AccountConfig): string {
  return accountKeyOf(account.institutionCode, account.username);
}

function enabledKinds(account: AccountConfig): RecordKind[] {
  return RECORD_KINDS.filter((kind) => account[kind].enabled);
}

async function fetchSnapshot(
  adapter: SchoolAdapter,
  kind: RecordKind,
  account: AccountConfig,
  options: { forceUpdate: boolean; target: string; capturedAt: () => string }
): Promise<FetchOutcome<Snapshot>> {
  const accountKey = accountKeyOfConfig(account);
  const credentials = { username: account.username, password: account.password };
  const fetchOptions = { forceUpdate: options.forceUpdate, target: options.target };

  if (kind === "grades") {
    const result = await fetchFromAdapter(adapter, "grades", credentials, fetchOptions);
    if (result.status === "no_data") {
      return { status: "no_data" };
    }
    return { status: "fetched", data: { kind, accountKey, records: result.records, capturedAt: options.capturedAt() } };
  }

  const result = await fetchFromAdapter(adapter, "schedule", credentials, fetchOptions);
  if (result.status === "no_data") {
    return { status: "no_data" };
  }
  return { status: "fetched", data: { kind, accountKey, records: result.records, capturedAt: options.capturedAt() } };
}

/**
 * Wires accounts to polling targets. Each target `<accountKey>#<kind>` runs
 * fetch → diff against the stored snapshot → render and dispatch → save.
 */
export class Orchestrator {
  private readonly context: AppContext;
  private readonly logger: Logger;
  private readonly eventBus: IEventStream | undefined;
  private readonly registry: PluginRegistry;
  private readonly stateStore: StateStore;
  private readonly dispatcher: NotificationDispatcher;
  private readonly scheduler: PollingScheduler;
  private readonly changeDetector: ChangeDetector;
  private readonly now: () => Date;

  constructor(context: AppContext) {
    this.context = context;
    this.logger = context.logger;
    this.eventBus = context.eventBus;
    this.registry = context.registry;
    this.stateStore = context.stateStore;
    this.dispatcher = context.dispatcher;
    this.scheduler = context.scheduler;
    this.changeDetector = context.changeDetector ?? new ChangeDetector({ logger: context.logger });
    this.now = context.now ?? (() => new Date());
  }

  enabledAccounts(): AccountConfig[] {
    return this.context.config.accounts.filter((account) => account.enabled);
  }

  /**
   * Starts one polling loop per enabled account and kind. Accounts whose
   * adapter cannot be resolved are logged and skipped.
   */
  async start(): Promise<StartSummary> {
    if (this.context.config.plugins.autoUpdate) {
      await this.autoUpdatePlugins();
    }

    const started: string[] = [];
    const skipped: string[] = [];
    for (const account of this.enabledAccounts()) {
      const accountKey = accountKeyOfConfig(account);
      const kinds = enabledKinds(account);
      if (kinds.length === 0) {
        this.logger.debug(`${accountKey}: no enabled targets`);
        continue;
      }

      const adapter = await this.resolveAdapter(account);
      if (!adapter) {
        skipped.push(accountKey);
        continue;
      }

      for (const kind of kinds) {
        const target = targetIdOf(accountKey, kind);
        this.scheduler.start(target, this.createRunner(account, adapter, kind, false), {
          intervalMs: account[kind].intervalSeconds * 1000,
          jitterMs: this.context.config.scheduler.jitterMs,
        });
        started.push(target);
      }
    }

    this.logger.info(`Started ${started.length} target(s)${skipped.length > 0 ? `; skipped ${skipped.join(", ")}` : ""}`);
    return { started: started.sort(), skipped };
  }

  /**
   * Runs one forced cycle per target and resolves with the results in
   * account order. `kinds` overrides the per-account target switches.
   *
   * @throws UnknownAccountError when `accountKey` names no enabled account
   */
  async runOnce(accountKey?: string, kinds?: RecordKind[]): Promise<RunOnceResult[]> {
    const accounts = this.enabledAccounts().filter(
      (account) => accountKey === undefined || accountKeyOfConfig(account) === accountKey
    );
    if (accountKey !== undefined && accounts.length === 0) {
      throw new UnknownAccountError(accountKey);
    }

    const runs: Promise<RunOnceResult>[] = [];
    for (const account of accounts) {
      const key = accountKeyOfConfig(account);
      const selected = kinds ?? enabledKinds(account);
      if (selected.length === 0) {
        continue;
      }

      const adapter = await this.resolveAdapter(account);
      for (const kind of selected) {
        const target = targetIdOf(key, kind);
        if (!adapter) {
          const unavailable: RunOnceResult = {
            target,
            accountKey: key,
            kind,
            status: "error",
            forced: true,
            attempts: 0,
            changeCount: 0,
            durationMs: 0,
            error: new Error(`${key}: adapter for ${account.institutionCode} is unavailable`),
          };
          runs.push(Promise.resolve(unavailable));
          continue;
        }
        runs.push(this.runTargetOnce(target, account, adapter, kind).then((result) => ({ ...result, accountKey: key, kind })));
      }
    }
    return Promise.all(runs);
  }

  async stop(): Promise<void> {
    await this.scheduler.stopAll();
  }

  /**
   * Updates every installed adapter referenced by an enabled account.
   * Built-in and not-installed codes count as unchanged.
   */
  async autoUpdatePlugins(): Promise<PluginUpdateSummary> {
    const codes = Array.from(new Set(this.enabledAccounts().map((account) => account.institutionCode))).sort();
    const summary: PluginUpdateSummary = { updated: [], unchanged: [], failed: [] };

    for (const code of codes) {
      try {
        if (await this.registry.updateIfNewer(code)) {
          this.logger.info(`Updated adapter ${code}`);
          summary.updated.push(code);
        } else {
          summary.unchanged.push(code);
        }
      } catch (error) {
        if (isPluginNotFoundError(error)) {
          this.logger.debug(`${code} is not installed; skipping update`);
          summary.unchanged.push(code);
        } else {
          this.logger.warn(`Update check for ${code} failed: ${errorMessage(error)}`);
          summary.failed.push(code);
        }
      }
    }
    return summary;
  }

  private async runTargetOnce(
    target: string,
    account: AccountConfig,
    adapter: SchoolAdapter,
    kind: RecordKind
  ): Promise<CycleResult> {
    if (this.scheduler.getState(target) !== undefined) {
      return this.scheduler.forceCycle(target);
    }

    this.scheduler.start(target, this.createRunner(account, adapter, kind, true), {
      intervalMs: account[kind].intervalSeconds * 1000,
      manual: true,
    });
    try {
      return await this.scheduler.forceCycle(target);
    } finally {
      await this.scheduler.stop(target);
    }
  }

  private async resolveAdapter(account: AccountConfig): Promise<SchoolAdapter | null> {
    try {
      const resolved = await this.registry.resolve(account.institutionCode);
      return resolved.adapter;
    } catch (error) {
      this.logger.error(`${accountKeyOfConfig(account)}: cannot resolve adapter: ${errorMessage(error)}`);
      return null;
    }
  }

  private createRunner(
    account: AccountConfig,
    adapter: SchoolAdapter,
    kind: RecordKind,
    forceUpdate: boolean
  ): CycleRunner<Snapshot, ChangeEvent[]> {
    const accountKey = accountKeyOfConfig(account);
    const target = targetIdOf(accountKey, kind);

    return {
      fetch: async () => {
        const outcome = await fetchSnapshot(adapter, kind, account, {
          forceUpdate,
          target,
          capturedAt: () => this.now().toISOString(),
        });
        // diff and commit both see one record per identity
        return outcome.status === "fetched" ? { status: "fetched", data: this.changeDetector.dedupe(outcome.data) } : outcome;
      },

      diff: async (current) => {
        const previous = await this.stateStore.load(accountKey, kind);
        const events = this.changeDetector.diff(previous, current);
        if (previous === null) {
          this.logger.info(`${target}: baseline of ${current.records.length} record(s) captured`);
        } else if (events.length > 0) {
          this.eventBus?.publish({
            type: "changes.detected",
            timestamp: Date.now(),
            source: "orchestrator",
            payload: { accountKey, kind, ...this.changeDetector.countByKind(events) },
          });
        }
        return { changeCount: events.length, detail: events };
      },

      dispatch: async (current, diff) => {
        const message = renderChanges(kind, diff.detail, {
          accountKey,
          ...(this.context.config.dispatch.sendFullReport ? { fullReport: current } : {}),
        });
        return this.dispatcher.dispatch(message.subject, message.content);
      },

      commit: async (current) => {
        await this.stateStore.save(accountKey, kind, current);
      },
    };
  }
}
