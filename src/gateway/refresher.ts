import { Cron } from 'croner';
import { errorMessage } from '../errors/index.js';
import type { PluginRegistry } from '../plugins/sdk/registry.js';
import type { SubscriptionStore } from './subscription-store.js';

export const REFRESH_WINDOW_SECONDS = 24 * 60 * 60;

export interface RefresherOptions {
  /** Cron expression for the refresh pass. */
  cron: string;
  windowSeconds?: number;
  now?: () => number;
  log?: (message: string) => void;
}

export interface RefreshReport {
  refreshed: string[];
  failed: string[];
}

/**
 * Periodically renews subscriptions that expire within the window. Each
 * renewal is independent; one failing vendor does not stop the pass.
 */
export class SubscriptionRefresher {
  private job: Cron | null = null;
  private windowSeconds: number;
  private now: () => number;
  private log: (message: string) => void;

  constructor(
    private store: SubscriptionStore,
    private registry: PluginRegistry,
    private options: RefresherOptions
  ) {
    this.windowSeconds = options.windowSeconds ?? REFRESH_WINDOW_SECONDS;
    this.now = options.now ?? Date.now;
    this.log = options.log ?? console.log;
  }

  start(): void {
    if (this.job) return;
    this.job = new Cron(this.options.cron, { protect: true }, async () => {
      await this.runScheduled();
    });
    this.log(`[subscriptions] Refresh scheduled (${this.options.cron}), next: ${this.job.nextRun()?.toISOString() ?? 'never'}`);
  }

  stop(): void {
    this.job?.stop();
    this.job = null;
  }

  /** One scheduled pass; errors outside a single renewal are logged. */
  async runScheduled(): Promise<void> {
    try {
      const report = await this.runOnce();
      if (report.failed.length > 0) {
        this.log(`[subscriptions] Refresh pass finished with ${report.failed.length} failure(s)`);
      }
    } catch (err) {
      this.log(`[subscriptions] Refresh pass failed: ${errorMessage(err)}`);
    }
  }

  async runOnce(): Promise<RefreshReport> {
    const cutoff = Math.floor(this.now() / 1000) + this.windowSeconds;
    const report: RefreshReport = { refreshed: [], failed: [] };

    for (const subscription of this.store.listExpiring(cutoff)) {
      const trigger = this.registry.getTrigger(subscription.trigger);
      if (!trigger) {
        this.log(`[subscriptions] No trigger ${subscription.trigger} for ${subscription.id}; skipping refresh`);
        report.failed.push(subscription.id);
        continue;
      }

      try {
        const refreshed = await trigger.subscription.refresh(subscription);
        this.store.save({ ...refreshed, id: subscription.id, trigger: subscription.trigger });
        report.refreshed.push(subscription.id);
        this.log(`[subscriptions] Refreshed ${subscription.id}, expires at ${refreshed.expiresAt}`);
      } catch (err) {
        report.failed.push(subscription.id);
        this.log(`[subscriptions] Failed to refresh ${subscription.id}: ${errorMessage(err)}`);
      }
    }

    return report;
  }
}
