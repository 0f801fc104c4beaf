import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SubscriptionRefresher } from './refresher.js';
import { SubscriptionStore } from './subscription-store.js';
import { PluginRegistry } from '../plugins/sdk/registry.js';
import { definePlugin, defineTrigger } from '../plugins/sdk/types.js';
import { jsonResponse } from '../plugins/sdk/webhook.js';
import { SubscriptionError } from '../errors/index.js';
import { makeSubscription } from '../testing/plugins.js';
import type { Subscription } from '../types/index.js';

const NOW_SECONDS = 1_700_000_000;

describe('SubscriptionRefresher', () => {
  let store: SubscriptionStore;
  let registry: PluginRegistry;
  const refresh = vi.fn();

  beforeEach(() => {
    store = new SubscriptionStore(':memory:');
    registry = new PluginRegistry();
    registry.register(
      definePlugin({
        name: 'vendor',
        version: '1.0.0',
        triggers: [
          defineTrigger({
            name: 'webhook',
            subscription: {
              create: async (input) => ({ ...input, properties: {}, expiresAt: -1 }),
              delete: async () => ({ success: true, message: 'removed' }),
              refresh: (subscription) => refresh(subscription),
            },
            dispatch: async () => ({ events: [], response: jsonResponse({}) }),
            events: [],
          }),
        ],
      })
    );
    refresh.mockReset();
  });

  afterEach(() => {
    store.close();
  });

  function refresher(log = vi.fn()) {
    return new SubscriptionRefresher(store, registry, { cron: '0 * * * *', now: () => NOW_SECONDS * 1000, log });
  }

  it('refreshes only subscriptions inside the 24h window', async () => {
    store.save(makeSubscription({ id: 'soon', trigger: 'vendor.webhook', expiresAt: NOW_SECONDS + 3600 }));
    store.save(makeSubscription({ id: 'later', trigger: 'vendor.webhook', expiresAt: NOW_SECONDS + 3 * 86400 }));
    store.save(makeSubscription({ id: 'never', trigger: 'vendor.webhook', expiresAt: -1 }));
    refresh.mockImplementation(async (subscription: Subscription) => ({
      ...subscription,
      expiresAt: NOW_SECONDS + 30 * 86400,
    }));

    const report = await refresher().runOnce();

    expect(report).toEqual({ refreshed: ['soon'], failed: [] });
    expect(refresh).toHaveBeenCalledTimes(1);
    expect(store.get('soon')?.expiresAt).toBe(NOW_SECONDS + 30 * 86400);
  });

  it('logs a failing vendor and carries on', async () => {
    store.save(makeSubscription({ id: 'broken', trigger: 'vendor.webhook', expiresAt: NOW_SECONDS + 10 }));
    store.save(makeSubscription({ id: 'fine', trigger: 'vendor.webhook', expiresAt: NOW_SECONDS + 20 }));
    refresh
      .mockRejectedValueOnce(new SubscriptionError('phone number released', 'WEBHOOK_CONFIGURATION_FAILED'))
      .mockImplementationOnce(async (subscription: Subscription) => ({ ...subscription, expiresAt: NOW_SECONDS + 99 }));
    const log = vi.fn();

    const report = await refresher(log).runOnce();

    expect(report).toEqual({ refreshed: ['fine'], failed: ['broken'] });
    expect(log).toHaveBeenCalledWith('[subscriptions] Failed to refresh broken: phone number released');
    expect(store.get('broken')?.expiresAt).toBe(NOW_SECONDS + 10);
  });

  it('reports subscriptions whose trigger is not loaded', async () => {
    store.save(makeSubscription({ id: 'orphan', trigger: 'gone.webhook', expiresAt: NOW_SECONDS }));

    expect(await refresher().runOnce()).toEqual({ refreshed: [], failed: ['orphan'] });
  });

  it('logs a scheduled pass that cannot read the store', async () => {
    vi.spyOn(store, 'listExpiring').mockImplementation(() => {
      throw new Error('disk I/O error');
    });
    const log = vi.fn();

    await expect(refresher(log).runScheduled()).resolves.toBeUndefined();

    expect(log).toHaveBeenCalledWith('[subscriptions] Refresh pass failed: disk I/O error');
    expect(refresh).not.toHaveBeenCalled();
  });

  it('summarizes failures of a scheduled pass', async () => {
    store.save(makeSubscription({ id: 'orphan', trigger: 'gone.webhook', expiresAt: NOW_SECONDS }));
    const log = vi.fn();

    await refresher(log).runScheduled();

    expect(log).toHaveBeenLastCalledWith('[subscriptions] Refresh pass finished with 1 failure(s)');
  });

  it('starts and stops its schedule', () => {
    const log = vi.fn();
    const instance = refresher(log);

    instance.start();
    instance.stop();

    expect(log).toHaveBeenCalledWith(expect.stringMatching(/^\[subscriptions\] Refresh scheduled \(0 \* \* \* \*\), next: /));
  });
});
