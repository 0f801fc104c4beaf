import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { KeyValueStorage, Subscription } from '../types/index.js';

const subscriptionRowSchema = z.object({
  id: z.string(),
  trigger_name: z.string(),
  endpoint: z.string(),
  parameters: z.string(),
  properties: z.string(),
  credentials: z.string(),
  expires_at: z.number(),
  created_at: z.number(),
});

const kvRowSchema = z.object({ value: z.string() });

function fromRow(row: unknown): Subscription {
  const parsed = subscriptionRowSchema.parse(row);
  return {
    id: parsed.id,
    trigger: parsed.trigger_name,
    endpoint: parsed.endpoint,
    parameters: z.record(z.unknown()).parse(JSON.parse(parsed.parameters)),
    properties: z.record(z.unknown()).parse(JSON.parse(parsed.properties)),
    credentials: z.record(z.string()).parse(JSON.parse(parsed.credentials)),
    expiresAt: parsed.expires_at,
    createdAt: parsed.created_at,
  };
}

/**
 * Subscriptions and their per-subscription key/value storage, kept in SQLite.
 * Pass `:memory:` for a throwaway database.
 */
export class SubscriptionStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.init();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS subscriptions (
        id TEXT PRIMARY KEY,
        trigger_name TEXT NOT NULL,
        endpoint TEXT NOT NULL,
        parameters TEXT NOT NULL,
        properties TEXT NOT NULL,
        credentials TEXT NOT NULL,
        expires_at INTEGER NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS subscriptions_expiry_idx ON subscriptions (expires_at);

      CREATE TABLE IF NOT EXISTS subscription_storage (
        subscription_id TEXT NOT NULL,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        PRIMARY KEY (subscription_id, key)
      );
    `);
  }

  save(subscription: Subscription): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO subscriptions
          (id, trigger_name, endpoint, parameters, properties, credentials, expires_at, created_at)
         VALUES (@id, @trigger, @endpoint, @parameters, @properties, @credentials, @expiresAt, @createdAt)`
      )
      .run({
        id: subscription.id,
        trigger: subscription.trigger,
        endpoint: subscription.endpoint,
        parameters: JSON.stringify(subscription.parameters),
        properties: JSON.stringify(subscription.properties),
        credentials: JSON.stringify(subscription.credentials),
        expiresAt: subscription.expiresAt,
        createdAt: subscription.createdAt,
      });
  }

  get(id: string): Subscription | undefined {
    const row = this.db.prepare('SELECT * FROM subscriptions WHERE id = ?').get(id);
    return row === undefined ? undefined : fromRow(row);
  }

  list(): Subscription[] {
    return this.db.prepare('SELECT * FROM subscriptions ORDER BY created_at, id').all().map(fromRow);
  }

  /** Removes the subscription and its storage; false when it did not exist. */
  delete(id: string): boolean {
    const removed = this.db.transaction((subscriptionId: string) => {
      this.db.prepare('DELETE FROM subscription_storage WHERE subscription_id = ?').run(subscriptionId);
      return this.db.prepare('DELETE FROM subscriptions WHERE id = ?').run(subscriptionId).changes;
    })(id);
    return removed > 0;
  }

  /** Subscriptions that expire at or before `before` (unix seconds); never-expiring ones are skipped. */
  listExpiring(before: number): Subscription[] {
    return this.db
      .prepare('SELECT * FROM subscriptions WHERE expires_at >= 0 AND expires_at <= ? ORDER BY expires_at')
      .all(before)
      .map(fromRow);
  }

  storage(subscriptionId: string): KeyValueStorage {
    const db = this.db;
    return {
      get(key) {
        const row = db
          .prepare('SELECT value FROM subscription_storage WHERE subscription_id = ? AND key = ?')
          .get(subscriptionId, key);
        return row === undefined ? undefined : kvRowSchema.parse(row).value;
      },
      set(key, value) {
        db.prepare(
          'INSERT OR REPLACE INTO subscription_storage (subscription_id, key, value) VALUES (?, ?, ?)'
        ).run(subscriptionId, key, value);
      },
      delete(key) {
        db.prepare('DELETE FROM subscription_storage WHERE subscription_id = ? AND key = ?').run(subscriptionId, key);
      },
    };
  }

  close(): void {
    this.db.close();
  }
}
