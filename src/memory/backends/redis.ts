/**
 * Durable history backend on Redis.
 *
 * One key per user (`<prefix><userId>`) holding the whole serialized conversation.
 * Every write replaces the value and resets its TTL; reads never touch the TTL.
 * Each command is bounded by `commandTimeoutMs`; a timeout rejects like any other failure.
 */

import { createClient } from "redis";
import type pino from "pino";
import { logger as rootLogger } from "../../logging";
import { errorMessage } from "../../utils/errors";
import { withTimeout } from "../../utils/timeout";
import { parseConversation, serializeConversation } from "../record";
import type { HistoryBackend, MessageRecord } from "../types";

/** The handful of Redis commands the backend needs. Tests substitute an in-process fake. */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<void>;
  scanKeys(pattern: string): Promise<string[]>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

export interface RedisConnectOptions {
  connectTimeoutMs: number;
}

export interface RedisHistoryBackendConfig {
  keyPrefix: string;
  ttlSeconds: number;
  commandTimeoutMs: number;
  logger?: pino.Logger;
}

/** host/port only; never log credentials from the URL. */
export function describeRedisUrl(redisUrl: string): { scheme: string; host: string; port: string } | { scheme: "unknown" } {
  try {
    const parsed = new URL(redisUrl);
    return {
      scheme: parsed.protocol.replace(":", ""),
      host: parsed.hostname,
      port: parsed.port || "(default)",
    };
  } catch {
    return { scheme: "unknown" };
  }
}

/** A single connection; `isOpen` turns false once the socket is gone for good. */
export interface RedisConnection extends KeyValueClient {
  readonly isOpen: boolean;
}

function isClientClosedError(err: unknown): boolean {
  return errorMessage(err).toLowerCase().includes("client is closed");
}

/**
 * KeyValueClient that opens a fresh connection whenever the current one has closed.
 * A command that fails because the client closed under it is re-run once on a new connection;
 * any other failure is passed to the caller.
 */
export class ReconnectingKeyValueClient implements KeyValueClient {
  private connection: RedisConnection | null;
  private opening: Promise<RedisConnection> | null = null;
  private closed = false;

  constructor(
    private readonly open: () => Promise<RedisConnection>,
    initial: RedisConnection | null = null
  ) {
    this.connection = initial;
  }

  private current(): Promise<RedisConnection> {
    if (this.closed) return Promise.reject(new Error("Redis client closed"));
    if (this.connection?.isOpen) return Promise.resolve(this.connection);
    this.connection = null;
    // Concurrent commands share one reconnect.
    if (!this.opening) {
      this.opening = this.reopen().finally(() => {
        this.opening = null;
      });
    }
    return this.opening;
  }

  private async reopen(): Promise<RedisConnection> {
    const connection = await this.open();
    if (this.closed) {
      await connection.close();
      throw new Error("Redis client closed");
    }
    this.connection = connection;
    return connection;
  }

  private async run<T>(command: (connection: RedisConnection) => Promise<T>): Promise<T> {
    const connection = await this.current();
    try {
      return await command(connection);
    } catch (err) {
      if (!isClientClosedError(err)) throw err;
      if (this.connection === connection) this.connection = null;
      return command(await this.current());
    }
  }

  get(key: string): Promise<string | null> {
    return this.run((c) => c.get(key));
  }

  setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void> {
    return this.run((c) => c.setWithExpiry(key, value, ttlSeconds));
  }

  del(key: string): Promise<void> {
    return this.run((c) => c.del(key));
  }

  scanKeys(pattern: string): Promise<string[]> {
    return this.run((c) => c.scanKeys(pattern));
  }

  ping(): Promise<void> {
    return this.run((c) => c.ping());
  }

  async close(): Promise<void> {
    this.closed = true;
    const connection = this.connection;
    this.connection = null;
    if (connection) await connection.close();
  }
}

/**
 * Open one node-redis connection. No reconnect loop and no offline queue: a dead connection
 * fails commands immediately, and ReconnectingKeyValueClient opens the next one on demand.
 */
export async function openRedisConnection(redisUrl: string, options: RedisConnectOptions): Promise<RedisConnection> {
  const client = createClient({
    url: redisUrl,
    socket: {
      connectTimeout: options.connectTimeoutMs,
      reconnectStrategy: () => new Error("Redis reconnect disabled for conversation history"),
    },
    disableOfflineQueue: true,
  });
  client.on("error", (err: unknown) => {
    rootLogger.debug({ event: "REDIS_CLIENT_ERROR", err: errorMessage(err) }, "Redis client error");
  });

  try {
    await withTimeout(client.connect(), options.connectTimeoutMs, "Redis connect");
  } catch (err) {
    await client.disconnect().catch((disconnectErr: unknown) => {
      rootLogger.debug({ event: "REDIS_DISCONNECT_FAILED", err: errorMessage(disconnectErr) }, "Failed to disconnect Redis");
    });
    throw err;
  }

  return {
    get isOpen() {
      return client.isOpen;
    },
    get: (key) => client.get(key),
    setWithExpiry: async (key, value, ttlSeconds) => {
      await client.set(key, value, { EX: ttlSeconds });
    },
    del: async (key) => {
      await client.del(key);
    },
    scanKeys: async (pattern) => {
      const keys: string[] = [];
      for await (const key of client.scanIterator({ MATCH: pattern, COUNT: 100 })) {
        keys.push(String(key));
      }
      return keys;
    },
    ping: async () => {
      await client.ping();
    },
    close: async () => {
      if (client.isOpen) await client.quit();
    },
  };
}

/**
 * Connect to Redis and return a client that reconnects after the connection drops.
 * The first connection is opened here so a bad URL or unreachable server rejects at once.
 */
export async function connectRedis(redisUrl: string, options: RedisConnectOptions): Promise<KeyValueClient> {
  const open = () => openRedisConnection(redisUrl, options);
  return new ReconnectingKeyValueClient(open, await open());
}

export class RedisHistoryBackend implements HistoryBackend {
  readonly kind = "durable" as const;
  private readonly log: pino.Logger;

  constructor(
    private readonly client: KeyValueClient,
    private readonly config: RedisHistoryBackendConfig
  ) {
    this.log = config.logger ?? rootLogger;
  }

  private keyFor(userId: string): string {
    return `${this.config.keyPrefix}${userId}`;
  }

  private bounded<T>(p: Promise<T>, label: string): Promise<T> {
    return withTimeout(p, this.config.commandTimeoutMs, label);
  }

  async get(userId: string): Promise<MessageRecord[]> {
    const raw = await this.bounded(this.client.get(this.keyFor(userId)), "Redis GET");
    if (raw === null) return [];
    const { records, dropped, malformed } = parseConversation(raw);
    if (malformed || dropped > 0) {
      this.log.warn(
        { event: "HISTORY_RECORD_CORRUPT", userId, dropped, malformed, kept: records.length },
        malformed ? "Stored conversation unreadable; treating as empty" : "Skipped malformed history records"
      );
    }
    return records;
  }

  async set(userId: string, records: MessageRecord[]): Promise<void> {
    await this.bounded(
      this.client.setWithExpiry(this.keyFor(userId), serializeConversation(records), this.config.ttlSeconds),
      "Redis SET"
    );
  }

  async delete(userId: string): Promise<void> {
    await this.bounded(this.client.del(this.keyFor(userId)), "Redis DEL");
  }

  async listKeys(): Promise<string[]> {
    const prefix = this.config.keyPrefix;
    const keys = await this.bounded(this.client.scanKeys(`${prefix}*`), "Redis SCAN");
    return keys.filter((k) => k.startsWith(prefix)).map((k) => k.slice(prefix.length));
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
