/**
 * ContextStore: per-user conversation history injected into every model call.
 *
 * - Holds at most `limit` records per user; each append trims the oldest (FIFO).
 * - Read-trim-write for one user runs inside that user's critical section; users never wait on each other.
 * - Durable backend (Redis) is chosen once at startup; if it is unset or unreachable the store
 *   runs on the in-process backend for the rest of the process lifetime.
 * - A failed durable operation is retried once, then served by the in-process backend for that
 *   call only. `failureThreshold` consecutive failed operations demote the store to in-process for good.
 *
 * Only invalid arguments reject; storage trouble is logged and absorbed.
 */

import type pino from "pino";
import type { HistoryConfig } from "../config";
import { logger } from "../logging";
import { errorMessage } from "../utils/errors";
import { withTimeout } from "../utils/timeout";
import { RedisHistoryBackend, connectRedis, describeRedisUrl } from "./backends/redis";
import type { KeyValueClient, RedisConnectOptions } from "./backends/redis";
import { VolatileHistoryBackend } from "./backends/volatile";
import { InvalidArgumentError } from "./errors";
import { describeRecentContext } from "./formatter";
import { KeyedLock } from "./keyed-lock";
import { assertContent, assertRole, assertUserId, createRecord } from "./record";
import type { BackendKind, ConversationSummary, HistoryBackend, MessageRecord, MessageRole } from "./types";

const DEFAULT_FAILURE_THRESHOLD = 3;

export interface ContextStoreOptions {
  /** Max records kept per user. */
  limit: number;
  /** Consecutive failed durable operations before permanent demotion (default 3). */
  failureThreshold?: number;
  /** Durable backend; omit for in-process only. */
  durable?: HistoryBackend | null;
  /** In-process backend; a fresh one is created when omitted. */
  volatile?: VolatileHistoryBackend;
  logger?: pino.Logger;
}

export interface ContextStoreDeps {
  volatile?: VolatileHistoryBackend;
  /** Opens the durable connection; defaults to node-redis. */
  connect?: (redisUrl: string, options: RedisConnectOptions) => Promise<KeyValueClient>;
  logger?: pino.Logger;
}

export interface AppendResult {
  record: MessageRecord;
  /** History after the append, oldest first. */
  history: MessageRecord[];
  /** True when the user had no stored history before this message. */
  wasEmpty: boolean;
}

interface Outcome<T> {
  value: T;
  backend: HistoryBackend;
}

export class ContextStore {
  readonly limit: number;
  private durable: HistoryBackend | null;
  private readonly volatile: VolatileHistoryBackend;
  private readonly failureThreshold: number;
  private readonly locks = new KeyedLock();
  private readonly log: pino.Logger;
  private consecutiveFailures = 0;

  constructor(options: ContextStoreOptions) {
    if (!Number.isInteger(options.limit) || options.limit <= 0) {
      throw new InvalidArgumentError(`limit must be a positive integer, got ${options.limit}`);
    }
    this.limit = options.limit;
    this.durable = options.durable ?? null;
    this.volatile = options.volatile ?? new VolatileHistoryBackend();
    this.failureThreshold = Math.max(1, options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD);
    this.log = options.logger ?? logger.child({ component: "context-store" });
  }

  /**
   * Build a store from config: probe Redis (connect + PING within `connectTimeoutMs`) when a URL
   * is configured, otherwise, or on any probe failure, run in-process. Never rejects for backend reasons.
   */
  static async create(config: HistoryConfig, deps: ContextStoreDeps = {}): Promise<ContextStore> {
    const log = deps.logger ?? logger.child({ component: "context-store" });
    const base: ContextStoreOptions = {
      limit: config.limit,
      failureThreshold: config.failureThreshold,
      volatile: deps.volatile,
      logger: log,
    };

    const redisUrl = config.redisUrl?.trim();
    if (!redisUrl) {
      log.info(
        { event: "HISTORY_BACKEND_SELECTED", backend: "volatile", reason: "unconfigured", limit: config.limit },
        "Conversation history kept in process memory (REDIS_URL not set)"
      );
      return new ContextStore(base);
    }

    const client = await probeRedis(redisUrl, config, deps.connect ?? connectRedis, log);
    if (!client) return new ContextStore(base);

    log.info(
      {
        event: "HISTORY_BACKEND_SELECTED",
        backend: "durable",
        redis: describeRedisUrl(redisUrl),
        limit: config.limit,
        ttlSeconds: config.ttlSeconds,
      },
      "Conversation history stored in Redis"
    );
    const durable = new RedisHistoryBackend(client, {
      keyPrefix: config.keyPrefix,
      ttlSeconds: config.ttlSeconds,
      commandTimeoutMs: config.commandTimeoutMs,
      logger: log,
    });
    return new ContextStore({ ...base, durable });
  }

  get backendKind(): BackendKind {
    return this.durable ? "durable" : "volatile";
  }

  /** Store one message and trim the user's history to `limit`. Resolves with the stored record. */
  async append(userId: string, role: MessageRole, content: string): Promise<MessageRecord> {
    const { record } = await this.appendWithHistory(userId, role, content);
    return record;
  }

  /**
   * Like `append`, but also resolves with the history as written and whether it was empty
   * beforehand, both taken inside the user's critical section.
   */
  async appendWithHistory(userId: string, role: MessageRole, content: string): Promise<AppendResult> {
    assertUserId(userId);
    assertRole(role);
    assertContent(content);

    return this.locks.run(userId, async () => {
      const { value: current, backend } = await this.attempt("get", (b) => b.get(userId));
      const last = current[current.length - 1];
      const record = createRecord(role, content, last?.timestamp ?? 0);
      const next = [...current, record].slice(-this.limit);

      // A read served in-process must not be written over the durable copy.
      if (backend.kind === "volatile") {
        await this.volatile.set(userId, next);
      } else {
        await this.attempt("set", (b) => b.set(userId, next));
      }

      this.log.debug(
        { event: "HISTORY_APPEND", userId, role, contentLength: content.length, count: next.length, backend: backend.kind },
        "History message appended"
      );
      return { record, history: next, wasEmpty: current.length === 0 };
    });
  }

  /** Stored history, oldest first; [] for unknown users. Never trims. */
  async read(userId: string): Promise<MessageRecord[]> {
    assertUserId(userId);
    const { value } = await this.attempt("get", (b) => b.get(userId));
    return value;
  }

  /** Delete a user's history. Clearing an unknown user is a no-op. */
  async clear(userId: string): Promise<void> {
    assertUserId(userId);
    await this.locks.run(userId, async () => {
      await this.attempt("delete", (b) => b.delete(userId));
      await this.volatile.delete(userId);
    });
    this.log.info({ event: "HISTORY_CLEARED", userId }, "Cleared conversation history");
  }

  /** Delete every conversation the active backend knows about. Resolves with how many were removed. */
  async clearAll(): Promise<number> {
    const users = await this.listUsers();
    for (const userId of users) {
      await this.clear(userId);
    }
    this.volatile.clearAll();
    this.log.info({ event: "HISTORY_CLEARED_ALL", count: users.length }, "Cleared all conversation histories");
    return users.length;
  }

  /** User ids with stored history, sorted. */
  async listUsers(): Promise<string[]> {
    const { value } = await this.attempt("listKeys", (b) => b.listKeys());
    return [...value].sort();
  }

  async summarize(userId: string): Promise<ConversationSummary> {
    const records = await this.read(userId);
    const roles: Record<MessageRole, number> = { user: 0, assistant: 0, system: 0 };
    for (const r of records) roles[r.role]++;
    return {
      userId,
      count: records.length,
      firstTimestamp: records.length > 0 ? records[0].timestamp : null,
      lastTimestamp: records.length > 0 ? records[records.length - 1].timestamp : null,
      roles,
    };
  }

  async isFirstMessage(userId: string): Promise<boolean> {
    return (await this.read(userId)).length === 0;
  }

  /** Digest of the newest messages ("New conversation" when empty). */
  async describeContext(userId: string): Promise<string> {
    return describeRecentContext(await this.read(userId));
  }

  async close(): Promise<void> {
    const durable = this.durable;
    this.durable = null;
    if (durable?.close) await durable.close();
  }

  /**
   * Run `op` on the durable backend with one retry, falling back to the in-process backend
   * for this call when both attempts fail.
   */
  private async attempt<T>(label: string, op: (backend: HistoryBackend) => Promise<T>): Promise<Outcome<T>> {
    const durable = this.durable;
    if (!durable) return { value: await op(this.volatile), backend: this.volatile };

    for (let tryNo = 1; tryNo <= 2; tryNo++) {
      try {
        const value = await op(durable);
        this.consecutiveFailures = 0;
        return { value, backend: durable };
      } catch (err) {
        this.log.warn(
          { event: tryNo === 1 ? "HISTORY_OP_RETRY" : "HISTORY_OP_FALLBACK", op: label, err: errorMessage(err) },
          tryNo === 1 ? "Durable history operation failed; retrying once" : "Durable history operation failed; using process memory for this call"
        );
      }
    }

    this.recordFailure(durable);
    return { value: await op(this.volatile), backend: this.volatile };
  }

  private recordFailure(durable: HistoryBackend): void {
    if (this.durable !== durable) return;
    this.consecutiveFailures++;
    if (this.consecutiveFailures < this.failureThreshold) return;

    this.durable = null;
    this.log.error(
      { event: "HISTORY_BACKEND_DEMOTED", failures: this.consecutiveFailures },
      "Durable history backend keeps failing; using process memory until restart"
    );
    if (durable.close) {
      durable.close().catch((err: unknown) => {
        this.log.warn({ event: "HISTORY_BACKEND_CLOSE_FAILED", err: errorMessage(err) }, "Failed to close durable history backend");
      });
    }
  }
}

async function probeRedis(
  redisUrl: string,
  config: HistoryConfig,
  connect: NonNullable<ContextStoreDeps["connect"]>,
  log: pino.Logger
): Promise<KeyValueClient | null> {
  let client: KeyValueClient | null = null;
  try {
    client = await withTimeout(connect(redisUrl, { connectTimeoutMs: config.connectTimeoutMs }), config.connectTimeoutMs, "Redis connect");
    await withTimeout(client.ping(), config.connectTimeoutMs, "Redis PING");
    return client;
  } catch (err) {
    log.warn(
      { event: "HISTORY_BACKEND_UNAVAILABLE", redis: describeRedisUrl(redisUrl), err: errorMessage(err) },
      "Redis unavailable; conversation history kept in process memory until restart"
    );
    if (client) {
      await client.close().catch((closeErr: unknown) => {
        log.debug({ event: "HISTORY_BACKEND_CLOSE_FAILED", err: errorMessage(closeErr) }, "Failed to close Redis after failed probe");
      });
    }
    return null;
  }
}
