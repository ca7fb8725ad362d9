import { randomUUID } from "crypto";
import type { Redis } from "ioredis";
import type { Logger } from "../logger.js";
import { UnavailableError } from "./errors.js";

/**
 * Per-key mutual exclusion. Keys are de-duplicated and taken in sorted
 * order, so two holders of overlapping key sets cannot deadlock.
 */
export interface KeyedLock {
    withLock<T>(keys: string[], task: () => Promise<T>): Promise<T>;
}

type Release = () => Promise<void> | void;

abstract class OrderedKeyLock implements KeyedLock {
    protected abstract acquire(key: string): Promise<Release>;

    async withLock<T>(keys: string[], task: () => Promise<T>): Promise<T> {
        const ordered = [...new Set(keys)].sort();
        const held: Release[] = [];
        try {
            for (const key of ordered) {
                held.push(await this.acquire(key));
            }
            return await task();
        } finally {
            for (const release of held.reverse()) {
                await release();
            }
        }
    }
}

/** FIFO queue per key inside one process. */
export class InProcessLock extends OrderedKeyLock {
    private readonly tails = new Map<string, Promise<void>>();

    protected async acquire(key: string): Promise<Release> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        let unlock: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            unlock = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        return () => {
            unlock();
            if (this.tails.get(key) === tail) this.tails.delete(key);
        };
    }

    /** Number of keys currently held or waited on. */
    get pending(): number {
        return this.tails.size;
    }
}

const RELEASE_SCRIPT = `if redis.call("get", KEYS[1]) == ARGV[1] then return redis.call("del", KEYS[1]) else return 0 end`;

export interface RedisLockOptions {
    ttlMs: number;
    waitMs: number;
    retryDelayMs?: number;
}

/**
 * Lock shared by every server instance. Each key is a `SET NX PX` entry
 * holding a random token; release only deletes the entry while it still
 * holds that token.
 */
export class RedisLock extends OrderedKeyLock {
    private readonly retryDelayMs: number;

    constructor(
        private readonly redis: Redis,
        private readonly options: RedisLockOptions,
        private readonly logger: Logger,
    ) {
        super();
        this.retryDelayMs = options.retryDelayMs ?? 25;
    }

    protected async acquire(key: string): Promise<Release> {
        const lockKey = `lock:${key}`;
        const token = randomUUID();
        const deadline = Date.now() + this.options.waitMs;

        for (;;) {
            let acquired: string | null;
            try {
                acquired = await this.redis.set(lockKey, token, "PX", this.options.ttlMs, "NX");
            } catch (err) {
                throw new UnavailableError(`Lock store failed to acquire ${key}`, err);
            }
            if (acquired) break;
            if (Date.now() >= deadline) {
                throw new UnavailableError(`Timed out waiting for lock ${key}`);
            }
            await sleep(this.retryDelayMs);
        }

        return async () => {
            try {
                await this.redis.eval(RELEASE_SCRIPT, 1, lockKey, token);
            } catch (err) {
                // Key expires after ttlMs.
                this.logger.error({ err, key }, "Failed to release lock");
            }
        };
    }
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
