import "dotenv/config";
import { getStorage } from "firebase-admin/storage";
import { buildServer } from "./app.js";
import { ConfigError, corsOrigin, loadConfig, type AppConfig } from "./config.js";
import { initFirebase } from "./firebase.js";
import { createCore } from "./lib/core.js";
import { InProcessLock, RedisLock, type KeyedLock } from "./lib/locks.js";
import type { BlobStore } from "./lib/store/blobStore.js";
import type { DocumentStore } from "./lib/store/documentStore.js";
import { FirestoreStore } from "./lib/store/firestoreStore.js";
import { MemoryBlobStore } from "./lib/store/memoryBlobStore.js";
import { MemoryStore } from "./lib/store/memoryStore.js";
import { StorageBlobStore } from "./lib/store/storageBlobStore.js";
import { createLogger, type Logger } from "./logger.js";
import { createRedis } from "./redis.js";

function createStores(config: AppConfig, logger: Logger): { store: DocumentStore; blobs: BlobStore } {
    if (config.STORE_DRIVER === "memory") {
        logger.warn("Using in-memory store; data is lost on restart");
        return { store: new MemoryStore(), blobs: new MemoryBlobStore() };
    }
    const admin = initFirebase(config);
    return {
        store: new FirestoreStore(admin.firestore()),
        blobs: new StorageBlobStore(getStorage().bucket()),
    };
}

function createLocks(config: AppConfig, logger: Logger): KeyedLock {
    if (config.LOCK_DRIVER === "redis" && config.REDIS_URL) {
        return new RedisLock(
            createRedis(config.REDIS_URL, logger),
            { ttlMs: config.LOCK_TTL_MS, waitMs: config.LOCK_WAIT_MS },
            logger.child({ component: "locks" }),
        );
    }
    return new InProcessLock();
}

async function main() {
    const config = loadConfig();
    const logger = createLogger(config);

    const core = createCore({
        ...createStores(config, logger),
        locks: createLocks(config, logger),
        logger,
        mediaLimits: { maxImageBytes: config.MEDIA_MAX_IMAGE_BYTES, maxVideoBytes: config.MEDIA_MAX_VIDEO_BYTES },
    });

    const server = await buildServer({
        core,
        logger,
        corsOrigin: corsOrigin(config),
        maxUploadBytes: Math.max(config.MEDIA_MAX_IMAGE_BYTES, config.MEDIA_MAX_VIDEO_BYTES),
    });

    await server.listen({ port: config.PORT, host: config.HOST });
}

main().catch((err) => {
    // The configured logger may not exist yet.
    const logger = createLogger({ LOG_LEVEL: "info", NODE_ENV: "production" });
    if (err instanceof ConfigError) {
        logger.fatal({ fieldErrors: err.fieldErrors }, err.message);
    } else {
        logger.fatal({ err }, "Server failed to start");
    }
    process.exit(1);
});
