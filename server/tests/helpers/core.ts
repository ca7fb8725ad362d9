import { createCore, type CoreDeps } from "../../src/lib/core.js";
import type { DomainError } from "../../src/lib/errors.js";
import { InProcessLock } from "../../src/lib/locks.js";
import type { Result } from "../../src/lib/result.js";
import { MemoryBlobStore } from "../../src/lib/store/memoryBlobStore.js";
import { MemoryStore } from "../../src/lib/store/memoryStore.js";
import { createLogger } from "../../src/logger.js";

export const testLogger = createLogger({ LOG_LEVEL: "silent", NODE_ENV: "test" });

export const TEST_MEDIA_LIMITS = { maxImageBytes: 1024, maxVideoBytes: 4096 };

export function createTestCore(overrides: Partial<CoreDeps> = {}) {
    const deps: CoreDeps = {
        store: new MemoryStore(),
        blobs: new MemoryBlobStore(),
        locks: new InProcessLock(),
        logger: testLogger,
        mediaLimits: TEST_MEDIA_LIMITS,
        ...overrides,
    };
    return { core: createCore(deps), ...deps };
}

export type TestCore = ReturnType<typeof createTestCore>["core"];

export function unwrap<T, E extends DomainError>(result: Result<T, E>): T {
    if (!result.ok) {
        throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
    }
    return result.value;
}

export function unwrapError<T, E extends DomainError>(result: Result<T, E>): E {
    if (result.ok) {
        throw new Error(`Expected failure, got ${JSON.stringify(result.value)}`);
    }
    return result.error;
}

export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function seedVenue(core: TestCore, overrides: Record<string, unknown> = {}) {
    return unwrap(await core.venues.create({ name: "Main Hall", address: "1 Harbour Road", capacity: 10, ...overrides }));
}

export async function seedEvent(core: TestCore, venueId: string, overrides: Record<string, unknown> = {}) {
    return unwrap(
        await core.events.create({ name: "Launch Night", date: "2030-06-01T19:00:00Z", venueId, capacity: 10, ...overrides }),
    );
}

export async function seedAttendee(core: TestCore, overrides: Record<string, unknown> = {}) {
    return unwrap(await core.attendees.create({ name: "Sam Doe", email: "sam@example.com", ...overrides }));
}

export async function seedBooking(core: TestCore, eventId: string, attendeeId: string, seatCount: number) {
    return unwrap(await core.bookings.create({ eventId, attendeeId, seatCount }));
}
