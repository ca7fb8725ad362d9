import { lockKey, type Venue } from "../types/entities.js";
import { now, type ManagerContext } from "./context.js";
import { NotFoundError, ValidationError } from "./errors.js";
import { fail, ok, settle, type Result } from "./result.js";
import { validate, validatePatch } from "./validators.js";

export function createVenueManager({ store, locks, integrity, logger }: ManagerContext) {
    const log = logger.child({ manager: "venues" });

    return {
        create(payload: unknown): Promise<Result<Venue>> {
            return settle(async () => {
                const input = validate("venue", payload);
                if (!input.ok) return input;

                const venue = await store.insert("venue", { ...input.value, createdAt: now() });
                log.info({ venueId: venue.id }, "Venue created");
                return ok(venue);
            });
        },

        get(id: string): Promise<Result<Venue>> {
            return settle(async () => {
                const venue = await store.get("venue", id);
                return venue ? ok(venue) : fail(new NotFoundError("venue", id));
            });
        },

        list(): Promise<Result<Venue[]>> {
            return settle(async () => ok(await store.list("venue")));
        },

        /**
         * Capacity may only shrink down to the largest capacity of the events
         * held at the venue; the venue lock keeps new events out meanwhile.
         */
        update(id: string, payload: unknown): Promise<Result<Venue>> {
            return settle(async () => {
                const patch = validatePatch("venue", payload);
                if (!patch.ok) return patch;

                return locks.withLock([lockKey("venue", id)], async (): Promise<Result<Venue>> => {
                    const current = await store.get("venue", id);
                    if (!current) return fail(new NotFoundError("venue", id));

                    const capacity = patch.value.capacity;
                    if (capacity !== undefined && capacity < current.capacity) {
                        const events = await store.findBy("event", "venueId", id);
                        const largest = events.reduce<{ id: string; capacity: number } | null>(
                            (max, event) => (max === null || event.capacity > max.capacity ? event : max),
                            null,
                        );
                        if (largest && largest.capacity > capacity) {
                            return fail(
                                ValidationError.of(
                                    "capacity",
                                    `must be at least ${largest.capacity} (capacity of event "${largest.id}")`,
                                ),
                            );
                        }
                    }

                    const venue = await store.update("venue", id, patch.value);
                    return venue ? ok(venue) : fail(new NotFoundError("venue", id));
                });
            });
        },

        remove(id: string): Promise<Result<Venue>> {
            return settle(async () =>
                locks.withLock([lockKey("venue", id)], async (): Promise<Result<Venue>> => {
                    const venue = await store.get("venue", id);
                    if (!venue) return fail(new NotFoundError("venue", id));

                    const allowed = await integrity.verifyDelete("venue", id);
                    if (!allowed.ok) {
                        log.warn({ venueId: id, events: allowed.error.dependentIds }, "Venue delete blocked");
                        return allowed;
                    }

                    await store.remove("venue", id);
                    log.info({ venueId: id }, "Venue deleted");
                    return ok(venue);
                }),
            );
        },
    };
}

export type VenueManager = ReturnType<typeof createVenueManager>;
