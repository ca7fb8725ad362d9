import { lockKey, type Event } from "../types/entities.js";
import type { CapacityUsage } from "./capacityLedger.js";
import { now, type ManagerContext } from "./context.js";
import { NotFoundError, ValidationError } from "./errors.js";
import { fail, ok, settle, type Result } from "./result.js";
import { validate, validatePatch } from "./validators.js";

export function createEventManager({ store, locks, integrity, ledger, logger }: ManagerContext) {
    const log = logger.child({ manager: "events" });

    return {
        /** Holds the venue's lock so the venue cannot be deleted or shrunk mid-create. */
        create(payload: unknown): Promise<Result<Event>> {
            return settle(async () => {
                const input = validate("event", payload);
                if (!input.ok) return input;

                return locks.withLock([lockKey("venue", input.value.venueId)], async (): Promise<Result<Event>> => {
                    const refs = await integrity.verifyCreate("event", input.value);
                    if (!refs.ok) return refs;

                    const event = await store.insert("event", { ...input.value, createdAt: now() });
                    log.info({ eventId: event.id, venueId: event.venueId }, "Event created");
                    return ok(event);
                });
            });
        },

        get(id: string): Promise<Result<Event>> {
            return settle(async () => {
                const event = await store.get("event", id);
                return event ? ok(event) : fail(new NotFoundError("event", id));
            });
        },

        list(): Promise<Result<Event[]>> {
            return settle(async () => ok(await store.list("event")));
        },

        availability(id: string): Promise<Result<CapacityUsage>> {
            return settle(() => ledger.usage(id));
        },

        update(id: string, payload: unknown): Promise<Result<Event>> {
            return settle(async () => {
                const patch = validatePatch("event", payload);
                if (!patch.ok) return patch;

                const { venueId, capacity } = patch.value;
                if (venueId === undefined && capacity === undefined) {
                    const event = await ledger.scope(id, () => store.update("event", id, patch.value));
                    return event ? ok(event) : fail(new NotFoundError("event", id));
                }

                // Retried when another update moves the event to a different venue while this one waits.
                for (;;) {
                    const current = await store.get("event", id);
                    if (!current) return fail(new NotFoundError("event", id));
                    const targetVenue = venueId ?? current.venueId;

                    const outcome = await ledger.scope(
                        id,
                        async (): Promise<Result<Event> | null> => {
                            const fresh = await store.get("event", id);
                            if (!fresh) return fail(new NotFoundError("event", id));
                            if (venueId === undefined && fresh.venueId !== targetVenue) return null;

                            const nextCapacity = capacity ?? fresh.capacity;
                            const refs = await integrity.verifyEvent({ venueId: targetVenue, capacity: nextCapacity });
                            if (!refs.ok) return refs;

                            const booked = await ledger.booked(id);
                            if (nextCapacity < booked) {
                                return fail(ValidationError.of("capacity", `must be at least ${booked} (seats already booked)`));
                            }

                            const event = await store.update("event", id, patch.value);
                            return event ? ok(event) : fail(new NotFoundError("event", id));
                        },
                        [lockKey("venue", targetVenue)],
                    );
                    if (outcome) return outcome;
                }
            });
        },

        remove(id: string): Promise<Result<Event>> {
            return settle(() =>
                ledger.scope(id, async (): Promise<Result<Event>> => {
                    const event = await store.get("event", id);
                    if (!event) return fail(new NotFoundError("event", id));

                    const allowed = await integrity.verifyDelete("event", id);
                    if (!allowed.ok) {
                        log.warn({ eventId: id, bookings: allowed.error.dependentIds }, "Event delete blocked");
                        return allowed;
                    }

                    await store.remove("event", id);
                    log.info({ eventId: id }, "Event deleted");
                    return ok(event);
                }),
            );
        },
    };
}

export type EventManager = ReturnType<typeof createEventManager>;
