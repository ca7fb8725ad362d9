import { lockKey, type Booking, type Event } from "../types/entities.js";
import { now, type ManagerContext } from "./context.js";
import { NotFoundError } from "./errors.js";
import { fail, ok, settle, type Result } from "./result.js";
import { validate, validatePatch } from "./validators.js";

export function createBookingManager({ store, integrity, ledger, logger }: ManagerContext) {
    const log = logger.child({ manager: "bookings" });

    const resolveEvent = async (eventId: string, attendeeId: string): Promise<Result<Event>> => {
        const refs = await integrity.verifyCreate("booking", { eventId, attendeeId });
        return refs.ok ? ok(refs.value.event) : refs;
    };

    return {
        /**
         * References are verified and seats granted under the event's lock
         * (and the attendee's), then the booking is written in one insert.
         */
        create(payload: unknown): Promise<Result<Booking>> {
            return settle(async () => {
                const input = validate("booking", payload);
                if (!input.ok) return input;
                const { eventId, attendeeId, seatCount } = input.value;

                const booking = await ledger.reserve(
                    { eventId, seatCount, holdKeys: [lockKey("attendee", attendeeId)] },
                    {
                        resolve: () => resolveEvent(eventId, attendeeId),
                        commit: () => store.insert("booking", { ...input.value, createdAt: now() }),
                    },
                );
                if (booking.ok) {
                    log.info({ bookingId: booking.value.id, eventId, attendeeId, seatCount }, "Booking created");
                }
                return booking;
            });
        },

        get(id: string): Promise<Result<Booking>> {
            return settle(async () => {
                const booking = await store.get("booking", id);
                return booking ? ok(booking) : fail(new NotFoundError("booking", id));
            });
        },

        list(): Promise<Result<Booking[]>> {
            return settle(async () => ok(await store.list("booking")));
        },

        /**
         * A change of seatCount, eventId or attendeeId is a release-then-reserve
         * on the target event: the booking's own seats are left out of the sum.
         * The booking's current event is locked alongside the target, and the
         * booking is read again inside; if another update moved it meanwhile,
         * the locks are dropped and the update starts over.
         */
        update(id: string, payload: unknown): Promise<Result<Booking>> {
            return settle(async () => {
                const patch = validatePatch("booking", payload);
                if (!patch.ok) return patch;

                const { eventId, attendeeId, seatCount } = patch.value;
                if (eventId === undefined && attendeeId === undefined && seatCount === undefined) {
                    const booking = await store.update("booking", id, patch.value);
                    return booking ? ok(booking) : fail(new NotFoundError("booking", id));
                }

                for (;;) {
                    const current = await store.get("booking", id);
                    if (!current) return fail(new NotFoundError("booking", id));

                    const targetEvent = eventId ?? current.eventId;
                    const holdKeys = [lockKey("event", targetEvent)];
                    if (attendeeId !== undefined) holdKeys.push(lockKey("attendee", attendeeId));

                    const outcome = await ledger.scope(
                        current.eventId,
                        async (): Promise<Result<Booking> | null> => {
                            const fresh = await store.get("booking", id);
                            if (!fresh) return fail(new NotFoundError("booking", id));
                            if (fresh.eventId !== current.eventId) return null;

                            const target = {
                                eventId: targetEvent,
                                attendeeId: attendeeId ?? fresh.attendeeId,
                                seatCount: seatCount ?? fresh.seatCount,
                            };
                            const event = await resolveEvent(target.eventId, target.attendeeId);
                            if (!event.ok) return event;
                            const granted = await ledger.admit(event.value, target.seatCount, id);
                            if (!granted.ok) return granted;

                            const booking = await store.update("booking", id, patch.value);
                            if (!booking) return fail(new NotFoundError("booking", id));
                            log.info({ bookingId: id, ...target }, "Booking updated");
                            return ok(booking);
                        },
                        holdKeys,
                    );
                    if (outcome) return outcome;
                }
            });
        },

        /** Cancels the booking and gives its seats back to the event. */
        remove(id: string): Promise<Result<Booking>> {
            return settle(() => ledger.release(id));
        },
    };
}

export type BookingManager = ReturnType<typeof createBookingManager>;
