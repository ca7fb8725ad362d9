import type { Logger } from "../logger.js";
import { lockKey, type Booking, type Event } from "../types/entities.js";
import { CapacityError, NotFoundError } from "./errors.js";
import type { KeyedLock } from "./locks.js";
import { fail, ok, type Result } from "./result.js";
import type { DocumentStore } from "./store/documentStore.js";

export interface ReservationRequest {
    eventId: string;
    seatCount: number;
    /** A booking being resized or moved; its current seats are not counted against it. */
    excludeBookingId?: string;
    /** Extra lock keys held for the whole decision, e.g. the attendee being referenced. */
    holdKeys?: string[];
}

export interface Reservation {
    eventId: string;
    seatCount: number;
    capacity: number;
    /** Seats held by other bookings when the decision was taken. */
    booked: number;
    remaining: number;
}

export interface CapacityUsage {
    eventId: string;
    capacity: number;
    booked: number;
    available: number;
}

export interface ReservationSteps<T> {
    /** Loads and verifies the event inside the lock. Defaults to a plain lookup. */
    resolve?: () => Promise<Result<Event>>;
    /** Persists the booking once seats are granted. Runs inside the lock. */
    commit: (reservation: Reservation) => Promise<T>;
}

/**
 * Booked seats per event are always summed from live bookings; nothing is
 * cached. Every decision for one event runs under that event's lock key, so
 * check-and-admit is indivisible per event while other events proceed.
 */
export class CapacityLedger {
    constructor(
        private readonly store: DocumentStore,
        private readonly locks: KeyedLock,
        private readonly logger: Logger,
    ) {}

    scope<T>(eventId: string, task: () => Promise<T>, holdKeys: string[] = []): Promise<T> {
        return this.locks.withLock([lockKey("event", eventId), ...holdKeys], task);
    }

    async booked(eventId: string, excludeBookingId?: string): Promise<number> {
        const bookings = await this.store.findBy("booking", "eventId", eventId);
        return bookings
            .filter((booking) => booking.id !== excludeBookingId)
            .reduce((sum, booking) => sum + booking.seatCount, 0);
    }

    async usage(eventId: string): Promise<Result<CapacityUsage>> {
        const event = await this.store.get("event", eventId);
        if (!event) return fail(new NotFoundError("event", eventId));
        const booked = await this.booked(eventId);
        return ok({ eventId, capacity: event.capacity, booked, available: Math.max(event.capacity - booked, 0) });
    }

    /**
     * The seat decision alone. Callers must already hold the event's lock;
     * `excludeBookingId` leaves a resized or moved booking out of the sum.
     */
    async admit(event: Event, seatCount: number, excludeBookingId?: string): Promise<Result<Reservation>> {
        const booked = await this.booked(event.id, excludeBookingId);
        const available = Math.max(event.capacity - booked, 0);
        if (seatCount > available) {
            this.logger.warn({ eventId: event.id, requested: seatCount, available }, "Reservation rejected: not enough seats");
            return fail(new CapacityError(seatCount, available));
        }
        return ok({ eventId: event.id, seatCount, capacity: event.capacity, booked, remaining: available - seatCount });
    }

    reserve<T>(request: ReservationRequest, steps: ReservationSteps<T>): Promise<Result<T>> {
        return this.scope(
            request.eventId,
            async (): Promise<Result<T>> => {
                const resolved = steps.resolve ? await steps.resolve() : await this.loadEvent(request.eventId);
                if (!resolved.ok) return resolved;

                const granted = await this.admit(resolved.value, request.seatCount, request.excludeBookingId);
                if (!granted.ok) return granted;
                return ok(await steps.commit(granted.value));
            },
            request.holdKeys,
        );
    }

    /** Cancels a booking; its seats count again as soon as the delete commits. */
    async release(bookingId: string): Promise<Result<Booking>> {
        const booking = await this.store.get("booking", bookingId);
        if (!booking) return fail(new NotFoundError("booking", bookingId));

        return this.scope(booking.eventId, async (): Promise<Result<Booking>> => {
            const removed = await this.store.remove("booking", bookingId);
            if (!removed) return fail(new NotFoundError("booking", bookingId));
            this.logger.info({ bookingId, eventId: booking.eventId, seatCount: booking.seatCount }, "Seats released");
            return ok(booking);
        });
    }

    private async loadEvent(eventId: string): Promise<Result<Event>> {
        const event = await this.store.get("event", eventId);
        return event ? ok(event) : fail(new NotFoundError("event", eventId));
    }
}
