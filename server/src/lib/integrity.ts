import type { Attendee, EntityKind, Event, Stored, Venue } from "../types/entities.js";
import { ConflictError, ReferenceError, ValidationError } from "./errors.js";
import { fail, ok, type Result } from "./result.js";
import type { DocumentStore } from "./store/documentStore.js";

export interface ResolvedRefs {
    event: { venue: Venue };
    booking: { event: Event; attendee: Attendee };
}

export type ReferencingKind = keyof ResolvedRefs;

export interface RefPayload {
    event: { venueId: string; capacity: number };
    booking: { eventId: string; attendeeId: string };
}

/**
 * Resolve-then-verify for every foreign reference, and the restrict policy
 * on delete. The store rejects nothing itself, so callers run these checks
 * inside the lock scope of the entities involved.
 */
export class IntegrityEngine {
    constructor(private readonly store: DocumentStore) {}

    resolve<K extends EntityKind>(kind: K, id: string): Promise<Stored<K> | null> {
        return this.store.get(kind, id);
    }

    verifyCreate<K extends ReferencingKind>(kind: K, payload: RefPayload[K]): Promise<Result<ResolvedRefs[K]>>;
    async verifyCreate(kind: ReferencingKind, payload: RefPayload[ReferencingKind]): Promise<Result<ResolvedRefs[ReferencingKind]>> {
        if (kind === "event" && "venueId" in payload) return this.verifyEvent(payload);
        if (kind === "booking" && "eventId" in payload) return this.verifyBooking(payload);
        throw new TypeError(`No reference rules for ${kind}`);
    }

    /** Venue must exist and hold at least the event's capacity. */
    async verifyEvent(payload: RefPayload["event"]): Promise<Result<ResolvedRefs["event"]>> {
        const venue = await this.store.get("venue", payload.venueId);
        if (!venue) return fail(new ReferenceError("venueId", payload.venueId));
        if (payload.capacity > venue.capacity) {
            return fail(ValidationError.of("capacity", `must not exceed venue capacity (${venue.capacity})`));
        }
        return ok({ venue });
    }

    /** Event is resolved before attendee so the reported field is deterministic. */
    async verifyBooking(payload: RefPayload["booking"]): Promise<Result<ResolvedRefs["booking"]>> {
        const event = await this.store.get("event", payload.eventId);
        if (!event) return fail(new ReferenceError("eventId", payload.eventId));
        const attendee = await this.store.get("attendee", payload.attendeeId);
        if (!attendee) return fail(new ReferenceError("attendeeId", payload.attendeeId));
        return ok({ event, attendee });
    }

    /** Restrict policy: any live dependent blocks the delete. Never cascades. */
    async verifyDelete(kind: EntityKind, id: string): Promise<Result<void, ConflictError>> {
        const dependents = await this.dependentsOf(kind, id);
        if (dependents && dependents.ids.length > 0) {
            return fail(new ConflictError(kind, id, dependents.kind, dependents.ids));
        }
        return ok(undefined);
    }

    private async dependentsOf(kind: EntityKind, id: string): Promise<{ kind: EntityKind; ids: string[] } | null> {
        switch (kind) {
            case "venue": {
                const events = await this.store.findBy("event", "venueId", id);
                return { kind: "event", ids: events.map((event) => event.id) };
            }
            case "event": {
                const bookings = await this.store.findBy("booking", "eventId", id);
                return { kind: "booking", ids: bookings.map((booking) => booking.id) };
            }
            case "attendee": {
                const bookings = await this.store.findBy("booking", "attendeeId", id);
                return { kind: "booking", ids: bookings.map((booking) => booking.id) };
            }
            case "booking":
                return null;
        }
    }
}
