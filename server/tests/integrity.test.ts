import { ConflictError, ReferenceError, ValidationError } from "../src/lib/errors.js";
import { IntegrityEngine } from "../src/lib/integrity.js";
import { MemoryStore } from "../src/lib/store/memoryStore.js";
import type { Attendee, Event, Venue } from "../src/types/entities.js";
import { unwrap, unwrapError } from "./helpers/core.js";

const createdAt = "2030-01-01T00:00:00.000Z";

describe("IntegrityEngine", () => {
    let store: MemoryStore;
    let integrity: IntegrityEngine;
    let venue: Venue;
    let event: Event;
    let attendee: Attendee;

    beforeEach(async () => {
        store = new MemoryStore();
        integrity = new IntegrityEngine(store);
        venue = await store.insert("venue", { name: "Main Hall", address: "1 Harbour Road", capacity: 10, createdAt });
        event = await store.insert("event", {
            name: "Launch Night",
            date: "2030-06-01",
            venueId: venue.id,
            capacity: 8,
            createdAt,
        });
        attendee = await store.insert("attendee", { name: "Sam Doe", email: "sam@example.com", createdAt });
    });

    describe("verifyCreate('event')", () => {
        it("returns the resolved venue", async () => {
            const refs = unwrap(await integrity.verifyCreate("event", { venueId: venue.id, capacity: 10 }));
            expect(refs.venue).toEqual(venue);
        });

        it("reports a missing venue on venueId", async () => {
            const error = unwrapError(await integrity.verifyCreate("event", { venueId: "nope", capacity: 1 }));

            expect(error).toBeInstanceOf(ReferenceError);
            expect(error.message).toBe('venueId "nope" does not exist');
            expect(error.details()).toEqual({ field: "venueId", id: "nope" });
        });

        it("rejects an event larger than its venue", async () => {
            const error = unwrapError(await integrity.verifyCreate("event", { venueId: venue.id, capacity: 11 }));

            expect(error).toBeInstanceOf(ValidationError);
            expect(error.message).toBe("capacity: must not exceed venue capacity (10)");
        });
    });

    describe("verifyCreate('booking')", () => {
        it("returns the event and attendee", async () => {
            const refs = unwrap(await integrity.verifyCreate("booking", { eventId: event.id, attendeeId: attendee.id }));
            expect(refs).toEqual({ event, attendee });
        });

        it("reports the event first when both references are missing", async () => {
            const error = unwrapError(await integrity.verifyCreate("booking", { eventId: "e-missing", attendeeId: "a-missing" }));
            expect(error.message).toBe('eventId "e-missing" does not exist');
        });

        it("reports a missing attendee", async () => {
            const error = unwrapError(await integrity.verifyCreate("booking", { eventId: event.id, attendeeId: "a-missing" }));
            expect(error.message).toBe('attendeeId "a-missing" does not exist');
        });
    });

    describe("verifyDelete", () => {
        it("blocks a venue that still hosts events and lists them", async () => {
            const second = await store.insert("event", {
                name: "Encore",
                date: "2030-06-02",
                venueId: venue.id,
                capacity: 2,
                createdAt,
            });

            const error = unwrapError(await integrity.verifyDelete("venue", venue.id));

            expect(error).toBeInstanceOf(ConflictError);
            expect(error.message).toBe(`venue "${venue.id}" is still referenced by 2 event(s)`);
            expect(error.details()).toEqual({ dependentKind: "event", dependentIds: [event.id, second.id] });
        });

        it("blocks an event or attendee with bookings", async () => {
            const booking = await store.insert("booking", {
                eventId: event.id,
                attendeeId: attendee.id,
                seatCount: 1,
                ticketType: "general",
                createdAt,
            });

            expect(unwrapError(await integrity.verifyDelete("event", event.id)).dependentIds).toEqual([booking.id]);
            expect(unwrapError(await integrity.verifyDelete("attendee", attendee.id)).dependentIds).toEqual([booking.id]);
        });

        it("allows entities without dependents", async () => {
            expect(await integrity.verifyDelete("event", event.id)).toEqual({ ok: true, value: undefined });
            expect(await integrity.verifyDelete("attendee", attendee.id)).toEqual({ ok: true, value: undefined });
            expect(await integrity.verifyDelete("booking", "any")).toEqual({ ok: true, value: undefined });
        });
    });
});
