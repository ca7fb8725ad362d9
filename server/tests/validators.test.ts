import { ValidationError } from "../src/lib/errors.js";
import { validate, validatePatch } from "../src/lib/validators.js";
import { unwrap, unwrapError } from "./helpers/core.js";

describe("validate", () => {
    describe("venue", () => {
        it("trims strings and keeps only known fields", () => {
            const venue = unwrap(
                validate("venue", {
                    name: "  Main Hall ",
                    address: "1 Harbour Road",
                    capacity: 10,
                    id: "client-chosen",
                    photoRef: "sneaky",
                }),
            );

            expect(venue).toEqual({ name: "Main Hall", address: "1 Harbour Road", capacity: 10 });
        });

        it("removes NUL bytes before trimming", () => {
            const venue = unwrap(validate("venue", { name: "Main\u0000 Hall", address: "x", capacity: 1 }));
            expect(venue.name).toBe("Main Hall");
        });

        it("reports every missing field in declaration order", () => {
            const error = unwrapError(validate("venue", { capacity: "many" }));

            expect(error).toBeInstanceOf(ValidationError);
            expect(error.message).toBe("name: is required");
            expect(error.issues).toEqual([
                { field: "name", reason: "is required" },
                { field: "address", reason: "is required" },
                { field: "capacity", reason: "must be a number" },
            ]);
        });

        it.each([
            [0, "must be a positive integer"],
            [-3, "must be a positive integer"],
            [2.5, "must be an integer"],
            ["10", "must be a number"],
        ])("rejects capacity %p", (capacity, reason) => {
            const error = unwrapError(validate("venue", { name: "Hall", address: "Road", capacity }));
            expect(error.field).toBe("capacity");
            expect(error.reason).toBe(reason);
        });

        it("rejects blank strings", () => {
            const error = unwrapError(validate("venue", { name: "   ", address: "Road", capacity: 5 }));
            expect(error.message).toBe("name: must not be empty");
        });

        it("rejects strings longer than 5000 characters", () => {
            const error = unwrapError(validate("venue", { name: "a".repeat(5001), address: "Road", capacity: 5 }));
            expect(error.reason).toBe("must be at most 5000 characters");
        });

        it.each([["a string"], [null], [[{ name: "Hall" }]]])("rejects a %p body", (payload) => {
            const error = unwrapError(validate("venue", payload));
            expect(error.field).toBe("body");
            expect(error.reason).toBe("must be a JSON object");
        });
    });

    describe("event", () => {
        const base = { name: "Launch", venueId: "v1", capacity: 5 };

        it.each(["2030-06-01", "2028-02-29", "2030-06-01T19:00:00Z", "2030-06-01T19:00:00.250+02:00", "2030-06-01 19:00"])(
            "accepts date %s",
            (date) => {
                expect(unwrap(validate("event", { ...base, date })).date).toBe(date);
            },
        );

        it.each(["next friday", "2030-13-45", "01/06/2030", "2030-02-31", "2030-02-29", "2030-04-31T10:00:00Z"])(
            "rejects date %s",
            (date) => {
                const error = unwrapError(validate("event", { ...base, date }));
                expect(error.field).toBe("date");
                expect(error.reason).toBe("must be an ISO-8601 date");
            },
        );

        it("treats description as optional", () => {
            const event = unwrap(validate("event", { ...base, date: "2030-06-01" }));
            expect(event.description).toBeUndefined();
        });
    });

    describe("attendee", () => {
        it("accepts a phone number with punctuation", () => {
            const attendee = unwrap(validate("attendee", { name: "Sam", email: "sam@example.com", phone: "+1 (555) 010-0000" }));
            expect(attendee.phone).toBe("+1 (555) 010-0000");
        });

        it("rejects a malformed email", () => {
            const error = unwrapError(validate("attendee", { name: "Sam", email: "sam.example.com" }));
            expect(error.message).toBe("email: must be a valid email address");
        });

        it("rejects a short phone number", () => {
            const error = unwrapError(validate("attendee", { name: "Sam", email: "sam@example.com", phone: "12" }));
            expect(error.message).toBe("phone: must be a valid phone number");
        });
    });

    describe("booking", () => {
        it("defaults the ticket type to general", () => {
            const booking = unwrap(validate("booking", { eventId: "e1", attendeeId: "a1", seatCount: 2 }));
            expect(booking).toEqual({ eventId: "e1", attendeeId: "a1", seatCount: 2, ticketType: "general" });
        });

        it("rejects an unknown ticket type", () => {
            const error = unwrapError(
                validate("booking", { eventId: "e1", attendeeId: "a1", seatCount: 2, ticketType: "backstage" }),
            );
            expect(error.message).toBe("ticketType: must be one of general, vip, student");
        });

        it("requires a positive seat count", () => {
            const error = unwrapError(validate("booking", { eventId: "e1", attendeeId: "a1", seatCount: 0 }));
            expect(error.message).toBe("seatCount: must be a positive integer");
        });
    });
});

describe("validatePatch", () => {
    it("accepts an empty patch", () => {
        expect(unwrap(validatePatch("venue", {}))).toEqual({});
    });

    it("does not fill in defaults", () => {
        expect(unwrap(validatePatch("booking", { seatCount: 3 }))).toEqual({ seatCount: 3 });
    });

    it("applies the create rules to the fields present", () => {
        const error = unwrapError(validatePatch("event", { name: "Renamed", capacity: -1 }));
        expect(error.issues).toEqual([{ field: "capacity", reason: "must be a positive integer" }]);
    });
});
