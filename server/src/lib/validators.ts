import { z } from "zod";
import { TICKET_TYPES, type EntityKind } from "../types/entities.js";
import { ValidationError, type FieldIssue } from "./errors.js";
import { fail, ok, type Result } from "./result.js";

const MAX_TEXT = 5000;
const EMAIL = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const PHONE = /^[\d+\-() ]{7,}$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

const text = () =>
    z
        .string({ required_error: "is required", invalid_type_error: "must be a string" })
        .transform((value) => value.replace(/\0/g, "").trim())
        .pipe(
            z
                .string()
                .min(1, "must not be empty")
                .max(MAX_TEXT, `must be at most ${MAX_TEXT} characters`),
        );

const positiveInt = () =>
    z
        .number({ required_error: "is required", invalid_type_error: "must be a number" })
        .int("must be an integer")
        .positive("must be a positive integer");

// Date.parse rolls 2030-02-31 over to March; the calendar date must survive as written.
const isCalendarDate = (value: string) => {
    const [year, month, day] = value.slice(0, 10).split("-").map(Number);
    const date = new Date(Date.UTC(year, month - 1, day));
    return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
};

const isoDate = () =>
    text().refine(
        (value) => ISO_DATE.test(value) && !Number.isNaN(Date.parse(value)) && isCalendarDate(value),
        "must be an ISO-8601 date",
    );

// Field order below is the order violations are reported in.
const venueSchema = z.object({
    name: text(),
    address: text(),
    capacity: positiveInt(),
});

const eventSchema = z.object({
    name: text(),
    description: text().optional(),
    date: isoDate(),
    venueId: text(),
    capacity: positiveInt(),
});

const attendeeSchema = z.object({
    name: text(),
    email: text().refine((value) => EMAIL.test(value), "must be a valid email address"),
    phone: text()
        .refine((value) => PHONE.test(value), "must be a valid phone number")
        .optional(),
});

const bookingSchema = z.object({
    eventId: text(),
    attendeeId: text(),
    seatCount: positiveInt(),
    ticketType: z
        .enum(TICKET_TYPES, {
            errorMap: () => ({ message: `must be one of ${TICKET_TYPES.join(", ")}` }),
        })
        .default("general"),
});

const bookingPatchSchema = bookingSchema.extend({
    ticketType: bookingSchema.shape.ticketType.removeDefault(),
});

const schemas = {
    venue: { create: venueSchema, patch: venueSchema.partial() },
    event: { create: eventSchema, patch: eventSchema.partial() },
    attendee: { create: attendeeSchema, patch: attendeeSchema.partial() },
    booking: { create: bookingSchema, patch: bookingPatchSchema.partial() },
};

export type CreateInput = { [K in EntityKind]: z.output<(typeof schemas)[K]["create"]> };
export type PatchInput = { [K in EntityKind]: z.output<(typeof schemas)[K]["patch"]> };

export type VenueInput = CreateInput["venue"];
export type EventInput = CreateInput["event"];
export type AttendeeInput = CreateInput["attendee"];
export type BookingInput = CreateInput["booking"];

function parseWith<S extends z.ZodTypeAny>(schema: S, payload: unknown): Result<z.output<S>, ValidationError> {
    if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
        return fail(ValidationError.of("body", "must be a JSON object"));
    }
    const parsed = schema.safeParse(payload);
    if (parsed.success) return ok(parsed.data);

    const issues = parsed.error.issues.map(toFieldIssue);
    const [first, ...rest] = issues;
    return fail(new ValidationError(first ? [first, ...rest] : [{ field: "body", reason: "is invalid" }]));
}

function toFieldIssue(issue: z.ZodIssue): FieldIssue {
    return { field: issue.path.length ? issue.path.join(".") : "body", reason: issue.message };
}

type Validators = {
    [K in EntityKind]: {
        create(payload: unknown): Result<CreateInput[K], ValidationError>;
        patch(payload: unknown): Result<PatchInput[K], ValidationError>;
    };
};

const validators: Validators = {
    venue: {
        create: (payload) => parseWith(schemas.venue.create, payload),
        patch: (payload) => parseWith(schemas.venue.patch, payload),
    },
    event: {
        create: (payload) => parseWith(schemas.event.create, payload),
        patch: (payload) => parseWith(schemas.event.patch, payload),
    },
    attendee: {
        create: (payload) => parseWith(schemas.attendee.create, payload),
        patch: (payload) => parseWith(schemas.attendee.patch, payload),
    },
    booking: {
        create: (payload) => parseWith(schemas.booking.create, payload),
        patch: (payload) => parseWith(schemas.booking.patch, payload),
    },
};

/** Shape-checks a create payload. References and capacity are not looked at. */
export function validate<K extends EntityKind>(kind: K, payload: unknown): Result<CreateInput[K], ValidationError> {
    return validators[kind].create(payload);
}

/** Same rules as {@link validate}, for the fields present in an update. */
export function validatePatch<K extends EntityKind>(kind: K, payload: unknown): Result<PatchInput[K], ValidationError> {
    return validators[kind].patch(payload);
}
