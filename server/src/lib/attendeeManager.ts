import { lockKey, type Attendee } from "../types/entities.js";
import { now, type ManagerContext } from "./context.js";
import { NotFoundError } from "./errors.js";
import { fail, ok, settle, type Result } from "./result.js";
import { validate, validatePatch } from "./validators.js";

export function createAttendeeManager({ store, locks, integrity, logger }: ManagerContext) {
    const log = logger.child({ manager: "attendees" });

    return {
        create(payload: unknown): Promise<Result<Attendee>> {
            return settle(async () => {
                const input = validate("attendee", payload);
                if (!input.ok) return input;

                const attendee = await store.insert("attendee", { ...input.value, createdAt: now() });
                log.info({ attendeeId: attendee.id }, "Attendee registered");
                return ok(attendee);
            });
        },

        get(id: string): Promise<Result<Attendee>> {
            return settle(async () => {
                const attendee = await store.get("attendee", id);
                return attendee ? ok(attendee) : fail(new NotFoundError("attendee", id));
            });
        },

        list(): Promise<Result<Attendee[]>> {
            return settle(async () => ok(await store.list("attendee")));
        },

        update(id: string, payload: unknown): Promise<Result<Attendee>> {
            return settle(async () => {
                const patch = validatePatch("attendee", payload);
                if (!patch.ok) return patch;

                const attendee = await store.update("attendee", id, patch.value);
                return attendee ? ok(attendee) : fail(new NotFoundError("attendee", id));
            });
        },

        remove(id: string): Promise<Result<Attendee>> {
            return settle(() =>
                locks.withLock([lockKey("attendee", id)], async (): Promise<Result<Attendee>> => {
                    const attendee = await store.get("attendee", id);
                    if (!attendee) return fail(new NotFoundError("attendee", id));

                    const allowed = await integrity.verifyDelete("attendee", id);
                    if (!allowed.ok) {
                        log.warn({ attendeeId: id, bookings: allowed.error.dependentIds }, "Attendee delete blocked");
                        return allowed;
                    }

                    await store.remove("attendee", id);
                    log.info({ attendeeId: id }, "Attendee deleted");
                    return ok(attendee);
                }),
            );
        },
    };
}

export type AttendeeManager = ReturnType<typeof createAttendeeManager>;
