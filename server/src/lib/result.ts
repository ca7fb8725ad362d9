import { DomainError, UnavailableError } from "./errors.js";

export type Result<T, E extends DomainError = DomainError> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const fail = <E extends DomainError>(error: E): { ok: false; error: E } => ({ ok: false, error });

/**
 * Runs a core operation, turning infrastructure failures thrown by the
 * store, blob or lock adapters into an UnavailableError result. Anything
 * else is a bug and keeps propagating.
 */
export async function settle<T>(task: () => Promise<Result<T>>): Promise<Result<T>> {
    try {
        return await task();
    } catch (err) {
        if (err instanceof UnavailableError) return fail(err);
        throw err;
    }
}
