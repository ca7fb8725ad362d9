import type { FastifyReply } from "fastify";
import type { DomainError } from "../lib/errors.js";
import type { Result } from "../lib/result.js";

export const ID_PATTERN = "^[A-Za-z0-9_-]{1,128}$";

export const idParams = {
    type: "object",
    required: ["id"],
    properties: { id: { type: "string", pattern: ID_PATTERN } },
} as const;

export type IdParams = { Params: { id: string } };

export function sendError(reply: FastifyReply, error: DomainError) {
    if (error.statusCode >= 500) reply.log.error({ err: error }, error.message);
    return reply.code(error.statusCode).send({ error: error.message, code: error.code, ...error.details() });
}

export function sendResult<T>(reply: FastifyReply, result: Result<T>, status = 200) {
    if (!result.ok) return sendError(reply, result.error);
    return reply.code(status).send(result.value);
}
