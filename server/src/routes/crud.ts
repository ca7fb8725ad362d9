import type { FastifyInstance } from "fastify";
import type { Result } from "../lib/result.js";
import { idParams, sendError, sendResult, type IdParams } from "./reply.js";

export interface CrudManager<T> {
    create(payload: unknown): Promise<Result<T>>;
    get(id: string): Promise<Result<T>>;
    list(): Promise<Result<T[]>>;
    update(id: string, payload: unknown): Promise<Result<T>>;
    remove(id: string): Promise<Result<T>>;
}

/** POST, GET (list and one), PATCH/PUT and DELETE under `path`. */
export function registerCrud<T>(fastify: FastifyInstance, path: string, manager: CrudManager<T>) {
    fastify.post(path, async (request, reply) => {
        return sendResult(reply, await manager.create(request.body), 201);
    });

    fastify.get(path, async (_request, reply) => {
        const result = await manager.list();
        if (!result.ok) return sendError(reply, result.error);
        return { data: result.value };
    });

    fastify.get<IdParams>(`${path}/:id`, { schema: { params: idParams } }, async (request, reply) => {
        return sendResult(reply, await manager.get(request.params.id));
    });

    // PUT takes the same partial body as PATCH.
    for (const method of ["PATCH", "PUT"] as const) {
        fastify.route<IdParams>({
            method,
            url: `${path}/:id`,
            schema: { params: idParams },
            handler: async (request, reply) => {
                return sendResult(reply, await manager.update(request.params.id, request.body ?? {}));
            },
        });
    }

    fastify.delete<IdParams>(`${path}/:id`, { schema: { params: idParams } }, async (request, reply) => {
        const result = await manager.remove(request.params.id);
        if (!result.ok) return sendError(reply, result.error);
        return reply.code(204).send();
    });
}
