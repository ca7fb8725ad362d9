import type { FastifyInstance } from "fastify";
import type { Core } from "../lib/core.js";
import type { AttachmentKind } from "../types/entities.js";
import { registerCrud } from "./crud.js";
import { idParams, sendError, sendResult, type IdParams } from "./reply.js";
import { readUpload } from "./upload.js";

const UPLOADS: Array<{ path: string; kind: AttachmentKind }> = [
    { path: "poster", kind: "poster" },
    { path: "promo-video", kind: "promo_video" },
];

export default async function eventRoutes(fastify: FastifyInstance, { core }: { core: Core }) {
    registerCrud(fastify, "/api/events", core.events);

    // --- Seats booked and left ---
    fastify.get<IdParams>("/api/events/:id/availability", { schema: { params: idParams } }, async (request, reply) => {
        return sendResult(reply, await core.events.availability(request.params.id));
    });

    // --- UPLOAD Poster / Promo Video ---
    for (const { path, kind } of UPLOADS) {
        fastify.post<IdParams>(`/api/events/:id/${path}`, { schema: { params: idParams } }, async (request, reply) => {
            const upload = await readUpload(request);
            if (!upload.ok) return sendError(reply, upload.error);
            return sendResult(reply, await core.media.attach("event", request.params.id, kind, upload.value), 201);
        });
    }
}
