import type { FastifyInstance } from "fastify";
import type { Core } from "../lib/core.js";
import { registerCrud } from "./crud.js";
import { idParams, sendError, sendResult, type IdParams } from "./reply.js";
import { readUpload } from "./upload.js";

export default async function venueRoutes(fastify: FastifyInstance, { core }: { core: Core }) {
    registerCrud(fastify, "/api/venues", core.venues);

    // --- UPLOAD Venue Photo ---
    fastify.post<IdParams>("/api/venues/:id/photo", { schema: { params: idParams } }, async (request, reply) => {
        const upload = await readUpload(request);
        if (!upload.ok) return sendError(reply, upload.error);
        return sendResult(reply, await core.media.attach("venue", request.params.id, "venue_photo", upload.value), 201);
    });
}
