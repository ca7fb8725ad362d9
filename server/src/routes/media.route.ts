import type { FastifyInstance } from "fastify";
import type { Core } from "../lib/core.js";
import { idParams, sendError, type IdParams } from "./reply.js";

export default async function mediaRoutes(fastify: FastifyInstance, { core }: { core: Core }) {
    // --- DOWNLOAD Media ---
    fastify.get<IdParams>("/api/media/:id", { schema: { params: idParams } }, async (request, reply) => {
        const media = await core.media.fetch(request.params.id);
        if (!media.ok) return sendError(reply, media.error);

        const { contentType, filename, bytes } = media.value;
        return reply
            .header("content-type", contentType)
            .header("content-disposition", `inline; filename="${encodeURIComponent(filename)}"`)
            .send(bytes);
    });
}
