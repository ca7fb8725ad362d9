import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import Fastify, { type FastifyError } from "fastify";
import type { Core } from "./lib/core.js";
import type { Logger } from "./logger.js";
import attendeeRoutes from "./routes/attendee.route.js";
import bookingRoutes from "./routes/booking.route.js";
import eventRoutes from "./routes/event.route.js";
import mediaRoutes from "./routes/media.route.js";
import venueRoutes from "./routes/venue.route.js";

export interface ServerOptions {
    core: Core;
    logger: Logger;
    corsOrigin: boolean | string[];
    /** Hard ceiling enforced while streaming an upload; per-kind limits are checked by the core. */
    maxUploadBytes: number;
}

// Multipart failures the plugin reports as 406/413 are a bad request here.
const UPLOAD_ERRORS = new Set([
    "FST_INVALID_MULTIPART_CONTENT_TYPE",
    "FST_REQ_FILE_TOO_LARGE",
    "FST_FILES_LIMIT",
    "FST_PARTS_LIMIT",
    "FST_FIELDS_LIMIT",
]);

export async function buildServer({ core, logger, corsOrigin, maxUploadBytes }: ServerOptions) {
    const server = Fastify({ logger });

    await server.register(cors, { origin: corsOrigin });
    await server.register(multipart, { limits: { fileSize: maxUploadBytes, files: 1 } });

    server.setErrorHandler((error: FastifyError, request, reply) => {
        if (error.validation) {
            const [first] = error.validation;
            const field = first?.instancePath.replace(/^\//, "") || error.validationContext || "request";
            return reply.code(400).send({
                error: `${field}: ${first?.message ?? "is invalid"}`,
                code: "VALIDATION_ERROR",
                field,
            });
        }
        if (UPLOAD_ERRORS.has(error.code)) {
            return reply.code(400).send({ error: error.message, code: "VALIDATION_ERROR", field: "file" });
        }
        if (error.statusCode && error.statusCode < 500) {
            return reply.code(error.statusCode).send({ error: error.message, code: error.code });
        }

        request.log.error(error);
        return reply.code(500).send({ error: "Internal server error" });
    });

    server.get("/api/health", async () => ({ status: "ok" }));

    await server.register(venueRoutes, { core });
    await server.register(eventRoutes, { core });
    await server.register(attendeeRoutes, { core });
    await server.register(bookingRoutes, { core });
    await server.register(mediaRoutes, { core });

    return server;
}
