import type { FastifyInstance } from "fastify";
import type { Core } from "../lib/core.js";
import { registerCrud } from "./crud.js";

export default async function attendeeRoutes(fastify: FastifyInstance, { core }: { core: Core }) {
    registerCrud(fastify, "/api/attendees", core.attendees);
}
