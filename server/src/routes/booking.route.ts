import type { FastifyInstance } from "fastify";
import type { Core } from "../lib/core.js";
import { registerCrud } from "./crud.js";

export default async function bookingRoutes(fastify: FastifyInstance, { core }: { core: Core }) {
    registerCrud(fastify, "/api/bookings", core.bookings);
}
