import type { FastifyRequest } from "fastify";
import { ValidationError } from "../lib/errors.js";
import type { Upload } from "../lib/mediaManager.js";
import { fail, ok, type Result } from "../lib/result.js";

/**
 * Reads the single `file` part of a multipart request. Oversized files and
 * non-multipart requests throw plugin errors, answered by the error handler.
 */
export async function readUpload(request: FastifyRequest): Promise<Result<Upload>> {
    const file = await request.file();
    if (!file) return fail(ValidationError.of("file", "is required"));
    if (file.fieldname !== "file") return fail(ValidationError.of("file", `unexpected field "${file.fieldname}"`));

    const bytes = await file.toBuffer();
    return ok({ bytes, contentType: file.mimetype, filename: file.filename });
}
