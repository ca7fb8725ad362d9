import { randomUUID } from "crypto";
import path from "path";
import type { Logger } from "../logger.js";
import {
    lockKey,
    type AttachmentKind,
    type EventDoc,
    type MediaOwnerKind,
    type MediaRef,
    type StoredMedia,
    type VenueDoc,
} from "../types/entities.js";
import { NotFoundError, ValidationError } from "./errors.js";
import type { IntegrityEngine } from "./integrity.js";
import type { KeyedLock } from "./locks.js";
import { fail, ok, settle, type Result } from "./result.js";
import type { BlobStore } from "./store/blobStore.js";
import type { DocumentStore } from "./store/documentStore.js";

const IMAGE_TYPES = ["image/jpeg", "image/png", "image/webp", "image/gif"];
const VIDEO_TYPES = ["video/mp4", "video/webm", "video/quicktime"];

interface AttachmentRule {
    owner: MediaOwnerKind;
    field: "posterRef" | "videoRef" | "photoRef";
    contentTypes: string[];
    media: "image" | "video";
}

const RULES: Record<AttachmentKind, AttachmentRule> = {
    poster: { owner: "event", field: "posterRef", contentTypes: IMAGE_TYPES, media: "image" },
    promo_video: { owner: "event", field: "videoRef", contentTypes: VIDEO_TYPES, media: "video" },
    venue_photo: { owner: "venue", field: "photoRef", contentTypes: IMAGE_TYPES, media: "image" },
};

export interface MediaLimits {
    maxImageBytes: number;
    maxVideoBytes: number;
}

export interface Upload {
    bytes: Buffer;
    contentType: string;
    filename?: string;
}

const normalizeContentType = (contentType: string) => contentType.split(";")[0].trim().toLowerCase();

export function sanitizeFilename(filename: string): string {
    let name = path.basename(filename.replace(/\\/g, "/"));
    name = name.replace(/[<>:"/\\|?*\x00-\x1f]/g, "").replace(/\.\./g, "");
    if (!name) name = "file";
    return name.slice(0, 255);
}

export class MediaManager {
    constructor(
        private readonly store: DocumentStore,
        private readonly blobs: BlobStore,
        private readonly integrity: IntegrityEngine,
        private readonly locks: KeyedLock,
        private readonly limits: MediaLimits,
        private readonly logger: Logger,
    ) {}

    /**
     * Stores the upload and points the owner's reference field at it. The
     * blob it replaces is left unreferenced in the blob store.
     */
    attach(ownerKind: MediaOwnerKind, ownerId: string, kind: AttachmentKind, upload: Upload): Promise<Result<MediaRef>> {
        return settle(async (): Promise<Result<MediaRef>> => {
            const rule = RULES[kind];
            const invalid = this.check(rule, ownerKind, upload);
            if (invalid) return fail(invalid);

            return this.locks.withLock([lockKey(ownerKind, ownerId)], async (): Promise<Result<MediaRef>> => {
                const owner = await this.integrity.resolve(ownerKind, ownerId);
                if (!owner) return fail(new NotFoundError(ownerKind, ownerId));

                const media: StoredMedia = {
                    ref: randomUUID(),
                    ownerKind,
                    ownerId,
                    kind,
                    filename: sanitizeFilename(upload.filename ?? "file"),
                    contentType: normalizeContentType(upload.contentType),
                    size: upload.bytes.length,
                    uploadedAt: new Date().toISOString(),
                    bytes: upload.bytes,
                };
                await this.blobs.put(media);

                const swapped = await this.swapReference(ownerKind, ownerId, rule.field, media.ref);
                if (!swapped) return fail(new NotFoundError(ownerKind, ownerId));

                this.logger.info({ ownerKind, ownerId, kind, ref: media.ref, size: media.size }, "Media attached");
                const { bytes: _bytes, ...descriptor } = media;
                return ok(descriptor);
            });
        });
    }

    fetch(ref: string): Promise<Result<StoredMedia>> {
        return settle(async (): Promise<Result<StoredMedia>> => {
            const media = await this.blobs.get(ref);
            return media ? ok(media) : fail(new NotFoundError("media", ref));
        });
    }

    private check(rule: AttachmentRule, ownerKind: MediaOwnerKind, upload: Upload): ValidationError | null {
        if (rule.owner !== ownerKind) {
            return ValidationError.of("kind", `cannot be attached to a ${ownerKind}`);
        }
        if (!rule.contentTypes.includes(normalizeContentType(upload.contentType))) {
            return ValidationError.of("contentType", `must be one of ${rule.contentTypes.join(", ")}`);
        }
        if (upload.bytes.length === 0) {
            return ValidationError.of("file", "must not be empty");
        }
        const ceiling = rule.media === "video" ? this.limits.maxVideoBytes : this.limits.maxImageBytes;
        if (upload.bytes.length > ceiling) {
            return ValidationError.of("file", `must be at most ${ceiling} bytes`);
        }
        return null;
    }

    private async swapReference(
        ownerKind: MediaOwnerKind,
        ownerId: string,
        field: AttachmentRule["field"],
        ref: string,
    ): Promise<boolean> {
        if (ownerKind === "venue") {
            const patch: Partial<VenueDoc> = field === "photoRef" ? { photoRef: ref } : {};
            return (await this.store.update("venue", ownerId, patch)) !== null;
        }
        const patch: Partial<EventDoc> = field === "posterRef" ? { posterRef: ref } : { videoRef: ref };
        return (await this.store.update("event", ownerId, patch)) !== null;
    }
}
