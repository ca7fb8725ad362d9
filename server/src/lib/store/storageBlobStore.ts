import type { getStorage } from "firebase-admin/storage";
import type { AttachmentKind, MediaOwnerKind, StoredMedia } from "../../types/entities.js";
import { UnavailableError } from "../errors.js";
import type { BlobStore } from "./blobStore.js";

type Bucket = ReturnType<ReturnType<typeof getStorage>["bucket"]>;

const OWNER_KINDS: readonly MediaOwnerKind[] = ["event", "venue"];
const ATTACHMENT_KINDS: readonly AttachmentKind[] = ["poster", "promo_video", "venue_photo"];

/** Media in a Cloud Storage bucket under `media/<ref>`; descriptor fields ride along as custom metadata. */
export class StorageBlobStore implements BlobStore {
    constructor(private readonly bucket: Bucket) {}

    async put(media: StoredMedia): Promise<void> {
        try {
            await this.bucket.file(objectPath(media.ref)).save(media.bytes, {
                resumable: false,
                contentType: media.contentType,
                metadata: {
                    metadata: {
                        ownerKind: media.ownerKind,
                        ownerId: media.ownerId,
                        kind: media.kind,
                        filename: media.filename,
                        uploadedAt: media.uploadedAt,
                    },
                },
            });
        } catch (err) {
            throw new UnavailableError(`Blob store failed to write ${media.ref}`, err);
        }
    }

    async get(ref: string): Promise<StoredMedia | null> {
        try {
            const file = this.bucket.file(objectPath(ref));
            const [exists] = await file.exists();
            if (!exists) return null;

            const [[bytes], [meta]] = await Promise.all([file.download(), file.getMetadata()]);
            const custom = meta.metadata ?? {};
            const ownerKind = pick(OWNER_KINDS, custom.ownerKind);
            const kind = pick(ATTACHMENT_KINDS, custom.kind);
            if (!ownerKind || !kind) return null;

            return {
                ref,
                ownerKind,
                ownerId: String(custom.ownerId ?? ""),
                kind,
                filename: String(custom.filename ?? "file"),
                contentType: meta.contentType ?? "application/octet-stream",
                size: bytes.length,
                uploadedAt: String(custom.uploadedAt ?? ""),
                bytes,
            };
        } catch (err) {
            throw new UnavailableError(`Blob store failed to read ${ref}`, err);
        }
    }
}

const objectPath = (ref: string) => `media/${ref}`;

function pick<T extends string>(allowed: readonly T[], value: unknown): T | undefined {
    return allowed.find((candidate) => candidate === value);
}
