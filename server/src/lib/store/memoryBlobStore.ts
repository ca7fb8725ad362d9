import type { StoredMedia } from "../../types/entities.js";
import type { BlobStore } from "./blobStore.js";

export class MemoryBlobStore implements BlobStore {
    private readonly blobs = new Map<string, StoredMedia>();

    async put(media: StoredMedia): Promise<void> {
        await Promise.resolve();
        this.blobs.set(media.ref, { ...media, bytes: Buffer.from(media.bytes) });
    }

    async get(ref: string): Promise<StoredMedia | null> {
        await Promise.resolve();
        return this.blobs.get(ref) ?? null;
    }
}
