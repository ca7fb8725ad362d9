import type { StoredMedia } from "../../types/entities.js";

/** Media bytes keyed by generated ref. Throws UnavailableError on driver failures. */
export interface BlobStore {
    put(media: StoredMedia): Promise<void>;
    get(ref: string): Promise<StoredMedia | null>;
}
