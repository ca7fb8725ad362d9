import type { DocMap, EntityKind, Stored } from "../../types/entities.js";

/**
 * Keyed access to the four collections. Implementations know nothing about
 * relations between them and throw UnavailableError on driver failures.
 */
export interface DocumentStore {
    insert<K extends EntityKind>(kind: K, doc: DocMap[K]): Promise<Stored<K>>;
    get<K extends EntityKind>(kind: K, id: string): Promise<Stored<K> | null>;
    /** All documents of a collection in insertion order. */
    list<K extends EntityKind>(kind: K): Promise<Stored<K>[]>;
    /** Documents whose `field` equals `value`, in insertion order. */
    findBy<K extends EntityKind>(kind: K, field: keyof DocMap[K] & string, value: string): Promise<Stored<K>[]>;
    /** Single-document merge. Resolves null when the document is missing. */
    update<K extends EntityKind>(kind: K, id: string, patch: Partial<DocMap[K]>): Promise<Stored<K> | null>;
    /** Resolves false when the document is missing. */
    remove(kind: EntityKind, id: string): Promise<boolean>;
}

export const byCreatedAt = (a: { createdAt: string }, b: { createdAt: string }) =>
    a.createdAt < b.createdAt ? -1 : a.createdAt > b.createdAt ? 1 : 0;
