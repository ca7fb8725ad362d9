import type admin from "firebase-admin";
import { COLLECTIONS, type DocMap, type EntityKind, type Stored } from "../../types/entities.js";
import { UnavailableError } from "../errors.js";
import { byCreatedAt, type DocumentStore } from "./documentStore.js";

export class FirestoreStore implements DocumentStore {
    constructor(private readonly db: admin.firestore.Firestore) {}

    insert<K extends EntityKind>(kind: K, doc: DocMap[K]): Promise<Stored<K>> {
        return this.guard(`insert into ${COLLECTIONS[kind]}`, async () => {
            const ref = this.collection(kind).doc();
            await ref.set(doc);
            const stored: Stored<K> = { id: ref.id, ...doc };
            return stored;
        });
    }

    get<K extends EntityKind>(kind: K, id: string): Promise<Stored<K> | null> {
        return this.guard(`read ${COLLECTIONS[kind]}/${id}`, async () => {
            const snap = await this.collection(kind).doc(id).get();
            if (!snap.exists) return null;
            return this.toEntity(kind, snap);
        });
    }

    list<K extends EntityKind>(kind: K): Promise<Stored<K>[]> {
        return this.guard(`list ${COLLECTIONS[kind]}`, async () => {
            const snapshot = await this.collection(kind).orderBy("createdAt", "asc").get();
            return snapshot.docs.map((doc) => this.toEntity(kind, doc));
        });
    }

    findBy<K extends EntityKind>(kind: K, field: keyof DocMap[K] & string, value: string): Promise<Stored<K>[]> {
        return this.guard(`query ${COLLECTIONS[kind]} by ${field}`, async () => {
            // Sorted here rather than with orderBy so no composite index is needed.
            const snapshot = await this.collection(kind).where(field, "==", value).get();
            return snapshot.docs.map((doc) => this.toEntity(kind, doc)).sort(byCreatedAt);
        });
    }

    update<K extends EntityKind>(kind: K, id: string, patch: Partial<DocMap[K]>): Promise<Stored<K> | null> {
        return this.guard(`update ${COLLECTIONS[kind]}/${id}`, () =>
            this.db.runTransaction(async (t) => {
                const ref = this.collection(kind).doc(id);
                const snap = await t.get(ref);
                if (!snap.exists) return null;
                t.update<admin.firestore.DocumentData, admin.firestore.DocumentData>(ref, patch);
                const next: Stored<K> = { ...this.toEntity(kind, snap), ...patch, id };
                return next;
            }),
        );
    }

    remove(kind: EntityKind, id: string): Promise<boolean> {
        return this.guard(`delete ${COLLECTIONS[kind]}/${id}`, () =>
            this.db.runTransaction(async (t) => {
                const ref = this.collection(kind).doc(id);
                const snap = await t.get(ref);
                if (!snap.exists) return false;
                t.delete(ref);
                return true;
            }),
        );
    }

    private collection(kind: EntityKind) {
        return this.db.collection(COLLECTIONS[kind]);
    }

    private toEntity<K extends EntityKind>(_kind: K, snap: admin.firestore.DocumentSnapshot): Stored<K> {
        return { id: snap.id, ...snap.data() } as Stored<K>;
    }

    private async guard<T>(operation: string, task: () => Promise<T>): Promise<T> {
        try {
            return await task();
        } catch (err) {
            throw new UnavailableError(`Document store failed to ${operation}`, err);
        }
    }
}
