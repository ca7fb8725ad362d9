import { randomUUID } from "crypto";
import type { DocMap, EntityKind, Stored } from "../../types/entities.js";
import type { DocumentStore } from "./documentStore.js";

type Tables = { [K in EntityKind]: Map<string, Stored<K>> };

/** In-process store used by tests and `STORE_DRIVER=memory`. Maps keep insertion order. */
export class MemoryStore implements DocumentStore {
    private readonly tables: Tables = {
        venue: new Map(),
        event: new Map(),
        attendee: new Map(),
        booking: new Map(),
    };

    async insert<K extends EntityKind>(kind: K, doc: DocMap[K]): Promise<Stored<K>> {
        await Promise.resolve();
        const stored: Stored<K> = { id: randomUUID(), ...doc };
        this.table(kind).set(stored.id, stored);
        return { ...stored };
    }

    async get<K extends EntityKind>(kind: K, id: string): Promise<Stored<K> | null> {
        await Promise.resolve();
        const found = this.table(kind).get(id);
        return found ? { ...found } : null;
    }

    async list<K extends EntityKind>(kind: K): Promise<Stored<K>[]> {
        await Promise.resolve();
        return [...this.table(kind).values()].map((doc) => ({ ...doc }));
    }

    async findBy<K extends EntityKind>(kind: K, field: keyof DocMap[K] & string, value: string): Promise<Stored<K>[]> {
        const all = await this.list(kind);
        return all.filter((doc) => {
            const candidate: unknown = doc[field];
            return candidate === value;
        });
    }

    async update<K extends EntityKind>(kind: K, id: string, patch: Partial<DocMap[K]>): Promise<Stored<K> | null> {
        await Promise.resolve();
        const table = this.table(kind);
        const current = table.get(id);
        if (!current) return null;
        const next: Stored<K> = { ...current, ...patch, id };
        table.set(id, next);
        return { ...next };
    }

    async remove(kind: EntityKind, id: string): Promise<boolean> {
        await Promise.resolve();
        return this.tables[kind].delete(id);
    }

    private table<K extends EntityKind>(kind: K): Tables[K] {
        return this.tables[kind];
    }
}
