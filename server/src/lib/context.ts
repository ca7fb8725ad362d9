import type { Logger } from "../logger.js";
import type { CapacityLedger } from "./capacityLedger.js";
import type { IntegrityEngine } from "./integrity.js";
import type { KeyedLock } from "./locks.js";
import type { DocumentStore } from "./store/documentStore.js";

/** What every entity manager is built from. */
export interface ManagerContext {
    store: DocumentStore;
    locks: KeyedLock;
    integrity: IntegrityEngine;
    ledger: CapacityLedger;
    logger: Logger;
}

export const now = () => new Date().toISOString();
