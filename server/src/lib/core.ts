import type { Logger } from "../logger.js";
import { createAttendeeManager } from "./attendeeManager.js";
import { createBookingManager } from "./bookingManager.js";
import { CapacityLedger } from "./capacityLedger.js";
import type { ManagerContext } from "./context.js";
import { createEventManager } from "./eventManager.js";
import { IntegrityEngine } from "./integrity.js";
import type { KeyedLock } from "./locks.js";
import { MediaManager, type MediaLimits } from "./mediaManager.js";
import type { BlobStore } from "./store/blobStore.js";
import type { DocumentStore } from "./store/documentStore.js";
import { createVenueManager } from "./venueManager.js";

export interface CoreDeps {
    store: DocumentStore;
    blobs: BlobStore;
    locks: KeyedLock;
    logger: Logger;
    mediaLimits: MediaLimits;
}

export function createCore({ store, blobs, locks, logger, mediaLimits }: CoreDeps) {
    const integrity = new IntegrityEngine(store);
    const ledger = new CapacityLedger(store, locks, logger.child({ component: "ledger" }));
    const context: ManagerContext = { store, locks, integrity, ledger, logger };

    return {
        integrity,
        ledger,
        venues: createVenueManager(context),
        events: createEventManager(context),
        attendees: createAttendeeManager(context),
        bookings: createBookingManager(context),
        media: new MediaManager(store, blobs, integrity, locks, mediaLimits, logger.child({ component: "media" })),
    };
}

export type Core = ReturnType<typeof createCore>;
