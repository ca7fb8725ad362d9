import { sanitizeFilename } from "../src/lib/mediaManager.js";
import type { BlobStore } from "../src/lib/store/blobStore.js";
import type { Event, Venue } from "../src/types/entities.js";
import { createTestCore, seedEvent, seedVenue, unwrap, unwrapError, type TestCore } from "./helpers/core.js";

const png = Buffer.from("\x89PNG fake image bytes");

describe("MediaManager", () => {
    let core: TestCore;
    let blobs: BlobStore;
    let venue: Venue;
    let event: Event;

    beforeEach(async () => {
        const created = createTestCore();
        core = created.core;
        blobs = created.blobs;
        venue = await seedVenue(core);
        event = await seedEvent(core, venue.id);
    });

    it("stores a poster and points the event at it", async () => {
        const media = unwrap(
            await core.media.attach("event", event.id, "poster", { bytes: png, contentType: "image/png", filename: "poster.png" }),
        );

        expect(media).toMatchObject({
            ownerKind: "event",
            ownerId: event.id,
            kind: "poster",
            filename: "poster.png",
            contentType: "image/png",
            size: png.length,
        });
        expect(media).not.toHaveProperty("bytes");
        expect(unwrap(await core.events.get(event.id)).posterRef).toBe(media.ref);

        const stored = await blobs.get(media.ref);
        expect(stored?.bytes.equals(png)).toBe(true);
    });

    it("replaces an earlier poster reference", async () => {
        const first = unwrap(await core.media.attach("event", event.id, "poster", { bytes: png, contentType: "image/png" }));
        const second = unwrap(await core.media.attach("event", event.id, "poster", { bytes: png, contentType: "image/jpeg" }));

        expect(second.ref).not.toBe(first.ref);
        expect(unwrap(await core.events.get(event.id)).posterRef).toBe(second.ref);
        expect(await blobs.get(first.ref)).not.toBeNull();
    });

    it("stores a promo video within the video limit", async () => {
        const video = Buffer.alloc(2048, 1);

        const media = unwrap(await core.media.attach("event", event.id, "promo_video", { bytes: video, contentType: "video/mp4" }));

        expect(media.filename).toBe("file");
        expect(unwrap(await core.events.get(event.id)).videoRef).toBe(media.ref);
    });

    it("stores a venue photo", async () => {
        const media = unwrap(
            await core.media.attach("venue", venue.id, "venue_photo", { bytes: png, contentType: "image/webp", filename: "hall.webp" }),
        );

        expect(unwrap(await core.venues.get(venue.id)).photoRef).toBe(media.ref);
    });

    it("drops content type parameters and case", async () => {
        const media = unwrap(
            await core.media.attach("event", event.id, "poster", { bytes: png, contentType: "Image/PNG; charset=binary" }),
        );

        expect(media.contentType).toBe("image/png");
    });

    it("reports a missing owner as not found", async () => {
        const error = unwrapError(await core.media.attach("event", "gone", "poster", { bytes: png, contentType: "image/png" }));

        expect(error.code).toBe("NOT_FOUND");
        expect(error.message).toBe('event "gone" not found');
    });

    it("rejects a kind that belongs to the other owner", async () => {
        const error = unwrapError(await core.media.attach("venue", venue.id, "poster", { bytes: png, contentType: "image/png" }));
        expect(error.message).toBe("kind: cannot be attached to a venue");
    });

    it("rejects a content type outside the allowed list", async () => {
        const error = unwrapError(await core.media.attach("event", event.id, "poster", { bytes: png, contentType: "application/pdf" }));
        expect(error.message).toBe("contentType: must be one of image/jpeg, image/png, image/webp, image/gif");
    });

    it("rejects an empty file", async () => {
        const error = unwrapError(
            await core.media.attach("event", event.id, "poster", { bytes: Buffer.alloc(0), contentType: "image/png" }),
        );
        expect(error.message).toBe("file: must not be empty");
    });

    it("rejects an image over the size limit and leaves the event unchanged", async () => {
        const error = unwrapError(
            await core.media.attach("event", event.id, "poster", { bytes: Buffer.alloc(1025), contentType: "image/png" }),
        );

        expect(error.message).toBe("file: must be at most 1024 bytes");
        expect(unwrap(await core.events.get(event.id)).posterRef).toBeUndefined();
    });

    it("validates the upload before looking up the owner", async () => {
        const error = unwrapError(await core.media.attach("event", "gone", "poster", { bytes: png, contentType: "text/plain" }));
        expect(error.code).toBe("VALIDATION_ERROR");
    });

    it("fetches stored media and reports unknown refs", async () => {
        const media = unwrap(await core.media.attach("event", event.id, "poster", { bytes: png, contentType: "image/png" }));

        const fetched = unwrap(await core.media.fetch(media.ref));
        expect(fetched.bytes.equals(png)).toBe(true);
        expect(fetched.contentType).toBe("image/png");

        expect(unwrapError(await core.media.fetch("nope")).message).toBe('media "nope" not found');
    });
});

describe("sanitizeFilename", () => {
    it.each([
        ["poster.png", "poster.png"],
        ["../../etc/passwd", "passwd"],
        ["C:\\Users\\sam\\poster.png", "poster.png"],
        ['bad<name>?".png', "badname.png"],
        ["tab\there.png", "tabhere.png"],
        ["..", "file"],
        ["", "file"],
    ])("turns %p into %p", (input, expected) => {
        expect(sanitizeFilename(input)).toBe(expected);
    });

    it("caps the length at 255 characters", () => {
        expect(sanitizeFilename(`${"a".repeat(300)}.png`)).toHaveLength(255);
    });
});
