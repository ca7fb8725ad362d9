export type EntityKind = "venue" | "event" | "attendee" | "booking";

export const TICKET_TYPES = ["general", "vip", "student"] as const;
export type TicketType = (typeof TICKET_TYPES)[number];

// Documents are type aliases (not interfaces) so they stay assignable to the
// store drivers' index-signature document types.
export type VenueDoc = {
    name: string;
    address: string;
    capacity: number;
    photoRef?: string;
    createdAt: string;
};

export type EventDoc = {
    name: string;
    description?: string;
    date: string;
    venueId: string;
    capacity: number;
    posterRef?: string;
    videoRef?: string;
    createdAt: string;
};

export type AttendeeDoc = {
    name: string;
    email: string;
    phone?: string;
    createdAt: string;
};

export type BookingDoc = {
    eventId: string;
    attendeeId: string;
    seatCount: number;
    ticketType: TicketType;
    createdAt: string;
};

export interface DocMap {
    venue: VenueDoc;
    event: EventDoc;
    attendee: AttendeeDoc;
    booking: BookingDoc;
}

export type WithId<T> = { id: string } & T;

export type Venue = WithId<VenueDoc>;
export type Event = WithId<EventDoc>;
export type Attendee = WithId<AttendeeDoc>;
export type Booking = WithId<BookingDoc>;

export type Stored<K extends EntityKind> = WithId<DocMap[K]>;

export const COLLECTIONS: { [K in EntityKind]: string } = {
    venue: "venues",
    event: "events",
    attendee: "attendees",
    booking: "bookings",
};

export type MediaOwnerKind = "event" | "venue";
export type AttachmentKind = "poster" | "promo_video" | "venue_photo";

/** Descriptor returned after an upload. */
export interface MediaRef {
    ref: string;
    ownerKind: MediaOwnerKind;
    ownerId: string;
    kind: AttachmentKind;
    filename: string;
    contentType: string;
    size: number;
    uploadedAt: string;
}

export interface StoredMedia extends MediaRef {
    bytes: Buffer;
}

export const lockKey = (kind: EntityKind, id: string) => `${kind}:${id}`;
