import type { Language } from "./schema";
import type { RouteGeometry } from "./routeGeometry";

// Error codes shared by the engine replies and the HTTP layer
export const ErrorCode = {
  COLLABORATOR_UNAVAILABLE: 'COLLABORATOR_UNAVAILABLE',
  COLLABORATOR_TIMEOUT: 'COLLABORATOR_TIMEOUT',
  PERSISTENCE_UNAVAILABLE: 'PERSISTENCE_UNAVAILABLE',
  INVALID_INPUT: 'INVALID_INPUT',
  ITEM_NOT_FOUND: 'ITEM_NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;
export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export type LocationInput =
  | { kind: 'coordinates'; latitude: number; longitude: number }
  | { kind: 'postal_code'; postalCode: string }
  | { kind: 'skip' };

export interface ResolvedAddress {
  postalCode: string | null;
  city: string | null;
  country: string | null;
  displayName: string | null;
}

export interface Match {
  itemId: number;
  similarity: number;
}

export type ResolveResult =
  | ({ kind: 'match' } & Match)
  | { kind: 'no_match'; bestSimilarity: number | null };

export interface IncomingPhoto {
  ref: string;
  bytes: Uint8Array;
}

// ============ SESSION STATE ============
// Idle is the absence of a session.
export type SessionStateTag =
  | 'idle'
  | 'awaiting_confirmation'
  | 'awaiting_name'
  | 'awaiting_description'
  | 'awaiting_location';

export type ExpectedInput = 'photo' | 'name' | 'description' | 'location';

export interface PendingObservation {
  photoRef: string;
  embedding: number[];
}

export type SessionState =
  | { tag: 'awaiting_confirmation'; pending: PendingObservation; candidate: Match }
  | { tag: 'awaiting_name'; pending: PendingObservation }
  | { tag: 'awaiting_description'; pending: PendingObservation; name: string }
  | { tag: 'awaiting_location'; pending: PendingObservation; name: string; description: string | null };

export interface Session {
  userId: string;
  language: Language;
  state: SessionState;
  startedAt: number;
  lastActivityAt: number;
}

export interface SessionSnapshot {
  userId: string;
  state: SessionStateTag;
  expect: ExpectedInput;
  language: Language | null;
  startedAt: number | null;
  lastActivityAt: number | null;
}

export function expectedInputFor(state: SessionState | null): ExpectedInput {
  if (!state) return 'photo';
  switch (state.tag) {
    case 'awaiting_name':
      return 'name';
    case 'awaiting_description':
      return 'description';
    case 'awaiting_confirmation':
    case 'awaiting_location':
      return 'location';
  }
}

// ============ REPLIES ============
// Structured results only, the transport owns every user-facing string.

export interface ItemCard {
  id: number;
  name: string;
  description: string | null;
  photoRef: string;
  registeredByUserId: string;
  registeredAt: Date;
  sightings: number;
}

export interface SightingSummary {
  id: number;
  recordedAt: Date;
  coordinates: Coordinates | null;
  postalCode: string | null;
  address: ResolvedAddress | null;
}

export type PromptReason =
  | 'item_recognized'
  | 'new_item'
  | 'name_accepted'
  | 'description_accepted'
  | 'name_too_short'
  | 'name_too_long'
  | 'invalid_location'
  | 'postal_code_requested'
  | 'unexpected_input';

export interface PromptReply {
  kind: 'prompt';
  expect: ExpectedInput;
  reason: PromptReason;
  item?: ItemCard;
  similarity?: number;
  // photo replies only; false when the whole photo was used as the subject
  subjectFound?: boolean;
  thumbnail?: Uint8Array;
}

export type ConfirmationReply =
  | { kind: 'confirmation'; outcome: 'item_registered'; item: ItemCard; sighting: SightingSummary }
  | {
      kind: 'confirmation';
      outcome: 'sighting_recorded';
      item: ItemCard;
      sighting: SightingSummary;
      route: RouteGeometry | null;
      routeImage: Uint8Array | null;
    }
  | { kind: 'confirmation'; outcome: 'cancelled'; discarded: boolean }
  | { kind: 'confirmation'; outcome: 'item_deleted'; itemId: number }
  | { kind: 'confirmation'; outcome: 'language_changed'; language: Language };

export interface ErrorReply {
  kind: 'error';
  code: ErrorCode;
  retryable: boolean;
  expect: ExpectedInput | null;
}

export interface ListReply {
  kind: 'list';
  query: string | null;
  results: Array<ItemCard & { similarity: number | null }>;
}

export type Reply = PromptReply | ConfirmationReply | ErrorReply | ListReply;
