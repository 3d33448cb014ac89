import { isLanguage, type HistoryRecord, type ItemSummary, type Language, type ItemLocationOverview } from "@shared/schema";
import {
  expectedInputFor,
  type ConfirmationReply,
  type Coordinates,
  type ErrorReply,
  type ExpectedInput,
  type IncomingPhoto,
  type ItemCard,
  type ListReply,
  type LocationInput,
  type PromptReason,
  type PromptReply,
  type Reply,
  type ResolvedAddress,
  type Session,
  type SessionSnapshot,
  type SessionState,
  type SightingSummary,
} from "@shared/conversation";
import type { RouteGeometry } from "@shared/routeGeometry";
import { AppError, ErrorCode, isRetryableCode, toAppError, withErrorCode } from "./error-handling";
import { trackApiCall } from "./monitoring";
import { withTimeout } from "./retry-strategy";
import type { IStorage } from "./storage";
import type { IdentityResolver } from "./identity-resolver";
import type { HistoryTracker, ObservedLocation, RouteBuilder } from "./history-tracker";
import type { SessionStore } from "./session-store";
import { KeyedQueue } from "./keyed-queue";
import type { EmbeddingProvider, Geocoder, RouteRenderer, SubjectCropper } from "./ports";
import { interpretLocationText, isSkipKeyword, normalizePostalCode, validateCoordinates } from "./location-input";

export interface TrackingEngineDeps {
  storage: IStorage;
  resolver: IdentityResolver;
  history: HistoryTracker;
  routes: RouteBuilder;
  sessions: SessionStore;
  embeddings: EmbeddingProvider;
  cropper: SubjectCropper;
  geocoder: Geocoder;
  renderer?: RouteRenderer;
  queue?: KeyedQueue;
  now?: () => number;
}

export interface TrackingEngineOptions {
  minNameLength: number;
  maxNameLength: number;
  defaultLanguage: Language;
  renderTimeoutMs: number;
}

const DEFAULT_ENGINE_OPTIONS: TrackingEngineOptions = {
  minNameLength: 2,
  maxNameLength: 255,
  defaultLanguage: 'pl',
  renderTimeoutMs: 30000,
};

const MAX_POSTAL_CODE_LENGTH = 20;

type EngineEvent =
  | { kind: 'photo'; photo: IncomingPhoto }
  | { kind: 'text'; text: string }
  | { kind: 'location'; location: LocationInput }
  | { kind: 'cancel' };

interface ResolvedLocation {
  observed: ObservedLocation | null;
  address: ResolvedAddress | null;
}

function prompt(expect: ExpectedInput, reason: PromptReason, extra: Partial<PromptReply> = {}): PromptReply {
  return { ...extra, kind: 'prompt', expect, reason };
}

export function errorReply(code: ErrorCode, expect: ExpectedInput | null): ErrorReply {
  return { kind: 'error', code, retryable: isRetryableCode(code), expect };
}

export function toItemCard(summary: ItemSummary): ItemCard {
  return {
    id: summary.id,
    name: summary.name,
    description: summary.description,
    photoRef: summary.photoRef,
    registeredByUserId: summary.registeredByUserId,
    registeredAt: summary.createdAt,
    sightings: summary.sightings,
  };
}

function toSighting(record: HistoryRecord, address: ResolvedAddress | null): SightingSummary {
  return {
    id: record.id,
    recordedAt: record.createdAt,
    coordinates:
      record.latitude !== null && record.longitude !== null
        ? { latitude: record.latitude, longitude: record.longitude }
        : null,
    postalCode: record.postalCode,
    address,
  };
}

/**
 * Conversation state machine for registering items and recording sightings.
 *
 * Every inbound event goes through `dispatch`, one at a time per user. A step
 * that fails leaves the session exactly as it was, so the user can repeat it.
 * Committed items and sightings are never rolled back.
 */
export class TrackingEngine {
  private readonly options: TrackingEngineOptions;
  private readonly queue: KeyedQueue;
  private readonly now: () => number;

  constructor(private readonly deps: TrackingEngineDeps, options: Partial<TrackingEngineOptions> = {}) {
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...options };
    this.queue = deps.queue ?? new KeyedQueue();
    this.now = deps.now ?? Date.now;
  }

  // ============ CONVERSATION EVENTS ============

  handlePhoto(userId: string, photo: IncomingPhoto): Promise<Reply> {
    return this.enqueue(userId, { kind: 'photo', photo });
  }

  handleText(userId: string, text: string): Promise<Reply> {
    return this.enqueue(userId, { kind: 'text', text });
  }

  handleLocation(userId: string, location: LocationInput): Promise<Reply> {
    return this.enqueue(userId, { kind: 'location', location });
  }

  handleCancel(userId: string): Promise<Reply> {
    return this.enqueue(userId, { kind: 'cancel' });
  }

  private enqueue(userId: string, event: EngineEvent): Promise<Reply> {
    return this.queue.run(userId, () => this.dispatch(userId, event));
  }

  private async dispatch(userId: string, event: EngineEvent): Promise<Reply> {
    const session = this.deps.sessions.get(userId) ?? null;

    try {
      switch (event.kind) {
        case 'cancel':
          return this.cancel(userId);
        case 'photo':
          return await this.onPhoto(userId, session, event.photo);
        case 'text':
          return await this.onText(userId, session, event.text);
        case 'location':
          return await this.onLocation(userId, session, event.location);
      }
    } catch (error) {
      const appError = toAppError(error);
      console.error(
        `[Engine] ${event.kind} from ${userId} failed with ${appError.code}:`,
        appError.originalError?.message ?? appError.message
      );
      // A failed photo is retried by sending it again; otherwise repeat the current step
      const expect = event.kind === 'photo' ? 'photo' : expectedInputFor(session?.state ?? null);
      return errorReply(appError.code, expect);
    }
  }

  private cancel(userId: string): ConfirmationReply {
    const discarded = this.deps.sessions.delete(userId);
    if (discarded) {
      console.log(`[Engine] Session for ${userId} cancelled`);
    }
    return { kind: 'confirmation', outcome: 'cancelled', discarded };
  }

  private async onPhoto(userId: string, session: Session | null, photo: IncomingPhoto): Promise<Reply> {
    const crop = await withErrorCode(ErrorCode.COLLABORATOR_UNAVAILABLE, () =>
      this.deps.cropper.cropSubject(photo.bytes)
    );
    const subject = crop.found ? crop.croppedBytes : photo.bytes;

    const embedding = await withErrorCode(ErrorCode.COLLABORATOR_UNAVAILABLE, () =>
      this.deps.embeddings.embedImage(subject)
    );
    const result = await this.deps.resolver.resolve(embedding);
    const language = session?.language ?? (await this.languageFor(userId));

    const pending = { photoRef: photo.ref, embedding };
    const subjectFound = crop.found;
    const thumbnail = subjectFound ? crop.thumbnailBytes : undefined;

    if (result.kind === 'match') {
      const summary = await this.persistence(() => this.deps.storage.getItemSummary(result.itemId));
      if (summary) {
        console.log(`[Engine] ${userId} photographed item #${summary.id} (similarity ${result.similarity.toFixed(3)})`);
        this.startSession(userId, language, session, {
          tag: 'awaiting_confirmation',
          pending,
          candidate: { itemId: result.itemId, similarity: result.similarity },
        });
        return prompt('location', 'item_recognized', {
          item: toItemCard(summary),
          similarity: result.similarity,
          subjectFound,
          thumbnail,
        });
      }
      console.warn(`[Engine] Matched item #${result.itemId} no longer exists, treating photo as new`);
    }

    this.startSession(userId, language, session, { tag: 'awaiting_name', pending });
    return prompt('name', 'new_item', { subjectFound, thumbnail });
  }

  private async onText(userId: string, session: Session | null, text: string): Promise<Reply> {
    if (!session) {
      return prompt('photo', 'unexpected_input');
    }

    const { state } = session;
    switch (state.tag) {
      case 'awaiting_name': {
        const name = text.trim();
        if (name.length < this.options.minNameLength) {
          return this.reprompt(session, 'name', 'name_too_short');
        }
        if (name.length > this.options.maxNameLength) {
          return this.reprompt(session, 'name', 'name_too_long');
        }
        this.deps.sessions.save({ ...session, state: { tag: 'awaiting_description', pending: state.pending, name } });
        return prompt('description', 'name_accepted');
      }

      case 'awaiting_description': {
        const trimmed = text.trim();
        const description = trimmed.length === 0 || isSkipKeyword(trimmed) ? null : trimmed;
        this.deps.sessions.save({
          ...session,
          state: { tag: 'awaiting_location', pending: state.pending, name: state.name, description },
        });
        return prompt('location', 'description_accepted');
      }

      case 'awaiting_confirmation':
      case 'awaiting_location': {
        const interpreted = interpretLocationText(text);
        if (interpreted.kind === 'postal_code_requested') {
          return this.reprompt(session, 'location', 'postal_code_requested');
        }
        if (interpreted.kind === 'unrecognized') {
          return this.reprompt(session, 'location', 'unexpected_input');
        }
        return this.onLocation(userId, session, interpreted.input);
      }
    }
  }

  private async onLocation(userId: string, session: Session | null, input: LocationInput): Promise<Reply> {
    if (!session) {
      return prompt('photo', 'unexpected_input');
    }
    if (session.state.tag !== 'awaiting_confirmation' && session.state.tag !== 'awaiting_location') {
      return this.reprompt(session, expectedInputFor(session.state), 'unexpected_input');
    }

    const location = await this.resolveLocation(input);
    if (!location) {
      return this.reprompt(session, 'location', 'invalid_location');
    }

    const { state } = session;
    if (state.tag === 'awaiting_location') {
      return this.commitNewItem(userId, state, location);
    }
    return this.commitSighting(userId, state, location);
  }

  // null means the input could not be a location at all
  private async resolveLocation(input: LocationInput): Promise<ResolvedLocation | null> {
    switch (input.kind) {
      case 'skip':
        return { observed: null, address: null };

      case 'coordinates': {
        const coordinates = validateCoordinates(input.latitude, input.longitude);
        if (!coordinates) return null;
        const address = await this.reverseGeocode(coordinates);
        return {
          observed: { coordinates, postalCode: address?.postalCode?.slice(0, MAX_POSTAL_CODE_LENGTH) ?? null },
          address,
        };
      }

      case 'postal_code': {
        const postalCode = normalizePostalCode(input.postalCode);
        if (!postalCode) return null;
        const coordinates = await withErrorCode(ErrorCode.COLLABORATOR_UNAVAILABLE, () =>
          this.deps.geocoder.forward(postalCode)
        );
        return { observed: { coordinates, postalCode }, address: null };
      }
    }
  }

  // The address is for display only, so a lookup failure does not block the sighting
  private async reverseGeocode(coordinates: Coordinates): Promise<ResolvedAddress | null> {
    try {
      return await this.deps.geocoder.reverse(coordinates);
    } catch (error) {
      const appError = toAppError(error, ErrorCode.COLLABORATOR_UNAVAILABLE);
      console.warn(
        `[Engine] Reverse geocoding ${coordinates.latitude}, ${coordinates.longitude} failed (${appError.code}), continuing without address`
      );
      return null;
    }
  }

  private async commitNewItem(
    userId: string,
    state: Extract<SessionState, { tag: 'awaiting_location' }>,
    location: ResolvedLocation
  ): Promise<Reply> {
    const { item, record } = await this.persistence(() =>
      this.deps.storage.registerItem(
        {
          name: state.name,
          description: state.description,
          photoRef: state.pending.photoRef,
          embedding: state.pending.embedding,
          registeredByUserId: userId,
        },
        {
          reporterUserId: userId,
          photoRef: state.pending.photoRef,
          latitude: location.observed?.coordinates?.latitude ?? null,
          longitude: location.observed?.coordinates?.longitude ?? null,
          postalCode: location.observed?.postalCode ?? null,
        }
      )
    );

    this.deps.sessions.delete(userId);
    console.log(`[Engine] ${userId} registered item #${item.id} "${item.name}"`);

    const { embedding: _embedding, ...rest } = item;
    return {
      kind: 'confirmation',
      outcome: 'item_registered',
      item: toItemCard({ ...rest, sightings: 1 }),
      sighting: toSighting(record, location.address),
    };
  }

  private async commitSighting(
    userId: string,
    state: Extract<SessionState, { tag: 'awaiting_confirmation' }>,
    location: ResolvedLocation
  ): Promise<Reply> {
    const summary = await this.persistence(() => this.deps.storage.getItemSummary(state.candidate.itemId));
    if (!summary) {
      // Deleted while the user was answering; there is nothing left to append to
      this.deps.sessions.delete(userId);
      return errorReply(ErrorCode.ITEM_NOT_FOUND, 'photo');
    }

    const record = await this.deps.history.append(summary.id, userId, state.pending.photoRef, location.observed);
    this.deps.sessions.delete(userId);
    console.log(`[Engine] ${userId} recorded sighting #${record.id} of item #${summary.id}`);

    const { route, routeImage } = await this.routeAfterCommit(summary.id);
    return {
      kind: 'confirmation',
      outcome: 'sighting_recorded',
      item: toItemCard({ ...summary, sightings: summary.sightings + 1 }),
      sighting: toSighting(record, location.address),
      route,
      routeImage,
    };
  }

  // Runs after the commit, so failures here are logged instead of reported
  private async routeAfterCommit(itemId: number): Promise<{ route: RouteGeometry | null; routeImage: Uint8Array | null }> {
    let route: RouteGeometry;
    try {
      route = await this.deps.routes.buildRoute(itemId);
    } catch (error) {
      console.error(`[Engine] Route for item #${itemId} unavailable:`, toAppError(error).originalError?.message);
      return { route: null, routeImage: null };
    }

    const renderer = this.deps.renderer;
    if (!renderer || route.points.length === 0) {
      return { route, routeImage: null };
    }

    try {
      const routeImage = await trackApiCall('renderer', () =>
        withTimeout(renderer.render(route), this.options.renderTimeoutMs)
      );
      return { route, routeImage };
    } catch (error) {
      console.error(`[Engine] Rendering route for item #${itemId} failed:`, toAppError(error).originalError?.message);
      return { route, routeImage: null };
    }
  }

  // Any answer counts as activity, including one that is rejected
  private reprompt(session: Session, expect: ExpectedInput, reason: PromptReason): PromptReply {
    this.deps.sessions.save(session);
    return prompt(expect, reason);
  }

  private startSession(userId: string, language: Language, previous: Session | null, state: SessionState): void {
    if (previous) {
      console.log(`[Engine] Discarding unfinished ${previous.state.tag} session for ${userId}`);
    }
    const now = this.now();
    this.deps.sessions.save({ userId, language, state, startedAt: now, lastActivityAt: now });
  }

  private async languageFor(userId: string): Promise<Language> {
    const preference = await this.persistence(() => this.deps.storage.getUserPreference(userId));
    return preference && isLanguage(preference.language) ? preference.language : this.options.defaultLanguage;
  }

  private persistence<T>(fn: () => Promise<T>): Promise<T> {
    return withErrorCode(ErrorCode.PERSISTENCE_UNAVAILABLE, fn);
  }

  // ============ SEARCH & CATALOGUE ============

  /**
   * Text search runs outside the conversation and leaves the session alone.
   */
  async handleTextSearch(userId: string, query: string): Promise<Reply> {
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      return errorReply(ErrorCode.INVALID_INPUT, null);
    }

    try {
      const embedding = await withErrorCode(ErrorCode.COLLABORATOR_UNAVAILABLE, () =>
        this.deps.embeddings.embedText(trimmed)
      );
      const matches = await this.deps.resolver.resolveText(embedding);

      const results: ListReply['results'] = [];
      for (const match of matches) {
        const summary = await this.persistence(() => this.deps.storage.getItemSummary(match.itemId));
        if (summary) {
          results.push({ ...toItemCard(summary), similarity: match.similarity });
        }
      }

      console.log(`[Engine] Text search by ${userId} returned ${results.length} items`);
      return { kind: 'list', query: trimmed, results };
    } catch (error) {
      const appError = toAppError(error);
      console.error(`[Engine] Text search by ${userId} failed with ${appError.code}`);
      return errorReply(appError.code, null);
    }
  }

  async listUserItems(userId: string): Promise<Reply> {
    try {
      const summaries = await this.persistence(() => this.deps.storage.getItemsByUser(userId));
      return {
        kind: 'list',
        query: null,
        results: summaries.map((summary) => ({ ...toItemCard(summary), similarity: null })),
      };
    } catch (error) {
      return errorReply(toAppError(error).code, null);
    }
  }

  async describeItem(itemId: number): Promise<Reply> {
    try {
      const summary = await this.persistence(() => this.deps.storage.getItemSummary(itemId));
      if (!summary) {
        return errorReply(ErrorCode.ITEM_NOT_FOUND, null);
      }
      return { kind: 'list', query: null, results: [{ ...toItemCard(summary), similarity: null }] };
    } catch (error) {
      return errorReply(toAppError(error).code, null);
    }
  }

  /**
   * Only the registering user may delete; history goes with the item.
   */
  async deleteItem(userId: string, itemId: number): Promise<Reply> {
    try {
      const deleted = await this.persistence(() => this.deps.storage.deleteItem(itemId, userId));
      if (!deleted) {
        return errorReply(ErrorCode.ITEM_NOT_FOUND, null);
      }
      console.log(`[Engine] ${userId} deleted item #${itemId}`);
      return { kind: 'confirmation', outcome: 'item_deleted', itemId };
    } catch (error) {
      return errorReply(toAppError(error).code, null);
    }
  }

  async getRoute(itemId: number): Promise<RouteGeometry> {
    const item = await this.persistence(() => this.deps.storage.getItem(itemId));
    if (!item) {
      throw new AppError(ErrorCode.ITEM_NOT_FOUND, undefined, { itemId });
    }
    return this.deps.routes.buildRoute(itemId);
  }

  async listItemLocations(): Promise<ItemLocationOverview[]> {
    return this.persistence(() => this.deps.storage.listItemLocations());
  }

  async setLanguage(userId: string, language: Language): Promise<Reply> {
    try {
      await this.persistence(() => this.deps.storage.setUserLanguage(userId, language));
    } catch (error) {
      return errorReply(toAppError(error).code, null);
    }

    // Through the queue so an in-flight step cannot overwrite the change
    return this.queue.run(userId, async (): Promise<Reply> => {
      const session = this.deps.sessions.get(userId);
      if (session) {
        this.deps.sessions.save({ ...session, language });
      }
      return { kind: 'confirmation', outcome: 'language_changed', language };
    });
  }

  getSessionSnapshot(userId: string): SessionSnapshot {
    const session = this.deps.sessions.get(userId);
    if (!session) {
      return { userId, state: 'idle', expect: 'photo', language: null, startedAt: null, lastActivityAt: null };
    }
    return {
      userId,
      state: session.state.tag,
      expect: expectedInputFor(session.state),
      language: session.language,
      startedAt: session.startedAt,
      lastActivityAt: session.lastActivityAt,
    };
  }
}
