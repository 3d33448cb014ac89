import type { HistoryRecord } from "@shared/schema";
import type { Coordinates } from "@shared/conversation";
import { buildRouteGeometry, sortHistoryChronologically, type RouteGeometry } from "@shared/routeGeometry";
import { ErrorCode, withErrorCode } from "./error-handling";
import type { IStorage } from "./storage";

export interface ObservedLocation {
  coordinates: Coordinates | null;
  postalCode: string | null;
}

/**
 * Append-only sighting log. Deleting an item is the only way records go away.
 */
export class HistoryTracker {
  constructor(private readonly storage: IStorage) {}

  async append(
    itemId: number,
    reporterUserId: string,
    photoRef: string,
    location: ObservedLocation | null
  ): Promise<HistoryRecord> {
    return withErrorCode(ErrorCode.PERSISTENCE_UNAVAILABLE, () =>
      this.storage.appendHistory({
        itemId,
        reporterUserId,
        photoRef,
        latitude: location?.coordinates?.latitude ?? null,
        longitude: location?.coordinates?.longitude ?? null,
        postalCode: location?.postalCode ?? null,
      })
    );
  }

  // Storage order is not trusted, equal timestamps fall back to record id
  async listOrdered(itemId: number): Promise<HistoryRecord[]> {
    const records = await withErrorCode(ErrorCode.PERSISTENCE_UNAVAILABLE, () =>
      this.storage.getHistory(itemId)
    );
    return sortHistoryChronologically(records);
  }
}

export class RouteBuilder {
  constructor(private readonly history: HistoryTracker) {}

  async buildRoute(itemId: number): Promise<RouteGeometry> {
    return buildRouteGeometry(itemId, await this.history.listOrdered(itemId));
  }
}
