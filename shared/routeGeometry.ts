/**
 * Route Geometry
 *
 * Turns an item's sighting history into the ordered point list, marker roles
 * and bounding region a map renderer needs. Pure geometry, no rendering.
 */

import type { HistoryRecord } from './schema';

export type MarkerRole = 'start' | 'waypoint' | 'end';

export interface RoutePoint {
  historyId: number;
  latitude: number;
  longitude: number;
  postalCode: string | null;
  recordedAt: Date;
}

export interface BoundingRegion {
  south: number;
  west: number;
  north: number;
  east: number;
}

export interface RouteGeometry {
  itemId: number;
  points: RoutePoint[];
  markerRoles: MarkerRole[]; // parallel to points
  boundingRegion: BoundingRegion | null;
}

type OrderedRecord = Pick<HistoryRecord, 'id' | 'createdAt'>;

/**
 * Chronological order with record id as the tie-break for equal timestamps
 */
export function compareHistoryRecords(a: OrderedRecord, b: OrderedRecord): number {
  const byTime = a.createdAt.getTime() - b.createdAt.getTime();
  if (byTime !== 0) return byTime;
  return a.id - b.id;
}

export function sortHistoryChronologically<T extends OrderedRecord>(records: readonly T[]): T[] {
  return [...records].sort(compareHistoryRecords);
}

export function markerRolesFor(count: number): MarkerRole[] {
  return Array.from({ length: count }, (_, i): MarkerRole => {
    if (i === 0) return 'start';
    if (i === count - 1) return 'end';
    return 'waypoint';
  });
}

export function boundingRegionOf(points: ReadonlyArray<{ latitude: number; longitude: number }>): BoundingRegion | null {
  if (points.length === 0) return null;

  let south = Infinity;
  let west = Infinity;
  let north = -Infinity;
  let east = -Infinity;

  for (const point of points) {
    south = Math.min(south, point.latitude);
    north = Math.max(north, point.latitude);
    west = Math.min(west, point.longitude);
    east = Math.max(east, point.longitude);
  }

  return { south, west, north, east };
}

/**
 * Build the route for one item. Records without coordinates stay in the
 * history but are left out of the geometry.
 */
export function buildRouteGeometry(itemId: number, history: readonly HistoryRecord[]): RouteGeometry {
  const points: RoutePoint[] = [];

  for (const record of sortHistoryChronologically(history)) {
    if (record.latitude === null || record.longitude === null) continue;
    points.push({
      historyId: record.id,
      latitude: record.latitude,
      longitude: record.longitude,
      postalCode: record.postalCode,
      recordedAt: record.createdAt,
    });
  }

  return {
    itemId,
    points,
    markerRoles: markerRolesFor(points.length),
    boundingRegion: boundingRegionOf(points),
  };
}
