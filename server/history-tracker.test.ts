import { HistoryTracker, RouteBuilder } from './history-tracker';
import { MemStorage } from './mem-storage';
import { ErrorCode } from './error-handling';
import { ManualClock } from './testing/fakes';

async function setup() {
  const clock = new ManualClock();
  const storage = new MemStorage({ now: clock.date });
  const { item } = await storage.registerItem(
    { name: 'Ladybug', description: null, photoRef: 'p0.jpg', embedding: [1, 0], registeredByUserId: 'owner' },
    { reporterUserId: 'owner', photoRef: 'p0.jpg', latitude: 52.1, longitude: 21.0, postalCode: null }
  );
  const tracker = new HistoryTracker(storage);
  return { clock, storage, item, tracker };
}

describe('HistoryTracker', () => {
  it('should store coordinates and postal code on append', async () => {
    const { tracker, item } = await setup();

    const record = await tracker.append(item.id, 'finder', 'p1.jpg', {
      coordinates: { latitude: 52.23, longitude: 21.01 },
      postalCode: '00-001',
    });

    expect(record).toMatchObject({
      itemId: item.id,
      reporterUserId: 'finder',
      photoRef: 'p1.jpg',
      latitude: 52.23,
      longitude: 21.01,
      postalCode: '00-001',
    });
  });

  it('should keep a sighting without location', async () => {
    const { tracker, item } = await setup();

    const record = await tracker.append(item.id, 'finder', 'p1.jpg', null);

    expect(record.latitude).toBeNull();
    expect(record.longitude).toBeNull();
    expect(record.postalCode).toBeNull();
    expect(await tracker.listOrdered(item.id)).toHaveLength(2);
  });

  it('should list in creation order regardless of insertion order', async () => {
    const { tracker, item, clock } = await setup();

    // A clock that jumps back, as with records arriving from a lagging writer
    clock.advance(10 * 60 * 1000);
    const late = await tracker.append(item.id, 'a', 'late.jpg', null);
    clock.advance(-5 * 60 * 1000);
    const early = await tracker.append(item.id, 'b', 'early.jpg', null);

    const ordered = await tracker.listOrdered(item.id);
    const times = ordered.map((r) => r.createdAt.getTime());

    expect(ordered.map((r) => r.id)).toEqual([1, early.id, late.id]);
    expect(times).toEqual([...times].sort((a, b) => a - b));
  });

  it('should order equal timestamps by record id', async () => {
    const { tracker, item } = await setup();

    const second = await tracker.append(item.id, 'a', 'a.jpg', null);
    const third = await tracker.append(item.id, 'b', 'b.jpg', null);

    expect((await tracker.listOrdered(item.id)).map((r) => r.id)).toEqual([1, second.id, third.id]);
  });

  it('should fail with PERSISTENCE_UNAVAILABLE for an unknown item', async () => {
    const { tracker } = await setup();
    await expect(tracker.append(999, 'a', 'a.jpg', null)).rejects.toMatchObject({
      code: ErrorCode.PERSISTENCE_UNAVAILABLE,
    });
  });

  it('should drop history together with the item', async () => {
    const { tracker, storage, item } = await setup();
    await tracker.append(item.id, 'a', 'a.jpg', null);

    expect(await storage.deleteItem(item.id, 'owner')).toBe(true);
    expect(await tracker.listOrdered(item.id)).toEqual([]);
  });
});

describe('RouteBuilder', () => {
  it('should build the route from located sightings only', async () => {
    const { tracker, item, clock } = await setup();
    clock.advance(60 * 1000);
    await tracker.append(item.id, 'a', 'a.jpg', null);
    clock.advance(60 * 1000);
    await tracker.append(item.id, 'b', 'b.jpg', {
      coordinates: { latitude: 50.06, longitude: 19.94 },
      postalCode: null,
    });

    const route = await new RouteBuilder(tracker).buildRoute(item.id);

    expect(route.points.map((p) => [p.latitude, p.longitude])).toEqual([
      [52.1, 21.0],
      [50.06, 19.94],
    ]);
    expect(route.markerRoles).toEqual(['start', 'end']);
    expect(route.boundingRegion).toEqual({ south: 50.06, west: 19.94, north: 52.1, east: 21.0 });
  });
});
