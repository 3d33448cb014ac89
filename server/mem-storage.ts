import type {
  Item,
  InsertItem,
  HistoryRecord,
  InsertHistoryRecord,
  UserPreference,
  ItemSummary,
  ItemLocationOverview,
  Language,
} from "@shared/schema";
import type { Match } from "@shared/conversation";
import { sortHistoryChronologically } from "@shared/routeGeometry";
import { cosineSimilarity } from "./embedding-service";
import type { FirstSighting, IStorage } from "./storage";

export interface MemStorageOptions {
  now?: () => Date;
}

/**
 * In-process storage for tests and for running without DATABASE_URL.
 * Similarity search is an exact linear scan.
 */
export class MemStorage implements IStorage {
  private items = new Map<number, Item>();
  private history = new Map<number, HistoryRecord>();
  private preferences = new Map<string, UserPreference>();
  private nextItemId = 1;
  private nextHistoryId = 1;
  private readonly now: () => Date;

  constructor(options: MemStorageOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async registerItem(item: InsertItem, firstSighting: FirstSighting): Promise<{ item: Item; record: HistoryRecord }> {
    const created: Item = {
      id: this.nextItemId++,
      name: item.name,
      description: item.description ?? null,
      photoRef: item.photoRef,
      embedding: [...item.embedding],
      registeredByUserId: item.registeredByUserId,
      createdAt: this.now(),
    };
    this.items.set(created.id, created);
    const record = await this.appendHistory({ ...firstSighting, itemId: created.id });
    return { item: created, record };
  }

  async getItem(id: number): Promise<Item | undefined> {
    return this.items.get(id);
  }

  async getItemSummary(id: number): Promise<ItemSummary | undefined> {
    const item = this.items.get(id);
    return item ? this.summarize(item) : undefined;
  }

  async getItemsByUser(userId: string): Promise<ItemSummary[]> {
    return Array.from(this.items.values())
      .filter((item) => item.registeredByUserId === userId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .map((item) => this.summarize(item));
  }

  async listItemLocations(): Promise<ItemLocationOverview[]> {
    return Array.from(this.items.values())
      .sort((a, b) => a.id - b.id)
      .map((item) => {
        const located = this.recordsFor(item.id).filter(
          (record) => record.latitude !== null && record.longitude !== null
        );
        const last = located[located.length - 1];
        return {
          id: item.id,
          name: item.name,
          sightings: this.recordsFor(item.id).length,
          latestLocation:
            last && last.latitude !== null && last.longitude !== null
              ? { latitude: last.latitude, longitude: last.longitude, recordedAt: last.createdAt }
              : null,
        };
      });
  }

  async deleteItem(id: number, userId: string): Promise<boolean> {
    const item = this.items.get(id);
    if (!item || item.registeredByUserId !== userId) return false;

    this.items.delete(id);
    this.history.forEach((record, recordId) => {
      if (record.itemId === id) this.history.delete(recordId);
    });
    return true;
  }

  async findNearestItems(embedding: number[], limit: number): Promise<Match[]> {
    const scored: Match[] = [];
    this.items.forEach((item) => {
      scored.push({ itemId: item.id, similarity: cosineSimilarity(embedding, item.embedding) });
    });

    return scored
      .sort((a, b) => b.similarity - a.similarity || a.itemId - b.itemId)
      .slice(0, limit);
  }

  async appendHistory(record: InsertHistoryRecord): Promise<HistoryRecord> {
    if (!this.items.has(record.itemId)) {
      throw new Error(`Item ${record.itemId} does not exist`);
    }

    const created: HistoryRecord = {
      id: this.nextHistoryId++,
      itemId: record.itemId,
      reporterUserId: record.reporterUserId,
      photoRef: record.photoRef,
      latitude: record.latitude ?? null,
      longitude: record.longitude ?? null,
      postalCode: record.postalCode ?? null,
      createdAt: this.now(),
    };
    this.history.set(created.id, created);
    return created;
  }

  // Insertion order, like a table scan; callers sort
  async getHistory(itemId: number): Promise<HistoryRecord[]> {
    return Array.from(this.history.values()).filter((record) => record.itemId === itemId);
  }

  async getUserPreference(userId: string): Promise<UserPreference | undefined> {
    return this.preferences.get(userId);
  }

  async setUserLanguage(userId: string, language: Language): Promise<UserPreference> {
    const existing = this.preferences.get(userId);
    const now = this.now();
    const preference: UserPreference = {
      userId,
      language,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    this.preferences.set(userId, preference);
    return preference;
  }

  private recordsFor(itemId: number): HistoryRecord[] {
    return sortHistoryChronologically(
      Array.from(this.history.values()).filter((record) => record.itemId === itemId)
    );
  }

  private summarize(item: Item): ItemSummary {
    const { embedding: _embedding, ...rest } = item;
    return { ...rest, sightings: this.recordsFor(item.id).length };
  }
}
