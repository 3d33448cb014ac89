import {
  items,
  itemHistory,
  userPreferences,
  type Item,
  type InsertItem,
  type HistoryRecord,
  type InsertHistoryRecord,
  type UserPreference,
  type ItemSummary,
  type ItemLocationOverview,
  type Language,
} from "@shared/schema";
import type { Match } from "@shared/conversation";
import { and, asc, cosineDistance, count, desc, eq, isNotNull, sql } from "drizzle-orm";
import type { Database } from "./db";
import { ErrorCode, withErrorCode } from "./error-handling";
import { trackApiCall } from "./monitoring";
import { distanceToSimilarity } from "./embedding-service";

export type FirstSighting = Omit<InsertHistoryRecord, "itemId">;

export interface IStorage {
  // Items
  registerItem(item: InsertItem, firstSighting: FirstSighting): Promise<{ item: Item; record: HistoryRecord }>;
  getItem(id: number): Promise<Item | undefined>;
  getItemSummary(id: number): Promise<ItemSummary | undefined>;
  getItemsByUser(userId: string): Promise<ItemSummary[]>;
  listItemLocations(): Promise<ItemLocationOverview[]>;
  deleteItem(id: number, userId: string): Promise<boolean>; // cascades to history

  // Similarity index over canonical embeddings, nearest first
  findNearestItems(embedding: number[], limit: number): Promise<Match[]>;

  // History (append-only)
  appendHistory(record: InsertHistoryRecord): Promise<HistoryRecord>;
  getHistory(itemId: number): Promise<HistoryRecord[]>;

  // Preferences
  getUserPreference(userId: string): Promise<UserPreference | undefined>;
  setUserLanguage(userId: string, language: Language): Promise<UserPreference>;
}

const summaryColumns = {
  id: items.id,
  name: items.name,
  description: items.description,
  photoRef: items.photoRef,
  registeredByUserId: items.registeredByUserId,
  createdAt: items.createdAt,
  sightings: count(itemHistory.id),
};

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Database) {}

  private run<T>(fn: () => Promise<T>): Promise<T> {
    return trackApiCall('database', () => withErrorCode(ErrorCode.PERSISTENCE_UNAVAILABLE, fn));
  }

  async registerItem(item: InsertItem, firstSighting: FirstSighting): Promise<{ item: Item; record: HistoryRecord }> {
    return this.run(() =>
      this.db.transaction(async (tx) => {
        const [created] = await tx.insert(items).values(item).returning();
        const [record] = await tx
          .insert(itemHistory)
          .values({ ...firstSighting, itemId: created.id })
          .returning();
        return { item: created, record };
      })
    );
  }

  async getItem(id: number): Promise<Item | undefined> {
    return this.run(async () => {
      const [item] = await this.db.select().from(items).where(eq(items.id, id));
      return item;
    });
  }

  async getItemSummary(id: number): Promise<ItemSummary | undefined> {
    return this.run(async () => {
      const [summary] = await this.db
        .select(summaryColumns)
        .from(items)
        .leftJoin(itemHistory, eq(itemHistory.itemId, items.id))
        .where(eq(items.id, id))
        .groupBy(items.id);
      return summary;
    });
  }

  async getItemsByUser(userId: string): Promise<ItemSummary[]> {
    return this.run(() =>
      this.db
        .select(summaryColumns)
        .from(items)
        .leftJoin(itemHistory, eq(itemHistory.itemId, items.id))
        .where(eq(items.registeredByUserId, userId))
        .groupBy(items.id)
        .orderBy(desc(items.createdAt), desc(items.id))
    );
  }

  async listItemLocations(): Promise<ItemLocationOverview[]> {
    return this.run(async () => {
      const summaries = await this.db
        .select({ id: items.id, name: items.name, sightings: count(itemHistory.id) })
        .from(items)
        .leftJoin(itemHistory, eq(itemHistory.itemId, items.id))
        .groupBy(items.id)
        .orderBy(asc(items.id));

      const latest = await this.db
        .selectDistinctOn([itemHistory.itemId], {
          itemId: itemHistory.itemId,
          latitude: itemHistory.latitude,
          longitude: itemHistory.longitude,
          recordedAt: itemHistory.createdAt,
        })
        .from(itemHistory)
        .where(and(isNotNull(itemHistory.latitude), isNotNull(itemHistory.longitude)))
        .orderBy(itemHistory.itemId, desc(itemHistory.createdAt), desc(itemHistory.id));

      const latestByItem = new Map(latest.map((row) => [row.itemId, row]));

      return summaries.map((summary) => {
        const row = latestByItem.get(summary.id);
        return {
          ...summary,
          latestLocation:
            row && row.latitude !== null && row.longitude !== null
              ? { latitude: row.latitude, longitude: row.longitude, recordedAt: row.recordedAt }
              : null,
        };
      });
    });
  }

  async deleteItem(id: number, userId: string): Promise<boolean> {
    return this.run(async () => {
      const deleted = await this.db
        .delete(items)
        .where(and(eq(items.id, id), eq(items.registeredByUserId, userId)))
        .returning({ id: items.id });
      return deleted.length > 0;
    });
  }

  // Served by the HNSW index, so recall is approximate
  async findNearestItems(embedding: number[], limit: number): Promise<Match[]> {
    return this.run(async () => {
      const distance = sql<number>`${cosineDistance(items.embedding, embedding)}`.mapWith(Number);
      const rows = await this.db
        .select({ itemId: items.id, distance })
        .from(items)
        .orderBy(distance, asc(items.id))
        .limit(limit);

      return rows.map((row) => ({
        itemId: row.itemId,
        similarity: distanceToSimilarity(row.distance),
      }));
    });
  }

  async appendHistory(record: InsertHistoryRecord): Promise<HistoryRecord> {
    return this.run(async () => {
      const [created] = await this.db.insert(itemHistory).values(record).returning();
      return created;
    });
  }

  async getHistory(itemId: number): Promise<HistoryRecord[]> {
    return this.run(() =>
      this.db
        .select()
        .from(itemHistory)
        .where(eq(itemHistory.itemId, itemId))
        .orderBy(asc(itemHistory.createdAt), asc(itemHistory.id))
    );
  }

  async getUserPreference(userId: string): Promise<UserPreference | undefined> {
    return this.run(async () => {
      const [preference] = await this.db
        .select()
        .from(userPreferences)
        .where(eq(userPreferences.userId, userId));
      return preference;
    });
  }

  async setUserLanguage(userId: string, language: Language): Promise<UserPreference> {
    return this.run(async () => {
      const [preference] = await this.db
        .insert(userPreferences)
        .values({ userId, language })
        .onConflictDoUpdate({
          target: userPreferences.userId,
          set: { language, updatedAt: new Date() },
        })
        .returning();
      return preference;
    });
  }
}
