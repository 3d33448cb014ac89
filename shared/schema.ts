import { pgTable, text, serial, integer, varchar, doublePrecision, timestamp, vector, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// jina-clip-v1 image and text embeddings share this space
export const EMBEDDING_DIMENSIONS = 768;

export const SUPPORTED_LANGUAGES = ['pl', 'en', 'ru'] as const;
export type Language = typeof SUPPORTED_LANGUAGES[number];

export function isLanguage(value: string): value is Language {
  return SUPPORTED_LANGUAGES.some((language) => language === value);
}

// Items - one row per registered physical item.
// The embedding is the canonical one captured at registration and is never updated.
export const items = pgTable("items", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: 255 }).notNull(),
  description: text("description"),
  photoRef: varchar("photo_ref", { length: 255 }).notNull(), // transport-owned file reference
  embedding: vector("embedding", { dimensions: EMBEDDING_DIMENSIONS }).notNull(),
  registeredByUserId: varchar("registered_by_user_id", { length: 64 }).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  embeddingIdx: index("items_embedding_idx").using('hnsw', table.embedding.op('vector_cosine_ops')),
  registeredByIdx: index("items_registered_by_idx").on(table.registeredByUserId),
}));

export const insertItemSchema = createInsertSchema(items).omit({
  id: true,
  createdAt: true,
});
export type Item = typeof items.$inferSelect;
export type InsertItem = z.infer<typeof insertItemSchema>;

// Item History - append-only sightings, the route is read back in created_at order
export const itemHistory = pgTable("item_history", {
  id: serial("id").primaryKey(),
  itemId: integer("item_id").notNull().references(() => items.id, { onDelete: 'cascade' }),
  reporterUserId: varchar("reporter_user_id", { length: 64 }).notNull(),
  photoRef: varchar("photo_ref", { length: 255 }).notNull(),
  latitude: doublePrecision("latitude"),
  longitude: doublePrecision("longitude"),
  postalCode: varchar("postal_code", { length: 20 }),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  itemCreatedIdx: index("item_history_item_created_idx").on(table.itemId, table.createdAt),
}));

export const insertHistoryRecordSchema = createInsertSchema(itemHistory).omit({
  id: true,
  createdAt: true,
});
export type HistoryRecord = typeof itemHistory.$inferSelect;
export type InsertHistoryRecord = z.infer<typeof insertHistoryRecordSchema>;

export const userPreferences = pgTable("user_preferences", {
  userId: varchar("user_id", { length: 64 }).primaryKey(),
  language: varchar("language", { length: 10 }).notNull().default('pl'),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export type UserPreference = typeof userPreferences.$inferSelect;

// Read models
export type ItemSummary = Omit<Item, "embedding"> & { sightings: number };

export interface ItemLocationOverview {
  id: number;
  name: string;
  sightings: number;
  latestLocation: { latitude: number; longitude: number; recordedAt: Date } | null;
}
