import {
  sqliteTable,
  text,
  integer,
  primaryKey,
  index,
} from "drizzle-orm/sqlite-core";
import { relations } from "drizzle-orm";
import type { BreakdownEntry, RecentBreakdownDay } from "../types";

export const entity = sqliteTable(
  "entity",
  {
    // JSON array of identifiers, channel first
    keyPath: text("key_path").primaryKey(),
    parentPath: text("parent_path"),
    depth: integer("depth").notNull(),
    name: text("name").notNull(),
    currentBreakdown: text("current_breakdown", { mode: "json" }).$type<
      BreakdownEntry[]
    >(),
    recentBreakdown: text("recent_breakdown", { mode: "json" }).$type<
      RecentBreakdownDay[]
    >(),
    updatedAt: integer("updated_at", { mode: "timestamp" }).notNull(),
  },
  (table) => {
    return {
      parentIdx: index("entity_parent_idx").on(table.parentPath),
    };
  }
);

export const dailyTotal = sqliteTable(
  "daily_total",
  {
    keyPath: text("key_path")
      .notNull()
      .references(() => entity.keyPath, { onDelete: "cascade" }),
    date: text("date").notNull(),
    total: integer("total").notNull(),
  },
  (table) => {
    return {
      pk: primaryKey({ columns: [table.keyPath, table.date] }),
    };
  }
);

export const entityRelations = relations(entity, ({ many }) => ({
  dailyTotals: many(dailyTotal),
}));

export const dailyTotalRelations = relations(dailyTotal, ({ one }) => ({
  entity: one(entity, {
    fields: [dailyTotal.keyPath],
    references: [entity.keyPath],
  }),
}));
