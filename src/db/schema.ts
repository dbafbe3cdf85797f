import {
  sqliteTable,
  text,
  integer,
  real,
  index,
  uniqueIndex,
} from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";
import { COUPON_SOURCE_LABELS } from "../shared/constants.js";

// ---------------------------------------------------------------------------
// Helper: current-timestamp default
// ---------------------------------------------------------------------------
const currentTimestamp = sql`(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`;

// ---------------------------------------------------------------------------
// coupons
// ---------------------------------------------------------------------------
export const coupons = sqliteTable(
  "coupons",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    name: text("name").notNull(),
    description: text("description").notNull(),
    discountPercentage: real("discount_percentage"),
    code: text("code").notNull(),
    url: text("url").notNull(),
    source: text("source", { enum: COUPON_SOURCE_LABELS }).notNull(),
    expiry: text("expiry"), // ISO-8601
    createdAt: text("created_at").default(currentTimestamp).notNull(),
    validatedAt: text("validated_at"),
    isValid: integer("is_valid", { mode: "boolean" }).default(false).notNull(),
    isPosted: integer("is_posted", { mode: "boolean" }).default(false).notNull(),
    fingerprint: text("fingerprint").notNull(), // sha256(name, code, url)
  },
  (table) => ({
    fingerprintIdx: uniqueIndex("idx_coupons_fingerprint").on(table.fingerprint),
    sourceIdx: index("idx_coupons_source").on(table.source),
    isValidIdx: index("idx_coupons_is_valid").on(table.isValid),
    isPostedIdx: index("idx_coupons_is_posted").on(table.isPosted),
    expiryIdx: index("idx_coupons_expiry").on(table.expiry),
  }),
);

export type CouponRow = typeof coupons.$inferSelect;
