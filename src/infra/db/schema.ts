import {
  boolean,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import type { FilingMetadata, FilingStatus } from "../../core/entities/filing";

export const issuersTable = pgTable(
  "issuers",
  {
    issuerCode: integer("issuer_code").primaryKey(),
    taxId: text("tax_id").notNull(),
    name: text("name").notNull(),
    sector: text("sector").notNull(),
    registrationStatus: text("registration_status").notNull(),
    active: boolean("active").notNull(),
    firstSeenAt: timestamp("first_seen_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    codeTaxIdx: uniqueIndex("issuers_code_tax_uidx").on(
      table.issuerCode,
      table.taxId,
    ),
  }),
);

export const filingRecordsTable = pgTable(
  "filing_records",
  {
    id: text("id").primaryKey(),
    issuerCode: integer("issuer_code").notNull(),
    referenceYear: integer("reference_year").notNull(),
    referenceDate: timestamp("reference_date", { withTimezone: true }).notNull(),
    receivedAt: timestamp("received_at", { withTimezone: true }).notNull(),
    version: integer("version").notNull(),
    sourceId: text("source_id").notNull(),
    category: text("category").notNull(),
    url: text("url").notNull(),
    status: text("status").$type<FilingStatus>().notNull(),
    retryCount: integer("retry_count").notNull(),
    lastError: text("last_error"),
    metadata: jsonb("metadata").$type<FilingMetadata>().notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    issuerYearIdx: uniqueIndex("filing_records_issuer_year_uidx").on(
      table.issuerCode,
      table.referenceYear,
    ),
    statusCreatedIdx: index("filing_records_status_created_idx").on(
      table.status,
      table.createdAt,
    ),
  }),
);
