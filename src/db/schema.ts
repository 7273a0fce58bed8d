/**
 * SQLite schema for the fetchm BioSample cache
 *
 * One row per BioSample accession. The parsed record is stored as JSON so a
 * cache hit never needs the XML parser.
 */

import { sqliteTable, text, index } from "drizzle-orm/sqlite-core"
import type { BioSampleRecord } from "../types.js"

export const biosamples = sqliteTable(
	"biosamples",
	{
		/** BioSample accession (SAMN…, SAME…, SAMD…) */
		accession: text("accession").primaryKey(),
		/** Parsed BioSampleRecord */
		record: text("record", { mode: "json" }).$type<BioSampleRecord>().notNull(),
		/** When the record was fetched from NCBI (ISO 8601) */
		fetchedAt: text("fetched_at").notNull(),
	},
	table => [index("idx_biosamples_fetched_at").on(table.fetchedAt)],
)

export type BioSampleRow = typeof biosamples.$inferSelect
export type NewBioSampleRow = typeof biosamples.$inferInsert
