/**
 * BioSample cache (SQLite-backed)
 *
 * Re-running fetchm on the same or an overlapping table only asks NCBI for
 * accessions it has not seen within `maxAgeDays`.
 */

import { count, inArray, sql } from "drizzle-orm"
import { biosamples, getDb, type DbClient } from "../db/index.js"
import { log } from "../logger.js"
import type { BioSampleRecord } from "../types.js"

const DAY_MS = 24 * 60 * 60 * 1000

// SQLite caps bound parameters per statement; stay well under it
const LOOKUP_CHUNK = 500

export interface BioSampleCacheOptions {
	/** Entries older than this are misses; 0 disables expiry */
	maxAgeDays?: number | undefined
	/** Clock override for tests */
	now?: (() => Date) | undefined
}

export class BioSampleCache {
	private readonly db: DbClient
	private readonly maxAgeDays: number
	private readonly now: () => Date

	constructor(
		readonly dbPath: string,
		options: BioSampleCacheOptions = {},
	) {
		this.db = getDb(dbPath)
		this.maxAgeDays = options.maxAgeDays ?? 30
		this.now = options.now ?? (() => new Date())
	}

	private isFresh(fetchedAt: string): boolean {
		if (this.maxAgeDays === 0) return true
		const age = this.now().getTime() - new Date(fetchedAt).getTime()
		return Number.isFinite(age) && age <= this.maxAgeDays * DAY_MS
	}

	get(accession: string): BioSampleRecord | undefined {
		return this.getMany([accession]).get(accession)
	}

	/** Fresh entries for the given accessions; misses are simply absent */
	getMany(accessions: string[]): Map<string, BioSampleRecord> {
		const hits = new Map<string, BioSampleRecord>()
		let stale = 0

		for (let i = 0; i < accessions.length; i += LOOKUP_CHUNK) {
			const slice = accessions.slice(i, i + LOOKUP_CHUNK)
			const rows = this.db
				.select()
				.from(biosamples)
				.where(inArray(biosamples.accession, slice))
				.all()
			for (const row of rows) {
				if (this.isFresh(row.fetchedAt)) {
					hits.set(row.accession, row.record)
				} else {
					stale++
				}
			}
		}

		log.cache.debug(
			{ requested: accessions.length, hits: hits.size, stale },
			"cache lookup",
		)
		return hits
	}

	set(record: BioSampleRecord): void {
		this.setMany([record])
	}

	/** Upsert records in one transaction */
	setMany(records: BioSampleRecord[]): void {
		if (records.length === 0) return
		const fetchedAt = this.now().toISOString()

		this.db.transaction(tx => {
			for (const record of records) {
				tx.insert(biosamples)
					.values({ accession: record.accession, record, fetchedAt })
					.onConflictDoUpdate({
						target: biosamples.accession,
						set: { record, fetchedAt },
					})
					.run()
			}
		})
	}

	count(): number {
		const row = this.db.select({ n: count() }).from(biosamples).get()
		return row?.n ?? 0
	}

	/** Remove every entry; returns how many were removed */
	clear(): number {
		const removed = this.count()
		this.db.delete(biosamples).run()
		return removed
	}

	/** Oldest and newest fetch times, or null when empty */
	span(): { oldest: string; newest: string } | null {
		const row = this.db
			.select({
				oldest: sql<string | null>`min(${biosamples.fetchedAt})`,
				newest: sql<string | null>`max(${biosamples.fetchedAt})`,
			})
			.from(biosamples)
			.get()
		if (!row?.oldest || !row.newest) return null
		return { oldest: row.oldest, newest: row.newest }
	}
}
