/**
 * Core pipeline types
 *
 * The pipeline is an async generator of events; the plain CLI renderer and
 * the Ink view both consume the same stream.
 */

import type { Dispatcher } from "undici"
import type { TableSummary } from "../stats/summary.js"
import type { FilterReason, MetadataStatus } from "../types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Fetch events
// ─────────────────────────────────────────────────────────────────────────────

export type FetchEvent =
	| LoadCompleteEvent
	| FilterCompleteEvent
	| FetchStartEvent
	| BatchStartEvent
	| BatchCompleteEvent
	| BatchErrorEvent
	| FetchCompleteEvent
	| WriteCompleteEvent
	| SummaryCompleteEvent
	| CompleteEvent

/** Input table parsed */
export interface LoadCompleteEvent {
	type: "load:complete"
	rows: number
	columns: number
}

export interface FilterCompleteEvent {
	type: "filter:complete"
	kept: number
	removed: number
	reasons: Record<FilterReason, number>
}

/** Emitted once cache lookups are done and before any request is sent */
export interface FetchStartEvent {
	type: "fetch:start"
	/** Unique valid BioSample accessions */
	total: number
	/** Served from the cache */
	cached: number
	/** efetch requests to send */
	batches: number
}

export interface BatchStartEvent {
	type: "batch:start"
	index: number
	size: number
}

export interface BatchCompleteEvent {
	type: "batch:complete"
	index: number
	/** Accessions NCBI returned a record for */
	found: number
	/** Accessions absent from the response */
	missing: number
	attempts: number
}

/** A batch failed after all retries; its accessions are marked `error` */
export interface BatchErrorEvent {
	type: "batch:error"
	index: number
	size: number
	error: string
}

export interface FetchCompleteEvent {
	type: "fetch:complete"
	fetched: number
	cached: number
	notFound: number
	failed: number
	durationMs: number
}

export interface WriteCompleteEvent {
	type: "write:complete"
	files: string[]
}

export interface SummaryCompleteEvent {
	type: "summary:complete"
	summary: TableSummary
}

export interface CompleteEvent {
	type: "complete"
	/** False when any batch failed */
	success: boolean
	statuses: Record<MetadataStatus, number>
	durationMs: number
}

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

export interface FetchOptions {
	input: string
	outdir: string
	checkmCompleteness?: number | undefined
	checkmContamination?: number | undefined
	apiKey?: string | undefined
	email?: string | undefined
	batchSize: number
	jobs: number
	/** Minimum delay between requests on one lane (ms) */
	requestDelayMs: number
	retryCount: number
	/** Seconds */
	retryDelay: number
	/** SQLite cache file; null disables caching */
	cachePath: string | null
	cacheMaxAgeDays: number
	figures: boolean
	top: number
	/** Override for tests (undici MockAgent) */
	dispatcher?: Dispatcher | undefined
	/** Override for tests */
	baseUrl?: string | undefined
	signal?: AbortSignal | undefined
	/** Clock override for tests */
	now?: (() => Date) | undefined
}

export interface SummarizeOptions {
	/** Annotated ncbi_clean.tsv */
	input: string
	outdir: string
	figures: boolean
	top: number
	now?: (() => Date) | undefined
}
