/**
 * Metadata pipeline as async generators
 *
 * runFetch: read table → quality filter → cache lookup → batched efetch →
 * annotate → write tables, summary and figures. Batches run concurrently
 * under p-limit; their events are yielded in completion order.
 */

import { join } from "node:path"
import pLimit from "p-limit"
import { parseBioSampleSet } from "../biosample.js"
import { readDataset, uniqueBioSamples } from "../dataset.js"
import { closeDb } from "../db/index.js"
import { errorMessage } from "../errors.js"
import { log } from "../logger.js"
import { BioSampleCache } from "../ncbi/cache.js"
import { chunk, fetchBioSamples } from "../ncbi/eutils.js"
import { LaneRateLimiter } from "../ncbi/rate-limiter.js"
import { writeFigures } from "../plots/figures.js"
import { countByReason, filterByQuality } from "../quality.js"
import { writeSummaryReport, type RunInfo } from "../stats/report.js"
import { summarizeTable, type TableSummary } from "../stats/summary.js"
import {
	OUTPUT_PATHS,
	annotateRows,
	countByStatus,
	readAnnotatedTable,
	writeTables,
	type LookupHit,
} from "../table.js"
import type { AnnotatedRow, BioSampleRecord } from "../types.js"
import type { FetchEvent, FetchOptions, SummarizeOptions } from "./types.js"

interface SummaryOutputs {
	summary: TableSummary
	files: string[]
}

async function writeSummaryOutputs(
	outdir: string,
	rows: AnnotatedRow[],
	run: RunInfo,
	options: { top: number; figures: boolean },
): Promise<SummaryOutputs> {
	const summary = summarizeTable(rows, { top: options.top })
	const files = await writeSummaryReport(
		join(outdir, OUTPUT_PATHS.summaryDir),
		summary,
		run,
	)
	if (options.figures) {
		files.push(
			...(await writeFigures(summary, rows, join(outdir, OUTPUT_PATHS.figuresDir))),
		)
	}
	return { summary, files }
}

// ─────────────────────────────────────────────────────────────────────────────
// Fetch
// ─────────────────────────────────────────────────────────────────────────────

export async function* runFetch(
	options: FetchOptions,
): AsyncGenerator<FetchEvent, void, undefined> {
	const startedAt = Date.now()
	const now = options.now ?? (() => new Date())

	const dataset = await readDataset(options.input)
	yield {
		type: "load:complete",
		rows: dataset.rows.length,
		columns: dataset.columns.length,
	}

	const { kept, removed } = filterByQuality(dataset.rows, {
		minCompleteness: options.checkmCompleteness,
		maxContamination: options.checkmContamination,
	})
	const reasons = countByReason(removed)
	yield {
		type: "filter:complete",
		kept: kept.length,
		removed: removed.length,
		reasons,
	}

	const cache = options.cachePath
		? new BioSampleCache(options.cachePath, {
				maxAgeDays: options.cacheMaxAgeDays,
				now,
			})
		: null

	try {
		const accessions = uniqueBioSamples(kept)
		const hits = new Map<string, LookupHit>()
		if (cache) {
			for (const [accession, record] of cache.getMany(accessions)) {
				hits.set(accession, { record, source: "cached" })
			}
		}
		const cachedCount = hits.size
		const pending = accessions.filter(accession => !hits.has(accession))
		const batches = chunk(pending, options.batchSize)

		yield {
			type: "fetch:start",
			total: accessions.length,
			cached: cachedCount,
			batches: batches.length,
		}
		// Nothing above debug until fetch:complete; the plain renderer's bar owns stderr
		log.pipeline.debug(
			{ total: accessions.length, cached: cachedCount, batches: batches.length },
			"fetch start",
		)

		const fetchStartedAt = Date.now()
		const limiter = new LaneRateLimiter(options.jobs, options.requestDelayMs)
		const failed = new Set<string>()
		let fetched = 0

		// Queue for events produced by concurrent batches
		const eventQueue: FetchEvent[] = []
		let resolveQueue: (() => void) | null = null

		const pushEvent = (event: FetchEvent) => {
			eventQueue.push(event)
			if (resolveQueue) {
				resolveQueue()
				resolveQueue = null
			}
		}

		const runBatch = async (batch: string[], index: number): Promise<void> => {
			pushEvent({ type: "batch:start", index, size: batch.length })

			const result = await fetchBioSamples(batch, {
				apiKey: options.apiKey,
				email: options.email,
				retryCount: options.retryCount,
				retryDelay: options.retryDelay,
				limiter,
				dispatcher: options.dispatcher,
				baseUrl: options.baseUrl,
				signal: options.signal,
			})

			const fail = (error: string) => {
				for (const accession of batch) failed.add(accession)
				log.pipeline.debug({ index, size: batch.length, error }, "batch failed")
				pushEvent({ type: "batch:error", index, size: batch.length, error })
			}

			if (result.xml === undefined) {
				fail(result.error ?? "efetch request failed")
				return
			}

			let records: BioSampleRecord[]
			try {
				records = parseBioSampleSet(result.xml)
			} catch (err) {
				fail(errorMessage(err))
				return
			}

			const wanted = new Set(batch)
			const received: BioSampleRecord[] = []
			for (const record of records) {
				if (!wanted.has(record.accession) || hits.has(record.accession)) continue
				hits.set(record.accession, { record, source: "ok" })
				received.push(record)
			}
			fetched += received.length
			cache?.setMany(received)

			pushEvent({
				type: "batch:complete",
				index,
				found: received.length,
				missing: batch.length - received.length,
				attempts: result.attempts,
			})
		}

		const limit = pLimit(options.jobs)
		const allDone = Promise.allSettled(
			batches.map((batch, index) => limit(() => runBatch(batch, index))),
		)
		let done = false
		let settled: PromiseSettledResult<void>[] = []
		void allDone.then(results => {
			settled = results
			done = true
			if (resolveQueue) resolveQueue()
		})

		while (!done || eventQueue.length > 0) {
			const next = eventQueue.shift()
			if (next) {
				yield next
			} else if (!done) {
				await new Promise<void>(resolve => {
					resolveQueue = resolve
				})
			}
		}

		for (const result of settled) {
			if (result.status === "rejected") throw result.reason
		}

		const notFound = pending.length - fetched - failed.size
		yield {
			type: "fetch:complete",
			fetched,
			cached: cachedCount,
			notFound,
			failed: failed.size,
			durationMs: Date.now() - fetchStartedAt,
		}

		const annotated = annotateRows(kept, hits, failed, now().getFullYear())
		const records = [...hits.values()].map(hit => hit.record)
		const tableFiles = await writeTables(options.outdir, {
			columns: dataset.columns,
			annotated,
			removed,
			records,
		})
		const { summary, files: summaryFiles } = await writeSummaryOutputs(
			options.outdir,
			annotated,
			{ input: options.input, generatedAt: now().toISOString(), removed: reasons },
			options,
		)

		yield { type: "write:complete", files: [...tableFiles, ...summaryFiles] }
		yield { type: "summary:complete", summary }

		const statuses = countByStatus(annotated)
		log.pipeline.info({ statuses, failed: failed.size }, "fetch complete")
		yield {
			type: "complete",
			success: failed.size === 0,
			statuses,
			durationMs: Date.now() - startedAt,
		}
	} finally {
		if (cache) closeDb()
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Summarize
// ─────────────────────────────────────────────────────────────────────────────

/** Recompute statistics and figures from an annotated table (no network) */
export async function* runSummarize(
	options: SummarizeOptions,
): AsyncGenerator<FetchEvent, void, undefined> {
	const startedAt = Date.now()
	const now = options.now ?? (() => new Date())

	const { rows } = await readAnnotatedTable(options.input)
	const { summary, files } = await writeSummaryOutputs(
		options.outdir,
		rows,
		{ input: options.input, generatedAt: now().toISOString() },
		options,
	)

	yield { type: "summary:complete", summary }
	yield { type: "write:complete", files }
	yield {
		type: "complete",
		success: true,
		statuses: countByStatus(rows),
		durationMs: Date.now() - startedAt,
	}
}

/** Drain a pipeline, returning every event (tests, library callers) */
export async function collectEvents(
	events: AsyncIterable<FetchEvent>,
): Promise<FetchEvent[]> {
	const all: FetchEvent[] = []
	for await (const event of events) all.push(event)
	return all
}
