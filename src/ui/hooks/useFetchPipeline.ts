/**
 * React hook that consumes the runFetch generator into view state
 */

import { useState, useEffect, useRef, useCallback } from "react"
import { runFetch } from "../../core/pipeline.js"
import type { FetchEvent, FetchOptions } from "../../core/types.js"
import { errorMessage } from "../../errors.js"
import { log } from "../../logger.js"
import type { TableSummary } from "../../stats/summary.js"
import type { MetadataStatus } from "../../types.js"

export type FetchPhase = "loading" | "fetching" | "writing" | "done"

export interface BatchFailure {
	index: number
	size: number
	error: string
}

export interface FetchViewState {
	phase: FetchPhase
	rows: number
	kept: number
	removed: number
	accessions: number
	cached: number
	batches: number
	completedBatches: number
	found: number
	missing: number
	failed: number
	failures: BatchFailure[]
	files: string[]
	summary: TableSummary | null
	statuses: Record<MetadataStatus, number> | null
	success: boolean | null
	startTime: number
	durationMs: number
}

export function initialFetchState(startTime: number = Date.now()): FetchViewState {
	return {
		phase: "loading",
		rows: 0,
		kept: 0,
		removed: 0,
		accessions: 0,
		cached: 0,
		batches: 0,
		completedBatches: 0,
		found: 0,
		missing: 0,
		failed: 0,
		failures: [],
		files: [],
		summary: null,
		statuses: null,
		success: null,
		startTime,
		durationMs: 0,
	}
}

/** Pure state transition, exported for tests */
export function reduceFetchEvent(
	prev: FetchViewState,
	event: FetchEvent,
): FetchViewState {
	switch (event.type) {
		case "load:complete":
			return { ...prev, rows: event.rows }
		case "filter:complete":
			return { ...prev, kept: event.kept, removed: event.removed }
		case "fetch:start":
			return {
				...prev,
				phase: "fetching",
				accessions: event.total,
				cached: event.cached,
				batches: event.batches,
			}
		case "batch:start":
			return prev
		case "batch:complete":
			return {
				...prev,
				completedBatches: prev.completedBatches + 1,
				found: prev.found + event.found,
				missing: prev.missing + event.missing,
			}
		case "batch:error":
			return {
				...prev,
				completedBatches: prev.completedBatches + 1,
				failed: prev.failed + event.size,
				failures: [
					...prev.failures,
					{ index: event.index, size: event.size, error: event.error },
				],
			}
		case "fetch:complete":
			return { ...prev, phase: "writing" }
		case "write:complete":
			return { ...prev, files: event.files }
		case "summary:complete":
			return { ...prev, summary: event.summary }
		case "complete":
			return {
				...prev,
				phase: "done",
				statuses: event.statuses,
				success: event.success,
				durationMs: event.durationMs,
			}
	}
}

export function useFetchPipeline(options: FetchOptions | null) {
	const [state, setState] = useState<FetchViewState>(() => initialFetchState())
	const [isRunning, setIsRunning] = useState(false)
	const [error, setError] = useState<string | null>(null)
	const abortRef = useRef(false)

	const processEvent = useCallback((event: FetchEvent) => {
		setState(prev => reduceFetchEvent(prev, event))
	}, [])

	useEffect(() => {
		if (!options) return

		log.ui.info(
			{ input: options.input, jobs: options.jobs, batchSize: options.batchSize },
			"fetch view started",
		)

		abortRef.current = false
		setIsRunning(true)
		setError(null)

		const run = async () => {
			try {
				for await (const event of runFetch(options)) {
					if (abortRef.current) break
					processEvent(event)
				}
			} catch (err) {
				log.ui.error({ error: errorMessage(err) }, "pipeline crashed")
				setError(errorMessage(err))
			} finally {
				setIsRunning(false)
			}
		}

		void run()

		return () => {
			abortRef.current = true
		}
	}, [options, processEvent])

	return { state, isRunning, error }
}
