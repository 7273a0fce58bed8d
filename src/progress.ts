/**
 * Batch progress bar for plain (non-Ink) runs, using cli-progress
 */

import cliProgress from "cli-progress"
import chalk from "chalk"

export interface BatchProgress {
	/** Total batches and the accessions already served from the cache */
	start(batches: number, cached: number): void
	batchDone(found: number, missing: number): void
	batchFailed(size: number): void
	stop(): void
}

interface Counters {
	found: number
	missing: number
	failed: number
}

function describeCounts(counts: Counters, cached: number): string {
	const parts = [`${counts.found} found`]
	if (cached > 0) parts.push(`${cached} cached`)
	if (counts.missing > 0) parts.push(chalk.yellow(`${counts.missing} not found`))
	if (counts.failed > 0) parts.push(chalk.red(`${counts.failed} failed`))
	return parts.join(", ")
}

export function createBatchProgress(quiet: boolean = false): BatchProgress {
	const counts: Counters = { found: 0, missing: 0, failed: 0 }
	let cached = 0
	let total = 0
	let completed = 0

	if (quiet) {
		return {
			start(batches, cachedCount) {
				total = batches
				cached = cachedCount
			},
			batchDone(found, missing) {
				counts.found += found
				counts.missing += missing
				completed++
			},
			batchFailed(size) {
				counts.failed += size
				completed++
			},
			stop() {},
		}
	}

	const bar = new cliProgress.SingleBar(
		{
			clearOnComplete: false,
			hideCursor: true,
			fps: 10,
			format: (options, params, payload: { detail?: string }) => {
				const width = options.barsize ?? 30
				const filled = Math.round(params.progress * width)
				const complete = options.barCompleteChar ?? "█"
				const incomplete = options.barIncompleteChar ?? "░"
				const barText = complete.repeat(filled) + incomplete.repeat(width - filled)
				const detail = payload.detail ?? ""
				return `${chalk.bold("BioSamples")} ${barText} ${params.value}/${params.total} batches ${chalk.gray(detail)}`
			},
		},
		cliProgress.Presets.shades_classic,
	)

	return {
		start(batches, cachedCount) {
			total = batches
			cached = cachedCount
			if (total > 0) {
				bar.start(total, 0, { detail: describeCounts(counts, cached) })
			}
		},
		batchDone(found, missing) {
			counts.found += found
			counts.missing += missing
			completed++
			if (total > 0) bar.update(completed, { detail: describeCounts(counts, cached) })
		},
		batchFailed(size) {
			counts.failed += size
			completed++
			if (total > 0) bar.update(completed, { detail: describeCounts(counts, cached) })
		},
		stop() {
			if (total > 0) bar.stop()
		},
	}
}
