/**
 * Command bodies for the fetchm CLI
 *
 * Each command reports through ui.ts and sets process.exitCode instead of
 * exiting, so index.ts stays a thin commander definition.
 */

import { existsSync } from "node:fs"
import { loadConfig, type Config } from "../config.js"
import { collectEvents, runFetch, runSummarize } from "../core/pipeline.js"
import type { FetchEvent, FetchOptions } from "../core/types.js"
import { closeDb, resolveCachePath } from "../db/index.js"
import { FetchmError, errorMessage } from "../errors.js"
import { configureLogging, flushLogs, log } from "../logger.js"
import { BioSampleCache } from "../ncbi/cache.js"
import { withSpinner } from "../parallel.js"
import { createBatchProgress } from "../progress.js"
import { promptConfirmOverwrite, setupPromptHandlers } from "../prompts.js"
import type { TableSummary } from "../stats/summary.js"
import { METADATA_STATUSES } from "../types.js"
import { ui } from "../ui.js"
import {
	DEFAULT_OUTDIR,
	existingResultsDir,
	resolveFetchOptions,
	resolveSummarizeOptions,
	type Env,
	type RunFlags,
	type SummarizeFlags,
} from "./options.js"

export const VERSION = "0.1.0"

export interface OutputFlags {
	force?: boolean
	nonInteractive?: boolean
	ink?: boolean
	quiet?: boolean
	verbose?: boolean
}

/** Surroundings a command reads; defaults come from the process */
export interface CommandContext {
	config?: Config | undefined
	env?: Env | undefined
	/** Defaults to stdin and stdout both being a TTY */
	interactive?: boolean | undefined
	/** Passed through to the pipeline (undici dispatcher, base URL, clock) */
	transport?: Pick<FetchOptions, "dispatcher" | "baseUrl" | "now"> | undefined
}

export interface CacheFlags {
	outdir?: string | undefined
	cachePath?: string | undefined
	clear?: boolean | undefined
}

async function exitWithCode(code: number): Promise<void> {
	if (code === 0) return
	try {
		await flushLogs()
	} catch (err) {
		console.error(`Failed to flush logs: ${errorMessage(err)}`)
	}
	process.exitCode = code
}

async function reportFailure(err: unknown): Promise<void> {
	if (err instanceof FetchmError) {
		ui.error(err.message)
		log.cli.debug({ code: err.code, context: err.context }, "command failed")
	} else {
		ui.error(`Unexpected error: ${errorMessage(err)}`)
		log.cli.error({ err: errorMessage(err) }, "command crashed")
	}
	await exitWithCode(1)
}

function printSummaryHighlights(summary: TableSummary): void {
	const countries = summary.frequencies.country.slice(0, 5)
	ui.table(
		"Top countries",
		countries.map((entry): [string, string] => [entry.value, `${entry.count} (${entry.percent}%)`]),
	)
	const { n, pearson, spearman } = summary.correlations.genomeSizeVsGc
	if (pearson !== null && spearman !== null) {
		ui.info(
			`Genome size vs GC: Pearson ${pearson.toFixed(3)}, Spearman ${spearman.toFixed(3)} (n=${n})`,
		)
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// run
// ─────────────────────────────────────────────────────────────────────────────

/** Plain renderer: cli-progress over batches, failures printed after the bar */
async function runFetchPlain(
	options: FetchOptions,
	flags: { quiet: boolean; verbose: boolean },
): Promise<boolean> {
	const { quiet, verbose } = flags
	const progress = createBatchProgress(quiet)
	const failures: Array<Extract<FetchEvent, { type: "batch:error" }>> = []
	let success = false

	for await (const event of runFetch(options)) {
		switch (event.type) {
			case "load:complete": {
				if (!quiet) ui.success(`Loaded ${event.rows} assemblies (${event.columns} columns)`)
				break
			}
			case "filter:complete": {
				if (!quiet && event.removed > 0) {
					ui.info(
						`CheckM filter removed ${event.removed} assemblies ` +
							`(completeness ${event.reasons.completeness}, ` +
							`contamination ${event.reasons.contamination}, ` +
							`missing ${event.reasons["missing-checkm"]})`,
					)
				}
				break
			}
			case "fetch:start": {
				if (!quiet) {
					ui.info(
						`${event.total} unique BioSamples: ${event.cached} cached, ` +
							`${event.batches} requests to send`,
					)
				}
				progress.start(event.batches, event.cached)
				break
			}
			case "batch:start":
				break
			case "batch:complete": {
				progress.batchDone(event.found, event.missing)
				break
			}
			case "batch:error": {
				failures.push(event)
				progress.batchFailed(event.size)
				break
			}
			case "fetch:complete": {
				progress.stop()
				for (const failure of failures) {
					ui.error(
						`Batch ${failure.index + 1} (${failure.size} BioSamples) failed: ${failure.error}`,
					)
				}
				if (!quiet && event.notFound > 0) {
					ui.warn(`${event.notFound} BioSamples have no record at NCBI`)
				}
				ui.debug(`Fetch took ${event.durationMs} ms`, verbose)
				break
			}
			case "write:complete": {
				if (!quiet) ui.success(`Wrote ${event.files.length} files to ${options.outdir}`)
				for (const file of event.files) ui.debug(file, verbose)
				break
			}
			case "summary:complete": {
				if (!quiet) printSummaryHighlights(event.summary)
				break
			}
			case "complete": {
				success = event.success
				if (!quiet) {
					ui.table(
						"Metadata status",
						METADATA_STATUSES.filter(status => event.statuses[status] > 0).map(
							(status): [string, number] => [status, event.statuses[status]],
						),
					)
					ui.finalStatus(event.success)
				}
				break
			}
		}
	}

	return success
}

export async function runCommand(
	input: string,
	flags: RunFlags & OutputFlags,
	context: CommandContext = {},
): Promise<void> {
	const quiet = Boolean(flags.quiet)
	const verbose = Boolean(flags.verbose)
	const interactive =
		(context.interactive ?? Boolean(process.stdin.isTTY && process.stdout.isTTY)) &&
		!flags.nonInteractive
	const useInk = Boolean(flags.ink) || (interactive && !quiet)

	configureLogging({ ink: false, verbose })
	if (interactive) setupPromptHandlers()

	try {
		const options: FetchOptions = {
			...resolveFetchOptions(
				input,
				flags,
				context.config ?? loadConfig(),
				context.env ?? process.env,
			),
			...context.transport,
		}

		if (!existsSync(input)) {
			ui.error(`Input file not found: ${input}`)
			await exitWithCode(1)
			return
		}

		if (existsSync(existingResultsDir(options.outdir)) && !flags.force && interactive) {
			const overwrite = await promptConfirmOverwrite(options.outdir)
			if (!overwrite) {
				ui.info("Keeping existing results.")
				return
			}
		}

		if (!quiet && !useInk) {
			ui.banner(VERSION, input, options.outdir, {
				jobs: options.jobs,
				batchSize: options.batchSize,
				apiKey: options.apiKey !== undefined,
			})
		}

		if (useInk) {
			const { runFetchView } = await import("../ui/renderApp.js")
			const result = await runFetchView(options, { verbose })
			if (result.logFilePath) ui.info(`Log written to ${result.logFilePath}`)
			if (result.error) ui.error(result.error)
			await exitWithCode(result.success ? 0 : 1)
			return
		}

		const success = await runFetchPlain(options, { quiet, verbose })
		await exitWithCode(success ? 0 : 1)
	} catch (err) {
		await reportFailure(err)
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// summarize
// ─────────────────────────────────────────────────────────────────────────────

export async function summarizeCommand(
	input: string,
	flags: SummarizeFlags & OutputFlags,
	context: CommandContext = {},
): Promise<void> {
	const quiet = Boolean(flags.quiet)
	configureLogging({ ink: false, verbose: Boolean(flags.verbose) })

	try {
		const options = resolveSummarizeOptions(input, flags, context.config ?? loadConfig())
		const events = await withSpinner(
			`Summarizing ${input}`,
			quiet,
			() => collectEvents(runSummarize(options)),
			all => {
				const written = all.find(e => e.type === "write:complete")
				const count = written?.type === "write:complete" ? written.files.length : 0
				return `Wrote ${count} files to ${options.outdir}`
			},
		)

		const summary = events.find(e => e.type === "summary:complete")
		if (!quiet && summary?.type === "summary:complete") {
			printSummaryHighlights(summary.summary)
		}
	} catch (err) {
		await reportFailure(err)
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// cache
// ─────────────────────────────────────────────────────────────────────────────

export async function cacheCommand(
	flags: CacheFlags,
	context: CommandContext = {},
): Promise<void> {
	configureLogging({ ink: false })
	const path = resolveCachePath(flags.outdir ?? DEFAULT_OUTDIR, flags.cachePath)

	if (!existsSync(path)) {
		ui.info(`No cache at ${path}`)
		return
	}

	try {
		const config = context.config ?? loadConfig()
		const cache = new BioSampleCache(path, { maxAgeDays: config.cacheMaxAgeDays })
		if (flags.clear) {
			const removed = cache.clear()
			ui.success(`Removed ${removed} cached BioSamples from ${path}`)
			return
		}

		const rows: Array<[string, string | number]> = [
			["Path", path],
			["Entries", cache.count()],
		]
		const span = cache.span()
		if (span) rows.push(["Oldest", span.oldest], ["Newest", span.newest])
		ui.table("BioSample cache", rows)
	} catch (err) {
		await reportFailure(err)
	} finally {
		closeDb()
	}
}
