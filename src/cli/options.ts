/**
 * Command line flags → pipeline options
 *
 * Precedence: flag > environment > .fetchmrc > default. Numeric flags are
 * parsed here and range-checked against the config schema so both sources
 * obey the same limits.
 */

import { join } from "node:path"
import { ConfigSchema, defaultRequestDelayMs, type Config } from "../config.js"
import type { FetchOptions, SummarizeOptions } from "../core/types.js"
import { resolveCachePath } from "../db/index.js"
import { OptionError } from "../errors.js"
import { OUTPUT_PATHS } from "../table.js"

export const DEFAULT_OUTDIR = "fetchm_output"

/** Raw commander values for `fetchm run` */
export interface RunFlags {
	outdir?: string | undefined
	checkmCompleteness?: string | undefined
	checkmContamination?: string | undefined
	apiKey?: string | undefined
	email?: string | undefined
	batchSize?: string | undefined
	jobs?: string | undefined
	sleep?: string | undefined
	cachePath?: string | undefined
	/** false with --no-cache */
	cache?: boolean | undefined
	/** false with --no-figures */
	figures?: boolean | undefined
	top?: string | undefined
}

export interface SummarizeFlags {
	outdir?: string | undefined
	top?: string | undefined
	figures?: boolean | undefined
}

export type Env = Record<string, string | undefined>

// Config keys → the flag a user would fix
const FLAG_NAMES: Record<string, string> = {
	apiKey: "--api-key",
	email: "--email",
	jobs: "--jobs",
	batchSize: "--batch-size",
	sleep: "--sleep",
	checkmCompleteness: "--checkm-completeness",
	checkmContamination: "--checkm-contamination",
	top: "--top",
}

export function parseNumber(option: string, raw: string | undefined): number | undefined {
	if (raw === undefined) return undefined
	const value = Number(raw.trim())
	if (raw.trim() === "" || !Number.isFinite(value)) {
		throw new OptionError(option, `expected a number, got "${raw}"`)
	}
	return value
}

/** Drop undefined entries so they do not mask config values */
function defined(values: Record<string, unknown>): Record<string, unknown> {
	return Object.fromEntries(
		Object.entries(values).filter(([, value]) => value !== undefined),
	)
}

/** Merge flag and environment overrides into the loaded config, re-validating */
export function mergeConfig(config: Config, flags: RunFlags, env: Env = process.env): Config {
	const overrides = defined({
		apiKey: flags.apiKey ?? env["NCBI_API_KEY"],
		email: flags.email ?? env["NCBI_EMAIL"],
		jobs: parseNumber("--jobs", flags.jobs),
		batchSize: parseNumber("--batch-size", flags.batchSize),
		sleep: parseNumber("--sleep", flags.sleep),
		checkmCompleteness: parseNumber("--checkm-completeness", flags.checkmCompleteness),
		checkmContamination: parseNumber(
			"--checkm-contamination",
			flags.checkmContamination,
		),
		top: parseNumber("--top", flags.top),
	})

	const result = ConfigSchema.safeParse({ ...config, ...overrides })
	if (!result.success) {
		const issue = result.error.issues[0]
		const key = String(issue?.path[0] ?? "")
		throw new OptionError(FLAG_NAMES[key] ?? key, issue?.message ?? "invalid value")
	}
	return result.data
}

export function resolveFetchOptions(
	input: string,
	flags: RunFlags,
	config: Config,
	env: Env = process.env,
): FetchOptions {
	const merged = mergeConfig(config, flags, env)
	const outdir = flags.outdir ?? DEFAULT_OUTDIR
	const requestDelayMs =
		merged.sleep !== undefined
			? Math.round(merged.sleep * 1000)
			: defaultRequestDelayMs(merged.apiKey !== undefined, merged.jobs)

	return {
		input,
		outdir,
		checkmCompleteness: merged.checkmCompleteness,
		checkmContamination: merged.checkmContamination,
		apiKey: merged.apiKey,
		email: merged.email,
		batchSize: merged.batchSize,
		jobs: merged.jobs,
		requestDelayMs,
		retryCount: merged.retryCount,
		retryDelay: merged.retryDelay,
		cachePath: flags.cache === false ? null : resolveCachePath(outdir, flags.cachePath),
		cacheMaxAgeDays: merged.cacheMaxAgeDays,
		figures: flags.figures !== false && merged.figures,
		top: merged.top,
	}
}

export function resolveSummarizeOptions(
	input: string,
	flags: SummarizeFlags,
	config: Config,
): SummarizeOptions {
	const merged = mergeConfig(config, { top: flags.top }, {})
	return {
		input,
		outdir: flags.outdir ?? DEFAULT_OUTDIR,
		figures: flags.figures !== false && merged.figures,
		top: merged.top,
	}
}

/** Where a previous run would have left its tables */
export function existingResultsDir(outdir: string): string {
	return join(outdir, OUTPUT_PATHS.metadataDir)
}
