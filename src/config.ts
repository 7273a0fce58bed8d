/**
 * Configuration file (.fetchmrc) with Zod validation
 */

import { existsSync, readFileSync } from "node:fs"
import { homedir } from "node:os"
import { join } from "node:path"
import { z } from "zod"
import { log } from "./logger.js"

const percent = z.number().min(0).max(100)

export const ConfigSchema = z.object({
	apiKey: z.string().min(1).optional(),
	email: z.string().email().optional(),
	jobs: z.number().int().min(1).max(10).default(2),
	batchSize: z.number().int().min(1).max(200).default(50),
	retryCount: z.number().int().min(0).max(10).default(3),
	/** Seconds; multiplied by the attempt number between retries */
	retryDelay: z.number().min(0).default(2),
	/** Seconds between requests on one lane; derived from apiKey when absent */
	sleep: z.number().min(0).optional(),
	checkmCompleteness: percent.optional(),
	checkmContamination: percent.optional(),
	top: z.number().int().min(1).max(100).default(15),
	figures: z.boolean().default(true),
	/** Cached BioSamples older than this are fetched again */
	cacheMaxAgeDays: z.number().int().min(0).default(30),
})

export type Config = z.infer<typeof ConfigSchema>

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({})

export const CONFIG_FILENAMES = [".fetchmrc", ".fetchmrc.json"] as const

/** Candidate config paths: working directory first, then home */
export function configSearchPaths(
	cwd: string = process.cwd(),
	home: string = homedir(),
): string[] {
	return [
		...CONFIG_FILENAMES.map(name => join(cwd, name)),
		...CONFIG_FILENAMES.map(name => join(home, name)),
	]
}

/**
 * Load the first config file that parses and validates.
 * Invalid files are logged and skipped.
 */
export function loadConfig(paths: string[] = configSearchPaths()): Config {
	for (const path of paths) {
		if (!existsSync(path)) continue

		let parsed: unknown
		try {
			parsed = JSON.parse(readFileSync(path, "utf-8"))
		} catch (err) {
			log.config.warn(
				{ path, err: err instanceof Error ? err.message : String(err) },
				"config file is not valid JSON; skipping",
			)
			continue
		}

		const result = ConfigSchema.safeParse(parsed)
		if (result.success) {
			log.config.debug({ path }, "loaded config")
			return result.data
		}
		log.config.warn(
			{ path, issues: result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`) },
			"config file failed validation; skipping",
		)
	}

	return DEFAULT_CONFIG
}

/**
 * Per-lane delay that keeps `jobs` lanes together under NCBI's limit of
 * 3 requests/s without an API key and 10 with one.
 */
export function defaultRequestDelayMs(hasApiKey: boolean, jobs: number): number {
	return (hasApiKey ? 100 : 340) * jobs
}
