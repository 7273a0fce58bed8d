/**
 * Terminal output helpers with consistent styling
 *
 * Everything routes through spinnerSafeLog() so messages printed while an
 * ora spinner is running do not tear its line.
 */

import chalk from "chalk"
import { spinnerSafeLog } from "./parallel.js"

export const ui = {
	success(text: string): void {
		spinnerSafeLog(chalk.green("✓") + " " + text)
	},

	error(text: string): void {
		spinnerSafeLog(chalk.red("✗") + " " + text)
	},

	warn(text: string): void {
		spinnerSafeLog(chalk.yellow("⚠") + " " + text)
	},

	info(text: string): void {
		spinnerSafeLog(chalk.blue("ℹ") + " " + text)
	},

	/** Only printed with --verbose */
	debug(text: string, verbose: boolean): void {
		if (verbose) {
			spinnerSafeLog(chalk.dim("  → " + text))
		}
	},

	banner(
		version: string,
		input: string,
		outdir: string,
		details: { jobs: number; batchSize: number; apiKey: boolean },
	): void {
		console.log(chalk.bold("fetchm") + ` v${version}`)
		console.log(`Input: ${chalk.cyan(input)}`)
		console.log(`Output: ${chalk.cyan(outdir)}`)
		console.log(
			`Requests: ${chalk.cyan(String(details.jobs))} concurrent, ` +
				`${chalk.cyan(String(details.batchSize))} BioSamples per request` +
				(details.apiKey ? chalk.dim(" (API key)") : ""),
		)
		console.log()
	},

	/** Aligned `label  value` lines under a title */
	table(title: string, rows: Array<[string, string | number]>): void {
		if (rows.length === 0) return
		const width = Math.max(...rows.map(([label]) => label.length))
		console.log(chalk.bold(title))
		for (const [label, value] of rows) {
			console.log(`  ${label.padEnd(width)}  ${chalk.cyan(String(value))}`)
		}
	},

	finalStatus(allSuccess: boolean): void {
		// Plain console.log: the spinner is gone by now
		console.log()
		if (allSuccess) {
			console.log(chalk.green.bold("✓ Metadata fetched successfully!"))
		} else {
			console.log(
				chalk.yellow.bold(
					"⚠ Some BioSamples could not be fetched. See above for details.",
				),
			)
		}
		console.log()
	},
}
