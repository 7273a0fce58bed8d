/**
 * Interactive prompts using the prompts library
 */

import prompts from "prompts"

/** Ask before replacing results in an existing output directory */
export async function promptConfirmOverwrite(outdir: string): Promise<boolean> {
	const response = await prompts({
		type: "confirm",
		name: "confirm",
		message: `Results already exist in ${outdir}. Overwrite existing results?`,
		initial: false,
	})

	return response.confirm === true
}

/**
 * Ctrl+C handling
 */
export function setupPromptHandlers(): void {
	prompts.override({})

	process.on("SIGINT", () => {
		console.log("\n\nAborted.")
		process.exit(130)
	})
}
