/**
 * renderApp - CLI entry point for the Ink view
 *
 * Switches logging to a file while Ink owns the terminal and resolves once
 * the view has exited.
 *
 * @module ui/renderApp
 */
import { render } from "ink"
import { FetchView, type FetchViewResult } from "./views/FetchView.js"
import type { FetchOptions } from "../core/types.js"
import { configureLogging } from "../logger.js"

export interface InkRunResult extends FetchViewResult {
	logFilePath: string | null
}

export async function runFetchView(
	options: FetchOptions,
	logging: { verbose?: boolean | undefined } = {},
): Promise<InkRunResult> {
	const { logFilePath } = configureLogging({ ink: true, verbose: logging.verbose })

	let result: FetchViewResult | null = null
	const { waitUntilExit } = render(
		<FetchView
			options={options}
			onComplete={r => {
				result = r
			}}
		/>,
	)
	await waitUntilExit()

	const final: FetchViewResult = result ?? {
		success: false,
		error: "Interrupted",
		durationMs: 0,
	}
	return { ...final, logFilePath }
}
