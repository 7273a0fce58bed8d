/**
 * Spinner-aware terminal output and single-step spinners (ora)
 */

import ora, { type Ora } from "ora"
import { log } from "./logger.js"

// The spinner currently on screen, if any
let activeSpinner: Ora | null = null
let spinnerText = ""

// Serializes writes so concurrent callers cannot interleave stop/print/start
let logLock: Promise<void> = Promise.resolve()

/**
 * Print a line without corrupting an active spinner: the spinner is stopped,
 * the line printed, and the spinner restarted with its last text.
 */
export function spinnerSafeLog(message: string): void {
	log.ui.debug(message)

	if (!activeSpinner) {
		console.log(message)
		return
	}

	logLock = logLock.then(
		() =>
			new Promise<void>(resolve => {
				if (activeSpinner) {
					activeSpinner.stop()
					console.log(message)
					activeSpinner.start(spinnerText)
				} else {
					console.log(message)
				}
				setImmediate(resolve)
			}),
	)
}

/** Wait until queued spinner-safe writes have reached the terminal */
export function drainLog(): Promise<void> {
	return logLock
}

/** Start a spinner for a single step; null in quiet mode */
export function createSpinner(text: string, quiet: boolean): Ora | null {
	if (quiet) return null
	spinnerText = text
	activeSpinner = ora(text).start()
	return activeSpinner
}

/**
 * Run one step behind a spinner. The spinner succeeds with `done(result)`
 * or fails with the error message, and the error is rethrown.
 */
export async function withSpinner<T>(
	text: string,
	quiet: boolean,
	fn: () => Promise<T>,
	done: (result: T) => string,
): Promise<T> {
	const spinner = createSpinner(text, quiet)
	try {
		const result = await fn()
		await drainLog()
		spinner?.succeed(done(result))
		return result
	} catch (err) {
		await drainLog()
		spinner?.fail(`${text}: ${err instanceof Error ? err.message : String(err)}`)
		throw err
	} finally {
		activeSpinner = null
	}
}
