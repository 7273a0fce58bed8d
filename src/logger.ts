/**
 * Structured logging with pino
 *
 * pino carries the diagnostic stream (request timings, retries, cache hits);
 * ui.ts carries what the user reads. The two never share a line.
 *
 * Levels follow LOG_LEVEL, or debug when DEBUG is set, or info. `--verbose`
 * lowers the level to debug at runtime. While the Ink view owns the
 * terminal, records go to a file instead of stdout.
 */

import { existsSync, mkdirSync } from "node:fs"
import { dirname, join } from "node:path"
import pino, { type Logger } from "pino"

const envLevel =
	process.env["LOG_LEVEL"] || (process.env["DEBUG"] ? "debug" : "info")

const prettyOutput = Boolean(process.stdout.isTTY) && !process.env["CI"]

export interface ConfigureLoggingOptions {
	/** Send records to a file so Ink redraws stay clean */
	ink: boolean
	/** Lower the console level to debug */
	verbose?: boolean | undefined
	/** Explicit log file; defaults to .log/fetchm-<stamp>.log under cwd */
	logFilePath?: string | undefined
}

let mode: "console" | "file" = "console"
let filePath: string | null = null
let verboseEnabled = false

function timestampedLogFile(): string {
	const stamp = new Date().toISOString().replace(/[:.]/g, "-")
	return join(process.cwd(), ".log", `fetchm-${stamp}-${process.pid}.log`)
}

function consoleLevel(): string {
	if (process.env["LOG_LEVEL"]) return envLevel
	return verboseEnabled ? "debug" : envLevel
}

function buildConsoleLogger(): Logger {
	if (prettyOutput) {
		return pino({
			level: consoleLevel(),
			transport: {
				target: "pino-pretty",
				options: {
					colorize: true,
					translateTime: "HH:MM:ss",
					ignore: "pid,hostname",
					messageFormat: "{module}: {msg}",
					destination: 2,
				},
			},
		})
	}
	// stderr keeps stdout free for tables piped elsewhere
	return pino(
		{ level: consoleLevel(), base: { pid: undefined, hostname: undefined } },
		pino.destination(2),
	)
}

function buildFileLogger(path: string): Logger {
	const dir = dirname(path)
	if (!existsSync(dir)) mkdirSync(dir, { recursive: true })
	// Synchronous writes: Ink exits through process.exit and would drop a buffer
	const destination = pino.destination({ dest: path, sync: true })
	const level =
		process.env["LOG_LEVEL_FILE"] ??
		(process.env["LOG_LEVEL"] || process.env["DEBUG"] ? envLevel : "debug")
	return pino(
		{ level, base: { pid: undefined, hostname: undefined } },
		destination,
	)
}

/** Root logger; modules take a child through createLogger() */
export let logger: Logger = buildConsoleLogger()

export function configureLogging(options: ConfigureLoggingOptions): {
	logFilePath: string | null
} {
	const verbose = Boolean(options.verbose)

	if (options.ink) {
		const nextPath = options.logFilePath ?? filePath ?? timestampedLogFile()
		if (mode === "file" && filePath === nextPath) {
			return { logFilePath: filePath }
		}
		mode = "file"
		filePath = nextPath
		verboseEnabled = verbose
		logger = buildFileLogger(nextPath)
		return { logFilePath: filePath }
	}

	if (mode !== "console" || verbose !== verboseEnabled) {
		mode = "console"
		filePath = null
		verboseEnabled = verbose
		logger = buildConsoleLogger()
	}

	return { logFilePath: filePath }
}

/**
 * Child logger tagged with a module name
 * @example
 * const log = createLogger("eutils")
 * log.debug({ accessions: batch.length }, "efetch biosample")
 */
export function createLogger(module: string): Logger {
	return logger.child({ module })
}

/** Flush buffered records; call before a non-zero exit */
export function flushLogs(): Promise<void> {
	return new Promise(resolve => {
		logger.flush(() => resolve())
	})
}

// Getters so callers always see the logger installed by configureLogging()
export const log = {
	get eutils() {
		return createLogger("eutils")
	},
	get pipeline() {
		return createLogger("pipeline")
	},
	get cache() {
		return createLogger("cache")
	},
	get config() {
		return createLogger("config")
	},
	get ui() {
		return createLogger("ui")
	},
	get cli() {
		return createLogger("cli")
	},
	get db() {
		return createLogger("db")
	},
} as const
