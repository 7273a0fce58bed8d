/**
 * Error types for fetchm
 *
 * Pipeline stages throw these for input and configuration problems.
 * Network failures are returned as values (`{ error }`) by the E-utilities
 * client and never thrown.
 */

export const ErrorCodes = {
	DATASET_NOT_FOUND: "E_DATASET_NOT_FOUND",
	DATASET_EMPTY: "E_DATASET_EMPTY",
	DATASET_MISSING_COLUMN: "E_DATASET_MISSING_COLUMN",
	BIOSAMPLE_PARSE: "E_BIOSAMPLE_PARSE",
	BIOSAMPLE_ERROR_RESPONSE: "E_BIOSAMPLE_ERROR_RESPONSE",
	INVALID_OPTION: "E_INVALID_OPTION",
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

export class FetchmError extends Error {
	constructor(
		message: string,
		public readonly code: ErrorCode,
		public readonly context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "FetchmError"
	}

	toJSON() {
		return {
			error: this.message,
			code: this.code,
			context: this.context,
		}
	}
}

/** Input table could not be read or lacks required columns */
export class DatasetError extends FetchmError {
	constructor(
		message: string,
		code: ErrorCode,
		context?: Record<string, unknown>,
	) {
		super(message, code, context)
		this.name = "DatasetError"
	}
}

/** BioSample XML was malformed or an E-utilities error document */
export class BioSampleParseError extends FetchmError {
	constructor(
		message: string,
		code: ErrorCode = ErrorCodes.BIOSAMPLE_PARSE,
		context?: Record<string, unknown>,
	) {
		super(message, code, context)
		this.name = "BioSampleParseError"
	}
}

/** A command line option or config value is out of range */
export class OptionError extends FetchmError {
	constructor(option: string, message: string) {
		super(`${option}: ${message}`, ErrorCodes.INVALID_OPTION, { option })
		this.name = "OptionError"
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
