/**
 * NCBI E-utilities client (efetch, db=biosample)
 *
 * Requests are POSTed so long accession lists stay out of the URL. Results
 * are values, never exceptions: the pipeline marks failed batches and
 * carries on with the rest.
 */

import { Agent, fetch as undiciFetch, type Dispatcher } from "undici"
import { looksLikeBioSampleXml } from "../biosample.js"
import { log } from "../logger.js"
import type { LaneRateLimiter } from "./rate-limiter.js"

export const EUTILS_BASE_URL = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils"
export const TOOL_NAME = "fetchm"
export const USER_AGENT = "fetchm/0.1.0"

// NCBI closes idle connections quickly; keep a small dedicated pool
const EUTILS_AGENT = new Agent({
	keepAliveTimeout: 10_000,
	keepAliveMaxTimeout: 30_000,
	connections: 10,
	pipelining: 0,
})

export interface EfetchOptions {
	apiKey?: string | undefined
	email?: string | undefined
	/** Total attempts, including the first */
	retryCount: number
	/** Seconds; multiplied by the attempt number */
	retryDelay: number
	limiter: LaneRateLimiter
	/** Override for tests (undici MockAgent) */
	dispatcher?: Dispatcher | undefined
	/** Override for tests */
	baseUrl?: string | undefined
	signal?: AbortSignal | undefined
}

export interface EfetchResult {
	xml?: string
	error?: string
	status?: number
	attempts: number
}

/** Form body for an efetch request */
export function buildEfetchBody(
	accessions: string[],
	options: Pick<EfetchOptions, "apiKey" | "email">,
): URLSearchParams {
	const body = new URLSearchParams({
		db: "biosample",
		id: accessions.join(","),
		retmode: "xml",
		tool: TOOL_NAME,
	})
	if (options.apiKey) body.set("api_key", options.apiKey)
	if (options.email) body.set("email", options.email)
	return body
}

function isRetryableStatus(status: number): boolean {
	return status === 429 || status >= 500
}

/** Retry-After in milliseconds, if the header holds a number of seconds */
export function parseRetryAfter(value: string | null): number | null {
	if (!value) return null
	const seconds = Number(value.trim())
	return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null
}

/** NCBI error bodies are JSON ({"error": "..."}) or plain text/HTML */
function summarizeErrorBody(raw: string, status: number): string {
	const trimmed = raw.trim()
	if (trimmed.startsWith("{")) {
		try {
			const parsed: unknown = JSON.parse(trimmed)
			if (
				typeof parsed === "object" &&
				parsed !== null &&
				"error" in parsed &&
				typeof parsed.error === "string"
			) {
				return `HTTP ${status}: ${parsed.error}`
			}
		} catch {
			// Not JSON after all; fall through to the raw text
		}
	}
	if (trimmed === "" || trimmed.startsWith("<")) return `HTTP ${status}`
	return `HTTP ${status}: ${trimmed.slice(0, 200)}`
}

function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Fetch BioSample XML for a batch of accessions.
 *
 * Retries 429/5xx responses, network errors and 200 responses that are not
 * BioSample XML. Other 4xx responses fail immediately.
 */
export async function fetchBioSamples(
	accessions: string[],
	options: EfetchOptions,
): Promise<EfetchResult> {
	if (accessions.length === 0) {
		return { xml: "<BioSampleSet></BioSampleSet>", attempts: 0 }
	}

	const url = `${options.baseUrl ?? EUTILS_BASE_URL}/efetch.fcgi`
	const body = buildEfetchBody(accessions, options).toString()
	const maxAttempts = Math.max(1, options.retryCount)
	const baseDelayMs = options.retryDelay * 1000
	let lastError = "efetch request failed"
	let lastStatus: number | undefined

	for (let attempt = 1; attempt <= maxAttempts; attempt++) {
		await options.limiter.wait()
		const startedAt = Date.now()

		try {
			const response = await undiciFetch(url, {
				method: "POST",
				headers: {
					"User-Agent": USER_AGENT,
					"Content-Type": "application/x-www-form-urlencoded",
				},
				body,
				dispatcher: options.dispatcher ?? EUTILS_AGENT,
				...(options.signal ? { signal: options.signal } : {}),
			})
			const raw = await response.text()
			lastStatus = response.status

			log.eutils.debug(
				{
					status: response.status,
					accessions: accessions.length,
					attempt,
					elapsedMs: Date.now() - startedAt,
				},
				"efetch biosample",
			)

			if (!response.ok) {
				lastError = summarizeErrorBody(raw, response.status)
				if (!isRetryableStatus(response.status) || attempt >= maxAttempts) {
					log.eutils.debug(
						{ status: response.status, first: accessions[0] },
						"efetch failed",
					)
					return { error: lastError, status: response.status, attempts: attempt }
				}
				const retryAfter = parseRetryAfter(response.headers.get("Retry-After"))
				if (retryAfter !== null) options.limiter.pause(retryAfter)
				await sleep(baseDelayMs * attempt)
				continue
			}

			if (!looksLikeBioSampleXml(raw)) {
				lastError = "Unexpected response body (not BioSample XML)"
				log.eutils.debug(
					{ first: accessions[0], head: raw.slice(0, 200), attempt },
					"efetch returned a non-XML body",
				)
				if (attempt >= maxAttempts) {
					return { error: lastError, status: response.status, attempts: attempt }
				}
				await sleep(baseDelayMs * attempt)
				continue
			}

			return { xml: raw, status: response.status, attempts: attempt }
		} catch (err) {
			if (options.signal?.aborted) {
				return { error: "Aborted", attempts: attempt }
			}
			lastError = err instanceof Error ? err.message : String(err)
			log.eutils.debug({ err: lastError, attempt }, "efetch network error")
			if (attempt >= maxAttempts) break
			await sleep(baseDelayMs * attempt)
		}
	}

	return {
		error: lastError,
		...(lastStatus !== undefined ? { status: lastStatus } : {}),
		attempts: maxAttempts,
	}
}

/** Split accessions into request-sized batches */
export function chunk<T>(items: T[], size: number): T[][] {
	if (size < 1) throw new RangeError("batch size must be at least 1")
	const batches: T[][] = []
	for (let i = 0; i < items.length; i += size) {
		batches.push(items.slice(i, i + size))
	}
	return batches
}
