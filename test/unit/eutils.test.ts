/**
 * Unit tests for the E-utilities client
 *
 * Requests go to an undici MockAgent; nothing leaves the process.
 */

import { afterEach, describe, it, expect, vi } from "vitest"
import pino, { type Logger } from "pino"
import { MockAgent } from "undici"
import { log } from "../../src/logger.js"
import {
	buildEfetchBody,
	chunk,
	fetchBioSamples,
	parseRetryAfter,
	type EfetchOptions,
} from "../../src/ncbi/eutils.js"
import { LaneRateLimiter } from "../../src/ncbi/rate-limiter.js"
import {
	EFETCH_PATH,
	MOCK_BASE_URL,
	MOCK_ORIGIN,
	biosampleXml,
	formFields,
	mockEutils,
	mockEutilsStatus,
} from "../helpers/index.js"

const instantClock = { now: () => 0, sleep: async () => {} }

const agents: MockAgent[] = []

function options(agent: MockAgent, overrides: Partial<EfetchOptions> = {}): EfetchOptions {
	agents.push(agent)
	return {
		retryCount: 3,
		retryDelay: 0,
		limiter: new LaneRateLimiter(1, 0, instantClock),
		dispatcher: agent,
		baseUrl: MOCK_BASE_URL,
		...overrides,
	}
}

afterEach(async () => {
	vi.restoreAllMocks()
	await Promise.all(agents.splice(0).map(agent => agent.close()))
})

/** pino logger whose records land in `messages` */
function captureLogger(level: string): { logger: Logger; messages: string[] } {
	const messages: string[] = []
	const logger = pino(
		{ level },
		{
			write(line: string) {
				const record: unknown = JSON.parse(line)
				if (typeof record === "object" && record !== null && "msg" in record) {
					messages.push(String(record.msg))
				}
			},
		},
	)
	return { logger, messages }
}

describe("buildEfetchBody", () => {
	it("names the database, ids and tool", () => {
		const body = buildEfetchBody(["SAMN00000001", "SAMN00000002"], {})

		expect(body.get("db")).toBe("biosample")
		expect(body.get("id")).toBe("SAMN00000001,SAMN00000002")
		expect(body.get("retmode")).toBe("xml")
		expect(body.get("tool")).toBe("fetchm")
		expect(body.has("api_key")).toBe(false)
		expect(body.has("email")).toBe(false)
	})

	it("adds the API key and email when given", () => {
		const body = buildEfetchBody(["SAMN00000001"], {
			apiKey: "test-secret",
			email: "dev@example.org",
		})

		expect(body.get("api_key")).toBe("test-secret")
		expect(body.get("email")).toBe("dev@example.org")
	})
})

describe("parseRetryAfter", () => {
	it("reads seconds", () => {
		expect(parseRetryAfter("2")).toBe(2000)
		expect(parseRetryAfter(" 0 ")).toBe(0)
	})

	it("ignores other values", () => {
		expect(parseRetryAfter(null)).toBeNull()
		expect(parseRetryAfter("soon")).toBeNull()
		expect(parseRetryAfter("-1")).toBeNull()
	})
})

describe("chunk", () => {
	it("splits into batches of at most size items", () => {
		expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]])
		expect(chunk([], 2)).toEqual([])
	})

	it("rejects a batch size below one", () => {
		expect(() => chunk([1], 0)).toThrow(RangeError)
	})
})

describe("fetchBioSamples", () => {
	it("posts the accessions and returns the XML", async () => {
		const { agent, requests } = mockEutils([{ accession: "SAMN00000001" }])

		const result = await fetchBioSamples(["SAMN00000001", "SAMN00000009"], options(agent))

		expect(requests).toEqual([["SAMN00000001", "SAMN00000009"]])
		expect(result.status).toBe(200)
		expect(result.attempts).toBe(1)
		expect(result.error).toBeUndefined()
		expect(result.xml).toContain('accession="SAMN00000001"')
		expect(result.xml).not.toContain("SAMN00000009")
	})

	it("sends the API key in the form body", async () => {
		const agent = new MockAgent()
		agent.disableNetConnect()
		let apiKey: string | null = null
		agent
			.get(MOCK_ORIGIN)
			.intercept({ path: EFETCH_PATH, method: "POST" })
			.reply(200, opts => {
				apiKey = formFields(opts.body).get("api_key")
				return biosampleXml([])
			})

		await fetchBioSamples(["SAMN00000001"], options(agent, { apiKey: "test-secret" }))
		expect(apiKey).toBe("test-secret")
	})

	it("skips the request for an empty batch", async () => {
		const { agent, requests } = mockEutils([])

		const result = await fetchBioSamples([], options(agent))

		expect(result).toEqual({ xml: "<BioSampleSet></BioSampleSet>", attempts: 0 })
		expect(requests).toEqual([])
	})

	it("fails a 400 immediately with the JSON error message", async () => {
		const { agent, requests } = mockEutilsStatus(400, '{"error":"Invalid id"}')

		const result = await fetchBioSamples(["SAMN00000001"], options(agent))

		expect(result).toEqual({ error: "HTTP 400: Invalid id", status: 400, attempts: 1 })
		expect(requests).toHaveLength(1)
	})

	it("does not echo an HTML error page", async () => {
		const { agent } = mockEutilsStatus(404, "<html><body>Not Found</body></html>")

		const result = await fetchBioSamples(["SAMN00000001"], options(agent))
		expect(result.error).toBe("HTTP 404")
	})

	it("retries server errors up to the attempt limit", async () => {
		const { agent, requests } = mockEutilsStatus(500, "")

		const result = await fetchBioSamples(["SAMN00000001"], options(agent, { retryCount: 3 }))

		expect(result).toEqual({ error: "HTTP 500", status: 500, attempts: 3 })
		expect(requests).toHaveLength(3)
	})

	it("retries a 200 response that is not BioSample XML", async () => {
		const { agent, requests } = mockEutilsStatus(200, "<html>busy</html>")

		const result = await fetchBioSamples(["SAMN00000001"], options(agent, { retryCount: 2 }))

		expect(result).toEqual({
			error: "Unexpected response body (not BioSample XML)",
			status: 200,
			attempts: 2,
		})
		expect(requests).toHaveLength(2)
	})

	it("recovers when a retry succeeds", async () => {
		const agent = new MockAgent()
		agent.disableNetConnect()
		const pool = agent.get(MOCK_ORIGIN)
		pool.intercept({ path: EFETCH_PATH, method: "POST" }).reply(503, "")
		pool
			.intercept({ path: EFETCH_PATH, method: "POST" })
			.reply(200, biosampleXml([{ accession: "SAMN00000001" }]))

		const result = await fetchBioSamples(["SAMN00000001"], options(agent))

		expect(result.attempts).toBe(2)
		expect(result.xml).toContain("SAMN00000001")
	})

	it("pauses the limiter on 429 with Retry-After", async () => {
		const agent = new MockAgent()
		agent.disableNetConnect()
		const pool = agent.get(MOCK_ORIGIN)
		pool
			.intercept({ path: EFETCH_PATH, method: "POST" })
			.reply(429, '{"error":"API rate limit exceeded"}', { headers: { "Retry-After": "2" } })
		pool.intercept({ path: EFETCH_PATH, method: "POST" }).reply(200, biosampleXml([]))

		const limiter = new LaneRateLimiter(1, 0, instantClock)
		const pause = vi.spyOn(limiter, "pause")

		const result = await fetchBioSamples(["SAMN00000001"], options(agent, { limiter }))

		expect(pause).toHaveBeenCalledWith(2000)
		expect(result.attempts).toBe(2)
		expect(result.error).toBeUndefined()
	})

	it("reports network errors after the last attempt", async () => {
		const agent = new MockAgent()
		agent.disableNetConnect()
		agent
			.get(MOCK_ORIGIN)
			.intercept({ path: EFETCH_PATH, method: "POST" })
			.replyWithError(new Error("socket hang up"))
			.persist()

		const result = await fetchBioSamples(["SAMN00000001"], options(agent, { retryCount: 2 }))

		expect(result.attempts).toBe(2)
		expect(result.xml).toBeUndefined()
		expect(typeof result.error).toBe("string")
	})
})

describe("fetchBioSamples logging", () => {
	it("keeps retries and failures below info while a progress bar may be drawing", async () => {
		const { logger, messages } = captureLogger("info")
		vi.spyOn(log, "eutils", "get").mockReturnValue(logger)
		const { agent } = mockEutilsStatus(500, "")

		const result = await fetchBioSamples(["SAMN00000001"], options(agent, { retryCount: 2 }))

		expect(result.error).toBe("HTTP 500")
		expect(messages).toEqual([])
	})

	it("records the failure at debug", async () => {
		const { logger, messages } = captureLogger("debug")
		vi.spyOn(log, "eutils", "get").mockReturnValue(logger)
		const { agent } = mockEutilsStatus(500, "")

		await fetchBioSamples(["SAMN00000001"], options(agent, { retryCount: 2 }))

		expect(messages).toEqual(["efetch biosample", "efetch biosample", "efetch failed"])
	})
})
