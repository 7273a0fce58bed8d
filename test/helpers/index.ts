/**
 * Test utilities for fetchm
 */

import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { dirname, join } from "node:path"
import { fileURLToPath } from "node:url"
import { MockAgent } from "undici"
import { closeDb } from "../../src/db/index.js"
import type { AssemblyRow } from "../../src/types.js"
import { toAssemblyRow } from "../../src/dataset.js"

export const FIXTURES_DIR = join(dirname(fileURLToPath(import.meta.url)), "../fixtures")

export function fixturePath(name: string): string {
	return join(FIXTURES_DIR, name)
}

/**
 * Create a temporary directory for test isolation.
 * Closes any cache database opened inside before removing it.
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
	const dir = await mkdtemp(join(tmpdir(), "fetchm-test-"))
	try {
		return await fn(dir)
	} finally {
		closeDb()
		await rm(dir, { recursive: true, force: true })
	}
}

/** AssemblyRow from a few named cells */
export function makeRow(values: Record<string, string>, index = 1): AssemblyRow {
	return toAssemblyRow(values, index)
}

// ─────────────────────────────────────────────────────────────────────────────
// NCBI stand-in
// ─────────────────────────────────────────────────────────────────────────────

export interface SampleSpec {
	accession: string
	title?: string
	organism?: string
	attributes?: Record<string, string>
}

function escape(value: string): string {
	return value
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;")
}

/** A BioSampleSet document for the given samples */
export function biosampleXml(samples: SampleSpec[]): string {
	const body = samples.map(sample => {
		const attributes = Object.entries(sample.attributes ?? {})
			.map(
				([name, value]) =>
					`<Attribute attribute_name="${escape(name)}" harmonized_name="${escape(name)}">${escape(value)}</Attribute>`,
			)
			.join("")
		return [
			`<BioSample access="public" accession="${sample.accession}">`,
			`<Ids><Id db="BioSample" is_primary="1">${sample.accession}</Id></Ids>`,
			"<Description>",
			sample.title ? `<Title>${escape(sample.title)}</Title>` : "",
			`<Organism taxonomy_id="562" taxonomy_name="${escape(sample.organism ?? "Escherichia coli")}"/>`,
			"</Description>",
			`<Attributes>${attributes}</Attributes>`,
			"</BioSample>",
		].join("")
	})
	return `<?xml version="1.0" encoding="UTF-8"?>\n<BioSampleSet>${body.join("")}</BioSampleSet>`
}

export const MOCK_ORIGIN = "https://eutils.test"
export const MOCK_BASE_URL = `${MOCK_ORIGIN}/entrez/eutils`
export const EFETCH_PATH = "/entrez/eutils/efetch.fcgi"

export interface MockEutils {
	agent: MockAgent
	/** Accession lists of every efetch request, in arrival order */
	requests: string[][]
}

/** Form fields of an intercepted request body */
export function formFields(body: unknown): URLSearchParams {
	if (typeof body === "string") return new URLSearchParams(body)
	if (body instanceof Uint8Array) return new URLSearchParams(Buffer.from(body).toString("utf-8"))
	if (body instanceof URLSearchParams) return body
	return new URLSearchParams()
}

function requestedIds(body: unknown): string[] {
	const id = formFields(body).get("id")
	return id ? id.split(",") : []
}

/**
 * In-process efetch that answers with the known samples among the
 * requested accessions, like NCBI does.
 */
export function mockEutils(samples: SampleSpec[]): MockEutils {
	const agent = new MockAgent()
	agent.disableNetConnect()
	const known = new Map(samples.map(sample => [sample.accession, sample]))
	const requests: string[][] = []

	agent
		.get(MOCK_ORIGIN)
		.intercept({ path: EFETCH_PATH, method: "POST" })
		.reply(200, opts => {
			const ids = requestedIds(opts.body)
			requests.push(ids)
			return biosampleXml(
				ids.flatMap(id => {
					const sample = known.get(id)
					return sample ? [sample] : []
				}),
			)
		})
		.persist()

	return { agent, requests }
}

/** efetch that always answers with one status code */
export function mockEutilsStatus(status: number, body = ""): MockEutils {
	const agent = new MockAgent()
	agent.disableNetConnect()
	const requests: string[][] = []

	agent
		.get(MOCK_ORIGIN)
		.intercept({ path: EFETCH_PATH, method: "POST" })
		.reply(status, opts => {
			requests.push(requestedIds(opts.body))
			return body
		})
		.persist()

	return { agent, requests }
}
