/**
 * BioSample XML parsing
 *
 * Turns an efetch `db=biosample` response into BioSampleRecord values.
 * fast-xml-parser produces an untyped tree; the helpers below narrow it
 * node by node instead of trusting its shape.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser"
import { BioSampleParseError, ErrorCodes } from "./errors.js"
import type { BioSampleRecord } from "./types.js"

// Elements that may repeat; always parsed as arrays
const REPEATED = new Set(["BioSample", "Attribute", "Id", "Link", "ERROR"])

const parser = new XMLParser({
	ignoreAttributes: false,
	attributeNamePrefix: "@_",
	textNodeName: "#text",
	parseTagValue: false,
	parseAttributeValue: false,
	trimValues: true,
	isArray: (tagName: string) => REPEATED.has(tagName),
})

// ─────────────────────────────────────────────────────────────────────────────
// Tree helpers
// ─────────────────────────────────────────────────────────────────────────────

type XmlElement = Record<string, unknown>

function isElement(value: unknown): value is XmlElement {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

function textOf(node: unknown): string | null {
	if (typeof node === "string" || typeof node === "number") {
		const value = String(node).trim()
		return value === "" ? null : value
	}
	if (isElement(node)) return textOf(node["#text"])
	return null
}

function attrOf(node: unknown, name: string): string | null {
	if (!isElement(node)) return null
	return textOf(node[`@_${name}`])
}

function childOf(node: unknown, name: string): unknown {
	return isElement(node) ? node[name] : undefined
}

function childrenOf(node: unknown, name: string): unknown[] {
	const value = childOf(node, name)
	if (value === undefined) return []
	return Array.isArray(value) ? value : [value]
}

// ─────────────────────────────────────────────────────────────────────────────
// Record extraction
// ─────────────────────────────────────────────────────────────────────────────

function toNumber(value: string | null): number | null {
	if (value === null) return null
	const n = Number(value)
	return Number.isFinite(n) ? n : null
}

function readAttributes(sample: unknown): Record<string, string> {
	const attributes: Record<string, string> = {}
	for (const node of childrenOf(childOf(sample, "Attributes"), "Attribute")) {
		const key = attrOf(node, "harmonized_name") ?? attrOf(node, "attribute_name")
		const value = textOf(node)
		if (key === null || value === null) continue
		// First occurrence wins
		if (!(key in attributes)) attributes[key] = value
	}
	return attributes
}

function readIds(sample: unknown): Record<string, string> {
	const ids: Record<string, string> = {}
	for (const node of childrenOf(childOf(sample, "Ids"), "Id")) {
		const key = attrOf(node, "db") ?? attrOf(node, "db_label")
		const value = textOf(node)
		if (key === null || value === null) continue
		if (!(key in ids)) ids[key] = value
	}
	return ids
}

function toRecord(sample: unknown): BioSampleRecord | null {
	const ids = readIds(sample)
	const accession = attrOf(sample, "accession") ?? ids["BioSample"] ?? null
	if (accession === null) return null

	const description = childOf(sample, "Description")
	const organism = childOf(description, "Organism")

	return {
		accession,
		title: textOf(childOf(description, "Title")),
		organism:
			attrOf(organism, "taxonomy_name") ??
			textOf(childOf(organism, "OrganismName")),
		taxonomyId: toNumber(attrOf(organism, "taxonomy_id")),
		publicationDate: attrOf(sample, "publication_date"),
		submissionDate: attrOf(sample, "submission_date"),
		attributes: readAttributes(sample),
		ids,
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parse a BioSampleSet (or a single BioSample) document.
 *
 * @throws BioSampleParseError for malformed XML, an E-utilities ERROR
 * document, or a document with neither root element
 */
export function parseBioSampleSet(xml: string): BioSampleRecord[] {
	const validation = XMLValidator.validate(xml)
	if (validation !== true) {
		throw new BioSampleParseError(
			`Malformed BioSample XML (line ${validation.err.line}): ${validation.err.msg}`,
			ErrorCodes.BIOSAMPLE_PARSE,
			{ line: validation.err.line, col: validation.err.col },
		)
	}

	const doc: unknown = parser.parse(xml)

	const errorNodes = [
		...childrenOf(childOf(doc, "eFetchResult"), "ERROR"),
		...childrenOf(childOf(doc, "eSummaryResult"), "ERROR"),
	]
	if (errorNodes.length > 0) {
		const message = errorNodes
			.map(node => textOf(node))
			.filter((m): m is string => m !== null)
			.join("; ")
		throw new BioSampleParseError(
			`E-utilities error: ${message || "unknown error"}`,
			ErrorCodes.BIOSAMPLE_ERROR_RESPONSE,
		)
	}

	let samples: unknown[]
	if (isElement(doc) && "BioSampleSet" in doc) {
		samples = childrenOf(doc["BioSampleSet"], "BioSample")
	} else if (isElement(doc) && "BioSample" in doc) {
		samples = childrenOf(doc, "BioSample")
	} else {
		throw new BioSampleParseError(
			"Response contains no BioSampleSet or BioSample element",
		)
	}

	const records: BioSampleRecord[] = []
	for (const sample of samples) {
		const record = toRecord(sample)
		if (record) records.push(record)
	}
	return records
}

/**
 * Cheap check used to decide whether a 200 response is worth parsing.
 * NCBI answers overload with HTML pages and sometimes with empty bodies.
 */
export function looksLikeBioSampleXml(body: string): boolean {
	const head = body.trimStart().slice(0, 512)
	if (head === "" || /^<!DOCTYPE html|^<html/i.test(head)) return false
	return /<BioSampleSet|<BioSample[\s>]|<eFetchResult/.test(body)
}
