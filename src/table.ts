/**
 * Annotated table assembly and output files
 */

import { existsSync } from "node:fs"
import { mkdir, readFile, rename, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"
import { stringify } from "csv-stringify/sync"
import { isBioSampleAccession, parseTsv, toAssemblyRow } from "./dataset.js"
import { DatasetError, ErrorCodes } from "./errors.js"
import { standardizeRecord } from "./standardize/index.js"
import {
	METADATA_STATUSES,
	type AnnotatedRow,
	type AssemblyRow,
	type BioSampleRecord,
	type MetadataStatus,
	type RemovedRow,
	type StandardizedMetadata,
} from "./types.js"

/** Output directory layout, relative to --outdir */
export const OUTPUT_PATHS = {
	metadataDir: "metadata_output",
	cleanTable: join("metadata_output", "ncbi_clean.tsv"),
	filteredTable: join("metadata_output", "filtered_out.tsv"),
	biosamples: join("metadata_output", "biosamples.jsonl"),
	summaryDir: "metadata_summary",
	figuresDir: "figures",
} as const

/** Columns appended after the input columns, in output order */
export const METADATA_COLUMNS = {
	title: "BioSample Title",
	organism: "BioSample Organism",
	collectionDate: "Collection Date",
	collectionYear: "Collection Year",
	geoLocation: "Geographic Location",
	country: "Country",
	continent: "Continent",
	host: "Host",
	hostStandardized: "Host Standardized",
	isolationSource: "Isolation Source",
	isolationCategory: "Isolation Source Category",
	serovar: "Serovar",
} as const satisfies Record<keyof StandardizedMetadata, string>

export const STATUS_COLUMN = "Metadata Status"
export const FILTER_REASON_COLUMN = "Filter Reason"

const METADATA_KEYS = [
	"title",
	"organism",
	"collectionDate",
	"collectionYear",
	"geoLocation",
	"country",
	"continent",
	"host",
	"hostStandardized",
	"isolationSource",
	"isolationCategory",
	"serovar",
] as const satisfies ReadonlyArray<keyof StandardizedMetadata>

export interface LookupHit {
	record: BioSampleRecord
	/** "ok" when fetched this run, "cached" when served from the cache */
	source: Extract<MetadataStatus, "ok" | "cached">
}

// ─────────────────────────────────────────────────────────────────────────────
// Annotation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Attach standardized metadata and a status to every row.
 *
 * @param hits Records by accession
 * @param failed Accessions whose request batch failed
 */
export function annotateRows(
	rows: AssemblyRow[],
	hits: Map<string, LookupHit>,
	failed: Set<string>,
	currentYear?: number,
): AnnotatedRow[] {
	// Rows sharing a BioSample share one standardized value
	const standardized = new Map<string, StandardizedMetadata>()

	return rows.map(row => {
		const accession = row.bioSample
		if (accession === null) {
			return { row, metadata: null, status: "no-accession" }
		}
		if (!isBioSampleAccession(accession)) {
			return { row, metadata: null, status: "invalid-accession" }
		}
		if (failed.has(accession)) {
			return { row, metadata: null, status: "error" }
		}

		const hit = hits.get(accession)
		if (!hit) {
			return { row, metadata: null, status: "not-found" }
		}

		let metadata = standardized.get(accession)
		if (!metadata) {
			metadata = standardizeRecord(hit.record, currentYear)
			standardized.set(accession, metadata)
		}
		return { row, metadata, status: hit.source }
	})
}

export function countByStatus(
	rows: AnnotatedRow[],
): Record<MetadataStatus, number> {
	const counts: Record<MetadataStatus, number> = {
		ok: 0,
		cached: 0,
		"not-found": 0,
		error: 0,
		"no-accession": 0,
		"invalid-accession": 0,
	}
	for (const { status } of rows) counts[status] += 1
	return counts
}

// ─────────────────────────────────────────────────────────────────────────────
// Serialization
// ─────────────────────────────────────────────────────────────────────────────

function cell(value: string | number | null): string {
	return value === null ? "" : String(value)
}

// Tabs and line breaks inside a value would split the cell or the row
function tsvCell(value: string): string {
	return value.replace(/[\t\r\n]+/g, " ")
}

/** Unquoted TSV, the way NCBI Datasets writes it */
function toTsv(header: string[], body: string[][]): string {
	return stringify(
		[header, ...body].map(cells => cells.map(tsvCell)),
		{ delimiter: "\t", quote: false },
	)
}

/** Writes to a temp file beside `path`, then renames it into place */
export async function writeFileAtomic(
	path: string,
	content: string,
): Promise<void> {
	await mkdir(dirname(path), { recursive: true })
	const tmp = `${path}.${process.pid}.tmp`
	await writeFile(tmp, content, "utf-8")
	await rename(tmp, path)
}

export function annotatedTableTsv(
	columns: string[],
	rows: AnnotatedRow[],
): string {
	const header = [
		...columns,
		...METADATA_KEYS.map(key => METADATA_COLUMNS[key]),
		STATUS_COLUMN,
	]
	const body = rows.map(({ row, metadata, status }) => [
		...columns.map(column => row.values[column] ?? ""),
		...METADATA_KEYS.map(key => cell(metadata ? metadata[key] : null)),
		status,
	])
	return toTsv(header, body)
}

export function filteredTableTsv(
	columns: string[],
	removed: RemovedRow[],
): string {
	const header = [...columns, FILTER_REASON_COLUMN]
	const body = removed.map(({ row, reason }) => [
		...columns.map(column => row.values[column] ?? ""),
		reason,
	])
	return toTsv(header, body)
}

/** One JSON record per line, in accession order */
export function biosamplesJsonl(records: BioSampleRecord[]): string {
	return [...records]
		.sort((a, b) => a.accession.localeCompare(b.accession))
		.map(record => JSON.stringify(record))
		.map(line => `${line}\n`)
		.join("")
}

export interface TableOutputs {
	columns: string[]
	annotated: AnnotatedRow[]
	removed: RemovedRow[]
	records: BioSampleRecord[]
}

/** Write the metadata_output/ files; returns the paths written */
export async function writeTables(
	outdir: string,
	outputs: TableOutputs,
): Promise<string[]> {
	const files: Array<[string, string]> = [
		[
			join(outdir, OUTPUT_PATHS.cleanTable),
			annotatedTableTsv(outputs.columns, outputs.annotated),
		],
		[
			join(outdir, OUTPUT_PATHS.filteredTable),
			filteredTableTsv(outputs.columns, outputs.removed),
		],
		[join(outdir, OUTPUT_PATHS.biosamples), biosamplesJsonl(outputs.records)],
	]

	for (const [path, content] of files) {
		await writeFileAtomic(path, content)
	}
	return files.map(([path]) => path)
}

// ─────────────────────────────────────────────────────────────────────────────
// Reading back
// ─────────────────────────────────────────────────────────────────────────────

function isMetadataStatus(value: string): value is MetadataStatus {
	return METADATA_STATUSES.some(status => status === value)
}

function readYear(value: string | undefined): number | null {
	if (!value) return null
	const year = Number(value)
	return Number.isInteger(year) ? year : null
}

function metadataFromValues(
	values: Record<string, string>,
): StandardizedMetadata {
	const get = (column: string): string | null => {
		const value = values[column]
		return value === undefined || value === "" ? null : value
	}
	return {
		title: get(METADATA_COLUMNS.title),
		organism: get(METADATA_COLUMNS.organism),
		collectionDate: get(METADATA_COLUMNS.collectionDate),
		collectionYear: readYear(values[METADATA_COLUMNS.collectionYear]),
		geoLocation: get(METADATA_COLUMNS.geoLocation),
		country: get(METADATA_COLUMNS.country),
		continent: get(METADATA_COLUMNS.continent),
		host: get(METADATA_COLUMNS.host),
		hostStandardized: get(METADATA_COLUMNS.hostStandardized),
		isolationSource: get(METADATA_COLUMNS.isolationSource),
		isolationCategory: get(METADATA_COLUMNS.isolationCategory),
		serovar: get(METADATA_COLUMNS.serovar),
	}
}

/**
 * Read an ncbi_clean.tsv written by `fetchm run`.
 * Returns the original input columns and the annotated rows.
 */
export async function readAnnotatedTable(
	path: string,
): Promise<{ columns: string[]; rows: AnnotatedRow[] }> {
	if (!existsSync(path)) {
		throw new DatasetError(
			`Annotated table not found: ${path}`,
			ErrorCodes.DATASET_NOT_FOUND,
			{ path },
		)
	}

	const { columns, records } = parseTsv(await readFile(path, "utf-8"))
	if (!columns.includes(STATUS_COLUMN)) {
		throw new DatasetError(
			`Not an annotated fetchm table (no "${STATUS_COLUMN}" column): ${path}`,
			ErrorCodes.DATASET_MISSING_COLUMN,
			{ path, column: STATUS_COLUMN },
		)
	}

	const appended = new Set<string>([
		...Object.values(METADATA_COLUMNS),
		STATUS_COLUMN,
	])
	const inputColumns = columns.filter(column => !appended.has(column))

	const rows = records.map((values, i): AnnotatedRow => {
		const inputValues: Record<string, string> = {}
		for (const column of inputColumns) inputValues[column] = values[column] ?? ""

		const rawStatus = values[STATUS_COLUMN] ?? ""
		const status: MetadataStatus = isMetadataStatus(rawStatus)
			? rawStatus
			: "error"
		const hasMetadata = status === "ok" || status === "cached"

		return {
			row: toAssemblyRow(inputValues, i + 1),
			metadata: hasMetadata ? metadataFromValues(values) : null,
			status,
		}
	})

	return { columns: inputColumns, rows }
}
