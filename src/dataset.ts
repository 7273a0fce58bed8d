/**
 * NCBI Datasets genome table loading
 *
 * Reads the TSV written by the NCBI Datasets web download or
 * `dataformat tsv genome` and maps the columns fetchm understands onto
 * typed fields. Unknown columns are carried through untouched.
 */

import { existsSync } from "node:fs"
import { readFile } from "node:fs/promises"
import { parse } from "csv-parse/sync"
import { DatasetError, ErrorCodes } from "./errors.js"
import type { AssemblyRow, Dataset } from "./types.js"

/** Input headers recognised by fetchm */
export const COLUMNS = {
	assemblyAccession: "Assembly Accession",
	assemblyName: "Assembly Name",
	organismName: "Organism Name",
	strain: "Organism Infraspecific Names Strain",
	assemblyLevel: "Assembly Level",
	bioSample: "Assembly BioSample Accession",
	bioProject: "Assembly BioProject Accession",
	releaseDate: "Assembly Release Date",
	sequencingTech: "Assembly Sequencing Tech",
	genomeSize: "Assembly Stats Total Sequence Length",
	gcPercent: "Assembly Stats GC Percent",
	contigCount: "Assembly Stats Number of Contigs",
	contigN50: "Assembly Stats Contig N50",
	checkmCompleteness: "CheckM completeness",
	checkmContamination: "CheckM contamination",
	geneCount: "Annotation Count Gene Total",
} as const

const BIOSAMPLE_ACCESSION = /^SAM[NED][A-Z]?\d+$/

export function isBioSampleAccession(value: string): boolean {
	return BIOSAMPLE_ACCESSION.test(value)
}

function text(values: Record<string, string>, column: string): string | null {
	const value = values[column]
	return value === undefined || value === "" ? null : value
}

function numeric(values: Record<string, string>, column: string): number | null {
	const raw = text(values, column)
	if (raw === null) return null
	const value = Number(raw)
	return Number.isFinite(value) ? value : null
}

/** Build a typed row from raw cells keyed by header */
export function toAssemblyRow(
	values: Record<string, string>,
	index: number,
): AssemblyRow {
	return {
		index,
		values,
		assemblyAccession: text(values, COLUMNS.assemblyAccession),
		assemblyName: text(values, COLUMNS.assemblyName),
		organismName: text(values, COLUMNS.organismName),
		strain: text(values, COLUMNS.strain),
		assemblyLevel: text(values, COLUMNS.assemblyLevel),
		bioSample: text(values, COLUMNS.bioSample),
		bioProject: text(values, COLUMNS.bioProject),
		releaseDate: text(values, COLUMNS.releaseDate),
		sequencingTech: text(values, COLUMNS.sequencingTech),
		genomeSize: numeric(values, COLUMNS.genomeSize),
		gcPercent: numeric(values, COLUMNS.gcPercent),
		contigCount: numeric(values, COLUMNS.contigCount),
		contigN50: numeric(values, COLUMNS.contigN50),
		checkmCompleteness: numeric(values, COLUMNS.checkmCompleteness),
		checkmContamination: numeric(values, COLUMNS.checkmContamination),
		geneCount: numeric(values, COLUMNS.geneCount),
	}
}

/**
 * Parse tab-separated text into a header and raw cell records.
 * Short rows are padded with empty cells; cells beyond the header are dropped.
 * Cells are never quoted, so a `"` is read as part of the value.
 */
export function parseTsv(content: string): {
	columns: string[]
	records: Array<Record<string, string>>
} {
	const lines: string[][] = parse(content, {
		delimiter: "\t",
		bom: true,
		trim: true,
		skip_empty_lines: true,
		relax_column_count: true,
		quote: false,
	})

	const [header, ...body] = lines
	if (!header || header.every(cell => cell === "")) {
		return { columns: [], records: [] }
	}

	const records = body.map(cells => {
		const record: Record<string, string> = {}
		header.forEach((column, i) => {
			record[column] = cells[i] ?? ""
		})
		return record
	})

	return { columns: header, records }
}

/** Load and validate an NCBI Datasets genome table */
export async function readDataset(path: string): Promise<Dataset> {
	if (!existsSync(path)) {
		throw new DatasetError(
			`Input file not found: ${path}`,
			ErrorCodes.DATASET_NOT_FOUND,
			{ path },
		)
	}

	const content = await readFile(path, "utf-8")
	const { columns, records } = parseTsv(content)

	if (columns.length === 0) {
		throw new DatasetError(
			`Input file is empty: ${path}`,
			ErrorCodes.DATASET_EMPTY,
			{ path },
		)
	}

	if (!columns.includes(COLUMNS.bioSample)) {
		throw new DatasetError(
			`Input file has no "${COLUMNS.bioSample}" column: ${path}`,
			ErrorCodes.DATASET_MISSING_COLUMN,
			{ path, column: COLUMNS.bioSample },
		)
	}

	return {
		path,
		columns,
		rows: records.map((values, i) => toAssemblyRow(values, i + 1)),
	}
}

/** Valid BioSample accessions in first-seen order, without duplicates */
export function uniqueBioSamples(rows: AssemblyRow[]): string[] {
	const seen = new Set<string>()
	for (const row of rows) {
		if (row.bioSample && isBioSampleAccession(row.bioSample)) {
			seen.add(row.bioSample)
		}
	}
	return [...seen]
}
