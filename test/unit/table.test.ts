/**
 * Unit tests for annotation and the metadata_output/ tables
 */

import { readFile, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { beforeAll, describe, it, expect } from "vitest"
import { parseBioSampleSet } from "../../src/biosample.js"
import { COLUMNS, readDataset } from "../../src/dataset.js"
import { ErrorCodes } from "../../src/errors.js"
import {
	METADATA_COLUMNS,
	OUTPUT_PATHS,
	STATUS_COLUMN,
	annotateRows,
	annotatedTableTsv,
	biosamplesJsonl,
	countByStatus,
	filteredTableTsv,
	readAnnotatedTable,
	writeTables,
	type LookupHit,
} from "../../src/table.js"
import type { AnnotatedRow, BioSampleRecord, Dataset } from "../../src/types.js"
import { fixturePath, makeRow, withTempDir } from "../helpers/index.js"

let dataset: Dataset
let records: BioSampleRecord[]
let annotated: AnnotatedRow[]

beforeAll(async () => {
	dataset = await readDataset(fixturePath("ncbi_dataset.tsv"))
	records = parseBioSampleSet(await readFile(fixturePath("biosample_set.xml"), "utf-8"))

	const hits = new Map<string, LookupHit>()
	for (const record of records) {
		hits.set(record.accession, {
			record,
			source: record.accession === "SAMN00000001" ? "ok" : "cached",
		})
	}
	annotated = annotateRows(dataset.rows, hits, new Set(["SAMN00000003"]), 2024)
})

describe("annotateRows", () => {
	it("assigns a status to every row", () => {
		expect(annotated.map(a => a.status)).toEqual([
			"ok",
			"cached",
			"ok",
			"no-accession",
			"error",
			"invalid-accession",
			"not-found",
		])
	})

	it("standardizes each BioSample once", () => {
		expect(annotated[0]?.metadata).toBe(annotated[2]?.metadata)
		expect(annotated[0]?.metadata).toMatchObject({
			title: "Escherichia coli isolate EC-1 & friends",
			collectionYear: 2019,
			country: "USA",
			continent: "North America",
			hostStandardized: "Homo sapiens",
			isolationCategory: "Clinical",
			serovar: null,
		})
		expect(annotated[1]?.metadata).toMatchObject({
			collectionDate: null,
			country: "Viet Nam",
			continent: "Asia",
			host: "cow",
			hostStandardized: "Bos taurus",
			isolationCategory: "Animal",
			serovar: "O157:H7",
		})
	})

	it("leaves metadata empty without a record", () => {
		for (const row of annotated.slice(3)) expect(row.metadata).toBeNull()
	})

	it("counts rows by status", () => {
		expect(countByStatus(annotated)).toEqual({
			ok: 2,
			cached: 1,
			"not-found": 1,
			error: 1,
			"no-accession": 1,
			"invalid-accession": 1,
		})
	})
})

describe("annotatedTableTsv", () => {
	it("appends metadata columns and the status after the input columns", () => {
		const [header, first] = annotatedTableTsv(dataset.columns, annotated).split("\n")
		const columns = header?.split("\t") ?? []

		expect(columns.slice(0, 10)).toEqual(dataset.columns)
		expect(columns.slice(10)).toEqual([...Object.values(METADATA_COLUMNS), STATUS_COLUMN])

		const cells = first?.split("\t") ?? []
		expect(cells[columns.indexOf(METADATA_COLUMNS.country)]).toBe("USA")
		expect(cells[columns.indexOf(METADATA_COLUMNS.collectionYear)]).toBe("2019")
		expect(cells[columns.indexOf(METADATA_COLUMNS.serovar)]).toBe("")
		expect(cells.at(-1)).toBe("ok")
	})

	it("reads back what it writes", async () => {
		await withTempDir(async dir => {
			const path = join(dir, "ncbi_clean.tsv")
			await writeFile(path, annotatedTableTsv(dataset.columns, annotated))

			const { columns, rows } = await readAnnotatedTable(path)

			expect(columns).toEqual(dataset.columns)
			expect(rows.map(r => r.status)).toEqual(annotated.map(a => a.status))
			expect(rows[0]?.metadata).toEqual(annotated[0]?.metadata)
			expect(rows[1]?.metadata).toEqual(annotated[1]?.metadata)
			expect(rows[3]?.metadata).toBeNull()
			expect(rows[0]?.row.genomeSize).toBe(5000000)
			expect(rows[0]?.row.values[COLUMNS.assemblyName]).toBe("asm1")
		})
	})
})

describe("annotatedTableTsv with quotes and tabs", () => {
	it("writes quotes verbatim and reads them back", async () => {
		const row = makeRow({
			[COLUMNS.organismName]: '"Candidatus Pelagibacter" sp.',
			[COLUMNS.strain]: "HTCC\t1062",
			[COLUMNS.bioSample]: "SAMN00000001",
		})
		const [record] = records
		if (!record) throw new Error("fixture record missing")
		const quoted: BioSampleRecord = { ...record, title: 'isolate "A1"' }
		const columns = [COLUMNS.organismName, COLUMNS.strain, COLUMNS.bioSample]
		const rows = annotateRows(
			[row],
			new Map<string, LookupHit>([["SAMN00000001", { record: quoted, source: "ok" }]]),
			new Set(),
			2024,
		)

		const tsv = annotatedTableTsv(columns, rows)
		const cells = tsv.split("\n")[1]?.split("\t") ?? []
		expect(cells.slice(0, 4)).toEqual([
			'"Candidatus Pelagibacter" sp.',
			"HTCC 1062",
			"SAMN00000001",
			'isolate "A1"',
		])

		await withTempDir(async dir => {
			const path = join(dir, "ncbi_clean.tsv")
			await writeFile(path, tsv)

			const read = await readAnnotatedTable(path)
			expect(read.columns).toEqual(columns)
			expect(read.rows[0]?.row.organismName).toBe('"Candidatus Pelagibacter" sp.')
			expect(read.rows[0]?.row.strain).toBe("HTCC 1062")
			expect(read.rows[0]?.metadata?.title).toBe('isolate "A1"')
			expect(read.rows[0]?.status).toBe("ok")
		})
	})
})

describe("readAnnotatedTable", () => {
	it("rejects a table without the status column", async () => {
		await expect(readAnnotatedTable(fixturePath("ncbi_dataset.tsv"))).rejects.toMatchObject({
			code: ErrorCodes.DATASET_MISSING_COLUMN,
		})
	})

	it("rejects a missing file", async () => {
		await expect(readAnnotatedTable("/nonexistent/ncbi_clean.tsv")).rejects.toMatchObject({
			code: ErrorCodes.DATASET_NOT_FOUND,
		})
	})

	it("reads an unrecognised status as error", async () => {
		await withTempDir(async dir => {
			const path = join(dir, "clean.tsv")
			await writeFile(path, `${COLUMNS.bioSample}\t${STATUS_COLUMN}\nSAMN00000001\tweird\n`)

			const { rows } = await readAnnotatedTable(path)
			expect(rows[0]?.status).toBe("error")
			expect(rows[0]?.metadata).toBeNull()
		})
	})
})

describe("filteredTableTsv", () => {
	it("lists removed rows with the reason", () => {
		const row = dataset.rows[3]
		if (!row) throw new Error("fixture row missing")

		const tsv = filteredTableTsv([COLUMNS.assemblyAccession], [{ row, reason: "contamination" }])
		expect(tsv).toBe("Assembly Accession\tFilter Reason\nGCF_000000004.1\tcontamination\n")
	})
})

describe("biosamplesJsonl", () => {
	it("writes one record per line in accession order", () => {
		const lines = biosamplesJsonl([...records].reverse()).trimEnd().split("\n")

		expect(lines).toHaveLength(2)
		expect(JSON.parse(lines[0] ?? "")).toMatchObject({ accession: "SAMN00000001" })
		expect(JSON.parse(lines[1] ?? "")).toMatchObject({ accession: "SAMN00000002" })
	})
})

describe("writeTables", () => {
	it("writes the three metadata_output files", async () => {
		await withTempDir(async dir => {
			const files = await writeTables(dir, {
				columns: dataset.columns,
				annotated,
				removed: [],
				records,
			})

			expect(files).toEqual([
				join(dir, OUTPUT_PATHS.cleanTable),
				join(dir, OUTPUT_PATHS.filteredTable),
				join(dir, OUTPUT_PATHS.biosamples),
			])
			const filtered = await readFile(join(dir, OUTPUT_PATHS.filteredTable), "utf-8")
			expect(filtered.split("\n")[0]?.endsWith("\tFilter Reason")).toBe(true)
		})
	})
})
