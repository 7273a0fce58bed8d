/**
 * Unit tests for NCBI Datasets table loading
 */

import { writeFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, it, expect } from "vitest"
import {
	COLUMNS,
	isBioSampleAccession,
	parseTsv,
	readDataset,
	uniqueBioSamples,
} from "../../src/dataset.js"
import { DatasetError, ErrorCodes } from "../../src/errors.js"
import { fixturePath, withTempDir } from "../helpers/index.js"

describe("isBioSampleAccession", () => {
	it("accepts NCBI, EBI and DDBJ accessions", () => {
		expect(isBioSampleAccession("SAMN00000001")).toBe(true)
		expect(isBioSampleAccession("SAMEA1234567")).toBe(true)
		expect(isBioSampleAccession("SAMD00012345")).toBe(true)
	})

	it("rejects other identifiers", () => {
		expect(isBioSampleAccession("GCF_000000001.1")).toBe(false)
		expect(isBioSampleAccession("samn00000001")).toBe(false)
		expect(isBioSampleAccession("SAMN")).toBe(false)
		expect(isBioSampleAccession("BADACC")).toBe(false)
	})
})

describe("parseTsv", () => {
	it("pads short rows and drops extra cells", () => {
		const { columns, records } = parseTsv("a\tb\tc\n1\t2\n4\t5\t6\t7\n")

		expect(columns).toEqual(["a", "b", "c"])
		expect(records).toEqual([
			{ a: "1", b: "2", c: "" },
			{ a: "4", b: "5", c: "6" },
		])
	})

	it("strips a byte order mark from the first header", () => {
		const { columns } = parseTsv("\uFEFFAssembly Accession\tx\nGCF_1\t2\n")
		expect(columns[0]).toBe("Assembly Accession")
	})

	it("keeps double quotes as part of the cell", () => {
		const { records } = parseTsv('a\tb\n"Candidatus Pelagibacter" sp.\tstrain "7"\n')
		expect(records).toEqual([{ a: '"Candidatus Pelagibacter" sp.', b: 'strain "7"' }])
	})

	it("returns nothing for empty input", () => {
		expect(parseTsv("")).toEqual({ columns: [], records: [] })
	})
})

describe("readDataset", () => {
	it("maps known columns onto typed fields", async () => {
		const dataset = await readDataset(fixturePath("ncbi_dataset.tsv"))

		expect(dataset.columns).toHaveLength(10)
		expect(dataset.rows).toHaveLength(7)

		const [first] = dataset.rows
		expect(first).toMatchObject({
			index: 1,
			assemblyAccession: "GCF_000000001.1",
			assemblyName: "asm1",
			organismName: "Escherichia coli",
			assemblyLevel: "Complete Genome",
			bioSample: "SAMN00000001",
			sequencingTech: "Illumina",
			genomeSize: 5000000,
			gcPercent: 50.5,
			checkmCompleteness: 99.5,
			checkmContamination: 0.5,
			contigCount: null,
			strain: null,
		})
		expect(first?.values[COLUMNS.assemblyName]).toBe("asm1")
	})

	it("reads empty cells as null", async () => {
		const { rows } = await readDataset(fixturePath("ncbi_dataset.tsv"))

		expect(rows[3]?.bioSample).toBeNull()
		expect(rows[4]?.checkmCompleteness).toBeNull()
		expect(rows[4]?.checkmContamination).toBeNull()
	})

	it("loads organism names that start with a double quote", async () => {
		await withTempDir(async dir => {
			const path = join(dir, "quoted.tsv")
			await writeFile(
				path,
				`${COLUMNS.organismName}\t${COLUMNS.bioSample}\n` +
					'"Candidatus Pelagibacter" sp.\tSAMN00000009\n',
			)

			const { rows } = await readDataset(path)
			expect(rows).toHaveLength(1)
			expect(rows[0]?.organismName).toBe('"Candidatus Pelagibacter" sp.')
			expect(rows[0]?.bioSample).toBe("SAMN00000009")
		})
	})

	it("reports a missing file", async () => {
		await expect(readDataset("/nonexistent/table.tsv")).rejects.toMatchObject({
			code: ErrorCodes.DATASET_NOT_FOUND,
		})
	})

	it("reports an empty file", async () => {
		await withTempDir(async dir => {
			const path = join(dir, "empty.tsv")
			await writeFile(path, "")
			await expect(readDataset(path)).rejects.toMatchObject({
				code: ErrorCodes.DATASET_EMPTY,
			})
		})
	})

	it("requires the BioSample column", async () => {
		await withTempDir(async dir => {
			const path = join(dir, "no-biosample.tsv")
			await writeFile(path, "Assembly Accession\tAssembly Name\nGCF_1\tasm\n")

			const error = await readDataset(path).catch((err: unknown) => err)
			expect(error).toBeInstanceOf(DatasetError)
			expect(error).toMatchObject({
				code: ErrorCodes.DATASET_MISSING_COLUMN,
				context: { column: COLUMNS.bioSample },
			})
		})
	})
})

describe("uniqueBioSamples", () => {
	it("keeps valid accessions once, in first-seen order", async () => {
		const { rows } = await readDataset(fixturePath("ncbi_dataset.tsv"))

		expect(uniqueBioSamples(rows)).toEqual([
			"SAMN00000001",
			"SAMN00000002",
			"SAMN00000003",
			"SAMN00000004",
		])
	})
})
