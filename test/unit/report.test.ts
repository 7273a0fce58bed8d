/**
 * Unit tests for metadata_summary/ writers
 */

import { readFile } from "node:fs/promises"
import { basename, join } from "node:path"
import { describe, it, expect } from "vitest"
import { COLUMNS } from "../../src/dataset.js"
import {
	frequencyCsv,
	numericSummaryCsv,
	summaryJson,
	writeSummaryReport,
} from "../../src/stats/report.js"
import { summarizeTable } from "../../src/stats/summary.js"
import type { AnnotatedRow } from "../../src/types.js"
import { makeRow, withTempDir } from "../helpers/index.js"

function rowsWithSizes(sizes: string[]): AnnotatedRow[] {
	return sizes.map((size, i) => ({
		row: makeRow({ [COLUMNS.genomeSize]: size }, i + 1),
		metadata: null,
		status: "not-found",
	}))
}

describe("frequencyCsv", () => {
	it("writes value, count and a two-decimal percent", () => {
		const csv = frequencyCsv([
			{ value: "USA", count: 2, percent: 40 },
			{ value: "Other, misc", count: 1, percent: 33.33 },
		])
		expect(csv).toBe('value,count,percent\nUSA,2,40.00\n"Other, misc",1,33.33\n')
	})

	it("writes only the header for an empty table", () => {
		expect(frequencyCsv([])).toBe("value,count,percent\n")
	})
})

describe("numericSummaryCsv", () => {
	it("rounds to four decimals and leaves empty cells for missing statistics", () => {
		const summary = summarizeTable(rowsWithSizes(["4", "1", "", "3", "2"]))
		const lines = numericSummaryCsv(summary).trimEnd().split("\n")

		expect(lines[0]).toBe("field,count,missing,mean,sd,min,q1,median,q3,max")
		expect(lines[1]).toBe("genome_size,4,1,2.5,1.291,1,1.75,2.5,3.25,4")
		expect(lines[2]).toBe("gc_percent,0,5,,,,,,,")
		expect(lines).toHaveLength(8)
	})
})

describe("summaryJson", () => {
	it("puts run information before the summary", () => {
		const summary = summarizeTable(rowsWithSizes(["1"]))
		const json = summaryJson(summary, {
			input: "genomes.tsv",
			generatedAt: "2024-06-01T00:00:00.000Z",
			removed: { completeness: 2 },
		})

		expect(json.endsWith("}\n")).toBe(true)
		const parsed: unknown = JSON.parse(json)
		expect(parsed).toMatchObject({
			input: "genomes.tsv",
			generatedAt: "2024-06-01T00:00:00.000Z",
			removed: { completeness: 2 },
			rows: 1,
			statuses: { "not-found": 1 },
		})
		expect(Object.keys(JSON.parse(json))[0]).toBe("input")
	})
})

describe("writeSummaryReport", () => {
	it("writes summary.json, one CSV per frequency field and the numeric summary", async () => {
		await withTempDir(async dir => {
			const summary = summarizeTable(rowsWithSizes(["1", "2"]))
			const files = await writeSummaryReport(join(dir, "metadata_summary"), summary, {
				input: "genomes.tsv",
				generatedAt: "2024-06-01T00:00:00.000Z",
			})

			expect(files.map(file => basename(file))).toEqual([
				"summary.json",
				"country_counts.csv",
				"continent_counts.csv",
				"host_counts.csv",
				"isolation_source_counts.csv",
				"collection_year_counts.csv",
				"assembly_level_counts.csv",
				"sequencing_tech_counts.csv",
				"metadata_status_counts.csv",
				"numeric_summary.csv",
			])
			expect(await readFile(join(dir, "metadata_summary", "metadata_status_counts.csv"), "utf-8")).toBe(
				"value,count,percent\nnot-found,2,100.00\n",
			)
			expect(await readFile(join(dir, "metadata_summary", "country_counts.csv"), "utf-8")).toBe(
				"value,count,percent\nUnknown,2,100.00\n",
			)
		})
	})
})
