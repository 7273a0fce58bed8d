/**
 * metadata_summary/ writers
 */

import { join } from "node:path"
import { stringify } from "csv-stringify/sync"
import { writeFileAtomic } from "../table.js"
import type { FilterReason } from "../types.js"
import {
	FREQUENCY_FIELDS,
	NUMERIC_FIELDS,
	type FrequencyEntry,
	type NumericSummary,
	type TableSummary,
} from "./summary.js"

export interface RunInfo {
	input: string
	generatedAt: string
	/** Rows removed by the quality filter, by reason */
	removed?: Partial<Record<FilterReason, number>> | undefined
}

const NUMERIC_COLUMNS = [
	"count",
	"missing",
	"mean",
	"sd",
	"min",
	"q1",
	"median",
	"q3",
	"max",
] as const satisfies ReadonlyArray<keyof NumericSummary>

function round4(value: number | null): number | null {
	return value === null ? null : Math.round(value * 10_000) / 10_000
}

export function frequencyCsv(entries: FrequencyEntry[]): string {
	return stringify(
		entries.map(({ value, count, percent }) => [value, count, percent.toFixed(2)]),
		{ header: true, columns: ["value", "count", "percent"] },
	)
}

export function numericSummaryCsv(summary: TableSummary): string {
	const rows = NUMERIC_FIELDS.map(field => {
		const stats = summary.numeric[field]
		return [
			field,
			...NUMERIC_COLUMNS.map(column => {
				const value = round4(stats[column])
				return value === null ? "" : String(value)
			}),
		]
	})
	return stringify(rows, { header: true, columns: ["field", ...NUMERIC_COLUMNS] })
}

export function summaryJson(summary: TableSummary, run: RunInfo): string {
	return `${JSON.stringify({ ...run, ...summary }, null, 2)}\n`
}

/** Write summary.json and the CSV tables; returns the paths written */
export async function writeSummaryReport(
	dir: string,
	summary: TableSummary,
	run: RunInfo,
): Promise<string[]> {
	const files: Array<[string, string]> = [
		[join(dir, "summary.json"), summaryJson(summary, run)],
		...FREQUENCY_FIELDS.map((field): [string, string] => [
			join(dir, `${field}_counts.csv`),
			frequencyCsv(summary.frequencies[field]),
		]),
		[join(dir, "numeric_summary.csv"), numericSummaryCsv(summary)],
	]

	for (const [path, content] of files) {
		await writeFileAtomic(path, content)
	}
	return files.map(([path]) => path)
}
