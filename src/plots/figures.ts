/**
 * figures/ writer
 */

import { join } from "node:path"
import { writeFileAtomic } from "../table.js"
import type { AnnotatedRow } from "../types.js"
import type {
	FrequencyEntry,
	FrequencyField,
	TableSummary,
} from "../stats/summary.js"
import { barChart, histogram, scatterPlot, type BarDatum } from "./svg.js"

const BAR_FIGURES: Array<{ field: FrequencyField; title: string }> = [
	{ field: "country", title: "Assemblies by country" },
	{ field: "continent", title: "Assemblies by continent" },
	{ field: "host", title: "Assemblies by host" },
	{ field: "isolation_source", title: "Assemblies by isolation source" },
	{ field: "collection_year", title: "Assemblies by collection year" },
	{ field: "assembly_level", title: "Assemblies by assembly level" },
]

function toBars(entries: FrequencyEntry[]): BarDatum[] {
	return entries.map(({ value, count }) => ({ label: value, count }))
}

/** Years read best in calendar order; Other and Unknown stay at the end */
function chronological(entries: FrequencyEntry[]): FrequencyEntry[] {
	const years = entries.filter(e => /^\d{4}$/.test(e.value))
	const rest = entries.filter(e => !/^\d{4}$/.test(e.value))
	years.sort((a, b) => Number(a.value) - Number(b.value))
	return [...years, ...rest]
}

function present(values: Array<number | null>): number[] {
	return values.filter((v): v is number => v !== null && Number.isFinite(v))
}

/** Render every figure; returns a map of file name to SVG */
export function renderFigures(
	summary: TableSummary,
	rows: AnnotatedRow[],
): Map<string, string> {
	const figures = new Map<string, string>()

	for (const { field, title } of BAR_FIGURES) {
		let entries = summary.frequencies[field]
		if (field === "collection_year") entries = chronological(entries)
		figures.set(
			`${field}.svg`,
			barChart({ title, data: toBars(entries), xLabel: "Assemblies" }),
		)
	}

	figures.set(
		"genome_size.svg",
		histogram({
			title: "Genome size distribution",
			values: present(rows.map(({ row }) => row.genomeSize)).map(v => v / 1e6),
			xLabel: "Genome size (Mb)",
		}),
	)
	figures.set(
		"gc_percent.svg",
		histogram({
			title: "GC content distribution",
			values: present(rows.map(({ row }) => row.gcPercent)),
			xLabel: "GC (%)",
		}),
	)
	figures.set(
		"checkm_completeness.svg",
		histogram({
			title: "CheckM completeness distribution",
			values: present(rows.map(({ row }) => row.checkmCompleteness)),
			xLabel: "Completeness (%)",
		}),
	)

	const points = rows.flatMap(({ row }) =>
		row.genomeSize !== null && row.gcPercent !== null
			? [{ x: row.genomeSize / 1e6, y: row.gcPercent }]
			: [],
	)
	figures.set(
		"genome_size_vs_gc.svg",
		scatterPlot({
			title: "Genome size vs GC content",
			points,
			xLabel: "Genome size (Mb)",
			yLabel: "GC (%)",
		}),
	)

	return figures
}

/** Write figures/*.svg under `dir`; returns the paths written */
export async function writeFigures(
	summary: TableSummary,
	rows: AnnotatedRow[],
	dir: string,
): Promise<string[]> {
	const paths: string[] = []
	for (const [name, svg] of renderFigures(summary, rows)) {
		const path = join(dir, name)
		await writeFileAtomic(path, svg)
		paths.push(path)
	}
	return paths
}
