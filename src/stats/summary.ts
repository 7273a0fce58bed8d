/**
 * Summary statistics over the annotated table (d3-array)
 */

import { ascending, deviation, max, mean, min, quantileSorted, rollups } from "d3-array"
import type { AnnotatedRow, AssemblyRow, MetadataStatus } from "../types.js"
import { countByStatus } from "../table.js"

export const UNKNOWN_LABEL = "Unknown"

export interface FrequencyEntry {
	value: string
	count: number
	/** Share of all values, Unknown included, rounded to 2 decimals */
	percent: number
}

export interface NumericSummary {
	count: number
	missing: number
	mean: number | null
	sd: number | null
	min: number | null
	q1: number | null
	median: number | null
	q3: number | null
	max: number | null
}

export interface Correlation {
	/** Pairs where both values are present */
	n: number
	pearson: number | null
	spearman: number | null
}

export const FREQUENCY_FIELDS = [
	"country",
	"continent",
	"host",
	"isolation_source",
	"collection_year",
	"assembly_level",
	"sequencing_tech",
	"metadata_status",
] as const

export type FrequencyField = (typeof FREQUENCY_FIELDS)[number]

export const NUMERIC_FIELDS = [
	"genome_size",
	"gc_percent",
	"contig_count",
	"contig_n50",
	"checkm_completeness",
	"checkm_contamination",
	"gene_count",
] as const

export type NumericField = (typeof NUMERIC_FIELDS)[number]

export interface TableSummary {
	rows: number
	statuses: Record<MetadataStatus, number>
	frequencies: Record<FrequencyField, FrequencyEntry[]>
	numeric: Record<NumericField, NumericSummary>
	correlations: {
		genomeSizeVsGc: Correlation
	}
}

function round2(value: number): number {
	return Math.round(value * 100) / 100
}

function isFiniteNumber(value: number | null | undefined): value is number {
	return typeof value === "number" && Number.isFinite(value)
}

// ─────────────────────────────────────────────────────────────────────────────
// Frequencies
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Count occurrences, most frequent first (ties by value).
 * Nulls are counted as "Unknown" and listed last; categories past `top`
 * are merged into one "Other (n categories)" entry.
 */
export function frequencyTable(
	values: ReadonlyArray<string | number | null>,
	options: { top?: number | undefined } = {},
): FrequencyEntry[] {
	const total = values.length
	if (total === 0) return []

	let unknown = 0
	const known: string[] = []
	for (const value of values) {
		if (value === null || value === "") unknown++
		else known.push(String(value))
	}

	const counted = rollups(
		known,
		group => group.length,
		value => value,
	).sort(([va, ca], [vb, cb]) => cb - ca || ascending(va, vb))

	const entry = (value: string, count: number): FrequencyEntry => ({
		value,
		count,
		percent: round2((count / total) * 100),
	})

	const top = options.top ?? counted.length
	const table = counted.slice(0, top).map(([value, count]) => entry(value, count))

	const rest = counted.slice(top)
	if (rest.length > 0) {
		const restCount = rest.reduce((sum, [, count]) => sum + count, 0)
		table.push(entry(`Other (${rest.length} categories)`, restCount))
	}
	if (unknown > 0) table.push(entry(UNKNOWN_LABEL, unknown))

	return table
}

// ─────────────────────────────────────────────────────────────────────────────
// Descriptive statistics
// ─────────────────────────────────────────────────────────────────────────────

export function describe(
	values: ReadonlyArray<number | null>,
): NumericSummary {
	const present = values.filter(isFiniteNumber)
	const sorted = [...present].sort(ascending)

	return {
		count: present.length,
		missing: values.length - present.length,
		mean: mean(sorted) ?? null,
		sd: deviation(sorted) ?? null,
		min: min(sorted) ?? null,
		q1: quantileSorted(sorted, 0.25) ?? null,
		median: quantileSorted(sorted, 0.5) ?? null,
		q3: quantileSorted(sorted, 0.75) ?? null,
		max: max(sorted) ?? null,
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Correlation
// ─────────────────────────────────────────────────────────────────────────────

function completePairs(
	xs: ReadonlyArray<number | null>,
	ys: ReadonlyArray<number | null>,
): Array<[number, number]> {
	const pairs: Array<[number, number]> = []
	const n = Math.min(xs.length, ys.length)
	for (let i = 0; i < n; i++) {
		const x = xs[i]
		const y = ys[i]
		if (isFiniteNumber(x) && isFiniteNumber(y)) pairs.push([x, y])
	}
	return pairs
}

function pearsonOfPairs(pairs: Array<[number, number]>): number | null {
	if (pairs.length < 3) return null
	const mx = mean(pairs, ([x]) => x) ?? 0
	const my = mean(pairs, ([, y]) => y) ?? 0

	let sxy = 0
	let sxx = 0
	let syy = 0
	for (const [x, y] of pairs) {
		sxy += (x - mx) * (y - my)
		sxx += (x - mx) ** 2
		syy += (y - my) ** 2
	}
	if (sxx === 0 || syy === 0) return null
	return sxy / Math.sqrt(sxx * syy)
}

/** 1-based ranks; tied values share the mean of their positions */
export function averageRanks(values: readonly number[]): number[] {
	const order = values
		.map((value, index) => ({ value, index }))
		.sort((a, b) => ascending(a.value, b.value))

	const ranks = new Array<number>(values.length).fill(0)
	let start = 0
	while (start < order.length) {
		let end = start
		while (end + 1 < order.length && order[end + 1]?.value === order[start]?.value) {
			end++
		}
		const rank = (start + end) / 2 + 1
		for (let k = start; k <= end; k++) {
			const item = order[k]
			if (item) ranks[item.index] = rank
		}
		start = end + 1
	}
	return ranks
}

/** Pearson r over pairs where both values are present; null below 3 pairs */
export function pearson(
	xs: ReadonlyArray<number | null>,
	ys: ReadonlyArray<number | null>,
): number | null {
	return pearsonOfPairs(completePairs(xs, ys))
}

/** Spearman rho: Pearson r of average ranks */
export function spearman(
	xs: ReadonlyArray<number | null>,
	ys: ReadonlyArray<number | null>,
): number | null {
	const pairs = completePairs(xs, ys)
	if (pairs.length < 3) return null
	const rx = averageRanks(pairs.map(([x]) => x))
	const ry = averageRanks(pairs.map(([, y]) => y))
	return pearsonOfPairs(rx.map((r, i): [number, number] => [r, ry[i] ?? 0]))
}

// ─────────────────────────────────────────────────────────────────────────────
// Table summary
// ─────────────────────────────────────────────────────────────────────────────

type FrequencyAccessor = (row: AnnotatedRow) => string | number | null

const FREQUENCY_ACCESSORS: Record<FrequencyField, FrequencyAccessor> = {
	country: ({ metadata }) => metadata?.country ?? null,
	continent: ({ metadata }) => metadata?.continent ?? null,
	host: ({ metadata }) => metadata?.hostStandardized ?? null,
	isolation_source: ({ metadata }) => metadata?.isolationCategory ?? null,
	collection_year: ({ metadata }) => metadata?.collectionYear ?? null,
	assembly_level: ({ row }) => row.assemblyLevel,
	sequencing_tech: ({ row }) => row.sequencingTech,
	metadata_status: ({ status }) => status,
}

export const NUMERIC_ACCESSORS: Record<
	NumericField,
	(row: AssemblyRow) => number | null
> = {
	genome_size: row => row.genomeSize,
	gc_percent: row => row.gcPercent,
	contig_count: row => row.contigCount,
	contig_n50: row => row.contigN50,
	checkm_completeness: row => row.checkmCompleteness,
	checkm_contamination: row => row.checkmContamination,
	gene_count: row => row.geneCount,
}

export function summarizeTable(
	rows: AnnotatedRow[],
	options: { top?: number | undefined } = {},
): TableSummary {
	const frequency = (field: FrequencyField): FrequencyEntry[] =>
		frequencyTable(rows.map(FREQUENCY_ACCESSORS[field]), options)
	const numeric = (field: NumericField): NumericSummary =>
		describe(rows.map(({ row }) => NUMERIC_ACCESSORS[field](row)))

	const sizes = rows.map(({ row }) => row.genomeSize)
	const gc = rows.map(({ row }) => row.gcPercent)

	return {
		rows: rows.length,
		statuses: countByStatus(rows),
		frequencies: {
			country: frequency("country"),
			continent: frequency("continent"),
			host: frequency("host"),
			isolation_source: frequency("isolation_source"),
			collection_year: frequency("collection_year"),
			assembly_level: frequency("assembly_level"),
			sequencing_tech: frequency("sequencing_tech"),
			metadata_status: frequency("metadata_status"),
		},
		numeric: {
			genome_size: numeric("genome_size"),
			gc_percent: numeric("gc_percent"),
			contig_count: numeric("contig_count"),
			contig_n50: numeric("contig_n50"),
			checkm_completeness: numeric("checkm_completeness"),
			checkm_contamination: numeric("checkm_contamination"),
			gene_count: numeric("gene_count"),
		},
		correlations: {
			genomeSizeVsGc: {
				n: completePairs(sizes, gc).length,
				pearson: pearson(sizes, gc),
				spearman: spearman(sizes, gc),
			},
		},
	}
}
