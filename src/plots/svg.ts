/**
 * Minimal SVG chart renderer
 *
 * Charts are plain strings: d3-scale maps values to pixels and d3-array
 * supplies extents, ticks and histogram bins. No DOM is involved.
 */

import { bin, extent, max } from "d3-array"
import { scaleBand, scaleLinear } from "d3-scale"

export interface BarDatum {
	label: string
	count: number
}

export interface BarChartOptions {
	title: string
	data: BarDatum[]
	xLabel?: string | undefined
}

export interface HistogramOptions {
	title: string
	values: number[]
	/** Approximate number of bins */
	bins?: number | undefined
	xLabel?: string | undefined
}

export interface ScatterPoint {
	x: number
	y: number
}

export interface ScatterPlotOptions {
	title: string
	points: ScatterPoint[]
	xLabel?: string | undefined
	yLabel?: string | undefined
}

const WIDTH = 720
const FONT = "font-family=\"sans-serif\""
const BAR_COLOR = "#4c78a8"
const POINT_COLOR = "#f58518"
const LABEL_MAX = 32

export function escapeXml(str: string): string {
	return str
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;")
		.replace(/'/g, "&apos;")
}

function truncate(label: string): string {
	return label.length > LABEL_MAX ? `${label.slice(0, LABEL_MAX - 1)}…` : label
}

function fmt(value: number): string {
	return String(Math.round(value * 100) / 100)
}

function text(
	x: number,
	y: number,
	content: string,
	attrs = "",
): string {
	const extra = attrs ? ` ${attrs}` : ""
	return `<text x="${fmt(x)}" y="${fmt(y)}"${extra}>${escapeXml(content)}</text>`
}

function svgDocument(height: number, title: string, body: string[]): string {
	return [
		`<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${height}" viewBox="0 0 ${WIDTH} ${height}" ${FONT} font-size="12">`,
		`<rect width="${WIDTH}" height="${height}" fill="#ffffff"/>`,
		text(WIDTH / 2, 24, title, `text-anchor="middle" font-size="16" font-weight="bold"`),
		...body,
		"</svg>",
		"",
	].join("\n")
}

function noData(title: string): string {
	return svgDocument(120, title, [
		text(WIDTH / 2, 70, "No data", `text-anchor="middle" fill="#888888"`),
	])
}

function xAxis(
	scale: (value: number) => number,
	ticks: number[],
	format: (value: number) => string,
	y: number,
	label: string | undefined,
	left: number,
	right: number,
): string[] {
	const lines = [
		`<line x1="${fmt(left)}" y1="${fmt(y)}" x2="${fmt(right)}" y2="${fmt(y)}" stroke="#333333"/>`,
	]
	for (const tick of ticks) {
		const x = scale(tick)
		lines.push(
			`<line x1="${fmt(x)}" y1="${fmt(y)}" x2="${fmt(x)}" y2="${fmt(y + 5)}" stroke="#333333"/>`,
			text(x, y + 18, format(tick), `text-anchor="middle"`),
		)
	}
	if (label) {
		lines.push(text((left + right) / 2, y + 38, label, `text-anchor="middle"`))
	}
	return lines
}

function yAxis(
	scale: (value: number) => number,
	ticks: number[],
	format: (value: number) => string,
	x: number,
	label: string | undefined,
	top: number,
	bottom: number,
): string[] {
	const lines = [
		`<line x1="${fmt(x)}" y1="${fmt(top)}" x2="${fmt(x)}" y2="${fmt(bottom)}" stroke="#333333"/>`,
	]
	for (const tick of ticks) {
		const y = scale(tick)
		lines.push(
			`<line x1="${fmt(x - 5)}" y1="${fmt(y)}" x2="${fmt(x)}" y2="${fmt(y)}" stroke="#333333"/>`,
			text(x - 8, y + 4, format(tick), `text-anchor="end"`),
		)
	}
	if (label) {
		const cy = (top + bottom) / 2
		lines.push(
			text(16, cy, label, `text-anchor="middle" transform="rotate(-90 16 ${fmt(cy)})"`),
		)
	}
	return lines
}

// ─────────────────────────────────────────────────────────────────────────────
// Charts
// ─────────────────────────────────────────────────────────────────────────────

/** Horizontal bars in the given order, each labelled with its count */
export function barChart({ title, data, xLabel }: BarChartOptions): string {
	if (data.length === 0) return noData(title)

	const margin = { top: 44, right: 60, bottom: 56, left: 220 }
	const barBand = 22
	const height = margin.top + data.length * barBand + margin.bottom
	const plotBottom = height - margin.bottom

	const x = scaleLinear()
		.domain([0, max(data, d => d.count) ?? 0])
		.nice()
		.range([margin.left, WIDTH - margin.right])
	const y = scaleBand<number>()
		.domain(data.map((_, i) => i))
		.range([margin.top, plotBottom])
		.padding(0.15)

	const body: string[] = []
	data.forEach((d, i) => {
		const top = y(i) ?? margin.top
		const barWidth = x(d.count) - margin.left
		const mid = top + y.bandwidth() / 2
		body.push(
			`<rect x="${margin.left}" y="${fmt(top)}" width="${fmt(barWidth)}" height="${fmt(y.bandwidth())}" fill="${BAR_COLOR}"/>`,
			text(margin.left - 6, mid + 4, truncate(d.label), `text-anchor="end"`),
			text(margin.left + barWidth + 4, mid + 4, String(d.count)),
		)
	})

	const ticks = x.ticks(5).filter(Number.isInteger)
	body.push(
		...xAxis(x, ticks, String, plotBottom, xLabel, margin.left, WIDTH - margin.right),
	)
	return svgDocument(height, title, body)
}

/** Frequency histogram of the values (d3-array bin) */
export function histogram({
	title,
	values,
	bins = 20,
	xLabel,
}: HistogramOptions): string {
	const finite = values.filter(Number.isFinite)
	if (finite.length === 0) return noData(title)

	const height = 360
	const margin = { top: 44, right: 30, bottom: 56, left: 60 }
	const plotBottom = height - margin.bottom

	const [lo = 0, hi = 0] = extent(finite)
	const x = scaleLinear()
		.domain(lo === hi ? [lo - 0.5, hi + 0.5] : [lo, hi])
		.nice()
		.range([margin.left, WIDTH - margin.right])
	const [d0 = lo, d1 = hi] = x.domain()

	const buckets = bin()
		.domain([d0, d1])
		.thresholds(x.ticks(bins))(finite)

	const y = scaleLinear()
		.domain([0, max(buckets, b => b.length) ?? 0])
		.nice()
		.range([plotBottom, margin.top])

	const body: string[] = []
	for (const bucket of buckets) {
		if (bucket.length === 0) continue
		const left = x(bucket.x0 ?? d0)
		const right = x(bucket.x1 ?? d1)
		const top = y(bucket.length)
		body.push(
			`<rect x="${fmt(left + 0.5)}" y="${fmt(top)}" width="${fmt(Math.max(0, right - left - 1))}" height="${fmt(plotBottom - top)}" fill="${BAR_COLOR}"/>`,
		)
	}

	body.push(
		...xAxis(x, x.ticks(6), x.tickFormat(6), plotBottom, xLabel, margin.left, WIDTH - margin.right),
		...yAxis(
			y,
			y.ticks(5).filter(Number.isInteger),
			String,
			margin.left,
			"Count",
			margin.top,
			plotBottom,
		),
	)
	return svgDocument(height, title, body)
}

export function scatterPlot({
	title,
	points,
	xLabel,
	yLabel,
}: ScatterPlotOptions): string {
	const finite = points.filter(p => Number.isFinite(p.x) && Number.isFinite(p.y))
	if (finite.length === 0) return noData(title)

	const height = 420
	const margin = { top: 44, right: 30, bottom: 56, left: 70 }
	const plotBottom = height - margin.bottom

	const padded = ([lo = 0, hi = 0]: [number, number] | [undefined, undefined]): [
		number,
		number,
	] => (lo === hi ? [lo - 1, hi + 1] : [lo, hi])

	const x = scaleLinear()
		.domain(padded(extent(finite, p => p.x)))
		.nice()
		.range([margin.left, WIDTH - margin.right])
	const y = scaleLinear()
		.domain(padded(extent(finite, p => p.y)))
		.nice()
		.range([plotBottom, margin.top])

	const body = finite.map(
		p =>
			`<circle cx="${fmt(x(p.x))}" cy="${fmt(y(p.y))}" r="3" fill="${POINT_COLOR}" fill-opacity="0.7"/>`,
	)
	body.push(
		...xAxis(x, x.ticks(6), x.tickFormat(6), plotBottom, xLabel, margin.left, WIDTH - margin.right),
		...yAxis(y, y.ticks(6), y.tickFormat(6), margin.left, yLabel, margin.top, plotBottom),
	)
	return svgDocument(height, title, body)
}
