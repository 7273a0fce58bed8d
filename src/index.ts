/**
 * fetchm - BioSample metadata for NCBI genome assembly tables
 *
 * Library entry point; the CLI is defined in cli/index.ts and runs cli/commands.ts.
 */

export * from "./types.js"
export * from "./errors.js"
export * from "./config.js"
export * from "./dataset.js"
export * from "./quality.js"
export * from "./biosample.js"
export * from "./table.js"
export * from "./standardize/index.js"
export * from "./stats/summary.js"
export { writeSummaryReport, type RunInfo } from "./stats/report.js"
export { barChart, histogram, scatterPlot, escapeXml } from "./plots/svg.js"
export { renderFigures, writeFigures } from "./plots/figures.js"
export {
	fetchBioSamples,
	buildEfetchBody,
	chunk,
	EUTILS_BASE_URL,
	type EfetchOptions,
	type EfetchResult,
} from "./ncbi/eutils.js"
export { LaneRateLimiter } from "./ncbi/rate-limiter.js"
export { BioSampleCache, type BioSampleCacheOptions } from "./ncbi/cache.js"
export { runFetch, runSummarize, collectEvents } from "./core/pipeline.js"
export type * from "./core/types.js"
