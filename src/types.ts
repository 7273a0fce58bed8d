/**
 * Shared type definitions for fetchm
 */

// ─────────────────────────────────────────────────────────────────────────────
// Input table
// ─────────────────────────────────────────────────────────────────────────────

/** One assembly from an NCBI Datasets genome table */
export interface AssemblyRow {
	/** 1-based data row number (header excluded) */
	index: number
	/** Raw cell values keyed by input column header */
	values: Record<string, string>
	assemblyAccession: string | null
	assemblyName: string | null
	organismName: string | null
	strain: string | null
	assemblyLevel: string | null
	bioSample: string | null
	bioProject: string | null
	releaseDate: string | null
	sequencingTech: string | null
	genomeSize: number | null
	gcPercent: number | null
	contigCount: number | null
	contigN50: number | null
	checkmCompleteness: number | null
	checkmContamination: number | null
	geneCount: number | null
}

export interface Dataset {
	path: string
	/** Input headers in file order */
	columns: string[]
	rows: AssemblyRow[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Quality filtering
// ─────────────────────────────────────────────────────────────────────────────

export interface QualityThresholds {
	/** Minimum CheckM completeness (percent) */
	minCompleteness?: number | undefined
	/** Maximum CheckM contamination (percent) */
	maxContamination?: number | undefined
}

export type FilterReason = "completeness" | "contamination" | "missing-checkm"

export interface RemovedRow {
	row: AssemblyRow
	reason: FilterReason
}

// ─────────────────────────────────────────────────────────────────────────────
// BioSample records
// ─────────────────────────────────────────────────────────────────────────────

export interface BioSampleRecord {
	accession: string
	title: string | null
	organism: string | null
	taxonomyId: number | null
	publicationDate: string | null
	submissionDate: string | null
	/** Attribute values keyed by harmonized name (or submitter name) */
	attributes: Record<string, string>
	/** Cross-references keyed by database label */
	ids: Record<string, string>
}

export interface StandardizedMetadata {
	title: string | null
	organism: string | null
	collectionDate: string | null
	collectionYear: number | null
	geoLocation: string | null
	country: string | null
	continent: string | null
	host: string | null
	hostStandardized: string | null
	isolationSource: string | null
	isolationCategory: string | null
	serovar: string | null
}

/**
 * Outcome of the metadata lookup for a row
 * - ok: fetched from NCBI during this run
 * - cached: served from the local cache
 * - not-found: NCBI returned no record for the accession
 * - error: the request batch failed after retries
 * - no-accession / invalid-accession: never sent to NCBI
 */
export type MetadataStatus =
	| "ok"
	| "cached"
	| "not-found"
	| "error"
	| "no-accession"
	| "invalid-accession"

export const METADATA_STATUSES: readonly MetadataStatus[] = [
	"ok",
	"cached",
	"not-found",
	"error",
	"no-accession",
	"invalid-accession",
]

export interface AnnotatedRow {
	row: AssemblyRow
	metadata: StandardizedMetadata | null
	status: MetadataStatus
}
