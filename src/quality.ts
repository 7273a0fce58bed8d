/**
 * CheckM quality filtering
 */

import type {
	AssemblyRow,
	FilterReason,
	QualityThresholds,
	RemovedRow,
} from "./types.js"

export interface QualityFilterResult {
	kept: AssemblyRow[]
	removed: RemovedRow[]
}

/** Reason a row fails the thresholds, or null when it passes */
export function qualityFailure(
	row: AssemblyRow,
	thresholds: QualityThresholds,
): FilterReason | null {
	const { minCompleteness, maxContamination } = thresholds

	if (minCompleteness !== undefined) {
		if (row.checkmCompleteness === null) return "missing-checkm"
		if (row.checkmCompleteness < minCompleteness) return "completeness"
	}

	if (maxContamination !== undefined) {
		if (row.checkmContamination === null) return "missing-checkm"
		if (row.checkmContamination > maxContamination) return "contamination"
	}

	return null
}

/**
 * Split rows by CheckM completeness/contamination.
 * Input order is preserved in both halves.
 */
export function filterByQuality(
	rows: AssemblyRow[],
	thresholds: QualityThresholds,
): QualityFilterResult {
	const kept: AssemblyRow[] = []
	const removed: RemovedRow[] = []

	for (const row of rows) {
		const reason = qualityFailure(row, thresholds)
		if (reason) {
			removed.push({ row, reason })
		} else {
			kept.push(row)
		}
	}

	return { kept, removed }
}

export function countByReason(
	removed: RemovedRow[],
): Record<FilterReason, number> {
	const counts: Record<FilterReason, number> = {
		completeness: 0,
		contamination: 0,
		"missing-checkm": 0,
	}
	for (const entry of removed) counts[entry.reason] += 1
	return counts
}
