/**
 * Unit tests for CheckM quality filtering
 */

import { describe, it, expect } from "vitest"
import { COLUMNS } from "../../src/dataset.js"
import { countByReason, filterByQuality, qualityFailure } from "../../src/quality.js"
import { makeRow } from "../helpers/index.js"

function row(completeness: string, contamination: string, index = 1) {
	return makeRow(
		{
			[COLUMNS.checkmCompleteness]: completeness,
			[COLUMNS.checkmContamination]: contamination,
		},
		index,
	)
}

describe("qualityFailure", () => {
	it("passes everything without thresholds", () => {
		expect(qualityFailure(row("", ""), {})).toBeNull()
	})

	it("applies the completeness minimum inclusively", () => {
		expect(qualityFailure(row("95", "1"), { minCompleteness: 95 })).toBeNull()
		expect(qualityFailure(row("94.9", "1"), { minCompleteness: 95 })).toBe(
			"completeness",
		)
	})

	it("applies the contamination maximum inclusively", () => {
		expect(qualityFailure(row("99", "5"), { maxContamination: 5 })).toBeNull()
		expect(qualityFailure(row("99", "5.1"), { maxContamination: 5 })).toBe(
			"contamination",
		)
	})

	it("removes rows without CheckM values when a threshold is set", () => {
		expect(qualityFailure(row("", "1"), { minCompleteness: 90 })).toBe(
			"missing-checkm",
		)
		expect(qualityFailure(row("99", ""), { maxContamination: 5 })).toBe(
			"missing-checkm",
		)
	})

	it("only checks the value whose threshold is set", () => {
		expect(qualityFailure(row("99", ""), { minCompleteness: 90 })).toBeNull()
	})

	it("reports completeness before contamination", () => {
		expect(
			qualityFailure(row("50", "50"), { minCompleteness: 90, maxContamination: 5 }),
		).toBe("completeness")
	})
})

describe("filterByQuality", () => {
	it("splits rows and preserves order", () => {
		const rows = [row("99", "1", 1), row("80", "1", 2), row("97", "9", 3), row("98", "2", 4)]
		const { kept, removed } = filterByQuality(rows, {
			minCompleteness: 90,
			maxContamination: 5,
		})

		expect(kept.map(r => r.index)).toEqual([1, 4])
		expect(removed.map(r => [r.row.index, r.reason])).toEqual([
			[2, "completeness"],
			[3, "contamination"],
		])
	})

	it("counts removals by reason", () => {
		const rows = [row("80", "1"), row("", "1"), row("70", "1")]
		const { removed } = filterByQuality(rows, { minCompleteness: 90 })

		expect(countByReason(removed)).toEqual({
			completeness: 2,
			contamination: 0,
			"missing-checkm": 1,
		})
	})
})
