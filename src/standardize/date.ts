import { cleanValue } from "./missing.js"

export const EARLIEST_YEAR = 1800

// A 4-digit year not embedded in a longer number
const YEAR = /(?<!\d)(1[89]\d{2}|20\d{2})(?!\d)/

/**
 * Collection year from a collection_date value.
 *
 * Handles ISO dates and partial dates (2019, 2019-05, 2019-05-17),
 * ranges (2018/2019 gives 2018), month-name forms (17-May-2019) and any
 * other text containing a plausible year. Years after `currentYear` are
 * rejected.
 */
export function parseCollectionYear(
	value: string | null | undefined,
	currentYear: number = new Date().getFullYear(),
): number | null {
	const cleaned = cleanValue(value)
	if (cleaned === null) return null

	const match = YEAR.exec(cleaned)
	if (!match?.[1]) return null

	const year = Number(match[1])
	if (year < EARLIEST_YEAR || year > currentYear) return null
	return year
}
