/**
 * Missing-value detection for BioSample attributes
 *
 * Submitters spell "no value" many ways; INSDC also defines reporting terms
 * that may carry a reason after a colon ("missing: control sample").
 */

const MISSING_TOKENS = new Set([
	"",
	"missing",
	"not collected",
	"not applicable",
	"not available",
	"not provided",
	"not determined",
	"not recorded",
	"restricted access",
	"unknown",
	"unspecified",
	"na",
	"n/a",
	"n.a.",
	"none",
	"null",
	"nan",
	"-",
	"--",
	".",
	"?",
])

const REPORTING_TERM_PREFIX =
	/^(missing|not collected|not applicable|not provided|restricted access)\s*:/

export function isMissing(value: string | null | undefined): boolean {
	if (value === null || value === undefined) return true
	const normalized = value.trim().toLowerCase()
	return MISSING_TOKENS.has(normalized) || REPORTING_TERM_PREFIX.test(normalized)
}

/** Trimmed value with inner whitespace collapsed, or null when missing */
export function cleanValue(value: string | null | undefined): string | null {
	if (isMissing(value) || value === null || value === undefined) return null
	return value.trim().replace(/\s+/g, " ")
}

/** First non-missing attribute among `keys`, in order */
export function pickAttribute(
	attributes: Record<string, string>,
	...keys: string[]
): string | null {
	for (const key of keys) {
		const value = cleanValue(attributes[key])
		if (value !== null) return value
	}
	return null
}
