import { hostTable } from "./data.js"
import { cleanValue } from "./missing.js"

function lookup(name: string): string | null {
	const key = name
		.trim()
		.toLowerCase()
		.replace(/\s+/g, " ")
		.replace(/[.,;]+$/, "")
	return hostTable().synonyms[key] ?? null
}

function capitalize(value: string): string {
	return value.charAt(0).toUpperCase() + value.slice(1)
}

/**
 * Standardized host name.
 *
 * Tries the whole value, then the part before the first `;`, `,` or `(`
 * ("Homo sapiens; female, 34" is a human host), against the synonym table.
 * Anything else is returned trimmed with its first letter capitalized.
 */
export function standardizeHost(value: string | null | undefined): string | null {
	const cleaned = cleanValue(value)
	if (cleaned === null) return null

	const whole = lookup(cleaned)
	if (whole) return whole

	const head = cleaned.split(/[;,(]/)[0] ?? ""
	if (head.trim() !== "" && head !== cleaned) {
		const partial = lookup(head)
		if (partial) return partial
	}

	return capitalize(cleaned)
}
