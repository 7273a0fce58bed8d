import { isolationSourceRules } from "./data.js"
import { cleanValue } from "./missing.js"

export const OTHER_CATEGORY = "Other"

interface CompiledRule {
	category: string
	patterns: RegExp[]
}

let compiled: CompiledRule[] | null = null

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * A keyword matches at the start of a word. Keywords ending in `*` are
 * prefixes ("bronch*" matches "bronchial"); others must end the word,
 * allowing a plural "s"/"es".
 */
export function keywordPattern(keyword: string): RegExp {
	const lower = keyword.toLowerCase()
	if (lower.endsWith("*")) {
		return new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(lower.slice(0, -1))}`)
	}
	return new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(lower)}(?:e?s)?(?=$|[^a-z0-9])`)
}

function rules(): CompiledRule[] {
	compiled ??= isolationSourceRules().categories.map(rule => ({
		category: rule.category,
		patterns: rule.keywords.map(keywordPattern),
	}))
	return compiled
}

/**
 * Broad category of an isolation_source value; the first category (in
 * data/isolation-sources.json order) with a matching keyword wins.
 */
export function categorizeIsolationSource(
	value: string | null | undefined,
): string | null {
	const cleaned = cleanValue(value)
	if (cleaned === null) return null

	const text = cleaned.toLowerCase()
	for (const rule of rules()) {
		if (rule.patterns.some(pattern => pattern.test(text))) {
			return rule.category
		}
	}
	return OTHER_CATEGORY
}
