import { countryTable } from "./data.js"
import { cleanValue } from "./missing.js"

export interface Location {
	country: string | null
	continent: string | null
}

let index: Map<string, string> | null = null

// Lower-cased canonical names and aliases -> canonical name
function countryIndex(): Map<string, string> {
	if (index) return index
	const table = countryTable()
	const built = new Map<string, string>()
	for (const name of Object.keys(table.continents)) {
		built.set(name.toLowerCase(), name)
	}
	for (const [alias, name] of Object.entries(table.aliases)) {
		built.set(alias.toLowerCase(), name)
	}
	index = built
	return built
}

/** Canonical INSDC country name, or null when the name is not in the table */
export function canonicalCountry(name: string): string | null {
	const key = name
		.trim()
		.replace(/\s+/g, " ")
		.replace(/[.,;]+$/, "")
		.toLowerCase()
	return countryIndex().get(key) ?? null
}

export function continentOf(country: string): string | null {
	return countryTable().continents[country] ?? null
}

/**
 * Country and continent from a geo_loc_name value ("USA: California, Davis").
 * Unknown countries keep their text and get no continent.
 */
export function parseLocation(value: string | null | undefined): Location {
	const cleaned = cleanValue(value)
	if (cleaned === null) return { country: null, continent: null }

	const head = cleaned.split(":")[0]?.trim() ?? ""
	if (head === "") return { country: null, continent: null }

	const canonical = canonicalCountry(head)
	if (canonical === null) return { country: head, continent: null }
	return { country: canonical, continent: continentOf(canonical) }
}
