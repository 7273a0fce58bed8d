/**
 * BioSample metadata standardization
 */

import type { BioSampleRecord, StandardizedMetadata } from "../types.js"
import { parseCollectionYear } from "./date.js"
import { standardizeHost } from "./host.js"
import { categorizeIsolationSource } from "./isolation-source.js"
import { parseLocation } from "./location.js"
import { cleanValue, pickAttribute } from "./missing.js"

/** Attribute names to try, harmonized name first */
export const ATTRIBUTE_KEYS = {
	collectionDate: ["collection_date", "collection date"],
	geoLocation: ["geo_loc_name", "geographic location (country and/or sea)", "country"],
	host: ["host", "specific_host", "host scientific name"],
	isolationSource: ["isolation_source", "isolation source", "source_type", "sample_type"],
	serovar: ["serovar", "serotype"],
} as const

export function standardizeRecord(
	record: BioSampleRecord,
	currentYear?: number,
): StandardizedMetadata {
	const { attributes } = record
	const collectionDate = pickAttribute(attributes, ...ATTRIBUTE_KEYS.collectionDate)
	const geoLocation = pickAttribute(attributes, ...ATTRIBUTE_KEYS.geoLocation)
	const host = pickAttribute(attributes, ...ATTRIBUTE_KEYS.host)
	const isolationSource = pickAttribute(attributes, ...ATTRIBUTE_KEYS.isolationSource)
	const { country, continent } = parseLocation(geoLocation)

	return {
		title: cleanValue(record.title),
		organism: cleanValue(record.organism),
		collectionDate,
		collectionYear: parseCollectionYear(collectionDate, currentYear),
		geoLocation,
		country,
		continent,
		host,
		hostStandardized: standardizeHost(host),
		isolationSource,
		isolationCategory: categorizeIsolationSource(isolationSource),
		serovar: pickAttribute(attributes, ...ATTRIBUTE_KEYS.serovar),
	}
}

export { isMissing, cleanValue, pickAttribute } from "./missing.js"
export { parseCollectionYear } from "./date.js"
export { parseLocation, canonicalCountry, continentOf } from "./location.js"
export { standardizeHost } from "./host.js"
export {
	categorizeIsolationSource,
	keywordPattern,
	OTHER_CATEGORY,
} from "./isolation-source.js"
