/**
 * Lookup tables shipped in data/ (countries, hosts, isolation sources)
 *
 * Read once on first use and validated with Zod so a broken edit to a
 * table fails loudly instead of silently standardizing nothing.
 */

import { readFileSync } from "node:fs"
import { dirname, join } from "node:path"
import { fileURLToPath } from "node:url"
import { z } from "zod"

/** data/ at the package root, for both src/standardize and dist/standardize */
export const DATA_DIR = join(dirname(fileURLToPath(import.meta.url)), "../../data")

const CountryTableSchema = z.object({
	continents: z.record(z.string()),
	aliases: z.record(z.string()),
})

const HostTableSchema = z.object({
	synonyms: z.record(z.string()),
})

const IsolationRulesSchema = z.object({
	categories: z
		.array(
			z.object({
				category: z.string().min(1),
				keywords: z.array(z.string().min(1)).min(1),
			}),
		)
		.min(1),
})

export type CountryTable = z.infer<typeof CountryTableSchema>
export type HostTable = z.infer<typeof HostTableSchema>
export type IsolationRules = z.infer<typeof IsolationRulesSchema>

function loadTable<T>(filename: string, schema: z.ZodType<T>): T {
	const path = join(DATA_DIR, filename)
	const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"))
	const result = schema.safeParse(parsed)
	if (!result.success) {
		throw new Error(`Invalid lookup table ${path}: ${result.error.message}`)
	}
	return result.data
}

let countries: CountryTable | null = null
let hosts: HostTable | null = null
let isolationRules: IsolationRules | null = null

export function countryTable(): CountryTable {
	countries ??= loadTable("countries.json", CountryTableSchema)
	return countries
}

export function hostTable(): HostTable {
	hosts ??= loadTable("hosts.json", HostTableSchema)
	return hosts
}

export function isolationSourceRules(): IsolationRules {
	isolationRules ??= loadTable("isolation-sources.json", IsolationRulesSchema)
	return isolationRules
}
