#!/usr/bin/env node
/**
 * fetchm CLI - BioSample metadata for NCBI genome assembly tables
 */

import { Command } from "commander"
import { DEFAULT_CACHE_FILENAME } from "../db/index.js"
import {
	VERSION,
	cacheCommand,
	runCommand,
	summarizeCommand,
	type CacheFlags,
	type OutputFlags,
} from "./commands.js"
import { DEFAULT_OUTDIR, type RunFlags, type SummarizeFlags } from "./options.js"

// ─────────────────────────────────────────────────────────────────────────────
// CLI Definition
// ─────────────────────────────────────────────────────────────────────────────

const program = new Command()

program
	.name("fetchm")
	.version(VERSION)
	.description(
		"Fetch and standardize NCBI BioSample metadata for a genome assembly table",
	)

program
	.command("run", { isDefault: true })
	.description("Annotate an NCBI Datasets assembly table with BioSample metadata")
	.argument("<input>", "Assembly table (TSV) exported from NCBI Datasets")
	.option("-o, --outdir <dir>", "Output directory", DEFAULT_OUTDIR)
	.option("--checkm-completeness <pct>", "Minimum CheckM completeness")
	.option("--checkm-contamination <pct>", "Maximum CheckM contamination")
	.option("--api-key <key>", "NCBI API key (env NCBI_API_KEY)")
	.option("--email <addr>", "Contact email sent to NCBI (env NCBI_EMAIL)")
	.option("-b, --batch-size <n>", "BioSamples per efetch request")
	.option("-j, --jobs <n>", "Concurrent requests")
	.option("--sleep <seconds>", "Minimum delay between requests per lane")
	.option(
		"--cache-path <file>",
		`SQLite cache file (default: <outdir>/${DEFAULT_CACHE_FILENAME})`,
	)
	.option("--no-cache", "Neither read nor write the BioSample cache")
	.option("--no-figures", "Skip SVG figures")
	.option("--top <n>", "Categories per frequency table and bar chart")
	.option("--force", "Overwrite existing results without asking", false)
	.option("--non-interactive", "Never prompt", false)
	.option("--ink", "Use the Ink UI for progress display", false)
	.option("-q, --quiet", "Minimal output", false)
	.option("--verbose", "Debug output", false)
	.action(async (input: string, flags: RunFlags & OutputFlags) => {
		await runCommand(input, flags)
	})

program
	.command("summarize")
	.description("Recompute statistics and figures from an annotated table")
	.argument("<annotated>", "ncbi_clean.tsv written by `fetchm run`")
	.option("-o, --outdir <dir>", "Output directory", DEFAULT_OUTDIR)
	.option("--top <n>", "Categories per frequency table and bar chart")
	.option("--no-figures", "Skip SVG figures")
	.option("-q, --quiet", "Minimal output", false)
	.option("--verbose", "Debug output", false)
	.action(async (input: string, flags: SummarizeFlags & OutputFlags) => {
		await summarizeCommand(input, flags)
	})

program
	.command("cache")
	.description("Show or clear the BioSample cache")
	.option("-o, --outdir <dir>", "Output directory holding the cache", DEFAULT_OUTDIR)
	.option("--cache-path <file>", "SQLite cache file")
	.option("--clear", "Remove every cached BioSample", false)
	.action(async (flags: CacheFlags) => {
		await cacheCommand(flags)
	})

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

await program.parseAsync()
