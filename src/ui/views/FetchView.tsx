/**
 * FetchView - live view of a metadata run
 *
 * Shows load/filter counts, a batch progress bar, failed batches as they
 * happen, and the status breakdown plus top countries when done.
 *
 * @module ui/views/FetchView
 */
import { Box, Text, useApp } from "ink"
import { useEffect, useState } from "react"
import {
	Failure,
	Header,
	ProgressBar,
	Section,
	Spinner,
	StatLine,
	Success,
	Warning,
} from "../components/index.js"
import { useFetchPipeline, type FetchViewState } from "../hooks/useFetchPipeline.js"
import { colors, symbols } from "../theme.js"
import type { FetchOptions } from "../../core/types.js"
import { METADATA_STATUSES } from "../../types.js"

export interface FetchViewResult {
	success: boolean
	error: string | null
	durationMs: number
}

export interface FetchViewProps {
	options: FetchOptions
	onComplete?: ((result: FetchViewResult) => void) | undefined
}

const MAX_FAILURES_SHOWN = 5
const TOP_COUNTRIES = 5

function formatDuration(ms: number): string {
	const seconds = Math.floor(ms / 1000)
	const minutes = Math.floor(seconds / 60)
	if (minutes > 0) return `${minutes}m ${seconds % 60}s`
	return `${seconds}s`
}

function batchInfo(state: FetchViewState): string {
	const parts = [`${state.found} found`]
	if (state.cached > 0) parts.push(`${state.cached} cached`)
	if (state.missing > 0) parts.push(`${state.missing} not found`)
	if (state.failed > 0) parts.push(`${state.failed} failed`)
	return parts.join(", ")
}

function Results({ state }: { state: FetchViewState }) {
	const statuses = state.statuses
	const countries = (state.summary?.frequencies.country ?? []).slice(0, TOP_COUNTRIES)

	return (
		<Box flexDirection="column">
			{statuses && (
				<Section title="Metadata status">
					{METADATA_STATUSES.filter(status => statuses[status] > 0).map(status => (
						<StatLine
							key={status}
							label={status}
							value={statuses[status]}
							color={status === "error" ? "error" : "accent"}
						/>
					))}
				</Section>
			)}
			{countries.length > 0 && (
				<Section title="Top countries">
					{countries.map(entry => (
						<StatLine
							key={entry.value}
							label={entry.value}
							value={`${entry.count} (${entry.percent}%)`}
							width={24}
						/>
					))}
				</Section>
			)}
		</Box>
	)
}

export function FetchView({ options, onComplete }: FetchViewProps) {
	const { exit } = useApp()
	const { state, isRunning, error } = useFetchPipeline(options)
	const [hasNotified, setHasNotified] = useState(false)

	useEffect(() => {
		if (isRunning || hasNotified) return
		if (state.phase !== "done" && error === null) return

		setHasNotified(true)
		onComplete?.({
			success: error === null && state.success === true,
			error,
			durationMs: state.durationMs,
		})
		setTimeout(() => exit(), 500)
	}, [isRunning, hasNotified, state, error, onComplete, exit])

	const shownFailures = state.failures.slice(-MAX_FAILURES_SHOWN)

	return (
		<Box flexDirection="column">
			<Header subtitle={options.input}>Fetching BioSample metadata</Header>

			{error && <Failure>{error}</Failure>}

			{state.rows > 0 && (
				<Text>
					<Text color={colors.success}>{symbols.success}</Text> {state.rows}{" "}
					assemblies loaded
					{state.removed > 0 && (
						<Text color={colors.muted}>
							{" "}
							({state.removed} removed by CheckM filter)
						</Text>
					)}
				</Text>
			)}

			{state.phase === "loading" && isRunning && <Spinner phase="loading" />}

			{state.phase !== "loading" && (
				<Box marginTop={1}>
					<ProgressBar
						label={`${state.accessions} BioSamples`}
						value={state.completedBatches}
						total={state.batches}
						info={batchInfo(state)}
					/>
				</Box>
			)}

			{shownFailures.length > 0 && (
				<Section title="Failed batches">
					{shownFailures.map(failure => (
						<Text key={failure.index} color={colors.error}>
							{symbols.error} batch {failure.index + 1} ({failure.size}): {failure.error}
						</Text>
					))}
					{state.failures.length > MAX_FAILURES_SHOWN && (
						<Text color={colors.muted}>
							…and {state.failures.length - MAX_FAILURES_SHOWN} more
						</Text>
					)}
				</Section>
			)}

			{state.phase === "writing" && isRunning && <Spinner phase="writing" />}

			{state.phase === "done" && (
				<>
					<Results state={state} />
					<Box marginTop={1}>
						{state.success ? (
							<Success>
								Wrote {state.files.length} files to {options.outdir} in{" "}
								{formatDuration(state.durationMs)}
							</Success>
						) : (
							<Warning>
								Finished with {state.failed} BioSamples not fetched; see Failed
								batches
							</Warning>
						)}
					</Box>
				</>
			)}
		</Box>
	)
}
