/**
 * Spinner for the pipeline phases that have no progress bar
 * @module ui/components/Spinner
 */
import { Text } from "ink"
import InkSpinner from "ink-spinner"
import type { FetchPhase } from "../hooks/useFetchPipeline.js"
import { colors, type ColorRole } from "../theme.js"

export type SpinnerPhase = Extract<FetchPhase, "loading" | "writing">

const PHASE_STYLE: Record<SpinnerPhase, { label: string; color: ColorRole }> = {
	loading: { label: "Reading input table…", color: "accent" },
	writing: { label: "Writing tables and figures…", color: "primary" },
}

export function spinnerStyle(phase: SpinnerPhase): { label: string; color: ColorRole } {
	return PHASE_STYLE[phase]
}

export interface SpinnerProps {
	phase: SpinnerPhase
}

export function Spinner({ phase }: SpinnerProps) {
	const { label, color } = spinnerStyle(phase)
	return (
		<Text>
			<Text color={colors[color]}>
				<InkSpinner type="dots" />
			</Text>
			<Text> {label}</Text>
		</Text>
	)
}
