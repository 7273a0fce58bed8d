/**
 * ProgressBar - batch progress with sub-character resolution
 * @module ui/components/ProgressBar
 */
import { Box, Text } from "ink"
import { colors, progressChars, symbols, type ColorRole } from "../theme.js"

export interface ProgressBarProps {
	label?: string | undefined
	value: number
	total: number
	/** Bar width in characters */
	width?: number
	color?: ColorRole
	/** Text after the counter, e.g. "12 found, 3 cached" */
	info?: string | undefined
}

export function ProgressBar({
	label,
	value,
	total,
	width = 30,
	color = "accent",
	info,
}: ProgressBarProps) {
	const progress = total > 0 ? Math.min(1, Math.max(0, value / total)) : 1
	const filledWidth = progress * width
	const fullBlocks = Math.floor(filledWidth)
	const partialIndex = Math.floor(
		(filledWidth - fullBlocks) * progressChars.partial.length,
	)
	const emptyBlocks = width - fullBlocks - (partialIndex > 0 ? 1 : 0)

	const filled = progressChars.filled.repeat(fullBlocks)
	const partial = partialIndex > 0 ? (progressChars.partial[partialIndex - 1] ?? "") : ""
	const empty = progressChars.empty.repeat(Math.max(0, emptyBlocks))
	const done = progress === 1

	return (
		<Box gap={1}>
			{label && (
				<Text>
					<Text color={done ? colors.success : colors.muted}>
						{done ? symbols.success : symbols.bullet}
					</Text>{" "}
					{label}
				</Text>
			)}
			<Text color={colors[color]}>
				{filled}
				{partial}
			</Text>
			<Text color={colors.muted}>{empty}</Text>
			<Text color={done ? colors.success : colors.muted}>
				{value}/{total}
			</Text>
			{info && <Text color={colors.muted}>{info}</Text>}
		</Box>
	)
}
