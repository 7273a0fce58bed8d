/**
 * StatLine - aligned "label  value" row
 * @module ui/components/StatLine
 */
import { Box, Text } from "ink"
import { colors, type ColorRole } from "../theme.js"

export interface StatLineProps {
	label: string
	value: string | number
	/** Label column width */
	width?: number
	color?: ColorRole
}

export function StatLine({
	label,
	value,
	width = 18,
	color = "accent",
}: StatLineProps) {
	return (
		<Box>
			<Box width={width}>
				<Text color={colors.muted}>{label}</Text>
			</Box>
			<Text color={colors[color]}>{value}</Text>
		</Box>
	)
}
