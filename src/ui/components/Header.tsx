/**
 * Header and Section
 * @module ui/components/Header
 */
import type { ReactNode } from "react"
import { Text, Box } from "ink"
import { colors, symbols, type ColorRole } from "../theme.js"

export interface HeaderProps {
	children: ReactNode
	/** Dimmed line under the title, e.g. the input path */
	subtitle?: string | undefined
	color?: ColorRole
}

export function Header({ children, subtitle, color = "primary" }: HeaderProps) {
	return (
		<Box flexDirection="column" marginBottom={1}>
			<Text bold color={colors[color]}>
				{symbols.arrow} {children}
			</Text>
			{subtitle && <Text color={colors.muted}> {subtitle}</Text>}
		</Box>
	)
}

export interface SectionProps {
	title: string
	children: ReactNode
}

/** Indented block under a bold title */
export function Section({ title, children }: SectionProps) {
	return (
		<Box flexDirection="column" marginTop={1}>
			<Text bold>{title}</Text>
			<Box marginLeft={2} flexDirection="column">
				{children}
			</Box>
		</Box>
	)
}
