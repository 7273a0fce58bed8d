/**
 * Design tokens for the Ink view
 * @module ui/theme
 */

/** Terminal colors by role */
export const colors = {
	success: "green",
	error: "red",
	warning: "yellow",
	info: "blue",
	muted: "gray",
	accent: "cyan",
	primary: "magenta",
} as const

export const symbols = {
	success: "✓",
	error: "✗",
	warning: "⚠",
	info: "ℹ",
	bullet: "•",
	arrow: "→",
} as const

/** Progress bar characters */
export const progressChars = {
	filled: "█",
	empty: "░",
	partial: ["▏", "▎", "▍", "▌", "▋", "▊", "▉"],
} as const

export type ColorRole = keyof typeof colors
