/**
 * Status messages
 * @module ui/components/Message
 */
import type { ReactNode } from "react"
import { Text, Box } from "ink"
import { colors, symbols, type ColorRole } from "../theme.js"

export type MessageType = "success" | "error" | "warning" | "info"

export interface MessageProps {
	type: MessageType
	children: ReactNode
}

const typeConfig: Record<MessageType, { color: ColorRole; symbol: string }> = {
	success: { color: "success", symbol: symbols.success },
	error: { color: "error", symbol: symbols.error },
	warning: { color: "warning", symbol: symbols.warning },
	info: { color: "info", symbol: symbols.info },
}

export function Message({ type, children }: MessageProps) {
	const { color, symbol } = typeConfig[type]

	return (
		<Box gap={1}>
			<Text color={colors[color]}>{symbol}</Text>
			<Text color={colors[color]}>{children}</Text>
		</Box>
	)
}

export function Success({ children }: { children: ReactNode }) {
	return <Message type="success">{children}</Message>
}

export function Failure({ children }: { children: ReactNode }) {
	return <Message type="error">{children}</Message>
}

export function Warning({ children }: { children: ReactNode }) {
	return <Message type="warning">{children}</Message>
}
