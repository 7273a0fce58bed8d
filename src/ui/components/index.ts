/**
 * UI components barrel export
 * @module ui/components
 */
export { ProgressBar, type ProgressBarProps } from "./ProgressBar.js"
export { Spinner, spinnerStyle, type SpinnerPhase, type SpinnerProps } from "./Spinner.js"
export {
	Message,
	Success,
	Failure,
	Warning,
	type MessageType,
	type MessageProps,
} from "./Message.js"
export { Header, Section, type HeaderProps, type SectionProps } from "./Header.js"
export { StatLine, type StatLineProps } from "./StatLine.js"
