/**
 * Runtime log collector for program execution.
 *
 * Collects printed output, traps and the final exit status while the
 * interpreter runs a module. Attached per execution and entirely opt-in:
 * `execute` creates one when the caller does not pass its own.
 */

export type RuntimeMessageType = "output" | "trap" | "exit"

export interface OutputMessage {
	readonly type: "output"
	readonly step: number
	readonly text: string
}

export interface TrapMessage {
	readonly type: "trap"
	readonly step: number
	readonly functionName: string
	readonly error: string
}

export interface ExitMessage {
	readonly type: "exit"
	readonly step: number
	readonly code: number
}

export type RuntimeMessage = OutputMessage | TrapMessage | ExitMessage

export interface RuntimeLog {
	output(step: number, text: string): void
	trap(step: number, functionName: string, error: unknown): void
	exit(step: number, code: number): void
	getMessages(): readonly RuntimeMessage[]
}

export function createRuntimeLog(): RuntimeLog {
	const messages: RuntimeMessage[] = []

	return {
		output(step: number, text: string) {
			messages.push({ type: "output", step, text })
		},

		trap(step: number, functionName: string, error: unknown) {
			const errorString = error instanceof Error ? error.message : String(error)
			messages.push({ type: "trap", step, functionName, error: errorString })
		},

		exit(step: number, code: number) {
			messages.push({ type: "exit", step, code })
		},

		getMessages(): readonly RuntimeMessage[] {
			return messages
		},
	}
}
