export type Stage = "lex" | "parse" | "semantic" | "codegen"

export type LexErrorCode = "UnterminatedString" | "InvalidCharacter" | "MalformedNumber"

export type ParseErrorCode = "UnexpectedToken" | "UnexpectedEOF"

export type SemanticErrorCode =
	| "UndefinedSymbol"
	| "Redeclaration"
	| "TypeMismatch"
	| "ArityMismatch"
	| "CannotInferType"
	| "InvalidAddressOf"
	| "InvalidDeref"
	| "IndexOutOfRange"
	| "InvalidAssignment"
	| "InvalidStatement"
	| "MissingReturn"

export type CodegenErrorCode = "InternalInvariantViolation"

export type DiagnosticCode = LexErrorCode | ParseErrorCode | SemanticErrorCode | CodegenErrorCode

export interface Diagnostic {
	readonly severity: "error" | "warning"
	readonly stage: Stage
	readonly code: DiagnosticCode
	readonly message: string
	readonly line: number
	readonly column: number
	readonly hint?: string
}

export class DiagnosticList {
	readonly diagnostics: Diagnostic[] = []

	add(
		stage: Stage,
		code: DiagnosticCode,
		line: number,
		column: number,
		message: string,
		hint?: string,
	): void {
		this.diagnostics.push({ severity: "error", stage, code, message, line, column, hint })
	}

	addAll(other: DiagnosticList): void {
		this.diagnostics.push(...other.diagnostics)
	}

	hasErrors(): boolean {
		return this.diagnostics.some((d) => d.severity === "error")
	}
}

/**
 * Raised by codegen when the typed AST breaks an invariant the resolver
 * should have guaranteed. Always fatal.
 */
export class CodegenError extends Error {
	readonly line: number
	readonly column: number

	constructor(message: string, position: { readonly line: number; readonly column: number }) {
		super(message)
		this.name = "CodegenError"
		this.line = position.line
		this.column = position.column
	}
}

/** Plain-text rendering: `path:line:column: error[Code]: message`. */
export function formatDiagnostic(d: Diagnostic, path: string): string {
	const head = `${path}:${d.line}:${d.column}: ${d.severity}[${d.code}]: ${d.message}`
	return d.hint ? `${head} (hint: ${d.hint})` : head
}
