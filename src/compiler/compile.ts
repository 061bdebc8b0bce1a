/**
 * Compiler driver: lex → parse → resolve → codegen.
 *
 * Lex and parse diagnostics are reported together; resolution only runs on a
 * clean parse, and codegen only on a clean resolution.
 */
import { codegen } from "./codegen"
import { CodegenError, type Diagnostic, DiagnosticList } from "./errors"
import type { IRModule } from "./ir"
import { lex } from "./lexer"
import { parse } from "./parser"
import { resolve } from "./resolver"

export interface CompileOptions {
	/** Module name recorded in the IR; defaults to the source file's base name. */
	readonly moduleName?: string
}

export type CompileResult =
	| { readonly success: true; readonly module: IRModule; readonly diagnostics: readonly [] }
	| { readonly success: false; readonly diagnostics: readonly Diagnostic[] }

export function compile(source: string, sourcePath: string, options: CompileOptions = {}): CompileResult {
	const allErrors = new DiagnosticList()

	// Lex, then parse whatever tokens came out
	const { tokens, errors: lexErrors } = lex(source)
	allErrors.addAll(lexErrors)
	const { program, errors: parseErrors } = parse(tokens)
	allErrors.addAll(parseErrors)
	if (allErrors.hasErrors()) {
		return { success: false, diagnostics: allErrors.diagnostics }
	}

	// Resolve
	const analysis = resolve(program)
	if (analysis.errors.hasErrors()) {
		return { success: false, diagnostics: analysis.errors.diagnostics }
	}

	// Codegen
	const moduleName = options.moduleName ?? moduleNameFor(sourcePath)
	try {
		const module = codegen(analysis, moduleName, sourcePath)
		return { success: true, module, diagnostics: [] }
	} catch (e) {
		if (!(e instanceof CodegenError)) throw e
		allErrors.add("codegen", "InternalInvariantViolation", e.line, e.column, e.message)
		return { success: false, diagnostics: allErrors.diagnostics }
	}
}

/** Thrown by `compileOrThrow` when compilation fails. */
export class CompileError extends Error {
	readonly diagnostics: readonly Diagnostic[]

	constructor(diagnostics: readonly Diagnostic[]) {
		const first = diagnostics[0]
		super(first ? `Compilation failed: ${first.line}:${first.column}: ${first.message}` : "Compilation failed")
		this.name = "CompileError"
		this.diagnostics = diagnostics
	}
}

export function compileOrThrow(source: string, sourcePath: string, options?: CompileOptions): IRModule {
	const result = compile(source, sourcePath, options)
	if (!result.success) throw new CompileError(result.diagnostics)
	return result.module
}

export function moduleNameFor(sourcePath: string): string {
	const base = sourcePath.split(/[\\/]/).pop() ?? sourcePath
	const dot = base.lastIndexOf(".")
	return dot > 0 ? base.slice(0, dot) : base
}
