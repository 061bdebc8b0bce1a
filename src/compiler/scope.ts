import type { Span, Stmt } from "./ast"
import type { FunctionType, Type } from "./types"

export type SymbolKind = "variable" | "parameter" | "function"

/** Where codegen keeps a symbol: a function local, or an addressable stack slot. */
export type Storage = "register" | "slot"

export interface SymbolInfo {
	readonly name: string
	readonly type: Type
	readonly kind: SymbolKind
	// Promoted to "slot" when the address is taken; final once resolution completes
	storage: Storage
	readonly depth: number
	readonly span: Span
	readonly function: FunctionInfo | null
}

export interface FunctionInfo {
	/** Module-level name of the lowered function. */
	readonly name: string
	readonly type: FunctionType
	readonly params: readonly SymbolInfo[]
	readonly body: readonly Stmt[]
	readonly span: Span
	readonly isEntry: boolean
}

export interface Lookup {
	readonly symbol: SymbolInfo
	/** True when the symbol lives outside the innermost enclosing function. */
	readonly crossesFunction: boolean
}

/**
 * One frame of the scope chain. Lookups walk from the innermost frame to the
 * root through `parent`.
 */
export class Scope {
	private readonly symbols = new Map<string, SymbolInfo>()

	readonly parent: Scope | null

	/** The frame holds a function's parameters and marks where its locals begin */
	readonly isFunctionBoundary: boolean

	readonly depth: number

	constructor(parent: Scope | null, isFunctionBoundary = false) {
		this.parent = parent
		this.isFunctionBoundary = isFunctionBoundary
		this.depth = parent ? parent.depth + 1 : 0
	}

	/** Adds the symbol to this frame; returns false if the name is already taken here. */
	declare(symbol: SymbolInfo): boolean {
		if (this.symbols.has(symbol.name)) return false
		this.symbols.set(symbol.name, symbol)
		return true
	}

	getLocal(name: string): SymbolInfo | undefined {
		return this.symbols.get(name)
	}

	lookup(name: string): Lookup | null {
		let crossesFunction = false
		for (let scope: Scope | null = this; scope; scope = scope.parent) {
			const symbol = scope.symbols.get(name)
			if (symbol) return { symbol, crossesFunction }
			if (scope.isFunctionBoundary) crossesFunction = true
		}
		return null
	}
}
