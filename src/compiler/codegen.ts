// IR codegen for tpl. Walks the type-checked AST once and emits one IR module.

import type {
	ArithOp,
	Block,
	BuiltinCall,
	CompareOp,
	Expr,
	ForInStmt,
	Ident,
	IfStmt,
	LogicalOp,
	Span,
	Stmt,
	UnaryExpr,
	VarDecl,
	WhileStmt,
} from "./ast"
import { CodegenError } from "./errors"
import { CONCAT, I128_TO_STR, PRINTF } from "./externs"
import type { BinaryOpcode, IRModule, IcmpPredicate, Operand, Reg } from "./ir"
import { FunctionBuilder, ModuleBuilder } from "./ir-builder"
import { type Analysis, type ExprInfo, isArithOp, isLogicalOp } from "./resolver"
import type { FunctionInfo, SymbolInfo } from "./scope"
import { BOOL, INT32, INT128, STR, type Type, intType, isInt, typeToString } from "./types"

const ARITH_OPCODES: Record<ArithOp, BinaryOpcode> = {
	"+": "add",
	"-": "sub",
	"*": "mul",
	"/": "sdiv",
	"%": "srem",
}

// Both operands are always evaluated
const LOGICAL_OPCODES: Record<LogicalOp, BinaryOpcode> = {
	"&&": "and",
	"||": "or",
}

const COMPARE_PREDICATES: Record<CompareOp, IcmpPredicate> = {
	"==": "eq",
	"!=": "ne",
	"<": "slt",
	">": "sgt",
	"<=": "sle",
	">=": "sge",
}

/**
 * Produce an IR module from a resolved program. Throws CodegenError when the
 * analysis breaks an invariant the resolver guarantees.
 */
export function codegen(analysis: Analysis, moduleName: string, sourcePath: string): IRModule {
	const gen = new IRCodegen(analysis)
	return gen.generate(moduleName, sourcePath)
}

// Where a symbol lives in the function being compiled
type SymbolStorage = { readonly kind: "local"; readonly name: string } | { readonly kind: "slot"; readonly ptr: Reg }

// An assignable location
type Place =
	| { readonly kind: "local"; readonly name: string; readonly type: Type }
	| { readonly kind: "memory"; readonly ptr: Operand; readonly type: Type }

// Function being compiled
interface CompilingFunc {
	readonly builder: FunctionBuilder
	readonly storage: Map<SymbolInfo, SymbolStorage>
	// Exit block of each enclosing loop, innermost last
	readonly breakTargets: string[]
}

class IRCodegen {
	private analysis: Analysis
	private module = new ModuleBuilder()

	constructor(analysis: Analysis) {
		this.analysis = analysis
	}

	generate(moduleName: string, sourcePath: string): IRModule {
		for (const info of this.analysis.functions) {
			this.compileFunction(info)
		}
		return this.module.build(moduleName, sourcePath)
	}

	// --- Functions ---

	private compileFunction(info: FunctionInfo): void {
		const builder = new FunctionBuilder(info.name, info.type.params, info.type.returns, info.span)
		const ctx: CompilingFunc = { builder, storage: new Map(), breakTargets: [] }

		// Parameters are copied into their storage on entry
		info.params.forEach((symbol, i) => {
			const reg = builder.params[i]
			if (!reg) throw new CodegenError(`missing parameter '${symbol.name}' in '${info.name}'`, symbol.span)
			this.bindSymbol(symbol, reg, ctx)
		})

		for (const stmt of info.body) {
			this.compileStmt(stmt, ctx)
		}

		if (!builder.isTerminated) {
			if (info.isEntry) {
				builder.ret({ kind: "const", value: 0n, type: INT32 })
			} else if (info.type.returns.kind === "void") {
				builder.ret(null)
			} else {
				// Every path returns; only a loop exit can reach here
				builder.unreachable()
			}
		}

		this.module.addFunction(builder.build())
	}

	/** Creates storage for a symbol and stores its initial value (zero when absent). */
	private bindSymbol(symbol: SymbolInfo, initial: Operand | null, ctx: CompilingFunc): void {
		const b = ctx.builder
		const value = initial ?? this.zeroValue(symbol.type)
		if (symbol.storage === "slot") {
			const ptr = b.alloca(symbol.type)
			b.store(ptr, value)
			ctx.storage.set(symbol, { kind: "slot", ptr })
		} else {
			const name = b.declareLocal(symbol.name, symbol.type)
			b.localSet(name, value)
			ctx.storage.set(symbol, { kind: "local", name })
		}
	}

	private zeroValue(type: Type): Operand {
		switch (type.kind) {
			case "int":
			case "bool":
				return { kind: "const", value: 0n, type }
			case "str":
				return this.module.stringConstant("")
			default:
				return { kind: "zero", type }
		}
	}

	// --- Statements ---

	private compileBlock(block: Block, ctx: CompilingFunc): void {
		for (const stmt of block.stmts) {
			this.compileStmt(stmt, ctx)
		}
	}

	private compileStmt(stmt: Stmt, ctx: CompilingFunc): void {
		const b = ctx.builder
		switch (stmt.kind) {
			case "VarDecl": {
				const symbol = this.declaration(stmt, stmt.span)
				const init = stmt.init ? this.value(stmt.init, ctx) : null
				this.bindSymbol(symbol, init, ctx)
				break
			}
			case "FuncDef":
				// Lowered separately; definitions only appear at top level
				break
			case "AssignStmt": {
				const place = this.compilePlace(stmt.target, ctx)
				if (stmt.op === "=") {
					this.writePlace(place, this.value(stmt.value, ctx), ctx)
				} else {
					const current = this.readPlace(place, ctx)
					const rhs = this.value(stmt.value, ctx)
					const op: ArithOp = stmt.op === "+=" ? "+" : stmt.op === "-=" ? "-" : stmt.op === "*=" ? "*" : "/"
					this.writePlace(place, b.binary(ARITH_OPCODES[op], current, rhs), ctx)
				}
				break
			}
			case "IncDecStmt": {
				const place = this.compilePlace(stmt.target, ctx)
				const current = this.readPlace(place, ctx)
				const one: Operand = { kind: "const", value: 1n, type: place.type }
				this.writePlace(place, b.binary(stmt.op === "++" ? "add" : "sub", current, one), ctx)
				break
			}
			case "IfStmt":
				this.compileIf(stmt, ctx)
				break
			case "WhileStmt":
				this.compileWhile(stmt, ctx)
				break
			case "ForInStmt":
				this.compileForIn(stmt, ctx)
				break
			case "ReturnStmt":
				b.ret(stmt.value ? this.value(stmt.value, ctx) : null)
				break
			case "BreakStmt": {
				const target = ctx.breakTargets[ctx.breakTargets.length - 1]
				if (target === undefined) throw new CodegenError("'break' outside of a loop", stmt.span)
				b.br(target)
				break
			}
			case "ExprStmt":
				this.compileExpr(stmt.expr, ctx)
				break
			case "Block":
				this.compileBlock(stmt, ctx)
				break
		}
	}

	private compileIf(stmt: IfStmt, ctx: CompilingFunc): void {
		const b = ctx.builder
		const cond = this.value(stmt.condition, ctx)
		const thenLabel = b.newBlock("if.then")
		const elseLabel = stmt.else_ ? b.newBlock("if.else") : null
		const endLabel = b.newBlock("if.end")
		b.condBr(cond, thenLabel, elseLabel ?? endLabel)

		b.switchTo(thenLabel)
		this.compileBlock(stmt.then, ctx)
		b.fallThrough(endLabel)

		if (elseLabel && stmt.else_) {
			b.switchTo(elseLabel)
			if (stmt.else_.kind === "IfStmt") {
				this.compileIf(stmt.else_, ctx)
			} else {
				this.compileBlock(stmt.else_, ctx)
			}
			b.fallThrough(endLabel)
		}

		b.switchTo(endLabel)
	}

	private compileWhile(stmt: WhileStmt, ctx: CompilingFunc): void {
		const b = ctx.builder
		const condLabel = b.newBlock("while.cond")
		const bodyLabel = b.newBlock("while.body")
		const endLabel = b.newBlock("while.end")
		b.br(condLabel)

		b.switchTo(condLabel)
		b.condBr(this.value(stmt.condition, ctx), bodyLabel, endLabel)

		b.switchTo(bodyLabel)
		ctx.breakTargets.push(endLabel)
		this.compileBlock(stmt.body, ctx)
		ctx.breakTargets.pop()
		b.fallThrough(condLabel)

		b.switchTo(endLabel)
	}

	// for i in N: counter from 0, bound evaluated once, `i` seeded from the counter each iteration
	private compileForIn(stmt: ForInStmt, ctx: CompilingFunc): void {
		const b = ctx.builder
		const symbol = this.declaration(stmt, stmt.span)
		const type = symbol.type
		const bound = this.value(stmt.bound, ctx)
		const counter = b.declareLocal(`${stmt.name}.counter`, type)
		b.localSet(counter, { kind: "const", value: 0n, type })

		const condLabel = b.newBlock("for.cond")
		const bodyLabel = b.newBlock("for.body")
		const latchLabel = b.newBlock("for.latch")
		const endLabel = b.newBlock("for.end")
		b.br(condLabel)

		b.switchTo(condLabel)
		const index = b.localGet(counter, type)
		b.condBr(b.icmp("slt", index, bound), bodyLabel, endLabel)

		b.switchTo(bodyLabel)
		this.bindSymbol(symbol, index, ctx)
		ctx.breakTargets.push(endLabel)
		this.compileBlock(stmt.body, ctx)
		ctx.breakTargets.pop()
		b.fallThrough(latchLabel)

		b.switchTo(latchLabel)
		const next = b.binary("add", b.localGet(counter, type), { kind: "const", value: 1n, type })
		b.localSet(counter, next)
		b.br(condLabel)

		b.switchTo(endLabel)
	}

	// --- Places ---

	private compilePlace(expr: Expr, ctx: CompilingFunc): Place {
		const type = this.typeOf(expr)
		switch (expr.kind) {
			case "Ident": {
				const symbol = this.reference(expr, expr.span)
				const storage = this.storageOf(symbol, ctx, expr.span)
				return storage.kind === "local"
					? { kind: "local", name: storage.name, type }
					: { kind: "memory", ptr: storage.ptr, type }
			}
			case "GroupExpr":
				return this.compilePlace(expr.expr, ctx)
			case "UnaryExpr":
				if (expr.op === "*") {
					return { kind: "memory", ptr: this.value(expr.operand, ctx), type }
				}
				break
			case "IndexAccess": {
				const objectType = this.typeOf(expr.object)
				if (objectType.kind === "array") {
					const base = this.compilePlace(expr.object, ctx)
					if (base.kind !== "memory") break
					const index = this.value(expr.index, ctx)
					return { kind: "memory", ptr: ctx.builder.elementPtr(base.ptr, index, type, true), type }
				}
				if (objectType.kind === "pointer") {
					const ptr = this.value(expr.object, ctx)
					const index = this.value(expr.index, ctx)
					return { kind: "memory", ptr: ctx.builder.elementPtr(ptr, index, type, false), type }
				}
				break
			}
		}
		throw new CodegenError("expression is not addressable", expr.span)
	}

	private readPlace(place: Place, ctx: CompilingFunc): Reg {
		return place.kind === "local"
			? ctx.builder.localGet(place.name, place.type)
			: ctx.builder.load(place.ptr, place.type)
	}

	private writePlace(place: Place, value: Operand, ctx: CompilingFunc): void {
		if (place.kind === "local") {
			ctx.builder.localSet(place.name, value)
		} else {
			ctx.builder.store(place.ptr, value)
		}
	}

	// --- Expressions ---

	/** Compiles an expression that must produce a value. */
	private value(expr: Expr, ctx: CompilingFunc): Operand {
		const result = this.compileExpr(expr, ctx)
		if (!result) throw new CodegenError("void expression used as a value", expr.span)
		return result
	}

	/** Returns null for calls to void functions and for print. */
	private compileExpr(expr: Expr, ctx: CompilingFunc): Operand | null {
		const b = ctx.builder
		const info = this.infoOf(expr)

		// Literals, negated literals and len() fold to constants
		if (info.constValue !== undefined && isInt(info.type)) {
			return { kind: "const", value: info.constValue, type: info.type }
		}

		const { kind, span } = expr
		switch (expr.kind) {
			case "IntLiteral":
				throw new CodegenError("integer literal without a constant value", expr.span)
			case "BoolLiteral":
				return { kind: "const", value: expr.value ? 1n : 0n, type: BOOL }
			case "StringLiteral":
				return this.module.stringConstant(expr.value)
			case "Ident": {
				const symbol = this.reference(expr, expr.span)
				if (symbol.kind === "function") return this.functionRef(symbol, expr.span)
				return this.readPlace(this.compilePlace(expr, ctx), ctx)
			}
			case "GroupExpr":
				return this.compileExpr(expr.expr, ctx)
			case "UnaryExpr":
				return this.compileUnary(expr, info, ctx)
			case "BinaryExpr": {
				const lhs = this.value(expr.left, ctx)
				const rhs = this.value(expr.right, ctx)
				if (isArithOp(expr.op)) return b.binary(ARITH_OPCODES[expr.op], lhs, rhs)
				if (isLogicalOp(expr.op)) return b.binary(LOGICAL_OPCODES[expr.op], lhs, rhs)
				return b.icmp(COMPARE_PREDICATES[expr.op], lhs, rhs)
			}
			case "CallExpr": {
				const callee = this.calleeOperand(expr.callee, ctx)
				const args = expr.args.map((a) => this.value(a, ctx))
				return b.call(callee, args, info.type)
			}
			case "MethodCall": {
				// recv.name(args) is name(recv, args)
				const symbol = this.analysis.methodCallees.get(expr)
				if (!symbol) throw new CodegenError(`unresolved method '${expr.method}'`, expr.methodSpan)
				const callee = this.symbolValue(symbol, ctx, expr.methodSpan)
				const args = [expr.receiver, ...expr.args].map((a) => this.value(a, ctx))
				return b.call(callee, args, info.type)
			}
			case "BuiltinCall":
				return this.compileBuiltin(expr, info, ctx)
			case "IndexAccess": {
				if (info.isLValue) return this.readPlace(this.compilePlace(expr, ctx), ctx)
				// Indexing a temporary array: spill it to a slot first
				const arrayType = this.typeOf(expr.object)
				const tmp = b.alloca(arrayType)
				b.store(tmp, this.value(expr.object, ctx))
				const ptr = b.elementPtr(tmp, this.value(expr.index, ctx), info.type, true)
				return b.load(ptr, info.type)
			}
			case "ArrayLiteral": {
				if (expr.elements.length === 0 || info.type.kind !== "array") return this.zeroValue(info.type)
				const elementType = info.type.inner
				const tmp = b.alloca(info.type)
				expr.elements.forEach((element, i) => {
					const ptr = b.elementPtr(tmp, { kind: "const", value: BigInt(i), type: INT32 }, elementType, true)
					b.store(ptr, this.value(element, ctx))
				})
				return b.load(tmp, info.type)
			}
			case "Lambda": {
				const fn = this.analysis.lambdas.get(expr)
				if (!fn) throw new CodegenError("unresolved function value", expr.span)
				return { kind: "func", name: fn.name, type: fn.type }
			}
		}
		throw new CodegenError(`cannot compile expression '${kind}'`, span)
	}

	private compileUnary(expr: UnaryExpr, info: ExprInfo, ctx: CompilingFunc): Operand {
		const b = ctx.builder
		switch (expr.op) {
			case "-":
				return b.binary("sub", { kind: "const", value: 0n, type: info.type }, this.value(expr.operand, ctx))
			case "!":
				return b.not(this.value(expr.operand, ctx))
			case "&": {
				const place = this.compilePlace(expr.operand, ctx)
				if (place.kind !== "memory") {
					throw new CodegenError("address taken of a register-resident value", expr.span)
				}
				return place.ptr
			}
			case "*":
				return b.load(this.value(expr.operand, ctx), info.type)
		}
	}

	private calleeOperand(callee: Expr, ctx: CompilingFunc): Operand {
		const target = callee.kind === "GroupExpr" ? callee.expr : callee
		if (target.kind === "Ident") {
			return this.symbolValue(this.reference(target, target.span), ctx, target.span)
		}
		return this.value(callee, ctx)
	}

	/** A named function as a direct callee, anything else read from its storage. */
	private symbolValue(symbol: SymbolInfo, ctx: CompilingFunc, span: Span): Operand {
		if (symbol.kind === "function") return this.functionRef(symbol, span)
		const storage = this.storageOf(symbol, ctx, span)
		return storage.kind === "local"
			? ctx.builder.localGet(storage.name, symbol.type)
			: ctx.builder.load(storage.ptr, symbol.type)
	}

	private functionRef(symbol: SymbolInfo, span: Span): Operand {
		const fn = symbol.function
		if (!fn) throw new CodegenError(`function '${symbol.name}' has no body`, span)
		return { kind: "func", name: fn.name, type: fn.type }
	}

	// --- Builtins ---

	private compileBuiltin(expr: BuiltinCall, info: ExprInfo, ctx: CompilingFunc): Operand | null {
		const b = ctx.builder
		const { builtin, args } = expr
		const [first, second] = args

		switch (builtin.name) {
			case "print": {
				const parts: string[] = []
				const values: Operand[] = []
				for (const arg of args) {
					this.formatValue(this.typeOf(arg), this.value(arg, ctx), parts, values, ctx, arg.span)
				}
				const format = this.module.stringConstant(`${parts.join(" ")}\n`)
				b.call(this.module.useExtern(PRINTF), [format, ...values], INT32)
				return null
			}
			case "concat": {
				if (!first || !second) break
				const lhs = this.value(first, ctx)
				const rhs = this.value(second, ctx)
				return b.call(this.module.useExtern(CONCAT), [lhs, rhs], STR)
			}
			case "type":
				// Static: the argument is not evaluated
				if (!first) break
				return this.module.stringConstant(typeToString(this.typeOf(first)))
			case "convert": {
				if (!first) break
				const from = this.typeOf(first)
				const to = intType(builtin.width)
				const value = this.value(first, ctx)
				if (from.kind === "bool") return b.cast("zext", value, to)
				if (!isInt(from)) break
				if (from.width === to.width) return value
				return b.cast(from.width > to.width ? "trunc" : "sext", value, to)
			}
			case "to_str": {
				if (!first) break
				const from = this.typeOf(first)
				const value = this.value(first, ctx)
				if (from.kind === "bool") return this.boolText(value, ctx)
				if (!isInt(from)) break
				const wide = from.width === 128 ? value : b.cast("sext", value, INT128)
				return b.call(this.module.useExtern(I128_TO_STR), [wide], STR)
			}
			case "len":
				// Folded to a constant from the resolved array length
				break
		}
		throw new CodegenError(`malformed call to builtin '${builtin.name}'`, expr.span)
	}

	/** Appends a printf conversion for one value, converting it to a printable form where needed. */
	private formatValue(
		type: Type,
		value: Operand,
		parts: string[],
		values: Operand[],
		ctx: CompilingFunc,
		span: Span,
	): void {
		const b = ctx.builder
		switch (type.kind) {
			case "int":
				switch (type.width) {
					case 8:
					case 16:
						// Variadic arguments narrower than int are promoted
						parts.push("%d")
						values.push(b.cast("sext", value, INT32))
						return
					case 32:
						parts.push("%d")
						values.push(value)
						return
					case 64:
						parts.push("%lld")
						values.push(value)
						return
					case 128: {
						parts.push("%s")
						const text = b.call(this.module.useExtern(I128_TO_STR), [value], STR)
						if (!text) break
						values.push(text)
						return
					}
				}
				break
			case "bool":
				parts.push("%s")
				values.push(this.boolText(value, ctx))
				return
			case "str":
				parts.push("%s")
				values.push(value)
				return
			case "array": {
				// Printed as [e1, e2] with string elements quoted
				const tmp = b.alloca(type)
				b.store(tmp, value)
				const elements: string[] = []
				for (let i = 0; i < type.length; i++) {
					const ptr = b.elementPtr(tmp, { kind: "const", value: BigInt(i), type: INT32 }, type.inner, true)
					const element = b.load(ptr, type.inner)
					const elementParts: string[] = []
					this.formatValue(type.inner, element, elementParts, values, ctx, span)
					const [directive = ""] = elementParts
					elements.push(type.inner.kind === "str" ? `"${directive}"` : directive)
				}
				parts.push(`[${elements.join(", ")}]`)
				return
			}
		}
		throw new CodegenError(`cannot print a value of type ${typeToString(type)}`, span)
	}

	private boolText(value: Operand, ctx: CompilingFunc): Operand {
		return ctx.builder.select(value, this.module.stringConstant("true"), this.module.stringConstant("false"))
	}

	// --- Analysis lookups ---

	private infoOf(expr: Expr): ExprInfo {
		const info = this.analysis.exprTypes.get(expr)
		if (!info) throw new CodegenError(`expression '${expr.kind}' was not type-checked`, expr.span)
		return info
	}

	private typeOf(expr: Expr): Type {
		return this.infoOf(expr).type
	}

	private reference(expr: Ident, span: Span): SymbolInfo {
		const symbol = this.analysis.references.get(expr)
		if (!symbol) throw new CodegenError(`unresolved identifier '${expr.name}'`, span)
		return symbol
	}

	private declaration(decl: VarDecl | ForInStmt, span: Span): SymbolInfo {
		const symbol = this.analysis.declarations.get(decl)
		if (!symbol) throw new CodegenError(`unresolved declaration of '${decl.name}'`, span)
		return symbol
	}

	private storageOf(symbol: SymbolInfo, ctx: CompilingFunc, span: Span): SymbolStorage {
		const storage = ctx.storage.get(symbol)
		if (!storage) throw new CodegenError(`'${symbol.name}' has no storage in this function`, span)
		return storage
	}
}
