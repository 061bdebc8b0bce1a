// Scope and type resolver for tpl. Two-pass: collect function signatures, then check bodies.

import type {
	ArithOp,
	BinaryExpr,
	BinaryOp,
	Block,
	BuiltinCall,
	CallExpr,
	Expr,
	ForInStmt,
	Ident,
	IndexAccess,
	Lambda,
	LogicalOp,
	MethodCall,
	Param,
	Program,
	Span,
	Stmt,
	TypeNode,
	UnaryExpr,
	VarDecl,
} from "./ast"
import { builtinSpelling, isBuiltinName } from "./builtins"
import { DiagnosticList, type SemanticErrorCode } from "./errors"
import { isRuntimeSymbol } from "./externs"
import { type FunctionInfo, Scope, type SymbolInfo, type SymbolKind } from "./scope"
import {
	BOOL,
	type FunctionType,
	INT32,
	type IntWidth,
	MAX_ARRAY_ELEMENTS,
	STR,
	type Type,
	VOID,
	arrayOf,
	elementCount,
	fitsWidth,
	functionType,
	intType,
	isInt,
	isPrintableScalar,
	pointerTo,
	typeEq,
	typeToString,
} from "./types"

// --- Public interfaces ---

export interface ExprInfo {
	readonly type: Type
	readonly isLValue: boolean
	/** Set for integer constants: literals, negated literals and `len()`. */
	readonly constValue?: bigint
}

export type Declaration = VarDecl | Param | ForInStmt

export interface Analysis {
	readonly exprTypes: Map<Expr, ExprInfo>
	readonly references: Map<Ident, SymbolInfo>
	readonly declarations: Map<Declaration, SymbolInfo>
	/** Callee of each `recv.name(args)`, resolved as `name(recv, args)`. */
	readonly methodCallees: Map<MethodCall, SymbolInfo>
	readonly lambdas: Map<Lambda, FunctionInfo>
	/** Every function to emit, entry first. */
	readonly functions: readonly FunctionInfo[]
	readonly errors: DiagnosticList
}

export const ENTRY_NAME = "main"

// Widths an unconstrained integer literal may take, narrowest first
const DEFAULT_LITERAL_WIDTHS: readonly IntWidth[] = [32, 64, 128]

// --- Entry point ---

export function resolve(program: Program): Analysis {
	const r = new Resolver()
	return r.resolve(program)
}

// --- Resolver ---

class Resolver {
	private errors = new DiagnosticList()
	private exprTypes = new Map<Expr, ExprInfo>()
	private references = new Map<Ident, SymbolInfo>()
	private declarations = new Map<Declaration, SymbolInfo>()
	private methodCallees = new Map<MethodCall, SymbolInfo>()
	private lambdas = new Map<Lambda, FunctionInfo>()
	private functions: FunctionInfo[] = []
	// Symbols whose declaration failed; references to them are silently poisoned
	private poisoned = new Set<SymbolInfo>()
	// Functions whose declared return type failed to resolve
	private unresolvedReturns = new Set<FunctionInfo>()
	private globals = new Scope(null)
	private scope = this.globals
	private currentFunc: FunctionInfo | null = null
	private loopDepth = 0
	private lambdaCount = 0

	resolve(program: Program): Analysis {
		const entry: FunctionInfo = {
			name: ENTRY_NAME,
			type: functionType([], INT32),
			params: [],
			body: program.stmts.filter((s) => s.kind !== "FuncDef"),
			span: program.span,
			isEntry: true,
		}
		this.functions.push(entry)

		const named = this.collectFunctions(program)
		this.checkFunctionBody(entry, this.globals)
		for (const info of named) {
			this.checkFunctionBody(info, this.globals)
		}

		return {
			exprTypes: this.exprTypes,
			references: this.references,
			declarations: this.declarations,
			methodCallees: this.methodCallees,
			lambdas: this.lambdas,
			functions: this.functions,
			errors: this.errors,
		}
	}

	// --- Pass 1: collect function signatures ---

	private collectFunctions(program: Program): FunctionInfo[] {
		const named: FunctionInfo[] = []
		for (const stmt of program.stmts) {
			if (stmt.kind !== "FuncDef") continue
			const info = this.buildFunction(stmt.name, stmt.returnType, stmt.params, stmt.body, stmt.span, this.globals)
			named.push(info)

			if (stmt.name === ENTRY_NAME) {
				this.error("Redeclaration", `'${ENTRY_NAME}' is reserved for the program entry point`, stmt.span)
				continue
			}
			if (isRuntimeSymbol(stmt.name)) {
				this.error("Redeclaration", `'${stmt.name}' is reserved for the runtime library`, stmt.span)
				continue
			}
			const symbol = this.makeSymbol(stmt.name, info.type, "function", this.globals.depth, stmt.span, info)
			if (!this.isResolved(info)) this.poisoned.add(symbol)
			this.declareSymbol(symbol)
		}
		return named
	}

	/** Resolves a signature and registers the function for emission. Parameters are declared when the body is checked. */
	private buildFunction(
		name: string,
		returnNode: TypeNode,
		paramNodes: readonly Param[],
		body: Block,
		span: Span,
		parent: Scope,
	): FunctionInfo {
		const returns = this.resolveType(returnNode, true)
		const params = paramNodes.map((p) => {
			const type = this.resolveType(p.typeNode)
			const symbol = this.makeSymbol(p.name, type ?? VOID, "parameter", parent.depth + 1, p.span)
			if (!type) this.poisoned.add(symbol)
			this.declarations.set(p, symbol)
			return symbol
		})
		const info: FunctionInfo = {
			name,
			type: functionType(
				params.map((p) => p.type),
				returns ?? VOID,
			),
			params,
			body: body.stmts,
			span,
			isEntry: false,
		}
		if (!returns) this.unresolvedReturns.add(info)
		this.functions.push(info)
		return info
	}

	private isResolved(info: FunctionInfo): boolean {
		return !this.unresolvedReturns.has(info) && info.params.every((p) => !this.poisoned.has(p))
	}

	// --- Pass 2: check bodies ---

	private checkFunctionBody(info: FunctionInfo, parent: Scope): void {
		const savedScope = this.scope
		const savedFunc = this.currentFunc
		const savedLoopDepth = this.loopDepth

		this.scope = new Scope(parent, true)
		this.currentFunc = info
		this.loopDepth = 0

		for (const param of info.params) {
			this.declareSymbol(param)
		}
		for (const stmt of info.body) {
			this.checkStmt(stmt)
		}

		const returns = info.type.returns
		if (!info.isEntry && returns.kind !== "void" && !this.unresolvedReturns.has(info) && !alwaysReturns(info.body)) {
			this.error(
				"MissingReturn",
				`function '${info.name}' must return ${typeToString(returns)} on every path`,
				info.span,
				"add a return statement at the end of the body",
			)
		}

		this.scope = savedScope
		this.currentFunc = savedFunc
		this.loopDepth = savedLoopDepth
	}

	// --- Type resolution ---

	private resolveType(node: TypeNode, allowVoid = false): Type | null {
		switch (node.kind) {
			case "BaseType":
				switch (node.name) {
					case "int8":
						return intType(8)
					case "int16":
						return intType(16)
					case "int32":
						return intType(32)
					case "int64":
						return intType(64)
					case "int128":
						return intType(128)
					case "bool":
						return BOOL
					case "str":
						return STR
					case "void":
						if (allowVoid) return VOID
						this.error("TypeMismatch", "'void' is only valid as a function return type", node.span)
						return null
				}
				break
			case "PointerType": {
				const inner = this.resolveType(node.inner)
				return inner && pointerTo(inner)
			}
			case "ArrayType": {
				const element = this.resolveType(node.element)
				if (!element) return null
				const limit = BigInt(MAX_ARRAY_ELEMENTS)
				if (node.size > limit || node.size * BigInt(elementCount(element)) > limit) {
					this.error(
						"TypeMismatch",
						`array type ${typeToString(element)}[${node.size}] exceeds the limit of ${MAX_ARRAY_ELEMENTS} elements`,
						node.span,
					)
					return null
				}
				return arrayOf(element, Number(node.size))
			}
			case "FnType": {
				const returns = this.resolveType(node.returns, true)
				const params = (node.params ?? []).map((p) => this.resolveType(p))
				const resolved: Type[] = []
				for (const p of params) {
					if (!p) return null
					resolved.push(p)
				}
				return returns && functionType(resolved, returns)
			}
		}
		return null
	}

	// --- Scope management ---

	private makeSymbol(
		name: string,
		type: Type,
		kind: SymbolKind,
		depth: number,
		span: Span,
		fn: FunctionInfo | null = null,
	): SymbolInfo {
		return {
			name,
			type,
			kind,
			// Arrays are always addressed through their element pointers
			storage: type.kind === "array" ? "slot" : "register",
			depth,
			span,
			function: fn,
		}
	}

	private declareSymbol(symbol: SymbolInfo): void {
		if (isBuiltinName(symbol.name)) {
			this.error("Redeclaration", `cannot redefine builtin '${symbol.name}'`, symbol.span)
		}
		if (!this.scope.declare(symbol)) {
			const previous = this.scope.getLocal(symbol.name)
			this.error(
				"Redeclaration",
				`'${symbol.name}' is already declared in this scope`,
				symbol.span,
				previous ? `previous declaration at ${previous.span.line}:${previous.span.column}` : undefined,
			)
		}
	}

	private lookupIdent(name: string, span: Span): SymbolInfo | null {
		const found = this.scope.lookup(name)
		if (!found || (found.crossesFunction && found.symbol.kind !== "function")) {
			this.error(
				"UndefinedSymbol",
				`undefined symbol '${name}'`,
				span,
				found ? "function values cannot capture local variables of an enclosing function" : undefined,
			)
			return null
		}
		if (this.poisoned.has(found.symbol)) return null
		return found.symbol
	}

	// --- Statement checking ---

	private checkBlock(block: Block): void {
		const saved = this.scope
		this.scope = new Scope(saved)
		for (const stmt of block.stmts) {
			this.checkStmt(stmt)
		}
		this.scope = saved
	}

	private checkStmt(stmt: Stmt): void {
		switch (stmt.kind) {
			case "VarDecl":
				this.checkVarDecl(stmt)
				break
			case "FuncDef":
				this.error("InvalidStatement", "functions can only be defined at top level", stmt.span)
				break
			case "AssignStmt": {
				const target = this.checkLValue(stmt.target)
				if (!target) {
					this.checkExpr(stmt.value)
					break
				}
				if (stmt.op !== "=" && !isInt(target)) {
					this.error("TypeMismatch", `'${stmt.op}' requires an integer target, found ${typeToString(target)}`, stmt.span)
					this.checkExpr(stmt.value)
					break
				}
				this.checkAssignable(stmt.value, target)
				break
			}
			case "IncDecStmt": {
				const target = this.checkLValue(stmt.target)
				if (target && !isInt(target)) {
					this.error("TypeMismatch", `'${stmt.op}' requires an integer target, found ${typeToString(target)}`, stmt.span)
				}
				break
			}
			case "IfStmt":
				this.checkCondition(stmt.condition, "if")
				this.checkBlock(stmt.then)
				if (stmt.else_?.kind === "IfStmt") {
					this.checkStmt(stmt.else_)
				} else if (stmt.else_) {
					this.checkBlock(stmt.else_)
				}
				break
			case "WhileStmt":
				this.checkCondition(stmt.condition, "while")
				this.loopDepth++
				this.checkBlock(stmt.body)
				this.loopDepth--
				break
			case "ForInStmt":
				this.checkForIn(stmt)
				break
			case "ReturnStmt":
				this.checkReturn(stmt.value, stmt.span)
				break
			case "BreakStmt":
				if (this.loopDepth === 0) {
					this.error("InvalidStatement", "'break' outside of a loop", stmt.span)
				}
				break
			case "ExprStmt":
				this.checkExpr(stmt.expr)
				break
			case "Block":
				this.checkBlock(stmt)
				break
		}
	}

	private checkVarDecl(stmt: VarDecl): void {
		let type: Type | null = null
		const { typeNode, init } = stmt

		if (typeNode === null) {
			// auto
			if (!init) {
				this.error(
					"CannotInferType",
					`cannot infer the type of '${stmt.name}' without an initializer`,
					stmt.span,
					"declare its type or give it an initial value",
				)
			} else {
				const initType = this.checkExpr(init)
				if (initType?.kind === "void") {
					this.error("CannotInferType", `cannot infer the type of '${stmt.name}' from a void expression`, init.span)
				} else {
					type = initType
				}
			}
		} else if (typeNode.kind === "FnType" && typeNode.params === null && init) {
			// `fn<R> name = value;` takes its parameter list from the value
			const returns = this.resolveType(typeNode.returns, true)
			const initType = this.checkExpr(init)
			if (returns && initType) {
				if (initType.kind === "function" && typeEq(initType.returns, returns)) {
					type = initType
				} else {
					this.error(
						"TypeMismatch",
						`expected a function returning ${typeToString(returns)}, found ${typeToString(initType)}`,
						init.span,
					)
				}
			}
		} else {
			type = this.resolveType(typeNode)
			if (init) {
				if (type) {
					this.checkAssignable(init, type)
				} else {
					this.checkExpr(init)
				}
			}
		}

		const symbol = this.makeSymbol(stmt.name, type ?? VOID, "variable", this.scope.depth, stmt.span)
		if (!type) this.poisoned.add(symbol)
		this.declarations.set(stmt, symbol)
		this.declareSymbol(symbol)
	}

	private checkForIn(stmt: ForInStmt): void {
		const boundType = this.checkExpr(stmt.bound)
		if (boundType && !isInt(boundType)) {
			this.error(
				"TypeMismatch",
				`for-in bound must be an integer, found ${typeToString(boundType)}`,
				stmt.bound.span,
			)
		}

		const saved = this.scope
		this.scope = new Scope(saved)
		const counterType = boundType && isInt(boundType) ? boundType : null
		const symbol = this.makeSymbol(stmt.name, counterType ?? INT32, "variable", this.scope.depth, stmt.span)
		if (!counterType) this.poisoned.add(symbol)
		this.declarations.set(stmt, symbol)
		this.declareSymbol(symbol)

		this.loopDepth++
		this.checkBlock(stmt.body)
		this.loopDepth--
		this.scope = saved
	}

	private checkReturn(value: Expr | null, span: Span): void {
		const func = this.currentFunc
		if (!func || func.isEntry) {
			this.error("InvalidStatement", "'return' outside of a function", span)
			if (value) this.checkExpr(value)
			return
		}

		const returns = func.type.returns
		if (this.unresolvedReturns.has(func)) {
			if (value) this.checkExpr(value)
			return
		}
		if (value === null) {
			if (returns.kind !== "void") {
				this.error("TypeMismatch", `missing return value in function returning ${typeToString(returns)}`, span)
			}
			return
		}
		if (returns.kind === "void") {
			this.error("TypeMismatch", "cannot return a value from a void function", value.span)
			this.checkExpr(value)
			return
		}
		this.checkAssignable(value, returns, "return value")
	}

	private checkCondition(expr: Expr, what: string): void {
		const type = this.checkExpr(expr)
		if (type && type.kind !== "bool") {
			this.error("TypeMismatch", `${what} condition must be bool, found ${typeToString(type)}`, expr.span)
		}
	}

	/** Checks an assignment target; returns its type when it is a valid lvalue. */
	private checkLValue(target: Expr): Type | null {
		const type = this.checkExpr(target)
		if (!type) return null
		if (!this.exprTypes.get(target)?.isLValue) {
			this.error(
				"InvalidAssignment",
				"cannot assign to this expression",
				target.span,
				"only variables, dereferenced pointers and indexed elements can be assigned",
			)
			return null
		}
		return type
	}

	private checkAssignable(expr: Expr, target: Type, context?: string): Type | null {
		const type = this.checkExpr(expr, target)
		if (!type) return null
		if (!typeEq(type, target)) {
			const detail = `expected ${typeToString(target)}, found ${typeToString(type)}`
			this.error("TypeMismatch", context ? `${context}: ${detail}` : detail, expr.span)
			return null
		}
		return type
	}

	// --- Expression checking ---

	/** Checks an expression and records its type. `expected` only guides untyped literals. */
	private checkExpr(expr: Expr, expected?: Type): Type | null {
		const info = this.inferExpr(expr, expected)
		if (!info) return null
		this.exprTypes.set(expr, info)
		return info.type
	}

	private inferExpr(expr: Expr, expected: Type | undefined): ExprInfo | null {
		switch (expr.kind) {
			case "IntLiteral":
				return this.literalInfo(expr.value, expected, expr.span)
			case "BoolLiteral":
				return { type: BOOL, isLValue: false }
			case "StringLiteral":
				return { type: STR, isLValue: false }
			case "Ident": {
				const symbol = this.lookupIdent(expr.name, expr.span)
				if (!symbol) return null
				this.references.set(expr, symbol)
				return { type: symbol.type, isLValue: symbol.kind !== "function" }
			}
			case "GroupExpr": {
				if (!this.checkExpr(expr.expr, expected)) return null
				return this.exprTypes.get(expr.expr) ?? null
			}
			case "UnaryExpr":
				return this.checkUnary(expr, expected)
			case "BinaryExpr":
				return this.checkBinary(expr, expected)
			case "CallExpr":
				return this.checkCall(expr)
			case "MethodCall":
				return this.checkMethodCall(expr)
			case "BuiltinCall":
				return this.checkBuiltin(expr)
			case "IndexAccess":
				return this.checkIndex(expr)
			case "ArrayLiteral":
				return this.checkArrayLiteral(expr.elements, expected, expr.span)
			case "Lambda":
				return this.checkLambda(expr)
		}
	}

	private literalInfo(value: bigint, expected: Type | undefined, span: Span): ExprInfo | null {
		if (expected && isInt(expected)) {
			if (!fitsWidth(value, expected.width)) {
				this.error("TypeMismatch", `integer literal ${value} does not fit in ${typeToString(expected)}`, span)
				return null
			}
			return { type: expected, isLValue: false, constValue: value }
		}
		const width = DEFAULT_LITERAL_WIDTHS.find((w) => fitsWidth(value, w))
		if (width === undefined) {
			this.error("TypeMismatch", `integer literal ${value} does not fit in int128`, span)
			return null
		}
		return { type: intType(width), isLValue: false, constValue: value }
	}

	private checkUnary(expr: UnaryExpr, expected: Type | undefined): ExprInfo | null {
		switch (expr.op) {
			case "-": {
				const folded = literalValue(expr)
				if (folded !== null) {
					return this.literalInfo(folded, expected, expr.span)
				}
				const type = this.checkExpr(expr.operand, expected)
				if (!type) return null
				if (!isInt(type)) {
					this.error("TypeMismatch", `unary '-' requires an integer, found ${typeToString(type)}`, expr.span)
					return null
				}
				return { type, isLValue: false }
			}
			case "!": {
				const type = this.checkExpr(expr.operand)
				if (!type) return null
				if (type.kind !== "bool") {
					this.error("TypeMismatch", `unary '!' requires bool, found ${typeToString(type)}`, expr.span)
					return null
				}
				return { type: BOOL, isLValue: false }
			}
			case "&": {
				const type = this.checkExpr(expr.operand)
				if (!type) return null
				if (!this.exprTypes.get(expr.operand)?.isLValue) {
					this.error(
						"InvalidAddressOf",
						"cannot take the address of this expression",
						expr.span,
						"only variables, dereferenced pointers and indexed elements have an address",
					)
					return null
				}
				this.markAddressTaken(expr.operand)
				return { type: pointerTo(type), isLValue: false }
			}
			case "*": {
				const type = this.checkExpr(expr.operand)
				if (!type) return null
				if (type.kind !== "pointer") {
					this.error("InvalidDeref", `cannot dereference a value of type ${typeToString(type)}`, expr.span)
					return null
				}
				return { type: type.inner, isLValue: true }
			}
		}
	}

	private markAddressTaken(expr: Expr): void {
		const target = unwrapGroups(expr)
		if (target.kind !== "Ident") return
		const symbol = this.references.get(target)
		if (symbol) symbol.storage = "slot"
	}

	private checkBinary(expr: BinaryExpr, expected: Type | undefined): ExprInfo | null {
		const { op, left, right } = expr
		if (isLogicalOp(op)) return this.checkLogical(expr, op)
		const arith = isArithOp(op)
		const outer = arith && expected && isInt(expected) ? expected : undefined

		// An untyped literal on the left takes its width from the right operand
		let leftType: Type | null
		let rightType: Type | null
		if (isUntypedLiteral(left) && !isUntypedLiteral(right)) {
			rightType = this.checkExpr(right, outer)
			leftType = this.checkExpr(left, rightType && isInt(rightType) ? rightType : outer)
		} else {
			leftType = this.checkExpr(left, outer)
			rightType = this.checkExpr(right, leftType && isInt(leftType) ? leftType : outer)
		}
		if (!leftType || !rightType) return null

		const operands = `${typeToString(leftType)} and ${typeToString(rightType)}`
		if (arith) {
			if (!isInt(leftType) || !typeEq(leftType, rightType)) {
				const bothStr = leftType.kind === "str" && rightType.kind === "str"
				this.error(
					"TypeMismatch",
					`operator '${op}' requires integer operands of the same width, found ${operands}`,
					expr.span,
					bothStr && op === "+" ? "use concat() to join strings" : undefined,
				)
				return null
			}
			return { type: leftType, isLValue: false }
		}

		if (op === "==" || op === "!=") {
			const comparable = leftType.kind === "int" || leftType.kind === "bool" || leftType.kind === "pointer"
			if (!comparable || !typeEq(leftType, rightType)) {
				this.error("TypeMismatch", `cannot compare ${operands} with '${op}'`, expr.span)
				return null
			}
		} else if (!isInt(leftType) || !typeEq(leftType, rightType)) {
			this.error("TypeMismatch", `operator '${op}' requires integer operands of the same width, found ${operands}`, expr.span)
			return null
		}
		return { type: BOOL, isLValue: false }
	}

	private checkLogical(expr: BinaryExpr, op: LogicalOp): ExprInfo | null {
		const leftType = this.checkExpr(expr.left)
		const rightType = this.checkExpr(expr.right)
		if (!leftType || !rightType) return null
		if (leftType.kind !== "bool" || rightType.kind !== "bool") {
			this.error(
				"TypeMismatch",
				`operator '${op}' requires bool operands, found ${typeToString(leftType)} and ${typeToString(rightType)}`,
				expr.span,
			)
			return null
		}
		return { type: BOOL, isLValue: false }
	}

	private checkCall(expr: CallExpr): ExprInfo | null {
		const calleeType = this.checkExpr(expr.callee)
		if (!calleeType) {
			this.checkLooseArgs(expr.args)
			return null
		}
		if (calleeType.kind !== "function") {
			this.error("TypeMismatch", `cannot call a value of type ${typeToString(calleeType)}`, expr.span)
			this.checkLooseArgs(expr.args)
			return null
		}
		const callee = unwrapGroups(expr.callee)
		const name = callee.kind === "Ident" ? callee.name : "function value"
		return this.checkArgs(calleeType, expr.args, name, expr.span)
	}

	private checkMethodCall(expr: MethodCall): ExprInfo | null {
		const symbol = this.lookupIdent(expr.method, expr.methodSpan)
		const args = [expr.receiver, ...expr.args]
		if (!symbol) {
			this.checkLooseArgs(args)
			return null
		}
		if (symbol.type.kind !== "function") {
			this.error("TypeMismatch", `'${expr.method}' is not a function`, expr.methodSpan)
			this.checkLooseArgs(args)
			return null
		}
		this.methodCallees.set(expr, symbol)
		return this.checkArgs(symbol.type, args, expr.method, expr.span)
	}

	private checkArgs(fnType: FunctionType, args: readonly Expr[], name: string, span: Span): ExprInfo | null {
		if (args.length !== fnType.params.length) {
			this.error(
				"ArityMismatch",
				`'${name}' expects ${fnType.params.length} argument(s), found ${args.length}`,
				span,
			)
			this.checkLooseArgs(args)
			return null
		}
		let ok = true
		args.forEach((arg, i) => {
			const param = fnType.params[i]
			if (!param || !this.checkAssignable(arg, param, `argument ${i + 1} of '${name}'`)) ok = false
		})
		return ok ? { type: fnType.returns, isLValue: false } : null
	}

	// Arguments of a call that already failed are still checked for their own errors
	private checkLooseArgs(args: readonly Expr[]): void {
		for (const arg of args) {
			this.checkExpr(arg)
		}
	}

	private checkBuiltin(expr: BuiltinCall): ExprInfo | null {
		const { builtin, args, span } = expr
		const name = builtinSpelling(builtin)

		switch (builtin.name) {
			case "print": {
				let ok = true
				for (const arg of args) {
					const type = this.checkExpr(arg)
					if (!type) {
						ok = false
					} else if (!isPrintable(type)) {
						this.error("TypeMismatch", `cannot print a value of type ${typeToString(type)}`, arg.span)
						ok = false
					}
				}
				return ok ? { type: VOID, isLValue: false } : null
			}
			case "concat": {
				if (!this.expectArity(name, args, 2, span)) return null
				let ok = true
				args.forEach((arg, i) => {
					if (!this.checkAssignable(arg, STR, `argument ${i + 1} of 'concat'`)) ok = false
				})
				return ok ? { type: STR, isLValue: false } : null
			}
			case "type": {
				if (!this.expectArity(name, args, 1, span)) return null
				const [arg] = args
				if (!arg || !this.checkExpr(arg)) return null
				return { type: STR, isLValue: false }
			}
			case "convert": {
				if (!this.expectArity(name, args, 1, span)) return null
				const [arg] = args
				const type = arg ? this.checkExpr(arg) : null
				if (!arg || !type) return null
				if (!isInt(type) && type.kind !== "bool") {
					this.error("TypeMismatch", `${name}() requires an integer or bool, found ${typeToString(type)}`, arg.span)
					return null
				}
				return { type: intType(builtin.width), isLValue: false }
			}
			case "to_str": {
				if (!this.expectArity(name, args, 1, span)) return null
				const [arg] = args
				const type = arg ? this.checkExpr(arg) : null
				if (!arg || !type) return null
				if (!isInt(type) && type.kind !== "bool") {
					this.error("TypeMismatch", `to_str() requires an integer or bool, found ${typeToString(type)}`, arg.span)
					return null
				}
				return { type: STR, isLValue: false }
			}
			case "len": {
				if (!this.expectArity(name, args, 1, span)) return null
				const [arg] = args
				const type = arg ? this.checkExpr(arg) : null
				if (!arg || !type) return null
				if (type.kind !== "array") {
					this.error("TypeMismatch", `len() requires an array, found ${typeToString(type)}`, arg.span)
					return null
				}
				return { type: INT32, isLValue: false, constValue: BigInt(type.length) }
			}
		}
	}

	private expectArity(name: string, args: readonly Expr[], count: number, span: Span): boolean {
		if (args.length === count) return true
		this.error("ArityMismatch", `'${name}' expects ${count} argument(s), found ${args.length}`, span)
		this.checkLooseArgs(args)
		return false
	}

	private checkIndex(expr: IndexAccess): ExprInfo | null {
		const objectType = this.checkExpr(expr.object)
		const indexType = this.checkExpr(expr.index)
		if (!objectType || !indexType) return null

		if (!isInt(indexType)) {
			this.error("TypeMismatch", `index must be an integer, found ${typeToString(indexType)}`, expr.index.span)
			return null
		}

		if (objectType.kind === "array") {
			const constant = this.exprTypes.get(expr.index)?.constValue
			if (constant !== undefined && (constant < 0n || constant >= BigInt(objectType.length))) {
				this.error(
					"IndexOutOfRange",
					`index ${constant} is out of range for ${typeToString(objectType)}`,
					expr.index.span,
				)
				return null
			}
			return { type: objectType.inner, isLValue: this.exprTypes.get(expr.object)?.isLValue ?? false }
		}
		if (objectType.kind === "pointer") {
			return { type: objectType.inner, isLValue: true }
		}
		this.error("TypeMismatch", `cannot index a value of type ${typeToString(objectType)}`, expr.span)
		return null
	}

	private checkArrayLiteral(elements: readonly Expr[], expected: Type | undefined, span: Span): ExprInfo | null {
		const expectedElement = expected?.kind === "array" ? expected.inner : undefined

		if (elements.length === 0) {
			if (expected?.kind === "array") return { type: expected, isLValue: false }
			this.error(
				"CannotInferType",
				"cannot infer the element type of an empty array literal",
				span,
				"declare the array type",
			)
			return null
		}

		let elementType: Type | null = null
		let ok = true
		for (const element of elements) {
			const type = this.checkExpr(element, elementType ?? expectedElement)
			if (!type) {
				ok = false
			} else if (type.kind === "void") {
				this.error("TypeMismatch", "array elements cannot be void", element.span)
				ok = false
			} else if (!elementType) {
				elementType = type
			} else if (!typeEq(type, elementType)) {
				this.error(
					"TypeMismatch",
					`array elements must share one type: expected ${typeToString(elementType)}, found ${typeToString(type)}`,
					element.span,
				)
				ok = false
			}
		}
		if (!ok || !elementType) return null
		return { type: arrayOf(elementType, elements.length), isLValue: false }
	}

	private checkLambda(expr: Lambda): ExprInfo | null {
		const name = `lambda.${this.lambdaCount++}`
		const info = this.buildFunction(name, expr.returnType, expr.params, expr.body, expr.span, this.scope)
		this.lambdas.set(expr, info)
		this.checkFunctionBody(info, this.scope)
		if (!this.isResolved(info)) return null
		return { type: info.type, isLValue: false }
	}

	// --- Error helpers ---

	private error(code: SemanticErrorCode, message: string, span: Span, hint?: string): void {
		this.errors.add("semantic", code, span.line, span.column, message, hint)
	}
}

// --- Helpers ---

export function isArithOp(op: BinaryOp): op is ArithOp {
	return op === "+" || op === "-" || op === "*" || op === "/" || op === "%"
}

export function isLogicalOp(op: BinaryOp): op is LogicalOp {
	return op === "&&" || op === "||"
}

function isPrintable(type: Type): boolean {
	return isPrintableScalar(type) || (type.kind === "array" && isPrintableScalar(type.inner))
}

function unwrapGroups(expr: Expr): Expr {
	return expr.kind === "GroupExpr" ? unwrapGroups(expr.expr) : expr
}

/** An integer literal, possibly negated or parenthesized, whose width is not fixed yet. */
function isUntypedLiteral(expr: Expr): boolean {
	return literalValue(expr) !== null
}

function literalValue(expr: Expr): bigint | null {
	switch (expr.kind) {
		case "IntLiteral":
			return expr.value
		case "GroupExpr":
			return literalValue(expr.expr)
		case "UnaryExpr": {
			if (expr.op !== "-") return null
			const inner = literalValue(expr.operand)
			return inner === null ? null : -inner
		}
		default:
			return null
	}
}

function alwaysReturns(stmts: readonly Stmt[]): boolean {
	return stmts.some(stmtReturns)
}

function stmtReturns(stmt: Stmt): boolean {
	switch (stmt.kind) {
		case "ReturnStmt":
			return true
		case "Block":
			return alwaysReturns(stmt.stmts)
		case "IfStmt":
			return stmt.else_ !== null && alwaysReturns(stmt.then.stmts) && stmtReturns(stmt.else_)
		default:
			return false
	}
}
