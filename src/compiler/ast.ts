// AST node definitions for the tpl language.
// These types represent the untyped parse tree produced by the parser.

import type { IntWidth } from "./types"

export interface Span {
	readonly line: number
	readonly column: number
}

export interface Program {
	readonly kind: "Program"
	readonly stmts: Stmt[]
	readonly span: Span
}

export interface Param {
	readonly name: string
	readonly typeNode: TypeNode
	readonly span: Span
}

// --- Type nodes (syntax-level, before resolution) ---

export type TypeNode = BaseTypeNode | PointerTypeNode | ArrayTypeNode | FnTypeNode

export type BaseTypeName = "int8" | "int16" | "int32" | "int64" | "int128" | "bool" | "str" | "void"

export interface BaseTypeNode {
	readonly kind: "BaseType"
	readonly name: BaseTypeName
	readonly span: Span
}

export interface PointerTypeNode {
	readonly kind: "PointerType"
	readonly inner: TypeNode
	readonly span: Span
}

export interface ArrayTypeNode {
	readonly kind: "ArrayType"
	readonly element: TypeNode
	readonly size: bigint
	readonly span: Span
}

export interface FnTypeNode {
	readonly kind: "FnType"
	readonly returns: TypeNode
	// null when written as bare `fn<R>`
	readonly params: TypeNode[] | null
	readonly span: Span
}

// --- Statements ---

export type Stmt =
	| VarDecl
	| FuncDef
	| AssignStmt
	| IncDecStmt
	| IfStmt
	| WhileStmt
	| ForInStmt
	| ReturnStmt
	| BreakStmt
	| ExprStmt
	| Block

export interface Block {
	readonly kind: "Block"
	readonly stmts: Stmt[]
	readonly span: Span
}

export interface VarDecl {
	readonly kind: "VarDecl"
	readonly name: string
	// null for `auto`
	readonly typeNode: TypeNode | null
	readonly init: Expr | null
	readonly span: Span
}

export interface FuncDef {
	readonly kind: "FuncDef"
	readonly name: string
	readonly params: Param[]
	readonly returnType: TypeNode
	readonly body: Block
	readonly span: Span
}

export type AssignOp = "=" | "+=" | "-=" | "*=" | "/="

export interface AssignStmt {
	readonly kind: "AssignStmt"
	readonly target: Expr
	readonly op: AssignOp
	readonly value: Expr
	readonly span: Span
}

export interface IncDecStmt {
	readonly kind: "IncDecStmt"
	readonly target: Expr
	readonly op: "++" | "--"
	readonly span: Span
}

export interface IfStmt {
	readonly kind: "IfStmt"
	readonly condition: Expr
	readonly then: Block
	readonly else_: Block | IfStmt | null
	readonly span: Span
}

export interface WhileStmt {
	readonly kind: "WhileStmt"
	readonly condition: Expr
	readonly body: Block
	readonly span: Span
}

export interface ForInStmt {
	readonly kind: "ForInStmt"
	readonly name: string
	readonly bound: Expr
	readonly body: Block
	readonly span: Span
}

export interface ReturnStmt {
	readonly kind: "ReturnStmt"
	readonly value: Expr | null
	readonly span: Span
}

export interface BreakStmt {
	readonly kind: "BreakStmt"
	readonly span: Span
}

export interface ExprStmt {
	readonly kind: "ExprStmt"
	readonly expr: Expr
	readonly span: Span
}

// --- Expressions ---

export type Expr =
	| IntLiteral
	| BoolLiteral
	| StringLiteral
	| Ident
	| UnaryExpr
	| BinaryExpr
	| CallExpr
	| MethodCall
	| BuiltinCall
	| IndexAccess
	| ArrayLiteral
	| Lambda
	| GroupExpr

export interface IntLiteral {
	readonly kind: "IntLiteral"
	readonly value: bigint
	readonly span: Span
}

export interface BoolLiteral {
	readonly kind: "BoolLiteral"
	readonly value: boolean
	readonly span: Span
}

export interface StringLiteral {
	readonly kind: "StringLiteral"
	readonly value: string
	readonly span: Span
}

export interface Ident {
	readonly kind: "Ident"
	readonly name: string
	readonly span: Span
}

export type UnaryOp = "&" | "*" | "-" | "!"

export interface UnaryExpr {
	readonly kind: "UnaryExpr"
	readonly op: UnaryOp
	readonly operand: Expr
	readonly span: Span
}

export type ArithOp = "+" | "-" | "*" | "/" | "%"
export type CompareOp = "==" | "!=" | "<" | ">" | "<=" | ">="
export type LogicalOp = "&&" | "||"
export type BinaryOp = ArithOp | CompareOp | LogicalOp

export interface BinaryExpr {
	readonly kind: "BinaryExpr"
	readonly op: BinaryOp
	readonly left: Expr
	readonly right: Expr
	readonly span: Span
}

export interface CallExpr {
	readonly kind: "CallExpr"
	readonly callee: Expr
	readonly args: Expr[]
	readonly span: Span
}

/** `receiver.method(args)`, resolved as `method(receiver, args)`. */
export interface MethodCall {
	readonly kind: "MethodCall"
	readonly receiver: Expr
	readonly method: string
	readonly methodSpan: Span
	readonly args: Expr[]
	readonly span: Span
}

export type Builtin =
	| { readonly name: "print" }
	| { readonly name: "concat" }
	| { readonly name: "type" }
	| { readonly name: "len" }
	| { readonly name: "to_str" }
	| { readonly name: "convert"; readonly width: IntWidth }

/**
 * A call to a compiler builtin, written either as a free call (`print(x)`)
 * or as method sugar (`x.type()`); in the sugar form the receiver is `args[0]`.
 */
export interface BuiltinCall {
	readonly kind: "BuiltinCall"
	readonly builtin: Builtin
	readonly args: Expr[]
	readonly span: Span
}

export interface IndexAccess {
	readonly kind: "IndexAccess"
	readonly object: Expr
	readonly index: Expr
	readonly span: Span
}

export interface ArrayLiteral {
	readonly kind: "ArrayLiteral"
	readonly elements: Expr[]
	readonly span: Span
}

/** Function value literal: `R (T a, ...) { ... }`. */
export interface Lambda {
	readonly kind: "Lambda"
	readonly returnType: TypeNode
	readonly params: Param[]
	readonly body: Block
	readonly span: Span
}

export interface GroupExpr {
	readonly kind: "GroupExpr"
	readonly expr: Expr
	readonly span: Span
}
