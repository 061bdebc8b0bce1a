// IR for tpl: an LLVM-flavoured module of functions made of basic blocks.
// Values are typed with the language's own types; `printModule` gives the text form.

import type { FunctionType, Type } from "./types"

// --- Operands ---

/** A virtual register, numbered per function. Parameters take the first ids. */
export interface Reg {
	readonly kind: "reg"
	readonly id: number
	readonly type: Type
}

export type Operand =
	| Reg
	// Integer constant; booleans use 0 and 1
	| { readonly kind: "const"; readonly value: bigint; readonly type: Type }
	// Address of a string constant
	| { readonly kind: "global"; readonly name: string; readonly type: Type }
	| { readonly kind: "func"; readonly name: string; readonly type: FunctionType }
	// Null pointer, null function value or all-zero array
	| { readonly kind: "zero"; readonly type: Type }

// --- Instructions ---

// `and` and `or` only take i1 operands
export type BinaryOpcode = "add" | "sub" | "mul" | "sdiv" | "srem" | "and" | "or"

export type IcmpPredicate = "eq" | "ne" | "slt" | "sgt" | "sle" | "sge"

export type CastOpcode = "trunc" | "sext" | "zext"

export type Instruction =
	| AllocaInst
	| LoadInst
	| StoreInst
	| LocalGetInst
	| LocalSetInst
	| BinaryInst
	| IcmpInst
	| NotInst
	| CastInst
	| ElementPtrInst
	| SelectInst
	| CallInst

/** Reserves a stack slot; `dest` is a pointer to it. */
export interface AllocaInst {
	readonly kind: "alloca"
	readonly dest: Reg
	readonly allocated: Type
}

export interface LoadInst {
	readonly kind: "load"
	readonly dest: Reg
	readonly ptr: Operand
}

export interface StoreInst {
	readonly kind: "store"
	readonly ptr: Operand
	readonly value: Operand
}

/** Reads a register-resident function local. */
export interface LocalGetInst {
	readonly kind: "local.get"
	readonly dest: Reg
	readonly local: string
}

export interface LocalSetInst {
	readonly kind: "local.set"
	readonly local: string
	readonly value: Operand
}

export interface BinaryInst {
	readonly kind: "binary"
	readonly op: BinaryOpcode
	readonly dest: Reg
	readonly lhs: Operand
	readonly rhs: Operand
}

export interface IcmpInst {
	readonly kind: "icmp"
	readonly pred: IcmpPredicate
	readonly dest: Reg
	readonly lhs: Operand
	readonly rhs: Operand
}

export interface NotInst {
	readonly kind: "not"
	readonly dest: Reg
	readonly operand: Operand
}

/** Integer width change; the target type is `dest.type`. */
export interface CastInst {
	readonly kind: "cast"
	readonly op: CastOpcode
	readonly dest: Reg
	readonly value: Operand
}

/**
 * Address computation. With `throughArray` the base points at an array and
 * the result points at its `index`th element; otherwise the base is a plain
 * pointer offset by `index` elements.
 */
export interface ElementPtrInst {
	readonly kind: "gep"
	readonly dest: Reg
	readonly base: Operand
	readonly index: Operand
	readonly throughArray: boolean
}

export interface SelectInst {
	readonly kind: "select"
	readonly dest: Reg
	readonly cond: Operand
	readonly ifTrue: Operand
	readonly ifFalse: Operand
}

/** Direct call when `callee` is a `func` operand, indirect through a register otherwise. */
export interface CallInst {
	readonly kind: "call"
	readonly dest: Reg | null
	readonly callee: Operand
	readonly args: readonly Operand[]
}

// --- Terminators ---

export type Terminator =
	| { readonly kind: "br"; readonly target: string }
	| { readonly kind: "condbr"; readonly cond: Operand; readonly ifTrue: string; readonly ifFalse: string }
	| { readonly kind: "ret"; readonly value: Operand | null }
	| { readonly kind: "unreachable" }

// --- Structure ---

export interface BasicBlock {
	readonly label: string
	readonly instructions: readonly Instruction[]
	readonly terminator: Terminator
}

export interface LocalDecl {
	readonly name: string
	readonly type: Type
}

export interface IRFunction {
	readonly name: string
	readonly params: readonly Reg[]
	readonly returnType: Type
	readonly locals: readonly LocalDecl[]
	readonly blocks: readonly BasicBlock[]
}

export interface ExternDecl {
	readonly name: string
	readonly params: readonly Type[]
	readonly returnType: Type
	readonly variadic: boolean
}

/** A NUL-terminated string constant. */
export interface GlobalString {
	readonly name: string
	readonly value: string
}

export interface IRModule {
	readonly name: string
	readonly sourcePath: string
	readonly globals: readonly GlobalString[]
	readonly externs: readonly ExternDecl[]
	readonly functions: readonly IRFunction[]
}
