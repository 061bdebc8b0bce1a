// Resolved type system for tpl, used by the resolver, codegen and the IR.

export type IntWidth = 8 | 16 | 32 | 64 | 128

export const INT_WIDTHS: readonly IntWidth[] = [8, 16, 32, 64, 128]

export type Type =
	| { readonly kind: "int"; readonly width: IntWidth }
	| { readonly kind: "bool" }
	| { readonly kind: "str" }
	| { readonly kind: "void" }
	| { readonly kind: "pointer"; readonly inner: Type }
	| { readonly kind: "array"; readonly inner: Type; readonly length: number }
	| { readonly kind: "function"; readonly params: readonly Type[]; readonly returns: Type }

export type IntType = Extract<Type, { kind: "int" }>
export type PointerType = Extract<Type, { kind: "pointer" }>
export type ArrayType = Extract<Type, { kind: "array" }>
export type FunctionType = Extract<Type, { kind: "function" }>

// Singleton primitive types
export const INT8: IntType = { kind: "int", width: 8 }
export const INT16: IntType = { kind: "int", width: 16 }
export const INT32: IntType = { kind: "int", width: 32 }
export const INT64: IntType = { kind: "int", width: 64 }
export const INT128: IntType = { kind: "int", width: 128 }
export const BOOL: Type = { kind: "bool" }
export const STR: Type = { kind: "str" }
export const VOID: Type = { kind: "void" }

export function intType(width: IntWidth): IntType {
	switch (width) {
		case 8:
			return INT8
		case 16:
			return INT16
		case 32:
			return INT32
		case 64:
			return INT64
		case 128:
			return INT128
	}
}

export function pointerTo(inner: Type): PointerType {
	return { kind: "pointer", inner }
}

export function arrayOf(inner: Type, length: number): ArrayType {
	return { kind: "array", inner, length }
}

/** Largest number of scalar elements one array type may hold, nested dimensions multiplied. */
export const MAX_ARRAY_ELEMENTS = 65_536

/** Scalar elements in a value of this type: 1 for scalars, the product of the dimensions for arrays. */
export function elementCount(t: Type): number {
	return t.kind === "array" ? t.length * elementCount(t.inner) : 1
}

export function functionType(params: readonly Type[], returns: Type): FunctionType {
	return { kind: "function", params, returns }
}

export function typeEq(a: Type, b: Type): boolean {
	switch (a.kind) {
		case "int":
			return b.kind === "int" && a.width === b.width
		case "bool":
		case "str":
		case "void":
			return a.kind === b.kind
		case "pointer":
			return b.kind === "pointer" && typeEq(a.inner, b.inner)
		case "array":
			return b.kind === "array" && a.length === b.length && typeEq(a.inner, b.inner)
		case "function":
			return (
				b.kind === "function" &&
				a.params.length === b.params.length &&
				a.params.every((p, i) => {
					const other = b.params[i]
					return other !== undefined && typeEq(p, other)
				}) &&
				typeEq(a.returns, b.returns)
			)
	}
}

/** Canonical source-level spelling of a type, as reported by `.type()`. */
export function typeToString(t: Type): string {
	switch (t.kind) {
		case "int":
			return `int${t.width}`
		case "bool":
		case "str":
		case "void":
			return t.kind
		case "pointer":
			return `${typeToString(t.inner)}*`
		case "array":
			return `${typeToString(t.inner)}[${t.length}]`
		case "function":
			return `fn<${typeToString(t.returns)}>(${t.params.map(typeToString).join(", ")})`
	}
}

export function isInt(t: Type): t is IntType {
	return t.kind === "int"
}

/** Types that `print` can format directly. */
export function isPrintableScalar(t: Type): boolean {
	return t.kind === "int" || t.kind === "bool" || t.kind === "str"
}

export function isIntWidth(n: number): n is IntWidth {
	return n === 8 || n === 16 || n === 32 || n === 64 || n === 128
}

/** Inclusive signed range of an integer width. */
export function intRange(width: IntWidth): { readonly min: bigint; readonly max: bigint } {
	const half = 1n << BigInt(width - 1)
	return { min: -half, max: half - 1n }
}

export function fitsWidth(value: bigint, width: IntWidth): boolean {
	const { min, max } = intRange(width)
	return value >= min && value <= max
}
