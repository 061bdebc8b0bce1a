// Runtime functions the generated code calls. Their names are reserved:
// a user function may not take one.

import type { ExternDecl } from "./ir"
import { INT32, INT128, STR } from "./types"

export const PRINTF: ExternDecl = { name: "printf", params: [STR], returnType: INT32, variadic: true }
export const CONCAT: ExternDecl = { name: "tpl_concat", params: [STR, STR], returnType: STR, variadic: false }
/** Decimal text of an int128; narrower integers are sign-extended first. */
export const I128_TO_STR: ExternDecl = {
	name: "tpl_i128_to_str",
	params: [INT128],
	returnType: STR,
	variadic: false,
}

export const RUNTIME_EXTERNS: readonly ExternDecl[] = [PRINTF, CONCAT, I128_TO_STR]

export function isRuntimeSymbol(name: string): boolean {
	return RUNTIME_EXTERNS.some((e) => e.name === name)
}
