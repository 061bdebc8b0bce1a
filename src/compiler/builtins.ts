import type { Builtin } from "./ast"
import { isIntWidth } from "./types"

const CONVERT_PREFIX = "to_int"

/** Maps a callee name to the builtin it denotes, or null for ordinary names. */
export function builtinByName(name: string): Builtin | null {
	switch (name) {
		case "print":
		case "concat":
		case "type":
		case "len":
		case "to_str":
			return { name }
	}
	if (name.startsWith(CONVERT_PREFIX)) {
		const width = Number(name.slice(CONVERT_PREFIX.length))
		if (isIntWidth(width) && name === `${CONVERT_PREFIX}${width}`) {
			return { name: "convert", width }
		}
	}
	return null
}

export function isBuiltinName(name: string): boolean {
	return builtinByName(name) !== null
}

export function builtinSpelling(builtin: Builtin): string {
	return builtin.name === "convert" ? `${CONVERT_PREFIX}${builtin.width}` : builtin.name
}
