// Text form of an IR module, in LLVM assembly style. Register-resident locals
// are declared at the top of each function and read with local.get/local.set.

import type { ExternDecl, IRFunction, IRModule, Instruction, Operand, Terminator } from "./ir"
import type { Type } from "./types"

export function printModule(module: IRModule): string {
	const externs = new Map(module.externs.map((e) => [e.name, e]))
	const out: string[] = [`; ModuleID = '${module.name}'`, `source_filename = "${module.sourcePath}"`]

	if (module.globals.length > 0) {
		out.push("")
		for (const g of module.globals) {
			const bytes = new TextEncoder().encode(g.value)
			out.push(`@${g.name} = private unnamed_addr constant [${bytes.length + 1} x i8] c"${escapeBytes(bytes)}\\00"`)
		}
	}

	if (module.externs.length > 0) {
		out.push("")
		for (const e of module.externs) {
			out.push(`declare ${irType(e.returnType)} @${e.name}(${externParams(e)})`)
		}
	}

	for (const fn of module.functions) {
		out.push("", ...printFunction(fn, externs))
	}

	return `${out.join("\n")}\n`
}

export function irType(type: Type): string {
	switch (type.kind) {
		case "int":
			return `i${type.width}`
		case "bool":
			return "i1"
		case "str":
		case "pointer":
		case "function":
			return "ptr"
		case "array":
			return `[${type.length} x ${irType(type.inner)}]`
		case "void":
			return "void"
	}
}

// --- Functions ---

function printFunction(fn: IRFunction, externs: Map<string, ExternDecl>): string[] {
	const params = fn.params.map((p) => `${irType(p.type)} %${p.id}`).join(", ")
	const lines = [`define ${irType(fn.returnType)} @${fn.name}(${params}) {`]
	for (const local of fn.locals) {
		lines.push(`  local ${irType(local.type)} $${local.name}`)
	}
	fn.blocks.forEach((block, i) => {
		if (i > 0 || fn.locals.length > 0) lines.push("")
		lines.push(`${block.label}:`)
		for (const inst of block.instructions) {
			lines.push(`  ${printInstruction(inst, externs)}`)
		}
		lines.push(`  ${printTerminator(block.terminator)}`)
	})
	lines.push("}")
	return lines
}

function printInstruction(inst: Instruction, externs: Map<string, ExternDecl>): string {
	switch (inst.kind) {
		case "alloca":
			return `%${inst.dest.id} = alloca ${irType(inst.allocated)}`
		case "load":
			return `%${inst.dest.id} = load ${irType(inst.dest.type)}, ptr ${operand(inst.ptr)}`
		case "store":
			return `store ${typed(inst.value)}, ptr ${operand(inst.ptr)}`
		case "local.get":
			return `%${inst.dest.id} = local.get ${irType(inst.dest.type)} $${inst.local}`
		case "local.set":
			return `local.set ${irType(inst.value.type)} $${inst.local}, ${operand(inst.value)}`
		case "binary":
			return `%${inst.dest.id} = ${inst.op} ${typed(inst.lhs)}, ${operand(inst.rhs)}`
		case "icmp":
			return `%${inst.dest.id} = icmp ${inst.pred} ${typed(inst.lhs)}, ${operand(inst.rhs)}`
		case "not":
			return `%${inst.dest.id} = xor ${typed(inst.operand)}, true`
		case "cast":
			return `%${inst.dest.id} = ${inst.op} ${typed(inst.value)} to ${irType(inst.dest.type)}`
		case "gep": {
			const dest = `%${inst.dest.id} = getelementptr`
			const pointee = inst.base.type.kind === "pointer" ? inst.base.type.inner : inst.base.type
			if (inst.throughArray) {
				return `${dest} ${irType(pointee)}, ptr ${operand(inst.base)}, i64 0, ${typed(inst.index)}`
			}
			return `${dest} ${irType(pointee)}, ptr ${operand(inst.base)}, ${typed(inst.index)}`
		}
		case "select":
			return `%${inst.dest.id} = select ${typed(inst.cond)}, ${typed(inst.ifTrue)}, ${typed(inst.ifFalse)}`
		case "call": {
			const callee = inst.callee
			const returns = callee.type.kind === "function" ? callee.type.returns : undefined
			const extern = callee.kind === "func" ? externs.get(callee.name) : undefined
			// Variadic callees spell out their full signature
			const signature = extern?.variadic ? ` (${externParams(extern)})` : ""
			const call = `call ${returns ? irType(returns) : "void"}${signature} ${operand(callee)}(${inst.args.map(typed).join(", ")})`
			return inst.dest ? `%${inst.dest.id} = ${call}` : call
		}
	}
}

function printTerminator(term: Terminator): string {
	switch (term.kind) {
		case "br":
			return `br label %${term.target}`
		case "condbr":
			return `br ${typed(term.cond)}, label %${term.ifTrue}, label %${term.ifFalse}`
		case "ret":
			return term.value ? `ret ${typed(term.value)}` : "ret void"
		case "unreachable":
			return "unreachable"
	}
}

// --- Operands ---

function operand(op: Operand): string {
	switch (op.kind) {
		case "reg":
			return `%${op.id}`
		case "const":
			if (op.type.kind === "bool") return op.value === 0n ? "false" : "true"
			return op.value.toString()
		case "global":
		case "func":
			return `@${op.name}`
		case "zero":
			switch (op.type.kind) {
				case "array":
					return "zeroinitializer"
				case "int":
					return "0"
				case "bool":
					return "false"
				default:
					return "null"
			}
	}
}

function typed(op: Operand): string {
	return `${irType(op.type)} ${operand(op)}`
}

function externParams(e: ExternDecl): string {
	const params = e.params.map(irType)
	if (e.variadic) params.push("...")
	return params.join(", ")
}

// Printable ASCII stays as is; quotes, backslashes and everything else become \XX
function escapeBytes(bytes: Uint8Array): string {
	let out = ""
	for (const byte of bytes) {
		if (byte >= 0x20 && byte <= 0x7e && byte !== 0x22 && byte !== 0x5c) {
			out += String.fromCharCode(byte)
		} else {
			out += `\\${byte.toString(16).toUpperCase().padStart(2, "0")}`
		}
	}
	return out
}
