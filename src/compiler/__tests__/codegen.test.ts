import { describe, expect, it } from "vitest"
import { codegen } from "../codegen"
import { compileOrThrow } from "../compile"
import { CodegenError } from "../errors"
import type { IRFunction, IRModule, Instruction } from "../ir"
import { lex } from "../lexer"
import { parse } from "../parser"
import { resolve } from "../resolver"

function compileModule(source: string): IRModule {
	return compileOrThrow(source, "test.tpl")
}

function fn(module: IRModule, name: string): IRFunction {
	const found = module.functions.find((f) => f.name === name)
	if (!found) throw new Error(`no function '${name}'`)
	return found
}

function instructions(f: IRFunction): Instruction[] {
	return f.blocks.flatMap((b) => [...b.instructions])
}

describe("codegen", () => {
	describe("storage", () => {
		it("keeps plain variables in locals and address-taken ones in slots", () => {
			const main = fn(compileModule("int32 a = 5; int32* p = &a; int32 b = 1;"), "main")
			expect(main.locals.map((l) => l.name)).toEqual(["p", "b"])
			const kinds = instructions(main).map((i) => i.kind)
			expect(kinds[0]).toBe("alloca")
			expect(kinds.filter((k) => k === "alloca")).toHaveLength(1)
		})

		it("renames locals that shadow each other", () => {
			const main = fn(compileModule("int32 x = 1; { int32 x = 2; }"), "main")
			expect(main.locals.map((l) => l.name)).toEqual(["x", "x.1"])
		})

		it("hoists every slot into the entry block", () => {
			const main = fn(compileModule("for i in 2 { int32[2] xs = [i, i]; print(xs); }"), "main")
			const [entry, ...rest] = main.blocks
			expect(entry?.instructions.some((i) => i.kind === "alloca")).toBe(true)
			expect(rest.flatMap((b) => b.instructions).some((i) => i.kind === "alloca")).toBe(false)
		})

		it("copies parameters into their storage on entry", () => {
			const add = fn(compileModule("define int32 add(int32 a, int32 b) { return a + b; }"), "add")
			expect(add.params.map((p) => p.id)).toEqual([0, 1])
			expect(add.blocks[0]?.instructions.slice(0, 2)).toEqual([
				{ kind: "local.set", local: "a", value: add.params[0] },
				{ kind: "local.set", local: "b", value: add.params[1] },
			])
		})
	})

	describe("control flow", () => {
		it("lowers for-in to header, body, latch and exit blocks", () => {
			const main = fn(compileModule("for i in 3 { print(i); }"), "main")
			expect(main.blocks.map((b) => b.label)).toEqual(["entry", "for.cond.0", "for.body.1", "for.latch.2", "for.end.3"])
			expect(main.locals.map((l) => l.name)).toEqual(["i.counter", "i"])
			expect(main.blocks[1]?.terminator).toMatchObject({ kind: "condbr", ifTrue: "for.body.1", ifFalse: "for.end.3" })
			expect(main.blocks[3]?.terminator).toEqual({ kind: "br", target: "for.cond.0" })
		})

		it("branches to the loop exit on break", () => {
			const main = fn(compileModule("while true { break; }"), "main")
			expect(main.blocks.map((b) => b.label)).toEqual(["entry", "while.cond.0", "while.body.1", "while.end.2"])
			expect(main.blocks[2]?.terminator).toEqual({ kind: "br", target: "while.end.2" })
		})

		it("builds then, else and merge blocks", () => {
			const main = fn(compileModule("bool c = true; if c { print(1); } else { print(2); }"), "main")
			expect(main.blocks.map((b) => b.label)).toEqual(["entry", "if.then.0", "if.else.1", "if.end.2"])
		})

		it("returns zero from main and nothing from void functions", () => {
			const module = compileModule('define void hello() { print("hi"); } hello();')
			const main = fn(module, "main")
			const hello = fn(module, "hello")
			expect(main.blocks[main.blocks.length - 1]?.terminator).toMatchObject({
				kind: "ret",
				value: { kind: "const", value: 0n },
			})
			expect(hello.blocks[hello.blocks.length - 1]?.terminator).toEqual({ kind: "ret", value: null })
		})

		it("marks the fall-off end of a function that returns on every branch unreachable", () => {
			const f = fn(compileModule("define int32 f(bool c) { if c { return 1; } else { return 2; } }"), "f")
			expect(f.blocks[f.blocks.length - 1]).toMatchObject({ label: "if.end.2", terminator: { kind: "unreachable" } })
		})
	})

	describe("functions", () => {
		it("lowers function values to module-level functions", () => {
			const module = compileModule("auto f = int32 (int32 x) { return x * 2; }; print(f(21));")
			expect(module.functions.map((f) => f.name)).toEqual(["main", "lambda.0"])
			const call = instructions(fn(module, "main")).find((i) => i.kind === "call" && i.callee.kind === "reg")
			expect(call).toBeDefined()
		})

		it("calls named functions directly", () => {
			const module = compileModule("define int32 one() { return 1; } print(one());")
			const calls = instructions(fn(module, "main")).filter((i) => i.kind === "call")
			expect(calls.map((c) => (c.kind === "call" && c.callee.kind === "func" ? c.callee.name : null))).toEqual([
				"one",
				"printf",
			])
		})
	})

	describe("module contents", () => {
		it("declares externs only when used", () => {
			expect(compileModule("int32 x = 1;").externs).toEqual([])
			expect(compileModule('auto s = concat("a", "b");').externs.map((e) => e.name)).toEqual(["tpl_concat"])
		})

		it("never defines a function under a runtime symbol's name", () => {
			const module = compileModule('auto s = concat(to_str(1), "x"); print(s);')
			const defined = module.functions.map((f) => f.name)
			expect(module.externs.map((e) => e.name)).toEqual(["tpl_i128_to_str", "tpl_concat", "printf"])
			for (const extern of module.externs) {
				expect(defined).not.toContain(extern.name)
			}
		})

		it("interns string constants", () => {
			const module = compileModule('print("x"); print("x");')
			expect(module.globals).toEqual([
				{ name: ".str.0", value: "x" },
				{ name: ".str.1", value: "%s\n" },
			])
		})

		it("builds print formats from static types", () => {
			const module = compileModule('int8 a = 1; int64 b = 2; int128 c = 3; print(a, b, c, true, "s", [1, 2]);')
			expect(module.globals.map((g) => g.value)).toContain("%d %lld %s %s %s [%d, %d]\n")
			expect(module.externs.map((e) => e.name)).toEqual(["tpl_i128_to_str", "printf"])
		})

		it("quotes string elements of printed arrays", () => {
			const module = compileModule('print(["a", "b"]);')
			expect(module.globals.map((g) => g.value)).toContain('["%s", "%s"]\n')
		})

		it("resolves type() statically", () => {
			const module = compileModule("int32* p; print(p.type());")
			expect(module.globals.map((g) => g.value)).toEqual(["int32*", "%s\n"])
		})
	})

	it("throws CodegenError when the analysis is incomplete", () => {
		const { program } = parse(lex("int32 x = 1; print(x);").tokens)
		const analysis = resolve(program)
		analysis.exprTypes.clear()
		expect(() => codegen(analysis, "test", "test.tpl")).toThrow(CodegenError)
	})
})
