import { describe, expect, it } from "vitest"
import type { Program, Stmt } from "../ast"
import type { Diagnostic } from "../errors"
import { lex } from "../lexer"
import { parse } from "../parser"
import { type Analysis, resolve } from "../resolver"
import { typeToString } from "../types"

function parseOk(source: string): Program {
	const { program, errors } = parse(lex(source).tokens)
	if (errors.hasErrors()) {
		throw new Error(`Parse errors: ${errors.diagnostics.map((e) => e.message).join("; ")}`)
	}
	return program
}

function analyze(source: string): Analysis {
	return resolve(parseOk(source))
}

function diagnostics(source: string): Diagnostic[] {
	return analyze(source).errors.diagnostics
}

function codes(source: string): string[] {
	return diagnostics(source).map((d) => d.code)
}

function stmtAt(program: Program, index: number): Stmt {
	const stmt = program.stmts[index]
	if (!stmt) throw new Error(`no statement at ${index}`)
	return stmt
}

describe("Resolver", () => {
	describe("valid programs", () => {
		it("accepts a program using every statement form", () => {
			const source = `
				define int32 add(int32 a, int32 b) { return a + b; }
				int32 total = 0;
				for i in 4 { total += add(i, 1); }
				while total > 0 { total--; if total == 2 { break; } }
				int32[2] xs = [1, 2];
				int32* p = &xs[0];
				*p = 5;
				print(total, xs, "done", true);
			`
			expect(codes(source)).toEqual([])
		})

		it("allows shadowing in an inner block", () => {
			expect(codes("int32 x = 1; { int32 x = 2; }")).toEqual([])
		})

		it("lets named functions call each other regardless of order", () => {
			expect(codes("define int32 a() { return b(); } define int32 b() { return 1; } print(a());")).toEqual([])
		})

		it("infers fn<R> parameters from the initializer", () => {
			const source = "define int32 add(int32 a, int32 b) { return a + b; } fn<int32> f = add; print(f(1, 2));"
			expect(codes(source)).toEqual([])
		})

		it("takes a literal's width from the other operand", () => {
			const program = parseOk("int8 a = 1; auto b = 2 + a;")
			const analysis = resolve(program)
			const decl = stmtAt(program, 1)
			if (decl.kind !== "VarDecl") throw new Error("expected VarDecl")
			const symbol = analysis.declarations.get(decl)
			expect(symbol && typeToString(symbol.type)).toBe("int8")
		})

		it("defaults an unconstrained literal to the narrowest width that fits", () => {
			const program = parseOk("auto a = 5; auto b = 5000000000;")
			const analysis = resolve(program)
			const types = program.stmts.map((s) => {
				if (s.kind !== "VarDecl") return null
				const symbol = analysis.declarations.get(s)
				return symbol ? typeToString(symbol.type) : null
			})
			expect(types).toEqual(["int32", "int64"])
		})
	})

	describe("storage classification", () => {
		it("moves address-taken variables and arrays into slots", () => {
			const program = parseOk("int32 a = 5; int32* p = &a; int32 b = 1; int32[2] xs = [1, 2];")
			const analysis = resolve(program)
			const storage = program.stmts.map((s) => {
				if (s.kind !== "VarDecl") return null
				return analysis.declarations.get(s)?.storage ?? null
			})
			expect(storage).toEqual(["slot", "register", "register", "slot"])
		})
	})

	describe("functions", () => {
		it("puts the entry function first, then named functions, then lambdas", () => {
			const analysis = analyze("define void f() { } auto g = int32 () { return 1; };")
			expect(analysis.functions.map((fn) => fn.name)).toEqual(["main", "f", "lambda.0"])
		})

		it("reserves main for the entry point", () => {
			expect(codes("define int32 main() { return 0; }")).toEqual(["Redeclaration"])
		})

		it("rejects nested function definitions", () => {
			expect(codes("if true { define void f() { } }")).toEqual(["InvalidStatement"])
		})

		it("reports a missing return", () => {
			const [d] = diagnostics("define int32 f(bool c) { if c { return 1; } }")
			expect(d).toMatchObject({
				code: "MissingReturn",
				message: "function 'f' must return int32 on every path",
			})
		})

		it("accepts if/else that returns on both branches", () => {
			expect(codes("define int32 f(bool c) { if c { return 1; } else { return 2; } }")).toEqual([])
		})

		it("rejects return and break outside their context", () => {
			expect(codes("return;")).toEqual(["InvalidStatement"])
			expect(codes("break;")).toEqual(["InvalidStatement"])
		})

		it("checks return values against the declared type", () => {
			expect(diagnostics('define int32 f() { return "x"; }')[0]?.message).toBe("return value: expected int32, found str")
			expect(codes("define void f() { return 1; }")).toEqual(["TypeMismatch"])
		})

		it("does not let named functions see top-level variables", () => {
			const [d] = diagnostics("int32 g = 1; define int32 f() { return g; }")
			expect(d).toMatchObject({ code: "UndefinedSymbol", message: "undefined symbol 'g'", hint: undefined })
		})

		it("does not let function values capture locals", () => {
			const [d] = diagnostics("int32 x = 1; auto f = int32 () { return x; };")
			expect(d).toMatchObject({
				code: "UndefinedSymbol",
				hint: "function values cannot capture local variables of an enclosing function",
			})
		})
	})

	describe("errors", () => {
		it("rejects a string initialised with an integer", () => {
			expect(diagnostics("str x = 5;")).toEqual([
				{
					severity: "error",
					stage: "semantic",
					code: "TypeMismatch",
					message: "expected str, found int32",
					line: 1,
					column: 9,
					hint: undefined,
				},
			])
		})

		it("names an undefined symbol and its position", () => {
			expect(diagnostics("print(y);")[0]).toMatchObject({
				code: "UndefinedSymbol",
				message: "undefined symbol 'y'",
				line: 1,
				column: 7,
			})
		})

		it("points a redeclaration at the previous one", () => {
			expect(diagnostics("int32 x = 1;\nint32 x = 2;")[0]).toMatchObject({
				code: "Redeclaration",
				line: 2,
				column: 1,
				hint: "previous declaration at 1:1",
			})
		})

		it("rejects redefining a builtin", () => {
			expect(diagnostics("int32 print = 1;")[0]?.message).toBe("cannot redefine builtin 'print'")
		})

		it("reports arity mismatches", () => {
			const [d] = diagnostics("define int32 add(int32 a, int32 b) { return a + b; } print(add(1));")
			expect(d).toMatchObject({ code: "ArityMismatch", message: "'add' expects 2 argument(s), found 1" })
		})

		it("rejects literals that do not fit", () => {
			expect(diagnostics("int8 x = 300;")[0]?.message).toBe("integer literal 300 does not fit in int8")
			expect(codes("int8 x = -128;")).toEqual([])
		})

		it("requires matching integer widths", () => {
			expect(diagnostics("int32 a = 1; int64 b = 2; auto c = a + b;")).toEqual([
				expect.objectContaining({
					code: "TypeMismatch",
					message: "operator '+' requires integer operands of the same width, found int32 and int64",
				}),
			])
		})

		it("suggests concat for string addition", () => {
			expect(diagnostics('auto s = "a" + "b";')[0]?.hint).toBe("use concat() to join strings")
		})

		it("rejects taking the address of a value", () => {
			expect(codes("int32* p = &5;")).toEqual(["InvalidAddressOf"])
		})

		it("rejects dereferencing a non-pointer", () => {
			expect(diagnostics("int32 a = 1; int32 b = *a;")[0]).toMatchObject({
				code: "InvalidDeref",
				message: "cannot dereference a value of type int32",
			})
		})

		it("rejects a constant index past the end of an array", () => {
			expect(diagnostics("int32[3] xs = [1, 2, 3]; print(xs[3]);")[0]).toMatchObject({
				code: "IndexOutOfRange",
				message: "index 3 is out of range for int32[3]",
			})
		})

		it("cannot infer auto without an initializer", () => {
			expect(codes("auto x;")).toEqual(["CannotInferType"])
			expect(codes("auto xs = [];")).toEqual(["CannotInferType"])
		})

		it("requires bool operands for logical operators", () => {
			expect(codes("bool a = true; bool b = 1 < 2 && a || false;")).toEqual([])
			expect(diagnostics("bool a = 1 && true;").map((d) => d.message)).toEqual([
				"operator '&&' requires bool operands, found int32 and bool",
			])
		})

		it("converts integers and bools with to_str", () => {
			expect(codes("int8 x = 1; str a = x.to_str(); str b = to_str(true);")).toEqual([])
			expect(diagnostics('print("s".to_str());').map((d) => d.message)).toEqual([
				"to_str() requires an integer or bool, found str",
			])
		})

		it("reserves the runtime library's function names", () => {
			const definitions: [string, string][] = [
				["printf", "define int32 printf(str a, int32 b) { return 7; }"],
				["tpl_concat", 'define str tpl_concat(str a, str b) { return "X"; }'],
				["tpl_i128_to_str", 'define str tpl_i128_to_str(int128 v) { return "0"; }'],
			]
			for (const [name, source] of definitions) {
				expect(diagnostics(source).map((d) => [d.code, d.message])).toEqual([
					["Redeclaration", `'${name}' is reserved for the runtime library`],
				])
			}
		})

		it("bounds the number of elements in an array type", () => {
			expect(codes("int32[65536] xs;")).toEqual([])
			expect(diagnostics("int32[5000000000] a;").map((d) => [d.code, d.message])).toEqual([
				["TypeMismatch", "array type int32[5000000000] exceeds the limit of 65536 elements"],
			])
			expect(diagnostics("int32[300][300] grid;")[0]?.message).toBe(
				"array type int32[300][300] exceeds the limit of 65536 elements",
			)
		})

		it("rejects void variables", () => {
			expect(diagnostics("void v;")[0]?.message).toBe("'void' is only valid as a function return type")
		})

		it("rejects assignment to a call result", () => {
			expect(codes("define int32 one() { return 1; } one() = 2;")).toEqual(["InvalidAssignment"])
		})

		it("requires bool conditions", () => {
			expect(diagnostics("if 1 { }")[0]?.message).toBe("if condition must be bool, found int32")
		})

		it("does not cascade from a failed declaration", () => {
			expect(codes("int32 x = undefinedThing; print(x + 1); x = 3;")).toEqual(["UndefinedSymbol"])
		})

		it("collects every error in the program", () => {
			expect(codes('str a = 1;\nprint(b);\nint8 c = 999;\nbool d = "x";')).toEqual([
				"TypeMismatch",
				"UndefinedSymbol",
				"TypeMismatch",
				"TypeMismatch",
			])
		})
	})
})
