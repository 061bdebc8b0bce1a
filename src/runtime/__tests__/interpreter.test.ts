import { describe, expect, it } from "vitest"
import { compileOrThrow } from "../../compiler/compile"
import type { IRModule } from "../../compiler/ir"
import { INT32, arrayOf, pointerTo } from "../../compiler/types"
import {
	DEFAULT_MAX_CALL_DEPTH,
	type ExecuteOptions,
	type ExecutionResult,
	MAX_ALLOCATION_CELLS,
	RuntimeTrap,
	execute,
} from "../interpreter"

function run(source: string, options?: ExecuteOptions): ExecutionResult {
	return execute(compileOrThrow(source, "test.tpl"), options)
}

function output(source: string): string {
	const result = run(source)
	if (result.trap) throw result.trap
	return result.output
}

describe("execute", () => {
	describe("printing", () => {
		it("formats each argument by its static type", () => {
			expect(output('print(true, 1 < 2, "s", 7);')).toBe("true true s 7\n")
		})

		it("prints arrays with quoted strings", () => {
			expect(output('str[2] names = ["a", "b"]; print(names, [1, 2, 3]);')).toBe('["a", "b"] [1, 2, 3]\n')
		})

		it("prints an empty line without arguments", () => {
			expect(output("print();")).toBe("\n")
		})

		it("prints int128 values in full", () => {
			const max = "170141183460469231731687303715884105727"
			expect(output(`int128 big = ${max}; print(big);`)).toBe(`${max}\n`)
		})

		it("converts values to text with to_str", () => {
			const max = "170141183460469231731687303715884105727"
			const source = `int8 a = -5; int128 b = ${max}; print(concat(a.to_str(), "!"), b.to_str(), to_str(false));`
			expect(output(source)).toBe(`-5! ${max} false\n`)
		})

		it("joins strings with concat", () => {
			expect(output('print(concat("foo", "bar"));')).toBe("foobar\n")
		})

		it("reports static types", () => {
			const source = `
				define int32 add(int32 a, int32 b) { return a + b; }
				int32* p;
				print(p.type(), type(5), [1, 2].type(), add.type());
			`
			expect(output(source)).toBe("int32* int32 int32[2] fn<int32>(int32, int32)\n")
		})
	})

	describe("integers", () => {
		it("wraps at the declared width", () => {
			expect(output("int8 x = 127; x++; print(x);")).toBe("-128\n")
		})

		it("converts between widths", () => {
			expect(output("int32 x = 300; print(to_int8(x), to_int64(x), to_int32(true));")).toBe("44 300 1\n")
		})

		it("divides toward zero", () => {
			expect(output("print(-7 / 2, -7 % 2);")).toBe("-3 -1\n")
		})

		it("applies compound assignment", () => {
			expect(output("int32 s = 0; for i in 4 { s += i; } s *= 10; s -= 1; s /= 2; print(s);")).toBe("29\n")
		})
	})

	describe("memory", () => {
		it("writes through pointers", () => {
			expect(output("int32 a = 5; int32* b = &a; *b = 100; print(a);")).toBe("100\n")
		})

		it("steps pointers within an array", () => {
			expect(output("int32[3] xs = [1, 2, 3]; int32* p = &xs[1]; *p = 20; p[1] = 30; print(xs);")).toBe(
				"[1, 20, 30]\n",
			)
		})

		it("copies arrays on assignment", () => {
			expect(output("int32[2] a = [1, 2]; int32[2] b = a; b[0] = 9; print(a, b);")).toBe("[1, 2] [9, 2]\n")
		})

		it("zero-initialises declarations without a value", () => {
			expect(output('int32 n; bool b; str s; int32[2] xs; print(n, b, s, xs, "end");')).toBe("0 false  [0, 0] end\n")
		})
	})

	describe("control flow and functions", () => {
		it("runs for-in from zero to the bound", () => {
			expect(output("for i in 5 { print(i); }")).toBe("0\n1\n2\n3\n4\n")
		})

		it("leaves a loop on break", () => {
			expect(output("int32 i = 0; while true { if i == 3 { break; } i++; } print(i);")).toBe("3\n")
		})

		it("combines conditions with && and ||", () => {
			expect(output("print(true && false, true || false, 1 < 2 && 3 > 2);")).toBe("false true true\n")
			expect(output("int32 n = 4; if n > 0 && n < 10 || n == 100 { print(n); }")).toBe("4\n")
		})

		it("follows else-if chains", () => {
			const source = `
				define str sign(int32 n) {
					if n < 0 { return "negative"; } else if n == 0 { return "zero"; } else { return "positive"; }
				}
				print(sign(-4), sign(0), sign(9));
			`
			expect(output(source)).toBe("negative zero positive\n")
		})

		it("recurses", () => {
			const source = "define int32 fact(int32 n) { if n <= 1 { return 1; } return n * fact(n - 1); } print(fact(10));"
			expect(output(source)).toBe("3628800\n")
		})

		it("calls function values directly and through method sugar", () => {
			const source = "auto twice = int32 (int32 x) { return x * 2; }; print(twice(4), 21.twice());"
			expect(output(source)).toBe("8 42\n")
		})

		it("passes function values as arguments", () => {
			const source = `
				define int32 apply(fn<int32>(int32) g, int32 v) { return g(v); }
				print(apply(int32 (int32 x) { return x + 1; }, 41));
			`
			expect(output(source)).toBe("42\n")
		})

		it("returns zero from main", () => {
			expect(run("print(1);").exitCode).toBe(0)
		})
	})

	describe("traps", () => {
		it("stops on division by zero", () => {
			const result = run('int32 a = 0; print("before"); print(10 / a); print("after");')
			expect(result.trap).toBeInstanceOf(RuntimeTrap)
			expect(result.trap?.message).toBe("division by zero")
			expect(result.exitCode).toBe(1)
			expect(result.output).toBe("before\n")
		})

		it("stops on a null pointer", () => {
			expect(run("int32* p; print(*p);").trap?.message).toBe("null pointer dereference")
		})

		it("stops on an out-of-range dynamic index", () => {
			expect(run("int32[2] xs = [1, 2]; int32 i = 5; print(xs[i]);").trap?.message).toBe(
				"index 5 out of range for length 2",
			)
		})

		it("stops on a null function value", () => {
			expect(run("fn<int32>(int32) g; print(g(1));").trap?.message).toBe("call through a null function value")
		})

		it("stops after the step limit", () => {
			const result = run("while true { }", { maxSteps: 1000 })
			expect(result.trap?.message).toBe("step limit of 1000 exceeded")
		})

		it("recurses close to the default depth limit", () => {
			const source = "define int64 d(int64 n) { if n == 0 { return 0; } return d(n - 1) + 1; } print(d(1990));"
			expect(output(source)).toBe("1990\n")
		})

		it("stops recursion past the default depth limit with a trap", () => {
			const source = "define int64 d(int64 n) { if n == 0 { return 0; } return d(n - 1) + 1; } print(d(5000));"
			const result = run(source)
			expect(result.trap?.message).toBe(`call depth limit of ${DEFAULT_MAX_CALL_DEPTH} exceeded`)
			expect(result.trap?.functionName).toBe("d")
			expect(result.exitCode).toBe(1)
		})

		it("stops an allocation over the memory limit", () => {
			const big = arrayOf(arrayOf(INT32, 1 << 13), 1 << 13)
			const module: IRModule = {
				name: "big",
				sourcePath: "big.tpl",
				globals: [],
				externs: [],
				functions: [
					{
						name: "main",
						params: [],
						returnType: INT32,
						locals: [],
						blocks: [
							{
								label: "entry",
								instructions: [{ kind: "alloca", dest: { kind: "reg", id: 0, type: pointerTo(big) }, allocated: big }],
								terminator: { kind: "ret", value: { kind: "const", value: 0n, type: INT32 } },
							},
						],
					},
				],
			}
			const result = execute(module)
			expect(result.trap?.message).toBe(
				`allocation of ${(1 << 13) * (1 << 13)} elements exceeds the limit of ${MAX_ALLOCATION_CELLS}`,
			)
			expect(result.exitCode).toBe(1)
		})

		it("stops runaway recursion", () => {
			const source = "define int32 down(int32 n) { return down(n + 1); } print(down(0));"
			const result = run(source, { maxCallDepth: 50 })
			expect(result.trap?.message).toBe("call depth limit of 50 exceeded")
			expect(result.trap?.functionName).toBe("down")
		})
	})
})
