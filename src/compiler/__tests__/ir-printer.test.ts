import { describe, expect, it } from "vitest"
import { compileOrThrow } from "../compile"
import { irType, printModule } from "../ir-printer"
import { BOOL, INT64, STR, arrayOf, functionType, pointerTo } from "../types"

function printed(source: string): string {
	return printModule(compileOrThrow(source, "test.tpl"))
}

function lines(source: string): string[] {
	return printed(source)
		.split("\n")
		.map((l) => l.trim())
}

describe("printModule", () => {
	it("prints a complete module", () => {
		expect(printed("int32 a = 10; int32 b = 2; print(a + b);")).toBe(
			[
				"; ModuleID = 'test'",
				'source_filename = "test.tpl"',
				"",
				'@.str.0 = private unnamed_addr constant [4 x i8] c"%d\\0A\\00"',
				"",
				"declare i32 @printf(ptr, ...)",
				"",
				"define i32 @main() {",
				"  local i32 $a",
				"  local i32 $b",
				"",
				"entry:",
				"  local.set i32 $a, 10",
				"  local.set i32 $b, 2",
				"  %0 = local.get i32 $a",
				"  %1 = local.get i32 $b",
				"  %2 = add i32 %0, %1",
				"  %3 = call i32 (ptr, ...) @printf(ptr @.str.0, i32 %2)",
				"  ret i32 0",
				"}",
				"",
			].join("\n"),
		)
	})

	it("escapes quotes and counts UTF-8 bytes in string constants", () => {
		expect(lines('print("a\\"b");')).toContain('@.str.0 = private unnamed_addr constant [4 x i8] c"a\\22b\\00"')
		expect(lines('print("é");')).toContain('@.str.0 = private unnamed_addr constant [3 x i8] c"\\C3\\A9\\00"')
	})

	it("prints bools through a select of two strings", () => {
		const out = lines("print(true);")
		expect(out).toContain("%0 = select i1 true, ptr @.str.0, ptr @.str.1")
		expect(out).toContain("%1 = call i32 (ptr, ...) @printf(ptr @.str.2, ptr %0)")
	})

	it("prints element addresses through arrays", () => {
		const out = lines("int32[3] xs = [1, 2, 3]; print(xs[1]);")
		expect(out).toContain("%0 = alloca [3 x i32]")
		expect(out).toContain("%1 = getelementptr [3 x i32], ptr %0, i64 0, i32 0")
		expect(out).toContain("store i32 1, ptr %1")
		expect(out).toContain("%6 = getelementptr [3 x i32], ptr %5, i64 0, i32 1")
		expect(out).toContain("%7 = load i32, ptr %6")
	})

	it("prints pointer offsets without the array step", () => {
		const out = lines("int32[2] xs = [1, 2]; int32* p = &xs[0]; print(p[1]);")
		expect(out.some((l) => /^%\d+ = getelementptr i32, ptr %\d+, i32 1$/.test(l))).toBe(true)
	})

	it("prints parameters, branches and comparisons", () => {
		const out = lines("define int32 max(int32 a, int32 b) { if a > b { return a; } return b; }")
		expect(out).toContain("define i32 @max(i32 %0, i32 %1) {")
		expect(out).toContain("%4 = icmp sgt i32 %2, %3")
		expect(out).toContain("br i1 %4, label %if.then.0, label %if.end.1")
		expect(out).toContain("ret i32 %5")
	})

	it("prints conversions", () => {
		const out = lines("int32 x = 300; auto y = to_int8(x); auto z = to_int64(x); auto w = to_int32(true);")
		expect(out).toContain("%1 = trunc i32 %0 to i8")
		expect(out).toContain("%3 = sext i32 %2 to i64")
		expect(out).toContain("%4 = zext i1 true to i32")
	})

	it("prints logical operators on i1", () => {
		const out = lines("bool a = true; bool b = false; bool c = a && b; bool d = a || b;")
		expect(out).toContain("%2 = and i1 %0, %1")
		expect(out).toContain("%5 = or i1 %3, %4")
	})

	it("prints to_str through the int128 formatter", () => {
		const out = lines("int32 n = 7; str s = n.to_str();")
		expect(out).toContain("%1 = sext i32 %0 to i128")
		expect(out).toContain("%2 = call ptr @tpl_i128_to_str(i128 %1)")
		expect(out).toContain("local.set ptr $s, %2")
	})

	it("is deterministic", () => {
		const source = "define int32 sq(int32 x) { return x * x; } for i in 3 { print(i.sq()); }"
		expect(printed(source)).toBe(printed(source))
	})

	it("spells types the LLVM way", () => {
		expect(irType(BOOL)).toBe("i1")
		expect(irType(INT64)).toBe("i64")
		expect(irType(STR)).toBe("ptr")
		expect(irType(pointerTo(INT64))).toBe("ptr")
		expect(irType(functionType([], BOOL))).toBe("ptr")
		expect(irType(arrayOf(arrayOf(BOOL, 2), 3))).toBe("[3 x [2 x i1]]")
	})
})
