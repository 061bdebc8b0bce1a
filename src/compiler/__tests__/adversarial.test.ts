import fc from "fast-check"
import { describe, expect, it } from "vitest"
import { execute } from "../../runtime"
import { compile, compileOrThrow } from "../compile"
import { lex } from "../lexer"
import { parse } from "../parser"
import { TokenKind } from "../token"

// Fragments that combine into mostly-broken but lexically valid programs
const FRAGMENTS = [
	"int32",
	"int8",
	"bool",
	"str",
	"auto",
	"fn",
	"define",
	"return",
	"if",
	"else",
	"while",
	"for",
	"in",
	"break",
	"print",
	"len",
	"to_str",
	"x",
	"y",
	"1",
	"300",
	"true",
	'"s"',
	"=",
	"+=",
	"++",
	"+",
	"*",
	"&",
	"<",
	">",
	"==",
	"&&",
	"||",
	";",
	",",
	".",
	"(",
	")",
	"{",
	"}",
	"[",
	"]",
]

const tokenSoup = fc.array(fc.constantFrom(...FRAGMENTS), { maxLength: 40 }).map((parts) => parts.join(" "))

describe("adversarial input", () => {
	it("lexes any string without throwing and always ends with EOF", () => {
		fc.assert(
			fc.property(fc.string(), (input) => {
				const { tokens } = lex(input)
				expect(tokens[tokens.length - 1]?.kind).toBe(TokenKind.EOF)
			}),
		)
	})

	it("parses any string without throwing", () => {
		fc.assert(
			fc.property(fc.string(), (input) => {
				parse(lex(input).tokens)
			}),
		)
	})

	it("compiles token soup to either a module or diagnostics", () => {
		fc.assert(
			fc.property(tokenSoup, (source) => {
				const result = compile(source, "soup.tpl")
				if (result.success) {
					expect(result.diagnostics).toEqual([])
				} else {
					expect(result.diagnostics.length).toBeGreaterThan(0)
				}
			}),
			{ numRuns: 300 },
		)
	})

	it("never reports codegen failures for programs the resolver accepts", () => {
		fc.assert(
			fc.property(tokenSoup, (source) => {
				const result = compile(source, "soup.tpl")
				if (!result.success) {
					expect(result.diagnostics.some((d) => d.stage === "codegen")).toBe(false)
				}
			}),
			{ numRuns: 300 },
		)
	})
})

describe("arithmetic semantics", () => {
	const int32 = fc.integer({ min: -2147483648, max: 2147483647 })
	const int64 = fc.bigInt({ min: -(2n ** 63n), max: 2n ** 63n - 1n })

	function run(source: string): string {
		return execute(compileOrThrow(source, "arith.tpl")).output
	}

	it("wraps int32 arithmetic like two's complement", () => {
		fc.assert(
			fc.property(int32, int32, fc.constantFrom("+", "-", "*"), (a, b, op) => {
				const expected =
					op === "+" ? BigInt(a) + BigInt(b) : op === "-" ? BigInt(a) - BigInt(b) : BigInt(a) * BigInt(b)
				const output = run(`int32 a = ${a}; int32 b = ${b}; print(a ${op} b);`)
				expect(output).toBe(`${BigInt.asIntN(32, expected)}\n`)
			}),
			{ numRuns: 50 },
		)
	})

	it("truncates int64 division toward zero", () => {
		fc.assert(
			fc.property(
				int64,
				int64.filter((b) => b !== 0n),
				(a, b) => {
					const output = run(`int64 a = ${a}; int64 b = ${b}; print(a / b, a % b);`)
					expect(output).toBe(`${BigInt.asIntN(64, a / b)} ${BigInt.asIntN(64, a % b)}\n`)
				},
			),
			{ numRuns: 50 },
		)
	})
})
