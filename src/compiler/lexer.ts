import { DiagnosticList } from "./errors"
import { type Token, TokenKind, keywordKind } from "./token"

export class Lexer {
	private source: string
	private pos = 0
	private line = 1
	private column = 1
	private tokens: Token[] = []
	readonly errors = new DiagnosticList()

	constructor(source: string) {
		this.source = source
	}

	tokenize(): Token[] {
		while (this.pos < this.source.length) {
			this.skipWhitespaceAndComments()
			if (this.pos >= this.source.length) break

			const ch = this.peek()

			if (isDigit(ch)) {
				this.readNumber()
				continue
			}

			if (ch === '"') {
				if (!this.readString()) break
				continue
			}

			if (isIdentStart(ch)) {
				this.readIdentOrKeyword()
				continue
			}

			this.readOperatorOrDelimiter()
		}

		this.tokens.push({ kind: TokenKind.EOF, value: "", line: this.line, column: this.column })
		return this.tokens
	}

	private peek(): string {
		return this.source[this.pos] ?? "\0"
	}

	private peekNext(): string {
		return this.source[this.pos + 1] ?? "\0"
	}

	private advance(): string {
		const ch = this.peek()
		this.pos++
		if (ch === "\n") {
			this.line++
			this.column = 1
		} else {
			this.column++
		}
		return ch
	}

	private push(kind: TokenKind, value: string, line: number, column: number): void {
		this.tokens.push({ kind, value, line, column })
	}

	private skipWhitespaceAndComments() {
		while (this.pos < this.source.length) {
			const ch = this.peek()

			if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n") {
				this.advance()
				continue
			}

			// Line comment
			if (ch === "/" && this.peekNext() === "/") {
				while (this.pos < this.source.length && this.peek() !== "\n") {
					this.advance()
				}
				continue
			}

			break
		}
	}

	private readNumber() {
		const startLine = this.line
		const startCol = this.column
		let raw = ""

		while (isDigit(this.peek()) || this.peek() === "_") {
			raw += this.advance()
		}

		// A number glued to identifier characters (`12ab`) or ending in a separator (`10_`)
		let malformed = raw.endsWith("_")
		while (isIdentPart(this.peek())) {
			raw += this.advance()
			malformed = true
		}

		const digits = raw.replace(/[^0-9]/g, "")
		if (malformed) {
			this.errors.add("lex", "MalformedNumber", startLine, startCol, `malformed number '${raw}'`)
		}
		this.push(TokenKind.Int, digits, startLine, startCol)
	}

	/** Returns false when the string runs to end of input, which ends the token stream. */
	private readString(): boolean {
		const startLine = this.line
		const startCol = this.column
		this.advance() // consume opening quote
		let value = ""

		while (this.pos < this.source.length && this.peek() !== '"') {
			if (this.peek() === "\\") {
				this.advance()
				if (this.pos >= this.source.length) break
				const esc = this.advance()
				switch (esc) {
					case "n":
						value += "\n"
						break
					case "t":
						value += "\t"
						break
					default:
						// covers \" and \\
						value += esc
				}
			} else {
				value += this.advance()
			}
		}

		if (this.pos >= this.source.length) {
			this.errors.add("lex", "UnterminatedString", startLine, startCol, "unterminated string literal", `add a closing '"'`)
			return false
		}

		this.advance() // consume closing quote
		this.push(TokenKind.String, value, startLine, startCol)
		return true
	}

	private readIdentOrKeyword() {
		const startCol = this.column
		let value = ""

		while (isIdentPart(this.peek())) {
			value += this.advance()
		}

		this.push(keywordKind(value) ?? TokenKind.Ident, value, this.line, startCol)
	}

	private readOperatorOrDelimiter() {
		const ch = this.peek()
		const startCol = this.column

		// Two-character operators
		const two = ch + this.peekNext()
		const twoCharOp = TWO_CHAR_OPS[two]
		if (twoCharOp !== undefined) {
			this.advance()
			this.advance()
			this.push(twoCharOp, two, this.line, startCol)
			return
		}

		// Single-character operators/delimiters
		const oneCharOp = ONE_CHAR_OPS[ch]
		if (oneCharOp !== undefined) {
			this.advance()
			this.push(oneCharOp, ch, this.line, startCol)
			return
		}

		this.errors.add("lex", "InvalidCharacter", this.line, startCol, `invalid character '${printable(ch)}'`)
		this.advance()
	}
}

export function lex(source: string): { tokens: Token[]; errors: DiagnosticList } {
	const lexer = new Lexer(source)
	const tokens = lexer.tokenize()
	return { tokens, errors: lexer.errors }
}

const TWO_CHAR_OPS: Partial<Record<string, TokenKind>> = {
	"+=": TokenKind.PlusAssign,
	"-=": TokenKind.MinusAssign,
	"*=": TokenKind.StarAssign,
	"/=": TokenKind.SlashAssign,
	"++": TokenKind.PlusPlus,
	"--": TokenKind.MinusMinus,
	"==": TokenKind.Eq,
	"!=": TokenKind.NotEq,
	"<=": TokenKind.LtEq,
	">=": TokenKind.GtEq,
	"&&": TokenKind.And,
	"||": TokenKind.Or,
}

const ONE_CHAR_OPS: Partial<Record<string, TokenKind>> = {
	"+": TokenKind.Plus,
	"-": TokenKind.Minus,
	"*": TokenKind.Star,
	"/": TokenKind.Slash,
	"%": TokenKind.Percent,
	"=": TokenKind.Assign,
	"<": TokenKind.Lt,
	">": TokenKind.Gt,
	"!": TokenKind.Not,
	"&": TokenKind.Amp,
	"(": TokenKind.LParen,
	")": TokenKind.RParen,
	"{": TokenKind.LBrace,
	"}": TokenKind.RBrace,
	"[": TokenKind.LBracket,
	"]": TokenKind.RBracket,
	",": TokenKind.Comma,
	".": TokenKind.Dot,
	";": TokenKind.Semicolon,
}

function isDigit(ch: string): boolean {
	return ch >= "0" && ch <= "9"
}

function isIdentStart(ch: string): boolean {
	return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_"
}

function isIdentPart(ch: string): boolean {
	return isIdentStart(ch) || isDigit(ch)
}

function printable(ch: string): string {
	const code = ch.charCodeAt(0)
	return code < 0x20 || code === 0x7f ? `\\u${code.toString(16).padStart(4, "0")}` : ch
}
