import type {
	AssignOp,
	BaseTypeName,
	BinaryOp,
	Block,
	Expr,
	ForInStmt,
	FuncDef,
	IfStmt,
	Param,
	Program,
	ReturnStmt,
	Span,
	Stmt,
	TypeNode,
	UnaryOp,
	VarDecl,
	WhileStmt,
} from "./ast"
import { builtinByName } from "./builtins"
import { DiagnosticList } from "./errors"
import type { Token } from "./token"
import { TokenKind, describeKind } from "./token"

// Raised inside a production once the diagnostic is recorded; unwinds to the statement loop
class SyntaxFailure extends Error {}

// Operator precedence levels (lowest to highest)
const PREC_OR = 1
const PREC_AND = 2
const PREC_COMPARISON = 3
const PREC_ADD = 4
const PREC_MUL = 5

function binaryPrecedence(kind: TokenKind): number {
	switch (kind) {
		case TokenKind.Or:
			return PREC_OR
		case TokenKind.And:
			return PREC_AND
		case TokenKind.Eq:
		case TokenKind.NotEq:
		case TokenKind.Lt:
		case TokenKind.Gt:
		case TokenKind.LtEq:
		case TokenKind.GtEq:
			return PREC_COMPARISON
		case TokenKind.Plus:
		case TokenKind.Minus:
			return PREC_ADD
		case TokenKind.Star:
		case TokenKind.Slash:
		case TokenKind.Percent:
			return PREC_MUL
		default:
			return 0
	}
}

function tokenToBinaryOp(kind: TokenKind): BinaryOp | null {
	switch (kind) {
		case TokenKind.Plus:
			return "+"
		case TokenKind.Minus:
			return "-"
		case TokenKind.Star:
			return "*"
		case TokenKind.Slash:
			return "/"
		case TokenKind.Percent:
			return "%"
		case TokenKind.Eq:
			return "=="
		case TokenKind.NotEq:
			return "!="
		case TokenKind.Lt:
			return "<"
		case TokenKind.Gt:
			return ">"
		case TokenKind.LtEq:
			return "<="
		case TokenKind.GtEq:
			return ">="
		case TokenKind.And:
			return "&&"
		case TokenKind.Or:
			return "||"
		default:
			return null
	}
}

function tokenToAssignOp(kind: TokenKind): AssignOp | null {
	switch (kind) {
		case TokenKind.Assign:
			return "="
		case TokenKind.PlusAssign:
			return "+="
		case TokenKind.MinusAssign:
			return "-="
		case TokenKind.StarAssign:
			return "*="
		case TokenKind.SlashAssign:
			return "/="
		default:
			return null
	}
}

function tokenToUnaryOp(kind: TokenKind): UnaryOp | null {
	switch (kind) {
		case TokenKind.Amp:
			return "&"
		case TokenKind.Star:
			return "*"
		case TokenKind.Minus:
			return "-"
		case TokenKind.Not:
			return "!"
		default:
			return null
	}
}

const BASE_TYPES: Partial<Record<TokenKind, BaseTypeName>> = {
	[TokenKind.Int8Type]: "int8",
	[TokenKind.Int16Type]: "int16",
	[TokenKind.Int32Type]: "int32",
	[TokenKind.Int64Type]: "int64",
	[TokenKind.Int128Type]: "int128",
	[TokenKind.BoolType]: "bool",
	[TokenKind.StrType]: "str",
	[TokenKind.VoidType]: "void",
}

function startsType(kind: TokenKind): boolean {
	return kind === TokenKind.Fn || BASE_TYPES[kind] !== undefined
}

export class Parser {
	private tokens: Token[]
	private pos = 0
	private errors = new DiagnosticList()

	constructor(tokens: Token[]) {
		this.tokens = tokens
	}

	parse(): { program: Program; errors: DiagnosticList } {
		const span = this.span()
		const stmts: Stmt[] = []

		while (!this.isAtEnd()) {
			const start = this.pos
			try {
				stmts.push(this.parseStmt())
			} catch (e) {
				if (!(e instanceof SyntaxFailure)) throw e
				this.recover(start)
			}
		}

		return { program: { kind: "Program", stmts, span }, errors: this.errors }
	}

	// --- Token helpers ---

	private peek(): Token {
		const last = this.tokens[this.tokens.length - 1]
		return (
			this.tokens[this.pos] ?? { kind: TokenKind.EOF, value: "", line: last?.line ?? 1, column: last?.column ?? 1 }
		)
	}

	private peekKind(): TokenKind {
		return this.peek().kind
	}

	private advance(): Token {
		const tok = this.peek()
		if (this.pos < this.tokens.length) {
			this.pos++
		}
		return tok
	}

	private expect(kind: TokenKind): Token {
		const tok = this.peek()
		if (tok.kind !== kind) {
			throw this.error(`expected ${describeKind(kind)}, found ${describeToken(tok)}`)
		}
		return this.advance()
	}

	private check(kind: TokenKind): boolean {
		return this.peekKind() === kind
	}

	private match(kind: TokenKind): Token | null {
		if (this.check(kind)) {
			return this.advance()
		}
		return null
	}

	private isAtEnd(): boolean {
		return this.peekKind() === TokenKind.EOF
	}

	private span(): Span {
		const tok = this.peek()
		return { line: tok.line, column: tok.column }
	}

	private error(message: string): SyntaxFailure {
		const tok = this.peek()
		const code = tok.kind === TokenKind.EOF ? "UnexpectedEOF" : "UnexpectedToken"
		this.errors.add("parse", code, tok.line, tok.column, message)
		return new SyntaxFailure(message)
	}

	/**
	 * Skip to the end of the broken statement: past the next `;`, past a
	 * brace-balanced `{...}` group, or up to a `}` closing the enclosing block.
	 */
	private recover(start: number): void {
		let depth = 0
		while (!this.isAtEnd()) {
			const kind = this.peekKind()
			if (kind === TokenKind.Semicolon && depth === 0) {
				this.advance()
				return
			}
			if (kind === TokenKind.LBrace) {
				depth++
			} else if (kind === TokenKind.RBrace) {
				if (depth === 0) {
					// A stray `}` that starts a statement must be consumed to make progress
					if (this.pos === start) this.advance()
					return
				}
				depth--
				if (depth === 0) {
					this.advance()
					this.match(TokenKind.Semicolon)
					return
				}
			}
			this.advance()
		}
	}

	// --- Statements ---

	private parseBlock(): Block {
		const span = this.span()
		this.expect(TokenKind.LBrace)

		const stmts: Stmt[] = []
		while (!this.check(TokenKind.RBrace) && !this.isAtEnd()) {
			const start = this.pos
			try {
				stmts.push(this.parseStmt())
			} catch (e) {
				if (!(e instanceof SyntaxFailure)) throw e
				this.recover(start)
			}
		}

		this.expect(TokenKind.RBrace)
		return { kind: "Block", stmts, span }
	}

	private parseStmt(): Stmt {
		const kind = this.peekKind()

		if (kind === TokenKind.Auto || startsType(kind)) {
			return this.parseVarDecl()
		}

		switch (kind) {
			case TokenKind.Define:
				return this.parseFuncDef()
			case TokenKind.If:
				return this.parseIfStmt()
			case TokenKind.While:
				return this.parseWhileStmt()
			case TokenKind.For:
				return this.parseForInStmt()
			case TokenKind.Return:
				return this.parseReturnStmt()
			case TokenKind.Break: {
				const span = this.span()
				this.advance()
				this.expect(TokenKind.Semicolon)
				return { kind: "BreakStmt", span }
			}
			case TokenKind.LBrace: {
				const block = this.parseBlock()
				this.match(TokenKind.Semicolon)
				return block
			}
			default:
				return this.parseExprOrAssignStmt()
		}
	}

	private parseVarDecl(): VarDecl {
		const span = this.span()
		let typeNode: TypeNode | null = null
		if (!this.match(TokenKind.Auto)) {
			typeNode = this.parseTypeNode()
		}
		const name = this.expect(TokenKind.Ident).value
		let init: Expr | null = null
		if (this.match(TokenKind.Assign)) {
			init = this.parseExpr()
		}
		this.expect(TokenKind.Semicolon)
		return { kind: "VarDecl", name, typeNode, init, span }
	}

	private parseFuncDef(): FuncDef {
		const span = this.span()
		this.expect(TokenKind.Define)
		const returnType = this.parseTypeNode()
		const name = this.expect(TokenKind.Ident).value
		const params = this.parseParams()
		const body = this.parseBlock()
		this.match(TokenKind.Semicolon)
		return { kind: "FuncDef", name, params, returnType, body, span }
	}

	private parseIfStmt(): IfStmt {
		const span = this.span()
		this.expect(TokenKind.If)
		const condition = this.parseExpr()
		const then = this.parseBlock()

		let else_: Block | IfStmt | null = null
		if (this.match(TokenKind.Else)) {
			if (this.check(TokenKind.If)) {
				return { kind: "IfStmt", condition, then, else_: this.parseIfStmt(), span }
			}
			else_ = this.parseBlock()
		}
		this.match(TokenKind.Semicolon)
		return { kind: "IfStmt", condition, then, else_, span }
	}

	private parseWhileStmt(): WhileStmt {
		const span = this.span()
		this.expect(TokenKind.While)
		const condition = this.parseExpr()
		const body = this.parseBlock()
		this.match(TokenKind.Semicolon)
		return { kind: "WhileStmt", condition, body, span }
	}

	private parseForInStmt(): ForInStmt {
		const span = this.span()
		this.expect(TokenKind.For)
		const name = this.expect(TokenKind.Ident).value
		this.expect(TokenKind.In)
		const bound = this.parseExpr()
		const body = this.parseBlock()
		this.match(TokenKind.Semicolon)
		return { kind: "ForInStmt", name, bound, body, span }
	}

	private parseReturnStmt(): ReturnStmt {
		const span = this.span()
		this.expect(TokenKind.Return)
		if (this.match(TokenKind.Semicolon)) {
			return { kind: "ReturnStmt", value: null, span }
		}
		const value = this.parseExpr()
		this.expect(TokenKind.Semicolon)
		return { kind: "ReturnStmt", value, span }
	}

	private parseExprOrAssignStmt(): Stmt {
		const span = this.span()
		const expr = this.parseExpr()

		const assignOp = tokenToAssignOp(this.peekKind())
		if (assignOp) {
			this.advance()
			const value = this.parseExpr()
			this.expect(TokenKind.Semicolon)
			return { kind: "AssignStmt", target: expr, op: assignOp, value, span }
		}

		if (this.check(TokenKind.PlusPlus) || this.check(TokenKind.MinusMinus)) {
			const op = this.advance().kind === TokenKind.PlusPlus ? "++" : "--"
			this.expect(TokenKind.Semicolon)
			return { kind: "IncDecStmt", target: expr, op, span }
		}

		this.expect(TokenKind.Semicolon)
		return { kind: "ExprStmt", expr, span }
	}

	// --- Parameters and types ---

	private parseParams(): Param[] {
		this.expect(TokenKind.LParen)
		const params: Param[] = []
		if (!this.check(TokenKind.RParen)) {
			params.push(this.parseParam())
			while (this.match(TokenKind.Comma)) {
				params.push(this.parseParam())
			}
		}
		this.expect(TokenKind.RParen)
		return params
	}

	private parseParam(): Param {
		const span = this.span()
		const typeNode = this.parseTypeNode()
		const name = this.expect(TokenKind.Ident).value
		return { name, typeNode, span }
	}

	private parseTypeNode(): TypeNode {
		const span = this.span()
		let node = this.parseBaseTypeNode()

		// Suffixes apply left to right: `int32*[3]` is an array of three pointers
		while (true) {
			if (this.match(TokenKind.Star)) {
				node = { kind: "PointerType", inner: node, span }
			} else if (this.match(TokenKind.LBracket)) {
				const size = BigInt(this.expect(TokenKind.Int).value)
				this.expect(TokenKind.RBracket)
				node = { kind: "ArrayType", element: node, size, span }
			} else {
				return node
			}
		}
	}

	private parseBaseTypeNode(): TypeNode {
		const span = this.span()
		const tok = this.peek()

		const base = BASE_TYPES[tok.kind]
		if (base !== undefined) {
			this.advance()
			return { kind: "BaseType", name: base, span }
		}

		if (tok.kind === TokenKind.Fn) {
			this.advance()
			this.expect(TokenKind.Lt)
			const returns = this.parseTypeNode()
			this.expect(TokenKind.Gt)
			let params: TypeNode[] | null = null
			if (this.match(TokenKind.LParen)) {
				params = []
				if (!this.check(TokenKind.RParen)) {
					params.push(this.parseTypeNode())
					while (this.match(TokenKind.Comma)) {
						params.push(this.parseTypeNode())
					}
				}
				this.expect(TokenKind.RParen)
			}
			return { kind: "FnType", returns, params, span }
		}

		throw this.error(`expected type, found ${describeToken(tok)}`)
	}

	// --- Expression parsing (precedence climbing) ---

	private parseExpr(): Expr {
		return this.parseBinary(0)
	}

	private parseBinary(minPrec: number): Expr {
		let left = this.parseUnary()

		while (true) {
			const prec = binaryPrecedence(this.peekKind())
			if (prec <= minPrec) break

			const op = tokenToBinaryOp(this.peekKind())
			if (!op) break

			this.advance()
			const right = this.parseBinary(prec)
			left = {
				kind: "BinaryExpr",
				op,
				left,
				right,
				span: left.span,
			}
		}

		return left
	}

	private parseUnary(): Expr {
		const span = this.span()
		const op = tokenToUnaryOp(this.peekKind())
		if (op) {
			this.advance()
			const operand = this.parseUnary()
			return { kind: "UnaryExpr", op, operand, span }
		}
		return this.parsePostfix()
	}

	private parsePostfix(): Expr {
		let expr = this.parsePrimary()

		while (true) {
			if (this.check(TokenKind.LParen)) {
				const args = this.parseArgs()
				const builtin = expr.kind === "Ident" ? builtinByName(expr.name) : null
				expr = builtin
					? { kind: "BuiltinCall", builtin, args, span: expr.span }
					: { kind: "CallExpr", callee: expr, args, span: expr.span }
			} else if (this.match(TokenKind.LBracket)) {
				const index = this.parseExpr()
				this.expect(TokenKind.RBracket)
				expr = { kind: "IndexAccess", object: expr, index, span: expr.span }
			} else if (this.match(TokenKind.Dot)) {
				const methodSpan = this.span()
				const method = this.expect(TokenKind.Ident).value
				const args = this.parseArgs()
				const builtin = builtinByName(method)
				expr = builtin
					? { kind: "BuiltinCall", builtin, args: [expr, ...args], span: expr.span }
					: { kind: "MethodCall", receiver: expr, method, methodSpan, args, span: expr.span }
			} else {
				return expr
			}
		}
	}

	private parseArgs(): Expr[] {
		this.expect(TokenKind.LParen)
		const args: Expr[] = []
		if (!this.check(TokenKind.RParen)) {
			args.push(this.parseExpr())
			while (this.match(TokenKind.Comma)) {
				args.push(this.parseExpr())
			}
		}
		this.expect(TokenKind.RParen)
		return args
	}

	private parsePrimary(): Expr {
		const span = this.span()
		const kind = this.peekKind()

		switch (kind) {
			case TokenKind.Int: {
				const tok = this.advance()
				return { kind: "IntLiteral", value: BigInt(tok.value), span }
			}

			case TokenKind.True: {
				this.advance()
				return { kind: "BoolLiteral", value: true, span }
			}

			case TokenKind.False: {
				this.advance()
				return { kind: "BoolLiteral", value: false, span }
			}

			case TokenKind.String: {
				const tok = this.advance()
				return { kind: "StringLiteral", value: tok.value, span }
			}

			case TokenKind.Ident: {
				const name = this.advance().value
				return { kind: "Ident", name, span }
			}

			case TokenKind.LParen: {
				this.advance()
				const expr = this.parseExpr()
				this.expect(TokenKind.RParen)
				return { kind: "GroupExpr", expr, span }
			}

			case TokenKind.LBracket: {
				this.advance()
				const elements: Expr[] = []
				if (!this.check(TokenKind.RBracket)) {
					elements.push(this.parseExpr())
					while (this.match(TokenKind.Comma)) {
						elements.push(this.parseExpr())
					}
				}
				this.expect(TokenKind.RBracket)
				return { kind: "ArrayLiteral", elements, span }
			}

			default:
				if (startsType(kind)) {
					return this.parseLambda(span)
				}
				throw this.error(`unexpected ${describeToken(this.peek())} in expression`)
		}
	}

	// Function value literal: R (T a, ...) { ... }
	private parseLambda(span: Span): Expr {
		const returnType = this.parseTypeNode()
		const params = this.parseParams()
		const body = this.parseBlock()
		return { kind: "Lambda", returnType, params, body, span }
	}
}

function describeToken(tok: Token): string {
	switch (tok.kind) {
		case TokenKind.EOF:
			return "end of input"
		case TokenKind.String:
			return `string literal "${tok.value}"`
		default:
			return `'${tok.value}'`
	}
}

export function parse(tokens: Token[]): { program: Program; errors: DiagnosticList } {
	const parser = new Parser(tokens)
	return parser.parse()
}
