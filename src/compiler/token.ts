export enum TokenKind {
	// Literals
	Int = "Int",
	String = "String",
	True = "True",
	False = "False",

	// Identifiers
	Ident = "Ident",

	// Keywords
	Auto = "Auto",
	Fn = "Fn",
	Define = "Define",
	Return = "Return",
	If = "If",
	Else = "Else",
	While = "While",
	For = "For",
	In = "In",
	Break = "Break",

	// Type keywords
	Int8Type = "Int8Type",
	Int16Type = "Int16Type",
	Int32Type = "Int32Type",
	Int64Type = "Int64Type",
	Int128Type = "Int128Type",
	BoolType = "BoolType",
	StrType = "StrType",
	VoidType = "VoidType",

	// Operators
	Plus = "Plus",
	Minus = "Minus",
	Star = "Star",
	Slash = "Slash",
	Percent = "Percent",
	Assign = "Assign",
	PlusAssign = "PlusAssign",
	MinusAssign = "MinusAssign",
	StarAssign = "StarAssign",
	SlashAssign = "SlashAssign",
	PlusPlus = "PlusPlus",
	MinusMinus = "MinusMinus",
	Eq = "Eq",
	NotEq = "NotEq",
	Lt = "Lt",
	Gt = "Gt",
	LtEq = "LtEq",
	GtEq = "GtEq",
	Not = "Not",
	Amp = "Amp",
	And = "And",
	Or = "Or",

	// Delimiters
	LParen = "LParen",
	RParen = "RParen",
	LBrace = "LBrace",
	RBrace = "RBrace",
	LBracket = "LBracket",
	RBracket = "RBracket",
	Comma = "Comma",
	Dot = "Dot",
	Semicolon = "Semicolon",

	// Special
	EOF = "EOF",
}

export interface Token {
	readonly kind: TokenKind
	readonly value: string
	readonly line: number
	readonly column: number
}

const KEYWORDS: Record<string, TokenKind> = {
	auto: TokenKind.Auto,
	fn: TokenKind.Fn,
	define: TokenKind.Define,
	return: TokenKind.Return,
	if: TokenKind.If,
	else: TokenKind.Else,
	while: TokenKind.While,
	for: TokenKind.For,
	in: TokenKind.In,
	break: TokenKind.Break,
	true: TokenKind.True,
	false: TokenKind.False,
	int8: TokenKind.Int8Type,
	int16: TokenKind.Int16Type,
	int32: TokenKind.Int32Type,
	int64: TokenKind.Int64Type,
	int128: TokenKind.Int128Type,
	bool: TokenKind.BoolType,
	str: TokenKind.StrType,
	void: TokenKind.VoidType,
}

export function keywordKind(word: string): TokenKind | undefined {
	return Object.hasOwn(KEYWORDS, word) ? KEYWORDS[word] : undefined
}

/** Human-readable spelling of a token kind, for "expected X" messages. */
export function describeKind(kind: TokenKind): string {
	return TOKEN_SPELLING[kind] ?? kind
}

const TOKEN_SPELLING: Partial<Record<TokenKind, string>> = {
	[TokenKind.Int]: "integer literal",
	[TokenKind.String]: "string literal",
	[TokenKind.Ident]: "identifier",
	[TokenKind.Assign]: "'='",
	[TokenKind.LParen]: "'('",
	[TokenKind.RParen]: "')'",
	[TokenKind.LBrace]: "'{'",
	[TokenKind.RBrace]: "'}'",
	[TokenKind.LBracket]: "'['",
	[TokenKind.RBracket]: "']'",
	[TokenKind.Comma]: "','",
	[TokenKind.Semicolon]: "';'",
	[TokenKind.Lt]: "'<'",
	[TokenKind.Gt]: "'>'",
	[TokenKind.In]: "'in'",
	[TokenKind.EOF]: "end of input",
}
