export enum TokenKind {
	// Literals
	Int = "Int",
	Real = "Real",
	String = "String",
	True = "True",
	False = "False",

	// Identifiers
	Ident = "Ident",

	// Structure
	Algorithm = "Algorithm",
	Variables = "Variables",
	Begin = "Begin",
	End = "End",

	// Functions
	Function = "Function",
	Procedure = "Procedure",
	Returns = "Returns",
	EndFunction = "EndFunction",
	EndProcedure = "EndProcedure",

	// Type keywords
	IntegerType = "IntegerType",
	RealType = "RealType",
	StringType = "StringType",
	BooleanType = "BooleanType",

	// I/O
	Print = "Print",
	Read = "Read",

	// Control flow
	If = "If",
	Then = "Then",
	Else = "Else",
	EndIf = "EndIf",
	While = "While",
	Do = "Do",
	EndWhile = "EndWhile",
	For = "For",
	From = "From",
	To = "To",
	EndFor = "EndFor",
	Switch = "Switch",
	Default = "Default",
	EndSwitch = "EndSwitch",

	// Logical keyword operators
	And = "And",
	Or = "Or",
	Not = "Not",

	// Operators
	Assign = "Assign", // <-
	Plus = "Plus",
	Minus = "Minus",
	Star = "Star",
	Slash = "Slash",
	Percent = "Percent",
	Eq = "Eq",
	NotEq = "NotEq",
	Lt = "Lt",
	Gt = "Gt",
	LtEq = "LtEq",
	GtEq = "GtEq",

	// Delimiters
	LParen = "LParen",
	RParen = "RParen",
	LBracket = "LBracket",
	RBracket = "RBracket",
	Colon = "Colon",
	Comma = "Comma",

	// Special
	Newline = "Newline",
	EOF = "EOF",
}

export interface Token {
	readonly kind: TokenKind
	readonly value: string
	readonly line: number
	readonly column: number
}

// Keys are upper-case: keywords match case-insensitively.
const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map([
	["ALGORITHME", TokenKind.Algorithm],
	["VARIABLES", TokenKind.Variables],
	["DEBUT", TokenKind.Begin],
	["FIN", TokenKind.End],
	["FONCTION", TokenKind.Function],
	["PROCEDURE", TokenKind.Procedure],
	["RETOURNE", TokenKind.Returns],
	["FINFONCTION", TokenKind.EndFunction],
	["FINPROCEDURE", TokenKind.EndProcedure],
	["ENTIER", TokenKind.IntegerType],
	["REEL", TokenKind.RealType],
	["TEXTE", TokenKind.StringType],
	["BOOLEEN", TokenKind.BooleanType],
	["VRAI", TokenKind.True],
	["FAUX", TokenKind.False],
	["ECRIRE", TokenKind.Print],
	["AFFICHER", TokenKind.Print],
	["LIRE", TokenKind.Read],
	["SI", TokenKind.If],
	["ALORS", TokenKind.Then],
	["SINON", TokenKind.Else],
	["FINSI", TokenKind.EndIf],
	["TANTQUE", TokenKind.While],
	["FAIRE", TokenKind.Do],
	["FINTANTQUE", TokenKind.EndWhile],
	["POUR", TokenKind.For],
	["DE", TokenKind.From],
	["A", TokenKind.To],
	["FINPOUR", TokenKind.EndFor],
	["CAS", TokenKind.Switch],
	["DEFAUT", TokenKind.Default],
	["FINCAS", TokenKind.EndSwitch],
	["ET", TokenKind.And],
	["OU", TokenKind.Or],
	["NON", TokenKind.Not],
])

export function keywordKind(word: string): TokenKind | undefined {
	return KEYWORDS.get(word.toUpperCase())
}

/** How a token kind reads in a diagnostic: the keyword or symbol itself, or a category. */
export function describeKind(kind: TokenKind): string {
	for (const [word, k] of KEYWORDS) {
		if (k === kind) return `'${word}'`
	}
	switch (kind) {
		case TokenKind.Int:
			return "integer literal"
		case TokenKind.Real:
			return "real literal"
		case TokenKind.String:
			return "string literal"
		case TokenKind.Ident:
			return "identifier"
		case TokenKind.Newline:
			return "line break"
		case TokenKind.EOF:
			return "end of input"
		default:
			return `'${SYMBOLS[kind] ?? kind}'`
	}
}

const SYMBOLS: Partial<Record<TokenKind, string>> = {
	[TokenKind.Assign]: "<-",
	[TokenKind.Plus]: "+",
	[TokenKind.Minus]: "-",
	[TokenKind.Star]: "*",
	[TokenKind.Slash]: "/",
	[TokenKind.Percent]: "%",
	[TokenKind.Eq]: "==",
	[TokenKind.NotEq]: "!=",
	[TokenKind.Lt]: "<",
	[TokenKind.Gt]: ">",
	[TokenKind.LtEq]: "<=",
	[TokenKind.GtEq]: ">=",
	[TokenKind.LParen]: "(",
	[TokenKind.RParen]: ")",
	[TokenKind.LBracket]: "[",
	[TokenKind.RBracket]: "]",
	[TokenKind.Colon]: ":",
	[TokenKind.Comma]: ",",
}

/** How a concrete token reads in a diagnostic. */
export function describeToken(tok: Token): string {
	switch (tok.kind) {
		case TokenKind.Ident:
			return `identifier '${tok.value}'`
		case TokenKind.Int:
		case TokenKind.Real:
			return `number ${tok.value}`
		case TokenKind.String:
			return `string "${tok.value}"`
		default:
			return describeKind(tok.kind)
	}
}
