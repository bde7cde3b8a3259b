import type {
	AssignStmt,
	BinaryOp,
	Block,
	CallExpr,
	CaseClause,
	Decl,
	Expr,
	ForStmt,
	FuncDecl,
	Ident,
	IfStmt,
	IndexAccess,
	Param,
	PrintStmt,
	Program,
	ReadStmt,
	ReturnStmt,
	Span,
	Stmt,
	SwitchStmt,
	WhileStmt,
} from "./ast"
import { CompileErrorList, ParseError } from "./errors"
import type { Token } from "./token"
import { TokenKind, describeKind, describeToken } from "./token"
import type { DeclaredType } from "./types"

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
			return "and"
		case TokenKind.Or:
			return "or"
		default:
			return null
	}
}

const TYPE_KEYWORDS: ReadonlyMap<TokenKind, DeclaredType> = new Map([
	[TokenKind.IntegerType, "integer"],
	[TokenKind.RealType, "real"],
	[TokenKind.StringType, "string"],
	[TokenKind.BooleanType, "boolean"],
])

// Keywords that close a statement list. A list stops at any of them; the
// enclosing construct then checks that it is the one it expects.
const BLOCK_ENDS = new Set<TokenKind>([
	TokenKind.End,
	TokenKind.EndFunction,
	TokenKind.EndProcedure,
	TokenKind.Else,
	TokenKind.EndIf,
	TokenKind.EndWhile,
	TokenKind.EndFor,
	TokenKind.Default,
	TokenKind.EndSwitch,
])

/**
 * Recursive-descent parser. Line breaks are insignificant between tokens
 * except where a construct must follow its name directly (calls, indexing)
 * and after a bare RETOURNE. The first error aborts the parse.
 */
export class Parser {
	private tokens: Token[]
	private pos = 0

	constructor(tokens: Token[]) {
		this.tokens = tokens
	}

	/** Parse a whole program. Throws ParseError at the first violation. */
	parse(): Program {
		const span = this.span()
		this.expect(TokenKind.Algorithm, "at the start of the program")
		const name = this.expectName("after 'ALGORITHME'")

		const decls: Decl[] = []
		if (this.match(TokenKind.Variables)) {
			while (this.checkName()) {
				decls.push(this.parseDecl())
			}
		}

		const funcs: FuncDecl[] = []
		while (this.check(TokenKind.Function) || this.check(TokenKind.Procedure)) {
			funcs.push(this.parseFuncDecl())
		}

		this.expect(TokenKind.Begin, "before the main body")
		const body = this.parseBlock([TokenKind.End])
		this.expect(TokenKind.End, "at the end of the program")
		this.expect(TokenKind.EOF, "after 'FIN'")

		return { kind: "Program", name, decls, funcs, body, span }
	}

	// --- Token helpers ---

	private eof(): Token {
		const last = this.tokens[this.tokens.length - 1]
		return last ?? { kind: TokenKind.EOF, value: "", line: 1, column: 1 }
	}

	private skipNewlines(): void {
		while (this.tokens[this.pos]?.kind === TokenKind.Newline) {
			this.pos++
		}
	}

	private peek(): Token {
		this.skipNewlines()
		return this.tokens[this.pos] ?? this.eof()
	}

	private peekKind(): TokenKind {
		return this.peek().kind
	}

	/** The meaningful token `offset` places ahead, skipping line breaks. */
	private peekAt(offset: number): Token {
		let seen = 0
		for (let i = this.pos; i < this.tokens.length; i++) {
			const tok = this.tokens[i]
			if (!tok) break
			if (tok.kind === TokenKind.Newline) continue
			if (seen === offset) return tok
			seen++
		}
		return this.eof()
	}

	/** Whether the very next raw token (no line break skipped) has this kind. */
	private directlyFollows(kind: TokenKind): boolean {
		return this.tokens[this.pos]?.kind === kind
	}

	private advance(): Token {
		const tok = this.peek()
		if (tok.kind !== TokenKind.EOF) {
			this.pos++
		}
		return tok
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

	private expect(kind: TokenKind, context?: string): Token {
		const tok = this.peek()
		if (tok.kind !== kind) {
			const where = context ? ` ${context}` : ""
			throw this.error(`expected ${describeKind(kind)}${where}, found ${describeToken(tok)}`)
		}
		return this.advance()
	}

	// The for-range keyword 'A' doubles as a name so that `a` stays usable.
	private checkName(): boolean {
		const kind = this.peekKind()
		return kind === TokenKind.Ident || kind === TokenKind.To
	}

	private expectName(context: string): string {
		if (this.checkName()) {
			return this.advanceName()
		}
		throw this.error(`expected identifier ${context}, found ${describeToken(this.peek())}`)
	}

	// Keyword tokens carry upper-cased text; as a name, 'A' reads as `a`.
	private advanceName(): string {
		const tok = this.advance()
		return tok.kind === TokenKind.To ? tok.value.toLowerCase() : tok.value
	}

	private isAtEnd(): boolean {
		return this.peekKind() === TokenKind.EOF
	}

	private span(): Span {
		const tok = this.peek()
		return { line: tok.line, column: tok.column }
	}

	private error(message: string): ParseError {
		const tok = this.peek()
		return new ParseError(message, tok.line, tok.column)
	}

	// --- Declarations ---

	private parseDecl(): Decl {
		const span = this.span()
		const name = this.expectName("in declaration")

		if (this.match(TokenKind.LBracket)) {
			const sizeTok = this.expect(TokenKind.Int, "as array size")
			this.expect(TokenKind.RBracket, "after array size")
			this.expect(TokenKind.Colon, `after '${name}[${sizeTok.value}]'`)
			const elementType = this.parseType()
			const size = BigInt(sizeTok.value)
			return { kind: "ArrayDecl", name, size, elementType, span }
		}

		this.expect(TokenKind.Colon, `after '${name}'`)
		const type = this.parseType()
		return { kind: "VarDecl", name, type, span }
	}

	private parseType(): DeclaredType {
		const type = TYPE_KEYWORDS.get(this.peekKind())
		if (type === undefined) {
			throw this.error(
				`expected a type (ENTIER, REEL, TEXTE or BOOLEEN), found ${describeToken(this.peek())}`,
			)
		}
		this.advance()
		return type
	}

	/** `name :` or `name [ int ] :` opens a declaration rather than a statement. */
	private isDeclStart(): boolean {
		if (!this.checkName()) return false
		const next = this.peekAt(1).kind
		if (next === TokenKind.Colon) return true
		return (
			next === TokenKind.LBracket &&
			this.peekAt(2).kind === TokenKind.Int &&
			this.peekAt(3).kind === TokenKind.RBracket &&
			this.peekAt(4).kind === TokenKind.Colon
		)
	}

	private parseFuncDecl(): FuncDecl {
		const span = this.span()
		const isProcedure = this.advance().kind === TokenKind.Procedure
		const keyword = isProcedure ? "PROCEDURE" : "FONCTION"
		const name = this.expectName(`after '${keyword}'`)

		this.expect(TokenKind.LParen, `after '${name}'`)
		const params: Param[] = []
		if (!this.check(TokenKind.RParen)) {
			params.push(this.parseParam())
			while (this.match(TokenKind.Comma)) {
				params.push(this.parseParam())
			}
		}
		this.expect(TokenKind.RParen, "after parameters")

		// A procedure never declares a return type, so RETOURNE there opens the body
		let returnType: DeclaredType | null = null
		if (!isProcedure && this.match(TokenKind.Returns)) {
			returnType = this.parseType()
		}

		this.match(TokenKind.Variables)
		const locals: Decl[] = []
		while (this.isDeclStart()) {
			locals.push(this.parseDecl())
		}

		const terminator = isProcedure ? TokenKind.EndProcedure : TokenKind.EndFunction
		const body = this.parseBlock([terminator])
		this.expect(terminator, `to close ${keyword.toLowerCase()} '${name}'`)

		return { kind: "FuncDecl", name, isProcedure, params, returnType, locals, body, span }
	}

	private parseParam(): Param {
		const span = this.span()
		const name = this.expectName("as parameter name")
		this.expect(TokenKind.Colon, `after parameter '${name}'`)
		const type = this.parseType()
		return { kind: "Param", name, type, span }
	}

	// --- Statements ---

	private parseBlock(terminators: readonly TokenKind[]): Block {
		const span = this.span()
		const stmts: Stmt[] = []
		while (!this.isAtEnd()) {
			const kind = this.peekKind()
			if (terminators.includes(kind) || BLOCK_ENDS.has(kind)) break
			stmts.push(this.parseStmt())
		}
		return { kind: "Block", stmts, span }
	}

	private parseStmt(): Stmt {
		switch (this.peekKind()) {
			case TokenKind.If:
				return this.parseIfStmt()
			case TokenKind.While:
				return this.parseWhileStmt()
			case TokenKind.For:
				return this.parseForStmt()
			case TokenKind.Switch:
				return this.parseSwitchStmt()
			case TokenKind.Print:
				return this.parsePrintStmt()
			case TokenKind.Read:
				return this.parseReadStmt()
			case TokenKind.Returns:
				return this.parseReturnStmt()
			case TokenKind.Ident:
			case TokenKind.To:
				return this.parseAssignOrCall()
			default:
				throw this.error(`expected a statement, found ${describeToken(this.peek())}`)
		}
	}

	private parseAssignOrCall(): Stmt {
		const span = this.span()
		const name = this.advanceName()

		if (this.directlyFollows(TokenKind.LParen)) {
			const call = this.parseCallArgs(name, span)
			return { kind: "CallStmt", call, span }
		}

		let target: Ident | IndexAccess = { kind: "Ident", name, span }
		if (this.directlyFollows(TokenKind.LBracket)) {
			target = this.parseIndex(name, span)
		}

		this.expect(TokenKind.Assign, `after '${name}'`)
		const value = this.parseExpr()
		const stmt: AssignStmt = { kind: "AssignStmt", target, value, span }
		return stmt
	}

	private parseIfStmt(): IfStmt {
		const span = this.span()
		this.expect(TokenKind.If)
		const condition = this.parseExpr()
		this.expect(TokenKind.Then, "after the condition")
		const then = this.parseBlock([TokenKind.Else, TokenKind.EndIf])
		let else_: Block | null = null
		if (this.match(TokenKind.Else)) {
			else_ = this.parseBlock([TokenKind.EndIf])
		}
		this.expect(TokenKind.EndIf, "to close 'SI'")
		return { kind: "IfStmt", condition, then, else_, span }
	}

	private parseWhileStmt(): WhileStmt {
		const span = this.span()
		this.expect(TokenKind.While)
		const condition = this.parseExpr()
		this.expect(TokenKind.Do, "after the condition")
		const body = this.parseBlock([TokenKind.EndWhile])
		this.expect(TokenKind.EndWhile, "to close 'TANTQUE'")
		return { kind: "WhileStmt", condition, body, span }
	}

	private parseForStmt(): ForStmt {
		const span = this.span()
		this.expect(TokenKind.For)
		const varSpan = this.span()
		const name = this.expectName("after 'POUR'")
		const variable: Ident = { kind: "Ident", name, span: varSpan }
		this.expect(TokenKind.From, `after '${name}'`)
		const from = this.parseExpr()
		this.expect(TokenKind.To, "after the start bound")
		const to = this.parseExpr()
		this.expect(TokenKind.Do, "after the end bound")
		const body = this.parseBlock([TokenKind.EndFor])
		this.expect(TokenKind.EndFor, "to close 'POUR'")
		return { kind: "ForStmt", variable, from, to, body, span }
	}

	private parseSwitchStmt(): SwitchStmt {
		const span = this.span()
		this.expect(TokenKind.Switch)
		const subject = this.parseExpr()
		this.expect(TokenKind.Do, "after the 'CAS' subject")

		const cases: CaseClause[] = []
		while (this.check(TokenKind.Int)) {
			const caseSpan = this.span()
			const value = BigInt(this.advance().value)
			this.expect(TokenKind.Colon, `after case ${value}`)
			const body = this.parseBlock([TokenKind.Int, TokenKind.Default, TokenKind.EndSwitch])
			cases.push({ kind: "CaseClause", value, body, span: caseSpan })
		}

		let default_: Block | null = null
		if (this.match(TokenKind.Default)) {
			this.expect(TokenKind.Colon, "after 'DEFAUT'")
			default_ = this.parseBlock([TokenKind.EndSwitch])
		}

		this.expect(TokenKind.EndSwitch, "to close 'CAS'")
		return { kind: "SwitchStmt", subject, cases, default_, span }
	}

	private parsePrintStmt(): PrintStmt {
		const span = this.span()
		this.expect(TokenKind.Print)
		this.expect(TokenKind.LParen, "after 'ECRIRE'")
		const args: Expr[] = [this.parseExpr()]
		while (this.match(TokenKind.Comma)) {
			args.push(this.parseExpr())
		}
		this.expect(TokenKind.RParen, "after the printed values")
		return { kind: "PrintStmt", args, span }
	}

	private parseReadStmt(): ReadStmt {
		const span = this.span()
		this.expect(TokenKind.Read)
		this.expect(TokenKind.LParen, "after 'LIRE'")
		const targetSpan = this.span()
		const name = this.expectName("inside 'LIRE'")
		let target: Ident | IndexAccess = { kind: "Ident", name, span: targetSpan }
		if (this.directlyFollows(TokenKind.LBracket)) {
			target = this.parseIndex(name, targetSpan)
		}
		this.expect(TokenKind.RParen, "after the variable to read")
		return { kind: "ReadStmt", target, span }
	}

	private parseReturnStmt(): ReturnStmt {
		const span = this.span()
		this.expect(TokenKind.Returns)

		// Bare RETOURNE: the line ends or a block closes right after it
		if (
			this.directlyFollows(TokenKind.Newline) ||
			this.isAtEnd() ||
			BLOCK_ENDS.has(this.peekKind())
		) {
			return { kind: "ReturnStmt", value: null, span }
		}

		const value = this.parseExpr()
		return { kind: "ReturnStmt", value, span }
	}

	// --- Expression parsing (precedence climbing) ---

	private parseExpr(): Expr {
		return this.parseBinary(0)
	}

	private parseBinary(minPrec: number): Expr {
		let left = this.parseUnary()
		let compared = false

		while (true) {
			const prec = binaryPrecedence(this.peekKind())
			if (prec <= minPrec) break
			// Comparisons do not chain: `a < b < c` needs ET
			if (prec === PREC_COMPARISON && compared) break

			const op = tokenToBinaryOp(this.peekKind())
			if (!op) break

			this.advance()
			const right = this.parseBinary(prec)
			left = { kind: "BinaryExpr", op, left, right, span: left.span }
			if (prec === PREC_COMPARISON) compared = true
		}

		return left
	}

	private parseUnary(): Expr {
		const span = this.span()

		if (this.match(TokenKind.Not)) {
			const operand = this.parseUnary()
			return { kind: "UnaryExpr", op: "not", operand, span }
		}

		if (this.match(TokenKind.Minus)) {
			const operand = this.parseUnary()
			return { kind: "UnaryExpr", op: "-", operand, span }
		}

		return this.parsePrimary()
	}

	private parsePrimary(): Expr {
		const span = this.span()
		const tok = this.peek()

		switch (tok.kind) {
			case TokenKind.Int:
				this.advance()
				return { kind: "IntLiteral", value: BigInt(tok.value), span }

			case TokenKind.Real:
				this.advance()
				return { kind: "RealLiteral", value: Number.parseFloat(tok.value), span }

			case TokenKind.String:
				this.advance()
				return { kind: "StringLiteral", value: tok.value, span }

			case TokenKind.True:
				this.advance()
				return { kind: "BoolLiteral", value: true, span }

			case TokenKind.False:
				this.advance()
				return { kind: "BoolLiteral", value: false, span }

			case TokenKind.LParen: {
				this.advance()
				const expr = this.parseExpr()
				this.expect(TokenKind.RParen, "to close '('")
				return expr
			}

			case TokenKind.Ident:
			case TokenKind.To: {
				const name = this.advanceName()
				// At most one postfix: a call or an index, directly after the name
				if (this.directlyFollows(TokenKind.LParen)) {
					return this.parseCallArgs(name, span)
				}
				if (this.directlyFollows(TokenKind.LBracket)) {
					return this.parseIndex(name, span)
				}
				return { kind: "Ident", name, span }
			}

			default:
				throw this.error(`expected an expression, found ${describeToken(tok)}`)
		}
	}

	private parseCallArgs(callee: string, span: Span): CallExpr {
		this.expect(TokenKind.LParen)
		const args: Expr[] = []
		if (!this.check(TokenKind.RParen)) {
			args.push(this.parseExpr())
			while (this.match(TokenKind.Comma)) {
				args.push(this.parseExpr())
			}
		}
		this.expect(TokenKind.RParen, `to close the call to '${callee}'`)
		return { kind: "CallExpr", callee, args, span }
	}

	private parseIndex(array: string, span: Span): IndexAccess {
		this.expect(TokenKind.LBracket)
		const index = this.parseExpr()
		this.expect(TokenKind.RBracket, `after the index of '${array}'`)
		return { kind: "IndexAccess", array, index, span }
	}
}

/** Non-throwing entry point: a syntax error comes back as a single-entry error list and no tree. */
export function parse(tokens: Token[]): { program: Program | null; errors: CompileErrorList } {
	try {
		return { program: new Parser(tokens).parse(), errors: new CompileErrorList() }
	} catch (e) {
		if (e instanceof ParseError) {
			return { program: null, errors: CompileErrorList.of(e.toCompileError()) }
		}
		throw e
	}
}
