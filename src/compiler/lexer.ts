import { CompileErrorList, LexError } from "./errors"
import { type Token, TokenKind, keywordKind } from "./token"

export class Lexer {
	private source: string
	private pos = 0
	private line = 1
	private column = 1
	private tokens: Token[] = []

	constructor(source: string) {
		this.source = source
	}

	/** Tokenize the whole source. Throws LexError at the first bad character. */
	tokenize(): Token[] {
		while (this.pos < this.source.length) {
			this.skipWhitespaceAndComments()
			if (this.pos >= this.source.length) break

			const ch = this.peek()

			if (ch === "\n") {
				this.emit(TokenKind.Newline, "\n", this.column)
				this.pos++
				this.line++
				this.column = 1
				continue
			}

			if (isDigit(ch)) {
				this.readNumber()
				continue
			}

			if (ch === '"') {
				this.readString()
				continue
			}

			if (isIdentStart(ch)) {
				this.readIdentOrKeyword()
				continue
			}

			this.readOperatorOrDelimiter()
		}

		this.emit(TokenKind.EOF, "", this.column)
		return this.tokens
	}

	private peek(): string {
		return this.source.charAt(this.pos)
	}

	private peekNext(): string {
		return this.source.charAt(this.pos + 1)
	}

	private advance(): string {
		const ch = this.source.charAt(this.pos)
		this.pos++
		this.column++
		return ch
	}

	private emit(kind: TokenKind, value: string, column: number) {
		this.tokens.push({ kind, value, line: this.line, column })
	}

	private skipWhitespaceAndComments() {
		while (this.pos < this.source.length) {
			const ch = this.peek()

			if (ch === " " || ch === "\t") {
				this.advance()
				continue
			}

			// Carriage returns are dropped without moving the column
			if (ch === "\r") {
				this.pos++
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
		const startCol = this.column
		let value = ""
		let isReal = false

		while (isDigit(this.peek())) {
			value += this.advance()
		}

		if (this.peek() === "." && isDigit(this.peekNext())) {
			isReal = true
			value += this.advance() // consume '.'
			while (isDigit(this.peek())) {
				value += this.advance()
			}
		}

		this.emit(isReal ? TokenKind.Real : TokenKind.Int, value, startCol)
	}

	private readString() {
		const startLine = this.line
		const startCol = this.column
		this.advance() // consume opening quote
		let value = ""

		while (this.pos < this.source.length && this.peek() !== '"') {
			if (this.peek() === "\n") {
				throw new LexError("unterminated string", startLine, startCol)
			}
			value += this.advance()
		}

		if (this.pos >= this.source.length) {
			throw new LexError("unterminated string", startLine, startCol)
		}

		this.advance() // consume closing quote
		this.emit(TokenKind.String, value, startCol)
	}

	private readIdentOrKeyword() {
		const startCol = this.column
		let value = ""

		while (this.pos < this.source.length && isIdentPart(this.peek())) {
			value += this.advance()
		}

		const keyword = keywordKind(value)
		if (keyword) {
			this.emit(keyword, value.toUpperCase(), startCol)
		} else {
			this.emit(TokenKind.Ident, value, startCol)
		}
	}

	private readOperatorOrDelimiter() {
		const ch = this.peek()
		const startCol = this.column

		// Two-character operators
		const two = ch + this.peekNext()
		const twoCharOp = TWO_CHAR_OPS.get(two)
		if (twoCharOp !== undefined) {
			this.advance()
			this.advance()
			this.emit(twoCharOp, two, startCol)
			return
		}

		// Single-character operators/delimiters
		const oneCharOp = ONE_CHAR_OPS.get(ch)
		if (oneCharOp !== undefined) {
			this.advance()
			this.emit(oneCharOp, ch, startCol)
			return
		}

		throw new LexError(`unexpected character '${ch}'`, this.line, startCol)
	}
}

/** Non-throwing entry point: a lexical error comes back as a single-entry error list. */
export function tokenize(source: string): { tokens: Token[]; errors: CompileErrorList } {
	try {
		return { tokens: new Lexer(source).tokenize(), errors: new CompileErrorList() }
	} catch (e) {
		if (e instanceof LexError) {
			return { tokens: [], errors: CompileErrorList.of(e.toCompileError()) }
		}
		throw e
	}
}

const TWO_CHAR_OPS: ReadonlyMap<string, TokenKind> = new Map([
	["<-", TokenKind.Assign],
	["<=", TokenKind.LtEq],
	[">=", TokenKind.GtEq],
	["==", TokenKind.Eq],
	["!=", TokenKind.NotEq],
])

const ONE_CHAR_OPS: ReadonlyMap<string, TokenKind> = new Map([
	["+", TokenKind.Plus],
	["-", TokenKind.Minus],
	["*", TokenKind.Star],
	["/", TokenKind.Slash],
	["%", TokenKind.Percent],
	["<", TokenKind.Lt],
	[">", TokenKind.Gt],
	["(", TokenKind.LParen],
	[")", TokenKind.RParen],
	["[", TokenKind.LBracket],
	["]", TokenKind.RBracket],
	[":", TokenKind.Colon],
	[",", TokenKind.Comma],
])

function isDigit(ch: string): boolean {
	return ch >= "0" && ch <= "9"
}

function isIdentStart(ch: string): boolean {
	return ch === "_" || /^\p{L}$/u.test(ch)
}

function isIdentPart(ch: string): boolean {
	return isIdentStart(ch) || isDigit(ch)
}
