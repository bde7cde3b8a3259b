import type { CompileError, CompilePhase } from "../../spec/compiler"

export type { CompileError, CompilePhase }

export class CompileErrorList {
	readonly errors: CompileError[] = []

	add(
		phase: CompilePhase,
		line: number,
		column: number,
		message: string,
		hint?: string,
	): void {
		this.errors.push({ message, line, column, phase, hint })
	}

	hasErrors(): boolean {
		return this.errors.length > 0
	}

	static of(error: CompileError): CompileErrorList {
		const list = new CompileErrorList()
		list.errors.push(error)
		return list
	}
}

/**
 * A fatal lexer or parser error. Thrown from inside the stage and turned
 * back into a CompileError record at the stage boundary.
 */
abstract class FatalCompileError extends Error {
	abstract readonly phase: "tokenize" | "parse"
	readonly line: number
	readonly column: number

	constructor(message: string, line: number, column: number) {
		super(message)
		this.line = line
		this.column = column
	}

	toCompileError(): CompileError {
		return { message: this.message, line: this.line, column: this.column, phase: this.phase }
	}
}

export class LexError extends FatalCompileError {
	readonly phase = "tokenize"

	constructor(message: string, line: number, column: number) {
		super(message, line, column)
		this.name = "LexError"
	}
}

export class ParseError extends FatalCompileError {
	readonly phase = "parse"

	constructor(message: string, line: number, column: number) {
		super(message, line, column)
		this.name = "ParseError"
	}
}
