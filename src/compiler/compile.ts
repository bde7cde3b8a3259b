/**
 * Compile pipeline: lex → parse → analyze → codegen.
 *
 * compile() never throws for bad input; compileOrThrow() is for callers
 * that would rather catch.
 */
import type { CompileResult as CompileResultBase, Compiler } from "../../spec/compiler"
import { type AnalysisResult, analyze } from "./analyzer"
import type { Program } from "./ast"
import { generate } from "./codegen"
import { formatDiagnostic } from "./diagnostics"
import type { CompileError, CompilePhase } from "./errors"
import { tokenize } from "./lexer"
import { parse } from "./parser"
import type { CompileTrace } from "./trace"

export interface CompileResult extends CompileResultBase {
	/** The checked tree. Present only when success is true. */
	readonly program?: Program
	/** Symbols and signatures, once analysis has run. */
	readonly analysis?: AnalysisResult
}

/** Compile pseudo-code source to a Python 3 script. */
export function compile(source: string, trace?: CompileTrace): CompileResult {
	// Lex
	const { tokens, errors: lexErrors } = tokenize(source)
	if (lexErrors.hasErrors()) {
		return { success: false, errors: lexErrors.errors }
	}
	trace?.tokenized(tokens.length)

	// Parse
	const { program, errors: parseErrors } = parse(tokens)
	if (!program) {
		return { success: false, errors: parseErrors.errors }
	}
	trace?.parsed(program)

	// Analyze
	const analysis = analyze(program)
	trace?.analyzed(analysis.errors.errors.length)
	if (analysis.errors.hasErrors()) {
		return { success: false, errors: analysis.errors.errors, analysis }
	}

	// Codegen
	const output = generate(program)
	trace?.generated(output)
	return { success: true, errors: [], output, program, analysis }
}

export class CompileFailure extends Error {
	readonly phase: CompilePhase
	readonly compileErrors: readonly CompileError[]

	constructor(errors: readonly CompileError[]) {
		const messages = errors.map(formatDiagnostic)
		super(`Compilation failed:\n${messages.join("\n")}`)
		this.name = "CompileFailure"
		this.phase = errors[0]?.phase ?? "analyze"
		this.compileErrors = errors
	}
}

/** Compile, returning the script or throwing CompileFailure. */
export function compileOrThrow(source: string): string {
	const result = compile(source)
	if (!result.success || result.output === undefined) {
		throw new CompileFailure(result.errors)
	}
	return result.output
}

/** The pipeline behind the boundary interface. */
export const compiler: Compiler = { compile: (source) => compile(source) }
