/**
 * Compiler Module Interfaces
 *
 * Boundary: pseudo-code source (.pso string) → CompileResult (Python text + diagnostics)
 *
 * The compiler is a pure function: string in, CompileResult out. It touches
 * no files and prints nothing; the command-line driver in scripts/ does both.
 */

// ─── Compiler Public API ──────────────────────────────────────────────────────

/**
 * The single entry point. Takes pseudo-code source, returns the generated
 * script or every diagnostic that stopped it.
 */
export interface Compiler {
	compile(source: string): CompileResult
}

/**
 * The complete output of compilation.
 */
export interface CompileResult {
	/** Whether compilation succeeded. If false, `output` is absent. */
	readonly success: boolean

	/** The generated Python 3 script. Present only when success is true. */
	readonly output?: string

	/**
	 * Errors encountered during compilation. A lexical or syntax error stops
	 * the pipeline and is the only entry; semantic errors are all reported.
	 */
	readonly errors: readonly CompileError[]
}

// ─── Diagnostics ──────────────────────────────────────────────────────────────

/** The stage that rejected the source. */
export type CompilePhase = "tokenize" | "parse" | "analyze"

export interface CompileError {
	/** Human-readable message, without position. */
	readonly message: string

	/** Line number in the source (1-based). */
	readonly line: number

	/** Column number in the source (1-based). */
	readonly column: number

	readonly phase: CompilePhase

	/** Optional suggestion for fixing the error. */
	readonly hint?: string
}
