/**
 * Stage trace collector for compiler diagnostics.
 *
 * Records one entry per completed pipeline stage. Entirely opt-in: pass one
 * to compile() and read it back afterwards.
 */

import type { Block, Program, Stmt } from "./ast"

export type TraceStage = "tokenize" | "parse" | "analyze" | "codegen"

export interface TokenizeEntry {
	readonly stage: "tokenize"
	readonly tokens: number
}

export interface ParseEntry {
	readonly stage: "parse"
	readonly functions: number
	readonly declarations: number
	readonly statements: number
}

export interface AnalyzeEntry {
	readonly stage: "analyze"
	readonly errors: number
}

export interface CodegenEntry {
	readonly stage: "codegen"
	readonly lines: number
}

export type TraceEntry = TokenizeEntry | ParseEntry | AnalyzeEntry | CodegenEntry

export interface CompileTrace {
	tokenized(tokenCount: number): void
	parsed(program: Program): void
	analyzed(errorCount: number): void
	generated(output: string): void
	getEntries(): readonly TraceEntry[]
}

export function createCompileTrace(): CompileTrace {
	const entries: TraceEntry[] = []

	return {
		tokenized(tokenCount: number) {
			entries.push({ stage: "tokenize", tokens: tokenCount })
		},

		parsed(program: Program) {
			const locals = program.funcs.reduce((n, f) => n + f.locals.length, 0)
			const statements = program.funcs.reduce(
				(n, f) => n + countStatements(f.body),
				countStatements(program.body),
			)
			entries.push({
				stage: "parse",
				functions: program.funcs.length,
				declarations: program.decls.length + locals,
				statements,
			})
		},

		analyzed(errorCount: number) {
			entries.push({ stage: "analyze", errors: errorCount })
		},

		generated(output: string) {
			// Output always ends with a newline
			const lines = output.split("\n").length - 1
			entries.push({ stage: "codegen", lines })
		},

		getEntries(): readonly TraceEntry[] {
			return entries
		},
	}
}

/** Statements in a block, nested ones included. */
export function countStatements(block: Block): number {
	return block.stmts.reduce((n, stmt) => n + 1 + nestedStatements(stmt), 0)
}

function nestedStatements(stmt: Stmt): number {
	switch (stmt.kind) {
		case "IfStmt":
			return countStatements(stmt.then) + (stmt.else_ ? countStatements(stmt.else_) : 0)
		case "WhileStmt":
		case "ForStmt":
			return countStatements(stmt.body)
		case "SwitchStmt":
			return (
				stmt.cases.reduce((n, c) => n + countStatements(c.body), 0) +
				(stmt.default_ ? countStatements(stmt.default_) : 0)
			)
		default:
			return 0
	}
}
