#!/usr/bin/env node
/**
 * Compile a pseudo-code source file to Python through the full pipeline:
 * lex → parse → analyze → codegen.
 *
 * Usage:
 *   npm run compile -- path/to/program.pso [-o out.py] [--debug]
 *
 * The output defaults to the input path with a .py extension.
 */
import { readFileSync, writeFileSync } from "node:fs"
import chalk from "chalk"
import {
	type CompileError,
	type TraceEntry,
	compile,
	createCompileTrace,
	describeAnalysis,
	formatDiagnosticWithHint,
	sourceExcerpt,
	tokenize,
} from "../src/compiler"

const USAGE = "Usage: npm run compile -- <file.pso> [-o <out.py>] [--debug]"

interface CliOptions {
	readonly input: string
	readonly output: string
	readonly debug: boolean
}

function parseArgs(argv: readonly string[]): CliOptions | string {
	let input: string | undefined
	let output: string | undefined
	let debug = false

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i]
		if (arg === "--debug") {
			debug = true
		} else if (arg === "-o") {
			output = argv[++i]
			if (!output) return "missing path after -o"
		} else if (arg !== undefined) {
			input = arg
		}
	}

	if (!input) return USAGE
	if (!input.endsWith(".pso")) return `expected a .pso file, got ${input}`
	return { input, output: output ?? input.replace(/\.pso$/, ".py"), debug }
}

function describeEntry(entry: TraceEntry): string {
	switch (entry.stage) {
		case "tokenize":
			return `${entry.tokens} tokens produced`
		case "parse":
			return `${entry.functions} function(s), ${entry.declarations} declaration(s), ${entry.statements} statement(s)`
		case "analyze":
			return entry.errors === 0 ? "no errors" : `${entry.errors} error(s)`
		case "codegen":
			return `${entry.lines} line(s) generated`
	}
}

function printError(source: string, error: CompileError): void {
	console.error(chalk.red(formatDiagnosticWithHint(error)))
	const excerpt = sourceExcerpt(source, error)
	if (excerpt) console.error(chalk.gray(excerpt))
}

const options = parseArgs(process.argv.slice(2))
if (typeof options === "string") {
	console.error(options === USAGE ? USAGE : chalk.red(options))
	process.exit(1)
}

const source = readFileSync(options.input, "utf-8")
console.log(`Compiling: ${chalk.bold(options.input)}\n`)

if (options.debug) {
	console.log(chalk.cyan("=== Tokens ==="))
	for (const tok of tokenize(source).tokens) {
		console.log(`  ${tok.line}:${tok.column} ${tok.kind} ${JSON.stringify(tok.value)}`)
	}
	console.log()
}

const trace = createCompileTrace()
const result = compile(source, trace)

for (const entry of trace.getEntries()) {
	console.log(`${chalk.green("✔")} ${entry.stage}: ${describeEntry(entry)}`)
}

if (!result.success || result.output === undefined) {
	const phase = result.errors[0]?.phase ?? "analyze"
	console.error(`\n${chalk.red("✖")} ${phase} failed with ${result.errors.length} error(s):`)
	for (const e of result.errors) {
		printError(source, e)
	}
	process.exit(1)
}

if (result.analysis) {
	console.log()
	for (const line of describeAnalysis(result.analysis)) {
		console.log(`  ${line}`)
	}
}

writeFileSync(options.output, result.output)
console.log(`\n${chalk.green("✔")} Wrote ${chalk.bold(options.output)}`)

if (options.debug) {
	console.log(chalk.cyan("\n=== Trace ==="))
	console.log(JSON.stringify(trace.getEntries(), null, 2))
}
