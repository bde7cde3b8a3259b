import type { AnalysisResult } from "./analyzer"
import type { CompileError } from "./errors"
import { typeToString } from "./types"

/** `Line L:C: message`, the form every front end prints. */
export function formatDiagnostic(error: CompileError): string {
	return `Line ${error.line}:${error.column}: ${error.message}`
}

/** The diagnostic, then the hint on its own indented line when there is one. */
export function formatDiagnosticWithHint(error: CompileError): string {
	const head = formatDiagnostic(error)
	return error.hint ? `${head}\n  hint: ${error.hint}` : head
}

/** The source line an error points at, with a caret under its column. */
export function sourceExcerpt(source: string, error: CompileError): string | null {
	const text = source.split(/\r?\n/)[error.line - 1]
	if (text === undefined) return null
	const caret = `${" ".repeat(Math.max(0, error.column - 1))}^`
	return `${text}\n${caret}`
}

/** Global symbols and function signatures, one indented line each. */
export function describeAnalysis(analysis: AnalysisResult): string[] {
	const lines = ["Symbols:"]
	const symbols = analysis.globals.entries()
	for (const sym of symbols) {
		const type = typeToString(sym.type)
		lines.push(`  ${sym.name}: ${sym.kind === "array" ? `${type}[${sym.size}]` : type}`)
	}
	if (symbols.length === 0) lines.push("  (none)")

	lines.push("Functions:")
	for (const [name, sig] of analysis.funcs) {
		const params = sig.params.map((p) => `${p.name}: ${typeToString(p.type)}`).join(", ")
		const ret = sig.returnType ? ` -> ${typeToString(sig.returnType)}` : ""
		lines.push(`  ${name}(${params})${ret}`)
	}
	if (analysis.funcs.size === 0) lines.push("  (none)")
	return lines
}
