export { Lexer, tokenize } from "./lexer"
export { Parser, parse } from "./parser"
export { TokenKind, describeKind, describeToken, keywordKind } from "./token"
export type { Token } from "./token"
export type {
	Program,
	Decl,
	VarDecl,
	ArrayDecl,
	FuncDecl,
	Param,
	Expr,
	Stmt,
	Block,
	Span,
	BinaryOp,
	UnaryOp,
} from "./ast"
export type { CompileError, CompilePhase } from "./errors"
export { CompileErrorList, LexError, ParseError } from "./errors"
export { SymbolTable } from "./symbol-table"
export type { PsoSymbol, SymbolKind, DeclareResult } from "./symbol-table"
export { analyze } from "./analyzer"
export type { AnalysisResult, FuncSignature, ParamInfo } from "./analyzer"
export { generate } from "./codegen"
export { compile, compileOrThrow, compiler, CompileFailure } from "./compile"
export type { CompileResult } from "./compile"
export { createCompileTrace } from "./trace"
export type { CompileTrace, TraceEntry, TraceStage } from "./trace"
export { describeAnalysis, formatDiagnostic, formatDiagnosticWithHint, sourceExcerpt } from "./diagnostics"
export type { DeclaredType } from "./types"
export { INTEGER, REAL, STRING, BOOLEAN, typeToString, isNumeric, promote } from "./types"
