// AST node definitions for the pseudo-code language.
// The parser builds these; the analyzer and codegen only read them.

import type { DeclaredType } from "./types"

export interface Span {
	readonly line: number
	readonly column: number
}

// --- Top-level ---

export interface Program {
	readonly kind: "Program"
	readonly name: string
	readonly decls: Decl[]
	readonly funcs: FuncDecl[]
	readonly body: Block
	readonly span: Span
}

export type Decl = VarDecl | ArrayDecl

export interface VarDecl {
	readonly kind: "VarDecl"
	readonly name: string
	readonly type: DeclaredType
	readonly span: Span
}

export interface ArrayDecl {
	readonly kind: "ArrayDecl"
	readonly name: string
	readonly size: bigint
	readonly elementType: DeclaredType
	readonly span: Span
}

export interface FuncDecl {
	readonly kind: "FuncDecl"
	readonly name: string
	readonly isProcedure: boolean
	readonly params: Param[]
	/** null for procedures */
	readonly returnType: DeclaredType | null
	readonly locals: Decl[]
	readonly body: Block
	readonly span: Span
}

export interface Param {
	readonly kind: "Param"
	readonly name: string
	readonly type: DeclaredType
	readonly span: Span
}

// --- Statements ---

export type Stmt =
	| AssignStmt
	| IfStmt
	| WhileStmt
	| ForStmt
	| SwitchStmt
	| PrintStmt
	| ReadStmt
	| ReturnStmt
	| CallStmt

export interface Block {
	readonly kind: "Block"
	readonly stmts: Stmt[]
	readonly span: Span
}

export interface AssignStmt {
	readonly kind: "AssignStmt"
	readonly target: Ident | IndexAccess
	readonly value: Expr
	readonly span: Span
}

export interface IfStmt {
	readonly kind: "IfStmt"
	readonly condition: Expr
	readonly then: Block
	readonly else_: Block | null
	readonly span: Span
}

export interface WhileStmt {
	readonly kind: "WhileStmt"
	readonly condition: Expr
	readonly body: Block
	readonly span: Span
}

export interface ForStmt {
	readonly kind: "ForStmt"
	readonly variable: Ident
	readonly from: Expr
	readonly to: Expr
	readonly body: Block
	readonly span: Span
}

export interface SwitchStmt {
	readonly kind: "SwitchStmt"
	readonly subject: Expr
	readonly cases: CaseClause[]
	readonly default_: Block | null
	readonly span: Span
}

export interface CaseClause {
	readonly kind: "CaseClause"
	readonly value: bigint
	readonly body: Block
	readonly span: Span
}

export interface PrintStmt {
	readonly kind: "PrintStmt"
	readonly args: Expr[]
	readonly span: Span
}

export interface ReadStmt {
	readonly kind: "ReadStmt"
	readonly target: Ident | IndexAccess
	readonly span: Span
}

export interface ReturnStmt {
	readonly kind: "ReturnStmt"
	readonly value: Expr | null
	readonly span: Span
}

export interface CallStmt {
	readonly kind: "CallStmt"
	readonly call: CallExpr
	readonly span: Span
}

// --- Expressions ---

export type Expr =
	| IntLiteral
	| RealLiteral
	| StringLiteral
	| BoolLiteral
	| Ident
	| IndexAccess
	| CallExpr
	| UnaryExpr
	| BinaryExpr

// Integer literals keep every digit; Python integers are unbounded.
export interface IntLiteral {
	readonly kind: "IntLiteral"
	readonly value: bigint
	readonly span: Span
}

export interface RealLiteral {
	readonly kind: "RealLiteral"
	readonly value: number
	readonly span: Span
}

export interface StringLiteral {
	readonly kind: "StringLiteral"
	readonly value: string
	readonly span: Span
}

export interface BoolLiteral {
	readonly kind: "BoolLiteral"
	readonly value: boolean
	readonly span: Span
}

export interface Ident {
	readonly kind: "Ident"
	readonly name: string
	readonly span: Span
}

export interface IndexAccess {
	readonly kind: "IndexAccess"
	readonly array: string
	readonly index: Expr
	readonly span: Span
}

export interface CallExpr {
	readonly kind: "CallExpr"
	readonly callee: string
	readonly args: Expr[]
	readonly span: Span
}

export type UnaryOp = "not" | "-"

export interface UnaryExpr {
	readonly kind: "UnaryExpr"
	readonly op: UnaryOp
	readonly operand: Expr
	readonly span: Span
}

export type ArithmeticOp = "+" | "-" | "*" | "/" | "%"
export type ComparisonOp = "<" | ">" | "<=" | ">="
export type EqualityOp = "==" | "!="
export type LogicalOp = "and" | "or"
export type BinaryOp = ArithmeticOp | ComparisonOp | EqualityOp | LogicalOp

export interface BinaryExpr {
	readonly kind: "BinaryExpr"
	readonly op: BinaryOp
	readonly left: Expr
	readonly right: Expr
	readonly span: Span
}
