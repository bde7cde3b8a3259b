// Semantic analyzer for the pseudo-code language. Declarations are collected
// first, then every body is type-checked. Errors are batched, never thrown.

import type {
	BinaryExpr,
	Block,
	CallExpr,
	Decl,
	Expr,
	FuncDecl,
	Ident,
	IndexAccess,
	Program,
	ReturnStmt,
	Span,
	Stmt,
	SwitchStmt,
} from "./ast"
import { CompileErrorList } from "./errors"
import { SymbolTable } from "./symbol-table"
import { BOOLEAN, type DeclaredType, INTEGER, REAL, STRING, isNumeric, promote, typeToString } from "./types"

// --- Public interfaces ---

export interface ParamInfo {
	readonly name: string
	readonly type: DeclaredType
}

export interface FuncSignature {
	readonly name: string
	readonly params: readonly ParamInfo[]
	/** null for procedures */
	readonly returnType: DeclaredType | null
	readonly span: Span
}

export interface AnalysisResult {
	readonly globals: SymbolTable
	readonly funcs: ReadonlyMap<string, FuncSignature>
	readonly errors: CompileErrorList
}

// An expression whose type could not be established. Checks against it are
// skipped so one mistake yields one error.
type ExprType = DeclaredType | null

// --- Entry point ---

export function analyze(program: Program): AnalysisResult {
	const a = new Analyzer()
	return a.analyze(program)
}

// --- Analyzer ---

class Analyzer {
	private errors = new CompileErrorList()
	private globals = new SymbolTable()
	private funcs = new Map<string, FuncSignature>()
	private scope: SymbolTable = this.globals
	private currentFunc: FuncSignature | null = null

	analyze(program: Program): AnalysisResult {
		for (const decl of program.decls) {
			this.declare(this.globals, decl, null)
		}
		for (const func of program.funcs) {
			this.collectFunc(func)
		}
		for (const func of program.funcs) {
			this.checkFuncBody(func)
		}
		this.scope = this.globals
		this.currentFunc = null
		this.checkBlock(program.body)

		return { globals: this.globals, funcs: this.funcs, errors: this.errors }
	}

	// --- Declarations ---

	private declare(table: SymbolTable, decl: Decl, owner: string | null): void {
		if (decl.kind === "ArrayDecl" && decl.size <= 0n) {
			this.error(`array '${decl.name}' must have a positive size, got ${decl.size}`, decl.span)
		}

		const result =
			decl.kind === "ArrayDecl"
				? table.declare({
						name: decl.name,
						type: decl.elementType,
						kind: "array",
						size: decl.size,
						span: decl.span,
					})
				: table.declare({ name: decl.name, type: decl.type, kind: "variable", span: decl.span })

		if (!result.ok) {
			this.duplicate(decl.name, decl.span, result.existing.span, owner)
		}
	}

	private duplicate(name: string, span: Span, previous: Span, owner: string | null): void {
		const where = owner ? ` in '${owner}'` : ""
		this.error(
			`'${name}' is already declared${where}`,
			span,
			`previous declaration at line ${previous.line}`,
		)
	}

	private collectFunc(decl: FuncDecl): void {
		const previous = this.funcs.get(decl.name)
		if (previous) {
			this.error(
				`function '${decl.name}' is already declared`,
				decl.span,
				`previous declaration at line ${previous.span.line}`,
			)
			return
		}

		const global = this.globals.lookupLocal(decl.name)
		if (global) {
			this.error(
				`function '${decl.name}' has the same name as a global variable`,
				decl.span,
				`global declared at line ${global.span.line}`,
			)
			return
		}

		this.funcs.set(decl.name, {
			name: decl.name,
			params: decl.params.map((p) => ({ name: p.name, type: p.type })),
			returnType: decl.returnType,
			span: decl.span,
		})
	}

	private checkFuncBody(decl: FuncDecl): void {
		const local = new SymbolTable(this.globals)
		for (const param of decl.params) {
			const result = local.declare({
				name: param.name,
				type: param.type,
				kind: "parameter",
				span: param.span,
			})
			if (!result.ok) {
				this.duplicate(param.name, param.span, result.existing.span, decl.name)
			}
		}
		for (const localDecl of decl.locals) {
			this.declare(local, localDecl, decl.name)
		}

		// A rejected duplicate still gets its body checked, against its own declaration
		this.scope = local
		this.currentFunc = {
			name: decl.name,
			params: decl.params.map((p) => ({ name: p.name, type: p.type })),
			returnType: decl.returnType,
			span: decl.span,
		}
		this.checkBlock(decl.body)
		this.scope = this.globals
		this.currentFunc = null
	}

	// --- Statement checking ---

	private checkBlock(block: Block): void {
		for (const stmt of block.stmts) {
			this.checkStmt(stmt)
		}
	}

	private checkStmt(stmt: Stmt): void {
		switch (stmt.kind) {
			case "AssignStmt": {
				const target = this.checkTarget(stmt.target)
				const value = this.checkExpr(stmt.value)
				if (target !== null && value !== null && target !== value) {
					this.error(
						`cannot assign ${typeToString(value)} to ${typeToString(target)}`,
						stmt.span,
						target === REAL && value === INTEGER ? "write the value as a real, e.g. 2.0" : undefined,
					)
				}
				break
			}

			case "IfStmt":
				this.checkExpr(stmt.condition)
				this.checkBlock(stmt.then)
				if (stmt.else_) this.checkBlock(stmt.else_)
				break

			case "WhileStmt":
				this.checkExpr(stmt.condition)
				this.checkBlock(stmt.body)
				break

			case "ForStmt":
				this.checkTarget(stmt.variable)
				this.checkBound(stmt.from, "start")
				this.checkBound(stmt.to, "end")
				this.checkBlock(stmt.body)
				break

			case "SwitchStmt":
				this.checkSwitchStmt(stmt)
				break

			case "PrintStmt":
				for (const arg of stmt.args) {
					this.checkExpr(arg)
				}
				break

			case "ReadStmt":
				this.checkTarget(stmt.target)
				break

			case "ReturnStmt":
				this.checkReturnStmt(stmt)
				break

			case "CallStmt":
				this.checkCall(stmt.call, true)
				break
		}
	}

	/** Type of an assignable place: a scalar name or an indexed array element. */
	private checkTarget(target: Ident | IndexAccess): ExprType {
		return target.kind === "Ident" ? this.checkIdent(target) : this.checkIndex(target)
	}

	private checkBound(expr: Expr, which: string): void {
		const type = this.checkExpr(expr)
		if (type !== null && !isNumeric(type)) {
			this.error(`loop ${which} bound must be a number, got ${typeToString(type)}`, expr.span)
		}
	}

	private checkSwitchStmt(stmt: SwitchStmt): void {
		this.checkExpr(stmt.subject)

		// Labels are integer literals; a repeated one could never be reached
		const seen = new Set<bigint>()
		for (const c of stmt.cases) {
			if (seen.has(c.value)) {
				this.error(`duplicate case ${c.value}`, c.span)
			}
			seen.add(c.value)
			this.checkBlock(c.body)
		}
		if (stmt.default_) this.checkBlock(stmt.default_)
	}

	private checkReturnStmt(stmt: ReturnStmt): void {
		const valueType = stmt.value ? this.checkExpr(stmt.value) : null

		const func = this.currentFunc
		if (!func) {
			this.error("'RETOURNE' outside a function", stmt.span)
			return
		}

		if (func.returnType === null) {
			if (stmt.value) {
				this.error(`procedure '${func.name}' cannot return a value`, stmt.span)
			}
			return
		}

		if (!stmt.value) {
			this.error(
				`function '${func.name}' must return a value of type ${typeToString(func.returnType)}`,
				stmt.span,
			)
			return
		}

		if (valueType !== null && valueType !== func.returnType) {
			this.error(
				`cannot return ${typeToString(valueType)} from '${func.name}', expected ${typeToString(func.returnType)}`,
				stmt.span,
			)
		}
	}

	// --- Expression checking ---

	private checkExpr(expr: Expr): ExprType {
		switch (expr.kind) {
			case "IntLiteral":
				return INTEGER
			case "RealLiteral":
				return REAL
			case "StringLiteral":
				return STRING
			case "BoolLiteral":
				return BOOLEAN
			case "Ident":
				return this.checkIdent(expr)
			case "IndexAccess":
				return this.checkIndex(expr)
			case "CallExpr":
				return this.checkCall(expr, false)
			case "UnaryExpr": {
				const operand = this.checkExpr(expr.operand)
				if (expr.op === "not") return BOOLEAN
				if (operand === null) return null
				if (!isNumeric(operand)) {
					this.error(`operator '-' needs a number, got ${typeToString(operand)}`, expr.span)
					return null
				}
				return operand
			}
			case "BinaryExpr":
				return this.checkBinaryExpr(expr)
		}
	}

	private checkIdent(expr: Ident): ExprType {
		const sym = this.scope.resolve(expr.name)
		if (!sym) {
			const hint = this.funcs.has(expr.name) ? `call it as ${expr.name}(...)` : undefined
			this.error(`undeclared identifier '${expr.name}'`, expr.span, hint)
			return null
		}
		if (sym.kind === "array") {
			this.error(`array '${expr.name}' must be indexed`, expr.span, `write ${expr.name}[i]`)
			return null
		}
		return sym.type
	}

	private checkIndex(expr: IndexAccess): ExprType {
		const sym = this.scope.resolve(expr.array)
		if (!sym) {
			this.error(`undeclared identifier '${expr.array}'`, expr.span)
		} else if (sym.kind !== "array") {
			this.error(`'${expr.array}' is not an array`, expr.span)
		}

		const index = this.checkExpr(expr.index)
		if (index !== null && index !== INTEGER) {
			this.error(`array index must be ENTIER, got ${typeToString(index)}`, expr.index.span)
		}

		return sym?.kind === "array" ? sym.type : null
	}

	private checkCall(expr: CallExpr, asStatement: boolean): ExprType {
		const argTypes = expr.args.map((arg) => this.checkExpr(arg))

		const func = this.funcs.get(expr.callee)
		if (!func) {
			this.error(`undeclared function '${expr.callee}'`, expr.span)
			return null
		}

		if (argTypes.length !== func.params.length) {
			this.error(
				`'${func.name}' expects ${func.params.length} argument(s), got ${argTypes.length}`,
				expr.span,
			)
		} else {
			func.params.forEach((param, i) => {
				const actual = argTypes[i] ?? null
				if (actual !== null && actual !== param.type) {
					this.error(
						`argument ${i + 1} of '${func.name}': expected ${typeToString(param.type)}, got ${typeToString(actual)}`,
						expr.args[i]?.span ?? expr.span,
					)
				}
			})
		}

		if (func.returnType === null) {
			if (!asStatement) {
				this.error(`procedure '${func.name}' has no value`, expr.span)
			}
			return null
		}
		return func.returnType
	}

	private checkBinaryExpr(expr: BinaryExpr): ExprType {
		const left = this.checkExpr(expr.left)
		const right = this.checkExpr(expr.right)

		switch (expr.op) {
			case "+":
			case "-":
			case "*":
			case "/":
			case "%": {
				const ok = this.requireNumeric(expr.op, left, expr.left.span)
				const okRight = this.requireNumeric(expr.op, right, expr.right.span)
				return ok && okRight ? promote(left, right) : null
			}

			case "<":
			case ">":
			case "<=":
			case ">=":
				this.requireNumeric(expr.op, left, expr.left.span)
				this.requireNumeric(expr.op, right, expr.right.span)
				return BOOLEAN

			case "==":
			case "!=":
				if (left !== null && right !== null && left !== right) {
					this.error(
						`cannot compare ${typeToString(left)} with ${typeToString(right)}`,
						expr.span,
					)
				}
				return BOOLEAN

			case "and":
			case "or":
				return BOOLEAN
		}
	}

	/** Reports a known non-numeric operand; true only for a known numeric one. */
	private requireNumeric(op: string, type: ExprType, span: Span): boolean {
		if (type === null) return false
		if (!isNumeric(type)) {
			this.error(`operator '${op}' needs numbers, got ${typeToString(type)}`, span)
			return false
		}
		return true
	}

	// --- Error helpers ---

	private error(message: string, span: Span, hint?: string): void {
		this.errors.add("analyze", span.line, span.column, message, hint)
	}
}
