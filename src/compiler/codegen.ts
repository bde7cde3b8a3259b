// Python codegen for the pseudo-code language. Produces a flat Python 3 script
// from a type-checked AST in one top-down pass.

import type { Block, Decl, Expr, FuncDecl, Ident, IndexAccess, Program, Stmt, SwitchStmt } from "./ast"
import type { DeclaredType } from "./types"

const INDENT = "    "

const ZERO_VALUES: Record<DeclaredType, string> = {
	integer: "0",
	real: "0.0",
	string: '""',
	boolean: "False",
}

const INPUT_CALLS: Record<DeclaredType, string> = {
	integer: "int(input())",
	real: "float(input())",
	string: "input()",
	boolean: "input()",
}

// Declared type of each name in scope; arrays map to their element type.
type TypeEnv = ReadonlyMap<string, DeclaredType>

function declTypes(decls: readonly Decl[]): Map<string, DeclaredType> {
	const env = new Map<string, DeclaredType>()
	for (const d of decls) {
		env.set(d.name, d.kind === "ArrayDecl" ? d.elementType : d.type)
	}
	return env
}

function declInit(decl: Decl): string {
	if (decl.kind === "ArrayDecl") {
		return `${decl.name} = [${ZERO_VALUES[decl.elementType]}] * ${decl.size}`
	}
	return `${decl.name} = ${ZERO_VALUES[decl.type]}`
}

function realLiteral(value: number): string {
	const text = String(value)
	return /[.eE]/.test(text) ? text : `${text}.0`
}

function stringLiteral(value: string): string {
	return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`
}

// --- Entry point ---

export function generate(program: Program): string {
	return new PythonCodegen(program).generate()
}

// --- Generator ---

class PythonCodegen {
	private readonly program: Program
	private readonly globalTypes: Map<string, DeclaredType>
	private lines: string[] = []
	private indent = 0
	private env: TypeEnv

	constructor(program: Program) {
		this.program = program
		this.globalTypes = declTypes(program.decls)
		this.env = this.globalTypes
	}

	generate(): string {
		// Only arrays get a global initialiser; scalars first appear on assignment
		for (const decl of this.program.decls) {
			if (decl.kind === "ArrayDecl") {
				this.line(declInit(decl))
			}
		}

		for (const func of this.program.funcs) {
			this.emitFunc(func)
		}

		this.env = this.globalTypes
		this.emitStmts(this.program.body)

		return `${this.lines.join("\n")}\n`
	}

	private line(text: string): void {
		this.lines.push(INDENT.repeat(this.indent) + text)
	}

	// --- Functions ---

	private emitFunc(func: FuncDecl): void {
		const params = func.params.map((p) => p.name)
		this.line(`def ${func.name}(${params.join(", ")}):`)

		const local = new Map(this.globalTypes)
		for (const p of func.params) local.set(p.name, p.type)
		for (const [name, type] of declTypes(func.locals)) local.set(name, type)
		this.env = local

		this.indent++
		const start = this.lines.length

		const shadowed = new Set([...params, ...func.locals.map((d) => d.name)])
		const assigned = collectAssignedNames(func.body).filter(
			(name) => this.globalTypes.has(name) && !shadowed.has(name),
		)
		if (assigned.length > 0) {
			this.line(`global ${assigned.join(", ")}`)
		}

		for (const decl of func.locals) {
			this.line(declInit(decl))
		}
		for (const stmt of func.body.stmts) {
			this.emitStmt(stmt)
		}
		if (this.lines.length === start) {
			this.line("pass")
		}

		this.indent--
		this.lines.push("")
	}

	// --- Statements ---

	/** Statements at the current level; `pass` when they produce nothing. */
	private emitStmts(block: Block): void {
		const start = this.lines.length
		for (const stmt of block.stmts) {
			this.emitStmt(stmt)
		}
		if (this.lines.length === start) {
			this.line("pass")
		}
	}

	private emitBody(block: Block): void {
		this.indent++
		this.emitStmts(block)
		this.indent--
	}

	private emitStmt(stmt: Stmt): void {
		switch (stmt.kind) {
			case "AssignStmt":
				this.line(`${this.expr(stmt.target)} = ${this.expr(stmt.value)}`)
				break

			case "IfStmt":
				this.line(`if ${this.expr(stmt.condition)}:`)
				this.emitBody(stmt.then)
				if (stmt.else_) {
					this.line("else:")
					this.emitBody(stmt.else_)
				}
				break

			case "WhileStmt":
				this.line(`while ${this.expr(stmt.condition)}:`)
				this.emitBody(stmt.body)
				break

			case "ForStmt": {
				const from = this.expr(stmt.from)
				const to = this.expr(stmt.to)
				this.line(`for ${stmt.variable.name} in range(${from}, ${to} + 1):`)
				this.emitBody(stmt.body)
				break
			}

			case "SwitchStmt":
				this.emitSwitch(stmt)
				break

			case "PrintStmt":
				this.line(`print(${stmt.args.map((a) => this.expr(a)).join(", ")})`)
				break

			case "ReadStmt": {
				const type = this.targetType(stmt.target)
				const call = type ? INPUT_CALLS[type] : "input()"
				this.line(`${this.expr(stmt.target)} = ${call}`)
				break
			}

			case "ReturnStmt":
				this.line(stmt.value ? `return ${this.expr(stmt.value)}` : "return")
				break

			case "CallStmt":
				this.line(this.expr(stmt.call))
				break
		}
	}

	private emitSwitch(stmt: SwitchStmt): void {
		if (stmt.cases.length === 0) {
			// Nothing to test against: the default runs unconditionally, after
			// the subject when evaluating it calls a function
			if (containsCall(stmt.subject)) {
				this.line(this.expr(stmt.subject))
			}
			if (stmt.default_) {
				for (const s of stmt.default_.stmts) {
					this.emitStmt(s)
				}
			}
			return
		}

		const subject = this.expr(stmt.subject)
		stmt.cases.forEach((c, i) => {
			this.line(`${i === 0 ? "if" : "elif"} ${subject} == ${c.value}:`)
			this.emitBody(c.body)
		})
		if (stmt.default_) {
			this.line("else:")
			this.emitBody(stmt.default_)
		}
	}

	private targetType(target: Ident | IndexAccess): DeclaredType | undefined {
		return this.env.get(target.kind === "Ident" ? target.name : target.array)
	}

	// --- Expressions ---

	private expr(expr: Expr): string {
		switch (expr.kind) {
			case "IntLiteral":
				return expr.value.toString()
			case "RealLiteral":
				return realLiteral(expr.value)
			case "StringLiteral":
				return stringLiteral(expr.value)
			case "BoolLiteral":
				return expr.value ? "True" : "False"
			case "Ident":
				return expr.name
			case "IndexAccess":
				return `${expr.array}[${this.expr(expr.index)}]`
			case "CallExpr":
				return `${expr.callee}(${expr.args.map((a) => this.expr(a)).join(", ")})`
			case "UnaryExpr":
				return expr.op === "not"
					? `(not ${this.expr(expr.operand)})`
					: `(-${this.expr(expr.operand)})`
			case "BinaryExpr":
				return `(${this.expr(expr.left)} ${expr.op} ${this.expr(expr.right)})`
		}
	}
}

function containsCall(expr: Expr): boolean {
	switch (expr.kind) {
		case "CallExpr":
			return true
		case "IndexAccess":
			return containsCall(expr.index)
		case "UnaryExpr":
			return containsCall(expr.operand)
		case "BinaryExpr":
			return containsCall(expr.left) || containsCall(expr.right)
		default:
			return false
	}
}

/** Scalar names a block writes to (assignment, LIRE, POUR), in first-write order. */
export function collectAssignedNames(block: Block): string[] {
	const names: string[] = []
	const note = (name: string) => {
		if (!names.includes(name)) names.push(name)
	}

	const walk = (stmts: readonly Stmt[]): void => {
		for (const stmt of stmts) {
			switch (stmt.kind) {
				case "AssignStmt":
				case "ReadStmt":
					if (stmt.target.kind === "Ident") note(stmt.target.name)
					break
				case "ForStmt":
					note(stmt.variable.name)
					walk(stmt.body.stmts)
					break
				case "IfStmt":
					walk(stmt.then.stmts)
					if (stmt.else_) walk(stmt.else_.stmts)
					break
				case "WhileStmt":
					walk(stmt.body.stmts)
					break
				case "SwitchStmt":
					for (const c of stmt.cases) walk(c.body.stmts)
					if (stmt.default_) walk(stmt.default_.stmts)
					break
				default:
					break
			}
		}
	}

	walk(block.stmts)
	return names
}
