import { describe, expect, it } from "vitest"
import type { PsoSymbol } from "../symbol-table"
import { SymbolTable } from "../symbol-table"

function variable(name: string, line = 1): PsoSymbol {
	return { name, type: "integer", kind: "variable", span: { line, column: 1 } }
}

describe("SymbolTable", () => {
	it("declares and resolves a symbol", () => {
		const table = new SymbolTable()
		expect(table.declare(variable("x"))).toEqual({ ok: true })
		expect(table.resolve("x")).toEqual(variable("x"))
	})

	it("rejects a duplicate in the same table and returns the first", () => {
		const table = new SymbolTable()
		table.declare(variable("x", 1))
		const result = table.declare(variable("x", 2))
		expect(result).toEqual({ ok: false, existing: variable("x", 1) })
		expect(table.resolve("x")?.span.line).toBe(1)
	})

	it("returns undefined for an unknown name", () => {
		expect(new SymbolTable().resolve("inconnu")).toBeUndefined()
	})

	it("resolves through the parent", () => {
		const globals = new SymbolTable()
		globals.declare(variable("g"))
		const local = new SymbolTable(globals)
		expect(local.resolve("g")).toEqual(variable("g"))
		expect(local.lookupLocal("g")).toBeUndefined()
	})

	it("lets a child shadow its parent", () => {
		const globals = new SymbolTable()
		globals.declare(variable("x"))
		const local = new SymbolTable(globals)
		const shadow: PsoSymbol = { name: "x", type: "string", kind: "parameter", span: { line: 4, column: 9 } }
		expect(local.declare(shadow)).toEqual({ ok: true })
		expect(local.resolve("x")).toBe(shadow)
		expect(globals.resolve("x")?.type).toBe("integer")
	})

	it("does not leak child declarations into the parent", () => {
		const globals = new SymbolTable()
		const local = new SymbolTable(globals)
		local.declare(variable("tmp"))
		expect(globals.resolve("tmp")).toBeUndefined()
	})

	it("lists entries in declaration order", () => {
		const table = new SymbolTable()
		table.declare(variable("b"))
		table.declare(variable("a"))
		expect(table.entries().map((s) => s.name)).toEqual(["b", "a"])
	})
})
