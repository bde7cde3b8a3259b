import type { Span } from "./ast"
import type { DeclaredType } from "./types"

export type SymbolKind = "variable" | "array" | "parameter"

export interface PsoSymbol {
	readonly name: string
	/** Element type for arrays. */
	readonly type: DeclaredType
	readonly kind: SymbolKind
	readonly size?: bigint
	readonly span: Span
}

export type DeclareResult = { readonly ok: true } | { readonly ok: false; readonly existing: PsoSymbol }

/**
 * One scope level. The global table has no parent; a function's table
 * points at the globals and lives only while that function is checked.
 */
export class SymbolTable {
	private readonly symbols = new Map<string, PsoSymbol>()
	readonly parent: SymbolTable | null

	constructor(parent?: SymbolTable) {
		this.parent = parent ?? null
	}

	declare(symbol: PsoSymbol): DeclareResult {
		const existing = this.symbols.get(symbol.name)
		if (existing) {
			return { ok: false, existing }
		}
		this.symbols.set(symbol.name, symbol)
		return { ok: true }
	}

	resolve(name: string): PsoSymbol | undefined {
		return this.symbols.get(name) ?? this.parent?.resolve(name)
	}

	lookupLocal(name: string): PsoSymbol | undefined {
		return this.symbols.get(name)
	}

	/** Symbols of this level, in declaration order. */
	entries(): PsoSymbol[] {
		return [...this.symbols.values()]
	}
}
