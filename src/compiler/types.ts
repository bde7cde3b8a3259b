// Declared types of the pseudo-code language, shared by the analyzer and codegen.

export type DeclaredType = "integer" | "real" | "string" | "boolean"

export const INTEGER: DeclaredType = "integer"
export const REAL: DeclaredType = "real"
export const STRING: DeclaredType = "string"
export const BOOLEAN: DeclaredType = "boolean"

/** Spelled the way the source declares it. */
export function typeToString(t: DeclaredType | null): string {
	switch (t) {
		case "integer":
			return "ENTIER"
		case "real":
			return "REEL"
		case "string":
			return "TEXTE"
		case "boolean":
			return "BOOLEEN"
		case null:
			return "unknown"
	}
}

export function isNumeric(t: DeclaredType): boolean {
	return t === "integer" || t === "real"
}

/** Result type of an arithmetic operator over two numeric operands. */
export function promote(a: DeclaredType | null, b: DeclaredType | null): DeclaredType {
	return a === "real" || b === "real" ? REAL : INTEGER
}
