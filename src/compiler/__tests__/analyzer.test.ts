import { describe, expect, it } from "vitest"
import type { AnalysisResult } from "../analyzer"
import { analyze } from "../analyzer"
import { Lexer } from "../lexer"
import { parse } from "../parser"

function analyzeSource(source: string): AnalysisResult {
	const tokens = new Lexer(source).tokenize()
	const { program, errors } = parse(tokens)
	if (!program) {
		throw new Error(`Unexpected parse error: ${errors.errors.map((e) => e.message).join("; ")}`)
	}
	return analyze(program)
}

function analyzeValid(source: string): AnalysisResult {
	const result = analyzeSource(source)
	if (result.errors.hasErrors()) {
		const msgs = result.errors.errors.map((e) => e.message).join("\n")
		throw new Error(`Expected no errors but got:\n${msgs}`)
	}
	return result
}

function errorMessages(source: string): string[] {
	return analyzeSource(source).errors.errors.map((e) => e.message)
}

/** A program with the given global declarations, function definitions and main body. */
function prog(decls: string, body: string, funcs = ""): string {
	return `ALGORITHME T\nVARIABLES\n${decls}\n${funcs}\nDEBUT\n${body}\nFIN\n`
}

const CARRE = `FONCTION carre(n : ENTIER) RETOURNE ENTIER
  RETOURNE n * n
FINFONCTION`

const AFFICHE = `PROCEDURE affiche(v : ENTIER)
  ECRIRE(v)
FINPROCEDURE`

describe("analyzer", () => {
	describe("declarations", () => {
		it("accepts a well-typed program", () => {
			const result = analyzeValid(
				prog(
					"x : ENTIER\nmoy : REEL\nt[3] : REEL",
					"x <- carre(2)\nt[0] <- 1.5\nmoy <- t[0] + x\naffiche(x)",
					`${CARRE}\n${AFFICHE}`,
				),
			)
			expect(result.globals.resolve("t")).toMatchObject({ kind: "array", type: "real", size: 3n })
			expect(result.funcs.get("carre")).toMatchObject({
				params: [{ name: "n", type: "integer" }],
				returnType: "integer",
			})
			expect(result.funcs.get("affiche")?.returnType).toBeNull()
		})

		it("reports a duplicate global exactly once", () => {
			const result = analyzeSource(prog("x : ENTIER\nx : REEL", ""))
			expect(result.errors.errors).toHaveLength(1)
			expect(result.errors.errors[0]).toMatchObject({
				phase: "analyze",
				message: "'x' is already declared",
				line: 4,
				column: 1,
				hint: "previous declaration at line 3",
			})
		})

		it("reports a local reusing a parameter name exactly once", () => {
			const messages = errorMessages(
				prog(
					"",
					"",
					"FONCTION f(n : ENTIER) RETOURNE ENTIER\nVARIABLES\n  n : ENTIER\n  RETOURNE n\nFINFONCTION",
				),
			)
			expect(messages).toEqual(["'n' is already declared in 'f'"])
		})

		it("rejects an empty array", () => {
			expect(errorMessages(prog("t[0] : ENTIER", ""))).toEqual([
				"array 't' must have a positive size, got 0",
			])
		})

		it("rejects a duplicate function", () => {
			expect(errorMessages(prog("", "", `${CARRE}\n${CARRE}`))).toEqual([
				"function 'carre' is already declared",
			])
		})

		it("rejects a function named like a global", () => {
			expect(errorMessages(prog("carre : ENTIER", "", CARRE))).toEqual([
				"function 'carre' has the same name as a global variable",
			])
		})

		it("lets a local shadow a global of another type", () => {
			analyzeValid(
				prog("x : TEXTE", 'x <- "ok"', "PROCEDURE p()\nVARIABLES\n  x : ENTIER\n  x <- 1\nFINPROCEDURE"),
			)
		})

		it("keeps function locals out of the main body", () => {
			expect(
				errorMessages(prog("", "y <- 1", "PROCEDURE p()\nVARIABLES\n  y : ENTIER\n  y <- 2\nFINPROCEDURE")),
			).toEqual(["undeclared identifier 'y'"])
		})

		it("lets functions read and write globals", () => {
			analyzeValid(prog("total : ENTIER", "total <- 0", "PROCEDURE p(v : ENTIER)\n  total <- total + v\nFINPROCEDURE"))
		})
	})

	describe("identifiers", () => {
		it("reports each undeclared use once", () => {
			expect(errorMessages(prog("", "x <- y + z"))).toEqual([
				"undeclared identifier 'x'",
				"undeclared identifier 'y'",
				"undeclared identifier 'z'",
			])
		})

		it("points at the undeclared name", () => {
			const result = analyzeSource(prog("x : ENTIER", "x <- 1 + inconnu"))
			expect(result.errors.errors[0]).toMatchObject({ line: 6, column: 10 })
		})

		it("suggests calling a function used as a variable", () => {
			const result = analyzeSource(prog("x : ENTIER", "x <- carre", CARRE))
			expect(result.errors.errors[0]).toMatchObject({
				message: "undeclared identifier 'carre'",
				hint: "call it as carre(...)",
			})
		})
	})

	describe("assignment", () => {
		it("accepts a mixed sum into a REEL", () => {
			analyzeValid(prog("x : REEL", "x <- 1 + 2.0"))
		})

		it("rejects a mixed sum into an ENTIER", () => {
			expect(errorMessages(prog("x : ENTIER", "x <- 1 + 2.0"))).toEqual(["cannot assign REEL to ENTIER"])
		})

		it("does not widen ENTIER to REEL", () => {
			const result = analyzeSource(prog("x : REEL", "x <- 2"))
			expect(result.errors.errors[0]).toMatchObject({
				message: "cannot assign ENTIER to REEL",
				hint: "write the value as a real, e.g. 2.0",
			})
		})

		it("checks boolean assignment", () => {
			analyzeValid(prog("b : BOOLEEN\nx : ENTIER", "b <- x > 1 ET NON FAUX"))
			expect(errorMessages(prog("b : BOOLEEN", 'b <- "vrai"'))).toEqual(["cannot assign TEXTE to BOOLEEN"])
		})
	})

	describe("operators", () => {
		it("rejects text in arithmetic without a follow-up error", () => {
			expect(errorMessages(prog("x : ENTIER", 'x <- "a" + 1'))).toEqual(["operator '+' needs numbers, got TEXTE"])
		})

		it("reports each offending side", () => {
			expect(errorMessages(prog("x : ENTIER", 'x <- "a" * VRAI'))).toEqual([
				"operator '*' needs numbers, got TEXTE",
				"operator '*' needs numbers, got BOOLEEN",
			])
		})

		it("requires numbers in ordering comparisons", () => {
			expect(errorMessages(prog("b : BOOLEEN", 'b <- "a" < 2'))).toEqual(["operator '<' needs numbers, got TEXTE"])
		})

		it("requires equal types in equality", () => {
			expect(errorMessages(prog("b : BOOLEEN\nx : ENTIER", 'b <- x == "a"'))).toEqual([
				"cannot compare ENTIER with TEXTE",
			])
		})

		it("types unary minus by its operand", () => {
			analyzeValid(prog("x : REEL", "x <- -x"))
			expect(errorMessages(prog("x : ENTIER", 'x <- -"a"'))).toEqual(["operator '-' needs a number, got TEXTE"])
		})

		it("promotes modulo and division like the other operators", () => {
			analyzeValid(prog("x : ENTIER\ny : REEL", "x <- x % 2\ny <- x / 2.0"))
		})
	})

	describe("arrays", () => {
		it("requires an ENTIER index", () => {
			expect(errorMessages(prog("t[3] : ENTIER", "t[1.5] <- 1"))).toEqual(["array index must be ENTIER, got REEL"])
		})

		it("rejects an array used without index", () => {
			expect(errorMessages(prog("t[3] : ENTIER\nx : ENTIER", "x <- t"))).toEqual(["array 't' must be indexed"])
			expect(errorMessages(prog("t[3] : ENTIER", "ECRIRE(t)"))).toEqual(["array 't' must be indexed"])
		})

		it("rejects indexing a scalar", () => {
			expect(errorMessages(prog("x : ENTIER", "x[0] <- 1"))).toEqual(["'x' is not an array"])
		})

		it("checks the element type on read and write", () => {
			expect(errorMessages(prog("t[3] : TEXTE\nx : ENTIER", "x <- t[0]"))).toEqual(["cannot assign TEXTE to ENTIER"])
			analyzeValid(prog("t[3] : TEXTE", "LIRE(t[2])"))
		})
	})

	describe("calls", () => {
		it("checks the argument count", () => {
			expect(errorMessages(prog("x : ENTIER", "x <- carre(1, 2)", CARRE))).toEqual([
				"'carre' expects 1 argument(s), got 2",
			])
		})

		it("checks argument types", () => {
			expect(errorMessages(prog("x : ENTIER", "x <- carre(2.0)", CARRE))).toEqual([
				"argument 1 of 'carre': expected ENTIER, got REEL",
			])
		})

		it("rejects an unknown function", () => {
			expect(errorMessages(prog("x : ENTIER", "x <- g(1)"))).toEqual(["undeclared function 'g'"])
		})

		it("rejects a procedure inside an expression", () => {
			expect(errorMessages(prog("x : ENTIER", "x <- affiche(1)", AFFICHE))).toEqual([
				"procedure 'affiche' has no value",
			])
		})

		it("accepts functions and procedures as statements", () => {
			analyzeValid(prog("", "affiche(1)\ncarre(2)", `${CARRE}\n${AFFICHE}`))
		})

		it("checks undeclared names inside arguments", () => {
			expect(errorMessages(prog("", "affiche(k)", AFFICHE))).toEqual(["undeclared identifier 'k'"])
		})
	})

	describe("returns", () => {
		it("rejects RETOURNE in the main body", () => {
			expect(errorMessages(prog("", "RETOURNE 1"))).toEqual(["'RETOURNE' outside a function"])
		})

		it("rejects a value returned from a procedure", () => {
			expect(errorMessages(prog("", "", "PROCEDURE p()\n  RETOURNE 1\nFINPROCEDURE"))).toEqual([
				"procedure 'p' cannot return a value",
			])
		})

		it("requires a value from a function", () => {
			expect(errorMessages(prog("", "", "FONCTION f() RETOURNE ENTIER\n  RETOURNE\nFINFONCTION"))).toEqual([
				"function 'f' must return a value of type ENTIER",
			])
		})

		it("checks the returned type", () => {
			expect(errorMessages(prog("", "", 'FONCTION f() RETOURNE ENTIER\n  RETOURNE "a"\nFINFONCTION'))).toEqual([
				"cannot return TEXTE from 'f', expected ENTIER",
			])
		})
	})

	describe("control flow", () => {
		it("checks POUR", () => {
			analyzeValid(prog("i : ENTIER", "POUR i DE 1 A 10 FAIRE\n  ECRIRE(i)\nFINPOUR"))
			expect(errorMessages(prog("", "POUR i DE 1 A 3 FAIRE\nFINPOUR"))).toEqual(["undeclared identifier 'i'"])
			expect(errorMessages(prog("i : ENTIER", 'POUR i DE 1 A "dix" FAIRE\nFINPOUR'))).toEqual([
				"loop end bound must be a number, got TEXTE",
			])
		})

		it("checks CAS", () => {
			analyzeValid(prog("r : REEL", "CAS r FAIRE\n  1 : ECRIRE(1)\nFINCAS"))
			expect(errorMessages(prog("", "CAS y FAIRE\n  1 : ECRIRE(1)\nFINCAS"))).toEqual([
				"undeclared identifier 'y'",
			])
			expect(
				errorMessages(prog("x : ENTIER", "CAS x FAIRE\n  1 : ECRIRE(1)\n  1 : ECRIRE(2)\nFINCAS")),
			).toEqual(["duplicate case 1"])
		})

		it("checks nested bodies", () => {
			expect(
				errorMessages(
					prog("x : ENTIER", "SI x > 0 ALORS\n  TANTQUE x > 0 FAIRE\n    y <- 1\n  FINTANTQUE\nSINON\n  z <- 2\nFINSI"),
				),
			).toEqual(["undeclared identifier 'y'", "undeclared identifier 'z'"])
		})
	})

	it("orders errors globals, functions, then main body", () => {
		const result = analyzeSource(prog("x : ENTIER\nx : ENTIER", "b <- 1", "PROCEDURE p()\n  a <- 1\nFINPROCEDURE"))
		expect(result.errors.errors.map((e) => e.message)).toEqual([
			"'x' is already declared",
			"undeclared identifier 'a'",
			"undeclared identifier 'b'",
		])
	})
})
