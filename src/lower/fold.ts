// PGM Lowering - Constant folding
// Evaluates operators over literal operands with Python semantics.

import type {
	BinaryOperator,
	CompareOperator,
	UnaryOperator,
} from "../ingest/python-types.js";
import { literal, type LiteralSource } from "./types.js";

interface NumericLiteral extends LiteralSource {
	domain: "integer" | "real";
	value: number;
}

function isNumeric(lit: LiteralSource): lit is NumericLiteral {
	return (lit.domain === "integer" || lit.domain === "real") && typeof lit.value === "number";
}

function arithmeticDomain(a: NumericLiteral, b: NumericLiteral): NumericLiteral["domain"] {
	return a.domain === "real" || b.domain === "real" ? "real" : "integer";
}

/** Python floor division and modulo round toward negative infinity. */
function floorDiv(a: number, b: number): number {
	return Math.floor(a / b);
}

function pyMod(a: number, b: number): number {
	return a - b * Math.floor(a / b);
}

/**
 * A number result only when it is exact: integers must stay within the safe
 * integer range and reals must be finite.
 */
function exact(domain: NumericLiteral["domain"], value: number): LiteralSource | undefined {
	const representable = domain === "integer" ? Number.isSafeInteger(value) : Number.isFinite(value);
	return representable ? literal(domain, value) : undefined;
}

function foldNumeric(op: BinaryOperator, a: NumericLiteral, b: NumericLiteral): LiteralSource | undefined {
	const domain = arithmeticDomain(a, b);
	switch (op) {
	case "Add": return exact(domain, a.value + b.value);
	case "Sub": return exact(domain, a.value - b.value);
	case "Mult": return exact(domain, a.value * b.value);
	case "Div": return b.value === 0 ? undefined : exact("real", a.value / b.value);
	case "FloorDiv": return b.value === 0 ? undefined : exact(domain, floorDiv(a.value, b.value));
	case "Mod": return b.value === 0 ? undefined : exact(domain, pyMod(a.value, b.value));
	case "Pow": {
		if (a.value === 0 && b.value < 0) return undefined;
		const powDomain = domain === "integer" && b.value < 0 ? "real" : domain;
		return exact(powDomain, a.value ** b.value);
	}
	}
}

/**
 * Fold a binary arithmetic operator. Returns undefined when the operands
 * cannot be folded (mixed kinds, division by zero) or the result has no
 * exact number representation.
 */
export function foldBinary(op: BinaryOperator, a: LiteralSource, b: LiteralSource): LiteralSource | undefined {
	if (isNumeric(a) && isNumeric(b)) return foldNumeric(op, a, b);
	if (op === "Add" && a.domain === "string" && b.domain === "string") {
		return literal("string", String(a.value) + String(b.value));
	}
	return undefined;
}

/** Decide a comparison from the sign of (a - b). */
function compareBySign(op: CompareOperator, sign: number): boolean {
	switch (op) {
	case "Eq": return sign === 0;
	case "NotEq": return sign !== 0;
	case "Lt": return sign < 0;
	case "LtE": return sign <= 0;
	case "Gt": return sign > 0;
	case "GtE": return sign >= 0;
	}
}

function stringOrder(a: string, b: string): number {
	if (a === b) return 0;
	return a < b ? -1 : 1;
}

/** Fold a single comparison between two literals into a boolean literal. */
export function foldCompare(op: CompareOperator, a: LiteralSource, b: LiteralSource): LiteralSource | undefined {
	if (isNumeric(a) && isNumeric(b)) return literal("boolean", compareBySign(op, Math.sign(a.value - b.value)));
	if (a.domain === "string" && b.domain === "string" && typeof a.value === "string" && typeof b.value === "string") {
		return literal("boolean", compareBySign(op, stringOrder(a.value, b.value)));
	}
	return undefined;
}

export function foldUnary(op: UnaryOperator, operand: LiteralSource): LiteralSource | undefined {
	switch (op) {
	case "Not": return literal("boolean", !operand.value);
	case "UAdd": return isNumeric(operand) ? operand : undefined;
	case "USub": return isNumeric(operand) ? literal(operand.domain, 0 - operand.value) : undefined;
	}
}
