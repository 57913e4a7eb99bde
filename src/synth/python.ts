// PGM Python Synthesizer
// Renders syntax tree fragments back to Python source for lambda bodies

import { PGMError } from "../errors.js";
import type {
	AnnAssignStmt,
	AssignStmt,
	BinaryOperator,
	BoolOperator,
	CompareOperator,
	ConstantKind,
	Expr,
	UnaryOperator,
} from "../ingest/python-types.js";
import type { Domain } from "../zod-schemas.js";

//==============================================================================
// Operator maps
//==============================================================================

const BINARY_OPERATOR_MAP: Record<BinaryOperator, string> = {
	Add: "+",
	Sub: "-",
	Mult: "*",
	Div: "/",
	FloorDiv: "//",
	Mod: "%",
	Pow: "**",
};

const UNARY_OPERATOR_MAP: Record<UnaryOperator, string> = {
	USub: "-",
	UAdd: "+",
	Not: "not ",
};

const BOOL_OPERATOR_MAP: Record<BoolOperator, string> = {
	And: "and",
	Or: "or",
};

const COMPARE_OPERATOR_MAP: Record<CompareOperator, string> = {
	Eq: "==",
	NotEq: "!=",
	Lt: "<",
	LtE: "<=",
	Gt: ">",
	GtE: ">=",
};

//==============================================================================
// Literals
//==============================================================================

/**
 * Python's float spelling: positional between 1e-4 and 1e16 with at least
 * one fractional digit, otherwise exponent form with a two-digit exponent.
 */
function formatReal(value: number): string {
	const magnitude = Math.abs(value);
	if (magnitude !== 0 && (magnitude >= 1e16 || magnitude < 1e-4)) {
		return value.toExponential().replace(/e([+-])(\d)$/, (_match, sign: string, digit: string) => `e${sign}0${digit}`);
	}
	return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/** Python source spelling of a constant. */
export function formatConstant(kind: ConstantKind, value: number | string | boolean): string {
	switch (kind) {
	case "bool": return value === true ? "True" : "False";
	case "str": return JSON.stringify(String(value));
	case "int": return String(value);
	case "float": return typeof value === "number" ? formatReal(value) : String(value);
	}
}

/**
 * Text of a literal as Python's `str()` prints it: strings are unquoted,
 * reals keep a fractional part.
 */
export function formatLiteralText(domain: Domain, value: number | string | boolean): string {
	switch (domain) {
	case "boolean": return value === true ? "True" : "False";
	case "string": return String(value);
	case "integer": return String(value);
	case "real": return typeof value === "number" ? formatReal(value) : String(value);
	}
}

//==============================================================================
// Expressions
//==============================================================================

/**
 * Render an expression. Compound sub-expressions are parenthesized; the
 * outermost expression is not.
 */
export function synthesizeExpr(expr: Expr, nested = false): string {
	const wrap = (code: string): string => (nested ? `(${code})` : code);
	switch (expr.kind) {
	case "constant": return formatConstant(expr.valueKind, expr.value);
	case "name": return expr.id;
	case "attribute": return `${synthesizeExpr(expr.value, true)}.${expr.attr}`;
	case "binOp":
		return wrap(`${synthesizeExpr(expr.left, true)} ${BINARY_OPERATOR_MAP[expr.op]} ${synthesizeExpr(expr.right, true)}`);
	case "unaryOp":
		return wrap(`${UNARY_OPERATOR_MAP[expr.op]}${synthesizeExpr(expr.operand, true)}`);
	case "boolOp":
		return wrap(expr.values.map((v) => synthesizeExpr(v, true)).join(` ${BOOL_OPERATOR_MAP[expr.op]} `));
	case "compare": {
		const parts = [synthesizeExpr(expr.left, true)];
		expr.ops.forEach((op, i) => {
			const right = expr.comparators[i];
			if (right === undefined) throw PGMError.unsupportedConstruct("Compare", expr.line, "Comparison is missing an operand");
			parts.push(COMPARE_OPERATOR_MAP[op], synthesizeExpr(right, true));
		});
		return wrap(parts.join(" "));
	}
	case "call":
		return `${synthesizeExpr(expr.func, true)}(${expr.args.map((a) => synthesizeExpr(a)).join(", ")})`;
	case "subscript":
		return `${synthesizeExpr(expr.value, true)}[${synthesizeExpr(expr.slice)}]`;
	case "list":
		return `[${expr.elts.map((e) => synthesizeExpr(e)).join(", ")}]`;
	case "tuple": {
		const items = expr.elts.map((e) => synthesizeExpr(e));
		return items.length === 1 ? `(${items[0] ?? ""},)` : `(${items.join(", ")})`;
	}
	case "unsupported":
		throw PGMError.unsupportedConstruct(expr.nodeType, expr.line);
	}
}

//==============================================================================
// Statements
//==============================================================================

export function synthesizeAssignment(stmt: AssignStmt | AnnAssignStmt): string {
	if (stmt.kind === "assign") {
		const targets = stmt.targets.map((t) => synthesizeExpr(t));
		return `${targets.join(" = ")} = ${synthesizeExpr(stmt.value)}`;
	}
	const declaration = `${synthesizeExpr(stmt.target)}: ${synthesizeExpr(stmt.annotation)}`;
	return stmt.value ? `${declaration} = ${synthesizeExpr(stmt.value)}` : declaration;
}

//==============================================================================
// Lambdas
//==============================================================================

export interface LambdaSource {
	name: string;
	inputs: string[];
	/** Statement lines of the body, without indentation */
	body: string[];
	/** Returned expression */
	returns: string;
}

const INDENT = "    ";

/**
 * Render a standalone Python function followed by a blank line.
 *
 * @example
 * synthesizeLambda({ name: "f", inputs: ["x"], body: ["y = x + 3"], returns: "y" })
 * // "def f(x):\n    y = x + 3\n    return y\n\n"
 */
export function synthesizeLambda(source: LambdaSource): string {
	const lines = [`def ${source.name}(${source.inputs.join(", ")}):`];
	for (const line of source.body) lines.push(INDENT + line);
	lines.push(`${INDENT}return ${source.returns}`);
	return lines.join("\n") + "\n\n";
}
