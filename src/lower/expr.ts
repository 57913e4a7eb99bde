// PGM Lowering - Expressions
// Converts expression subtrees into ordered lists of source descriptors.

import { PGMError } from "../errors.js";
import type {
	CallExpr,
	ConstantKind,
	Expr,
	SubscriptExpr,
} from "../ingest/python-types.js";
import type { Domain, VariableReference } from "../zod-schemas.js";
import { readVersion, writeVersion, type TraversalContext } from "./context.js";
import { foldBinary, foldCompare, foldUnary } from "./fold.js";
import {
	literal,
	variableRef,
	type CallSource,
	type LiteralSource,
	type SourceDescriptor,
} from "./types.js";

const CONSTANT_DOMAINS: Record<ConstantKind, Domain> = {
	int: "integer",
	float: "real",
	str: "string",
	bool: "boolean",
};

// `[0] * 5` repeats a list; it is not arithmetic on its element
function isSequence(expr: Expr): boolean {
	return expr.kind === "list" || expr.kind === "tuple";
}

function singleLiteral(sources: SourceDescriptor[]): LiteralSource | undefined {
	const [only] = sources;
	return sources.length === 1 && only?.kind === "literal" ? only : undefined;
}

//==============================================================================
// Reads
//==============================================================================

/**
 * Lower an expression in read position.
 *
 * Operator nodes contribute the concatenation of their operands' descriptors;
 * operators over literal operands are folded into a single literal.
 */
export function lowerExpr(expr: Expr, ctx: TraversalContext): SourceDescriptor[] {
	switch (expr.kind) {
	case "constant":
		return [literal(CONSTANT_DOMAINS[expr.valueKind], expr.value)];
	case "name":
		if (expr.ctx === "del") throw PGMError.unsupportedConstruct("Delete", expr.line);
		return [variableRef(
			expr.id,
			expr.ctx === "store" ? writeVersion(ctx, expr.id) : readVersion(ctx, expr.id),
		)];
	case "binOp": {
		const left = lowerExpr(expr.left, ctx);
		const right = lowerExpr(expr.right, ctx);
		const a = singleLiteral(left);
		const b = singleLiteral(right);
		const folded = a && b && !isSequence(expr.left) && !isSequence(expr.right)
			? foldBinary(expr.op, a, b)
			: undefined;
		return folded ? [folded] : [...left, ...right];
	}
	case "unaryOp": {
		const operand = lowerExpr(expr.operand, ctx);
		const lit = singleLiteral(operand);
		const folded = lit ? foldUnary(expr.op, lit) : undefined;
		return folded ? [folded] : operand;
	}
	case "boolOp":
		return expr.values.flatMap((v) => lowerExpr(v, ctx));
	case "compare": {
		const left = lowerExpr(expr.left, ctx);
		const rights = expr.comparators.map((c) => lowerExpr(c, ctx));
		const [op] = expr.ops;
		const [right] = rights;
		if (expr.ops.length === 1 && op !== undefined && right !== undefined) {
			const a = singleLiteral(left);
			const b = singleLiteral(right);
			const folded = a && b ? foldCompare(op, a, b) : undefined;
			if (folded) return [folded];
		}
		return [...left, ...rights.flat()];
	}
	case "call":
		return [lowerCall(expr, ctx)];
	case "subscript": {
		if (expr.ctx !== "load") throw PGMError.unsupportedConstruct("Subscript", expr.line, "Subscript write in expression position");
		const base = subscriptBase(expr);
		return [variableRef(base, readVersion(ctx, base))];
	}
	case "list":
	case "tuple":
		if (expr.ctx !== "load") {
			throw PGMError.unsupportedConstruct(expr.kind === "list" ? "List" : "Tuple", expr.line, "Destructuring targets are not supported");
		}
		return expr.elts.flatMap((e) => lowerExpr(e, ctx));
	case "attribute":
		throw PGMError.unsupportedConstruct("Attribute", expr.line, "Attribute access is only supported as a call target");
	case "unsupported":
		throw PGMError.unsupportedConstruct(expr.nodeType, expr.line);
	}
}

//==============================================================================
// Calls
//==============================================================================

/**
 * Qualified callee name: `f` for a plain call, `module.f` for an attribute
 * call on a (possibly dotted) receiver.
 */
export function resolveCallee(func: Expr, line?: number): string {
	switch (func.kind) {
	case "name": return func.id;
	case "attribute": return resolveCallee(func.value, line ?? func.line) + "." + func.attr;
	default:
		throw PGMError.unsupportedConstruct("Call", line, "Unsupported callee expression");
	}
}

export function lowerCall(expr: CallExpr, ctx: TraversalContext): CallSource {
	if (expr.keywords.length > 0) {
		throw PGMError.unsupportedConstruct("Call", expr.line, "Keyword arguments are not supported (" + expr.keywords.join(", ") + ")");
	}
	const functionName = resolveCallee(expr.func, expr.line);
	return {
		kind: "call",
		functionName,
		inputs: expr.args.map((arg) => lowerExpr(arg, ctx)),
	};
}

//==============================================================================
// Subscripts
//==============================================================================

/**
 * Array variable of a subscript. Only constant integer indices on a plain
 * variable are accepted; every element shares the array's version counter.
 */
export function subscriptBase(expr: SubscriptExpr): string {
	if (expr.value.kind !== "name") {
		throw PGMError.unsupportedConstruct("Subscript", expr.line, "Only subscripts of plain variables are supported");
	}
	const index = expr.slice;
	const constantIndex = index.kind === "constant" && index.valueKind === "int";
	const negativeIndex = index.kind === "unaryOp" && index.op === "USub"
		&& index.operand.kind === "constant" && index.operand.valueKind === "int";
	if (!constantIndex && !negativeIndex) {
		throw PGMError.arrayIndexing(expr.value.id, expr.line);
	}
	return expr.value.id;
}

//==============================================================================
// Writes
//==============================================================================

export interface WriteTarget {
	/** Version produced by the write */
	reference: VariableReference;
	/** Prior version of an array updated in place */
	carried?: VariableReference;
}

/**
 * Lower an assignment target. Names get a fresh version; a subscript write
 * reads the array's current version and then versions the whole array.
 */
export function lowerTarget(target: Expr, ctx: TraversalContext): WriteTarget {
	switch (target.kind) {
	case "name":
		return { reference: { variable: target.id, index: writeVersion(ctx, target.id) } };
	case "subscript": {
		const base = subscriptBase(target);
		const carried = { variable: base, index: readVersion(ctx, base) };
		return { reference: { variable: base, index: writeVersion(ctx, base) }, carried };
	}
	case "tuple":
	case "list":
		throw PGMError.unsupportedConstruct(target.kind === "list" ? "List" : "Tuple", target.line, "Destructuring targets are not supported");
	default:
		throw PGMError.unsupportedConstruct("Assign", target.line, "Unsupported assignment target");
	}
}
