// Python AST normalization
// Validates bridge JSON with Zod and maps it onto the closed syntax unions.

import { z } from "zod/v4";
import { PGMError } from "../errors.js";
import type {
	Arg,
	BinaryOperator,
	BoolOperator,
	CompareOperator,
	ConstantExpr,
	ConstantKind,
	Expr,
	Module,
	NameContext,
	Stmt,
	UnaryOperator,
	UnsupportedExpr,
	UnsupportedStmt,
} from "./python-types.js";

//==============================================================================
// Raw node schemas
//==============================================================================

const RawNode = z.looseObject({
	_type: z.string(),
	lineno: z.number().int().optional(),
});

type RawNode = z.infer<typeof RawNode>;

const NodeList = z.array(z.unknown());

const ModuleFields = z.object({ body: NodeList });

const FunctionDefFields = z.object({
	name: z.string(),
	args: z.unknown(),
	body: NodeList,
});

const ArgumentsFields = z.object({
	args: NodeList,
	posonlyargs: NodeList.optional(),
	kwonlyargs: NodeList.optional(),
	vararg: z.unknown().optional(),
	kwarg: z.unknown().optional(),
});

const ArgFields = z.object({
	arg: z.string(),
	annotation: z.unknown().optional(),
});

const AssignFields = z.object({ targets: NodeList, value: z.unknown() });

const AnnAssignFields = z.object({
	target: z.unknown(),
	annotation: z.unknown(),
	value: z.unknown().optional(),
});

const IfFields = z.object({ test: z.unknown(), body: NodeList, orelse: NodeList });

const ForFields = z.object({
	target: z.unknown(),
	iter: z.unknown(),
	body: NodeList,
	orelse: NodeList,
});

const ValueFields = z.object({ value: z.unknown() });

const ConstantFields = z.object({
	value: z.union([z.number(), z.string(), z.boolean(), z.null()]),
	_valueType: z.string().optional(),
});

const NumFields = z.object({ n: z.number() });
const StrFields = z.object({ s: z.string() });

const NameFields = z.object({ id: z.string(), ctx: z.unknown().optional() });

const AttributeFields = z.object({
	value: z.unknown(),
	attr: z.string(),
	ctx: z.unknown().optional(),
});

const BinOpFields = z.object({ left: z.unknown(), op: RawNode, right: z.unknown() });

const UnaryOpFields = z.object({ op: RawNode, operand: z.unknown() });

const BoolOpFields = z.object({ op: RawNode, values: NodeList });

const CompareFields = z.object({
	left: z.unknown(),
	ops: z.array(RawNode),
	comparators: NodeList,
});

const KeywordFields = z.object({ arg: z.string().nullable() });

const CallFields = z.object({
	func: z.unknown(),
	args: NodeList,
	keywords: z.array(KeywordFields).optional(),
});

const SubscriptFields = z.object({
	value: z.unknown(),
	slice: z.unknown(),
	ctx: z.unknown().optional(),
});

const SequenceFields = z.object({ elts: NodeList, ctx: z.unknown().optional() });

//==============================================================================
// Operator tables
//==============================================================================

const BINARY_OPERATORS: Record<BinaryOperator, true> = {
	Add: true, Sub: true, Mult: true, Div: true, FloorDiv: true, Mod: true, Pow: true,
};

const UNARY_OPERATORS: Record<UnaryOperator, true> = { USub: true, UAdd: true, Not: true };

const BOOL_OPERATORS: Record<BoolOperator, true> = { And: true, Or: true };

const COMPARE_OPERATORS: Record<CompareOperator, true> = {
	Eq: true, NotEq: true, Lt: true, LtE: true, Gt: true, GtE: true,
};

function isBinaryOperator(op: string): op is BinaryOperator {
	return Object.hasOwn(BINARY_OPERATORS, op);
}

function isUnaryOperator(op: string): op is UnaryOperator {
	return Object.hasOwn(UNARY_OPERATORS, op);
}

function isBoolOperator(op: string): op is BoolOperator {
	return Object.hasOwn(BOOL_OPERATORS, op);
}

function isCompareOperator(op: string): op is CompareOperator {
	return Object.hasOwn(COMPARE_OPERATORS, op);
}

//==============================================================================
// Field extraction
//==============================================================================

function parseWith<T extends z.ZodType>(
	schema: T,
	raw: unknown,
	path: string,
): z.output<T> {
	const parsed = schema.safeParse(raw);
	if (parsed.success) return parsed.data;
	const issue = parsed.error.issues[0];
	const where = issue && issue.path.length > 0
		? path + "." + issue.path.map(String).join(".")
		: path;
	throw PGMError.invalidTree(where, issue?.message ?? "invalid node");
}

function located<T extends object>(node: T, raw: RawNode): T & { line?: number } {
	if (raw.lineno === undefined) return node;
	return { ...node, line: raw.lineno };
}

function parseContext(raw: unknown): NameContext {
	if (raw === undefined || raw === null) return "load";
	const node = RawNode.safeParse(raw);
	if (!node.success) return "load";
	switch (node.data._type) {
	case "Store": return "store";
	case "Del": return "del";
	default: return "load";
	}
}

//==============================================================================
// Module and statements
//==============================================================================

/**
 * Normalize a JSON-dumped Python module into a {@link Module}.
 *
 * @throws PGMError with code `InvalidSyntaxTree` when the JSON does not have
 * the shape of a Python AST.
 */
export function normalizeModule(raw: unknown, path = "$"): Module {
	const node = parseWith(RawNode, raw, path);
	if (node._type !== "Module") {
		throw PGMError.invalidTree(path, "expected Module, got " + node._type);
	}
	const fields = parseWith(ModuleFields, raw, path);
	return {
		kind: "module",
		body: normalizeBlock(fields.body, path + ".body"),
	};
}

function normalizeBlock(raw: unknown[], path: string): Stmt[] {
	return raw.map((stmt, i) => normalizeStmt(stmt, path + "." + String(i)));
}

function unsupportedStmt(raw: RawNode, nodeType = raw._type): UnsupportedStmt {
	return located({ kind: "unsupported" as const, nodeType }, raw);
}

export function normalizeStmt(raw: unknown, path: string): Stmt {
	const node = parseWith(RawNode, raw, path);
	switch (node._type) {
	case "FunctionDef": return normalizeFunctionDef(node, path);
	case "Assign": {
		const f = parseWith(AssignFields, node, path);
		return located({
			kind: "assign" as const,
			targets: f.targets.map((t, i) => normalizeExpr(t, path + ".targets." + String(i))),
			value: normalizeExpr(f.value, path + ".value"),
		}, node);
	}
	case "AnnAssign": {
		const f = parseWith(AnnAssignFields, node, path);
		const stmt = {
			kind: "annAssign" as const,
			target: normalizeExpr(f.target, path + ".target"),
			annotation: normalizeExpr(f.annotation, path + ".annotation"),
		};
		if (f.value === undefined || f.value === null) return located(stmt, node);
		return located({ ...stmt, value: normalizeExpr(f.value, path + ".value") }, node);
	}
	case "If": {
		const f = parseWith(IfFields, node, path);
		return located({
			kind: "if" as const,
			test: normalizeExpr(f.test, path + ".test"),
			body: normalizeBlock(f.body, path + ".body"),
			orelse: normalizeBlock(f.orelse, path + ".orelse"),
		}, node);
	}
	case "For": {
		const f = parseWith(ForFields, node, path);
		return located({
			kind: "for" as const,
			target: normalizeExpr(f.target, path + ".target"),
			iter: normalizeExpr(f.iter, path + ".iter"),
			body: normalizeBlock(f.body, path + ".body"),
			orelse: normalizeBlock(f.orelse, path + ".orelse"),
		}, node);
	}
	case "Expr": {
		const f = parseWith(ValueFields, node, path);
		return located({ kind: "expr" as const, value: normalizeExpr(f.value, path + ".value") }, node);
	}
	default:
		return unsupportedStmt(node);
	}
}

function normalizeFunctionDef(node: RawNode, path: string): Stmt {
	const f = parseWith(FunctionDefFields, node, path);
	const params = parseWith(ArgumentsFields, f.args, path + ".args");
	const variadic = (params.vararg ?? null) !== null || (params.kwarg ?? null) !== null;
	const extraArgs = (params.posonlyargs?.length ?? 0) + (params.kwonlyargs?.length ?? 0);
	if (variadic || extraArgs > 0) {
		return unsupportedStmt(node, "FunctionDef(" + f.name + ": non-positional parameters)");
	}
	return located({
		kind: "functionDef" as const,
		name: f.name,
		args: params.args.map((a, i) => normalizeArg(a, path + ".args.args." + String(i))),
		body: normalizeBlock(f.body, path + ".body"),
	}, node);
}

function normalizeArg(raw: unknown, path: string): Arg {
	const node = parseWith(RawNode, raw, path);
	const f = parseWith(ArgFields, node, path);
	const arg: Arg = located({ name: f.arg }, node);
	if (f.annotation === undefined || f.annotation === null) return arg;
	return { ...arg, annotation: normalizeExpr(f.annotation, path + ".annotation") };
}

//==============================================================================
// Expressions
//==============================================================================

function unsupportedExpr(raw: RawNode, nodeType = raw._type): UnsupportedExpr {
	return located({ kind: "unsupported" as const, nodeType }, raw);
}

const VALUE_KINDS: Record<ConstantKind, true> = { int: true, float: true, str: true, bool: true };

function isConstantKind(kind: string): kind is ConstantKind {
	return Object.hasOwn(VALUE_KINDS, kind);
}

function inferConstantKind(value: number | string | boolean): ConstantKind {
	if (typeof value === "boolean") return "bool";
	if (typeof value === "string") return "str";
	return Number.isInteger(value) ? "int" : "float";
}

function constantMatchesKind(value: number | string | boolean, kind: ConstantKind): boolean {
	switch (kind) {
	case "int": return typeof value === "number" && Number.isInteger(value);
	case "float": return typeof value === "number";
	case "str": return typeof value === "string";
	case "bool": return typeof value === "boolean";
	}
}

function normalizeConstant(node: RawNode, path: string): ConstantExpr | UnsupportedExpr {
	const f = parseWith(ConstantFields, node, path);
	if (f.value === null) return unsupportedExpr(node, "Constant(None)");
	const declared = f._valueType;
	if (declared === undefined) {
		return located({ kind: "constant" as const, valueKind: inferConstantKind(f.value), value: f.value }, node);
	}
	if (!isConstantKind(declared) || !constantMatchesKind(f.value, declared)) {
		return unsupportedExpr(node, "Constant(" + declared + ")");
	}
	return located({ kind: "constant" as const, valueKind: declared, value: f.value }, node);
}

function normalizeExprList(raw: unknown[], path: string): Expr[] {
	return raw.map((e, i) => normalizeExpr(e, path + "." + String(i)));
}

export function normalizeExpr(raw: unknown, path: string): Expr {
	const node = parseWith(RawNode, raw, path);
	switch (node._type) {
	case "Constant":
		return normalizeConstant(node, path);
	case "Num": {
		const f = parseWith(NumFields, node, path);
		return located({ kind: "constant" as const, valueKind: inferConstantKind(f.n), value: f.n }, node);
	}
	case "Str": {
		const f = parseWith(StrFields, node, path);
		return located({ kind: "constant" as const, valueKind: "str" as const, value: f.s }, node);
	}
	case "NameConstant":
		return normalizeConstant(node, path);
	case "Name": {
		const f = parseWith(NameFields, node, path);
		return located({ kind: "name" as const, id: f.id, ctx: parseContext(f.ctx) }, node);
	}
	case "Attribute": {
		const f = parseWith(AttributeFields, node, path);
		return located({
			kind: "attribute" as const,
			value: normalizeExpr(f.value, path + ".value"),
			attr: f.attr,
			ctx: parseContext(f.ctx),
		}, node);
	}
	case "BinOp": {
		const f = parseWith(BinOpFields, node, path);
		const op = f.op._type;
		if (!isBinaryOperator(op)) return unsupportedExpr(node, "BinOp(" + op + ")");
		return located({
			kind: "binOp" as const,
			op,
			left: normalizeExpr(f.left, path + ".left"),
			right: normalizeExpr(f.right, path + ".right"),
		}, node);
	}
	case "UnaryOp": {
		const f = parseWith(UnaryOpFields, node, path);
		const op = f.op._type;
		if (!isUnaryOperator(op)) return unsupportedExpr(node, "UnaryOp(" + op + ")");
		return located({
			kind: "unaryOp" as const,
			op,
			operand: normalizeExpr(f.operand, path + ".operand"),
		}, node);
	}
	case "BoolOp": {
		const f = parseWith(BoolOpFields, node, path);
		const op = f.op._type;
		if (!isBoolOperator(op)) return unsupportedExpr(node, "BoolOp(" + op + ")");
		return located({ kind: "boolOp" as const, op, values: normalizeExprList(f.values, path + ".values") }, node);
	}
	case "Compare": {
		const f = parseWith(CompareFields, node, path);
		const ops: CompareOperator[] = [];
		for (const raw of f.ops) {
			if (!isCompareOperator(raw._type)) return unsupportedExpr(node, "Compare(" + raw._type + ")");
			ops.push(raw._type);
		}
		return located({
			kind: "compare" as const,
			left: normalizeExpr(f.left, path + ".left"),
			ops,
			comparators: normalizeExprList(f.comparators, path + ".comparators"),
		}, node);
	}
	case "Call": {
		const f = parseWith(CallFields, node, path);
		return located({
			kind: "call" as const,
			func: normalizeExpr(f.func, path + ".func"),
			args: normalizeExprList(f.args, path + ".args"),
			keywords: (f.keywords ?? []).map((k) => k.arg ?? "**"),
		}, node);
	}
	case "Subscript": {
		const f = parseWith(SubscriptFields, node, path);
		return located({
			kind: "subscript" as const,
			value: normalizeExpr(f.value, path + ".value"),
			slice: normalizeSlice(f.slice, path + ".slice"),
			ctx: parseContext(f.ctx),
		}, node);
	}
	case "List": {
		const f = parseWith(SequenceFields, node, path);
		return located({ kind: "list" as const, elts: normalizeExprList(f.elts, path + ".elts"), ctx: parseContext(f.ctx) }, node);
	}
	case "Tuple": {
		const f = parseWith(SequenceFields, node, path);
		return located({ kind: "tuple" as const, elts: normalizeExprList(f.elts, path + ".elts"), ctx: parseContext(f.ctx) }, node);
	}
	default:
		return unsupportedExpr(node);
	}
}

// Python < 3.9 wraps subscripts in Index nodes
function normalizeSlice(raw: unknown, path: string): Expr {
	const node = parseWith(RawNode, raw, path);
	if (node._type !== "Index") return normalizeExpr(raw, path);
	const f = parseWith(ValueFields, node, path);
	return normalizeExpr(f.value, path + ".value");
}
