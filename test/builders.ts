// SPDX-License-Identifier: MIT
// Normalized syntax tree builders shared by the lowering tests

import type {
	AnnAssignStmt,
	Arg,
	AssignStmt,
	BinaryOperator,
	CallExpr,
	CompareOperator,
	ConstantExpr,
	Expr,
	ExprStmt,
	ForStmt,
	FunctionDefStmt,
	IfStmt,
	Module,
	NameExpr,
	Stmt,
	SubscriptExpr,
} from "../src/ingest/python-types.js";

export function name(id: string): NameExpr {
	return { kind: "name", id, ctx: "load" };
}

export function store(id: string): NameExpr {
	return { kind: "name", id, ctx: "store" };
}

export function int(value: number): ConstantExpr {
	return { kind: "constant", valueKind: "int", value };
}

export function float(value: number): ConstantExpr {
	return { kind: "constant", valueKind: "float", value };
}

export function str(value: string): ConstantExpr {
	return { kind: "constant", valueKind: "str", value };
}

export function bool(value: boolean): ConstantExpr {
	return { kind: "constant", valueKind: "bool", value };
}

export function bin(left: Expr, op: BinaryOperator, right: Expr): Expr {
	return { kind: "binOp", op, left, right };
}

export function cmp(left: Expr, op: CompareOperator, right: Expr): Expr {
	return { kind: "compare", left, ops: [op], comparators: [right] };
}

export function call(callee: string, ...args: Expr[]): CallExpr {
	return { kind: "call", func: name(callee), args, keywords: [] };
}

export function index(array: string, i: number, ctx: "load" | "store" = "load"): SubscriptExpr {
	return { kind: "subscript", value: name(array), slice: int(i), ctx };
}

/** `List[T]` annotation */
export function listOf(type: string): Expr {
	return { kind: "subscript", value: name("List"), slice: name(type), ctx: "load" };
}

function target(t: string | Expr): Expr {
	return typeof t === "string" ? store(t) : t;
}

export function assign(t: string | Expr, value: Expr, line?: number): AssignStmt {
	const stmt: AssignStmt = { kind: "assign", targets: [target(t)], value };
	return line === undefined ? stmt : { ...stmt, line };
}

export function declare(t: string, type: string | Expr, value?: Expr, line?: number): AnnAssignStmt {
	const annotation = typeof type === "string" ? name(type) : type;
	const stmt: AnnAssignStmt = { kind: "annAssign", target: store(t), annotation };
	const withValue = value === undefined ? stmt : { ...stmt, value };
	return line === undefined ? withValue : { ...withValue, line };
}

export function ifElse(test: Expr, body: Stmt[], orelse: Stmt[] = [], line?: number): IfStmt {
	const stmt: IfStmt = { kind: "if", test, body, orelse };
	return line === undefined ? stmt : { ...stmt, line };
}

export function forRange(index: string, start: Expr, end: Expr, body: Stmt[]): ForStmt {
	return { kind: "for", target: store(index), iter: call("range", start, end), body, orelse: [] };
}

export function callStmt(callee: string, ...args: Expr[]): ExprStmt {
	return { kind: "expr", value: call(callee, ...args) };
}

export function def(fn: string, params: [string, string][], body: Stmt[]): FunctionDefStmt {
	const args: Arg[] = params.map(([p, type]) => ({ name: p, annotation: name(type) }));
	return { kind: "functionDef", name: fn, args, body };
}

export function module(...body: Stmt[]): Module {
	return { kind: "module", body };
}
