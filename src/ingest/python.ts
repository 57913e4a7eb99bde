// PGM Python Ingest
// Turns Python source (or an already dumped AST) into a normalized Module
// Uses Python's ast module via subprocess for parsing

import { execSync } from "node:child_process";
import { PGMError } from "../errors.js";
import { normalizeModule } from "./python-ast.js";
import type { Expr, Module, SyntaxNode } from "./python-types.js";

//==============================================================================
// Public API
//==============================================================================

export interface PythonParseOptions {
	/** Interpreter used for the bridge (default: python3) */
	python?: string;
	/** Bridge timeout in milliseconds */
	timeout?: number;
}

/**
 * Parse Python source through the interpreter's own `ast` module.
 */
export function parsePythonSource(
	source: string,
	options?: PythonParseOptions,
): Module {
	const script = buildBridgeScript(source);
	let output: string;
	try {
		output = execSync(options?.python ?? "python3", {
			input: script,
			encoding: "utf-8",
			timeout: options?.timeout ?? 10_000,
			stdio: ["pipe", "pipe", "pipe"],
		});
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		throw PGMError.bridge("Python AST bridge failed: " + reason);
	}
	return parseSyntaxTree(output);
}

/**
 * Parse and normalize a JSON-dumped Python AST.
 */
export function parseSyntaxTree(json: string): Module {
	let parsed: unknown;
	try {
		parsed = JSON.parse(json.trim());
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		throw PGMError.invalidTree("$", "not valid JSON (" + reason + ")");
	}
	return normalizeModule(parsed);
}

//==============================================================================
// Python AST bridge
//==============================================================================

function buildBridgeScript(source: string): string {
	const encoded = Buffer.from(source).toString("base64");
	return [
		"import ast, json, base64",
		"",
		"def constant_value(value):",
		"    if value is None or isinstance(value, (bool, int, float, str)):",
		"        return value",
		"    return repr(value)",
		"",
		"def node_to_dict(node):",
		"    if isinstance(node, ast.AST):",
		"        result = {\"_type\": node.__class__.__name__}",
		"        for field, value in ast.iter_fields(node):",
		"            if field == \"value\" and isinstance(node, ast.Constant):",
		"                result[field] = constant_value(value)",
		"                result[\"_valueType\"] = type(value).__name__",
		"            else:",
		"                result[field] = node_to_dict(value)",
		"        if hasattr(node, \"lineno\"):",
		"            result[\"lineno\"] = node.lineno",
		"        return result",
		"    elif isinstance(node, list):",
		"        return [node_to_dict(x) for x in node]",
		"    else:",
		"        return node",
		"",
		`source = base64.b64decode("${encoded}").decode("utf-8")`,
		"tree = ast.parse(source)",
		"print(json.dumps(node_to_dict(tree)))",
	].join("\n");
}

//==============================================================================
// Tree dump
//==============================================================================

/**
 * Render a normalized tree as an indented outline, one node per line.
 */
export function dumpSyntaxTree(node: SyntaxNode, indent = "  "): string {
	const lines: string[] = [];
	dumpNode(node, 0, indent, lines);
	return lines.join("\n");
}

function dumpNode(node: SyntaxNode, level: number, indent: string, lines: string[]): void {
	const pad = indent.repeat(level);
	const line = "line" in node && node.line !== undefined ? " @" + String(node.line) : "";
	lines.push(pad + describeNode(node) + line);
	for (const child of childrenOf(node)) {
		dumpNode(child, level + 1, indent, lines);
	}
}

function describeNode(node: SyntaxNode): string {
	switch (node.kind) {
	case "module": return "Module";
	case "functionDef": return "FunctionDef " + node.name + "(" + node.args.map((a) => a.name).join(", ") + ")";
	case "assign": return "Assign";
	case "annAssign": return "AnnAssign";
	case "if": return "If";
	case "for": return "For";
	case "expr": return "Expr";
	case "constant": return "Constant " + JSON.stringify(node.value) + " (" + node.valueKind + ")";
	case "name": return "Name " + node.id + " [" + node.ctx + "]";
	case "attribute": return "Attribute ." + node.attr;
	case "binOp": return "BinOp " + node.op;
	case "unaryOp": return "UnaryOp " + node.op;
	case "boolOp": return "BoolOp " + node.op;
	case "compare": return "Compare " + node.ops.join(" ");
	case "call": return "Call";
	case "subscript": return "Subscript";
	case "list": return "List";
	case "tuple": return "Tuple";
	case "unsupported": return "Unsupported " + node.nodeType;
	}
}

function childrenOf(node: SyntaxNode): SyntaxNode[] {
	switch (node.kind) {
	case "module": return node.body;
	case "functionDef": {
		const annotations: Expr[] = [];
		for (const arg of node.args) {
			if (arg.annotation) annotations.push(arg.annotation);
		}
		return [...annotations, ...node.body];
	}
	case "assign": return [...node.targets, node.value];
	case "annAssign": return node.value ? [node.target, node.annotation, node.value] : [node.target, node.annotation];
	case "if": return [node.test, ...node.body, ...node.orelse];
	case "for": return [node.target, node.iter, ...node.body, ...node.orelse];
	case "expr": return [node.value];
	case "attribute": return [node.value];
	case "binOp": return [node.left, node.right];
	case "unaryOp": return [node.operand];
	case "boolOp": return node.values;
	case "compare": return [node.left, ...node.comparators];
	case "call": return [node.func, ...node.args];
	case "subscript": return [node.value, node.slice];
	case "list":
	case "tuple": return node.elts;
	case "constant":
	case "name":
	case "unsupported": return [];
	}
}
