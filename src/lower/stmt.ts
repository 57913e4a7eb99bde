// PGM Lowering - Statements
// Lowers the statements of a function body into PGM fragments.

import { PGMError, exhaustive } from "../errors.js";
import type {
	AnnAssignStmt,
	AssignStmt,
	Expr,
	ExprStmt,
	ForStmt,
	FunctionDefStmt,
	IfStmt,
	Stmt,
} from "../ingest/python-types.js";
import { formatLiteralText } from "../synth/python.js";
import type {
	AssignFunction,
	AssignRecord,
	ContainerFunction,
	DecisionFunction,
	Domain,
	DomainEntry,
	IterationRange,
	LoopPlateFunction,
	RangeBound,
	VariableReference,
} from "../zod-schemas.js";
import {
	absorb,
	forkContext,
	readVersion,
	scopeName,
	writeVersion,
	type TraversalContext,
} from "./context.js";
import { lowerCall, lowerExpr, lowerTarget, type WriteTarget } from "./expr.js";
import {
	bodyInputs,
	functionSources,
	lambdaInputs,
	versionedSource,
} from "./fragment.js";
import { emitLambda, lambdaBody } from "./lambda.js";
import {
	emptyFragment,
	mergeFragments,
	type Fragment,
	type LiteralSource,
	type SourceDescriptor,
} from "./types.js";

//==============================================================================
// Dispatch
//==============================================================================

/** Lower a statement sequence inside a function, loop or branch scope. */
export function lowerBlock(stmts: readonly Stmt[], ctx: TraversalContext): Fragment {
	return mergeFragments(stmts.map((stmt) => lowerStatement(stmt, ctx)));
}

export function lowerStatement(stmt: Stmt, ctx: TraversalContext): Fragment {
	switch (stmt.kind) {
	case "assign": return lowerAssign(stmt, ctx);
	case "annAssign": return lowerAnnAssign(stmt, ctx);
	case "if": return lowerIf(stmt, ctx);
	case "for": return lowerFor(stmt, ctx);
	case "expr": return lowerCallStatement(stmt, ctx);
	case "functionDef": return lowerFunctionDef(stmt, ctx);
	case "unsupported": throw PGMError.unsupportedConstruct(stmt.nodeType, stmt.line);
	default: return exhaustive(stmt);
	}
}

//==============================================================================
// Type annotations
//==============================================================================

const ANNOTATION_DOMAINS: Record<string, Domain> = {
	int: "integer",
	float: "real",
	str: "string",
	bool: "boolean",
};

/**
 * Domain of an annotation. Declarations are written either bare (`int`) or
 * wrapped in a list (`List[int]`), as translated array-cell scalars are.
 */
export function annotationDomain(annotation: Expr | undefined, subject: string, line?: number): Domain {
	if (annotation === undefined) {
		throw PGMError.unsupportedType(`Missing type annotation for '${subject}'`, line);
	}
	let inner = annotation;
	if (inner.kind === "subscript" && inner.value.kind === "name" && (inner.value.id === "List" || inner.value.id === "list")) {
		inner = inner.slice;
	}
	const domain = inner.kind === "name" && Object.hasOwn(ANNOTATION_DOMAINS, inner.id)
		? ANNOTATION_DOMAINS[inner.id]
		: undefined;
	if (domain === undefined) {
		throw PGMError.unsupportedType(`Unsupported type annotation for '${subject}'`, line ?? annotation.line);
	}
	return domain;
}

//==============================================================================
// Assignment
//==============================================================================

function singleLiteralSource(sources: SourceDescriptor[]): LiteralSource | undefined {
	const [only] = sources;
	return sources.length === 1 && only?.kind === "literal" ? only : undefined;
}

interface AssignmentParts {
	node: AssignStmt | AnnAssignStmt;
	sources: SourceDescriptor[];
	targets: WriteTarget[];
}

/**
 * One `assign` function and one body record per target. A target whose only
 * source is a literal carries the literal itself instead of a lambda.
 */
function lowerAssignmentParts(parts: AssignmentParts, ctx: TraversalContext): Fragment {
	const fragment = emptyFragment();
	const scope = scopeName(ctx);
	for (const target of parts.targets) {
		const variable = target.reference.variable;
		const carried = target.carried ? [target.carried] : [];
		const sources = functionSources(parts.sources, carried);
		const constant = sources.length === 0 ? singleLiteralSource(parts.sources) : undefined;
		const name = ctx.names.next(`${scope}__assign__${variable}`);

		let fn: AssignFunction;
		if (constant) {
			fn = {
				name,
				type: "assign",
				target: variable,
				sources,
				body: [{ type: "literal", dtype: constant.domain, value: formatLiteralText(constant.domain, constant.value) }],
			};
			if (!ctx.varTypes.has(variable)) ctx.varTypes.set(variable, constant.domain);
		} else {
			const lambdaName = ctx.names.next(`${scope}__lambda__${variable}`);
			emitLambda(ctx, {
				kind: "assignment",
				name: lambdaName,
				node: parts.node,
				inputs: lambdaInputs(parts.sources, carried),
				returns: variable,
			});
			fn = {
				name,
				type: "assign",
				target: variable,
				sources,
				body: [lambdaBody(lambdaName, parts.node.line)],
			};
		}

		const record: AssignRecord = {
			name,
			output: target.reference,
			input: bodyInputs(parts.sources, carried),
		};
		fragment.functions.push(fn);
		fragment.body.push(record);
	}
	return fragment;
}

function lowerAssign(stmt: AssignStmt, ctx: TraversalContext): Fragment {
	const sources = lowerExpr(stmt.value, ctx);
	const targets = stmt.targets.map((t) => lowerTarget(t, ctx));
	return lowerAssignmentParts({ node: stmt, sources, targets }, ctx);
}

function declaredVariable(stmt: AnnAssignStmt): string {
	switch (stmt.target.kind) {
	case "name": return stmt.target.id;
	default:
		throw PGMError.unsupportedConstruct("AnnAssign", stmt.line, "Annotated targets must be plain variables");
	}
}

function lowerAnnAssign(stmt: AnnAssignStmt, ctx: TraversalContext): Fragment {
	const variable = declaredVariable(stmt);
	const domain = annotationDomain(stmt.annotation, variable, stmt.line);
	ctx.varTypes.set(variable, domain);
	// A list initializer only declares the variable's storage
	if (stmt.value === undefined || stmt.value.kind === "list") return emptyFragment();

	const sources = lowerExpr(stmt.value, ctx);
	const targets = [lowerTarget(stmt.target, ctx)];
	return lowerAssignmentParts({ node: stmt, sources, targets }, ctx);
}

//==============================================================================
// Conditionals
//==============================================================================

interface Condition {
	fragment: Fragment;
	output: VariableReference;
}

/** Compute the test into a fresh boolean `IF_<n>` variable. */
function lowerCondition(stmt: IfStmt, ctx: TraversalContext): Condition {
	const scope = scopeName(ctx);
	const sources = lowerExpr(stmt.test, ctx);
	const variable = `IF_${String(ctx.names.take(`${scope}#condition`))}`;
	ctx.varTypes.set(variable, "boolean");
	ctx.conditionVariables.add(variable);
	ctx.lastDefs.set(variable, 0);
	const output = { variable, index: 0 };

	const name = ctx.names.next(`${scope}__condition__${variable}`);
	const lambdaName = ctx.names.next(`${scope}__lambda__${variable}`);
	emitLambda(ctx, {
		kind: "expression",
		name: lambdaName,
		node: stmt.test,
		inputs: lambdaInputs(sources),
	});

	const fn: AssignFunction = {
		name,
		type: "assign",
		target: variable,
		sources: functionSources(sources),
		body: [lambdaBody(lambdaName, stmt.line)],
	};
	const record: AssignRecord = { name, output, input: bodyInputs(sources) };
	return { fragment: { functions: [fn], body: [record] }, output };
}

/** Variables in order of first appearance across the given scopes. */
function unionKeys(...maps: ReadonlyMap<string, number>[]): string[] {
	const keys = new Set<string>();
	for (const map of maps) {
		for (const key of map.keys()) keys.add(key);
	}
	return [...keys];
}

/**
 * Phi-style merges at the exit of a conditional. For each variable written
 * by either branch a `decision` function selects between the candidates;
 * the condition is always its first input. Conditions of nested `if`s have a
 * single version and are only made visible to the enclosing scope.
 */
function mergeBranches(
	ctx: TraversalContext,
	condition: VariableReference,
	start: ReadonlyMap<string, number>,
	thenDefs: ReadonlyMap<string, number>,
	elseDefs: ReadonlyMap<string, number>,
): Fragment {
	const fragment = emptyFragment();
	const scope = scopeName(ctx);

	for (const variable of unionKeys(start, thenDefs, elseDefs)) {
		if (ctx.conditionVariables.has(variable)) {
			ctx.lastDefs.set(variable, 0);
			continue;
		}
		const before = start.get(variable);
		const baseline = before ?? ctx.baselineVersion;
		const thenVersion = thenDefs.get(variable);
		const elseVersion = elseDefs.get(variable);
		const thenChanged = thenVersion !== undefined && thenVersion !== baseline;
		const elseChanged = elseVersion !== undefined && elseVersion !== baseline;

		if (!thenChanged && !elseChanged) {
			// Only read inside a branch: its entry value is visible here too
			if (before === undefined) ctx.lastDefs.set(variable, baseline);
			continue;
		}

		let candidates: [number, number];
		if (thenChanged && elseChanged) candidates = [thenVersion, elseVersion];
		else if (thenChanged) candidates = [thenVersion, baseline];
		else if (elseChanged) candidates = [elseVersion, baseline];
		else continue;

		const inputs: VariableReference[] = [
			condition,
			{ variable, index: candidates[0] },
			{ variable, index: candidates[1] },
		];
		const output = { variable, index: writeVersion(ctx, variable) };
		const name = ctx.names.next(`${scope}__decision__${variable}`);
		const fn: DecisionFunction = {
			name,
			type: "decision",
			target: variable,
			sources: inputs.map(versionedSource),
		};
		fragment.functions.push(fn);
		fragment.body.push({ name, output, input: inputs });
	}
	return fragment;
}

function lowerIf(stmt: IfStmt, ctx: TraversalContext): Fragment {
	const condition = lowerCondition(stmt, ctx);
	const start = new Map(ctx.lastDefs);

	// Branch writes draw from one version sequence so that the two candidates
	// of a merge never share a version.
	const thenCtx = forkContext(ctx);
	const thenFragment = lowerBlock(stmt.body, thenCtx);
	const elseCtx = forkContext(ctx, {
		nextDefs: new Map(thenCtx.nextDefs),
		varTypes: new Map(thenCtx.varTypes),
	});
	const elseFragment = lowerBlock(stmt.orelse, elseCtx);
	absorb(ctx.nextDefs, elseCtx.nextDefs);
	absorb(ctx.varTypes, elseCtx.varTypes);

	const merges = mergeBranches(ctx, condition.output, start, thenCtx.lastDefs, elseCtx.lastDefs);
	return mergeFragments([condition.fragment, thenFragment, elseFragment, merges]);
}

//==============================================================================
// Loops
//==============================================================================

function loopIndex(stmt: ForStmt): string {
	switch (stmt.target.kind) {
	case "name": return stmt.target.id;
	case "tuple":
	case "list": throw PGMError.multipleLoopIndices(stmt.line);
	default:
		throw PGMError.unsupportedConstruct("For", stmt.line, "Loop index must be a plain variable");
	}
}

function rangeBound(arg: SourceDescriptor[], which: string, line?: number): RangeBound {
	const [only] = arg;
	if (arg.length !== 1 || only === undefined) {
		throw PGMError.unsupportedRange(`Range ${which} must be a single literal or variable`, line);
	}
	switch (only.kind) {
	case "variable": return only.reference;
	case "literal":
		if (only.domain === "integer" && typeof only.value === "number") return only.value;
		throw PGMError.unsupportedRange(`Range ${which} must be an integer`, line);
	case "call":
		throw PGMError.unsupportedRange(`Range ${which} must be a single literal or variable`, line);
	}
}

/** The `range(start, end)` header of a loop. */
function iterationRange(stmt: ForStmt, ctx: TraversalContext): IterationRange {
	const iter = lowerExpr(stmt.iter, ctx);
	const [call] = iter;
	if (iter.length !== 1 || call?.kind !== "call" || call.functionName !== "range") {
		throw PGMError.unsupportedConstruct("For", stmt.line, "Can only iterate over a range");
	}
	const [start, end] = call.inputs;
	if (call.inputs.length !== 2 || start === undefined || end === undefined) {
		throw PGMError.unsupportedRange("Range must have exactly a start and an end", stmt.line);
	}
	return {
		start: rangeBound(start, "start", stmt.line),
		end: rangeBound(end, "end", stmt.line),
	};
}

/**
 * Lower a bounded loop into a loop plate: a template whose body is lowered
 * in a fresh scope with baseline -1, so that the first write inside the loop
 * (version 0) is distinct from any value entering it.
 */
function lowerFor(stmt: ForStmt, ctx: TraversalContext): Fragment {
	if (stmt.orelse.length > 0) {
		throw PGMError.unsupportedConstruct("For", stmt.line, "For/else is not supported");
	}
	const index = loopIndex(stmt);
	const range = iterationRange(stmt, ctx);
	writeVersion(ctx, index);
	if (!ctx.varTypes.has(index)) ctx.varTypes.set(index, "integer");

	const loopCtx = forkContext(ctx, {
		lastDefs: new Map(),
		nextDefs: new Map(),
		baselineVersion: -1,
	});
	const loop = lowerBlock(stmt.body, loopCtx);
	absorb(ctx.varTypes, loopCtx.varTypes);

	const variables = [...loopCtx.lastDefs.keys()].filter((v) => v !== index);
	const name = ctx.names.next(`${scopeName(ctx)}__loop_plate__${index}`);
	const plate: LoopPlateFunction = {
		name,
		type: "loop_plate",
		input: variables,
		index_variable: index,
		index_iteration_range: range,
		body: loop.body,
	};
	return {
		functions: [...loop.functions, plate],
		body: [{ name, inputs: variables, output: {} }],
	};
}

//==============================================================================
// Call statements
//==============================================================================

/** A call evaluated for its effect: a body record with no output. */
function lowerCallStatement(stmt: ExprStmt, ctx: TraversalContext): Fragment {
	if (stmt.value.kind !== "call") {
		throw PGMError.unsupportedConstruct("Expr", stmt.line, "Only call expressions are supported as statements");
	}
	const call = lowerCall(stmt.value, ctx);
	const input: VariableReference[] = [];
	for (const arg of call.inputs) {
		const [only] = arg;
		if (arg.length !== 1 || only === undefined) {
			throw PGMError.unsupportedConstruct("Call", stmt.line, "Only 1 input per argument is supported in call statements");
		}
		if (only.kind === "call") {
			throw PGMError.unsupportedConstruct("Call", stmt.line, "Nested calls are not supported in call statements");
		}
		if (only.kind === "variable") input.push(only.reference);
	}
	return { functions: [], body: [{ function: call.functionName, output: {}, input }] };
}

//==============================================================================
// Function definitions
//==============================================================================

function domainEntry(ctx: TraversalContext, variable: string, line?: number): DomainEntry {
	const domain = ctx.varTypes.get(variable);
	if (domain === undefined) {
		throw PGMError.unsupportedType(`No declared type for variable '${variable}' in '${scopeName(ctx)}'`, line);
	}
	return { name: variable, domain };
}

/**
 * Lower a function definition in an isolated scope. Functions produced by
 * its body are hoisted next to the container, which references them only by
 * name.
 */
export function lowerFunctionDef(stmt: FunctionDefStmt, ctx: TraversalContext): Fragment {
	if (!ctx.names.claim(stmt.name)) {
		throw PGMError.unsupportedConstruct("FunctionDef", stmt.line, `Duplicate function '${stmt.name}'`);
	}
	const fnCtx = forkContext(ctx, {
		lastDefs: new Map(),
		nextDefs: new Map(),
		baselineVersion: 0,
		varTypes: new Map(),
		currentFunctionName: stmt.name,
		conditionVariables: new Set(),
	});

	const params = stmt.args.map((arg) => {
		fnCtx.varTypes.set(arg.name, annotationDomain(arg.annotation, arg.name, arg.line ?? stmt.line));
		readVersion(fnCtx, arg.name);
		return arg.name;
	});
	const body = lowerBlock(stmt.body, fnCtx);

	const container: ContainerFunction = {
		name: stmt.name,
		type: "container",
		input: params.map((p) => domainEntry(fnCtx, p, stmt.line)),
		variables: [...fnCtx.lastDefs.keys()].map((v) => domainEntry(fnCtx, v, stmt.line)),
		body: body.body,
	};
	return { functions: [...body.functions, container], body: [] };
}
