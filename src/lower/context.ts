// PGM Lowering - Traversal context and version tracking
//
// A TraversalContext holds the version state of one scope (function body,
// loop body or conditional branch). Nested scopes receive copies of the maps
// they inherit; the caller reconciles them explicitly once the nested
// traversal returns. The name registry, lambda sink and logger are shared by
// every context of a translation run.

import type { Logger } from "../logger.js";
import type { Domain } from "../zod-schemas.js";

//==============================================================================
// Lambda sink
//==============================================================================

/** Append-only destination for rendered lambda source text. */
export interface LambdaSink {
	write(text: string): void;
}

export class BufferedLambdaSink implements LambdaSink {
	private readonly chunks: string[] = [];

	write(text: string): void {
		this.chunks.push(text);
	}

	/** Number of writes so far. */
	get count(): number {
		return this.chunks.length;
	}

	toString(): string {
		return this.chunks.join("");
	}
}

//==============================================================================
// Name registry
//==============================================================================

/**
 * Hands out document-unique names. Each basename has its own counter, so
 * `main__assign__x` yields `main__assign__x_0`, `main__assign__x_1`, ...
 */
export class NameRegistry {
	private readonly counters = new Map<string, number>();
	private readonly claimed = new Set<string>();

	next(basename: string): string {
		return `${basename}_${String(this.take(basename))}`;
	}

	/** Reserve a name taken from the source; false when it is already taken. */
	claim(name: string): boolean {
		if (this.claimed.has(name)) return false;
		this.claimed.add(name);
		return true;
	}

	/** Next value of a named counter, starting at 0. */
	take(key: string): number {
		const value = this.counters.get(key) ?? 0;
		this.counters.set(key, value + 1);
		return value;
	}
}

//==============================================================================
// Traversal context
//==============================================================================

export interface TraversalContext {
	/** Most recent version visible for reads */
	lastDefs: Map<string, number>;
	/** Version the next write will receive */
	nextDefs: Map<string, number>;
	/** Version treated as "not yet defined" in this scope */
	baselineVersion: number;
	varTypes: Map<string, Domain>;
	/** Enclosing function; null at module top level */
	currentFunctionName: string | null;
	/** `IF_<n>` variables of the enclosing function, each written exactly once */
	conditionVariables: Set<string>;
	lambdaSink: LambdaSink;
	names: NameRegistry;
	logger: Logger;
}

export interface RootContextOptions {
	lambdaSink: LambdaSink;
	names: NameRegistry;
	logger: Logger;
}

export function createRootContext(options: RootContextOptions): TraversalContext {
	return {
		lastDefs: new Map(),
		nextDefs: new Map(),
		baselineVersion: 0,
		varTypes: new Map(),
		currentFunctionName: null,
		conditionVariables: new Set(),
		lambdaSink: options.lambdaSink,
		names: options.names,
		logger: options.logger,
	};
}

/** What a nested scope does not simply copy from its parent. */
export interface ForkOptions {
	lastDefs?: Map<string, number>;
	nextDefs?: Map<string, number>;
	baselineVersion?: number;
	varTypes?: Map<string, Domain>;
	currentFunctionName?: string;
	conditionVariables?: Set<string>;
}

/**
 * Open a nested scope. Maps not supplied in `options` are copied from the
 * parent, never shared with it; the condition set is shared unless replaced.
 */
export function forkContext(parent: TraversalContext, options: ForkOptions = {}): TraversalContext {
	return {
		lastDefs: options.lastDefs ?? new Map(parent.lastDefs),
		nextDefs: options.nextDefs ?? new Map(parent.nextDefs),
		baselineVersion: options.baselineVersion ?? parent.baselineVersion,
		varTypes: options.varTypes ?? new Map(parent.varTypes),
		currentFunctionName: options.currentFunctionName ?? parent.currentFunctionName,
		conditionVariables: options.conditionVariables ?? parent.conditionVariables,
		lambdaSink: parent.lambdaSink,
		names: parent.names,
		logger: parent.logger,
	};
}

/** Copy every entry of `source` into `target`, overwriting. */
export function absorb<V>(target: Map<string, V>, source: ReadonlyMap<string, V>): void {
	for (const [key, value] of source) {
		target.set(key, value);
	}
}

//==============================================================================
// Version tracking
//==============================================================================

/**
 * Current version of `variable` for a read. An unset variable is an implicit
 * reference to the scope's entry value and is pinned at the baseline.
 */
export function readVersion(ctx: TraversalContext, variable: string): number {
	const current = ctx.lastDefs.get(variable);
	if (current !== undefined) return current;
	ctx.lastDefs.set(variable, ctx.baselineVersion);
	return ctx.baselineVersion;
}

/**
 * Allocate the next version of `variable` and make it visible to reads.
 */
export function writeVersion(ctx: TraversalContext, variable: string): number {
	const version = ctx.nextDefs.get(variable) ?? ctx.baselineVersion + 1;
	ctx.nextDefs.set(variable, version + 1);
	ctx.lastDefs.set(variable, version);
	return version;
}

/** Enclosing function name used as the prefix of generated names. */
export function scopeName(ctx: TraversalContext): string {
	return ctx.currentFunctionName ?? "__module__";
}
