// PGM Lowering - Module assembly
// Lowers module top levels and assembles the PGM document.

import type { Module, Stmt } from "../ingest/python-types.js";
import { nodeTypeName } from "../ingest/python-types.js";
import type { PgmDocument } from "../zod-schemas.js";
import type { TraversalContext } from "./context.js";
import { resolveCallee } from "./expr.js";
import { lowerFunctionDef } from "./stmt.js";
import { emptyFragment, mergeFragments, type Fragment } from "./types.js";

/** Fragment of a whole input plus the entry call discovered at its top level. */
export interface ModuleFragment extends Fragment {
	start: string | null;
}

interface TopLevelState {
	start: string | null;
}

function recordStart(stmt: Stmt, state: TopLevelState, ctx: TraversalContext): void {
	if (stmt.kind !== "expr" || stmt.value.kind !== "call") {
		ctx.logger.debug(`Ignoring top-level ${nodeTypeName(stmt)} at line ${String(stmt.line ?? "?")}`);
		return;
	}
	const callee = resolveCallee(stmt.value.func, stmt.line);
	if (state.start === null) {
		state.start = callee;
		return;
	}
	ctx.logger.debug(`Ignoring additional top-level call '${callee}'; start is '${state.start}'`);
}

function lowerTopLevel(stmts: readonly Stmt[], state: TopLevelState, ctx: TraversalContext): Fragment {
	const fragments: Fragment[] = [];
	for (const stmt of stmts) {
		switch (stmt.kind) {
		case "functionDef":
			fragments.push(lowerFunctionDef(stmt, ctx));
			break;
		case "if":
			// `if __name__ == "__main__":` guards hold the entry call
			fragments.push(lowerTopLevel(stmt.body, state, ctx));
			break;
		default:
			recordStart(stmt, state, ctx);
		}
	}
	return fragments.length > 0 ? mergeFragments(fragments) : emptyFragment();
}

/**
 * Lower the top level of each module in order. Functions and body records are
 * concatenated; the first top-level call across all modules is the start.
 */
export function lowerModules(modules: readonly Module[], ctx: TraversalContext): ModuleFragment {
	const state: TopLevelState = { start: null };
	const fragment = mergeFragments(modules.map((m) => lowerTopLevel(m.body, state, ctx)));
	return { ...fragment, start: state.start };
}

export interface DocumentHeader {
	name: string;
	dateCreated: string;
}

export function assembleDocument(fragment: ModuleFragment, header: DocumentHeader): PgmDocument {
	return {
		start: fragment.start ?? "",
		name: header.name,
		dateCreated: header.dateCreated,
		functions: fragment.functions,
		body: fragment.body,
	};
}
