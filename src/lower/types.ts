// PGM Lowering - Shared types

import type {
	BodyRecord,
	Domain,
	PgmFunction,
	VariableReference,
} from "../zod-schemas.js";

//==============================================================================
// Source descriptors
//==============================================================================

export interface LiteralSource {
	kind: "literal";
	domain: Domain;
	value: number | string | boolean;
}

export interface VariableSource {
	kind: "variable";
	reference: VariableReference;
}

export interface CallSource {
	kind: "call";
	functionName: string;
	/** One descriptor list per syntactic argument */
	inputs: SourceDescriptor[][];
}

export type SourceDescriptor = LiteralSource | VariableSource | CallSource;

export function literal(domain: Domain, value: number | string | boolean): LiteralSource {
	return { kind: "literal", domain, value };
}

export function variableRef(variable: string, index: number): VariableSource {
	return { kind: "variable", reference: { variable, index } };
}

//==============================================================================
// Fragments
//==============================================================================

/** Functions and body records produced by one statement or block. */
export interface Fragment {
	functions: PgmFunction[];
	body: BodyRecord[];
}

export function emptyFragment(): Fragment {
	return { functions: [], body: [] };
}

/** Concatenate fragments, preserving order. */
export function mergeFragments(fragments: readonly Fragment[]): Fragment {
	return {
		functions: fragments.flatMap((f) => f.functions),
		body: fragments.flatMap((f) => f.body),
	};
}
