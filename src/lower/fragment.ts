// PGM Lowering - Graph record builders
// Flattens source descriptors into function sources, body inputs and lambda
// parameters.

import type {
	BodyInput,
	SourceEntry,
	VariableReference,
} from "../zod-schemas.js";
import type { SourceDescriptor } from "./types.js";

type Leaf =
	| { kind: "variable"; reference: VariableReference }
	| { kind: "function"; name: string };

/** Variables and callees in order of appearance, nested calls included. */
function leaves(sources: readonly SourceDescriptor[]): Leaf[] {
	const out: Leaf[] = [];
	const visit = (source: SourceDescriptor): void => {
		switch (source.kind) {
		case "literal":
			return;
		case "variable":
			out.push({ kind: "variable", reference: source.reference });
			return;
		case "call":
			out.push({ kind: "function", name: source.functionName });
			for (const arg of source.inputs) arg.forEach(visit);
			return;
		}
	};
	sources.forEach(visit);
	return out;
}

function withCarried(sources: readonly SourceDescriptor[], carried: readonly VariableReference[]): Leaf[] {
	return [
		...carried.map((reference): Leaf => ({ kind: "variable", reference })),
		...leaves(sources),
	];
}

/** `sources` list of an assign-kind function, one entry per distinct name. */
export function functionSources(
	sources: readonly SourceDescriptor[],
	carried: readonly VariableReference[] = [],
): SourceEntry[] {
	const seen = new Set<string>();
	const out: SourceEntry[] = [];
	for (const leaf of withCarried(sources, carried)) {
		const entry: SourceEntry = leaf.kind === "variable"
			? { name: leaf.reference.variable, type: "variable" }
			: { name: leaf.name, type: "function" };
		const key = entry.type + ":" + entry.name;
		if (seen.has(key)) continue;
		seen.add(key);
		out.push(entry);
	}
	return out;
}

/** `input` list of a body record, one entry per distinct versioned value. */
export function bodyInputs(
	sources: readonly SourceDescriptor[],
	carried: readonly VariableReference[] = [],
): BodyInput[] {
	const seen = new Set<string>();
	const out: BodyInput[] = [];
	for (const leaf of withCarried(sources, carried)) {
		const input: BodyInput = leaf.kind === "variable"
			? { variable: leaf.reference.variable, index: leaf.reference.index }
			: { name: leaf.name, type: "function" };
		const key = "variable" in input
			? "v:" + input.variable + "@" + String(input.index)
			: "f:" + input.name;
		if (seen.has(key)) continue;
		seen.add(key);
		out.push(input);
	}
	return out;
}

/**
 * Parameter names of the lambda computing these sources. Callees are resolved
 * by the lambda's own module, so only variables are parameters.
 */
export function lambdaInputs(
	sources: readonly SourceDescriptor[],
	carried: readonly VariableReference[] = [],
): string[] {
	return functionSources(sources, carried)
		.filter((s) => s.type === "variable")
		.map((s) => s.name);
}

/** `sources` entry naming a specific version, as decision functions list them. */
export function versionedSource(reference: VariableReference): SourceEntry {
	return { name: `${reference.variable}_${String(reference.index)}`, type: "variable" };
}
