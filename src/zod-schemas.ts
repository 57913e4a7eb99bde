// PGM Zod Schemas
// Single source of truth for the serialized Program Graph Model document.
//
// Interfaces are written out by hand and the schemas are annotated with them
// (z.ZodType<T>), so that the public types stay readable in editor hovers and
// the schemas cannot drift from them.

import { z } from "zod/v4";

//==============================================================================
// Primitives
//==============================================================================

/** Value domains tracked for variables and literals. */
export type Domain = "integer" | "real" | "string" | "boolean";

export const DomainSchema: z.ZodType<Domain> = z.enum(["integer", "real", "string", "boolean"]);

/** A versioned read/write handle on a variable. */
export interface VariableReference {
	variable: string;
	index: number;
}

export const VariableReferenceSchema: z.ZodType<VariableReference> = z.strictObject({
	variable: z.string().min(1),
	index: z.number().int(),
});

/** Output slot of records that produce no value. */
export type EmptyOutput = Record<string, never>;

const EmptyOutputSchema: z.ZodType<EmptyOutput> = z.strictObject({});

//==============================================================================
// Function bodies and sources
//==============================================================================

export interface SourceEntry {
	name: string;
	type: "variable" | "function";
}

export const SourceEntrySchema: z.ZodType<SourceEntry> = z.strictObject({
	name: z.string().min(1),
	type: z.enum(["variable", "function"]),
});

export interface LambdaBody {
	type: "lambda";
	name: string;
	/** Source line of the construct the lambda was rendered from */
	reference: number | null;
}

export interface LiteralBody {
	type: "literal";
	dtype: Domain;
	value: string;
}

export type AssignBodyPayload = LambdaBody | LiteralBody;

const AssignBodyPayloadSchema: z.ZodType<AssignBodyPayload> = z.discriminatedUnion("type", [
	z.strictObject({ type: z.literal("lambda"), name: z.string().min(1), reference: z.number().int().nullable() }),
	z.strictObject({ type: z.literal("literal"), dtype: DomainSchema, value: z.string() }),
]);

//==============================================================================
// Body records (dataflow edges)
//==============================================================================

export interface FunctionInput {
	name: string;
	type: "function";
}

export type BodyInput = VariableReference | FunctionInput;

/** Links an assign/decision/condition function to its versioned inputs and output. */
export interface AssignRecord {
	name: string;
	output: VariableReference;
	input: BodyInput[];
}

/** A bare call statement; produces no value. */
export interface CallRecord {
	function: string;
	output: EmptyOutput;
	input: VariableReference[];
}

/** Invocation of a loop plate from its enclosing scope. */
export interface LoopCallRecord {
	name: string;
	inputs: string[];
	output: EmptyOutput;
}

export type BodyRecord = AssignRecord | CallRecord | LoopCallRecord;

const BodyInputSchema: z.ZodType<BodyInput> = z.union([
	VariableReferenceSchema,
	z.strictObject({ name: z.string().min(1), type: z.literal("function") }),
]);

export const BodyRecordSchema: z.ZodType<BodyRecord> = z.union([
	z.strictObject({
		name: z.string().min(1),
		output: VariableReferenceSchema,
		input: z.array(BodyInputSchema),
	}),
	z.strictObject({
		function: z.string().min(1),
		output: EmptyOutputSchema,
		input: z.array(VariableReferenceSchema),
	}),
	z.strictObject({
		name: z.string().min(1),
		inputs: z.array(z.string().min(1)),
		output: EmptyOutputSchema,
	}),
]);

export function isCallRecord(record: BodyRecord): record is CallRecord {
	return "function" in record;
}

export function isLoopCallRecord(record: BodyRecord): record is LoopCallRecord {
	return "inputs" in record;
}

//==============================================================================
// Functions (graph nodes)
//==============================================================================

export interface DomainEntry {
	name: string;
	domain: Domain;
}

export interface AssignFunction {
	name: string;
	type: "assign";
	target: string;
	sources: SourceEntry[];
	body: AssignBodyPayload[];
}

export interface DecisionFunction {
	name: string;
	type: "decision";
	target: string;
	sources: SourceEntry[];
}

export interface ContainerFunction {
	name: string;
	type: "container";
	input: DomainEntry[];
	variables: DomainEntry[];
	body: BodyRecord[];
}

/** Loop bound: an integer literal or a versioned variable. */
export type RangeBound = number | VariableReference;

export interface IterationRange {
	start: RangeBound;
	end: RangeBound;
}

export interface LoopPlateFunction {
	name: string;
	type: "loop_plate";
	input: string[];
	index_variable: string;
	index_iteration_range: IterationRange;
	body: BodyRecord[];
}

export type PgmFunction =
	| AssignFunction
	| DecisionFunction
	| ContainerFunction
	| LoopPlateFunction;

export type PgmFunctionKind = PgmFunction["type"];

const DomainEntrySchema: z.ZodType<DomainEntry> = z.strictObject({
	name: z.string().min(1),
	domain: DomainSchema,
});

const RangeBoundSchema: z.ZodType<RangeBound> = z.union([z.number().int(), VariableReferenceSchema]);

export const PgmFunctionSchema: z.ZodType<PgmFunction> = z.discriminatedUnion("type", [
	z.strictObject({
		name: z.string().min(1),
		type: z.literal("assign"),
		target: z.string().min(1),
		sources: z.array(SourceEntrySchema),
		body: z.array(AssignBodyPayloadSchema).length(1),
	}),
	z.strictObject({
		name: z.string().min(1),
		type: z.literal("decision"),
		target: z.string().min(1),
		sources: z.array(SourceEntrySchema),
	}),
	z.strictObject({
		name: z.string().min(1),
		type: z.literal("container"),
		input: z.array(DomainEntrySchema),
		variables: z.array(DomainEntrySchema),
		body: z.array(BodyRecordSchema),
	}),
	z.strictObject({
		name: z.string().min(1),
		type: z.literal("loop_plate"),
		input: z.array(z.string().min(1)),
		index_variable: z.string().min(1),
		index_iteration_range: z.strictObject({ start: RangeBoundSchema, end: RangeBoundSchema }),
		body: z.array(BodyRecordSchema),
	}),
]);

//==============================================================================
// Document
//==============================================================================

export interface PgmDocument {
	/** Entry call name, or "" when the input has no top-level call */
	start: string;
	name: string;
	/** YYYY-MM-DD */
	dateCreated: string;
	functions: PgmFunction[];
	body: BodyRecord[];
}

export const PgmDocumentSchema: z.ZodType<PgmDocument> = z.strictObject({
	start: z.string(),
	name: z.string().min(1),
	dateCreated: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
	functions: z.array(PgmFunctionSchema),
	body: z.array(BodyRecordSchema),
});
