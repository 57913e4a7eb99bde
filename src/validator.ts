// PGM Document Validator
// Two-phase validation: Zod safeParse for structural, then semantic checks.

import { z } from "zod/v4";
import {
	invalidResult,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.js";
import {
	type BodyRecord,
	isCallRecord,
	isLoopCallRecord,
	type PgmDocument,
	PgmDocumentSchema,
	type PgmFunction,
} from "./zod-schemas.js";

//==============================================================================
// Zod-to-ValidationError Conversion
//==============================================================================

function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	return error.issues.map(issue => ({
		path: issue.path.map(String).join(".") || "$",
		message: issue.message,
	}));
}

//==============================================================================
// Validation State (for semantic checks)
//==============================================================================

interface ValidationState {
	errors: ValidationError[];
	functions: Map<string, PgmFunction>;
	/** Bare-call targets with no definition in the document */
	externalCallees: Set<string>;
}

function addError(
	state: ValidationState,
	path: string,
	message: string,
	value?: unknown,
): void {
	state.errors.push(value === undefined ? { path, message } : { path, message, value });
}

//==============================================================================
// Semantic Checks
//==============================================================================

function checkDuplicateNames(state: ValidationState, doc: PgmDocument): void {
	doc.functions.forEach((fn, i) => {
		if (state.functions.has(fn.name)) {
			addError(state, "functions." + String(i) + ".name", "Duplicate function name: " + fn.name, fn.name);
			return;
		}
		state.functions.set(fn.name, fn);
	});
}

function checkRecord(state: ValidationState, record: BodyRecord, path: string): void {
	if (isCallRecord(record)) {
		if (!state.functions.has(record.function)) state.externalCallees.add(record.function);
		return;
	}
	const fn = state.functions.get(record.name);
	if (!fn) {
		addError(state, path + ".name", "Reference to undefined function: " + record.name, record.name);
		return;
	}
	if (isLoopCallRecord(record)) {
		if (fn.type !== "loop_plate") {
			addError(state, path + ".name", "Loop call must reference a loop_plate, got " + fn.type, record.name);
		}
		return;
	}
	if (fn.type !== "assign" && fn.type !== "decision") {
		addError(state, path + ".name", "Value record must reference an assign or decision function, got " + fn.type, record.name);
		return;
	}
	if (fn.target !== record.output.variable) {
		addError(state, path + ".output", "Output variable '" + record.output.variable + "' does not match target '" + fn.target + "' of " + fn.name);
	}
}

function checkBody(state: ValidationState, body: BodyRecord[], path: string): void {
	body.forEach((record, i) => {
		checkRecord(state, record, path + "." + String(i));
	});
}

function checkReferences(state: ValidationState, doc: PgmDocument): void {
	checkBody(state, doc.body, "body");
	doc.functions.forEach((fn, i) => {
		if (fn.type === "container" || fn.type === "loop_plate") {
			checkBody(state, fn.body, "functions." + String(i) + ".body");
		}
	});
}

function checkStart(state: ValidationState, doc: PgmDocument): void {
	if (doc.start === "") return;
	const fn = state.functions.get(doc.start);
	if (!fn) {
		// An entry point outside the document is an external call like any other
		state.externalCallees.add(doc.start);
		return;
	}
	if (fn.type !== "container") {
		addError(state, "start", "Start must reference a container, got " + fn.type, doc.start);
	}
}

//==============================================================================
// Public API
//==============================================================================

export interface PgmValidationResult extends ValidationResult<PgmDocument> {
	/** Called functions the document does not define, in first-use order */
	externalCallees: string[];
}

/**
 * Validate a PGM document: structure first, then unique names and
 * referential closure.
 */
export function validatePgm(doc: unknown): PgmValidationResult {
	// Phase 1: Structural validation via Zod
	const parsed = PgmDocumentSchema.safeParse(doc);
	if (!parsed.success) {
		return { ...invalidResult<PgmDocument>(zodToValidationErrors(parsed.error)), externalCallees: [] };
	}

	// Phase 2: Semantic validation on typed data
	const state: ValidationState = {
		errors: [],
		functions: new Map(),
		externalCallees: new Set(),
	};
	checkDuplicateNames(state, parsed.data);
	checkReferences(state, parsed.data);
	checkStart(state, parsed.data);

	const externalCallees = [...state.externalCallees];
	if (state.errors.length > 0) {
		return { ...invalidResult<PgmDocument>(state.errors), externalCallees };
	}
	return { ...validResult(parsed.data), externalCallees };
}
