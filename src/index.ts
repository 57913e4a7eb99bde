// PGM - Program Graph Model generator
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	AssignFunction, AssignRecord, BodyInput, BodyRecord, CallRecord,
	ContainerFunction, DecisionFunction, Domain, DomainEntry, IterationRange,
	LoopCallRecord, LoopPlateFunction, PgmDocument, PgmFunction, RangeBound,
	SourceEntry, VariableReference,
} from "./zod-schemas.js";

export type { ErrorCode, ErrorMeta, ValidationError, ValidationResult } from "./errors.js";

export type { Expr, Module, Stmt, SyntaxNode } from "./ingest/python-types.js";

export type { Logger } from "./logger.js";

//==============================================================================
// Schemas
//==============================================================================

export {
	BodyRecordSchema, DomainSchema, PgmDocumentSchema, PgmFunctionSchema,
	VariableReferenceSchema, isCallRecord, isLoopCallRecord,
} from "./zod-schemas.js";

//==============================================================================
// Error Codes
//==============================================================================

export { ErrorCodes, PGMError, exhaustive, invalidResult, validResult } from "./errors.js";

//==============================================================================
// Ingest
//==============================================================================

export { normalizeModule } from "./ingest/python-ast.js";
export { dumpSyntaxTree, parsePythonSource, parseSyntaxTree, type PythonParseOptions } from "./ingest/python.js";

//==============================================================================
// Lowering
//==============================================================================

export {
	BufferedLambdaSink,
	NameRegistry,
	lowerProgram,
	translate,
	type LambdaSink,
	type TranslateOptions,
	type TranslateResult,
	type Translation,
} from "./lower/index.js";

export { synthesizeExpr, synthesizeLambda } from "./synth/python.js";

//==============================================================================
// Validation and Logging
//==============================================================================

export { validatePgm, type PgmValidationResult } from "./validator.js";
export { createConsoleLogger, silentLogger } from "./logger.js";
