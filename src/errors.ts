// PGM Error Types
// Error domain for syntax tree ingest, lowering and document validation

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Lowering errors
	UnsupportedConstruct: "UnsupportedConstruct",
	UnsupportedType: "UnsupportedType",
	UnsupportedRange: "UnsupportedRange",
	MultipleLoopIndices: "MultipleLoopIndices",
	ArrayIndexingUnsupported: "ArrayIndexingUnsupported",

	// Ingest errors
	InvalidSyntaxTree: "InvalidSyntaxTree",
	BridgeError: "BridgeError",

	// Validation errors
	ValidationError: "ValidationError",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Location details attached to an error. */
export interface ErrorMeta {
	/** Syntax tree construct that triggered the error */
	construct?: string;
	/** Source line, when the tree carries one */
	line?: number;
	/** Path inside a JSON input */
	path?: string;
}

//==============================================================================
// PGM Error Class
//==============================================================================

export class PGMError extends Error {
	readonly code: ErrorCode;
	readonly meta?: ErrorMeta;

	constructor(code: ErrorCode, message: string, meta?: ErrorMeta) {
		super(message);
		this.name = "PGMError";
		this.code = code;
		if (meta !== undefined) this.meta = meta;
	}

	/**
	 * Format as a single diagnostic line, e.g.
	 * `UnsupportedConstruct (line 4): No handler for While`
	 */
	describe(): string {
		const line = this.meta?.line;
		const where = line !== undefined ? " (line " + String(line) + ")" : "";
		return this.code + where + ": " + this.message;
	}

	/**
	 * Create an UnsupportedConstruct error
	 */
	static unsupportedConstruct(
		construct: string,
		line?: number,
		detail?: string,
	): PGMError {
		return new PGMError(
			ErrorCodes.UnsupportedConstruct,
			(detail ?? "No handler for " + construct),
			withLine({ construct }, line),
		);
	}

	/**
	 * Create an UnsupportedType error
	 */
	static unsupportedType(message: string, line?: number): PGMError {
		return new PGMError(
			ErrorCodes.UnsupportedType,
			message,
			withLine({ construct: "annotation" }, line),
		);
	}

	/**
	 * Create an UnsupportedRange error
	 */
	static unsupportedRange(message: string, line?: number): PGMError {
		return new PGMError(
			ErrorCodes.UnsupportedRange,
			message,
			withLine({ construct: "For" }, line),
		);
	}

	/**
	 * Create a MultipleLoopIndices error
	 */
	static multipleLoopIndices(line?: number): PGMError {
		return new PGMError(
			ErrorCodes.MultipleLoopIndices,
			"Only one index variable is supported",
			withLine({ construct: "For" }, line),
		);
	}

	/**
	 * Create an ArrayIndexingUnsupported error
	 */
	static arrayIndexing(variable: string, line?: number): PGMError {
		return new PGMError(
			ErrorCodes.ArrayIndexingUnsupported,
			"Only constant numeric indices are supported (subscript of " +
				variable +
				")",
			withLine({ construct: "Subscript" }, line),
		);
	}

	/**
	 * Create an InvalidSyntaxTree error
	 */
	static invalidTree(path: string, message: string): PGMError {
		return new PGMError(
			ErrorCodes.InvalidSyntaxTree,
			"Invalid syntax tree at " + path + ": " + message,
			{ path },
		);
	}

	/**
	 * Create a BridgeError
	 */
	static bridge(message: string): PGMError {
		return new PGMError(ErrorCodes.BridgeError, message);
	}

	/**
	 * Create a ValidationError
	 */
	static validation(errors: ValidationError[]): PGMError {
		const first = errors[0];
		const summary = first
			? first.path + ": " + first.message
			: "unknown error";
		const more = errors.length > 1
			? " (+" + String(errors.length - 1) + " more)"
			: "";
		return new PGMError(
			ErrorCodes.ValidationError,
			"Invalid PGM document at " + summary + more,
		);
	}
}

function withLine(meta: ErrorMeta, line: number | undefined): ErrorMeta {
	if (line !== undefined) meta.line = line;
	return meta;
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
	value?: unknown;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
): ValidationResult<T> {
	return { valid: false, errors };
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 *
 * @example
 * switch (node.kind) {
 *   case "name": return ...;
 *   case "constant": return ...;
 *   default:
 *     exhaustive(node); // Type error if a kind is missing
 * }
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
