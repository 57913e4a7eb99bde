// PGM Lowering - Entry points
// Lowers normalized modules into a PGM document plus its lambda source text.

import { PGMError } from "../errors.js";
import type { Module } from "../ingest/python-types.js";
import { silentLogger, type Logger } from "../logger.js";
import type { PgmDocument } from "../zod-schemas.js";
import { assembleDocument, lowerModules } from "./assemble.js";
import { BufferedLambdaSink, NameRegistry, createRootContext } from "./context.js";

export interface TranslateOptions {
	/** Document `name` field (default: "pgm.json") */
	documentName?: string;
	/** Document `dateCreated` field, YYYY-MM-DD (default: today) */
	dateCreated?: string;
	logger?: Logger;
}

export interface Translation {
	document: PgmDocument;
	/** Rendered lambdas, in emission order */
	lambdas: string;
}

export type TranslateResult =
	| ({ ok: true } & Translation)
	| { ok: false; error: PGMError };

function today(): string {
	return new Date().toISOString().slice(0, 10);
}

/**
 * Lower one or more modules into a single PGM document.
 *
 * @throws PGMError when any construct falls outside the supported subset
 */
export function lowerProgram(modules: readonly Module[], options: TranslateOptions = {}): Translation {
	const sink = new BufferedLambdaSink();
	const ctx = createRootContext({
		lambdaSink: sink,
		names: new NameRegistry(),
		logger: options.logger ?? silentLogger,
	});
	const fragment = lowerModules(modules, ctx);
	const document = assembleDocument(fragment, {
		name: options.documentName ?? "pgm.json",
		dateCreated: options.dateCreated ?? today(),
	});
	ctx.logger.debug(`Lowered ${String(document.functions.length)} functions and ${String(sink.count)} lambdas`);
	return { document, lambdas: sink.toString() };
}

/**
 * Non-throwing form of {@link lowerProgram}. Only PGMError is turned into a
 * failed result; anything else propagates.
 */
export function translate(modules: readonly Module[], options: TranslateOptions = {}): TranslateResult {
	try {
		return { ok: true, ...lowerProgram(modules, options) };
	} catch (err) {
		if (err instanceof PGMError) return { ok: false, error: err };
		throw err;
	}
}

export { annotationDomain, lowerBlock, lowerStatement } from "./stmt.js";
export { lowerExpr, lowerTarget, resolveCallee } from "./expr.js";
export {
	BufferedLambdaSink,
	NameRegistry,
	createRootContext,
	forkContext,
	readVersion,
	writeVersion,
	type LambdaSink,
	type TraversalContext,
} from "./context.js";
export type { Fragment, SourceDescriptor } from "./types.js";
