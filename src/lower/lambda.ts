// PGM Lowering - Lambda emission
// Appends rendered computation units to the run's lambda sink.

import type { AnnAssignStmt, AssignStmt, Expr } from "../ingest/python-types.js";
import {
	synthesizeAssignment,
	synthesizeExpr,
	synthesizeLambda,
} from "../synth/python.js";
import type { LambdaBody } from "../zod-schemas.js";
import type { TraversalContext } from "./context.js";

/** Assignment lambda: runs the statement and returns the written variable. */
export interface AssignmentLambda {
	kind: "assignment";
	name: string;
	node: AssignStmt | AnnAssignStmt;
	inputs: string[];
	returns: string;
}

/** Expression lambda: returns the value of the expression. */
export interface ExpressionLambda {
	kind: "expression";
	name: string;
	node: Expr;
	inputs: string[];
}

export type LambdaRequest = AssignmentLambda | ExpressionLambda;

export function emitLambda(ctx: TraversalContext, request: LambdaRequest): void {
	const text = request.kind === "assignment"
		? synthesizeLambda({
			name: request.name,
			inputs: request.inputs,
			body: [synthesizeAssignment(request.node)],
			returns: request.returns,
		})
		: synthesizeLambda({
			name: request.name,
			inputs: request.inputs,
			body: [],
			returns: synthesizeExpr(request.node),
		});
	ctx.lambdaSink.write(text);
}

/** Body entry pointing a PGM function at its lambda. */
export function lambdaBody(name: string, line: number | undefined): LambdaBody {
	return { type: "lambda", name, reference: line ?? null };
}
