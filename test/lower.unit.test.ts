// SPDX-License-Identifier: MIT
// PGM Lowering - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ErrorCodes } from "../src/errors.js";
import type { Module } from "../src/ingest/python-types.js";
import type { Logger } from "../src/logger.js";
import { lowerProgram, translate, type Translation } from "../src/lower/index.js";
import type {
	ContainerFunction,
	LoopPlateFunction,
	PgmDocument,
} from "../src/zod-schemas.js";
import { validatePgm } from "../src/validator.js";
import {
	assign,
	bin,
	call,
	callStmt,
	cmp,
	declare,
	def,
	float,
	forRange,
	ifElse,
	index,
	int,
	listOf,
	module,
	name,
	store,
	str,
} from "./builders.js";

//==============================================================================
// Test Helpers
//==============================================================================

const DATE = "2024-01-02";

function lower(...modules: Module[]): Translation {
	const result = translate(modules, { dateCreated: DATE });
	if (!result.ok) assert.fail(result.error.describe());
	return result;
}

function lowerError(...modules: Module[]): { code: string; message: string } {
	const result = translate(modules, { dateCreated: DATE });
	if (result.ok) assert.fail("expected lowering to fail");
	return { code: result.error.code, message: result.error.message };
}

function container(doc: PgmDocument, fn: string): ContainerFunction {
	const found = doc.functions.find((f) => f.name === fn);
	if (found?.type !== "container") assert.fail("no container named " + fn);
	return found;
}

function plate(doc: PgmDocument): LoopPlateFunction {
	const found = doc.functions.filter((f) => f.type === "loop_plate");
	assert.equal(found.length, 1);
	const [only] = found;
	if (only?.type !== "loop_plate") assert.fail("no loop plate");
	return only;
}

function recordingLogger(): Logger & { lines: string[] } {
	const lines: string[] = [];
	return {
		lines,
		debug: (m) => { lines.push("debug " + m); },
		info: (m) => { lines.push("info " + m); },
		warn: (m) => { lines.push("warn " + m); },
		error: (m) => { lines.push("error " + m); },
	};
}

//==============================================================================
// Test Suite
//==============================================================================

describe("PGM Lowering - Unit Tests", () => {

	//==========================================================================
	// Assignments
	//==========================================================================

	describe("assignments", () => {

		it("should lower a literal and a dependent assignment", () => {
			const { document, lambdas } = lower(module(
				def("main", [], [
					declare("x", "int", int(2), 2),
					declare("y", "int", bin(name("x"), "Add", int(3)), 3),
				]),
				callStmt("main"),
			));

			assert.deepEqual(document, {
				start: "main",
				name: "pgm.json",
				dateCreated: DATE,
				functions: [
					{
						name: "main__assign__x_0",
						type: "assign",
						target: "x",
						sources: [],
						body: [{ type: "literal", dtype: "integer", value: "2" }],
					},
					{
						name: "main__assign__y_0",
						type: "assign",
						target: "y",
						sources: [{ name: "x", type: "variable" }],
						body: [{ type: "lambda", name: "main__lambda__y_0", reference: 3 }],
					},
					{
						name: "main",
						type: "container",
						input: [],
						variables: [
							{ name: "x", domain: "integer" },
							{ name: "y", domain: "integer" },
						],
						body: [
							{ name: "main__assign__x_0", output: { variable: "x", index: 1 }, input: [] },
							{
								name: "main__assign__y_0",
								output: { variable: "y", index: 1 },
								input: [{ variable: "x", index: 1 }],
							},
						],
					},
				],
				body: [],
			});
			assert.equal(lambdas, "def main__lambda__y_0(x):\n    y: int = x + 3\n    return y\n\n");
		});

		it("should fold literal arithmetic into a literal body", () => {
			const { document, lambdas } = lower(module(
				def("f", [], [
					assign("x", bin(bin(int(2), "Mult", int(3)), "Add", int(1))),
					assign("r", bin(int(4), "Div", int(2))),
					assign("s", bin(str("ab"), "Add", str("c"))),
				]),
			));

			assert.deepEqual(document.functions.slice(0, 3).map((f) => f.type === "assign" ? f.body : []), [
				[{ type: "literal", dtype: "integer", value: "7" }],
				[{ type: "literal", dtype: "real", value: "2.0" }],
				[{ type: "literal", dtype: "string", value: "abc" }],
			]);
			assert.deepEqual(container(document, "f").variables, [
				{ name: "x", domain: "integer" },
				{ name: "r", domain: "real" },
				{ name: "s", domain: "string" },
			]);
			assert.equal(lambdas, "");
		});

		it("should keep a lambda when a literal is divided by zero", () => {
			const { document, lambdas } = lower(module(
				def("f", [], [declare("q", "float", bin(int(1), "Div", int(0)))]),
			));
			const [fn] = document.functions;
			assert.deepEqual(fn, {
				name: "f__assign__q_0",
				type: "assign",
				target: "q",
				sources: [],
				body: [{ type: "lambda", name: "f__lambda__q_0", reference: null }],
			});
			assert.equal(lambdas, "def f__lambda__q_0():\n    q: float = 1 / 0\n    return q\n\n");
		});

		it("should keep a lambda when an integer result is not exact", () => {
			const { document, lambdas } = lower(module(
				def("f", [], [declare("big", "int", bin(int(2), "Pow", int(64)))]),
			));
			const [fn] = document.functions;
			assert.deepEqual(fn, {
				name: "f__assign__big_0",
				type: "assign",
				target: "big",
				sources: [],
				body: [{ type: "lambda", name: "f__lambda__big_0", reference: null }],
			});
			assert.equal(lambdas, "def f__lambda__big_0():\n    big: int = 2 ** 64\n    return big\n\n");
		});

		it("should list callees as sources but not as lambda parameters", () => {
			const { document, lambdas } = lower(module(
				def("f", [["a", "float"]], [
					declare("b", "float", call("sqrt", bin(name("a"), "Mult", name("a")))),
				]),
			));
			assert.deepEqual(document.functions[0], {
				name: "f__assign__b_0",
				type: "assign",
				target: "b",
				sources: [
					{ name: "sqrt", type: "function" },
					{ name: "a", type: "variable" },
				],
				body: [{ type: "lambda", name: "f__lambda__b_0", reference: null }],
			});
			const body = container(document, "f").body;
			assert.deepEqual(body[0], {
				name: "f__assign__b_0",
				output: { variable: "b", index: 1 },
				input: [{ name: "sqrt", type: "function" }, { variable: "a", index: 0 }],
			});
			assert.equal(lambdas, "def f__lambda__b_0(a):\n    b: float = sqrt(a * a)\n    return b\n\n");
		});

		it("should version successive writes in order", () => {
			const { document } = lower(module(
				def("f", [["x", "int"]], [
					assign("x", bin(name("x"), "Add", int(1))),
					assign("x", bin(name("x"), "Mult", int(2))),
				]),
			));
			assert.deepEqual(container(document, "f").body, [
				{ name: "f__assign__x_0", output: { variable: "x", index: 1 }, input: [{ variable: "x", index: 0 }] },
				{ name: "f__assign__x_1", output: { variable: "x", index: 2 }, input: [{ variable: "x", index: 1 }] },
			]);
		});

		it("should carry the prior array version into an element write", () => {
			const { document, lambdas } = lower(module(
				def("arr", [["v", "int"]], [
					declare("a", listOf("int"), { kind: "list", elts: [], ctx: "load" }),
					assign(index("a", 1, "store"), name("v")),
					declare("b", "int", index("a", 1)),
				]),
			));
			assert.deepEqual(container(document, "arr"), {
				name: "arr",
				type: "container",
				input: [{ name: "v", domain: "integer" }],
				variables: [
					{ name: "v", domain: "integer" },
					{ name: "a", domain: "integer" },
					{ name: "b", domain: "integer" },
				],
				body: [
					{
						name: "arr__assign__a_0",
						output: { variable: "a", index: 1 },
						input: [{ variable: "a", index: 0 }, { variable: "v", index: 0 }],
					},
					{
						name: "arr__assign__b_0",
						output: { variable: "b", index: 1 },
						input: [{ variable: "a", index: 1 }],
					},
				],
			});
			assert.equal(
				lambdas,
				"def arr__lambda__a_0(a, v):\n    a[1] = v\n    return a\n\n" +
				"def arr__lambda__b_0(a):\n    b: int = a[1]\n    return b\n\n",
			);
		});

		it("should register a declaration without a value and emit nothing", () => {
			const { document } = lower(module(
				def("f", [], [declare("n", "int"), assign("n", int(3))]),
			));
			assert.deepEqual(container(document, "f").variables, [{ name: "n", domain: "integer" }]);
			assert.equal(document.functions.length, 2);
		});
	});

	//==========================================================================
	// Conditionals
	//==========================================================================

	describe("conditionals", () => {

		it("should merge both branch writes with one decision", () => {
			const { document, lambdas } = lower(module(
				def("choose", [["a", "int"], ["b", "int"]], [
					ifElse(cmp(name("a"), "LtE", name("b")), [assign("y", int(1))], [assign("y", int(2))], 2),
					declare("z", "int", name("y")),
				]),
			));

			assert.deepEqual(document.functions, [
				{
					name: "choose__condition__IF_0_0",
					type: "assign",
					target: "IF_0",
					sources: [{ name: "a", type: "variable" }, { name: "b", type: "variable" }],
					body: [{ type: "lambda", name: "choose__lambda__IF_0_0", reference: 2 }],
				},
				{
					name: "choose__assign__y_0",
					type: "assign",
					target: "y",
					sources: [],
					body: [{ type: "literal", dtype: "integer", value: "1" }],
				},
				{
					name: "choose__assign__y_1",
					type: "assign",
					target: "y",
					sources: [],
					body: [{ type: "literal", dtype: "integer", value: "2" }],
				},
				{
					name: "choose__decision__y_0",
					type: "decision",
					target: "y",
					sources: [
						{ name: "IF_0_0", type: "variable" },
						{ name: "y_1", type: "variable" },
						{ name: "y_2", type: "variable" },
					],
				},
				{
					name: "choose__assign__z_0",
					type: "assign",
					target: "z",
					sources: [{ name: "y", type: "variable" }],
					body: [{ type: "lambda", name: "choose__lambda__z_0", reference: null }],
				},
				{
					name: "choose",
					type: "container",
					input: [{ name: "a", domain: "integer" }, { name: "b", domain: "integer" }],
					variables: [
						{ name: "a", domain: "integer" },
						{ name: "b", domain: "integer" },
						{ name: "IF_0", domain: "boolean" },
						{ name: "y", domain: "integer" },
						{ name: "z", domain: "integer" },
					],
					body: [
						{
							name: "choose__condition__IF_0_0",
							output: { variable: "IF_0", index: 0 },
							input: [{ variable: "a", index: 0 }, { variable: "b", index: 0 }],
						},
						{ name: "choose__assign__y_0", output: { variable: "y", index: 1 }, input: [] },
						{ name: "choose__assign__y_1", output: { variable: "y", index: 2 }, input: [] },
						{
							name: "choose__decision__y_0",
							output: { variable: "y", index: 3 },
							input: [
								{ variable: "IF_0", index: 0 },
								{ variable: "y", index: 1 },
								{ variable: "y", index: 2 },
							],
						},
						{
							name: "choose__assign__z_0",
							output: { variable: "z", index: 1 },
							input: [{ variable: "y", index: 3 }],
						},
					],
				},
			]);
			assert.equal(
				lambdas,
				"def choose__lambda__IF_0_0(a, b):\n    return a <= b\n\n" +
				"def choose__lambda__z_0(y):\n    z: int = y\n    return z\n\n",
			);
		});

		it("should pair a one-branch write with the entry version", () => {
			const { document } = lower(module(
				def("g", [["a", "int"]], [
					declare("y", "int", int(5)),
					ifElse(cmp(name("a"), "Gt", int(0)), [declare("z", "int", int(1))], [assign("y", name("a"))]),
				]),
			));
			const body = container(document, "g").body;
			assert.deepEqual(body.slice(-2), [
				{
					name: "g__decision__y_0",
					output: { variable: "y", index: 3 },
					input: [
						{ variable: "IF_0", index: 0 },
						{ variable: "y", index: 2 },
						{ variable: "y", index: 1 },
					],
				},
				{
					name: "g__decision__z_0",
					output: { variable: "z", index: 2 },
					input: [
						{ variable: "IF_0", index: 0 },
						{ variable: "z", index: 1 },
						{ variable: "z", index: 0 },
					],
				},
			]);
			assert.deepEqual(container(document, "g").variables.map((v) => v.name), ["a", "y", "IF_0", "z"]);
		});

		it("should give repeated conditionals distinct names and versions", () => {
			const { document } = lower(module(
				def("twice", [["a", "int"]], [
					declare("y", "int", int(0)),
					ifElse(cmp(name("a"), "Gt", int(0)), [assign("y", int(1))]),
					ifElse(cmp(name("a"), "Gt", int(1)), [assign("y", int(2))]),
				]),
			));
			const names = document.functions.map((f) => f.name);
			assert.equal(new Set(names).size, names.length);
			assert.ok(names.includes("twice__condition__IF_1_0"));
			assert.deepEqual(container(document, "twice").body.at(-1), {
				name: "twice__decision__y_1",
				output: { variable: "y", index: 5 },
				input: [
					{ variable: "IF_1", index: 0 },
					{ variable: "y", index: 4 },
					{ variable: "y", index: 3 },
				],
			});
		});

		it("should not merge variables only read inside a branch", () => {
			const { document } = lower(module(
				def("h", [["a", "int"], ["b", "int"]], [
					ifElse(cmp(name("a"), "Gt", name("b")), [declare("c", "int", name("b"))]),
				]),
			));
			const decisions = document.functions.filter((f) => f.type === "decision");
			assert.deepEqual(decisions.map((f) => f.name), ["h__decision__c_0"]);
		});
	});

	//==========================================================================
	// Loops
	//==========================================================================

	describe("loops", () => {

		it("should lower a bounded loop into a loop plate", () => {
			const { document, lambdas } = lower(module(
				def("total", [["s", "int"]], [
					forRange("i", int(1), int(5), [assign("s", bin(name("s"), "Add", name("i")))]),
				]),
			));

			assert.deepEqual(plate(document), {
				name: "total__loop_plate__i_0",
				type: "loop_plate",
				input: ["s"],
				index_variable: "i",
				index_iteration_range: { start: 1, end: 5 },
				body: [
					{
						name: "total__assign__s_0",
						output: { variable: "s", index: 0 },
						input: [{ variable: "s", index: -1 }, { variable: "i", index: -1 }],
					},
				],
			});
			assert.deepEqual(container(document, "total"), {
				name: "total",
				type: "container",
				input: [{ name: "s", domain: "integer" }],
				variables: [{ name: "s", domain: "integer" }, { name: "i", domain: "integer" }],
				body: [{ name: "total__loop_plate__i_0", inputs: ["s"], output: {} }],
			});
			assert.deepEqual(document.functions.map((f) => f.name), [
				"total__assign__s_0",
				"total__loop_plate__i_0",
				"total",
			]);
			assert.equal(lambdas, "def total__lambda__s_0(s, i):\n    s = s + i\n    return s\n\n");
		});

		it("should keep loop-local variables out of the enclosing scope", () => {
			const { document } = lower(module(
				def("acc", [["n", "int"]], [
					declare("s", "int", int(0)),
					forRange("i", int(0), name("n"), [
						declare("t", "int", name("i")),
						assign("s", bin(name("s"), "Add", name("t"))),
					]),
				]),
			));
			const loop = plate(document);
			assert.deepEqual(loop.input, ["t", "s"]);
			assert.deepEqual(loop.index_iteration_range, { start: 0, end: { variable: "n", index: 0 } });
			assert.deepEqual(container(document, "acc").variables.map((v) => v.name), ["n", "s", "i"]);
		});

		it("should not merge the condition of an if nested in a loop branch", () => {
			const { document } = lower(module(
				def("f", [["n", "int"], ["x", "int"]], [
					declare("s", "int", int(0)),
					forRange("i", name("x"), name("n"), [
						ifElse(cmp(name("i"), "Gt", int(1)), [
							ifElse(cmp(name("i"), "Gt", int(2)), [assign("s", int(1))]),
						]),
					]),
				]),
			));

			const loop = plate(document);
			assert.deepEqual(loop.input, ["IF_0", "IF_1", "s"]);
			assert.deepEqual(loop.body, [
				{ name: "f__condition__IF_0_0", output: { variable: "IF_0", index: 0 }, input: [{ variable: "i", index: -1 }] },
				{ name: "f__condition__IF_1_0", output: { variable: "IF_1", index: 0 }, input: [{ variable: "i", index: -1 }] },
				{ name: "f__assign__s_1", output: { variable: "s", index: 0 }, input: [] },
				{
					name: "f__decision__s_0",
					output: { variable: "s", index: 1 },
					input: [{ variable: "IF_1", index: 0 }, { variable: "s", index: 0 }, { variable: "s", index: -1 }],
				},
				{
					name: "f__decision__s_1",
					output: { variable: "s", index: 2 },
					input: [{ variable: "IF_0", index: 0 }, { variable: "s", index: 1 }, { variable: "s", index: -1 }],
				},
			]);
			const decisions = document.functions.filter((fn) => fn.type === "decision");
			assert.deepEqual(decisions.map((fn) => fn.name), ["f__decision__s_0", "f__decision__s_1"]);
			assert.equal(validatePgm(document).valid, true);
		});

		it("should accept folded literal bounds", () => {
			const { document } = lower(module(
				def("f", [], [
					forRange("i", int(0), bin(int(10), "FloorDiv", int(2)), [callStmt("tick", name("i"))]),
				]),
			));
			assert.deepEqual(plate(document).index_iteration_range, { start: 0, end: 5 });
		});

		it("should reject non-range iterables", () => {
			const err = lowerError(module(def("f", [], [
				{ kind: "for", target: store("i"), iter: name("xs"), body: [], orelse: [] },
			])));
			assert.deepEqual(err, { code: ErrorCodes.UnsupportedConstruct, message: "Can only iterate over a range" });
		});

		it("should reject malformed range bounds", () => {
			const oneArg = lowerError(module(def("f", [], [
				{ kind: "for", target: store("i"), iter: call("range", int(3)), body: [], orelse: [] },
			])));
			assert.equal(oneArg.code, ErrorCodes.UnsupportedRange);

			const compound = lowerError(module(def("f", [["n", "int"]], [
				forRange("i", int(0), bin(name("n"), "Add", int(1)), []),
			])));
			assert.deepEqual(compound, {
				code: ErrorCodes.UnsupportedRange,
				message: "Range end must be a single literal or variable",
			});

			const real = lowerError(module(def("f", [], [forRange("i", int(0), float(2.5), [])])));
			assert.deepEqual(real, { code: ErrorCodes.UnsupportedRange, message: "Range end must be an integer" });
		});

		it("should reject tuple loop targets", () => {
			const err = lowerError(module(def("f", [], [{
				kind: "for",
				target: { kind: "tuple", elts: [store("i"), store("j")], ctx: "store" },
				iter: call("range", int(0), int(2)),
				body: [],
				orelse: [],
			}])));
			assert.equal(err.code, ErrorCodes.MultipleLoopIndices);
		});

		it("should reject for/else", () => {
			const err = lowerError(module(def("f", [], [{
				kind: "for",
				target: store("i"),
				iter: call("range", int(0), int(2)),
				body: [],
				orelse: [callStmt("done")],
			}])));
			assert.deepEqual(err, { code: ErrorCodes.UnsupportedConstruct, message: "For/else is not supported" });
		});
	});

	//==========================================================================
	// Call statements
	//==========================================================================

	describe("call statements", () => {

		it("should record variable arguments and skip literals", () => {
			const { document } = lower(module(
				def("f", [], [declare("x", "int", int(2)), callStmt("show", name("x"), int(1))]),
			));
			assert.deepEqual(container(document, "f").body[1], {
				function: "show",
				output: {},
				input: [{ variable: "x", index: 1 }],
			});
		});

		it("should reject compound and nested arguments", () => {
			const compound = lowerError(module(def("f", [["x", "int"]], [
				callStmt("show", bin(name("x"), "Add", name("x"))),
			])));
			assert.deepEqual(compound, {
				code: ErrorCodes.UnsupportedConstruct,
				message: "Only 1 input per argument is supported in call statements",
			});
			const nested = lowerError(module(def("f", [["x", "int"]], [
				callStmt("show", call("g", name("x"))),
			])));
			assert.deepEqual(nested, {
				code: ErrorCodes.UnsupportedConstruct,
				message: "Nested calls are not supported in call statements",
			});
		});

		it("should reject expression statements that are not calls", () => {
			const err = lowerError(module(def("f", [], [{ kind: "expr", value: name("x") }])));
			assert.equal(err.code, ErrorCodes.UnsupportedConstruct);
		});
	});

	//==========================================================================
	// Types and unsupported constructs
	//==========================================================================

	describe("errors", () => {

		it("should require parameter annotations", () => {
			const err = lowerError(module({
				kind: "functionDef",
				name: "f",
				args: [{ name: "p" }],
				body: [],
			}));
			assert.deepEqual(err, { code: ErrorCodes.UnsupportedType, message: "Missing type annotation for 'p'" });
		});

		it("should reject unknown annotations", () => {
			const err = lowerError(module(def("f", [], [declare("d", "dict", int(1))])));
			assert.deepEqual(err, { code: ErrorCodes.UnsupportedType, message: "Unsupported type annotation for 'd'" });
		});

		it("should reject body variables without a known domain", () => {
			const err = lowerError(module(def("f", [["a", "int"]], [assign("b", name("a"))])));
			assert.deepEqual(err, { code: ErrorCodes.UnsupportedType, message: "No declared type for variable 'b' in 'f'" });
		});

		it("should reject unsupported statements by name", () => {
			const err = lowerError(module(def("f", [], [{ kind: "unsupported", nodeType: "While", line: 4 }])));
			assert.deepEqual(err, { code: ErrorCodes.UnsupportedConstruct, message: "No handler for While" });
		});

		it("should reject variable array indices", () => {
			const err = lowerError(module(def("f", [["k", "int"]], [
				assign({ kind: "subscript", value: name("a"), slice: name("k"), ctx: "store" }, int(1)),
			])));
			assert.equal(err.code, ErrorCodes.ArrayIndexingUnsupported);
		});

		it("should reject a function defined twice", () => {
			const err = lowerError(
				module(def("main", [], [declare("x", "int", int(1))])),
				module(def("main", [], [declare("y", "int", int(2))])),
			);
			assert.deepEqual(err, { code: ErrorCodes.UnsupportedConstruct, message: "Duplicate function 'main'" });
		});

		it("should produce nothing when a later function fails", () => {
			const result = translate([module(
				def("ok", [], [declare("x", "int", int(1))]),
				def("bad", [], [{ kind: "unsupported", nodeType: "While" }]),
			)]);
			assert.equal(result.ok, false);
			assert.equal("document" in result, false);
		});

		it("should throw from lowerProgram", () => {
			assert.throws(
				() => lowerProgram([module(def("f", [], [{ kind: "unsupported", nodeType: "With" }]))]),
				{ name: "PGMError", code: ErrorCodes.UnsupportedConstruct },
			);
		});
	});

	//==========================================================================
	// Module top level
	//==========================================================================

	describe("module top level", () => {

		it("should find the start call inside a main guard", () => {
			const logger = recordingLogger();
			const result = translate([module(
				{ kind: "unsupported", nodeType: "Import", line: 1 },
				def("main", [], []),
				ifElse(cmp(name("__name__"), "Eq", str("__main__")), [callStmt("main"), callStmt("other")]),
			)], { dateCreated: DATE, logger });
			if (!result.ok) assert.fail(result.error.describe());

			assert.equal(result.document.start, "main");
			assert.deepEqual(result.document.functions, [
				{ name: "main", type: "container", input: [], variables: [], body: [] },
			]);
			assert.deepEqual(logger.lines.slice(0, 2), [
				"debug Ignoring top-level Import at line 1",
				"debug Ignoring additional top-level call 'other'; start is 'main'",
			]);
		});

		it("should leave start empty without a top-level call", () => {
			const { document } = lower(module(def("main", [], [])));
			assert.equal(document.start, "");
		});

		it("should merge several modules into one document", () => {
			const { document } = lower(
				module(def("helper", [["v", "int"]], [])),
				module(def("main", [], [callStmt("helper", int(1))]), callStmt("main")),
			);
			assert.deepEqual(document.functions.map((f) => f.name), ["helper", "main"]);
			assert.equal(document.start, "main");
		});

		it("should honour the document name option", () => {
			const result = translate([module()], { documentName: "model.json", dateCreated: DATE });
			if (!result.ok) assert.fail(result.error.describe());
			assert.equal(result.document.name, "model.json");
			assert.deepEqual(result.document.functions, []);
		});
	});

	//==========================================================================
	// Document invariants
	//==========================================================================

	describe("document invariants", () => {

		it("should produce documents that validate", () => {
			const { document } = lower(module(
				def("main", [["n", "int"]], [
					declare("s", "int", int(0)),
					ifElse(cmp(name("n"), "Gt", int(2)), [assign("s", int(1))], [assign("s", name("n"))]),
					forRange("i", int(0), name("n"), [assign("s", bin(name("s"), "Add", name("i")))]),
					callStmt("report", name("s")),
				]),
				callStmt("main"),
			));
			const result = validatePgm(document);
			assert.deepEqual(result.errors, []);
			assert.equal(result.valid, true);
			assert.deepEqual(result.externalCallees, ["report"]);
		});
	});
});
