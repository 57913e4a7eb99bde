// SPDX-License-Identifier: MIT
// PGM Fixture Lowering - Integration Tests
// Lowers every dumped syntax tree under test/fixtures and checks the result

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { basename, dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { globSync } from "glob";

import { loadModule } from "../src/cli-utils.js";
import { ErrorCodes } from "../src/errors.js";
import { translate, type Translation } from "../src/lower/index.js";
import { validatePgm } from "../src/validator.js";
import type { PgmDocument } from "../src/zod-schemas.js";

//==============================================================================
// Discovery
//==============================================================================

const FIXTURES = resolve(dirname(fileURLToPath(import.meta.url)), "fixtures");

/** Fixtures that must be rejected, by file name */
const REJECTED: Record<string, { code: string; message: string }> = {
	"unsupported.ast.json": { code: ErrorCodes.UnsupportedConstruct, message: "No handler for While" },
};

function discoverFixtures(): string[] {
	return globSync("*.ast.json", { cwd: FIXTURES, absolute: true }).sort();
}

async function lowerFixture(name: string): Promise<Translation> {
	const module = await loadModule(resolve(FIXTURES, name));
	const result = translate([module], { dateCreated: "2024-01-02" });
	if (!result.ok) assert.fail(result.error.describe());
	return result;
}

function lambdaNames(doc: PgmDocument): string[] {
	return doc.functions.flatMap((fn) =>
		fn.type === "assign"
			? fn.body.flatMap((b) => (b.type === "lambda" ? [b.name] : []))
			: [],
	);
}

//==============================================================================
// Test Suite
//==============================================================================

describe("PGM Fixture Lowering - Integration Tests", () => {
	const files = discoverFixtures();

	it("should find the fixtures", () => {
		assert.equal(files.length >= 4, true);
	});

	for (const path of files) {
		const file = basename(path);
		const rejected = REJECTED[file];

		if (rejected) {
			it(`should reject ${file}`, async () => {
				const result = translate([await loadModule(path)]);
				if (result.ok) assert.fail("expected lowering to fail");
				assert.equal(result.error.code, rejected.code);
				assert.equal(result.error.message, rejected.message);
			});
			continue;
		}

		it(`should lower ${file} into a valid document`, async () => {
			const { document, lambdas } = await lowerFixture(file);
			const validation = validatePgm(document);
			assert.deepEqual(validation.errors, []);
			assert.equal(validation.valid, true);

			const names = document.functions.map((fn) => fn.name);
			assert.equal(new Set(names).size, names.length);

			for (const lambda of lambdaNames(document)) {
				assert.equal(lambdas.includes(`def ${lambda}(`), true, `missing lambda ${lambda}`);
			}
		});
	}

	//==========================================================================
	// Fixture specifics
	//==========================================================================

	describe("accumulate", () => {

		it("should start at the function called under the main guard", async () => {
			const { document, lambdas } = await lowerFixture("accumulate.ast.json");
			assert.equal(document.start, "accumulate");
			assert.deepEqual(document.functions.map((fn) => fn.name), [
				"accumulate__assign__total_0",
				"accumulate__assign__total_1",
				"accumulate__loop_plate__i_0",
				"accumulate",
			]);
			assert.deepEqual(document.functions[2], {
				name: "accumulate__loop_plate__i_0",
				type: "loop_plate",
				input: ["total"],
				index_variable: "i",
				index_iteration_range: { start: 0, end: { variable: "n", index: 0 } },
				body: [{
					name: "accumulate__assign__total_1",
					output: { variable: "total", index: 0 },
					input: [{ variable: "total", index: -1 }, { variable: "i", index: -1 }],
				}],
			});
			assert.equal(lambdas, "def accumulate__lambda__total_0(total, i):\n    total = total + i\n    return total\n\n");
		});

		it("should read the pre-loop version after the loop", async () => {
			const { document } = await lowerFixture("accumulate.ast.json");
			const fn = document.functions[3];
			if (fn?.type !== "container") assert.fail("expected a container");
			assert.deepEqual(fn.body[2], { function: "print", output: {}, input: [{ variable: "total", index: 1 }] });
			assert.deepEqual(validatePgm(document).externalCallees, ["print"]);
		});
	});

	describe("classify", () => {

		it("should ignore the import and start at main", async () => {
			const { document } = await lowerFixture("classify.ast.json");
			assert.equal(document.start, "main");
			assert.deepEqual(document.functions.at(-1), {
				name: "main",
				type: "container",
				input: [],
				variables: [],
				body: [{ function: "classify", output: {}, input: [] }],
			});
		});

		it("should merge the branches into a decision", async () => {
			const { document, lambdas } = await lowerFixture("classify.ast.json");
			const decision = document.functions.find((fn) => fn.type === "decision");
			assert.deepEqual(decision, {
				name: "classify__decision__label_0",
				type: "decision",
				target: "label",
				sources: [
					{ name: "IF_0_0", type: "variable" },
					{ name: "label_2", type: "variable" },
					{ name: "label_3", type: "variable" },
				],
			});
			const classify = document.functions.find((fn) => fn.name === "classify");
			if (classify?.type !== "container") assert.fail("expected a container");
			assert.deepEqual(classify.body.at(-1), {
				function: "print",
				output: {},
				input: [{ variable: "label", index: 4 }, { variable: "scaled", index: 1 }],
			});
			assert.equal(
				lambdas,
				"def classify__lambda__IF_0_0(x, limit):\n    return x > limit\n\n" +
				"def classify__lambda__scaled_0(x):\n    scaled: float = math.sqrt(x) * 2.0\n    return scaled\n\n",
			);
		});

		it("should list a dotted callee as a function source", async () => {
			const { document } = await lowerFixture("classify.ast.json");
			const scaled = document.functions.find((fn) => fn.name === "classify__assign__scaled_0");
			if (scaled?.type !== "assign") assert.fail("expected an assign function");
			assert.deepEqual(scaled.sources, [
				{ name: "math.sqrt", type: "function" },
				{ name: "x", type: "variable" },
			]);
		});
	});

	describe("arrays", () => {

		it("should version every element write of the array", async () => {
			const { document } = await lowerFixture("arrays.ast.json");
			assert.equal(document.start, "fill");
			const fill = document.functions.find((fn) => fn.name === "fill");
			if (fill?.type !== "container") assert.fail("expected a container");
			assert.deepEqual(fill.variables, [
				{ name: "v", domain: "integer" },
				{ name: "a", domain: "integer" },
				{ name: "first", domain: "integer" },
				{ name: "k", domain: "integer" },
			]);
			assert.deepEqual(fill.body.slice(0, 4), [
				{ name: "fill__assign__a_0", output: { variable: "a", index: 1 }, input: [] },
				{
					name: "fill__assign__a_1",
					output: { variable: "a", index: 2 },
					input: [{ variable: "a", index: 1 }, { variable: "v", index: 0 }],
				},
				{
					name: "fill__assign__a_2",
					output: { variable: "a", index: 3 },
					input: [{ variable: "a", index: 2 }, { variable: "v", index: 0 }],
				},
				{
					name: "fill__assign__first_0",
					output: { variable: "first", index: 1 },
					input: [{ variable: "a", index: 3 }],
				},
			]);
		});

		it("should keep list repetition as a lambda", async () => {
			const { lambdas } = await lowerFixture("arrays.ast.json");
			assert.equal(
				lambdas.startsWith("def fill__lambda__a_0():\n    a: List[int] = [0] * 5\n    return a\n\n"),
				true,
			);
			assert.equal(lambdas.includes("    a[-1] = v + 1\n"), true);
		});
	});
});
