/**
 * PGM CLI Utilities
 *
 * Extracted CLI functions for testability and reusability:
 * - Argument parsing (flags, options with one or more values)
 * - Option validation
 * - Input loading (.py sources through the bridge, dumped .json trees)
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { z } from "zod/v4";
import {
	invalidResult,
	type ValidationResult,
	validResult,
} from "./errors.js";
import { parsePythonSource, parseSyntaxTree } from "./ingest/python.js";
import type { Module } from "./ingest/python-types.js";

/**
 * CLI options interface
 */
export interface Options {
  files: string[];
  pgmFile: string;
  lambdaFile: string;
  printAst: boolean;
  verbose: boolean;
  validate: boolean;
  help: boolean;
}

export const USAGE = [
	"Usage: pgmgen -f <file...> [options]",
	"",
	"Translate Python sources (.py) or dumped syntax trees (.json) into a PGM document.",
	"",
	"Options:",
	"  -f, --files <paths...>    Input files, lowered together into one document",
	"  -p, --pgm-file <path>     PGM document output (default: pgm.json)",
	"  -l, --lambda-file <path>  Lambda source output (default: lambdas.py)",
	"  -a, --print-ast           Print the normalized syntax tree of each input",
	"  -v, --verbose             Debug logging",
	"      --no-validate         Write the document without validating it",
	"  -h, --help                Show this help",
].join("\n");

function defaultOptions(): Options {
	return {
		files: [],
		pgmFile: "pgm.json",
		lambdaFile: "lambdas.py",
		printAst: false,
		verbose: false,
		validate: true,
		help: false,
	};
}

//==============================================================================
// Argument parsing
//==============================================================================

function processFlag(options: Options, arg: string): boolean {
	switch (arg) {
	case "--verbose": case "-v": options.verbose = true; return true;
	case "--print-ast": case "-a": options.printAst = true; return true;
	case "--no-validate": options.validate = false; return true;
	case "--help": case "-h": options.help = true; return true;
	default: return false;
	}
}

/** Values following position `i` up to the next option. */
function consumeValues(args: string[], i: number): string[] {
	const values: string[] = [];
	for (let j = i + 1; j < args.length; j++) {
		const next = args[j];
		if (next === undefined || next.startsWith("-")) break;
		values.push(next);
	}
	return values;
}

export interface ParsedArgs {
	options: Options;
	/** Unknown options and options missing their value */
	problems: string[];
}

/**
 * Parse command-line arguments
 *
 * @param args Argument array (typically from process.argv.slice(2))
 *
 * Supports:
 *   - Flags: --print-ast/-a, --verbose/-v, --help/-h, --no-validate
 *   - Options with values: --files/-f <paths...>, --pgm-file/-p <path>,
 *     --lambda-file/-l <path>
 *   - Bare paths, which are added to the input files
 */
export function parseArgs(args: string[]): ParsedArgs {
	const options = defaultOptions();
	const problems: string[] = [];

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === undefined) break;
		if (processFlag(options, arg)) continue;

		switch (arg) {
		case "--files": case "-f": {
			const values = consumeValues(args, i);
			if (values.length === 0) problems.push(arg + " requires at least one path");
			options.files.push(...values);
			i += values.length;
			break;
		}
		case "--pgm-file": case "-p":
		case "--lambda-file": case "-l": {
			const [value] = consumeValues(args, i);
			if (value === undefined) {
				problems.push(arg + " requires a path");
				break;
			}
			if (arg === "--pgm-file" || arg === "-p") options.pgmFile = value;
			else options.lambdaFile = value;
			i += 1;
			break;
		}
		default:
			if (arg.startsWith("-")) problems.push("Unknown option: " + arg);
			else options.files.push(arg);
		}
	}

	return { options, problems };
}

//==============================================================================
// Option validation
//==============================================================================

const OptionsSchema = z.object({
	files: z.array(z.string().min(1)).min(1, "no input files given (use --files)"),
	pgmFile: z.string().min(1),
	lambdaFile: z.string().min(1),
}).refine((o) => o.pgmFile !== o.lambdaFile, {
	message: "PGM and lambda outputs must be different files",
	path: ["lambdaFile"],
});

/**
 * Check that the options describe a runnable translation.
 */
export function validateOptions(options: Options): ValidationResult<Options> {
	const parsed = OptionsSchema.safeParse(options);
	if (parsed.success) return validResult(options);
	return invalidResult(parsed.error.issues.map((issue) => ({
		path: issue.path.map(String).join(".") || "$",
		message: issue.message,
	})));
}

//==============================================================================
// Input loading
//==============================================================================

/**
 * Read one input: `.py` files are parsed through the Python bridge, anything
 * else is taken to be a dumped syntax tree.
 */
export async function loadModule(filePath: string): Promise<Module> {
	const content = await readFile(filePath, "utf-8");
	return extname(filePath) === ".py" ? parsePythonSource(content) : parseSyntaxTree(content);
}
