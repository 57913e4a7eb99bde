#!/usr/bin/env node
// PGM command-line driver
// Reads the inputs, lowers them into one document and writes the document and
// its lambda file. Nothing is written unless every step succeeds.

import { writeFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import {
	loadModule,
	parseArgs,
	USAGE,
	validateOptions,
} from "./cli-utils.js";
import { PGMError } from "./errors.js";
import { dumpSyntaxTree } from "./ingest/python.js";
import type { Module } from "./ingest/python-types.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { translate } from "./lower/index.js";
import { validatePgm } from "./validator.js";

async function loadAll(files: string[], logger: Logger): Promise<Module[]> {
	const modules: Module[] = [];
	for (const file of files) {
		logger.debug(`Reading ${file}`);
		modules.push(await loadModule(file));
	}
	return modules;
}

/**
 * Run the translator. Returns the process exit code: 0 on success, 1 when
 * translation fails, 2 on usage errors.
 */
export async function runCli(args: string[]): Promise<number> {
	const { options, problems } = parseArgs(args);
	const logger = createConsoleLogger({ verbose: options.verbose });

	if (options.help) {
		console.log(USAGE);
		return 0;
	}
	const checked = validateOptions(options);
	const usageErrors = [...problems, ...checked.errors.map((e) => e.message)];
	if (usageErrors.length > 0) {
		for (const message of usageErrors) logger.error(message);
		console.error(USAGE);
		return 2;
	}

	let modules: Module[];
	try {
		modules = await loadAll(options.files, logger);
	} catch (err) {
		if (err instanceof PGMError) {
			logger.error(err.describe());
			return 1;
		}
		throw err;
	}

	if (options.printAst) {
		for (const module of modules) console.log(dumpSyntaxTree(module));
	}

	const result = translate(modules, { documentName: options.pgmFile, logger });
	if (!result.ok) {
		logger.error(result.error.describe());
		return 1;
	}

	if (options.validate) {
		const validation = validatePgm(result.document);
		if (!validation.valid) {
			logger.error(PGMError.validation(validation.errors).describe());
			return 1;
		}
		for (const callee of validation.externalCallees) {
			logger.warn(`'${callee}' is not defined in the document`);
		}
	}

	await writeFile(options.pgmFile, JSON.stringify(result.document, null, 2) + "\n", "utf-8");
	await writeFile(options.lambdaFile, result.lambdas, "utf-8");
	logger.info(`Wrote ${options.pgmFile} (${String(result.document.functions.length)} functions) and ${options.lambdaFile}`);
	return 0;
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
	process.exitCode = await runCli(process.argv.slice(2));
}
