#!/usr/bin/env -S npx tsx
/**
 * @module
 *
 * Demo CLI detecting flavor anomalies in a stream of lollipops: three
 * strawberry (`s`) or three lemon (`l`) lollipops in a row.
 *
 * Runs the whole input once, reporting each anomaly with its 1-based position.
 * Then replays the input in two halves, saving the machine to a snapshot file
 * after the first half and continuing from the reloaded snapshot, and reports
 * whether the resumed run matched the uninterrupted one.
 *
 * @example Usage via npm script
 * ```sh
 * npm run lollipop -- sssllll
 * npm run lollipop -- sssllll --snapshot /tmp/machine.json --debug
 * ```
 */

import { createClog } from "@marianmeres/clog";
import { Command } from "commander";
import {
	AutomatonError,
	createRepeatDetector,
	load,
	save,
	UndefinedTransitionError,
} from "../src/mod.ts";

const FLAVORS: Record<string, string> = { s: "strawberry", l: "lemon" };

const program = new Command()
	.name("lollipop")
	.description("Detect three lollipops of the same flavor in a row")
	.argument("<input>", 'sequence of flavors, e.g. "sslllsl"')
	.option("--snapshot <path>", "snapshot file path", "./machine.json")
	.option("--debug", "enable debug logging", false)
	.parse();

const [input] = program.args;
const options = program.opts<{ snapshot: string; debug: boolean }>();
const clog = createClog("lollipop");
const machineOptions = { debug: options.debug, logger: clog };

const createDetector = () =>
	createRepeatDetector<string, string>({
		...machineOptions,
		alphabet: Object.keys(FLAVORS),
		error: (flavor) => `Error: three ${FLAVORS[flavor]} lollipops in a row`,
	});

try {
	const symbols = [...input];

	const expected = createDetector().process(symbols);
	expected.forEach((output, idx) => {
		if (output) console.log(output, "at position", idx + 1);
	});

	const half = Math.floor(symbols.length / 2);
	const first = createDetector();
	const resumedOutputs: unknown[] = first.process(symbols.slice(0, half));
	save(first, options.snapshot, machineOptions);

	const resumed = load(options.snapshot, machineOptions);
	resumedOutputs.push(...resumed.process(symbols.slice(half)));

	const same =
		resumedOutputs.length === expected.length &&
		resumedOutputs.every((output, idx) => output === expected[idx]);
	console.log(
		same
			? `Resumed from "${options.snapshot}" with identical results`
			: `Resumed run from "${options.snapshot}" diverged`
	);
	if (!same) process.exitCode = 1;
} catch (error) {
	if (error instanceof UndefinedTransitionError) {
		clog.error(`Unknown flavor ${JSON.stringify(error.symbol)}, use "s" or "l"`);
	} else if (error instanceof AutomatonError) {
		clog.error(`Error: ${error.message}`);
	} else {
		clog.error(`Error: ${error instanceof Error ? error.message : error}`);
	}
	process.exitCode = 1;
}
