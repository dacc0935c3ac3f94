import { readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { z } from "zod";
import { type FSMSymbol, MalformedSnapshotError } from "./errors.ts";
import { reachableStates } from "./graph.ts";
import { createDebugLog, type DebugOptions } from "./logger.ts";
import { State } from "./state.ts";
import { MealyMachine } from "./transducer.ts";

const SymbolSchema = z.union([z.string(), z.number().finite()]);

const SnapshotTransitionSchema = z.object({
	symbol: SymbolSchema,
	target: z.string(),
	output: SymbolSchema.optional(),
});

const SnapshotStateSchema = z.object({
	name: z.string(),
	initial: z.boolean(),
	accepting: z.boolean().optional(),
	transitions: z.array(SnapshotTransitionSchema),
});

/** Zod schema of the persisted form of a Mealy machine. */
export const SnapshotSchema = z.object({
	states: z.array(SnapshotStateSchema),
	current: z.string(),
	alphabet: z.array(SymbolSchema).optional(),
});

export type SnapshotTransition = z.infer<typeof SnapshotTransitionSchema>;
export type SnapshotState = z.infer<typeof SnapshotStateSchema>;

/**
 * Self-contained persisted form of a Mealy machine: its whole graph, with
 * states referring to each other by name, plus the name of the current state.
 *
 * @example
 * ```json
 * {
 *   "states": [
 *     { "name": "q0", "initial": true, "transitions": [
 *       { "symbol": "a", "target": "q0", "output": "ok" },
 *       { "symbol": "b", "target": "q1", "output": "error" }
 *     ] },
 *     { "name": "q1", "initial": false, "transitions": [
 *       { "symbol": "a", "target": "q0", "output": "ok" }
 *     ] }
 *   ],
 *   "current": "q1"
 * }
 * ```
 */
export type Snapshot = z.infer<typeof SnapshotSchema>;

/** JSON writes `NaN` and `Infinity` as `null`, which would not load back. */
const isPersistable = (value: FSMSymbol): boolean =>
	typeof value === "string" || Number.isFinite(value);

/**
 * Captures the graph reachable from `machine.initial` and the current
 * position. Each state is recorded once, in depth-first discovery order.
 *
 * @throws MalformedSnapshotError when a symbol or output is a non-finite
 * number
 */
export function toSnapshot<TSymbol extends FSMSymbol, TOutput extends FSMSymbol>(
	machine: MealyMachine<TSymbol, TOutput>
): Snapshot {
	const states: SnapshotState[] = reachableStates(machine.initial).map(
		(state) => ({
			name: state.name,
			initial: state === machine.initial,
			transitions: [...state.transitions].map(([symbol, edge]) => {
				const transition: SnapshotTransition = {
					symbol,
					target: edge.target.name,
				};
				if (edge.output !== undefined) transition.output = edge.output;
				return transition;
			}),
		})
	);

	const snapshot: Snapshot = { states, current: machine.current.name };
	if (machine.alphabet.length) snapshot.alphabet = [...machine.alphabet];

	const issues: string[] = [];
	for (const state of states) {
		for (const { symbol, output } of state.transitions) {
			if (!isPersistable(symbol)) {
				// prettier-ignore
				issues.push(`symbol ${symbol} on state "${state.name}" is not a finite number`);
			}
			if (output !== undefined && !isPersistable(output)) {
				// prettier-ignore
				issues.push(`output ${output} on state "${state.name}" is not a finite number`);
			}
		}
	}
	for (const symbol of snapshot.alphabet ?? []) {
		if (!isPersistable(symbol)) {
			issues.push(`alphabet symbol ${symbol} is not a finite number`);
		}
	}
	if (issues.length) throw new MalformedSnapshotError(issues);

	return snapshot;
}

/** Collects every structural inconsistency of a shape-valid snapshot. */
function findIssues(snapshot: Snapshot): string[] {
	const issues: string[] = [];
	const names = new Set<string>();

	for (const state of snapshot.states) {
		if (names.has(state.name)) {
			issues.push(`duplicate state "${state.name}"`);
		}
		names.add(state.name);
	}

	for (const state of snapshot.states) {
		const symbols = new Set<FSMSymbol>();
		for (const { symbol, target } of state.transitions) {
			if (symbols.has(symbol)) {
				// prettier-ignore
				issues.push(`duplicate transition ${JSON.stringify(symbol)} on state "${state.name}"`);
			}
			symbols.add(symbol);
			if (!names.has(target)) {
				// prettier-ignore
				issues.push(`transition ${JSON.stringify(symbol)} on state "${state.name}" targets undeclared state "${target}"`);
			}
		}
	}

	const initials = snapshot.states.filter((s) => s.initial);
	if (initials.length === 0) {
		issues.push("no initial state");
	} else if (initials.length > 1) {
		// prettier-ignore
		issues.push(`multiple initial states: ${initials.map((s) => `"${s.name}"`).join(", ")}`);
	}

	if (!names.has(snapshot.current)) {
		issues.push(`current state "${snapshot.current}" is not declared`);
	}

	return issues;
}

/**
 * Rebuilds a live Mealy machine from a snapshot document. All states are
 * created first and wired afterwards, so record order does not matter and
 * cycles resolve. The machine resumes at the recorded current state.
 *
 * @throws MalformedSnapshotError for any structural inconsistency; no
 * machine is constructed in that case
 */
export function fromSnapshot(
	document: unknown,
	options: DebugOptions = {}
): MealyMachine<FSMSymbol, FSMSymbol> {
	const debugLog = createDebugLog("Snapshot", options);
	const parsed = SnapshotSchema.safeParse(document);
	if (!parsed.success) {
		throw new MalformedSnapshotError(
			parsed.error.issues.map(
				(issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
			)
		);
	}

	const snapshot = parsed.data;
	const issues = findIssues(snapshot);
	if (issues.length) throw new MalformedSnapshotError(issues);

	const states = new Map<string, State<FSMSymbol, FSMSymbol>>();
	for (const record of snapshot.states) {
		states.set(
			record.name,
			new State<FSMSymbol, FSMSymbol>(record.name, {
				initial: record.initial,
				accepting: record.accepting,
			})
		);
	}
	const byName = (name: string): State<FSMSymbol, FSMSymbol> => {
		const state = states.get(name);
		if (!state) throw new MalformedSnapshotError([`undeclared state "${name}"`]);
		return state;
	};

	for (const record of snapshot.states) {
		const from = byName(record.name);
		for (const { symbol, target, output } of record.transitions) {
			from.addTransition(symbol, byName(target), output);
		}
	}

	const initialRecord = snapshot.states.find((s) => s.initial);
	if (!initialRecord) throw new MalformedSnapshotError(["no initial state"]);
	const initial = byName(initialRecord.name);
	const current = byName(snapshot.current);
	if (!reachableStates(initial).includes(current)) {
		throw new MalformedSnapshotError([
			`current state "${current.name}" is not reachable from "${initial.name}"`,
		]);
	}

	// prettier-ignore
	debugLog(`restored ${states.size} states, current state "${current.name}"`);
	return new MealyMachine(initial, {
		...options,
		alphabet: snapshot.alphabet,
		current,
	});
}

/**
 * Saves the machine and its current position as JSON at `path`.
 *
 * The document is written to a temporary sibling file which is then renamed
 * over `path`, so readers see either the previous file or the complete new
 * one. The temporary file is removed if anything fails.
 */
export function save<TSymbol extends FSMSymbol, TOutput extends FSMSymbol>(
	machine: MealyMachine<TSymbol, TOutput>,
	path: string,
	options: DebugOptions = {}
): void {
	const debugLog = createDebugLog("Snapshot", options);
	const json = JSON.stringify(toSnapshot(machine), null, "\t");
	const tmp = `${path}.${process.pid}.tmp`;
	try {
		writeFileSync(tmp, json);
		renameSync(tmp, path);
	} catch (e) {
		rmSync(tmp, { force: true });
		throw e;
	}
	debugLog(`saved to "${path}" at state "${machine.current.name}"`);
}

/**
 * Loads a machine saved by `save`. File system errors propagate unchanged.
 *
 * @throws MalformedSnapshotError when the file is not a valid snapshot
 */
export function load(
	path: string,
	options: DebugOptions = {}
): MealyMachine<FSMSymbol, FSMSymbol> {
	const debugLog = createDebugLog("Snapshot", options);
	const text = readFileSync(path, "utf8");
	let document: unknown;
	try {
		document = JSON.parse(text);
	} catch (e) {
		// prettier-ignore
		throw new MalformedSnapshotError([`invalid JSON: ${e instanceof Error ? e.message : String(e)}`]);
	}
	debugLog(`loading from "${path}"`);
	return fromSnapshot(document, options);
}
