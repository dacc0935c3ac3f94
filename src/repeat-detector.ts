import type { FSMSymbol } from "./errors.ts";
import { State } from "./state.ts";
import type { DebugOptions } from "./logger.ts";
import { MealyMachine } from "./transducer.ts";

/** Options of `createRepeatDetector`. */
export type RepeatDetectorOptions<TSymbol extends FSMSymbol, TOutput> =
	DebugOptions & {
		alphabet: Iterable<TSymbol>;
		/** Run length reported as an anomaly (default: 3) */
		runLength?: number;
		/** Output of every step that is not an anomaly (default: none) */
		ok?: TOutput;
		/** Output of the step completing a run of `symbol` */
		error: (symbol: TSymbol) => TOutput;
	};

/**
 * Builds a Mealy machine flagging runs of identical consecutive symbols.
 *
 * The step that makes a run reach exactly `runLength` emits `error`; every
 * other step (including further repeats of an already reported run) emits
 * `ok`. States are `i` (initial) and `<symbol><count>` for each count from 1
 * to `runLength`. When those names would clash (symbols `1` and `"1"`, or
 * `"a"` and `"a1"` with long runs), every run state is named
 * `<index>:<count>` instead, `index` being the symbol's position in the
 * alphabet.
 *
 * @example
 * ```typescript
 * const detector = createRepeatDetector({
 *   alphabet: ["s", "l"],
 *   ok: "ok",
 *   error: () => "error",
 * });
 * detector.process("sssl"); // ["ok", "ok", "error", "ok"]
 * ```
 */
export function createRepeatDetector<TSymbol extends FSMSymbol, TOutput>(
	options: RepeatDetectorOptions<TSymbol, TOutput>
): MealyMachine<TSymbol, TOutput> {
	const { runLength = 3, ok, error, debug, logger } = options;
	if (!Number.isInteger(runLength) || runLength < 1) {
		throw new RangeError(`Invalid run length ${runLength}`);
	}

	const alphabet = [...new Set(options.alphabet)];
	const counts = Array.from({ length: runLength }, (_, k) => k + 1);
	let nameOf = (symbol: TSymbol, _idx: number, count: number) =>
		`${symbol}${count}`;
	const names = alphabet.flatMap((symbol, idx) =>
		counts.map((count) => nameOf(symbol, idx, count))
	);
	if (new Set(["i", ...names]).size !== names.length + 1) {
		nameOf = (_symbol, idx, count) => `${idx}:${count}`;
	}

	const initial = new State<TSymbol, TOutput>("i", { initial: true });
	// runs.get(symbol)[k] is the state after k + 1 consecutive `symbol`s
	const runs = new Map<TSymbol, State<TSymbol, TOutput>[]>();
	alphabet.forEach((symbol, idx) => {
		runs.set(
			symbol,
			counts.map(
				(count) => new State<TSymbol, TOutput>(nameOf(symbol, idx, count))
			)
		);
	});

	const wire = (
		from: State<TSymbol, TOutput>,
		count: number,
		last?: TSymbol
	) => {
		for (const [symbol, states] of runs) {
			const run = symbol === last ? count + 1 : 1;
			const output = run === runLength ? error(symbol) : ok;
			from.addTransition(symbol, states[Math.min(run, runLength) - 1], output);
		}
	};

	wire(initial, 0);
	for (const [symbol, states] of runs) {
		states.forEach((state, idx) => wire(state, idx + 1, symbol));
	}

	return new MealyMachine(initial, { alphabet, debug, logger });
}
