import { DuplicateStateError, type FSMSymbol } from "./errors.ts";
import { reachableStates, renderTree, toMermaid } from "./graph.ts";
import { createDebugLog, type DebugOptions } from "./logger.ts";
import { State, type DFAState } from "./state.ts";

/** A hole in the transition function of a DFA. */
export type MissingTransition<TSymbol extends FSMSymbol> = {
	state: DFAState<TSymbol>;
	symbol: TSymbol;
};

/**
 * A deterministic finite acceptor over a declared alphabet.
 *
 * Totality is not validated on construction. A symbol without a transition
 * makes `accept` throw `UndefinedTransitionError` rather than reject; use
 * `isComplete`/`missingTransitions()` to check a machine up front, or
 * `complete()` to fill the holes with a rejecting sink.
 *
 * @template TSymbol - Input symbol type
 *
 * @example
 * ```typescript
 * const p = new State<0 | 1>("p", { initial: true, accepting: true });
 * const q = new State<0 | 1>("q");
 * p.addTransition(0, p).addTransition(1, q);
 * q.addTransition(0, q).addTransition(1, p);
 *
 * const dfa = new DFA(p, [0, 1]);
 * dfa.accept([1, 1]); // true
 * dfa.accept([1, 0]); // false
 * ```
 */
export class DFA<TSymbol extends FSMSymbol = FSMSymbol> {
	readonly alphabet: readonly TSymbol[];

	#debugLog: (...args: unknown[]) => void;

	constructor(
		public readonly initial: DFAState<TSymbol>,
		alphabet: Iterable<TSymbol>,
		public readonly options: DebugOptions = {}
	) {
		this.alphabet = [...new Set(alphabet)];
		this.#debugLog = createDebugLog("DFA", options);
		this.#debugLog(`DFA created with initial state "${initial.name}"`);
	}

	/**
	 * Walks `sequence` from the initial state and returns the state reached.
	 * @throws UndefinedTransitionError when a symbol has no transition
	 */
	run(sequence: Iterable<TSymbol>): DFAState<TSymbol> {
		let state = this.initial;
		for (const symbol of sequence) {
			state = state.transitionFor(symbol).target;
		}
		return state;
	}

	/**
	 * Checks whether the DFA accepts the given sequence. Every call starts
	 * from the initial state; nothing is remembered between calls.
	 *
	 * @throws UndefinedTransitionError when a symbol has no transition
	 */
	accept(sequence: Iterable<TSymbol>): boolean {
		try {
			const accepted = this.run(sequence).accepting;
			this.#debugLog(`accept() -> ${accepted}`);
			return accepted;
		} catch (e) {
			this.#debugLog(`accept() failed: ${e instanceof Error ? e.message : e}`);
			throw e;
		}
	}

	/** All states reachable from the initial state. */
	get states(): DFAState<TSymbol>[] {
		return reachableStates(this.initial);
	}

	/** Lists every (state, symbol) pair of the alphabet lacking a transition. */
	missingTransitions(): MissingTransition<TSymbol>[] {
		const missing: MissingTransition<TSymbol>[] = [];
		for (const state of this.states) {
			for (const symbol of this.alphabet) {
				if (!state.hasTransition(symbol)) missing.push({ state, symbol });
			}
		}
		return missing;
	}

	/** Whether each reachable state has a transition for every symbol. */
	get isComplete(): boolean {
		return this.missingTransitions().length === 0;
	}

	/**
	 * Returns a new DFA over copies of this machine's states, with every
	 * missing transition pointing to a non-accepting sink that loops on the
	 * whole alphabet. When nothing is missing no sink is added.
	 *
	 * This machine is left untouched.
	 *
	 * @throws DuplicateStateError if a sink is needed and `sinkName` is taken
	 */
	complete(sinkName = "q'"): DFA<TSymbol> {
		const missing = this.missingTransitions();
		if (missing.length && this.states.some((s) => s.name === sinkName)) {
			throw new DuplicateStateError(sinkName);
		}

		const copies = new Map<DFAState<TSymbol>, DFAState<TSymbol>>();
		for (const state of this.states) {
			copies.set(
				state,
				new State<TSymbol>(state.name, {
					initial: state.initial,
					accepting: state.accepting,
				})
			);
		}
		const copyOf = (state: DFAState<TSymbol>): DFAState<TSymbol> => {
			const copy = copies.get(state);
			if (!copy) throw new Error(`State "${state.name}" is not reachable`);
			return copy;
		};

		for (const [original, copy] of copies) {
			for (const [symbol, edge] of original.transitions) {
				copy.addTransition(symbol, copyOf(edge.target));
			}
		}

		if (missing.length) {
			this.#debugLog(`complete() adds sink "${sinkName}" for ${missing.length} holes`);
			const sink = new State<TSymbol>(sinkName);
			for (const symbol of this.alphabet) sink.addTransition(symbol, sink);
			for (const { state, symbol } of missing) {
				copyOf(state).addTransition(symbol, sink);
			}
		}

		return new DFA(copyOf(this.initial), this.alphabet, this.options);
	}

	/** Indented textual rendering of the graph (debug aid). */
	toString(): string {
		return renderTree(this.initial);
	}

	/** Mermaid stateDiagram-v2 rendering of the graph. */
	toMermaid(): string {
		return toMermaid(this.initial);
	}
}
