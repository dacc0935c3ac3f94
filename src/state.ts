import {
	DuplicateTransitionError,
	type FSMSymbol,
	UndefinedTransitionError,
} from "./errors.ts";

/**
 * Outgoing edge of a state. Acceptor edges never carry an output, Mealy edges
 * may carry one.
 *
 * @template TSymbol - Input symbol type
 * @template TOutput - Output symbol type (`never` for acceptors)
 */
export type Edge<TSymbol extends FSMSymbol, TOutput> = {
	target: State<TSymbol, TOutput>;
	output?: TOutput;
};

/** Constructor options of a state. */
export type StateOptions<TOutput> = {
	initial?: boolean;
	accepting?: boolean;
	/** State-level output, used by Moore machines */
	output?: TOutput;
	/** Throw `DuplicateTransitionError` instead of overwriting an existing edge */
	strict?: boolean;
};

/**
 * A named node of a machine graph holding its flags and its outgoing
 * transition table. The same node type serves acceptors, Mealy machines and
 * Moore machines; the machines differ only in how they walk it.
 *
 * States reference each other directly, so graphs may contain self-loops and
 * cycles. Execution never mutates a state.
 *
 * @example
 * ```typescript
 * const p = new State("p", { initial: true, accepting: true });
 * const q = new State("q");
 * p.addTransition(0, p).addTransition(1, q);
 * q.addTransition(0, q).addTransition(1, p);
 * ```
 */
export class State<TSymbol extends FSMSymbol = FSMSymbol, TOutput = never> {
	readonly initial: boolean;
	readonly accepting: boolean;
	readonly output: TOutput | undefined;
	readonly strict: boolean;

	#transitions = new Map<TSymbol, Edge<TSymbol, TOutput>>();

	constructor(
		public readonly name: string,
		options: StateOptions<TOutput> = {}
	) {
		this.initial = options.initial ?? false;
		this.accepting = options.accepting ?? false;
		this.output = options.output;
		this.strict = options.strict ?? false;
	}

	/** Read-only view of the transition table, in registration order. */
	get transitions(): ReadonlyMap<TSymbol, Edge<TSymbol, TOutput>> {
		return this.#transitions;
	}

	/**
	 * Registers the outgoing edge for `symbol`. An existing edge for the same
	 * symbol is replaced (last write wins) unless the state is strict.
	 *
	 * @returns The state itself for chaining
	 * @throws DuplicateTransitionError in strict mode when the symbol is taken
	 */
	addTransition(
		symbol: TSymbol,
		target: State<TSymbol, TOutput>,
		output?: TOutput
	): this {
		if (this.strict && this.#transitions.has(symbol)) {
			throw new DuplicateTransitionError(this.name, symbol);
		}
		this.#transitions.set(
			symbol,
			output === undefined ? { target } : { target, output }
		);
		return this;
	}

	/**
	 * Returns the edge registered for `symbol`.
	 * @throws UndefinedTransitionError if there is none
	 */
	transitionFor(symbol: TSymbol): Edge<TSymbol, TOutput> {
		const edge = this.#transitions.get(symbol);
		if (!edge) {
			throw new UndefinedTransitionError(this.name, symbol);
		}
		return edge;
	}

	hasTransition(symbol: TSymbol): boolean {
		return this.#transitions.has(symbol);
	}

	symbols(): TSymbol[] {
		return [...this.#transitions.keys()];
	}

	toString(): string {
		let label = `State(${this.name})`;
		if (this.initial) label = `> ${label}`;
		if (this.accepting) label = `${label} *`;
		return label;
	}
}

/** State of an acceptor: edges carry no output. */
export type DFAState<TSymbol extends FSMSymbol = FSMSymbol> = State<
	TSymbol,
	never
>;
