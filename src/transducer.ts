import { createPubSub, type Unsubscriber } from "@marianmeres/pubsub";
import { type FSMSymbol, UnreachableStateError } from "./errors.ts";
import { reachableStates, renderTree, toMermaid } from "./graph.ts";
import { createDebugLog, type DebugOptions } from "./logger.ts";
import type { Edge, State } from "./state.ts";

/** Constructor options of a transducer. */
export type TransducerOptions<TSymbol extends FSMSymbol, TOutput> =
	DebugOptions & {
		/** Declared input alphabet; informational, persisted with snapshots */
		alphabet?: Iterable<TSymbol>;
		/** Position to start from (default: initial); must be reachable */
		current?: State<TSymbol, TOutput>;
	};

/**
 * Published step data sent to subscribers. `previous`, `symbol` and `output`
 * are null for the initial notification and after `reset()`.
 */
export type StepData<TSymbol extends FSMSymbol, TOutput> = {
	current: string;
	previous: string | null;
	symbol: TSymbol | null;
	output: TOutput | null;
};

/**
 * Shared stepping engine of Mealy and Moore machines. Subclasses only decide
 * which output a taken edge produces.
 */
export abstract class Transducer<TSymbol extends FSMSymbol, TOutput> {
	readonly alphabet: readonly TSymbol[];

	#current: State<TSymbol, TOutput>;

	/** Internal pub sub */
	#pubsub = createPubSub();

	#debugLog: (...args: unknown[]) => void;

	constructor(
		public readonly initial: State<TSymbol, TOutput>,
		public readonly options: TransducerOptions<TSymbol, TOutput> = {}
	) {
		this.alphabet = [...new Set(options.alphabet ?? [])];
		this.#debugLog = createDebugLog(new.target.name, options);
		this.#current = options.current ?? initial;
		if (!reachableStates(initial).includes(this.#current)) {
			throw new UnreachableStateError(this.#current.name, initial.name);
		}
		this.#debugLog(`created at state "${this.#current.name}"`);
	}

	/** Output produced by taking `edge`. */
	protected abstract outputOf(
		edge: Edge<TSymbol, TOutput>
	): TOutput | undefined;

	/** The state reached after all symbols consumed so far. */
	get current(): State<TSymbol, TOutput> {
		return this.#current;
	}

	/**
	 * Consumes one symbol: follows the transition of the current state and
	 * returns its output. On `UndefinedTransitionError` the current state is
	 * left unchanged and the machine stays usable.
	 */
	step(symbol: TSymbol): TOutput | undefined {
		const previous = this.#current;
		let edge: Edge<TSymbol, TOutput>;
		try {
			edge = previous.transitionFor(symbol);
		} catch (e) {
			this.#debugLog(`step(${JSON.stringify(symbol)}) failed at "${previous.name}"`);
			throw e;
		}
		const output = this.outputOf(edge);
		this.#current = edge.target;
		// prettier-ignore
		this.#debugLog(`step(${JSON.stringify(symbol)}): "${previous.name}" -> "${edge.target.name}"`);
		this.#pubsub.publish("change", {
			current: edge.target.name,
			previous: previous.name,
			symbol,
			output: output ?? null,
		} satisfies StepData<TSymbol, TOutput>);
		return output;
	}

	/** Alias of `step`. */
	forward(symbol: TSymbol): TOutput | undefined {
		return this.step(symbol);
	}

	/**
	 * Steps through the whole sequence and returns the outputs in order.
	 * Symbols consumed before a failing one stay consumed.
	 */
	process(sequence: Iterable<TSymbol>): (TOutput | undefined)[] {
		const outputs: (TOutput | undefined)[] = [];
		for (const symbol of sequence) outputs.push(this.step(symbol));
		return outputs;
	}

	/**
	 * Returns to the initial state. Subscribers are notified.
	 * @returns The machine for chaining
	 */
	reset(): this {
		this.#debugLog(`reset() called, returning to "${this.initial.name}"`);
		this.#current = this.initial;
		this.#pubsub.publish("change", this.#getNotifyData());
		return this;
	}

	#getNotifyData(): StepData<TSymbol, TOutput> {
		return {
			current: this.#current.name,
			previous: null,
			symbol: null,
			output: null,
		};
	}

	/**
	 * Subscribes to position changes. The callback is invoked immediately with
	 * the current position and after every successful step or reset.
	 *
	 * @returns Unsubscriber function to stop receiving updates
	 */
	subscribe(cb: (data: StepData<TSymbol, TOutput>) => void): Unsubscriber {
		const unsub = this.#pubsub.subscribe("change", cb);
		cb(this.#getNotifyData());
		return unsub;
	}

	/** All states reachable from the initial state. */
	get states(): State<TSymbol, TOutput>[] {
		return reachableStates(this.initial);
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

/**
 * A Mealy machine: every consumed symbol emits the output stored on the edge
 * taken (or `undefined` for edges without one).
 *
 * @template TSymbol - Input symbol type
 * @template TOutput - Output symbol type
 *
 * @example
 * ```typescript
 * const q0 = new State<"a" | "b", string>("q0", { initial: true });
 * const q1 = new State<"a" | "b", string>("q1");
 * q0.addTransition("a", q0, "normal").addTransition("b", q1, "detected");
 * q1.addTransition("b", q1, "clearing").addTransition("a", q0, "recovered");
 *
 * const machine = new MealyMachine(q0);
 * machine.step("b"); // "detected"
 * machine.current.name; // "q1"
 * ```
 */
export class MealyMachine<
	TSymbol extends FSMSymbol = FSMSymbol,
	TOutput = unknown
> extends Transducer<TSymbol, TOutput> {
	protected outputOf(edge: Edge<TSymbol, TOutput>): TOutput | undefined {
		return edge.output;
	}
}

/**
 * A Moore machine: every consumed symbol emits the output of the state
 * reached.
 *
 * @template TSymbol - Input symbol type
 * @template TOutput - Output symbol type
 */
export class MooreMachine<
	TSymbol extends FSMSymbol = FSMSymbol,
	TOutput = unknown
> extends Transducer<TSymbol, TOutput> {
	protected outputOf(edge: Edge<TSymbol, TOutput>): TOutput | undefined {
		return edge.target.output;
	}
}
