/** Input symbol type accepted by every machine. */
export type FSMSymbol = string | number;

/** Base class of every error thrown by this library. */
export class AutomatonError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/**
 * Thrown when execution reaches a state with no transition for the symbol.
 * Acceptors surface it too, instead of treating the input as rejected.
 */
export class UndefinedTransitionError extends AutomatonError {
	constructor(
		public readonly state: string,
		public readonly symbol: FSMSymbol
	) {
		super(`No transition for symbol ${JSON.stringify(symbol)} from state "${state}"`);
	}
}

/** Thrown by strict states when a symbol already has an outgoing edge. */
export class DuplicateTransitionError extends AutomatonError {
	constructor(
		public readonly state: string,
		public readonly symbol: FSMSymbol
	) {
		// prettier-ignore
		super(`Transition for symbol ${JSON.stringify(symbol)} already defined on state "${state}"`);
	}
}

/** Thrown when a state name is already taken within a machine. */
export class DuplicateStateError extends AutomatonError {
	constructor(public readonly state: string) {
		super(`State "${state}" already exists`);
	}
}

/** Thrown when a transducer is asked to start from a state it cannot reach. */
export class UnreachableStateError extends AutomatonError {
	constructor(
		public readonly state: string,
		public readonly initial: string
	) {
		super(`State "${state}" is not reachable from "${initial}"`);
	}
}

/** Thrown when a snapshot cannot be turned back into a machine. */
export class MalformedSnapshotError extends AutomatonError {
	constructor(public readonly issues: string[]) {
		super(`Malformed snapshot: ${issues.join("; ")}`);
	}
}
