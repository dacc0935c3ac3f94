/**
 * @module
 *
 * Deterministic finite-state machines: acceptors (DFA) classifying a sequence,
 * and transducers (Mealy and Moore machines) emitting one output per consumed
 * symbol. States are declared independently of any problem, wired into a
 * graph, and handed to a machine. Mealy machines can be saved mid-run and
 * resumed later from a JSON snapshot.
 *
 * @example Acceptor
 * ```typescript
 * import { DFA, State } from "automata-kit";
 *
 * const p = new State<0 | 1>("p", { initial: true, accepting: true });
 * const q = new State<0 | 1>("q");
 * p.addTransition(0, p).addTransition(1, q);
 * q.addTransition(0, q).addTransition(1, p);
 *
 * new DFA(p, [0, 1]).accept([1, 0, 1]); // true
 * ```
 *
 * @example Save and resume a transducer
 * ```typescript
 * import { createRepeatDetector, load, save } from "automata-kit";
 *
 * const detector = createRepeatDetector({
 *   alphabet: ["s", "l"],
 *   ok: "ok",
 *   error: (flavor) => `three ${flavor} in a row`,
 * });
 * detector.process("ss");
 * save(detector, "./machine.json");
 *
 * const resumed = load("./machine.json");
 * resumed.step("s"); // "three s in a row"
 * ```
 */

export * from "./errors.ts";
export * from "./logger.ts";
export * from "./state.ts";
export * from "./graph.ts";
export * from "./acceptor.ts";
export * from "./transducer.ts";
export * from "./repeat-detector.ts";
export * from "./snapshot.ts";
