import { expect, test } from "vitest";
import {
	MealyMachine,
	MooreMachine,
	State,
	type StepData,
	UndefinedTransitionError,
	UnreachableStateError,
} from "../src/mod.ts";

const createMonitor = () => {
	const q0 = new State<string, string>("q0", { initial: true });
	const q1 = new State<string, string>("q1");
	q0.addTransition("a", q0, "Normal operation");
	q0.addTransition("b", q1, "Detected erroneous input");
	q1.addTransition("b", q1, "Clearing erroneous input");
	q1.addTransition("a", q0, "Returning to normal operation");
	return { q0, q1, machine: new MealyMachine(q0, { alphabet: ["a", "b"] }) };
};

test("mealy machine emits edge outputs", () => {
	const { machine, q0, q1 } = createMonitor();

	expect(machine.current).toBe(q0);
	expect(machine.forward("a")).toBe("Normal operation");
	expect(machine.forward("b")).toBe("Detected erroneous input");
	expect(machine.current).toBe(q1);
	expect(machine.step("b")).toBe("Clearing erroneous input");

	machine.reset();
	expect(machine.current).toBe(q0);
	expect(machine.step("b")).toBe("Detected erroneous input");
});

test("step is deterministic from a given position", () => {
	const first = createMonitor().machine;
	const second = createMonitor().machine;

	first.process("abb");
	second.process("abb");
	expect(first.step("a")).toBe(second.step("a"));
	expect(first.current.name).toBe(second.current.name);

	first.reset();
	const output = first.step("b");
	first.reset();
	expect(first.step("b")).toBe(output);
	expect(first.current.name).toBe("q1");
});

test("undefined transition leaves the position unchanged", () => {
	const { machine, q1 } = createMonitor();
	machine.step("b");

	expect(() => machine.step("c")).toThrow(UndefinedTransitionError);
	expect(machine.current).toBe(q1);

	// still usable afterwards
	expect(machine.step("a")).toBe("Returning to normal operation");
});

test("process returns outputs in order and keeps consumed symbols", () => {
	const { machine, q1 } = createMonitor();

	expect(machine.process(["a", "b", "a"])).toEqual([
		"Normal operation",
		"Detected erroneous input",
		"Returning to normal operation",
	]);

	expect(() => machine.process("bxa")).toThrow(UndefinedTransitionError);
	expect(machine.current).toBe(q1);
});

test("edges without output emit undefined", () => {
	const p = new State<number, string>("p", { initial: true });
	p.addTransition(0, p).addTransition(1, p, "one");
	const machine = new MealyMachine(p);

	expect(machine.process([0, 1, 0])).toEqual([undefined, "one", undefined]);
	expect(machine.alphabet).toEqual([]);
});

test("subscribe", () => {
	const { machine } = createMonitor();
	const log: StepData<string, string>[] = [];

	const unsub = machine.subscribe((x) => log.push(x));
	machine.step("b");
	expect(() => machine.step("c")).toThrow();
	machine.reset();
	unsub();
	machine.step("a");

	expect(log).toEqual([
		{ current: "q0", previous: null, symbol: null, output: null },
		{
			current: "q1",
			previous: "q0",
			symbol: "b",
			output: "Detected erroneous input",
		},
		{ current: "q0", previous: null, symbol: null, output: null },
	]);
});

test("starting position must be reachable", () => {
	const { q0, q1 } = createMonitor();
	const stray = new State<string, string>("stray");

	expect(new MealyMachine(q0, { current: q1 }).current).toBe(q1);
	expect(() => new MealyMachine(q0, { current: stray })).toThrow(
		UnreachableStateError
	);
	expect(() => new MealyMachine(q0, { current: stray })).toThrow(
		'State "stray" is not reachable from "q0"'
	);
});

test("moore machine emits the output of the state reached", () => {
	const even = new State<string, string>("even", {
		initial: true,
		output: "even",
	});
	const odd = new State<string, string>("odd", { output: "odd" });
	even.addTransition("a", odd).addTransition("b", even);
	odd.addTransition("a", even).addTransition("b", odd);

	const machine = new MooreMachine(even, { alphabet: "ab" });

	expect(machine.process("aab")).toEqual(["odd", "even", "even"]);
	expect(machine.step("a")).toBe("odd");
	expect(machine.current).toBe(odd);
	expect(machine.alphabet).toEqual(["a", "b"]);
	expect(() => machine.step("c")).toThrow(UndefinedTransitionError);
	expect(machine.current).toBe(odd);
});

test("rendering shows edge outputs", () => {
	const { machine } = createMonitor();

	expect(machine.toString()).toBe(
		[
			"q0",
			"  a -> q0 [Normal operation]",
			"  b -> q1 [Detected erroneous input]",
			"       q1",
			"         b -> q1 [Clearing erroneous input]",
			"         a -> q0 [Returning to normal operation]",
		].join("\n")
	);

	expect(machine.toMermaid()).toBe(
		`stateDiagram-v2
    [*] --> q0
    q0 --> q0: a / Normal operation
    q0 --> q1: b / Detected erroneous input
    q1 --> q1: b / Clearing erroneous input
    q1 --> q0: a / Returning to normal operation
`
	);
	expect(machine.states.map((s) => s.name)).toEqual(["q0", "q1"]);
});

test("debug logging", () => {
	const log: unknown[][] = [];
	const logger = {
		debug: (...args: unknown[]) => log.push(args),
		log: () => "",
		warn: () => "",
		error: () => "",
	};
	const { q0 } = createMonitor();
	const machine = new MealyMachine(q0, { debug: true, logger });
	machine.step("b");

	expect(log).toEqual([
		["[MealyMachine]", 'created at state "q0"'],
		["[MealyMachine]", 'step("b"): "q0" -> "q1"'],
	]);
});
